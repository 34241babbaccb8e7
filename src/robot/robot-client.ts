import type { z } from "zod";
import { logger } from "../config/logger.js";
import { ProvisioningError } from "../provisioning/errors.js";
import {
  apiErrorBodySchema,
  type RescueInfo,
  rescueEnvelopeSchema,
  type ServerInfo,
  serverListSchema,
  type TransactionRecord,
  transactionEnvelopeSchema,
  type VSwitchInfo,
  vswitchResponseSchema,
} from "./types.js";

export class RobotApiError extends Error {
  readonly name = "RobotApiError" as const;
  constructor(
    readonly statusCode: number,
    readonly code: string,
    readonly robotMessage: string,
  ) {
    super(`Robot API error ${statusCode} ${code}: ${robotMessage}`);
  }
}

/** Structural not-found check; never inspects message text. */
export function isNotFound(err: unknown): boolean {
  return err instanceof RobotApiError && err.statusCode === 404;
}

export interface OrderServerParams {
  productId: string;
  dist?: string;
  location?: string;
  password?: string;
  authorizedKeys?: readonly string[];
  addons?: readonly string[];
  test?: boolean;
}

export interface OrderMarketServerParams {
  productId: number;
  dist?: string;
  password?: string;
  authorizedKeys?: readonly string[];
  addons?: readonly string[];
  test?: boolean;
}

export type ResetType = "hw" | "sw" | "man";

export interface RobotClientOptions {
  username?: string;
  password?: string;
  baseUrl: string;
  timeoutSeconds: number;
}

type FormValue = string | number | boolean | readonly string[] | undefined;

function encodeForm(fields: Record<string, FormValue>): URLSearchParams {
  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
      form.append(key, String(value));
    } else {
      for (const item of value) form.append(`${key}[]`, item);
    }
  }
  return form;
}

/** Client for the Robot webservice: HTTP Basic auth, form-encoded requests, JSON responses. */
export class RobotClient {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly timeoutMs: number;

  constructor(options: RobotClientOptions) {
    if (!options.username || !options.password) {
      throw new ProvisioningError(
        "missing_credentials",
        "Robot credentials missing",
        "set HROBOT_USERNAME and HROBOT_PASSWORD or the manifest provider block",
      );
    }
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${options.username}:${options.password}`).toString("base64")}`;
    this.timeoutMs = options.timeoutSeconds * 1000;
  }

  // --- Orders

  async orderServer(params: OrderServerParams): Promise<TransactionRecord> {
    const form = encodeForm({
      product_id: params.productId,
      dist: params.dist,
      location: params.location,
      password: params.password,
      authorized_key: params.authorizedKeys,
      addon: params.addons,
      test: params.test ? "true" : undefined,
    });
    return this.request("POST", "/order/server/transaction", transactionEnvelopeSchema, form);
  }

  async orderMarketServer(params: OrderMarketServerParams): Promise<TransactionRecord> {
    const form = encodeForm({
      product_id: params.productId,
      dist: params.dist,
      password: params.password,
      authorized_key: params.authorizedKeys,
      addon: params.addons,
      test: params.test ? "true" : undefined,
    });
    return this.request("POST", "/order/server_market/transaction", transactionEnvelopeSchema, form);
  }

  async getOrderTransaction(id: string): Promise<TransactionRecord> {
    return this.request("GET", `/order/server/transaction/${encodeURIComponent(id)}`, transactionEnvelopeSchema);
  }

  async getMarketOrderTransaction(id: string): Promise<TransactionRecord> {
    return this.request("GET", `/order/server_market/transaction/${encodeURIComponent(id)}`, transactionEnvelopeSchema);
  }

  // --- Boot and power

  async activateRescue(serverNumber: number, authorizedKeys: readonly string[]): Promise<RescueInfo> {
    const form = encodeForm({ os: "linux", authorized_key: authorizedKeys });
    return this.request("POST", `/boot/${serverNumber}/rescue`, rescueEnvelopeSchema, form);
  }

  async reset(serverNumber: number, type: ResetType = "hw"): Promise<void> {
    await this.send("POST", `/reset/${serverNumber}`, encodeForm({ type }));
  }

  // --- Server

  async setServerName(serverNumber: number, name: string): Promise<void> {
    await this.send("POST", `/server/${serverNumber}`, encodeForm({ server_name: name }));
  }

  /** Request cancellation. `date` is "now", "end" (of billing period) or YYYY-MM-DD. */
  async cancelServer(serverNumber: number, date = "end"): Promise<void> {
    await this.send("POST", `/server/${serverNumber}/cancellation`, encodeForm({ cancellation_date: date }));
  }

  async listAllServers(): Promise<ServerInfo[]> {
    return this.request("GET", "/server", serverListSchema);
  }

  // --- vSwitch

  async addServerToVSwitch(vswitchId: number, serverIP: string): Promise<void> {
    await this.send("POST", `/vswitch/${vswitchId}/server`, encodeForm({ server: [serverIP] }));
  }

  async createVSwitch(vlan: number, name: string): Promise<VSwitchInfo> {
    const body = await this.send("POST", "/vswitch", encodeForm({ vlan, name }));
    return this.vswitchFrom(body, { vlan, name });
  }

  async getVSwitch(id: number): Promise<VSwitchInfo> {
    const body = await this.send("GET", `/vswitch/${id}`);
    return this.vswitchFrom(body, { id });
  }

  async updateVSwitch(id: number, vlan: number, name: string): Promise<VSwitchInfo> {
    const body = await this.send("POST", `/vswitch/${id}`, encodeForm({ vlan, name }));
    return this.vswitchFrom(body, { id, vlan, name });
  }

  async deleteVSwitch(id: number, date = "now"): Promise<void> {
    await this.send("DELETE", `/vswitch/${id}?cancellation_date=${encodeURIComponent(date)}`);
  }

  /** Parse a bare or wrapped vSwitch body; fields the API leaves out fall back to what was sent. */
  private vswitchFrom(body: string, sent: { id?: number; vlan?: number; name?: string }): VSwitchInfo {
    if (body.trim() === "" && sent.id !== undefined) {
      return { id: sent.id, vlan: sent.vlan ?? 0, name: sent.name ?? "", cancelled: false };
    }
    const parsed = this.parse(vswitchResponseSchema, body);
    return {
      id: parsed.id,
      vlan: parsed.vlan || sent.vlan || 0,
      name: parsed.name || sent.name || "",
      cancelled: parsed.cancelled ?? false,
    };
  }

  private async request<S extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    form?: URLSearchParams,
  ): Promise<z.output<S>> {
    return this.parse(schema, await this.send(method, path, form));
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: string): z.output<S> {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new RobotApiError(502, "INVALID_RESPONSE", `response is not JSON: ${body.slice(0, 200)}`);
    }
    const result = schema.safeParse(json);
    if (!result.success) {
      throw new RobotApiError(502, "INVALID_RESPONSE", result.error.issues.map((i) => i.message).join("; "));
    }
    return result.data;
  }

  private async send(method: string, path: string, form?: URLSearchParams): Promise<string> {
    const headers: Record<string, string> = { Authorization: this.authorization, Accept: "application/json" };
    if (form) headers["Content-Type"] = "application/x-www-form-urlencoded";

    logger.debug(`Robot ${method} ${path}`);
    const res = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: form?.toString(),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const body = await res.text();
    if (!res.ok) {
      const parsed = apiErrorBodySchema.safeParse(safeJson(body));
      const code = parsed.success ? (parsed.data.error.code ?? "UNKNOWN") : "UNKNOWN";
      const message = parsed.success ? (parsed.data.error.message ?? res.statusText) : body.slice(0, 200) || res.statusText;
      logger.warn(`Robot ${method} ${path} failed`, { status: res.status, code });
      throw new RobotApiError(res.status, code, message);
    }
    return body;
  }
}

function safeJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}
