import { logger } from "../config/logger.js";
import type { OrderService } from "../orders/order-service.js";
import type { ServerOrderSpec, ServerOrderState } from "../orders/types.js";
import { errorMessage } from "../provisioning/errors.js";
import type { ServerListCache } from "../robot/server-list-cache.js";
import {
  type LifecycleResult,
  pendingChangeWarning,
  pipelineOnlyChanges,
  replacementReasons,
  type ServerLifecycle,
} from "../servers/server-lifecycle.js";
import type { IManagedServerRepository } from "../servers/server-repository.js";
import type { ManagedServerSpec, ManagedServerState } from "../servers/types.js";
import type { VSwitchSpec, VSwitchState } from "../vswitch/vswitch-repository.js";
import type { VSwitchService } from "../vswitch/vswitch-service.js";
import { orderKey, orderSpecs, serverKey, vswitchKey, vswitchSpecs } from "./manifest-loader.js";
import type { Manifest, ServerBlock } from "./manifest-schema.js";

const ACTION_KINDS = ["create", "update", "replace", "delete", "noop", "retry"] as const;
export type ActionKind = (typeof ACTION_KINDS)[number];

export type ResourceType = "order" | "vswitch" | "server";

export interface PlannedAction {
  type: ResourceType;
  key: string;
  action: ActionKind;
  /** Why the action is needed, for display */
  reason?: string;
}

export type ActionOutcome = "ok" | "failed" | "skipped";

export interface ActionResult extends PlannedAction {
  outcome: ActionOutcome;
  warnings: string[];
  error?: string;
}

export interface ApplyReport {
  results: ActionResult[];
  /** True when any action failed */
  failed: boolean;
}

export interface ReconcilerDeps {
  orders: OrderService;
  vswitches: VSwitchService;
  servers: ServerLifecycle;
  serverRepo: IManagedServerRepository;
  /** Checks that fixed server numbers exist in the account before provisioning */
  inventory?: Pick<ServerListCache, "get">;
}

/** A server spec resolved against current state, or why it cannot be resolved yet. */
type Resolution = { spec: ManagedServerSpec } | { pending: string };

const DECLARED_ORDER_FIELDS = ["market", "productId", "dist", "location", "authorizedKeys", "addons", "test"] as const;

function orderChanges(state: ServerOrderState, spec: ServerOrderSpec): string[] {
  return DECLARED_ORDER_FIELDS.filter((field) => JSON.stringify(state[field]) !== JSON.stringify(spec[field]));
}

/** Compare declared fields only; JSON gives arrays and nested objects value semantics. */
function declaredView(server: ManagedServerSpec): string {
  return JSON.stringify({
    name: server.name,
    description: server.description ?? null,
    vswitchId: server.vswitchId ?? null,
    version: server.version,
    architecture: server.architecture,
    encryptionPassphrase: server.encryptionPassphrase,
    raidLevel: server.raidLevel,
    noUEFI: server.noUEFI,
    rescueKeyFingerprints: server.rescueKeyFingerprints,
    nodeLabels: server.nodeLabels,
    taints: server.taints,
    cluster: server.cluster ?? null,
    extraScript: server.extraScript ?? null,
  });
}

/**
 * Diffs a manifest against persisted state and applies the difference:
 * orders first, then vSwitches, then servers, with independent servers
 * provisioned concurrently. One failing resource does not stop the others.
 */
export class Reconciler {
  constructor(private readonly deps: ReconcilerDeps) {}

  plan(manifest: Manifest): PlannedAction[] {
    return [...this.planOrders(manifest), ...this.planVSwitches(manifest), ...this.planServers(manifest)];
  }

  async apply(manifest: Manifest, options: { signal?: AbortSignal } = {}): Promise<ApplyReport> {
    const results: ActionResult[] = [];
    for (const action of this.planOrders(manifest)) results.push(await this.applyOrder(manifest, action));
    for (const action of this.planVSwitches(manifest)) results.push(await this.applyVSwitch(manifest, action));

    // Servers resolve against the refreshed orders and vSwitches.
    const serverActions = this.planServers(manifest);
    results.push(
      ...(await Promise.all(serverActions.map((action) => this.applyServer(manifest, action, options.signal)))),
    );

    const failed = results.some((r) => r.outcome === "failed");
    logger.info("Apply finished", {
      actions: results.length,
      failed: results.filter((r) => r.outcome === "failed").length,
      skipped: results.filter((r) => r.outcome === "skipped").length,
    });
    return { results, failed };
  }

  // --- Orders

  private planOrders(manifest: Manifest): PlannedAction[] {
    const declared = orderSpecs(manifest);
    const declaredKeys = new Set(declared.map((o) => o.key));
    const actions: PlannedAction[] = declared.map((spec) => {
      const state = this.deps.orders.get(spec.key);
      if (!state) return { type: "order", key: spec.key, action: "create" };
      const changes = orderChanges(state, spec);
      return changes.length > 0
        ? { type: "order", key: spec.key, action: "replace", reason: `changed: ${changes.join(", ")}` }
        : { type: "order", key: spec.key, action: "noop" };
    });
    for (const state of this.deps.orders.list()) {
      if (!declaredKeys.has(state.key)) actions.push({ type: "order", key: state.key, action: "delete" });
    }
    return actions;
  }

  private async applyOrder(manifest: Manifest, action: PlannedAction): Promise<ActionResult> {
    const spec = orderSpecs(manifest).find((o) => o.key === action.key);
    return this.attempt(action, async (warnings) => {
      switch (action.action) {
        case "delete":
          this.deps.orders.forget(action.key);
          return;
        case "replace":
          this.deps.orders.forget(action.key);
          if (spec) await this.deps.orders.order(spec);
          return;
        case "create":
          if (spec) await this.deps.orders.order(spec);
          return;
        default: {
          const refreshed = await this.deps.orders.refresh(action.key);
          if (!refreshed) warnings.push("order transaction no longer known; removed from state");
        }
      }
    });
  }

  // --- vSwitches

  private planVSwitches(manifest: Manifest): PlannedAction[] {
    const declared = vswitchSpecs(manifest);
    const declaredKeys = new Set(declared.map((v) => v.key));
    const actions: PlannedAction[] = declared.map((spec) => {
      const state = this.deps.vswitches.get(spec.key);
      if (!state) return { type: "vswitch", key: spec.key, action: "create" };
      return vswitchChanged(state, spec)
        ? { type: "vswitch", key: spec.key, action: "update", reason: `vlan ${spec.vlan}, name ${spec.name}` }
        : { type: "vswitch", key: spec.key, action: "noop" };
    });
    for (const state of this.deps.vswitches.list()) {
      if (!declaredKeys.has(state.key)) actions.push({ type: "vswitch", key: state.key, action: "delete" });
    }
    return actions;
  }

  private async applyVSwitch(manifest: Manifest, action: PlannedAction): Promise<ActionResult> {
    const spec = vswitchSpecs(manifest).find((v) => v.key === action.key);
    return this.attempt(action, async (warnings) => {
      if (action.action === "delete") {
        await this.deps.vswitches.delete(action.key);
        return;
      }
      if (!spec) return;
      if (action.action === "create") {
        await this.deps.vswitches.create(spec);
        return;
      }
      if (action.action === "update") {
        await this.deps.vswitches.update(spec);
        return;
      }
      const live = await this.deps.vswitches.read(action.key);
      if (!live) {
        warnings.push("vSwitch gone from the account; recreating");
        await this.deps.vswitches.create(spec);
      }
    });
  }

  // --- Servers

  private planServers(manifest: Manifest): PlannedAction[] {
    const declaredKeys = new Set<string>();
    const actions: PlannedAction[] = [];
    for (const [name, block] of Object.entries(manifest.servers)) {
      const key = serverKey(name);
      declaredKeys.add(key);
      const state = this.deps.serverRepo.getByKey(key);
      const resolution = this.resolveServer(key, block, state);
      actions.push(planServer(key, state, resolution));
    }
    for (const state of this.deps.serverRepo.list()) {
      if (!declaredKeys.has(state.key)) actions.push({ type: "server", key: state.key, action: "delete" });
    }
    return actions;
  }

  private async applyServer(manifest: Manifest, action: PlannedAction, signal?: AbortSignal): Promise<ActionResult> {
    if (action.action === "delete") {
      return this.attempt(action, async (warnings) => {
        warnings.push(...(await this.deps.servers.teardown(action.key)).warnings);
      });
    }
    const name = action.key.slice("servers.".length);
    const block = manifest.servers[name];
    if (!block) return { ...action, outcome: "skipped", warnings: ["not declared"] };

    const state = this.deps.serverRepo.getByKey(action.key);
    const resolution = this.resolveServer(action.key, block, state);
    if ("pending" in resolution) {
      logger.warn(`Skipping ${action.key}: ${resolution.pending}`);
      return { ...action, outcome: "skipped", warnings: [resolution.pending] };
    }
    const { spec } = resolution;

    return this.attempt(action, async (warnings) => {
      const keep = (result: LifecycleResult) => warnings.push(...result.warnings);
      switch (action.action) {
        case "create":
          await this.checkInventory(spec);
          keep(await this.deps.servers.create(spec, { signal }));
          return;
        case "replace":
          await this.checkInventory(spec);
          warnings.push(...(await this.deps.servers.teardown(action.key)).warnings);
          keep(await this.deps.servers.create(spec, { signal }));
          return;
        case "retry":
          keep(await this.deps.servers.retry(spec, { signal }));
          return;
        case "update":
          keep(await this.deps.servers.update(spec, { signal }));
          return;
        default:
          return;
      }
    });
  }

  /**
   * Server number and IP come from the manifest or from the referenced order;
   * the vSwitch id from the manifest or from the referenced vSwitch's state.
   */
  private resolveServer(key: string, block: ServerBlock, state: ManagedServerState | null): Resolution {
    let serverNumber = block.serverNumber;
    let serverIP = block.serverIP;
    if (block.order !== undefined) {
      const order = this.deps.orders.get(orderKey(block.order));
      if (order && order.serverNumber !== null && order.serverIP) {
        serverNumber = order.serverNumber;
        serverIP = order.serverIP;
      } else if (state) {
        // Keep what the server was provisioned on; the order may have been forgotten since.
        serverNumber = state.serverNumber;
        serverIP = state.serverIP;
      } else {
        return { pending: `order ${block.order} is not ready (${order?.status ?? "not placed"})` };
      }
    }
    if (serverNumber === undefined || serverIP === undefined) {
      return { pending: "no server number or IP" };
    }

    let vswitchId = block.vswitchId;
    if (block.vswitch !== undefined) {
      const vswitch = this.deps.vswitches.get(vswitchKey(block.vswitch));
      if (!vswitch) return { pending: `vswitch ${block.vswitch} does not exist yet` };
      vswitchId = vswitch.vswitchId;
    }

    return {
      spec: {
        key,
        serverNumber,
        serverIP,
        name: block.name,
        description: block.description,
        vswitchId,
        version: block.version,
        architecture: block.architecture,
        encryptionPassphrase: block.encryptionPassphrase,
        raidLevel: block.raidLevel,
        noUEFI: block.noUEFI,
        rescueKeyFingerprints: block.rescueKeyFingerprints,
        nodeLabels: block.nodeLabels,
        taints: block.taints,
        cluster: block.cluster,
        extraScript: block.extraScript,
      },
    };
  }

  private async checkInventory(spec: ManagedServerSpec): Promise<void> {
    if (!this.deps.inventory) return;
    const server = await this.deps.inventory.get(spec.serverNumber);
    if (!server) throw new Error(`server ${spec.serverNumber} is not in the account`);
    if (server.serverIP && server.serverIP !== spec.serverIP) {
      throw new Error(`server ${spec.serverNumber} has IP ${server.serverIP}, not ${spec.serverIP}`);
    }
  }

  private async attempt(action: PlannedAction, run: (warnings: string[]) => Promise<void>): Promise<ActionResult> {
    const warnings: string[] = [];
    try {
      await run(warnings);
      return { ...action, outcome: "ok", warnings };
    } catch (err) {
      const message = errorMessage(err);
      logger.error(`${action.action} ${action.key} failed`, { error: message });
      return { ...action, outcome: "failed", warnings, error: message };
    }
  }
}

function vswitchChanged(state: VSwitchState, spec: VSwitchSpec): boolean {
  return state.vlan !== spec.vlan || state.name !== spec.name;
}

function planServer(key: string, state: ManagedServerState | null, resolution: Resolution): PlannedAction {
  if ("pending" in resolution) {
    return state
      ? { type: "server", key, action: "noop", reason: resolution.pending }
      : { type: "server", key, action: "create", reason: resolution.pending };
  }
  if (!state) return { type: "server", key, action: "create" };

  const { spec } = resolution;
  const reasons = replacementReasons(state, spec);
  if (reasons.length > 0) return { type: "server", key, action: "replace", reason: `changed: ${reasons.join(", ")}` };
  if (state.status !== "ready") {
    return { type: "server", key, action: "retry", reason: state.lastError ?? `status ${state.status}` };
  }
  if (declaredView(state) !== declaredView(spec)) {
    if (spec.version !== state.version) {
      return { type: "server", key, action: "update", reason: `version ${state.version} → ${spec.version}` };
    }
    const pending = pipelineOnlyChanges(state, spec);
    return {
      type: "server",
      key,
      action: "update",
      reason: pending.length > 0 ? pendingChangeWarning(pending) : undefined,
    };
  }
  return { type: "server", key, action: "noop" };
}
