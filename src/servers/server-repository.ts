import { eq } from "drizzle-orm";
import { z } from "zod";
import type { DrizzleDb } from "../db/index.js";
import { managedServers } from "../db/schema/index.js";
import { ARCHITECTURES, type Architecture } from "../provisioning/payloads.js";
import { isServerStatus, type ManagedServerState } from "./types.js";

type ManagedServerRow = typeof managedServers.$inferSelect;
type ManagedServerInsert = typeof managedServers.$inferInsert;

/** Persistence seam for the server lifecycle. Synchronous: better-sqlite3 is. */
export interface IManagedServerRepository {
  getByKey(key: string): ManagedServerState | null;
  list(): ManagedServerState[];
  /** Insert or replace the full row for `state.key`. */
  save(state: ManagedServerState): void;
  updateStage(key: string, stage: string): void;
  markFailed(key: string, error: string): void;
  delete(key: string): void;
  /** Every assigned private address; seeds the allocator at startup. */
  listLocalIps(): string[];
}

const stringList = z.array(z.string());
const labelList = z.array(z.object({ name: z.string(), value: z.string() }));

function parseJson<T>(schema: z.ZodType<T>, text: string, column: string): T {
  const result = schema.safeParse(JSON.parse(text));
  if (!result.success) throw new Error(`Corrupt ${column} column: ${result.error.message}`);
  return result.data;
}

function toArchitecture(value: string): Architecture {
  const match = ARCHITECTURES.find((a) => a === value);
  if (!match) throw new Error(`Corrupt architecture column: ${value}`);
  return match;
}

function toState(row: ManagedServerRow): ManagedServerState {
  return {
    key: row.key,
    id: row.id,
    serverNumber: row.serverNumber,
    serverIP: row.serverIP,
    name: row.name,
    description: row.description ?? undefined,
    vswitchId: row.vswitchId ?? undefined,
    version: row.version,
    architecture: toArchitecture(row.architecture),
    encryptionPassphrase: row.encryptionPassphrase,
    raidLevel: row.raidLevel,
    noUEFI: row.noUefi,
    rescueKeyFingerprints: parseJson(stringList, row.rescueKeyFingerprints, "rescue_key_fingerprints"),
    nodeLabels: parseJson(labelList, row.nodeLabels, "node_labels"),
    taints: parseJson(stringList, row.taints, "taints"),
    cluster:
      row.clusterUrl !== null && row.clusterToken !== null ? { url: row.clusterUrl, token: row.clusterToken } : undefined,
    extraScript: row.extraScript ?? undefined,
    localIP: row.localIP,
    serverName: row.serverName,
    robotName: row.robotName,
    status: isServerStatus(row.status) ? row.status : "failed",
    provisionStage: row.provisionStage,
    lastError: row.lastError,
  };
}

function toRow(state: ManagedServerState, now: number): ManagedServerInsert {
  return {
    key: state.key,
    id: state.id,
    serverNumber: state.serverNumber,
    serverIP: state.serverIP,
    name: state.name,
    description: state.description ?? null,
    vswitchId: state.vswitchId ?? null,
    version: state.version,
    architecture: state.architecture,
    encryptionPassphrase: state.encryptionPassphrase,
    raidLevel: state.raidLevel,
    noUefi: state.noUEFI,
    rescueKeyFingerprints: JSON.stringify(state.rescueKeyFingerprints),
    nodeLabels: JSON.stringify(state.nodeLabels),
    taints: JSON.stringify(state.taints),
    clusterUrl: state.cluster?.url ?? null,
    clusterToken: state.cluster?.token ?? null,
    extraScript: state.extraScript ?? null,
    localIP: state.localIP,
    serverName: state.serverName,
    robotName: state.robotName,
    status: state.status,
    provisionStage: state.provisionStage,
    lastError: state.lastError,
    updatedAt: now,
  };
}

export class DrizzleManagedServerRepository implements IManagedServerRepository {
  constructor(private readonly db: DrizzleDb) {}

  getByKey(key: string): ManagedServerState | null {
    const row = this.db.select().from(managedServers).where(eq(managedServers.key, key)).get();
    return row ? toState(row) : null;
  }

  list(): ManagedServerState[] {
    return this.db.select().from(managedServers).orderBy(managedServers.key).all().map(toState);
  }

  save(state: ManagedServerState): void {
    const row = toRow(state, Math.floor(Date.now() / 1000));
    const { key: _key, ...updates } = row;
    this.db.insert(managedServers).values(row).onConflictDoUpdate({ target: managedServers.key, set: updates }).run();
  }

  updateStage(key: string, stage: string): void {
    this.db
      .update(managedServers)
      .set({ provisionStage: stage, updatedAt: Math.floor(Date.now() / 1000) })
      .where(eq(managedServers.key, key))
      .run();
  }

  markFailed(key: string, error: string): void {
    this.db
      .update(managedServers)
      .set({ status: "failed", lastError: error, updatedAt: Math.floor(Date.now() / 1000) })
      .where(eq(managedServers.key, key))
      .run();
  }

  delete(key: string): void {
    this.db.delete(managedServers).where(eq(managedServers.key, key)).run();
  }

  listLocalIps(): string[] {
    return this.db
      .select({ localIP: managedServers.localIP })
      .from(managedServers)
      .all()
      .map((r) => r.localIP);
  }
}
