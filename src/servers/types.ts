import type { Architecture, NodeLabel } from "../provisioning/payloads.js";

export const SERVER_STATUSES = ["provisioning", "ready", "failed"] as const;
export type ServerStatus = (typeof SERVER_STATUSES)[number];

export function isServerStatus(value: string): value is ServerStatus {
  return SERVER_STATUSES.some((s) => s === value);
}

export interface ClusterJoin {
  url: string;
  token: string;
}

/** Declared configuration of one managed server. */
export interface ManagedServerSpec {
  /** Manifest address, unique per server */
  key: string;
  serverNumber: number;
  serverIP: string;
  name: string;
  description?: string;
  vswitchId?: number;
  /** Bumping this re-runs the full provisioning pipeline. */
  version: number;
  architecture: Architecture;
  encryptionPassphrase: string;
  raidLevel: number;
  noUEFI: boolean;
  rescueKeyFingerprints: string[];
  nodeLabels: NodeLabel[];
  taints: string[];
  cluster?: ClusterJoin;
  extraScript?: string;
}

/** Persisted server: the declared spec plus what provisioning derived for it. */
export interface ManagedServerState extends ManagedServerSpec {
  /** "server-<unix seconds>", stamped when the first pipeline run succeeds */
  id: string | null;
  localIP: string;
  serverName: string;
  robotName: string;
  status: ServerStatus;
  provisionStage: string | null;
  lastError: string | null;
}
