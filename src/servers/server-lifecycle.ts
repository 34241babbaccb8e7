import { logger } from "../config/logger.js";
import { IpPoolExhaustedError, type PrivateIpAllocator } from "../network/ip-allocator.js";
import { errorMessage, ProvisioningError } from "../provisioning/errors.js";
import type { PipelineResult, PipelineTarget, ProvisioningPipeline } from "../provisioning/pipeline.js";
import { RobotApiError, type RobotClient } from "../robot/robot-client.js";
import type { IManagedServerRepository } from "./server-repository.js";
import { deriveServerName, newServerId, type SuffixSource } from "./server-names.js";
import type { ManagedServerSpec, ManagedServerState } from "./types.js";

export type LifecycleRobot = Pick<RobotClient, "setServerName" | "addServerToVSwitch" | "cancelServer">;

export interface ServerLifecycleDeps {
  repo: IManagedServerRepository;
  allocator: PrivateIpAllocator;
  robot: LifecycleRobot;
  pipeline: Pick<ProvisioningPipeline, "run">;
  suffix?: SuffixSource;
  now?: () => number;
}

export interface LifecycleOptions {
  signal?: AbortSignal;
}

export interface LifecycleResult {
  state: ManagedServerState;
  /** True when the provisioning pipeline ran */
  provisioned: boolean;
  warnings: string[];
}

export interface TeardownResult {
  warnings: string[];
}

/** Fields that cannot change on an existing server. */
const IMMUTABLE_FIELDS = ["serverNumber", "serverIP"] as const;

export function replacementReasons(state: ManagedServerState, spec: ManagedServerSpec): string[] {
  return IMMUTABLE_FIELDS.filter((field) => state[field] !== spec[field]);
}

/** Fields written onto the machine by the pipeline; a change reaches it only when the pipeline runs again. */
const PIPELINE_FIELDS = [
  "architecture",
  "encryptionPassphrase",
  "raidLevel",
  "noUEFI",
  "rescueKeyFingerprints",
  "nodeLabels",
  "taints",
  "cluster",
  "extraScript",
] as const;

/** Declared fields that changed but only take effect on the next pipeline run. */
export function pipelineOnlyChanges(state: ManagedServerSpec, spec: ManagedServerSpec): string[] {
  return PIPELINE_FIELDS.filter((field) => JSON.stringify(state[field] ?? null) !== JSON.stringify(spec[field] ?? null));
}

export function pendingChangeWarning(fields: readonly string[]): string {
  return `${fields.join(", ")} changed; applied only on the next version bump`;
}

async function robotCall<T>(summary: string, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof RobotApiError) {
      throw new ProvisioningError("remote_api", summary, `${err.statusCode} ${err.code}: ${err.robotMessage}`, undefined, {
        cause: err,
      });
    }
    throw err;
  }
}

function toTarget(state: ManagedServerState): PipelineTarget {
  return {
    serverNumber: state.serverNumber,
    serverIP: state.serverIP,
    hostname: state.serverName,
    architecture: state.architecture,
    encryptionPassphrase: state.encryptionPassphrase,
    raidLevel: state.raidLevel,
    noUEFI: state.noUEFI,
    rescueKeyFingerprints: state.rescueKeyFingerprints,
    localIP: state.localIP,
    extraScript: state.extraScript,
    cluster: state.cluster
      ? { url: state.cluster.url, token: state.cluster.token, nodeLabels: state.nodeLabels, taints: state.taints }
      : undefined,
  };
}

/**
 * Create, update and tear down managed servers.
 *
 * The private address is allocated once, on create, and stays with the row
 * until teardown. Only a version bump (or a retry of a failed server) re-runs
 * the provisioning pipeline.
 */
export class ServerLifecycle {
  private readonly repo: IManagedServerRepository;
  private readonly allocator: PrivateIpAllocator;
  private readonly robot: LifecycleRobot;
  private readonly pipeline: Pick<ProvisioningPipeline, "run">;
  private readonly suffix: SuffixSource | undefined;
  private readonly now: () => number;

  constructor(deps: ServerLifecycleDeps) {
    this.repo = deps.repo;
    this.allocator = deps.allocator;
    this.robot = deps.robot;
    this.pipeline = deps.pipeline;
    this.suffix = deps.suffix;
    this.now = deps.now ?? Date.now;
  }

  async create(spec: ManagedServerSpec, options: LifecycleOptions = {}): Promise<LifecycleResult> {
    if (this.repo.getByKey(spec.key)) throw new Error(`Server ${spec.key} is already in state`);
    if (spec.rescueKeyFingerprints.length === 0) {
      throw new ProvisioningError("no_ssh_keys", "no rescue SSH keys", `server ${spec.key} declares no key fingerprints`);
    }

    const localIP = this.acquireAddress();
    const serverName = deriveServerName(spec.name, this.suffix);
    const state: ManagedServerState = {
      ...spec,
      id: null,
      localIP,
      serverName,
      robotName: serverName,
      status: "provisioning",
      provisionStage: null,
      lastError: null,
    };
    try {
      this.repo.save(state);
    } catch (err) {
      this.allocator.release(localIP);
      throw err;
    }
    logger.info("Provisioning new server", { key: spec.key, serverNumber: spec.serverNumber, localIP, serverName });

    return this.provision(state, { rename: true, attach: spec.vswitchId !== undefined }, options);
  }

  /**
   * Apply a changed spec to an existing server. Renames and vSwitch
   * attachment happen only when they changed; a version bump re-runs the
   * pipeline. The private address and id are always kept.
   */
  async update(spec: ManagedServerSpec, options: LifecycleOptions = {}): Promise<LifecycleResult> {
    const current = this.requireState(spec.key);
    const reasons = replacementReasons(current, spec);
    if (reasons.length > 0) {
      throw new ProvisioningError(
        "requires_replacement",
        "server must be replaced",
        `${spec.key}: ${reasons.join(", ")} cannot change in place`,
      );
    }

    const versionChanged = spec.version !== current.version;
    const renamed = versionChanged || spec.name !== current.name;
    const serverName = renamed ? deriveServerName(spec.name, this.suffix) : current.serverName;
    const next: ManagedServerState = {
      ...current,
      ...spec,
      serverName,
      robotName: serverName,
    };
    const attach = spec.vswitchId !== undefined && spec.vswitchId !== current.vswitchId;

    if (versionChanged) {
      logger.info("Version changed, reprovisioning", { key: spec.key, from: current.version, to: spec.version });
      return this.provision({ ...next, status: "provisioning", lastError: null }, { rename: renamed, attach }, options);
    }

    await this.configure(next, { rename: renamed, attach });
    this.repo.save(next);
    logger.info("Updated server in place", { key: spec.key, renamed, attach });

    const warnings: string[] = [];
    const pending = pipelineOnlyChanges(current, spec);
    if (pending.length > 0) {
      warnings.push(pendingChangeWarning(pending));
      logger.warn("Update limited, machine keeps its provisioned configuration", { key: spec.key, fields: pending });
    }
    return { state: next, provisioned: false, warnings };
  }

  /** Re-run every create step for a server whose last run failed, on the address it already holds. */
  async retry(spec: ManagedServerSpec, options: LifecycleOptions = {}): Promise<LifecycleResult> {
    const current = this.requireState(spec.key);
    const reasons = replacementReasons(current, spec);
    if (reasons.length > 0) {
      throw new ProvisioningError(
        "requires_replacement",
        "server must be replaced",
        `${spec.key}: ${reasons.join(", ")} cannot change in place`,
      );
    }
    const serverName =
      spec.name !== current.name || spec.version !== current.version
        ? deriveServerName(spec.name, this.suffix)
        : current.serverName;
    const next: ManagedServerState = {
      ...current,
      ...spec,
      serverName,
      robotName: serverName,
      status: "provisioning",
      lastError: null,
    };
    logger.info("Retrying failed server", { key: spec.key, lastStage: current.provisionStage });
    return this.provision(next, { rename: true, attach: spec.vswitchId !== undefined }, options);
  }

  /**
   * Forget the server, release its address and ask for cancellation.
   * The row goes before the address is released, so a concurrent create
   * never receives an address that is still in state. Cancellation is
   * best-effort: its failures come back as warnings.
   */
  async teardown(key: string): Promise<TeardownResult> {
    const state = this.repo.getByKey(key);
    if (!state) return { warnings: [] };

    const warnings: string[] = [];
    this.repo.delete(key);
    this.allocator.release(state.localIP);
    logger.info("Removed server from state and released its address", { key, localIP: state.localIP });

    try {
      await this.robot.cancelServer(state.serverNumber);
      logger.info("Requested cancellation at end of billing period", { key, serverNumber: state.serverNumber });
    } catch (err) {
      warnings.push(`cancellation of server ${state.serverNumber} failed: ${errorMessage(err)}`);
    }
    try {
      await this.robot.setServerName(state.serverNumber, "cancelled");
    } catch (err) {
      warnings.push(`renaming server ${state.serverNumber} to "cancelled" failed: ${errorMessage(err)}`);
    }
    for (const warning of warnings) logger.warn(warning, { key });
    return { warnings };
  }

  private async provision(
    state: ManagedServerState,
    steps: { rename: boolean; attach: boolean },
    options: LifecycleOptions,
  ): Promise<LifecycleResult> {
    this.repo.save(state);
    let result: PipelineResult;
    try {
      await this.configure(state, steps);
      result = await this.pipeline.run(toTarget(state), {
        signal: options.signal,
        onStage: (stage) => this.repo.updateStage(state.key, stage),
      });
    } catch (err) {
      this.repo.markFailed(state.key, errorMessage(err));
      throw err;
    }

    const ready: ManagedServerState = {
      ...state,
      id: state.id ?? newServerId(this.now),
      status: "ready",
      provisionStage: result.stages.at(-1) ?? null,
      lastError: null,
    };
    this.repo.save(ready);
    logger.info("Server ready", { key: state.key, id: ready.id, localIP: ready.localIP });
    return { state: ready, provisioned: true, warnings: result.warnings };
  }

  private async configure(state: ManagedServerState, steps: { rename: boolean; attach: boolean }): Promise<void> {
    if (steps.rename) {
      await robotCall("setting server name failed", () => this.robot.setServerName(state.serverNumber, state.robotName));
    }
    if (steps.attach && state.vswitchId !== undefined) {
      const vswitchId = state.vswitchId;
      await robotCall("attaching server to vSwitch failed", () =>
        this.robot.addServerToVSwitch(vswitchId, state.serverIP),
      );
    }
  }

  private acquireAddress(): string {
    try {
      return this.allocator.acquire();
    } catch (err) {
      if (err instanceof IpPoolExhaustedError) {
        throw new ProvisioningError("ip_pool_exhausted", "no private address available", err.message, undefined, {
          cause: err,
        });
      }
      throw err;
    }
  }

  private requireState(key: string): ManagedServerState {
    const state = this.repo.getByKey(key);
    if (!state) throw new Error(`Server ${key} is not in state`);
    return state;
  }
}
