import type { PrivateNetworkConfig, ProvisioningTimings } from "../config/index.js";
import { logger } from "../config/logger.js";
import type { RobotClient } from "../robot/robot-client.js";
import { listDisks, requireDiskPair } from "./disk-prober.js";
import { errorMessage, ProvisioningError } from "./errors.js";
import {
  type Architecture,
  buildClusterJoinScript,
  buildFirstBootScript,
  buildGatewayWaitScript,
  buildImagingDirective,
  buildPostInstallScript,
  type ClusterJoinParams,
} from "./payloads.js";
import { type PipelineStage, type StageListener, StepRunner } from "./pipeline-stages.js";
import { abortableSleep, ReachabilityTimeoutError, type WaitOptions, waitUntilReachable } from "./reachability.js";
import { type IRemoteSession, openRemoteSession, type SessionOpener } from "./remote-session.js";

export const SETUP_CONF_PATH = "/root/setup.conf";
export const POST_INSTALL_PATH = "/root/post-install.sh";
export const FIRST_BOOT_PATH = "/root/initialize.sh";
export const IMAGING_COMMAND = `/root/.oldroot/nfs/install/installimage -a -c ${SETUP_CONF_PATH} -x ${POST_INSTALL_PATH}`;
export const REBOOT_COMMAND = "reboot || systemctl reboot || shutdown -r now || true";

const SSH_PORT = 22;

/** Everything the pipeline needs to know about the server it images. */
export interface PipelineTarget {
  serverNumber: number;
  serverIP: string;
  /** Hostname written by the imaging tool */
  hostname: string;
  architecture: Architecture;
  encryptionPassphrase: string;
  raidLevel: number;
  noUEFI: boolean;
  rescueKeyFingerprints: readonly string[];
  localIP: string;
  extraScript?: string;
  cluster?: ClusterJoinParams;
}

export interface PipelineDeps {
  robot: Pick<RobotClient, "activateRescue" | "reset">;
  openSession?: SessionOpener;
  waitUntilReachable?: (host: string, port: number, options: WaitOptions) => Promise<void>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface PipelineOptions {
  ssh: { user: string; agentSocket?: string; readyTimeoutMs: number };
  timings: ProvisioningTimings;
  network: PrivateNetworkConfig;
}

export interface RunOptions {
  onStage?: StageListener;
  signal?: AbortSignal;
}

export interface PipelineResult {
  stages: readonly PipelineStage[];
  disks: readonly [string, string];
  /** Best-effort steps that failed without failing the run */
  warnings: string[];
}

/**
 * Rescue → image → reboot → first boot, over the Robot API and SSH.
 *
 * Each run starts from scratch: a failed run is retried by running the whole
 * pipeline again, which re-images the disks.
 */
export class ProvisioningPipeline {
  private readonly robot: PipelineDeps["robot"];
  private readonly openSession: SessionOpener;
  private readonly wait: NonNullable<PipelineDeps["waitUntilReachable"]>;
  private readonly sleep: NonNullable<PipelineDeps["sleep"]>;

  constructor(
    deps: PipelineDeps,
    private readonly options: PipelineOptions,
  ) {
    this.robot = deps.robot;
    this.openSession = deps.openSession ?? openRemoteSession;
    this.wait = deps.waitUntilReachable ?? waitUntilReachable;
    this.sleep = deps.sleep ?? abortableSleep;
  }

  async run(target: PipelineTarget, runOptions: RunOptions = {}): Promise<PipelineResult> {
    const agentSocket = this.preflight(target);
    const { signal } = runOptions;
    const { timings } = this.options;
    const steps = new StepRunner({ label: target.hostname, onStage: runOptions.onStage, signal });
    const warnings: string[] = [];
    const warn = (message: string, meta: Record<string, unknown> = {}) => {
      warnings.push(message);
      logger.warn(`[${target.hostname}] ${message}`, meta);
    };
    const connect = () =>
      this.openSession({
        host: target.serverIP,
        port: SSH_PORT,
        username: this.options.ssh.user,
        auth: { kind: "agent", socket: agentSocket },
        readyTimeoutMs: this.options.ssh.readyTimeoutMs,
      });
    const waitOptions = (timeoutMs: number): WaitOptions => ({
      timeoutMs,
      attemptTimeoutMs: timings.attemptTimeoutMs,
      intervalMs: timings.pollIntervalMs,
      signal,
    });

    await steps.run("rescue_activate", () => this.robot.activateRescue(target.serverNumber, target.rescueKeyFingerprints));
    await steps.run("hard_reset", () => this.robot.reset(target.serverNumber, "hw"));
    await steps.run("wait_rescue_reachable", () =>
      this.wait(target.serverIP, SSH_PORT, waitOptions(timings.rescueWaitMs)),
    );

    const rescue = await steps.run("session_open", connect);
    let disks: [string, string];
    try {
      disks = await steps.run("probe_disks", async () => requireDiskPair(await listDisks(rescue)));

      await steps.run("upload_payloads", async () => {
        const directive = buildImagingDirective({
          hostname: target.hostname,
          architecture: target.architecture,
          encryptionPassphrase: target.encryptionPassphrase,
          raidLevel: target.raidLevel,
          drives: disks,
          noUEFI: target.noUEFI,
        });
        await rescue.upload(SETUP_CONF_PATH, directive, 0o600);
        await rescue.upload(POST_INSTALL_PATH, buildPostInstallScript(target), 0o700);
        const chmod = await rescue.runUnchecked(`chmod +x ${POST_INSTALL_PATH}`);
        if (chmod.code !== 0) warn(`chmod of ${POST_INSTALL_PATH} failed`, { stderr: chmod.stderr });
      });

      await steps.run("run_imaging", () => rescue.run(IMAGING_COMMAND));

      await steps.run("reboot", async () => {
        try {
          await rescue.runUnchecked(REBOOT_COMMAND);
        } catch (err) {
          // The connection usually drops mid-command.
          warn("reboot command did not complete", { error: errorMessage(err) });
        }
      });
    } finally {
      rescue.close();
    }

    await steps.run("wait_os_reachable", async () => {
      await this.sleep(timings.rebootGraceMs, signal);
      try {
        await this.wait(target.serverIP, SSH_PORT, waitOptions(timings.osWaitMs));
      } catch (err) {
        if (!(err instanceof ReachabilityTimeoutError) || timings.osWaitExtensionMs <= 0) throw err;
        warn("installed system slow to come up, extending wait", { extensionMs: timings.osWaitExtensionMs });
        await this.wait(target.serverIP, SSH_PORT, waitOptions(timings.osWaitExtensionMs));
      }
    });

    await steps.run("first_boot", async () => {
      const session = await connect();
      try {
        await this.firstBoot(session, target);
      } finally {
        session.close();
      }
    });

    return { stages: steps.stages, disks, warnings };
  }

  private async firstBoot(session: IRemoteSession, target: PipelineTarget): Promise<void> {
    const { network } = this.options;
    const script = buildFirstBootScript({ localIP: target.localIP, network, extraScript: target.extraScript });
    await session.upload(FIRST_BOOT_PATH, script, 0o700);
    await session.run(FIRST_BOOT_PATH);
    if (!target.cluster) return;

    await session.run(buildGatewayWaitScript({ target: network.clusterProbeTarget }));
    await session.run(buildClusterJoinScript(target.cluster));
  }

  /** Checks that need no remote call. Returns the agent socket to authenticate with. */
  private preflight(target: PipelineTarget): string {
    if (target.rescueKeyFingerprints.length === 0) {
      throw new ProvisioningError(
        "no_ssh_keys",
        "no rescue SSH keys",
        "at least one key fingerprint is required to reach the rescue system",
      );
    }
    const socket = this.options.ssh.agentSocket;
    if (!socket) {
      throw new ProvisioningError(
        "invalid_configuration",
        "SSH agent unavailable",
        "SSH_AUTH_SOCK is not set; the rescue system only accepts key authentication",
      );
    }
    return socket;
  }
}
