/**
 * Provisioning pipeline stages and the step runner that sequences them.
 *
 * Stages run strictly in the order of {@link PIPELINE_STAGES}. The runner is
 * the only place that logs stage boundaries, reports progress, checks for
 * cancellation and turns failures into a {@link ProvisioningError} naming the
 * stage that failed.
 */

import { logger } from "../config/logger.js";
import { RobotApiError } from "../robot/robot-client.js";
import { AbortedError, errorMessage, ProvisioningError, type ProvisioningErrorKind } from "./errors.js";
import { ReachabilityTimeoutError } from "./reachability.js";
import { RemoteCommandError } from "./remote-session.js";

export const PIPELINE_STAGES = [
  "rescue_activate",
  "hard_reset",
  "wait_rescue_reachable",
  "session_open",
  "probe_disks",
  "upload_payloads",
  "run_imaging",
  "reboot",
  "wait_os_reachable",
  "first_boot",
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export function isPipelineStage(value: string): value is PipelineStage {
  return PIPELINE_STAGES.some((s) => s === value);
}

/** Error kind for a stage failure the runner cannot classify more precisely. */
export const STAGE_FAILURE_KIND: Record<PipelineStage, ProvisioningErrorKind> = {
  rescue_activate: "remote_api",
  hard_reset: "remote_api",
  wait_rescue_reachable: "timeout",
  session_open: "ssh",
  probe_disks: "ssh",
  upload_payloads: "ssh",
  run_imaging: "imaging_failed",
  reboot: "ssh",
  wait_os_reachable: "timeout",
  first_boot: "ssh",
};

export const STAGE_SUMMARY: Record<PipelineStage, string> = {
  rescue_activate: "activating rescue system failed",
  hard_reset: "hardware reset failed",
  wait_rescue_reachable: "rescue system did not come up",
  session_open: "could not open SSH session to rescue system",
  probe_disks: "disk probe failed",
  upload_payloads: "uploading imaging payloads failed",
  run_imaging: "imaging failed",
  reboot: "reboot failed",
  wait_os_reachable: "installed system did not come up",
  first_boot: "first-boot configuration failed",
};

const OUTPUT_TAIL = 2_000;

function tail(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > OUTPUT_TAIL ? `…${trimmed.slice(-OUTPUT_TAIL)}` : trimmed;
}

/** Turn whatever a stage threw into a ProvisioningError attributed to that stage. */
export function classifyFailure(stage: PipelineStage, err: unknown): ProvisioningError {
  if (err instanceof ProvisioningError) return err.atStage(stage);
  const summary = STAGE_SUMMARY[stage];
  if (err instanceof AbortedError) {
    return new ProvisioningError("aborted", "provisioning aborted", err.message, stage, { cause: err });
  }
  if (err instanceof ReachabilityTimeoutError) {
    return new ProvisioningError("timeout", summary, err.message, stage, { cause: err });
  }
  if (err instanceof RobotApiError) {
    return new ProvisioningError("remote_api", summary, `${err.statusCode} ${err.code}: ${err.robotMessage}`, stage, {
      cause: err,
    });
  }
  if (err instanceof RemoteCommandError) {
    const output = [err.stderr, err.stdout].map(tail).filter((s) => s.length > 0).join("\n");
    const detail = `\`${err.command}\` exited with ${err.exitCode ?? "a signal"}${output ? `\n${output}` : ""}`;
    return new ProvisioningError(STAGE_FAILURE_KIND[stage], summary, detail, stage, { cause: err });
  }
  return new ProvisioningError(STAGE_FAILURE_KIND[stage], summary, errorMessage(err), stage, { cause: err });
}

export type StageListener = (stage: PipelineStage) => void;

export interface StepRunnerOptions {
  /** Identifies the server in log lines. */
  label: string;
  onStage?: StageListener;
  signal?: AbortSignal;
}

export class StepRunner {
  private lastIndex = -1;
  private readonly entered: PipelineStage[] = [];

  constructor(private readonly options: StepRunnerOptions) {}

  /** Stages entered so far, in order. */
  get stages(): readonly PipelineStage[] {
    return this.entered;
  }

  async run<T>(stage: PipelineStage, step: () => Promise<T>): Promise<T> {
    const index = PIPELINE_STAGES.indexOf(stage);
    if (index <= this.lastIndex) {
      throw new Error(`Stage ${stage} cannot run after ${PIPELINE_STAGES[this.lastIndex]}`);
    }
    if (this.options.signal?.aborted) {
      throw new ProvisioningError("aborted", "provisioning aborted", `cancelled before ${stage}`, stage);
    }

    this.lastIndex = index;
    this.entered.push(stage);
    this.options.onStage?.(stage);

    const started = Date.now();
    logger.info(`[${this.options.label}] ${stage} started`);
    try {
      const result = await step();
      logger.info(`[${this.options.label}] ${stage} done`, { durationMs: Date.now() - started });
      return result;
    } catch (err) {
      const failure = classifyFailure(stage, err);
      logger.error(`[${this.options.label}] ${stage} failed`, {
        kind: failure.kind,
        detail: failure.detail,
        durationMs: Date.now() - started,
      });
      throw failure;
    }
  }
}
