/**
 * Error taxonomy for everything that touches a server: API calls, the SSH
 * pipeline and the lifecycle around it.
 *
 * `kind` is the machine-readable classification callers switch on; `summary`
 * is a short headline and `detail` carries the human-readable explanation,
 * including remote output where there is any.
 */

const PROVISIONING_ERROR_KINDS = [
  "missing_credentials",
  "invalid_configuration",
  "no_ssh_keys",
  "ip_pool_exhausted",
  "requires_replacement",
  "invalid_disk_count",
  "remote_api",
  "ssh",
  "timeout",
  "imaging_failed",
  "aborted",
] as const;

export type ProvisioningErrorKind = (typeof PROVISIONING_ERROR_KINDS)[number];

export class ProvisioningError extends Error {
  readonly name = "ProvisioningError" as const;

  constructor(
    readonly kind: ProvisioningErrorKind,
    readonly summary: string,
    readonly detail: string,
    /** Pipeline stage in progress when the failure happened, if any. */
    readonly stage?: string,
    options?: { cause?: unknown },
  ) {
    super(stage ? `[${stage}] ${summary}: ${detail}` : `${summary}: ${detail}`, options);
  }

  /** Copy of this error attributed to a pipeline stage. Keeps an existing stage. */
  atStage(stage: string): ProvisioningError {
    if (this.stage) return this;
    return new ProvisioningError(this.kind, this.summary, this.detail, stage, { cause: this.cause });
  }
}

/** Thrown when a wait is cancelled through its AbortSignal. */
export class AbortedError extends Error {
  readonly name = "AbortedError" as const;
  constructor(reason = "operation aborted") {
    super(reason);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
