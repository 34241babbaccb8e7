import { Socket } from "node:net";
import { setTimeout as delay } from "node:timers/promises";
import { logger } from "../config/logger.js";
import { AbortedError } from "./errors.js";

export class ReachabilityTimeoutError extends Error {
  readonly name = "ReachabilityTimeoutError" as const;
  constructor(
    readonly host: string,
    readonly port: number,
    readonly timeoutMs: number,
  ) {
    super(`${host}:${port} not reachable within ${Math.round(timeoutMs / 1000)}s`);
  }
}

/** One TCP connection attempt. Resolves true on connect, false on refusal or timeout. */
export type ReachabilityProbe = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export interface WaitOptions {
  timeoutMs: number;
  /** Per-attempt connect timeout. Default 5000 */
  attemptTimeoutMs?: number;
  /** Pause between attempts. Default 5000 */
  intervalMs?: number;
  signal?: AbortSignal;
  probe?: ReachabilityProbe;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export const tcpProbe: ReachabilityProbe = (host, port, timeoutMs) =>
  new Promise((resolve) => {
    const socket = new Socket();
    const finish = (reachable: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(reachable);
    };
    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish(true));
    socket.once("timeout", () => finish(false));
    socket.once("error", () => finish(false));
    socket.connect(port, host);
  });

export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw new AbortedError("wait aborted");
    throw err;
  }
}

/**
 * Poll `host:port` until a TCP connection succeeds.
 *
 * Attempts and the pauses between them are clamped to the remaining budget, so
 * a failing wait throws {@link ReachabilityTimeoutError} no earlier than
 * `timeoutMs` and no later than `timeoutMs + intervalMs`.
 */
export async function waitUntilReachable(host: string, port: number, options: WaitOptions): Promise<void> {
  const attemptTimeoutMs = options.attemptTimeoutMs ?? 5_000;
  const intervalMs = options.intervalMs ?? 5_000;
  const probe = options.probe ?? tcpProbe;
  const sleep = options.sleep ?? abortableSleep;
  const now = options.now ?? Date.now;
  const { signal, timeoutMs } = options;

  const deadline = now() + timeoutMs;
  let attempts = 0;

  for (;;) {
    if (signal?.aborted) throw new AbortedError(`wait for ${host}:${port} aborted`);

    const remaining = deadline - now();
    if (remaining <= 0) break;

    attempts++;
    if (await probe(host, port, Math.min(attemptTimeoutMs, remaining))) {
      logger.info(`${host}:${port} is reachable`, { attempts });
      return;
    }

    const left = deadline - now();
    if (left <= 0) break;
    await sleep(Math.min(intervalMs, left), signal);
  }

  logger.warn(`Gave up waiting for ${host}:${port}`, { attempts, timeoutMs });
  throw new ReachabilityTimeoutError(host, port, timeoutMs);
}
