import { randomBytes } from "node:crypto";

/** Six lowercase hex characters. */
export type SuffixSource = () => string;

export const randomSuffix: SuffixSource = () => randomBytes(3).toString("hex");

/** `<name>-<6 hex>`; used both as hostname and as the Robot panel name. */
export function deriveServerName(name: string, suffix: SuffixSource = randomSuffix): string {
  return `${name}-${suffix()}`;
}

/** Server ids carry the unix time of the first successful provisioning run. */
export function newServerId(now: () => number = Date.now): string {
  return `server-${Math.floor(now() / 1000)}`;
}
