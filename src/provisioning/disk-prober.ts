import { ProvisioningError } from "./errors.js";
import type { IRemoteSession } from "./remote-session.js";

export const LIST_DISKS_COMMAND = "lsblk -d -n -o NAME,SIZE,TYPE";

export interface DiskListing {
  /** Whole-disk device paths in listing order, e.g. /dev/nvme0n1 */
  devices: string[];
  /** Raw listing, kept for diagnostics */
  raw: string;
}

/** Parse `lsblk -d -n -o NAME,SIZE,TYPE` output. Only rows of type `disk` are kept. */
export function parseDiskListing(raw: string): DiskListing {
  const devices: string[] = [];
  for (const line of raw.split("\n")) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 3) continue;
    const [name, , type] = fields;
    if (type === "disk" && name) devices.push(`/dev/${name}`);
  }
  return { devices, raw };
}

export async function listDisks(session: IRemoteSession): Promise<DiskListing> {
  return parseDiskListing(await session.run(LIST_DISKS_COMMAND));
}

/** The imaging layout mirrors exactly two drives; anything else is refused. */
export function requireDiskPair(listing: DiskListing): [string, string] {
  const [first, second] = listing.devices;
  if (listing.devices.length !== 2 || first === undefined || second === undefined) {
    throw new ProvisioningError(
      "invalid_disk_count",
      "expected exactly 2 disks",
      `found ${listing.devices.length} disk(s):\n${listing.raw.trim()}`,
    );
  }
  return [first, second];
}
