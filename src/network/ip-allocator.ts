/**
 * Private address pool for the vSwitch network.
 *
 * Addresses are handed out lowest-first from a closed range. Every operation
 * is synchronous, so on the Node event loop acquire and release are atomic with
 * respect to concurrently running provisioning tasks; keep it that way.
 */

export class IpPoolExhaustedError extends Error {
  readonly name = "IpPoolExhaustedError" as const;
  constructor(rangeStart: string, rangeEnd: string) {
    super(`No free private IP addresses left in ${rangeStart}-${rangeEnd}`);
  }
}

export class InvalidIpRangeError extends Error {
  readonly name = "InvalidIpRangeError" as const;
}

/** Parse a dotted-quad IPv4 address into an unsigned 32-bit integer. */
export function ipv4ToInt(address: string): number {
  const parts = address.split(".");
  if (parts.length !== 4) throw new InvalidIpRangeError(`Not an IPv4 address: ${address}`);
  let value = 0;
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) throw new InvalidIpRangeError(`Not an IPv4 address: ${address}`);
    const octet = Number(part);
    if (octet > 255) throw new InvalidIpRangeError(`Not an IPv4 address: ${address}`);
    value = value * 256 + octet;
  }
  return value;
}

export function intToIpv4(value: number): string {
  return [(value >>> 24) & 0xff, (value >>> 16) & 0xff, (value >>> 8) & 0xff, value & 0xff].join(".");
}

export interface IpAllocatorOptions {
  /** First assignable address (inclusive). Default 10.1.0.2 */
  rangeStart?: string;
  /** Last assignable address (inclusive). Default 10.1.0.127 */
  rangeEnd?: string;
}

export class PrivateIpAllocator {
  readonly rangeStart: string;
  readonly rangeEnd: string;
  private readonly start: number;
  private readonly end: number;
  private readonly held = new Set<number>();

  constructor(options: IpAllocatorOptions = {}) {
    this.rangeStart = options.rangeStart ?? "10.1.0.2";
    this.rangeEnd = options.rangeEnd ?? "10.1.0.127";
    this.start = ipv4ToInt(this.rangeStart);
    this.end = ipv4ToInt(this.rangeEnd);
    if (this.start > this.end) {
      throw new InvalidIpRangeError(`Empty range: ${this.rangeStart}-${this.rangeEnd}`);
    }
  }

  /** Number of addresses in the range. */
  get capacity(): number {
    return this.end - this.start + 1;
  }

  get heldCount(): number {
    return this.held.size;
  }

  /** Reserve and return the lowest free address. */
  acquire(): string {
    for (let candidate = this.start; candidate <= this.end; candidate++) {
      if (!this.held.has(candidate)) {
        this.held.add(candidate);
        return intToIpv4(candidate);
      }
    }
    throw new IpPoolExhaustedError(this.rangeStart, this.rangeEnd);
  }

  /** Return an address to the pool. Unknown or unheld addresses are ignored. */
  release(address: string): void {
    const value = this.parseInRange(address);
    if (value !== null) this.held.delete(value);
  }

  /** Mark addresses already assigned elsewhere (persisted state) as held. */
  seed(addresses: Iterable<string>): void {
    for (const address of addresses) {
      const value = this.parseInRange(address);
      if (value !== null) this.held.add(value);
    }
  }

  isHeld(address: string): boolean {
    const value = this.parseInRange(address);
    return value !== null && this.held.has(value);
  }

  private parseInRange(address: string): number | null {
    let value: number;
    try {
      value = ipv4ToInt(address);
    } catch (err) {
      if (err instanceof InvalidIpRangeError) return null;
      throw err;
    }
    return value >= this.start && value <= this.end ? value : null;
  }
}
