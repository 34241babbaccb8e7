import { describe, expect, it } from "vitest";
import { IpPoolExhaustedError, intToIpv4, ipv4ToInt, PrivateIpAllocator } from "./ip-allocator.js";

describe("ipv4 helpers", () => {
  it("round-trips a dotted quad", () => {
    expect(ipv4ToInt("10.1.0.2")).toBe(167837698);
    expect(intToIpv4(167837698)).toBe("10.1.0.2");
  });

  it("rejects malformed addresses", () => {
    expect(() => ipv4ToInt("10.1.0")).toThrow("Not an IPv4 address");
    expect(() => ipv4ToInt("10.1.0.256")).toThrow("Not an IPv4 address");
    expect(() => ipv4ToInt("10.1.0.x")).toThrow("Not an IPv4 address");
  });
});

describe("PrivateIpAllocator", () => {
  it("defaults to 126 addresses from 10.1.0.2 to 10.1.0.127", () => {
    const pool = new PrivateIpAllocator();
    expect(pool.capacity).toBe(126);
    expect(pool.acquire()).toBe("10.1.0.2");
    expect(pool.acquire()).toBe("10.1.0.3");
  });

  it("hands out the lowest free address", () => {
    const pool = new PrivateIpAllocator();
    pool.seed(["10.1.0.2", "10.1.0.3", "10.1.0.5"]);
    expect(pool.acquire()).toBe("10.1.0.4");
    expect(pool.acquire()).toBe("10.1.0.6");
  });

  it("returns the same address after acquire, release, acquire", () => {
    const pool = new PrivateIpAllocator();
    const first = pool.acquire();
    pool.release(first);
    expect(pool.acquire()).toBe(first);
  });

  it("ignores release of an address that is not held", () => {
    const pool = new PrivateIpAllocator();
    pool.acquire();
    pool.release("10.1.0.50");
    pool.release("192.168.0.1");
    pool.release("garbage");
    expect(pool.heldCount).toBe(1);
    expect(pool.isHeld("10.1.0.2")).toBe(true);
  });

  it("ignores seeded addresses outside the range", () => {
    const pool = new PrivateIpAllocator();
    pool.seed(["10.1.0.1", "10.1.0.128", "10.2.0.5", ""]);
    expect(pool.heldCount).toBe(0);
  });

  it("never hands out the same address twice and fails once exhausted", () => {
    const pool = new PrivateIpAllocator();
    const seen = new Set<string>();
    for (let i = 0; i < 126; i++) seen.add(pool.acquire());
    expect(seen.size).toBe(126);
    expect(seen.has("10.1.0.127")).toBe(true);
    expect(() => pool.acquire()).toThrow(IpPoolExhaustedError);
  });

  it("recovers from exhaustion once an address is released", () => {
    const pool = new PrivateIpAllocator({ rangeStart: "10.9.0.10", rangeEnd: "10.9.0.11" });
    pool.acquire();
    pool.acquire();
    expect(() => pool.acquire()).toThrow("No free private IP addresses left in 10.9.0.10-10.9.0.11");
    pool.release("10.9.0.11");
    expect(pool.acquire()).toBe("10.9.0.11");
  });

  it("rejects an inverted range", () => {
    expect(() => new PrivateIpAllocator({ rangeStart: "10.1.0.9", rangeEnd: "10.1.0.1" })).toThrow("Empty range");
  });
});
