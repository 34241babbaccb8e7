import { describe, expect, it } from "vitest";
import { deriveServerName, newServerId, randomSuffix } from "./server-names.js";

describe("server names", () => {
  it("appends a six character hex suffix", () => {
    expect(randomSuffix()).toMatch(/^[0-9a-f]{6}$/);
    expect(deriveServerName("worker")).toMatch(/^worker-[0-9a-f]{6}$/);
  });

  it("uses the injected suffix source", () => {
    expect(deriveServerName("worker", () => "abc123")).toBe("worker-abc123");
  });

  it("builds ids from unix seconds", () => {
    expect(newServerId(() => 1_700_000_000_999)).toBe("server-1700000000");
  });
});
