import { describe, expect, it } from "vitest";
import { formatApplyResults, formatPlan, formatServers, formatTransaction } from "./cli-format.js";
import type { ManagedServerState } from "./servers/types.js";

describe("formatPlan", () => {
  it("says so when nothing changes", () => {
    expect(formatPlan([{ type: "server", key: "servers.a", action: "noop" }])).toBe("No changes.");
  });

  it("lists changes with a summary", () => {
    const text = formatPlan([
      { type: "order", key: "orders.db-1", action: "noop" },
      { type: "server", key: "servers.db", action: "create", reason: "order db-1 is not ready (in process)" },
      { type: "server", key: "servers.worker", action: "replace", reason: "changed: serverIP" },
      { type: "server", key: "servers.old", action: "delete" },
      { type: "server", key: "servers.broken", action: "retry" },
    ]);
    expect(text.split("\n")).toEqual([
      "  + servers.db (order db-1 is not ready (in process))",
      "-/+ servers.worker (changed: serverIP)",
      "  - servers.old",
      "  ↻ servers.broken",
      "",
      "Plan: 1 to create, 1 to change, 1 to replace, 1 to delete.",
    ]);
  });
});

describe("formatApplyResults", () => {
  it("hides quiet no-ops and shows warnings and errors", () => {
    const text = formatApplyResults([
      { type: "order", key: "orders.db-1", action: "noop", outcome: "ok", warnings: [] },
      { type: "server", key: "servers.db", action: "create", outcome: "skipped", warnings: ["order not ready"] },
      { type: "server", key: "servers.w", action: "create", outcome: "failed", warnings: [], error: "boom" },
    ]);
    expect(text.split("\n")).toEqual([
      "skipped create  servers.db",
      "        warning: order not ready",
      "failed  create  servers.w: boom",
    ]);
  });

  it("reports an empty run", () => {
    expect(formatApplyResults([])).toBe("Nothing to do.");
  });
});

describe("formatServers", () => {
  it("joins account servers with managed state", () => {
    const managed = { serverNumber: 321, key: "servers.worker", localIP: "10.1.0.2" } as const;
    const text = formatServers(
      [
        {
          serverNumber: 321,
          serverName: "worker-abc123",
          serverIP: "203.0.113.10",
          status: "ready",
          product: "EX44",
          location: "FSN1",
        },
        { serverNumber: 7, serverName: "", serverIP: "203.0.113.7", status: "ready", product: "AX41", location: "HEL1" },
      ],
      [{ ...stateStub(), ...managed }],
    );
    expect(text.split("\n")).toEqual([
      "NUMBER  NAME           IP            PRODUCT  STATUS  MANAGED AS      PRIVATE IP",
      "321     worker-abc123  203.0.113.10  EX44     ready   servers.worker  10.1.0.2",
      "7                      203.0.113.7   AX41     ready   -               -",
    ]);
  });
});

describe("formatTransaction", () => {
  it("prints dashes for unknown fields", () => {
    expect(
      formatTransaction({
        id: "B1",
        date: null,
        status: "in process",
        serverNumber: null,
        serverIP: null,
        productId: "EX44",
      }),
    ).toBe("transaction  B1\nstatus       in process\nserver       -\nserver ip    -\nproduct      EX44");
  });
});

function stateStub(): ManagedServerState {
  return {
    key: "",
    id: null,
    serverNumber: 0,
    serverIP: "203.0.113.10",
    name: "worker",
    version: 1,
    architecture: "amd64",
    encryptionPassphrase: "test-secret",
    raidLevel: 1,
    noUEFI: false,
    rescueKeyFingerprints: ["aa:bb"],
    nodeLabels: [],
    taints: [],
    localIP: "",
    serverName: "worker-abc123",
    robotName: "worker-abc123",
    status: "ready",
    provisionStage: null,
    lastError: null,
  };
}
