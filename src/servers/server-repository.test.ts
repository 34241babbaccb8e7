import Database from "better-sqlite3";
import { beforeEach, describe, expect, it } from "vitest";
import { createDb } from "../db/index.js";
import { initProvisionerSchema } from "../db/init-schema.js";
import { DrizzleManagedServerRepository } from "./server-repository.js";
import type { ManagedServerState } from "./types.js";

function makeState(overrides: Partial<ManagedServerState> = {}): ManagedServerState {
  return {
    key: "servers.worker-1",
    id: null,
    serverNumber: 321,
    serverIP: "203.0.113.10",
    name: "worker",
    version: 1,
    architecture: "amd64",
    encryptionPassphrase: "test-secret",
    raidLevel: 1,
    noUEFI: false,
    rescueKeyFingerprints: ["aa:bb"],
    nodeLabels: [{ name: "role", value: "worker" }],
    taints: ["dedicated=db:NoSchedule"],
    localIP: "10.1.0.2",
    serverName: "worker-abc123",
    robotName: "worker-abc123",
    status: "provisioning",
    provisionStage: null,
    lastError: null,
    ...overrides,
  };
}

describe("DrizzleManagedServerRepository", () => {
  let sqlite: Database.Database;
  let repo: DrizzleManagedServerRepository;

  beforeEach(() => {
    sqlite = new Database(":memory:");
    initProvisionerSchema(sqlite);
    repo = new DrizzleManagedServerRepository(createDb(sqlite));
  });

  it("returns null for an unknown key", () => {
    expect(repo.getByKey("servers.nope")).toBeNull();
  });

  it("round-trips every field", () => {
    const state = makeState({
      description: "db node",
      vswitchId: 77,
      cluster: { url: "https://10.0.0.120:6443", token: "test-token" },
      extraScript: "echo hi",
    });
    repo.save(state);
    expect(repo.getByKey(state.key)).toEqual(state);
  });

  it("maps absent optional fields back to undefined", () => {
    repo.save(makeState());
    const loaded = repo.getByKey("servers.worker-1");
    expect(loaded?.description).toBeUndefined();
    expect(loaded?.vswitchId).toBeUndefined();
    expect(loaded?.cluster).toBeUndefined();
    expect(loaded?.extraScript).toBeUndefined();
  });

  it("save overwrites an existing row", () => {
    repo.save(makeState());
    repo.save(makeState({ status: "ready", id: "server-1700000000", description: "updated" }));

    const loaded = repo.getByKey("servers.worker-1");
    expect(loaded?.status).toBe("ready");
    expect(loaded?.id).toBe("server-1700000000");
    expect(loaded?.description).toBe("updated");
    expect(repo.list()).toHaveLength(1);
  });

  it("records the pipeline stage and failures", () => {
    repo.save(makeState());
    repo.updateStage("servers.worker-1", "probe_disks");
    repo.markFailed("servers.worker-1", "expected exactly 2 disks");

    const loaded = repo.getByKey("servers.worker-1");
    expect(loaded?.provisionStage).toBe("probe_disks");
    expect(loaded?.status).toBe("failed");
    expect(loaded?.lastError).toBe("expected exactly 2 disks");
  });

  it("lists servers by key and their private addresses", () => {
    repo.save(makeState({ key: "servers.b", localIP: "10.1.0.3" }));
    repo.save(makeState({ key: "servers.a", localIP: "10.1.0.2" }));

    expect(repo.list().map((s) => s.key)).toEqual(["servers.a", "servers.b"]);
    expect(repo.listLocalIps().sort()).toEqual(["10.1.0.2", "10.1.0.3"]);
  });

  it("deletes a row", () => {
    repo.save(makeState());
    repo.delete("servers.worker-1");
    expect(repo.getByKey("servers.worker-1")).toBeNull();
    expect(repo.listLocalIps()).toEqual([]);
  });
});
