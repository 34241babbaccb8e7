import Database from "better-sqlite3";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createDb } from "../db/index.js";
import { initProvisionerSchema } from "../db/init-schema.js";
import { RobotApiError } from "../robot/robot-client.js";
import { DrizzleVSwitchRepository } from "./vswitch-repository.js";
import { VSwitchService } from "./vswitch-service.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe("VSwitchService", () => {
  let robot: {
    createVSwitch: ReturnType<typeof vi.fn>;
    getVSwitch: ReturnType<typeof vi.fn>;
    updateVSwitch: ReturnType<typeof vi.fn>;
    deleteVSwitch: ReturnType<typeof vi.fn>;
  };
  let repo: DrizzleVSwitchRepository;
  let service: VSwitchService;

  beforeEach(() => {
    robot = {
      createVSwitch: vi.fn(async (vlan: number, name: string) => ({ id: 77, vlan, name, cancelled: false })),
      getVSwitch: vi.fn(async (id: number) => ({ id, vlan: 4001, name: "private", cancelled: false })),
      updateVSwitch: vi.fn(async (id: number, vlan: number, name: string) => ({ id, vlan, name, cancelled: false })),
      deleteVSwitch: vi.fn(async () => undefined),
    };
    const sqlite = new Database(":memory:");
    initProvisionerSchema(sqlite);
    repo = new DrizzleVSwitchRepository(createDb(sqlite));
    service = new VSwitchService(robot, repo);
  });

  it("creates and persists a vSwitch", async () => {
    const state = await service.create({ key: "vswitches.private", vlan: 4001, name: "private" });
    expect(state).toEqual({ key: "vswitches.private", vswitchId: 77, vlan: 4001, name: "private" });
    expect(repo.getByKey("vswitches.private")).toEqual(state);
  });

  it("reads back what the API reports", async () => {
    await service.create({ key: "vswitches.private", vlan: 4001, name: "private" });
    robot.getVSwitch.mockResolvedValueOnce({ id: 77, vlan: 4001, name: "renamed-in-robot", cancelled: false });

    const state = await service.read("vswitches.private");
    expect(state?.name).toBe("renamed-in-robot");
    expect(robot.getVSwitch).toHaveBeenCalledWith(77);
  });

  it("drops a vSwitch the API no longer knows", async () => {
    await service.create({ key: "vswitches.private", vlan: 4001, name: "private" });
    robot.getVSwitch.mockRejectedValueOnce(new RobotApiError(404, "NOT_FOUND", "vswitch not found"));

    expect(await service.read("vswitches.private")).toBeNull();
    expect(service.list()).toEqual([]);
  });

  it("drops a cancelled vSwitch", async () => {
    await service.create({ key: "vswitches.private", vlan: 4001, name: "private" });
    robot.getVSwitch.mockResolvedValueOnce({ id: 77, vlan: 4001, name: "private", cancelled: true });

    expect(await service.read("vswitches.private")).toBeNull();
  });

  it("propagates other read failures", async () => {
    await service.create({ key: "vswitches.private", vlan: 4001, name: "private" });
    robot.getVSwitch.mockRejectedValueOnce(new RobotApiError(500, "INTERNAL_ERROR", "boom"));

    await expect(service.read("vswitches.private")).rejects.toBeInstanceOf(RobotApiError);
    expect(service.get("vswitches.private")).not.toBeNull();
  });

  it("updates vlan and name in place", async () => {
    await service.create({ key: "vswitches.private", vlan: 4001, name: "private" });
    const state = await service.update({ key: "vswitches.private", vlan: 4002, name: "backend" });

    expect(robot.updateVSwitch).toHaveBeenCalledWith(77, 4002, "backend");
    expect(state).toEqual({ key: "vswitches.private", vswitchId: 77, vlan: 4002, name: "backend" });
  });

  it("deletes immediately and tolerates an already gone vSwitch", async () => {
    await service.create({ key: "vswitches.a", vlan: 4001, name: "a" });
    await service.create({ key: "vswitches.b", vlan: 4002, name: "b" });
    robot.deleteVSwitch.mockRejectedValueOnce(new RobotApiError(404, "NOT_FOUND", "vswitch not found"));

    await service.delete("vswitches.a");
    await service.delete("vswitches.b");

    expect(robot.deleteVSwitch).toHaveBeenCalledWith(77, "now");
    expect(service.list()).toEqual([]);
  });
});
