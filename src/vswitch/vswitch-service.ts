import { logger } from "../config/logger.js";
import { isNotFound, type RobotClient } from "../robot/robot-client.js";
import type { IVSwitchRepository, VSwitchSpec, VSwitchState } from "./vswitch-repository.js";

export type VSwitchRobot = Pick<RobotClient, "createVSwitch" | "getVSwitch" | "updateVSwitch" | "deleteVSwitch">;

export class VSwitchService {
  constructor(
    private readonly robot: VSwitchRobot,
    private readonly repo: IVSwitchRepository,
  ) {}

  async create(spec: VSwitchSpec): Promise<VSwitchState> {
    const created = await this.robot.createVSwitch(spec.vlan, spec.name);
    const state: VSwitchState = { key: spec.key, vswitchId: created.id, vlan: created.vlan, name: created.name };
    this.repo.save(state);
    logger.info("Created vSwitch", { key: spec.key, id: created.id, vlan: created.vlan, name: created.name });
    return state;
  }

  /** Current state from the API; null (and dropped from state) once the vSwitch is gone. */
  async read(key: string): Promise<VSwitchState | null> {
    const state = this.repo.getByKey(key);
    if (!state) return null;
    try {
      const live = await this.robot.getVSwitch(state.vswitchId);
      if (live.cancelled) {
        logger.warn("vSwitch cancelled, dropping from state", { key, id: state.vswitchId });
        this.repo.delete(key);
        return null;
      }
      const next: VSwitchState = { ...state, vlan: live.vlan || state.vlan, name: live.name || state.name };
      this.repo.save(next);
      return next;
    } catch (err) {
      if (!isNotFound(err)) throw err;
      logger.warn("vSwitch not found, dropping from state", { key, id: state.vswitchId });
      this.repo.delete(key);
      return null;
    }
  }

  async update(spec: VSwitchSpec): Promise<VSwitchState> {
    const state = this.repo.getByKey(spec.key);
    if (!state) throw new Error(`vSwitch ${spec.key} is not in state`);
    const updated = await this.robot.updateVSwitch(state.vswitchId, spec.vlan, spec.name);
    const next: VSwitchState = { ...state, vlan: updated.vlan, name: updated.name };
    this.repo.save(next);
    logger.info("Updated vSwitch", { key: spec.key, id: state.vswitchId, vlan: next.vlan, name: next.name });
    return next;
  }

  /** Cancel immediately. A vSwitch the API no longer knows counts as deleted. */
  async delete(key: string): Promise<void> {
    const state = this.repo.getByKey(key);
    if (!state) return;
    try {
      await this.robot.deleteVSwitch(state.vswitchId, "now");
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
    this.repo.delete(key);
    logger.info("Deleted vSwitch", { key, id: state.vswitchId });
  }

  get(key: string): VSwitchState | null {
    return this.repo.getByKey(key);
  }

  list(): VSwitchState[] {
    return this.repo.list();
  }
}
