import { eq } from "drizzle-orm";
import type { DrizzleDb } from "../db/index.js";
import { vswitches } from "../db/schema/index.js";

export interface VSwitchSpec {
  key: string;
  vlan: number;
  name: string;
}

export interface VSwitchState extends VSwitchSpec {
  vswitchId: number;
}

export interface IVSwitchRepository {
  getByKey(key: string): VSwitchState | null;
  list(): VSwitchState[];
  save(state: VSwitchState): void;
  delete(key: string): void;
}

export class DrizzleVSwitchRepository implements IVSwitchRepository {
  constructor(private readonly db: DrizzleDb) {}

  getByKey(key: string): VSwitchState | null {
    const row = this.db.select().from(vswitches).where(eq(vswitches.key, key)).get();
    return row ? { key: row.key, vswitchId: row.vswitchId, vlan: row.vlan, name: row.name } : null;
  }

  list(): VSwitchState[] {
    return this.db
      .select({ key: vswitches.key, vswitchId: vswitches.vswitchId, vlan: vswitches.vlan, name: vswitches.name })
      .from(vswitches)
      .orderBy(vswitches.key)
      .all();
  }

  save(state: VSwitchState): void {
    const updates = { vswitchId: state.vswitchId, vlan: state.vlan, name: state.name, updatedAt: Math.floor(Date.now() / 1000) };
    this.db
      .insert(vswitches)
      .values({ key: state.key, ...updates })
      .onConflictDoUpdate({ target: vswitches.key, set: updates })
      .run();
  }

  delete(key: string): void {
    this.db.delete(vswitches).where(eq(vswitches.key, key)).run();
  }
}
