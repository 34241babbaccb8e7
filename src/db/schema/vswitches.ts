import { sql } from "drizzle-orm";
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const vswitches = sqliteTable("vswitches", {
  key: text("key").primaryKey(),
  /** Robot vSwitch id */
  vswitchId: integer("vswitch_id").notNull(),
  vlan: integer("vlan").notNull(),
  name: text("name").notNull(),
  createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
  updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
});
