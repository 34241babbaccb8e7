import { sql } from "drizzle-orm";
import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

/** Server orders placed through the Robot API. Orders are immutable once placed. */
export const serverOrders = sqliteTable("server_orders", {
  /** Manifest address of the order */
  key: text("key").primaryKey(),
  /** Standard product order or market (auction) order */
  market: integer("market", { mode: "boolean" }).notNull().default(false),
  /** Product id as declared (e.g. "EX44", or the numeric market product id) */
  productId: text("product_id").notNull(),
  dist: text("dist"),
  location: text("location"),
  /** JSON array of key fingerprints */
  authorizedKeys: text("authorized_keys").notNull().default("[]"),
  /** JSON array of addon ids */
  addons: text("addons").notNull().default("[]"),
  test: integer("test", { mode: "boolean" }).notNull().default(false),
  transactionId: text("transaction_id").notNull(),
  /** in process | ready | cancelled */
  status: text("status").notNull(),
  serverNumber: integer("server_number"),
  serverIP: text("server_ip"),
  createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
  updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
});
