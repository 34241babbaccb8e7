import { mkdirSync } from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { type BetterSQLite3Database, drizzle } from "drizzle-orm/better-sqlite3";
import { initProvisionerSchema } from "./init-schema.js";
import { applyStatePragmas } from "./pragmas.js";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/** Repositories accept this type; tests pass an in-memory database. */
export type DrizzleDb = BetterSQLite3Database<Schema>;

/** Create a Drizzle database instance wrapping the given SQLite handle. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

export interface StateDb {
  sqlite: Database.Database;
  db: DrizzleDb;
}

/** Open (creating if needed) the state database at `filePath`, with pragmas and tables in place. */
export function openStateDb(filePath: string): StateDb {
  if (filePath !== ":memory:") mkdirSync(path.dirname(path.resolve(filePath)), { recursive: true });
  const sqlite = new Database(filePath);
  applyStatePragmas(sqlite);
  initProvisionerSchema(sqlite);
  return { sqlite, db: createDb(sqlite) };
}

export { schema };
