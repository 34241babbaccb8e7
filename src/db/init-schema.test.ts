import Database from "better-sqlite3";
import { describe, expect, it } from "vitest";
import { initProvisionerSchema } from "./init-schema.js";

function tableNames(db: Database.Database): string[] {
  const rows: unknown[] = db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name").all();
  return rows.flatMap((row) =>
    typeof row === "object" && row !== null && "name" in row && typeof row.name === "string" ? [row.name] : [],
  );
}

describe("initProvisionerSchema", () => {
  it("creates the state tables", () => {
    const db = new Database(":memory:");
    initProvisionerSchema(db);
    expect(tableNames(db)).toEqual(["managed_servers", "server_orders", "vswitches"]);
    db.close();
  });

  it("is idempotent", () => {
    const db = new Database(":memory:");
    initProvisionerSchema(db);
    initProvisionerSchema(db);
    expect(tableNames(db)).toHaveLength(3);
    db.close();
  });

  it("enforces one server per private address", () => {
    const db = new Database(":memory:");
    initProvisionerSchema(db);
    const insert = db.prepare(
      `INSERT INTO managed_servers (key, server_number, server_ip, name, architecture, encryption_passphrase,
        rescue_key_fingerprints, local_ip, server_name, robot_name) VALUES (?, ?, ?, 'n', 'amd64', 'x', '[]', ?, 'n-1', 'n-1')`,
    );
    insert.run("a", 1, "203.0.113.1", "10.1.0.2");
    expect(() => insert.run("b", 2, "203.0.113.2", "10.1.0.2")).toThrow(/UNIQUE constraint failed/);
    db.close();
  });
});
