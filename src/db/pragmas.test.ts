import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openStateDb } from "./index.js";
import { applyStatePragmas } from "./pragmas.js";

describe("applyStatePragmas", () => {
  let tmpDir: string;
  let dbPath: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "state-db-test-"));
    dbPath = join(tmpDir, "state.db");
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("switches a file database to WAL", () => {
    const db = new Database(dbPath);
    applyStatePragmas(db);
    const result = db.pragma("journal_mode");
    db.close();
    expect(result).toEqual([{ journal_mode: "wal" }]);
  });

  it("sets the busy timeout to 5000ms", () => {
    const db = new Database(dbPath);
    applyStatePragmas(db);
    // better-sqlite3 reports this pragma under the key "timeout"
    const result = db.pragma("busy_timeout");
    db.close();
    expect(result).toEqual([{ timeout: 5000 }]);
  });

  it("openStateDb creates missing parent directories", () => {
    const nested = join(tmpDir, "a", "b", "state.db");
    const { sqlite } = openStateDb(nested);
    const mode = sqlite.pragma("journal_mode");
    sqlite.close();
    expect(mode).toEqual([{ journal_mode: "wal" }]);
  });
});
