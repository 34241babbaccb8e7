import type Database from "better-sqlite3";

/**
 * Pragmas for the state database.
 *
 * WAL lets `plan` read while an `apply` in another terminal writes; the busy
 * timeout makes the second writer wait up to 5s for the lock instead of
 * failing with SQLITE_BUSY.
 */
export function applyStatePragmas(sqlite: Database.Database): void {
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("busy_timeout = 5000");
  sqlite.pragma("foreign_keys = ON");
}
