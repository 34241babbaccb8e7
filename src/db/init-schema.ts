import type Database from "better-sqlite3";

/** Create the state tables and indexes. Safe to run on every start. */
export function initProvisionerSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS managed_servers (
      key TEXT PRIMARY KEY,
      id TEXT,
      server_number INTEGER NOT NULL,
      server_ip TEXT NOT NULL,
      name TEXT NOT NULL,
      description TEXT,
      vswitch_id INTEGER,
      version INTEGER NOT NULL DEFAULT 1,
      architecture TEXT NOT NULL,
      encryption_passphrase TEXT NOT NULL,
      raid_level INTEGER NOT NULL DEFAULT 1,
      no_uefi INTEGER NOT NULL DEFAULT 0,
      rescue_key_fingerprints TEXT NOT NULL,
      node_labels TEXT NOT NULL DEFAULT '[]',
      taints TEXT NOT NULL DEFAULT '[]',
      cluster_url TEXT,
      cluster_token TEXT,
      extra_script TEXT,
      local_ip TEXT NOT NULL,
      server_name TEXT NOT NULL,
      robot_name TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'provisioning',
      provision_stage TEXT,
      last_error TEXT,
      created_at INTEGER NOT NULL DEFAULT (unixepoch()),
      updated_at INTEGER NOT NULL DEFAULT (unixepoch())
    )
  `);
  db.exec("CREATE UNIQUE INDEX IF NOT EXISTS idx_managed_servers_local_ip ON managed_servers(local_ip)");
  db.exec("CREATE INDEX IF NOT EXISTS idx_managed_servers_status ON managed_servers(status)");

  db.exec(`
    CREATE TABLE IF NOT EXISTS server_orders (
      key TEXT PRIMARY KEY,
      market INTEGER NOT NULL DEFAULT 0,
      product_id TEXT NOT NULL,
      dist TEXT,
      location TEXT,
      authorized_keys TEXT NOT NULL DEFAULT '[]',
      addons TEXT NOT NULL DEFAULT '[]',
      test INTEGER NOT NULL DEFAULT 0,
      transaction_id TEXT NOT NULL,
      status TEXT NOT NULL,
      server_number INTEGER,
      server_ip TEXT,
      created_at INTEGER NOT NULL DEFAULT (unixepoch()),
      updated_at INTEGER NOT NULL DEFAULT (unixepoch())
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS vswitches (
      key TEXT PRIMARY KEY,
      vswitch_id INTEGER NOT NULL,
      vlan INTEGER NOT NULL,
      name TEXT NOT NULL,
      created_at INTEGER NOT NULL DEFAULT (unixepoch()),
      updated_at INTEGER NOT NULL DEFAULT (unixepoch())
    )
  `);
}
