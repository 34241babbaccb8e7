import { sql } from "drizzle-orm";
import { index, integer, sqliteTable, text, uniqueIndex } from "drizzle-orm/sqlite-core";

/**
 * Managed servers: declared configuration plus the state the provisioning
 * pipeline derived for it. One row per manifest server key.
 */
export const managedServers = sqliteTable(
  "managed_servers",
  {
    /** Manifest address of the server (e.g. "servers.worker-1") */
    key: text("key").primaryKey(),
    /** Stamped once the first pipeline run succeeds: "server-<unix seconds>" */
    id: text("id"),
    /** Provider-assigned server number; immutable */
    serverNumber: integer("server_number").notNull(),
    /** Public IPv4 address; immutable */
    serverIP: text("server_ip").notNull(),
    /** Base name; serverName/robotName derive from it */
    name: text("name").notNull(),
    description: text("description"),
    vswitchId: integer("vswitch_id"),
    /** Bumping this re-runs the full pipeline */
    version: integer("version").notNull().default(1),
    /** amd64 | arm64 */
    architecture: text("architecture").notNull(),
    encryptionPassphrase: text("encryption_passphrase").notNull(),
    raidLevel: integer("raid_level").notNull().default(1),
    noUefi: integer("no_uefi", { mode: "boolean" }).notNull().default(false),
    /** JSON array of rescue key fingerprints */
    rescueKeyFingerprints: text("rescue_key_fingerprints").notNull(),
    /** JSON array of { name, value } */
    nodeLabels: text("node_labels").notNull().default("[]"),
    /** JSON array of taint strings */
    taints: text("taints").notNull().default("[]"),
    clusterUrl: text("cluster_url"),
    clusterToken: text("cluster_token"),
    extraScript: text("extra_script"),
    /** Private address on the vSwitch VLAN; frozen once assigned */
    localIP: text("local_ip").notNull(),
    /** Hostname written by the imaging step: <name>-<6 hex> */
    serverName: text("server_name").notNull(),
    /** Name shown in the Robot panel; same derivation as serverName */
    robotName: text("robot_name").notNull(),
    /** provisioning | ready | failed */
    status: text("status").notNull().default("provisioning"),
    /** Last pipeline stage entered */
    provisionStage: text("provision_stage"),
    lastError: text("last_error"),
    createdAt: integer("created_at").notNull().default(sql`(unixepoch())`),
    updatedAt: integer("updated_at").notNull().default(sql`(unixepoch())`),
  },
  (table) => [
    uniqueIndex("idx_managed_servers_local_ip").on(table.localIP),
    index("idx_managed_servers_status").on(table.status),
  ],
);
