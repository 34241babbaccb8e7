import { z } from "zod";

const DEFAULT_ROBOT_BASE_URL = "https://robot-ws.your-server.de";

const MINUTE_MS = 60_000;

const configSchema = z.object({
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),
  /** "pretty" prints one readable line per entry instead of JSON. */
  logFormat: z.enum(["json", "pretty"]).default("json"),

  /** SQLite file holding persisted resource state. */
  stateDbPath: z.string().min(1).default("./.state/provisioner.db"),

  /** Directory for the transaction cache files. Empty means `.cache/` under the working directory. */
  cacheDir: z.string().optional(),

  /** Robot webservice access. Credentials may also come from the manifest's provider block. */
  robot: z
    .object({
      username: z.string().optional(),
      password: z.string().optional(),
      baseUrl: z.string().url().default(DEFAULT_ROBOT_BASE_URL),
      timeoutSeconds: z.coerce.number().int().positive().default(30),
    })
    .default({ baseUrl: DEFAULT_ROBOT_BASE_URL, timeoutSeconds: 30 }),

  ssh: z
    .object({
      user: z.string().min(1).default("root"),
      agentSocket: z.string().optional(),
      readyTimeoutMs: z.coerce.number().int().positive().default(3 * MINUTE_MS),
    })
    .default({ user: "root", readyTimeoutMs: 3 * MINUTE_MS }),

  provisioning: z
    .object({
      rescueWaitMs: z.coerce.number().int().positive().default(20 * MINUTE_MS),
      osWaitMs: z.coerce.number().int().positive().default(20 * MINUTE_MS),
      osWaitExtensionMs: z.coerce.number().int().nonnegative().default(15 * MINUTE_MS),
      pollIntervalMs: z.coerce.number().int().positive().default(5_000),
      attemptTimeoutMs: z.coerce.number().int().positive().default(5_000),
      rebootGraceMs: z.coerce.number().int().nonnegative().default(10_000),
    })
    .default({
      rescueWaitMs: 20 * MINUTE_MS,
      osWaitMs: 20 * MINUTE_MS,
      osWaitExtensionMs: 15 * MINUTE_MS,
      pollIntervalMs: 5_000,
      attemptTimeoutMs: 5_000,
      rebootGraceMs: 10_000,
    }),

  /** Private network reached through the vSwitch VLAN. */
  privateNetwork: z
    .object({
      rangeStart: z.string().ip({ version: "v4" }).default("10.1.0.2"),
      rangeEnd: z.string().ip({ version: "v4" }).default("10.1.0.127"),
      prefixLength: z.coerce.number().int().min(8).max(30).default(24),
      vlanId: z.coerce.number().int().min(4000).max(4091).default(4001),
      mtu: z.coerce.number().int().min(576).max(9000).default(1400),
      gateway: z.string().ip({ version: "v4" }).default("10.1.0.1"),
      routeCidr: z.string().default("10.0.0.0/16"),
      /** Address pinged before joining the cluster. */
      clusterProbeTarget: z.string().ip({ version: "v4" }).default("10.0.0.120"),
    })
    .default({
      rangeStart: "10.1.0.2",
      rangeEnd: "10.1.0.127",
      prefixLength: 24,
      vlanId: 4001,
      mtu: 1400,
      gateway: "10.1.0.1",
      routeCidr: "10.0.0.0/16",
      clusterProbeTarget: "10.0.0.120",
    }),
});

export type Config = z.infer<typeof configSchema>;
export type PrivateNetworkConfig = Config["privateNetwork"];
export type ProvisioningTimings = Config["provisioning"];

/** Empty strings in the environment count as unset. */
function env(source: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = source[name];
  return value === undefined || value === "" ? undefined : value;
}

/** Parse configuration from an environment map. Throws a ZodError on invalid values. */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    logLevel: env(source, "LOG_LEVEL"),
    logFormat: env(source, "LOG_FORMAT"),
    stateDbPath: env(source, "STATE_DB_PATH"),
    cacheDir: env(source, "CACHE_DIR"),
    robot: {
      username: env(source, "HROBOT_USERNAME"),
      password: env(source, "HROBOT_PASSWORD"),
      baseUrl: env(source, "HROBOT_BASE_URL"),
      timeoutSeconds: env(source, "HROBOT_TIMEOUT_SECONDS"),
    },
    ssh: {
      user: env(source, "SSH_USER"),
      agentSocket: env(source, "SSH_AUTH_SOCK"),
      readyTimeoutMs: env(source, "SSH_READY_TIMEOUT_MS"),
    },
    provisioning: {
      rescueWaitMs: env(source, "RESCUE_WAIT_MS"),
      osWaitMs: env(source, "OS_WAIT_MS"),
      osWaitExtensionMs: env(source, "OS_WAIT_EXTENSION_MS"),
      pollIntervalMs: env(source, "POLL_INTERVAL_MS"),
      attemptTimeoutMs: env(source, "POLL_ATTEMPT_TIMEOUT_MS"),
      rebootGraceMs: env(source, "REBOOT_GRACE_MS"),
    },
    privateNetwork: {
      rangeStart: env(source, "PRIVATE_IP_RANGE_START"),
      rangeEnd: env(source, "PRIVATE_IP_RANGE_END"),
      prefixLength: env(source, "PRIVATE_PREFIX_LENGTH"),
      vlanId: env(source, "PRIVATE_VLAN_ID"),
      mtu: env(source, "PRIVATE_MTU"),
      gateway: env(source, "PRIVATE_GATEWAY"),
      routeCidr: env(source, "PRIVATE_ROUTE_CIDR"),
      clusterProbeTarget: env(source, "CLUSTER_PROBE_TARGET"),
    },
  });
}

export const config = loadConfig();
