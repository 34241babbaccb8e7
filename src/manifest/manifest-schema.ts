import { z } from "zod";
import { ARCHITECTURES, RAID_LEVELS } from "../provisioning/payloads.js";

/** Resource names become state keys such as `servers.<name>`. */
const resourceName = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, "must be alphanumeric, '-' or '_'");

/** Robot credentials; `HROBOT_USERNAME` / `HROBOT_PASSWORD` take over when absent */
export const providerSchema = z.object({
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
});
export type ProviderBlock = z.infer<typeof providerSchema>;

export const orderSchema = z.object({
  /** Product id such as "EX44"; numeric for market orders */
  product: z.union([z.string().min(1), z.number().int().positive()]).transform(String),
  market: z.boolean().default(false),
  dist: z.string().min(1).optional(),
  location: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
  authorizedKeys: z.array(z.string().min(1)).default(() => []),
  addons: z.array(z.string().min(1)).default(() => []),
  test: z.boolean().default(false),
});
export type OrderBlock = z.infer<typeof orderSchema>;

export const vswitchSchema = z.object({
  vlan: z.number().int().min(4000).max(4091),
  name: z.string().min(1),
});
export type VSwitchBlock = z.infer<typeof vswitchSchema>;

export const nodeLabelSchema = z.object({ name: z.string().min(1), value: z.string() });

export const serverSchema = z
  .object({
    /** Take server number and IP from an order in this manifest */
    order: resourceName.optional(),
    serverNumber: z.number().int().positive().optional(),
    serverIP: z.string().ip({ version: "v4" }).optional(),
    name: z.string().regex(/^[A-Za-z0-9](?:[A-Za-z0-9-]{0,54}[A-Za-z0-9])?$/, "must be a hostname label of up to 56 characters"),
    description: z.string().optional(),
    /** vSwitch declared in this manifest */
    vswitch: resourceName.optional(),
    vswitchId: z.number().int().positive().optional(),
    version: z.number().int().positive().default(1),
    architecture: z.enum(ARCHITECTURES).default("amd64"),
    encryptionPassphrase: z.string().min(1),
    raidLevel: z
      .number()
      .int()
      .refine((level) => RAID_LEVELS.some((r) => r === level), { message: `must be one of ${RAID_LEVELS.join(", ")}` })
      .default(1),
    noUEFI: z.boolean().default(false),
    rescueKeyFingerprints: z.array(z.string().min(1)).min(1),
    nodeLabels: z.array(nodeLabelSchema).default(() => []),
    taints: z.array(z.string().min(1)).default(() => []),
    cluster: z.object({ url: z.string().url(), token: z.string().min(1) }).optional(),
    extraScript: z.string().optional(),
  })
  .superRefine((server, ctx) => {
    const fixed = server.serverNumber !== undefined || server.serverIP !== undefined;
    if (server.order !== undefined && fixed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "use either order or serverNumber/serverIP, not both" });
    }
    if (server.order === undefined && (server.serverNumber === undefined || server.serverIP === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "serverNumber and serverIP are required without an order" });
    }
    if (server.vswitch !== undefined && server.vswitchId !== undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "use either vswitch or vswitchId, not both" });
    }
  });
export type ServerBlock = z.infer<typeof serverSchema>;

export const manifestSchema = z
  .object({
    provider: providerSchema.default(() => ({})),
    orders: z.record(resourceName, orderSchema).default(() => ({})),
    vswitches: z.record(resourceName, vswitchSchema).default(() => ({})),
    servers: z.record(resourceName, serverSchema).default(() => ({})),
  })
  .superRefine((manifest, ctx) => {
    for (const [name, server] of Object.entries(manifest.servers)) {
      if (server.order !== undefined && !(server.order in manifest.orders)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["servers", name, "order"],
          message: `unknown order "${server.order}"`,
        });
      }
      if (server.vswitch !== undefined && !(server.vswitch in manifest.vswitches)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["servers", name, "vswitch"],
          message: `unknown vswitch "${server.vswitch}"`,
        });
      }
    }
  });

export type Manifest = z.infer<typeof manifestSchema>;
