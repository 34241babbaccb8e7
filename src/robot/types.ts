import { z } from "zod";

/** Robot webservice payloads, validated at the boundary. Only the fields we read are modelled. */

export const TRANSACTION_STATUSES = ["in process", "ready", "cancelled"] as const;
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

/** Terminal statuses never change again; only "in process" is worth re-fetching. */
export function isTerminalStatus(status: TransactionStatus): boolean {
  return status !== "in process";
}

const productSchema = z.union([
  z.number(),
  z.string(),
  z.object({ id: z.union([z.number(), z.string()]) }).passthrough(),
]);

function productIdOf(product: z.infer<typeof productSchema> | null | undefined): string | null {
  if (product === null || product === undefined) return null;
  return String(typeof product === "object" ? product.id : product);
}

export const transactionSchema = z
  .object({
    id: z.string(),
    date: z.string().optional(),
    status: z.enum(TRANSACTION_STATUSES),
    server_number: z.number().int().nullish(),
    server_ip: z.string().nullish(),
    product: productSchema.nullish(),
  })
  .transform((t) => ({
    id: t.id,
    date: t.date ?? null,
    status: t.status,
    serverNumber: t.server_number ?? null,
    serverIP: t.server_ip ? t.server_ip : null,
    productId: productIdOf(t.product),
  }));

export type TransactionRecord = z.output<typeof transactionSchema>;

export const transactionEnvelopeSchema = z.object({ transaction: transactionSchema }).transform((e) => e.transaction);

export const rescueEnvelopeSchema = z
  .object({
    rescue: z.object({
      server_ip: z.string().nullish(),
      active: z.boolean(),
      password: z.string().nullish(),
    }),
  })
  .transform(({ rescue }) => ({
    serverIP: rescue.server_ip ?? null,
    active: rescue.active,
    password: rescue.password ?? null,
  }));

export type RescueInfo = z.output<typeof rescueEnvelopeSchema>;

const vswitchSchema = z.object({
  id: z.number().int(),
  vlan: z.number().int().optional(),
  name: z.string().optional(),
  cancelled: z.boolean().optional(),
});

/** vSwitch responses arrive both bare and wrapped in `{ vswitch: … }`. */
export const vswitchResponseSchema = z.union([
  z.object({ vswitch: vswitchSchema }).transform((e) => e.vswitch),
  vswitchSchema,
]);


export interface VSwitchInfo {
  id: number;
  vlan: number;
  name: string;
  cancelled: boolean;
}

const serverSchema = z.object({
  server_number: z.number().int(),
  server_name: z.string().nullish(),
  server_ip: z.string().nullish(),
  status: z.string().nullish(),
  product: z.string().nullish(),
  location: z.string().nullish(),
  dc: z.string().nullish(),
});

/** `GET /server` is documented as a list of wrapped entries; some accounts see `{ server: [...] }`. */
export const serverListSchema = z
  .union([
    z.array(z.object({ server: serverSchema })).transform((list) => list.map((e) => e.server)),
    z.object({ server: z.array(serverSchema) }).transform((e) => e.server),
  ])
  .transform((servers) =>
    servers.map((s) => ({
      serverNumber: s.server_number,
      serverName: s.server_name ?? "",
      serverIP: s.server_ip ?? "",
      status: s.status ?? "",
      product: s.product ?? "",
      location: s.location ?? s.dc ?? "",
    })),
  );

export type ServerInfo = z.output<typeof serverListSchema>[number];

export const apiErrorBodySchema = z.object({
  error: z.object({
    status: z.number().int().optional(),
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});
