import fs from "node:fs";
import { parse as parseYaml } from "yaml";
import type { ServerOrderSpec } from "../orders/types.js";
import type { VSwitchSpec } from "../vswitch/vswitch-repository.js";
import { type Manifest, manifestSchema } from "./manifest-schema.js";

export const orderKey = (name: string) => `orders.${name}`;
export const vswitchKey = (name: string) => `vswitches.${name}`;
export const serverKey = (name: string) => `servers.${name}`;

/** Parse and validate a YAML manifest */
export function parseManifest(content: string, filename: string): Manifest {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new Error(`Invalid manifest "${filename}": ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = manifestSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Invalid manifest "${filename}":\n  ${issues.join("\n  ")}`);
  }
  return result.data;
}

export function loadManifest(filePath: string): Manifest {
  return parseManifest(fs.readFileSync(filePath, "utf-8"), filePath);
}

export function orderSpecs(manifest: Manifest): ServerOrderSpec[] {
  return Object.entries(manifest.orders).map(([name, order]) => ({
    key: orderKey(name),
    market: order.market,
    productId: order.product,
    dist: order.dist,
    location: order.location,
    password: order.password,
    authorizedKeys: order.authorizedKeys,
    addons: order.addons,
    test: order.test,
  }));
}

export function vswitchSpecs(manifest: Manifest): VSwitchSpec[] {
  return Object.entries(manifest.vswitches).map(([name, vswitch]) => ({
    key: vswitchKey(name),
    vlan: vswitch.vlan,
    name: vswitch.name,
  }));
}
