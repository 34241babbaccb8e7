import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { PrivateNetworkConfig } from "../config/index.js";
import { ProvisioningError } from "./errors.js";

/**
 * Payload builder: the imaging directive, the post-install script run by the
 * imaging tool, the first-boot script and the cluster join command.
 *
 * Script skeletons live in `templates/` with `{{NAME}}` placeholders. Values
 * that land in shell assignments are single-quoted by the builders here, so
 * templates never quote them again.
 */

export const ARCHITECTURES = ["amd64", "arm64"] as const;
export type Architecture = (typeof ARCHITECTURES)[number];

export const RAID_LEVELS = [0, 1, 5, 6, 10] as const;

const TEMPLATE_DIR = fileURLToPath(new URL("../../templates/", import.meta.url));

export type TemplateName = "post-install.sh" | "first-boot.sh" | "wait-gateway.sh";

const templateCache = new Map<TemplateName, string>();

export function loadTemplate(name: TemplateName): string {
  let text = templateCache.get(name);
  if (text === undefined) {
    text = readFileSync(`${TEMPLATE_DIR}${name}`, "utf8");
    templateCache.set(name, text);
  }
  return text;
}

function invalid(summary: string, detail: string): ProvisioningError {
  return new ProvisioningError("invalid_configuration", summary, detail);
}

const PLACEHOLDER = /\{\{([A-Z0-9_]+)\}\}/g;

/**
 * Substitute `{{NAME}}` placeholders in one pass.
 *
 * Every placeholder needs a value and every value a placeholder. Values may not
 * contain placeholder delimiters; only keys listed in `multiline` may span lines.
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
  multiline: readonly string[] = [],
): string {
  for (const [key, value] of Object.entries(values)) {
    if (value.includes("{{") || value.includes("}}")) {
      throw invalid("invalid template value", `${key} contains a placeholder delimiter`);
    }
    if (value.includes("\0")) {
      throw invalid("invalid template value", `${key} contains a NUL byte`);
    }
    if (!multiline.includes(key) && /[\r\n]/.test(value)) {
      throw invalid("invalid template value", `${key} must be a single line`);
    }
  }

  const used = new Set<string>();
  const missing = new Set<string>();
  const rendered = template.replace(PLACEHOLDER, (match, key: string) => {
    const value = values[key];
    if (value === undefined) {
      missing.add(key);
      return match;
    }
    used.add(key);
    return value;
  });

  if (missing.size > 0) {
    throw invalid("unreplaced template placeholder", [...missing].map((k) => `{{${k}}}`).join(", "));
  }
  const unused = Object.keys(values).filter((k) => !used.has(k));
  if (unused.length > 0) {
    throw invalid("unknown template value", unused.join(", "));
  }
  return rendered;
}

/** Quote a value for POSIX shells. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

const HOSTNAME = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/;
const DEVICE = /^\/dev\/[A-Za-z0-9_.-]+$/;

export interface ImagingDirectiveParams {
  hostname: string;
  architecture: Architecture;
  encryptionPassphrase: string;
  raidLevel: number;
  drives: readonly [string, string];
  noUEFI: boolean;
}

/** Configuration file for the rescue system's imaging tool (installimage). */
export function buildImagingDirective(params: ImagingDirectiveParams): string {
  if (!HOSTNAME.test(params.hostname)) {
    throw invalid("invalid hostname", `"${params.hostname}" is not a valid hostname`);
  }
  if (!ARCHITECTURES.some((a) => a === params.architecture)) {
    throw invalid("invalid architecture", `expected one of ${ARCHITECTURES.join(", ")}, got ${params.architecture}`);
  }
  if (!RAID_LEVELS.some((l) => l === params.raidLevel)) {
    throw invalid("invalid RAID level", `expected one of ${RAID_LEVELS.join(", ")}, got ${params.raidLevel}`);
  }
  if (params.encryptionPassphrase.length === 0 || /[\r\n]/.test(params.encryptionPassphrase)) {
    throw invalid("invalid encryption passphrase", "passphrase must be a non-empty single line");
  }
  for (const drive of params.drives) {
    if (!DEVICE.test(drive)) throw invalid("invalid drive", `"${drive}" is not a block device path`);
  }

  const lines = [
    `CRYPTPASSWORD ${params.encryptionPassphrase}`,
    `DRIVE1 ${params.drives[0]}`,
    `DRIVE2 ${params.drives[1]}`,
    "SWRAID 1",
    `SWRAIDLEVEL ${params.raidLevel}`,
    "BOOTLOADER grub",
    ...(params.noUEFI ? [] : ["PART /boot/efi esp 512M"]),
    "PART /boot ext4 1G",
    "PART /     ext4 all crypt",
    `IMAGE /root/images/Ubuntu-2404-noble-${params.architecture}-base.tar.gz`,
    `HOSTNAME ${params.hostname}`,
  ];
  return `${lines.join("\n")}\n`;
}

export interface PostInstallParams {
  encryptionPassphrase: string;
  /** Port of the dropbear SSH server in the initramfs. Default 2222 */
  dropbearPort?: number;
}

export function buildPostInstallScript(params: PostInstallParams): string {
  return renderTemplate(loadTemplate("post-install.sh"), {
    CRYPT_PASSWORD: shellQuote(params.encryptionPassphrase),
    DROPBEAR_PORT: String(params.dropbearPort ?? 2222),
  });
}

export interface FirstBootParams {
  localIP: string;
  network: PrivateNetworkConfig;
  extraScript?: string;
}

export function buildFirstBootScript(params: FirstBootParams): string {
  const { network } = params;
  return renderTemplate(
    loadTemplate("first-boot.sh"),
    {
      LOCAL_IP: shellQuote(params.localIP),
      PREFIX_LENGTH: String(network.prefixLength),
      VLAN_ID: String(network.vlanId),
      VLAN_MTU: String(network.mtu),
      GATEWAY_IP: shellQuote(network.gateway),
      ROUTE_CIDR: shellQuote(network.routeCidr),
      EXTRA_SCRIPT: params.extraScript?.trim() ?? "",
    },
    ["EXTRA_SCRIPT"],
  );
}

export interface GatewayWaitParams {
  target: string;
  /** Default 60 */
  maxAttempts?: number;
  /** Default 5 */
  intervalSeconds?: number;
}

/** Ping loop run on the new OS before joining the cluster over the private network. */
export function buildGatewayWaitScript(params: GatewayWaitParams): string {
  return renderTemplate(loadTemplate("wait-gateway.sh"), {
    TARGET: shellQuote(params.target),
    MAX_ATTEMPTS: String(params.maxAttempts ?? 60),
    INTERVAL_SECONDS: String(params.intervalSeconds ?? 5),
  });
}

export interface NodeLabel {
  name: string;
  value: string;
}

export interface ClusterJoinParams {
  url: string;
  token: string;
  nodeLabels: readonly NodeLabel[];
  taints: readonly string[];
}

/** k3s agent install-and-join command. */
export function buildClusterJoinScript(params: ClusterJoinParams): string {
  if (!/^https?:\/\/\S+$/.test(params.url)) {
    throw invalid("invalid cluster url", `"${params.url}" is not an http(s) URL`);
  }
  if (params.token.length === 0 || /\s/.test(params.token)) {
    throw invalid("invalid cluster token", "token must be non-empty and contain no whitespace");
  }

  const args = [
    `--kubelet-arg=${shellQuote("--cloud-provider=external")}`,
    ...params.nodeLabels.map((l) => `--node-label ${shellQuote(`${l.name}=${l.value}`)}`),
    ...params.taints.map((t) => `--kubelet-arg=${shellQuote(`register-with-taints=${t}`)}`),
  ];
  const lines = [
    `curl -sfL https://get.k3s.io | K3S_URL=${shellQuote(params.url)} K3S_TOKEN=${shellQuote(params.token)} \\`,
    "  sh -s - \\",
    ...args.map((arg, i) => `  ${arg}${i < args.length - 1 ? " \\" : ""}`),
    "echo 'cluster agent installed'",
  ];
  return `${lines.join("\n")}\n`;
}
