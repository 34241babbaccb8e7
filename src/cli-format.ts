import type { ActionKind, ActionResult, PlannedAction } from "./manifest/reconciler.js";
import type { ServerInfo, TransactionRecord } from "./robot/types.js";
import type { ManagedServerState } from "./servers/types.js";

const SYMBOL: Record<ActionKind, string> = {
  create: "+",
  update: "~",
  replace: "-/+",
  delete: "-",
  noop: " ",
  retry: "↻",
};

export function formatPlan(actions: readonly PlannedAction[]): string {
  const changes = actions.filter((a) => a.action !== "noop");
  if (changes.length === 0) return "No changes.";
  const lines = changes.map((a) => `${SYMBOL[a.action].padStart(3)} ${a.key}${a.reason ? ` (${a.reason})` : ""}`);
  const counts = (kind: ActionKind) => changes.filter((a) => a.action === kind).length;
  lines.push(
    "",
    `Plan: ${counts("create")} to create, ${counts("update") + counts("retry")} to change, ` +
      `${counts("replace")} to replace, ${counts("delete")} to delete.`,
  );
  return lines.join("\n");
}

export function formatApplyResults(results: readonly ActionResult[]): string {
  const lines: string[] = [];
  for (const r of results) {
    if (r.action === "noop" && r.outcome === "ok" && r.warnings.length === 0) continue;
    lines.push(`${r.outcome.padEnd(7)} ${r.action.padEnd(7)} ${r.key}${r.error ? `: ${r.error}` : ""}`);
    for (const warning of r.warnings) lines.push(`        warning: ${warning}`);
  }
  return lines.length > 0 ? lines.join("\n") : "Nothing to do.";
}

/** Account servers, with the managed state key and private address where there is one. */
export function formatServers(servers: readonly ServerInfo[], managed: readonly ManagedServerState[]): string {
  if (servers.length === 0) return "No servers in this account.";
  const byNumber = new Map(managed.map((m) => [m.serverNumber, m]));
  const rows = servers.map((s) => {
    const m = byNumber.get(s.serverNumber);
    return [String(s.serverNumber), s.serverName, s.serverIP, s.product, s.status, m?.key ?? "-", m?.localIP ?? "-"];
  });
  const header = ["NUMBER", "NAME", "IP", "PRODUCT", "STATUS", "MANAGED AS", "PRIVATE IP"];
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));
  return [header, ...rows].map((row) => row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd()).join("\n");
}

export function formatTransaction(tx: TransactionRecord): string {
  return [
    `transaction  ${tx.id}`,
    `status       ${tx.status}`,
    `server       ${tx.serverNumber ?? "-"}`,
    `server ip    ${tx.serverIP ?? "-"}`,
    `product      ${tx.productId ?? "-"}`,
  ].join("\n");
}
