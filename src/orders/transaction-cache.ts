import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";
import { logger } from "../config/logger.js";
import { TRANSACTION_STATUSES, type TransactionRecord } from "../robot/types.js";

export const TRANSACTION_CACHE_TTL_MS = 5 * 60 * 1000;
const CACHE_FILE_NAME = "transaction-cache.json";

const cachedTransactionSchema = z.object({
  id: z.string(),
  date: z.string().nullable(),
  status: z.enum(TRANSACTION_STATUSES),
  serverNumber: z.number().int().nullable(),
  serverIP: z.string().nullable(),
  productId: z.string().nullable(),
});

const cacheFileSchema = z.record(
  z.string(),
  z.object({
    transaction: cachedTransactionSchema,
    lastUpdated: z.string().datetime({ offset: true }),
  }),
);

interface CacheEntry {
  transaction: TransactionRecord;
  lastUpdated: number;
}

export interface TransactionCacheOptions {
  /** JSON file backing the cache; null keeps it in memory only. */
  filePath: string | null;
  ttlMs?: number;
  now?: () => number;
}

/**
 * Where the cache file lives: `cacheDir` when configured, else `.cache/` under
 * the working directory, else the OS temp directory.
 */
export function resolveCacheFile(cacheDir?: string): string {
  if (cacheDir) return join(cacheDir, CACHE_FILE_NAME);
  try {
    const dir = join(process.cwd(), ".cache");
    mkdirSync(dir, { recursive: true });
    return join(dir, CACHE_FILE_NAME);
  } catch (err) {
    logger.warn("Working directory unusable for the transaction cache, using temp dir", { err });
    return join(tmpdir(), `metal-provisioner-${CACHE_FILE_NAME}`);
  }
}

/**
 * Order transactions keyed by transaction id, so repeated reads of a finished
 * order cost no API call. Entries expire after the TTL; the file is rewritten
 * on every update and expired entries are dropped when it is loaded.
 *
 * The cache only saves calls. A missing or unreadable file means an empty cache.
 */
export class TransactionCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(private readonly options: TransactionCacheOptions) {
    this.ttlMs = options.ttlMs ?? TRANSACTION_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
    this.load();
  }

  /** Cached transaction, or null when absent or older than the TTL. */
  get(id: string): TransactionRecord | null {
    const entry = this.entries.get(id);
    if (!entry) return null;
    if (this.now() - entry.lastUpdated > this.ttlMs) return null;
    return { ...entry.transaction };
  }

  set(transaction: TransactionRecord): void {
    this.entries.set(transaction.id, { transaction: { ...transaction }, lastUpdated: this.now() });
    this.persist();
  }

  delete(id: string): void {
    if (this.entries.delete(id)) this.persist();
  }

  get size(): number {
    return this.entries.size;
  }

  private load(): void {
    const { filePath } = this.options;
    if (!filePath) return;

    let text: string;
    try {
      text = readFileSync(filePath, "utf8");
    } catch {
      return; // first run
    }

    let parsed: z.infer<typeof cacheFileSchema>;
    try {
      const result = cacheFileSchema.safeParse(JSON.parse(text));
      if (!result.success) {
        logger.warn("Ignoring malformed transaction cache", { filePath, issues: result.error.issues.length });
        return;
      }
      parsed = result.data;
    } catch (err) {
      logger.warn("Ignoring unreadable transaction cache", { filePath, err });
      return;
    }

    const now = this.now();
    for (const [id, entry] of Object.entries(parsed)) {
      const lastUpdated = Date.parse(entry.lastUpdated);
      if (now - lastUpdated > this.ttlMs) continue;
      this.entries.set(id, { transaction: entry.transaction, lastUpdated });
    }
  }

  private persist(): void {
    const { filePath } = this.options;
    if (!filePath) return;

    const out: z.input<typeof cacheFileSchema> = {};
    for (const [id, entry] of this.entries) {
      out[id] = { transaction: entry.transaction, lastUpdated: new Date(entry.lastUpdated).toISOString() };
    }
    try {
      mkdirSync(dirname(filePath), { recursive: true });
      writeFileSync(filePath, JSON.stringify(out), { mode: 0o600 });
    } catch (err) {
      logger.warn("Failed to write transaction cache", { filePath, err });
    }
  }
}
