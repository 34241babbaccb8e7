import { eq } from "drizzle-orm";
import { z } from "zod";
import type { DrizzleDb } from "../db/index.js";
import { serverOrders } from "../db/schema/index.js";
import { TRANSACTION_STATUSES, type TransactionStatus } from "../robot/types.js";
import type { ServerOrderState } from "./types.js";

type ServerOrderRow = typeof serverOrders.$inferSelect;

export interface IServerOrderRepository {
  getByKey(key: string): ServerOrderState | null;
  list(): ServerOrderState[];
  save(state: ServerOrderState): void;
  delete(key: string): void;
}

const stringList = z.array(z.string());

function toStatus(value: string): TransactionStatus {
  const match = TRANSACTION_STATUSES.find((s) => s === value);
  if (!match) throw new Error(`Corrupt order status column: ${value}`);
  return match;
}

function toState(row: ServerOrderRow): ServerOrderState {
  return {
    key: row.key,
    market: row.market,
    productId: row.productId,
    dist: row.dist ?? undefined,
    location: row.location ?? undefined,
    authorizedKeys: stringList.parse(JSON.parse(row.authorizedKeys)),
    addons: stringList.parse(JSON.parse(row.addons)),
    test: row.test,
    transactionId: row.transactionId,
    status: toStatus(row.status),
    serverNumber: row.serverNumber,
    serverIP: row.serverIP,
  };
}

export class DrizzleServerOrderRepository implements IServerOrderRepository {
  constructor(private readonly db: DrizzleDb) {}

  getByKey(key: string): ServerOrderState | null {
    const row = this.db.select().from(serverOrders).where(eq(serverOrders.key, key)).get();
    return row ? toState(row) : null;
  }

  list(): ServerOrderState[] {
    return this.db.select().from(serverOrders).orderBy(serverOrders.key).all().map(toState);
  }

  save(state: ServerOrderState): void {
    const row = {
      key: state.key,
      market: state.market,
      productId: state.productId,
      dist: state.dist ?? null,
      location: state.location ?? null,
      authorizedKeys: JSON.stringify(state.authorizedKeys),
      addons: JSON.stringify(state.addons),
      test: state.test,
      transactionId: state.transactionId,
      status: state.status,
      serverNumber: state.serverNumber,
      serverIP: state.serverIP,
      updatedAt: Math.floor(Date.now() / 1000),
    };
    const { key: _key, ...updates } = row;
    this.db.insert(serverOrders).values(row).onConflictDoUpdate({ target: serverOrders.key, set: updates }).run();
  }

  delete(key: string): void {
    this.db.delete(serverOrders).where(eq(serverOrders.key, key)).run();
  }
}
