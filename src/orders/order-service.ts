import { logger } from "../config/logger.js";
import { ProvisioningError } from "../provisioning/errors.js";
import { isNotFound, type RobotClient } from "../robot/robot-client.js";
import { isTerminalStatus, type TransactionRecord } from "../robot/types.js";
import type { IServerOrderRepository } from "./order-repository.js";
import type { TransactionCache } from "./transaction-cache.js";
import type { ServerOrderSpec, ServerOrderState } from "./types.js";

export type OrderRobot = Pick<
  RobotClient,
  "orderServer" | "orderMarketServer" | "getOrderTransaction" | "getMarketOrderTransaction"
>;

/**
 * Places server orders and tracks their transactions.
 *
 * Orders are immutable: a changed order is a new order, and forgetting one
 * only drops local state (the server itself is cancelled through its managed
 * server, not here).
 */
export class OrderService {
  constructor(
    private readonly robot: OrderRobot,
    private readonly cache: TransactionCache,
    private readonly repo: IServerOrderRepository,
  ) {}

  async order(spec: ServerOrderSpec): Promise<ServerOrderState> {
    const params = {
      dist: spec.dist,
      password: spec.password,
      authorizedKeys: spec.authorizedKeys,
      addons: spec.addons,
      test: spec.test,
    };
    const tx = spec.market
      ? await this.robot.orderMarketServer({ ...params, productId: marketProductId(spec) })
      : await this.robot.orderServer({ ...params, productId: spec.productId, location: spec.location });

    this.cache.set(tx);
    const { password: _password, ...declared } = spec;
    const state: ServerOrderState = { ...declared, ...fromTransaction(tx) };
    this.repo.save(state);
    logger.info("Placed server order", { key: spec.key, transactionId: tx.id, status: tx.status });
    return state;
  }

  /**
   * Current state of a placed order. Returns null, and drops the order from
   * state, when the API no longer knows the transaction.
   */
  async refresh(key: string): Promise<ServerOrderState | null> {
    const state = this.repo.getByKey(key);
    if (!state) return null;

    const tx = await this.transaction(state.transactionId, state.market);
    if (!tx) {
      logger.warn("Order transaction gone, dropping from state", { key, transactionId: state.transactionId });
      this.repo.delete(key);
      return null;
    }

    const next: ServerOrderState = { ...state, ...fromTransaction(tx) };
    this.repo.save(next);
    return next;
  }

  /**
   * A transaction by id. Terminal statuses come from the cache while it is
   * fresh; "in process" is always re-fetched.
   */
  async transaction(id: string, market: boolean): Promise<TransactionRecord | null> {
    const cached = this.cache.get(id);
    if (cached && isTerminalStatus(cached.status)) {
      logger.debug("Using cached transaction", { transactionId: id, status: cached.status });
      return cached;
    }

    let tx: TransactionRecord;
    try {
      tx = market ? await this.robot.getMarketOrderTransaction(id) : await this.robot.getOrderTransaction(id);
    } catch (err) {
      if (!isNotFound(err)) throw err;
      this.cache.delete(id);
      return null;
    }
    this.cache.set(tx);
    logger.info("Refreshed transaction", { transactionId: id, status: tx.status, cachedStatus: cached?.status });
    return tx;
  }

  list(): ServerOrderState[] {
    return this.repo.list();
  }

  get(key: string): ServerOrderState | null {
    return this.repo.getByKey(key);
  }

  forget(key: string): void {
    this.repo.delete(key);
    logger.info("Server order removed from state", { key });
  }
}

function fromTransaction(tx: TransactionRecord): Pick<
  ServerOrderState,
  "transactionId" | "status" | "serverNumber" | "serverIP"
> {
  return { transactionId: tx.id, status: tx.status, serverNumber: tx.serverNumber, serverIP: tx.serverIP };
}

function marketProductId(spec: ServerOrderSpec): number {
  if (!/^\d+$/.test(spec.productId)) {
    throw new ProvisioningError(
      "invalid_configuration",
      "invalid market product id",
      `order ${spec.key}: market product id must be numeric, got "${spec.productId}"`,
    );
  }
  return Number(spec.productId);
}
