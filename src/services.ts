import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { openStateDb, type StateDb } from "./db/index.js";
import { Reconciler } from "./manifest/reconciler.js";
import { PrivateIpAllocator } from "./network/ip-allocator.js";
import { DrizzleServerOrderRepository } from "./orders/order-repository.js";
import { OrderService } from "./orders/order-service.js";
import { resolveCacheFile, TransactionCache } from "./orders/transaction-cache.js";
import { ProvisioningPipeline } from "./provisioning/pipeline.js";
import { RobotClient } from "./robot/robot-client.js";
import { ServerListCache } from "./robot/server-list-cache.js";
import { ServerLifecycle } from "./servers/server-lifecycle.js";
import { DrizzleManagedServerRepository, type IManagedServerRepository } from "./servers/server-repository.js";
import { DrizzleVSwitchRepository } from "./vswitch/vswitch-repository.js";
import { VSwitchService } from "./vswitch/vswitch-service.js";

/**
 * Lazy process-wide singletons. The CLI resolves everything through here so
 * every command shares one state database, one allocator and one transaction
 * cache. Nothing is opened at import time.
 */

let _state: StateDb | null = null;
let _robot: RobotClient | null = null;
let _credentials: { username?: string; password?: string } = {};
let _allocator: PrivateIpAllocator | null = null;
let _transactionCache: TransactionCache | null = null;
let _serverRepo: IManagedServerRepository | null = null;
let _orderService: OrderService | null = null;
let _vswitchService: VSwitchService | null = null;
let _serverListCache: ServerListCache | null = null;
let _pipeline: ProvisioningPipeline | null = null;
let _lifecycle: ServerLifecycle | null = null;
let _reconciler: Reconciler | null = null;

export function getStateDb(): StateDb {
  if (!_state) {
    _state = openStateDb(config.stateDbPath);
    logger.debug("Opened state database", { path: config.stateDbPath });
  }
  return _state;
}

/**
 * Credentials from a manifest's provider block. Environment values win; must
 * be called before the client is first used.
 */
export function setProviderCredentials(credentials: { username?: string; password?: string }): void {
  if (_robot) throw new Error("Robot client already created");
  _credentials = credentials;
}

export function getRobotClient(): RobotClient {
  if (!_robot) {
    _robot = new RobotClient({
      ...config.robot,
      username: config.robot.username ?? _credentials.username,
      password: config.robot.password ?? _credentials.password,
    });
  }
  return _robot;
}

export function getServerRepo(): IManagedServerRepository {
  if (!_serverRepo) {
    _serverRepo = new DrizzleManagedServerRepository(getStateDb().db);
  }
  return _serverRepo;
}

/** Seeded with every address already recorded in state. */
export function getAllocator(): PrivateIpAllocator {
  if (!_allocator) {
    const allocator = new PrivateIpAllocator({
      rangeStart: config.privateNetwork.rangeStart,
      rangeEnd: config.privateNetwork.rangeEnd,
    });
    allocator.seed(getServerRepo().listLocalIps());
    logger.debug("Private address pool ready", { held: allocator.heldCount, capacity: allocator.capacity });
    _allocator = allocator;
  }
  return _allocator;
}

export function getTransactionCache(): TransactionCache {
  if (!_transactionCache) {
    _transactionCache = new TransactionCache({ filePath: resolveCacheFile(config.cacheDir) });
  }
  return _transactionCache;
}

export function getOrderService(): OrderService {
  if (!_orderService) {
    _orderService = new OrderService(
      getRobotClient(),
      getTransactionCache(),
      new DrizzleServerOrderRepository(getStateDb().db),
    );
  }
  return _orderService;
}

export function getVSwitchService(): VSwitchService {
  if (!_vswitchService) {
    _vswitchService = new VSwitchService(getRobotClient(), new DrizzleVSwitchRepository(getStateDb().db));
  }
  return _vswitchService;
}

export function getServerListCache(): ServerListCache {
  if (!_serverListCache) {
    _serverListCache = new ServerListCache(getRobotClient());
  }
  return _serverListCache;
}

export function getPipeline(): ProvisioningPipeline {
  if (!_pipeline) {
    _pipeline = new ProvisioningPipeline(
      { robot: getRobotClient() },
      { ssh: config.ssh, timings: config.provisioning, network: config.privateNetwork },
    );
  }
  return _pipeline;
}

export function getServerLifecycle(): ServerLifecycle {
  if (!_lifecycle) {
    _lifecycle = new ServerLifecycle({
      repo: getServerRepo(),
      allocator: getAllocator(),
      robot: getRobotClient(),
      pipeline: getPipeline(),
    });
  }
  return _lifecycle;
}

export function getReconciler(): Reconciler {
  if (!_reconciler) {
    _reconciler = new Reconciler({
      orders: getOrderService(),
      vswitches: getVSwitchService(),
      servers: getServerLifecycle(),
      serverRepo: getServerRepo(),
      inventory: getServerListCache(),
    });
  }
  return _reconciler;
}

export function closeServices(): void {
  _state?.sqlite.close();
  _state = null;
  _robot = null;
  _credentials = {};
  _allocator = null;
  _transactionCache = null;
  _serverRepo = null;
  _orderService = null;
  _vswitchService = null;
  _serverListCache = null;
  _pipeline = null;
  _lifecycle = null;
  _reconciler = null;
}
