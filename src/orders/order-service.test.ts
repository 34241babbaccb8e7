import Database from "better-sqlite3";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createDb } from "../db/index.js";
import { initProvisionerSchema } from "../db/init-schema.js";
import { RobotApiError } from "../robot/robot-client.js";
import type { TransactionRecord } from "../robot/types.js";
import { DrizzleServerOrderRepository } from "./order-repository.js";
import { OrderService } from "./order-service.js";
import { TransactionCache } from "./transaction-cache.js";
import type { ServerOrderSpec } from "./types.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const TX_ID = "B20240101-1234567-123456";

const inProcess: TransactionRecord = {
  id: TX_ID,
  date: "2024-01-01T10:00:00+01:00",
  status: "in process",
  serverNumber: null,
  serverIP: null,
  productId: "EX44",
};

const ready: TransactionRecord = { ...inProcess, status: "ready", serverNumber: 123456, serverIP: "192.168.1.100" };

const spec: ServerOrderSpec = {
  key: "orders.db-1",
  market: false,
  productId: "EX44",
  location: "FSN1",
  password: "test-secret",
  authorizedKeys: ["aa:bb"],
  addons: ["primary_ipv4"],
  test: false,
};

describe("OrderService", () => {
  let robot: {
    orderServer: ReturnType<typeof vi.fn>;
    orderMarketServer: ReturnType<typeof vi.fn>;
    getOrderTransaction: ReturnType<typeof vi.fn>;
    getMarketOrderTransaction: ReturnType<typeof vi.fn>;
  };
  let repo: DrizzleServerOrderRepository;
  let service: OrderService;

  beforeEach(() => {
    robot = {
      orderServer: vi.fn(async () => inProcess),
      orderMarketServer: vi.fn(async () => ({ ...inProcess, id: "B-market-1", productId: "1234567" })),
      getOrderTransaction: vi.fn(async () => ready),
      getMarketOrderTransaction: vi.fn(async () => ({ ...ready, id: "B-market-1" })),
    };
    const sqlite = new Database(":memory:");
    initProvisionerSchema(sqlite);
    repo = new DrizzleServerOrderRepository(createDb(sqlite));
    service = new OrderService(robot, new TransactionCache({ filePath: null }), repo);
  });

  function apiCalls(): number {
    return [robot.orderServer, robot.orderMarketServer, robot.getOrderTransaction, robot.getMarketOrderTransaction]
      .map((fn) => fn.mock.calls.length)
      .reduce((a, b) => a + b, 0);
  }

  it("places a standard order and persists it without the password", async () => {
    const state = await service.order(spec);

    expect(robot.orderServer).toHaveBeenCalledWith({
      productId: "EX44",
      location: "FSN1",
      dist: undefined,
      password: "test-secret",
      authorizedKeys: ["aa:bb"],
      addons: ["primary_ipv4"],
      test: false,
    });
    expect(state).toEqual({
      key: "orders.db-1",
      market: false,
      productId: "EX44",
      location: "FSN1",
      authorizedKeys: ["aa:bb"],
      addons: ["primary_ipv4"],
      test: false,
      transactionId: TX_ID,
      status: "in process",
      serverNumber: null,
      serverIP: null,
    });
    expect(repo.getByKey("orders.db-1")).toEqual({ ...state, dist: undefined });
  });

  it("makes exactly two API calls across create and two reads", async () => {
    await service.order(spec);

    const first = await service.refresh("orders.db-1");
    expect(first?.status).toBe("ready");
    expect(first?.serverNumber).toBe(123456);
    expect(first?.serverIP).toBe("192.168.1.100");

    const second = await service.refresh("orders.db-1");
    expect(second?.status).toBe("ready");
    expect(second?.serverNumber).toBe(123456);

    expect(apiCalls()).toBe(2);
    expect(robot.getOrderTransaction).toHaveBeenCalledTimes(1);
  });

  it("keeps re-fetching while the order is in process", async () => {
    robot.getOrderTransaction.mockResolvedValue(inProcess);
    await service.order(spec);
    await service.refresh("orders.db-1");
    await service.refresh("orders.db-1");
    expect(robot.getOrderTransaction).toHaveBeenCalledTimes(2);
  });

  it("drops an order the API no longer knows", async () => {
    await service.order(spec);
    robot.getOrderTransaction.mockRejectedValueOnce(new RobotApiError(404, "NOT_FOUND", "transaction not found"));

    expect(await service.refresh("orders.db-1")).toBeNull();
    expect(repo.getByKey("orders.db-1")).toBeNull();
  });

  it("propagates other API failures and keeps state", async () => {
    await service.order(spec);
    robot.getOrderTransaction.mockRejectedValueOnce(new RobotApiError(503, "UNAVAILABLE", "maintenance"));

    await expect(service.refresh("orders.db-1")).rejects.toThrow("Robot API error 503 UNAVAILABLE: maintenance");
    expect(repo.getByKey("orders.db-1")?.status).toBe("in process");
  });

  it("returns null when refreshing an unknown key", async () => {
    expect(await service.refresh("orders.nope")).toBeNull();
    expect(apiCalls()).toBe(0);
  });

  it("routes market orders to the market endpoints", async () => {
    await service.order({ ...spec, key: "orders.auction", market: true, productId: "1234567", location: undefined });

    expect(robot.orderMarketServer).toHaveBeenCalledWith(expect.objectContaining({ productId: 1234567 }));
    await service.refresh("orders.auction");
    expect(robot.getMarketOrderTransaction).toHaveBeenCalledWith("B-market-1");
    expect(robot.getOrderTransaction).not.toHaveBeenCalled();
  });

  it("rejects a non-numeric market product id before calling the API", async () => {
    await expect(service.order({ ...spec, market: true })).rejects.toMatchObject({ kind: "invalid_configuration" });
    expect(apiCalls()).toBe(0);
  });

  it("forget only removes state", async () => {
    await service.order(spec);
    service.forget("orders.db-1");
    expect(service.list()).toEqual([]);
    expect(apiCalls()).toBe(1);
  });
});
