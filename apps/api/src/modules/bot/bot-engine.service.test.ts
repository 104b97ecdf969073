import pino from "pino";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { ConfigService } from "../config/config.service";
import { parseAppConfig } from "../config/config.service";
import type { ExchangeClient, MarketSnapshot } from "../integrations/exchange-client";
import type { MarketDataService } from "../integrations/market-data.service";
import { BotEngineService } from "./bot-engine.service";

const logger = pino({ level: "silent" });

const START = Date.UTC(2024, 0, 1);

const liveEnv = { DRY_RUN: "false", EXCHANGE_API_KEY: "test-key", EXCHANGE_API_SECRET: "test-secret" };

function snapshotAt(lastPrice: number): MarketSnapshot {
  return {
    pair: "ETH/USDT",
    ticker: { lastPrice },
    orderbook: { bids: [[lastPrice * 0.999, 100]], asks: [[lastPrice * 1.001, 100]] },
    trades: [],
    candles: [],
    timestamp: START
  };
}

function createExchange(overrides: Partial<ExchangeClient> = {}): ExchangeClient {
  return {
    id: "binance",
    ping: vi.fn(async () => undefined),
    fetchTicker: vi.fn(async () => ({ lastPrice: 100 })),
    fetchOrderBook: vi.fn(async () => ({ bids: [], asks: [] })),
    fetchTrades: vi.fn(async () => []),
    fetchCandles: vi.fn(async () => []),
    fetchBalance: vi.fn(async () => 0),
    createLimitOrder: vi.fn(async (pair: string, side: "buy" | "sell", amount: number, price: number) => ({
      id: "ord-1",
      pair,
      side,
      amount,
      price,
      status: "open" as const,
      dryRun: false
    })),
    createMarketOrder: vi.fn(async () => {
      throw new Error("not used");
    }),
    cancelOrder: vi.fn(async () => undefined),
    fetchOrderStatus: vi.fn(async () => "open"),
    close: vi.fn(async () => undefined),
    ...overrides
  };
}

function createEngine(params: {
  env?: Record<string, string>;
  snapshot?: MarketSnapshot | null;
  balance?: number;
  exchange?: Partial<ExchangeClient>;
}) {
  const config = parseAppConfig(params.env ?? {});
  const configService = { load: () => config, tradingPair: "ETH/USDT" };
  const snapshot = params.snapshot === undefined ? snapshotAt(100) : params.snapshot;
  const marketData = {
    getSnapshot: vi.fn(async () => snapshot),
    getAvailableBalance: vi.fn(async () => params.balance ?? 1)
  };
  const exchange = createExchange(params.exchange);

  const engine = new BotEngineService(
    configService as unknown as ConfigService,
    marketData as unknown as MarketDataService,
    exchange,
    logger
  );
  return { engine, exchange, marketData };
}

async function startAndTick(engine: BotEngineService): Promise<void> {
  engine.start();
  await engine.tick();
}

describe("BotEngineService", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("caps the order at the balance usage ratio and places a limit order at the current price", async () => {
    const { engine, exchange } = createEngine({ env: liveEnv, balance: 1 });

    await startAndTick(engine);

    expect(exchange.createLimitOrder).toHaveBeenCalledTimes(1);
    expect(exchange.createLimitOrder).toHaveBeenCalledWith("ETH/USDT", expect.stringMatching(/^(buy|sell)$/), 0.05, 100);
    expect(engine.openOrderIds()).toEqual(["ord-1"]);

    const [latest] = engine.getDecisions();
    expect(latest?.kind).toBe("TRADE");
    expect(latest?.summary).toMatch(/^(BUY|SELL) 0\.05 ETH\/USDT @ 100$/);

    const stats = engine.getRunStats();
    expect(stats.totals.orders).toBe(1);
    expect(stats.totals.volumeUsdt).toBeCloseTo(5, 10);
    expect(stats.totals.lastOrderAt).toBe("2024-01-01T00:00:00.000Z");
    await engine.stop();
  });

  it("skips and pauses when the usable balance cannot cover the minimum order", async () => {
    const { engine, exchange } = createEngine({ env: liveEnv, balance: 0.4 });

    await startAndTick(engine);

    expect(exchange.createLimitOrder).not.toHaveBeenCalled();
    expect(engine.getDecisions()[0]?.kind).toBe("SKIP");
    expect(engine.getDecisions()[0]?.summary).toBe("ETH balance too small for a 5 USDT order");
    expect(engine.getState().pausedUntil).toBe("2024-01-01T00:00:30.000Z");
    await engine.stop();
  });

  it("pauses on an empty balance and resumes after the warning wait", async () => {
    const { engine, marketData } = createEngine({ balance: 0 });

    await startAndTick(engine);
    expect(engine.getDecisions()[0]?.summary).toBe("No ETH balance available");
    expect(engine.getState().pausedUntil).toBe("2024-01-01T00:00:30.000Z");

    vi.setSystemTime(START + 10_000);
    await engine.tick();
    expect(marketData.getSnapshot).toHaveBeenCalledTimes(1);

    vi.setSystemTime(START + 30_000);
    await engine.tick();
    expect(marketData.getSnapshot).toHaveBeenCalledTimes(2);
    await engine.stop();
  });

  it("waits quietly when there is no market data", async () => {
    const { engine, marketData } = createEngine({ snapshot: null });

    await startAndTick(engine);

    expect(marketData.getAvailableBalance).not.toHaveBeenCalled();
    expect(engine.getDecisions().map((d) => d.kind)).toEqual(["ENGINE"]);
    await engine.stop();
  });

  it("records decision errors", async () => {
    const { engine } = createEngine({ snapshot: snapshotAt(0) });

    await startAndTick(engine);

    expect(engine.getDecisions()[0]?.summary).toBe("Decision failed: invalid_price");
    await engine.stop();
  });

  it("simulates orders in dry-run without touching the exchange", async () => {
    const { engine, exchange } = createEngine({ balance: 1 });

    await startAndTick(engine);

    expect(exchange.createLimitOrder).not.toHaveBeenCalled();
    expect(engine.getDecisions()[0]?.summary.startsWith("[DRY RUN] ")).toBe(true);
    expect(engine.getRunStats().openOrders).toBe(0);
    await engine.stop();
  });

  it("records a failed placement and keeps running", async () => {
    const { engine } = createEngine({
      env: liveEnv,
      exchange: {
        createLimitOrder: vi.fn(async () => {
          throw new Error("Account has insufficient balance");
        })
      }
    });

    await startAndTick(engine);

    expect(engine.getDecisions()[0]?.summary).toBe("Order failed: Account has insufficient balance");
    expect(engine.getState()).toMatchObject({ running: true, lastError: "Account has insufficient balance" });
    expect(engine.getRunStats().totals.failedOrders).toBe(1);
    await engine.stop();
  });

  it("cancels every tracked order on stop and reports the final cleanup", async () => {
    const { engine, exchange } = createEngine({ env: liveEnv });

    await startAndTick(engine);
    await engine.stop();

    expect(exchange.cancelOrder).toHaveBeenCalledWith("ord-1", "ETH/USDT");
    expect(engine.openOrderIds()).toEqual([]);
    expect(engine.getState()).toMatchObject({ running: false, phase: "STOPPED" });
    expect(engine.getDecisions()[0]?.summary).toBe("Final cleanup cancelled 1 open orders");
    expect(engine.getDecisions()[1]?.summary).toBe("Stop requested");
  });

  it("retries the cancel of orders left tracked by an earlier stop before closing the exchange", async () => {
    const cancelOrder = vi
      .fn<ExchangeClient["cancelOrder"]>()
      .mockRejectedValueOnce(new Error("ECONNRESET"))
      .mockResolvedValue(undefined);
    const { engine, exchange } = createEngine({ env: liveEnv, exchange: { cancelOrder } });

    await startAndTick(engine);
    await engine.stop();
    expect(engine.openOrderIds()).toEqual(["ord-1"]);

    await engine.beforeApplicationShutdown("SIGTERM");

    expect(cancelOrder).toHaveBeenCalledTimes(2);
    expect(engine.openOrderIds()).toEqual([]);
    expect(engine.getDecisions()[0]?.summary).toBe("Cancelled 1 open orders");
    expect(exchange.close).toHaveBeenCalledTimes(1);
  });

  it("runs manual order cleanup after the in-flight tick", async () => {
    let releaseSnapshot: (snapshot: MarketSnapshot) => void = () => undefined;
    const { engine, exchange, marketData } = createEngine({ env: liveEnv });
    marketData.getSnapshot.mockImplementationOnce(
      () =>
        new Promise<MarketSnapshot>((resolve) => {
          releaseSnapshot = resolve;
        })
    );

    engine.start();
    const cancelled = engine.cancelAllOpen();
    await vi.advanceTimersByTimeAsync(0);
    expect(exchange.createLimitOrder).not.toHaveBeenCalled();

    releaseSnapshot(snapshotAt(100));

    expect(await cancelled).toBe(1);
    expect(exchange.createLimitOrder).toHaveBeenCalledTimes(1);
    expect(exchange.cancelOrder).toHaveBeenCalledWith("ord-1", "ETH/USDT");
    expect(engine.openOrderIds()).toEqual([]);
    await engine.stop();
  });

  it("shares one shutdown between concurrent stop calls", async () => {
    const { engine } = createEngine({});

    await startAndTick(engine);
    await Promise.all([engine.stop(), engine.stop()]);
    await engine.stop();

    expect(engine.getDecisions().filter((d) => d.summary === "Stop requested")).toHaveLength(1);
  });

  it("stops by itself once the run duration has elapsed", async () => {
    const { engine } = createEngine({ env: { CHECK_INTERVAL_SECONDS: "600" } });

    engine.start({ durationHours: 1 });
    expect(engine.getState().endsAt).toBe("2024-01-01T01:00:00.000Z");

    await vi.advanceTimersByTimeAsync(3_601_000);
    await engine.stop();

    expect(engine.getState().running).toBe(false);
    expect(engine.getDecisions().some((d) => d.summary === "Run duration reached")).toBe(true);
  });

  it("reports volume per hour over the run time", async () => {
    const { engine } = createEngine({ env: { CHECK_INTERVAL_SECONDS: "3600" }, balance: 1 });

    await startAndTick(engine);
    vi.setSystemTime(START + 1_800_000);

    const stats = engine.getRunStats();
    expect(stats.runtimeSeconds).toBe(1800);
    expect(stats.totals.volumePerHourUsdt).toBeCloseTo(10, 8);
    expect(stats.decisionsByKind).toEqual({ ENGINE: 1, TRADE: 1 });
    await engine.stop();
  });

  it("auto-starts on bootstrap only when enabled", async () => {
    const auto = createEngine({ snapshot: null }).engine;
    const manual = createEngine({ env: { AUTO_START: "false" } }).engine;

    auto.onApplicationBootstrap();
    manual.onApplicationBootstrap();

    expect(auto.getState().running).toBe(true);
    expect(manual.getState().running).toBe(false);
    await auto.stop();
  });

  it("stops and closes the exchange on application shutdown", async () => {
    const { engine, exchange } = createEngine({ snapshot: null });

    engine.start();
    await engine.beforeApplicationShutdown("SIGINT");

    expect(engine.getState().phase).toBe("STOPPED");
    expect(engine.getDecisions().some((d) => d.summary === "Shutdown requested (SIGINT)")).toBe(true);
    expect(exchange.close).toHaveBeenCalledTimes(1);
  });
});
