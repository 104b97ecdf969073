import crypto from "node:crypto";

import { type BeforeApplicationShutdown, Inject, Injectable, type OnApplicationBootstrap } from "@nestjs/common";
import type { AppConfig, BotState, Decision, DecisionKind, OrderSide } from "@volume-bot/shared";
import { defaultBotState } from "@volume-bot/shared";
import type { Logger } from "pino";

import { ConfigService } from "../config/config.service";
import { EXCHANGE_CLIENT, type ExchangeClient } from "../integrations/exchange-client";
import { errorMessage } from "../integrations/exchange-errors";
import { MarketDataService } from "../integrations/market-data.service";
import { LOGGER } from "../logging/pino-logger";
import { OrderTracker } from "../volume/order-tracker";
import { type StrategyStats, type TradeAnalysis, VolumeStrategy } from "../volume/volume-strategy";

const MAX_DECISIONS = 200;

type RunTotals = {
  orders: number;
  failedOrders: number;
  volumeUsdt: number;
  lastOrderAt?: string;
};

export type BotRunStatsResponse = {
  generatedAt: string;
  pair: string;
  dryRun: boolean;
  running: boolean;
  phase: BotState["phase"];
  startedAt?: string;
  runtimeSeconds: number;
  totals: RunTotals & { volumePerHourUsdt: number };
  strategy: StrategyStats;
  lastOrderSide: OrderSide | null;
  openOrders: number;
  decisionsByKind: Record<string, number>;
};

export type StartOptions = {
  durationHours?: number;
};

function emptyTotals(): RunTotals {
  return { orders: 0, failedOrders: 0, volumeUsdt: 0 };
}

function formatAmount(value: number): string {
  return Number.parseFloat(value.toFixed(8)).toString();
}

@Injectable()
export class BotEngineService implements OnApplicationBootstrap, BeforeApplicationShutdown {
  private readonly config: AppConfig;
  private readonly pair: string;
  private readonly tracker: OrderTracker;
  private readonly strategy: VolumeStrategy;

  private state: BotState = defaultBotState();
  private decisions: Decision[] = [];
  private totals: RunTotals = emptyTotals();
  private stoppedAtMs: number | null = null;
  private endsAtMs: number | null = null;
  private lastCleanupAtMs = 0;

  private loopTimer: NodeJS.Timeout | null = null;
  private currentTick: Promise<void> | null = null;
  // Ticks and manual order operations run one after another on this chain.
  private pipeline: Promise<void> = Promise.resolve();
  private stopping: Promise<void> | null = null;

  constructor(
    configService: ConfigService,
    private readonly marketData: MarketDataService,
    @Inject(EXCHANGE_CLIENT) private readonly exchange: ExchangeClient,
    @Inject(LOGGER) private readonly logger: Logger
  ) {
    this.config = configService.load();
    this.pair = configService.tradingPair;
    this.tracker = new OrderTracker({ exchange, pair: this.pair, logger });
    this.strategy = new VolumeStrategy({ settings: this.config.strategy, tracker: this.tracker, logger });
  }

  onApplicationBootstrap(): void {
    if (this.config.runtime.autoStart) {
      this.start();
    }
  }

  async beforeApplicationShutdown(signal?: string): Promise<void> {
    await this.stop(signal ? `Shutdown requested (${signal})` : "Shutdown requested");
    // A cancel that failed during an earlier stop leaves orders tracked.
    if (this.tracker.openCount() > 0) {
      await this.cancelAllOpen();
    }
    try {
      await this.exchange.close();
    } catch (err) {
      this.logger.warn({ msg: "Error closing exchange connection", error: errorMessage(err) });
    }
  }

  getState(): BotState {
    return this.state;
  }

  getDecisions(): Decision[] {
    return this.decisions;
  }

  openOrderIds(): string[] {
    return this.tracker.openOrderIds();
  }

  getRunStats(): BotRunStatsResponse {
    const now = Date.now();
    const startedAtMs = this.state.startedAt ? Date.parse(this.state.startedAt) : null;
    const runtimeSeconds = startedAtMs === null ? 0 : Math.max(0, ((this.stoppedAtMs ?? now) - startedAtMs) / 1000);
    const runtimeHours = runtimeSeconds / 3600;

    const decisionsByKind: Record<string, number> = {};
    for (const decision of this.decisions) {
      decisionsByKind[decision.kind] = (decisionsByKind[decision.kind] ?? 0) + 1;
    }

    return {
      generatedAt: new Date(now).toISOString(),
      pair: this.pair,
      dryRun: this.config.runtime.dryRun,
      running: this.state.running,
      phase: this.state.phase,
      startedAt: this.state.startedAt,
      runtimeSeconds,
      totals: {
        ...this.totals,
        volumePerHourUsdt: runtimeHours > 0 ? this.totals.volumeUsdt / runtimeHours : 0
      },
      strategy: this.strategy.stats,
      lastOrderSide: this.strategy.lastOrderSide,
      openOrders: this.strategy.openOrderCount(),
      decisionsByKind
    };
  }

  start(options: StartOptions = {}): void {
    if (this.state.running) return;

    const { runtime } = this.config;
    const durationHours = options.durationHours ?? runtime.runDurationHours;
    const now = Date.now();

    this.totals = emptyTotals();
    this.stoppedAtMs = null;
    this.lastCleanupAtMs = now;
    this.endsAtMs = durationHours ? now + durationHours * 3_600_000 : null;
    this.state = {
      running: true,
      phase: "TRADING",
      startedAt: new Date(now).toISOString(),
      ...(this.endsAtMs === null ? {} : { endsAt: new Date(this.endsAtMs).toISOString() })
    };

    this.addDecision("ENGINE", durationHours ? `Started for ${durationHours}h on ${this.pair}` : `Started on ${this.pair}`, {
      dryRun: runtime.dryRun,
      exchange: this.exchange.id
    });
    this.logger.info({
      msg: "Volume bot started",
      pair: this.pair,
      dryRun: runtime.dryRun,
      durationHours: durationHours ?? null
    });

    this.loopTimer = setInterval(() => {
      this.onTimer().catch((err: unknown) => {
        this.logger.error({ msg: "Run loop failure", error: errorMessage(err) });
      });
    }, runtime.checkIntervalSeconds * 1000);

    void this.tick();
  }

  /**
   * Stops the loop, waits for an in-flight tick, then cancels every tracked
   * order. Concurrent callers share the same shutdown.
   */
  stop(reason = "Stop requested"): Promise<void> {
    if (this.stopping) return this.stopping;
    if (!this.state.running) return Promise.resolve();

    this.stopping = this.performStop(reason).finally(() => {
      this.stopping = null;
    });
    return this.stopping;
  }

  tick(): Promise<void> {
    if (this.currentTick) return this.currentTick;
    this.currentTick = this.serialize(() => this.runTick()).finally(() => {
      this.currentTick = null;
    });
    return this.currentTick;
  }

  cancelAllOpen(): Promise<number> {
    return this.serialize(async () => {
      const cancelled = await this.strategy.cancelAllOpen();
      this.addDecision("CLEANUP", `Cancelled ${cancelled} open orders`, { cancelled, remaining: this.tracker.openCount() });
      return cancelled;
    });
  }

  reconcileOpen(): Promise<number> {
    return this.serialize(() => this.reconcileTracked());
  }

  addDecision(kind: DecisionKind, summary: string, details?: Decision["details"]): void {
    const decision: Decision = {
      id: crypto.randomUUID(),
      ts: new Date().toISOString(),
      kind,
      summary,
      ...(details ? { details } : {})
    };
    this.decisions = [decision, ...this.decisions].slice(0, MAX_DECISIONS);
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pipeline.then(task);
    // Failures reach the caller through `run`; the chain itself keeps going.
    this.pipeline = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async reconcileTracked(): Promise<number> {
    const removed = await this.strategy.reconcileOpen();
    if (removed > 0) {
      this.addDecision("CLEANUP", `Removed ${removed} completed orders`, { removed, remaining: this.tracker.openCount() });
    }
    return removed;
  }

  private async onTimer(): Promise<void> {
    if (this.endsAtMs !== null && Date.now() >= this.endsAtMs) {
      await this.stop("Run duration reached");
      return;
    }
    await this.tick();
  }

  private async performStop(reason: string): Promise<void> {
    this.state = { ...this.state, phase: "STOPPING" };
    this.addDecision("ENGINE", reason);
    this.logger.info({ msg: "Stopping volume bot", reason });

    if (this.loopTimer) clearInterval(this.loopTimer);
    this.loopTimer = null;

    const cancelled = await this.serialize(() => this.strategy.cancelAllOpen());
    this.addDecision("CLEANUP", `Final cleanup cancelled ${cancelled} open orders`, {
      cancelled,
      remaining: this.tracker.openCount()
    });

    this.stoppedAtMs = Date.now();
    this.state = { ...this.state, running: false, phase: "STOPPED", pausedUntil: undefined };
    this.logStatistics();
  }

  private pause(seconds: number): void {
    this.state = { ...this.state, pausedUntil: new Date(Date.now() + seconds * 1000).toISOString() };
  }

  private async runTick(): Promise<void> {
    if (!this.state.running || this.state.phase !== "TRADING") return;

    const now = Date.now();
    if (this.state.pausedUntil) {
      if (Date.parse(this.state.pausedUntil) > now) return;
      this.state = { ...this.state, pausedUntil: undefined };
    }

    const { runtime } = this.config;
    try {
      if (now - this.lastCleanupAtMs >= runtime.cleanupIntervalSeconds * 1000) {
        this.lastCleanupAtMs = now;
        await this.reconcileTracked();
      }

      const snapshot = await this.marketData.getSnapshot(this.pair);
      if (!snapshot) {
        this.logger.warn({ msg: "Failed to get market data", pair: this.pair });
        return;
      }

      const baseAsset = this.config.exchange.baseAsset.toUpperCase();
      const balance = await this.marketData.getAvailableBalance(baseAsset);
      if (balance <= 0) {
        this.logger.warn({ msg: "Insufficient balance", asset: baseAsset, balance });
        this.addDecision("SKIP", `No ${baseAsset} balance available`, { balance });
        this.pause(runtime.balanceWarningWaitSeconds);
        return;
      }

      const decision = await this.strategy.decide(snapshot, balance);
      switch (decision.kind) {
        case "waiting":
          return;
        case "error":
          this.addDecision("ERROR", `Decision failed: ${decision.error}`);
          return;
        case "trade":
          if (!decision.shouldPlace) {
            this.logger.debug({ msg: "Decision: skip", confidence: decision.confidence, spread: decision.analysis.spread });
            this.addDecision("SKIP", decision.analysis.spreadOk ? "Confidence too low" : "Spread too wide", {
              confidence: decision.confidence,
              spread: decision.analysis.spread
            });
            return;
          }
          await this.placeOrder(decision.analysis, decision.confidence, balance);
          return;
      }
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error({ msg: "Error in main loop", error });
      this.state = { ...this.state, lastError: error };
      this.addDecision("ERROR", `Tick failed: ${error}`);
      this.pause(runtime.errorRetryWaitSeconds);
    }
  }

  private async placeOrder(analysis: TradeAnalysis, confidence: number, balance: number): Promise<void> {
    const { runtime, strategy } = this.config;
    const { currentPrice, side } = analysis;
    const baseAsset = this.config.exchange.baseAsset.toUpperCase();

    const maxBalanceSize = balance * runtime.maxBalanceUsageRatio;
    const minViableSize = strategy.minOrderValueUsdt / currentPrice;
    if (maxBalanceSize < minViableSize) {
      this.logger.warn({
        msg: "Balance too small for minimum order value",
        asset: baseAsset,
        balance,
        maxBalanceSize,
        minViableSize
      });
      this.addDecision("SKIP", `${baseAsset} balance too small for a ${strategy.minOrderValueUsdt} USDT order`, {
        balance,
        maxBalanceSize,
        minViableSize
      });
      this.pause(runtime.balanceWarningWaitSeconds);
      return;
    }

    const size = Math.min(Math.max(analysis.size, minViableSize), maxBalanceSize);
    const result = await this.tracker.place(side, size, currentPrice, runtime.dryRun);
    if (!result.ok) {
      this.totals = { ...this.totals, failedOrders: this.totals.failedOrders + 1 };
      this.state = { ...this.state, lastError: result.error };
      this.addDecision("ERROR", `Order failed: ${result.error}`, { side, size, price: currentPrice });
      return;
    }

    const valueUsdt = size * currentPrice;
    const placedAt = new Date().toISOString();
    this.totals = {
      ...this.totals,
      orders: this.totals.orders + 1,
      volumeUsdt: this.totals.volumeUsdt + valueUsdt,
      lastOrderAt: placedAt
    };

    const prefix = runtime.dryRun ? "[DRY RUN] " : "";
    this.addDecision("TRADE", `${prefix}${side.toUpperCase()} ${formatAmount(size)} ${this.pair} @ ${currentPrice}`, {
      orderId: result.order.id,
      side,
      size,
      price: currentPrice,
      valueUsdt,
      targetPrice: analysis.targetPrice,
      confidence
    });
  }

  private logStatistics(): void {
    const stats = this.getRunStats();
    this.logger.info({
      msg: "Volume bot statistics",
      runtimeHours: Number((stats.runtimeSeconds / 3600).toFixed(2)),
      totalOrders: stats.totals.orders,
      failedOrders: stats.totals.failedOrders,
      totalVolumeUsdt: Number(stats.totals.volumeUsdt.toFixed(2)),
      volumePerHourUsdt: Number(stats.totals.volumePerHourUsdt.toFixed(2)),
      lastOrderAt: stats.totals.lastOrderAt ?? null,
      dryRun: stats.dryRun
    });
  }
}
