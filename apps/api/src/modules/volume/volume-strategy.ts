import type { OrderSide, StrategySettings } from "@volume-bot/shared";
import type { Logger } from "pino";

import type { MarketSnapshot, OrderBook } from "../integrations/exchange-client";
import { errorMessage } from "../integrations/exchange-errors";
import { calculateSpread, getAvailableLiquidity } from "./liquidity";
import type { OrderTracker } from "./order-tracker";
import { PriceWalk } from "./price-walk";
import { mathRandomSource, type RandomSource, uniform } from "./random-source";
import { TimingScheduler } from "./timing-scheduler";
import {
  BASE_CONFIDENCE_SPREAD_OK,
  BASE_CONFIDENCE_SPREAD_WIDE,
  BEHIND_TARGET_CONFIDENCE_BOOST,
  BEHIND_TARGET_RATIO,
  FALLBACK_MIN_ORDER_UNITS,
  LIQUIDITY_USAGE_RATIO,
  MIN_PLACE_CONFIDENCE
} from "./volume-constants";

export type TradeAnalysis = {
  currentPrice: number;
  targetPrice: number;
  side: OrderSide;
  size: number;
  orderValueUsdt: number;
  spread: number;
  spreadOk: boolean;
  volumeRateUsdt: number;
  behindTarget: boolean;
};

export type DecisionError = "no_market_data" | "invalid_price" | (string & {});

export type TradeDecision =
  | { kind: "trade"; shouldPlace: boolean; confidence: number; analysis: TradeAnalysis }
  | { kind: "waiting"; shouldPlace: false; confidence: 0; waitingForTiming: true }
  | { kind: "error"; shouldPlace: false; confidence: 0; error: DecisionError };

export type StrategyStats = {
  lastOrderTime: number | null;
  volumeGeneratedUsdt: number;
  orderCount: number;
};

export type VolumeStrategyOptions = {
  settings: StrategySettings;
  tracker: OrderTracker;
  logger: Logger;
  random?: RandomSource;
  clock?: () => number;
};

function rejected(error: DecisionError): TradeDecision {
  return { kind: "error", shouldPlace: false, confidence: 0, error };
}

// Local wall-clock hour plus one, so the first hour of the day divides by 1.
function hoursElapsedToday(now: number): number {
  return new Date(now).getHours() + 1;
}

/**
 * Volume generation decision engine. `decide` is the only entry point that
 * mutates the running stats, and only when it chooses to place.
 */
export class VolumeStrategy {
  private readonly settings: StrategySettings;
  private readonly tracker: OrderTracker;
  private readonly logger: Logger;
  private readonly random: RandomSource;
  private readonly clock: () => number;
  private readonly priceWalk: PriceWalk;
  private readonly timing: TimingScheduler;

  private lastOrderTime: number | null = null;
  private volumeGeneratedUsdt = 0;
  private orderCount = 0;

  constructor(options: VolumeStrategyOptions) {
    this.settings = options.settings;
    this.tracker = options.tracker;
    this.logger = options.logger;
    this.random = options.random ?? mathRandomSource;
    this.clock = options.clock ?? Date.now;
    this.priceWalk = new PriceWalk({
      direction: this.settings.priceWalkDirection,
      maxPriceDeviation: this.settings.maxPriceDeviation,
      random: this.random,
      logger: this.logger
    });
    this.timing = new TimingScheduler(this.settings, this.random);

    this.logger.info({
      msg: "Volume strategy initialized",
      targetVolumeUsdtPerHour: this.settings.targetVolumeUsdtPerHour,
      direction: this.settings.priceWalkDirection,
      cancelPreviousOrders: this.settings.cancelPreviousOrders
    });
  }

  get stats(): StrategyStats {
    return {
      lastOrderTime: this.lastOrderTime,
      volumeGeneratedUsdt: this.volumeGeneratedUsdt,
      orderCount: this.orderCount
    };
  }

  get lastOrderSide(): OrderSide | null {
    return this.priceWalk.lastOrderSide;
  }

  openOrderCount(): number {
    return this.tracker.openCount();
  }

  async cancelAllOpen(): Promise<number> {
    return await this.tracker.cancelAll();
  }

  async reconcileOpen(): Promise<number> {
    return await this.tracker.reconcile();
  }

  calculateOrderSize(availableBalance: number, orderbook: OrderBook | null | undefined, currentPrice: number): number {
    const { minOrderRatio, maxOrderRatio, sizeRandomization, minOrderValueUsdt } = this.settings;

    const ratio = uniform(this.random, minOrderRatio, maxOrderRatio);
    const baseSize = availableBalance * ratio;
    let size = baseSize * (1 + uniform(this.random, -sizeRandomization, sizeRandomization));

    const liquidity = getAvailableLiquidity(orderbook);
    const maxLiquiditySize = Math.min(liquidity.bidVolume, liquidity.askVolume) * LIQUIDITY_USAGE_RATIO;
    if (maxLiquiditySize > 0) {
      size = Math.min(size, maxLiquiditySize);
    }

    // The notional floor wins over both the ratio and the liquidity cap.
    if (currentPrice > 0) {
      size = Math.max(size, minOrderValueUsdt / currentPrice);
    } else {
      size = Math.max(size, FALLBACK_MIN_ORDER_UNITS);
    }

    return size;
  }

  async decide(snapshot: MarketSnapshot | null | undefined, availableBalance: number): Promise<TradeDecision> {
    try {
      if (!snapshot) return rejected("no_market_data");

      const now = this.clock();
      if (!this.timing.isDue(now, this.lastOrderTime)) {
        return { kind: "waiting", shouldPlace: false, confidence: 0, waitingForTiming: true };
      }

      if (this.settings.cancelPreviousOrders) {
        try {
          await this.tracker.cancelAll();
        } catch (err) {
          this.logger.warn({ msg: "Cancel before placing failed", error: errorMessage(err) });
        }
      }

      const currentPrice = snapshot.ticker.lastPrice ?? 0;
      if (!(currentPrice > 0)) return rejected("invalid_price");

      const targetPrice = this.priceWalk.nextTarget(currentPrice);
      const side = this.priceWalk.nextSide(currentPrice, targetPrice);
      const size = this.calculateOrderSize(availableBalance, snapshot.orderbook, currentPrice);

      const spread = calculateSpread(snapshot.orderbook);
      const spreadOk = spread <= this.settings.maxSpreadThreshold;
      let confidence = spreadOk ? BASE_CONFIDENCE_SPREAD_OK : BASE_CONFIDENCE_SPREAD_WIDE;

      const volumeRateUsdt = this.volumeGeneratedUsdt / Math.max(1, hoursElapsedToday(now));
      const behindTarget = volumeRateUsdt < this.settings.targetVolumeUsdtPerHour * BEHIND_TARGET_RATIO;
      if (behindTarget) {
        confidence += BEHIND_TARGET_CONFIDENCE_BOOST;
      }

      const shouldPlace = spreadOk && confidence > MIN_PLACE_CONFIDENCE;
      const orderValueUsdt = size * currentPrice;

      if (shouldPlace) {
        this.lastOrderTime = now;
        this.orderCount += 1;
        this.volumeGeneratedUsdt += orderValueUsdt;
      }

      return {
        kind: "trade",
        shouldPlace,
        confidence,
        analysis: {
          currentPrice,
          targetPrice,
          side,
          size,
          orderValueUsdt,
          spread,
          spreadOk,
          volumeRateUsdt,
          behindTarget
        }
      };
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error({ msg: "Error in trade decision", error });
      return rejected(error);
    }
  }
}
