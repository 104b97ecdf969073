import type { OrderSide, PriceWalkDirection } from "@volume-bot/shared";
import type { Logger } from "pino";

import { errorMessage } from "../integrations/exchange-errors";
import { type RandomSource, uniform } from "./random-source";
import {
  BASE_PRICE_STEP_RATIO,
  ORDER_SIDE_ALTERNATE_PROBABILITY,
  PRICE_ADJUSTMENT_PROBABILITY,
  PRICE_RANDOMIZATION_FACTOR
} from "./volume-constants";

export type PriceWalkOptions = {
  direction: PriceWalkDirection;
  maxPriceDeviation: number;
  random: RandomSource;
  logger: Logger;
};

/**
 * Synthetic target-price generator. Keeps the oscillation phase used by the
 * sideways walk and the last side chosen, so consecutive cycles stay correlated.
 */
export class PriceWalk {
  private phase = 0;
  private lastSide: OrderSide | null = null;

  constructor(private readonly options: PriceWalkOptions) {}

  get walkPhase(): number {
    return this.phase;
  }

  get lastOrderSide(): OrderSide | null {
    return this.lastSide;
  }

  nextTarget(currentPrice: number): number {
    try {
      const { random, direction, maxPriceDeviation } = this.options;
      const baseStep = currentPrice * BASE_PRICE_STEP_RATIO;
      const noise = baseStep * uniform(random, -PRICE_RANDOMIZATION_FACTOR, PRICE_RANDOMIZATION_FACTOR);

      let target: number;
      switch (direction) {
        case "up":
          target = currentPrice + baseStep * (1 + uniform(random, 0, 1)) + noise;
          break;
        case "down":
          target = currentPrice - baseStep * (1 + uniform(random, 0, 1)) + noise;
          break;
        case "sideways":
          this.phase += uniform(random, 0.1, 0.3);
          target = currentPrice + baseStep * 2 * Math.sin(this.phase) + noise;
          break;
        case "random": {
          const sign = random.next() < 0.5 ? -1 : 1;
          target = currentPrice + baseStep * uniform(random, 0.5, 2.0) * sign + noise;
          break;
        }
      }

      const maxPrice = currentPrice * (1 + maxPriceDeviation);
      const minPrice = currentPrice * (1 - maxPriceDeviation);
      const clamped = Math.min(Math.max(target, minPrice), maxPrice);
      if (!Number.isFinite(clamped)) {
        throw new Error(`Non-finite price target for current price ${currentPrice}`);
      }
      return clamped;
    } catch (err) {
      this.options.logger.error({ msg: "Error calculating price target", error: errorMessage(err) });
      return currentPrice;
    }
  }

  nextSide(currentPrice: number, targetPrice: number): OrderSide {
    const { random } = this.options;

    let side: OrderSide;
    if (this.lastSide === null) {
      side = random.next() < 0.5 ? "buy" : "sell";
    } else if (random.next() < ORDER_SIDE_ALTERNATE_PROBABILITY) {
      side = this.lastSide === "buy" ? "sell" : "buy";
    } else {
      side = this.lastSide;
    }

    // Soft nudge toward the side that moves price to the target.
    if (targetPrice > currentPrice && side === "sell") {
      if (random.next() < PRICE_ADJUSTMENT_PROBABILITY) side = "buy";
    } else if (targetPrice < currentPrice && side === "buy") {
      if (random.next() < PRICE_ADJUSTMENT_PROBABILITY) side = "sell";
    }

    this.lastSide = side;
    return side;
  }
}
