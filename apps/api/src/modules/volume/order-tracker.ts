import crypto from "node:crypto";

import type { OrderRecord, OrderSide } from "@volume-bot/shared";
import type { Logger } from "pino";

import type { ExchangeClient } from "../integrations/exchange-client";
import {
  classifyCancelError,
  classifyStatusQueryError,
  errorMessage,
  sanitizeExchangeErrorMessage
} from "../integrations/exchange-errors";
import { COMPLETED_ORDER_STATUSES } from "./volume-constants";

export type OrderPlacement = { ok: true; order: OrderRecord } | { ok: false; error: string };

export type OrderTrackerOptions = {
  exchange: ExchangeClient;
  pair: string;
  logger: Logger;
};

/**
 * Owns the ids of orders believed to be open on the exchange. Never forgets an
 * order that may still be live; drops ids as soon as the exchange proves them gone.
 */
export class OrderTracker {
  private readonly openIds = new Set<string>();

  constructor(private readonly options: OrderTrackerOptions) {}

  openCount(): number {
    return this.openIds.size;
  }

  openOrderIds(): string[] {
    return [...this.openIds];
  }

  async place(side: OrderSide, amount: number, price: number | undefined, dryRun: boolean): Promise<OrderPlacement> {
    const { exchange, pair, logger } = this.options;
    const orderValueUsdt = price !== undefined ? amount * price : 0;

    if (dryRun) {
      const order: OrderRecord = {
        id: `dry_run_${crypto.randomUUID()}`,
        pair,
        side,
        amount,
        ...(price !== undefined ? { price } : {}),
        status: "filled",
        dryRun: true
      };
      logger.info({ msg: "[DRY RUN] order simulated", side, amount, price, orderValueUsdt });
      return { ok: true, order };
    }

    try {
      const order =
        price !== undefined
          ? await exchange.createLimitOrder(pair, side, amount, price)
          : await exchange.createMarketOrder(pair, side, amount);

      if (order.id) {
        this.openIds.add(order.id);
        logger.info({ msg: "Tracking order", orderId: order.id });
      }

      logger.info({ msg: "Order executed", side, amount, price, orderValueUsdt });
      return { ok: true, order };
    } catch (err) {
      const error = sanitizeExchangeErrorMessage(errorMessage(err));
      logger.error({ msg: "Error executing order", side, amount, price, error });
      return { ok: false, error };
    }
  }

  /** Cancels every tracked order; returns how many were positively cancelled. */
  async cancelAll(): Promise<number> {
    if (this.openIds.size === 0) return 0;

    const { exchange, pair, logger } = this.options;
    logger.info({ msg: "Cancelling open orders", count: this.openIds.size });

    let cancelled = 0;
    for (const id of [...this.openIds]) {
      try {
        await exchange.cancelOrder(id, pair);
        this.openIds.delete(id);
        cancelled += 1;
        logger.info({ msg: "Cancelled order", orderId: id });
      } catch (err) {
        if (classifyCancelError(err) === "benign-absence") {
          this.openIds.delete(id);
          logger.info({ msg: "Order already completed", orderId: id });
        } else {
          logger.warn({ msg: "Failed to cancel order", orderId: id, error: sanitizeExchangeErrorMessage(errorMessage(err)) });
        }
      }
    }

    if (cancelled > 0) {
      logger.info({ msg: "Cancelled orders", cancelled, remaining: this.openIds.size });
    }
    return cancelled;
  }

  /** Drops tracked orders the exchange reports as completed or unknown; returns how many. */
  async reconcile(): Promise<number> {
    if (this.openIds.size === 0) return 0;

    const { exchange, pair, logger } = this.options;
    let removed = 0;
    for (const id of [...this.openIds]) {
      try {
        const status = await exchange.fetchOrderStatus(id, pair);
        if (COMPLETED_ORDER_STATUSES.has(status)) {
          this.openIds.delete(id);
          removed += 1;
          logger.info({ msg: "Order completed", orderId: id, status });
        }
      } catch (err) {
        if (classifyStatusQueryError(err) === "benign-absence") {
          this.openIds.delete(id);
          removed += 1;
          logger.info({ msg: "Order not found (likely completed)", orderId: id });
        } else {
          logger.warn({ msg: "Failed to query order status", orderId: id, error: sanitizeExchangeErrorMessage(errorMessage(err)) });
        }
      }
    }

    if (removed > 0) {
      logger.info({ msg: "Cleaned up completed orders", removed });
    }
    return removed;
  }
}
