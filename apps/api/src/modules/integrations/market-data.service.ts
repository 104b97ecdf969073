import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";

import { LOGGER } from "../logging/pino-logger";
import { CANDLE_INTERVAL, CANDLE_LIMIT, ORDER_BOOK_DEPTH, RECENT_TRADES_LIMIT } from "../volume/volume-constants";
import { EXCHANGE_CLIENT, type ExchangeClient, type MarketSnapshot } from "./exchange-client";
import { errorMessage, sanitizeExchangeErrorMessage } from "./exchange-errors";

@Injectable()
export class MarketDataService {
  constructor(
    @Inject(EXCHANGE_CLIENT) private readonly exchange: ExchangeClient,
    @Inject(LOGGER) private readonly logger: Logger
  ) {}

  /** Ticker, order book, recent trades and 5m candles for `pair`; null when any fetch fails. */
  async getSnapshot(pair: string): Promise<MarketSnapshot | null> {
    try {
      const [ticker, orderbook, trades, candles] = await Promise.all([
        this.exchange.fetchTicker(pair),
        this.exchange.fetchOrderBook(pair, ORDER_BOOK_DEPTH),
        this.exchange.fetchTrades(pair, RECENT_TRADES_LIMIT),
        this.exchange.fetchCandles(pair, CANDLE_INTERVAL, CANDLE_LIMIT)
      ]);
      return { pair, ticker, orderbook, trades, candles, timestamp: Date.now() };
    } catch (err) {
      this.logger.error({ msg: "Error fetching market data", pair, error: sanitizeExchangeErrorMessage(errorMessage(err)) });
      return null;
    }
  }

  async getAvailableBalance(asset: string): Promise<number> {
    try {
      return await this.exchange.fetchBalance(asset);
    } catch (err) {
      this.logger.error({ msg: "Error fetching balance", asset, error: sanitizeExchangeErrorMessage(errorMessage(err)) });
      return 0;
    }
  }
}
