import type { OrderRecord, OrderSide } from "@volume-bot/shared";

export const EXCHANGE_CLIENT = Symbol("EXCHANGE_CLIENT");

export type PriceLevel = [price: number, size: number];

export type OrderBook = {
  bids: PriceLevel[];
  asks: PriceLevel[];
};

export type Ticker = {
  lastPrice: number | null;
};

export type Trade = {
  id?: string;
  timestamp: number;
  side?: OrderSide;
  price: number;
  amount: number;
};

export type Candle = {
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

export type MarketSnapshot = {
  pair: string;
  ticker: Ticker;
  orderbook: OrderBook;
  trades: Trade[];
  candles: Candle[];
  timestamp: number;
};

/**
 * Asynchronous exchange capability consumed by the volume core.
 * Every call may reject; callers classify and absorb failures.
 */
export interface ExchangeClient {
  readonly id: string;
  ping(): Promise<void>;
  fetchTicker(pair: string): Promise<Ticker>;
  fetchOrderBook(pair: string, depth: number): Promise<OrderBook>;
  fetchTrades(pair: string, limit: number): Promise<Trade[]>;
  fetchCandles(pair: string, interval: string, limit: number): Promise<Candle[]>;
  /** Free (unlocked) amount of `asset`; 0 when the account holds none. */
  fetchBalance(asset: string): Promise<number>;
  createLimitOrder(pair: string, side: OrderSide, amount: number, price: number): Promise<OrderRecord>;
  createMarketOrder(pair: string, side: OrderSide, amount: number): Promise<OrderRecord>;
  cancelOrder(id: string, pair: string): Promise<void>;
  /** Raw lower-case status as reported by the exchange (`open`, `closed`, `canceled`, ...). */
  fetchOrderStatus(id: string, pair: string): Promise<string>;
  close(): Promise<void>;
}
