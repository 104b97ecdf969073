import ccxt from "ccxt";
import type { OrderRecord, OrderSide, OrderStatus, SupportedExchange } from "@volume-bot/shared";

import type { Candle, ExchangeClient, OrderBook, PriceLevel, Ticker, Trade } from "./exchange-client";

export type CcxtExchangeOptions = {
  exchange: SupportedExchange;
  apiKey?: string;
  apiSecret?: string;
  sandbox: boolean;
  timeoutMs?: number;
};

function asNumber(v: unknown): number | null {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string") {
    const n = Number.parseFloat(v);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

function asRecord(v: unknown): Record<string, unknown> | null {
  if (!v || typeof v !== "object") return null;
  return Object.fromEntries(Object.entries(v));
}

function asString(v: unknown): string | null {
  return typeof v === "string" ? v : null;
}

function asNumberOrString(v: unknown): number | string | null {
  if (typeof v === "number" && Number.isFinite(v)) return v;
  if (typeof v === "string" && v.trim()) return v.trim();
  return null;
}

function asSide(v: unknown): OrderSide | undefined {
  const s = asString(v)?.toLowerCase();
  return s === "buy" || s === "sell" ? s : undefined;
}

function pickSpotMarket(entry: unknown): { symbol?: string } | null {
  if (!entry) return null;
  if (!Array.isArray(entry)) {
    const rec = asRecord(entry);
    return rec ? { symbol: asString(rec.symbol) ?? undefined } : null;
  }

  const markets = entry.map((v) => asRecord(v)).filter((m): m is Record<string, unknown> => m !== null);

  const isSpot = (m: Record<string, unknown>): boolean => {
    const spotFlag = m.spot;
    const type = m.type;
    const contract = m.contract;
    if (typeof spotFlag === "boolean") return spotFlag;
    if (typeof type === "string" && type.toLowerCase() === "spot") return true;
    if (typeof contract === "boolean") return !contract;
    return false;
  };

  const best = markets.find(isSpot) ?? markets[0];
  return best ? { symbol: asString(best.symbol) ?? undefined } : null;
}

export function mapCcxtOrderStatus(status: unknown): OrderStatus {
  if (typeof status !== "string") return "open";
  const s = status.toLowerCase();
  if (s === "closed" || s === "filled") return "filled";
  if (s === "canceled" || s === "cancelled" || s === "expired" || s === "rejected") return "canceled";
  return "open";
}

function parseLevels(raw: unknown): PriceLevel[] {
  if (!Array.isArray(raw)) return [];
  const out: PriceLevel[] = [];
  for (const level of raw) {
    if (!Array.isArray(level)) continue;
    const price = asNumber(level[0]);
    const size = asNumber(level[1]);
    if (price === null || size === null) continue;
    out.push([price, size]);
  }
  return out;
}

export type CcxtExchangeMinimal = {
  loadMarkets: () => Promise<unknown>;
  fetchTime?: () => Promise<unknown>;
  fetchTicker: (symbol: string) => Promise<unknown>;
  fetchOrderBook: (symbol: string, limit?: number) => Promise<unknown>;
  fetchTrades: (symbol: string, since?: number, limit?: number) => Promise<unknown>;
  fetchOHLCV: (symbol: string, timeframe?: string, since?: number, limit?: number) => Promise<unknown>;
  fetchBalance: () => Promise<unknown>;
  fetchOrder: (id: string, symbol?: string) => Promise<unknown>;
  cancelOrder: (id: string, symbol?: string) => Promise<unknown>;
  createOrder: (
    symbol: string,
    type: string,
    side: string,
    amount: number,
    price?: number,
    params?: Record<string, unknown>
  ) => Promise<unknown>;
  setSandboxMode?: (enabled: boolean) => void;
  markets_by_id?: Record<string, unknown>;
  close?: () => Promise<void> | void;
};

type CcxtExchangeCtor = new (opts: Record<string, unknown>) => CcxtExchangeMinimal;

export function createCcxtExchange(options: CcxtExchangeOptions): CcxtExchangeMinimal {
  const registry = ccxt as unknown as Record<string, CcxtExchangeCtor | undefined>;
  const ExchangeCtor = registry[options.exchange];
  if (!ExchangeCtor) {
    throw new Error(`Unsupported exchange: ${options.exchange}`);
  }

  const ex = new ExchangeCtor({
    ...(options.apiKey ? { apiKey: options.apiKey } : {}),
    ...(options.apiSecret ? { secret: options.apiSecret } : {}),
    enableRateLimit: true,
    timeout: options.timeoutMs ?? 12_000,
    options: { defaultType: "spot" }
  });

  if (options.sandbox) {
    ex.setSandboxMode?.(true);
  }

  return ex;
}

export class CcxtExchangeAdapter implements ExchangeClient {
  private marketsLoaded = false;

  constructor(
    private readonly exchange: CcxtExchangeMinimal,
    readonly id: string
  ) {}

  async close(): Promise<void> {
    await this.exchange.close?.();
  }

  private async ensureMarketsLoaded(): Promise<void> {
    if (this.marketsLoaded) return;
    await this.exchange.loadMarkets();
    this.marketsLoaded = true;
  }

  // Accepts both unified (`ETH/USDT`) and exchange-native (`ETHUSDT`) pair spellings.
  private async toUnifiedSymbol(pair: string): Promise<string> {
    const id = pair.trim().toUpperCase();
    if (!id) throw new Error("Missing symbol");
    if (id.includes("/")) return id;

    await this.ensureMarketsLoaded();
    const entry = this.exchange.markets_by_id?.[id];
    const market = pickSpotMarket(entry);
    const symbol = typeof market?.symbol === "string" ? market.symbol : null;
    if (!symbol) {
      throw new Error(`Unknown symbol (ccxt): ${id}`);
    }
    return symbol;
  }

  async ping(): Promise<void> {
    if (this.exchange.fetchTime) {
      await this.exchange.fetchTime();
      return;
    }
    await this.ensureMarketsLoaded();
  }

  async fetchTicker(pair: string): Promise<Ticker> {
    const ticker = asRecord(await this.exchange.fetchTicker(await this.toUnifiedSymbol(pair))) ?? {};
    return { lastPrice: asNumber(ticker.last) ?? asNumber(ticker.close) };
  }

  async fetchOrderBook(pair: string, depth: number): Promise<OrderBook> {
    const book = asRecord(await this.exchange.fetchOrderBook(await this.toUnifiedSymbol(pair), depth)) ?? {};
    return { bids: parseLevels(book.bids), asks: parseLevels(book.asks) };
  }

  async fetchTrades(pair: string, limit: number): Promise<Trade[]> {
    const raw = await this.exchange.fetchTrades(await this.toUnifiedSymbol(pair), undefined, limit);
    const list = Array.isArray(raw) ? raw : [];
    const out: Trade[] = [];
    for (const item of list) {
      const trade = asRecord(item);
      if (!trade) continue;
      const price = asNumber(trade.price);
      const amount = asNumber(trade.amount);
      if (price === null || amount === null) continue;
      const id = asNumberOrString(trade.id);
      out.push({
        ...(id === null ? {} : { id: String(id) }),
        timestamp: asNumber(trade.timestamp) ?? 0,
        side: asSide(trade.side),
        price,
        amount
      });
    }
    return out;
  }

  async fetchCandles(pair: string, interval: string, limit: number): Promise<Candle[]> {
    const raw = await this.exchange.fetchOHLCV(await this.toUnifiedSymbol(pair), interval, undefined, limit);
    const list = Array.isArray(raw) ? raw : [];
    const out: Candle[] = [];
    for (const row of list) {
      if (!Array.isArray(row)) continue;
      const [timestamp, open, high, low, close, volume] = row.map((v) => asNumber(v));
      if (timestamp == null || open == null || high == null || low == null || close == null) continue;
      out.push({ timestamp, open, high, low, close, volume: volume ?? 0 });
    }
    return out;
  }

  async fetchBalance(asset: string): Promise<number> {
    const balance = asRecord(await this.exchange.fetchBalance()) ?? {};
    const key = asset.trim().toUpperCase();
    const free = asRecord(balance.free) ?? {};
    const fromFree = asNumber(free[key]);
    if (fromFree !== null) return fromFree;
    return asNumber(asRecord(balance[key])?.free) ?? 0;
  }

  private mapCcxtOrder(orderRaw: unknown, fallback: Omit<OrderRecord, "id" | "status" | "dryRun">): OrderRecord {
    const order = asRecord(orderRaw) ?? {};
    const info = asRecord(order.info) ?? {};

    const idRaw = asNumberOrString(order.id) ?? asNumberOrString(info.orderId);
    const price = asNumber(order.price) ?? asNumber(order.average) ?? fallback.price;

    return {
      id: idRaw === null ? "" : String(idRaw),
      pair: asString(order.symbol) ?? fallback.pair,
      side: asSide(order.side) ?? fallback.side,
      amount: asNumber(order.amount) ?? fallback.amount,
      ...(price === undefined ? {} : { price }),
      status: mapCcxtOrderStatus(order.status),
      dryRun: false
    };
  }

  async createLimitOrder(pair: string, side: OrderSide, amount: number, price: number): Promise<OrderRecord> {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new Error(`Invalid quantity: ${amount}`);
    }
    if (!Number.isFinite(price) || price <= 0) {
      throw new Error(`Invalid price: ${price}`);
    }
    const symbol = await this.toUnifiedSymbol(pair);
    const raw = await this.exchange.createOrder(symbol, "limit", side, amount, price);
    return this.mapCcxtOrder(raw, { pair: symbol, side, amount, price });
  }

  async createMarketOrder(pair: string, side: OrderSide, amount: number): Promise<OrderRecord> {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new Error(`Invalid quantity: ${amount}`);
    }
    const symbol = await this.toUnifiedSymbol(pair);
    const raw = await this.exchange.createOrder(symbol, "market", side, amount);
    return this.mapCcxtOrder(raw, { pair: symbol, side, amount });
  }

  async cancelOrder(id: string, pair: string): Promise<void> {
    await this.exchange.cancelOrder(id, await this.toUnifiedSymbol(pair));
  }

  async fetchOrderStatus(id: string, pair: string): Promise<string> {
    const order = asRecord(await this.exchange.fetchOrder(id, await this.toUnifiedSymbol(pair))) ?? {};
    return asString(order.status)?.toLowerCase() ?? "unknown";
  }
}
