import type { OrderBook, PriceLevel } from "../integrations/exchange-client";

export type Liquidity = {
  bidVolume: number;
  askVolume: number;
};

function topOfBook(levels: readonly PriceLevel[] | undefined): PriceLevel | null {
  if (!Array.isArray(levels) || levels.length === 0) return null;
  const top = levels[0];
  if (!Array.isArray(top)) return null;
  const [price, size] = top;
  if (!Number.isFinite(price) || !Number.isFinite(size)) return null;
  return [price, size];
}

/** Relative best bid/ask spread; 0 when either side is empty or the bid is not positive. */
export function calculateSpread(orderbook: Partial<OrderBook> | null | undefined): number {
  const bid = topOfBook(orderbook?.bids);
  const ask = topOfBook(orderbook?.asks);
  if (!bid || !ask) return 0;

  const [bidPrice] = bid;
  const [askPrice] = ask;
  return bidPrice > 0 ? (askPrice - bidPrice) / bidPrice : 0;
}

export function getAvailableLiquidity(orderbook: Partial<OrderBook> | null | undefined): Liquidity {
  return {
    bidVolume: topOfBook(orderbook?.bids)?.[1] ?? 0,
    askVolume: topOfBook(orderbook?.asks)?.[1] ?? 0
  };
}
