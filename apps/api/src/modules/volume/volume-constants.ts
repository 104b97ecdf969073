// Price walk
export const BASE_PRICE_STEP_RATIO = 0.001; // 0.1% of the current price
export const PRICE_RANDOMIZATION_FACTOR = 0.5;
export const ORDER_SIDE_ALTERNATE_PROBABILITY = 0.8;
export const PRICE_ADJUSTMENT_PROBABILITY = 0.7;

// Sizing
export const LIQUIDITY_USAGE_RATIO = 0.5; // at most half of the thinner top-of-book side
export const FALLBACK_MIN_ORDER_UNITS = 1;

// Acceptance
export const BASE_CONFIDENCE_SPREAD_OK = 0.7;
export const BASE_CONFIDENCE_SPREAD_WIDE = 0.3;
export const BEHIND_TARGET_CONFIDENCE_BOOST = 0.2;
export const BEHIND_TARGET_RATIO = 0.8;
export const MIN_PLACE_CONFIDENCE = 0.5;

// Timing regimes
export const BURST_MODE_INTERVAL_MULTIPLIER = 0.3;
export const QUIET_MODE_INTERVAL_MULTIPLIER = 3.0;

// Order tracking
export const COMPLETED_ORDER_STATUSES: ReadonlySet<string> = new Set([
  "closed",
  "filled",
  "canceled",
  "cancelled",
  "expired",
  "rejected"
]);

// Market snapshot shape
export const ORDER_BOOK_DEPTH = 50;
export const RECENT_TRADES_LIMIT = 100;
export const CANDLE_INTERVAL = "5m";
export const CANDLE_LIMIT = 20;
