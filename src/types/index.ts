/**
 * Core types for Greeks and volatility-index monitoring
 */

/**
 * Position direction, derived from the sign of the exchange-reported size
 */
export type Direction = 'buy' | 'sell';

/**
 * Alert severity tier (the highest threshold a metric's magnitude meets)
 */
export type Severity = 'light' | 'medium' | 'heavy';

/**
 * Tiers in ascending order of threshold
 */
export const SEVERITY_TIERS: readonly Severity[] = ['light', 'medium', 'heavy'];

/**
 * Normalized option position with its risk sensitivities
 */
export interface Position {
  /** Exchange instrument name (e.g., "BTC-27DEC24-60000-C") */
  instrumentName: string;
  /** Contract kind as reported by the exchange (e.g., "option") */
  kind: string;
  /** Long ("buy") when the signed size is positive, short ("sell") otherwise */
  direction: Direction;
  /** Unsigned position size */
  size: number;
  /** Mark implied volatility */
  markIv: number;
  /** Total position gamma, as resolved by the configured Greeks policy */
  gamma: number;
  /** Total position delta */
  delta: number;
  /** Total position theta */
  theta: number;
  /** Total position vega, as resolved by the configured Greeks policy */
  vega: number;
}

/**
 * Latest reading of the exchange volatility index (DVOL)
 */
export interface VolatilityObservation {
  /** Index value (close of the most recent bucket) */
  value: number;
  /** Unix timestamp of the bucket, in seconds */
  timestamp: number;
}

/**
 * Open order summary
 */
export interface OpenOrder {
  orderId: string;
  instrumentName: string;
  direction: string;
  price: number;
  amount: number;
  filled: number;
  /** amount - filled */
  remaining: number;
  orderType: string;
  orderState: string;
  timeInForce: string;
  kind: string;
  creationTimestamp: number;
  lastUpdateTimestamp: number;
}

/**
 * Per-contract Greeks reported by the order book for one instrument
 */
export interface OrderBookGreeks {
  instrumentName: string;
  gamma: number;
  vega: number;
  delta: number;
  theta: number;
}

/**
 * Structured record persisted per instrument
 */
export type PositionSnapshot = {
  gamma: number;
  vega: number;
  delta: number;
  direction: Direction;
  size: number;
};

/**
 * Value stored in a time series: a scalar (DVOL) or a small flat record
 */
export type SeriesValue = number | { [field: string]: number | string };

/**
 * One point of a metric series
 */
export interface TimeSeriesEntry {
  value: SeriesValue;
  /** Unix timestamp in seconds (fractional) */
  timestamp: number;
}

/**
 * Three ascending thresholds. A tier set to Infinity never matches.
 */
export interface TieredThresholds {
  light: number;
  medium: number;
  heavy: number;
}
