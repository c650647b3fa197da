import { OrderBookGreeks } from '../types';

/**
 * Where total position gamma and vega come from
 */
export type GreeksSource = 'order_book' | 'position';

/**
 * Inputs available when resolving a position's gamma and vega
 */
export interface GreeksPolicyInput {
  /** Signed position size (negative for shorts) */
  signedSize: number;
  /** Aggregate values reported on the position record */
  position: { gamma: number; vega: number };
  /** Per-contract Greeks from the order book, when fetched and present */
  orderBook: OrderBookGreeks | null;
}

/**
 * Strategy for turning exchange data into total-position gamma and vega.
 *
 * @remarks
 * The exchange reports Greeks both on the position (documented as already
 * aggregated) and per contract on the order book. Which one is authoritative,
 * and in which unit, is left to the policy. Results keep their sign; callers
 * that classify magnitudes take the absolute value.
 */
export interface GreeksPolicy {
  readonly source: GreeksSource;
  /** Whether the client must query the order book for each position */
  readonly usesOrderBook: boolean;
  resolve(input: GreeksPolicyInput): { gamma: number; vega: number };
}

/**
 * Per-contract order-book Greeks multiplied by the signed size, falling back
 * to the position aggregate when the order book has no Greeks.
 */
export const orderBookPerContractPolicy: GreeksPolicy = {
  source: 'order_book',
  usesOrderBook: true,
  resolve({ signedSize, position, orderBook }) {
    if (!orderBook) {
      return { gamma: position.gamma, vega: position.vega };
    }
    return {
      gamma: orderBook.gamma * signedSize,
      vega: orderBook.vega * signedSize,
    };
  },
};

/**
 * The position record's own aggregate values.
 */
export const positionAggregatePolicy: GreeksPolicy = {
  source: 'position',
  usesOrderBook: false,
  resolve({ position }) {
    return { gamma: position.gamma, vega: position.vega };
  },
};

/**
 * Looks up the built-in policy for a configured source.
 */
export function greeksPolicyFor(source: GreeksSource): GreeksPolicy {
  return source === 'position' ? positionAggregatePolicy : orderBookPerContractPolicy;
}
