import { Position, Severity, TieredThresholds, VolatilityObservation } from '../types';

/**
 * Metrics classified against tiered thresholds
 */
export type LevelMetric = 'gamma' | 'vega' | 'dvol';

/**
 * A metric sitting at or above a severity tier
 */
export interface LevelAlert {
  type: 'level';
  key: string;
  metric: LevelMetric;
  severity: Severity;
  /** Magnitude that was classified */
  value: number;
  threshold: number;
  /** Present for position metrics */
  position?: Position;
}

/**
 * DVOL within tolerance of a configured target value
 */
export interface SpecificValueAlert {
  type: 'specificValue';
  key: string;
  value: number;
  target: number;
  tolerance: number;
  /** Reading nearest the trend window start, when history exists */
  previous?: number;
}

/**
 * DVOL moved more than the configured limits over the trend window
 */
export interface TrendAlert {
  type: 'trend';
  key: string;
  current: number;
  previous: number;
  pctChange: number;
  absChange: number;
  pctLimit: number;
  absLimit: number;
  windowMinutes: number;
}

export type AlertCandidate = LevelAlert | SpecificValueAlert | TrendAlert;

/**
 * Volatility-index alert limits
 */
export interface DvolThresholds {
  /** Tiers for the raw index value */
  absLevels: TieredThresholds;
  /** Fractional change over the window that fires a trend alert (e.g. 0.05) */
  pctChange: number;
  /** Absolute change over the window that fires a trend alert */
  absChange: number;
  specificValues: number[];
  specificTolerance: number;
  trendWindowMinutes: number;
}

/**
 * Evaluator settings, usually derived from the loaded configuration
 */
export interface AlertSettings {
  /** When false, alerts are evaluated and logged but never delivered */
  enabled: boolean;
  cooldownSeconds: number;
  gamma: TieredThresholds;
  vega: TieredThresholds;
  dvol: DvolThresholds;
  /** Currencies whose option positions are polled */
  currencies: string[];
  /** Volatility-index currency */
  underlying: string;
}

/**
 * Read-only market data the evaluator polls each cycle
 */
export interface MarketDataSource {
  getAccountOptionPositions(currency: string): Promise<Position[]>;
  getVolatilityIndex(currency: string): Promise<VolatilityObservation | null>;
}

/**
 * Summary of one poll cycle
 */
export interface CycleReport {
  /** Unix seconds the cycle was evaluated at */
  timestamp: number;
  positions: number;
  dvol: VolatilityObservation | null;
  candidates: AlertCandidate[];
  /** Keys delivered and recorded this cycle */
  delivered: string[];
  /** Keys held back by cooldown */
  suppressed: string[];
}
