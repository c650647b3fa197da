import { Severity, TieredThresholds } from '../types';

/**
 * Tier matched by a magnitude
 */
export interface LevelMatch {
  severity: Severity;
  /** Threshold of the matched tier */
  threshold: number;
}

/**
 * Change between a previous and a current reading
 */
export interface TrendResult {
  previous: number;
  current: number;
  /** Signed fractional change; 0 when previous is 0 */
  pctChange: number;
  /** Signed absolute change */
  absChange: number;
}

/**
 * Classifies a magnitude against ascending light/medium/heavy thresholds.
 *
 * @param magnitude - Non-negative metric value
 * @param thresholds - Tier thresholds (a tier at Infinity never matches)
 * @returns The highest tier met, or null when below all tiers
 *
 * @example
 * ```typescript
 * classifyLevel(0.0007, { light: 0.0001, medium: 0.0005, heavy: 0.001 });
 * // { severity: 'medium', threshold: 0.0005 }
 * ```
 */
export function classifyLevel(magnitude: number, thresholds: TieredThresholds): LevelMatch | null {
  if (magnitude >= thresholds.heavy) return { severity: 'heavy', threshold: thresholds.heavy };
  if (magnitude >= thresholds.medium) return { severity: 'medium', threshold: thresholds.medium };
  if (magnitude >= thresholds.light) return { severity: 'light', threshold: thresholds.light };
  return null;
}

/**
 * Computes fractional and absolute change from `previous` to `current`.
 */
export function computeTrend(previous: number, current: number): TrendResult {
  return {
    previous,
    current,
    pctChange: previous === 0 ? 0 : (current - previous) / previous,
    absChange: current - previous,
  };
}

/**
 * Whether a trend breaches either the fractional or the absolute limit.
 */
export function exceedsTrendLimits(trend: TrendResult, pctLimit: number, absLimit: number): boolean {
  return Math.abs(trend.pctChange) > pctLimit || Math.abs(trend.absChange) > absLimit;
}

/**
 * Finds the first target within `tolerance` of `current`.
 */
export function matchSpecificValue(current: number, targets: readonly number[], tolerance: number): number | null {
  for (const target of targets) {
    if (Math.abs(current - target) <= tolerance) return target;
  }
  return null;
}

/**
 * Whether an alert last fired at `lastAlertTime` may fire again at `now`.
 */
export function isCooldownElapsed(lastAlertTime: number | undefined, now: number, cooldownSeconds: number): boolean {
  if (lastAlertTime === undefined) return true;
  return now - lastAlertTime >= cooldownSeconds;
}
