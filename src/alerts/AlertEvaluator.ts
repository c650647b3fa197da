import { formatAlert } from '../notifier/format';
import { Notifier } from '../notifier/types';
import { ObservationStore } from '../store';
import { Position, PositionSnapshot, TieredThresholds, VolatilityObservation } from '../types';
import { classifyLevel, computeTrend, exceedsTrendLimits, isCooldownElapsed, matchSpecificValue } from './levels';
import { AlertCandidate, AlertSettings, CycleReport, LevelMetric, MarketDataSource } from './types';

/** Series key of the volatility index */
export const DVOL_KEY = 'dvol';

/**
 * Alert evaluator configuration options
 */
export interface AlertEvaluatorOptions {
  source: MarketDataSource;
  store: ObservationStore;
  notifier: Notifier;
  settings: AlertSettings;
  /** Whether to log verbose debug information */
  verbose?: boolean;
  /** Clock in Unix seconds (default: wall clock) */
  now?: () => number;
}

/**
 * Turns one poll of positions and DVOL into alerts.
 *
 * @remarks
 * Per position, gamma and vega magnitudes are classified against their tiers.
 * Per DVOL reading, three independent checks run in order: target value,
 * absolute level, and change over the trend window (only once history exists).
 * Each candidate is gated by its own cooldown key; a firing is recorded only
 * after the notifier reports delivery, so failed deliveries are retried next
 * cycle. Every observation is written to the store afterwards.
 *
 * Work is sequential: one currency, one position, one check at a time.
 */
export class AlertEvaluator {
  private readonly source: MarketDataSource;

  private readonly store: ObservationStore;

  private readonly notifier: Notifier;

  private readonly settings: AlertSettings;

  private readonly verbose: boolean;

  private readonly clock: () => number;

  constructor(options: AlertEvaluatorOptions) {
    this.source = options.source;
    this.store = options.store;
    this.notifier = options.notifier;
    this.settings = options.settings;
    this.verbose = options.verbose ?? false;
    this.clock = options.now ?? (() => Date.now() / 1000);
  }

  /**
   * Runs one poll cycle: fetch, evaluate, deliver, persist.
   *
   * @param now - Cycle time in Unix seconds (default: clock)
   */
  async runCycle(now: number = this.clock()): Promise<CycleReport> {
    const report: CycleReport = {
      timestamp: now,
      positions: 0,
      dvol: null,
      candidates: [],
      delivered: [],
      suppressed: [],
    };

    const positions: Position[] = [];
    for (const currency of this.settings.currencies) {
      positions.push(...(await this.source.getAccountOptionPositions(currency)));
    }
    report.positions = positions.length;
    if (positions.length > 0) {
      this.log(`Fetched ${positions.length} option positions`);
    }

    for (const position of positions) {
      await this.checkPosition(position, now, report);
    }

    const dvol = await this.source.getVolatilityIndex(this.settings.underlying);
    report.dvol = dvol;
    if (dvol) {
      await this.checkVolatilityIndex(dvol, now, report);
    }

    return report;
  }

  /**
   * Classifies a position's gamma and vega and records the observation.
   */
  async checkPosition(position: Position, now: number, report: CycleReport): Promise<void> {
    const name = position.instrumentName;
    this.log(`${name}: gamma=${position.gamma.toFixed(8)}, vega=${position.vega.toFixed(2)}`);

    await this.checkPositionLevel(position, 'gamma', Math.abs(position.gamma), this.settings.gamma, now, report);
    await this.checkPositionLevel(position, 'vega', Math.abs(position.vega), this.settings.vega, now, report);

    const snapshot: PositionSnapshot = {
      gamma: position.gamma,
      vega: position.vega,
      delta: position.delta,
      direction: position.direction,
      size: position.size,
    };
    this.store.set(name, snapshot, now);
  }

  /**
   * Runs the target-value, level and trend checks for a DVOL reading and
   * records it.
   */
  async checkVolatilityIndex(observation: VolatilityObservation, now: number, report: CycleReport): Promise<void> {
    const { dvol: limits } = this.settings;
    const current = observation.value;

    const hasHistory = this.store.getHistory(DVOL_KEY, limits.trendWindowMinutes).length > 0;
    const nearest = hasHistory
      ? this.store.getValueNear(DVOL_KEY, now - limits.trendWindowMinutes * 60)
      : undefined;
    const previous = typeof nearest === 'number' ? nearest : undefined;

    const target = matchSpecificValue(current, limits.specificValues, limits.specificTolerance);
    if (target !== null) {
      await this.dispatch(
        {
          type: 'specificValue',
          key: `dvol_specific_${target}`,
          value: current,
          target,
          tolerance: limits.specificTolerance,
          previous,
        },
        now,
        report
      );
    }

    const level = classifyLevel(current, limits.absLevels);
    if (level) {
      await this.dispatch(
        {
          type: 'level',
          key: `dvol_abs_value_${level.severity}`,
          metric: 'dvol',
          severity: level.severity,
          value: current,
          threshold: level.threshold,
        },
        now,
        report
      );
    }

    if (previous === undefined) {
      this.log(`DVOL first reading in window: ${current.toFixed(2)}`);
    } else {
      const trend = computeTrend(previous, current);
      this.log(
        `DVOL ${current.toFixed(2)}, ${limits.trendWindowMinutes}m ago ${previous.toFixed(2)}, ` +
        `change ${(trend.pctChange * 100).toFixed(2)}% (${trend.absChange.toFixed(2)})`
      );

      if (exceedsTrendLimits(trend, limits.pctChange, limits.absChange)) {
        await this.dispatch(
          {
            type: 'trend',
            key: 'dvol_change',
            current,
            previous,
            pctChange: trend.pctChange,
            absChange: trend.absChange,
            pctLimit: limits.pctChange,
            absLimit: limits.absChange,
            windowMinutes: limits.trendWindowMinutes,
          },
          now,
          report
        );
      }
    }

    this.store.set(DVOL_KEY, current, now);
  }

  /**
   * Whether `alertKey` is outside its cooldown at `now`.
   */
  isEligible(alertKey: string, now: number): boolean {
    return isCooldownElapsed(this.store.getLastAlertTime(alertKey), now, this.settings.cooldownSeconds);
  }

  // ==================== Private Methods ====================

  private async checkPositionLevel(
    position: Position,
    metric: Exclude<LevelMetric, 'dvol'>,
    magnitude: number,
    thresholds: TieredThresholds,
    now: number,
    report: CycleReport
  ): Promise<void> {
    const level = classifyLevel(magnitude, thresholds);
    if (!level) return;

    await this.dispatch(
      {
        type: 'level',
        key: `${position.instrumentName}_${metric}_level_${level.severity}`,
        metric,
        severity: level.severity,
        value: magnitude,
        threshold: level.threshold,
        position,
      },
      now,
      report
    );
  }

  /**
   * Applies cooldown and the global switch, delivers, and records the firing.
   */
  private async dispatch(candidate: AlertCandidate, now: number, report: CycleReport): Promise<void> {
    report.candidates.push(candidate);

    if (!this.isEligible(candidate.key, now)) {
      this.log(`${candidate.key} in cooldown, skipping`);
      report.suppressed.push(candidate.key);
      return;
    }

    const message = formatAlert(candidate);
    if (!this.settings.enabled) {
      this.log(`[alerts disabled] ${message.title}`);
      return;
    }

    let delivered: boolean;
    try {
      delivered = await this.notifier.send(message);
    } catch (error) {
      console.error(`[Alerts] Notifier threw for ${candidate.key}:`, error);
      delivered = false;
    }

    if (!delivered) {
      console.error(`[Alerts] Delivery failed for ${candidate.key}, will retry next cycle`);
      return;
    }

    this.store.setLastAlertTime(candidate.key, now);
    report.delivered.push(candidate.key);
    console.warn(`[Alerts] Sent: ${message.title}`);
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[Alerts] ${message}`);
    }
  }
}
