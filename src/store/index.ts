import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { SeriesValue, TimeSeriesEntry } from '../types';

/**
 * Entries whose timestamps differ by at most this many seconds are coalesced
 */
export const COALESCE_WINDOW_SECONDS = 1;

const SeriesValueSchema = z.union([z.number(), z.record(z.union([z.number(), z.string()]))]);

const EntrySchema = z.object({
  value: SeriesValueSchema,
  timestamp: z.number(),
});

/**
 * Durable snapshot layout. Metric series and alert cooldowns are separate maps
 * so retention pruning never touches cooldown timestamps.
 */
export const SnapshotSchema = z.object({
  series: z
    .record(
      z.object({
        latest: EntrySchema.optional(),
        history: z.array(EntrySchema).default([]),
      })
    )
    .default({}),
  lastAlertTimes: z.record(z.number()).default({}),
});

export type Snapshot = z.infer<typeof SnapshotSchema>;

/**
 * Copies a value, dropping record fields JSON cannot carry (NaN, ±Infinity)
 */
function copyValue(value: SeriesValue): SeriesValue {
  if (typeof value === 'number') return value;
  const copy: { [field: string]: number | string } = {};
  for (const [field, item] of Object.entries(value)) {
    if (typeof item === 'string' || Number.isFinite(item)) {
      copy[field] = item;
    }
  }
  return copy;
}

function copyEntry(entry: TimeSeriesEntry): TimeSeriesEntry {
  return { value: copyValue(entry.value), timestamp: entry.timestamp };
}

/**
 * One metric's retained data
 */
interface MetricSeries {
  latest?: TimeSeriesEntry;
  /** Sorted by timestamp ascending */
  history: TimeSeriesEntry[];
}

/**
 * Observation store configuration options
 */
export interface ObservationStoreOptions {
  /** Snapshot file (default: state_store.json in the working directory) */
  filePath?: string;
  /** Minutes of history kept per series (default: 60) */
  retentionMinutes?: number;
  /** Whether to log verbose debug information */
  verbose?: boolean;
  /** Clock in Unix seconds (default: wall clock) */
  now?: () => number;
}

/**
 * Retention-bounded time series per metric key, plus the last firing time of
 * every alert key, persisted as one JSON document.
 *
 * @remarks
 * The snapshot is read once at construction and rewritten wholesale on every
 * mutation. A missing or unreadable snapshot starts an empty store, and a failed
 * write is logged while the in-memory state keeps serving. Only one process may
 * write a given file.
 *
 * @example
 * ```typescript
 * const store = new ObservationStore({ filePath: 'state_store.json', retentionMinutes: 60 });
 * store.set('dvol', 55.2);
 * const fiveMinutesAgo = store.getValueNear('dvol', Date.now() / 1000 - 300);
 * ```
 */
export class ObservationStore {
  private readonly series: Map<string, MetricSeries> = new Map();

  private readonly lastAlertTimes: Map<string, number> = new Map();

  readonly filePath: string;

  readonly retentionMinutes: number;

  private readonly verbose: boolean;

  private readonly clock: () => number;

  constructor(options: ObservationStoreOptions = {}) {
    this.filePath = path.resolve(options.filePath ?? 'state_store.json');
    this.retentionMinutes = options.retentionMinutes ?? 60;
    this.verbose = options.verbose ?? false;
    this.clock = options.now ?? (() => Date.now() / 1000);
    this.load();
  }

  // ==================== Metric Series ====================

  /**
   * Records a value as the latest entry for `key` and persists the store.
   * An existing entry within one second of `timestamp` is replaced. A non-finite
   * scalar or timestamp is not recorded; non-finite record fields are dropped.
   *
   * @param key - Series key (instrument name or "dvol")
   * @param value - Scalar or flat record
   * @param timestamp - Unix seconds (default: now)
   */
  set(key: string, value: SeriesValue, timestamp: number = this.clock()): void {
    if ((typeof value === 'number' && !Number.isFinite(value)) || !Number.isFinite(timestamp)) {
      console.warn(`[Store] Ignoring non-finite ${key} observation`);
      return;
    }

    const entry: TimeSeriesEntry = { value: copyValue(value), timestamp };
    const existing = this.series.get(key);
    const history = (existing?.history ?? []).filter(
      item => Math.abs(item.timestamp - timestamp) > COALESCE_WINDOW_SECONDS
    );
    history.push(entry);
    history.sort((a, b) => a.timestamp - b.timestamp);

    this.series.set(key, { latest: entry, history });
    this.persist();
  }

  /**
   * Returns copies of the entries of `key` recorded within the last `minutes`.
   */
  getHistory(key: string, minutes: number = 5): TimeSeriesEntry[] {
    const cutoff = this.clock() - minutes * 60;
    return (this.series.get(key)?.history ?? []).filter(item => item.timestamp >= cutoff).map(copyEntry);
  }

  /**
   * Returns a copy of the most recently written entry of `key`.
   */
  getLatest(key: string): TimeSeriesEntry | undefined {
    const latest = this.series.get(key)?.latest;
    return latest ? copyEntry(latest) : undefined;
  }

  /**
   * Returns the retained value of `key` whose timestamp is closest to
   * `targetTime`. On equal distance the earlier entry wins.
   */
  getValueNear(key: string, targetTime: number): SeriesValue | undefined {
    let closest: TimeSeriesEntry | undefined;
    let bestDistance = Infinity;

    for (const item of this.getHistory(key, this.retentionMinutes)) {
      const distance = Math.abs(item.timestamp - targetTime);
      if (distance < bestDistance) {
        closest = item;
        bestDistance = distance;
      }
    }

    return closest?.value;
  }

  /**
   * Keys that currently hold series data.
   */
  keys(): string[] {
    return Array.from(this.series.keys());
  }

  // ==================== Alert Cooldowns ====================

  /**
   * Unix seconds of the last successful firing of `alertKey`.
   */
  getLastAlertTime(alertKey: string): number | undefined {
    return this.lastAlertTimes.get(alertKey);
  }

  /**
   * Records a successful firing and persists the store.
   */
  setLastAlertTime(alertKey: string, timestamp: number = this.clock()): void {
    this.lastAlertTimes.set(alertKey, timestamp);
    this.persist();
  }

  /**
   * Alert keys with a recorded firing.
   */
  getAlertKeys(): string[] {
    return Array.from(this.lastAlertTimes.keys());
  }

  // ==================== Persistence ====================

  /**
   * Loads the snapshot, falling back to an empty store.
   */
  private load(): void {
    if (!fs.existsSync(this.filePath)) {
      this.log(`No state file at ${this.filePath}, starting empty`);
      return;
    }

    try {
      const snapshot = SnapshotSchema.parse(JSON.parse(fs.readFileSync(this.filePath, 'utf-8')));

      for (const [key, data] of Object.entries(snapshot.series)) {
        const history = [...data.history].sort((a, b) => a.timestamp - b.timestamp);
        this.series.set(key, { latest: data.latest, history });
      }
      for (const [alertKey, timestamp] of Object.entries(snapshot.lastAlertTimes)) {
        this.lastAlertTimes.set(alertKey, timestamp);
      }

      this.log(`Loaded ${this.series.size} series and ${this.lastAlertTimes.size} alert timestamps`);
    } catch (error) {
      console.error(`[Store] Failed to load ${this.filePath}, starting empty:`, error);
      this.series.clear();
      this.lastAlertTimes.clear();
    }
  }

  /**
   * Prunes expired series data and rewrites the snapshot.
   */
  private persist(): void {
    this.prune(this.clock());

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(this.toSnapshot(), null, 2), 'utf-8');
    } catch (error) {
      console.error(`[Store] Failed to write ${this.filePath}, keeping state in memory:`, error);
    }
  }

  /**
   * Drops series entries older than the retention window. A key with no history
   * and no latest entry left is removed. Alert timestamps are kept.
   */
  private prune(now: number): void {
    const cutoff = now - this.retentionMinutes * 60;

    for (const [key, data] of this.series) {
      data.history = data.history.filter(item => item.timestamp >= cutoff);
      if (data.latest && data.latest.timestamp < cutoff) {
        data.latest = undefined;
      }
      if (data.history.length === 0 && !data.latest) {
        this.series.delete(key);
      }
    }
  }

  private toSnapshot(): Snapshot {
    const snapshot: Snapshot = { series: {}, lastAlertTimes: {} };
    for (const [key, data] of this.series) {
      snapshot.series[key] = data.latest ? { latest: data.latest, history: data.history } : { history: data.history };
    }
    for (const [alertKey, timestamp] of this.lastAlertTimes) {
      snapshot.lastAlertTimes[alertKey] = timestamp;
    }
    return snapshot;
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[Store] ${message}`);
    }
  }
}
