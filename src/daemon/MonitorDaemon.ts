import { CycleReport } from '../alerts/types';

/**
 * Anything that can run one poll cycle (normally an AlertEvaluator)
 */
export interface CycleRunner {
  runCycle(): Promise<CycleReport>;
}

/**
 * Monitor daemon configuration options
 */
export interface MonitorDaemonOptions {
  runner: CycleRunner;
  /** Seconds between the end of one cycle and the start of the next */
  intervalSeconds: number;
  /** Whether to log verbose debug information */
  verbose?: boolean;
}

/**
 * Runs poll cycles on a fixed interval until stopped.
 *
 * @remarks
 * A failing cycle is logged and the loop carries on. `stop()` ends the wait
 * between cycles immediately; a cycle already in flight is allowed to finish.
 */
export class MonitorDaemon {
  private readonly runner: CycleRunner;

  private readonly intervalMs: number;

  private readonly verbose: boolean;

  private running = false;

  private wake: (() => void) | null = null;

  private cycles = 0;

  constructor(options: MonitorDaemonOptions) {
    this.runner = options.runner;
    this.intervalMs = Math.max(0, options.intervalSeconds) * 1000;
    this.verbose = options.verbose ?? false;
  }

  /** Whether the loop is active */
  get isRunning(): boolean {
    return this.running;
  }

  /** Cycles started since construction */
  get cycleCount(): number {
    return this.cycles;
  }

  /**
   * Runs a single cycle.
   *
   * @returns The cycle report, or null if the cycle threw
   */
  async runOnce(): Promise<CycleReport | null> {
    this.cycles += 1;
    try {
      const report = await this.runner.runCycle();
      this.log(
        `Cycle ${this.cycles}: ${report.positions} positions, ` +
        `${report.delivered.length} alerts sent, ${report.suppressed.length} in cooldown`
      );
      return report;
    } catch (error) {
      console.error(`[Monitor] Cycle ${this.cycles} failed:`, error);
      return null;
    }
  }

  /**
   * Loops until {@link stop} is called. Resolves once the loop has exited.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    console.log(`[Monitor] Started, polling every ${this.intervalMs / 1000}s`);

    while (this.running) {
      await this.runOnce();
      if (!this.running) break;
      await this.pause();
    }

    console.log('[Monitor] Stopped');
  }

  /**
   * Ends the loop after the current cycle.
   */
  stop(): void {
    this.running = false;
    if (this.wake) {
      this.wake();
    }
  }

  // ==================== Private Methods ====================

  private pause(): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, this.intervalMs);

      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private log(message: string): void {
    if (this.verbose) {
      console.log(`[Monitor] ${message}`);
    }
  }
}
