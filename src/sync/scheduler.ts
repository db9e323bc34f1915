import { RemoteSyncError, describeError } from '../errors.js';
import { logger } from '../logger.js';

// Default sync interval: 60 seconds between tick starts
export const SYNC_INTERVAL_MS = 60 * 1000;

export type SchedulerState = 'idle' | 'scheduled' | 'firing';

export type TriggerResult = 'completed' | 'failed' | 'skipped';

/**
 * Cancellation handle for an armed ticker.
 */
export interface TickerHandle {
  cancel(): void;
}

/**
 * Source of periodic ticks. The default uses setInterval; tests drive it with
 * fake timers or a hand-cranked implementation.
 */
export interface Ticker {
  start(intervalMs: number, onTick: () => void): TickerHandle;
}

export const intervalTicker: Ticker = {
  start(intervalMs, onTick) {
    const timer = setInterval(onTick, intervalMs);
    return {
      cancel: () => clearInterval(timer),
    };
  },
};

export interface SyncSchedulerOptions {
  intervalMs?: number;
  ticker?: Ticker;
}

/**
 * Drives periodic pulls: idle -> scheduled -> firing -> scheduled.
 *
 * Every enable() starts a new generation. disable() bumps the generation and
 * cancels the ticker, so any tick or completion belonging to an older
 * generation is ignored: no pull starts after disable() returns and an
 * in-flight pull finishes without touching the state.
 */
export class SyncScheduler {
  private readonly runPull: () => Promise<void>;
  private readonly intervalMs: number;
  private readonly ticker: Ticker;
  private state: SchedulerState = 'idle';
  private handle: TickerHandle | null = null;
  private generation = 0;
  private current: Promise<void> | null = null;

  constructor(runPull: () => Promise<void>, options: SyncSchedulerOptions = {}) {
    this.runPull = runPull;
    this.intervalMs = options.intervalMs ?? SYNC_INTERVAL_MS;
    this.ticker = options.ticker ?? intervalTicker;
  }

  getState(): SchedulerState {
    return this.state;
  }

  get isEnabled(): boolean {
    return this.state !== 'idle';
  }

  /**
   * Arm the ticker and pull once right away. Resolves when that first pull
   * has settled. Calling it while already enabled is a no-op.
   */
  enable(): Promise<void> {
    if (this.isEnabled) {
      return Promise.resolve();
    }

    const generation = ++this.generation;
    this.state = 'scheduled';
    this.handle = this.ticker.start(this.intervalMs, () => {
      this.fire(generation);
    });

    logger.info(`Sync enabled; pulling every ${Math.round(this.intervalMs / 1000)}s.`);
    return this.fire(generation);
  }

  disable(): void {
    this.generation++;
    if (this.handle) {
      this.handle.cancel();
      this.handle = null;
    }
    if (this.state !== 'idle') {
      logger.info('Sync disabled.');
    }
    this.state = 'idle';
  }

  /**
   * Pull immediately, outside the cadence. Skipped while sync is disabled.
   */
  async triggerSync(): Promise<TriggerResult> {
    if (!this.isEnabled) {
      logger.info('Sync is disabled; skipping manual sync.');
      return 'skipped';
    }

    try {
      await this.runPull();
      return 'completed';
    } catch (error) {
      this.report(error);
      return 'failed';
    }
  }

  /**
   * Resolves once the scheduled pull in progress, if any, has settled.
   */
  async idle(): Promise<void> {
    await this.current;
  }

  private fire(generation: number): Promise<void> {
    if (generation !== this.generation) {
      return Promise.resolve();
    }

    if (this.state === 'firing') {
      // Previous pull overran the interval; skip rather than stack ticks
      logger.debug('Previous sync still running; skipping this tick.');
      return this.current ?? Promise.resolve();
    }

    this.state = 'firing';
    const run: Promise<void> = this.runPull()
      .catch((error: unknown) => this.report(error))
      .finally(() => {
        if (generation === this.generation) {
          this.state = 'scheduled';
        }
        if (this.current === run) {
          this.current = null;
        }
      });

    this.current = run;
    return run;
  }

  private report(error: unknown): void {
    // RemoteSync has already logged its own failures
    if (!(error instanceof RemoteSyncError)) {
      logger.error(`Scheduled sync failed: ${describeError(error)}`);
    }
  }
}
