/**
 * Sync Scheduler Tests
 *
 * State transitions, tick skipping and the guarantees of disable().
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { SYNC_INTERVAL_MS, SyncScheduler, type Ticker } from '../src/sync/index.js';
import { RemoteSyncError } from '../src/errors.js';
import { createGate } from './setup.js';

/**
 * Ticker driven by hand from the test.
 */
class ManualTicker implements Ticker {
  starts = 0;
  cancelled = 0;
  intervalMs = 0;
  private onTick: (() => void) | null = null;

  start(intervalMs: number, onTick: () => void) {
    this.starts++;
    this.intervalMs = intervalMs;
    this.onTick = onTick;
    return {
      cancel: () => {
        this.cancelled++;
      },
    };
  }

  /** Fire the most recently armed callback, even after cancel */
  tick(): void {
    this.onTick?.();
  }
}

describe('SyncScheduler', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('pulls once on enable and settles in scheduled', async () => {
    const ticker = new ManualTicker();
    const runPull = vi.fn(async () => undefined);
    const scheduler = new SyncScheduler(runPull, { ticker });

    expect(scheduler.getState()).toBe('idle');
    const enabling = scheduler.enable();
    expect(scheduler.getState()).toBe('firing');
    await enabling;

    expect(runPull).toHaveBeenCalledTimes(1);
    expect(scheduler.getState()).toBe('scheduled');
    expect(ticker.intervalMs).toBe(SYNC_INTERVAL_MS);
  });

  it('pulls on every tick', async () => {
    const ticker = new ManualTicker();
    const runPull = vi.fn(async () => undefined);
    const scheduler = new SyncScheduler(runPull, { ticker });
    await scheduler.enable();

    ticker.tick();
    await scheduler.idle();
    ticker.tick();
    await scheduler.idle();

    expect(runPull).toHaveBeenCalledTimes(3);
  });

  it('skips a tick while the previous pull is still running', async () => {
    const ticker = new ManualTicker();
    const gate = createGate();
    const runPull = vi.fn(() => gate.promise);
    const scheduler = new SyncScheduler(runPull, { ticker });

    const enabling = scheduler.enable();
    ticker.tick();
    ticker.tick();
    expect(runPull).toHaveBeenCalledTimes(1);

    gate.open();
    await enabling;
    ticker.tick();
    expect(runPull).toHaveBeenCalledTimes(2);
  });

  it('starts no pull after disable returns', async () => {
    const ticker = new ManualTicker();
    const runPull = vi.fn(async () => undefined);
    const scheduler = new SyncScheduler(runPull, { ticker });
    await scheduler.enable();

    scheduler.disable();
    ticker.tick();

    expect(ticker.cancelled).toBe(1);
    expect(runPull).toHaveBeenCalledTimes(1);
    expect(scheduler.getState()).toBe('idle');
  });

  it('lets an in-flight pull finish without rescheduling', async () => {
    const ticker = new ManualTicker();
    const gate = createGate();
    const scheduler = new SyncScheduler(() => gate.promise, { ticker });

    const enabling = scheduler.enable();
    scheduler.disable();
    gate.open();
    await enabling;

    expect(scheduler.getState()).toBe('idle');
    expect(scheduler.isEnabled).toBe(false);
  });

  it('keeps the cadence after a failed pull', async () => {
    const ticker = new ManualTicker();
    const runPull = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new RemoteSyncError('network', 'Remote pull failed: offline'))
      .mockResolvedValue(undefined);
    const scheduler = new SyncScheduler(runPull, { ticker });

    await expect(scheduler.enable()).resolves.toBeUndefined();
    expect(scheduler.getState()).toBe('scheduled');

    ticker.tick();
    await scheduler.idle();
    expect(runPull).toHaveBeenCalledTimes(2);
  });

  it('ignores a second enable', async () => {
    const ticker = new ManualTicker();
    const runPull = vi.fn(async () => undefined);
    const scheduler = new SyncScheduler(runPull, { ticker });

    await scheduler.enable();
    await scheduler.enable();

    expect(ticker.starts).toBe(1);
    expect(runPull).toHaveBeenCalledTimes(1);
  });

  describe('triggerSync', () => {
    it('is skipped while disabled', async () => {
      const runPull = vi.fn(async () => undefined);
      const scheduler = new SyncScheduler(runPull, { ticker: new ManualTicker() });

      await expect(scheduler.triggerSync()).resolves.toBe('skipped');
      expect(runPull).not.toHaveBeenCalled();
    });

    it('pulls immediately while enabled', async () => {
      const runPull = vi.fn(async () => undefined);
      const scheduler = new SyncScheduler(runPull, { ticker: new ManualTicker() });
      await scheduler.enable();

      await expect(scheduler.triggerSync()).resolves.toBe('completed');
      expect(runPull).toHaveBeenCalledTimes(2);
    });

    it('reports a failure without disabling sync', async () => {
      const runPull = vi
        .fn<() => Promise<void>>()
        .mockResolvedValueOnce(undefined)
        .mockRejectedValueOnce(new RemoteSyncError('auth', 'Not authorized'));
      const scheduler = new SyncScheduler(runPull, { ticker: new ManualTicker() });
      await scheduler.enable();

      await expect(scheduler.triggerSync()).resolves.toBe('failed');
      expect(scheduler.isEnabled).toBe(true);
    });
  });

  it('ticks on a real interval', async () => {
    vi.useFakeTimers();
    const runPull = vi.fn(async () => undefined);
    const scheduler = new SyncScheduler(runPull, { intervalMs: 60_000 });

    await scheduler.enable();
    await vi.advanceTimersByTimeAsync(60_000);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(runPull).toHaveBeenCalledTimes(3);

    scheduler.disable();
    await vi.advanceTimersByTimeAsync(180_000);
    expect(runPull).toHaveBeenCalledTimes(3);
  });
});
