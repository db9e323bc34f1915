/**
 * Engine Tests
 *
 * The store, the workbook and an in-memory remote sheet wired together:
 * saves and pushes after mutations, pulls, and the sync switches.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { ConfigStore } from '../src/config/configStore.js';
import { TrackerEngine, type EngineEvent } from '../src/engine.js';
import { FileIOError, RemoteSyncError } from '../src/errors.js';
import { LocalPersistence } from '../src/storage/records/index.js';
import type { Ticker } from '../src/sync/index.js';
import {
  HEADER,
  InMemorySheetTable,
  cleanupTempDir,
  createGate,
  createSnapshot,
  createTempDir,
  flushMicrotasks,
} from './setup.js';

const ACME = ['Acme', 'Engineer', '', '2024-05-01', 'Submitted'];
const GLOBEX = ['Globex', 'Analyst', '', '2024-05-02', 'Interview'];
const INITECH = ['Initech', 'Developer', '', '2024-05-03', 'Offer'];
const NOW = 1_714_557_600_000;

class ManualTicker implements Ticker {
  cancelled = 0;
  private onTick: (() => void) | null = null;

  start(_intervalMs: number, onTick: () => void) {
    this.onTick = onTick;
    return {
      cancel: () => {
        this.cancelled++;
      },
    };
  }

  tick(): void {
    this.onTick?.();
  }
}

interface OpenOptions {
  sync?: boolean;
  spreadsheetId?: string;
  withTable?: boolean;
  dataFile?: string;
}

describe('TrackerEngine', () => {
  let home: string;
  let dataFile: string;
  let table: InMemorySheetTable;
  let ticker: ManualTicker;
  let events: EngineEvent[];
  let engine: TrackerEngine | null;

  async function openEngine(options: OpenOptions = {}): Promise<TrackerEngine> {
    const config = new ConfigStore(home);
    await config.load();
    await config.update({
      ENABLE_GOOGLE_SYNC: options.sync ?? false,
      SPREADSHEET_ID: options.spreadsheetId ?? 'sheet-test',
      DATA_FILE_PATH: options.dataFile ?? dataFile,
    });

    const opened = await TrackerEngine.open({
      config,
      sheetTable: options.withTable === false ? undefined : table,
      ticker,
      today: () => new Date(2024, 4, 1),
      now: () => NOW,
    });
    opened.subscribe(event => events.push(event));
    engine = opened;
    return opened;
  }

  beforeEach(async () => {
    home = await createTempDir();
    dataFile = path.join(home, 'Applications.xlsx');
    table = new InMemorySheetTable();
    ticker = new ManualTicker();
    events = [];
    engine = null;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await engine?.close();
    await cleanupTempDir(home);
  });

  it('saves every mutation to the workbook', async () => {
    const tracker = await openEngine();

    tracker.add({ company: 'Acme', position: 'Engineer' });
    tracker.update(0, 'status', 'Interview');
    await tracker.flush();

    await expect(new LocalPersistence(dataFile).load()).resolves.toEqual([
      { id: 0, company: 'Acme', position: 'Engineer', portalUrl: '', dateApplied: '2024-05-01', status: 'Interview' },
    ]);
    expect(table.readCount).toBe(0);
    expect(table.writes).toHaveLength(0);
  });

  it('adopts the remote table on open when sync is on', async () => {
    table.rows = [HEADER, ACME, GLOBEX];

    const tracker = await openEngine({ sync: true });
    await tracker.flush();

    expect(tracker.list().map(r => r.company)).toEqual(['Acme', 'Globex']);
    expect(tracker.getSyncState()).toMatchObject({ enabled: true, scheduler: 'scheduled', lastSyncTimestamp: NOW });
    expect(table.writes).toHaveLength(0);
    expect((await new LocalPersistence(dataFile).load()).map(r => r.company)).toEqual(['Acme', 'Globex']);
  });

  it('pushes the post-mutation table while sync is on', async () => {
    table.rows = [HEADER, ACME];
    const tracker = await openEngine({ sync: true });

    tracker.add({ company: 'Globex', position: 'Analyst', dateApplied: '2024-05-02', status: 'Interview' });
    await tracker.flush();

    expect(table.writes).toEqual([[HEADER, ACME, GLOBEX]]);
    expect(events).toContainEqual({ type: 'syncCompleted', operation: 'push', changed: false });
  });

  it('does not push back a table that came from the remote', async () => {
    table.rows = [HEADER, ACME];
    const tracker = await openEngine({ sync: true });
    table.rows = [HEADER, ACME, GLOBEX];

    await expect(tracker.triggerSync()).resolves.toBe('completed');
    await tracker.flush();

    expect(tracker.list().map(r => r.company)).toEqual(['Acme', 'Globex']);
    expect(events.flatMap(e => (e.type === 'changed' ? [e.reason] : []))).toEqual(['replace']);
    expect(table.writes).toHaveLength(0);
  });

  it('leaves the table alone when a pull matches it', async () => {
    await new LocalPersistence(dataFile).save(createSnapshot([{ company: 'Acme' }]));
    table.rows = [HEADER, ACME];
    const tracker = await openEngine({ sync: true });
    const revision = tracker.revision;
    const save = vi.spyOn(LocalPersistence.prototype, 'save');

    await expect(tracker.triggerSync()).resolves.toBe('completed');
    ticker.tick();
    await tracker.close();

    expect(table.readCount).toBe(3);
    expect(events.filter(e => e.type === 'changed')).toEqual([]);
    expect(events.filter(e => e.type === 'syncCompleted')).toEqual([
      { type: 'syncCompleted', operation: 'pull', changed: false },
      { type: 'syncCompleted', operation: 'pull', changed: false },
    ]);
    expect(tracker.revision).toBe(revision);
    expect(save).not.toHaveBeenCalled();
    expect(table.writes).toHaveLength(0);
  });

  it('keeps pushes in order when the remote settings change', async () => {
    table.rows = [HEADER, ACME];
    const tracker = await openEngine({ sync: true });
    const gate = createGate();
    table.writeGate = gate.promise;

    tracker.add({ company: 'Globex', position: 'Analyst', dateApplied: '2024-05-02', status: 'Interview' });
    await flushMicrotasks();
    await tracker.updateConfig({ SYNC_TIMEOUT_MS: 20_000 });
    table.writeGate = null;
    tracker.add({ company: 'Initech', position: 'Developer', dateApplied: '2024-05-03', status: 'Offer' });
    await flushMicrotasks();

    expect(table.writes).toHaveLength(0);
    expect(tracker.getSyncState().pendingRemote).toBe(2);

    gate.open();
    await tracker.flush();

    expect(table.writes.map(rows => rows.length)).toEqual([3, 4]);
    expect(table.rows).toEqual([HEADER, ACME, GLOBEX, INITECH]);
  });

  it('drops a pull that finishes after a local mutation', async () => {
    table.rows = [HEADER, ACME];
    const tracker = await openEngine({ sync: true });
    table.rows = [HEADER, INITECH];
    const gate = createGate();
    table.readGate = gate.promise;

    const syncing = tracker.triggerSync();
    tracker.add({ company: 'Globex', position: 'Analyst', dateApplied: '2024-05-02', status: 'Interview' });
    gate.open();

    await expect(syncing).resolves.toBe('completed');
    await tracker.flush();

    expect(tracker.list().map(r => r.company)).toEqual(['Acme', 'Globex']);
    expect(table.rows).toEqual([HEADER, ACME, GLOBEX]);
    expect(events).toContainEqual({ type: 'syncCompleted', operation: 'pull', changed: false });
  });

  it('pulls again on each tick', async () => {
    table.rows = [HEADER, ACME];
    const tracker = await openEngine({ sync: true });
    table.rows = [HEADER, GLOBEX];

    ticker.tick();
    await tracker.close();

    expect(table.readCount).toBe(2);
    expect(tracker.list().map(r => r.company)).toEqual(['Globex']);
  });

  it('keeps the local table when the remote sheet is empty', async () => {
    await new LocalPersistence(dataFile).save(createSnapshot([{ company: 'Acme' }]));

    const tracker = await openEngine({ sync: true });

    expect(table.readCount).toBe(1);
    expect(tracker.list().map(r => r.company)).toEqual(['Acme']);
    expect(table.writes).toHaveLength(0);
  });

  it('requires a spreadsheet id before enabling sync', async () => {
    const tracker = await openEngine({ spreadsheetId: '', withTable: false });

    const error = await tracker.enableSync().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemoteSyncError);
    expect(error instanceof RemoteSyncError && error.kind).toBe('config');
    expect(tracker.settings.get().ENABLE_GOOGLE_SYNC).toBe(false);
    expect(tracker.getSyncState()).toMatchObject({ enabled: false, configured: false });
  });

  it('stays local when sync is on but no spreadsheet is configured', async () => {
    const tracker = await openEngine({ sync: true, spreadsheetId: '', withTable: false });

    tracker.add({ company: 'Acme', position: 'Engineer' });
    await tracker.flush();

    expect(tracker.getSyncState()).toMatchObject({ enabled: false, scheduler: 'idle', configured: false });
    expect(tracker.list()).toHaveLength(1);
  });

  it('persists the sync flag when switching sync on and off', async () => {
    table.rows = [HEADER, ACME];
    const tracker = await openEngine();

    const enabled = await tracker.enableSync();
    expect(enabled).toMatchObject({ enabled: true, scheduler: 'scheduled' });
    expect(tracker.list().map(r => r.company)).toEqual(['Acme']);
    expect(tracker.settings.get().ENABLE_GOOGLE_SYNC).toBe(true);

    const disabled = await tracker.disableSync();
    expect(disabled).toMatchObject({ enabled: false, scheduler: 'idle' });
    expect(ticker.cancelled).toBe(1);

    tracker.add({ company: 'Globex', position: 'Analyst' });
    await tracker.flush();
    expect(table.writes).toHaveLength(0);

    const reloaded = new ConfigStore(home);
    await reloaded.load();
    expect(reloaded.get().ENABLE_GOOGLE_SYNC).toBe(false);
  });

  it('routes the sync flag in a config update through enableSync', async () => {
    table.rows = [HEADER, ACME];
    const tracker = await openEngine();

    const config = await tracker.updateConfig({ ENABLE_GOOGLE_SYNC: true, SHEET_NAME: 'Applications' });

    expect(config).toMatchObject({ ENABLE_GOOGLE_SYNC: true, SHEET_NAME: 'Applications' });
    expect(tracker.getSyncState().enabled).toBe(true);
    expect(table.readCount).toBe(1);
  });

  it('skips a manual sync while sync is off', async () => {
    const tracker = await openEngine();

    await expect(tracker.triggerSync()).resolves.toBe('skipped');
    expect(table.readCount).toBe(0);
  });

  it('pushes on demand while sync is off', async () => {
    const tracker = await openEngine();
    tracker.add({ company: 'Acme', position: 'Engineer' });

    await tracker.pushNow();

    expect(table.rows).toEqual([HEADER, ACME]);
    expect(tracker.getSyncState().lastSyncTimestamp).toBe(NOW);
  });

  it('reports a failed push and keeps sync on', async () => {
    table.rows = [HEADER, ACME];
    const tracker = await openEngine({ sync: true });
    table.failNextWrite = new Error('socket hang up');

    tracker.add({ company: 'Globex', position: 'Analyst' });
    await tracker.flush();

    const failures = events.flatMap(e => (e.type === 'syncFailed' ? [e] : []));
    expect(failures.map(f => [f.operation, f.error.kind])).toEqual([['push', 'network']]);
    expect(tracker.getSyncState()).toMatchObject({
      enabled: true,
      lastError: { operation: 'push', kind: 'network', at: NOW },
    });
    expect(tracker.list()).toHaveLength(2);
  });

  it('reports a failed save without undoing the change', async () => {
    await fs.writeFile(path.join(home, 'blocker'), 'not a directory');
    const tracker = await openEngine({ dataFile: path.join(home, 'blocker', 'Applications.xlsx') });

    tracker.add({ company: 'Acme', position: 'Engineer' });
    await tracker.flush();

    const failures = events.flatMap(e => (e.type === 'saveFailed' ? [e.error] : []));
    expect(failures).toHaveLength(1);
    expect(failures[0]).toBeInstanceOf(FileIOError);
    expect(tracker.list()).toHaveLength(1);
  });

  it('stops the timer on close but keeps the persisted flag', async () => {
    table.rows = [HEADER, ACME];
    const tracker = await openEngine({ sync: true });

    await tracker.close();
    await tracker.close();

    expect(tracker.getSyncState().scheduler).toBe('idle');
    expect(ticker.cancelled).toBe(1);
    expect(tracker.settings.get().ENABLE_GOOGLE_SYNC).toBe(true);
  });
});
