import { ConfigStore, resolveAppHome, type AppConfig, type ConfigReader } from './config/configStore.js';
import { ConfigCorruptError, RemoteSyncError, describeError } from './errors.js';
import { logger } from './logger.js';
import {
  LocalPersistence,
  RecordStore,
  type ApplicationRecord,
  type ChangeReason,
  type EditableField,
  type NewApplication,
  type Snapshot,
  type StoreChange,
} from './storage/records/index.js';
import { GoogleSheetTable, type SheetTable } from './storage/sheets/index.js';
import { SerialQueue } from './utils/serialQueue.js';
import {
  RemoteSync,
  SyncScheduler,
  type PullResult,
  type SchedulerState,
  type SyncErrorInfo,
  type SyncOperation,
  type Ticker,
  type TriggerResult,
} from './sync/index.js';

export type EngineEvent =
  | { type: 'changed'; reason: ChangeReason; snapshot: Snapshot; revision: number }
  | { type: 'saveFailed'; error: Error }
  | { type: 'syncFailed'; operation: SyncOperation; error: RemoteSyncError }
  | { type: 'syncCompleted'; operation: SyncOperation; changed: boolean };

export type EngineListener = (event: EngineEvent) => void;

export interface SyncState {
  enabled: boolean;
  scheduler: SchedulerState;
  /** True when a spreadsheet id is configured (or a table was injected) */
  configured: boolean;
  lastSyncTimestamp: number | null;
  lastError: SyncErrorInfo | null;
  pendingRemote: number;
}

export interface TrackerEngineOptions {
  /** Root for config and data; defaults to APPTRACK_HOME or ~/.apptrack */
  home?: string;
  /** A config store that has already been loaded */
  config?: ConfigStore;
  /** Stand-in for the Google Sheet, used instead of building one from config */
  sheetTable?: SheetTable;
  /** Arm the scheduler on open when ENABLE_GOOGLE_SYNC is set (default true) */
  startSync?: boolean;
  intervalMs?: number;
  ticker?: Ticker;
  today?: () => Date;
  now?: () => number;
}

function remoteKeyOf(config: Readonly<AppConfig>): string {
  return JSON.stringify([
    config.SPREADSHEET_ID,
    config.SHEET_NAME,
    config.SERVICE_ACCOUNT_FILE,
    config.SYNC_TIMEOUT_MS,
  ]);
}

/**
 * The one object the CLI talks to. Owns the record store and keeps the
 * workbook and the remote sheet in step with it.
 *
 * Every successful mutation queues a save of the post-mutation table and,
 * while sync is enabled, a push of the same table. A pulled table replaces the
 * local one only if no mutation landed while the pull was in flight; otherwise
 * the pending push of that mutation is the newer write and the pull is dropped.
 */
export class TrackerEngine {
  /** Set when the config file had to be reset on open */
  readonly configWarning: ConfigCorruptError | null;

  private readonly store: RecordStore;
  private readonly persistence: LocalPersistence;
  private readonly config: ConfigStore;
  private readonly scheduler: SyncScheduler;
  private readonly options: TrackerEngineOptions;
  private readonly listeners = new Set<EngineListener>();
  private readonly background = new Set<Promise<void>>();
  // Outlives any one RemoteSync, so a rebuilt client queues behind the old one
  private readonly remoteQueue = new SerialQueue();
  private remote: RemoteSync | null = null;
  private remoteKey = '';
  private closed = false;

  private constructor(
    store: RecordStore,
    persistence: LocalPersistence,
    config: ConfigStore,
    configWarning: ConfigCorruptError | null,
    options: TrackerEngineOptions
  ) {
    this.store = store;
    this.persistence = persistence;
    this.config = config;
    this.configWarning = configWarning;
    this.options = options;
    this.scheduler = new SyncScheduler(() => this.pullAndApply(), {
      intervalMs: options.intervalMs,
      ticker: options.ticker,
    });
    this.store.subscribe(change => this.onStoreChange(change));
  }

  /**
   * Load config and the local table, then start syncing if the config says so.
   */
  static async open(options: TrackerEngineOptions = {}): Promise<TrackerEngine> {
    let config = options.config;
    let warning: ConfigCorruptError | null = null;
    if (!config) {
      config = new ConfigStore(options.home ?? resolveAppHome());
      warning = await config.load();
    }

    const persistence = new LocalPersistence(config.get().DATA_FILE_PATH);
    const snapshot = await persistence.load();
    const store = new RecordStore(snapshot, { today: options.today });
    const engine = new TrackerEngine(store, persistence, config, warning, options);

    if ((options.startSync ?? true) && config.get().ENABLE_GOOGLE_SYNC) {
      if (engine.isRemoteConfigured()) {
        await engine.scheduler.enable();
      } else {
        logger.warn('Sync is on but no SPREADSHEET_ID is configured; working locally.');
      }
    }

    return engine;
  }

  get settings(): ConfigReader {
    return this.config;
  }

  // ---- reads ----

  /** Bumped by every change to the table */
  get revision(): number {
    return this.store.revision;
  }

  list(): Snapshot {
    return this.store.list();
  }

  get(id: number): ApplicationRecord {
    return this.store.get(id);
  }

  filter(predicate: (record: ApplicationRecord) => boolean): Generator<ApplicationRecord, void, undefined> {
    return this.store.filter(predicate);
  }

  // ---- mutations ----

  add(input: NewApplication): number {
    return this.store.add(input);
  }

  update(id: number, field: EditableField, value: string): void {
    this.store.update(id, field, value);
  }

  delete(ids: Iterable<number>): void {
    this.store.delete(ids);
  }

  // ---- sync ----

  async enableSync(): Promise<SyncState> {
    this.remoteFor();
    if (!this.config.get().ENABLE_GOOGLE_SYNC) {
      await this.config.update({ ENABLE_GOOGLE_SYNC: true });
    }
    await this.scheduler.enable();
    return this.getSyncState();
  }

  async disableSync(): Promise<SyncState> {
    this.scheduler.disable();
    if (this.config.get().ENABLE_GOOGLE_SYNC) {
      await this.config.update({ ENABLE_GOOGLE_SYNC: false });
    }
    return this.getSyncState();
  }

  triggerSync(): Promise<TriggerResult> {
    return this.scheduler.triggerSync();
  }

  /**
   * Overwrite the remote sheet with the local table right away, whether or
   * not periodic sync is on.
   */
  async pushNow(): Promise<void> {
    const remote = this.remoteFor();
    try {
      await remote.push(this.store.list());
      this.emit({ type: 'syncCompleted', operation: 'push', changed: false });
    } catch (error) {
      this.reportSyncFailure('push', error);
      throw error;
    }
  }

  getSyncState(): SyncState {
    const status = this.remote?.getStatus();
    return {
      enabled: this.scheduler.isEnabled,
      scheduler: this.scheduler.getState(),
      configured: this.isRemoteConfigured(),
      lastSyncTimestamp: status?.lastSyncTimestamp ?? null,
      lastError: status?.lastError ?? null,
      pendingRemote: this.remoteQueue.size,
    };
  }

  /**
   * Persist config changes. Sync on/off goes through enableSync/disableSync;
   * a new data file path applies from the next start.
   */
  async updateConfig(patch: Partial<AppConfig>): Promise<Readonly<AppConfig>> {
    const { ENABLE_GOOGLE_SYNC: syncFlag, ...rest } = patch;

    if (Object.keys(rest).length > 0) {
      await this.config.update(rest);
    }
    if (rest.DATA_FILE_PATH !== undefined && rest.DATA_FILE_PATH !== this.persistence.filePath) {
      logger.info(`Data file changed to ${rest.DATA_FILE_PATH}; it will be used from the next start.`);
    }

    if (syncFlag === true) {
      await this.enableSync();
    } else if (syncFlag === false) {
      await this.disableSync();
    }
    return this.config.get();
  }

  // ---- lifecycle ----

  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Resolves once every save and remote operation queued so far has settled.
   */
  async flush(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
    await this.persistence.flush();
    await this.remoteQueue.onIdle();
  }

  /**
   * Stop the timer without touching the persisted sync flag, then drain.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.scheduler.disable();
    await this.scheduler.idle();
    await this.flush();
  }

  // ---- internals ----

  private isRemoteConfigured(): boolean {
    return this.options.sheetTable !== undefined || this.config.get().SPREADSHEET_ID.trim() !== '';
  }

  private remoteFor(): RemoteSync {
    const config = this.config.get();
    const key = remoteKeyOf(config);
    if (this.remote && this.remoteKey === key) {
      return this.remote;
    }

    if (!this.isRemoteConfigured()) {
      throw new RemoteSyncError('config', 'No SPREADSHEET_ID configured. Set one with: apptrack config SPREADSHEET_ID <id>');
    }

    const table =
      this.options.sheetTable ??
      new GoogleSheetTable({
        spreadsheetId: config.SPREADSHEET_ID.trim(),
        sheetName: config.SHEET_NAME,
        serviceAccountFile: config.SERVICE_ACCOUNT_FILE,
        timeoutMs: config.SYNC_TIMEOUT_MS,
      });

    this.remote = new RemoteSync(table, {
      timeoutMs: config.SYNC_TIMEOUT_MS,
      now: this.options.now,
      queue: this.remoteQueue,
    });
    this.remoteKey = key;
    return this.remote;
  }

  private async pullAndApply(): Promise<void> {
    let remote: RemoteSync;
    try {
      remote = this.remoteFor();
    } catch (error) {
      logger.error(`Sync pull skipped: ${describeError(error)}`);
      this.reportSyncFailure('pull', error);
      throw error;
    }

    const revisionAtStart = this.store.revision;
    let result: PullResult;
    try {
      result = await remote.pull(() => this.store.list());
    } catch (error) {
      this.reportSyncFailure('pull', error);
      throw error;
    }

    let applied = false;
    if (result.changed) {
      if (this.store.revision !== revisionAtStart) {
        logger.info('Local table changed while pulling; keeping local changes.');
      } else {
        this.store.replace(result.snapshot);
        applied = true;
      }
    }
    this.emit({ type: 'syncCompleted', operation: 'pull', changed: applied });
  }

  private onStoreChange(change: StoreChange): void {
    this.emit({ type: 'changed', reason: change.reason, snapshot: change.snapshot, revision: change.revision });

    this.track(
      this.persistence.save(change.snapshot).catch((error: unknown) => {
        logger.error(describeError(error));
        this.emit({ type: 'saveFailed', error: error instanceof Error ? error : new Error(String(error)) });
      })
    );

    // A replace came from the remote; pushing it back would be an echo
    if (change.reason !== 'replace' && this.scheduler.isEnabled) {
      this.schedulePush(change.snapshot);
    }
  }

  private schedulePush(snapshot: Snapshot): void {
    let remote: RemoteSync;
    try {
      remote = this.remoteFor();
    } catch (error) {
      logger.error(`Sync push skipped: ${describeError(error)}`);
      this.reportSyncFailure('push', error);
      return;
    }

    this.track(
      remote.push(snapshot).then(
        () => this.emit({ type: 'syncCompleted', operation: 'push', changed: false }),
        (error: unknown) => this.reportSyncFailure('push', error)
      )
    );
  }

  private reportSyncFailure(operation: SyncOperation, error: unknown): void {
    const failure =
      error instanceof RemoteSyncError
        ? error
        : new RemoteSyncError('network', `Remote ${operation} failed: ${describeError(error)}`, error);
    this.emit({ type: 'syncFailed', operation, error: failure });
  }

  private track(task: Promise<void>): void {
    this.background.add(task);
    void task.finally(() => {
      this.background.delete(task);
    });
  }

  private emit(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error(`Engine listener failed: ${describeError(error)}`);
      }
    }
  }
}
