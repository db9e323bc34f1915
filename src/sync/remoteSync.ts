import { RemoteSyncError, TableFormatError, describeError, type RemoteErrorKind } from '../errors.js';
import { logger } from '../logger.js';
import {
  decodeTable,
  encodeTable,
  numberRecords,
  validateSnapshot,
  type Snapshot,
} from '../storage/records/index.js';
import type { SheetTable } from '../storage/sheets/index.js';
import { SerialQueue, withDeadline } from '../utils/serialQueue.js';
import { calculateSnapshotChecksum, resolve, type SyncDecision } from './conflictResolver.js';

export const DEFAULT_SYNC_TIMEOUT_MS = 15_000;

export type SyncOperation = 'pull' | 'push';

export interface SyncErrorInfo {
  operation: SyncOperation;
  kind: RemoteErrorKind;
  message: string;
  at: number;
}

export interface RemoteStatus {
  lastSyncTimestamp: number | null;
  lastError: SyncErrorInfo | null;
}

export interface PullResult {
  snapshot: Snapshot;
  changed: boolean;
  decision: SyncDecision;
}

export interface RemoteSyncOptions {
  timeoutMs?: number;
  now?: () => number;
  /** Queue shared with earlier instances that talk to the same sheet */
  queue?: SerialQueue;
}

function readNumber(source: object, key: string): number | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'number' ? value : undefined;
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;

  const direct = readNumber(error, 'status');
  if (direct !== undefined) return direct;

  const response: unknown = Reflect.get(error, 'response');
  if (typeof response === 'object' && response !== null) {
    return readNumber(response, 'status');
  }
  return undefined;
}

/**
 * Map a failure from the remote table into the sync error taxonomy.
 */
export function classifyRemoteError(operation: SyncOperation, error: unknown): RemoteSyncError {
  if (error instanceof RemoteSyncError) {
    return error;
  }

  const message = describeError(error);

  if (error instanceof TableFormatError) {
    return new RemoteSyncError('malformed', `Remote sheet is malformed: ${message}`, error);
  }

  const status = httpStatusOf(error);
  if (status === 401 || status === 403 || /invalid_grant|unauthorized|permission/i.test(message)) {
    return new RemoteSyncError('auth', `Not authorized to ${operation} the remote sheet: ${message}`, error);
  }

  const code = typeof error === 'object' && error !== null ? readString(error, 'code') : undefined;
  if (code === 'ENOENT') {
    return new RemoteSyncError('config', `Credentials file not found: ${message}`, error);
  }
  if (code === 'ETIMEDOUT' || code === 'ECONNABORTED' || /timeout/i.test(message)) {
    return new RemoteSyncError('timeout', `Remote ${operation} timed out: ${message}`, error);
  }

  return new RemoteSyncError('network', `Remote ${operation} failed: ${message}`, error);
}

/**
 * Whole-snapshot pull and push against a remote sheet.
 *
 * All remote calls go through one serial queue, so pushes land in the order
 * they were issued and a pull never overlaps a push. Every call is bounded by
 * a timeout that aborts the request; a call that outlives its timeout still
 * holds the queue until it has finished. Failures are logged and recorded in
 * the status, then rethrown to the caller; they never switch synchronization
 * off.
 */
export class RemoteSync {
  private readonly table: SheetTable;
  private readonly worker: SerialQueue;
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private status: RemoteStatus = { lastSyncTimestamp: null, lastError: null };

  constructor(table: SheetTable, options: RemoteSyncOptions = {}) {
    this.table = table;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.worker = options.queue ?? new SerialQueue();
  }

  getStatus(): RemoteStatus {
    return { ...this.status };
  }

  /**
   * Number of remote operations queued or running.
   */
  get pending(): number {
    return this.worker.size;
  }

  /**
   * Fetch the remote table and compare it with the local table as it stands
   * once the fetch completes. An empty remote sheet is never adopted.
   */
  pull(currentLocal: () => Snapshot): Promise<PullResult> {
    return this.schedule<PullResult>('pull', async signal => {
      const rows = await this.table.readRows(signal);
      const remote = numberRecords(decodeTable(rows));
      const local = currentLocal();

      if (remote.length === 0 && local.length > 0) {
        logger.info(`Remote ${this.table.description} is empty; keeping the local table.`);
        return { snapshot: remote, changed: false, decision: 'NoChange' };
      }

      const decision = resolve(local, remote);
      if (decision === 'AdoptRemote') {
        logger.info(
          `Remote table changed (${calculateSnapshotChecksum(local)} -> ${calculateSnapshotChecksum(remote)}); ` +
            `${remote.length} applications fetched.`
        );
      } else {
        logger.debug('Remote table matches the local table.');
      }

      return { snapshot: remote, changed: decision === 'AdoptRemote', decision };
    });
  }

  /**
   * Overwrite the remote table with the given snapshot.
   */
  push(snapshot: Snapshot): Promise<void> {
    return this.schedule('push', async signal => {
      const rows = encodeTable(validateSnapshot(snapshot));
      await this.table.writeRows(rows, signal);
      logger.info(`Pushed ${snapshot.length} applications to ${this.table.description}.`);
    });
  }

  /**
   * Resolves once every queued remote operation has settled.
   */
  idle(): Promise<void> {
    return this.worker.onIdle();
  }

  private schedule<T>(operation: SyncOperation, task: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return this.worker.enqueueUntilSettled(() => {
      const attempt = withDeadline(
        task,
        this.timeoutMs,
        () => new RemoteSyncError('timeout', `Remote ${operation} timed out after ${this.timeoutMs} ms`)
      );
      return { result: this.track(operation, attempt.result), settled: attempt.settled };
    });
  }

  private async track<T>(operation: SyncOperation, result: Promise<T>): Promise<T> {
    try {
      const value = await result;
      this.status = { lastSyncTimestamp: this.now(), lastError: null };
      return value;
    } catch (error) {
      const failure = classifyRemoteError(operation, error);
      this.status = {
        ...this.status,
        lastError: { operation, kind: failure.kind, message: failure.message, at: this.now() },
      };
      logger.error(`Sync ${operation} failed [${failure.kind}]: ${failure.message}`);
      throw failure;
    }
  }
}
