/**
 * Sync module exports
 */

export {
  type SyncDecision,
  snapshotsEqual,
  resolve,
  calculateSnapshotChecksum,
} from './conflictResolver.js';
export {
  DEFAULT_SYNC_TIMEOUT_MS,
  RemoteSync,
  classifyRemoteError,
  type SyncOperation,
  type SyncErrorInfo,
  type RemoteStatus,
  type PullResult,
  type RemoteSyncOptions,
} from './remoteSync.js';
export {
  SYNC_INTERVAL_MS,
  SyncScheduler,
  intervalTicker,
  type SchedulerState,
  type TriggerResult,
  type Ticker,
  type TickerHandle,
  type SyncSchedulerOptions,
} from './scheduler.js';
