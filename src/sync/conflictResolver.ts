/**
 * Snapshot Conflict Resolution
 *
 * Decides whether a pulled remote table supersedes the local one. The policy
 * is whole-snapshot: a remote table that differs in any way replaces the local
 * table in full. There is no per-row merge, so two clients editing different
 * rows between syncs will lose one side's edits (last whole write wins).
 */

import crypto from 'crypto';
import type { ApplicationRecord, Snapshot } from '../storage/records/index.js';

export type SyncDecision = 'NoChange' | 'AdoptRemote';

function recordsEqual(a: ApplicationRecord, b: ApplicationRecord): boolean {
  return (
    a.company === b.company &&
    a.position === b.position &&
    a.portalUrl === b.portalUrl &&
    a.dateApplied === b.dateApplied &&
    a.status === b.status
  );
}

/**
 * Same records, same order, identical field values. Ids follow from order.
 */
export function snapshotsEqual(local: Snapshot, remote: Snapshot): boolean {
  if (local.length !== remote.length) {
    return false;
  }

  for (let i = 0; i < local.length; i++) {
    const left = local[i];
    const right = remote[i];
    if (!left || !right || !recordsEqual(left, right)) {
      return false;
    }
  }

  return true;
}

/**
 * A pull is remote-authoritative: any difference means adopt the remote table.
 */
export function resolve(local: Snapshot, remote: Snapshot): SyncDecision {
  return snapshotsEqual(local, remote) ? 'NoChange' : 'AdoptRemote';
}

/**
 * Short content hash of a snapshot, used to identify tables in log lines.
 */
export function calculateSnapshotChecksum(snapshot: Snapshot): string {
  const content = JSON.stringify(
    snapshot.map(record => [
      record.company,
      record.position,
      record.portalUrl,
      record.dateApplied,
      record.status,
    ])
  );

  return crypto.createHash('sha256').update(content).digest('hex').substring(0, 16);
}
