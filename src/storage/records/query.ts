import type {
  ApplicationRecord,
  ApplicationStatusEnum,
  EditableField,
  Snapshot,
} from './schema.js';

export type SortColumn = 'no' | EditableField;

export const SORT_COLUMNS: readonly SortColumn[] = [
  'no',
  'company',
  'position',
  'portalUrl',
  'dateApplied',
  'status',
];

export function isSortColumn(value: string): value is SortColumn {
  return SORT_COLUMNS.some(column => column === value);
}

/**
 * Predicate matching records that contain the term in any column,
 * case-insensitively. An empty term matches everything.
 */
export function matchesSearchTerm(term: string): (record: ApplicationRecord) => boolean {
  const needle = term.trim().toLowerCase();
  if (!needle) {
    return () => true;
  }

  return record =>
    [
      String(record.id + 1),
      record.company,
      record.position,
      record.portalUrl,
      record.dateApplied,
      record.status,
    ].some(value => value.toLowerCase().includes(needle));
}

export function hasStatus(status: ApplicationStatusEnum): (record: ApplicationRecord) => boolean {
  return record => record.status === status;
}

function sortValue(record: ApplicationRecord, column: SortColumn): string | number {
  if (column === 'no') {
    return record.id;
  }
  return record[column].toLowerCase();
}

/**
 * Return a sorted copy. The sort is stable, so ties keep table order.
 */
export function sortRecords(
  records: readonly ApplicationRecord[],
  column: SortColumn,
  descending = false
): ApplicationRecord[] {
  const direction = descending ? -1 : 1;

  return [...records].sort((a, b) => {
    const left = sortValue(a, column);
    const right = sortValue(b, column);

    if (typeof left === 'number' && typeof right === 'number') {
      return (left - right) * direction;
    }

    return String(left).localeCompare(String(right)) * direction;
  });
}

/**
 * Count applications per status. Every status is present, zero or not.
 */
export function summarizeByStatus(snapshot: Snapshot): Record<ApplicationStatusEnum, number> {
  const counts: Record<ApplicationStatusEnum, number> = {
    Submitted: 0,
    Rejected: 0,
    Interview: 0,
    Offer: 0,
  };

  for (const record of snapshot) {
    counts[record.status]++;
  }

  return counts;
}

/**
 * Number of applications submitted per day, oldest first.
 */
export function submissionsByDate(snapshot: Snapshot): Array<{ date: string; count: number }> {
  const counts = new Map<string, number>();

  for (const record of snapshot) {
    counts.set(record.dateApplied, (counts.get(record.dateApplied) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, count]) => ({ date, count }));
}

/**
 * Tab-separated text of rows, "No" first, one row per line.
 */
export function formatRowsForClipboard(records: readonly ApplicationRecord[]): string {
  return records
    .map(record =>
      [
        String(record.id + 1),
        record.company,
        record.position,
        record.portalUrl,
        record.dateApplied,
        record.status,
      ].join('\t')
    )
    .join('\n');
}
