import { TableFormatError } from '../../errors.js';
import {
  DEFAULT_STATUS,
  RecordFieldsSchema,
  TABLE_COLUMNS,
  formatCalendarDate,
  isCalendarDate,
  parseStatus,
  recordToRow,
  type RecordFields,
  type TableColumn,
} from './schema.js';

export const HEADER_ROW: readonly string[] = TABLE_COLUMNS;

/**
 * Turn one raw cell into text. Missing cells become ''.
 */
export function normalizeCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value.trim();
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return String(value).trim();
}

/**
 * Bring common spreadsheet date renderings back to `YYYY-MM-DD`.
 * Values that cannot be read as a date are returned unchanged.
 */
export function normalizeDate(value: string): string {
  if (isCalendarDate(value)) return value;

  const prefixed = /^(\d{4}-\d{2}-\d{2})[ T]/.exec(value);
  if (prefixed?.[1] && isCalendarDate(prefixed[1])) {
    return prefixed[1];
  }

  if (value) {
    const parsed = new Date(value);
    if (!Number.isNaN(parsed.getTime())) {
      return formatCalendarDate(parsed);
    }
  }

  return value;
}

/**
 * Header row followed by one row per record.
 */
export function encodeTable(records: readonly RecordFields[]): string[][] {
  return [[...HEADER_ROW], ...records.map(recordToRow)];
}

function locateColumns(header: readonly string[]): Record<TableColumn, number> {
  const lowered = header.map(cell => cell.toLowerCase());
  const find = (column: TableColumn): number => lowered.indexOf(column.toLowerCase());

  const columns: Record<TableColumn, number> = {
    'Company': find('Company'),
    'Position': find('Position'),
    'Application Portal URL': find('Application Portal URL'),
    'Date Applied': find('Date Applied'),
    'Status': find('Status'),
  };

  if (columns.Company === -1 || columns.Position === -1) {
    throw new TableFormatError('Header row must contain "Company" and "Position" columns', 1);
  }

  return columns;
}

/**
 * Decode a table whose first row is the header. Columns are matched by name,
 * blank rows are skipped, an empty status falls back to the default, and any
 * row that still breaks a record invariant fails the whole table.
 */
export function decodeTable(rows: readonly (readonly unknown[])[]): RecordFields[] {
  const cells = rows.map(row => row.map(normalizeCell));
  const header = cells[0];
  if (!header || header.every(cell => cell === '')) {
    if (cells.slice(1).some(row => row.some(cell => cell !== ''))) {
      throw new TableFormatError('Missing header row', 1);
    }
    return [];
  }

  const columns = locateColumns(header);
  const cellAt = (row: readonly string[], column: TableColumn): string => {
    const index = columns[column];
    return index === -1 ? '' : row[index] ?? '';
  };

  const records: RecordFields[] = [];

  cells.slice(1).forEach((row, offset) => {
    if (row.every(cell => cell === '')) return;

    const rowNumber = offset + 2;
    const rawStatus = cellAt(row, 'Status');
    const status = rawStatus === '' ? DEFAULT_STATUS : parseStatus(rawStatus);
    if (!status) {
      throw new TableFormatError(`Unknown status "${rawStatus}"`, rowNumber);
    }

    const parsed = RecordFieldsSchema.safeParse({
      company: cellAt(row, 'Company'),
      position: cellAt(row, 'Position'),
      portalUrl: cellAt(row, 'Application Portal URL'),
      dateApplied: normalizeDate(cellAt(row, 'Date Applied')),
      status,
    });

    if (!parsed.success) {
      throw new TableFormatError(parsed.error.issues[0]?.message ?? 'Invalid record', rowNumber);
    }

    records.push(parsed.data);
  });

  return records;
}
