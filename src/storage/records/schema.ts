import { z } from 'zod';

// Application statuses, in the order they are offered to the user
export const APPLICATION_STATUSES = ['Submitted', 'Rejected', 'Interview', 'Offer'] as const;

export const ApplicationStatus = z.enum(APPLICATION_STATUSES);
export type ApplicationStatusEnum = z.infer<typeof ApplicationStatus>;

export const DEFAULT_STATUS: ApplicationStatusEnum = 'Submitted';

/**
 * Column headers of the workbook and the remote sheet, in storage order.
 * The displayed "No" column is derived from position and never stored.
 */
export const TABLE_COLUMNS = [
  'Company',
  'Position',
  'Application Portal URL',
  'Date Applied',
  'Status',
] as const;

export type TableColumn = (typeof TABLE_COLUMNS)[number];

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for `YYYY-MM-DD` strings naming a real calendar day.
 */
export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

/**
 * Local calendar date as `YYYY-MM-DD`.
 */
export function formatCalendarDate(date: Date): string {
  const year = date.getFullYear().toString().padStart(4, '0');
  const month = (date.getMonth() + 1).toString().padStart(2, '0');
  const day = date.getDate().toString().padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export const CalendarDate = z
  .string()
  .trim()
  .refine(isCalendarDate, { message: 'Date must be a calendar date in YYYY-MM-DD form' });

// Record fields as stored; the id is derived from position
export const RecordFieldsSchema = z.object({
  company: z.string().trim().min(1, 'Company is required'),
  position: z.string().trim().min(1, 'Position is required'),
  portalUrl: z.string().trim(),
  dateApplied: CalendarDate,
  status: ApplicationStatus,
});

export type RecordFields = z.infer<typeof RecordFieldsSchema>;

export interface ApplicationRecord extends RecordFields {
  readonly id: number;
}

/**
 * Full, ordered copy of the record table at one instant.
 */
export type Snapshot = readonly ApplicationRecord[];

export type EditableField = keyof RecordFields;

// Maps each record field to its stored column header
export const FIELD_COLUMNS: Record<EditableField, TableColumn> = {
  company: 'Company',
  position: 'Position',
  portalUrl: 'Application Portal URL',
  dateApplied: 'Date Applied',
  status: 'Status',
};

/**
 * Input accepted by RecordStore.add; only company and position are required.
 */
export interface NewApplication {
  company: string;
  position: string;
  portalUrl?: string;
  dateApplied?: string;
  status?: string;
}

/**
 * Match a status case-insensitively ("interview" -> "Interview").
 */
export function parseStatus(value: string): ApplicationStatusEnum | null {
  const wanted = value.trim().toLowerCase();
  return APPLICATION_STATUSES.find(status => status.toLowerCase() === wanted) ?? null;
}

/**
 * Attach position-derived ids to a list of record fields.
 */
export function numberRecords(rows: readonly RecordFields[]): ApplicationRecord[] {
  return rows.map((row, index) => ({ ...row, id: index }));
}

/**
 * Strip ids and validate each row of a snapshot.
 */
export function validateSnapshot(snapshot: Snapshot): RecordFields[] {
  return snapshot.map(record => RecordFieldsSchema.parse({
    company: record.company,
    position: record.position,
    portalUrl: record.portalUrl,
    dateApplied: record.dateApplied,
    status: record.status,
  }));
}

/**
 * Convert a record into a row of cell values in column order.
 */
export function recordToRow(record: RecordFields): string[] {
  return [record.company, record.position, record.portalUrl, record.dateApplied, record.status];
}
