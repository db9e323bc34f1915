import chalk from 'chalk';
import { ValidationError } from '../errors.js';
import type { ApplicationRecord, ApplicationStatusEnum, EditableField } from '../storage/records/index.js';

const FIELD_ALIASES: Record<string, EditableField> = {
  company: 'company',
  position: 'position',
  role: 'position',
  url: 'portalUrl',
  portal: 'portalUrl',
  portalurl: 'portalUrl',
  'application portal url': 'portalUrl',
  date: 'dateApplied',
  dateapplied: 'dateApplied',
  'date applied': 'dateApplied',
  status: 'status',
};

/**
 * Convert a 1-based row number typed by the user into a record id.
 */
export function parseRowNumber(raw: string): number {
  const value = raw.trim();
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new ValidationError(`Invalid row number "${raw}". Use the No. column from "list".`);
  }
  return Number(value) - 1;
}

/**
 * Resolve a field name as typed on the command line ("url", "Date Applied", ...).
 */
export function parseFieldName(raw: string): EditableField {
  const field = FIELD_ALIASES[raw.trim().toLowerCase().replace(/[_-]/g, ' ').replace(/\s+/g, ' ')];
  if (!field) {
    throw new ValidationError(`Unknown field "${raw}". Use company, position, url, date or status.`, 'field');
  }
  return field;
}

export function statusColor(status: ApplicationStatusEnum): (text: string) => string {
  switch (status) {
    case 'Offer': return chalk.green;
    case 'Interview': return chalk.cyan;
    case 'Rejected': return chalk.red;
    case 'Submitted': return chalk.yellow;
  }
}

function fit(text: string, width: number): string {
  return text.length > width ? text.substring(0, width - 3) + '...' : text.padEnd(width);
}

export const TABLE_RULE = chalk.gray('  ' + '─'.repeat(78));

export function formatTableHeader(): string {
  return chalk.bold(
    `  ${'No.'.padStart(4)}  ${'Company'.padEnd(22)}  ${'Position'.padEnd(22)}  ${'Applied'.padEnd(10)}  Status`
  );
}

export function formatRecordLine(record: ApplicationRecord): string {
  const num = `${record.id + 1}.`.padStart(4);
  return (
    `  ${chalk.gray(num)}  ${chalk.cyan(fit(record.company, 22))}  ${fit(record.position, 22)}  ` +
    `${chalk.gray(record.dateApplied.padEnd(10))}  ${statusColor(record.status)(record.status)}`
  );
}

/**
 * Multi-line view of one record, used after add/edit.
 */
export function formatRecordDetails(record: ApplicationRecord): string[] {
  return [
    `  ${chalk.gray('No.:')}      ${record.id + 1}`,
    `  ${chalk.gray('Company:')}  ${chalk.cyan(record.company)}`,
    `  ${chalk.gray('Position:')} ${record.position}`,
    `  ${chalk.gray('Portal:')}   ${record.portalUrl || chalk.gray('-')}`,
    `  ${chalk.gray('Applied:')}  ${record.dateApplied}`,
    `  ${chalk.gray('Status:')}   ${statusColor(record.status)(record.status)}`,
  ];
}

/**
 * Horizontal bar scaled against the largest value.
 */
export function formatBar(value: number, max: number, width: number = 30): string {
  if (max <= 0 || value <= 0) return '';
  return '█'.repeat(Math.max(1, Math.round((value / max) * width)));
}
