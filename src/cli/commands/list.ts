import chalk from 'chalk';
import { ValidationError } from '../../errors.js';
import {
  hasStatus,
  parseStatus,
  sortRecords,
  type ApplicationRecord,
  type SortColumn,
} from '../../storage/records/index.js';
import { TABLE_RULE, formatRecordLine, formatTableHeader, parseFieldName } from '../format.js';
import { withEngine } from '../session.js';

export interface ListOptions {
  sort?: string;
  desc?: boolean;
  status?: string;
}

export function parseSortColumn(raw: string): SortColumn {
  const value = raw.trim().toLowerCase();
  if (value === 'no' || value === 'number' || value === '#') {
    return 'no';
  }
  return parseFieldName(raw);
}

/**
 * Print records as a table, or a hint when there is nothing to show.
 */
export function printRecords(records: readonly ApplicationRecord[], total: number): void {
  if (records.length === 0) {
    console.log(chalk.yellow('\n  No applications found.\n'));
    if (total === 0) {
      console.log(chalk.gray('  Use "apptrack add" to record your first application.\n'));
    }
    return;
  }

  console.log('');
  console.log(formatTableHeader());
  console.log(TABLE_RULE);
  for (const record of records) {
    console.log(formatRecordLine(record));
  }
  console.log(TABLE_RULE);
  const shown = records.length === total ? `${total}` : `${records.length} of ${total}`;
  console.log(chalk.gray(`  Showing ${shown} applications\n`));
}

export async function listCommand(options: ListOptions = {}): Promise<void> {
  await withEngine(engine => {
    let records: ApplicationRecord[];
    if (options.status) {
      const status = parseStatus(options.status);
      if (!status) {
        throw new ValidationError(`Unknown status "${options.status}"`, 'status');
      }
      records = [...engine.filter(hasStatus(status))];
    } else {
      records = [...engine.list()];
    }

    if (options.sort || options.desc) {
      records = sortRecords(records, parseSortColumn(options.sort ?? 'no'), options.desc ?? false);
    }

    printRecords(records, engine.list().length);
  });
}
