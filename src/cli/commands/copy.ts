import chalk from 'chalk';
import clipboardy from 'clipboardy';
import { formatRowsForClipboard } from '../../storage/records/index.js';
import { parseRowNumber } from '../format.js';
import { withEngine } from '../session.js';

export async function copyCommand(rowNumbers: string[]): Promise<void> {
  await withEngine(async engine => {
    const records = rowNumbers.map(parseRowNumber).map(id => engine.get(id));
    await clipboardy.write(formatRowsForClipboard(records));
    console.log(chalk.green(`\n  ✓ Copied ${records.length} row${records.length === 1 ? '' : 's'} to clipboard\n`));
  });
}
