import chalk from 'chalk';
import { formatRecordLine, parseRowNumber } from '../format.js';
import { promptConfirm } from '../prompts.js';
import { withEngine } from '../session.js';

export async function deleteCommand(rowNumbers: string[], options: { force?: boolean } = {}): Promise<void> {
  await withEngine(async engine => {
    const ids = [...new Set(rowNumbers.map(parseRowNumber))].sort((a, b) => a - b);
    // Resolve every row first so a bad number deletes nothing
    const records = ids.map(id => engine.get(id));

    if (!options.force) {
      console.log('');
      for (const record of records) {
        console.log(formatRecordLine(record));
      }
      console.log('');
      const label = records.length === 1 ? 'this application' : `these ${records.length} applications`;
      if (!await promptConfirm(`Delete ${label}?`)) {
        console.log(chalk.gray('\n  Cancelled.\n'));
        return;
      }
    }

    engine.delete(ids);
    console.log(chalk.green(`\n  ✓ Deleted ${ids.length} application${ids.length === 1 ? '' : 's'}`));
    console.log(chalk.gray('  Remaining applications have been renumbered.\n'));
  });
}
