import chalk from 'chalk';
import { parseRowNumber, statusColor } from '../format.js';
import { promptStatus } from '../prompts.js';
import { withEngine } from '../session.js';

export async function statusSetCommand(rowNumber: string, status?: string): Promise<void> {
  await withEngine(async engine => {
    const id = parseRowNumber(rowNumber);
    const record = engine.get(id);
    const next = status ?? await promptStatus(record.status);

    engine.update(id, 'status', next);

    const updated = engine.get(id);
    console.log(
      chalk.green(`\n  ✓ ${updated.company} (#${id + 1}) is now `) + statusColor(updated.status)(updated.status) + '\n'
    );
  });
}
