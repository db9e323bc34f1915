import chalk from 'chalk';
import { openPortalUrl } from '../openExternal.js';
import { parseRowNumber } from '../format.js';
import { withEngine } from '../session.js';

export async function openCommand(rowNumber: string): Promise<void> {
  await withEngine(async engine => {
    const record = engine.get(parseRowNumber(rowNumber));
    const url = await openPortalUrl(record.portalUrl);
    console.log(chalk.green(`\n  ✓ Opened ${url}\n`));
  });
}
