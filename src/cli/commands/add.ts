import chalk from 'chalk';
import { promptApplication } from '../prompts.js';
import { formatRecordDetails } from '../format.js';
import { withEngine } from '../session.js';

export interface AddOptions {
  url?: string;
  date?: string;
  status?: string;
}

export async function addCommand(company?: string, position?: string, options: AddOptions = {}): Promise<void> {
  // Prompt for whatever was not given on the command line
  const input = company && position
    ? { company, position, portalUrl: options.url, dateApplied: options.date, status: options.status }
    : await promptApplication({ company, position, portalUrl: options.url, dateApplied: options.date });

  await withEngine(engine => {
    const id = engine.add(input);
    console.log(chalk.green(`\n  ✓ Added application #${id + 1}\n`));
    for (const line of formatRecordDetails(engine.get(id))) {
      console.log(line);
    }
    console.log('');
  });
}
