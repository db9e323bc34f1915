import chalk from 'chalk';
import { matchesSearchTerm } from '../../storage/records/index.js';
import { formatSearchResult, fuzzySearchRecords, getMatchQuality } from '../fuzzySearch.js';
import { withEngine } from '../session.js';
import { printRecords } from './list.js';

export async function searchCommand(term: string, options: { fuzzy?: boolean } = {}): Promise<void> {
  await withEngine(engine => {
    const total = engine.list().length;

    if (!options.fuzzy) {
      printRecords([...engine.filter(matchesSearchTerm(term))], total);
      return;
    }

    const results = fuzzySearchRecords(engine.list(), term);
    if (results.length === 0) {
      console.log(chalk.yellow(`\n  No applications match "${term}".\n`));
      return;
    }

    console.log(chalk.bold(`\n  Matches for "${term}" (${results.length})\n`));
    for (const result of results) {
      console.log(`  ${getMatchQuality(result.score)} ${formatSearchResult(result)}`);
    }
    console.log('');
  });
}
