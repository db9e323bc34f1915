import chalk from 'chalk';
import { APPLICATION_STATUSES, submissionsByDate, summarizeByStatus } from '../../storage/records/index.js';
import { formatBar, statusColor } from '../format.js';
import { withEngine } from '../session.js';

export async function statsCommand(): Promise<void> {
  await withEngine(engine => {
    const snapshot = engine.list();
    if (snapshot.length === 0) {
      console.log(chalk.yellow('\n  No applications yet.\n'));
      return;
    }

    const byStatus = summarizeByStatus(snapshot);
    const maxStatus = Math.max(...Object.values(byStatus));

    console.log(chalk.bold(`\n  Applications by status (${snapshot.length} total)\n`));
    for (const status of APPLICATION_STATUSES) {
      const count = byStatus[status];
      const share = Math.round((count / snapshot.length) * 100);
      const color = statusColor(status);
      console.log(`  ${color(status.padEnd(10))} ${String(count).padStart(4)}  ${chalk.gray(`${share}%`.padStart(4))}  ${color(formatBar(count, maxStatus))}`);
    }

    const byDate = submissionsByDate(snapshot);
    const maxDate = Math.max(...byDate.map(entry => entry.count));

    console.log(chalk.bold('\n  Submissions over time\n'));
    for (const { date, count } of byDate) {
      console.log(`  ${chalk.gray(date)} ${String(count).padStart(4)}  ${chalk.cyan(formatBar(count, maxDate))}`);
    }
    console.log('');
  });
}
