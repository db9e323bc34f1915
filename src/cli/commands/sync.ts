import chalk from 'chalk';
import ora from 'ora';
import type { SyncState, TrackerEngine } from '../../engine.js';
import { ValidationError, describeError } from '../../errors.js';
import { withEngine } from '../session.js';

export type SyncAction = 'on' | 'off' | 'now' | 'push' | 'status';

const SYNC_ACTIONS: readonly SyncAction[] = ['on', 'off', 'now', 'push', 'status'];

function parseSyncAction(raw: string | undefined): SyncAction {
  const value = (raw ?? 'status').trim().toLowerCase();
  const action = SYNC_ACTIONS.find(candidate => candidate === value);
  if (!action) {
    throw new ValidationError(`Unknown sync action "${raw}". Use on, off, now, push or status.`);
  }
  return action;
}

function formatTimestamp(timestamp: number | null): string {
  return timestamp === null ? 'never' : new Date(timestamp).toLocaleString();
}

export function printSyncState(state: SyncState, engine: TrackerEngine): void {
  const config = engine.settings.get();

  console.log(chalk.bold('\n  Google Sheets Sync\n'));
  console.log(`  ${chalk.gray('Sync:')}         ${state.enabled ? chalk.green('on') : chalk.yellow('off')}`);
  console.log(`  ${chalk.gray('Spreadsheet:')}  ${config.SPREADSHEET_ID || chalk.gray('<not configured>')}`);
  console.log(`  ${chalk.gray('Sheet:')}        ${config.SHEET_NAME}`);
  console.log(`  ${chalk.gray('Last sync:')}    ${formatTimestamp(state.lastSyncTimestamp)}`);
  if (state.lastError) {
    console.log(`  ${chalk.gray('Last error:')}   ${chalk.red(`[${state.lastError.operation}/${state.lastError.kind}] ${state.lastError.message}`)}`);
  }
  if (state.pendingRemote > 0) {
    console.log(`  ${chalk.gray('Pending:')}      ${state.pendingRemote} remote operation(s)`);
  }
  console.log('');
}

export async function syncCommand(rawAction?: string): Promise<void> {
  await withEngine(async engine => {
    const action = parseSyncAction(rawAction);

    switch (action) {
      case 'status':
        printSyncState(engine.getSyncState(), engine);
        return;

      case 'on': {
        const spinner = ora('Enabling sync and pulling the remote sheet...').start();
        try {
          const state = await engine.enableSync();
          if (state.lastError) {
            spinner.warn('Sync enabled, but the first pull failed');
            console.log(chalk.red(`  ${state.lastError.message}`));
          } else {
            spinner.succeed('Sync enabled');
          }
        } catch (error) {
          spinner.fail('Could not enable sync');
          throw error;
        }
        return;
      }

      case 'off':
        await engine.disableSync();
        console.log(chalk.green('\n  ✓ Sync disabled. Changes stay local.\n'));
        return;

      case 'now': {
        const spinner = ora('Pulling the remote sheet...').start();
        const result = await engine.triggerSync();
        if (result === 'completed') {
          spinner.succeed('Sync complete');
        } else if (result === 'skipped') {
          spinner.info('Sync is off. Run "apptrack sync on" first.');
        } else {
          spinner.fail('Sync failed');
          const { lastError } = engine.getSyncState();
          if (lastError) {
            console.log(chalk.red(`  ${lastError.message}`));
          }
        }
        return;
      }

      case 'push': {
        const spinner = ora('Uploading applications to the remote sheet...').start();
        try {
          await engine.pushNow();
          spinner.succeed(`Pushed ${engine.list().length} applications`);
        } catch (error) {
          spinner.fail('Push failed');
          console.log(chalk.red(`  ${describeError(error)}`));
        }
        return;
      }
    }
  });
}
