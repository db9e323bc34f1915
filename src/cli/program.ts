import { Command } from 'commander';
import chalk from 'chalk';
import { configureLogger } from '../logger.js';
import {
  addCommand,
  configCommand,
  copyCommand,
  deleteCommand,
  editCommand,
  listCommand,
  openCommand,
  searchCommand,
  statsCommand,
  statusSetCommand,
  syncCommand,
} from './commands/index.js';
import type { AddOptions } from './commands/add.js';
import type { ListOptions } from './commands/list.js';

export interface ProgramOptions {
  version: string;
  /** Throw instead of exiting the process on parse errors and --help */
  interactive?: boolean;
  /** Runs the interactive shell; omitted inside the shell itself */
  onShell?: () => Promise<void>;
}

// ASCII art banner
export const BANNER = `
   █████╗ ██████╗ ██████╗ ████████╗██████╗  █████╗  ██████╗██╗  ██╗
  ██╔══██╗██╔══██╗██╔══██╗╚══██╔══╝██╔══██╗██╔══██╗██╔════╝██║ ██╔╝
  ███████║██████╔╝██████╔╝   ██║   ██████╔╝███████║██║     █████╔╝
  ██╔══██║██╔═══╝ ██╔═══╝    ██║   ██╔══██╗██╔══██║██║     ██╔═██╗
  ██║  ██║██║     ██║        ██║   ██║  ██║██║  ██║╚██████╗██║  ██╗
  ╚═╝  ╚═╝╚═╝     ╚═╝        ╚═╝   ╚═╝  ╚═╝╚═╝  ╚═╝ ╚═════╝╚═╝  ╚═╝
`;

export function createProgram(options: ProgramOptions): Command {
  const program = new Command();

  // Must precede .command() so subcommands inherit it
  if (options.interactive) {
    program.exitOverride();
  }

  program
    .name('apptrack')
    .description('Track job applications in a local workbook, optionally synced with Google Sheets')
    .version(options.version, '-v, --version', 'Show version number')
    .option('--verbose', 'Print info-level log messages')
    .hook('preAction', () => {
      if (program.opts<{ verbose?: boolean }>().verbose) {
        configureLogger({ consoleLevel: 'info' });
      }
    });

  if (!options.interactive) {
    program.addHelpText('before', chalk.cyan(BANNER));
  }

  program
    .command('add [company] [position]')
    .description('Record a new application (prompts for anything missing)')
    .option('-u, --url <url>', 'Application portal URL')
    .option('-d, --date <date>', 'Date applied (YYYY-MM-DD, default today)')
    .option('-s, --status <status>', 'Submitted, Rejected, Interview or Offer')
    .action(async (company: string | undefined, position: string | undefined, opts: AddOptions) => {
      await addCommand(company, position, opts);
    });

  program
    .command('list')
    .alias('ls')
    .description('List applications')
    .option('--sort <column>', 'Sort by no, company, position, url, date or status')
    .option('--desc', 'Sort descending')
    .option('--status <status>', 'Only show applications with this status')
    .action(async (opts: ListOptions) => {
      await listCommand(opts);
    });

  program
    .command('search <term>')
    .alias('find')
    .description('Find applications containing a term in any column')
    .option('-f, --fuzzy', 'Rank loose matches instead of substring search')
    .action(async (term: string, opts: { fuzzy?: boolean }) => {
      await searchCommand(term, opts);
    });

  program
    .command('edit <no> <field> <value>')
    .description('Change one field of an application')
    .action(async (no: string, field: string, value: string) => {
      await editCommand(no, field, value);
    });

  program
    .command('status-set <no> [status]')
    .alias('mark')
    .description('Set the status of an application')
    .action(async (no: string, status: string | undefined) => {
      await statusSetCommand(no, status);
    });

  program
    .command('delete <no...>')
    .alias('rm')
    .description('Delete applications by row number')
    .option('-f, --force', 'Skip confirmation')
    .action(async (nos: string[], opts: { force?: boolean }) => {
      await deleteCommand(nos, opts);
    });

  program
    .command('copy <no...>')
    .alias('cp')
    .description('Copy rows to the clipboard as tab-separated text')
    .action(async (nos: string[]) => {
      await copyCommand(nos);
    });

  program
    .command('open <no>')
    .description('Open the application portal in your browser')
    .action(async (no: string) => {
      await openCommand(no);
    });

  program
    .command('stats')
    .description('Show counts per status and submissions over time')
    .action(async () => {
      await statsCommand();
    });

  program
    .command('sync [action]')
    .description('Google Sheets sync: on, off, now, push or status')
    .action(async (action: string | undefined) => {
      await syncCommand(action);
    });

  program
    .command('config [key] [value]')
    .description('Show or change configuration')
    .action(async (key: string | undefined, value: string | undefined) => {
      await configCommand(key, value);
    });

  const onShell = options.onShell;
  if (onShell) {
    program
      .command('shell')
      .description('Start the interactive shell with background sync')
      .action(async () => {
        await onShell();
      });
  }

  return program;
}
