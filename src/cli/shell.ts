import chalk from 'chalk';
import readline from 'readline';
import fs from 'fs/promises';
import path from 'path';
import { CommanderError } from 'commander';
import { resolveAppHome } from '../config/configStore.js';
import type { EngineEvent, TrackerEngine } from '../engine.js';
import { describeError } from '../errors.js';
import { flushLogs, logger } from '../logger.js';
import { BANNER, createProgram } from './program.js';
import { openEngine, reportError, setSessionEngine } from './session.js';

const SHELL_PROMPT = chalk.cyan('apptrack') + chalk.gray('> ');

// Command history settings
const MAX_HISTORY = 100;
let commandHistory: string[] = [];

function historyFile(): string {
  return path.join(resolveAppHome(), 'history');
}

async function loadHistory(): Promise<void> {
  try {
    const data = await fs.readFile(historyFile(), 'utf-8');
    commandHistory = data.split('\n').filter(line => line.trim()).slice(-MAX_HISTORY);
  } catch (error) {
    logger.debug(`No shell history loaded: ${describeError(error)}`);
    commandHistory = [];
  }
}

async function saveHistory(): Promise<void> {
  try {
    await fs.mkdir(path.dirname(historyFile()), { recursive: true });
    await fs.writeFile(historyFile(), commandHistory.slice(-MAX_HISTORY).join('\n'), 'utf-8');
  } catch (error) {
    logger.warn(`Could not save shell history: ${describeError(error)}`);
  }
}

/**
 * Add command to history (avoid duplicates of last command)
 */
function addToHistory(command: string): void {
  const trimmed = command.trim();
  if (trimmed && trimmed !== commandHistory[commandHistory.length - 1]) {
    commandHistory.push(trimmed);
    if (commandHistory.length > MAX_HISTORY) {
      commandHistory = commandHistory.slice(-MAX_HISTORY);
    }
  }
}

function showHistory(count: number = 20): void {
  const history = commandHistory.slice(-count);

  if (history.length === 0) {
    console.log(chalk.yellow('\n  No command history yet.\n'));
    return;
  }

  console.log(chalk.bold(`\n  Command History (last ${history.length}):\n`));

  const startNum = commandHistory.length - history.length + 1;
  history.forEach((cmd, idx) => {
    const num = (startNum + idx).toString().padStart(4, ' ');
    console.log(`  ${chalk.gray(num)}  ${chalk.white(cmd)}`);
  });
  console.log('');
}

const SHELL_ONLY_COMMANDS = ['help', 'history', 'clear', 'exit', 'quit', 'q'];

/**
 * Split a shell line into arguments, honouring single and double quotes
 * so that `add "Acme Corp" "Data Engineer"` yields two arguments.
 */
export function splitCommandLine(input: string): string[] {
  const args: string[] = [];
  let current = '';
  let quote: '"' | "'" | null = null;
  let hasToken = false;

  for (const char of input) {
    if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === '"' || char === "'") {
      quote = char;
      hasToken = true;
    } else if (/\s/.test(char)) {
      if (hasToken) {
        args.push(current);
        current = '';
        hasToken = false;
      }
    } else {
      current += char;
      hasToken = true;
    }
  }

  if (hasToken) {
    args.push(current);
  }
  return args;
}

/**
 * Tab completion over command names and shell built-ins.
 */
export function createCompleter(commands: readonly string[]): (line: string) => [string[], string] {
  const candidates = [...commands, ...SHELL_ONLY_COMMANDS].sort();
  return (line: string) => {
    const lineLower = line.toLowerCase();
    const hits = candidates.filter(cmd => cmd.startsWith(lineLower));

    if (hits.length === 0) {
      return [[], line];
    }
    if (hits.length === 1 && hits[0] === lineLower) {
      return [[`${lineLower} `], line];
    }
    return [hits, line];
  };
}

function askQuestion(rl: readline.Interface, prompt: string): Promise<string> {
  return new Promise(resolve => {
    rl.question(prompt, answer => {
      resolve(answer);
    });
  });
}

function describeEvent(event: EngineEvent): string | null {
  switch (event.type) {
    case 'changed':
      return event.reason === 'replace'
        ? chalk.cyan(`  ↻ Applications updated from the remote sheet (${event.snapshot.length} rows).`)
        : null;
    case 'saveFailed':
      return chalk.red(`  ✗ ${event.error.message}`);
    case 'syncFailed':
    case 'syncCompleted':
      // RemoteSync logs failures itself
      return null;
  }
}

/**
 * Run one shell line through the same commander definitions as the CLI.
 * Returns false when the user asked to leave.
 */
async function executeLine(input: string, version: string): Promise<boolean> {
  const args = splitCommandLine(input);
  const cmd = args[0]?.toLowerCase();
  if (!cmd) {
    return true;
  }

  switch (cmd) {
    case 'exit':
    case 'quit':
    case 'q':
      return false;
    case 'clear':
    case 'cls':
      console.clear();
      return true;
    case 'history':
    case 'hist': {
      const count = Number(args[1]);
      showHistory(Number.isInteger(count) && count > 0 ? count : undefined);
      return true;
    }
    case 'shell':
      console.log(chalk.gray('\n  Already in the shell.\n'));
      return true;
  }

  const program = createProgram({ version, interactive: true });
  if (cmd === 'help') {
    program.outputHelp();
    console.log(chalk.gray('\n  Shell only: history [n], clear, exit\n'));
    return true;
  }

  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    // Commander has already printed usage errors, help and the version
    if (!(error instanceof CommanderError)) {
      reportError(error);
    }
  }
  return true;
}

/**
 * Start interactive shell
 */
export async function startShell(version: string): Promise<void> {
  console.log(chalk.cyan(BANNER));
  console.log(chalk.gray(`  v${version}\n`));

  let engine: TrackerEngine;
  try {
    engine = await openEngine();
  } catch (error) {
    reportError(error);
    return;
  }

  setSessionEngine(engine);
  const unsubscribe = engine.subscribe(event => {
    const message = describeEvent(event);
    if (message) {
      console.log(message);
    }
  });

  const sync = engine.getSyncState();
  console.log(chalk.gray(`  ${engine.list().length} applications loaded. Sync is ${sync.enabled ? 'on' : 'off'}.`));
  console.log(chalk.gray('  Type "help" for commands, "exit" to quit.\n'));

  await loadHistory();
  const completer = createCompleter(createProgram({ version, interactive: true }).commands.map(c => c.name()));

  let running = true;
  while (running) {
    // Fresh readline per prompt so inquirer can own stdin while a command runs
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      terminal: true,
      historySize: MAX_HISTORY,
      removeHistoryDuplicates: true,
      history: [...commandHistory].reverse(),
      completer,
    });
    const input = await askQuestion(rl, SHELL_PROMPT);
    rl.close();

    if (input.trim()) {
      addToHistory(input);
    }

    running = await executeLine(input, version);
  }

  unsubscribe();
  setSessionEngine(null);
  await engine.close();
  await saveHistory();
  await flushLogs();
  console.log(chalk.gray('\n  Goodbye!\n'));
}
