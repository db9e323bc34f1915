import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const CONSOLE_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

interface LoggerSettings {
  file: string | null;
  fileLevel: LogThreshold;
  consoleLevel: LogThreshold;
}

let settings: LoggerSettings = {
  file: null,
  fileLevel: 'debug',
  consoleLevel: 'warn',
};

// Appends are chained so lines land in the file in call order
let writeChain: Promise<void> = Promise.resolve();
let fileSinkBroken = false;

export function isLogLevel(value: string): value is LogThreshold {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Point the logger at a log file and/or change its thresholds.
 */
export function configureLogger(patch: Partial<LoggerSettings>): void {
  settings = { ...settings, ...patch };
  fileSinkBroken = false;
}

/**
 * Format a log line as `2024-05-01T10:00:00.000Z - INFO - message`.
 */
export function formatLogLine(level: LogLevel, message: string, at: Date = new Date()): string {
  return `${at.toISOString()} - ${level.toUpperCase()} - ${message}`;
}

function enabled(level: LogLevel, threshold: LogThreshold): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function appendToFile(file: string, line: string): void {
  writeChain = writeChain.then(async () => {
    if (fileSinkBroken) return;
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.appendFile(file, line + '\n', 'utf-8');
    } catch (error) {
      fileSinkBroken = true;
      const reason = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`  Log file ${file} is not writable (${reason}); file logging disabled.`));
    }
  });
}

function write(level: LogLevel, message: string): void {
  const line = formatLogLine(level, message);

  if (settings.file && enabled(level, settings.fileLevel)) {
    appendToFile(settings.file, line);
  }

  if (enabled(level, settings.consoleLevel)) {
    const text = CONSOLE_COLORS[level](`  ${message}`);
    if (level === 'error' || level === 'warn') {
      console.error(text);
    } else {
      console.log(text);
    }
  }
}

export const logger = {
  debug: (message: string): void => write('debug', message),
  info: (message: string): void => write('info', message),
  warn: (message: string): void => write('warn', message),
  error: (message: string): void => write('error', message),
};

/**
 * Resolves once every queued file append has been attempted.
 */
export function flushLogs(): Promise<void> {
  return writeChain;
}
