#!/usr/bin/env node

import path from 'path';
import dotenv from 'dotenv';
import { configureLogger, isLogLevel } from './logger.js';
import { resolveAppHome } from './config/configStore.js';
import { createProgram } from './cli/program.js';
import { startShell } from './cli/shell.js';
import { readPackageVersion } from './version.js';

dotenv.config();

const home = resolveAppHome();
const fileLevel = process.env.APPTRACK_LOG_LEVEL?.trim().toLowerCase() ?? 'info';

configureLogger({
  file: path.join(home, 'apptrack.log'),
  fileLevel: isLogLevel(fileLevel) ? fileLevel : 'info',
});

const VERSION = readPackageVersion();

const program = createProgram({
  version: VERSION,
  onShell: () => startShell(VERSION),
});

// No arguments: interactive shell
if (!process.argv.slice(2).length) {
  await startShell(VERSION);
} else {
  await program.parseAsync();
}
