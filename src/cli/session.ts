import chalk from 'chalk';
import ora from 'ora';
import { TrackerEngine } from '../engine.js';
import { NotFoundError, TrackerError, ValidationError, describeError } from '../errors.js';

let sessionEngine: TrackerEngine | null = null;

/**
 * Share one engine between commands for the lifetime of the interactive shell.
 */
export function setSessionEngine(engine: TrackerEngine | null): void {
  sessionEngine = engine;
}

/**
 * Open the engine with a spinner, surfacing a reset config as a warning.
 */
export async function openEngine(): Promise<TrackerEngine> {
  const spinner = ora('Loading applications...').start();
  try {
    const engine = await TrackerEngine.open();
    spinner.stop();
    if (engine.configWarning) {
      console.log(chalk.yellow(`\n  ⚠ ${engine.configWarning.message}\n`));
    }
    return engine;
  } catch (error) {
    spinner.fail('Failed to load applications');
    throw error;
  }
}

/**
 * Run a command against the shell's engine, or against a freshly opened one
 * that is drained and closed afterwards.
 */
export async function withEngine(task: (engine: TrackerEngine) => Promise<void> | void): Promise<void> {
  if (sessionEngine) {
    try {
      await task(sessionEngine);
    } catch (error) {
      reportError(error);
    }
    return;
  }

  let engine: TrackerEngine;
  try {
    engine = await openEngine();
  } catch (error) {
    reportError(error);
    return;
  }

  try {
    await task(engine);
  } catch (error) {
    reportError(error);
  } finally {
    await engine.close();
  }
}

/**
 * Print a command failure in red. Bad input exits non-zero.
 */
export function reportError(error: unknown): void {
  console.log(chalk.red(`\n  ✗ ${describeError(error)}\n`));
  // Remote and file failures are reported but leave the local command successful
  if (error instanceof ValidationError || error instanceof NotFoundError || !(error instanceof TrackerError)) {
    process.exitCode = 1;
  }
}
