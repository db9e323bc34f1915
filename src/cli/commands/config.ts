import chalk from 'chalk';
import { CONFIG_KEYS, isConfigKey, parseConfigAssignment } from '../../config/configStore.js';
import { ValidationError } from '../../errors.js';
import { withEngine } from '../session.js';

function formatValue(value: string | number | boolean): string {
  if (typeof value === 'boolean') {
    return value ? chalk.green('true') : chalk.yellow('false');
  }
  if (value === '') {
    return chalk.gray('<empty>');
  }
  return String(value);
}

export async function configCommand(key?: string, value?: string): Promise<void> {
  await withEngine(async engine => {
    if (!key) {
      const config = engine.settings.get();
      console.log(chalk.bold('\n  Configuration\n'));
      for (const name of CONFIG_KEYS) {
        console.log(`  ${chalk.gray(name.padEnd(22))} ${formatValue(config[name])}`);
      }
      console.log('');
      return;
    }

    const name = key.trim().toUpperCase();
    if (!isConfigKey(name)) {
      throw new ValidationError(`Unknown config key "${key}". Known keys: ${CONFIG_KEYS.join(', ')}`);
    }

    if (value === undefined) {
      console.log(`\n  ${chalk.gray(name)} ${formatValue(engine.settings.get()[name])}\n`);
      return;
    }

    const updated = await engine.updateConfig(parseConfigAssignment(name, value));
    console.log(chalk.green(`\n  ✓ ${name} set to `) + formatValue(updated[name]) + '\n');
  });
}
