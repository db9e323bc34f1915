import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { ConfigCorruptError, FileIOError, ValidationError, describeError } from '../errors.js';
import { logger } from '../logger.js';

export const CONFIG_FILE_NAME = 'app_config.json';

/**
 * Root directory for config, data and logs: APPTRACK_HOME or ~/.apptrack.
 */
export function resolveAppHome(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.APPTRACK_HOME?.trim();
  return fromEnv ? path.resolve(fromEnv) : path.join(os.homedir(), '.apptrack');
}

export function configFilePath(home: string): string {
  return path.join(home, 'config', CONFIG_FILE_NAME);
}

export const AppConfigSchema = z.object({
  ENABLE_GOOGLE_SYNC: z.boolean(),
  SERVICE_ACCOUNT_FILE: z.string(),
  SPREADSHEET_ID: z.string(),
  DATA_FILE_PATH: z.string().min(1, 'DATA_FILE_PATH cannot be empty'),
  SHEET_NAME: z.string().min(1, 'SHEET_NAME cannot be empty'),
  SYNC_TIMEOUT_MS: z.number().int().positive(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ConfigKey = keyof AppConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = AppConfigSchema.keyof().options;

export function isConfigKey(value: string): value is ConfigKey {
  return AppConfigSchema.keyof().safeParse(value).success;
}

export function defaultConfig(home: string): AppConfig {
  return {
    ENABLE_GOOGLE_SYNC: false,
    SERVICE_ACCOUNT_FILE: path.join(home, 'config', 'service_account.json'),
    SPREADSHEET_ID: '',
    DATA_FILE_PATH: path.join(home, 'Data', 'Applications.xlsx'),
    SHEET_NAME: 'Sheet1',
    SYNC_TIMEOUT_MS: 15_000,
  };
}

/**
 * Turn a command-line `key value` pair into a typed config patch.
 */
export function parseConfigAssignment(key: ConfigKey, raw: string): Partial<AppConfig> {
  const value = raw.trim();

  switch (key) {
    case 'ENABLE_GOOGLE_SYNC': {
      const lowered = value.toLowerCase();
      if (['true', 'on', 'yes', '1'].includes(lowered)) return { ENABLE_GOOGLE_SYNC: true };
      if (['false', 'off', 'no', '0'].includes(lowered)) return { ENABLE_GOOGLE_SYNC: false };
      throw new ValidationError(`${key} must be true or false`, key);
    }
    case 'SYNC_TIMEOUT_MS': {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ValidationError(`${key} must be a positive whole number of milliseconds`, key);
      }
      return { SYNC_TIMEOUT_MS: parsed };
    }
    case 'SERVICE_ACCOUNT_FILE':
      return { SERVICE_ACCOUNT_FILE: value ? path.resolve(value) : value };
    case 'DATA_FILE_PATH':
      return { DATA_FILE_PATH: value ? path.resolve(value) : value };
    case 'SPREADSHEET_ID':
      return { SPREADSHEET_ID: value };
    case 'SHEET_NAME':
      return { SHEET_NAME: value };
  }
}

/**
 * Narrow read side handed to the engine and the sync layer.
 */
export interface ConfigReader {
  get(): Readonly<AppConfig>;
}

/**
 * JSON config file with defaults. Missing keys are filled in and written back;
 * a file that cannot be parsed or validated is copied aside and replaced by
 * defaults, and load() returns the warning for the caller to surface.
 */
export class ConfigStore implements ConfigReader {
  readonly filePath: string;
  private readonly defaults: AppConfig;
  private config: AppConfig;

  constructor(home: string = resolveAppHome()) {
    this.filePath = configFilePath(home);
    this.defaults = defaultConfig(home);
    this.config = { ...this.defaults };
  }

  get corruptBackupPath(): string {
    return `${this.filePath}.corrupt`;
  }

  get(): Readonly<AppConfig> {
    return { ...this.config };
  }

  async load(): Promise<ConfigCorruptError | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info(`No config at ${this.filePath}; writing defaults.`);
        this.config = { ...this.defaults };
        await this.write(this.config);
        return null;
      }
      throw new FileIOError(`Could not read config ${this.filePath}: ${describeError(error)}`, this.filePath, error);
    }

    let parsed: AppConfig;
    let missingKeys: ConfigKey[];
    try {
      const raw: unknown = JSON.parse(text);
      if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new Error('expected a JSON object');
      }
      missingKeys = CONFIG_KEYS.filter(key => !(key in raw));
      parsed = AppConfigSchema.parse({ ...this.defaults, ...raw });
    } catch (error) {
      return this.recoverFromCorruptFile(error);
    }

    this.config = parsed;
    if (missingKeys.length > 0) {
      logger.info(`Config is missing ${missingKeys.join(', ')}; filling in defaults.`);
      await this.write(this.config);
    }
    return null;
  }

  async update(patch: Partial<AppConfig>): Promise<AppConfig> {
    const result = AppConfigSchema.safeParse({ ...this.config, ...patch });
    if (!result.success) {
      const issue = result.error.issues[0];
      const field = issue?.path.join('.');
      throw new ValidationError(issue ? `${field}: ${issue.message}` : 'Invalid config', field);
    }

    await this.write(result.data);
    this.config = result.data;
    logger.debug(`Config updated: ${Object.keys(patch).join(', ')}`);
    return this.get();
  }

  private async recoverFromCorruptFile(cause: unknown): Promise<ConfigCorruptError> {
    const backupPath = this.corruptBackupPath;
    try {
      await fs.copyFile(this.filePath, backupPath);
    } catch (error) {
      logger.warn(`Could not back up corrupt config to ${backupPath}: ${describeError(error)}`);
    }

    this.config = { ...this.defaults };
    await this.write(this.config);

    const warning = new ConfigCorruptError(
      `Config ${this.filePath} was unreadable (${describeError(cause)}); defaults restored, old file kept at ${backupPath}`,
      backupPath,
      cause
    );
    logger.warn(warning.message);
    return warning;
  }

  private async write(config: AppConfig): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
    } catch (error) {
      throw new FileIOError(`Could not write config ${this.filePath}: ${describeError(error)}`, this.filePath, error);
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && Reflect.get(error, 'code') === 'ENOENT';
}
