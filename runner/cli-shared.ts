import { Argv } from 'yargs';
import chalk from 'chalk';
import {
  AppConfig,
  AppConfigOverrides,
  loadAppConfig,
} from './configuration/app-config.js';
import { toProcessAbsolutePath } from './file-system-utils.js';
import { createStores } from './storage/store-creation.js';
import { Stores } from './storage/store.js';
import { UserFacingError } from './utils/errors.js';
import { redX } from './reporting/format.js';

/** Flags shared by all commands that read or write stored data. */
export interface StorageOptions {
  storage?: 'json' | 'sql';
  dataDir?: string;
  databaseUrl?: string;
}

/** Adds the flags selecting the storage backend. */
export function withStorageOptions(argv: Argv): Argv<StorageOptions> {
  return argv
    .option('storage', {
      type: 'string',
      choices: ['json', 'sql'] as const,
      description: 'Storage backend (defaults to `RATER_STORAGE` or `json`)',
    })
    .option('data-dir', {
      type: 'string',
      description: 'Directory of the JSON files (defaults to `RATER_DATA_DIR`)',
    })
    .option('database-url', {
      type: 'string',
      description: 'libsql URL of the SQL backend (defaults to `DATABASE_URL`)',
    });
}

/** Resolves the config for a command, with CLI flags taking precedence. */
export function resolveConfig(
  options: StorageOptions,
  extra: AppConfigOverrides = {}
): AppConfig {
  return loadAppConfig(process.env, {
    storage: options.storage,
    dataDirectory: options.dataDir
      ? toProcessAbsolutePath(options.dataDir)
      : undefined,
    databaseUrl: options.databaseUrl,
    ...extra,
  });
}

/**
 * Runs the body of a command with the configured stores and reports errors
 * the same way for every command. The stores are closed afterwards.
 */
export async function runWithStores(
  options: StorageOptions,
  body: (stores: Stores, config: AppConfig) => Promise<void>
): Promise<void> {
  let stores: Stores | null = null;

  try {
    const config = resolveConfig(options);
    stores = createStores(config);
    await body(stores, config);
  } catch (error) {
    reportCommandError(error);
  } finally {
    if (stores) {
      await stores.close();
    }
  }
}

/** Prints an error that ended a command and marks the process as failed. */
export function reportCommandError(error: unknown): void {
  if (error instanceof UserFacingError) {
    console.error(`${redX()} ${chalk.red(error.message)}`);
  } else {
    console.error(`${redX()} ${chalk.red('An unexpected error occurred:')}`);
    console.error(chalk.red(error));
  }
  process.exitCode = 1;
}
