import { Arguments, Argv, CommandModule } from 'yargs';
import { createJsonStores } from './storage/json-file-store.js';
import { createSqlStores } from './storage/sql-store.js';
import { migrateJsonToSql } from './storage/sql-migration.js';
import { formatTitleCard } from './reporting/format.js';
import { reportCommandError, resolveConfig } from './cli-shared.js';
import { UserFacingError } from './utils/errors.js';

export const MigrateModule = {
  builder,
  handler,
  command: 'migrate',
  describe: 'Copy the JSON data files into an SQL database',
} satisfies CommandModule<{}, Options>;

interface Options {
  dataDir?: string;
  databaseUrl?: string;
}

function builder(argv: Argv): Argv<Options> {
  return argv
    .option('data-dir', {
      type: 'string',
      description:
        'Directory of the JSON files to copy (defaults to `RATER_DATA_DIR`)',
    })
    .option('database-url', {
      type: 'string',
      description: 'libsql URL of the target database (defaults to `DATABASE_URL`)',
    })
    .strict()
    .version(false)
    .help();
}

async function handler(cliArgs: Arguments<Options>): Promise<void> {
  try {
    // The source is always the JSON backend, regardless of `RATER_STORAGE`.
    const config = resolveConfig({ ...cliArgs, storage: 'json' });

    if (!config.databaseUrl) {
      throw new UserFacingError(
        'Pass `--database-url` or set `DATABASE_URL` to select the target database.'
      );
    }

    const source = createJsonStores(config.dataDirectory, {
      recoverMalformedFiles: config.recoverMalformedFiles,
    });
    const target = createSqlStores({
      url: config.databaseUrl,
      authToken: config.databaseAuthToken,
    });

    try {
      const result = await migrateJsonToSql(source, target.database);

      if (!result.skipped) {
        console.log(
          formatTitleCard(
            [
              `Copied ${result.prompts} prompts and ${result.evaluations} evaluations`,
              `from ${config.dataDirectory}`,
              `to ${config.databaseUrl}`,
            ].join('\n'),
            120
          )
        );
      }
    } finally {
      await target.close();
    }
  } catch (error) {
    reportCommandError(error);
  }
}
