import { Arguments, Argv, CommandModule } from 'yargs';
import { startAppServer } from '../app-server/app-server.js';
import { createStores } from './storage/store-creation.js';
import { seedDefaultPrompts } from './orchestration/prompt-library.js';
import { formatTitleCard } from './reporting/format.js';
import {
  reportCommandError,
  resolveConfig,
  StorageOptions,
  withStorageOptions,
} from './cli-shared.js';

export const ServeModule = {
  builder,
  handler,
  command: 'serve',
  describe: 'Serve the JSON API used by the rating UI',
} satisfies CommandModule<{}, Options>;

interface Options extends StorageOptions {
  port?: number;
  seed: boolean;
}

function builder(argv: Argv): Argv<Options> {
  return withStorageOptions(argv)
    .option('port', {
      type: 'number',
      description: 'Port on which to serve the API (defaults to `RATER_PORT`)',
    })
    .option('seed', {
      type: 'boolean',
      default: true,
      description: 'Whether to add the default prompts to an empty store',
    })
    .strict()
    .version(false)
    .help();
}

async function handler(cliArgs: Arguments<Options>): Promise<void> {
  try {
    const config = resolveConfig(cliArgs, { port: cliArgs.port });
    const stores = createStores(config);

    if (cliArgs.seed) {
      await seedDefaultPrompts(stores.prompts);
    }

    await startAppServer({ stores }, config.port);

    console.log(
      formatTitleCard(
        [
          `API available at http://localhost:${config.port}/api`,
          `Storage: ${stores.kind}`,
        ].join('\n')
      )
    );
  } catch (error) {
    reportCommandError(error);
  }
}
