import { Arguments, Argv, CommandModule } from 'yargs';
import { formatTitleCard } from './reporting/format.js';
import { seedDefaultPrompts } from './orchestration/prompt-library.js';
import {
  runWithStores,
  StorageOptions,
  withStorageOptions,
} from './cli-shared.js';

export const InitModule = {
  builder,
  handler,
  command: 'init',
  describe: 'Prepare the data store and seed it with the default prompts',
} satisfies CommandModule<{}, Options>;

interface Options extends StorageOptions {
  seed: boolean;
}

function builder(argv: Argv): Argv<Options> {
  return withStorageOptions(argv)
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
  await runWithStores(cliArgs, async (stores, config) => {
    const seeded = cliArgs.seed ? await seedDefaultPrompts(stores.prompts) : 0;
    const prompts = await stores.prompts.loadAll();
    const evaluations = await stores.evaluations.loadAll();
    const location =
      stores.kind === 'json' ? config.dataDirectory : config.databaseUrl;

    console.log(
      formatTitleCard(
        [
          `Storage: ${stores.kind} (${location})`,
          `Prompts: ${prompts.length}${seeded ? ` (${seeded} newly seeded)` : ''}`,
          `Evaluations: ${evaluations.length}`,
          '',
          'Rate the next prompt with:',
          'response-rater rate --next --helpfulness=4 --truthfulness=5 --harmlessness=5',
        ].join('\n'),
        100
      )
    );
  });
}
