import { Arguments, Argv, CommandModule } from 'yargs';
import { calculateEvaluationStats } from './ratings/stats.js';
import { logStatsToConsole } from './reporting/report-logging.js';
import { printJson } from './reporting/format.js';
import {
  runWithStores,
  StorageOptions,
  withStorageOptions,
} from './cli-shared.js';

export const StatsModule = {
  builder,
  handler,
  command: 'stats',
  describe: 'Show statistics about the stored evaluations',
} satisfies CommandModule<{}, Options>;

interface Options extends StorageOptions {
  json: boolean;
}

function builder(argv: Argv): Argv<Options> {
  return withStorageOptions(argv)
    .option('json', {
      type: 'boolean',
      default: false,
      description: 'Whether to print the statistics as JSON',
    })
    .strict()
    .version(false)
    .help();
}

async function handler(cliArgs: Arguments<Options>): Promise<void> {
  await runWithStores(cliArgs, async (stores) => {
    const prompts = await stores.prompts.loadAll();
    const stats = calculateEvaluationStats(
      await stores.evaluations.loadAll(),
      prompts.length
    );

    if (cliArgs.json) {
      console.log(printJson(stats));
    } else {
      logStatsToConsole(stats);
    }
  });
}
