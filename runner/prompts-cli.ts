import { Arguments, Argv, CommandModule } from 'yargs';
import chalk from 'chalk';
import { PROMPT_CATEGORIES } from './configuration/authoring-aids.js';
import {
  HuggingFaceResponseGenerator,
} from './generation/hf-response-generator.js';
import { generateMissingResponse } from './generation/response-generator.js';
import {
  authorPrompt,
  setPromptResponse,
} from './orchestration/prompt-library.js';
import {
  filterPrompts,
  findNextUnrated,
  PROMPT_FILTERS,
  PromptFilter,
} from './orchestration/review-queue.js';
import { formatReviewItems } from './reporting/report-logging.js';
import { greenCheckmark, printJson } from './reporting/format.js';
import {
  runWithStores,
  StorageOptions,
  withStorageOptions,
} from './cli-shared.js';

interface ListOptions extends StorageOptions {
  filter: PromptFilter;
  json: boolean;
}

const ListModule = {
  command: 'list',
  describe: 'List stored prompts',
  builder: (argv: Argv): Argv<ListOptions> =>
    withStorageOptions(argv)
      .option('filter', {
        type: 'string',
        choices: PROMPT_FILTERS,
        default: 'all' as const,
        description: 'Which prompts to show',
      })
      .option('json', {
        type: 'boolean',
        default: false,
        description: 'Whether to print the prompts as JSON',
      }),
  handler: async (cliArgs: Arguments<ListOptions>): Promise<void> => {
    await runWithStores(cliArgs, async (stores) => {
      const prompts = await stores.prompts.loadAll();
      const evaluations = await stores.evaluations.loadAll();
      const items = filterPrompts(prompts, evaluations, cliArgs.filter);

      if (cliArgs.json) {
        console.log(printJson(items));
        return;
      }

      const next = findNextUnrated(prompts, evaluations);
      const rated = filterPrompts(prompts, evaluations, 'rated').length;

      console.log(formatReviewItems(items));
      console.log(chalk.gray(`\nRated ${rated} of ${prompts.length} prompts.`));
      console.log(
        next
          ? `Next unrated prompt: ${chalk.bold(next.id)}`
          : `${greenCheckmark()} All prompts are rated.`
      );
    });
  },
} satisfies CommandModule<{}, ListOptions>;

interface AddOptions extends StorageOptions {
  text: string;
  response?: string;
  category?: string;
}

const AddModule = {
  command: 'add <text>',
  describe: 'Store a new prompt',
  builder: (argv: Argv): Argv<AddOptions> =>
    withStorageOptions(argv)
      .positional('text', {
        type: 'string',
        demandOption: true,
        description: 'Prompt text',
      })
      .option('response', {
        type: 'string',
        description: 'Response to rate for the prompt',
      })
      .option('category', {
        type: 'string',
        choices: PROMPT_CATEGORIES,
        description: 'Category of the prompt',
      }),
  handler: async (cliArgs: Arguments<AddOptions>): Promise<void> => {
    await runWithStores(cliArgs, async (stores) => {
      const record = await authorPrompt(stores.prompts, {
        prompt: cliArgs.text,
        response: cliArgs.response,
        category: cliArgs.category,
      });
      console.log(
        `${greenCheckmark()} Saved prompt ${chalk.bold(record.id)}.`
      );
    });
  },
} satisfies CommandModule<{}, AddOptions>;

interface RespondOptions extends StorageOptions {
  id: string;
  response: string;
}

const RespondModule = {
  command: 'respond <id> <response>',
  describe: 'Set the response to rate for a prompt',
  builder: (argv: Argv): Argv<RespondOptions> =>
    withStorageOptions(argv)
      .positional('id', {
        type: 'string',
        demandOption: true,
        description: 'ID of the prompt',
      })
      .positional('response', {
        type: 'string',
        demandOption: true,
        description: 'Response text',
      }),
  handler: async (cliArgs: Arguments<RespondOptions>): Promise<void> => {
    await runWithStores(cliArgs, async (stores) => {
      await setPromptResponse(stores.prompts, cliArgs.id, cliArgs.response);
      console.log(`${greenCheckmark()} Updated the response of ${cliArgs.id}.`);
    });
  },
} satisfies CommandModule<{}, RespondOptions>;

interface GenerateOptions extends StorageOptions {
  id: string;
  overwrite: boolean;
}

const GenerateModule = {
  command: 'generate <id>',
  describe: 'Generate a response for a prompt through Hugging Face',
  builder: (argv: Argv): Argv<GenerateOptions> =>
    withStorageOptions(argv)
      .positional('id', {
        type: 'string',
        demandOption: true,
        description: 'ID of the prompt',
      })
      .option('overwrite', {
        type: 'boolean',
        default: false,
        description: 'Whether to replace an existing response',
      }),
  handler: async (cliArgs: Arguments<GenerateOptions>): Promise<void> => {
    await runWithStores(cliArgs, async (stores, config) => {
      const generator = new HuggingFaceResponseGenerator({
        apiKey: config.hfApiKey,
        model: config.hfModel,
      });
      console.log(
        chalk.gray(`Generating a response with ${generator.displayName}...`)
      );
      const record = await generateMissingResponse(
        stores,
        generator,
        cliArgs.id,
        cliArgs.overwrite
      );
      console.log(`${greenCheckmark()} Generated response:`);
      console.log(record.response);
    });
  },
} satisfies CommandModule<{}, GenerateOptions>;

export const PromptsModule = {
  builder,
  handler: () => {},
  command: 'prompts <command>',
  describe: 'Manage the prompts that can be rated',
} satisfies CommandModule<{}, {}>;

function builder(argv: Argv): Argv<{}> {
  return argv
    .command(ListModule)
    .command(AddModule)
    .command(RespondModule)
    .command(GenerateModule)
    .demandCommand()
    .strict()
    .version(false)
    .help();
}
