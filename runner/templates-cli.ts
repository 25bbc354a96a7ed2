import { Arguments, Argv, CommandModule } from 'yargs';
import chalk from 'chalk';
import { analyzePrompt } from './analysis/prompt-analyzer.js';
import {
  getTemplatePlaceholders,
  listTemplates,
  renderPromptTemplate,
} from './configuration/prompt-templating.js';
import {
  CATEGORY_TIPS,
  PROMPT_CATEGORIES,
  PromptCategory,
} from './configuration/authoring-aids.js';
import { authorPrompt } from './orchestration/prompt-library.js';
import { formatQualityReport } from './reporting/report-logging.js';
import { greenCheckmark } from './reporting/format.js';
import { ValidationError } from './utils/errors.js';
import {
  reportCommandError,
  runWithStores,
  StorageOptions,
  withStorageOptions,
} from './cli-shared.js';

export const TemplatesModule = {
  builder,
  handler,
  command: 'templates [id]',
  describe: 'List prompt templates or render one into a prompt',
} satisfies CommandModule<{}, Options>;

interface Options extends StorageOptions {
  id?: string;
  set: string[];
  save: boolean;
  category?: PromptCategory;
}

function builder(argv: Argv): Argv<Options> {
  return withStorageOptions(argv)
    .positional('id', {
      type: 'string',
      description: 'ID of the template to render',
    })
    .option('set', {
      type: 'string',
      array: true,
      default: [],
      description: 'Placeholder value in the form `name=value`',
    })
    .option('save', {
      type: 'boolean',
      default: false,
      description: 'Whether to store the rendered prompt for rating',
    })
    .option('category', {
      type: 'string',
      choices: PROMPT_CATEGORIES,
      description: 'Category of the saved prompt',
    })
    .strict()
    .version(false)
    .help();
}

async function handler(cliArgs: Arguments<Options>): Promise<void> {
  if (!cliArgs.id) {
    logTemplates();
    return;
  }

  const templateId = cliArgs.id;
  let prompt: string;

  try {
    prompt = renderPromptTemplate(
      templateId,
      parsePlaceholderValues(cliArgs.set)
    );
  } catch (error) {
    reportCommandError(error);
    return;
  }

  console.log(chalk.bold(prompt));
  console.log('');
  console.log(formatQualityReport(analyzePrompt(prompt)));

  if (cliArgs.category) {
    const tip = CATEGORY_TIPS[cliArgs.category];
    console.log(chalk.gray(`\nTip for ${cliArgs.category} prompts: ${tip}`));
  }

  if (cliArgs.save) {
    await runWithStores(cliArgs, async (stores) => {
      const record = await authorPrompt(stores.prompts, {
        prompt,
        category: cliArgs.category,
      });
      console.log(
        `\n${greenCheckmark()} Saved prompt ${chalk.bold(record.id)}.`
      );
    });
  }
}

/**
 * Parses `name=value` pairs into placeholder values.
 * @throws ValidationError if a pair has no `=`.
 */
export function parsePlaceholderValues(
  pairs: readonly string[]
): Record<string, string> {
  const values: Record<string, string> = {};

  for (const pair of pairs) {
    const separatorIndex = pair.indexOf('=');

    if (separatorIndex < 1) {
      throw new ValidationError(
        `Invalid placeholder value "${pair}". Use the form \`name=value\`.`
      );
    }

    values[pair.slice(0, separatorIndex).trim()] = pair.slice(
      separatorIndex + 1
    );
  }

  return values;
}

function logTemplates(): void {
  for (const template of listTemplates()) {
    const placeholders = getTemplatePlaceholders(template.content);
    console.log(`${chalk.bold(template.id)} - ${template.displayName}`);
    console.log(`  ${template.content}`);
    console.log(chalk.gray(`  Placeholders: ${placeholders.join(', ')}`));
  }
}
