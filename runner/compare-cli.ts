import { ArgumentsCamelCase, Argv, CommandModule } from 'yargs';
import chalk from 'chalk';
import { comparePrompts, ComparisonSide } from './analysis/comparison.js';
import { formatScore, printJson } from './reporting/format.js';

export const CompareModule = {
  builder,
  handler,
  command: 'compare',
  describe: 'Compare two prompts and their responses side by side',
} satisfies CommandModule<{}, Options>;

interface Options {
  'prompt-a': string;
  'response-a': string;
  'prompt-b': string;
  'response-b': string;
  json: boolean;
}

function builder(argv: Argv): Argv<Options> {
  return argv
    .option('prompt-a', {
      type: 'string',
      demandOption: true,
      description: 'First prompt',
    })
    .option('response-a', {
      type: 'string',
      demandOption: true,
      description: 'Response to the first prompt',
    })
    .option('prompt-b', {
      type: 'string',
      demandOption: true,
      description: 'Second prompt',
    })
    .option('response-b', {
      type: 'string',
      demandOption: true,
      description: 'Response to the second prompt',
    })
    .option('json', {
      type: 'boolean',
      default: false,
      description: 'Whether to print the comparison as JSON',
    })
    .strict()
    .version(false)
    .help();
}

async function handler(cliArgs: ArgumentsCamelCase<Options>): Promise<void> {
  const comparison = comparePrompts(
    { prompt: cliArgs.promptA, response: cliArgs.responseA },
    { prompt: cliArgs.promptB, response: cliArgs.responseB }
  );

  if (cliArgs.json) {
    console.log(printJson(comparison));
    return;
  }

  logSide('Prompt A', comparison.a);
  console.log('');
  logSide('Prompt B', comparison.b);
  console.log('');

  if (comparison.preferred === 'tie') {
    console.log(chalk.bold('Both prompts scored the same.'));
  } else {
    console.log(
      chalk.bold(`Prompt ${comparison.preferred.toUpperCase()} scored higher.`)
    );
  }
}

function logSide(title: string, side: ComparisonSide): void {
  const { score } = side.quality;

  console.log(chalk.bold(title));
  console.log(` Quality: ${formatScore(score / 100, `${score}/100`)}`);
  console.log(` Words: ${side.promptStats.wordCount}`);
  console.log(` Characters: ${side.promptStats.charCount}`);
  console.log(` Response words: ${side.responseStats.wordCount}`);
  console.log(` Response content quality: ${side.responseSignals.contentQuality}/3`);
}
