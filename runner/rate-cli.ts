import { Arguments, Argv, CommandModule } from 'yargs';
import chalk from 'chalk';
import { submitRating } from './orchestration/evaluation-service.js';
import { findNextUnrated } from './orchestration/review-queue.js';
import {
  buildAnalysisReport,
  writeAnalysisReport,
} from './reporting/analysis-report.js';
import { formatEvaluation } from './reporting/report-logging.js';
import { greenCheckmark } from './reporting/format.js';
import { EvaluationStatus } from './shared-interfaces.js';
import { UserFacingError } from './utils/errors.js';
import { toProcessAbsolutePath } from './file-system-utils.js';
import { REPORTS_ROOT_DIR } from './configuration/constants.js';
import {
  runWithStores,
  StorageOptions,
  withStorageOptions,
} from './cli-shared.js';

export const RateModule = {
  builder,
  handler,
  command: 'rate',
  describe: 'Rate the response to a prompt',
} satisfies CommandModule<{}, Options>;

interface Options extends StorageOptions {
  promptId?: string;
  prompt?: string;
  response?: string;
  category?: string;
  next: boolean;
  helpfulness: number;
  truthfulness: number;
  harmlessness: number;
  comment: string;
  status: EvaluationStatus;
  report: boolean;
  reportsDirectory?: string;
}

function builder(argv: Argv): Argv<Options> {
  return withStorageOptions(argv)
    .option('prompt-id', {
      type: 'string',
      description: 'ID of the stored prompt to rate',
    })
    .option('prompt', {
      type: 'string',
      description: 'Text of the prompt to rate. Stored if it is new',
    })
    .option('response', {
      type: 'string',
      description: 'Response to store together with a new prompt',
    })
    .option('category', {
      type: 'string',
      description: 'Category of a new prompt',
    })
    .option('next', {
      type: 'boolean',
      default: false,
      description: 'Rate the first prompt that has not been rated yet',
    })
    .option('helpfulness', {
      type: 'number',
      demandOption: true,
      description: 'How well the response addresses the prompt (1-5)',
    })
    .option('truthfulness', {
      type: 'number',
      demandOption: true,
      description: 'How accurate and factual the response is (1-5)',
    })
    .option('harmlessness', {
      type: 'number',
      demandOption: true,
      description: 'How free of harmful content the response is (1-5)',
    })
    .option('comment', {
      type: 'string',
      default: '',
      description: 'Free-text comment about the response',
    })
    .option('status', {
      type: 'string',
      choices: ['pending', 'completed'] as const,
      default: 'completed' as const,
      description: 'Status of the evaluation',
    })
    .option('report', {
      type: 'boolean',
      default: false,
      description: 'Whether to write an analysis report for the rating',
    })
    .option('reports-directory', {
      type: 'string',
      description: 'Directory in which to write the analysis report',
    })
    .strict()
    .version(false)
    .help()
    .showHelpOnFail(false);
}

async function handler(cliArgs: Arguments<Options>): Promise<void> {
  await runWithStores(cliArgs, async (stores) => {
    let promptId = cliArgs.promptId;

    if (cliArgs.next) {
      const next = findNextUnrated(
        await stores.prompts.loadAll(),
        await stores.evaluations.loadAll()
      );

      if (!next) {
        throw new UserFacingError('All prompts have been rated already.');
      }
      promptId = next.id;
    }

    const result = await submitRating(stores, {
      promptId,
      prompt: cliArgs.prompt,
      response: cliArgs.response,
      category: cliArgs.category,
      helpfulness: cliArgs.helpfulness,
      truthfulness: cliArgs.truthfulness,
      harmlessness: cliArgs.harmlessness,
      comment: cliArgs.comment,
      status: cliArgs.status,
    });

    console.log(
      `${greenCheckmark()} ${result.updated ? 'Updated' : 'Saved'} evaluation:`
    );
    console.log(formatEvaluation(result.evaluation, result.prompt));

    if (!result.prompt.response) {
      console.log(
        chalk.yellow('The rated prompt has no response stored for it.')
      );
    }

    if (cliArgs.report) {
      await writeAnalysisReport(
        buildAnalysisReport(
          result.prompt.prompt,
          result.prompt.response ?? '',
          result.evaluation
        ),
        result.evaluation.id,
        cliArgs.reportsDirectory
          ? toProcessAbsolutePath(cliArgs.reportsDirectory)
          : REPORTS_ROOT_DIR
      );
    }
  });
}
