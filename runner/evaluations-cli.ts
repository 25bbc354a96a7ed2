import { Arguments, Argv, CommandModule } from 'yargs';
import chalk from 'chalk';
import {
  reRate,
  removeEvaluation,
} from './orchestration/evaluation-service.js';
import {
  buildAnalysisReport,
  writeAnalysisReport,
} from './reporting/analysis-report.js';
import { formatEvaluation } from './reporting/report-logging.js';
import { greenCheckmark, printJson } from './reporting/format.js';
import { averageScore, EvaluationStatus } from './shared-interfaces.js';
import { NotFoundError } from './utils/errors.js';
import { toProcessAbsolutePath } from './file-system-utils.js';
import { REPORTS_ROOT_DIR } from './configuration/constants.js';
import {
  runWithStores,
  StorageOptions,
  withStorageOptions,
} from './cli-shared.js';

interface ListOptions extends StorageOptions {
  json: boolean;
}

const ListModule = {
  command: 'list',
  describe: 'List stored evaluations',
  builder: (argv: Argv): Argv<ListOptions> =>
    withStorageOptions(argv).option('json', {
      type: 'boolean',
      default: false,
      description: 'Whether to print the evaluations as JSON',
    }),
  handler: async (cliArgs: Arguments<ListOptions>): Promise<void> => {
    await runWithStores(cliArgs, async (stores) => {
      const evaluations = await stores.evaluations.loadAll();

      if (cliArgs.json) {
        console.log(
          printJson(
            evaluations.map((e) => ({ ...e, averageScore: averageScore(e) }))
          )
        );
        return;
      }

      if (evaluations.length === 0) {
        console.log(chalk.gray('No evaluations found.'));
        return;
      }

      const promptsById = new Map(
        (await stores.prompts.loadAll()).map((p) => [p.id, p])
      );
      console.log(
        evaluations
          .map((e) => formatEvaluation(e, promptsById.get(e.promptId)))
          .join('\n\n')
      );
    });
  },
} satisfies CommandModule<{}, ListOptions>;

interface UpdateOptions extends StorageOptions {
  id: string;
  helpfulness?: number;
  truthfulness?: number;
  harmlessness?: number;
  comment?: string;
  status?: EvaluationStatus;
}

const UpdateModule = {
  command: 'update <id>',
  describe: 'Change the scores or comment of an evaluation',
  builder: (argv: Argv): Argv<UpdateOptions> =>
    withStorageOptions(argv)
      .positional('id', {
        type: 'string',
        demandOption: true,
        description: 'ID of the evaluation',
      })
      .option('helpfulness', { type: 'number', description: 'New score 1-5' })
      .option('truthfulness', { type: 'number', description: 'New score 1-5' })
      .option('harmlessness', { type: 'number', description: 'New score 1-5' })
      .option('comment', { type: 'string', description: 'New comment' })
      .option('status', {
        type: 'string',
        choices: ['pending', 'completed'] as const,
        description: 'New status',
      }),
  handler: async (cliArgs: Arguments<UpdateOptions>): Promise<void> => {
    await runWithStores(cliArgs, async (stores) => {
      const updated = await reRate(stores, cliArgs.id, {
        helpfulness: cliArgs.helpfulness,
        truthfulness: cliArgs.truthfulness,
        harmlessness: cliArgs.harmlessness,
        comment: cliArgs.comment,
        status: cliArgs.status,
      });
      console.log(`${greenCheckmark()} Updated evaluation:`);
      console.log(formatEvaluation(updated));
    });
  },
} satisfies CommandModule<{}, UpdateOptions>;

interface DeleteOptions extends StorageOptions {
  id: string;
}

const DeleteModule = {
  command: 'delete <id>',
  describe: 'Delete an evaluation',
  builder: (argv: Argv): Argv<DeleteOptions> =>
    withStorageOptions(argv).positional('id', {
      type: 'string',
      demandOption: true,
      description: 'ID of the evaluation',
    }),
  handler: async (cliArgs: Arguments<DeleteOptions>): Promise<void> => {
    await runWithStores(cliArgs, async (stores) => {
      await removeEvaluation(stores, cliArgs.id);
      console.log(`${greenCheckmark()} Deleted evaluation ${cliArgs.id}.`);
    });
  },
} satisfies CommandModule<{}, DeleteOptions>;

interface ReportOptions extends StorageOptions {
  id: string;
  reportsDirectory?: string;
  print: boolean;
}

const ReportModule = {
  command: 'report <id>',
  describe: 'Write an analysis report for an evaluation',
  builder: (argv: Argv): Argv<ReportOptions> =>
    withStorageOptions(argv)
      .positional('id', {
        type: 'string',
        demandOption: true,
        description: 'ID of the evaluation',
      })
      .option('reports-directory', {
        type: 'string',
        description: 'Directory in which to write the report',
      })
      .option('print', {
        type: 'boolean',
        default: false,
        description: 'Print the report instead of writing it to disk',
      }),
  handler: async (cliArgs: Arguments<ReportOptions>): Promise<void> => {
    await runWithStores(cliArgs, async (stores) => {
      const evaluations = await stores.evaluations.loadAll();
      const evaluation = evaluations.find((e) => e.id === cliArgs.id);

      if (!evaluation) {
        throw new NotFoundError('evaluation', cliArgs.id);
      }

      const prompts = await stores.prompts.loadAll();
      const prompt = prompts.find((p) => p.id === evaluation.promptId);

      if (!prompt) {
        throw new NotFoundError('prompt', evaluation.promptId);
      }

      const report = buildAnalysisReport(
        prompt.prompt,
        prompt.response ?? '',
        evaluation
      );

      if (cliArgs.print) {
        console.log(report);
        return;
      }

      await writeAnalysisReport(
        report,
        evaluation.id,
        cliArgs.reportsDirectory
          ? toProcessAbsolutePath(cliArgs.reportsDirectory)
          : REPORTS_ROOT_DIR
      );
    });
  },
} satisfies CommandModule<{}, ReportOptions>;

export const EvaluationsModule = {
  builder,
  handler: () => {},
  command: 'evaluations <command>',
  describe: 'Inspect and manage stored evaluations',
} satisfies CommandModule<{}, {}>;

function builder(argv: Argv): Argv<{}> {
  return argv
    .command(ListModule)
    .command(UpdateModule)
    .command(DeleteModule)
    .command(ReportModule)
    .demandCommand()
    .strict()
    .version(false)
    .help();
}
