import { Arguments, Argv, CommandModule } from 'yargs';
import { analyzePrompt } from './analysis/prompt-analyzer.js';
import {
  analyzePromptSignals,
  analyzeResponseSignals,
  computeTextStats,
  TextStats,
} from './analysis/text-stats.js';
import { formatQualityReport } from './reporting/report-logging.js';
import { printJson } from './reporting/format.js';

export const AnalyzeModule = {
  builder,
  handler,
  command: 'analyze <prompt>',
  describe: 'Score the quality of a prompt and show text statistics',
} satisfies CommandModule<{}, Options>;

interface Options {
  prompt: string;
  response?: string;
  json: boolean;
}

function builder(argv: Argv): Argv<Options> {
  return argv
    .positional('prompt', {
      type: 'string',
      demandOption: true,
      description: 'Prompt text to analyze',
    })
    .option('response', {
      type: 'string',
      description: 'Response to the prompt, analyzed as well if provided',
    })
    .option('json', {
      type: 'boolean',
      default: false,
      description: 'Whether to print the analysis as JSON',
    })
    .strict()
    .version(false)
    .help();
}

async function handler(cliArgs: Arguments<Options>): Promise<void> {
  const quality = analyzePrompt(cliArgs.prompt);
  const promptStats = computeTextStats(cliArgs.prompt);
  const promptSignals = analyzePromptSignals(cliArgs.prompt);

  if (cliArgs.json) {
    const responseAnalysis =
      cliArgs.response === undefined
        ? {}
        : {
            responseStats: computeTextStats(cliArgs.response),
            responseSignals: analyzeResponseSignals(cliArgs.response),
          };
    console.log(
      printJson({ quality, promptStats, promptSignals, ...responseAnalysis })
    );
    return;
  }

  console.log(formatQualityReport(quality));
  console.log('\nPrompt statistics:');
  console.log(formatTextStats(promptStats));
  console.log(` Has question: ${promptSignals.hasQuestion ? 'yes' : 'no'}`);
  console.log(` Has context: ${promptSignals.hasContext ? 'yes' : 'no'}`);

  if (cliArgs.response !== undefined) {
    const signals = analyzeResponseSignals(cliArgs.response);
    console.log('\nResponse statistics:');
    console.log(formatTextStats(computeTextStats(cliArgs.response)));
    console.log(` Has examples: ${signals.hasExamples ? 'yes' : 'no'}`);
    console.log(` Has structure: ${signals.hasStructure ? 'yes' : 'no'}`);
    console.log(` Has explanation: ${signals.hasExplanation ? 'yes' : 'no'}`);
    console.log(` Content quality: ${signals.contentQuality}/3`);
  }
}

/** Formats text statistics as indented lines. */
export function formatTextStats(stats: TextStats): string {
  return [
    ` Words: ${stats.wordCount}`,
    ` Characters: ${stats.charCount}`,
    ` Sentences: ${stats.sentenceCount}`,
    ` Reading level: ${stats.readingLevel ?? 'N/A'}`,
    ` Complexity: ${stats.complexity}/5`,
    ` Clarity: ${stats.clarity}/5`,
  ].join('\n');
}
