import chalk from 'chalk';
import {
  averageScore,
  EvaluationRecord,
  PromptRecord,
  QualityReport,
  RATING_DIMENSIONS,
} from '../shared-interfaces.js';
import { DIMENSION_NAMES } from '../ratings/rating-types.js';
import { EvaluationStats, isPositiveScore } from '../ratings/stats.js';
import { ReviewItem } from '../orchestration/review-queue.js';
import {
  getAverageSeries,
  getBucketSeries,
  getDistributionSeries,
  renderBarChart,
} from './charts.js';
import {
  formatAverage,
  formatScore,
  formatTitleCard,
  greenCheckmark,
  yellowWarning,
} from './format.js';

/** Formats the outcome of the prompt analysis. */
export function formatQualityReport(report: QualityReport): string {
  const lines = [
    `Prompt quality: ${formatScore(report.score / 100, `${report.score}/100`)}`,
  ];

  if (report.suggestions.length === 0) {
    lines.push(` ${greenCheckmark()} No suggestions, the prompt looks good.`);
  } else {
    lines.push(' Suggestions:');
    lines.push(
      ...report.suggestions.map((s) => `  ${yellowWarning()} ${s}`)
    );
  }

  return lines.join('\n');
}

/** Formats a single evaluation, optionally together with its prompt. */
export function formatEvaluation(
  evaluation: EvaluationRecord,
  prompt?: PromptRecord
): string {
  const lines = [
    `${chalk.bold(evaluation.id)} ${chalk.gray(`(${evaluation.status}, ${evaluation.timestamp})`)}`,
  ];

  if (prompt) {
    lines.push(` Prompt: ${prompt.prompt}`);
  }

  const scores = RATING_DIMENSIONS.map(
    (dimension) => `${DIMENSION_NAMES[dimension]} ${evaluation[dimension]}/5`
  ).join(', ');

  lines.push(` ${scores}`);
  lines.push(` Average: ${formatAverage(averageScore(evaluation))}`);

  if (evaluation.comment) {
    lines.push(` Comment: ${evaluation.comment}`);
  }

  return lines.join('\n');
}

/** Formats one line per prompt, marking the ones that were rated. */
export function formatReviewItems(items: ReviewItem[]): string {
  if (items.length === 0) {
    return chalk.gray('No prompts found.');
  }

  return items
    .map(({ prompt, evaluation }) => {
      const status = evaluation
        ? `${greenCheckmark()} ${formatAverage(averageScore(evaluation))}`
        : chalk.gray('- unrated');
      return `${status} ${chalk.bold(prompt.id)} [${prompt.category}] ${prompt.prompt}`;
    })
    .join('\n');
}

/** Logs the dashboard statistics, including text charts. */
export function logStatsToConsole(stats: EvaluationStats): void {
  const { progress } = stats;

  console.log(
    formatTitleCard(
      [
        `Evaluated ${progress.ratedPrompts}/${progress.totalPrompts} prompts ` +
          `(${(progress.fraction * 100).toFixed(1)}%)`,
        `Total evaluations: ${stats.totalEvaluations}`,
        `Overall average: ${formatAverage(stats.overallAverage)}`,
      ].join('\n')
    )
  );

  if (stats.totalEvaluations === 0) {
    console.log(chalk.gray('No evaluations yet.'));
    return;
  }

  console.log('\nAverage scores:');
  console.log(
    renderBarChart(getAverageSeries(stats), { max: 5, precision: 2 })
  );

  for (const dimension of RATING_DIMENSIONS) {
    console.log(`\n${DIMENSION_NAMES[dimension]} distribution:`);
    console.log(renderBarChart(getDistributionSeries(stats, dimension)));
  }

  console.log('\nQuality buckets:');
  console.log(renderBarChart(getBucketSeries(stats)));

  const positive = stats.buckets
    .filter(isPositiveScore)
    .reduce((total, bucket) => total + bucket.evaluationsCount, 0);
  console.log(
    formatScore(
      positive / stats.totalEvaluations,
      ` ${positive} of ${stats.totalEvaluations} evaluations scored Good or better`
    )
  );

  console.log('\nRecent evaluations:');
  stats.recent.forEach((evaluation) => {
    console.log(formatEvaluation(evaluation));
  });
}
