import { join } from 'path';
import {
  averageScore,
  EvaluationRecord,
  RATING_DIMENSIONS,
  RatingDimension,
} from '../shared-interfaces.js';
import {
  analyzePromptSignals,
  analyzeResponseSignals,
  computeTextStats,
} from '../analysis/text-stats.js';
import { REPORTS_ROOT_DIR } from '../configuration/constants.js';
import { safeWriteFile } from '../file-system-utils.js';
import { greenCheckmark } from './format.js';

/** Scores and comment that a report is generated for. */
export type ReportedEvaluation = Pick<
  EvaluationRecord,
  RatingDimension | 'comment'
>;

const LOW_SCORE_RECOMMENDATIONS: Record<RatingDimension, string> = {
  helpfulness: 'Consider improving response relevance and usefulness',
  truthfulness: 'Verify factual accuracy and provide reliable sources',
  harmlessness: 'Review content for potential harmful or biased information',
};

/** Builds the recommendations for a set of scores, in display order. */
export function getRecommendations(evaluation: ReportedEvaluation): string[] {
  const recommendations: string[] = [];

  for (const dimension of RATING_DIMENSIONS) {
    if (evaluation[dimension] < 3) {
      recommendations.push(LOW_SCORE_RECOMMENDATIONS[dimension]);
    }
  }

  const average = averageScore(evaluation);

  if (average >= 4) {
    recommendations.push(
      'Excellent response quality! Consider using as a template'
    );
  } else if (average >= 3) {
    recommendations.push('Good response with room for minor improvements');
  } else {
    recommendations.push(
      'Response needs significant improvement in multiple areas'
    );
  }

  return recommendations;
}

/** Produces a plain-text report about a rated prompt/response pair. */
export function buildAnalysisReport(
  prompt: string,
  response: string,
  evaluation: ReportedEvaluation,
  now = new Date()
): string {
  const promptStats = computeTextStats(prompt);
  const promptSignals = analyzePromptSignals(prompt);
  const responseStats = computeTextStats(response);
  const responseSignals = analyzeResponseSignals(response);

  return [
    'RESPONSE RATER - ANALYSIS REPORT',
    '================================',
    `Generated: ${formatTimestamp(now)}`,
    '',
    'PROMPT ANALYSIS',
    '---------------',
    `Prompt: ${prompt}`,
    `Word Count: ${promptStats.wordCount}`,
    `Character Count: ${promptStats.charCount}`,
    `Has Question Mark: ${yesNo(promptSignals.hasQuestion)}`,
    `Has Context: ${yesNo(promptSignals.hasContext)}`,
    '',
    'RESPONSE ANALYSIS',
    '-----------------',
    `Response: ${response}`,
    `Word Count: ${responseStats.wordCount}`,
    `Character Count: ${responseStats.charCount}`,
    `Sentences: ${responseStats.sentenceCount}`,
    `Has Examples: ${yesNo(responseSignals.hasExamples)}`,
    `Has Structure: ${yesNo(responseSignals.hasStructure)}`,
    `Has Explanations: ${yesNo(responseSignals.hasExplanation)}`,
    '',
    'EVALUATION SCORES',
    '-----------------',
    `Helpfulness: ${evaluation.helpfulness}/5`,
    `Truthfulness: ${evaluation.truthfulness}/5`,
    `Harmlessness: ${evaluation.harmlessness}/5`,
    `Overall Average: ${averageScore(evaluation).toFixed(2)}/5`,
    '',
    'ADDITIONAL COMMENTS',
    '-------------------',
    evaluation.comment || 'No additional comments provided.',
    '',
    'RECOMMENDATIONS',
    '---------------',
    ...getRecommendations(evaluation).map((r) => `- ${r}`),
    '',
  ].join('\n');
}

/**
 * Writes a report into the reports directory.
 * @returns Path of the written file.
 */
export async function writeAnalysisReport(
  report: string,
  evaluationId: string,
  directory = REPORTS_ROOT_DIR
): Promise<string> {
  // Only allow a-z, A-Z, 0-9 and hyphens in the file name.
  const sanitizedId = evaluationId.replace(/[^a-zA-Z0-9-]/g, '-');
  const reportPath = join(directory, `analysis-${sanitizedId}.txt`);

  await safeWriteFile(reportPath, report);
  console.log(`${greenCheckmark()} Report has been saved to '${reportPath}'.`);
  return reportPath;
}

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}

function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
