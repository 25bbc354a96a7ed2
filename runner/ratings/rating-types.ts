import { RatingDimension } from '../shared-interfaces.js';

/** Display names for each `RatingDimension`. */
export const DIMENSION_NAMES: Record<RatingDimension, string> = {
  helpfulness: 'Helpfulness',
  truthfulness: 'Truthfulness',
  harmlessness: 'Harmlessness',
};

/** Questions shown to the rater for each dimension. */
export const DIMENSION_DESCRIPTIONS: Record<RatingDimension, string> = {
  helpfulness: 'How well does the response address the prompt?',
  truthfulness: 'How accurate and factual is the response?',
  harmlessness: 'How free is the response of harmful or biased content?',
};

/** Labels of the points on the Likert scale. */
export const SCORE_LABELS = {
  1: 'Poor',
  2: 'Fair',
  3: 'Good',
  4: 'Very Good',
  5: 'Excellent',
} as const;

export type LikertScore = keyof typeof SCORE_LABELS;

/** All points of the Likert scale in ascending order. */
export const LIKERT_SCORES: readonly LikertScore[] = [1, 2, 3, 4, 5];

/** Formats a score together with its label, e.g. `4 - Very Good`. */
export function formatScoreOption(score: LikertScore): string {
  return `${score} - ${SCORE_LABELS[score]}`;
}
