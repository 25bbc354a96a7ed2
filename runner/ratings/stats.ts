import {
  averageScore,
  EvaluationRecord,
  RATING_DIMENSIONS,
  RatingDimension,
} from '../shared-interfaces.js';
import { UserFacingError } from '../utils/errors.js';

/** Possible buckets that average scores can be categorized into. */
const BUCKET_CONFIG = [
  { name: 'Excellent', min: 4.5, id: 'excellent' },
  { name: 'Good', min: 3.5, id: 'good' },
  { name: 'Fair', min: 2.5, id: 'fair' },
  { name: 'Poor', min: 0, id: 'poor' },
] as const;

/** Number of evaluations shown as recent activity. */
const RECENT_EVALUATIONS_COUNT = 3;

export type ScoreBucketId = (typeof BUCKET_CONFIG)[number]['id'];

/** Range of average scores and how many evaluations fell into it. */
export interface ScoreBucket {
  id: ScoreBucketId;
  name: string;
  /** Inclusive lower bound of the average score. */
  min: number;
  evaluationsCount: number;
}

/** Number of evaluations for each score from 1 to 5, indexed by `score - 1`. */
export type ScoreDistribution = [number, number, number, number, number];

/** Aggregated statistics over a set of evaluations. */
export interface EvaluationStats {
  totalEvaluations: number;
  /** Mean score per dimension. Null if there are no evaluations. */
  averages: Record<RatingDimension, number | null>;
  /** Mean of the per-evaluation averages. Null if there are no evaluations. */
  overallAverage: number | null;
  distribution: Record<RatingDimension, ScoreDistribution>;
  buckets: ScoreBucket[];
  progress: {
    /** Number of distinct prompts that have an evaluation. */
    ratedPrompts: number;
    totalPrompts: number;
    /** Share of rated prompts between 0 and 1. */
    fraction: number;
  };
  /** Most recently stored evaluations, newest first. */
  recent: EvaluationRecord[];
}

/**
 * Calculates the statistics shown on the dashboard.
 *
 * @param evaluations Evaluations in storage order.
 * @param totalPrompts Number of prompts that can be rated.
 */
export function calculateEvaluationStats(
  evaluations: EvaluationRecord[],
  totalPrompts: number
): EvaluationStats {
  const buckets: ScoreBucket[] = BUCKET_CONFIG.map((b) => ({
    id: b.id,
    name: b.name,
    min: b.min,
    evaluationsCount: 0,
  }));
  const distribution = {
    helpfulness: emptyDistribution(),
    truthfulness: emptyDistribution(),
    harmlessness: emptyDistribution(),
  };
  const sums = { helpfulness: 0, truthfulness: 0, harmlessness: 0 };
  let averageSum = 0;

  for (const evaluation of evaluations) {
    for (const dimension of RATING_DIMENSIONS) {
      const score = evaluation[dimension];
      sums[dimension] += score;
      distribution[dimension][score - 1]++;
    }

    const average = averageScore(evaluation);
    const bucket = buckets.find((b) => average >= b.min);

    if (!bucket) {
      throw new UserFacingError(
        `Average score ${average} did not fit into any bucket`
      );
    }

    bucket.evaluationsCount++;
    averageSum += average;
  }

  const count = evaluations.length;
  const ratedPrompts = new Set(evaluations.map((e) => e.promptId)).size;

  return {
    totalEvaluations: count,
    averages: {
      helpfulness: count ? sums.helpfulness / count : null,
      truthfulness: count ? sums.truthfulness / count : null,
      harmlessness: count ? sums.harmlessness / count : null,
    },
    overallAverage: count ? averageSum / count : null,
    distribution,
    buckets,
    progress: {
      ratedPrompts,
      totalPrompts,
      fraction: totalPrompts > 0 ? Math.min(1, ratedPrompts / totalPrompts) : 0,
    },
    recent: evaluations.slice(-RECENT_EVALUATIONS_COUNT).reverse(),
  };
}

/** Shared function that determines if a bucket's score is positive. */
export function isPositiveScore(bucket: ScoreBucket): boolean {
  return bucket.min >= 3.5;
}

function emptyDistribution(): ScoreDistribution {
  return [0, 0, 0, 0, 0];
}
