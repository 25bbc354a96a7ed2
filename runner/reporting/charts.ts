import chalk from 'chalk';
import { RATING_DIMENSIONS, RatingDimension } from '../shared-interfaces.js';
import {
  DIMENSION_NAMES,
  formatScoreOption,
  LIKERT_SCORES,
} from '../ratings/rating-types.js';
import { EvaluationStats, ScoreBucketId } from '../ratings/stats.js';

/** Single bar of a chart, in the shape the UI's chart component consumes. */
export interface ChartSeries {
  label: string;
  /** CSS color of the bar. */
  color: string;
  value: number;
}

const DIMENSION_COLORS: Record<RatingDimension, string> = {
  helpfulness: '#4f8ff7',
  truthfulness: '#2fb67c',
  harmlessness: '#9b6cf0',
};

const BUCKET_COLORS: Record<ScoreBucketId, string> = {
  excellent: '#1b873f',
  good: '#7ac143',
  fair: '#f2b01e',
  poor: '#d93f3f',
};

/** Average score per dimension. Dimensions without data have a value of 0. */
export function getAverageSeries(stats: EvaluationStats): ChartSeries[] {
  return RATING_DIMENSIONS.map((dimension) => ({
    label: DIMENSION_NAMES[dimension],
    color: DIMENSION_COLORS[dimension],
    value: stats.averages[dimension] ?? 0,
  }));
}

/** Number of evaluations per average-score bucket. */
export function getBucketSeries(stats: EvaluationStats): ChartSeries[] {
  return stats.buckets.map((bucket) => ({
    label: bucket.name,
    color: BUCKET_COLORS[bucket.id],
    value: bucket.evaluationsCount,
  }));
}

/** Number of evaluations that gave each score in one dimension. */
export function getDistributionSeries(
  stats: EvaluationStats,
  dimension: RatingDimension
): ChartSeries[] {
  return LIKERT_SCORES.map((score) => ({
    label: formatScoreOption(score),
    color: DIMENSION_COLORS[dimension],
    value: stats.distribution[dimension][score - 1],
  }));
}

/**
 * Renders series as horizontal text bars. Bars are scaled relative to `max`,
 * which defaults to the largest value of the series.
 */
export function renderBarChart(
  series: ChartSeries[],
  options: { width?: number; max?: number; precision?: number } = {}
): string {
  const width = options.width ?? 30;
  const max = options.max ?? Math.max(0, ...series.map((s) => s.value));
  const labelWidth = Math.max(0, ...series.map((s) => s.label.length));

  return series
    .map((s) => {
      const length = max > 0 ? Math.round((s.value / max) * width) : 0;
      const bar = chalk.hex(s.color)('█'.repeat(length));
      const value =
        options.precision === undefined
          ? String(s.value)
          : s.value.toFixed(options.precision);
      return `${s.label.padEnd(labelWidth)} │${bar}${' '.repeat(width - length)}│ ${value}`;
    })
    .join('\n');
}
