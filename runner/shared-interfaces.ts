import z from 'zod';

/** Dimensions along which every response is rated. */
export const RATING_DIMENSIONS = [
  'helpfulness',
  'truthfulness',
  'harmlessness',
] as const;

/** A single rating dimension. */
export type RatingDimension = (typeof RATING_DIMENSIONS)[number];

/** Likert score for one dimension. */
export const ratingScoreSchema = z.number().int().min(1).max(5);

/** Lifecycle of an evaluation. */
export const evaluationStatusSchema = z.enum(['pending', 'completed']);

export type EvaluationStatus = z.infer<typeof evaluationStatusSchema>;

export const promptRecordSchema = z.strictObject({
  id: z.string(),
  prompt: z.string(),
  response: z.string().optional(),
  category: z.string(),
  /** ISO-8601 creation time. */
  createdAt: z.string(),
});

/** Prompt that was authored or seeded, optionally with a response to rate. */
export type PromptRecord = z.infer<typeof promptRecordSchema>;

export const evaluationRecordSchema = z.strictObject({
  id: z.string(),
  /** ID of the `PromptRecord` that was rated. */
  promptId: z.string(),
  helpfulness: ratingScoreSchema,
  truthfulness: ratingScoreSchema,
  harmlessness: ratingScoreSchema,
  comment: z.string(),
  /** ISO-8601 time of the (latest) rating. */
  timestamp: z.string(),
  status: evaluationStatusSchema,
});

/**
 * Manual rating of a prompt's response. The average score is intentionally
 * not part of the record; use `averageScore` to compute it.
 */
export type EvaluationRecord = z.infer<typeof evaluationRecordSchema>;

/** Evaluation as handed to a store, before an ID was assigned. */
export type NewEvaluationRecord = Omit<
  EvaluationRecord,
  'id' | 'timestamp' | 'status'
> &
  Partial<Pick<EvaluationRecord, 'timestamp' | 'status'>>;

/** Fields of an evaluation that can be changed after it was created. */
export type EvaluationPatch = Partial<
  Pick<
    EvaluationRecord,
    'helpfulness' | 'truthfulness' | 'harmlessness' | 'comment' | 'status'
  >
>;

/** Prompt as handed to a store, before an ID was assigned. */
export type NewPromptRecord = Omit<PromptRecord, 'id' | 'createdAt'> &
  Partial<Pick<PromptRecord, 'createdAt'>>;

/** Outcome of the heuristic prompt analysis. */
export interface QualityReport {
  /** Score between 0 and 100. */
  score: number;
  /** Suggestions in the order in which their rules were evaluated. */
  suggestions: string[];
}

/** Arithmetic mean of the three dimension scores of an evaluation. */
export function averageScore(
  evaluation: Pick<EvaluationRecord, RatingDimension>
): number {
  return (
    (evaluation.helpfulness +
      evaluation.truthfulness +
      evaluation.harmlessness) /
    3
  );
}
