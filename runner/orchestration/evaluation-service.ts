import z from 'zod';
import { CUSTOM_PROMPT_CATEGORY } from '../configuration/constants.js';
import {
  EvaluationRecord,
  evaluationStatusSchema,
  PromptRecord,
  ratingScoreSchema,
} from '../shared-interfaces.js';
import { Stores } from '../storage/store.js';
import { NotFoundError } from '../utils/errors.js';
import { parseInput } from '../utils/validation.js';

const ratingInputSchema = z
  .strictObject({
    /** ID of an existing prompt. Takes precedence over `prompt`. */
    promptId: z.string().min(1).optional(),
    /** Text of a prompt to rate. Authored as a new prompt if it's unknown. */
    prompt: z.string().trim().min(1).optional(),
    /** Response being rated. Stored on the prompt if it differs. */
    response: z.string().trim().min(1).optional(),
    category: z.string().trim().min(1).optional(),
    helpfulness: ratingScoreSchema,
    truthfulness: ratingScoreSchema,
    harmlessness: ratingScoreSchema,
    comment: z.string().default(''),
    status: evaluationStatusSchema.default('completed'),
  })
  .refine((input) => !!input.promptId || !!input.prompt, {
    message: 'Either a prompt ID or the prompt text is required',
    path: ['promptId'],
  });

/** Scores and metadata submitted for a prompt. */
export type RatingInput = z.input<typeof ratingInputSchema>;

const evaluationPatchSchema = z
  .strictObject({
    helpfulness: ratingScoreSchema.optional(),
    truthfulness: ratingScoreSchema.optional(),
    harmlessness: ratingScoreSchema.optional(),
    comment: z.string().optional(),
    status: evaluationStatusSchema.optional(),
  })
  .refine((patch) => Object.values(patch).some((v) => v !== undefined), {
    message: 'At least one field has to be changed',
  });

/** Result of submitting a rating. */
export interface SubmittedRating {
  prompt: PromptRecord;
  evaluation: EvaluationRecord;
  /** Whether an existing evaluation of the prompt was re-rated. */
  updated: boolean;
}

/**
 * Stores a rating for a prompt. Every prompt has at most one evaluation: if
 * the prompt was rated before, its evaluation is updated in place.
 *
 * The input is validated before the stores are touched.
 * @throws ValidationError if the input is invalid.
 * @throws NotFoundError if `promptId` doesn't refer to a stored prompt.
 */
export async function submitRating(
  stores: Stores,
  input: unknown
): Promise<SubmittedRating> {
  const rating = parseInput(ratingInputSchema, input, 'Invalid rating:');
  const prompt = await resolvePrompt(stores, rating);
  const evaluations = await stores.evaluations.loadAll();
  const existing = evaluations.find((e) => e.promptId === prompt.id);
  const fields = {
    helpfulness: rating.helpfulness,
    truthfulness: rating.truthfulness,
    harmlessness: rating.harmlessness,
    comment: rating.comment,
    status: rating.status,
  };

  if (existing) {
    return {
      prompt,
      evaluation: await stores.evaluations.update(existing.id, fields),
      updated: true,
    };
  }

  return {
    prompt,
    evaluation: await stores.evaluations.append({
      promptId: prompt.id,
      ...fields,
    }),
    updated: false,
  };
}

/**
 * Changes some fields of an existing evaluation.
 * @throws ValidationError if the patch is invalid.
 * @throws NotFoundError if there's no evaluation with the ID.
 */
export async function reRate(
  stores: Stores,
  id: string,
  patch: unknown
): Promise<EvaluationRecord> {
  const validPatch = parseInput(
    evaluationPatchSchema,
    patch,
    'Invalid evaluation update:'
  );
  return await stores.evaluations.update(id, validPatch);
}

/**
 * Deletes an evaluation.
 * @throws NotFoundError if there's no evaluation with the ID.
 */
export function removeEvaluation(stores: Stores, id: string): Promise<void> {
  return stores.evaluations.delete(id);
}

async function resolvePrompt(
  stores: Stores,
  rating: z.output<typeof ratingInputSchema>
): Promise<PromptRecord> {
  const prompts = await stores.prompts.loadAll();
  let match: PromptRecord | undefined;

  if (rating.promptId) {
    match = prompts.find((p) => p.id === rating.promptId);

    if (!match) {
      throw new NotFoundError('prompt', rating.promptId);
    }
  } else {
    match = prompts.find((p) => p.prompt === rating.prompt);
  }

  if (!match) {
    return stores.prompts.append({
      prompt: rating.prompt ?? '',
      category: rating.category ?? CUSTOM_PROMPT_CATEGORY,
      ...(rating.response === undefined ? {} : { response: rating.response }),
    });
  }

  // The rated response replaces the stored one if it differs.
  if (rating.response !== undefined && rating.response !== match.response) {
    return stores.prompts.updateResponse(match.id, rating.response);
  }

  return match;
}
