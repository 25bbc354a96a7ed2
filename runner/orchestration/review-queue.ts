import { EvaluationRecord, PromptRecord } from '../shared-interfaces.js';

/** Which prompts to show while reviewing. */
export type PromptFilter = 'all' | 'rated' | 'unrated';

export const PROMPT_FILTERS: readonly PromptFilter[] = [
  'all',
  'rated',
  'unrated',
];

/** Prompt paired with its evaluation, if it has one. */
export interface ReviewItem {
  prompt: PromptRecord;
  evaluation: EvaluationRecord | null;
}

/** Pairs prompts with their evaluations and keeps the ones matching a filter. */
export function filterPrompts(
  prompts: PromptRecord[],
  evaluations: EvaluationRecord[],
  filter: PromptFilter
): ReviewItem[] {
  const evaluationsByPrompt = new Map<string, EvaluationRecord>();

  for (const evaluation of evaluations) {
    evaluationsByPrompt.set(evaluation.promptId, evaluation);
  }

  return prompts
    .map((prompt) => ({
      prompt,
      evaluation: evaluationsByPrompt.get(prompt.id) ?? null,
    }))
    .filter((item) => {
      switch (filter) {
        case 'rated':
          return item.evaluation !== null;
        case 'unrated':
          return item.evaluation === null;
        default:
          return true;
      }
    });
}

/** Finds the first prompt, in storage order, that hasn't been rated yet. */
export function findNextUnrated(
  prompts: PromptRecord[],
  evaluations: EvaluationRecord[]
): PromptRecord | null {
  const ratedIds = new Set(evaluations.map((e) => e.promptId));
  return prompts.find((prompt) => !ratedIds.has(prompt.id)) ?? null;
}

export function isPromptFilter(value: string): value is PromptFilter {
  return PROMPT_FILTERS.some((filter) => filter === value);
}
