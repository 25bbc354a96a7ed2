import {
  EvaluationPatch,
  EvaluationRecord,
  NewEvaluationRecord,
  NewPromptRecord,
  PromptRecord,
} from '../shared-interfaces.js';

/**
 * Persistence for evaluations. Implementations rewrite the whole collection
 * on every mutation and don't cache anything, so callers must serialize
 * access. Concurrent writers may lose updates.
 */
export interface EvaluationStore {
  /** Loads all evaluations in insertion order. */
  loadAll(): Promise<EvaluationRecord[]>;

  /** Stores a new evaluation under a fresh ID and returns the stored record. */
  append(record: NewEvaluationRecord): Promise<EvaluationRecord>;

  /**
   * Merges a patch into an existing evaluation.
   * @throws NotFoundError if there's no evaluation with the ID.
   */
  update(id: string, patch: EvaluationPatch): Promise<EvaluationRecord>;

  /**
   * Removes an evaluation.
   * @throws NotFoundError if there's no evaluation with the ID.
   */
  delete(id: string): Promise<void>;
}

/** Persistence for prompts. Prompts only ever change their response text. */
export interface PromptStore {
  /** Loads all prompts in insertion order. */
  loadAll(): Promise<PromptRecord[]>;

  /** Stores a new prompt under a fresh ID and returns the stored record. */
  append(record: NewPromptRecord): Promise<PromptRecord>;

  /**
   * Replaces the response text of a prompt.
   * @throws NotFoundError if there's no prompt with the ID.
   */
  updateResponse(id: string, response: string): Promise<PromptRecord>;
}

/** Kinds of storage backends. */
export type StorageKind = 'json' | 'sql';

/** Stores selected for the current process. */
export interface Stores {
  kind: StorageKind;
  prompts: PromptStore;
  evaluations: EvaluationStore;
  /** Releases resources held by the backend. */
  close(): Promise<void>;
}

/** Fields of an evaluation that a patch can change. */
const EVALUATION_PATCH_KEYS = [
  'helpfulness',
  'truthfulness',
  'harmlessness',
  'comment',
  'status',
] as const satisfies ReadonlyArray<keyof EvaluationPatch>;

/** Applies the fields that are set in a patch onto an evaluation. */
export function mergeEvaluationPatch(
  record: EvaluationRecord,
  patch: EvaluationPatch
): EvaluationRecord {
  const merged = { ...record };

  for (const key of EVALUATION_PATCH_KEYS) {
    const value = patch[key];
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  return merged;
}
