import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createJsonStores } from '../storage/json-file-store.js';
import { Stores } from '../storage/store.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { removeEvaluation, reRate, submitRating } from './evaluation-service.js';

describe('evaluation service', () => {
  let directory: string;
  let stores: Stores;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'response-rater-service-'));
    stores = createJsonStores(directory);
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  const scores = { helpfulness: 4, truthfulness: 5, harmlessness: 5 };

  it('rates a stored prompt', async () => {
    const prompt = await stores.prompts.append({
      prompt: 'What is gravity?',
      response: 'A force that attracts masses.',
      category: 'Educational',
    });

    const result = await submitRating(stores, {
      promptId: prompt.id,
      ...scores,
      comment: 'Accurate.',
    });

    expect(result.updated).toBe(false);
    expect(result.prompt).toEqual(prompt);
    expect(result.evaluation).toMatchObject({
      promptId: prompt.id,
      ...scores,
      comment: 'Accurate.',
      status: 'completed',
    });
    expect(await stores.evaluations.loadAll()).toEqual([result.evaluation]);
  });

  it('authors a custom prompt from text', async () => {
    const result = await submitRating(stores, {
      prompt: 'Name three primary colors.',
      response: 'Red, blue, and yellow.',
      ...scores,
    });

    expect(result.prompt).toMatchObject({
      prompt: 'Name three primary colors.',
      response: 'Red, blue, and yellow.',
      category: 'Custom',
    });
    expect(result.evaluation.comment).toBe('');
    expect(await stores.prompts.loadAll()).toEqual([result.prompt]);
  });

  it('reuses a stored prompt with the same text', async () => {
    const prompt = await stores.prompts.append({
      prompt: 'Name three primary colors.',
      category: 'Educational',
    });

    const result = await submitRating(stores, {
      prompt: 'Name three primary colors.',
      ...scores,
    });

    expect(result.prompt.id).toBe(prompt.id);
    expect(await stores.prompts.loadAll()).toHaveLength(1);
  });

  it('stores a new response for a prompt matched by text', async () => {
    const prompt = await stores.prompts.append({
      prompt: 'What causes tides?',
      category: 'Educational',
    });

    const result = await submitRating(stores, {
      prompt: 'What causes tides?',
      response: 'The moon.',
      ...scores,
    });

    expect(result.prompt).toEqual({ ...prompt, response: 'The moon.' });
    expect(await stores.prompts.loadAll()).toEqual([result.prompt]);
  });

  it('replaces the response of a prompt rated by ID', async () => {
    const prompt = await stores.prompts.append({
      prompt: 'What causes tides?',
      response: 'The wind.',
      category: 'Educational',
    });

    const result = await submitRating(stores, {
      promptId: prompt.id,
      response: 'Mostly the gravity of the moon.',
      ...scores,
    });

    expect(result.prompt.response).toBe('Mostly the gravity of the moon.');
    expect((await stores.prompts.loadAll())[0].response).toBe(
      'Mostly the gravity of the moon.'
    );
  });

  it('rejects a blank response', async () => {
    await expect(
      submitRating(stores, {
        prompt: 'What causes tides?',
        response: '   ',
        ...scores,
      })
    ).rejects.toThrow(ValidationError);
    expect(await stores.prompts.loadAll()).toEqual([]);
  });

  it('updates the evaluation when a prompt is rated again', async () => {
    const first = await submitRating(stores, {
      prompt: 'Why is the sky blue?',
      ...scores,
    });
    const second = await submitRating(stores, {
      promptId: first.prompt.id,
      helpfulness: 2,
      truthfulness: 3,
      harmlessness: 5,
      comment: 'Too vague on reflection.',
    });

    expect(second.updated).toBe(true);
    expect(second.evaluation).toEqual({
      ...first.evaluation,
      helpfulness: 2,
      truthfulness: 3,
      comment: 'Too vague on reflection.',
    });
    expect(await stores.evaluations.loadAll()).toEqual([second.evaluation]);
  });

  it.each([0, 6, 3.5])(
    'rejects a score of %s without touching the stores',
    async (score) => {
      await expect(
        submitRating(stores, {
          prompt: 'Why is the sky blue?',
          ...scores,
          truthfulness: score,
        })
      ).rejects.toThrow(ValidationError);

      expect(await stores.prompts.loadAll()).toEqual([]);
      expect(await stores.evaluations.loadAll()).toEqual([]);
    }
  );

  it('requires a prompt ID or text', async () => {
    await expect(submitRating(stores, scores)).rejects.toThrow(
      /Either a prompt ID or the prompt text is required/
    );
  });

  it('rejects unknown prompt IDs', async () => {
    await expect(
      submitRating(stores, { promptId: 'missing', ...scores })
    ).rejects.toThrow(NotFoundError);
    expect(await stores.evaluations.loadAll()).toEqual([]);
  });

  it('re-rates selected fields of an evaluation', async () => {
    const { evaluation } = await submitRating(stores, {
      prompt: 'Why is the sky blue?',
      ...scores,
    });

    const updated = await reRate(stores, evaluation.id, {
      harmlessness: 1,
      status: 'pending',
    });

    expect(updated).toEqual({
      ...evaluation,
      harmlessness: 1,
      status: 'pending',
    });
  });

  it('rejects an empty re-rating', async () => {
    await expect(reRate(stores, 'any', {})).rejects.toThrow(
      /At least one field has to be changed/
    );
  });

  it('removes evaluations', async () => {
    const { evaluation } = await submitRating(stores, {
      prompt: 'Why is the sky blue?',
      ...scores,
    });

    await removeEvaluation(stores, evaluation.id);

    expect(await stores.evaluations.loadAll()).toEqual([]);
    await expect(removeEvaluation(stores, evaluation.id)).rejects.toThrow(
      NotFoundError
    );
  });
});
