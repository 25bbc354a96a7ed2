import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createJsonStores } from '../runner/storage/json-file-store.js';
import { StorageError } from '../runner/utils/errors.js';
import {
  analyzeHandler,
  ApiContext,
  createEvaluationHandler,
  createPromptHandler,
  deleteEvaluationHandler,
  listEvaluationsHandler,
  listPromptsHandler,
  renderTemplateHandler,
  runHandler,
  samplesHandler,
  statsHandler,
  toErrorResult,
  variationHandler,
} from './api-handlers.js';

describe('API handlers', () => {
  let directory: string;
  let ctx: ApiContext;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'response-rater-api-'));
    ctx = { stores: createJsonStores(directory) };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  const rating = {
    prompt: 'Why do leaves change color?',
    response: 'Chlorophyll breaks down in autumn.',
    helpfulness: 4,
    truthfulness: 5,
    harmlessness: 5,
  };

  it('analyzes a prompt with an optional response', () => {
    const promptOnly = analyzeHandler({ prompt: 'Explain' });

    expect(promptOnly.status).toBe(200);
    expect(promptOnly.body).toMatchObject({
      quality: { score: 40 },
      promptSignals: { hasQuestion: false, hasContext: false },
    });
    expect(promptOnly.body).not.toHaveProperty('responseStats');

    const withResponse = analyzeHandler({
      prompt: 'Explain',
      response: 'First, because.',
    });

    expect(withResponse.body).toMatchObject({
      responseSignals: {
        hasStructure: true,
        hasExplanation: true,
        contentQuality: 2,
      },
    });
  });

  it('renders a template and rates the resulting prompt', async () => {
    const result = await runHandler(() =>
      renderTemplateHandler('problem-solving', {
        values: { problem: 'my bike squeaks' },
      })
    );

    expect(result.status).toBe(200);
    expect(result.body).toMatchObject({
      prompt:
        'Help me solve this problem: my bike squeaks. Please provide ' +
        'step-by-step guidance and alternative approaches.',
    });
  });

  it('answers 404 for unknown templates', async () => {
    const result = await runHandler(() =>
      renderTemplateHandler('poetry', { values: {} })
    );

    expect(result).toEqual({
      status: 404,
      body: { error: 'No template record with ID "poetry" exists.' },
    });
  });

  it('answers 400 for missing template values', async () => {
    const result = await runHandler(() =>
      renderTemplateHandler('problem-solving', { values: {} })
    );

    expect(result).toEqual({
      status: 400,
      body: {
        error: 'Template "Problem Solving" is missing values for: problem',
      },
    });
  });

  it('creates evaluations and re-rates them', async () => {
    const first = await runHandler(() => createEvaluationHandler(ctx, rating));
    const second = await runHandler(() =>
      createEvaluationHandler(ctx, { ...rating, helpfulness: 2 })
    );

    expect(first.status).toBe(201);
    expect(second.status).toBe(200);

    const list = await listEvaluationsHandler(ctx);
    expect(list.body).toEqual([
      expect.objectContaining({ helpfulness: 2, averageScore: 4 }),
    ]);
  });

  it('answers 400 for invalid scores without storing anything', async () => {
    const result = await runHandler(() =>
      createEvaluationHandler(ctx, { ...rating, truthfulness: 6 })
    );

    expect(result.status).toBe(400);
    expect(await ctx.stores.prompts.loadAll()).toEqual([]);
    expect(await ctx.stores.evaluations.loadAll()).toEqual([]);
  });

  it('deletes evaluations', async () => {
    await createEvaluationHandler(ctx, rating);
    const [evaluation] = await ctx.stores.evaluations.loadAll();

    expect(await deleteEvaluationHandler(ctx, evaluation.id)).toEqual({
      status: 204,
      body: null,
    });
    expect(
      (await runHandler(() => deleteEvaluationHandler(ctx, evaluation.id)))
        .status
    ).toBe(404);
  });

  it('filters prompts and points to the next unrated one', async () => {
    await createEvaluationHandler(ctx, rating);
    const created = await createPromptHandler(ctx, { prompt: 'Unrated one' });

    expect(created.status).toBe(201);

    const unrated = await listPromptsHandler(ctx, 'unrated');
    expect(unrated.body).toEqual({
      items: [{ prompt: created.body, evaluation: null }],
      nextUnrated: created.body,
    });
  });

  it('rejects unknown prompt filters', async () => {
    const result = await runHandler(() => listPromptsHandler(ctx, 'newest'));

    expect(result).toEqual({
      status: 400,
      body: { error: 'Filter has to be one of "all", "rated" or "unrated".' },
    });
  });

  it('reports statistics with chart series', async () => {
    await createEvaluationHandler(ctx, rating);
    await createPromptHandler(ctx, { prompt: 'Unrated one' });

    const result = await statsHandler(ctx);

    expect(result.body).toMatchObject({
      totalEvaluations: 1,
      progress: { ratedPrompts: 1, totalPrompts: 2, fraction: 0.5 },
      charts: {
        averages: [
          { label: 'Helpfulness', value: 4 },
          { label: 'Truthfulness', value: 5 },
          { label: 'Harmlessness', value: 5 },
        ],
      },
    });
  });

  it('describes the rating dimensions', () => {
    expect(samplesHandler().body).toMatchObject({
      dimensions: [
        {
          id: 'helpfulness',
          name: 'Helpfulness',
          description: 'How well does the response address the prompt?',
        },
        {
          id: 'truthfulness',
          name: 'Truthfulness',
          description: 'How accurate and factual is the response?',
        },
        {
          id: 'harmlessness',
          name: 'Harmlessness',
          description: 'How free is the response of harmful or biased content?',
        },
      ],
    });
  });

  it('builds response variations', () => {
    expect(
      variationHandler({
        length: 'Short',
        tone: 'Professional',
        style: 'Step-by-step',
        includeExamples: false,
      })
    ).toEqual({
      status: 200,
      body: {
        response:
          'Here is a response that addresses your prompt using professional ' +
          'language and formal structure. This provides a concise answer. ' +
          'breaking down the process into numbered steps.',
      },
    });
  });

  it('maps storage errors to 500 and hides unexpected errors', () => {
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(toErrorResult(new StorageError('Disk is full.'))).toEqual({
      status: 500,
      body: { error: 'Disk is full.' },
    });
    expect(toErrorResult(new Error('secret detail'))).toEqual({
      status: 500,
      body: { error: 'Internal server error' },
    });
    expect(errorLog).toHaveBeenCalled();
  });
});
