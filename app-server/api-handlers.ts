import chalk from 'chalk';
import z from 'zod';
import { analyzePrompt } from '../runner/analysis/prompt-analyzer.js';
import { comparePrompts } from '../runner/analysis/comparison.js';
import {
  analyzePromptSignals,
  analyzeResponseSignals,
  computeTextStats,
} from '../runner/analysis/text-stats.js';
import {
  buildResponseVariation,
  CATEGORY_TIPS,
  EXPERT_TIPS,
  PROMPT_CATEGORIES,
  SAMPLE_RESPONSES,
} from '../runner/configuration/authoring-aids.js';
import {
  getTemplatePlaceholders,
  listTemplates,
  renderPromptTemplate,
} from '../runner/configuration/prompt-templating.js';
import {
  reRate,
  removeEvaluation,
  submitRating,
} from '../runner/orchestration/evaluation-service.js';
import {
  authorPrompt,
  setPromptResponse,
} from '../runner/orchestration/prompt-library.js';
import {
  filterPrompts,
  findNextUnrated,
  isPromptFilter,
} from '../runner/orchestration/review-queue.js';
import {
  DIMENSION_DESCRIPTIONS,
  DIMENSION_NAMES,
  SCORE_LABELS,
} from '../runner/ratings/rating-types.js';
import { calculateEvaluationStats } from '../runner/ratings/stats.js';
import {
  getAverageSeries,
  getBucketSeries,
  getDistributionSeries,
} from '../runner/reporting/charts.js';
import {
  averageScore,
  RATING_DIMENSIONS,
} from '../runner/shared-interfaces.js';
import { Stores } from '../runner/storage/store.js';
import {
  NotFoundError,
  StorageError,
  UserFacingError,
  ValidationError,
} from '../runner/utils/errors.js';
import { parseInput } from '../runner/utils/validation.js';

/** Dependencies of the API handlers. */
export interface ApiContext {
  stores: Stores;
}

/** Outcome of a handler. `body` is sent as JSON unless it's null. */
export interface ApiResult {
  status: number;
  body: unknown;
}

const analyzeRequestSchema = z.strictObject({
  prompt: z.string(),
  response: z.string().optional(),
});

const pairSchema = z.strictObject({
  prompt: z.string().min(1),
  response: z.string().min(1),
});

const compareRequestSchema = z.strictObject({ a: pairSchema, b: pairSchema });

const renderRequestSchema = z.strictObject({
  values: z.record(z.string()),
});

const updatePromptRequestSchema = z.strictObject({ response: z.string() });

const variationRequestSchema = z.strictObject({
  length: z.enum(['Short', 'Medium', 'Long']),
  tone: z.enum(['Professional', 'Casual', 'Academic', 'Creative']),
  style: z.enum([
    'Explanatory',
    'Step-by-step',
    'Example-based',
    'Comparative',
  ]),
  includeExamples: z.boolean().default(true),
});

/** `GET /api/templates` */
export function listTemplatesHandler(): ApiResult {
  return ok(
    listTemplates().map((template) => ({
      ...template,
      placeholders: getTemplatePlaceholders(template.content),
    }))
  );
}

/** `POST /api/templates/:id/render` */
export function renderTemplateHandler(id: string, body: unknown): ApiResult {
  const { values } = parseInput(
    renderRequestSchema,
    body,
    'Invalid template values:'
  );
  const prompt = renderPromptTemplate(id, values);
  return ok({ prompt, quality: analyzePrompt(prompt) });
}

/** `POST /api/analyze` */
export function analyzeHandler(body: unknown): ApiResult {
  const request = parseInput(analyzeRequestSchema, body, 'Invalid request:');
  const result = {
    quality: analyzePrompt(request.prompt),
    promptStats: computeTextStats(request.prompt),
    promptSignals: analyzePromptSignals(request.prompt),
  };

  if (request.response === undefined) {
    return ok(result);
  }

  return ok({
    ...result,
    responseStats: computeTextStats(request.response),
    responseSignals: analyzeResponseSignals(request.response),
  });
}

/** `POST /api/compare` */
export function compareHandler(body: unknown): ApiResult {
  const { a, b } = parseInput(compareRequestSchema, body, 'Invalid request:');
  return ok(comparePrompts(a, b));
}

/** `GET /api/prompts?filter=all|rated|unrated` */
export async function listPromptsHandler(
  ctx: ApiContext,
  filter: unknown
): Promise<ApiResult> {
  const resolvedFilter = filter === undefined ? 'all' : filter;

  if (typeof resolvedFilter !== 'string' || !isPromptFilter(resolvedFilter)) {
    throw new ValidationError(
      'Filter has to be one of "all", "rated" or "unrated".'
    );
  }

  const prompts = await ctx.stores.prompts.loadAll();
  const evaluations = await ctx.stores.evaluations.loadAll();

  return ok({
    items: filterPrompts(prompts, evaluations, resolvedFilter),
    nextUnrated: findNextUnrated(prompts, evaluations),
  });
}

/** `POST /api/prompts` */
export async function createPromptHandler(
  ctx: ApiContext,
  body: unknown
): Promise<ApiResult> {
  return created(await authorPrompt(ctx.stores.prompts, body));
}

/** `PATCH /api/prompts/:id` */
export async function updatePromptHandler(
  ctx: ApiContext,
  id: string,
  body: unknown
): Promise<ApiResult> {
  const { response } = parseInput(
    updatePromptRequestSchema,
    body,
    'Invalid request:'
  );
  return ok(await setPromptResponse(ctx.stores.prompts, id, response));
}

/** `GET /api/evaluations` */
export async function listEvaluationsHandler(
  ctx: ApiContext
): Promise<ApiResult> {
  const evaluations = await ctx.stores.evaluations.loadAll();
  return ok(
    evaluations.map((evaluation) => ({
      ...evaluation,
      averageScore: averageScore(evaluation),
    }))
  );
}

/** `POST /api/evaluations`. Re-rating an already rated prompt answers 200. */
export async function createEvaluationHandler(
  ctx: ApiContext,
  body: unknown
): Promise<ApiResult> {
  const result = await submitRating(ctx.stores, body);
  return result.updated ? ok(result) : created(result);
}

/** `PATCH /api/evaluations/:id` */
export async function updateEvaluationHandler(
  ctx: ApiContext,
  id: string,
  body: unknown
): Promise<ApiResult> {
  return ok(await reRate(ctx.stores, id, body));
}

/** `DELETE /api/evaluations/:id` */
export async function deleteEvaluationHandler(
  ctx: ApiContext,
  id: string
): Promise<ApiResult> {
  await removeEvaluation(ctx.stores, id);
  return { status: 204, body: null };
}

/** `GET /api/stats` */
export async function statsHandler(ctx: ApiContext): Promise<ApiResult> {
  const prompts = await ctx.stores.prompts.loadAll();
  const evaluations = await ctx.stores.evaluations.loadAll();
  const stats = calculateEvaluationStats(evaluations, prompts.length);

  return ok({
    ...stats,
    charts: {
      averages: getAverageSeries(stats),
      buckets: getBucketSeries(stats),
      distribution: Object.fromEntries(
        RATING_DIMENSIONS.map((dimension) => [
          dimension,
          getDistributionSeries(stats, dimension),
        ])
      ),
    },
  });
}

/** `GET /api/samples` */
export function samplesHandler(): ApiResult {
  return ok({
    responses: SAMPLE_RESPONSES,
    categories: PROMPT_CATEGORIES.map((name) => ({
      name,
      tip: CATEGORY_TIPS[name],
    })),
    expertTips: EXPERT_TIPS,
    dimensions: RATING_DIMENSIONS.map((id) => ({
      id,
      name: DIMENSION_NAMES[id],
      description: DIMENSION_DESCRIPTIONS[id],
    })),
    scoreLabels: SCORE_LABELS,
  });
}

/** `POST /api/samples/variation` */
export function variationHandler(body: unknown): ApiResult {
  const options = parseInput(
    variationRequestSchema,
    body,
    'Invalid variation options:'
  );
  return ok({ response: buildResponseVariation(options) });
}

/**
 * Runs a handler and maps the errors it throws to responses. Errors that
 * aren't user-facing are logged and answered without their message.
 */
export async function runHandler(
  handler: () => ApiResult | Promise<ApiResult>
): Promise<ApiResult> {
  try {
    return await handler();
  } catch (error) {
    return toErrorResult(error);
  }
}

/** Maps an error to the response that reports it. */
export function toErrorResult(error: unknown): ApiResult {
  if (error instanceof ValidationError) {
    return { status: 400, body: { error: error.message } };
  }
  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: error.message } };
  }
  if (error instanceof StorageError) {
    return { status: 500, body: { error: error.message } };
  }
  if (error instanceof UserFacingError) {
    return { status: 400, body: { error: error.message } };
  }
  console.error(chalk.red('Unexpected error while handling a request:'));
  console.error(chalk.red(error));
  return { status: 500, body: { error: 'Internal server error' } };
}

function ok(body: unknown): ApiResult {
  return { status: 200, body };
}

function created(body: unknown): ApiResult {
  return { status: 201, body };
}
