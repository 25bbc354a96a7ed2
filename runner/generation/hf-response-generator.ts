import fetch from 'node-fetch';
import { RateLimiter } from 'limiter';
import z from 'zod';
import { UserFacingError } from '../utils/errors.js';
import { ResponseGenerator } from './response-generator.js';

/** Subset of the `fetch` API used by the generator. */
export type FetchFn = (
  url: string,
  init: {
    method: string;
    headers: Record<string, string>;
    body: string;
    signal: AbortSignal;
  }
) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
  json(): Promise<unknown>;
}>;

export interface HuggingFaceGeneratorOptions {
  apiKey: string | undefined;
  model: string;
  /** Base URL of the inference API. */
  baseUrl?: string;
  fetchFn?: FetchFn;
  /** Maximum number of requests per minute. */
  requestsPerMinute?: number;
  /** Time after which a request is aborted. */
  timeoutMs?: number;
}

const DEFAULT_BASE_URL = 'https://api-inference.huggingface.co/models';

const DEFAULT_TIMEOUT_MS = 30_000;

const generationResultSchema = z.array(
  z.object({ generated_text: z.string().optional() })
);

/** Generates responses through the Hugging Face inference API. */
export class HuggingFaceResponseGenerator implements ResponseGenerator {
  readonly displayName: string;
  private readonly fetchFn: FetchFn;
  private readonly requestsPerMinute: RateLimiter;

  constructor(private readonly options: HuggingFaceGeneratorOptions) {
    this.displayName = `Hugging Face (${options.model})`;
    this.fetchFn = options.fetchFn ?? fetch;
    this.requestsPerMinute = new RateLimiter({
      tokensPerInterval: options.requestsPerMinute ?? 30,
      interval: 'minute',
    });
  }

  async generate(prompt: string): Promise<string | null> {
    const apiKey = this.options.apiKey;

    if (!apiKey) {
      throw new UserFacingError(
        'Cannot generate a response, because `HF_API_KEY` is not set.'
      );
    }

    await this.requestsPerMinute.removeTokens(1);

    const baseUrl = this.options.baseUrl ?? DEFAULT_BASE_URL;
    let response: Awaited<ReturnType<FetchFn>>;

    try {
      response = await this.fetchFn(`${baseUrl}/${this.options.model}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          inputs: prompt,
          parameters: { max_length: 200, temperature: 0.7, do_sample: true },
        }),
        signal: AbortSignal.timeout(
          this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS
        ),
      });
    } catch (error) {
      throw new UserFacingError(
        `Hugging Face API request failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new UserFacingError(
        `Hugging Face API error: ${response.status} - ${await response.text()}`
      );
    }

    let body: unknown;

    try {
      body = await response.json();
    } catch (error) {
      throw new UserFacingError(
        `Hugging Face API returned a response that is not JSON: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const result = generationResultSchema.safeParse(body);

    if (!result.success || result.data.length === 0) {
      return null;
    }

    return result.data[0].generated_text?.trim() || null;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
