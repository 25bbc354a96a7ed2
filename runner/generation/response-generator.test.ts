import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createJsonStores } from '../storage/json-file-store.js';
import { Stores } from '../storage/store.js';
import { NotFoundError, UserFacingError } from '../utils/errors.js';
import {
  generateMissingResponse,
  ResponseGenerator,
} from './response-generator.js';

class StubGenerator implements ResponseGenerator {
  readonly displayName = 'Stub';
  readonly prompts: string[] = [];

  constructor(private readonly output: string | null) {}

  async generate(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.output;
  }
}

describe('generateMissingResponse', () => {
  let directory: string;
  let stores: Stores;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'response-rater-generate-'));
    stores = createJsonStores(directory);
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('stores the generated response', async () => {
    const prompt = await stores.prompts.append({
      prompt: 'Define entropy.',
      category: 'Custom',
    });
    const generator = new StubGenerator('A measure of disorder.');

    const updated = await generateMissingResponse(stores, generator, prompt.id);

    expect(generator.prompts).toEqual(['Define entropy.']);
    expect(updated.response).toBe('A measure of disorder.');
    expect(await stores.prompts.loadAll()).toEqual([updated]);
  });

  it('keeps existing responses unless asked to overwrite', async () => {
    const prompt = await stores.prompts.append({
      prompt: 'Define entropy.',
      response: 'Old answer.',
      category: 'Custom',
    });
    const generator = new StubGenerator('New answer.');

    await expect(
      generateMissingResponse(stores, generator, prompt.id)
    ).rejects.toThrow(UserFacingError);
    expect(generator.prompts).toEqual([]);

    const updated = await generateMissingResponse(
      stores,
      generator,
      prompt.id,
      true
    );
    expect(updated.response).toBe('New answer.');
  });

  it('fails if the generator returns nothing', async () => {
    const prompt = await stores.prompts.append({
      prompt: 'Define entropy.',
      category: 'Custom',
    });

    await expect(
      generateMissingResponse(stores, new StubGenerator(null), prompt.id)
    ).rejects.toThrow(
      `Stub did not return a response for prompt "${prompt.id}".`
    );
  });

  it('fails for unknown prompts', async () => {
    await expect(
      generateMissingResponse(stores, new StubGenerator('x'), 'missing')
    ).rejects.toThrow(NotFoundError);
  });
});
