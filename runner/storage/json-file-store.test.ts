import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StorageError } from '../utils/errors.js';
import {
  createJsonStores,
  EVALUATIONS_FILE_NAME,
  PROMPTS_FILE_NAME,
} from './json-file-store.js';

describe('JSON file stores', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'response-rater-json-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(directory, { recursive: true, force: true });
  });

  it('writes the collection as an indented JSON array', async () => {
    const stores = createJsonStores(directory);
    const stored = await stores.evaluations.append({
      promptId: 'prompt-1',
      helpfulness: 5,
      truthfulness: 4,
      harmlessness: 5,
      comment: '',
      timestamp: '2024-05-01T10:00:00.000Z',
    });
    const content = await readFile(
      join(directory, EVALUATIONS_FILE_NAME),
      'utf8'
    );

    expect(content).toBe(JSON.stringify([stored], null, 2));
  });

  it('fails on a file that is not valid JSON', async () => {
    await writeFile(join(directory, EVALUATIONS_FILE_NAME), '[{"id": ');

    await expect(
      createJsonStores(directory).evaluations.loadAll()
    ).rejects.toThrow(StorageError);
  });

  it('fails on records that do not match the schema', async () => {
    await writeFile(
      join(directory, EVALUATIONS_FILE_NAME),
      JSON.stringify([
        {
          id: 'e1',
          promptId: 'p1',
          helpfulness: 7,
          truthfulness: 3,
          harmlessness: 3,
          comment: '',
          timestamp: '2024-05-01T10:00:00.000Z',
          status: 'completed',
        },
      ])
    );

    await expect(
      createJsonStores(directory).evaluations.loadAll()
    ).rejects.toThrow(StorageError);
  });

  it('treats a malformed file as empty when recovery is enabled', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    await writeFile(join(directory, PROMPTS_FILE_NAME), 'not json');

    const stores = createJsonStores(directory, { recoverMalformedFiles: true });

    expect(await stores.prompts.loadAll()).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('does not write anything when an update fails', async () => {
    await writeFile(join(directory, EVALUATIONS_FILE_NAME), 'broken');

    await expect(
      createJsonStores(directory).evaluations.update('e1', { comment: 'x' })
    ).rejects.toThrow(StorageError);
    expect(
      await readFile(join(directory, EVALUATIONS_FILE_NAME), 'utf8')
    ).toBe('broken');
  });
});
