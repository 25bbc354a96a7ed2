import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createJsonStores } from './json-file-store.js';
import { createSqlStores, SqlStores } from './sql-store.js';
import { migrateJsonToSql } from './sql-migration.js';

describe('migrateJsonToSql', () => {
  let directory: string;
  let target: SqlStores;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    directory = await mkdtemp(join(tmpdir(), 'response-rater-migration-'));
    target = createSqlStores({ url: `file:${join(directory, 'target.db')}` });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await target.close();
    await rm(directory, { recursive: true, force: true });
  });

  it('copies prompts and evaluations with their IDs', async () => {
    const source = createJsonStores(join(directory, 'data'));
    const prompt = await source.prompts.append({
      prompt: 'What causes earthquakes?',
      response: 'Moving tectonic plates.',
      category: 'Educational',
    });
    await source.prompts.append({ prompt: 'Unrated', category: 'Custom' });
    await source.evaluations.append({
      promptId: prompt.id,
      helpfulness: 4,
      truthfulness: 4,
      harmlessness: 5,
      comment: 'Short but right.',
    });

    const result = await migrateJsonToSql(source, target.database);

    expect(result).toEqual({ skipped: false, prompts: 2, evaluations: 1 });
    expect(await target.prompts.loadAll()).toEqual(
      await source.prompts.loadAll()
    );
    expect(await target.evaluations.loadAll()).toEqual(
      await source.evaluations.loadAll()
    );
  });

  it('skips databases that already contain prompts', async () => {
    const source = createJsonStores(join(directory, 'data'));
    await source.prompts.append({ prompt: 'From JSON', category: 'Custom' });
    await target.prompts.append({ prompt: 'Already there', category: 'Custom' });

    const result = await migrateJsonToSql(source, target.database);

    expect(result).toEqual({ skipped: true, prompts: 0, evaluations: 0 });
    expect((await target.prompts.loadAll()).map((p) => p.prompt)).toEqual([
      'Already there',
    ]);
  });
});
