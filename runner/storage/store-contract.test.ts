import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { NewEvaluationRecord } from '../shared-interfaces.js';
import { NotFoundError, StorageError } from '../utils/errors.js';
import { createJsonStores } from './json-file-store.js';
import { createSqlStores } from './sql-store.js';
import { Stores } from './store.js';

const backends: Array<[string, (directory: string) => Stores]> = [
  ['json', (directory) => createJsonStores(directory)],
  [
    'sql',
    (directory) => createSqlStores({ url: `file:${join(directory, 'test.db')}` }),
  ],
];

function newEvaluation(
  overrides: Partial<NewEvaluationRecord> = {}
): NewEvaluationRecord {
  return {
    promptId: 'prompt-1',
    helpfulness: 4,
    truthfulness: 5,
    harmlessness: 3,
    comment: 'Clear and accurate.',
    ...overrides,
  };
}

describe.each(backends)('%s stores', (_name, createBackend) => {
  let directory: string;
  let stores: Stores;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'response-rater-'));
    stores = createBackend(directory);
  });

  afterEach(async () => {
    await stores.close();
    await rm(directory, { recursive: true, force: true });
  });

  describe('evaluations', () => {
    it('starts out empty', async () => {
      expect(await stores.evaluations.loadAll()).toEqual([]);
    });

    it('stores appended records with a fresh ID', async () => {
      const input = newEvaluation({ timestamp: '2024-05-01T10:00:00.000Z' });
      const stored = await stores.evaluations.append(input);

      expect(stored).toEqual({
        ...input,
        id: expect.any(String),
        status: 'completed',
      });
      expect(await stores.evaluations.loadAll()).toEqual([stored]);
    });

    it('stamps the current time and keeps an explicit status', async () => {
      const before = Date.now();
      const stored = await stores.evaluations.append(
        newEvaluation({ status: 'pending' })
      );

      expect(stored.status).toBe('pending');
      expect(Date.parse(stored.timestamp)).toBeGreaterThanOrEqual(before);
    });

    it('keeps records in insertion order with unique IDs', async () => {
      const first = await stores.evaluations.append(
        newEvaluation({ promptId: 'a' })
      );
      const second = await stores.evaluations.append(
        newEvaluation({ promptId: 'b' })
      );
      const third = await stores.evaluations.append(
        newEvaluation({ promptId: 'c' })
      );
      const loaded = await stores.evaluations.loadAll();

      expect(loaded.map((r) => r.promptId)).toEqual(['a', 'b', 'c']);
      expect(new Set([first.id, second.id, third.id]).size).toBe(3);
    });

    it('preserves string fields exactly', async () => {
      const comment = 'Très bien: "quoted", \'single\'\n\ttabbed 🚀 \\ done';
      await stores.evaluations.append(
        newEvaluation({ comment, timestamp: '2024-05-01T10:00:00.123+02:00' })
      );
      const [loaded] = await stores.evaluations.loadAll();

      expect(loaded.comment).toBe(comment);
      expect(loaded.timestamp).toBe('2024-05-01T10:00:00.123+02:00');
    });

    it('merges a patch into an existing record', async () => {
      const stored = await stores.evaluations.append(newEvaluation());
      const updated = await stores.evaluations.update(stored.id, {
        helpfulness: 1,
        comment: 'Changed my mind.',
      });

      expect(updated).toEqual({
        ...stored,
        helpfulness: 1,
        comment: 'Changed my mind.',
      });
      expect(await stores.evaluations.loadAll()).toEqual([updated]);
    });

    it('fails to update a missing record and leaves the rest untouched', async () => {
      const stored = await stores.evaluations.append(newEvaluation());

      await expect(
        stores.evaluations.update('missing', { helpfulness: 2 })
      ).rejects.toThrow(NotFoundError);
      expect(await stores.evaluations.loadAll()).toEqual([stored]);
    });

    it('rejects records with out-of-range scores and keeps the rest', async () => {
      const stored = await stores.evaluations.append(newEvaluation());

      await expect(
        stores.evaluations.append(newEvaluation({ helpfulness: 9 }))
      ).rejects.toThrow(StorageError);
      await expect(
        stores.evaluations.update(stored.id, { truthfulness: 0 })
      ).rejects.toThrow(StorageError);
      expect(await stores.evaluations.loadAll()).toEqual([stored]);
    });

    it('deletes records', async () => {
      const first = await stores.evaluations.append(newEvaluation());
      const second = await stores.evaluations.append(newEvaluation());

      await stores.evaluations.delete(first.id);

      expect(await stores.evaluations.loadAll()).toEqual([second]);
    });

    it('fails to delete a missing record', async () => {
      await expect(stores.evaluations.delete('missing')).rejects.toThrow(
        NotFoundError
      );
    });
  });

  describe('prompts', () => {
    it('stores prompts without a response', async () => {
      const stored = await stores.prompts.append({
        prompt: 'What causes tides?',
        category: 'Educational',
        createdAt: '2024-05-01T10:00:00.000Z',
      });

      expect(stored).toEqual({
        id: expect.any(String),
        prompt: 'What causes tides?',
        category: 'Educational',
        createdAt: '2024-05-01T10:00:00.000Z',
      });
      expect(await stores.prompts.loadAll()).toEqual([stored]);
    });

    it('updates the response of a prompt', async () => {
      const stored = await stores.prompts.append({
        prompt: 'What causes tides?',
        response: 'The wind.',
        category: 'Educational',
      });
      const updated = await stores.prompts.updateResponse(
        stored.id,
        'Mostly the gravity of the moon.'
      );

      expect(updated).toEqual({
        ...stored,
        response: 'Mostly the gravity of the moon.',
      });
      expect(await stores.prompts.loadAll()).toEqual([updated]);
    });

    it('fails to update the response of a missing prompt', async () => {
      await expect(
        stores.prompts.updateResponse('missing', 'Anything.')
      ).rejects.toThrow(NotFoundError);
    });
  });
});
