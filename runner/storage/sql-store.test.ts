import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createClient } from '@libsql/client';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { StorageError } from '../utils/errors.js';
import { SqlDatabase } from './sql-store.js';

describe('SqlDatabase', () => {
  let directory: string;
  let db: SqlDatabase;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'response-rater-sql-'));
    db = new SqlDatabase(
      createClient({ url: `file:${join(directory, 'test.db')}` })
    );
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    db.close();
    await rm(directory, { recursive: true, force: true });
  });

  it('retries creating the schema after a failed attempt', async () => {
    const batch = vi
      .spyOn(db.client, 'batch')
      .mockRejectedValueOnce(new Error('database is locked'));

    await expect(
      db.execute('SELECT COUNT(*) AS count FROM prompts')
    ).rejects.toThrow(
      new StorageError('Database operation failed: database is locked')
    );

    const { rows } = await db.execute('SELECT COUNT(*) AS count FROM prompts');

    expect(Number(rows[0]['count'])).toBe(0);
    expect(batch).toHaveBeenCalledTimes(2);
  });

  it('creates the schema only once', async () => {
    const batch = vi.spyOn(db.client, 'batch');

    await db.execute('SELECT id FROM prompts');
    await db.execute('SELECT id FROM evaluations');

    expect(batch).toHaveBeenCalledTimes(1);
  });

  it('wraps driver errors in a StorageError', async () => {
    await expect(db.execute('SELECT * FROM missing_table')).rejects.toThrow(
      StorageError
    );
  });
});
