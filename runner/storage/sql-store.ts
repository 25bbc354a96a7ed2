import {
  createClient,
  type Client,
  type InStatement,
  type ResultSet,
  type Row,
  type Value,
} from '@libsql/client';
import z from 'zod';
import { fromError } from 'zod-validation-error/v3';
import {
  EvaluationPatch,
  EvaluationRecord,
  evaluationRecordSchema,
  NewEvaluationRecord,
  NewPromptRecord,
  PromptRecord,
  promptRecordSchema,
} from '../shared-interfaces.js';
import { NotFoundError, StorageError } from '../utils/errors.js';
import { generateRecordId } from '../utils/id-generation.js';
import { ensureSchema } from './sql-schema.js';
import {
  EvaluationStore,
  mergeEvaluationPatch,
  PromptStore,
  Stores,
} from './store.js';

/** Connection options for the SQL backend. */
export interface SqlConnectionOptions {
  /** libsql URL, e.g. `file:ratings.db` or `libsql://<host>`. */
  url: string;
  authToken?: string;
}

/**
 * Thin wrapper around a libsql client that makes sure the schema exists
 * before the first statement runs and reports failures as `StorageError`s.
 */
export class SqlDatabase {
  /** Pending or finished schema creation. Reset if it fails. */
  private schemaReady: Promise<void> | null = null;

  constructor(readonly client: Client) {}

  async execute(statement: InStatement): Promise<ResultSet> {
    try {
      await this.ensureSchemaOnce();
      return await this.client.execute(statement);
    } catch (error) {
      throw toStorageError(error);
    }
  }

  async batch(statements: InStatement[]): Promise<void> {
    try {
      await this.ensureSchemaOnce();
      await this.client.batch(statements, 'write');
    } catch (error) {
      throw toStorageError(error);
    }
  }

  close(): void {
    this.client.close();
  }

  private ensureSchemaOnce(): Promise<void> {
    if (!this.schemaReady) {
      this.schemaReady = ensureSchema(this.client).catch((error: unknown) => {
        this.schemaReady = null;
        throw error;
      });
    }
    return this.schemaReady;
  }
}

/** Evaluation store backed by the `evaluations` table. */
export class SqlEvaluationStore implements EvaluationStore {
  constructor(private readonly db: SqlDatabase) {}

  async loadAll(): Promise<EvaluationRecord[]> {
    const { rows } = await this.db.execute(
      `SELECT * FROM evaluations ORDER BY seq`
    );
    return rows.map(rowToEvaluation);
  }

  async append(record: NewEvaluationRecord): Promise<EvaluationRecord> {
    const stored: EvaluationRecord = {
      id: generateRecordId(await this.existingIds()),
      promptId: record.promptId,
      helpfulness: record.helpfulness,
      truthfulness: record.truthfulness,
      harmlessness: record.harmlessness,
      comment: record.comment,
      timestamp: record.timestamp ?? new Date().toISOString(),
      status: record.status ?? 'completed',
    };

    await this.db.execute(insertEvaluationStatement(stored));
    return stored;
  }

  async update(id: string, patch: EvaluationPatch): Promise<EvaluationRecord> {
    const { rows } = await this.db.execute({
      sql: `SELECT * FROM evaluations WHERE id = ? LIMIT 1`,
      args: [id],
    });

    if (rows.length === 0) {
      throw new NotFoundError('evaluation', id);
    }

    const updated = mergeEvaluationPatch(rowToEvaluation(rows[0]), patch);
    await this.db.execute({
      sql: `UPDATE evaluations
            SET helpfulness_score = ?, truthfulness_score = ?, harmlessness_score = ?,
                comments = ?, status = ?
            WHERE id = ?`,
      args: [
        updated.helpfulness,
        updated.truthfulness,
        updated.harmlessness,
        updated.comment,
        updated.status,
        id,
      ],
    });

    return updated;
  }

  async delete(id: string): Promise<void> {
    const result = await this.db.execute({
      sql: `DELETE FROM evaluations WHERE id = ?`,
      args: [id],
    });

    if (result.rowsAffected === 0) {
      throw new NotFoundError('evaluation', id);
    }
  }

  private async existingIds(): Promise<Set<string>> {
    const { rows } = await this.db.execute(`SELECT id FROM evaluations`);
    return new Set(rows.map((row) => String(row['id'])));
  }
}

/** Prompt store backed by the `prompts` table. */
export class SqlPromptStore implements PromptStore {
  constructor(private readonly db: SqlDatabase) {}

  async loadAll(): Promise<PromptRecord[]> {
    const { rows } = await this.db.execute(
      `SELECT * FROM prompts ORDER BY seq`
    );
    return rows.map(rowToPrompt);
  }

  async append(record: NewPromptRecord): Promise<PromptRecord> {
    const { rows } = await this.db.execute(`SELECT id FROM prompts`);
    const stored: PromptRecord = {
      id: generateRecordId(new Set(rows.map((row) => String(row['id'])))),
      prompt: record.prompt,
      category: record.category,
      createdAt: record.createdAt ?? new Date().toISOString(),
    };

    if (record.response !== undefined) {
      stored.response = record.response;
    }

    await this.db.execute(insertPromptStatement(stored));
    return stored;
  }

  async updateResponse(id: string, response: string): Promise<PromptRecord> {
    const result = await this.db.execute({
      sql: `UPDATE prompts SET response_text = ? WHERE id = ?`,
      args: [response, id],
    });

    if (result.rowsAffected === 0) {
      throw new NotFoundError('prompt', id);
    }

    const { rows } = await this.db.execute({
      sql: `SELECT * FROM prompts WHERE id = ? LIMIT 1`,
      args: [id],
    });
    return rowToPrompt(rows[0]);
  }
}

/** SQL-backed stores, exposing the database for migrations. */
export interface SqlStores extends Stores {
  kind: 'sql';
  database: SqlDatabase;
}

/** Creates the SQL-backed stores for a libsql connection. */
export function createSqlStores(options: SqlConnectionOptions): SqlStores {
  const db = new SqlDatabase(
    createClient({
      url: options.url,
      ...(options.authToken ? { authToken: options.authToken } : {}),
    })
  );

  return {
    kind: 'sql',
    database: db,
    prompts: new SqlPromptStore(db),
    evaluations: new SqlEvaluationStore(db),
    close: async () => db.close(),
  };
}

/** Statement inserting a prompt with an already assigned ID. */
export function insertPromptStatement(prompt: PromptRecord): InStatement {
  return {
    sql: `INSERT INTO prompts (id, prompt_text, response_text, category, created_at)
          VALUES (?, ?, ?, ?, ?)`,
    args: [
      prompt.id,
      prompt.prompt,
      prompt.response ?? null,
      prompt.category,
      prompt.createdAt,
    ],
  };
}

/** Statement inserting an evaluation with an already assigned ID. */
export function insertEvaluationStatement(
  evaluation: EvaluationRecord
): InStatement {
  return {
    sql: `INSERT INTO evaluations (id, prompt_id, helpfulness_score, truthfulness_score,
            harmlessness_score, comments, status, created_at)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    args: [
      evaluation.id,
      evaluation.promptId,
      evaluation.helpfulness,
      evaluation.truthfulness,
      evaluation.harmlessness,
      evaluation.comment,
      evaluation.status,
      evaluation.timestamp,
    ],
  };
}

function rowToEvaluation(row: Row): EvaluationRecord {
  return parseRow(evaluationRecordSchema, {
    id: row['id'],
    promptId: row['prompt_id'],
    helpfulness: toNumber(row['helpfulness_score']),
    truthfulness: toNumber(row['truthfulness_score']),
    harmlessness: toNumber(row['harmlessness_score']),
    comment: row['comments'],
    timestamp: row['created_at'],
    status: row['status'],
  });
}

function rowToPrompt(row: Row): PromptRecord {
  const responseText = row['response_text'];

  return parseRow(promptRecordSchema, {
    id: row['id'],
    prompt: row['prompt_text'],
    ...(responseText === null ? {} : { response: responseText }),
    category: row['category'],
    createdAt: row['created_at'],
  });
}

function parseRow<T>(schema: z.ZodType<T>, value: unknown): T {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new StorageError(
      `Database row does not match the expected shape. ${fromError(result.error).toString()}`
    );
  }
  return result.data;
}

/** libsql may return integers as bigints depending on the integer mode. */
function toNumber(value: Value): unknown {
  return typeof value === 'bigint' ? Number(value) : value;
}

function toStorageError(error: unknown): Error {
  if (error instanceof StorageError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StorageError(`Database operation failed: ${message}`, {
    cause: error,
  });
}
