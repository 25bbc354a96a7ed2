import { join } from 'path';
import chalk from 'chalk';
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
import { readFileIfExists, safeWriteFile } from '../file-system-utils.js';
import { printJson } from '../reporting/format.js';
import { NotFoundError, StorageError } from '../utils/errors.js';
import { generateRecordId } from '../utils/id-generation.js';
import {
  EvaluationStore,
  mergeEvaluationPatch,
  PromptStore,
  Stores,
} from './store.js';

/** Name of the file holding evaluations inside the data directory. */
export const EVALUATIONS_FILE_NAME = 'evaluations.json';

/** Name of the file holding prompts inside the data directory. */
export const PROMPTS_FILE_NAME = 'prompts.json';

export interface JsonCollectionOptions {
  /**
   * Whether a file that can't be parsed should be treated as an empty
   * collection instead of failing the operation.
   */
  recoverMalformedFiles?: boolean;
}

/** Collection of records stored as a single JSON array on disk. */
export class JsonFileCollection<T extends { id: string }> {
  constructor(
    readonly filePath: string,
    private readonly recordSchema: z.ZodType<T>,
    private readonly options: JsonCollectionOptions = {}
  ) {}

  /** Reads all records. A missing file is an empty collection. */
  async read(): Promise<T[]> {
    const content = await readFileIfExists(this.filePath);

    if (content === null) {
      return [];
    }

    let parsed: unknown;

    try {
      parsed = JSON.parse(content);
    } catch (error) {
      return this.handleMalformedFile(
        `Could not parse "${this.filePath}" as JSON.`,
        error
      );
    }

    const validationResult = z.array(this.recordSchema).safeParse(parsed);

    if (!validationResult.success) {
      const details = fromError(validationResult.error).toString();
      return this.handleMalformedFile(
        `File "${this.filePath}" does not contain valid records. ${details}`,
        validationResult.error
      );
    }

    return validationResult.data;
  }

  /**
   * Replaces the entire collection on disk. Records that don't match the
   * schema are rejected before anything is written.
   */
  async write(records: T[]): Promise<void> {
    const validationResult = z.array(this.recordSchema).safeParse(records);

    if (!validationResult.success) {
      throw new StorageError(
        `Refusing to write invalid records to "${this.filePath}". ` +
          fromError(validationResult.error).toString(),
        { cause: validationResult.error }
      );
    }

    try {
      await safeWriteFile(this.filePath, printJson(records));
    } catch (error) {
      throw new StorageError(`Could not write "${this.filePath}".`, {
        cause: error,
      });
    }
  }

  /**
   * Replaces the record with the given ID by the result of `change` and
   * writes the collection back.
   */
  async replace(
    id: string,
    collectionName: string,
    change: (record: T) => T
  ): Promise<T> {
    const records = await this.read();
    const index = this.indexOrThrow(records, id, collectionName);
    const replacement = change(records[index]);

    records[index] = replacement;
    await this.write(records);
    return replacement;
  }

  /** Removes the record with the given ID and writes the collection back. */
  async remove(id: string, collectionName: string): Promise<void> {
    const records = await this.read();
    records.splice(this.indexOrThrow(records, id, collectionName), 1);
    await this.write(records);
  }

  private indexOrThrow(
    records: T[],
    id: string,
    collectionName: string
  ): number {
    const index = records.findIndex((record) => record.id === id);

    if (index === -1) {
      throw new NotFoundError(collectionName, id);
    }
    return index;
  }

  private handleMalformedFile(message: string, cause: unknown): T[] {
    if (this.options.recoverMalformedFiles) {
      console.warn(chalk.yellow(`${message} Treating it as empty.`));
      return [];
    }
    throw new StorageError(message, { cause });
  }
}

/** Evaluation store backed by `evaluations.json`. */
export class JsonEvaluationStore implements EvaluationStore {
  private readonly collection: JsonFileCollection<EvaluationRecord>;

  constructor(filePath: string, options?: JsonCollectionOptions) {
    this.collection = new JsonFileCollection(
      filePath,
      evaluationRecordSchema,
      options
    );
  }

  loadAll(): Promise<EvaluationRecord[]> {
    return this.collection.read();
  }

  async append(record: NewEvaluationRecord): Promise<EvaluationRecord> {
    const records = await this.collection.read();
    const stored: EvaluationRecord = {
      id: generateRecordId(new Set(records.map((r) => r.id))),
      promptId: record.promptId,
      helpfulness: record.helpfulness,
      truthfulness: record.truthfulness,
      harmlessness: record.harmlessness,
      comment: record.comment,
      timestamp: record.timestamp ?? new Date().toISOString(),
      status: record.status ?? 'completed',
    };

    records.push(stored);
    await this.collection.write(records);
    return stored;
  }

  update(id: string, patch: EvaluationPatch): Promise<EvaluationRecord> {
    return this.collection.replace(id, 'evaluation', (record) =>
      mergeEvaluationPatch(record, patch)
    );
  }

  delete(id: string): Promise<void> {
    return this.collection.remove(id, 'evaluation');
  }
}

/** Prompt store backed by `prompts.json`. */
export class JsonPromptStore implements PromptStore {
  private readonly collection: JsonFileCollection<PromptRecord>;

  constructor(filePath: string, options?: JsonCollectionOptions) {
    this.collection = new JsonFileCollection(
      filePath,
      promptRecordSchema,
      options
    );
  }

  loadAll(): Promise<PromptRecord[]> {
    return this.collection.read();
  }

  async append(record: NewPromptRecord): Promise<PromptRecord> {
    const records = await this.collection.read();
    const stored: PromptRecord = {
      id: generateRecordId(new Set(records.map((r) => r.id))),
      prompt: record.prompt,
      category: record.category,
      createdAt: record.createdAt ?? new Date().toISOString(),
    };

    if (record.response !== undefined) {
      stored.response = record.response;
    }

    records.push(stored);
    await this.collection.write(records);
    return stored;
  }

  updateResponse(id: string, response: string): Promise<PromptRecord> {
    return this.collection.replace(id, 'prompt', (record) => ({
      ...record,
      response,
    }));
  }
}

/** Creates the JSON-backed stores for a data directory. */
export function createJsonStores(
  dataDirectory: string,
  options?: JsonCollectionOptions
): Stores {
  return {
    kind: 'json',
    prompts: new JsonPromptStore(
      join(dataDirectory, PROMPTS_FILE_NAME),
      options
    ),
    evaluations: new JsonEvaluationStore(
      join(dataDirectory, EVALUATIONS_FILE_NAME),
      options
    ),
    close: () => Promise.resolve(),
  };
}
