import chalk from 'chalk';
import { greenCheckmark } from '../reporting/format.js';
import {
  insertEvaluationStatement,
  insertPromptStatement,
  SqlDatabase,
} from './sql-store.js';
import { Stores } from './store.js';

/** Outcome of copying the JSON collections into a database. */
export interface MigrationResult {
  /** Whether the copy was skipped because the database already had prompts. */
  skipped: boolean;
  prompts: number;
  evaluations: number;
}

/**
 * Copies all prompts and evaluations from a set of stores (usually the JSON
 * ones) into an SQL database, keeping their IDs and timestamps. The copy is
 * skipped if the database already contains prompts.
 */
export async function migrateJsonToSql(
  source: Pick<Stores, 'prompts' | 'evaluations'>,
  target: SqlDatabase
): Promise<MigrationResult> {
  const { rows } = await target.execute(
    `SELECT COUNT(*) AS count FROM prompts`
  );

  if (Number(rows[0]['count']) > 0) {
    console.warn(
      chalk.yellow(
        'Database already contains prompts. Skipping the migration.'
      )
    );
    return { skipped: true, prompts: 0, evaluations: 0 };
  }

  const prompts = await source.prompts.loadAll();
  const evaluations = await source.evaluations.loadAll();

  const statements = [
    ...prompts.map(insertPromptStatement),
    ...evaluations.map(insertEvaluationStatement),
  ];

  if (statements.length > 0) {
    await target.batch(statements);
  }

  console.log(
    `${greenCheckmark()} Migrated ${prompts.length} prompts and ` +
      `${evaluations.length} evaluations.`
  );

  return {
    skipped: false,
    prompts: prompts.length,
    evaluations: evaluations.length,
  };
}
