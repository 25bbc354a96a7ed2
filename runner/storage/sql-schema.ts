import type { Client } from '@libsql/client';

/**
 * Statements creating the tables backing the SQL stores. Both tables keep an
 * autoincrement `seq` column so that reads can return records in insertion
 * order, matching the JSON backend.
 */
const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS prompts (
    seq            INTEGER PRIMARY KEY AUTOINCREMENT,
    id             TEXT    NOT NULL UNIQUE,
    prompt_text    TEXT    NOT NULL,
    response_text  TEXT,
    category       TEXT    NOT NULL,
    created_at     TEXT    NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS evaluations (
    seq                 INTEGER PRIMARY KEY AUTOINCREMENT,
    id                  TEXT    NOT NULL UNIQUE,
    prompt_id           TEXT    NOT NULL,
    helpfulness_score   INTEGER NOT NULL CHECK (helpfulness_score BETWEEN 1 AND 5),
    truthfulness_score  INTEGER NOT NULL CHECK (truthfulness_score BETWEEN 1 AND 5),
    harmlessness_score  INTEGER NOT NULL CHECK (harmlessness_score BETWEEN 1 AND 5),
    comments            TEXT    NOT NULL DEFAULT '',
    status              TEXT    NOT NULL CHECK (status IN ('pending', 'completed')),
    created_at          TEXT    NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS ix_evaluations_prompt ON evaluations(prompt_id)`,
];

/** Creates the tables if they don't exist yet. Safe to call repeatedly. */
export async function ensureSchema(db: Client): Promise<void> {
  await db.batch(SCHEMA_STATEMENTS, 'write');
}
