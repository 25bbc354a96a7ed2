import z from 'zod';
import { createMessageBuilder, fromError } from 'zod-validation-error/v3';
import { UserFacingError } from '../utils/errors.js';
import { toProcessAbsolutePath } from '../file-system-utils.js';
import {
  DEFAULT_DATA_DIR,
  DEFAULT_HF_MODEL,
  DEFAULT_PORT,
} from './constants.js';

const appConfigSchema = z
  .strictObject({
    /** Storage backend to use for prompts and evaluations. */
    storage: z.enum(['json', 'sql']),
    /** Directory containing the JSON files of the `json` backend. */
    dataDirectory: z.string().min(1),
    /** libsql URL of the `sql` backend. */
    databaseUrl: z.string().min(1).optional(),
    databaseAuthToken: z.string().min(1).optional(),
    /** Whether to treat unparsable JSON files as empty instead of failing. */
    recoverMalformedFiles: z.boolean(),
    /** Port of the HTTP API. */
    port: z.number().int().min(0).max(65535),
    /** Hugging Face API key used to generate missing responses. */
    hfApiKey: z.string().min(1).optional(),
    hfModel: z.string().min(1),
  })
  .refine((config) => config.storage !== 'sql' || !!config.databaseUrl, {
    message: 'A database URL is required when the storage is "sql"',
    path: ['databaseUrl'],
  });

/** Settings of the application, resolved from the environment and CLI flags. */
export type AppConfig = z.infer<typeof appConfigSchema>;

/** Values that take precedence over the environment, e.g. from CLI flags. */
export type AppConfigOverrides = Partial<AppConfig>;

/**
 * Resolves the application config from environment variables and overrides.
 * @throws UserFacingError if the resulting config is invalid.
 */
export function loadAppConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: AppConfigOverrides = {}
): AppConfig {
  const fromEnv = {
    storage: env['RATER_STORAGE'] || 'json',
    dataDirectory: env['RATER_DATA_DIR']
      ? toProcessAbsolutePath(env['RATER_DATA_DIR'])
      : DEFAULT_DATA_DIR,
    databaseUrl: env['DATABASE_URL'] || undefined,
    databaseAuthToken: env['DATABASE_AUTH_TOKEN'] || undefined,
    recoverMalformedFiles: parseFlag(env['RATER_RECOVER_MALFORMED']),
    port: env['RATER_PORT'] ? Number(env['RATER_PORT']) : DEFAULT_PORT,
    hfApiKey: env['HF_API_KEY'] || undefined,
    hfModel: env['HF_MODEL'] || DEFAULT_HF_MODEL,
  };
  const merged: Record<string, unknown> = { ...fromEnv };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const validationResult = appConfigSchema.safeParse(merged);

  if (!validationResult.success) {
    const message = fromError(validationResult.error, {
      messageBuilder: createMessageBuilder({
        prefix: 'Invalid configuration:',
        prefixSeparator: '\n',
        issueSeparator: '\n',
      }),
    }).toString();

    throw new UserFacingError(message);
  }

  return validationResult.data;
}

function parseFlag(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}
