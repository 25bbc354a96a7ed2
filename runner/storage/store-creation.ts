import { AppConfig } from '../configuration/app-config.js';
import { UserFacingError } from '../utils/errors.js';
import { createJsonStores } from './json-file-store.js';
import { createSqlStores } from './sql-store.js';
import { StorageKind, Stores } from './store.js';

/**
 * Creates the stores for the configured backend. Meant to be called once at
 * startup; the rest of the program only sees the `Stores` interface.
 */
export function createStores(
  config: Pick<
    AppConfig,
    | 'storage'
    | 'dataDirectory'
    | 'databaseUrl'
    | 'databaseAuthToken'
    | 'recoverMalformedFiles'
  >
): Stores {
  const kind: StorageKind = config.storage;

  switch (kind) {
    case 'json':
      return createJsonStores(config.dataDirectory, {
        recoverMalformedFiles: config.recoverMalformedFiles,
      });
    case 'sql':
      if (!config.databaseUrl) {
        throw new UserFacingError(
          'The SQL storage backend requires a database URL. ' +
            'Set `DATABASE_URL` or pass `--database-url`.'
        );
      }
      return createSqlStores({
        url: config.databaseUrl,
        authToken: config.databaseAuthToken,
      });
    default:
      throw new UserFacingError(`Unsupported storage backend ${kind}`);
  }
}
