/** Error whose message can be shown to the user as-is. */
export class UserFacingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Input that was rejected before reaching the storage layer. */
export class ValidationError extends UserFacingError {}

/** A record referenced by ID doesn't exist in the collection. */
export class NotFoundError extends UserFacingError {
  constructor(
    readonly collection: string,
    readonly id: string
  ) {
    super(`No ${collection} record with ID "${id}" exists.`);
  }
}

/**
 * The persisted collection couldn't be read or written, e.g. because
 * the file on disk is not valid JSON.
 */
export class StorageError extends UserFacingError {}
