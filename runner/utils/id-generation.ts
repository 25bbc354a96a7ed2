import { randomUUID } from 'crypto';

/** Generates a random record ID that isn't part of `existingIds`. */
export function generateRecordId(
  existingIds: ReadonlySet<string>,
  createId: () => string = randomUUID
): string {
  let id = createId();

  while (existingIds.has(id)) {
    id = createId();
  }

  return id;
}
