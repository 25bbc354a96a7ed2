import z from 'zod';
import { createMessageBuilder, fromError } from 'zod-validation-error/v3';
import { ValidationError } from './errors.js';

/**
 * Parses a value against a schema.
 * @throws ValidationError listing every issue if the value doesn't match.
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  prefix: string
): z.output<T> {
  const validationResult = schema.safeParse(value);

  if (!validationResult.success) {
    const message = fromError(validationResult.error, {
      messageBuilder: createMessageBuilder({
        prefix,
        prefixSeparator: '\n',
        issueSeparator: '\n',
      }),
    }).toString();

    throw new ValidationError(message, { cause: validationResult.error });
  }

  return validationResult.data;
}
