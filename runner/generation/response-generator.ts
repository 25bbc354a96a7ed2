import { PromptRecord } from '../shared-interfaces.js';
import { Stores } from '../storage/store.js';
import { NotFoundError, UserFacingError } from '../utils/errors.js';

/** Produces a response for a prompt using some external model. */
export interface ResponseGenerator {
  /** Human-readable name of the generator, e.g. for logs. */
  readonly displayName: string;

  /** Generates a response. Resolves to null if the model returned nothing. */
  generate(prompt: string): Promise<string | null>;
}

/**
 * Generates a response for a stored prompt that doesn't have one yet and
 * stores it.
 * @throws NotFoundError if there's no prompt with the ID.
 * @throws UserFacingError if the prompt already has a response (unless
 *   `overwrite` is set) or the generator produced nothing.
 */
export async function generateMissingResponse(
  stores: Stores,
  generator: ResponseGenerator,
  promptId: string,
  overwrite = false
): Promise<PromptRecord> {
  const prompts = await stores.prompts.loadAll();
  const prompt = prompts.find((p) => p.id === promptId);

  if (!prompt) {
    throw new NotFoundError('prompt', promptId);
  }

  if (prompt.response && !overwrite) {
    throw new UserFacingError(
      `Prompt "${promptId}" already has a response. Pass --overwrite to replace it.`
    );
  }

  const response = await generator.generate(prompt.prompt);

  if (!response) {
    throw new UserFacingError(
      `${generator.displayName} did not return a response for prompt "${promptId}".`
    );
  }

  return stores.prompts.updateResponse(promptId, response);
}
