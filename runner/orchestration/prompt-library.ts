import chalk from 'chalk';
import z from 'zod';
import defaultPrompts from '../data/default-prompts.json' with { type: 'json' };
import { CUSTOM_PROMPT_CATEGORY } from '../configuration/constants.js';
import { PromptRecord } from '../shared-interfaces.js';
import { PromptStore } from '../storage/store.js';
import { parseInput } from '../utils/validation.js';

const defaultPromptsSchema = z.array(
  z.strictObject({
    prompt: z.string(),
    response: z.string(),
    category: z.string(),
  })
);

const newPromptSchema = z.strictObject({
  prompt: z.string().trim().min(1, 'Prompt text cannot be empty'),
  response: z.string().trim().min(1).optional(),
  category: z.string().trim().min(1).default(CUSTOM_PROMPT_CATEGORY),
});

const responseSchema = z.string().trim().min(1, 'Response cannot be empty');

/**
 * Adds the bundled prompt/response pairs to an empty store.
 * @returns The number of prompts that were added.
 */
export async function seedDefaultPrompts(store: PromptStore): Promise<number> {
  const existing = await store.loadAll();

  if (existing.length > 0) {
    return 0;
  }

  const seeds = defaultPromptsSchema.parse(defaultPrompts);

  for (const seed of seeds) {
    await store.append(seed);
  }

  console.log(chalk.gray(`Seeded ${seeds.length} default prompts.`));
  return seeds.length;
}

/**
 * Stores a newly authored prompt.
 * @throws ValidationError if the prompt text is empty.
 */
export async function authorPrompt(
  store: PromptStore,
  input: unknown
): Promise<PromptRecord> {
  const prompt = parseInput(newPromptSchema, input, 'Invalid prompt:');
  return await store.append(prompt);
}

/**
 * Sets the response that should be rated for a prompt.
 * @throws ValidationError if the response is empty.
 * @throws NotFoundError if there's no prompt with the ID.
 */
export async function setPromptResponse(
  store: PromptStore,
  id: string,
  response: unknown
): Promise<PromptRecord> {
  return await store.updateResponse(
    id,
    parseInput(responseSchema, response, 'Invalid response:')
  );
}
