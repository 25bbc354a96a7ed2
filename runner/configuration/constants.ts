import { join } from 'path';

// Extracted out for convenience, do NOT export.
const rootDir = join(process.cwd(), '.response-rater');

/** Directory holding `prompts.json` and `evaluations.json` by default. */
export const DEFAULT_DATA_DIR = join(rootDir, 'data');

/** Name of the folder where analysis reports are written by default. */
export const REPORTS_ROOT_DIR = join(rootDir, 'reports');

/** Port on which the HTTP API is served when none is configured. */
export const DEFAULT_PORT = 4300;

/** Model used for response generation when `HF_MODEL` is not set. */
export const DEFAULT_HF_MODEL = 'microsoft/DialoGPT-medium';

/** Category assigned to prompts that were authored ad hoc while rating. */
export const CUSTOM_PROMPT_CATEGORY = 'Custom';
