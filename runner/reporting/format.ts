import chalk from 'chalk';
import boxen from 'boxen';

/** Formats a title card that can be shown at the beginning a script. */
export function formatTitleCard(text: string, width = 80): string {
  return boxen(text, {
    title: 'response-rater',
    titleAlignment: 'center',
    borderStyle: 'double',
    borderColor: 'cyan',
    padding: 1,
    width,
  });
}

/**
 * Formats a score message for display by adding a color depending on its value.
 *
 * @param score Score percentage that was achieved. Between 0 and 1.
 * @param message Message to be formatted.
 */
export function formatScore(score: number, message: string): string {
  let formatFn: (value: string) => string;

  if (score >= 0.8) {
    formatFn = chalk.green; // Green for high scores
  } else if (score >= 0.5) {
    formatFn = chalk.yellow; // Yellow for medium scores
  } else {
    formatFn = chalk.red; // Red for low scores
  }

  return formatFn(message);
}

/** Formats an average Likert score as e.g. `3.67/5`, or `N/A` if missing. */
export function formatAverage(average: number | null): string {
  if (average === null) {
    return chalk.gray('N/A');
  }
  return formatScore(average / 5, `${average.toFixed(2)}/5`);
}

/**
 * Converts a JavaScript object into a JSON string, pretty-printed with an
 * indent of 2 spaces.
 */
export function printJson(obj: {}): string {
  return JSON.stringify(obj, null, 2);
}

/** Returns a green checkmark icon. */
export function greenCheckmark(): string {
  return chalk.green('✔');
}

/** Returns a yellow warning icon. */
export function yellowWarning(): string {
  return chalk.yellow('⚠');
}

/** Returns a red X icon. */
export function redX(): string {
  return chalk.red('✘');
}
