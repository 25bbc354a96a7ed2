/** Rough reading level derived from the average sentence length. */
export type ReadingLevel = 'Simple' | 'Moderate' | 'Complex';

/** Basic statistics about a piece of text. */
export interface TextStats {
  wordCount: number;
  charCount: number;
  sentenceCount: number;
  averageWordsPerSentence: number;
  /** Absent for text without words. */
  readingLevel?: ReadingLevel;
  /** Length-based complexity between 1 and 5. */
  complexity: number;
  /** Number of clarity indicators between 1 and 5. */
  clarity: number;
}

/** Markers that suggest a prompt asks for something clearly. */
const CLARITY_INDICATORS = ['?', 'please', 'explain', 'how', 'what', 'why'];
const CONTEXT_WORDS = ['for', 'as', 'like', 'example', 'please'];
const EXAMPLE_MARKERS = ['example', 'for instance', 'such as', 'like'];
const STRUCTURE_MARKERS = ['first', 'second', 'next', 'finally', '1.', '2.'];
const EXPLANATION_MARKERS = [
  'because',
  'therefore',
  'this means',
  'in other words',
];

/** Splits text into whitespace-separated words. */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/** Splits text into the non-blank pieces between sentence terminators. */
export function splitSentences(text: string): string[] {
  return text
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
}

/** Computes the statistics shown next to a prompt or response. */
export function computeTextStats(text: string): TextStats {
  const wordCount = splitWords(text).length;
  const charCount = text.length;
  const sentenceCount = splitSentences(text).length;
  const averageWordsPerSentence = wordCount / Math.max(sentenceCount, 1);
  const lowerCased = text.toLowerCase();
  const foundIndicators = CLARITY_INDICATORS.filter((indicator) =>
    lowerCased.includes(indicator)
  ).length;

  const stats: TextStats = {
    wordCount,
    charCount,
    sentenceCount,
    averageWordsPerSentence,
    complexity: clamp(
      Math.floor(wordCount / 10) + Math.floor(charCount / 100),
      1,
      5
    ),
    clarity: Math.min(5, foundIndicators + 1),
  };

  if (wordCount > 0) {
    stats.readingLevel = getReadingLevel(averageWordsPerSentence);
  }

  return stats;
}

/** Maps an average sentence length to a reading level. */
export function getReadingLevel(averageWordsPerSentence: number): ReadingLevel {
  if (averageWordsPerSentence < 10) {
    return 'Simple';
  } else if (averageWordsPerSentence < 20) {
    return 'Moderate';
  }
  return 'Complex';
}

/** Signals about how a prompt is phrased. */
export interface PromptSignals {
  hasQuestion: boolean;
  hasContext: boolean;
}

export function analyzePromptSignals(prompt: string): PromptSignals {
  return {
    hasQuestion: prompt.includes('?'),
    hasContext: containsWord(prompt, CONTEXT_WORDS),
  };
}

/** Signals about the content of a response. */
export interface ResponseSignals {
  hasExamples: boolean;
  hasStructure: boolean;
  hasExplanation: boolean;
  /** Number of signals that are present, between 0 and 3. */
  contentQuality: number;
}

export function analyzeResponseSignals(response: string): ResponseSignals {
  const lowerCased = response.toLowerCase();
  const hasExamples = EXAMPLE_MARKERS.some((m) => lowerCased.includes(m));
  const hasStructure = STRUCTURE_MARKERS.some((m) => lowerCased.includes(m));
  const hasExplanation = EXPLANATION_MARKERS.some((m) =>
    lowerCased.includes(m)
  );

  return {
    hasExamples,
    hasStructure,
    hasExplanation,
    contentQuality: [hasExamples, hasStructure, hasExplanation].filter(Boolean)
      .length,
  };
}

/** Whether any of the given words appears in the text as a whole word. */
export function containsWord(text: string, words: readonly string[]): boolean {
  const lowerCased = text.toLowerCase();
  return words.some((word) => createWordPattern(word).test(lowerCased));
}

/** Creates a case-insensitive pattern matching a (multi-)word phrase. */
export function createWordPattern(phrase: string, flags = 'i'): RegExp {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped.replace(/\s+/g, '\\s+')}\\b`, flags);
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
