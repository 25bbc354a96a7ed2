import { QualityReport } from '../shared-interfaces.js';
import {
  containsWord,
  createWordPattern,
  splitSentences,
  splitWords,
} from './text-stats.js';

/** Score that every prompt starts out with. */
export const BASELINE_SCORE = 50;

/** Prompts with fewer words than this are considered too short. */
export const MIN_WORDS = 8;

/** Prompts with more words than this are considered too long. */
export const MAX_WORDS = 60;

/** Sentences longer than this (on average) hurt clarity. */
export const MAX_AVERAGE_SENTENCE_WORDS = 25;

/** Words that make a prompt read as a question or an instruction. */
const INTENT_WORDS = new Set([
  'analyze',
  'calculate',
  'compare',
  'create',
  'define',
  'describe',
  'design',
  'discuss',
  'draft',
  'evaluate',
  'explain',
  'generate',
  'give',
  'help',
  'identify',
  'list',
  'outline',
  'provide',
  'review',
  'show',
  'suggest',
  'summarize',
  'tell',
  'translate',
  'write',
  'how',
  'what',
  'why',
  'when',
  'where',
  'who',
  'which',
  'can',
  'could',
]);

/** Qualifiers that make a prompt vague. Order determines suggestion order. */
const VAGUE_QUALIFIERS = [
  'something',
  'stuff',
  'things',
  'somehow',
  'maybe',
  'etc',
  'whatever',
  'kind of',
  'sort of',
  'various',
  'really',
  'basically',
];

const CONTEXT_WORDS = ['for', 'as', 'like', 'example', 'including', 'using'];

/** Facts about a prompt that the rules operate on. */
interface PromptFacts {
  text: string;
  words: string[];
  sentences: string[];
}

/** Result of evaluating a single rule. */
interface PromptRuleResult {
  delta: number;
  suggestion?: string;
}

/** Heuristic rule contributing to the prompt quality score. */
interface PromptRule {
  id: string;
  evaluate(facts: PromptFacts): PromptRuleResult;
}

const lengthRule: PromptRule = {
  id: 'length',
  evaluate: ({ words }) => {
    if (words.length < MIN_WORDS) {
      return {
        delta: -20,
        suggestion:
          'Prompt is too short; add more specific details about what you need.',
      };
    }
    if (words.length > MAX_WORDS) {
      return {
        delta: -10,
        suggestion:
          'Prompt is long; consider splitting it into smaller, focused requests.',
      };
    }
    return { delta: 15 };
  },
};

const intentRule: PromptRule = {
  id: 'intent',
  evaluate: ({ text, sentences }) => {
    const startsWithIntent = sentences.some((sentence) => {
      const firstWord = sentence.split(/\s+/)[0].toLowerCase();
      return INTENT_WORDS.has(firstWord.replace(/[^a-z]/g, ''));
    });

    if (text.includes('?') || startsWithIntent) {
      return { delta: 10 };
    }
    return {
      delta: 0,
      suggestion: 'Phrase the prompt as a clear question or instruction.',
    };
  },
};

const vaguenessRule: PromptRule = {
  id: 'vagueness',
  evaluate: ({ text }) => {
    const found: string[] = [];
    let occurrences = 0;

    for (const qualifier of VAGUE_QUALIFIERS) {
      const matches = text.match(createWordPattern(qualifier, 'gi'));
      if (matches) {
        found.push(qualifier);
        occurrences += matches.length;
      }
    }

    if (occurrences === 0) {
      return { delta: 0 };
    }
    return {
      delta: -5 * occurrences,
      suggestion: `Replace vague wording (${found.join(', ')}) with specific terms.`,
    };
  },
};

const clarityRule: PromptRule = {
  id: 'clarity',
  evaluate: ({ words, sentences }) => {
    if (words.length === 0) {
      return { delta: 0 };
    }

    const averageWords = words.length / Math.max(sentences.length, 1);
    if (averageWords > MAX_AVERAGE_SENTENCE_WORDS) {
      return {
        delta: -10,
        suggestion: 'Break long sentences into shorter ones.',
      };
    }
    return { delta: words.length >= MIN_WORDS ? 10 : 0 };
  },
};

const contextRule: PromptRule = {
  id: 'context',
  evaluate: ({ text }) => {
    if (containsWord(text, CONTEXT_WORDS)) {
      return { delta: 5 };
    }
    return {
      delta: 0,
      suggestion: 'Add context about the intended audience or purpose.',
    };
  },
};

/** Rules in the order in which they're evaluated. */
const PROMPT_RULES: readonly PromptRule[] = [
  lengthRule,
  intentRule,
  vaguenessRule,
  clarityRule,
  contextRule,
];

/**
 * Scores the quality of a prompt using a fixed set of heuristics and collects
 * suggestions for every rule the prompt didn't satisfy. Never throws; missing
 * input is treated as an empty prompt.
 */
export function analyzePrompt(
  promptText: string | null | undefined
): QualityReport {
  const text = promptText ?? '';
  const facts: PromptFacts = {
    text,
    words: splitWords(text),
    sentences: splitSentences(text),
  };
  const suggestions: string[] = [];
  let score = BASELINE_SCORE;

  for (const rule of PROMPT_RULES) {
    const result = rule.evaluate(facts);
    score += result.delta;

    if (result.suggestion) {
      suggestions.push(result.suggestion);
    }
  }

  return {
    score: Math.min(100, Math.max(0, Math.round(score))),
    suggestions,
  };
}
