import { QualityReport } from '../shared-interfaces.js';
import { analyzePrompt } from './prompt-analyzer.js';
import {
  analyzePromptSignals,
  analyzeResponseSignals,
  computeTextStats,
  PromptSignals,
  ResponseSignals,
  TextStats,
} from './text-stats.js';

/** Prompt together with the response it produced. */
export interface PromptResponsePair {
  prompt: string;
  response: string;
}

/** Analysis of one side of a comparison. */
export interface ComparisonSide {
  promptStats: TextStats;
  promptSignals: PromptSignals;
  responseStats: TextStats;
  responseSignals: ResponseSignals;
  quality: QualityReport;
}

export interface PromptComparison {
  a: ComparisonSide;
  b: ComparisonSide;
  /** Side whose prompt received the higher quality score. */
  preferred: 'a' | 'b' | 'tie';
}

/** Analyzes two prompt/response pairs side by side. */
export function comparePrompts(
  a: PromptResponsePair,
  b: PromptResponsePair
): PromptComparison {
  const sideA = analyzeSide(a);
  const sideB = analyzeSide(b);
  let preferred: PromptComparison['preferred'] = 'tie';

  if (sideA.quality.score > sideB.quality.score) {
    preferred = 'a';
  } else if (sideB.quality.score > sideA.quality.score) {
    preferred = 'b';
  }

  return { a: sideA, b: sideB, preferred };
}

function analyzeSide(pair: PromptResponsePair): ComparisonSide {
  return {
    promptStats: computeTextStats(pair.prompt),
    promptSignals: analyzePromptSignals(pair.prompt),
    responseStats: computeTextStats(pair.response),
    responseSignals: analyzeResponseSignals(pair.response),
    quality: analyzePrompt(pair.prompt),
  };
}
