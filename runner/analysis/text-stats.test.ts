import { describe, expect, it } from 'vitest';
import {
  analyzePromptSignals,
  analyzeResponseSignals,
  computeTextStats,
  getReadingLevel,
  splitSentences,
} from './text-stats.js';

describe('computeTextStats', () => {
  it('computes the statistics of a prompt', () => {
    expect(
      computeTextStats(
        'How does photosynthesis work? Please explain why it matters.'
      )
    ).toEqual({
      wordCount: 9,
      charCount: 60,
      sentenceCount: 2,
      averageWordsPerSentence: 4.5,
      readingLevel: 'Simple',
      complexity: 1,
      clarity: 5,
    });
  });

  it('handles empty text', () => {
    expect(computeTextStats('')).toEqual({
      wordCount: 0,
      charCount: 0,
      sentenceCount: 0,
      averageWordsPerSentence: 0,
      complexity: 1,
      clarity: 1,
    });
  });

  it('caps the complexity at 5', () => {
    expect(computeTextStats('word '.repeat(60)).complexity).toBe(5);
  });
});

describe('getReadingLevel', () => {
  it('maps sentence lengths to levels', () => {
    expect(getReadingLevel(9.9)).toBe('Simple');
    expect(getReadingLevel(10)).toBe('Moderate');
    expect(getReadingLevel(19.9)).toBe('Moderate');
    expect(getReadingLevel(20)).toBe('Complex');
  });
});

describe('splitSentences', () => {
  it('drops blank pieces between terminators', () => {
    expect(splitSentences('Hi!! What?  . Done')).toEqual(['Hi', 'What', 'Done']);
  });
});

describe('analyzePromptSignals', () => {
  it('matches context words only as whole words', () => {
    expect(analyzePromptSignals('What is aspirin?')).toEqual({
      hasQuestion: true,
      hasContext: false,
    });
    expect(analyzePromptSignals('Write a poem for my mom')).toEqual({
      hasQuestion: false,
      hasContext: true,
    });
  });
});

describe('analyzeResponseSignals', () => {
  it('detects examples, structure and explanations', () => {
    expect(
      analyzeResponseSignals(
        'First, mix the flour. This means the dough rises, for instance overnight.'
      )
    ).toEqual({
      hasExamples: true,
      hasStructure: true,
      hasExplanation: true,
      contentQuality: 3,
    });
  });

  it('reports plain responses', () => {
    expect(analyzeResponseSignals('Plain answer.')).toEqual({
      hasExamples: false,
      hasStructure: false,
      hasExplanation: false,
      contentQuality: 0,
    });
  });
});
