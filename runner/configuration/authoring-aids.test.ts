import { describe, expect, it } from 'vitest';
import {
  buildResponseVariation,
  CATEGORY_TIPS,
  isPromptCategory,
  PROMPT_CATEGORIES,
} from './authoring-aids.js';

describe('authoring aids', () => {
  it('has a tip for every category', () => {
    for (const category of PROMPT_CATEGORIES) {
      expect(CATEGORY_TIPS[category]).not.toBe('');
    }
  });

  it('recognizes categories', () => {
    expect(isPromptCategory('Technical')).toBe(true);
    expect(isPromptCategory('technical')).toBe(false);
  });

  it('builds a response variation from the selected options', () => {
    expect(
      buildResponseVariation({
        length: 'Short',
        tone: 'Academic',
        style: 'Comparative',
        includeExamples: true,
      })
    ).toBe(
      'Here is a response that addresses your prompt with scholarly ' +
        'precision and technical terminology. This provides a concise ' +
        'answer. comparing different approaches and options. For example, ' +
        'this demonstrates the concept clearly.'
    );
  });

  it('leaves out the example sentence when not requested', () => {
    expect(
      buildResponseVariation({
        length: 'Medium',
        tone: 'Casual',
        style: 'Explanatory',
        includeExamples: false,
      })
    ).toBe(
      "Here is a response that addresses your prompt in a friendly, " +
        "conversational way that's easy to understand. This provides a " +
        'balanced explanation with key details and context. providing ' +
        'clear explanations of concepts.'
    );
  });
});
