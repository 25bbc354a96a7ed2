/** Categories offered when authoring a prompt. */
export const PROMPT_CATEGORIES = [
  'Educational',
  'Business',
  'Creative',
  'Technical',
  'Writing',
  'Analysis',
] as const;

export type PromptCategory = (typeof PROMPT_CATEGORIES)[number];

/** Tips shown next to the category picker. */
export const CATEGORY_TIPS: Record<PromptCategory, string> = {
  Educational: 'Use analogies, examples, and age-appropriate language',
  Business: 'Focus on ROI, metrics, and actionable insights',
  Creative: 'Encourage imagination, emotion, and unique perspectives',
  Technical: 'Request detailed explanations and code examples',
  Writing: 'Specify tone, style, and target audience',
  Analysis: 'Ask for data-driven insights and comparisons',
};

/** General advice for writing prompts. */
export const EXPERT_TIPS = [
  'Use specific keywords',
  'Define your audience',
  'Ask for examples',
  'Set the desired format',
  'Include constraints',
  'Request step-by-step',
] as const;

/** Canned responses that can be rated when no real response is at hand. */
export const SAMPLE_RESPONSES = {
  'Short & Simple':
    'This is a brief, straightforward response that covers the basics ' +
    'without much detail.',
  'Detailed & Comprehensive':
    'This is a thorough response that provides extensive information, ' +
    'multiple examples, step-by-step explanations, and covers various ' +
    'aspects of the topic. It includes background context, practical ' +
    'applications, and additional resources for further learning.',
  'Creative & Engaging':
    'Imagine diving into a world where this topic comes alive! Let me ' +
    'paint you a picture with vivid examples and exciting analogies that ' +
    'make everything crystal clear and memorable.',
  'Technical & Precise':
    'According to established principles and methodologies, the ' +
    'systematic approach involves: 1) Initial assessment, 2) ' +
    'Implementation of standardized procedures, 3) Monitoring and ' +
    'evaluation of outcomes, 4) Iterative optimization based on ' +
    'quantitative metrics.',
  'Conversational & Friendly':
    "Hey there! Great question! So basically, what you're asking about " +
    "is pretty interesting. Think of it like this - it's kind of similar " +
    'to something you probably already know about...',
} as const;

export type SampleResponseStyle = keyof typeof SAMPLE_RESPONSES;

export type VariationLength = 'Short' | 'Medium' | 'Long';
export type VariationTone = 'Professional' | 'Casual' | 'Academic' | 'Creative';
export type VariationStyle =
  | 'Explanatory'
  | 'Step-by-step'
  | 'Example-based'
  | 'Comparative';

/** Knobs for building a synthetic response variation. */
export interface ResponseVariationOptions {
  length: VariationLength;
  tone: VariationTone;
  style: VariationStyle;
  includeExamples: boolean;
}

const LENGTH_SENTENCES: Record<VariationLength, string> = {
  Short: 'This provides a concise answer.',
  Medium: 'This provides a balanced explanation with key details and context.',
  Long:
    'This provides a comprehensive, detailed explanation with extensive ' +
    'background information, multiple perspectives, and thorough coverage ' +
    'of all relevant aspects.',
};

const TONE_PHRASES: Record<VariationTone, string> = {
  Professional: 'using professional language and formal structure',
  Casual: "in a friendly, conversational way that's easy to understand",
  Academic: 'with scholarly precision and technical terminology',
  Creative: 'with engaging analogies and imaginative examples',
};

const STYLE_PHRASES: Record<VariationStyle, string> = {
  Explanatory: 'providing clear explanations of concepts',
  'Step-by-step': 'breaking down the process into numbered steps',
  'Example-based': 'using practical examples to illustrate points',
  Comparative: 'comparing different approaches and options',
};

/** Builds a placeholder response with the requested characteristics. */
export function buildResponseVariation(
  options: ResponseVariationOptions
): string {
  const exampleText = options.includeExamples
    ? ' For example, this demonstrates the concept clearly.'
    : '';

  return (
    `Here is a response that addresses your prompt ${TONE_PHRASES[options.tone]}. ` +
    `${LENGTH_SENTENCES[options.length]} ${STYLE_PHRASES[options.style]}.${exampleText}`
  );
}

/** Whether a string names one of the prompt categories. */
export function isPromptCategory(value: string): value is PromptCategory {
  return PROMPT_CATEGORIES.some((category) => category === value);
}
