import Handlebars from 'handlebars';
import { NotFoundError, UserFacingError } from '../utils/errors.js';

/** Template that helps structuring a prompt for a common kind of request. */
export interface PromptTemplate {
  id: string;
  displayName: string;
  /** Handlebars source. Placeholders are plain `{{name}}` expressions. */
  content: string;
}

/** Templates that ship with the tool. */
export const BUILT_IN_TEMPLATES: readonly PromptTemplate[] = [
  {
    id: 'educational-explanation',
    displayName: 'Educational Explanation',
    content:
      'Explain {{topic}} in simple terms that a {{age}}-year-old could ' +
      'understand, using analogies and examples.',
  },
  {
    id: 'creative-writing',
    displayName: 'Creative Writing',
    content:
      'Write a {{storyType}} story about {{subject}} that includes ' +
      '{{elements}} and has a {{tone}} mood.',
  },
  {
    id: 'problem-solving',
    displayName: 'Problem Solving',
    content:
      'Help me solve this problem: {{problem}}. Please provide ' +
      'step-by-step guidance and alternative approaches.',
  },
  {
    id: 'code-explanation',
    displayName: 'Code Explanation',
    content:
      'Explain this code snippet: {{code}}. Break down what each part ' +
      'does and suggest improvements.',
  },
  {
    id: 'business-analysis',
    displayName: 'Business Analysis',
    content:
      'Analyze {{businessScenario}} and provide strategic recommendations ' +
      'with pros and cons.',
  },
];

/** Collects the names of all path expressions in a template. */
class PlaceholderCollector extends Handlebars.Visitor {
  readonly names: string[] = [];

  PathExpression(path: hbs.AST.PathExpression): void {
    if (!this.names.includes(path.original)) {
      this.names.push(path.original);
    }
  }
}

/** Lists the built-in templates. */
export function listTemplates(): readonly PromptTemplate[] {
  return BUILT_IN_TEMPLATES;
}

/**
 * Looks up a template by its ID.
 * @throws NotFoundError if there's no such template.
 */
export function getTemplate(id: string): PromptTemplate {
  const template = BUILT_IN_TEMPLATES.find((t) => t.id === id);

  if (!template) {
    throw new NotFoundError('template', id);
  }
  return template;
}

/** Gets the names of the placeholders of a template in order of appearance. */
export function getTemplatePlaceholders(content: string): string[] {
  const collector = new PlaceholderCollector();
  collector.accept(Handlebars.parse(content));
  return collector.names;
}

/**
 * Renders a built-in template with values for its placeholders.
 * @throws UserFacingError if a placeholder has no value.
 */
export function renderPromptTemplate(
  id: string,
  values: Readonly<Record<string, string | undefined>>
): string {
  const template = getTemplate(id);
  const missing = getTemplatePlaceholders(template.content).filter(
    (name) => !values[name]?.trim()
  );

  if (missing.length > 0) {
    throw new UserFacingError(
      `Template "${template.displayName}" is missing values for: ${missing.join(', ')}`
    );
  }

  return renderHandlebarsTemplate(template.content, values);
}

/**
 * Renders the given content via Handlebars. Values are inserted verbatim,
 * since prompts are plain text rather than HTML.
 */
export function renderHandlebarsTemplate(
  content: string,
  ctx: Readonly<Record<string, unknown>>
): string {
  return Handlebars.compile(content, { strict: true, noEscape: true })(ctx);
}
