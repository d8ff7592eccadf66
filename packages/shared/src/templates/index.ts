/**
 * Prompt Templates
 *
 * Built-in templates are looked up by name; anything else that contains a
 * placeholder is taken as literal template text.
 */

import { ConfigurationError } from '../errors';
import type { ExtractionTemplate } from './types';
import { GENERIC_TEMPLATE } from './generic.template';
import { REPAIR_TEMPLATE, DEFAULT_REPAIR_POLICY } from './repair.template';
import { findPlaceholders } from './render';

// Export types
export type { ExtractionTemplate, RepairPolicy } from './types';

export { renderTemplate, findPlaceholders } from './render';
export { GENERIC_TEMPLATE, REPAIR_TEMPLATE, DEFAULT_REPAIR_POLICY };

/**
 * Map of template names to templates. The repair template is kept out of
 * this map: it is not a valid starting prompt.
 */
const TEMPLATES: Record<string, ExtractionTemplate> = {
  generic: GENERIC_TEMPLATE,
};

/**
 * Get a built-in template by name.
 */
export function getTemplate(name: string): ExtractionTemplate | undefined {
  return Object.prototype.hasOwnProperty.call(TEMPLATES, name) ? TEMPLATES[name] : undefined;
}

/**
 * Get all built-in template names
 */
export function getAvailableTemplates(): string[] {
  return Object.keys(TEMPLATES);
}

/**
 * Wrap literal template text as a template without a system prompt.
 */
export function literalTemplate(text: string, name = 'literal'): ExtractionTemplate {
  return {
    name,
    systemPrompt: '',
    userPromptTemplate: text,
    description: 'Caller-supplied template text',
  };
}

/**
 * Resolve a template reference: a built-in name, or literal template text.
 *
 * @throws ConfigurationError when the reference is neither
 */
export function resolveTemplate(ref: string): ExtractionTemplate {
  const builtIn = getTemplate(ref);
  if (builtIn) return builtIn;

  if (findPlaceholders(ref).length > 0) {
    return literalTemplate(ref);
  }

  throw new ConfigurationError(
    `Unknown prompt template "${ref}". Available: ${getAvailableTemplates().join(', ')}`,
    { template: ref }
  );
}
