/**
 * Template Rendering
 *
 * Fills `{{name}}` placeholders from a context. Every placeholder must resolve;
 * rendering is single-pass, so values are never re-expanded.
 */

import { ConfigurationError } from '../errors';

// Any `{{ ... }}` token is a placeholder, whatever its name looks like
const PLACEHOLDER_PATTERN = /\{\{([^{}]*)\}\}/g;

/**
 * List the distinct placeholder names in a template, in order of appearance.
 */
export function findPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    names.add(match[1].trim());
  }
  return Array.from(names);
}

/**
 * Render a template against a context.
 *
 * @throws ConfigurationError listing every placeholder without a context entry
 */
export function renderTemplate(template: string, context: Readonly<Record<string, string>>): string {
  const missing = findPlaceholders(template).filter(
    (name) => !Object.prototype.hasOwnProperty.call(context, name)
  );

  if (missing.length > 0) {
    const listed = missing.map((name) => name || '(empty)');
    throw new ConfigurationError(`Unresolved template placeholder(s): ${listed.join(', ')}`, {
      placeholders: missing,
    });
  }

  return template.replace(PLACEHOLDER_PATTERN, (_match, name: string) => context[name.trim()]);
}
