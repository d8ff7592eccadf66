/**
 * Repair Prompt Construction
 *
 * Phrases a parse failure or a list of schema violations back to the model,
 * following a RepairPolicy.
 */

import type { RepairPolicy } from '../templates/types';
import { renderTemplate } from '../templates/render';
import type { SchemaViolation } from '../types';
import { truncateCodePoints } from './response-parser';
import type { RenderedPrompt, RepairProblem } from './state-machine';
import type { SchemaDefinition } from './schema-definition';
import { describeFields } from './schema-definition';

const OBSERVED_CHARS = 80;

export function formatObserved(observed: unknown): string {
  if (observed === undefined) return 'nothing';
  const text = JSON.stringify(observed) ?? String(observed);
  const cut = truncateCodePoints(text, OBSERVED_CHARS);
  return cut === undefined ? text : `${cut}...`;
}

export function formatViolation(violation: SchemaViolation): string {
  const path = violation.path || '(root)';
  if (violation.expected === 'present') {
    return `- ${path}: required field is missing`;
  }
  return `- ${path}: expected ${violation.expected}, got ${formatObserved(violation.observed)}`;
}

export function describeProblem(problem: RepairProblem): string {
  if (problem.kind === 'parse') {
    return `- the response could not be parsed (${problem.failure.reason}): ${problem.failure.message}`;
  }
  return problem.violations.map(formatViolation).join('\n');
}

/**
 * Render the repair prompt for a failed attempt.
 *
 * @throws ConfigurationError when the repair template has unresolved placeholders
 */
export function buildRepairPrompt(
  original: RenderedPrompt,
  previousResponse: string,
  problem: RepairProblem,
  policy: RepairPolicy,
  schema: SchemaDefinition
): RenderedPrompt {
  const cut = truncateCodePoints(previousResponse, policy.maxResponseChars);
  const response = cut === undefined ? previousResponse : `${cut}\n[...truncated]`;

  const user = renderTemplate(policy.template.userPromptTemplate, {
    original_prompt: policy.includeOriginalPrompt ? original.user : '',
    previous_response: response,
    problems: describeProblem(problem),
    field_list: describeFields(schema),
  });

  return {
    system: policy.template.systemPrompt || original.system,
    user,
  };
}
