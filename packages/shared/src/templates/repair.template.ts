/**
 * Repair Template
 *
 * Sent after a response could not be parsed or failed validation. Carries the
 * previous output and the concrete problems back to the model.
 */

import type { ExtractionTemplate, RepairPolicy } from './types';

export const REPAIR_TEMPLATE: ExtractionTemplate = {
  name: 'repair',
  description: 'Self-repair prompt listing the problems found in the previous response',

  systemPrompt: `You are a literary analyst who produces structured metadata for text documents.
You always answer with a single JSON object and nothing else.`,

  userPromptTemplate: `{{original_prompt}}

YOUR PREVIOUS RESPONSE:
{{previous_response}}

That response could not be accepted:
{{problems}}

Return a corrected JSON object containing exactly these fields: {{field_list}}.
Return only the JSON object, with no markdown fences and no commentary.`,
};

export const DEFAULT_REPAIR_POLICY: RepairPolicy = {
  template: REPAIR_TEMPLATE,
  includeOriginalPrompt: true,
  maxResponseChars: 4000,
};
