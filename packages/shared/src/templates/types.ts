/**
 * Extraction Template Types
 */

/**
 * Prompt template for one kind of LLM request.
 */
export interface ExtractionTemplate {
  /** Registry name, e.g. `generic` */
  name: string;

  /** System prompt sent ahead of the rendered user prompt (may be empty) */
  systemPrompt: string;

  /**
   * User prompt with `{{name}}` placeholders. The metadata templates use:
   * - {{content}}: the document text
   * The repair template additionally uses:
   * - {{original_prompt}}, {{previous_response}}, {{problems}}, {{field_list}}
   */
  userPromptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;
}

/**
 * How repair prompts are built after a parse or validation failure.
 */
export interface RepairPolicy {
  template: ExtractionTemplate;
  /** Repeat the initial prompt inside the repair prompt */
  includeOriginalPrompt: boolean;
  /** Previous model output is cut to this many characters */
  maxResponseChars: number;
}
