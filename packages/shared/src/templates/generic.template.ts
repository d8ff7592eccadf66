/**
 * Generic Document Metadata Template
 *
 * Document semantics:
 * - Any prose document; the model reads the full text
 * - The author profile is an inferred, fictional sketch of the likely writer
 * - Rarity must be one of the three fixed labels
 */

import type { ExtractionTemplate } from './types';

export const GENERIC_TEMPLATE: ExtractionTemplate = {
  name: 'generic',
  description: 'General-purpose metadata card - title, summary, style, tone, domain, rarity and author profile',

  systemPrompt: `You are a literary analyst who produces structured metadata for text documents.
You always answer with a single JSON object and nothing else.`,

  userPromptTemplate: `Analyze the document below and return its metadata as JSON.

REQUIRED FIELDS:
- title: a short title for the document (invent one if it has none)
- summary: two or three sentences describing the content
- author_style: style of writing (e.g. concise, academic, poetic)
- tone: emotional tone (e.g. serious, humorous, critical)
- language: primary language of the document
- domain: subject domain (e.g. politics, philosophy, food)
- estimated_date: estimated date of creation, or null if it cannot be told
- rarity: exactly one of "🟢 Common", "🔴 Rare", "🟣 Legendary"
- author_profile: an object with name, profession, writing_style, possible_age_range, location_guess

All values except estimated_date are strings. Do not add other fields.
Return only the JSON object, with no markdown fences and no commentary.

DOCUMENT:
{{content}}`,
};
