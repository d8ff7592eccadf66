/**
 * Rarity Heuristic
 *
 * Recomputes the rarity label from the summary so that the label does not
 * depend on the model's mood.
 */

import type { ParsedPayload, Rarity } from '../types';
import { RARITY_VALUES } from '../types';

const LEGENDARY_TERMS = [
  'groundbreaking',
  'revolutionary',
  'unprecedented',
  'extraordinary',
  'remarkable',
  'absurd',
  'paradoxical',
];

const RARE_TERMS = ['innovative', 'unique', 'uncommon', 'unusual', 'specialized', 'technical', 'complex'];

export function calculateRarity(summary: string): Rarity {
  if (!summary) return '🟢 Common';

  const lower = summary.toLowerCase();
  // Code points, not UTF-16 units
  const length = Array.from(summary).length;

  if (length > 500 && LEGENDARY_TERMS.some((term) => lower.includes(term))) {
    return '🟣 Legendary';
  }

  if (length > 300 || RARE_TERMS.some((term) => lower.includes(term))) {
    return '🔴 Rare';
  }

  return '🟢 Common';
}

function bareLabel(rarity: Rarity): string {
  return rarity.slice(rarity.indexOf(' ') + 1).toLowerCase();
}

/**
 * Match a rarity label case-insensitively, with or without its emoji.
 */
export function canonicalRarity(value: string): Rarity | undefined {
  const label = value.trim().toLowerCase();
  return RARITY_VALUES.find((rarity) => rarity.toLowerCase() === label || bareLabel(rarity) === label);
}

/**
 * Rewrite a recognisable rarity label to its canonical form before
 * validation. Anything else is left for the validator to report.
 */
export function normalizeRarity(payload: ParsedPayload): ParsedPayload {
  const value = payload.rarity;
  if (typeof value !== 'string') return payload;

  const rarity = canonicalRarity(value);
  return rarity !== undefined && rarity !== value ? { ...payload, rarity } : payload;
}
