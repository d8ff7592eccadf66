/**
 * Response Parser
 *
 * Pulls a JSON object out of raw model text. Tolerates leading/trailing prose,
 * markdown code fences and JSON that needs repair (trailing commas, typographic
 * quotes, unquoted keys). Never throws:
 * a response without a usable block yields a ParseFailure carrying a snippet
 * of the raw text.
 *
 * Parsing is all-or-nothing. A block either parses completely into an object
 * or it is rejected; nothing is salvaged from a half-valid block.
 */

import { jsonrepair } from 'jsonrepair';
import { errorMessage } from '../errors';
import type { ParseFailure, ParseFailureReason, ParseResult } from '../types';
import { isPlainObject } from './validator';

const SNIPPET_CHARS = 500;

const FENCE_PATTERN = /```[ \t]*([A-Za-z0-9_-]*)[ \t]*\r?\n?([\s\S]*?)```/g;

/**
 * Cut on code points so an emoji is never split in half.
 */
export function truncateCodePoints(text: string, max: number): string | undefined {
  const chars = Array.from(text);
  return chars.length > max ? chars.slice(0, max).join('') : undefined;
}

function snippetOf(text: string): string {
  const cut = truncateCodePoints(text, SNIPPET_CHARS);
  return cut === undefined ? text : `${cut}...`;
}

function failure(reason: ParseFailureReason, message: string, raw: string): ParseResult {
  const parseFailure: ParseFailure = { reason, message, snippet: snippetOf(raw) };
  return { ok: false, failure: parseFailure };
}

/**
 * Fenced blocks, `json`-tagged fences first.
 */
function fencedBlocks(text: string): string[] {
  const tagged: string[] = [];
  const untagged: string[] = [];

  for (const match of text.matchAll(FENCE_PATTERN)) {
    const body = match[2].trim();
    if (!body) continue;
    if (match[1].toLowerCase() === 'json') {
      tagged.push(body);
    } else {
      untagged.push(body);
    }
  }

  return [...tagged, ...untagged];
}

interface BalancedSpan {
  text: string;
  /** False when the braces never close and the span runs to the last `}` */
  balanced: boolean;
  end: number;
}

/**
 * The balanced `{ ... }` span opening at `start`, skipping braces inside
 * string literals. Falls back to `start` through the last `}` when the braces
 * never balance.
 */
function spanAt(text: string, start: number): BalancedSpan | undefined {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return { text: text.slice(start, i + 1), balanced: true, end: i };
      }
    }
  }

  const end = text.lastIndexOf('}');
  return end > start ? { text: text.slice(start, end + 1), balanced: false, end } : undefined;
}

/**
 * Every top-level `{ ... }` span in the text, left to right. Scanning resumes
 * after each balanced span; an unbalanced span runs to the end of the text and
 * is the last one.
 */
export function findObjectSpans(text: string): string[] {
  const spans: string[] = [];
  let from = 0;

  for (;;) {
    const start = text.indexOf('{', from);
    if (start === -1) break;

    const span = spanAt(text, start);
    if (!span) break;

    spans.push(span.text);
    if (!span.balanced) break;
    from = span.end + 1;
  }

  return spans;
}

/**
 * The first balanced `{ ... }` span in the text.
 */
export function findBalancedObject(text: string): string | undefined {
  return findObjectSpans(text)[0];
}

type BlockParse = { ok: true; value: unknown } | { ok: false; error: string };

function strictParse(block: string): BlockParse {
  try {
    return { ok: true, value: JSON.parse(block) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

/**
 * Second chance for a block that failed strict parsing.
 */
function repairedParse(block: string): BlockParse {
  try {
    return { ok: true, value: JSON.parse(jsonrepair(block)) };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

/**
 * Candidate blocks in priority order: fenced blocks, the top-level objects in
 * the whole text, then objects found inside fences that held other text.
 * Duplicates are dropped.
 */
function candidateBlocks(text: string): string[] {
  const candidates = fencedBlocks(text);
  candidates.push(...findObjectSpans(text));

  for (const block of [...candidates]) {
    if (!block.startsWith('{')) {
      candidates.push(...findObjectSpans(block));
    }
  }

  return Array.from(new Set(candidates));
}

/**
 * Parse raw model text into a payload.
 */
export function parseResponse(raw: string): ParseResult {
  const text = raw.trim();

  if (!text) {
    return failure('empty-response', 'Model returned an empty response', raw);
  }

  const candidates = candidateBlocks(text);
  if (candidates.length === 0) {
    return failure('no-structured-block', 'No JSON object found in model response', raw);
  }

  let firstError: string | undefined;
  let sawNonObject = false;

  // All strict parses come before any repair
  for (const parse of [strictParse, repairedParse]) {
    for (const block of candidates) {
      const parsed = parse(block);
      if (!parsed.ok) {
        firstError = firstError ?? parsed.error;
        continue;
      }
      if (isPlainObject(parsed.value)) {
        return { ok: true, payload: parsed.value };
      }
      sawNonObject = true;
    }
  }

  if (sawNonObject && firstError === undefined) {
    return failure('not-an-object', 'Structured block is not a JSON object', raw);
  }

  return failure('malformed-json', `Structured block is not valid JSON: ${firstError}`, raw);
}
