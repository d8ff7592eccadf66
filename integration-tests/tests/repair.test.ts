/**
 * Repair Prompt Tests
 */

import {
  DEFAULT_REPAIR_POLICY,
  METADATA_SCHEMA,
  buildRepairPrompt,
  calculateRarity,
  canonicalRarity,
  describeProblem,
  formatObserved,
  formatViolation,
  literalTemplate,
  normalizeRarity,
  type RepairPolicy,
} from '@docmeta/shared';

const ORIGINAL = { system: 'SYS', user: 'Extract: doc' };

describe('formatting violations', () => {
  it('describes a missing field', () => {
    expect(formatViolation({ path: 'title', expected: 'present', observed: undefined })).toBe(
      '- title: required field is missing'
    );
  });

  it('describes a wrong value with its JSON form', () => {
    expect(formatViolation({ path: 'tone', expected: 'string', observed: 5 })).toBe('- tone: expected string, got 5');
    expect(formatViolation({ path: '', expected: 'object', observed: 'array' })).toBe(
      '- (root): expected object, got "array"'
    );
  });

  it('cuts long observed values', () => {
    expect(formatObserved('a'.repeat(100))).toBe(`"${'a'.repeat(79)}...`);
  });

  it('cuts observed values on whole emoji', () => {
    expect(formatObserved('🟢'.repeat(100))).toBe(`"${'🟢'.repeat(79)}...`);
  });

  it('describes a parse failure', () => {
    expect(
      describeProblem({
        kind: 'parse',
        failure: { reason: 'malformed-json', message: 'Structured block is not valid JSON: oops', snippet: '{' },
      })
    ).toBe('- the response could not be parsed (malformed-json): Structured block is not valid JSON: oops');
  });
});

describe('buildRepairPrompt', () => {
  it('follows a custom policy and truncates the previous response', () => {
    const policy: RepairPolicy = {
      template: literalTemplate('{{previous_response}}|{{problems}}'),
      includeOriginalPrompt: false,
      maxResponseChars: 5,
    };

    const prompt = buildRepairPrompt(
      ORIGINAL,
      'abcdefgh',
      { kind: 'validation', violations: [{ path: 'title', expected: 'string', observed: 42 }] },
      policy,
      METADATA_SCHEMA
    );

    expect(prompt).toEqual({ system: 'SYS', user: 'abcde\n[...truncated]|- title: expected string, got 42' });
  });

  it('truncates the previous response on whole emoji', () => {
    const policy: RepairPolicy = {
      template: literalTemplate('{{previous_response}}'),
      includeOriginalPrompt: false,
      maxResponseChars: 3,
    };

    const prompt = buildRepairPrompt(ORIGINAL, '🔴🔴🔴🔴', { kind: 'validation', violations: [] }, policy, METADATA_SCHEMA);

    expect(prompt.user).toBe('🔴🔴🔴\n[...truncated]');
  });

  it('lists the expected fields in the default policy', () => {
    const prompt = buildRepairPrompt(
      ORIGINAL,
      'nope',
      { kind: 'validation', violations: [{ path: 'title', expected: 'present', observed: undefined }] },
      DEFAULT_REPAIR_POLICY,
      METADATA_SCHEMA
    );

    expect(prompt.user).toContain(
      'Return a corrected JSON object containing exactly these fields: title, summary, author_style, tone, ' +
        'language, domain, estimated_date, rarity, author_profile {name, profession, writing_style, ' +
        'possible_age_range, location_guess}.'
    );
  });

  it('leaves the original prompt out when the policy says so', () => {
    const prompt = buildRepairPrompt(
      ORIGINAL,
      'nope',
      { kind: 'validation', violations: [] },
      { ...DEFAULT_REPAIR_POLICY, includeOriginalPrompt: false },
      METADATA_SCHEMA
    );

    expect(prompt.user.startsWith('\n\nYOUR PREVIOUS RESPONSE:\nnope\n')).toBe(true);
  });
});

describe('calculateRarity', () => {
  it('defaults to common', () => {
    expect(calculateRarity('')).toBe('🟢 Common');
    expect(calculateRarity('A quiet walk by the sea.')).toBe('🟢 Common');
  });

  it('marks rare terms and long summaries as rare', () => {
    expect(calculateRarity('A highly technical manual.')).toBe('🔴 Rare');
    expect(calculateRarity('w'.repeat(301))).toBe('🔴 Rare');
  });

  it('needs both length and a legendary term for legendary', () => {
    expect(calculateRarity(`A groundbreaking study. ${'w'.repeat(500)}`)).toBe('🟣 Legendary');
    expect(calculateRarity('A groundbreaking study.')).toBe('🟢 Common');
  });

  it('measures the summary in characters, not UTF-16 units', () => {
    expect(calculateRarity('🌊'.repeat(200))).toBe('🟢 Common');
    expect(calculateRarity('🌊'.repeat(301))).toBe('🔴 Rare');
  });
});

describe('rarity labels', () => {
  it('matches bare labels in any case', () => {
    expect(canonicalRarity('Common')).toBe('🟢 Common');
    expect(canonicalRarity(' RARE ')).toBe('🔴 Rare');
    expect(canonicalRarity('🟣 legendary')).toBe('🟣 Legendary');
    expect(canonicalRarity('Epic')).toBeUndefined();
  });

  it('rewrites only recognisable labels', () => {
    expect(normalizeRarity({ title: 'x', rarity: 'legendary' })).toEqual({ title: 'x', rarity: '🟣 Legendary' });
    expect(normalizeRarity({ rarity: 'Epic' })).toEqual({ rarity: 'Epic' });
    expect(normalizeRarity({ rarity: 3 })).toEqual({ rarity: 3 });
  });
});
