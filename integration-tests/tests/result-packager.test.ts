/**
 * Result Packager Tests
 *
 * Record shape, contract validation and failure descriptions.
 */

import {
  describeFailure,
  packageResult,
  validateMetadataRecord,
  type ExtractionFailure,
  type Metadata,
} from '@docmeta/shared';
import { validPayload } from './helpers';

const METADATA: Metadata = {
  title: 'The Quiet Harbour',
  summary: 'A short essay about a fishing town.',
  author_style: 'Concise',
  tone: 'Reflective',
  language: 'English',
  domain: 'Travel',
  estimated_date: null,
  rarity: '🟢 Common',
  author_profile: {
    name: 'A. Writer',
    profession: 'Journalist',
    writing_style: 'Plain',
    possible_age_range: '40-50',
    location_guess: 'Coastal town',
  },
};

const PROVENANCE = {
  correlationId: '01HZY3M4N5P6Q7R8S9T0V1W2X3',
  sourceId: 'essay.txt',
  provider: 'mock',
  model: 'scripted',
  template: 'generic',
  extractedAt: new Date('2024-05-01T10:00:00.000Z'),
};

const FAILURE: ExtractionFailure = {
  success: false,
  reason: 'max-retries-exceeded',
  attempts: 2,
  violations: [{ path: 'author_profile.name', expected: 'present', observed: undefined }],
  detail: '1 schema violation(s)',
};

describe('packageResult', () => {
  it('packages a success', () => {
    expect(packageResult({ success: true, metadata: METADATA, attempts: 1 }, PROVENANCE)).toEqual({
      schema_version: '1.0',
      correlation_id: '01HZY3M4N5P6Q7R8S9T0V1W2X3',
      success: true,
      metadata: METADATA,
      failure: null,
      provenance: {
        source_id: 'essay.txt',
        extracted_at: '2024-05-01T10:00:00.000Z',
        attempts: 1,
        provider: 'mock',
        model: 'scripted',
        template: 'generic',
      },
    });
  });

  it('keeps the failure detail verbatim', () => {
    const record = packageResult(FAILURE, PROVENANCE);

    expect(record.success).toBe(false);
    expect(record.metadata).toBeNull();
    expect(record.failure).toEqual({
      reason: 'max-retries-exceeded',
      message: '1 schema violation(s)',
      violations: [{ path: 'author_profile.name', expected: 'present', observed: undefined }],
      parse_failure: null,
    });
    expect(record.provenance.attempts).toBe(2);
  });

  it('carries the parse failure', () => {
    const parseFailure = { reason: 'no-structured-block' as const, message: 'No JSON object found', snippet: 'prose' };
    const record = packageResult(
      { ...FAILURE, violations: [], parseFailure, detail: 'No JSON object found' },
      PROVENANCE
    );

    expect(record.failure?.parse_failure).toEqual(parseFailure);
  });
});

describe('validateMetadataRecord', () => {
  it('accepts packaged successes and failures', () => {
    expect(validateMetadataRecord(packageResult({ success: true, metadata: METADATA, attempts: 1 }, PROVENANCE))).toEqual({
      valid: true,
    });
    expect(validateMetadataRecord(packageResult(FAILURE, PROVENANCE))).toEqual({ valid: true });
  });

  it('rejects an unknown schema version', () => {
    const record = { ...packageResult(FAILURE, PROVENANCE), schema_version: '2.0' };
    const validation = validateMetadataRecord(record);

    expect(validation.valid).toBe(false);
    expect(validation.errors).toContain('/schema_version: must be equal to constant');
  });

  it('rejects metadata with fields outside the contract', () => {
    const record = {
      ...packageResult({ success: true, metadata: METADATA, attempts: 1 }, PROVENANCE),
      metadata: { ...validPayload(), mood: 'sunny' },
    };

    expect(validateMetadataRecord(record).valid).toBe(false);
  });
});

describe('describeFailure', () => {
  it('is empty for a success', () => {
    expect(describeFailure({ success: true, metadata: METADATA, attempts: 1 })).toBe('');
  });

  it('lists the violations and suggests a next step', () => {
    expect(describeFailure(FAILURE)).toBe(
      [
        'Extraction failed (max-retries-exceeded) after 2 attempt(s): 1 schema violation(s)',
        'Problems in the last response:',
        '- author_profile.name: required field is missing',
        'Hint: provide a more explicit template or increase retries.',
      ].join('\n')
    );
  });

  it('points at credentials for a fatal provider error', () => {
    expect(
      describeFailure({
        success: false,
        reason: 'fatal-provider-error',
        attempts: 1,
        violations: [],
        detail: 'Provider rejected request (401): 401 invalid key',
      })
    ).toBe(
      'Extraction failed (fatal-provider-error) after 1 attempt(s): Provider rejected request (401): 401 invalid key\n' +
        'Hint: check the provider credentials, model name and base URL.'
    );
  });
});
