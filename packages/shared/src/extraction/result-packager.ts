/**
 * Result Packager
 *
 * Shapes an ExtractionResult and its provenance into the MetadataRecord that
 * callers print, return or persist. No decisions are made here; failure
 * detail is copied through unchanged.
 */

import type { ExtractionResult, MetadataRecord, RecordFailure } from '../types';
import { formatViolation } from './repair';

export interface Provenance {
  correlationId: string;
  sourceId: string;
  provider: string;
  model: string;
  template: string;
  /** Defaults to now */
  extractedAt?: Date;
}

export function packageResult(result: ExtractionResult, provenance: Provenance): MetadataRecord {
  let failure: RecordFailure | null = null;
  if (!result.success) {
    failure = {
      reason: result.reason,
      message: result.detail,
      violations: result.violations.map((v) => ({ path: v.path, expected: v.expected, observed: v.observed })),
      parse_failure: result.parseFailure ? { ...result.parseFailure } : null,
    };
  }

  return {
    schema_version: '1.0',
    correlation_id: provenance.correlationId,
    success: result.success,
    metadata: result.success ? result.metadata : null,
    failure,
    provenance: {
      source_id: provenance.sourceId,
      extracted_at: (provenance.extractedAt ?? new Date()).toISOString(),
      attempts: result.attempts,
      provider: provenance.provider,
      model: provenance.model,
      template: provenance.template,
    },
  };
}

/**
 * Human-readable explanation of a failed extraction, ending with what to try
 * next. Returns an empty string for a success.
 */
export function describeFailure(result: ExtractionResult): string {
  if (result.success) return '';

  const lines = [`Extraction failed (${result.reason}) after ${result.attempts} attempt(s): ${result.detail}`];

  if (result.violations.length > 0) {
    lines.push('Problems in the last response:', ...result.violations.map(formatViolation));
  }
  if (result.parseFailure) {
    lines.push(`Last response (${result.parseFailure.reason}): ${result.parseFailure.snippet}`);
  }

  switch (result.reason) {
    case 'max-retries-exceeded':
      lines.push('Hint: provide a more explicit template or increase retries.');
      break;
    case 'fatal-provider-error':
      lines.push('Hint: check the provider credentials, model name and base URL.');
      break;
    case 'configuration-error':
      lines.push('Hint: fix the template placeholders or the option values and run again.');
      break;
    case 'cancelled':
      lines.push('Hint: the extraction was cancelled; run it again to completion.');
      break;
  }

  return lines.join('\n');
}
