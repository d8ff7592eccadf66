/**
 * Shared TypeScript Types
 *
 * Types for the metadata extraction pipeline. The persisted record shape
 * matches docs/contracts/metadata_record.schema.json.
 */

// ============================================================================
// Metadata
// ============================================================================

export const RARITY_VALUES = ['🟢 Common', '🔴 Rare', '🟣 Legendary'] as const;

export type Rarity = (typeof RARITY_VALUES)[number];

export interface AuthorProfile {
  name: string;
  profession: string;
  writing_style: string;
  possible_age_range: string;
  location_guess: string;
}

/**
 * Validated metadata. Every required field is present and type-correct;
 * only estimated_date may be null.
 */
export interface Metadata {
  title: string;
  summary: string;
  author_style: string;
  tone: string;
  language: string;
  domain: string;
  estimated_date: string | null;
  rarity: Rarity;
  author_profile: AuthorProfile;
}

// ============================================================================
// Pipeline Values
// ============================================================================

/** Template variables for one extraction call. Always carries `content`. */
export type PromptContext = Readonly<Record<string, string>> & { readonly content: string };

/** Structured block pulled out of a model response, before validation. */
export type ParsedPayload = Record<string, unknown>;

export interface SchemaViolation {
  /** Dotted field path, e.g. `author_profile.name` */
  path: string;
  /** The constraint the field failed, e.g. `string`, `present`, `one of [...]` */
  expected: string;
  observed: unknown;
}

export type ParseFailureReason = 'empty-response' | 'no-structured-block' | 'malformed-json' | 'not-an-object';

export interface ParseFailure {
  reason: ParseFailureReason;
  message: string;
  /** Leading part of the raw response, kept for diagnostics and repair prompts */
  snippet: string;
}

export type ParseResult =
  | { ok: true; payload: ParsedPayload }
  | { ok: false; failure: ParseFailure };

/**
 * One CALL → PARSE → VALIDATE pass. Only the most recent attempt survives the
 * loop; it feeds the repair prompt and the failure detail.
 */
export interface ExtractionAttempt {
  index: number;
  response?: string;
  payload?: ParsedPayload;
  parseFailure?: ParseFailure;
  violations: SchemaViolation[];
  providerError?: string;
}

// ============================================================================
// Results
// ============================================================================

export type FailureReason =
  | 'max-retries-exceeded'
  | 'fatal-provider-error'
  | 'configuration-error'
  | 'cancelled';

export interface ExtractionSuccess {
  readonly success: true;
  readonly metadata: Metadata;
  readonly attempts: number;
}

export interface ExtractionFailure {
  readonly success: false;
  readonly reason: FailureReason;
  readonly attempts: number;
  /** Violations of the last attempt, verbatim */
  readonly violations: readonly SchemaViolation[];
  readonly parseFailure?: ParseFailure;
  readonly detail: string;
}

export type ExtractionResult = ExtractionSuccess | ExtractionFailure;

// ============================================================================
// Persisted Record
// ============================================================================

export interface RecordFailure {
  reason: FailureReason;
  message: string;
  violations: SchemaViolation[];
  parse_failure: ParseFailure | null;
}

export interface RecordProvenance {
  source_id: string;
  extracted_at: string;
  attempts: number;
  provider: string;
  model: string;
  template: string;
}

export interface MetadataRecord {
  schema_version: '1.0';
  correlation_id: string;
  success: boolean;
  metadata: Metadata | null;
  failure: RecordFailure | null;
  provenance: RecordProvenance;
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
    details?: Record<string, unknown>;
  };
}

export interface HealthResponse {
  status: 'healthy';
  timestamp: string;
  provider: string;
  model: string;
}
