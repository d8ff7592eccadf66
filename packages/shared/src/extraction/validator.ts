/**
 * Payload Validator
 *
 * Checks a parsed payload against a SchemaDefinition. Pure and deterministic:
 * the same payload and schema always give the same violations, in the same
 * order.
 *
 * Check order per level: (a) required fields present, (b) primitive types,
 * (c) nested objects (recursively, same order), (d) value domains.
 */

import type { AuthorProfile, Metadata, ParsedPayload, Rarity, SchemaViolation } from '../types';
import { RARITY_VALUES } from '../types';
import type { FieldDescriptor, SchemaDefinition } from './schema-definition';
import { METADATA_SCHEMA } from './schema-definition';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function isAbsent(payload: Record<string, unknown>, name: string): boolean {
  return !Object.prototype.hasOwnProperty.call(payload, name) || payload[name] === undefined;
}

function matchesType(field: FieldDescriptor, value: unknown): boolean {
  if (value === null) return field.nullable === true;
  if (field.type === 'object') return isPlainObject(value);
  if (field.type === 'number') return typeof value === 'number' && Number.isFinite(value);
  return typeof value === field.type;
}

function expectedType(field: FieldDescriptor): string {
  return field.nullable ? `${field.type} or null` : field.type;
}

function joinPath(prefix: string, name: string): string {
  return prefix ? `${prefix}.${name}` : name;
}

function validateLevel(
  payload: Record<string, unknown>,
  schema: SchemaDefinition,
  prefix: string
): SchemaViolation[] {
  const missing: SchemaViolation[] = [];
  const wrongType: SchemaViolation[] = [];
  const nested: SchemaViolation[] = [];
  const outOfDomain: SchemaViolation[] = [];

  for (const field of schema.fields) {
    const path = joinPath(prefix, field.name);

    if (isAbsent(payload, field.name)) {
      if (field.required) {
        missing.push({ path, expected: 'present', observed: undefined });
      }
      continue;
    }

    const value = payload[field.name];

    if (!matchesType(field, value)) {
      wrongType.push({ path, expected: expectedType(field), observed: value });
      continue;
    }

    if (field.schema && isPlainObject(value)) {
      nested.push(...validateLevel(value, field.schema, path));
    }

    if (field.allowedValues && typeof value === 'string' && !field.allowedValues.includes(value)) {
      outOfDomain.push({
        path,
        expected: `one of [${field.allowedValues.map((v) => JSON.stringify(v)).join(', ')}]`,
        observed: value,
      });
    }
  }

  return [...missing, ...wrongType, ...nested, ...outOfDomain];
}

/**
 * Validate a payload; an empty array means valid.
 */
export function validatePayload(payload: unknown, schema: SchemaDefinition = METADATA_SCHEMA): SchemaViolation[] {
  if (!isPlainObject(payload)) {
    return [{ path: '', expected: 'object', observed: typeOf(payload) }];
  }
  return validateLevel(payload, schema, '');
}

function isRarity(value: unknown): value is Rarity {
  return RARITY_VALUES.some((rarity) => rarity === value);
}

function readString(payload: Record<string, unknown>, name: string): string | undefined {
  const value = payload[name];
  return typeof value === 'string' ? value : undefined;
}

function toAuthorProfile(value: unknown): AuthorProfile | undefined {
  if (!isPlainObject(value)) return undefined;

  const name = readString(value, 'name');
  const profession = readString(value, 'profession');
  const writingStyle = readString(value, 'writing_style');
  const ageRange = readString(value, 'possible_age_range');
  const location = readString(value, 'location_guess');

  if (
    name === undefined ||
    profession === undefined ||
    writingStyle === undefined ||
    ageRange === undefined ||
    location === undefined
  ) {
    return undefined;
  }

  return {
    name,
    profession,
    writing_style: writingStyle,
    possible_age_range: ageRange,
    location_guess: location,
  };
}

/**
 * Promote a payload that passed validation against METADATA_SCHEMA to
 * Metadata. Unknown fields are dropped; an absent estimated_date becomes null.
 * Returns undefined when the payload does not conform.
 */
export function toMetadata(payload: ParsedPayload): Metadata | undefined {
  if (validatePayload(payload, METADATA_SCHEMA).length > 0) return undefined;

  const title = readString(payload, 'title');
  const summary = readString(payload, 'summary');
  const authorStyle = readString(payload, 'author_style');
  const tone = readString(payload, 'tone');
  const language = readString(payload, 'language');
  const domain = readString(payload, 'domain');
  const rarity = payload.rarity;
  const profile = toAuthorProfile(payload.author_profile);

  if (
    title === undefined ||
    summary === undefined ||
    authorStyle === undefined ||
    tone === undefined ||
    language === undefined ||
    domain === undefined ||
    !isRarity(rarity) ||
    profile === undefined
  ) {
    return undefined;
  }

  return {
    title,
    summary,
    author_style: authorStyle,
    tone,
    language,
    domain,
    estimated_date: readString(payload, 'estimated_date') ?? null,
    rarity,
    author_profile: profile,
  };
}
