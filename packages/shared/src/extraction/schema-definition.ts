/**
 * Metadata Schema Definition
 *
 * The structural contract a payload must satisfy to become Metadata, written
 * as an ordered list of field descriptors that the validator interprets.
 */

import { ConfigurationError } from '../errors';
import { RARITY_VALUES } from '../types';

export type FieldType = 'string' | 'number' | 'boolean' | 'object';

export interface FieldDescriptor {
  name: string;
  type: FieldType;
  required: boolean;
  /** Accept an explicit null in place of a value */
  nullable?: boolean;
  /** Nested structure, for `object` fields */
  schema?: SchemaDefinition;
  /** Closed value domain, for `string` fields */
  allowedValues?: readonly string[];
  description: string;
}

export interface SchemaDefinition {
  name: string;
  fields: readonly FieldDescriptor[];
}

export const AUTHOR_PROFILE_SCHEMA: SchemaDefinition = {
  name: 'AuthorProfile',
  fields: [
    { name: 'name', type: 'string', required: true, description: "Author's name" },
    { name: 'profession', type: 'string', required: true, description: "Author's profession or occupation" },
    { name: 'writing_style', type: 'string', required: true, description: 'Characteristic writing style' },
    { name: 'possible_age_range', type: 'string', required: true, description: 'Estimated age range of the author' },
    { name: 'location_guess', type: 'string', required: true, description: 'Possible geographic location of the author' },
  ],
};

export const METADATA_SCHEMA: SchemaDefinition = {
  name: 'Metadata',
  fields: [
    { name: 'title', type: 'string', required: true, description: 'Title of the document' },
    { name: 'summary', type: 'string', required: true, description: 'Brief summary of the document content' },
    { name: 'author_style', type: 'string', required: true, description: 'Style of writing' },
    { name: 'tone', type: 'string', required: true, description: 'Emotional tone' },
    { name: 'language', type: 'string', required: true, description: 'Primary language of the document' },
    { name: 'domain', type: 'string', required: true, description: 'Subject domain' },
    {
      name: 'estimated_date',
      type: 'string',
      required: false,
      nullable: true,
      description: 'Estimated date of creation if detectable',
    },
    {
      name: 'rarity',
      type: 'string',
      required: true,
      allowedValues: RARITY_VALUES,
      description: 'Rarity classification',
    },
    {
      name: 'author_profile',
      type: 'object',
      required: true,
      schema: AUTHOR_PROFILE_SCHEMA,
      description: 'Generated profile of the likely author',
    },
  ],
};

/**
 * Reject schema definitions the validator cannot interpret.
 *
 * @throws ConfigurationError on duplicate names, object fields without a
 * nested schema, or value domains on non-string fields
 */
export function assertValidSchema(schema: SchemaDefinition, path = schema.name): void {
  const seen = new Set<string>();

  for (const field of schema.fields) {
    const fieldPath = `${path}.${field.name}`;

    if (seen.has(field.name)) {
      throw new ConfigurationError(`Invalid schema: duplicate field ${fieldPath}`);
    }
    seen.add(field.name);

    if (field.type === 'object') {
      if (!field.schema) {
        throw new ConfigurationError(`Invalid schema: object field ${fieldPath} has no nested schema`);
      }
      assertValidSchema(field.schema, fieldPath);
    } else if (field.schema) {
      throw new ConfigurationError(`Invalid schema: nested schema on non-object field ${fieldPath}`);
    }

    if (field.allowedValues && field.type !== 'string') {
      throw new ConfigurationError(`Invalid schema: value domain on non-string field ${fieldPath}`);
    }
  }
}

/**
 * Comma-separated field names, nested fields in dotted form.
 */
export function describeFields(schema: SchemaDefinition, prefix = ''): string {
  return schema.fields
    .map((field) =>
      field.schema
        ? `${prefix}${field.name} {${describeFields(field.schema)}}`
        : `${prefix}${field.name}`
    )
    .join(', ');
}
