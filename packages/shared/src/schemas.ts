/**
 * JSON Schema Validation
 *
 * Checks MetadataRecords against docs/contracts/metadata_record.schema.json
 * with Ajv before they are stored or returned.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigurationError } from './errors';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

const METADATA_RECORD_SCHEMA = 'metadata_record.schema.json';

// Compiled lazily on first use
let metadataRecordValidator: ValidateFunction | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to the working directory
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  const schemaPath = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!schemaPath) {
    throw new ConfigurationError(`Schema file not found: ${schemaName}`, { searched: possiblePaths });
  }

  const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null) {
    throw new ConfigurationError(`Schema file is not a JSON object: ${schemaPath}`);
  }
  return parsed;
}

function getMetadataRecordValidator(): ValidateFunction {
  if (!metadataRecordValidator) {
    metadataRecordValidator = ajv.compile(loadSchema(METADATA_RECORD_SCHEMA));
  }
  return metadataRecordValidator;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate a MetadataRecord against metadata_record.schema.json
 */
export function validateMetadataRecord(data: unknown): ValidationResult {
  const validate = getMetadataRecordValidator();
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('MetadataRecord validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}
