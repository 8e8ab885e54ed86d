/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for analyzer payloads and attestation results.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { AttestationResult, RawAnalysisResult } from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// Validators - compiled on first use
let analysisResultValidator: ValidateFunction<RawAnalysisResult> | null = null;
let attestationResultValidator: ValidateFunction<AttestationResult> | null = null;

function loadSchema(schemaName: string): SchemaObject {
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getAnalysisResultValidator(): ValidateFunction<RawAnalysisResult> {
  if (!analysisResultValidator) {
    analysisResultValidator = ajv.compile<RawAnalysisResult>(loadSchema('analysis_result.schema.json'));
  }
  return analysisResultValidator;
}

function getAttestationResultValidator(): ValidateFunction<AttestationResult> {
  if (!attestationResultValidator) {
    attestationResultValidator = ajv.compile<AttestationResult>(
      loadSchema('attestation_result.schema.json')
    );
  }
  return attestationResultValidator;
}

export type SchemaValidation<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown, label: string): SchemaValidation<T> {
  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate an analyzer operation payload against analysis_result.schema.json
 */
export function validateAnalysisResult(data: unknown): SchemaValidation<RawAnalysisResult> {
  return runValidator(getAnalysisResultValidator(), data, 'AnalysisResult');
}

/**
 * Validate an AttestationResult against attestation_result.schema.json
 */
export function validateAttestationResult(data: unknown): SchemaValidation<AttestationResult> {
  return runValidator(getAttestationResultValidator(), data, 'AttestationResult');
}
