/**
 * Parameter validation for action modules.
 *
 * Each module's JSON Schema is compiled once at registration and reused
 * for every invocation. Unknown properties are rejected, schema defaults
 * are applied to a copy of the caller's parameters, and prototype
 * pollution keys are refused before the schema runs.
 */

import _Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import { isRecord } from '../redactor.js';
import type { JsonSchema } from '../../types/schema.js';

const POLLUTION_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

export type ParamValidationResult =
  | { valid: true; value: Record<string, unknown> }
  | { valid: false; errors: string[] };

// ---------------------------------------------------------------------------
// ParamValidator
// ---------------------------------------------------------------------------

export class ParamValidator {
  private readonly ajv: InstanceType<typeof Ajv>;
  private readonly validators: Map<string, ValidateFunction> = new Map();

  constructor() {
    this.ajv = new Ajv({ allErrors: true, strict: false, useDefaults: true });
  }

  /**
   * Compile and cache the schema for a module.
   *
   * @throws If the key was already compiled or the schema is invalid.
   */
  compile(key: string, schema: JsonSchema): void {
    if (this.validators.has(key)) {
      throw new Error(`Schema already compiled for module: "${key}"`);
    }
    this.validators.set(key, this.ajv.compile(schema));
  }

  has(key: string): boolean {
    return this.validators.has(key);
  }

  /** Validate `params`; on success `value` is a copy with defaults filled in. */
  validate(key: string, params: unknown): ParamValidationResult {
    const validateFn = this.validators.get(key);
    if (!validateFn) {
      throw new Error(`No compiled schema for module: "${key}"`);
    }

    if (!isRecord(params)) {
      return { valid: false, errors: [': parameters must be an object'] };
    }

    const pollutionErrors = checkPollutionKeys(params, '');
    if (pollutionErrors.length > 0) {
      return { valid: false, errors: pollutionErrors };
    }

    // useDefaults writes into the data, so validate a copy.
    const value = structuredClone(params);
    if (validateFn(value)) {
      return { valid: true, value };
    }
    return { valid: false, errors: formatAjvErrors(validateFn.errors) };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).map((err) => {
    const path = err.instancePath || '';
    if (err.keyword === 'additionalProperties') {
      return `${path}: additional property "${String(err.params['additionalProperty'] ?? '')}" not allowed`;
    }
    if (err.keyword === 'required') {
      return `${path}: required property "${String(err.params['missingProperty'] ?? '')}" is missing`;
    }
    return `${path}: ${err.message ?? 'unknown error'}`;
  });
}

function checkPollutionKeys(obj: Record<string, unknown>, path: string): string[] {
  const errors: string[] = [];

  for (const key of Object.keys(obj)) {
    if (POLLUTION_KEYS.has(key)) {
      errors.push(`${path}/${key}: prototype pollution key "${key}" is not allowed`);
    }
    const value = obj[key];
    if (isRecord(value)) {
      errors.push(...checkPollutionKeys(value, `${path}/${key}`));
    }
  }

  return errors;
}
