import { describe, it, expect } from 'vitest';
import { ErrorCode, ERROR_RETRIABLE_DEFAULTS, type ErrorCodeValue } from './errors.js';

// ---------------------------------------------------------------------------
// ErrorCode
// ---------------------------------------------------------------------------

describe('ErrorCode', () => {
  it('values are identical to their keys', () => {
    for (const [key, value] of Object.entries(ErrorCode)) {
      expect(key).toBe(value);
    }
  });

  it('contains the failure codes results and reports carry', () => {
    expect(Object.keys(ErrorCode)).toEqual([
      'AUTH_ERROR',
      'RATE_LIMITED',
      'REMOTE_ERROR',
      'NETWORK_ERROR',
      'UNKNOWN_MODULE',
      'DUPLICATE_MODULE',
      'REGISTRY_SEALED',
      'INVALID_PARAMS',
      'TIMEOUT',
      'CANCELLED',
      'DRY_RUN_VIOLATION',
      'UNDECLARED_ARTIFACT',
      'MODULE_ERROR',
    ]);
  });
});

// ---------------------------------------------------------------------------
// ERROR_RETRIABLE_DEFAULTS
// ---------------------------------------------------------------------------

describe('ERROR_RETRIABLE_DEFAULTS', () => {
  it('has an entry for every code', () => {
    expect(Object.keys(ERROR_RETRIABLE_DEFAULTS).sort()).toEqual(Object.keys(ErrorCode).sort());
  });

  it('marks only transient failures as retriable', () => {
    const retriable = (Object.keys(ERROR_RETRIABLE_DEFAULTS) as ErrorCodeValue[]).filter(
      (code) => ERROR_RETRIABLE_DEFAULTS[code],
    );
    expect(retriable.sort()).toEqual(['NETWORK_ERROR', 'RATE_LIMITED', 'TIMEOUT']);
  });
});
