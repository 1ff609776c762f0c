/**
 * Error taxonomy shared by the API client, the engine and the cleanup
 * coordinator.
 *
 * Every failure that ends up in a Module Result, Run Report or Cleanup
 * Report is expressed as an {@link ErrorDetail} carrying one of these
 * codes.
 */

// ---------------------------------------------------------------------------
// Codes
// ---------------------------------------------------------------------------

export const ErrorCode = {
  /** Credentials invalid or expired, and one re-authentication failed. */
  AUTH_ERROR: 'AUTH_ERROR',
  /** Provider kept answering 429 until the retry budget ran out. */
  RATE_LIMITED: 'RATE_LIMITED',
  /** Provider-side failure (validation error, 403, exhausted 5xx). */
  REMOTE_ERROR: 'REMOTE_ERROR',
  /** Transport failure (DNS, reset, request timeout). */
  NETWORK_ERROR: 'NETWORK_ERROR',
  UNKNOWN_MODULE: 'UNKNOWN_MODULE',
  DUPLICATE_MODULE: 'DUPLICATE_MODULE',
  REGISTRY_SEALED: 'REGISTRY_SEALED',
  INVALID_PARAMS: 'INVALID_PARAMS',
  /** Module exceeded its execution budget. */
  TIMEOUT: 'TIMEOUT',
  /** Operator interrupted the run. */
  CANCELLED: 'CANCELLED',
  /** A mutating call was attempted during a dry run. */
  DRY_RUN_VIOLATION: 'DRY_RUN_VIOLATION',
  /** A module recorded an artifact kind it did not declare. */
  UNDECLARED_ARTIFACT: 'UNDECLARED_ARTIFACT',
  /** Anything a module threw that is not a SimError. */
  MODULE_ERROR: 'MODULE_ERROR',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Whether the same operation may succeed if attempted again. */
export const ERROR_RETRIABLE_DEFAULTS: Readonly<Record<ErrorCodeValue, boolean>> = {
  AUTH_ERROR: false,
  RATE_LIMITED: true,
  REMOTE_ERROR: false,
  NETWORK_ERROR: true,
  UNKNOWN_MODULE: false,
  DUPLICATE_MODULE: false,
  REGISTRY_SEALED: false,
  INVALID_PARAMS: false,
  TIMEOUT: true,
  CANCELLED: false,
  DRY_RUN_VIOLATION: false,
  UNDECLARED_ARTIFACT: false,
  MODULE_ERROR: false,
};

// ---------------------------------------------------------------------------
// ErrorDetail
// ---------------------------------------------------------------------------

/** Serializable description of a failure, kept for post-hoc analysis. */
export interface ErrorDetail {
  code: ErrorCodeValue;
  message: string;
  /** ISO 8601 time the error was captured. */
  timestamp: string;
  retriable: boolean;
  /** HTTP status of the response that caused the error, if any. */
  status?: number;
  /** Provider error code (e.g. `E0000001`), if the body carried one. */
  remoteCode?: string;
}
