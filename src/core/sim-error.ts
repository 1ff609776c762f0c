/**
 * SimError: structured error class for the engine and its collaborators.
 *
 * Everything the API client, registry, engine or a module raises on
 * purpose is a SimError carrying a machine-readable code. The engine
 * discriminates SimError from other throws when it builds a Module
 * Result: SimError → its own code and detail, anything else →
 * MODULE_ERROR with the original message.
 */

import type { ErrorCodeValue, ErrorDetail } from '../types/errors.js';
import { ERROR_RETRIABLE_DEFAULTS, ErrorCode } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

/**
 * Brands SimError instances so a duplicate copy of this module (or a
 * plain object with matching fields) cannot pass the type guard.
 */
const SIM_ERROR_BRAND = Symbol.for('tinman.SimError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface SimErrorOptions {
  code: ErrorCodeValue;
  message: string;
  /** Defaults to ERROR_RETRIABLE_DEFAULTS[code]. */
  retriable?: boolean;
  /** HTTP status that caused the error. */
  status?: number;
  /** Provider error code from the response body. */
  remoteCode?: string;
  cause?: unknown;
}

// ---------------------------------------------------------------------------
// SimError class
// ---------------------------------------------------------------------------

export class SimError extends Error {
  readonly code: ErrorCodeValue;
  readonly retriable: boolean;
  readonly status?: number;
  readonly remoteCode?: string;

  /** @internal */
  readonly [SIM_ERROR_BRAND] = true as const;

  constructor(options: SimErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SimError';
    this.code = options.code;
    this.retriable = options.retriable ?? ERROR_RETRIABLE_DEFAULTS[options.code];

    if (options.status !== undefined) {
      this.status = options.status;
    }
    if (options.remoteCode !== undefined) {
      this.remoteCode = options.remoteCode;
    }
  }

  /** Serializable detail for results and reports. */
  toDetail(timestamp: string): ErrorDetail {
    const detail: ErrorDetail = {
      code: this.code,
      message: this.message,
      timestamp,
      retriable: this.retriable,
    };
    if (this.status !== undefined) {
      detail.status = this.status;
    }
    if (this.remoteCode !== undefined) {
      detail.remoteCode = this.remoteCode;
    }
    return detail;
  }
}

// ---------------------------------------------------------------------------
// Named subclasses
// ---------------------------------------------------------------------------

export class AuthError extends SimError {
  constructor(message: string, status?: number) {
    super({ code: ErrorCode.AUTH_ERROR, message, status });
    this.name = 'AuthError';
  }
}

export class RateLimitedError extends SimError {
  /** Milliseconds the provider asked us to wait, if it said. */
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super({ code: ErrorCode.RATE_LIMITED, message, status: 429 });
    this.name = 'RateLimitedError';
    if (retryAfterMs !== undefined) {
      this.retryAfterMs = retryAfterMs;
    }
  }
}

export class RemoteError extends SimError {
  constructor(message: string, status: number, remoteCode?: string) {
    super({
      code: ErrorCode.REMOTE_ERROR,
      message,
      status,
      remoteCode,
      retriable: status >= 500,
    });
    this.name = 'RemoteError';
  }
}

export class NetworkError extends SimError {
  constructor(message: string, cause?: unknown) {
    super({ code: ErrorCode.NETWORK_ERROR, message, cause });
    this.name = 'NetworkError';
  }
}

export class UnknownModuleError extends SimError {
  readonly moduleId: string;

  constructor(moduleId: string) {
    super({ code: ErrorCode.UNKNOWN_MODULE, message: `Unknown module: "${moduleId}"` });
    this.name = 'UnknownModuleError';
    this.moduleId = moduleId;
  }
}

export class DuplicateModuleError extends SimError {
  constructor(moduleId: string) {
    super({ code: ErrorCode.DUPLICATE_MODULE, message: `Module already registered: "${moduleId}"` });
    this.name = 'DuplicateModuleError';
  }
}

export class RegistrySealedError extends SimError {
  constructor(moduleId: string) {
    super({
      code: ErrorCode.REGISTRY_SEALED,
      message: `Registry is sealed; cannot register "${moduleId}"`,
    });
    this.name = 'RegistrySealedError';
  }
}

export class InvalidParamsError extends SimError {
  readonly errors: readonly string[];

  constructor(moduleId: string, errors: readonly string[]) {
    super({
      code: ErrorCode.INVALID_PARAMS,
      message: `Invalid parameters for "${moduleId}": ${errors.join('; ')}`,
    });
    this.name = 'InvalidParamsError';
    this.errors = errors;
  }
}

export class ModuleTimeoutError extends SimError {
  constructor(moduleId: string, timeoutMs: number) {
    super({
      code: ErrorCode.TIMEOUT,
      message: `Module "${moduleId}" did not finish within ${timeoutMs}ms`,
    });
    this.name = 'ModuleTimeoutError';
  }
}

export class CancelledError extends SimError {
  constructor(message = 'Run was cancelled') {
    super({ code: ErrorCode.CANCELLED, message });
    this.name = 'CancelledError';
  }
}

export class DryRunViolationError extends SimError {
  /** @param action - What was refused, e.g. `Mutating call POST /users`. */
  constructor(action: string) {
    super({
      code: ErrorCode.DRY_RUN_VIOLATION,
      message: `${action} refused during dry run`,
    });
    this.name = 'DryRunViolationError';
  }
}

export class UndeclaredArtifactError extends SimError {
  constructor(moduleId: string, kind: string) {
    super({
      code: ErrorCode.UNDECLARED_ARTIFACT,
      message: `Module "${moduleId}" recorded undeclared artifact kind "${kind}"`,
    });
    this.name = 'UndeclaredArtifactError';
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

/**
 * Type guard for SimError instances, checked by brand as well as
 * instanceof so errors from another copy of this module still match.
 */
export function isSimError(value: unknown): value is SimError {
  if (value instanceof SimError) {
    return true;
  }

  if (
    typeof value === 'object' &&
    value !== null &&
    SIM_ERROR_BRAND in value &&
    (value as Record<symbol, unknown>)[SIM_ERROR_BRAND] === true
  ) {
    return true;
  }

  return false;
}

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

/**
 * Capture any thrown value as an ErrorDetail. Non-SimError values keep
 * their message under MODULE_ERROR.
 */
export function toErrorDetail(error: unknown, timestamp: string): ErrorDetail {
  if (isSimError(error)) {
    return error.toDetail(timestamp);
  }
  return {
    code: ErrorCode.MODULE_ERROR,
    message: error instanceof Error ? error.message : String(error),
    timestamp,
    retriable: ERROR_RETRIABLE_DEFAULTS[ErrorCode.MODULE_ERROR],
  };
}
