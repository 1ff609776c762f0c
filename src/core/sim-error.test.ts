import { describe, it, expect } from 'vitest';
import {
  AuthError,
  CancelledError,
  DryRunViolationError,
  InvalidParamsError,
  ModuleTimeoutError,
  NetworkError,
  RateLimitedError,
  RemoteError,
  SimError,
  UnknownModuleError,
  isSimError,
  toErrorDetail,
} from './sim-error.js';

const TS = '2026-01-01T00:00:00.000Z';

// ---------------------------------------------------------------------------
// SimError
// ---------------------------------------------------------------------------

describe('SimError', () => {
  it('defaults retriable from its code', () => {
    expect(new SimError({ code: 'NETWORK_ERROR', message: 'reset' }).retriable).toBe(true);
    expect(new SimError({ code: 'INVALID_PARAMS', message: 'bad' }).retriable).toBe(false);
  });

  it('lets the caller override retriable', () => {
    expect(new SimError({ code: 'REMOTE_ERROR', message: 'x', retriable: true }).retriable).toBe(true);
  });

  it('keeps the cause', () => {
    const cause = new Error('socket hang up');
    expect(new NetworkError('GET /users failed', cause).cause).toBe(cause);
  });

  it('builds a detail with only the fields it has', () => {
    expect(new CancelledError().toDetail(TS)).toEqual({
      code: 'CANCELLED',
      message: 'Run was cancelled',
      timestamp: TS,
      retriable: false,
    });
    expect(new RemoteError('POST /users failed with 400: Api validation failed', 400, 'E0000001').toDetail(TS)).toEqual({
      code: 'REMOTE_ERROR',
      message: 'POST /users failed with 400: Api validation failed',
      timestamp: TS,
      retriable: false,
      status: 400,
      remoteCode: 'E0000001',
    });
  });
});

// ---------------------------------------------------------------------------
// Subclasses
// ---------------------------------------------------------------------------

describe('subclasses', () => {
  it('treats only server errors as retriable remote errors', () => {
    expect(new RemoteError('x', 503).retriable).toBe(true);
    expect(new RemoteError('x', 403).retriable).toBe(false);
  });

  it('records the retry hint of a 429', () => {
    const error = new RateLimitedError('slow down', 2000);
    expect(error).toMatchObject({ code: 'RATE_LIMITED', status: 429, retryAfterMs: 2000, retriable: true });
  });

  it.each([
    [new AuthError('rejected', 401), 'AuthError', 'AUTH_ERROR', 'rejected'],
    [new UnknownModuleError('discovery/nope'), 'UnknownModuleError', 'UNKNOWN_MODULE', 'Unknown module: "discovery/nope"'],
    [
      new InvalidParamsError('discovery/list-users', ['/status: must be equal to one of the allowed values']),
      'InvalidParamsError',
      'INVALID_PARAMS',
      'Invalid parameters for "discovery/list-users": /status: must be equal to one of the allowed values',
    ],
    [
      new ModuleTimeoutError('discovery/find-admins', 500),
      'ModuleTimeoutError',
      'TIMEOUT',
      'Module "discovery/find-admins" did not finish within 500ms',
    ],
    [
      new DryRunViolationError('Mutating call POST /users'),
      'DryRunViolationError',
      'DRY_RUN_VIOLATION',
      'Mutating call POST /users refused during dry run',
    ],
  ])('%s has name %s and code %s', (error, name, code, message) => {
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
  });
});

// ---------------------------------------------------------------------------
// isSimError / toErrorDetail
// ---------------------------------------------------------------------------

describe('isSimError', () => {
  it('accepts SimErrors and subclasses', () => {
    expect(isSimError(new SimError({ code: 'MODULE_ERROR', message: 'x' }))).toBe(true);
    expect(isSimError(new AuthError('x'))).toBe(true);
  });

  it('rejects look-alikes', () => {
    expect(isSimError(new Error('x'))).toBe(false);
    expect(isSimError({ code: 'AUTH_ERROR', message: 'x', retriable: false })).toBe(false);
    expect(isSimError(null)).toBe(false);
  });

  it('accepts an object carrying the brand', () => {
    expect(isSimError({ [Symbol.for('tinman.SimError')]: true })).toBe(true);
  });
});

describe('toErrorDetail', () => {
  it('uses the SimError detail', () => {
    expect(toErrorDetail(new AuthError('rejected', 401), TS)).toEqual({
      code: 'AUTH_ERROR',
      message: 'rejected',
      timestamp: TS,
      retriable: false,
      status: 401,
    });
  });

  it('wraps anything else as a module error', () => {
    expect(toErrorDetail(new TypeError('undefined is not a function'), TS)).toEqual({
      code: 'MODULE_ERROR',
      message: 'undefined is not a function',
      timestamp: TS,
      retriable: false,
    });
    expect(toErrorDetail('bad state', TS).message).toBe('bad state');
  });
});
