/**
 * Structured JSON logging for tinman.
 *
 * Component-scoped loggers with level filtering and injectable sinks.
 * Every entry is a JSON object with level, ts, component and msg;
 * run, module and invocation ids bound through `withContext` are
 * promoted to top-level fields so a run's log can be filtered with jq.
 *
 * @example
 * ```ts
 * const logger = createLogger('engine').withContext({ run: runId });
 * logger.info('module finished', { status: 'success', duration_ms: 120 });
 * ```
 */

import { mkdirSync, appendFileSync } from 'node:fs';
import { dirname } from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  run?: string;
  module?: string;
  invocation?: string;
  duration_ms?: number;
  ok?: boolean;
  error_code?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields promoted to every entry of a bound logger. */
export interface LogContext {
  run?: string;
  module?: string;
  invocation?: string;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = defaultSink;

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stderr JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = defaultSink;
}

// Logs go to stderr so stdout stays clean for reports.
function defaultSink(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + '\n');
}

/** Fan an entry out to several sinks. */
export function combineSinks(...sinks: LogSink[]): LogSink {
  return (entry) => {
    for (const sink of sinks) {
      sink(entry);
    }
  };
}

// ---------------------------------------------------------------------------
// NEVER_LOG_FIELDS: deny-listed metadata keys
// ---------------------------------------------------------------------------

/** Metadata keys that must never appear in log output. */
export const NEVER_LOG_FIELDS = new Set([
  'token',
  'apiToken',
  'api_token',
  'tokenValue',
  'password',
  'answer',
  'secret',
  'sessionToken',
  'cookie',
  'authorization',
  'credentials',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

const PROMOTED_KEYS = new Set(['duration_ms', 'ok', 'error_code', 'run', 'module', 'invocation']);

/**
 * Strip denied keys, truncate long strings, and serialize Errors in metadata.
 */
function sanitizeMeta(meta?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!meta) return undefined;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key) || PROMOTED_KEYS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = { name: value.name, message: value.message };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'engine'`, `'api-client'`).
 * @param boundContext - Context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      if (boundContext.run) entry.run = boundContext.run;
      if (boundContext.module) entry.module = boundContext.module;
      if (boundContext.invocation) entry.invocation = boundContext.invocation;
    }

    if (meta) {
      if (typeof meta['duration_ms'] === 'number') entry.duration_ms = meta['duration_ms'];
      if (typeof meta['ok'] === 'boolean') entry.ok = meta['ok'];
      if (typeof meta['error_code'] === 'string') entry.error_code = meta['error_code'];
    }

    const sanitized = sanitizeMeta(meta);
    if (sanitized !== undefined) {
      entry.meta = sanitized;
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => createLogger(component, { ...boundContext, ...ctx }),
  };
}

// ---------------------------------------------------------------------------
// Sanitizing sink
// ---------------------------------------------------------------------------

/**
 * Structural interface for a redactor, so this module does not import
 * the redactor directly.
 */
export interface LogSanitizer {
  redactEntry(entry: LogEntry): LogEntry;
}

/**
 * Wrap a sink so entries pass through a redactor first. Catches
 * credential patterns inside messages and nested metadata that
 * NEVER_LOG_FIELDS cannot see.
 */
export function createSanitizingLogSink(innerSink: LogSink, sanitizer: LogSanitizer): LogSink {
  return (entry: LogEntry) => {
    innerSink(sanitizer.redactEntry(entry));
  };
}

// ---------------------------------------------------------------------------
// File sink: per-run JSONL log files
// ---------------------------------------------------------------------------

/** A LogSink that appends JSONL to a file, with a close() method. */
export interface FileLogSink {
  (entry: LogEntry): void;
  close(): void;
}

/**
 * Create a LogSink that appends JSONL to `filePath`, used for
 * `data/logs/<runId>.jsonl`. Entries after close() are dropped.
 */
export function createFileLogSink(
  filePath: string,
  fs?: {
    mkdirSync: (path: string, options: { recursive: boolean }) => void;
    appendFileSync: (path: string, data: string) => void;
  },
): FileLogSink {
  const fsMkdir = fs?.mkdirSync ?? mkdirSync;
  const fsAppend = fs?.appendFileSync ?? appendFileSync;

  fsMkdir(dirname(filePath), { recursive: true });

  let closed = false;

  const sink = (entry: LogEntry): void => {
    if (closed) return;
    fsAppend(filePath, JSON.stringify(entry) + '\n');
  };

  return Object.assign(sink, {
    close: () => {
      closed = true;
    },
  });
}
