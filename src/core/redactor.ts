/**
 * Credential redaction for logs and reports.
 *
 * Deep-walks a value and replaces identity-provider credential patterns
 * with [REDACTED]. Reports the JSON paths that were touched so callers
 * can record where redaction happened without keeping the value.
 */

import type { LogEntry, LogSanitizer } from './logger.js';

export const REDACTED_PLACEHOLDER = '[REDACTED]';

export interface RedactResult<T> {
  /** Deep copy with sensitive data replaced; the input is not mutated. */
  value: T;
  redactedPaths: string[];
}

// ---------------------------------------------------------------------------
// Credential patterns
// ---------------------------------------------------------------------------

/** Applied in order; a string may match several. */
const CREDENTIAL_PATTERNS: Array<{
  name: string;
  pattern: RegExp;
  replace: (match: string) => string;
}> = [
  // Provider API token header value: "SSWS <token>"
  {
    name: 'ssws_token',
    pattern: /\bSSWS\s+[A-Za-z0-9._~+/=-]{6,}/g,
    replace: () => `SSWS ${REDACTED_PLACEHOLDER}`,
  },

  // Bearer tokens, but not "bearer of" in prose
  {
    name: 'bearer_token',
    pattern: /\b(bearer)\s+([A-Za-z0-9._~+/=-]{6,})/gi,
    replace: (match: string) => {
      const prefix = match.split(/\s+/)[0] ?? 'Bearer';
      return `${prefix} ${REDACTED_PLACEHOLDER}`;
    },
  },

  // Session cookie: "sid=<value>"
  {
    name: 'session_cookie',
    pattern: /\bsid=[^;\s]+/g,
    replace: () => `sid=${REDACTED_PLACEHOLDER}`,
  },

  // Raw provider API tokens: 42 characters starting with "00"
  {
    name: 'raw_api_token',
    pattern: /\b00[A-Za-z0-9_-]{40}\b/g,
    replace: () => REDACTED_PLACEHOLDER,
  },

  // One-time recovery links carry the token in the path
  {
    name: 'recovery_link',
    pattern: /\/reset_password\/[A-Za-z0-9_-]{8,}/g,
    replace: () => `/reset_password/${REDACTED_PLACEHOLDER}`,
  },
];

// ---------------------------------------------------------------------------
// Redactor
// ---------------------------------------------------------------------------

export class Redactor implements LogSanitizer {
  redact(value: unknown): RedactResult<unknown> {
    const redactedPaths: string[] = [];
    return { value: this.walk(value, '$', redactedPaths), redactedPaths };
  }

  /** Redact a record, keeping its record type. */
  redactRecord(value: Record<string, unknown>): RedactResult<Record<string, unknown>> {
    const redactedPaths: string[] = [];
    return { value: this.walkRecord(value, '$', redactedPaths), redactedPaths };
  }

  redactString(value: string): string {
    return this.sanitizeString(value, '$', []);
  }

  redactEntry(entry: LogEntry): LogEntry {
    const redacted: LogEntry = { ...entry, msg: this.redactString(entry.msg) };
    if (entry.meta !== undefined) {
      redacted.meta = this.redactRecord(entry.meta).value;
    }
    return redacted;
  }

  // -----------------------------------------------------------------------
  // Private helpers
  // -----------------------------------------------------------------------

  private walk(value: unknown, path: string, redactedPaths: string[]): unknown {
    if (typeof value === 'string') {
      return this.sanitizeString(value, path, redactedPaths);
    }
    if (Array.isArray(value)) {
      return value.map((item, index) => this.walk(item, `${path}[${index}]`, redactedPaths));
    }
    if (isRecord(value)) {
      return this.walkRecord(value, path, redactedPaths);
    }
    return value;
  }

  private walkRecord(
    value: Record<string, unknown>,
    path: string,
    redactedPaths: string[],
  ): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = this.walk(val, `${path}.${key}`, redactedPaths);
    }
    return result;
  }

  private sanitizeString(value: string, path: string, redactedPaths: string[]): string {
    let sanitized = value;
    let wasRedacted = false;

    for (const { pattern, replace } of CREDENTIAL_PATTERNS) {
      pattern.lastIndex = 0;
      sanitized = sanitized.replace(pattern, (match) => {
        wasRedacted = true;
        return replace(match);
      });
    }

    if (wasRedacted) {
      redactedPaths.push(path);
    }
    return sanitized;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
