/**
 * tinman configuration schema and TINMAN_HOME resolution.
 *
 * Defines the TypeScript types for config.toml sections, the
 * $TINMAN_HOME resolution algorithm, and the directory layout the
 * engine writes ledgers, reports and logs into.
 */

import { chmodSync, mkdirSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { isRecord } from '../core/redactor.js';
import { isLogLevel, type LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[engine]` section of config.toml. */
export interface EngineConfig {
  /** Worker pool size, also the API client's in-flight limit. */
  concurrency: number;
  module_timeout_ms: number;
  drain_timeout_ms: number;
  request_timeout_ms: number;
}

/** `[retry]` section of config.toml. */
export interface RetryConfig {
  max_attempts: number;
  max_elapsed_ms: number;
  base_delay_ms: number;
  max_delay_ms: number;
  multiplier: number;
}

/** `[rate_limit]` section of config.toml. */
export interface RateLimitConfig {
  requests_per_minute: number;
  burst: number;
}

/** `[logging]` section of config.toml. */
export interface LoggingConfig {
  level: LogLevel;
}

/**
 * `[elasticsearch]` section of config.toml. Present only when log events
 * are exported; the password comes from the credentials directory.
 */
export interface ElasticsearchConfig {
  url: string;
  username?: string;
  index: string;
  level: LogLevel;
}

/** One `[profiles.<name>]` table: a tenant the operator can target. */
export interface ProfileConfig {
  org_url: string;
  description: string;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full tinman configuration.
 *
 * Known sections are strongly typed. Unknown top-level keys are
 * preserved as-is so newer config files still load.
 */
export interface TinmanConfig {
  default_profile?: string;
  engine: EngineConfig;
  retry: RetryConfig;
  rate_limit: RateLimitConfig;
  logging: LoggingConfig;
  elasticsearch?: ElasticsearchConfig;
  profiles: Record<string, ProfileConfig>;
  [section: string]: unknown;
}

const KNOWN_SECTIONS: ReadonlySet<string> = new Set([
  'default_profile',
  'engine',
  'retry',
  'rate_limit',
  'logging',
  'elasticsearch',
  'profiles',
]);

export const DEFAULT_ELASTICSEARCH_INDEX = 'tinman';

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Default configuration applied when config.toml is absent or partial. */
export const DEFAULT_CONFIG: TinmanConfig = {
  engine: {
    concurrency: 4,
    module_timeout_ms: 120_000,
    drain_timeout_ms: 5_000,
    request_timeout_ms: 30_000,
  },
  retry: {
    max_attempts: 5,
    max_elapsed_ms: 60_000,
    base_delay_ms: 500,
    max_delay_ms: 8_000,
    multiplier: 2,
  },
  rate_limit: { requests_per_minute: 600, burst: 20 },
  logging: { level: 'info' },
  profiles: {},
};

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

/**
 * Resolve the tinman home directory.
 *
 * Precedence:
 *  1. `$TINMAN_HOME` environment variable (if non-empty)
 *  2. `~/.tinman/` default
 *
 * Trailing slashes are stripped. A leading `~` is expanded to the
 * user's home directory.
 */
export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  const envValue = env['TINMAN_HOME'];
  if (envValue && envValue.length > 0) {
    let resolved = envValue;
    if (resolved.startsWith('~/') || resolved === '~') {
      resolved = join(homedir(), resolved.slice(2));
    }
    if (resolved.length > 1 && resolved.endsWith('/')) {
      resolved = resolved.slice(0, -1);
    }
    return resolved;
  }
  return join(homedir(), '.tinman');
}

// ---------------------------------------------------------------------------
// Directory structure
// ---------------------------------------------------------------------------

/**
 * All subdirectories that must exist under `$TINMAN_HOME`.
 * Parents are listed before children.
 */
export const TINMAN_SUBDIRS = [
  'data',
  'data/ledger',
  'data/reports',
  'data/logs',
  'plans',
  'credentials',
] as const;

/** Subdirectories that hold secrets (0700). */
const RESTRICTED_DIRS: ReadonlySet<string> = new Set(['credentials']);

export interface DirectoryStructure {
  root: string;
  ledger: string;
  reports: string;
  logs: string;
  plans: string;
  credentials: string;
  configFile: string;
}

/**
 * Create the `$TINMAN_HOME` directory tree. Idempotent.
 */
export function ensureDirectoryStructure(root: string): DirectoryStructure {
  mkdirSync(root, { recursive: true });

  for (const subdir of TINMAN_SUBDIRS) {
    const fullPath = join(root, subdir);
    mkdirSync(fullPath, { recursive: true });
    if (RESTRICTED_DIRS.has(subdir)) {
      chmodSync(fullPath, 0o700);
    }
  }

  return {
    root,
    ledger: join(root, 'data/ledger'),
    reports: join(root, 'data/reports'),
    logs: join(root, 'data/logs'),
    plans: join(root, 'plans'),
    credentials: join(root, 'credentials'),
    configFile: join(root, 'config.toml'),
  };
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

/**
 * Validate a raw config object (e.g. from TOML parsing) into a fully
 * typed `TinmanConfig`, filling defaults for missing keys.
 *
 * @throws On a known key with the wrong type or an out-of-range value.
 */
export function parseConfig(raw: Record<string, unknown>): TinmanConfig {
  const extra: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.has(key)) {
      extra[key] = raw[key];
    }
  }

  const engine = section(raw, 'engine');
  const retry = section(raw, 'retry');
  const rateLimit = section(raw, 'rate_limit');
  const logging = section(raw, 'logging');

  const level = logging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (!isLogLevel(level)) {
    throw new Error(`Invalid logging.level: "${String(level)}". Must be one of: debug, info, warn, error`);
  }

  const config: TinmanConfig = {
    ...extra,
    engine: {
      concurrency: positiveInteger(engine, 'engine', 'concurrency', DEFAULT_CONFIG.engine.concurrency),
      module_timeout_ms: positiveInteger(engine, 'engine', 'module_timeout_ms', DEFAULT_CONFIG.engine.module_timeout_ms),
      drain_timeout_ms: positiveInteger(engine, 'engine', 'drain_timeout_ms', DEFAULT_CONFIG.engine.drain_timeout_ms),
      request_timeout_ms: positiveInteger(engine, 'engine', 'request_timeout_ms', DEFAULT_CONFIG.engine.request_timeout_ms),
    },
    retry: {
      max_attempts: positiveInteger(retry, 'retry', 'max_attempts', DEFAULT_CONFIG.retry.max_attempts),
      max_elapsed_ms: positiveInteger(retry, 'retry', 'max_elapsed_ms', DEFAULT_CONFIG.retry.max_elapsed_ms),
      base_delay_ms: positiveInteger(retry, 'retry', 'base_delay_ms', DEFAULT_CONFIG.retry.base_delay_ms),
      max_delay_ms: positiveInteger(retry, 'retry', 'max_delay_ms', DEFAULT_CONFIG.retry.max_delay_ms),
      multiplier: positiveNumber(retry, 'retry', 'multiplier', DEFAULT_CONFIG.retry.multiplier),
    },
    rate_limit: {
      requests_per_minute: positiveInteger(
        rateLimit,
        'rate_limit',
        'requests_per_minute',
        DEFAULT_CONFIG.rate_limit.requests_per_minute,
      ),
      burst: positiveInteger(rateLimit, 'rate_limit', 'burst', DEFAULT_CONFIG.rate_limit.burst),
    },
    logging: { level },
    profiles: parseProfiles(raw['profiles']),
  };

  if (raw['elasticsearch'] !== undefined) {
    config.elasticsearch = parseElasticsearch(section(raw, 'elasticsearch'));
  }

  const defaultProfile = raw['default_profile'];
  if (defaultProfile !== undefined) {
    if (typeof defaultProfile !== 'string' || !(defaultProfile in config.profiles)) {
      throw new Error(`default_profile must name a configured profile, got "${String(defaultProfile)}"`);
    }
    config.default_profile = defaultProfile;
  }

  return config;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const PROFILE_NAME = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name] ?? {};
  if (!isRecord(value)) {
    throw new Error(`[${name}] must be a table`);
  }
  return value;
}

function positiveNumber(table: Record<string, unknown>, name: string, key: string, fallback: number): number {
  const value = table[key] ?? fallback;
  if (typeof value !== 'number' || !(value > 0)) {
    throw new Error(`${name}.${key} must be a positive number`);
  }
  return value;
}

function positiveInteger(table: Record<string, unknown>, name: string, key: string, fallback: number): number {
  const value = table[key] ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`${name}.${key} must be a positive integer`);
  }
  return value;
}

function parseElasticsearch(table: Record<string, unknown>): ElasticsearchConfig {
  const url = table['url'];
  if (typeof url !== 'string' || !/^https?:\/\//.test(url)) {
    throw new Error('elasticsearch.url must be an http or https URL');
  }
  const index = table['index'] ?? DEFAULT_ELASTICSEARCH_INDEX;
  if (typeof index !== 'string' || index.length === 0) {
    throw new Error('elasticsearch.index must be a non-empty string');
  }
  const level = table['level'] ?? 'info';
  if (!isLogLevel(level)) {
    throw new Error(`Invalid elasticsearch.level: "${String(level)}". Must be one of: debug, info, warn, error`);
  }
  const username = table['username'];
  if (username !== undefined && typeof username !== 'string') {
    throw new Error('elasticsearch.username must be a string');
  }

  return { url, index, level, ...(username !== undefined ? { username } : {}) };
}

function parseProfiles(raw: unknown): Record<string, ProfileConfig> {
  if (raw === undefined) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new Error('[profiles] must be a table of tables');
  }

  const profiles: Record<string, ProfileConfig> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (!PROFILE_NAME.test(name)) {
      throw new Error(`Invalid profile name: "${name}"`);
    }
    if (!isRecord(value) || typeof value['org_url'] !== 'string' || value['org_url'].length === 0) {
      throw new Error(`profiles.${name}.org_url must be a non-empty string`);
    }
    const description = value['description'] ?? '';
    if (typeof description !== 'string') {
      throw new Error(`profiles.${name}.description must be a string`);
    }
    profiles[name] = { org_url: value['org_url'], description };
  }
  return profiles;
}
