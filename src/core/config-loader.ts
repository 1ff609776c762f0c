/**
 * TOML-based configuration loader.
 *
 * Reads `config.toml` from `$TINMAN_HOME`, parses it with smol-toml,
 * validates it and returns a fully typed `TinmanConfig`. `initialize()`
 * sets up everything a command needs at startup.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseConfig, ensureDirectoryStructure, DEFAULT_CONFIG } from '../types/config.js';
import type { ProfileConfig, TinmanConfig, DirectoryStructure } from '../types/config.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate `config.toml` from a tinman home directory.
 *
 * If `config.toml` does not exist or is empty, returns `DEFAULT_CONFIG`.
 * Throws on invalid TOML syntax or schema validation errors.
 */
export function loadConfig(home: string): TinmanConfig {
  const configPath = join(home, 'config.toml');

  if (!existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return { ...DEFAULT_CONFIG };
  }

  return parseConfig(parseTOML(content));
}

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

export interface SelectedProfile extends ProfileConfig {
  name: string;
}

/**
 * Pick the tenant profile a command targets: the one named on the
 * command line, else `default_profile`, else the only one configured.
 */
export function selectProfile(config: TinmanConfig, requested?: string): SelectedProfile {
  const names = Object.keys(config.profiles);
  const name = requested ?? config.default_profile ?? (names.length === 1 ? names[0] : undefined);

  if (name === undefined) {
    throw new Error(
      names.length === 0
        ? 'No profiles configured; add a [profiles.<name>] table to config.toml'
        : `Several profiles configured (${names.join(', ')}); pass --profile`,
    );
  }

  const profile = config.profiles[name];
  if (!profile) {
    throw new Error(`Unknown profile "${name}"`);
  }
  return { name, ...profile };
}

// ---------------------------------------------------------------------------
// initialize()
// ---------------------------------------------------------------------------

/** Result of `initialize()`: everything needed at startup. */
export interface InitResult {
  config: TinmanConfig;
  dirs: DirectoryStructure;
}

/**
 * Initialize a tinman home directory.
 *
 * 1. Ensures the directory structure exists (idempotent).
 * 2. Loads `config.toml` (or applies defaults).
 */
export function initialize(home: string): InitResult {
  const dirs = ensureDirectoryStructure(home);
  const config = loadConfig(home);

  return { config, dirs };
}
