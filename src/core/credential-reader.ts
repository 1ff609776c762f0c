/**
 * API token lookup for a tenant profile.
 *
 * Tokens live one per profile under `$TINMAN_HOME/credentials/` in a
 * directory only the owner can read. `TINMAN_API_TOKEN` overrides the
 * file, for CI runs. Token values are never logged. The Elasticsearch
 * export password is looked up the same way.
 */

import { join } from 'node:path';
import { AuthError } from './sim-error.js';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const API_TOKEN_ENV_VAR = 'TINMAN_API_TOKEN';
export const ELASTICSEARCH_PASSWORD_ENV_VAR = 'TINMAN_ELASTICSEARCH_PASSWORD';
export const ELASTICSEARCH_PASSWORD_FILE = 'elasticsearch.password';

/** Credential file of a profile, relative to the credentials directory. */
export function tokenFilename(profile: string): string {
  return `${profile}.token`;
}

// ---------------------------------------------------------------------------
// Dependency injection
// ---------------------------------------------------------------------------

/** Minimal filesystem interface for credential reading. */
export interface CredentialFs {
  existsSync(path: string): boolean;
  readFileSync(path: string, encoding: 'utf-8'): string;
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

/**
 * Read the API token for `profile`.
 *
 * @returns The trimmed token, or null when neither the environment nor
 * the credential file provides one.
 */
export function readApiToken(
  credentialsDir: string,
  profile: string,
  fs: CredentialFs,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  return readSecret(env[API_TOKEN_ENV_VAR], join(credentialsDir, tokenFilename(profile)), fs);
}

/** The Elasticsearch password, or null when none is stored. */
export function readElasticsearchPassword(
  credentialsDir: string,
  fs: CredentialFs,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  return readSecret(env[ELASTICSEARCH_PASSWORD_ENV_VAR], join(credentialsDir, ELASTICSEARCH_PASSWORD_FILE), fs);
}

function readSecret(envValue: string | undefined, filePath: string, fs: CredentialFs): string | null {
  const fromEnv = envValue?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  if (fs.existsSync(filePath)) {
    const value = fs.readFileSync(filePath, 'utf-8').trim();
    if (value.length > 0) {
      return value;
    }
  }

  return null;
}

/** Like {@link readApiToken}, failing with an AuthError when there is none. */
export function requireApiToken(
  credentialsDir: string,
  profile: string,
  fs: CredentialFs,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const token = readApiToken(credentialsDir, profile, fs, env);
  if (token === null) {
    throw new AuthError(
      `No API token for profile "${profile}": set ${API_TOKEN_ENV_VAR} or write ${join(credentialsDir, tokenFilename(profile))}`,
    );
  }
  return token;
}
