/**
 * Technique identifiers and module descriptors.
 *
 * A technique is addressed by `{ tactic, name }` and written as
 * `tactic/name` on the command line and in run plans, e.g.
 * `persistence/create-user`.
 */

import type { JsonSchema } from './schema.js';

// ---------------------------------------------------------------------------
// Tactics
// ---------------------------------------------------------------------------

/** Attacker tactics covered by the catalog (MITRE ATT&CK naming). */
export type Tactic =
  | 'discovery'
  | 'persistence'
  | 'privilege-escalation'
  | 'defense-evasion'
  | 'impact';

export const TACTICS: readonly Tactic[] = [
  'discovery',
  'persistence',
  'privilege-escalation',
  'defense-evasion',
  'impact',
];

const TACTIC_SET: ReadonlySet<string> = new Set(TACTICS);

export function isTactic(value: string): value is Tactic {
  return TACTIC_SET.has(value);
}

// ---------------------------------------------------------------------------
// Technique identifier
// ---------------------------------------------------------------------------

export interface TechniqueId {
  readonly tactic: Tactic;
  readonly name: string;
}

const NAME_PATTERN = /^[a-z][a-z0-9]*(?:-[a-z0-9]+)*$/;

/** Canonical string form used as the registry key. */
export function formatTechniqueId(id: TechniqueId): string {
  return `${id.tactic}/${id.name}`;
}

/**
 * Parse `tactic/name` into a {@link TechniqueId}.
 *
 * @throws If the tactic is unknown or the name is not kebab-case.
 */
export function parseTechniqueId(value: string): TechniqueId {
  const slash = value.indexOf('/');
  if (slash === -1) {
    throw new Error(`Invalid technique id "${value}": expected "tactic/name"`);
  }
  const tactic = value.slice(0, slash);
  const name = value.slice(slash + 1);
  if (!isTactic(tactic)) {
    throw new Error(`Invalid technique id "${value}": unknown tactic "${tactic}"`);
  }
  if (!NAME_PATTERN.test(name)) {
    throw new Error(`Invalid technique id "${value}": name must be kebab-case`);
  }
  return Object.freeze({ tactic, name });
}

// ---------------------------------------------------------------------------
// Artifact kinds
// ---------------------------------------------------------------------------

/** Remote object kinds a module may create or mutate. */
export type ArtifactKind =
  | 'session'
  | 'api-token'
  | 'role-assignment'
  | 'credential'
  | 'policy-rule'
  | 'policy'
  | 'zone'
  | 'app'
  | 'user-state'
  | 'user';

export const ARTIFACT_KINDS: readonly ArtifactKind[] = [
  'session',
  'api-token',
  'role-assignment',
  'credential',
  'policy-rule',
  'policy',
  'zone',
  'app',
  'user-state',
  'user',
];

// ---------------------------------------------------------------------------
// Module descriptor
// ---------------------------------------------------------------------------

/** Static description of an action module, fixed at registration. */
export interface ModuleDescriptor {
  readonly id: TechniqueId;
  /** One-line summary shown by `tinman list`. */
  readonly description: string;
  /** ATT&CK technique ids the module reproduces, e.g. `T1136.003`. */
  readonly attack: readonly string[];
  /** Admin roles the API principal needs, e.g. `SUPER_ADMIN`. */
  readonly permissions: readonly string[];
  /** Artifact kinds the module may record. Empty for read-only modules. */
  readonly artifactKinds: readonly ArtifactKind[];
  /** Whether the module calls mutating endpoints when not in dry-run. */
  readonly mutating: boolean;
  /** JSON Schema for the module's parameters. */
  readonly params: JsonSchema;
}
