/**
 * The contract between the execution engine and an action module.
 *
 * A module receives a tenant API scope, its validated parameters, a
 * ledger scope bound to its own invocation, and a context carrying the
 * run's cancellation signal and dry-run flag. It throws to fail, and
 * records every artifact into the ledger scope the moment the remote
 * call that created it succeeds, so a later failure never loses one.
 */

import type { TenantApi } from '../api/api-client.js';
import type { Logger } from '../logger.js';
import type { ModuleDescriptor } from '../../types/technique.js';
import type { ArtifactInput, ArtifactRecord, PlannedAction } from '../../types/run.js';

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

export type ModuleOutcome =
  | { status: 'success'; output: Record<string, unknown> }
  | { status: 'skipped'; reason: string };

// ---------------------------------------------------------------------------
// Ledger scope
// ---------------------------------------------------------------------------

/** The slice of the artifact ledger one module invocation may write. */
export interface LedgerScope {
  readonly moduleId: string;
  readonly invocationId: string;
  /** Append a record. Throws for kinds the module did not declare. */
  record(input: ArtifactInput): ArtifactRecord;
  /** Flag one of this invocation's own records as undone. */
  markReversed(seq: number): ArtifactRecord;
  /** This invocation's records, in creation order. */
  records(): ArtifactRecord[];
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export interface ModuleContext {
  readonly runId: string;
  readonly invocationId: string;
  readonly dryRun: boolean;
  /** Aborted on run cancellation or when the module's timeout expires. */
  readonly signal: AbortSignal;
  readonly logger: Logger;
  /** Report a mutating call the module would make (dry run). */
  plan(action: PlannedAction): void;
}

// ---------------------------------------------------------------------------
// Module
// ---------------------------------------------------------------------------

export interface ActionModule {
  execute(
    client: TenantApi,
    params: Record<string, unknown>,
    ledger: LedgerScope,
    context: ModuleContext,
  ): Promise<ModuleOutcome>;
}

/** Builds a fresh module instance for each invocation. */
export type ModuleFactory = (descriptor: ModuleDescriptor) => ActionModule;

// ---------------------------------------------------------------------------
// Parameter accessors
// ---------------------------------------------------------------------------
//
// Parameters reach a module after schema validation, so these only fail
// when a module reads a key its own schema does not declare.

export function stringParam(params: Record<string, unknown>, key: string): string {
  const value = params[key];
  if (typeof value !== 'string') {
    throw new Error(`Parameter "${key}" is not a string`);
  }
  return value;
}

export function optionalStringParam(
  params: Record<string, unknown>,
  key: string,
): string | undefined {
  const value = params[key];
  return typeof value === 'string' ? value : undefined;
}

export function booleanParam(
  params: Record<string, unknown>,
  key: string,
  fallback: boolean,
): boolean {
  const value = params[key];
  return typeof value === 'boolean' ? value : fallback;
}

export function stringListParam(params: Record<string, unknown>, key: string): string[] {
  const value = params[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === 'string');
}
