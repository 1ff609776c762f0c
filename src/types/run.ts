/**
 * Run-level data model: requests, artifact records, module results and
 * the reports the engine and the cleanup coordinator hand back.
 */

import type { ErrorDetail } from './errors.js';
import type { ArtifactKind, TechniqueId } from './technique.js';

// ---------------------------------------------------------------------------
// Run request
// ---------------------------------------------------------------------------

export type ExecutionMode = 'sequential' | 'concurrent';

/** One module selected for a run, with its operator-supplied parameters. */
export interface ModuleInvocation {
  id: TechniqueId;
  params?: Record<string, unknown>;
  /** A failure of a best-effort module does not fail the run. */
  bestEffort?: boolean;
}

export interface RunRequest {
  /** Generated when omitted. */
  runId?: string;
  modules: ModuleInvocation[];
  mode: ExecutionMode;
  dryRun: boolean;
  /** Sequential mode only: skip the remaining modules after a failure. */
  abortOnFailure?: boolean;
}

// ---------------------------------------------------------------------------
// Artifact records
// ---------------------------------------------------------------------------

/** Reversal actions understood by the cleanup coordinator. */
export type ReversalActionName =
  | 'delete-user'
  | 'revoke-api-token'
  | 'unassign-user-role'
  | 'unassign-group-role'
  | 'revoke-session'
  | 'user-lifecycle'
  | 'set-lifecycle'
  | 'rename-resource'
  | 'manual';

/** A serializable reference to the action that undoes an artifact. */
export interface ReversalRef {
  action: ReversalActionName;
  args: Record<string, string>;
}

/** What a module supplies when it records an artifact. */
export interface ArtifactInput {
  kind: ArtifactKind;
  remoteId: string;
  description: string;
  reversal: ReversalRef;
}

export interface ArtifactRecord extends ArtifactInput {
  /** Ledger-wide sequence number; creation order. */
  readonly seq: number;
  readonly runId: string;
  /** String form of the owning module's technique id. */
  readonly moduleId: string;
  /** Identifies the module execution within the run. */
  readonly invocationId: string;
  readonly createdAt: string;
  readonly reversed: boolean;
  readonly reversedAt?: string;
}

// ---------------------------------------------------------------------------
// Module results
// ---------------------------------------------------------------------------

export type ModuleStatus = 'success' | 'failure' | 'skipped' | 'timeout';

/** A mutating call a module would have made, reported during dry runs. */
export interface PlannedAction {
  method: 'POST' | 'PUT' | 'DELETE';
  path: string;
  description: string;
  body?: Record<string, unknown>;
}

export interface ModuleResult {
  invocationId: string;
  /** Position in the run request. */
  index: number;
  moduleId: string;
  status: ModuleStatus;
  output: Record<string, unknown> | null;
  error: ErrorDetail | null;
  /** Why the module was skipped, or why it never started. */
  reason?: string;
  artifacts: ArtifactRecord[];
  plannedActions: PlannedAction[];
  bestEffort: boolean;
  startedAt: string | null;
  endedAt: string | null;
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Run report
// ---------------------------------------------------------------------------

export type RunStatus = 'success' | 'failure';

export interface RunReport {
  runId: string;
  startedAt: string;
  endedAt: string;
  mode: ExecutionMode;
  dryRun: boolean;
  cancelled: boolean;
  status: RunStatus;
  results: ModuleResult[];
}

// ---------------------------------------------------------------------------
// Cleanup report
// ---------------------------------------------------------------------------

export type ReversalOutcome = 'reversed' | 'failed' | 'skipped';

export interface ReversalResult {
  seq: number;
  kind: ArtifactKind;
  remoteId: string;
  action: ReversalActionName;
  outcome: ReversalOutcome;
  error?: ErrorDetail;
  note?: string;
}

export interface CleanupReport {
  runId: string;
  startedAt: string;
  endedAt: string;
  attempted: number;
  reversed: number;
  failed: number;
  skipped: number;
  outcomes: ReversalResult[];
}
