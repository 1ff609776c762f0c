/**
 * CleanupCoordinator: undoes what a run left behind in the tenant.
 *
 * Un-reversed records are processed one at a time, grouped by artifact
 * kind in ARTIFACT_KINDS order (sessions and tokens first, users last)
 * and newest first within a kind. A failed reversal is reported and the
 * record stays un-reversed so a later cleanup can retry it; it never
 * stops the others.
 */

import type { ApiClient } from '../api/api-client.js';
import type { ArtifactLedger } from '../ledger/artifact-ledger.js';
import { createLogger, type Logger } from '../logger.js';
import { toErrorDetail } from '../sim-error.js';
import type { ReportPersistence } from '../engine/report-store.js';
import { ARTIFACT_KINDS, type ArtifactKind } from '../../types/technique.js';
import type { ArtifactRecord, CleanupReport, ReversalResult } from '../../types/run.js';
import { REVERSAL_HANDLERS, type ReversalHandler } from './reversal-actions.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CleanupSelection {
  kind?: ArtifactKind | readonly ArtifactKind[];
  moduleId?: string;
  /** Specific records by sequence number. */
  seqs?: readonly number[];
}

export interface CleanupCoordinatorOptions {
  client: ApiClient;
  ledger: ArtifactLedger;
  reportStore?: ReportPersistence;
  logger?: Logger;
  now?: () => Date;
  /** Overrides for entries of the reversal table. */
  handlers?: Partial<Record<ArtifactRecord['reversal']['action'], ReversalHandler>>;
}

export interface CleanupRunOptions {
  signal?: AbortSignal;
}

const KIND_ORDER: ReadonlyMap<ArtifactKind, number> = new Map(
  ARTIFACT_KINDS.map((kind, index) => [kind, index]),
);

// ---------------------------------------------------------------------------
// CleanupCoordinator
// ---------------------------------------------------------------------------

export class CleanupCoordinator {
  private readonly client: ApiClient;
  private readonly ledger: ArtifactLedger;
  private readonly reportStore?: ReportPersistence;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly handlers: Record<ArtifactRecord['reversal']['action'], ReversalHandler>;

  constructor(options: CleanupCoordinatorOptions) {
    this.client = options.client;
    this.ledger = options.ledger;
    this.reportStore = options.reportStore;
    this.logger = (options.logger ?? createLogger('cleanup')).withContext({ run: options.ledger.runId });
    this.now = options.now ?? (() => new Date());
    this.handlers = { ...REVERSAL_HANDLERS, ...options.handlers };
  }

  /** Reverse every un-reversed record of the run. */
  reverseAll(options: CleanupRunOptions = {}): Promise<CleanupReport> {
    return this.reverse({}, options);
  }

  /** The records `reverse(selection)` would process, in processing order. */
  plan(selection: CleanupSelection = {}): ArtifactRecord[] {
    return selectForReversal(this.ledger, selection);
  }

  async reverse(selection: CleanupSelection, options: CleanupRunOptions = {}): Promise<CleanupReport> {
    const startedAt = this.now();
    const records = this.plan(selection);
    const outcomes: ReversalResult[] = [];
    const { signal } = options;

    if (records.length > 0 && !signal?.aborted && !this.client.currentSession) {
      await this.client.authenticate();
    }
    const api = this.client.scope({ signal });

    this.logger.info('cleanup started', { records: records.length });

    for (const record of records) {
      const base = {
        seq: record.seq,
        kind: record.kind,
        remoteId: record.remoteId,
        action: record.reversal.action,
      };

      if (signal?.aborted) {
        outcomes.push({ ...base, outcome: 'skipped', note: 'cleanup cancelled' });
        continue;
      }

      try {
        const step = await this.handlers[record.reversal.action](api, record);
        if (step.outcome === 'reversed') {
          this.ledger.markReversed(record.seq);
        }
        outcomes.push({ ...base, ...step });
        this.logger.debug('artifact processed', { seq: record.seq, outcome: step.outcome });
      } catch (err: unknown) {
        const error = toErrorDetail(err, this.now().toISOString());
        outcomes.push({ ...base, outcome: 'failed', error });
        this.logger.warn('reversal failed', {
          seq: record.seq,
          kind: record.kind,
          error_code: error.code,
          error: error.message,
        });
      }
    }

    const endedAt = this.now();
    const report: CleanupReport = {
      runId: this.ledger.runId,
      startedAt: startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      attempted: records.length,
      reversed: outcomes.filter((outcome) => outcome.outcome === 'reversed').length,
      failed: outcomes.filter((outcome) => outcome.outcome === 'failed').length,
      skipped: outcomes.filter((outcome) => outcome.outcome === 'skipped').length,
      outcomes,
    };

    this.reportStore?.saveCleanup(report);
    this.logger.info('cleanup finished', {
      reversed: report.reversed,
      failed: report.failed,
      skipped: report.skipped,
      duration_ms: endedAt.getTime() - startedAt.getTime(),
      ok: report.failed === 0,
    });
    return report;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Un-reversed records of `ledger` matching `selection`, in the order
 * cleanup processes them. Needs no tenant access.
 */
export function selectForReversal(ledger: ArtifactLedger, selection: CleanupSelection = {}): ArtifactRecord[] {
  const seqs = selection.seqs ? new Set(selection.seqs) : undefined;
  return ledger
    .list({ kind: selection.kind, moduleId: selection.moduleId, reversed: false })
    .filter((record) => seqs === undefined || seqs.has(record.seq))
    .sort(reversalOrder);
}

/** Kind dependency order first, then newest first. */
export function reversalOrder(a: ArtifactRecord, b: ArtifactRecord): number {
  const byKind = (KIND_ORDER.get(a.kind) ?? 0) - (KIND_ORDER.get(b.kind) ?? 0);
  return byKind !== 0 ? byKind : b.seq - a.seq;
}
