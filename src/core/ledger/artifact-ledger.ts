/**
 * ArtifactLedger: the append-only record of every remote object a run
 * created or changed.
 *
 * Appends are synchronous, so concurrently running modules can never
 * interleave inside one append or lose a record; sequence numbers give
 * the global creation order. Records are frozen; marking one reversed
 * replaces it with a reversed copy, and that flag never clears.
 */

import { DryRunViolationError, UndeclaredArtifactError } from '../sim-error.js';
import type { LedgerScope } from '../modules/action-module.js';
import type { ArtifactKind } from '../../types/technique.js';
import type { ArtifactInput, ArtifactRecord } from '../../types/run.js';
import { isArtifactKind, type LedgerPersistence } from './ledger-store.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LedgerFilter {
  kind?: ArtifactKind | readonly ArtifactKind[];
  moduleId?: string;
  invocationId?: string;
  reversed?: boolean;
}

export interface RecordOwner {
  moduleId: string;
  invocationId: string;
}

export interface ScopeOptions extends RecordOwner {
  /** Kinds the module declared. Anything else is refused. */
  allowedKinds: readonly ArtifactKind[];
  /** Refuse every record (dry run). */
  readOnly?: boolean;
}

export interface ArtifactLedgerOptions {
  store?: LedgerPersistence;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// ArtifactLedger
// ---------------------------------------------------------------------------

export class ArtifactLedger {
  readonly runId: string;
  private readonly store?: LedgerPersistence;
  private readonly now: () => Date;
  private readonly entries: ArtifactRecord[] = [];
  private readonly bySeq = new Map<number, number>();
  private nextSeq = 1;

  constructor(runId: string, options: ArtifactLedgerOptions = {}) {
    this.runId = runId;
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
  }

  /** Rebuild a run's ledger by replaying its stored lines. */
  static load(runId: string, store: LedgerPersistence, now?: () => Date): ArtifactLedger {
    const ledger = new ArtifactLedger(runId, { store, now });
    for (const line of store.read(runId)) {
      if (line.type === 'record') {
        ledger.insert(Object.freeze({ ...line.record, reversal: freezeReversal(line.record) }));
      } else {
        ledger.applyReversed(line.seq, line.reversedAt);
      }
    }
    return ledger;
  }

  get size(): number {
    return this.entries.length;
  }

  record(owner: RecordOwner, input: ArtifactInput): ArtifactRecord {
    if (!isArtifactKind(input.kind)) {
      throw new Error(`Unknown artifact kind: "${input.kind}"`);
    }
    if (input.remoteId.length === 0) {
      throw new Error('Artifact records need a remote id');
    }

    const record: ArtifactRecord = Object.freeze({
      seq: this.nextSeq,
      runId: this.runId,
      kind: input.kind,
      remoteId: input.remoteId,
      description: input.description,
      moduleId: owner.moduleId,
      invocationId: owner.invocationId,
      createdAt: this.now().toISOString(),
      reversal: Object.freeze({ action: input.reversal.action, args: Object.freeze({ ...input.reversal.args }) }),
      reversed: false,
    });

    this.insert(record);
    this.store?.append(this.runId, { type: 'record', record });
    return record;
  }

  get(seq: number): ArtifactRecord | undefined {
    const index = this.bySeq.get(seq);
    return index === undefined ? undefined : this.entries[index];
  }

  /** Records matching every given filter field, in creation order. */
  list(filter: LedgerFilter = {}): ArtifactRecord[] {
    const kinds =
      filter.kind === undefined ? undefined : typeof filter.kind === 'string' ? [filter.kind] : filter.kind;

    return this.entries.filter(
      (record) =>
        (kinds === undefined || kinds.includes(record.kind)) &&
        (filter.moduleId === undefined || record.moduleId === filter.moduleId) &&
        (filter.invocationId === undefined || record.invocationId === filter.invocationId) &&
        (filter.reversed === undefined || record.reversed === filter.reversed),
    );
  }

  /** Flag a record as undone. Marking an already reversed record is a no-op. */
  markReversed(seq: number): ArtifactRecord {
    const existing = this.get(seq);
    if (!existing) {
      throw new Error(`No artifact record with seq ${seq} in run ${this.runId}`);
    }
    if (existing.reversed) {
      return existing;
    }

    const reversedAt = this.now().toISOString();
    const updated = this.applyReversed(seq, reversedAt);
    this.store?.append(this.runId, { type: 'reversed', seq, reversedAt });
    return updated;
  }

  /** A ledger view bound to one module invocation. */
  scope(options: ScopeOptions): LedgerScope {
    const owner: RecordOwner = { moduleId: options.moduleId, invocationId: options.invocationId };
    const allowed = new Set(options.allowedKinds);

    return {
      moduleId: owner.moduleId,
      invocationId: owner.invocationId,
      record: (input) => {
        if (options.readOnly) {
          throw new DryRunViolationError(`Recording a ${input.kind} artifact`);
        }
        if (!allowed.has(input.kind)) {
          throw new UndeclaredArtifactError(owner.moduleId, input.kind);
        }
        return this.record(owner, input);
      },
      markReversed: (seq) => {
        const record = this.get(seq);
        if (!record || record.invocationId !== owner.invocationId) {
          throw new Error(`Record ${seq} does not belong to invocation ${owner.invocationId}`);
        }
        return this.markReversed(seq);
      },
      records: () => this.list({ invocationId: owner.invocationId }),
    };
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private insert(record: ArtifactRecord): void {
    if (this.bySeq.has(record.seq)) {
      throw new Error(`Duplicate artifact seq ${record.seq} in run ${this.runId}`);
    }
    this.bySeq.set(record.seq, this.entries.length);
    this.entries.push(record);
    this.nextSeq = Math.max(this.nextSeq, record.seq + 1);
  }

  private applyReversed(seq: number, reversedAt: string): ArtifactRecord {
    const index = this.bySeq.get(seq);
    const existing = index === undefined ? undefined : this.entries[index];
    if (index === undefined || !existing) {
      throw new Error(`No artifact record with seq ${seq} in run ${this.runId}`);
    }
    const updated: ArtifactRecord = Object.freeze({ ...existing, reversed: true, reversedAt });
    this.entries[index] = updated;
    return updated;
  }
}

function freezeReversal(record: ArtifactRecord): ArtifactRecord['reversal'] {
  return Object.freeze({ action: record.reversal.action, args: Object.freeze({ ...record.reversal.args }) });
}
