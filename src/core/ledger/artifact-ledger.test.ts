import { describe, it, expect, vi } from 'vitest';
import { createArtifactInput } from '../../testing/factories.js';
import { ArtifactLedger } from './artifact-ledger.js';
import type { LedgerLine, LedgerPersistence } from './ledger-store.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const OWNER = { moduleId: 'persistence/create-user', invocationId: 'run-1:0' };

/** In-memory persistence that keeps lines per run. */
function memoryStore(): LedgerPersistence & { lines: Map<string, LedgerLine[]> } {
  const lines = new Map<string, LedgerLine[]>();
  return {
    lines,
    append: (runId, line) => {
      lines.set(runId, [...(lines.get(runId) ?? []), line]);
    },
    read: (runId) => lines.get(runId) ?? [],
  };
}

function fixedClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ArtifactLedger', () => {
  // -------------------------------------------------------------------------
  // record
  // -------------------------------------------------------------------------

  describe('record', () => {
    it('assigns increasing sequence numbers', () => {
      const ledger = new ArtifactLedger('run-1', { now: fixedClock() });

      const first = ledger.record(OWNER, createArtifactInput());
      const second = ledger.record(OWNER, createArtifactInput({ remoteId: '00u0003' }));

      expect(first.seq).toBe(1);
      expect(second.seq).toBe(2);
      expect(ledger.size).toBe(2);
    });

    it('stamps the owner, run and time', () => {
      const ledger = new ArtifactLedger('run-1', { now: fixedClock() });

      const record = ledger.record(OWNER, createArtifactInput());

      expect(record).toEqual({
        seq: 1,
        runId: 'run-1',
        kind: 'user',
        remoteId: '00u0002',
        description: 'user "sim@example.com" created',
        moduleId: 'persistence/create-user',
        invocationId: 'run-1:0',
        createdAt: '2026-01-01T00:00:00.000Z',
        reversal: { action: 'delete-user', args: { userId: '00u0002' } },
        reversed: false,
      });
    });

    it('returns frozen records', () => {
      const ledger = new ArtifactLedger('run-1');
      const record = ledger.record(OWNER, createArtifactInput());

      expect(Object.isFrozen(record)).toBe(true);
      expect(Object.isFrozen(record.reversal.args)).toBe(true);
    });

    it('copies the reversal arguments', () => {
      const ledger = new ArtifactLedger('run-1');
      const input = createArtifactInput();

      const record = ledger.record(OWNER, input);
      input.reversal.args['userId'] = 'changed';

      expect(record.reversal.args['userId']).toBe('00u0002');
    });

    it('rejects an empty remote id', () => {
      const ledger = new ArtifactLedger('run-1');
      expect(() => ledger.record(OWNER, createArtifactInput({ remoteId: '' }))).toThrow(
        'Artifact records need a remote id',
      );
    });

    it('persists each record', () => {
      const store = memoryStore();
      const ledger = new ArtifactLedger('run-1', { store });

      const record = ledger.record(OWNER, createArtifactInput());

      expect(store.lines.get('run-1')).toEqual([{ type: 'record', record }]);
    });

    it('keeps every record when many are appended at once', async () => {
      const ledger = new ArtifactLedger('run-1');

      await Promise.all(
        Array.from({ length: 50 }, (_, i) =>
          Promise.resolve().then(() =>
            ledger.record({ moduleId: OWNER.moduleId, invocationId: `run-1:${i}` }, createArtifactInput({ remoteId: `00u${i}` })),
          ),
        ),
      );

      expect(ledger.list().map((record) => record.seq)).toEqual(Array.from({ length: 50 }, (_, i) => i + 1));
    });
  });

  // -------------------------------------------------------------------------
  // list
  // -------------------------------------------------------------------------

  describe('list', () => {
    function seeded(): ArtifactLedger {
      const ledger = new ArtifactLedger('run-1');
      ledger.record(OWNER, createArtifactInput());
      ledger.record(
        { moduleId: 'persistence/create-api-token', invocationId: 'run-1:1' },
        createArtifactInput({
          kind: 'api-token',
          remoteId: '00T0002',
          description: 'API token "sim" issued',
          reversal: { action: 'revoke-api-token', args: { tokenId: '00T0002' } },
        }),
      );
      ledger.record(OWNER, createArtifactInput({ kind: 'role-assignment', remoteId: 'irb0002' }));
      return ledger;
    }

    it('returns records in creation order', () => {
      expect(seeded().list().map((record) => record.seq)).toEqual([1, 2, 3]);
    });

    it('filters by kind', () => {
      expect(seeded().list({ kind: 'api-token' }).map((record) => record.seq)).toEqual([2]);
      expect(seeded().list({ kind: ['user', 'role-assignment'] }).map((record) => record.seq)).toEqual([1, 3]);
    });

    it('filters by module and invocation', () => {
      expect(seeded().list({ moduleId: 'persistence/create-user' }).map((record) => record.seq)).toEqual([1, 3]);
      expect(seeded().list({ invocationId: 'run-1:1' }).map((record) => record.seq)).toEqual([2]);
    });

    it('filters by reversal state', () => {
      const ledger = seeded();
      ledger.markReversed(2);
      expect(ledger.list({ reversed: false }).map((record) => record.seq)).toEqual([1, 3]);
      expect(ledger.list({ reversed: true }).map((record) => record.seq)).toEqual([2]);
    });
  });

  // -------------------------------------------------------------------------
  // markReversed
  // -------------------------------------------------------------------------

  describe('markReversed', () => {
    it('flags the record and stamps the time', () => {
      const ledger = new ArtifactLedger('run-1', { now: fixedClock() });
      ledger.record(OWNER, createArtifactInput());

      const updated = ledger.markReversed(1);

      expect(updated.reversed).toBe(true);
      expect(updated.reversedAt).toBe('2026-01-01T00:00:01.000Z');
      expect(ledger.get(1)).toBe(updated);
    });

    it('is a no-op for an already reversed record', () => {
      const store = memoryStore();
      const ledger = new ArtifactLedger('run-1', { store });
      ledger.record(OWNER, createArtifactInput());

      const first = ledger.markReversed(1);
      const second = ledger.markReversed(1);

      expect(second).toBe(first);
      expect(store.lines.get('run-1')?.filter((line) => line.type === 'reversed')).toHaveLength(1);
    });

    it('throws for an unknown sequence number', () => {
      const ledger = new ArtifactLedger('run-1');
      expect(() => ledger.markReversed(7)).toThrow('No artifact record with seq 7 in run run-1');
    });
  });

  // -------------------------------------------------------------------------
  // load
  // -------------------------------------------------------------------------

  describe('load', () => {
    it('replays records and reversals', () => {
      const store = memoryStore();
      const original = new ArtifactLedger('run-1', { store, now: fixedClock() });
      original.record(OWNER, createArtifactInput());
      original.record(OWNER, createArtifactInput({ remoteId: '00u0003' }));
      original.markReversed(1);

      const loaded = ArtifactLedger.load('run-1', store);

      expect(loaded.list()).toEqual(original.list());
    });

    it('continues numbering after the loaded records', () => {
      const store = memoryStore();
      const original = new ArtifactLedger('run-1', { store });
      original.record(OWNER, createArtifactInput());
      original.record(OWNER, createArtifactInput({ remoteId: '00u0003' }));

      const loaded = ArtifactLedger.load('run-1', store);

      expect(loaded.record(OWNER, createArtifactInput({ remoteId: '00u0004' })).seq).toBe(3);
    });

    it('rejects a duplicated sequence number', () => {
      const store = memoryStore();
      const original = new ArtifactLedger('run-1', { store });
      const record = original.record(OWNER, createArtifactInput());
      store.append('run-1', { type: 'record', record });

      expect(() => ArtifactLedger.load('run-1', store)).toThrow('Duplicate artifact seq 1 in run run-1');
    });
  });

  // -------------------------------------------------------------------------
  // scope
  // -------------------------------------------------------------------------

  describe('scope', () => {
    it('records on behalf of the bound invocation', () => {
      const ledger = new ArtifactLedger('run-1');
      const scope = ledger.scope({ ...OWNER, allowedKinds: ['user'] });

      const record = scope.record(createArtifactInput());

      expect(record.invocationId).toBe('run-1:0');
      expect(scope.records()).toEqual([record]);
    });

    it('refuses kinds the module did not declare', () => {
      const ledger = new ArtifactLedger('run-1');
      const scope = ledger.scope({ ...OWNER, allowedKinds: ['user'] });

      expect(() => scope.record(createArtifactInput({ kind: 'api-token' }))).toThrow(
        'Module "persistence/create-user" recorded undeclared artifact kind "api-token"',
      );
      expect(ledger.size).toBe(0);
    });

    it('refuses every record when read-only', () => {
      const store = memoryStore();
      const append = vi.spyOn(store, 'append');
      const ledger = new ArtifactLedger('run-1', { store });
      const scope = ledger.scope({ ...OWNER, allowedKinds: ['user'], readOnly: true });

      expect(() => scope.record(createArtifactInput())).toThrow('Recording a user artifact refused during dry run');
      expect(append).not.toHaveBeenCalled();
    });

    it('only reverses its own records', () => {
      const ledger = new ArtifactLedger('run-1');
      ledger.record({ moduleId: 'impact/suspend-user', invocationId: 'run-1:4' }, createArtifactInput());
      const scope = ledger.scope({ ...OWNER, allowedKinds: ['user'] });

      expect(() => scope.markReversed(1)).toThrow('Record 1 does not belong to invocation run-1:0');
    });
  });
});
