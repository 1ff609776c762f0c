import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createArtifactInput, createArtifactRecord, createTestClient } from '../../testing/factories.js';
import type { FakeTenant } from '../../testing/fake-tenant.js';
import { ArtifactLedger } from '../ledger/artifact-ledger.js';
import { configureLogging, resetLogging, type LogEntry } from '../logger.js';
import type { ReportPersistence } from '../engine/report-store.js';
import {
  CleanupCoordinator,
  reversalOrder,
  selectForReversal,
  type CleanupCoordinatorOptions,
} from './cleanup-coordinator.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date('2026-01-01T00:10:00.000Z');

let logs: LogEntry[];

beforeEach(() => {
  logs = [];
  configureLogging({ sink: (entry) => logs.push(entry) });
});

afterEach(() => {
  resetLogging();
});

/**
 * A tenant holding two simulation users, a token and a role, and a ledger
 * recording them in creation order:
 * 1 user 00u0002, 2 api-token 00T0002, 3 role irb0002, 4 user 00u0003.
 */
function setup() {
  const { tenant, client } = createTestClient();
  const first = tenant.addUser({ login: 'sim1@example.com' });
  const token = tenant.issueToken(tenant.adminId, 'sim');
  const role = tenant.assignUserRole(first.id, 'ORG_ADMIN');
  const second = tenant.addUser({ login: 'sim2@example.com' });

  const ledger = new ArtifactLedger('run-1', { now: () => NOW });
  ledger.record(
    { moduleId: 'persistence/create-user', invocationId: 'run-1:0' },
    createArtifactInput({ remoteId: first.id, reversal: { args: { userId: first.id } } }),
  );
  ledger.record(
    { moduleId: 'persistence/create-api-token', invocationId: 'run-1:1' },
    createArtifactInput({
      kind: 'api-token',
      remoteId: token.id,
      description: 'API token "sim"',
      reversal: { action: 'revoke-api-token', args: { tokenId: token.id } },
    }),
  );
  ledger.record(
    { moduleId: 'persistence/create-admin-user', invocationId: 'run-1:2' },
    createArtifactInput({
      kind: 'role-assignment',
      remoteId: role.id,
      description: 'ORG_ADMIN assigned to user 00u0002',
      reversal: { action: 'unassign-user-role', args: { userId: first.id, roleId: role.id } },
    }),
  );
  ledger.record(
    { moduleId: 'persistence/create-user', invocationId: 'run-1:3' },
    createArtifactInput({ remoteId: second.id, reversal: { args: { userId: second.id } } }),
  );

  const coordinator = (overrides: Partial<CleanupCoordinatorOptions> = {}): CleanupCoordinator =>
    new CleanupCoordinator({ client, ledger, now: () => NOW, ...overrides });

  return { tenant, client, ledger, coordinator };
}

function remaining(tenant: FakeTenant) {
  return {
    users: [...tenant.users.keys()],
    tokens: [...tenant.apiTokens.keys()],
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('CleanupCoordinator', () => {
  // -------------------------------------------------------------------------
  // reverseAll
  // -------------------------------------------------------------------------

  describe('reverseAll', () => {
    it('reverses every record, dependents first and newest first', async () => {
      const { tenant, ledger, coordinator } = setup();

      const report = await coordinator().reverseAll();

      expect(report.outcomes.map((outcome) => [outcome.seq, outcome.kind, outcome.outcome])).toEqual([
        [2, 'api-token', 'reversed'],
        [3, 'role-assignment', 'reversed'],
        [4, 'user', 'reversed'],
        [1, 'user', 'reversed'],
      ]);
      expect(report).toMatchObject({
        runId: 'run-1',
        startedAt: '2026-01-01T00:10:00.000Z',
        endedAt: '2026-01-01T00:10:00.000Z',
        attempted: 4,
        reversed: 4,
        failed: 0,
        skipped: 0,
      });
      expect(remaining(tenant)).toEqual({ users: ['00u0001'], tokens: ['00T0001'] });
      expect(ledger.list({ reversed: false })).toEqual([]);
    });

    it('authenticates once before the first reversal', async () => {
      const { tenant, coordinator } = setup();

      await coordinator().reverseAll();

      expect(tenant.requests[0]?.path).toBe('/users/me');
      expect(tenant.requests.filter((req) => req.path === '/users/me')).toHaveLength(1);
    });

    it('makes no call when nothing is left to reverse', async () => {
      const { tenant, coordinator } = setup();
      await coordinator().reverseAll();
      const before = tenant.requests.length;

      const report = await coordinator().reverseAll();

      expect(report.attempted).toBe(0);
      expect(report.outcomes).toEqual([]);
      expect(tenant.requests).toHaveLength(before);
    });

    it('saves the cleanup report', async () => {
      const { coordinator } = setup();
      const reportStore: ReportPersistence = {
        saveRun: vi.fn(),
        saveCleanup: vi.fn().mockReturnValue('/tmp/reports/run-1.cleanup.json'),
      };

      const report = await coordinator({ reportStore }).reverseAll();

      expect(reportStore.saveCleanup).toHaveBeenCalledWith(report);
    });
  });

  // -------------------------------------------------------------------------
  // Failures
  // -------------------------------------------------------------------------

  describe('failures', () => {
    it('reports a failed reversal and carries on with the rest', async () => {
      const { tenant, ledger, coordinator } = setup();

      const report = await coordinator({
        handlers: {
          'revoke-api-token': async () => {
            throw new Error('token store offline');
          },
        },
      }).reverseAll();

      expect(report.outcomes[0]).toEqual({
        seq: 2,
        kind: 'api-token',
        remoteId: '00T0002',
        action: 'revoke-api-token',
        outcome: 'failed',
        error: {
          code: 'MODULE_ERROR',
          message: 'token store offline',
          timestamp: '2026-01-01T00:10:00.000Z',
          retriable: false,
        },
      });
      expect(report).toMatchObject({ attempted: 4, reversed: 3, failed: 1 });
      expect(ledger.list({ reversed: false }).map((record) => record.seq)).toEqual([2]);
      expect(remaining(tenant).tokens).toEqual(['00T0001', '00T0002']);
    });

    it('retries only what failed on the next cleanup', async () => {
      const { tenant, coordinator } = setup();
      tenant.failNext(
        { method: 'DELETE', path: '/api-tokens/00T0002' },
        { status: 403, body: { errorCode: 'E0000006', errorSummary: 'You do not have permission to perform the requested action' } },
      );
      const first = await coordinator().reverseAll();
      expect(first.failed).toBe(1);

      const second = await coordinator().reverseAll();

      expect(second.outcomes.map((outcome) => [outcome.seq, outcome.outcome])).toEqual([[2, 'reversed']]);
      expect(remaining(tenant).tokens).toEqual(['00T0001']);
    });

    it('logs each failed reversal', async () => {
      const { coordinator } = setup();

      await coordinator({
        handlers: {
          'revoke-api-token': async () => {
            throw new Error('token store offline');
          },
        },
      }).reverseAll();

      expect(logs.find((entry) => entry.msg === 'reversal failed')).toMatchObject({
        level: 'warn',
        component: 'cleanup',
        run: 'run-1',
        error_code: 'MODULE_ERROR',
        meta: { seq: 2, kind: 'api-token', error: 'token store offline' },
      });
    });

    it('leaves manual reversals un-reversed', async () => {
      const { tenant, client } = createTestClient();
      const ledger = new ArtifactLedger('run-1');
      ledger.record(
        { moduleId: 'persistence/reset-factors', invocationId: 'run-1:0' },
        createArtifactInput({
          kind: 'credential',
          remoteId: tenant.adminId,
          description: 'MFA factors reset for admin@example.com',
          reversal: { action: 'manual', args: { instructions: 'Re-enroll MFA for admin@example.com' } },
        }),
      );

      const report = await new CleanupCoordinator({ client, ledger }).reverseAll();

      expect(report.outcomes[0]).toMatchObject({ outcome: 'skipped', note: 'Re-enroll MFA for admin@example.com' });
      expect(report.skipped).toBe(1);
      expect(ledger.list({ reversed: false })).toHaveLength(1);
    });
  });

  // -------------------------------------------------------------------------
  // Cancellation
  // -------------------------------------------------------------------------

  describe('cancellation', () => {
    it('skips everything when cancelled before it starts', async () => {
      const { tenant, coordinator } = setup();
      const controller = new AbortController();
      controller.abort();

      const report = await coordinator().reverseAll({ signal: controller.signal });

      expect(report.outcomes.map((outcome) => outcome.note)).toEqual([
        'cleanup cancelled',
        'cleanup cancelled',
        'cleanup cancelled',
        'cleanup cancelled',
      ]);
      expect(report.skipped).toBe(4);
      expect(tenant.requests).toHaveLength(0);
    });

    it('skips the records after the interrupt', async () => {
      const { coordinator, ledger } = setup();
      const controller = new AbortController();

      const report = await coordinator({
        handlers: {
          'revoke-api-token': async () => {
            controller.abort();
            return { outcome: 'reversed' };
          },
        },
      }).reverseAll({ signal: controller.signal });

      expect(report.outcomes.map((outcome) => outcome.outcome)).toEqual(['reversed', 'skipped', 'skipped', 'skipped']);
      expect(ledger.list({ reversed: false }).map((record) => record.seq)).toEqual([1, 3, 4]);
    });
  });

  // -------------------------------------------------------------------------
  // Selection
  // -------------------------------------------------------------------------

  describe('selection', () => {
    it('plans by kind, module or sequence number', () => {
      const { coordinator } = setup();
      const cleanup = coordinator();

      expect(cleanup.plan({ kind: 'user' }).map((record) => record.seq)).toEqual([4, 1]);
      expect(cleanup.plan({ moduleId: 'persistence/create-api-token' }).map((record) => record.seq)).toEqual([2]);
      expect(cleanup.plan({ seqs: [1, 2] }).map((record) => record.seq)).toEqual([2, 1]);
    });

    it('reverses only the selected records', async () => {
      const { tenant, coordinator } = setup();

      const report = await coordinator().reverse({ kind: 'api-token' });

      expect(report.attempted).toBe(1);
      expect(remaining(tenant)).toEqual({ users: ['00u0001', '00u0002', '00u0003'], tokens: ['00T0001'] });
    });
  });
});

describe('selectForReversal', () => {
  it('needs no client', () => {
    const ledger = new ArtifactLedger('run-1');
    ledger.record({ moduleId: 'persistence/create-user', invocationId: 'run-1:0' }, createArtifactInput());

    expect(selectForReversal(ledger).map((record) => record.remoteId)).toEqual(['00u0002']);
  });
});

describe('reversalOrder', () => {
  it('puts sessions before users regardless of age', () => {
    const user = createArtifactRecord({ seq: 1, kind: 'user' });
    const session = createArtifactRecord({ seq: 2, kind: 'session' });

    expect([user, session].sort(reversalOrder).map((record) => record.kind)).toEqual(['session', 'user']);
  });

  it('puts newer records first within a kind', () => {
    const older = createArtifactRecord({ seq: 1 });
    const newer = createArtifactRecord({ seq: 5 });

    expect([older, newer].sort(reversalOrder).map((record) => record.seq)).toEqual([5, 1]);
  });
});
