import { describe, it, expect } from 'vitest';
import { createDescriptor, createTestClient, createTestFactory, type TestModuleBody } from '../../testing/factories.js';
import { ArtifactLedger } from '../ledger/artifact-ledger.js';
import { createLogger } from '../logger.js';
import { ModuleRegistry } from '../registry/module-registry.js';
import { DryRunViolationError } from '../sim-error.js';
import type { ModuleDescriptor } from '../../types/technique.js';
import { runModule, type ModuleInvocationPlan, type ModuleRunContext } from './module-runner.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const NOW = new Date('2026-01-01T00:00:00.000Z');

function setup(
  body: TestModuleBody,
  overrides: Partial<Omit<ModuleDescriptor, 'id'>> = {},
  context: Partial<ModuleRunContext> = {},
) {
  const { client, tenant } = createTestClient();
  const registry = new ModuleRegistry();
  registry.register(createDescriptor('discovery/sample', overrides), createTestFactory(body));
  const ledger = new ArtifactLedger('run-1', { now: () => NOW });

  const ctx: ModuleRunContext = {
    runId: 'run-1',
    dryRun: false,
    client,
    ledger,
    logger: createLogger('test'),
    timeoutMs: 1_000,
    now: () => NOW,
    ...context,
  };
  const plan: ModuleInvocationPlan = {
    index: 0,
    invocationId: 'run-1:0',
    module: registry.resolve('discovery/sample'),
    params: { depth: 2 },
    bestEffort: false,
  };
  return { ctx, plan, ledger, tenant };
}

const RECORDS_USERS = { mutating: true, artifactKinds: ['user'] } as const;

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('runModule', () => {
  it('reports a successful outcome', async () => {
    const { ctx, plan } = setup(async (_api, params) => ({ status: 'success', output: { seen: params } }));

    const { result } = await runModule(plan, ctx);

    expect(result).toEqual({
      invocationId: 'run-1:0',
      index: 0,
      moduleId: 'discovery/sample',
      status: 'success',
      output: { seen: { depth: 2 } },
      error: null,
      artifacts: [],
      plannedActions: [],
      bestEffort: false,
      startedAt: '2026-01-01T00:00:00.000Z',
      endedAt: '2026-01-01T00:00:00.000Z',
      durationMs: 0,
    });
  });

  it('reports a skipped outcome with its reason', async () => {
    const { ctx, plan } = setup(async () => ({ status: 'skipped', reason: 'no admins found' }));

    const { result } = await runModule(plan, ctx);

    expect(result.status).toBe('skipped');
    expect(result.reason).toBe('no admins found');
    expect(result.output).toBeNull();
  });

  it('turns a thrown error into a MODULE_ERROR failure', async () => {
    const { ctx, plan } = setup(async () => {
      throw new Error('boom');
    });

    const { result } = await runModule(plan, ctx);

    expect(result.status).toBe('failure');
    expect(result.error).toEqual({
      code: 'MODULE_ERROR',
      message: 'boom',
      timestamp: '2026-01-01T00:00:00.000Z',
      retriable: false,
    });
  });

  it('keeps the message of a thrown non-error value', async () => {
    const { ctx, plan } = setup(() => Promise.reject('bad state'));

    const { result } = await runModule(plan, ctx);

    expect(result.error?.message).toBe('bad state');
  });

  it('keeps the code of a simulation error', async () => {
    const { ctx, plan } = setup(async () => {
      throw new DryRunViolationError('Mutating call POST /users');
    });

    const { result } = await runModule(plan, ctx);

    expect(result.error).toMatchObject({
      code: 'DRY_RUN_VIOLATION',
      message: 'Mutating call POST /users refused during dry run',
    });
  });

  it('collects the records the module made', async () => {
    const { ctx, plan } = setup(async (_api, _params, ledger) => {
      ledger.record({
        kind: 'user',
        remoteId: '00u0002',
        description: 'User sim@example.com',
        reversal: { action: 'delete-user', args: { userId: '00u0002' } },
      });
      return { status: 'success', output: {} };
    }, RECORDS_USERS);

    const { result } = await runModule(plan, ctx);

    expect(result.artifacts).toEqual([
      expect.objectContaining({ seq: 1, invocationId: 'run-1:0', moduleId: 'discovery/sample', remoteId: '00u0002' }),
    ]);
  });

  it('copies planned actions', async () => {
    const action = { method: 'POST' as const, path: '/groups', description: 'Create group sim' };
    const { ctx, plan } = setup(async (_api, _params, _ledger, context) => {
      context.plan(action);
      action.description = 'changed';
      return { status: 'success', output: {} };
    });

    const { result } = await runModule(plan, ctx);

    expect(result.plannedActions).toEqual([{ method: 'POST', path: '/groups', description: 'Create group sim' }]);
  });

  // -------------------------------------------------------------------------
  // Dry run
  // -------------------------------------------------------------------------

  describe('dry run', () => {
    it('hands the module a read-only client and ledger', async () => {
      const { ctx, plan, tenant } = setup(
        async (api, _params, _ledger, context) => {
          expect(context.dryRun).toBe(true);
          await api.call('POST', '/users', { body: {} });
          return { status: 'success', output: {} };
        },
        RECORDS_USERS,
        { dryRun: true },
      );

      const { result } = await runModule(plan, ctx);

      expect(result.error?.code).toBe('DRY_RUN_VIOLATION');
      expect(tenant.requests).toHaveLength(0);
    });
  });

  // -------------------------------------------------------------------------
  // Timeout and cancellation
  // -------------------------------------------------------------------------

  describe('timeout', () => {
    it('reports a timeout and aborts the module signal', async () => {
      let aborted = false;
      const { ctx, plan, ledger } = setup(
        async (_api, _params, scope, context) => {
          await new Promise<void>((resolve) => context.signal.addEventListener('abort', () => resolve(), { once: true }));
          aborted = context.signal.aborted;
          scope.record({
            kind: 'user',
            remoteId: '00u0009',
            description: 'User late@example.com',
            reversal: { action: 'delete-user', args: { userId: '00u0009' } },
          });
          return { status: 'success', output: {} };
        },
        RECORDS_USERS,
        { timeoutMs: 10 },
      );

      const { result, settled } = await runModule(plan, ctx);
      await settled;

      expect(result.status).toBe('timeout');
      expect(result.error).toMatchObject({
        code: 'TIMEOUT',
        message: 'Module "discovery/sample" did not finish within 10ms',
      });
      expect(aborted).toBe(true);
      expect(ledger.list({ invocationId: 'run-1:0' })).toHaveLength(1);
    });

    it('starts with an aborted signal when the run is already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      let seen: boolean | undefined;
      const { ctx, plan } = setup(
        async (_api, _params, _ledger, context) => {
          seen = context.signal.aborted;
          return { status: 'skipped', reason: 'cancelled' };
        },
        {},
        { runSignal: controller.signal },
      );

      await runModule(plan, ctx);

      expect(seen).toBe(true);
    });

    it('forwards a run cancellation to a running module', async () => {
      const controller = new AbortController();
      const { ctx, plan } = setup(
        async (_api, _params, _ledger, context) => {
          setTimeout(() => controller.abort(), 5);
          await new Promise<void>((resolve) => context.signal.addEventListener('abort', () => resolve(), { once: true }));
          return { status: 'skipped', reason: 'interrupted' };
        },
        {},
        { runSignal: controller.signal },
      );

      const { result } = await runModule(plan, ctx);

      expect(result).toMatchObject({ status: 'skipped', reason: 'interrupted' });
    });
  });
});
