/**
 * ExecutionEngine: turns a RunRequest into a RunReport.
 *
 * Lifecycle of a run:
 * 1. Resolve every technique id and validate every parameter set. Any
 *    failure here throws before a single API call is made.
 * 2. Make sure the client holds a session. AuthError is fatal here too;
 *    any other failure (tenant unreachable, rate limit budget spent) is
 *    reported as the error of every requested module and nothing runs.
 * 3. Dispatch modules, one at a time in request order or through a pool
 *    of K workers, each under its own timeout.
 * 4. Stop dispatching on cancellation, on an AuthError raised inside a
 *    module, or (sequential mode) on the first non-best-effort failure
 *    when the request asks for abort-on-failure. Undispatched modules are reported as
 *    `skipped`.
 * 5. Give timed-out modules a bounded drain period, re-read every
 *    invocation's artifacts from the ledger, aggregate, persist.
 */

import { randomBytes } from 'node:crypto';
import type { ApiClient } from '../api/api-client.js';
import { ArtifactLedger } from '../ledger/artifact-ledger.js';
import { assertValidRunId, type LedgerPersistence } from '../ledger/ledger-store.js';
import { createLogger, type Logger } from '../logger.js';
import type { ModuleRegistry } from '../registry/module-registry.js';
import { AuthError, toErrorDetail } from '../sim-error.js';
import { ErrorCode, type ErrorDetail } from '../../types/errors.js';
import type { ModuleResult, RunReport, RunRequest, RunStatus } from '../../types/run.js';
import { formatTechniqueId } from '../../types/technique.js';
import type { ReportPersistence } from './report-store.js';
import { runModule, type ModuleInvocationPlan, type ModuleRunContext } from './module-runner.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ExecutionEngineOptions {
  registry: ModuleRegistry;
  client: ApiClient;
  /** Worker pool size in concurrent mode (default 4). */
  concurrency?: number;
  /** Per-module execution budget (default 120s). */
  moduleTimeoutMs?: number;
  /** How long to wait for timed-out modules before reporting (default 5s). */
  drainTimeoutMs?: number;
  ledgerStore?: LedgerPersistence;
  reportStore?: ReportPersistence;
  logger?: Logger;
  now?: () => Date;
  generateRunId?: () => string;
}

export interface RunOptions {
  /** Operator interrupt. */
  signal?: AbortSignal;
}

export interface RunOutcome {
  report: RunReport;
  ledger: ArtifactLedger;
}

type StopReason = 'cancelled' | 'auth' | 'abort-on-failure' | 'unreachable';

const SKIP_REASONS: Readonly<Record<StopReason, string>> = {
  cancelled: 'Run was cancelled before this module started',
  auth: 'Skipped after an authentication failure',
  'abort-on-failure': 'Skipped after an earlier module failed',
  unreachable: 'Tenant could not be reached before the run started',
};

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_MODULE_TIMEOUT_MS = 120_000;
export const DEFAULT_DRAIN_TIMEOUT_MS = 5_000;

// ---------------------------------------------------------------------------
// ExecutionEngine
// ---------------------------------------------------------------------------

export class ExecutionEngine {
  private readonly registry: ModuleRegistry;
  private readonly client: ApiClient;
  private readonly concurrency: number;
  private readonly moduleTimeoutMs: number;
  private readonly drainTimeoutMs: number;
  private readonly ledgerStore?: LedgerPersistence;
  private readonly reportStore?: ReportPersistence;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateRunId: () => string;

  constructor(options: ExecutionEngineOptions) {
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error('concurrency must be a positive integer');
    }

    this.registry = options.registry;
    this.client = options.client;
    this.concurrency = concurrency;
    this.moduleTimeoutMs = options.moduleTimeoutMs ?? DEFAULT_MODULE_TIMEOUT_MS;
    this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;
    this.ledgerStore = options.ledgerStore;
    this.reportStore = options.reportStore;
    this.logger = options.logger ?? createLogger('engine');
    this.now = options.now ?? (() => new Date());
    this.generateRunId = options.generateRunId ?? (() => generateRunId(this.now()));
  }

  /** Execute a run and return its report. */
  async run(request: RunRequest, options: RunOptions = {}): Promise<RunReport> {
    const { report } = await this.execute(request, options);
    return report;
  }

  /**
   * Execute a run and return the report together with its ledger.
   *
   * @throws UnknownModuleError, InvalidParamsError, AuthError before any
   *   module runs. Other authentication failures come back as a report
   *   whose modules all failed with that error.
   */
  async execute(request: RunRequest, options: RunOptions = {}): Promise<RunOutcome> {
    const runId = request.runId ?? this.generateRunId();
    assertValidRunId(runId);

    const plans = this.prepare(runId, request);
    const logger = this.logger.withContext({ run: runId });
    const { signal } = options;
    const startedAt = this.now();

    let preflightError: ErrorDetail | undefined;
    if (!signal?.aborted && !this.client.currentSession) {
      try {
        await this.client.authenticate();
      } catch (err: unknown) {
        if (err instanceof AuthError) {
          throw err;
        }
        preflightError = toErrorDetail(err, this.now().toISOString());
        logger.error('authentication failed before dispatch', {
          error_code: preflightError.code,
          error: err,
        });
      }
    }

    logger.info('run started', {
      modules: plans.length,
      mode: request.mode,
      dryRun: request.dryRun,
    });

    const ledger = new ArtifactLedger(runId, { store: this.ledgerStore, now: this.now });
    const context: ModuleRunContext = {
      runId,
      dryRun: request.dryRun,
      client: this.client,
      ledger,
      logger,
      timeoutMs: this.moduleTimeoutMs,
      runSignal: signal,
      now: this.now,
    };

    const results = new Map<number, ModuleResult>();
    const lingering: Promise<void>[] = [];
    let stop: StopReason | undefined = preflightError ? 'unreachable' : undefined;

    const shouldStop = (): boolean => {
      if (signal?.aborted) {
        stop ??= 'cancelled';
      }
      return stop !== undefined;
    };

    const runOne = async (plan: ModuleInvocationPlan): Promise<void> => {
      const { result, settled } = await runModule(plan, context);
      results.set(plan.index, result);

      if (result.status === 'timeout') {
        lingering.push(settled);
      }
      if (result.error?.code === ErrorCode.AUTH_ERROR) {
        stop ??= 'auth';
      } else if (
        request.mode === 'sequential' &&
        request.abortOnFailure === true &&
        !result.bestEffort &&
        countsAsFailure(result)
      ) {
        stop ??= 'abort-on-failure';
      }
    };

    if (request.mode === 'sequential') {
      for (const plan of plans) {
        if (shouldStop()) break;
        await runOne(plan);
      }
    } else {
      let next = 0;
      const worker = async (): Promise<void> => {
        while (next < plans.length && !shouldStop()) {
          const plan = plans[next];
          next += 1;
          if (plan) {
            await runOne(plan);
          }
        }
      };
      const poolSize = Math.min(this.concurrency, plans.length);
      await Promise.all(Array.from({ length: poolSize }, () => worker()));
    }

    if (!(await drain(lingering, this.drainTimeoutMs))) {
      logger.warn('timed-out modules still running after drain period', {
        pending: lingering.length,
        drainTimeoutMs: this.drainTimeoutMs,
      });
    }

    const ordered = plans.map((plan) => {
      const result = results.get(plan.index);
      if (!result) {
        return preflightError
          ? failedResult(plan, preflightError)
          : skippedResult(plan, SKIP_REASONS[stop ?? 'cancelled']);
      }
      // Late records from timed-out modules belong to them too.
      return { ...result, artifacts: ledger.list({ invocationId: plan.invocationId }) };
    });

    const status: RunStatus = ordered.some(
      (result) => !result.bestEffort && countsAsFailure(result),
    )
      ? 'failure'
      : 'success';
    const endedAt = this.now();

    const report: RunReport = {
      runId,
      startedAt: startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      mode: request.mode,
      dryRun: request.dryRun,
      cancelled: signal?.aborted ?? false,
      status,
      results: ordered,
    };

    const reportPath = this.reportStore?.saveRun(report);
    logger.info('run finished', {
      status,
      cancelled: report.cancelled,
      artifacts: ledger.size,
      duration_ms: endedAt.getTime() - startedAt.getTime(),
      ok: status === 'success',
      ...(stop ? { stopReason: stop } : {}),
      ...(reportPath ? { reportPath } : {}),
    });

    return { report, ledger };
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  /** Resolve everything first so an unknown id wins over bad parameters. */
  private prepare(runId: string, request: RunRequest): ModuleInvocationPlan[] {
    const modules = request.modules.map((invocation) => this.registry.resolve(invocation.id));

    return request.modules.map((invocation, index) => {
      const module = modules[index];
      if (!module) {
        throw new Error(`No resolved module at index ${index}`);
      }
      return {
        index,
        invocationId: `${runId}:${index}`,
        module,
        params: this.registry.validateParams(invocation.id, invocation.params ?? {}),
        bestEffort: invocation.bestEffort ?? false,
      };
    });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function countsAsFailure(result: ModuleResult): boolean {
  return result.status === 'failure' || result.status === 'timeout';
}

function skippedResult(plan: ModuleInvocationPlan, reason: string): ModuleResult {
  return {
    invocationId: plan.invocationId,
    index: plan.index,
    moduleId: formatTechniqueId(plan.module.descriptor.id),
    status: 'skipped',
    output: null,
    error: null,
    reason,
    artifacts: [],
    plannedActions: [],
    bestEffort: plan.bestEffort,
    startedAt: null,
    endedAt: null,
    durationMs: 0,
  };
}

function failedResult(plan: ModuleInvocationPlan, error: ErrorDetail): ModuleResult {
  return {
    ...skippedResult(plan, SKIP_REASONS.unreachable),
    status: 'failure',
    error,
  };
}

/** Resolves true if every promise settled within `ms`. */
async function drain(pending: Promise<void>[], ms: number): Promise<boolean> {
  if (pending.length === 0) {
    return true;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });

  try {
    return await Promise.race([Promise.all(pending).then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/** `20261018T093000Z-1a2b3c4d` */
export function generateRunId(at: Date): string {
  const stamp = at.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
  return `${stamp}-${randomBytes(4).toString('hex')}`;
}
