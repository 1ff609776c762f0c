/**
 * Runs one module invocation and turns whatever happens into a
 * ModuleResult.
 *
 * - Timeout enforcement (→ status `timeout`, module signal aborted)
 * - SimError discrimination (→ its own code and detail)
 * - Anything else thrown (→ MODULE_ERROR with the original message)
 *
 * The returned `settled` promise resolves once the module's own promise
 * has finished, even after a timeout, so the engine can wait for late
 * ledger records before it assembles the report.
 */

import type { ApiClient } from '../api/api-client.js';
import type { ArtifactLedger } from '../ledger/artifact-ledger.js';
import type { Logger } from '../logger.js';
import type { ModuleContext, ModuleOutcome } from '../modules/action-module.js';
import type { RegisteredModule } from '../registry/module-registry.js';
import { ModuleTimeoutError, toErrorDetail } from '../sim-error.js';
import { formatTechniqueId } from '../../types/technique.js';
import type { ErrorDetail } from '../../types/errors.js';
import type { ModuleResult, ModuleStatus, PlannedAction } from '../../types/run.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ModuleInvocationPlan {
  index: number;
  invocationId: string;
  module: RegisteredModule;
  /** Validated parameters with defaults applied. */
  params: Record<string, unknown>;
  bestEffort: boolean;
}

export interface ModuleRunContext {
  runId: string;
  dryRun: boolean;
  client: ApiClient;
  ledger: ArtifactLedger;
  logger: Logger;
  timeoutMs: number;
  /** Run-level cancellation. */
  runSignal?: AbortSignal;
  now: () => Date;
}

export interface ModuleExecution {
  result: ModuleResult;
  /** Resolves when the module's promise settles; never rejects. */
  settled: Promise<void>;
}

// ---------------------------------------------------------------------------
// Timeout helper
// ---------------------------------------------------------------------------

async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  onTimeout: () => void,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      onTimeout();
      reject(new ModuleTimeoutError(label, ms));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export async function runModule(
  plan: ModuleInvocationPlan,
  ctx: ModuleRunContext,
): Promise<ModuleExecution> {
  const { descriptor, factory } = plan.module;
  const moduleId = formatTechniqueId(descriptor.id);
  const logger = ctx.logger.withContext({ module: moduleId, invocation: plan.invocationId });

  const controller = new AbortController();
  const onRunAbort = (): void => controller.abort();
  if (ctx.runSignal?.aborted) {
    controller.abort();
  } else {
    ctx.runSignal?.addEventListener('abort', onRunAbort, { once: true });
  }

  const plannedActions: PlannedAction[] = [];
  const context: ModuleContext = {
    runId: ctx.runId,
    invocationId: plan.invocationId,
    dryRun: ctx.dryRun,
    signal: controller.signal,
    logger,
    plan: (action) => {
      plannedActions.push({ ...action });
    },
  };
  const api = ctx.client.scope({ signal: controller.signal, readOnly: ctx.dryRun });
  const ledger = ctx.ledger.scope({
    moduleId,
    invocationId: plan.invocationId,
    allowedKinds: descriptor.artifactKinds,
    readOnly: ctx.dryRun,
  });

  const startedAt = ctx.now();
  logger.info('module started', { dryRun: ctx.dryRun });

  const execution = Promise.resolve().then(() =>
    factory(descriptor).execute(api, plan.params, ledger, context),
  );
  const settled = execution.then(
    () => undefined,
    () => undefined,
  );

  let status: ModuleStatus;
  let output: Record<string, unknown> | null = null;
  let error: ErrorDetail | null = null;
  let reason: string | undefined;

  try {
    const outcome: ModuleOutcome = await withTimeout(execution, ctx.timeoutMs, moduleId, () =>
      controller.abort(),
    );
    if (outcome.status === 'success') {
      status = 'success';
      output = outcome.output;
    } else {
      status = 'skipped';
      reason = outcome.reason;
    }
  } catch (err: unknown) {
    status = err instanceof ModuleTimeoutError ? 'timeout' : 'failure';
    error = toErrorDetail(err, ctx.now().toISOString());
  } finally {
    ctx.runSignal?.removeEventListener('abort', onRunAbort);
  }

  const endedAt = ctx.now();
  const durationMs = endedAt.getTime() - startedAt.getTime();
  const ok = status === 'success' || status === 'skipped';
  logger[ok ? 'info' : 'warn']('module finished', {
    status,
    duration_ms: durationMs,
    ok,
    ...(error ? { error_code: error.code, error: error.message } : {}),
  });

  const result: ModuleResult = {
    invocationId: plan.invocationId,
    index: plan.index,
    moduleId,
    status,
    output,
    error,
    artifacts: ledger.records(),
    plannedActions,
    bestEffort: plan.bestEffort,
    startedAt: startedAt.toISOString(),
    endedAt: endedAt.toISOString(),
    durationMs,
  };
  if (reason !== undefined) {
    result.reason = reason;
  }

  return { result, settled };
}
