export const VERSION = '0.1.0';

export {
  ApiClient,
  apiBaseUrl,
  type ApiClientOptions,
  type ApiPage,
  type ApiResponse,
  type CallOptions,
  type Credentials,
  type Session,
  type TenantApi,
} from './core/api/api-client.js';
export { NodeHttpTransport, type HttpTransport, type HttpRequest, type HttpResponse } from './core/api/transport.js';
export { DEFAULT_RETRY_POLICY, planRetry, type RetryPolicy, type RetryDecision } from './core/api/retry-policy.js';
export { DEFAULT_RATE_LIMIT, RateLimiter, type RateLimiterConfig } from './core/api/rate-limiter.js';
export { ModuleRegistry } from './core/registry/module-registry.js';
export type { ActionModule, LedgerScope, ModuleContext, ModuleFactory, ModuleOutcome } from './core/modules/action-module.js';
export { ArtifactLedger, type LedgerFilter } from './core/ledger/artifact-ledger.js';
export { LedgerStore } from './core/ledger/ledger-store.js';
export { ExecutionEngine, type ExecutionEngineOptions } from './core/engine/execution-engine.js';
export { ReportStore } from './core/engine/report-store.js';
export { CleanupCoordinator, type CleanupSelection } from './core/cleanup/cleanup-coordinator.js';
export { loadRunPlan, parseRunPlan } from './core/run-plan.js';
export { SimError, isSimError } from './core/sim-error.js';
export { registerBuiltinTechniques } from './techniques/index.js';
export * from './types/index.js';
