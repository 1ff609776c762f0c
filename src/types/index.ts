export {
  ErrorCode,
  type ErrorCodeValue,
  type ErrorDetail,
  ERROR_RETRIABLE_DEFAULTS,
} from './errors.js';

export {
  type Tactic,
  type TechniqueId,
  type ArtifactKind,
  type ModuleDescriptor,
  TACTICS,
  ARTIFACT_KINDS,
  formatTechniqueId,
  parseTechniqueId,
} from './technique.js';

export { type JsonSchema, type JsonSchemaProperty, NO_PARAMS } from './schema.js';

export type {
  ExecutionMode,
  ModuleInvocation,
  RunRequest,
  ReversalActionName,
  ReversalRef,
  ArtifactInput,
  ArtifactRecord,
  ModuleStatus,
  PlannedAction,
  ModuleResult,
  RunStatus,
  RunReport,
  ReversalOutcome,
  ReversalResult,
  CleanupReport,
} from './run.js';

export {
  type EngineConfig,
  type RetryConfig,
  type RateLimitConfig,
  type LoggingConfig,
  type ElasticsearchConfig,
  type ProfileConfig,
  type TinmanConfig,
  type DirectoryStructure,
  DEFAULT_CONFIG,
  DEFAULT_ELASTICSEARCH_INDEX,
  TINMAN_SUBDIRS,
  resolveHome,
  ensureDirectoryStructure,
  parseConfig,
} from './config.js';
