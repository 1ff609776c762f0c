/**
 * tinman CLI.
 *
 * Provides the `tinman` command with subcommands:
 *   - `list [tactic]`     Show the module catalog.
 *   - `run <plan>`        Execute a run plan against a tenant.
 *   - `cleanup <runId>`   Reverse what a run left behind.
 *   - `ledger <runId>`    Show a run's artifact records.
 *   - `runs`              List recorded runs.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import { join } from 'node:path';
import { VERSION } from './index.js';
import { ApiClient } from './core/api/api-client.js';
import type { SleepFn } from './core/api/sleep.js';
import type { HttpTransport } from './core/api/transport.js';
import { CleanupCoordinator, selectForReversal, type CleanupSelection } from './core/cleanup/cleanup-coordinator.js';
import { selectProfile } from './core/config-loader.js';
import { requireApiToken, type CredentialFs } from './core/credential-reader.js';
import { ExecutionEngine, generateRunId } from './core/engine/execution-engine.js';
import { ReportStore } from './core/engine/report-store.js';
import { ArtifactLedger } from './core/ledger/artifact-ledger.js';
import { LedgerStore, isArtifactKind } from './core/ledger/ledger-store.js';
import { ModuleRegistry } from './core/registry/module-registry.js';
import { parseRunPlan, type PlanOverrides } from './core/run-plan.js';
import { registerBuiltinTechniques } from './techniques/index.js';
import type { DirectoryStructure, TinmanConfig } from './types/config.js';
import type { CleanupReport, RunReport } from './types/run.js';
import { formatTechniqueId, isTactic } from './types/technique.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Handle on a per-run log file. */
export interface RunLog {
  close(): void;
}

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
  /** Resolved TINMAN_HOME path. */
  home: string;
  env: NodeJS.ProcessEnv;
  /** Load and validate config from TINMAN_HOME. */
  loadConfig: (home: string) => TinmanConfig;
  /** Ensure directory structure exists under TINMAN_HOME. */
  ensureDirs: (home: string) => DirectoryStructure;
  /** Read file contents as string. */
  readFile: (path: string) => string;
  credentialFs: CredentialFs;
  /** HTTP transport for the API client; the node one when omitted. */
  transport?: HttpTransport;
  /** Backoff sleep for the API client. */
  sleep?: SleepFn;
  /** Start copying log entries to a run's log file. */
  openRunLog?: (path: string) => RunLog;
  /** Operator interrupt (Ctrl-C). */
  signal?: AbortSignal;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

/** Options that take a value, as `--name value` or `--name=value`. */
const VALUE_OPTIONS: ReadonlySet<string> = new Set(['profile', 'kind', 'module']);

/**
 * Parse process.argv into a command, positional arguments, boolean
 * flags and valued options.
 *
 * Expects argv in the form: [node, script, command?, ...args]
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};
  const positionals: string[] = [];
  let command = '';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq !== -1) {
        options[body.slice(0, eq)] = body.slice(eq + 1);
      } else if (VALUE_OPTIONS.has(body)) {
        options[body] = args[i + 1] ?? '';
        i += 1;
      } else {
        flags[body] = true;
      }
    } else if (!command) {
      command = arg;
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags, options };
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

const USAGE = `Usage: tinman <command>

Commands:
  list [tactic]      Show available modules
  run <plan>         Execute a run plan (YAML)
  cleanup <runId>    Reverse the artifacts a run left behind
  ledger <runId>     Show a run's artifact records
  runs               List recorded runs

Options:
  --profile <name>   Tenant profile from config.toml
  --dry-run          Plan only; make no changes
  --concurrent       Run plan modules concurrently (run)
  --kind <kind>      Only reverse artifacts of this kind (cleanup)
  --module <id>      Only reverse artifacts of this module (cleanup)
  --verbose          Write structured logs to stderr
  --debug            Log at debug level
  --version          Show version number
  --help             Show this help message`;

/**
 * Dispatch parsed arguments to the matching handler.
 *
 * @returns Process exit code (0 = success, 1 = failure).
 */
export async function runCommand(args: ParsedArgs, deps: CliDeps): Promise<number> {
  if (args.flags['version']) {
    deps.stdout(VERSION);
    return 0;
  }

  if (args.command === '' || args.flags['help']) {
    deps.stdout(USAGE);
    return 0;
  }

  try {
    switch (args.command) {
      case 'list':
        return list(args, deps);
      case 'run':
        return await run(args, deps);
      case 'cleanup':
        return await cleanup(args, deps);
      case 'ledger':
        return ledger(args, deps);
      case 'runs':
        return runs(deps);
      default:
        deps.stderr(`Unknown command: "${args.command}"\n`);
        deps.stdout(USAGE);
        return 1;
    }
  } catch (err) {
    deps.stderr(`Error: ${errorMessage(err)}`);
    return 1;
  }
}

// ---------------------------------------------------------------------------
// list
// ---------------------------------------------------------------------------

export function list(args: ParsedArgs, deps: CliDeps): number {
  const tactic = args.positionals[0];
  if (tactic !== undefined && !isTactic(tactic)) {
    deps.stderr(`Unknown tactic: "${tactic}"`);
    return 1;
  }

  const descriptors = createRegistry().list(tactic);
  const width = Math.max(...descriptors.map((d) => formatTechniqueId(d.id).length));
  for (const descriptor of descriptors) {
    const id = formatTechniqueId(descriptor.id).padEnd(width);
    const access = descriptor.mutating ? 'mutating ' : 'read-only';
    deps.stdout(`${id}  ${access}  ${descriptor.description}`);
  }
  deps.stdout(`\n${descriptors.length} modules`);
  return 0;
}

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

/**
 * Execute a run plan.
 *
 * 1. Load config and the plan (flags override the plan's mode and dry run).
 * 2. Read the profile's API token and build the client.
 * 3. Run the engine with the ledger and reports under `data/`, and the
 *    run's log entries copied to `data/logs/<runId>.jsonl`.
 * 4. Print a summary. Exit 1 unless the run succeeded.
 */
export async function run(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const planPath = args.positionals[0];
  if (planPath === undefined) {
    deps.stderr('Usage: tinman run <plan.yaml>');
    return 1;
  }

  const dirs = deps.ensureDirs(deps.home);
  const config = deps.loadConfig(deps.home);
  const overrides: PlanOverrides = {};
  if (args.flags['dry-run']) overrides.dryRun = true;
  if (args.flags['concurrent']) overrides.mode = 'concurrent';
  const request = parseRunPlan(deps.readFile(planPath), planPath, overrides);

  const client = createClient(deps, config, dirs, args.options['profile']);
  const now = deps.now ?? (() => new Date());
  const runId = generateRunId(now());
  const runLog = deps.openRunLog?.(join(dirs.logs, `${runId}.jsonl`));

  try {
    const engine = new ExecutionEngine({
      registry: createRegistry(),
      client,
      concurrency: config.engine.concurrency,
      moduleTimeoutMs: config.engine.module_timeout_ms,
      drainTimeoutMs: config.engine.drain_timeout_ms,
      ledgerStore: new LedgerStore(dirs.ledger),
      reportStore: new ReportStore(dirs.reports),
      now,
    });
    const report = await engine.run({ ...request, runId }, { signal: deps.signal });
    printRunReport(report, deps);
    return report.status === 'success' ? 0 : 1;
  } finally {
    runLog?.close();
    client.close();
  }
}

function printRunReport(report: RunReport, deps: CliDeps): void {
  const notes = [report.dryRun ? 'dry run' : '', report.cancelled ? 'cancelled' : ''].filter(Boolean);
  deps.stdout(`Run ${report.runId}: ${report.status}${notes.length > 0 ? ` (${notes.join(', ')})` : ''}`);

  let artifacts = 0;
  for (const result of report.results) {
    const detail = result.error?.message ?? result.reason;
    deps.stdout(`  [${result.status}] ${result.moduleId}${detail ? `: ${detail}` : ''}`);
    for (const action of result.plannedActions) {
      deps.stdout(`      would ${action.method} ${action.path}: ${action.description}`);
    }
    artifacts += result.artifacts.filter((record) => !record.reversed).length;
  }

  if (artifacts > 0) {
    deps.stdout(`\n${artifacts} artifacts left in the tenant; undo with: tinman cleanup ${report.runId}`);
  }
}

// ---------------------------------------------------------------------------
// cleanup
// ---------------------------------------------------------------------------

/**
 * Reverse a run's un-reversed artifacts, optionally narrowed by
 * `--kind` and `--module`. With `--dry-run`, only list what would be
 * reversed; no credentials are needed then.
 */
export async function cleanup(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const runId = args.positionals[0];
  if (runId === undefined) {
    deps.stderr('Usage: tinman cleanup <runId>');
    return 1;
  }

  const selection: CleanupSelection = {};
  const kind = args.options['kind'];
  if (kind !== undefined) {
    if (!isArtifactKind(kind)) {
      deps.stderr(`Unknown artifact kind: "${kind}"`);
      return 1;
    }
    selection.kind = kind;
  }
  if (args.options['module'] !== undefined) {
    selection.moduleId = args.options['module'];
  }

  const dirs = deps.ensureDirs(deps.home);
  const store = new LedgerStore(dirs.ledger);
  if (!store.exists(runId)) {
    deps.stderr(`No ledger for run "${runId}"`);
    return 1;
  }
  const now = deps.now ?? (() => new Date());
  const runLedger = ArtifactLedger.load(runId, store, now);

  if (args.flags['dry-run']) {
    const records = selectForReversal(runLedger, selection);
    deps.stdout(`Would reverse ${records.length} artifacts:`);
    for (const record of records) {
      deps.stdout(`  #${record.seq} ${record.kind} ${record.remoteId} via ${record.reversal.action}`);
    }
    return 0;
  }

  const config = deps.loadConfig(deps.home);
  const client = createClient(deps, config, dirs, args.options['profile']);
  try {
    const coordinator = new CleanupCoordinator({
      client,
      ledger: runLedger,
      reportStore: new ReportStore(dirs.reports),
      now,
    });
    const report = await coordinator.reverse(selection, { signal: deps.signal });
    printCleanupReport(report, deps);
    return report.failed === 0 ? 0 : 1;
  } finally {
    client.close();
  }
}

function printCleanupReport(report: CleanupReport, deps: CliDeps): void {
  for (const outcome of report.outcomes) {
    const detail = outcome.error?.message ?? outcome.note;
    deps.stdout(
      `  [${outcome.outcome}] #${outcome.seq} ${outcome.kind} ${outcome.remoteId}${detail ? `: ${detail}` : ''}`,
    );
  }
  deps.stdout(`Reversed ${report.reversed}, failed ${report.failed}, skipped ${report.skipped}`);
}

// ---------------------------------------------------------------------------
// ledger / runs
// ---------------------------------------------------------------------------

export function ledger(args: ParsedArgs, deps: CliDeps): number {
  const runId = args.positionals[0];
  if (runId === undefined) {
    deps.stderr('Usage: tinman ledger <runId>');
    return 1;
  }

  const store = new LedgerStore(deps.ensureDirs(deps.home).ledger);
  if (!store.exists(runId)) {
    deps.stderr(`No ledger for run "${runId}"`);
    return 1;
  }

  for (const record of ArtifactLedger.load(runId, store).list()) {
    const state = record.reversed ? 'reversed' : 'open';
    deps.stdout(`#${record.seq} ${state} ${record.kind} ${record.remoteId} (${record.moduleId}) ${record.description}`);
  }
  return 0;
}

export function runs(deps: CliDeps): number {
  const summaries = new LedgerStore(deps.ensureDirs(deps.home).ledger).listRuns();
  if (summaries.length === 0) {
    deps.stdout('No runs recorded');
    return 0;
  }
  for (const summary of summaries) {
    deps.stdout(`${summary.runId}  ${summary.records} artifacts, ${summary.reversed} reversed`);
  }
  return 0;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createRegistry(): ModuleRegistry {
  const registry = new ModuleRegistry();
  registerBuiltinTechniques(registry);
  registry.seal();
  return registry;
}

function createClient(
  deps: CliDeps,
  config: TinmanConfig,
  dirs: DirectoryStructure,
  requestedProfile: string | undefined,
): ApiClient {
  const profile = selectProfile(config, requestedProfile);
  const token = requireApiToken(dirs.credentials, profile.name, deps.credentialFs, deps.env);

  return new ApiClient({
    orgUrl: profile.org_url,
    credentials: { kind: 'api-token', token },
    transport: deps.transport,
    retry: {
      maxAttempts: config.retry.max_attempts,
      maxElapsedMs: config.retry.max_elapsed_ms,
      baseDelayMs: config.retry.base_delay_ms,
      maxDelayMs: config.retry.max_delay_ms,
      multiplier: config.retry.multiplier,
    },
    rateLimit: {
      requestsPerMinute: config.rate_limit.requests_per_minute,
      burstSize: config.rate_limit.burst,
    },
    maxInFlight: config.engine.concurrency,
    requestTimeoutMs: config.engine.request_timeout_ms,
    sleep: deps.sleep,
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
