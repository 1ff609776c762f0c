#!/usr/bin/env node
/**
 * Production entry point for tinman.
 *
 * Wires real dependencies (filesystem, process signals, logging sinks)
 * into CliDeps and dispatches to the CLI command handler. When config.toml
 * has an `[elasticsearch]` section, log events are also exported there.
 *
 * Usage:
 *   node dist/main.js list
 *   node dist/main.js run plans/discovery.yaml --profile staging
 *   node dist/main.js cleanup 20261018T093000Z-1a2b3c4d
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps, RunLog } from './cli.js';
import { resolveHome, ensureDirectoryStructure } from './types/config.js';
import { loadConfig } from './core/config-loader.js';
import { readElasticsearchPassword, type CredentialFs } from './core/credential-reader.js';
import { openElasticsearchExport, type ElasticsearchExport } from './core/elasticsearch-sink.js';
import {
  combineSinks,
  configureLogging,
  createFileLogSink,
  createSanitizingLogSink,
  type LogEntry,
  type LogSink,
} from './core/logger.js';
import { Redactor } from './core/redactor.js';

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

const redactor = new Redactor();

function stderrSink(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + '\n');
}

/**
 * Copy log entries to a run's JSONL file until the returned handle is
 * closed, then fall back to `baseSink()`.
 */
function openRunLog(path: string, baseSink: () => LogSink): RunLog {
  const file = createFileLogSink(path);
  configureLogging({ sink: createSanitizingLogSink(combineSinks(baseSink(), file), redactor) });
  return {
    close: () => {
      file.close();
      configureLogging({ sink: createSanitizingLogSink(baseSink(), redactor) });
    },
  };
}

const credentialFs: CredentialFs = {
  existsSync: (path: string) => existsSync(path),
  readFileSync: (path: string) => readFileSync(path, 'utf-8'),
};

// ---------------------------------------------------------------------------
// main()
// ---------------------------------------------------------------------------

/**
 * Production main(): wires real deps and dispatches commands.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code (0 = success, non-zero = failure).
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseArgs(argv);
  const home = resolveHome();

  // Logs stay quiet unless asked for; stdout carries the command output.
  let baseSink: LogSink = args.flags['verbose'] ? stderrSink : () => undefined;
  let elasticsearch: ElasticsearchExport | undefined;
  configureLogging({
    level: args.flags['debug'] ? 'debug' : 'info',
    sink: createSanitizingLogSink(baseSink, redactor),
  });

  // First Ctrl-C cancels the run; a second one kills the process.
  const controller = new AbortController();
  process.once('SIGINT', () => {
    process.stderr.write('Cancelling; press Ctrl-C again to quit immediately\n');
    controller.abort();
  });

  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    home,
    env: process.env,
    loadConfig: (h: string) => {
      const config = loadConfig(h);
      if (!args.flags['debug']) {
        configureLogging({ level: config.logging.level });
      }
      if (config.elasticsearch && !elasticsearch) {
        const password = readElasticsearchPassword(join(h, 'credentials'), credentialFs);
        elasticsearch = openElasticsearchExport(config.elasticsearch, password);
        baseSink = combineSinks(baseSink, elasticsearch.sink);
        configureLogging({ sink: createSanitizingLogSink(baseSink, redactor) });
      }
      return config;
    },
    ensureDirs: (h: string) => ensureDirectoryStructure(h),
    readFile: (path: string) => readFileSync(path, 'utf-8'),
    credentialFs,
    openRunLog: (path: string) => openRunLog(path, () => baseSink),
    signal: controller.signal,
  };

  try {
    return await runCommand(args, deps);
  } finally {
    await elasticsearch?.close();
  }
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

/* c8 ignore next 3 */
main().then((code) => {
  process.exitCode = code;
});
