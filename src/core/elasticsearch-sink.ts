/**
 * Optional export of log events to Elasticsearch, so a detection stack
 * can line up what a run did with what it alerted on.
 *
 * Enabled by an `[elasticsearch]` section in config.toml. Indexing runs in
 * the background: the sink never blocks a log call and never throws.
 * Failures are logged under this module's own component, which the sink
 * does not forward, so an unreachable cluster cannot feed itself.
 */

import { Client } from '@elastic/elasticsearch';
import { createLogger, type LogEntry, type LogLevel, type Logger } from './logger.js';
import type { ElasticsearchConfig } from '../types/config.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const ELASTICSEARCH_COMPONENT = 'elasticsearch';

/** The part of the Elasticsearch client the sink uses. */
export interface EventIndexer {
  index(request: { index: string; document: Record<string, unknown> }): Promise<unknown>;
}

export interface ElasticsearchLogSinkOptions {
  index: string;
  /** Entries below this level are not exported (default info). */
  level?: LogLevel;
  logger?: Logger;
}

/** A LogSink whose pending index requests can be awaited. */
export interface ElasticsearchLogSink {
  (entry: LogEntry): void;
  /** Wait for every request issued so far. */
  flush(): Promise<void>;
  /** Stop exporting and wait for what is in flight. */
  close(): Promise<void>;
  /** Index requests that failed so far. */
  failureCount(): number;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

export function createElasticsearchLogSink(
  indexer: EventIndexer,
  options: ElasticsearchLogSinkOptions,
): ElasticsearchLogSink {
  const minRank = LEVEL_RANK[options.level ?? 'info'];
  const logger = options.logger ?? createLogger(ELASTICSEARCH_COMPONENT);
  const pending = new Set<Promise<void>>();
  let closed = false;
  let failures = 0;

  const sink = (entry: LogEntry): void => {
    if (closed || LEVEL_RANK[entry.level] < minRank) return;
    if (entry.component === ELASTICSEARCH_COMPONENT) return;

    const request = indexer
      .index({ index: options.index, document: { '@timestamp': entry.ts, ...entry } })
      .then(
        () => undefined,
        (err: unknown) => {
          failures += 1;
          // One warning per outage; the count is reported on close.
          if (failures === 1) {
            logger.warn('event indexing failed', { index: options.index, error: err });
          }
        },
      )
      .finally(() => {
        pending.delete(request);
      });
    pending.add(request);
  };

  const flush = async (): Promise<void> => {
    while (pending.size > 0) {
      await Promise.all([...pending]);
    }
  };

  return Object.assign(sink, {
    flush,
    close: async () => {
      closed = true;
      await flush();
      if (failures > 0) {
        logger.warn('events not indexed', { index: options.index, failed: failures });
      }
    },
    failureCount: () => failures,
  });
}

// ---------------------------------------------------------------------------
// Client wiring
// ---------------------------------------------------------------------------

export interface ElasticsearchExport {
  sink: ElasticsearchLogSink;
  /** Flush the sink, then release the client's connections. */
  close(): Promise<void>;
}

/** Build the client and sink for a configured cluster. */
export function openElasticsearchExport(config: ElasticsearchConfig, password: string | null): ElasticsearchExport {
  const client = new Client({
    node: config.url,
    ...(config.username !== undefined && password !== null
      ? { auth: { username: config.username, password } }
      : {}),
  });
  const indexer: EventIndexer = {
    index: (request) => client.index(request),
  };
  const sink = createElasticsearchLogSink(indexer, {
    index: config.index,
    level: config.level,
  });

  return {
    sink,
    close: async () => {
      await sink.close();
      await client.close();
    },
  };
}
