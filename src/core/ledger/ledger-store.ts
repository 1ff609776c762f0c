/**
 * Durable storage for artifact ledgers.
 *
 * Writes JSON Lines to `{basePath}/{runId}.jsonl`. Append-only: a
 * `record` line per artifact and a `reversed` line per reversal. Loading
 * a ledger replays the lines in order. A final line cut short by a crash
 * mid-append is dropped from the file with a warning.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createLogger, type Logger } from '../logger.js';
import { isRecord } from '../redactor.js';
import { ARTIFACT_KINDS, type ArtifactKind } from '../../types/technique.js';
import type { ArtifactRecord, ReversalActionName } from '../../types/run.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LedgerLine =
  | { type: 'record'; record: ArtifactRecord }
  | { type: 'reversed'; seq: number; reversedAt: string };

/** What the ledger needs from its backing store. */
export interface LedgerPersistence {
  append(runId: string, line: LedgerLine): void;
  read(runId: string): LedgerLine[];
}

export interface RunLedgerSummary {
  runId: string;
  records: number;
  reversed: number;
  modifiedAt: string;
}

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const REVERSAL_ACTIONS: ReadonlySet<string> = new Set<ReversalActionName>([
  'delete-user',
  'revoke-api-token',
  'unassign-user-role',
  'unassign-group-role',
  'revoke-session',
  'user-lifecycle',
  'set-lifecycle',
  'rename-resource',
  'manual',
]);

/** Run ids double as file names. */
export function assertValidRunId(runId: string): void {
  if (!RUN_ID_PATTERN.test(runId)) {
    throw new Error(`Invalid run id: "${runId}"`);
  }
}

// ---------------------------------------------------------------------------
// LedgerStore
// ---------------------------------------------------------------------------

export class LedgerStore implements LedgerPersistence {
  readonly basePath: string;
  private readonly logger: Logger;

  constructor(basePath: string = 'data/ledger', logger?: Logger) {
    this.basePath = basePath;
    this.logger = logger ?? createLogger('ledger-store');
    fs.mkdirSync(this.basePath, { recursive: true });
  }

  append(runId: string, line: LedgerLine): void {
    fs.appendFileSync(this.runFilePath(runId), JSON.stringify(line) + '\n', 'utf-8');
  }

  /**
   * Read every line for a run. Returns an empty array if the run has no
   * file yet; throws on any line that does not parse as a ledger line,
   * except a final line cut short mid-write, which is dropped.
   */
  read(runId: string): LedgerLine[] {
    const filePath = this.runFilePath(runId);
    if (!fs.existsSync(filePath)) {
      return [];
    }

    const text = fs.readFileSync(filePath, 'utf-8');
    const completeLength = text.lastIndexOf('\n') + 1;
    const lines: LedgerLine[] = [];

    text
      .slice(0, completeLength)
      .split('\n')
      .forEach((line, index) => {
        if (line.trim().length === 0) return;
        const parsed = parseLedgerLine(line);
        if (!parsed) {
          throw new Error(`Malformed ledger line ${index + 1} in ${filePath}`);
        }
        lines.push(parsed);
      });

    const tail = text.slice(completeLength);
    if (tail.trim().length > 0) {
      const parsed = parseLedgerLine(tail);
      if (parsed) {
        lines.push(parsed);
        fs.appendFileSync(filePath, '\n', 'utf-8');
      } else if (isJson(tail)) {
        throw new Error(`Malformed ledger line ${text.slice(0, completeLength).split('\n').length} in ${filePath}`);
      } else {
        this.logger.withContext({ run: runId }).warn('dropping incomplete final ledger line', {
          path: filePath,
          bytes: Buffer.byteLength(tail, 'utf-8'),
        });
        fs.truncateSync(filePath, Buffer.byteLength(text.slice(0, completeLength), 'utf-8'));
      }
    }

    return lines;
  }

  exists(runId: string): boolean {
    return fs.existsSync(this.runFilePath(runId));
  }

  /** Every stored run, most recently modified first. */
  listRuns(): RunLedgerSummary[] {
    const summaries: RunLedgerSummary[] = [];

    for (const entry of fs.readdirSync(this.basePath)) {
      if (!entry.endsWith('.jsonl')) continue;
      const runId = entry.slice(0, -'.jsonl'.length);
      if (!RUN_ID_PATTERN.test(runId)) continue;

      const lines = this.read(runId);
      const stat = fs.statSync(path.join(this.basePath, entry));
      summaries.push({
        runId,
        records: lines.filter((line) => line.type === 'record').length,
        reversed: lines.filter((line) => line.type === 'reversed').length,
        modifiedAt: stat.mtime.toISOString(),
      });
    }

    return summaries.sort((a, b) =>
      a.modifiedAt === b.modifiedAt ? a.runId.localeCompare(b.runId) : b.modifiedAt.localeCompare(a.modifiedAt),
    );
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  private runFilePath(runId: string): string {
    assertValidRunId(runId);
    return path.join(this.basePath, `${runId}.jsonl`);
  }
}

// ---------------------------------------------------------------------------
// Line validation
// ---------------------------------------------------------------------------

function parseLedgerLine(line: string): LedgerLine | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }
  return isLedgerLine(parsed) ? parsed : undefined;
}

function isJson(text: string): boolean {
  try {
    JSON.parse(text);
    return true;
  } catch {
    return false;
  }
}

function isLedgerLine(value: unknown): value is LedgerLine {
  if (!isRecord(value)) return false;
  if (value['type'] === 'reversed') {
    return typeof value['seq'] === 'number' && typeof value['reversedAt'] === 'string';
  }
  return value['type'] === 'record' && isArtifactRecord(value['record']);
}

function isArtifactRecord(value: unknown): value is ArtifactRecord {
  if (!isRecord(value)) return false;
  const reversal = value['reversal'];
  return (
    typeof value['seq'] === 'number' &&
    typeof value['runId'] === 'string' &&
    typeof value['kind'] === 'string' &&
    isArtifactKind(value['kind']) &&
    typeof value['remoteId'] === 'string' &&
    typeof value['description'] === 'string' &&
    typeof value['moduleId'] === 'string' &&
    typeof value['invocationId'] === 'string' &&
    typeof value['createdAt'] === 'string' &&
    typeof value['reversed'] === 'boolean' &&
    isRecord(reversal) &&
    typeof reversal['action'] === 'string' &&
    REVERSAL_ACTIONS.has(reversal['action']) &&
    isRecord(reversal['args']) &&
    Object.values(reversal['args']).every((arg) => typeof arg === 'string')
  );
}

export function isArtifactKind(value: string): value is ArtifactKind {
  return ARTIFACT_KINDS.some((kind) => kind === value);
}
