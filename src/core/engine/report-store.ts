/**
 * Writes run and cleanup reports as pretty-printed JSON under
 * `{basePath}/{runId}.json` and `{basePath}/{runId}.cleanup.json`.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { assertValidRunId } from '../ledger/ledger-store.js';
import type { CleanupReport, RunReport } from '../../types/run.js';

export interface ReportPersistence {
  saveRun(report: RunReport): string;
  saveCleanup(report: CleanupReport): string;
}

export class ReportStore implements ReportPersistence {
  readonly basePath: string;

  constructor(basePath: string = 'data/reports') {
    this.basePath = basePath;
    fs.mkdirSync(this.basePath, { recursive: true });
  }

  /** @returns The path written. */
  saveRun(report: RunReport): string {
    return this.write(report.runId, '.json', report);
  }

  saveCleanup(report: CleanupReport): string {
    return this.write(report.runId, '.cleanup.json', report);
  }

  private write(runId: string, suffix: string, value: unknown): string {
    assertValidRunId(runId);
    const filePath = path.join(this.basePath, `${runId}${suffix}`);
    fs.writeFileSync(filePath, JSON.stringify(value, null, 2) + '\n', 'utf-8');
    return filePath;
  }
}
