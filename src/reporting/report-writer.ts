import { join } from 'node:path';
import { readdir } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import type { RuntimeConfig } from '../config/loader.js';
import type { ReconciliationResult } from '../core/reconciler.js';
import { atomicWriteJSON, ensureDir, readJSON } from '../util/fs.js';
import type { RunReport, RunIterationSummary } from './types.js';

export class ReportWriter {
  constructor(private readonly config: Pick<RuntimeConfig, 'fixture' | 'filter' | 'stateDir'>) {}

  /**
   * Assemble a RunReport from the result of a reconciliation run.
   */
  buildReport(result: ReconciliationResult, startTime: number, endTime: number = Date.now()): RunReport {
    const { failureCountHistory, appliedCountHistory } = result.session;
    const iterations: RunIterationSummary[] = failureCountHistory.map((failures, i) => ({
      iteration: i + 1,
      failures,
      applied: appliedCountHistory[i] ?? 0,
    }));

    return {
      runId: randomUUID(),
      fixture: this.config.fixture,
      filter: this.config.filter,
      status: result.status,
      startTime: new Date(startTime).toISOString(),
      endTime: new Date(endTime).toISOString(),
      duration: endTime - startTime,
      iterations,
      progress: result.progress,
      remainingFailures: result.remainingFailures.length,
      unmatched: result.unmatched.map((record) => ({
        expectedHead: record.expected.split('\n', 1)[0],
        expectedLines: record.expected.split('\n').length,
      })),
      unparsed: result.unparsed,
    };
  }

  /**
   * Write the report as a timestamped JSON file to `<stateDir>/reports/`.
   * Returns the path of the written file.
   */
  async write(report: RunReport): Promise<string> {
    const reportsDir = join(this.config.stateDir, 'reports');
    await ensureDir(reportsDir);

    const timestamp = report.startTime.replace(/[:.]/g, '-');
    const filePath = join(reportsDir, `run-report-${timestamp}.json`);

    await atomicWriteJSON(filePath, report);
    return filePath;
  }

  /**
   * List all run report files sorted alphabetically (oldest first).
   */
  static async listReports(stateDir: string): Promise<string[]> {
    const reportsDir = join(stateDir, 'reports');
    let entries: string[];
    try {
      entries = await readdir(reportsDir);
    } catch {
      return [];
    }

    return entries
      .filter((name) => name.startsWith('run-report-') && name.endsWith('.json'))
      .sort()
      .map((name) => join(reportsDir, name));
  }

  static async readReport(filePath: string): Promise<RunReport> {
    return readJSON<RunReport>(filePath);
  }
}
