import type { DryRunResult, ReconciliationResult } from '../core/reconciler.js';
import type { EditPlanEntry, FailureRecord } from '../core/types.js';
import type { RunReport } from '../reporting/types.js';
import { firstLine } from '../util/text.js';

const UNPARSED_NOTICE = 'The harness reported failures that could not be parsed.';

const STATUS_EMOJI: Record<ReconciliationResult['status'], string> = {
  converged: '✅',
  exhausted: '⏱️',
  stalled: '⚠️',
};

/**
 * Renders the final status of a run followed by a per-iteration table.
 * Pure: takes all data as parameters.
 */
export function renderResult(result: ReconciliationResult): string {
  const { session } = result;
  const header = [
    `Status: ${STATUS_EMOJI[result.status]} ${result.status}`,
    `Iterations: ${session.iteration}/${session.maxIterations}`,
    `Remaining failures: ${result.remainingFailures.length}`,
    `Unmatched: ${result.unmatched.length}`,
  ].join('  |  ');

  const rows = session.failureCountHistory.map((failures, i) => [
    String(i + 1),
    String(failures),
    String(session.appliedCountHistory[i] ?? 0),
    i === 0 ? '—' : formatDelta(result.progress[i - 1]),
  ]);

  let out = header;
  if (rows.length > 0) {
    out += '\n\n' + renderTable(['Iteration', 'Failures', 'Applied', 'Progress'], rows);
  }

  if (result.unparsed) {
    out += `\n\n${UNPARSED_NOTICE}`;
  }

  if (result.unmatched.length > 0) {
    out += '\n\nUnmatched records (fix by hand):\n';
    out += result.unmatched.map((r) => `  - ${firstLine(r.expected)}`).join('\n');
  }

  return out;
}

/**
 * Renders parsed records and, when given, the edit located for each one.
 */
export function renderRecords(records: FailureRecord[], located?: (EditPlanEntry | null)[]): string {
  if (records.length === 0) return 'No failure records found.';

  const rows = records.map((record, i) => {
    const row = [String(i + 1), firstLine(record.expected, 50), firstLine(record.actual, 50)];
    if (located) {
      const entry = located[i];
      row.push(entry ? `${entry.strategy} (${entry.scope})` : 'unmatched');
    }
    return row;
  });

  const headers = ['#', 'Expected', 'Actual'];
  if (located) headers.push('Edit');
  return renderTable(headers, rows);
}

/**
 * Renders the plan a dry run found. Nothing was written.
 */
export function renderDryRun(dry: DryRunResult): string {
  const body = dry.unparsed ? UNPARSED_NOTICE : renderRecords(dry.records, dry.located);
  return `${body}\n\n${dry.appliedCount} of ${dry.plan.length} planned edit(s) would apply; nothing was written.`;
}

/**
 * Renders a stored run report.
 */
export function renderReport(report: RunReport): string {
  const lines = [
    `Run ${report.runId} (${report.startTime})`,
    `Fixture: ${report.fixture}`,
    `Status: ${STATUS_EMOJI[report.status]} ${report.status}  |  Duration: ${(report.duration / 1000).toFixed(1)}s`,
  ];
  const rows = report.iterations.map((it) => [String(it.iteration), String(it.failures), String(it.applied)]);
  if (rows.length > 0) {
    lines.push('', renderTable(['Iteration', 'Failures', 'Applied'], rows));
  }
  return lines.join('\n');
}

function formatDelta(delta: number | undefined): string {
  if (delta === undefined) return '—';
  return delta > 0 ? `-${delta}` : delta < 0 ? `+${-delta}` : '0';
}

function renderTable(headers: string[], rows: string[][]): string {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, colIdx) =>
    Math.max(...allRows.map((row) => (row[colIdx] ?? '').length)),
  );

  const formatRow = (row: string[]) =>
    '| ' + row.map((cell, i) => cell.padEnd(colWidths[i])).join(' | ') + ' |';

  const separator = '|-' + colWidths.map((w) => '-'.repeat(w)).join('-|-') + '-|';

  const lines = [formatRow(headers), separator, ...rows.map(formatRow)];
  return lines.join('\n');
}
