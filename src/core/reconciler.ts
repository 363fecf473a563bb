import { parseFailures, hasFailureSignal, DEFAULT_FAILURE_MARKER, DEFAULT_FAILURE_WORD } from '../parsing/failure-parser.js';
import { locateEdit, type MatchStrategy } from '../matching/index.js';
import { applyEdits } from '../patching/apply-edits.js';
import type { PatchResult } from '../patching/fixture-patcher.js';
import type { HarnessSelection, TestHarness } from '../harness/harness.js';
import { ReconciliationAbortedError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { firstLine } from '../util/text.js';
import type {
  EditPlan,
  EditPlanEntry,
  FailureRecord,
  ReconciliationSession,
  ReconciliationStatus,
} from './types.js';

/** What the loop needs from the fixture file. Implemented by FixturePatcher. */
export interface FixtureAccess {
  readonly path: string;
  load(): Promise<string>;
  apply(content: string, edits: readonly EditPlanEntry[]): Promise<PatchResult>;
}

export interface ReconcilerDeps {
  harness: TestHarness;
  fixture: FixtureAccess;
  strategies: readonly MatchStrategy[];
  selection: HarnessSelection;
  parser?: {
    marker?: string;
    failureWord?: string;
  };
  logger?: Logger;
}

export interface StepOutcome {
  status: ReconciliationStatus;
  records: FailureRecord[];
  plan: EditPlan;
  unmatched: FailureRecord[];
  appliedCount: number;
  /** The harness signalled failure but no section could be parsed. */
  unparsed: boolean;
}

export interface ReconciliationResult {
  status: Exclude<ReconciliationStatus, 'running'>;
  session: ReconciliationSession;
  /** Failures seen by the final harness run; empty when converged. */
  remainingFailures: FailureRecord[];
  /** Records no strategy could locate in the final iteration. */
  unmatched: FailureRecord[];
  unparsed: boolean;
  /** Drop in failure count between successive iterations. */
  progress: number[];
}

export interface DryRunResult extends BuiltPlan {
  records: FailureRecord[];
  /** Edits that would apply against the current file. */
  appliedCount: number;
  /** The harness signalled failure but no section could be parsed. */
  unparsed: boolean;
}

export function createSession(maxIterations: number): ReconciliationSession {
  return {
    iteration: 0,
    maxIterations,
    failureCountHistory: [],
    appliedCountHistory: [],
  };
}

export interface BuiltPlan {
  plan: EditPlan;
  unmatched: FailureRecord[];
  /** The edit located for each record, in record order; null when unmatched. */
  located: (EditPlanEntry | null)[];
}

/**
 * Run every record through the strategy chain against `content`.
 * Records no strategy locates are returned separately.
 */
export function buildEditPlan(
  records: readonly FailureRecord[],
  content: string,
  strategies: readonly MatchStrategy[],
): BuiltPlan {
  const plan: EditPlan = [];
  const unmatched: FailureRecord[] = [];
  const located: (EditPlanEntry | null)[] = [];
  for (const record of records) {
    const entry = locateEdit(record, content, strategies);
    located.push(entry);
    if (entry) {
      plan.push(entry);
    } else {
      unmatched.push(record);
    }
  }
  return { plan, unmatched, located };
}

/**
 * Failure-count deltas between successive iterations (positive means fewer
 * failures). Not guaranteed to be monotonic.
 */
export function computeProgress(history: readonly number[]): number[] {
  const deltas: number[] = [];
  for (let i = 1; i < history.length; i++) {
    deltas.push(history[i - 1] - history[i]);
  }
  return deltas;
}

async function runAndParse(deps: ReconcilerDeps): Promise<{ records: FailureRecord[]; failed: boolean }> {
  const output = await deps.harness.run(deps.selection);
  const records = parseFailures(output, { marker: deps.parser?.marker ?? DEFAULT_FAILURE_MARKER });
  const failed = hasFailureSignal(output, deps.parser?.failureWord ?? DEFAULT_FAILURE_WORD);
  return { records, failed };
}

/**
 * One iteration: run the harness, parse, plan, apply, and decide the next state.
 * The given session is not modified; the next one is returned.
 */
export async function reconcileStep(
  session: ReconciliationSession,
  deps: ReconcilerDeps,
): Promise<{ session: ReconciliationSession; outcome: StepOutcome }> {
  const iteration = session.iteration + 1;
  const { records, failed } = await runAndParse(deps);

  if (records.length === 0) {
    const status = failed ? 'stalled' : 'converged';
    if (failed) {
      deps.logger?.warn('Harness reported failures, but none could be parsed', { iteration });
    }
    return {
      session: { ...session, iteration },
      outcome: { status, records, plan: [], unmatched: [], appliedCount: 0, unparsed: failed },
    };
  }

  const content = await deps.fixture.load();
  const { plan, unmatched } = buildEditPlan(records, content, deps.strategies);
  const { appliedCount } = await deps.fixture.apply(content, plan);

  for (const record of unmatched) {
    deps.logger?.event({ type: 'record-unmatched', iteration, expectedHead: firstLine(record.expected) });
  }
  deps.logger?.event({
    type: 'iteration-completed',
    iteration,
    failureCount: records.length,
    plannedCount: plan.length,
    appliedCount,
    unmatchedCount: unmatched.length,
  });
  deps.logger?.info(
    `${records.length} failure(s), ${plan.length} edit(s) planned, ${appliedCount} applied, ${unmatched.length} unmatched`,
    { iteration },
  );

  const next: ReconciliationSession = {
    ...session,
    iteration,
    failureCountHistory: [...session.failureCountHistory, records.length],
    appliedCountHistory: [...session.appliedCountHistory, appliedCount],
  };

  let status: ReconciliationStatus = 'running';
  if (appliedCount === 0) {
    status = 'stalled';
  } else if (iteration >= session.maxIterations) {
    status = 'exhausted';
  }

  return {
    session: next,
    outcome: { status, records, plan, unmatched, appliedCount, unparsed: false },
  };
}

/**
 * Iterate run → parse → patch until the harness reports no failures, the
 * iteration cap is reached, or an iteration applies nothing.
 *
 * Fixture I/O and harness errors abort the loop with a ReconciliationAbortedError.
 */
export async function runReconciliation(
  deps: ReconcilerDeps,
  options: { maxIterations: number },
): Promise<ReconciliationResult> {
  let session = createSession(options.maxIterations);
  deps.logger?.event(
    {
      type: 'reconcile-started',
      fixture: deps.fixture.path,
      filter: deps.selection.filter,
      maxIterations: options.maxIterations,
    },
    'info',
  );

  for (;;) {
    let step: { session: ReconciliationSession; outcome: StepOutcome };
    try {
      step = await reconcileStep(session, deps);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ReconciliationAbortedError(
        `Reconciliation aborted in iteration ${session.iteration + 1}: ${reason}`,
        session.iteration + 1,
        err,
      );
    }

    session = step.session;
    const { outcome } = step;
    if (outcome.status === 'running') continue;

    const result: ReconciliationResult = {
      status: outcome.status,
      session,
      remainingFailures: outcome.status === 'converged' ? [] : outcome.records,
      unmatched: outcome.unmatched,
      unparsed: outcome.unparsed,
      progress: computeProgress(session.failureCountHistory),
    };

    deps.logger?.event(
      {
        type: 'reconcile-finished',
        status: result.status,
        iterations: session.iteration,
        remainingFailures: result.remainingFailures.length,
        unmatched: result.unmatched.length,
      },
      'info',
    );
    return result;
  }
}

/**
 * Run the harness once and report the plan that an iteration would apply,
 * without writing the fixture file.
 */
export async function planReconciliation(deps: ReconcilerDeps): Promise<DryRunResult> {
  const { records, failed } = await runAndParse(deps);
  if (records.length === 0) {
    return { records, plan: [], unmatched: [], located: [], appliedCount: 0, unparsed: failed };
  }
  const content = await deps.fixture.load();
  const built = buildEditPlan(records, content, deps.strategies);
  const { appliedCount } = applyEdits(content, built.plan);
  return { ...built, records, appliedCount, unparsed: false };
}
