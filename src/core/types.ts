/**
 * One mismatch reported by the harness. Both sides are raw text: any escaping
 * the harness applied to print them has already been undone.
 */
export interface FailureRecord {
  expected: string;
  actual: string;
}

/** `global` replaces every occurrence; `first` replaces exactly one. */
export type EditScope = 'global' | 'first';

/**
 * Regex fragments a match must not touch. `before` is checked with a negative
 * lookbehind, `after` with a negative lookahead.
 */
export interface EditBoundary {
  before?: string;
  after?: string;
}

/**
 * A located replacement. `searchText` and `replaceText` are in file form,
 * i.e. already escaped the way they appear in the fixture source.
 */
export interface EditPlanEntry {
  searchText: string;
  replaceText: string;
  scope: EditScope;
  /** Name of the strategy that produced this entry. */
  strategy: string;
  /** Only occurrences clear of this boundary are searched and replaced. */
  boundary?: EditBoundary;
}

export type EditPlan = EditPlanEntry[];

export type ReconciliationStatus = 'running' | 'converged' | 'exhausted' | 'stalled';

/**
 * Mutable-by-replacement state for one run of the reconciliation loop.
 * Each step receives a session and returns the next one.
 */
export interface ReconciliationSession {
  /** Number of harness invocations made so far. */
  readonly iteration: number;
  readonly maxIterations: number;
  /** Failure count seen by each iteration, before its edits were applied. */
  readonly failureCountHistory: readonly number[];
  /** Edits applied by each iteration. */
  readonly appliedCountHistory: readonly number[];
}
