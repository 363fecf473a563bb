/** Which tests to run, and where. */
export interface HarnessSelection {
  /** Passed to the harness as its test filter; empty selects everything. */
  filter: string;
  cwd: string;
}

/**
 * The external test runner. Returns the combined output of one run; the
 * reconciler only ever looks at that text.
 */
export interface TestHarness {
  run(selection: HarnessSelection): Promise<string>;
}
