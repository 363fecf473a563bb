export interface RunIterationSummary {
  iteration: number;
  failures: number;
  applied: number;
}

export interface RunUnmatchedSummary {
  /** First line of the expected value. */
  expectedHead: string;
  expectedLines: number;
}

export interface RunReport {
  runId: string;
  fixture: string;
  filter: string;
  status: 'converged' | 'exhausted' | 'stalled';
  startTime: string;
  endTime: string;
  duration: number;
  iterations: RunIterationSummary[];
  progress: number[];
  remainingFailures: number;
  unmatched: RunUnmatchedSummary[];
  unparsed: boolean;
}
