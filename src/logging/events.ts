/**
 * Typed event definitions for structured reconciliation logging.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  source: string;
  iteration?: number;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogContext {
  iteration?: number;
  data?: Record<string, unknown>;
}

export interface ReconcileStartedEvent {
  type: 'reconcile-started';
  fixture: string;
  filter: string;
  maxIterations: number;
}

export interface IterationCompletedEvent {
  type: 'iteration-completed';
  iteration: number;
  failureCount: number;
  plannedCount: number;
  appliedCount: number;
  unmatchedCount: number;
}

export interface RecordUnmatchedEvent {
  type: 'record-unmatched';
  iteration: number;
  /** First line of the expected value, for locating it by eye. */
  expectedHead: string;
}

export interface ReconcileFinishedEvent {
  type: 'reconcile-finished';
  status: 'converged' | 'exhausted' | 'stalled';
  iterations: number;
  remainingFailures: number;
  unmatched: number;
}

export type ReconcileEvent =
  | ReconcileStartedEvent
  | IterationCompletedEvent
  | RecordUnmatchedEvent
  | ReconcileFinishedEvent;
