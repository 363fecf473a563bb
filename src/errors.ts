export class FixtureIOError extends Error {
  path: string;
  operation: 'read' | 'write';

  constructor(message: string, path: string, operation: 'read' | 'write', cause?: unknown) {
    super(message, { cause });
    this.name = 'FixtureIOError';
    this.path = path;
    this.operation = operation;
  }
}

export class HarnessTimeoutError extends Error {
  command: string;
  timeoutMs: number;

  constructor(message: string, command: string, timeoutMs: number) {
    super(message);
    this.name = 'HarnessTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

export class ReconciliationAbortedError extends Error {
  iteration: number;

  constructor(message: string, iteration: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'ReconciliationAbortedError';
    this.iteration = iteration;
  }
}
