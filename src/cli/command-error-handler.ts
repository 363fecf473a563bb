import chalk from 'chalk';
import { FixtureIOError, HarnessTimeoutError, ReconciliationAbortedError } from '../errors.js';
import { ConfigLoadError } from '../config/loader.js';

function causeMessage(err: Error): string | null {
  const { cause } = err;
  if (cause instanceof Error) return cause.message;
  return null;
}

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof ReconciliationAbortedError) {
    console.error(chalk.red(`Error: ${err.message}`));
    const inner = err.cause;
    if (inner instanceof FixtureIOError) {
      const detail = causeMessage(inner);
      console.error(chalk.yellow(`  This iteration left the fixture file unchanged${detail ? ` (${detail})` : ''}.`));
    } else if (inner instanceof HarnessTimeoutError) {
      console.error(chalk.yellow(`  Increase --timeout or narrow the --filter.`));
    }
    process.exit(1);
  } else if (err instanceof ConfigLoadError) {
    console.error(chalk.red(`Error: ${err.message}`));
    process.exit(1);
  } else {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${msg}`));
    process.exit(1);
  }
}

/**
 * Wrap an async commander action handler with standardized error handling.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      handleCommandError(err);
    }
  };
}
