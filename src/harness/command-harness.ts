import { HarnessTimeoutError } from '../errors.js';
import { execShell } from '../util/process.js';
import type { HarnessSelection, TestHarness } from './harness.js';

export const FILTER_PLACEHOLDER = '{filter}';

export interface CommandHarnessOptions {
  /** Shell command; `{filter}` is replaced by the shell-quoted test filter. */
  command: string;
  /** Milliseconds before the run is killed. No limit when omitted. */
  timeout?: number;
}

/** Quote a value as a single shell word. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Build the shell command for a selection. Without a placeholder in the template
 * a non-empty filter is appended as the last argument.
 */
export function renderCommand(template: string, filter: string): string {
  if (template.includes(FILTER_PLACEHOLDER)) {
    return template.split(FILTER_PLACEHOLDER).join(shellQuote(filter));
  }
  return filter === '' ? template : `${template} ${shellQuote(filter)}`;
}

/**
 * Runs the test suite through the shell. A non-zero exit is expected when tests
 * fail and is not an error here; the output is what matters.
 */
export class CommandHarness implements TestHarness {
  constructor(private readonly opts: CommandHarnessOptions) {}

  async run(selection: HarnessSelection): Promise<string> {
    const command = renderCommand(this.opts.command, selection.filter);
    const result = await execShell(command, { cwd: selection.cwd, timeout: this.opts.timeout });

    if (result.timedOut) {
      throw new HarnessTimeoutError(
        `Harness command timed out after ${this.opts.timeout ?? 0}ms: ${command}`,
        command,
        this.opts.timeout ?? 0,
      );
    }

    return result.stderr + result.stdout;
  }
}
