import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { FixtureIOError, HarnessTimeoutError, ReconciliationAbortedError } from '../../src/errors.js';
import { ConfigLoadError } from '../../src/config/loader.js';
import { handleCommandError, withCommandHandler } from '../../src/cli/command-error-handler.js';

vi.mock('chalk', () => ({
  default: {
    red: (s: string) => s,
    yellow: (s: string) => s,
  },
}));

describe('handleCommandError', () => {
  let exitMock: MockInstance<typeof process.exit>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    exitMock = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should explain that the fixture is untouched when a write failed', () => {
    const io = new FixtureIOError('Failed to write fixture /src/plans.go', '/src/plans.go', 'write', new Error('EACCES'));
    const err = new ReconciliationAbortedError('Reconciliation aborted in iteration 2', 2, io);

    handleCommandError(err);

    expect(errorSpy).toHaveBeenNthCalledWith(1, 'Error: Reconciliation aborted in iteration 2');
    expect(errorSpy).toHaveBeenNthCalledWith(2, '  This iteration left the fixture file unchanged (EACCES).');
    expect(exitMock).toHaveBeenCalledWith(1);
  });

  it('should omit the cause detail when the I/O error has none', () => {
    const io = new FixtureIOError('Failed to read fixture /src/plans.go', '/src/plans.go', 'read');
    handleCommandError(new ReconciliationAbortedError('aborted', 1, io));

    expect(errorSpy).toHaveBeenNthCalledWith(2, '  This iteration left the fixture file unchanged.');
  });

  it('should suggest a longer timeout for harness timeouts', () => {
    const timeout = new HarnessTimeoutError('Harness timed out', 'go test ./...', 1000);
    handleCommandError(new ReconciliationAbortedError('aborted', 1, timeout));

    expect(errorSpy).toHaveBeenCalledWith('  Increase --timeout or narrow the --filter.');
    expect(exitMock).toHaveBeenCalledWith(1);
  });

  it('should print config error message and exit 1 for ConfigLoadError', () => {
    const err = new ConfigLoadError('Config file not found: reconcile.config.json');

    handleCommandError(err);

    expect(errorSpy).toHaveBeenCalledWith('Error: Config file not found: reconcile.config.json');
    expect(exitMock).toHaveBeenCalledWith(1);
  });

  it('should print generic Error message and exit 1 for unknown Error', () => {
    handleCommandError(new Error('something went wrong'));

    expect(errorSpy).toHaveBeenCalledWith('Error: something went wrong');
    expect(exitMock).toHaveBeenCalledWith(1);
  });

  it('should stringify non-Error values and exit 1', () => {
    handleCommandError(404);

    expect(errorSpy).toHaveBeenCalledWith('Error: 404');
    expect(exitMock).toHaveBeenCalledWith(1);
  });
});

describe('withCommandHandler', () => {
  let exitMock: MockInstance<typeof process.exit>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    vi.clearAllMocks();
    exitMock = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should call the wrapped function with the provided arguments', async () => {
    const fn = vi.fn().mockResolvedValue(undefined);
    const wrapped = withCommandHandler(fn);

    await wrapped('arg1', 42);

    expect(fn).toHaveBeenCalledWith('arg1', 42);
    expect(exitMock).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should delegate to handleCommandError when the function throws', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('boom'));
    const wrapped = withCommandHandler(fn);

    await wrapped();

    expect(errorSpy).toHaveBeenCalledWith('Error: boom');
    expect(exitMock).toHaveBeenCalledWith(1);
  });
});
