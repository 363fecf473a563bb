import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';

export interface ProcessResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
}

export interface SpawnOpts {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
  shell?: string | boolean;
}

/**
 * Signal the child's whole process group (it is spawned detached), falling back
 * to the child alone when the group is already gone.
 */
function killGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, signal);
  } catch {
    child.kill(signal);
  }
}

/**
 * Spawn a child process and collect its output.
 * Returns a ProcessResult when the process exits or times out.
 */
export function spawnProcess(
  command: string,
  args: string[],
  opts: SpawnOpts = {},
): { promise: Promise<ProcessResult>; process: ChildProcess } {
  const spawnOpts: SpawnOptions = {
    cwd: opts.cwd,
    env: opts.env ?? process.env,
    stdio: ['ignore', 'pipe', 'pipe'],
    shell: opts.shell,
    detached: true,
  };

  const child = spawn(command, args, spawnOpts);
  trackProcess(child);

  const promise = new Promise<ProcessResult>((resolve) => {
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;
    let forceTimer: ReturnType<typeof setTimeout> | undefined;

    if (opts.timeout && opts.timeout > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        killGroup(child, 'SIGTERM');
        // Force kill after 5 seconds if still alive
        forceTimer = setTimeout(() => killGroup(child, 'SIGKILL'), 5000);
      }, opts.timeout);
    }

    const clearTimers = (): void => {
      if (timer) clearTimeout(timer);
      if (forceTimer) clearTimeout(forceTimer);
    };

    child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    child.on('close', (code, signal) => {
      clearTimers();
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        signal,
        timedOut,
      });
    });

    child.on('error', (err) => {
      clearTimers();
      resolve({
        exitCode: 1,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: err.message,
        signal: null,
        timedOut,
      });
    });
  });

  return { promise, process: child };
}

/**
 * Run a shell command string (through the shell) and wait for the result.
 */
export async function execShell(
  command: string,
  opts: Omit<SpawnOpts, 'shell'> = {},
): Promise<ProcessResult> {
  const { promise } = spawnProcess(command, [], { ...opts, shell: true });
  return promise;
}

/**
 * Active child processes that need cleanup on shutdown.
 */
const activeProcesses = new Set<ChildProcess>();

export function trackProcess(child: ChildProcess): void {
  activeProcesses.add(child);
  child.on('close', () => activeProcesses.delete(child));
}

export function killAllTrackedProcesses(): void {
  for (const child of activeProcesses) {
    killGroup(child, 'SIGTERM');
  }
  activeProcesses.clear();
}

export function getTrackedProcessCount(): number {
  return activeProcesses.size;
}
