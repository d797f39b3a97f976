/**
 * Child process execution with bounded time
 *
 * Every external tool (build, optimize, codegen, link, size, the benchmark
 * itself) goes through here. Children are spawned in their own process group so
 * a timeout can take down anything they forked. Detached groups do not receive
 * the terminal's SIGINT, so live groups are tracked for `killAllChildren`.
 */

import { spawn } from 'child_process';
import { openSync, closeSync } from 'fs';

export interface RunOptions {
  cwd?: string;
  timeoutMs: number;
  stdinFile?: string | null;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  maxOutputBytes?: number;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  elapsedMs: number;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options: RunOptions
) => Promise<ProcessResult>;

const DEFAULT_MAX_OUTPUT = 256 * 1024;

/**
 * Keeps the last `limit` bytes written to it.
 */
class OutputTail {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    // Drop whole chunks only while what remains still covers the limit.
    while (this.chunks.length > 1 && this.size - this.chunks[0].length >= this.limit) {
      const dropped = this.chunks.shift();
      this.size -= dropped ? dropped.length : 0;
    }
  }

  toString(): string {
    const all = Buffer.concat(this.chunks);
    return all.subarray(Math.max(0, all.length - this.limit)).toString('utf-8');
  }
}

function killGroup(pid: number | undefined): void {
  if (pid === undefined) {
    return;
  }
  try {
    process.kill(-pid, 'SIGKILL');
  } catch {
    // Group already gone; fall back to the leader alone.
    try {
      process.kill(pid, 'SIGKILL');
    } catch {
      // exited between the check and the kill
    }
  }
}

const liveGroups = new Set<number>();

/**
 * SIGKILL every process group started by `runCommand` that has not yet exited.
 * Returns how many groups were signalled.
 */
export function killAllChildren(): number {
  const pids = [...liveGroups];
  for (const pid of pids) {
    killGroup(pid);
  }
  return pids.length;
}

export function liveChildCount(): number {
  return liveGroups.size;
}

/**
 * Run a command to completion. Resolves for any exit status, rejects only when
 * the process cannot be spawned.
 */
export const runCommand: CommandRunner = (command, args, options) => {
  return new Promise((resolve, reject) => {
    const limit = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT;
    const stdout = new OutputTail(limit);
    const stderr = new OutputTail(limit);
    const started = performance.now();

    let stdinFd: number | null = null;
    if (options.stdinFile) {
      try {
        stdinFd = openSync(options.stdinFile, 'r');
      } catch (error) {
        reject(error);
        return;
      }
    }

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      detached: true,
      stdio: [stdinFd ?? 'ignore', 'pipe', 'pipe'],
    });
    const pid = child.pid;
    if (pid !== undefined) {
      liveGroups.add(pid);
    }

    let timedOut = false;
    let settled = false;

    const timer = setTimeout(() => {
      timedOut = true;
      killGroup(child.pid);
    }, options.timeoutMs);

    const onAbort = (): void => killGroup(child.pid);
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) {
      onAbort();
    }

    const cleanup = (): void => {
      if (pid !== undefined) {
        liveGroups.delete(pid);
      }
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      if (stdinFd !== null) {
        closeSync(stdinFd);
        stdinFd = null;
      }
    };

    child.stdout?.on('data', (data: Buffer) => stdout.push(data));
    child.stderr?.on('data', (data: Buffer) => stderr.push(data));

    child.on('error', (error) => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      reject(error);
    });

    child.on('close', (exitCode, signal) => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      resolve({
        exitCode,
        signal,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        timedOut,
        elapsedMs: performance.now() - started,
      });
    });
  });
};

export function succeeded(result: ProcessResult): boolean {
  return !result.timedOut && result.exitCode === 0;
}
