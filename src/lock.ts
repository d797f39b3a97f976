/**
 * Lock files
 *
 * Exclusive creation of `<path>` marks ownership across processes. The file
 * holds the owner's pid and start time; a lock whose pid is dead or that is
 * older than the stale TTL is removed by the next contender.
 */

import { promises as fs, rmSync } from 'fs';
import { z } from 'zod';
import { isErrnoException, writeFileExclusive } from './fs-utils.js';
import { Logger, silentLogger } from './logger.js';

const holderSchema = z.object({ pid: z.number(), startedMs: z.number() });

export type LockHolder = z.infer<typeof holderSchema>;

export const DEFAULT_LOCK_STALE_MS = 6 * 60 * 60 * 1000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function backoff(attempt: number): number {
  return Math.min(50 * Math.pow(2, attempt), 1000);
}

function pidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

export class LockFile {
  readonly lockPath: string;
  private description: string;
  private staleMs: number;
  private logger: Logger;

  constructor(lockPath: string, options: { description?: string; staleMs?: number; logger?: Logger } = {}) {
    this.lockPath = lockPath;
    this.description = options.description ?? 'lock';
    this.staleMs = options.staleMs ?? DEFAULT_LOCK_STALE_MS;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Take the lock if nobody live holds it. Never waits.
   */
  async tryAcquire(): Promise<boolean> {
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        // Content lands with the link, so readers never see an empty lock.
        await writeFileExclusive(this.lockPath, JSON.stringify({ pid: process.pid, startedMs: Date.now() }));
        return true;
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') {
          throw error;
        }
      }
      if (!(await this.clearIfStale())) {
        return false;
      }
    }
    return false;
  }

  /**
   * Wait up to `timeoutMs` for the lock.
   */
  async acquire(timeoutMs: number): Promise<void> {
    const started = Date.now();
    let attempt = 0;
    while (!(await this.tryAcquire())) {
      if (Date.now() - started >= timeoutMs) {
        throw new Error(`Timed out waiting for ${this.description} ${this.lockPath}`);
      }
      await sleep(backoff(attempt++));
    }
  }

  async release(): Promise<void> {
    await fs.rm(this.lockPath, { force: true });
  }

  releaseSync(): void {
    rmSync(this.lockPath, { force: true });
  }

  /** True while a live, non-stale holder owns the lock. */
  async isHeld(): Promise<boolean> {
    const holder = await this.readHolder();
    if (holder === undefined) {
      return false;
    }
    return !this.isStale(holder);
  }

  /**
   * undefined: no lock file. null: a lock file that cannot be read as a holder.
   */
  private async readHolder(): Promise<LockHolder | null | undefined> {
    let content: string;
    try {
      content = await fs.readFile(this.lockPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return null;
    }
    const parsed = holderSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  private isStale(holder: LockHolder | null): boolean {
    return holder === null || !pidAlive(holder.pid) || Date.now() - holder.startedMs > this.staleMs;
  }

  private async clearIfStale(): Promise<boolean> {
    const holder = await this.readHolder();
    if (holder === undefined) {
      return true;
    }
    if (!this.isStale(holder)) {
      return false;
    }
    this.logger.warn(`Removing stale ${this.description}`, { lock: this.lockPath, holder });
    await fs.rm(this.lockPath, { force: true });
    return true;
  }
}
