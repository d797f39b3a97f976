/**
 * Baseline cache
 *
 * Measurements of the unmodified toolchain, taken once per task and reused
 * until the cache file is deleted. Population happens under a lock file so two
 * harness processes sharing a task never measure twice.
 */

import { promises as fs } from 'fs';
import { z } from 'zod';
import { isErrnoException, writeJsonAtomic } from '../fs-utils.js';
import { LockFile } from '../lock.js';
import { Logger, silentLogger } from '../logger.js';
import { Baseline } from '../types.js';

export interface BaselineRepository {
  load(): Promise<Baseline | null>;
  save(baseline: Baseline): Promise<void>;
  /** Run `fn` while holding exclusive rights to populate the cache. */
  withLock<T>(fn: () => Promise<T>): Promise<T>;
}

const baselineSchema = z.record(
  z.object({
    binarySize: z.number().nonnegative(),
    textSize: z.number().nonnegative(),
    runtimeMs: z.number().nonnegative().nullable(),
  })
);

const LOCK_TIMEOUT_MS = 60 * 60 * 1000;

export class FileBaselineRepository implements BaselineRepository {
  readonly filePath: string;
  readonly lockPath: string;
  private logger: Logger;
  private lock: LockFile;
  private lockTimeoutMs: number;

  constructor(filePath: string, options: { logger?: Logger; lockTimeoutMs?: number } = {}) {
    this.filePath = filePath;
    this.lockPath = `${filePath}.lock`;
    this.logger = options.logger ?? silentLogger;
    this.lock = new LockFile(this.lockPath, { description: 'baseline lock', logger: this.logger });
    this.lockTimeoutMs = options.lockTimeoutMs ?? LOCK_TIMEOUT_MS;
  }

  async load(): Promise<Baseline | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      raw = null;
    }
    const parsed = baselineSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Ignoring invalid baseline cache', { file: this.filePath });
      return null;
    }
    return parsed.data;
  }

  async save(baseline: Baseline): Promise<void> {
    await writeJsonAtomic(this.filePath, baseline);
    this.logger.info('Baseline saved', { file: this.filePath, benchmarks: Object.keys(baseline).length });
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.lock.acquire(this.lockTimeoutMs);
    try {
      return await fn();
    } finally {
      await this.lock.release();
    }
  }
}

/**
 * Measure with the unmodified toolchain. Called at most once per task.
 */
export type BaselineMeasure = () => Promise<Baseline>;

/**
 * Lazily populates and then serves the baseline.
 */
export class BaselineProvider {
  private repository: BaselineRepository;
  private cached: Baseline | null = null;
  private logger: Logger;

  constructor(repository: BaselineRepository, options: { logger?: Logger } = {}) {
    this.repository = repository;
    this.logger = options.logger ?? silentLogger;
  }

  get current(): Baseline | null {
    return this.cached;
  }

  async ensure(measure: BaselineMeasure): Promise<Baseline> {
    if (this.cached) {
      return this.cached;
    }
    const existing = await this.repository.load();
    if (existing) {
      this.cached = existing;
      return existing;
    }

    this.cached = await this.repository.withLock(async () => {
      // Another process may have filled the cache while we waited.
      const raced = await this.repository.load();
      if (raced) {
        return raced;
      }
      this.logger.info('No baseline cached; measuring unmodified toolchain');
      const baseline = await measure();
      await this.repository.save(baseline);
      return baseline;
    });
    return this.cached;
  }
}
