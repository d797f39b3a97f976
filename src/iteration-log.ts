/**
 * Iteration log
 *
 * One JSON line per finished iteration. Appends only; a restarted harness
 * replays it to pick up where it stopped.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';
import { isErrnoException } from './fs-utils.js';
import { Logger, silentLogger } from './logger.js';
import { IterationRecord, Measurement, TuningResult } from './types.js';

const measurementSchema: z.ZodType<Measurement> = z.object({
  benchmark: z.string(),
  ok: z.boolean(),
  textSize: z.number().nullable(),
  objectSize: z.number().nullable(),
  binarySize: z.number().nullable(),
  runtimeMs: z.number().nullable(),
  runtimesMs: z.array(z.number()),
  noisy: z.boolean(),
  failureReason: z.string().nullable(),
});

const tuningSchema: z.ZodType<TuningResult> = z.object({
  bestParams: z.record(z.number()),
  bestFlags: z.array(z.string()),
  bestObjective: z.number().nullable(),
  trials: z.array(
    z.object({
      trial: z.number().int(),
      params: z.record(z.number()),
      flags: z.array(z.string()),
      objective: z.number().nullable(),
      error: z.string().nullable(),
    })
  ),
});

export const iterationRecordSchema: z.ZodType<IterationRecord> = z.object({
  runId: z.string(),
  iteration: z.number().int().nonnegative(),
  timestamp: z.string(),
  status: z.enum(['scored', 'skipped', 'aborted']),
  score: z.number().nullable(),
  breakdown: z.record(z.number()),
  measurements: z.array(measurementSchema),
  build: z
    .object({
      success: z.boolean(),
      elapsedMs: z.number(),
      errorSummary: z.string().nullable(),
    })
    .nullable(),
  tuning: tuningSchema.nullable(),
  states: z.array(z.enum(['Idle', 'Patched', 'Built', 'Tuned', 'Benchmarked', 'Scored', 'Restored'])),
  error: z.string().nullable(),
  source: z.string().nullable(),
});

export class IterationLog {
  readonly filePath: string;
  private logger: Logger;

  constructor(filePath: string, options: { logger?: Logger } = {}) {
    this.filePath = filePath;
    this.logger = options.logger ?? silentLogger;
  }

  async append(record: IterationRecord): Promise<void> {
    await fs.mkdir(dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, JSON.stringify(record) + '\n', 'utf-8');
  }

  /**
   * Every valid record in file order. Corrupt lines (e.g. a torn final write)
   * are skipped.
   */
  async readAll(): Promise<IterationRecord[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const records: IterationRecord[] = [];
    content.split('\n').forEach((line, index) => {
      if (line.trim().length === 0) {
        return;
      }
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        this.logger.warn('Skipping unparsable log line', { file: this.filePath, line: index + 1 });
        return;
      }
      const parsed = iterationRecordSchema.safeParse(raw);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        this.logger.warn('Skipping invalid log record', { file: this.filePath, line: index + 1 });
      }
    });
    return records;
  }

  /** Highest iteration logged, or null for an empty log. */
  async lastIteration(): Promise<number | null> {
    const records = await this.readAll();
    return records.reduce<number | null>(
      (max, record) => (max === null || record.iteration > max ? record.iteration : max),
      null
    );
  }
}
