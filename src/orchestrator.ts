/**
 * Evolution Orchestrator
 *
 * Controls the outer loop, one candidate at a time:
 * 1. Replay the iteration log into the controller (resume)
 * 2. Make sure the baseline exists
 * 3. For each iteration:
 *    a. Ask the controller for context
 *    b. Publish the request and wait for the response
 *    c. Evaluate the candidate
 *    d. Log the outcome and feed it back to the controller
 */

import { nanoid } from 'nanoid';
import { AwaitResponseOptions } from './bridge/index.js';
import { EvolutionController } from './controller.js';
import { errorMessage, isHarnessError } from './errors.js';
import { IterationLog } from './iteration-log.js';
import { Logger, silentLogger } from './logger.js';
import {
  Baseline,
  Candidate,
  EvaluationResult,
  IterationRecord,
  IterationStatus,
  RequestContext,
} from './types.js';

export interface CandidateBridge {
  submit(requestId: number, context: RequestContext): Promise<string>;
  awaitResponse(requestId: number, options: AwaitResponseOptions): Promise<Candidate>;
}

export interface CandidateEvaluator {
  prepare(): Promise<Baseline>;
  evaluate(candidate: Candidate): Promise<EvaluationResult>;
}

export interface OrchestratorOptions {
  bridge: CandidateBridge;
  pipeline: CandidateEvaluator;
  controller: EvolutionController;
  log: IterationLog;
  runId?: string;
  logger?: Logger;
  now?: () => Date;
}

export interface RunLoopOptions {
  iterations: number;
  responseTimeoutMs: number;
  signal?: AbortSignal;
}

export interface RunSummary {
  runId: string;
  firstIteration: number;
  lastIteration: number | null;
  scored: number;
  skipped: number;
  aborted: number;
  cancelled: boolean;
  best: { iteration: number; score: number } | null;
}

export class Orchestrator {
  readonly runId: string;
  private bridge: CandidateBridge;
  private pipeline: CandidateEvaluator;
  private controller: EvolutionController;
  private log: IterationLog;
  private logger: Logger;
  private now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.runId = options.runId ?? nanoid(10);
    this.bridge = options.bridge;
    this.pipeline = options.pipeline;
    this.controller = options.controller;
    this.log = options.log;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run up to `iterations` iterations after the last logged one.
   * Only a RestoreFailure (or an unexpected error) ends the loop early.
   */
  async run(options: RunLoopOptions): Promise<RunSummary> {
    const { iterations, responseTimeoutMs, signal } = options;

    const previous = await this.log.readAll();
    for (const record of previous) {
      this.controller.acceptScore(record);
    }
    const firstIteration = previous.reduce((max, r) => Math.max(max, r.iteration), 0) + 1;
    if (previous.length > 0) {
      this.logger.info(`Resuming after iteration ${firstIteration - 1}`, { records: previous.length });
    }

    await this.pipeline.prepare();

    const summary: RunSummary = {
      runId: this.runId,
      firstIteration,
      lastIteration: null,
      scored: 0,
      skipped: 0,
      aborted: 0,
      cancelled: false,
      best: bestOf(previous),
    };

    for (let iteration = firstIteration; iteration < firstIteration + iterations; iteration++) {
      if (signal?.aborted) {
        summary.cancelled = true;
        break;
      }
      this.logger.info(`--- Iteration ${iteration} ---`);

      let candidate: Candidate;
      try {
        candidate = await this.requestCandidate(iteration, responseTimeoutMs, signal);
      } catch (error) {
        if (isHarnessError(error, 'BRIDGE_CANCELLED')) {
          summary.cancelled = true;
          break;
        }
        if (isHarnessError(error, 'BRIDGE_TIMEOUT') || isHarnessError(error, 'MALFORMED_RESPONSE')) {
          this.logger.warn(`Iteration ${iteration} skipped`, { error: error.message });
          await this.record(this.emptyRecord(iteration, 'skipped', error.message));
          summary.skipped++;
          summary.lastIteration = iteration;
          continue;
        }
        throw error;
      }

      let result: EvaluationResult;
      try {
        result = await this.pipeline.evaluate(candidate);
      } catch (error) {
        if (isHarnessError(error, 'PATCH_FAILURE')) {
          this.logger.error(`Iteration ${iteration} aborted`, { error: error.message });
          await this.record({ ...this.emptyRecord(iteration, 'aborted', error.message), source: candidate.source });
          summary.aborted++;
          summary.lastIteration = iteration;
          continue;
        }
        this.logger.error(`Iteration ${iteration} left the harness in an unknown state`, {
          error: errorMessage(error),
        });
        throw error;
      }

      await this.record({
        runId: this.runId,
        iteration,
        timestamp: this.now().toISOString(),
        status: 'scored',
        score: result.score.value,
        breakdown: result.score.breakdown,
        measurements: result.measurements,
        build: result.build,
        tuning: result.tuning,
        states: result.states,
        error: result.error,
        source: candidate.source,
      });
      summary.scored++;
      summary.lastIteration = iteration;
      if (summary.best === null || result.score.value > summary.best.score) {
        summary.best = { iteration, score: result.score.value };
        this.logger.info(`New best: iteration ${iteration} scored ${result.score.value}`);
      }
    }

    return summary;
  }

  private async requestCandidate(
    iteration: number,
    timeoutMs: number,
    signal: AbortSignal | undefined
  ): Promise<Candidate> {
    try {
      await this.bridge.submit(iteration, this.controller.proposeContext(iteration));
    } catch (error) {
      // Written by a run that died before logging this iteration
      if (!isHarnessError(error, 'REQUEST_EXISTS')) {
        throw error;
      }
      this.logger.info(`Request ${iteration} already published; waiting for its response`);
    }
    return this.bridge.awaitResponse(iteration, { timeoutMs, signal });
  }

  private async record(record: IterationRecord): Promise<void> {
    await this.log.append(record);
    this.controller.acceptScore(record);
  }

  private emptyRecord(iteration: number, status: IterationStatus, error: string): IterationRecord {
    return {
      runId: this.runId,
      iteration,
      timestamp: this.now().toISOString(),
      status,
      score: null,
      breakdown: {},
      measurements: [],
      build: null,
      tuning: null,
      states: ['Idle'],
      error,
      source: null,
    };
  }
}

function bestOf(records: readonly IterationRecord[]): { iteration: number; score: number } | null {
  let best: { iteration: number; score: number } | null = null;
  for (const record of records) {
    if (record.status === 'scored' && record.score !== null && (best === null || record.score > best.score)) {
      best = { iteration: record.iteration, score: record.score };
    }
  }
  return best;
}
