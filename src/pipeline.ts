/**
 * Evaluation Pipeline
 *
 * One candidate, end to end:
 *
 *   Idle -> Patched -> Built -> Tuned? -> Benchmarked -> Scored -> Restored
 *
 * The target file is restored however the iteration ends. Build failures,
 * timeouts and benchmark failures become a (bad) score; only PatchFailure and
 * RestoreFailure escape.
 */

import { promises as fs } from 'fs';
import { join } from 'path';
import { BaselineProvider, FileBaselineRepository } from './benchmarks/baseline.js';
import { BenchmarkRunner, discoverBenchmarks, failedMeasurement } from './benchmarks/runner.js';
import { BuildDriver } from './build.js';
import { HarnessConfig, TaskConfig, targetPathOf } from './config.js';
import { BuildFailure, PipelineBusy, errorMessage, isHarnessError } from './errors.js';
import { Logger, createConsoleLogger, silentLogger } from './logger.js';
import { SourcePatcher } from './patcher.js';
import { CommandRunner, killAllChildren } from './process.js';
import { Scorer, scorerFromTask } from './scoring.js';
import { HyperparameterTuner, Sampler, selectSubset } from './tuner.js';
import {
  Baseline,
  BenchmarkSpec,
  BuildResult,
  Candidate,
  EvaluationResult,
  Measurement,
  PipelineState,
  StageFlags,
  TuningResult,
} from './types.js';

const INTERRUPT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Puts the target back if the process is interrupted while patched.
 * Signal handlers cannot await, hence the synchronous restore. Children run in
 * their own process groups and never see the signal, so they are killed first.
 */
export class InterruptGuard {
  private restore: () => void;
  private killChildren: () => number;
  private exit: (code: number) => void;
  private logger: Logger;
  private armed = false;

  constructor(
    restore: () => void,
    options: { exit?: (code: number) => void; killChildren?: () => number; logger?: Logger } = {}
  ) {
    this.restore = restore;
    this.killChildren = options.killChildren ?? killAllChildren;
    this.exit = options.exit ?? ((code) => process.exit(code));
    this.logger = options.logger ?? silentLogger;
  }

  get isArmed(): boolean {
    return this.armed;
  }

  arm(): void {
    if (this.armed) {
      return;
    }
    for (const signal of INTERRUPT_SIGNALS) {
      process.on(signal, this.handleSignal);
    }
    this.armed = true;
  }

  disarm(): void {
    for (const signal of INTERRUPT_SIGNALS) {
      process.off(signal, this.handleSignal);
    }
    this.armed = false;
  }

  readonly handleSignal = (signal: NodeJS.Signals): void => {
    this.logger.warn(`Received ${signal} while patched; restoring target`);
    this.disarm();
    let code = signal === 'SIGINT' ? 130 : 143;
    const killed = this.killChildren();
    if (killed > 0) {
      this.logger.warn(`Killed ${killed} running child process group(s)`);
    }
    try {
      this.restore();
    } catch (error) {
      this.logger.error('Restore during interrupt failed', { error: errorMessage(error) });
      code = 1;
    }
    this.exit(code);
  };
}

export interface EvaluationPipelineOptions {
  config: HarnessConfig;
  task: TaskConfig;
  patcher: SourcePatcher;
  builder: BuildDriver;
  runner: BenchmarkRunner;
  baseline: BaselineProvider;
  tuner?: HyperparameterTuner;
  scorer?: Scorer;
  /** null disables signal handling */
  guard?: InterruptGuard | null;
  logger?: Logger;
}

export interface CreatePipelineOptions {
  commandRunner?: CommandRunner;
  sampler?: Sampler;
  logger?: Logger;
  guard?: InterruptGuard | null;
}

export class EvaluationPipeline {
  private config: HarnessConfig;
  private task: TaskConfig;
  private patcher: SourcePatcher;
  private builder: BuildDriver;
  private runner: BenchmarkRunner;
  private baseline: BaselineProvider;
  private tuner: HyperparameterTuner;
  private scorer: Scorer;
  private guard: InterruptGuard | null;
  private logger: Logger;

  private benchmarks: BenchmarkSpec[] | null = null;
  private recovered = false;
  private inFlight = false;

  constructor(options: EvaluationPipelineOptions) {
    this.config = options.config;
    this.task = options.task;
    this.patcher = options.patcher;
    this.builder = options.builder;
    this.runner = options.runner;
    this.baseline = options.baseline;
    this.tuner = options.tuner ?? new HyperparameterTuner();
    this.scorer = options.scorer ?? scorerFromTask(options.task);
    this.logger = options.logger ?? silentLogger;
    this.guard =
      options.guard === undefined
        ? new InterruptGuard(() => this.patcher.restoreSync(), { logger: this.logger })
        : options.guard;
  }

  /**
   * Wire up the standard components for a harness config and task.
   */
  static create(config: HarnessConfig, task: TaskConfig, options: CreatePipelineOptions = {}): EvaluationPipeline {
    const logger = options.logger;
    const log = (component: string): Logger => logger ?? createConsoleLogger(component);

    return new EvaluationPipeline({
      config,
      task,
      patcher: new SourcePatcher(targetPathOf(config), { logger: log('patcher') }),
      builder: new BuildDriver({
        tool: config.buildTool,
        buildDir: config.buildDir,
        runner: options.commandRunner,
        logger: log('build'),
      }),
      runner: new BenchmarkRunner({
        task,
        buildDir: config.buildDir,
        stageTimeoutMs: config.stageTimeoutMs,
        linkTimeoutMs: config.linkTimeoutMs,
        runs: config.runs,
        noiseThresholdMs: config.noiseThresholdMs,
        runner: options.commandRunner,
        logger: log('bench'),
      }),
      baseline: new BaselineProvider(new FileBaselineRepository(task.baselineFile, { logger: log('baseline') }), {
        logger: log('baseline'),
      }),
      tuner: new HyperparameterTuner({ sampler: options.sampler, logger: log('tuner') }),
      guard: options.guard,
      logger: log('pipeline'),
    });
  }

  get busy(): boolean {
    return this.inFlight;
  }

  /**
   * Recover a stale backup, discover benchmarks and make sure a baseline
   * exists. Runs implicitly before the first evaluation.
   */
  async prepare(): Promise<Baseline> {
    if (!this.recovered) {
      await this.patcher.recoverStale();
      this.recovered = true;
    }
    const benchmarks = await this.discover();
    return this.baseline.ensure(() => this.measureBaseline(benchmarks));
  }

  async discover(): Promise<BenchmarkSpec[]> {
    if (!this.benchmarks) {
      this.benchmarks = await discoverBenchmarks(this.task);
      if (this.benchmarks.length === 0) {
        this.logger.warn('No benchmarks found', { dir: this.task.benchmarkDir });
      } else {
        this.logger.info(`Found ${this.benchmarks.length} benchmarks`);
      }
    }
    return this.benchmarks;
  }

  /**
   * Evaluate one candidate. Only one evaluation may run at a time.
   */
  async evaluate(candidate: Candidate): Promise<EvaluationResult> {
    if (this.inFlight) {
      throw new PipelineBusy();
    }
    this.inFlight = true;
    try {
      return await this.run(candidate);
    } finally {
      this.inFlight = false;
    }
  }

  private async run(candidate: Candidate): Promise<EvaluationResult> {
    const baseline = await this.prepare();
    const benchmarks = await this.discover();

    const states: PipelineState[] = ['Idle'];
    let build: BuildResult = { success: false, elapsedMs: 0, errorSummary: null };
    let tuning: TuningResult | null = null;
    let flags = this.stageFlags([]);
    let measurements: Measurement[] = [];
    let error: string | null = null;

    await fs.mkdir(this.config.workDir, { recursive: true });
    const workDir = await fs.mkdtemp(join(this.config.workDir, `evolve-iter-${candidate.iteration}-`));
    this.logger.info(`Evaluating candidate ${candidate.iteration}`, {
      tunables: candidate.tunables.map((t) => t.name),
      workDir,
    });

    try {
      try {
        await this.patcher.patch(candidate.source);
        this.guard?.arm();
        states.push('Patched');

        build = await this.buildCandidate();
        if (build.success) {
          states.push('Built');

          tuning = await this.tune(candidate, benchmarks, baseline, workDir);
          if (tuning) {
            states.push('Tuned');
            flags = this.stageFlags(tuning.bestFlags);
          }

          measurements = await this.runner.runAll(benchmarks, flags, join(workDir, 'final'));
        } else {
          error = build.errorSummary ?? 'build failed';
          measurements = benchmarks.map((b) => failedMeasurement(b.name, 'build failed'));
        }
        states.push('Benchmarked');
      } catch (caught) {
        if (isHarnessError(caught, 'PATCH_FAILURE') || isHarnessError(caught, 'RESTORE_FAILURE')) {
          throw caught;
        }
        error = errorMessage(caught);
        this.logger.error(`Candidate ${candidate.iteration} evaluation crashed`, { error });
        measurements = benchmarks.map((b) => failedMeasurement(b.name, `evaluation error: ${error}`));
      }

      const score = this.scorer(measurements, baseline);
      states.push('Scored');
      this.logger.info(`Candidate ${candidate.iteration} scored ${score.value}`, score.breakdown);

      return { iteration: candidate.iteration, score, measurements, build, tuning, flags, states, error };
    } finally {
      this.guard?.disarm();
      try {
        await this.patcher.restore();
        states.push('Restored');
      } finally {
        if (!this.config.keepArtifacts) {
          await fs.rm(workDir, { recursive: true, force: true });
        }
      }
    }
  }

  private async buildCandidate(): Promise<BuildResult> {
    try {
      return await this.builder.build(this.config.buildTargets, this.config.buildTimeoutMs);
    } catch (error) {
      if (isHarnessError(error, 'BUILD_TIMEOUT')) {
        return { success: false, elapsedMs: this.config.buildTimeoutMs, errorSummary: error.message };
      }
      throw error;
    }
  }

  private async tune(
    candidate: Candidate,
    benchmarks: readonly BenchmarkSpec[],
    baseline: Baseline,
    workDir: string
  ): Promise<TuningResult | null> {
    if (this.config.tunerTrials <= 0 || candidate.tunables.length === 0) {
      return null;
    }
    const subset = selectSubset(benchmarks, this.task.tunerSubset);
    this.logger.info('Tuning', {
      trials: this.config.tunerTrials,
      subset: subset.map((b) => b.name),
    });

    return this.tuner.tune({
      tunables: candidate.tunables,
      trials: this.config.tunerTrials,
      objective: async (trialFlags, trial) => {
        const measurements = await this.runner.runAll(
          subset,
          this.stageFlags(trialFlags),
          join(workDir, `trial_${trial}`)
        );
        return this.scorer(measurements, baseline).value;
      },
    });
  }

  /**
   * Task candidate flags, with tuned flags appended to the tuned stage.
   */
  private stageFlags(tuned: readonly string[]): StageFlags {
    const { optimize, codegen } = this.task.candidateFlags;
    return this.task.tunedStage === 'optimize'
      ? { optimize: [...optimize, ...tuned], codegen: [...codegen] }
      : { optimize: [...optimize], codegen: [...codegen, ...tuned] };
  }

  private async measureBaseline(benchmarks: readonly BenchmarkSpec[]): Promise<Baseline> {
    const build = await this.builder.build(this.config.buildTargets, this.config.buildTimeoutMs);
    if (!build.success) {
      throw new BuildFailure(build.errorSummary ?? 'unknown error');
    }

    await fs.mkdir(this.config.workDir, { recursive: true });
    const dir = await fs.mkdtemp(join(this.config.workDir, 'evolve-baseline-'));
    try {
      const baseline = await this.runner.measureBaseline(benchmarks, dir);
      const missing = benchmarks.filter((b) => !(b.name in baseline)).map((b) => b.name);
      if (missing.length > 0) {
        this.logger.warn('Benchmarks left out of the baseline', { missing });
      }
      return baseline;
    } finally {
      if (!this.config.keepArtifacts) {
        await fs.rm(dir, { recursive: true, force: true });
      }
    }
  }
}
