/**
 * Benchmark Runner
 *
 * Drives the freshly built toolchain over each benchmark:
 * optimize -> codegen -> link -> run k times.
 * Reports sizes and the median wall-clock time, which is steadier than the mean
 * under OS scheduling noise.
 */

import { promises as fs } from 'fs';
import { basename, extname, join } from 'path';
import { TaskConfig, resolveTool } from '../config.js';
import { errorMessage } from '../errors.js';
import { pathExists } from '../fs-utils.js';
import { Logger, silentLogger } from '../logger.js';
import { CommandRunner, ProcessResult, runCommand } from '../process.js';
import {
  Baseline,
  BenchmarkSpec,
  DEFAULT_NOISE_THRESHOLD_MS,
  DEFAULT_RUNS,
  Measurement,
  StageFlags,
} from '../types.js';

export interface BenchmarkRunnerOptions {
  task: TaskConfig;
  buildDir: string;
  stageTimeoutMs: number;
  linkTimeoutMs: number;
  runs?: number;
  noiseThresholdMs?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

export const NO_FLAGS: StageFlags = { optimize: [], codegen: [] };

const SIZE_TIMEOUT_MS = 10_000;
const STDERR_LIMIT = 500;

/**
 * Middle value of the sorted sample; the upper middle for even counts.
 */
export function median(values: readonly number[]): number | null {
  if (values.length === 0) {
    return null;
  }
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

/**
 * Parse the text column from `size` output:
 *    text    data     bss     dec     hex filename
 *   12345     678      90   13113    3339 bench.o
 */
export function parseTextSize(output: string): number | null {
  const lines = output.trim().split('\n');
  if (lines.length < 2) {
    return null;
  }
  const value = Number.parseInt(lines[1].trim().split(/\s+/)[0], 10);
  return Number.isNaN(value) ? null : value;
}

/**
 * Find the benchmark artifacts for a task, sorted by name, minus exclusions
 */
export async function discoverBenchmarks(task: TaskConfig): Promise<BenchmarkSpec[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(task.benchmarkDir);
  } catch {
    return [];
  }

  const excluded = new Set(task.excluded);
  return entries
    .filter((file) => extname(file) === task.benchmarkExtension)
    .map((file) => basename(file, task.benchmarkExtension))
    .filter((name) => !excluded.has(name))
    .sort()
    .map((name) => ({
      name,
      artifactPath: join(task.benchmarkDir, name + task.benchmarkExtension),
      recipe: task.recipes[name] ?? null,
    }));
}

export function failedMeasurement(
  benchmark: string,
  reason: string,
  partial: Partial<Measurement> = {}
): Measurement {
  return {
    benchmark,
    ok: false,
    textSize: null,
    objectSize: null,
    binarySize: null,
    runtimeMs: null,
    runtimesMs: [],
    noisy: false,
    ...partial,
    failureReason: reason,
  };
}

export class BenchmarkRunner {
  private task: TaskConfig;
  private buildDir: string;
  private stageTimeoutMs: number;
  private linkTimeoutMs: number;
  private runs: number;
  private noiseThresholdMs: number;
  private runner: CommandRunner;
  private logger: Logger;

  constructor(options: BenchmarkRunnerOptions) {
    this.task = options.task;
    this.buildDir = options.buildDir;
    this.stageTimeoutMs = options.stageTimeoutMs;
    this.linkTimeoutMs = options.linkTimeoutMs;
    this.runs = options.runs ?? DEFAULT_RUNS;
    this.noiseThresholdMs = options.noiseThresholdMs ?? DEFAULT_NOISE_THRESHOLD_MS;
    this.runner = options.runner ?? runCommand;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run every benchmark in order. A failing benchmark never stops the others.
   */
  async runAll(
    benchmarks: readonly BenchmarkSpec[],
    flags: StageFlags,
    workDir: string
  ): Promise<Measurement[]> {
    const measurements: Measurement[] = [];
    for (const bench of benchmarks) {
      let measurement: Measurement;
      try {
        measurement = await this.runBenchmark(bench, flags, workDir);
      } catch (error) {
        measurement = failedMeasurement(bench.name, errorMessage(error));
      }
      if (measurement.ok) {
        this.logger.info(`${bench.name}: ok`, {
          text: measurement.textSize,
          binary: measurement.binarySize,
          runtimeMs: measurement.runtimeMs,
          noisy: measurement.noisy,
        });
      } else {
        this.logger.warn(`${bench.name}: failed`, { reason: measurement.failureReason });
      }
      measurements.push(measurement);
    }
    return measurements;
  }

  /**
   * Measure the unmodified toolchain (no candidate flags). Failed benchmarks
   * are left out of the baseline.
   */
  async measureBaseline(benchmarks: readonly BenchmarkSpec[], workDir: string): Promise<Baseline> {
    const measurements = await this.runAll(benchmarks, NO_FLAGS, workDir);
    const baseline: Baseline = {};
    for (const m of measurements) {
      if (m.ok && m.textSize !== null && m.binarySize !== null) {
        baseline[m.benchmark] = { binarySize: m.binarySize, textSize: m.textSize, runtimeMs: m.runtimeMs };
      }
    }
    return baseline;
  }

  /**
   * Compile, link and time one benchmark
   */
  async runBenchmark(bench: BenchmarkSpec, flags: StageFlags, workDir: string): Promise<Measurement> {
    await fs.mkdir(workDir, { recursive: true });
    const optOut = join(workDir, `${bench.name}_opt.bc`);
    const objOut = join(workDir, `${bench.name}.o`);
    const binary = join(workDir, bench.name);

    // 1. Optimize
    const optimizer = resolveTool(this.buildDir, this.task.tools.optimizer);
    const optArgs = [...this.task.baseFlags.optimize, ...flags.optimize, bench.artifactPath, '-o', optOut];
    const optError = await this.stage('opt', optimizer, optArgs, this.stageTimeoutMs, optOut);
    if (optError) {
      return failedMeasurement(bench.name, optError);
    }

    // 2. Codegen
    const codegen = resolveTool(this.buildDir, this.task.tools.codegen);
    const llcArgs = [...this.task.baseFlags.codegen, ...flags.codegen, optOut, '-o', objOut];
    const llcError = await this.stage('llc', codegen, llcArgs, this.stageTimeoutMs, objOut);
    if (llcError) {
      return failedMeasurement(bench.name, llcError);
    }
    const objectSize = (await fs.stat(objOut)).size;
    const textSize = await this.textSize(objOut, objectSize);

    // 3. Link
    const linkArgs = [
      objOut,
      '-o',
      binary,
      ...this.task.linkLibraries,
      ...(bench.recipe?.extraLinkFlags ?? []),
    ];
    const linkError = await this.stage('link', this.task.tools.linker, linkArgs, this.linkTimeoutMs, binary);
    if (linkError) {
      return failedMeasurement(bench.name, linkError, { textSize, objectSize });
    }
    const binarySize = (await fs.stat(binary)).size;

    // 4. Execute
    if (!bench.recipe) {
      return {
        benchmark: bench.name,
        ok: true,
        textSize,
        objectSize,
        binarySize,
        runtimeMs: null,
        runtimesMs: [],
        noisy: false,
        failureReason: null,
      };
    }

    const runtimesMs = await this.execute(bench, binary, workDir);
    const runtimeMs = median(runtimesMs);
    if (runtimeMs === null) {
      return failedMeasurement(bench.name, 'run failed', { textSize, objectSize, binarySize });
    }

    return {
      benchmark: bench.name,
      ok: true,
      textSize,
      objectSize,
      binarySize,
      runtimeMs,
      runtimesMs,
      noisy: runtimeMs < this.noiseThresholdMs,
      failureReason: null,
    };
  }

  /**
   * Run one toolchain stage. Returns a failure reason, or null on success.
   */
  private async stage(
    label: string,
    command: string,
    args: string[],
    timeoutMs: number,
    expectedOutput: string
  ): Promise<string | null> {
    let result: ProcessResult;
    try {
      result = await this.runner(command, args, { timeoutMs });
    } catch (error) {
      return `${label} could not start: ${errorMessage(error)}`;
    }
    if (result.timedOut) {
      return `${label} timed out (${timeoutMs}ms)`;
    }
    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim().slice(0, STDERR_LIMIT);
      return stderr || `${label} exited with code ${result.exitCode}`;
    }
    if (!(await pathExists(expectedOutput))) {
      return `${label} produced no output`;
    }
    return null;
  }

  private async textSize(objectPath: string, fallback: number): Promise<number> {
    try {
      const result = await this.runner(this.task.tools.size, [objectPath], { timeoutMs: SIZE_TIMEOUT_MS });
      if (result.exitCode === 0 && !result.timedOut) {
        return parseTextSize(result.stdout) ?? fallback;
      }
    } catch (error) {
      this.logger.debug('size tool unavailable', { error: errorMessage(error) });
    }
    return fallback;
  }

  /**
   * Copy the binary and its inputs into a run directory and time `runs`
   * executions. Only successful runs are kept.
   */
  private async execute(bench: BenchmarkSpec, binary: string, workDir: string): Promise<number[]> {
    const recipe = bench.recipe;
    if (!recipe) {
      return [];
    }

    const runDir = join(workDir, `${bench.name}_run`);
    await fs.mkdir(runDir, { recursive: true });
    const runBinary = join(runDir, bench.name);
    await fs.copyFile(binary, runBinary);
    await fs.chmod(runBinary, 0o755);

    const benchData = join(this.task.dataDir, bench.name);
    const hasData = await pathExists(benchData);
    if (hasData && recipe.dataDirectory) {
      await fs.cp(benchData, runDir, { recursive: true });
    } else if (hasData) {
      for (const file of recipe.dataFiles) {
        const src = join(benchData, file);
        if (await pathExists(src)) {
          await fs.copyFile(src, join(runDir, file));
        }
      }
    }

    let stdinFile: string | null = null;
    if (recipe.stdinFile && hasData) {
      const candidate = join(benchData, recipe.stdinFile);
      stdinFile = (await pathExists(candidate)) ? candidate : null;
    }

    const timings: number[] = [];
    for (let i = 0; i < this.runs; i++) {
      const result = await this.runner(runBinary, recipe.args, {
        cwd: runDir,
        timeoutMs: recipe.timeoutMs,
        stdinFile,
      });
      if (!result.timedOut && result.exitCode === 0) {
        timings.push(result.elapsedMs);
      }
    }
    return timings;
  }
}
