import { existsSync, readFileSync } from 'fs';
import { mkdir, readFile, readdir, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { describe, expect, it, vi } from 'vitest';
import { HarnessConfigInput, parseHarnessConfig, parseTaskConfig } from '../src/config.js';
import { PatchFailure, PipelineBusy } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import { BACKUP_SUFFIX, LOCK_SUFFIX } from '../src/patcher.js';
import { EvaluationPipeline, InterruptGuard } from '../src/pipeline.js';
import { ProcessResult, runCommand } from '../src/process.js';
import { FAILURE_SCORE } from '../src/scoring.js';
import { RandomSampler, Sampler, parseTunables } from '../src/tuner.js';
import { Candidate } from '../src/types.js';
import { FakeToolchainOptions, ToolCall, fakeToolchain, processResult, randomSequence, tempDir } from './helpers.js';

const TARGET = 'lib/Analysis/EvolvedInlineCost.cpp';
const ORIGINAL = Buffer.from('int computeInlineCost() { return 225; }\n');

interface SetupOptions {
  toolchain?: (patched: () => boolean) => FakeToolchainOptions;
  task?: Record<string, unknown>;
  config?: Partial<HarnessConfigInput>;
  sampler?: Sampler;
  guard?: InterruptGuard | null;
}

async function setup(options: SetupOptions = {}) {
  const root = await tempDir();
  const targetPath = join(root, 'llvm', TARGET);
  await mkdir(dirname(targetPath), { recursive: true });
  await writeFile(targetPath, ORIGINAL);

  const benchmarkDir = join(root, 'bench');
  await mkdir(benchmarkDir);
  await writeFile(join(benchmarkDir, 'a.bc'), '');
  await writeFile(join(benchmarkDir, 'b.bc'), '');

  const task = parseTaskConfig({ name: 'test', benchmarkDir, recipes: { a: {}, b: {} }, ...options.task }, root);
  const config = parseHarnessConfig({
    sourceRoot: join(root, 'llvm'),
    targetFile: TARGET,
    buildDir: join(root, 'build'),
    workDir: join(root, 'work'),
    runs: 3,
    tunerTrials: 0,
    ...options.config,
  });

  const patched = (): boolean => !readFileSync(targetPath).equals(ORIGINAL);
  const toolchain = fakeToolchain(options.toolchain ? options.toolchain(patched) : {});
  const pipeline = EvaluationPipeline.create(config, task, {
    commandRunner: toolchain.runner,
    logger: silentLogger,
    sampler: options.sampler,
    guard: options.guard === undefined ? null : options.guard,
  });

  return { root, targetPath, pipeline, toolchain, task, config };
}

function candidate(source: string, marker = '[hyperparam]'): Candidate {
  return { iteration: 1, source, tunables: parseTunables(source, marker) };
}

async function expectRestored(targetPath: string): Promise<void> {
  expect(await readFile(targetPath)).toEqual(ORIGINAL);
  expect(existsSync(targetPath + BACKUP_SUFFIX)).toBe(false);
  expect(existsSync(targetPath + LOCK_SUFFIX)).toBe(false);
}

const SMALLER = 'int computeInlineCost() { return 100; } // SMALLER\n';

describe('EvaluationPipeline', () => {
  it('patches, builds, benchmarks, scores and restores', async () => {
    const { root, targetPath, pipeline, toolchain } = await setup({
      toolchain: (patched) => ({ objectBytes: () => (patched() ? 900 : 1000) }),
    });

    const result = await pipeline.evaluate(candidate(SMALLER));

    expect(result.states).toEqual(['Idle', 'Patched', 'Built', 'Benchmarked', 'Scored', 'Restored']);
    expect(result.score.value).toBe(10);
    expect(result.measurements.map((m) => [m.benchmark, m.ok, m.textSize, m.runtimeMs])).toEqual([
      ['a', true, 900, 50],
      ['b', true, 900, 50],
    ]);
    expect(result.build.success).toBe(true);
    expect(result.tuning).toBeNull();
    expect(result.flags).toEqual({ optimize: [], codegen: [] });
    expect(result.error).toBeNull();
    await expectRestored(targetPath);

    expect(JSON.parse(await readFile(join(root, 'bench', 'baseline.json'), 'utf-8'))).toEqual({
      a: { binarySize: 2000, textSize: 1000, runtimeMs: 50 },
      b: { binarySize: 2000, textSize: 1000, runtimeMs: 50 },
    });
    expect(await readdir(join(root, 'work'))).toEqual([]);
    expect(toolchain.callsTo('ninja')).toHaveLength(2);
  });

  it('measures the baseline only once', async () => {
    const { pipeline, toolchain } = await setup();

    await pipeline.evaluate(candidate('int a;\n'));
    await pipeline.evaluate({ ...candidate('int b;\n'), iteration: 2 });

    expect(toolchain.callsTo('ninja')).toHaveLength(3);
    expect(toolchain.callsTo('opt')).toHaveLength(6);
  });

  it('keeps scratch directories when asked', async () => {
    const { root, pipeline } = await setup({ config: { keepArtifacts: true } });

    await pipeline.evaluate(candidate('int a;\n'));

    const kept = (await readdir(join(root, 'work'))).sort();
    expect(kept).toHaveLength(2);
    expect(kept[0].startsWith('evolve-baseline-')).toBe(true);
    expect(kept[1].startsWith('evolve-iter-1-')).toBe(true);
  });

  const failures: Array<{ stage: string; tool: string; result: ProcessResult }> = [
    { stage: 'build', tool: 'ninja', result: processResult({ exitCode: 1, stdout: 'H.cpp:1:1: error: unknown type' }) },
    { stage: 'build timeout', tool: 'ninja', result: processResult({ exitCode: null, timedOut: true }) },
    { stage: 'optimize', tool: 'opt', result: processResult({ exitCode: 139, stderr: 'Segmentation fault' }) },
    { stage: 'codegen', tool: 'llc', result: processResult({ exitCode: null, timedOut: true }) },
    { stage: 'link', tool: 'gcc', result: processResult({ exitCode: 1 }) },
    { stage: 'benchmark run', tool: 'a', result: processResult({ exitCode: 134 }) },
  ];

  it.each(failures)('restores the target byte for byte after a $stage failure', async ({ tool, result }) => {
    const { targetPath, pipeline } = await setup({
      toolchain: (patched) => ({
        override: (call: ToolCall) => (basename(call.command) === tool && patched() ? result : null),
      }),
    });

    const evaluation = await pipeline.evaluate(candidate(SMALLER));

    await expectRestored(targetPath);
    expect(evaluation.states[evaluation.states.length - 1]).toBe('Restored');
    expect(evaluation.states.includes('Built')).toBe(tool !== 'ninja');
    expect(evaluation.score.value).toBe(tool === 'a' ? -10 : FAILURE_SCORE);
  });

  it('scores a failed build as a failure and keeps the error summary', async () => {
    const { pipeline } = await setup({
      toolchain: (patched) => ({
        override: (call) =>
          call.command === 'ninja' && patched()
            ? processResult({ exitCode: 1, stdout: '[1/9] CXX\nH.cpp:1:1: error: unknown type\n' })
            : null,
      }),
    });

    const result = await pipeline.evaluate(candidate(SMALLER));

    expect(result.states).toEqual(['Idle', 'Patched', 'Benchmarked', 'Scored', 'Restored']);
    expect(result.error).toBe('H.cpp:1:1: error: unknown type');
    expect(result.measurements.map((m) => m.failureReason)).toEqual(['build failed', 'build failed']);
    expect(result.score.value).toBe(FAILURE_SCORE);
  });

  it('treats a build timeout like a failed build', async () => {
    const { pipeline } = await setup({
      toolchain: (patched) => ({
        override: (call) =>
          call.command === 'ninja' && patched() ? processResult({ exitCode: null, timedOut: true }) : null,
      }),
    });

    const result = await pipeline.evaluate(candidate(SMALLER));

    expect(result.error).toBe('Build timed out (600000ms)');
    expect(result.build).toEqual({ success: false, elapsedMs: 600_000, errorSummary: 'Build timed out (600000ms)' });
  });

  it('folds an unexpected error into a penalized score', async () => {
    const exploding: Sampler = {
      suggest: () => {
        throw new Error('sampler exploded');
      },
    };
    const { targetPath, pipeline } = await setup({ sampler: exploding, config: { tunerTrials: 2 } });

    const result = await pipeline.evaluate(candidate('// [hyperparam]: knob, int, 0, 9\nint Knob = 1;\n'));

    expect(result.states).toEqual(['Idle', 'Patched', 'Built', 'Scored', 'Restored']);
    expect(result.error).toBe('sampler exploded');
    expect(result.score.value).toBe(FAILURE_SCORE);
    expect(result.measurements.map((m) => m.failureReason)).toEqual([
      'evaluation error: sampler exploded',
      'evaluation error: sampler exploded',
    ]);
    await expectRestored(targetPath);
  });

  it('propagates PatchFailure and leaves no backup behind', async () => {
    const { targetPath, pipeline } = await setup();
    await pipeline.prepare();
    await rm(targetPath);

    await expect(pipeline.evaluate(candidate(SMALLER))).rejects.toBeInstanceOf(PatchFailure);
    expect(existsSync(targetPath + BACKUP_SUFFIX)).toBe(false);
    expect(pipeline.busy).toBe(false);
  });

  it('recovers a stale backup before the first evaluation', async () => {
    const { targetPath, pipeline } = await setup({
      toolchain: (patched) => ({ objectBytes: () => (patched() ? 900 : 1000) }),
    });
    await writeFile(targetPath + BACKUP_SUFFIX, ORIGINAL);
    await writeFile(targetPath, 'leftover candidate');

    const result = await pipeline.evaluate(candidate(SMALLER));

    expect(result.score.value).toBe(10);
    await expectRestored(targetPath);
  });

  it('allows only one evaluation at a time', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { pipeline } = await setup({
      toolchain: (patched) => ({
        override: async (call) => {
          if (call.command === 'ninja' && patched()) {
            await gate;
          }
          return null;
        },
      }),
    });
    await pipeline.prepare();

    const first = pipeline.evaluate(candidate(SMALLER));
    await expect(pipeline.evaluate(candidate(SMALLER))).rejects.toBeInstanceOf(PipelineBusy);
    expect(pipeline.busy).toBe(true);

    release();
    expect((await first).states).toContain('Restored');
    expect(pipeline.busy).toBe(false);
  });

  it('leaves the target alone while another pipeline has it patched', async () => {
    let reached: () => void = () => {};
    const atBuild = new Promise<void>((resolve) => {
      reached = resolve;
    });
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const { targetPath, pipeline, config, task } = await setup({
      toolchain: (patched) => ({
        objectBytes: () => (patched() ? 900 : 1000),
        override: async (call) => {
          if (call.command === 'ninja' && patched()) {
            reached();
            await gate;
          }
          return null;
        },
      }),
    });

    const first = pipeline.evaluate(candidate(SMALLER));
    await atBuild;

    const second = EvaluationPipeline.create(config, task, {
      commandRunner: fakeToolchain().runner,
      logger: silentLogger,
      guard: null,
    });
    await expect(second.evaluate(candidate('int other;\n'))).rejects.toBeInstanceOf(PatchFailure);
    expect(await readFile(targetPath, 'utf-8')).toBe(SMALLER);
    expect(existsSync(targetPath + BACKUP_SUFFIX)).toBe(true);

    release();
    expect((await first).score.value).toBe(10);
    await expectRestored(targetPath);
  });

  describe('tuning', () => {
    const TUNED = [
      '// TUNE: base_threshold, int, 50, 300',
      'static cl::opt<int> BaseThreshold("base_threshold", cl::init(100));',
      'int computeInlineCost() { return BaseThreshold; }',
      '',
    ].join('\n');

    const thresholdBytes = (_bench: string, flags: string[]): number => {
      const flag = flags.find((f) => f.startsWith('-base_threshold='));
      return flag ? 1000 - Math.floor(Number(flag.split('=')[1]) / 10) : 1000;
    };

    it('runs the trial budget on the subset and benchmarks with the best flags', async () => {
      const { root, pipeline, toolchain } = await setup({
        task: { marker: 'TUNE', tunerSubset: ['a'] },
        config: { tunerTrials: 3 },
        sampler: new RandomSampler({ random: randomSequence([0, 0.999]) }),
        toolchain: () => ({ objectBytes: thresholdBytes }),
      });

      const result = await pipeline.evaluate(candidate(TUNED, 'TUNE'));

      const trialCalls = toolchain.callsTo('opt').filter((call) => call.args.some((arg) => arg.includes('trial_')));
      expect(trialCalls).toHaveLength(3);
      expect(trialCalls.every((call) => call.args.includes(join(root, 'bench', 'a.bc')))).toBe(true);
      expect(trialCalls.map((call) => call.args.find((arg) => arg.startsWith('-base_threshold=')))).toEqual([
        '-base_threshold=100',
        '-base_threshold=50',
        '-base_threshold=300',
      ]);

      expect(result.tuning?.trials.map((t) => t.objective)).toEqual([1, 0.5, 3]);
      expect(result.tuning?.bestFlags).toEqual(['-base_threshold=300']);
      expect(result.flags).toEqual({ optimize: ['-base_threshold=300'], codegen: [] });
      expect(result.states).toEqual(['Idle', 'Patched', 'Built', 'Tuned', 'Benchmarked', 'Scored', 'Restored']);
      expect(result.score.value).toBe(3);
    });

    it('passes no tuned flags when the budget is zero', async () => {
      const { pipeline, toolchain } = await setup({
        task: { marker: 'TUNE', tunerSubset: ['a'] },
        config: { tunerTrials: 0 },
        toolchain: () => ({ objectBytes: thresholdBytes }),
      });

      const result = await pipeline.evaluate(candidate(TUNED, 'TUNE'));

      expect(result.tuning).toBeNull();
      expect(result.flags).toEqual({ optimize: [], codegen: [] });
      expect(toolchain.callsTo('opt').some((call) => call.args.some((arg) => arg.startsWith('-base_threshold')))).toBe(
        false
      );
      expect(result.score.value).toBe(0);
    });

    it('appends tuned flags to the codegen stage when configured', async () => {
      const { pipeline, toolchain } = await setup({
        task: { marker: 'TUNE', tunedStage: 'codegen', candidateFlags: { codegen: ['-regalloc=greedy'] } },
        config: { tunerTrials: 2 },
        sampler: new RandomSampler({ random: () => 0 }),
      });

      const result = await pipeline.evaluate(candidate(TUNED, 'TUNE'));

      // Every trial scores the same, so the first one (the declared default) stands.
      expect(result.flags).toEqual({ optimize: [], codegen: ['-regalloc=greedy', '-base_threshold=100'] });
      const finalLlc = toolchain.callsTo('llc').filter((call) => call.args.some((arg) => arg.includes('/final/')));
      expect(finalLlc[0].args).toContain('-base_threshold=100');
    });
  });

  it('arms the interrupt guard only while patched', async () => {
    const restore = vi.fn();
    const guard = new InterruptGuard(restore, { exit: vi.fn() });
    const armedDuringBuild: boolean[] = [];
    const { pipeline } = await setup({
      guard,
      toolchain: () => ({
        override: (call) => {
          if (call.command === 'ninja') {
            armedDuringBuild.push(guard.isArmed);
          }
          return null;
        },
      }),
    });

    await pipeline.evaluate(candidate(SMALLER));

    expect(armedDuringBuild).toEqual([false, true]);
    expect(guard.isArmed).toBe(false);
    expect(restore).not.toHaveBeenCalled();
  });
});

describe('InterruptGuard', () => {
  it('restores and exits on a signal', () => {
    const restore = vi.fn();
    const exit = vi.fn();
    const guard = new InterruptGuard(restore, { exit });

    guard.handleSignal('SIGTERM');
    guard.handleSignal('SIGINT');

    expect(restore).toHaveBeenCalledTimes(2);
    expect(exit.mock.calls).toEqual([[143], [130]]);
  });

  it('kills running children before restoring', () => {
    const order: string[] = [];
    const guard = new InterruptGuard(() => order.push('restore'), {
      exit: () => order.push('exit'),
      killChildren: () => {
        order.push('kill');
        return 0;
      },
    });

    guard.handleSignal('SIGTERM');

    expect(order).toEqual(['kill', 'restore', 'exit']);
  });

  it('takes down a live build child when interrupted', async () => {
    const restore = vi.fn();
    const exit = vi.fn();
    const guard = new InterruptGuard(restore, { exit });
    const build = runCommand(process.execPath, ['-e', 'setTimeout(() => {}, 30000)'], { timeoutMs: 30_000 });

    guard.handleSignal('SIGINT');
    const result = await build;

    expect(result.signal).toBe('SIGKILL');
    expect(result.timedOut).toBe(false);
    expect(restore).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(130);
  });

  it('exits with failure when the restore throws', () => {
    const exit = vi.fn();
    const guard = new InterruptGuard(
      () => {
        throw new Error('disk gone');
      },
      { exit }
    );

    guard.handleSignal('SIGINT');

    expect(exit).toHaveBeenCalledWith(1);
  });

  it('installs one listener per signal while armed', () => {
    const guard = new InterruptGuard(vi.fn(), { exit: vi.fn() });
    const before = process.listenerCount('SIGINT');

    guard.arm();
    guard.arm();
    expect(process.listenerCount('SIGINT')).toBe(before + 1);
    expect(process.listenerCount('SIGTERM')).toBeGreaterThan(0);

    guard.disarm();
    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
