import { writeFileSync } from 'fs';
import { mkdtemp, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { CommandRunner, ProcessResult, RunOptions } from '../src/process.js';
import { IterationRecord } from '../src/types.js';

export async function tempDir(prefix = 'evolve-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export function processResult(partial: Partial<ProcessResult> = {}): ProcessResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: '',
    stderr: '',
    timedOut: false,
    elapsedMs: 1,
    ...partial,
  };
}

export function randomSequence(values: readonly number[], fallback = 0.5): () => number {
  let index = 0;
  return () => {
    const value = values[index];
    index += 1;
    return value ?? fallback;
  };
}

export function iterationRecord(overrides: Partial<IterationRecord> = {}): IterationRecord {
  return {
    runId: 'run-1',
    iteration: 1,
    timestamp: '2026-01-01T00:00:00.000Z',
    status: 'scored',
    score: 2.5,
    breakdown: { sizeReductionPct: 2.5 },
    measurements: [],
    build: { success: true, elapsedMs: 10, errorSummary: null },
    tuning: null,
    states: ['Idle', 'Patched', 'Built', 'Benchmarked', 'Scored', 'Restored'],
    error: null,
    source: 'int x;\n',
    ...overrides,
  };
}

export interface ToolCall {
  command: string;
  args: string[];
  options: RunOptions;
}

export interface FakeToolchainOptions {
  /** Return a result to replace the simulated behavior for this call. */
  override?: (call: ToolCall) => ProcessResult | null | Promise<ProcessResult | null>;
  /** Size of the object file llc writes; `optFlags` are the flags opt received. */
  objectBytes?: (bench: string, optFlags: string[]) => number;
  binaryBytes?: number;
  /** Wall time reported for the n-th run (0-based) of a benchmark binary. */
  runtimeMs?: (bench: string, run: number) => number;
}

export interface FakeToolchain {
  runner: CommandRunner;
  calls: ToolCall[];
  callsTo(tool: string): ToolCall[];
}

function outputOf(args: readonly string[]): string {
  const index = args.indexOf('-o');
  return index >= 0 ? args[index + 1] : '';
}

/**
 * In-process stand-in for ninja, opt, llc, gcc, size and the benchmark
 * binaries. Tools write real (dummy) output files so the runner's existence
 * and size checks behave as they would against the real toolchain.
 */
export function fakeToolchain(options: FakeToolchainOptions = {}): FakeToolchain {
  const calls: ToolCall[] = [];
  const optFlags = new Map<string, string[]>();
  const runCounts = new Map<string, number>();

  const runner: CommandRunner = async (command, args, runOptions) => {
    const call: ToolCall = { command, args: [...args], options: runOptions };
    calls.push(call);

    const replaced = options.override ? await options.override(call) : null;
    if (replaced) {
      return replaced;
    }

    const tool = basename(command);
    const out = outputOf(args);

    switch (tool) {
      case 'ninja':
        return processResult({ elapsedMs: 10 });
      case 'opt': {
        optFlags.set(out, args.filter((arg, i) => arg.startsWith('-') && arg !== '-o' && args[i - 1] !== '-o'));
        writeFileSync(out, 'IR');
        return processResult();
      }
      case 'llc': {
        const input = args[args.indexOf('-o') - 1];
        const bench = basename(input, '_opt.bc');
        const bytes = options.objectBytes ? options.objectBytes(bench, optFlags.get(input) ?? []) : 1000;
        writeFileSync(out, Buffer.alloc(bytes));
        return processResult();
      }
      case 'size': {
        const size = (await stat(args[0])).size;
        return processResult({
          stdout: `   text\t   data\t    bss\t    dec\t    hex\tfilename\n  ${size}\t      0\t      0\t  ${size}\t      0\t${args[0]}\n`,
        });
      }
      case 'gcc': {
        writeFileSync(out, Buffer.alloc(options.binaryBytes ?? 2000));
        return processResult();
      }
      default: {
        const run = runCounts.get(tool) ?? 0;
        runCounts.set(tool, run + 1);
        return processResult({ elapsedMs: options.runtimeMs ? options.runtimeMs(tool, run) : 50 });
      }
    }
  };

  return {
    runner,
    calls,
    callsTo: (tool) => calls.filter((call) => basename(call.command) === tool),
  };
}
