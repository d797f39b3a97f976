/**
 * Configuration
 *
 * Two layers:
 * - HarnessConfig: where the external tree, build and scratch space live,
 *   plus time budgets. Read from the environment with explicit overrides.
 * - TaskConfig: a JSON file describing one evolution task (toolchain flags,
 *   benchmark recipes, scoring weights).
 */

import { readFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, isAbsolute, join, resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { BenchmarkRecipe, DEFAULT_MARKER, DEFAULT_NOISE_THRESHOLD_MS, DEFAULT_RUNS } from './types.js';

const positiveInt = z.coerce.number().int().positive();

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => value === true || value === '1' || value === 'true');

export const harnessConfigSchema = z.object({
  sourceRoot: z.string().min(1, 'source root is required (EVOLVE_SOURCE_ROOT)'),
  targetFile: z.string().min(1, 'target file is required (EVOLVE_TARGET_FILE)'),
  buildDir: z.string().min(1, 'build directory is required (EVOLVE_BUILD_DIR)'),
  buildTool: z.string().min(1).default('ninja'),
  buildTargets: z
    .union([z.array(z.string()), z.string()])
    .transform((value) => (Array.isArray(value) ? value : value.split(/\s+/).filter(Boolean)))
    .default(['bin/opt', 'bin/llc']),
  buildTimeoutMs: positiveInt.default(600_000),
  stageTimeoutMs: positiveInt.default(120_000),
  linkTimeoutMs: positiveInt.default(60_000),
  tunerTrials: z.coerce.number().int().min(0).default(20),
  runs: positiveInt.default(DEFAULT_RUNS),
  noiseThresholdMs: z.coerce.number().nonnegative().default(DEFAULT_NOISE_THRESHOLD_MS),
  workDir: z.string().min(1).default(tmpdir()),
  keepArtifacts: booleanFlag.default(false),
});

export type HarnessConfig = z.output<typeof harnessConfigSchema>;
export type HarnessConfigInput = z.input<typeof harnessConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function parseHarnessConfig(input: HarnessConfigInput): HarnessConfig {
  const parsed = harnessConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('harness configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

function firstSet(env: NodeJS.ProcessEnv, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      return value;
    }
  }
  return undefined;
}

/**
 * Build the harness config from environment variables, with keyword overrides
 * taking precedence.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<HarnessConfigInput> = {}
): HarnessConfig {
  const fromEnv: Record<string, string | undefined> = {
    sourceRoot: firstSet(env, 'EVOLVE_SOURCE_ROOT', 'LLVM_SRC_PATH'),
    targetFile: firstSet(env, 'EVOLVE_TARGET_FILE'),
    buildDir: firstSet(env, 'EVOLVE_BUILD_DIR', 'BUILD_LLVM_DIR'),
    buildTool: firstSet(env, 'EVOLVE_BUILD_TOOL', 'NINJA'),
    buildTargets: firstSet(env, 'EVOLVE_BUILD_TARGETS'),
    buildTimeoutMs: firstSet(env, 'EVOLVE_BUILD_TIMEOUT_MS'),
    stageTimeoutMs: firstSet(env, 'EVOLVE_STAGE_TIMEOUT_MS'),
    linkTimeoutMs: firstSet(env, 'EVOLVE_LINK_TIMEOUT_MS'),
    tunerTrials: firstSet(env, 'EVOLVE_TUNER_TRIALS'),
    runs: firstSet(env, 'EVOLVE_RUNS'),
    workDir: firstSet(env, 'EVOLVE_WORK_DIR'),
    keepArtifacts: firstSet(env, 'EVOLVE_KEEP_ARTIFACTS'),
  };

  const merged: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fromEnv)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const parsed = harnessConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError('harness configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

export function targetPathOf(config: HarnessConfig): string {
  return join(config.sourceRoot, config.targetFile);
}

// ---------------------------------------------------------------------------
// Task configuration
// ---------------------------------------------------------------------------

const recipeSchema = z.object({
  args: z.array(z.string()).default([]),
  dataFiles: z.array(z.string()).default([]),
  dataDirectory: z.boolean().default(false),
  stdinFile: z.string().nullable().default(null),
  timeoutMs: positiveInt.default(30_000),
  extraLinkFlags: z.array(z.string()).default([]),
});

const stageFlagsSchema = z.object({
  optimize: z.array(z.string()).default([]),
  codegen: z.array(z.string()).default([]),
});

export const scoringSchema = z.object({
  sizeMetric: z.enum(['text', 'binary']).default('text'),
  sizeWeight: z.number().default(1),
  speedupWeight: z.number().default(0.1),
  failurePenalty: z.number().nonnegative().default(10),
});

export type ScoringConfig = z.output<typeof scoringSchema>;

export const taskConfigSchema = z.object({
  name: z.string().min(1),
  benchmarkDir: z.string().min(1),
  benchmarkExtension: z.string().default('.bc'),
  dataDir: z.string().optional(),
  baselineFile: z.string().optional(),
  tools: z
    .object({
      optimizer: z.string().default('bin/opt'),
      codegen: z.string().default('bin/llc'),
      linker: z.string().default('gcc'),
      size: z.string().default('size'),
    })
    .default({}),
  baseFlags: stageFlagsSchema.default({ optimize: ['-O2'], codegen: ['-O2', '-filetype=obj', '-relocation-model=pic'] }),
  candidateFlags: stageFlagsSchema.default({}),
  tunedStage: z.enum(['optimize', 'codegen']).default('optimize'),
  linkLibraries: z.array(z.string()).default(['-lm', '-lpthread', '-ldl']),
  marker: z.string().min(1).default(DEFAULT_MARKER),
  tunerSubset: z.array(z.string()).default([]),
  scoring: z
    .union([z.enum(['inlining', 'regalloc']), scoringSchema])
    .default('inlining'),
  excluded: z.array(z.string()).default([]),
  recipes: z.record(recipeSchema).default({}),
});

type ParsedTask = z.output<typeof taskConfigSchema>;

export interface TaskConfig extends Omit<ParsedTask, 'dataDir' | 'baselineFile' | 'recipes'> {
  dataDir: string;
  baselineFile: string;
  recipes: Record<string, BenchmarkRecipe>;
}

/**
 * Validate a task definition. Relative paths are resolved against `baseDir`.
 */
export function parseTaskConfig(raw: unknown, baseDir: string): TaskConfig {
  const parsed = taskConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('task configuration', formatIssues(parsed.error));
  }
  const task = parsed.data;
  const at = (p: string): string => (isAbsolute(p) ? p : resolve(baseDir, p));
  const benchmarkDir = at(task.benchmarkDir);

  return {
    ...task,
    benchmarkDir,
    dataDir: task.dataDir ? at(task.dataDir) : join(benchmarkDir, 'data'),
    baselineFile: task.baselineFile ? at(task.baselineFile) : join(benchmarkDir, 'baseline.json'),
  };
}

export async function loadTaskConfig(filePath: string): Promise<TaskConfig> {
  const content = await readFile(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`task file ${filePath}`, [error instanceof Error ? error.message : String(error)]);
  }
  return parseTaskConfig(raw, dirname(resolve(filePath)));
}

/**
 * Tools given as a relative path with a directory part live in the build
 * directory (`bin/opt`); bare names are looked up on PATH (`gcc`).
 */
export function resolveTool(buildDir: string, tool: string): string {
  if (isAbsolute(tool) || !tool.includes('/')) {
    return tool;
  }
  return join(buildDir, tool);
}
