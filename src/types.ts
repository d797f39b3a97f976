/**
 * Core types for the heuristic evaluation harness
 */

export type TunableType = 'int' | 'float';

/**
 * A numeric flag declared eligible for nested search via an in-source annotation.
 */
export interface Tunable {
  name: string;
  type: TunableType;
  min: number;
  max: number;
  defaultValue: number | null;
}

/**
 * One proposed replacement implementation. Identity is the iteration index.
 */
export interface Candidate {
  readonly iteration: number;
  readonly source: string;
  readonly tunables: readonly Tunable[];
}

export interface BenchmarkRecipe {
  args: string[];
  dataFiles: string[];
  dataDirectory: boolean; // copy the whole data/<name>/ directory into the run dir
  stdinFile: string | null;
  timeoutMs: number;
  extraLinkFlags: string[];
}

export interface BenchmarkSpec {
  name: string;
  artifactPath: string; // pre-built IR
  recipe: BenchmarkRecipe | null; // null = size-only
}

export interface BaselineEntry {
  binarySize: number;
  textSize: number;
  runtimeMs: number | null;
}

export type Baseline = Record<string, BaselineEntry>;

export interface Measurement {
  benchmark: string;
  ok: boolean;
  textSize: number | null;
  objectSize: number | null;
  binarySize: number | null;
  runtimeMs: number | null; // median of successful runs
  runtimesMs: number[];
  noisy: boolean; // median below the noise threshold
  failureReason: string | null;
}

export type ScoreBreakdown = Record<string, number>;

export interface ScoreResult {
  value: number;
  breakdown: ScoreBreakdown;
}

/**
 * Flags appended to the optimize and codegen stages.
 */
export interface StageFlags {
  optimize: string[];
  codegen: string[];
}

export interface BuildResult {
  success: boolean;
  elapsedMs: number;
  errorSummary: string | null;
}

export interface TrialRecord {
  trial: number;
  params: Record<string, number>;
  flags: string[];
  objective: number | null; // null = failed trial, ranks below everything
  error: string | null;
}

export interface TuningResult {
  bestParams: Record<string, number>;
  bestFlags: string[];
  bestObjective: number | null;
  trials: TrialRecord[];
}

export type PipelineState =
  | 'Idle'
  | 'Patched'
  | 'Built'
  | 'Tuned'
  | 'Benchmarked'
  | 'Scored'
  | 'Restored';

export interface EvaluationResult {
  iteration: number;
  score: ScoreResult;
  measurements: Measurement[];
  build: BuildResult;
  tuning: TuningResult | null;
  flags: StageFlags;
  states: PipelineState[];
  error: string | null;
}

export type IterationStatus = 'scored' | 'skipped' | 'aborted';

export interface IterationRecord {
  runId: string;
  iteration: number;
  timestamp: string;
  status: IterationStatus;
  score: number | null;
  breakdown: ScoreBreakdown;
  measurements: Measurement[];
  build: BuildResult | null;
  tuning: TuningResult | null;
  states: PipelineState[];
  error: string | null;
  source: string | null;
}

export interface HistoryEntry {
  iteration: number;
  status: IterationStatus;
  score: number | null;
  breakdown: ScoreBreakdown;
  error: string | null;
}

/**
 * Everything a generator needs to propose the next candidate.
 */
export interface RequestContext {
  iteration: number;
  best: {
    iteration: number;
    source: string;
    score: number | null;
    breakdown: ScoreBreakdown;
  };
  history: HistoryEntry[];
  instructions: string | null;
}

export const DEFAULT_MARKER = '[hyperparam]';
export const DEFAULT_NOISE_THRESHOLD_MS = 10;
export const DEFAULT_RUNS = 5;
