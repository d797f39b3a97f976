/**
 * Heuristic Evolve
 *
 * Evaluation harness for evolving compiler heuristics: patch a candidate into
 * the toolchain source, rebuild, benchmark, tune its knobs, score, restore.
 */

export { Orchestrator } from './orchestrator.js';
export type {
  CandidateBridge,
  CandidateEvaluator,
  OrchestratorOptions,
  RunLoopOptions,
  RunSummary,
} from './orchestrator.js';
export { HillClimbController } from './controller.js';
export type { EvolutionController, ScoredCandidate } from './controller.js';
export { EvaluationPipeline, InterruptGuard } from './pipeline.js';
export type { CreatePipelineOptions, EvaluationPipelineOptions } from './pipeline.js';
export {
  FileBridge,
  serveRequests,
  writeResponse,
  renderRequest,
  parseResponse,
  formatResponse,
  extractCodeBlocks,
  requestFileName,
  responseFileName,
  DEFAULT_POLL_INTERVAL_MS,
} from './bridge/index.js';
export type { AwaitResponseOptions, CandidateGenerator, FileBridgeOptions, PendingRequest } from './bridge/index.js';
export { SourcePatcher, BACKUP_SUFFIX, LOCK_SUFFIX } from './patcher.js';
export { BuildDriver, summarizeBuildErrors } from './build.js';
export { runCommand, succeeded } from './process.js';
export type { CommandRunner, ProcessResult, RunOptions } from './process.js';
export {
  BenchmarkRunner,
  discoverBenchmarks,
  median,
  parseTextSize,
  NO_FLAGS,
} from './benchmarks/runner.js';
export { BaselineProvider, FileBaselineRepository } from './benchmarks/baseline.js';
export type { BaselineMeasure, BaselineRepository } from './benchmarks/baseline.js';
export { HyperparameterTuner, RandomSampler, parseTunables, selectSubset, formatFlag } from './tuner.js';
export type { Sampler, TrialObjective, TuneRequest } from './tuner.js';
export {
  createWeightedScorer,
  scorerFromTask,
  FAILURE_SCORE,
  SCORE_FLOOR,
  INLINING_SCORING,
  REGALLOC_SCORING,
} from './scoring.js';
export type { Scorer } from './scoring.js';
export { IterationLog } from './iteration-log.js';
export {
  loadConfigFromEnv,
  parseHarnessConfig,
  loadTaskConfig,
  parseTaskConfig,
  targetPathOf,
  resolveTool,
} from './config.js';
export type { HarnessConfig, HarnessConfigInput, ScoringConfig, TaskConfig } from './config.js';
export { createConsoleLogger, silentLogger, parseLogLevel } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export * from './errors.js';
export * from './types.js';

// Default export for convenience
import { Orchestrator } from './orchestrator.js';
export default Orchestrator;
