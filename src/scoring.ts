/**
 * Scorer
 *
 * Maps (measurements, baseline) to one fitness value plus named sub-terms.
 * Scorers are pure: the same inputs always give the same score, and every
 * input (including an empty or all-failed set) gives a finite number.
 */

import { ScoringConfig, TaskConfig, scoringSchema } from './config.js';
import { Baseline, Measurement, ScoreResult } from './types.js';

export type Scorer = (measurements: readonly Measurement[], baseline: Baseline) => ScoreResult;

/** Score of an evaluation where nothing could be measured. */
export const FAILURE_SCORE = -1000;

/** Lowest value a partially successful evaluation can reach. */
export const SCORE_FLOOR = -999;

/**
 * Inlining: text-size reduction first, runtime second.
 */
export const INLINING_SCORING: ScoringConfig = {
  sizeMetric: 'text',
  sizeWeight: 1,
  speedupWeight: 0.1,
  failurePenalty: 10,
};

/**
 * Register allocation: runtime dominates, binary size second.
 */
export const REGALLOC_SCORING: ScoringConfig = {
  sizeMetric: 'binary',
  sizeWeight: 1,
  speedupWeight: 5,
  failurePenalty: 10,
};

function round4(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}

/**
 * Weighted sum of size reduction (percent) and speedup (percent), minus a fixed
 * penalty per failed benchmark.
 */
export function createWeightedScorer(config: Partial<ScoringConfig> = {}): Scorer {
  const { sizeMetric, sizeWeight, speedupWeight, failurePenalty } = scoringSchema.parse(config);

  return (measurements, baseline) => {
    const failed = measurements.filter((m) => !m.ok).length;
    const noisy = measurements.filter((m) => m.ok && m.noisy).length;

    if (measurements.length === 0 || failed === measurements.length) {
      return {
        value: FAILURE_SCORE,
        breakdown: {
          sizeReductionPct: 0,
          avgSpeedup: 0,
          speedupPct: 0,
          failedBenchmarks: failed,
          noisyBenchmarks: 0,
          failurePenalty: 0,
        },
      };
    }

    let total = 0;
    let baselineTotal = 0;
    const speedups: number[] = [];

    for (const m of measurements) {
      if (!m.ok) {
        continue;
      }
      const reference = baseline[m.benchmark];
      const size = sizeMetric === 'text' ? m.textSize : m.binarySize;
      if (reference && size !== null) {
        total += size;
        baselineTotal += sizeMetric === 'text' ? reference.textSize : reference.binarySize;
      }
      if (
        reference &&
        !m.noisy &&
        m.runtimeMs !== null &&
        m.runtimeMs > 0 &&
        reference.runtimeMs !== null &&
        reference.runtimeMs > 0
      ) {
        speedups.push(reference.runtimeMs / m.runtimeMs);
      }
    }

    const sizeReductionPct = baselineTotal > 0 ? (100 * (baselineTotal - total)) / baselineTotal : 0;
    const avgSpeedup = speedups.length > 0 ? speedups.reduce((a, b) => a + b, 0) / speedups.length : 0;
    const speedupPct = avgSpeedup > 0 ? (avgSpeedup - 1) * 100 : 0;
    const penalty = failurePenalty * failed;

    const raw = sizeWeight * sizeReductionPct + speedupWeight * speedupPct - penalty;
    const value = Number.isFinite(raw) ? Math.max(SCORE_FLOOR, round4(raw)) : SCORE_FLOOR;

    return {
      value,
      breakdown: {
        sizeReductionPct: round4(sizeReductionPct),
        avgSpeedup: round4(avgSpeedup),
        speedupPct: round4(speedupPct),
        failedBenchmarks: failed,
        noisyBenchmarks: noisy,
        failurePenalty: penalty,
      },
    };
  };
}

export function scorerFromTask(task: Pick<TaskConfig, 'scoring'>): Scorer {
  if (task.scoring === 'inlining') {
    return createWeightedScorer(INLINING_SCORING);
  }
  if (task.scoring === 'regalloc') {
    return createWeightedScorer(REGALLOC_SCORING);
  }
  return createWeightedScorer(task.scoring);
}
