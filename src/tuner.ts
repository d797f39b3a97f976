/**
 * Hyperparameter Tuner
 *
 * Nested search over the numeric flags a candidate declares with annotations
 * such as:
 *
 *   // [hyperparam]: ae-inline-base-threshold, int, 0, 500
 *   static cl::opt<int> BaseThreshold("ae-inline-base-threshold", cl::init(225));
 *
 * Only the flags passed to the toolchain change between trials; the candidate
 * source is never touched. How values are proposed is up to the Sampler.
 */

import { errorMessage } from './errors.js';
import { Logger, silentLogger } from './logger.js';
import { BenchmarkSpec, TrialRecord, Tunable, TunableType, TuningResult } from './types.js';

const NUMBER = '(-?\\d+(?:\\.\\d+)?)';

const DEFAULT_PATTERNS = [
  new RegExp(`cl::init\\(\\s*${NUMBER}\\s*\\)`),
  new RegExp(`=\\s*${NUMBER}`),
  new RegExp(`\\(\\s*${NUMBER}\\s*\\)`),
];

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function annotationPattern(marker: string): RegExp {
  return new RegExp(
    `//\\s*${escapeRegExp(marker)}:\\s*([\\w-]+)\\s*,\\s*(\\w+)\\s*,\\s*${NUMBER}\\s*,\\s*${NUMBER}`
  );
}

function isTunableType(value: string): value is TunableType {
  return value === 'int' || value === 'float';
}

function inBounds(value: number, tunable: Pick<Tunable, 'type' | 'min' | 'max'>): boolean {
  if (tunable.type === 'int' && !Number.isInteger(value)) {
    return false;
  }
  return value >= tunable.min && value <= tunable.max;
}

function defaultFrom(line: string | undefined): number | null {
  if (line === undefined) {
    return null;
  }
  for (const pattern of DEFAULT_PATTERNS) {
    const match = line.match(pattern);
    if (match) {
      return Number(match[1]);
    }
  }
  return null;
}

/**
 * Extract the tunables a candidate declares. The default is read from the next
 * non-blank line (the declaration the annotation sits on top of).
 * Annotations with an unknown type or inverted bounds are ignored.
 */
export function parseTunables(source: string, marker: string): Tunable[] {
  const pattern = annotationPattern(marker);
  const lines = source.split('\n');
  const tunables: Tunable[] = [];
  const seen = new Set<string>();

  lines.forEach((line, index) => {
    const match = line.match(pattern);
    if (!match) {
      return;
    }
    const [, name, type, minText, maxText] = match;
    const min = Number(minText);
    const max = Number(maxText);
    if (!isTunableType(type) || min > max || seen.has(name)) {
      return;
    }
    if (type === 'int' && (!Number.isInteger(min) || !Number.isInteger(max))) {
      return;
    }

    const declaration = lines.slice(index + 1).find((next) => next.trim().length > 0);
    const isAnotherAnnotation = declaration !== undefined && pattern.test(declaration);
    const candidateDefault = isAnotherAnnotation ? null : defaultFrom(declaration);
    const defaultValue =
      candidateDefault !== null && inBounds(candidateDefault, { type, min, max }) ? candidateDefault : null;

    seen.add(name);
    tunables.push({ name, type, min, max, defaultValue });
  });

  return tunables;
}

/**
 * Pull a suggested value into the tunable's range; integers are rounded.
 */
export function clampToBounds(value: number, tunable: Pick<Tunable, 'type' | 'min' | 'max'>): number {
  const clamped = Math.min(Math.max(value, tunable.min), tunable.max);
  return tunable.type === 'int' ? Math.round(clamped) : clamped;
}

export function formatFlag(name: string, value: number): string {
  return `-${name}=${value}`;
}

/**
 * Benchmarks used for tuning: the named subset, or the first few when none of
 * the names are present.
 */
export function selectSubset(
  benchmarks: readonly BenchmarkSpec[],
  names: readonly string[],
  fallbackCount = 3
): BenchmarkSpec[] {
  const wanted = new Set(names);
  const subset = benchmarks.filter((b) => wanted.has(b.name));
  return subset.length > 0 ? subset : benchmarks.slice(0, fallbackCount);
}

export interface Sampler {
  suggest(tunable: Tunable, trial: number): number;
}

/**
 * Uniform sampling within each tunable's bounds. The first trial can reuse
 * the declared defaults so the tuned result is never worse than the
 * untuned one on the subset.
 */
export class RandomSampler implements Sampler {
  private random: () => number;
  private startFromDefaults: boolean;

  constructor(options: { random?: () => number; startFromDefaults?: boolean } = {}) {
    this.random = options.random ?? Math.random;
    this.startFromDefaults = options.startFromDefaults ?? true;
  }

  suggest(tunable: Tunable, trial: number): number {
    if (this.startFromDefaults && trial === 0 && tunable.defaultValue !== null) {
      return tunable.defaultValue;
    }
    const r = Math.min(Math.max(this.random(), 0), 1);
    if (tunable.type === 'int') {
      const span = tunable.max - tunable.min + 1;
      return Math.min(tunable.min + Math.floor(r * span), tunable.max);
    }
    return tunable.min + r * (tunable.max - tunable.min);
  }
}

/**
 * Evaluates one trial's flags on the tuning subset and returns its score.
 */
export type TrialObjective = (flags: string[], trial: number) => Promise<number>;

export interface TuneRequest {
  tunables: readonly Tunable[];
  trials: number;
  objective: TrialObjective;
}

export class HyperparameterTuner {
  private sampler: Sampler;
  private logger: Logger;

  constructor(options: { sampler?: Sampler; logger?: Logger } = {}) {
    this.sampler = options.sampler ?? new RandomSampler();
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run exactly `trials` trials. Returns null when there is nothing to tune.
   */
  async tune(request: TuneRequest): Promise<TuningResult | null> {
    const { tunables, trials, objective } = request;
    if (trials <= 0 || tunables.length === 0) {
      return null;
    }

    const records: TrialRecord[] = [];
    let best: TrialRecord | null = null;

    for (let trial = 0; trial < trials; trial++) {
      const params: Record<string, number> = {};
      const flags: string[] = [];
      let rejected: string | null = null;
      for (const tunable of tunables) {
        const suggested = this.sampler.suggest(tunable, trial);
        if (!Number.isFinite(suggested)) {
          if (rejected === null) {
            rejected = `sampler suggested ${suggested} for ${tunable.name}`;
          }
          params[tunable.name] = suggested;
          continue;
        }
        const value = clampToBounds(suggested, tunable);
        if (value !== suggested) {
          this.logger.debug(`Clamped ${tunable.name} from ${suggested} to ${value}`);
        }
        params[tunable.name] = value;
        flags.push(formatFlag(tunable.name, value));
      }

      let record: TrialRecord;
      if (rejected !== null) {
        record = { trial, params, flags, objective: null, error: rejected };
      } else {
        try {
          const value = await objective(flags, trial);
          record = Number.isFinite(value)
            ? { trial, params, flags, objective: value, error: null }
            : { trial, params, flags, objective: null, error: `non-finite objective ${value}` };
        } catch (error) {
          record = { trial, params, flags, objective: null, error: errorMessage(error) };
        }
      }

      this.logger.info(`Trial ${trial + 1}/${trials}`, { params, objective: record.objective, error: record.error });
      records.push(record);

      if (record.objective !== null && (best === null || best.objective === null || record.objective > best.objective)) {
        best = record;
      }
    }

    if (best === null) {
      this.logger.warn('Every tuning trial failed; keeping declared defaults');
      return { bestParams: {}, bestFlags: [], bestObjective: null, trials: records };
    }

    return {
      bestParams: best.params,
      bestFlags: best.flags,
      bestObjective: best.objective,
      trials: records,
    };
  }
}
