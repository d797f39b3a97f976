/**
 * Evolution controllers
 *
 * A controller decides what the generator sees next and learns from each
 * finished iteration. The search strategy lives here; the harness only
 * evaluates.
 */

import { HistoryEntry, IterationRecord, RequestContext, ScoreBreakdown } from './types.js';

export interface EvolutionController {
  proposeContext(iteration: number): RequestContext;
  acceptScore(record: IterationRecord): void;
}

export interface ScoredCandidate {
  iteration: number;
  source: string;
  score: number;
  breakdown: ScoreBreakdown;
}

/**
 * Greedy controller: always asks for an improvement on the best candidate
 * seen so far, starting from the seed.
 */
export class HillClimbController implements EvolutionController {
  private seedSource: string;
  private instructions: string | null;
  private scored: ScoredCandidate[] = [];
  private history: HistoryEntry[] = [];

  constructor(seedSource: string, options: { instructions?: string | null } = {}) {
    this.seedSource = seedSource;
    this.instructions = options.instructions ?? null;
  }

  proposeContext(iteration: number): RequestContext {
    const best = this.getBest();
    return {
      iteration,
      best: best
        ? { iteration: best.iteration, source: best.source, score: best.score, breakdown: best.breakdown }
        : { iteration: 0, source: this.seedSource, score: null, breakdown: {} },
      history: [...this.history],
      instructions: this.instructions,
    };
  }

  acceptScore(record: IterationRecord): void {
    this.history.push({
      iteration: record.iteration,
      status: record.status,
      score: record.score,
      breakdown: record.breakdown,
      error: record.error,
    });
    if (record.status === 'scored' && record.score !== null && record.source !== null) {
      this.scored.push({
        iteration: record.iteration,
        source: record.source,
        score: record.score,
        breakdown: record.breakdown,
      });
    }
  }

  /**
   * Get top N candidates by score (earlier iteration wins ties)
   */
  getTop(n: number): ScoredCandidate[] {
    return [...this.scored]
      .sort((a, b) => b.score - a.score || a.iteration - b.iteration)
      .slice(0, n);
  }

  getBest(): ScoredCandidate | null {
    return this.getTop(1)[0] ?? null;
  }

  getHistory(): HistoryEntry[] {
    return [...this.history];
  }
}
