import { describe, expect, it } from 'vitest';
import { HillClimbController } from '../src/controller.js';
import { iterationRecord } from './helpers.js';

const SEED = 'int cost() { return 225; }\n';

describe('HillClimbController', () => {
  it('starts from the seed', () => {
    const controller = new HillClimbController(SEED, { instructions: 'Keep it small.' });

    expect(controller.proposeContext(1)).toEqual({
      iteration: 1,
      best: { iteration: 0, source: SEED, score: null, breakdown: {} },
      history: [],
      instructions: 'Keep it small.',
    });
  });

  it('proposes from the best scored candidate', () => {
    const controller = new HillClimbController(SEED);

    controller.acceptScore(iterationRecord({ iteration: 1, score: 2, source: 'one' }));
    controller.acceptScore(iterationRecord({ iteration: 2, score: 5, source: 'two', breakdown: { sizeReductionPct: 5 } }));
    controller.acceptScore(iterationRecord({ iteration: 3, score: 3, source: 'three' }));

    const context = controller.proposeContext(4);
    expect(context.best).toEqual({ iteration: 2, source: 'two', score: 5, breakdown: { sizeReductionPct: 5 } });
    expect(context.history.map((h) => h.iteration)).toEqual([1, 2, 3]);
    expect(context.instructions).toBeNull();
  });

  it('records skipped and aborted iterations in history only', () => {
    const controller = new HillClimbController(SEED);

    controller.acceptScore(iterationRecord({ iteration: 1, status: 'skipped', score: null, source: null, error: 'timeout' }));
    controller.acceptScore(iterationRecord({ iteration: 2, status: 'aborted', score: null, source: 'bad', error: 'patch' }));

    expect(controller.getBest()).toBeNull();
    expect(controller.getHistory()).toEqual([
      { iteration: 1, status: 'skipped', score: null, breakdown: { sizeReductionPct: 2.5 }, error: 'timeout' },
      { iteration: 2, status: 'aborted', score: null, breakdown: { sizeReductionPct: 2.5 }, error: 'patch' },
    ]);
    expect(controller.proposeContext(3).best.source).toBe(SEED);
  });

  it('ranks by score with the earlier iteration winning ties', () => {
    const controller = new HillClimbController(SEED);

    controller.acceptScore(iterationRecord({ iteration: 1, score: 4, source: 'a' }));
    controller.acceptScore(iterationRecord({ iteration: 2, score: -1000, source: 'b' }));
    controller.acceptScore(iterationRecord({ iteration: 3, score: 4, source: 'c' }));

    expect(controller.getTop(3).map((c) => c.iteration)).toEqual([1, 3, 2]);
  });
});
