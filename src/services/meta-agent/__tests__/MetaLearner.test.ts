import { describe, expect, test } from '@jest/globals';

import { MetaLearner, NEUTRAL_ADJUSTMENT, clamp } from '../MetaLearner.js';

function entries(...scores: number[]): Array<{ score: number }> {
  return scores.map(score => ({ score }));
}

describe('MetaLearner', () => {
  const learner = new MetaLearner();

  test('should return the neutral adjustment for an empty history', () => {
    expect(learner.analyze([])).toEqual(NEUTRAL_ADJUSTMENT);
  });

  test('should stay neutral with a single entry but report its statistics', () => {
    const adjustment = learner.analyze(entries(0.5));

    expect(adjustment.direction).toBe('neutral');
    expect(adjustment.explorationDelta).toBe(0);
    expect(adjustment.switchApproach).toBe(false);
    expect(adjustment.sampleSize).toBe(1);
    expect(adjustment.latestScore).toBe(0.5);
  });

  test('should exploit when recent scores are above the average', () => {
    const adjustment = learner.analyze(entries(0.2, 0.2, 0.2, 0.8, 0.9, 1.0));

    expect(adjustment.direction).toBe('improving');
    expect(adjustment.overallAverage).toBe(0.55);
    expect(adjustment.recentAverage).toBe(0.9);
    expect(adjustment.trend).toBe(0.35);
    expect(adjustment.explorationDelta).toBe(-0.05);
    expect(adjustment.switchApproach).toBe(false);
  });

  test('should explore and switch approach when scores decline', () => {
    const adjustment = learner.analyze(entries(0.9, 0.9, 0.9, 0.3, 0.2, 0.1));

    expect(adjustment.direction).toBe('declining');
    expect(adjustment.trend).toBe(-0.35);
    expect(adjustment.explorationDelta).toBe(0.05);
    expect(adjustment.switchApproach).toBe(true);
  });

  test('should nudge exploration by half a step while stable below target', () => {
    const adjustment = learner.analyze(entries(0.5, 0.5, 0.5));

    expect(adjustment.direction).toBe('stable');
    expect(adjustment.explorationDelta).toBe(0.025);
  });

  test('should not nudge while stable at or above target', () => {
    const adjustment = learner.analyze(entries(0.8, 0.8));

    expect(adjustment.direction).toBe('stable');
    expect(adjustment.explorationDelta).toBe(0);
    expect(adjustment.successRate).toBe(1);
  });

  test('should report best, worst and success rate', () => {
    const adjustment = learner.analyze(entries(0.8, 0.5));

    expect(adjustment.bestScore).toBe(0.8);
    expect(adjustment.worstScore).toBe(0.5);
    expect(adjustment.successRate).toBe(0.5);
    expect(adjustment.sampleSize).toBe(2);
  });

  test('should keep the exploration delta within one step', () => {
    const custom = new MetaLearner({ step: 0.1 });
    const histories = [
      entries(0, 1),
      entries(1, 0),
      entries(0.3, 0.3, 0.3, 0.3),
      entries(0.1, 0.9, 0.1, 0.9, 0.1),
      entries(1, 1, 1, 0, 0, 0, 0, 0)
    ];

    for (const history of histories) {
      const { explorationDelta } = custom.analyze(history);
      expect(Math.abs(explorationDelta)).toBeLessThanOrEqual(0.1);
    }
  });

  test('should use the configured recent window', () => {
    const wide = new MetaLearner({ recentWindow: 6 });
    const adjustment = wide.analyze(entries(0.2, 0.2, 0.2, 0.8, 0.9, 1.0));

    expect(adjustment.recentAverage).toBe(adjustment.overallAverage);
    expect(adjustment.direction).toBe('stable');
  });
});

describe('clamp', () => {
  test('should bound values on both sides', () => {
    expect(clamp(2, 0, 1)).toBe(1);
    expect(clamp(-1, 0, 1)).toBe(0);
    expect(clamp(0.5, 0, 1)).toBe(0.5);
  });
});
