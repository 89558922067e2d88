/**
 * Meta-Learner
 *
 * Reads an agent's whole memory log and derives a bounded strategy
 * adjustment. Analysis is pure; agents apply the adjustment to their own
 * parameters.
 *
 * Rule:
 * - fewer than 2 entries: neutral adjustment
 * - trend = average of the last `recentWindow` scores - average of all scores
 * - improving (trend > epsilon): exploit, explorationDelta = -step
 * - declining (trend < -epsilon): explore, explorationDelta = +step
 * - stable: +step / 2 while the latest score is below target, otherwise 0
 * - switchApproach when the latest score is strictly below the previous one
 */

import { createLogger } from '../../common/logger.js';

const logger = createLogger('MetaLearner');

export type TrendDirection = 'improving' | 'declining' | 'stable' | 'neutral';

export interface StrategyAdjustment {
  direction: TrendDirection;
  trend: number;
  overallAverage: number;
  recentAverage: number;
  bestScore: number;
  worstScore: number;
  latestScore: number;
  sampleSize: number;

  /** Fraction of entries that reached the target score */
  successRate: number;

  /** Nudge for exploration knobs, always within [-step, step] */
  explorationDelta: number;

  /** Whether the agent should change its categorical approach */
  switchApproach: boolean;
}

export interface MetaLearnerConfig {
  /** Number of most recent entries compared against the overall average */
  recentWindow: number;

  /** Largest exploration nudge per adjustment */
  step: number;

  /** Score considered a success */
  targetScore: number;

  /** Trend magnitude treated as flat */
  stableEpsilon: number;
}

export const DEFAULT_META_LEARNER_CONFIG: MetaLearnerConfig = {
  recentWindow: 3,
  step: 0.05,
  targetScore: 0.75,
  stableEpsilon: 0.01
};

export const NEUTRAL_ADJUSTMENT: Readonly<StrategyAdjustment> = Object.freeze<StrategyAdjustment>({
  direction: 'neutral',
  trend: 0,
  overallAverage: 0,
  recentAverage: 0,
  bestScore: 0,
  worstScore: 0,
  latestScore: 0,
  sampleSize: 0,
  successRate: 0,
  explorationDelta: 0,
  switchApproach: false
});

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function average(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export class MetaLearner {
  private config: MetaLearnerConfig;

  constructor(config: Partial<MetaLearnerConfig> = {}) {
    this.config = { ...DEFAULT_META_LEARNER_CONFIG, ...config };
  }

  public getConfig(): MetaLearnerConfig {
    return { ...this.config };
  }

  /**
   * Analyze scored history, oldest entry first
   */
  public analyze(entries: ReadonlyArray<{ score: number }>): StrategyAdjustment {
    const scores = entries.map(entry => entry.score);

    if (scores.length === 0) {
      return { ...NEUTRAL_ADJUSTMENT };
    }

    const latestScore = scores[scores.length - 1];
    const overallAverage = round4(average(scores));
    const bestScore = Math.max(...scores);
    const worstScore = Math.min(...scores);
    const successRate = round4(scores.filter(score => score >= this.config.targetScore).length / scores.length);

    if (scores.length < 2) {
      return {
        ...NEUTRAL_ADJUSTMENT,
        overallAverage,
        recentAverage: overallAverage,
        bestScore,
        worstScore,
        latestScore,
        sampleSize: 1,
        successRate
      };
    }

    const window = Math.max(1, this.config.recentWindow);
    const recentAverage = round4(average(scores.slice(-window)));
    const trend = round4(recentAverage - overallAverage);
    const { step, stableEpsilon, targetScore } = this.config;

    let direction: TrendDirection;
    let explorationDelta: number;

    if (trend > stableEpsilon) {
      direction = 'improving';
      explorationDelta = -step;
    } else if (trend < -stableEpsilon) {
      direction = 'declining';
      explorationDelta = step;
    } else {
      direction = 'stable';
      explorationDelta = latestScore < targetScore ? step / 2 : 0;
    }

    const adjustment: StrategyAdjustment = {
      direction,
      trend,
      overallAverage,
      recentAverage,
      bestScore,
      worstScore,
      latestScore,
      sampleSize: scores.length,
      successRate,
      explorationDelta,
      switchApproach: latestScore < scores[scores.length - 2]
    };

    logger.debug('Memory analyzed', {
      direction,
      trend,
      sampleSize: adjustment.sampleSize,
      switchApproach: adjustment.switchApproach
    });

    return adjustment;
  }
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
