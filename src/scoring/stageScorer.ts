/**
 * Stage Scorer
 *
 * Pure heuristics rating each stage's output in [0, 1]. The same role, task
 * and result always produce the same score. Results that do not have the
 * shape their role expects score 0.
 */

import { AgentRole, StageResultMap, StageTaskMap } from '../types/agent.types.js';
import { EvaluationError } from '../errors/foundryErrors.js';
import { createLogger, errorMessage } from '../common/logger.js';

const logger = createLogger('StageScorer');

type StageScorer<R extends AgentRole> = (task: StageTaskMap[R], result: StageResultMap[R]) => number;

const STRUCTURE_PATTERN = /\b(class|function|def)\b/;

/**
 * Whether source text declares a class or function
 */
export function hasCodeStructure(code: string): boolean {
  return STRUCTURE_PATTERN.test(code);
}

export function roundScore(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Weighted heuristics per role
 */
export const STAGE_SCORERS: { [R in AgentRole]: StageScorer<R> } = {
  // components found 0.3, substantial text 0.3, complexity < 5 ? 0.4 : 0.2
  [AgentRole.ARCHITECT]: (_task, result) => {
    let score = 0;
    if (result.components.length > 0) score += 0.3;
    if (result.architecture.length > 100) score += 0.3;
    score += result.estimatedComplexity < 5 ? 0.4 : 0.2;
    return score;
  },

  // length 0.3, structure 0.3, line count 0.2, healing 0.2 / 0.1 / 0
  [AgentRole.CODER]: (_task, result) => {
    let score = 0;
    if (result.code.length > 50) score += 0.3;
    if (hasCodeStructure(result.code)) score += 0.3;
    if (result.linesOfCode > 10 && result.linesOfCode < 500) score += 0.2;

    if (result.issuesFixed === 0) {
      score += 0.2;
    } else if (result.issuesFixed <= 2) {
      score += 0.1;
    }
    return score;
  },

  [AgentRole.EXECUTOR]: (_task, result) => {
    let score = 0;
    if (result.success) score += 0.5;
    if (result.exitCode === 0) score += 0.3;
    if (result.durationMs < 1000) score += 0.2;
    return score;
  },

  [AgentRole.CRITIC]: (_task, result) => {
    const substance = result.critique.length > 50 ? 1 : 0;
    const coverage = Math.min(result.suggestions.length / 3, 1);
    return substance * 0.3 + coverage * 0.3 + result.overallScore * 0.4;
  },

  [AgentRole.DEPLOYER]: (_task, result) => {
    let score = 0;
    if (result.deployed) score += 0.4;
    if (result.healthCheck === 'passing') score += 0.3;
    if (result.replicas >= 2) score += 0.3;
    return score;
  }
};

function isScorerRole(role: string): role is AgentRole {
  return Object.prototype.hasOwnProperty.call(STAGE_SCORERS, role);
}

/**
 * Score one stage result
 * @returns Score in [0, 1] rounded to 4 decimals
 * @throws EvaluationError when the role has no scorer
 */
export function scoreStage<R extends AgentRole>(
  role: R,
  task: StageTaskMap[R],
  result: StageResultMap[R]
): number {
  if (!isScorerRole(role)) {
    throw new EvaluationError('no scorer registered', String(role));
  }

  if (typeof result !== 'object' || result === null) {
    return 0;
  }

  const scorer: StageScorer<R> = STAGE_SCORERS[role];
  let raw: number;
  try {
    raw = scorer(task, result);
  } catch (error) {
    logger.warn('Malformed stage result scored as 0', { role, error: errorMessage(error) });
    return 0;
  }

  if (!Number.isFinite(raw)) {
    return 0;
  }
  return roundScore(Math.min(1, Math.max(0, raw)));
}
