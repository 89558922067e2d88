/**
 * Reflexion Loop
 *
 * Drives one agent through bounded execute → score → store → adjust
 * iterations. Stops early once a score reaches the performance threshold and
 * always returns the best result seen, even when no iteration met it.
 */

import { FoundryAgent } from '../../agents/base/FoundryAgent.js';
import { MetaLearner } from '../meta-agent/MetaLearner.js';
import { withTimeout } from '../../utils/timeout.js';
import { createLogger, errorMessage } from '../../common/logger.js';
import {
  BudgetExhaustedError,
  EvaluationError,
  ExecutionError,
  InvalidConfigurationError
} from '../../errors/foundryErrors.js';
import { AgentRole, AgentStatus, StageResultMap, StageTaskMap } from '../../types/agent.types.js';

const logger = createLogger('ReflexionLoop');

export interface ReflexionOptions {
  /** Hard bound on iterations, at least 1 */
  maxLoops: number;

  /** Score in [0, 1] that ends the loop early */
  performanceThreshold: number;

  /** Bound on each execute step; 0 or absent disables it */
  stageTimeoutMs?: number;
}

export type ReflexionStatus = 'completed' | 'failed';

export interface ReflexionResult<TResult> {
  bestResult: TResult | null;
  bestScore: number;
  loopsExecuted: number;
  status: ReflexionStatus;
  thresholdMet: boolean;

  /** Score of every iteration, in order; failed iterations score 0 */
  scores: number[];

  failures: number;

  /** Set when the budget ran out below the threshold */
  budgetExhausted?: BudgetExhaustedError;
}

export function validateReflexionOptions(options: ReflexionOptions): void {
  if (!Number.isInteger(options.maxLoops) || options.maxLoops < 1) {
    throw new InvalidConfigurationError(`maxLoops must be a positive integer, got ${options.maxLoops}`);
  }
  if (!(options.performanceThreshold >= 0 && options.performanceThreshold <= 1)) {
    throw new InvalidConfigurationError(
      `performanceThreshold must be within [0, 1], got ${options.performanceThreshold}`
    );
  }
  if (options.stageTimeoutMs !== undefined && !(options.stageTimeoutMs >= 0)) {
    throw new InvalidConfigurationError(`stageTimeoutMs must be non-negative, got ${options.stageTimeoutMs}`);
  }
}

/**
 * Run the reflexion loop for one agent and task
 * @throws InvalidConfigurationError for invalid options; iteration failures never throw
 */
export async function runReflexionLoop<R extends AgentRole>(
  agent: FoundryAgent<R>,
  task: StageTaskMap[R],
  options: ReflexionOptions,
  metaLearner: MetaLearner = new MetaLearner()
): Promise<ReflexionResult<StageResultMap[R]>> {
  validateReflexionOptions(options);

  const { maxLoops, performanceThreshold, stageTimeoutMs } = options;
  const scores: number[] = [];
  let bestResult: StageResultMap[R] | null = null;
  let bestScore = 0;
  let hasBest = false;
  let failures = 0;
  let thresholdMet = false;

  agent.setStatus(AgentStatus.RUNNING);
  logger.debug(`Starting reflexion loop for ${agent.agentId}`, { maxLoops, performanceThreshold });

  for (let iteration = 1; iteration <= maxLoops; iteration++) {
    let score: number;
    let succeeded = false;

    try {
      const execution = agent.execute(task);
      const result = stageTimeoutMs
        ? await withTimeout(execution, stageTimeoutMs, () =>
            new ExecutionError(`timed out after ${stageTimeoutMs}ms`, agent.agentId))
        : await execution;

      score = agent.score(task, result);
      agent.remember({ task, action: agent.role, result, score });

      if (!hasBest || score > bestScore) {
        bestResult = result;
        bestScore = score;
        hasBest = true;
      }
      succeeded = true;
    } catch (error) {
      if (!(error instanceof ExecutionError) && !(error instanceof EvaluationError)) {
        agent.setStatus(AgentStatus.FAILED);
        throw error;
      }

      failures++;
      score = 0;
      agent.remember({ task, action: agent.role, result: null, score, failed: true, error: error.message });
      logger.warn(`Iteration ${iteration} of ${agent.agentId} failed`, { error: errorMessage(error) });
    }

    scores.push(score);
    logger.debug(`Iteration ${iteration} of ${agent.agentId} scored ${score}`);

    if (succeeded && score >= performanceThreshold) {
      thresholdMet = true;
      break;
    }

    agent.adaptStrategy(metaLearner.analyze(agent.memory));
  }

  const status: ReflexionStatus = failures === scores.length ? 'failed' : 'completed';
  agent.setStatus(status === 'completed' ? AgentStatus.COMPLETED : AgentStatus.FAILED);

  const result: ReflexionResult<StageResultMap[R]> = {
    bestResult,
    bestScore,
    loopsExecuted: scores.length,
    status,
    thresholdMet,
    scores,
    failures
  };

  if (!thresholdMet) {
    result.budgetExhausted = new BudgetExhaustedError(agent.agentId, scores.length, bestScore, performanceThreshold);
    logger.warn(result.budgetExhausted.message);
  }

  return result;
}
