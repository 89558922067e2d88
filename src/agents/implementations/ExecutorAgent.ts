/**
 * Executor Agent
 *
 * Runs generated code in the sandbox provider. A non-zero exit code is a
 * low-scoring result, not a failure of the agent.
 */

import { FoundryAgent, AgentInitOptions } from '../base/FoundryAgent.js';
import { StrategyAdjustment, clamp } from '../../services/meta-agent/MetaLearner.js';
import { AgentRole, ExecutorResult, ExecutorStrategy, ExecutorTask } from '../../types/agent.types.js';

export const DEFAULT_EXECUTOR_STRATEGY: ExecutorStrategy = {
  environment: 'sandboxed',
  timeoutMs: 30000
};

export const TIMEOUT_BOUNDS = { min: 1000, max: 60000 } as const;

export class ExecutorAgent extends FoundryAgent<AgentRole.EXECUTOR> {
  constructor(options: AgentInitOptions<AgentRole.EXECUTOR>) {
    super(AgentRole.EXECUTOR, options, DEFAULT_EXECUTOR_STRATEGY);
  }

  protected instantiate(options: AgentInitOptions<AgentRole.EXECUTOR>): ExecutorAgent {
    return new ExecutorAgent(options);
  }

  protected async performTask(task: ExecutorTask): Promise<ExecutorResult> {
    const { environment, timeoutMs } = this.strategy;
    const run = await this.providers.sandbox.run(task.code, task.language, timeoutMs);

    if (run.exitCode !== 0) {
      this.logger.debug('Sandbox run exited with an error', { exitCode: run.exitCode, stderr: run.stderr });
    }

    return {
      success: run.exitCode === 0,
      output: run.stdout,
      error: run.stderr,
      exitCode: run.exitCode,
      durationMs: run.durationMs,
      environment
    };
  }

  protected adjustStrategy(strategy: ExecutorStrategy, adjustment: StrategyAdjustment): ExecutorStrategy {
    const timeoutMs = Math.round(strategy.timeoutMs * (1 + adjustment.explorationDelta));
    return {
      environment: adjustment.switchApproach ? 'optimized_sandbox' : strategy.environment,
      timeoutMs: clamp(timeoutMs, TIMEOUT_BOUNDS.min, TIMEOUT_BOUNDS.max)
    };
  }
}
