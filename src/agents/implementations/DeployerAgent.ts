/**
 * Deployer Agent
 */

import { FoundryAgent, AgentInitOptions } from '../base/FoundryAgent.js';
import { StrategyAdjustment, clamp } from '../../services/meta-agent/MetaLearner.js';
import { ExecutionError } from '../../errors/foundryErrors.js';
import { AgentRole, DeployerResult, DeployerStrategy, DeployerTask } from '../../types/agent.types.js';

export const DEFAULT_DEPLOYER_STRATEGY: DeployerStrategy = {
  deploymentStrategy: 'rolling',
  replicas: 3,
  environment: 'staging'
};

export const REPLICA_BOUNDS = { min: 2, max: 5 } as const;

export class DeployerAgent extends FoundryAgent<AgentRole.DEPLOYER> {
  constructor(options: AgentInitOptions<AgentRole.DEPLOYER>) {
    super(AgentRole.DEPLOYER, options, DEFAULT_DEPLOYER_STRATEGY);
  }

  protected instantiate(options: AgentInitOptions<AgentRole.DEPLOYER>): DeployerAgent {
    return new DeployerAgent(options);
  }

  protected async performTask(task: DeployerTask): Promise<DeployerResult> {
    if (!task.code.trim()) {
      throw new ExecutionError('no code to deploy', this.agentId);
    }

    const { deploymentStrategy, replicas, environment } = this.strategy;
    const outcome = await this.providers.deployment.deploy(this.agentId, environment, replicas);

    this.logger.info(`Deployed ${task.serviceName} to ${environment}`, {
      deploymentId: outcome.deploymentId,
      healthCheck: outcome.healthCheck
    });

    return {
      deployed: true,
      deploymentId: outcome.deploymentId,
      endpoint: outcome.endpoint,
      version: `v${this.generation + 1}.0.0`,
      strategy: deploymentStrategy,
      replicas,
      environment,
      healthCheck: outcome.healthCheck
    };
  }

  protected adjustStrategy(strategy: DeployerStrategy, adjustment: StrategyAdjustment): DeployerStrategy {
    const replicas = adjustment.explorationDelta > 0 ? strategy.replicas + 1 : strategy.replicas;
    return {
      ...strategy,
      deploymentStrategy: adjustment.switchApproach ? 'blue_green' : strategy.deploymentStrategy,
      replicas: clamp(replicas, REPLICA_BOUNDS.min, REPLICA_BOUNDS.max)
    };
  }
}
