/**
 * Agent Factory
 *
 * Maps each role to its agent class and builds the five-agent staff of a
 * pipeline.
 */

import { FoundryAgent, AgentInitOptions } from './base/FoundryAgent.js';
import { ArchitectAgent } from './implementations/ArchitectAgent.js';
import { CoderAgent } from './implementations/CoderAgent.js';
import { ExecutorAgent } from './implementations/ExecutorAgent.js';
import { CriticAgent } from './implementations/CriticAgent.js';
import { DeployerAgent } from './implementations/DeployerAgent.js';
import { AgentProviders } from '../providers/types.js';
import { AgentRole, StrategyMap } from '../types/agent.types.js';

type AgentConstructor<R extends AgentRole> = new (options: AgentInitOptions<R>) => FoundryAgent<R>;

const AGENT_CLASSES: { [R in AgentRole]: AgentConstructor<R> } = {
  [AgentRole.ARCHITECT]: ArchitectAgent,
  [AgentRole.CODER]: CoderAgent,
  [AgentRole.EXECUTOR]: ExecutorAgent,
  [AgentRole.CRITIC]: CriticAgent,
  [AgentRole.DEPLOYER]: DeployerAgent
};

/**
 * An agent of any role
 */
export type AnyFoundryAgent = FoundryAgent<AgentRole>;

/**
 * One agent per pipeline stage, keyed by role
 */
export type PipelineAgents = { [R in AgentRole]: FoundryAgent<R> };

/**
 * Strategy overrides per role
 */
export type StrategyOverrides = { [R in AgentRole]?: Partial<StrategyMap[R]> };

export function createAgent<R extends AgentRole>(role: R, options: AgentInitOptions<R>): FoundryAgent<R> {
  const AgentClass: AgentConstructor<R> = AGENT_CLASSES[role];
  return new AgentClass(options);
}

/**
 * Create the generation-0 agents of a pipeline, ids `${pipelineId}_${role}`
 */
export function createPipelineAgents(
  pipelineId: string,
  providers: AgentProviders,
  strategies: StrategyOverrides = {}
): PipelineAgents {
  const root = <R extends AgentRole>(role: R, strategy: Partial<StrategyMap[R]> | undefined): FoundryAgent<R> =>
    createAgent(role, { agentId: `${pipelineId}_${role}`, generation: 0, providers, strategy });

  return {
    [AgentRole.ARCHITECT]: root(AgentRole.ARCHITECT, strategies[AgentRole.ARCHITECT]),
    [AgentRole.CODER]: root(AgentRole.CODER, strategies[AgentRole.CODER]),
    [AgentRole.EXECUTOR]: root(AgentRole.EXECUTOR, strategies[AgentRole.EXECUTOR]),
    [AgentRole.CRITIC]: root(AgentRole.CRITIC, strategies[AgentRole.CRITIC]),
    [AgentRole.DEPLOYER]: root(AgentRole.DEPLOYER, strategies[AgentRole.DEPLOYER])
  };
}

/**
 * Stage agents in pipeline order
 */
export function agentsInOrder(agents: PipelineAgents): AnyFoundryAgent[] {
  return [
    agents[AgentRole.ARCHITECT],
    agents[AgentRole.CODER],
    agents[AgentRole.EXECUTOR],
    agents[AgentRole.CRITIC],
    agents[AgentRole.DEPLOYER]
  ];
}
