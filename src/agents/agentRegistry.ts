/**
 * Agent Registry
 *
 * Every agent instance the orchestrator has created, by id.
 */

import { AnyFoundryAgent } from './agentFactory.js';
import { createLogger } from '../common/logger.js';
import { AgentRole, AgentSnapshot } from '../types/agent.types.js';

const logger = createLogger('AgentRegistry');

export class AgentRegistry {
  private agents: Map<string, AnyFoundryAgent> = new Map();

  /**
   * Register an agent
   * @returns false when the id is already taken
   */
  public registerAgent(agent: AnyFoundryAgent): boolean {
    if (this.agents.has(agent.agentId)) {
      logger.warn(`Agent ${agent.agentId} is already registered`);
      return false;
    }
    this.agents.set(agent.agentId, agent);
    logger.debug(`Registered ${agent.role} agent ${agent.agentId}`, { generation: agent.generation });
    return true;
  }

  public getAgent(agentId: string): AnyFoundryAgent | undefined {
    return this.agents.get(agentId);
  }

  public hasAgent(agentId: string): boolean {
    return this.agents.has(agentId);
  }

  public getAgentsByRole(role: AgentRole): AnyFoundryAgent[] {
    return Array.from(this.agents.values()).filter(agent => agent.role === role);
  }

  public getAllSnapshots(): AgentSnapshot[] {
    return Array.from(this.agents.values()).map(agent => agent.snapshot());
  }

  public get size(): number {
    return this.agents.size;
  }
}
