/**
 * Agent Context
 *
 * Identity, lineage, lifecycle status, strategy parameters and memory of one
 * agent instance.
 */

import { createLogger, Logger } from '../../common/logger.js';
import { AgentMemoryLog } from '../../services/memory/AgentMemoryLog.js';
import {
  AgentRole,
  AgentStatus,
  StageResultMap,
  StageTaskMap,
  StrategyMap
} from '../../types/agent.types.js';

export interface AgentIdentity {
  agentId: string;

  // 0 for agents created with a pipeline
  generation: number;

  // Absent for roots
  parentId?: string;
}

export class AgentContext<R extends AgentRole> {
  public readonly agentId: string;
  public readonly role: R;
  public readonly generation: number;
  public readonly parentId?: string;
  public readonly logger: Logger;
  public readonly memory: AgentMemoryLog<StageTaskMap[R], StageResultMap[R]>;

  private _status: AgentStatus = AgentStatus.IDLE;
  private _strategy: StrategyMap[R];
  private _childIds: string[] = [];

  constructor(role: R, identity: AgentIdentity, strategy: StrategyMap[R]) {
    this.agentId = identity.agentId;
    this.role = role;
    this.generation = identity.generation;
    this.parentId = identity.parentId;
    this.logger = createLogger(`Agent:${identity.agentId}`, { role });
    this.memory = new AgentMemoryLog();
    this._strategy = { ...strategy };
  }

  public get status(): AgentStatus {
    return this._status;
  }

  public setStatus(status: AgentStatus): void {
    if (status === this._status) return;
    this.logger.debug(`Status ${this._status} -> ${status}`);
    this._status = status;
  }

  /**
   * Copy of the current strategy parameters
   */
  public get strategy(): StrategyMap[R] {
    return { ...this._strategy };
  }

  public setStrategy(strategy: StrategyMap[R]): void {
    this._strategy = { ...strategy };
  }

  public get childIds(): string[] {
    return [...this._childIds];
  }

  public addChild(childId: string): void {
    if (!this._childIds.includes(childId)) {
      this._childIds.push(childId);
    }
  }
}
