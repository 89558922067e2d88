/**
 * Foundry Agent
 *
 * Abstract base class for the five pipeline roles. Subclasses implement the
 * role logic and the mapping from a strategy adjustment to their own
 * parameters; the base class owns identity, memory and error wrapping.
 */

import { AgentContext, AgentIdentity } from './AgentContext.js';
import { AgentProviders } from '../../providers/types.js';
import { ExecutionError } from '../../errors/foundryErrors.js';
import { errorMessage, Logger } from '../../common/logger.js';
import { MemoryEntry, MemoryEntryInput } from '../../services/memory/AgentMemoryLog.js';
import { StrategyAdjustment, clamp } from '../../services/meta-agent/MetaLearner.js';
import { scoreStage } from '../../scoring/stageScorer.js';
import {
  AgentRole,
  AgentSnapshot,
  AgentStatus,
  StageResultMap,
  StageTaskMap,
  StrategyMap
} from '../../types/agent.types.js';

export const TEMPERATURE_BOUNDS = { min: 0.1, max: 1.0 } as const;

/**
 * Options for creating an agent
 */
export interface AgentInitOptions<R extends AgentRole> extends AgentIdentity {
  providers: AgentProviders;

  // Overrides merged over the role's default strategy
  strategy?: Partial<StrategyMap[R]>;
}

/**
 * Move a temperature by an exploration delta, keeping it in bounds
 */
export function nudgeTemperature(temperature: number, delta: number): number {
  const next = Math.round((temperature + delta) * 100) / 100;
  return clamp(next, TEMPERATURE_BOUNDS.min, TEMPERATURE_BOUNDS.max);
}

export abstract class FoundryAgent<R extends AgentRole> {
  protected context: AgentContext<R>;
  protected providers: AgentProviders;

  constructor(role: R, options: AgentInitOptions<R>, defaults: StrategyMap[R]) {
    this.context = new AgentContext(
      role,
      { agentId: options.agentId, generation: options.generation, parentId: options.parentId },
      { ...defaults, ...options.strategy }
    );
    this.providers = options.providers;
  }

  /**
   * Run the role logic once
   * @throws ExecutionError for any failure, including provider errors
   */
  public async execute(task: StageTaskMap[R]): Promise<StageResultMap[R]> {
    try {
      return await this.performTask(task);
    } catch (error) {
      if (error instanceof ExecutionError) {
        throw error;
      }
      throw new ExecutionError(errorMessage(error), this.agentId, error);
    }
  }

  /**
   * Rate a result produced by this agent's role
   */
  public score(task: StageTaskMap[R], result: StageResultMap[R]): number {
    return scoreStage(this.role, task, result);
  }

  public remember(
    input: MemoryEntryInput<StageTaskMap[R], StageResultMap[R]>
  ): MemoryEntry<StageTaskMap[R], StageResultMap[R]> {
    return this.context.memory.append(input);
  }

  /**
   * Apply a meta-learning adjustment to the strategy parameters.
   * A neutral adjustment leaves them untouched.
   */
  public adaptStrategy(adjustment: StrategyAdjustment): void {
    if (adjustment.direction === 'neutral' && !adjustment.switchApproach) {
      return;
    }

    const before = this.context.strategy;
    const after = this.adjustStrategy(before, adjustment);
    this.context.setStrategy(after);

    this.logger.debug('Strategy adapted', {
      direction: adjustment.direction,
      explorationDelta: adjustment.explorationDelta,
      switchApproach: adjustment.switchApproach,
      strategy: after
    });
  }

  /**
   * Build the next-generation agent of the same role with a copy of this
   * agent's strategy. Lineage on this agent is not touched; callers record
   * the child with addChild once the spawn is committed.
   */
  public createChild(childId: string): FoundryAgent<R> {
    return this.instantiate({
      agentId: childId,
      generation: this.generation + 1,
      parentId: this.agentId,
      providers: this.providers,
      strategy: this.strategy
    });
  }

  public setStatus(status: AgentStatus): void {
    this.context.setStatus(status);
  }

  public addChild(childId: string): void {
    this.context.addChild(childId);
  }

  public snapshot(): AgentSnapshot {
    return {
      agentId: this.agentId,
      role: this.role,
      generation: this.generation,
      ...(this.parentId !== undefined ? { parentId: this.parentId } : {}),
      childIds: this.context.childIds,
      status: this.status,
      strategy: this.strategy,
      memorySize: this.context.memory.size,
      performance: this.context.memory.summarize()
    };
  }

  public get agentId(): string {
    return this.context.agentId;
  }

  public get role(): R {
    return this.context.role;
  }

  public get generation(): number {
    return this.context.generation;
  }

  public get parentId(): string | undefined {
    return this.context.parentId;
  }

  public get status(): AgentStatus {
    return this.context.status;
  }

  public get strategy(): StrategyMap[R] {
    return this.context.strategy;
  }

  public get memory(): ReadonlyArray<MemoryEntry<StageTaskMap[R], StageResultMap[R]>> {
    return this.context.memory.getEntries();
  }

  protected get logger(): Logger {
    return this.context.logger;
  }

  protected abstract instantiate(options: AgentInitOptions<R>): FoundryAgent<R>;

  protected abstract performTask(task: StageTaskMap[R]): Promise<StageResultMap[R]>;

  protected abstract adjustStrategy(
    strategy: StrategyMap[R],
    adjustment: StrategyAdjustment
  ): StrategyMap[R];
}
