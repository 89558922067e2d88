/**
 * Pipeline Orchestrator
 *
 * Runs the architect → coder → executor → critic → deployer pipeline. Each
 * stage is one reflexion loop whose task derives from the earlier stages'
 * best results. When the role-weighted pipeline score reaches the evolution
 * threshold every stage agent spawns one child into the evolution tree.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';

import { createLogger, errorMessage } from '../common/logger.js';
import { AgentProviders } from '../providers/types.js';
import { FoundryAgent } from '../agents/base/FoundryAgent.js';
import { AgentRegistry } from '../agents/agentRegistry.js';
import {
  PipelineAgents,
  StrategyOverrides,
  agentsInOrder,
  createPipelineAgents
} from '../agents/agentFactory.js';
import { runReflexionLoop } from '../services/reflexion/ReflexionLoop.js';
import { MetaLearner } from '../services/meta-agent/MetaLearner.js';
import { EvolutionTree } from '../services/evolution/EvolutionTree.js';
import {
  EvolutionNode,
  EvolutionStats,
  EvolutionTreeJSON,
  SpawnReason
} from '../services/evolution/types.js';
import { DEFAULT_FOUNDRY_CONFIG, FoundryConfig } from '../config/foundry.config.js';
import {
  CollisionError,
  EvolutionStructureError,
  PipelineNotFoundError,
  PipelineStateError
} from '../errors/foundryErrors.js';
import {
  AgentRole,
  AgentSnapshot,
  PIPELINE_STAGES,
  StageTaskMap
} from '../types/agent.types.js';
import {
  PipelineExecutionResult,
  PipelineOptions,
  PipelineStages,
  PipelineStatus,
  PipelineStatusReport,
  PipelineSummary,
  SpawnEvent,
  SpawnFailure,
  StageOutcome
} from './types.js';

const logger = createLogger('PipelineOrchestrator');

interface PipelineRecord {
  pipelineId: string;
  description: string;
  requirements: string[];
  constraints: string[];
  language: string;
  serviceName: string;
  agents: PipelineAgents;
  stages: PipelineStages;
  status: PipelineStatus;
  overallScore: number | null;
  createdAt: Date;
  completedAt?: Date;
  error?: string;

  // Children spawned by the last evolution step, by role
  children: Partial<PipelineAgents>;
  evolvedFrom?: string;
  evolvedInto?: string;
}

/**
 * State of one executePipeline call
 */
interface ExecutionRun {
  record: PipelineRecord;
  aborted: boolean;
}

export interface OrchestratorOptions {
  providers: AgentProviders;
  config?: FoundryConfig;
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Child agents of every role, or null when any role has none
 */
function completeStaff(children: Partial<PipelineAgents>): PipelineAgents | null {
  const architect = children[AgentRole.ARCHITECT];
  const coder = children[AgentRole.CODER];
  const executor = children[AgentRole.EXECUTOR];
  const critic = children[AgentRole.CRITIC];
  const deployer = children[AgentRole.DEPLOYER];

  if (!architect || !coder || !executor || !critic || !deployer) {
    return null;
  }

  return {
    [AgentRole.ARCHITECT]: architect,
    [AgentRole.CODER]: coder,
    [AgentRole.EXECUTOR]: executor,
    [AgentRole.CRITIC]: critic,
    [AgentRole.DEPLOYER]: deployer
  };
}

export class PipelineOrchestrator extends EventEmitter {
  private providers: AgentProviders;
  private tree: EvolutionTree = new EvolutionTree();
  private config: FoundryConfig;
  private registry: AgentRegistry = new AgentRegistry();
  private pipelines: Map<string, PipelineRecord> = new Map();
  private metaLearner: MetaLearner;

  constructor(options: OrchestratorOptions) {
    super();
    this.providers = options.providers;
    this.config = options.config ?? DEFAULT_FOUNDRY_CONFIG;
    this.metaLearner = new MetaLearner({
      recentWindow: this.config.metaLearning.recentWindow,
      step: this.config.metaLearning.step,
      targetScore: this.config.performanceThreshold
    });
  }

  /**
   * Create a pipeline with five generation-0 agents, each registered as a
   * root of the evolution tree with score 0
   * @returns The pipeline id
   */
  public createPipeline(description: string, requirements: string[] = [], options: PipelineOptions = {}): string {
    const pipelineId = this.newPipelineId();

    const strategies: StrategyOverrides = {
      ...options.strategies,
      [AgentRole.DEPLOYER]: {
        environment: this.config.deploymentEnvironment,
        ...options.strategies?.[AgentRole.DEPLOYER]
      }
    };
    const agents = createPipelineAgents(pipelineId, this.providers, strategies);

    for (const agent of agentsInOrder(agents)) {
      this.tree.addNode({
        nodeId: agent.agentId,
        generation: 0,
        performanceScore: 0,
        metadata: { role: agent.role, pipelineId, reason: SpawnReason.GENESIS }
      });
      this.registry.registerAgent(agent);
    }

    return this.addPipeline({
      pipelineId,
      description,
      requirements: [...requirements],
      constraints: [...(options.constraints ?? [])],
      language: options.language ?? this.config.language,
      serviceName: options.serviceName ?? `service-${pipelineId}`,
      agents
    });
  }

  /**
   * Run every stage in order, aggregate and evolve. A pipeline runs once;
   * evolvePipeline creates the next one.
   * @throws PipelineNotFoundError for unknown ids, PipelineStateError unless the pipeline is new
   */
  public async executePipeline(pipelineId: string): Promise<PipelineExecutionResult> {
    const record = this.requirePipeline(pipelineId);
    if (record.status === 'running') {
      throw new PipelineStateError(pipelineId, 'is already running');
    }
    if (record.status !== 'created') {
      throw new PipelineStateError(pipelineId, `has already run (${record.status})`);
    }

    const startedAt = Date.now();
    record.status = 'running';

    logger.info(`Executing pipeline ${pipelineId}`, { description: record.description });

    const run: ExecutionRun = { record, aborted: false };
    let spawnedChildIds: string[] = [];
    let spawnFailures: SpawnFailure[] = [];
    let evolved = false;
    let overallScore = 0;

    try {
      await this.runStages(run);

      overallScore = this.calculateOverallScore(record.stages);
      record.overallScore = overallScore;
      record.status = this.deriveStatus(record.stages);

      if (overallScore >= this.config.evolutionThreshold) {
        evolved = true;
        ({ spawnedChildIds, spawnFailures } = this.evolveAgents(record));
      }
    } catch (error) {
      logger.error(`Pipeline ${pipelineId} failed`, { error: errorMessage(error) });
      record.status = 'failed';
      record.error = errorMessage(error);
      overallScore = this.calculateOverallScore(record.stages);
      record.overallScore = overallScore;
    }

    record.completedAt = new Date();

    const result: PipelineExecutionResult = {
      pipelineId,
      status: record.status,
      overallScore,
      stages: { ...record.stages },
      evolved,
      spawnedChildIds,
      spawnFailures,
      durationMs: Date.now() - startedAt,
      ...(record.error !== undefined ? { error: record.error } : {})
    };

    logger.info(`Pipeline ${pipelineId} ${result.status}`, {
      overallScore: result.overallScore,
      evolved,
      spawned: spawnedChildIds.length
    });
    this.emit('pipeline:completed', result);

    return result;
  }

  /**
   * Spawn the next-generation child of an agent. The child id is
   * `${agentId}_gen${generation + 1}`.
   * @throws CollisionError when that id exists; nothing is changed then
   */
  public spawnChild(agentId: string): AgentSnapshot {
    const parent = this.registry.getAgent(agentId);
    if (!parent) {
      throw new EvolutionStructureError(`Agent ${agentId} is not registered`, 'UNKNOWN_AGENT', agentId);
    }
    return this.spawnAgent(parent).snapshot();
  }

  /**
   * Create a pipeline staffed by the children spawned from an evolved pipeline
   * @returns The new pipeline id
   */
  public evolvePipeline(pipelineId: string): string {
    const source = this.requirePipeline(pipelineId);

    if (source.evolvedInto !== undefined) {
      throw new PipelineStateError(pipelineId, `already evolved into ${source.evolvedInto}`);
    }

    const agents = completeStaff(source.children);
    if (!agents) {
      throw new PipelineStateError(pipelineId, 'has no complete generation of children to evolve into');
    }

    const evolvedId = this.addPipeline({
      pipelineId: this.newPipelineId(),
      description: source.description,
      requirements: [...source.requirements],
      constraints: [...source.constraints],
      language: source.language,
      serviceName: source.serviceName,
      agents,
      evolvedFrom: pipelineId
    });
    source.evolvedInto = evolvedId;

    logger.info(`Pipeline ${pipelineId} evolved into ${evolvedId}`);
    return evolvedId;
  }

  public getPipelineStatus(pipelineId: string): PipelineStatusReport {
    const record = this.requirePipeline(pipelineId);
    return {
      ...this.summarize(record),
      requirements: [...record.requirements],
      agents: agentsInOrder(record.agents).map(agent => agent.snapshot()),
      stages: { ...record.stages },
      spawnedChildIds: PIPELINE_STAGES.flatMap(role => {
        const child = record.children[role];
        return child ? [child.agentId] : [];
      }),
      ...(record.error !== undefined ? { error: record.error } : {})
    };
  }

  public listPipelines(): PipelineSummary[] {
    return Array.from(this.pipelines.values()).map(record => this.summarize(record));
  }

  public getAgent(agentId: string): AgentSnapshot | undefined {
    return this.registry.getAgent(agentId)?.snapshot();
  }

  public listAgents(): AgentSnapshot[] {
    return this.registry.getAllSnapshots();
  }

  /**
   * Snapshot of the evolution tree; the tree itself is only changed here
   */
  public getEvolutionTree(): EvolutionTreeJSON {
    return this.tree.toJSON();
  }

  public getTreeStats(): EvolutionStats {
    return this.tree.stats();
  }

  public getLineage(agentId: string): string[] {
    return this.tree.getLineage(agentId);
  }

  public getTopPerformers(count: number): EvolutionNode[] {
    return this.tree.topPerformers(count);
  }

  private newPipelineId(): string {
    let pipelineId: string;
    do {
      pipelineId = `pipeline_${uuidv4().slice(0, 8)}`;
    } while (this.pipelines.has(pipelineId) || this.tree.hasNode(`${pipelineId}_${AgentRole.ARCHITECT}`));
    return pipelineId;
  }

  private addPipeline(
    fields: Omit<PipelineRecord, 'stages' | 'status' | 'overallScore' | 'createdAt' | 'children'>
  ): string {
    const record: PipelineRecord = {
      ...fields,
      stages: {},
      status: 'created',
      overallScore: null,
      createdAt: new Date(),
      children: {}
    };
    this.pipelines.set(record.pipelineId, record);

    logger.info(`Created pipeline ${record.pipelineId}`, {
      description: record.description,
      evolvedFrom: record.evolvedFrom
    });
    this.emit('pipeline:created', this.summarize(record));
    return record.pipelineId;
  }

  private requirePipeline(pipelineId: string): PipelineRecord {
    const record = this.pipelines.get(pipelineId);
    if (!record) {
      throw new PipelineNotFoundError(pipelineId);
    }
    return record;
  }

  private async runStages(run: ExecutionRun): Promise<void> {
    const { record } = run;
    const { description, requirements, constraints, language, agents } = record;

    const architect = await this.runStage(run, AgentRole.ARCHITECT, agents[AgentRole.ARCHITECT], {
      description,
      requirements,
      constraints
    });
    record.stages[AgentRole.ARCHITECT] = architect;
    const architecture = architect.result;

    const coder = await this.runStage(run, AgentRole.CODER, agents[AgentRole.CODER], {
      description,
      requirements,
      architecture,
      language
    });
    record.stages[AgentRole.CODER] = coder;
    const code = coder.result?.code ?? '';

    const executor = await this.runStage(run, AgentRole.EXECUTOR, agents[AgentRole.EXECUTOR], {
      description,
      code,
      language
    });
    record.stages[AgentRole.EXECUTOR] = executor;

    const critic = await this.runStage(run, AgentRole.CRITIC, agents[AgentRole.CRITIC], {
      description,
      architecture,
      code,
      execution: executor.result
    });
    record.stages[AgentRole.CRITIC] = critic;

    if (this.config.requireCriticApproval && !critic.result?.passed) {
      record.stages[AgentRole.DEPLOYER] = this.skipStage(
        run,
        AgentRole.DEPLOYER,
        agents[AgentRole.DEPLOYER],
        'critic did not approve the work'
      );
      return;
    }

    record.stages[AgentRole.DEPLOYER] = await this.runStage(run, AgentRole.DEPLOYER, agents[AgentRole.DEPLOYER], {
      description,
      code,
      serviceName: record.serviceName
    });
  }

  private async runStage<R extends AgentRole>(
    run: ExecutionRun,
    role: R,
    agent: FoundryAgent<R>,
    task: StageTaskMap[R]
  ): Promise<StageOutcome<R>> {
    if (run.aborted) {
      return this.skipStage(run, role, agent, 'an earlier stage failed');
    }

    logger.info(`Stage ${role} started`, { pipelineId: run.record.pipelineId, agentId: agent.agentId });

    const loop = await runReflexionLoop(
      agent,
      task,
      {
        maxLoops: this.config.maxReflexionLoops,
        performanceThreshold: this.config.performanceThreshold,
        stageTimeoutMs: this.config.stageTimeoutMs
      },
      this.metaLearner
    );

    const outcome: StageOutcome<R> = {
      role,
      agentId: agent.agentId,
      status: loop.status,
      score: loop.bestScore,
      loopsExecuted: loop.loopsExecuted,
      thresholdMet: loop.thresholdMet,
      result: loop.bestResult
    };
    if (loop.status === 'failed') {
      outcome.error = `all ${loop.loopsExecuted} iteration(s) failed`;
      if (this.config.failurePolicy === 'abort') {
        run.aborted = true;
      }
    }

    this.tree.updatePerformance(agent.agentId, outcome.score);
    this.emitStage(run, outcome);
    return outcome;
  }

  private skipStage<R extends AgentRole>(
    run: ExecutionRun,
    role: R,
    agent: FoundryAgent<R>,
    reason: string
  ): StageOutcome<R> {
    const outcome: StageOutcome<R> = {
      role,
      agentId: agent.agentId,
      status: 'skipped',
      score: 0,
      loopsExecuted: 0,
      thresholdMet: false,
      result: null,
      error: reason
    };

    logger.info(`Stage ${role} skipped: ${reason}`, { pipelineId: run.record.pipelineId });
    this.emitStage(run, outcome);
    return outcome;
  }

  private emitStage<R extends AgentRole>(run: ExecutionRun, outcome: StageOutcome<R>): void {
    this.emit('stage:completed', run.record.pipelineId, outcome);
  }

  /**
   * Role-weighted mean of stage scores; missing and skipped stages count as 0
   */
  private calculateOverallScore(stages: PipelineStages): number {
    let weighted = 0;
    let totalWeight = 0;

    for (const role of PIPELINE_STAGES) {
      const weight = this.config.stageWeights[role];
      weighted += (stages[role]?.score ?? 0) * weight;
      totalWeight += weight;
    }

    return totalWeight > 0 ? round4(weighted / totalWeight) : 0;
  }

  private deriveStatus(stages: PipelineStages): PipelineStatus {
    const completed = PIPELINE_STAGES.filter(role => stages[role]?.status === 'completed').length;
    if (completed === PIPELINE_STAGES.length) return 'completed';
    if (completed === 0) return 'failed';
    return 'partial';
  }

  /**
   * Spawn one child per stage agent. A failed spawn is reported and does not
   * stop the others.
   */
  private evolveAgents(record: PipelineRecord): { spawnedChildIds: string[]; spawnFailures: SpawnFailure[] } {
    const spawnedChildIds: string[] = [];
    const spawnFailures: SpawnFailure[] = [];
    const children: Partial<PipelineAgents> = {};

    const attempt = <R extends AgentRole>(parent: FoundryAgent<R>): FoundryAgent<R> | undefined => {
      try {
        const child = this.spawnAgent(parent);
        spawnedChildIds.push(child.agentId);
        return child;
      } catch (error) {
        if (!(error instanceof EvolutionStructureError)) {
          throw error;
        }
        logger.warn(`Spawn from ${parent.agentId} failed`, { error: error.message });
        spawnFailures.push({ parentId: parent.agentId, childId: error.nodeId, error: error.message });
        return undefined;
      }
    };

    const { agents } = record;
    children[AgentRole.ARCHITECT] = attempt(agents[AgentRole.ARCHITECT]);
    children[AgentRole.CODER] = attempt(agents[AgentRole.CODER]);
    children[AgentRole.EXECUTOR] = attempt(agents[AgentRole.EXECUTOR]);
    children[AgentRole.CRITIC] = attempt(agents[AgentRole.CRITIC]);
    children[AgentRole.DEPLOYER] = attempt(agents[AgentRole.DEPLOYER]);
    record.children = children;

    logger.info(`Evolved pipeline ${record.pipelineId}`, {
      spawned: spawnedChildIds.length,
      failed: spawnFailures.length
    });
    return { spawnedChildIds, spawnFailures };
  }

  /**
   * Check, then commit node, edge and registration together
   */
  private spawnAgent<R extends AgentRole>(parent: FoundryAgent<R>): FoundryAgent<R> {
    const childId = `${parent.agentId}_gen${parent.generation + 1}`;

    if (this.tree.hasNode(childId) || this.registry.hasAgent(childId)) {
      throw new CollisionError(childId, parent.agentId);
    }

    const child = parent.createChild(childId);
    const parentNode = this.tree.getNode(parent.agentId);

    // Throws before anything is registered when the parent is not in the tree
    this.tree.addNode({
      nodeId: childId,
      generation: child.generation,
      performanceScore: parentNode?.performanceScore ?? 0,
      parentId: parent.agentId,
      metadata: { role: child.role, reason: SpawnReason.EVOLUTION }
    });
    this.registry.registerAgent(child);
    parent.addChild(childId);

    const event: SpawnEvent = {
      parentId: parent.agentId,
      childId,
      role: child.role,
      generation: child.generation
    };
    logger.info(`Spawned ${childId}`, { parentId: parent.agentId, generation: child.generation });
    this.emit('agent:spawned', event);

    return child;
  }

  private summarize(record: PipelineRecord): PipelineSummary {
    return {
      pipelineId: record.pipelineId,
      description: record.description,
      status: record.status,
      overallScore: record.overallScore,
      createdAt: record.createdAt.toISOString(),
      ...(record.completedAt ? { completedAt: record.completedAt.toISOString() } : {}),
      ...(record.evolvedFrom !== undefined ? { evolvedFrom: record.evolvedFrom } : {})
    };
  }
}
