/**
 * Orchestration Types
 */

import { StrategyOverrides } from '../agents/agentFactory.js';
import { AgentRole, AgentSnapshot, StageResultMap } from '../types/agent.types.js';

export type PipelineStatus = 'created' | 'running' | 'completed' | 'partial' | 'failed';

export type StageStatus = 'completed' | 'failed' | 'skipped';

export interface PipelineOptions {
  constraints?: string[];

  // Defaults to the configured language
  language?: string;

  // Defaults to a name derived from the pipeline id
  serviceName?: string;

  strategies?: StrategyOverrides;
}

/**
 * Outcome of one stage's reflexion loop
 */
export interface StageOutcome<R extends AgentRole> {
  role: R;
  agentId: string;
  status: StageStatus;

  /** Best score of the stage, 0 when failed or skipped */
  score: number;

  loopsExecuted: number;
  thresholdMet: boolean;
  result: StageResultMap[R] | null;
  error?: string;
}

export type PipelineStages = { [R in AgentRole]?: StageOutcome<R> };

/**
 * A spawn attempt that did not produce a child
 */
export interface SpawnFailure {
  parentId: string;
  childId: string;
  error: string;
}

export interface PipelineExecutionResult {
  pipelineId: string;
  status: PipelineStatus;
  overallScore: number;
  stages: PipelineStages;

  /** Whether the score crossed the evolution threshold */
  evolved: boolean;

  spawnedChildIds: string[];
  spawnFailures: SpawnFailure[];
  durationMs: number;
  error?: string;
}

export interface PipelineSummary {
  pipelineId: string;
  description: string;
  status: PipelineStatus;
  overallScore: number | null;
  createdAt: string;
  completedAt?: string;
  evolvedFrom?: string;
}

export interface PipelineStatusReport extends PipelineSummary {
  requirements: string[];
  agents: AgentSnapshot[];
  stages: PipelineStages;
  spawnedChildIds: string[];
  error?: string;
}

export interface SpawnEvent {
  parentId: string;
  childId: string;
  role: AgentRole;
  generation: number;
}
