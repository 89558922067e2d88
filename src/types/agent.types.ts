/**
 * Agent Types
 *
 * Roles, lifecycle states and the task, result and strategy shapes of each
 * pipeline stage.
 */

/**
 * The closed set of agent roles, in pipeline order
 */
export enum AgentRole {
  ARCHITECT = 'architect',
  CODER = 'coder',
  EXECUTOR = 'executor',
  CRITIC = 'critic',
  DEPLOYER = 'deployer'
}

export const PIPELINE_STAGES: readonly AgentRole[] = [
  AgentRole.ARCHITECT,
  AgentRole.CODER,
  AgentRole.EXECUTOR,
  AgentRole.CRITIC,
  AgentRole.DEPLOYER
];

export enum AgentStatus {
  IDLE = 'idle',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed'
}

// ── Stage tasks ──

export interface ArchitectTask {
  description: string;
  requirements: string[];
  constraints: string[];
}

export interface CoderTask {
  description: string;
  requirements: string[];
  // null when the architect stage failed
  architecture: ArchitectResult | null;
  language: string;
}

export interface ExecutorTask {
  description: string;
  code: string;
  language: string;
}

export interface CriticTask {
  description: string;
  architecture: ArchitectResult | null;
  code: string;
  execution: ExecutorResult | null;
}

export interface DeployerTask {
  description: string;
  code: string;
  serviceName: string;
}

// ── Stage results ──

export interface ArchitectResult {
  architecture: string;
  components: string[];
  designPatterns: string[];
  estimatedComplexity: number;
}

export interface CoderResult {
  code: string;
  language: string;
  healed: boolean;
  issuesFixed: number;
  linesOfCode: number;
}

export interface ExecutorResult {
  success: boolean;
  output: string;
  error: string;
  exitCode: number;
  durationMs: number;
  environment: ExecutionEnvironment;
}

/**
 * The critic's rating of upstream work, each in [0, 1]
 */
export interface CriticAssessment {
  architecture: number;
  code: number;
  execution: number;
}

export interface CriticResult {
  critique: string;
  suggestions: string[];
  assessment: CriticAssessment;
  overallScore: number;
  passed: boolean;
}

export type HealthStatus = 'passing' | 'failing' | 'unknown';

export interface DeployerResult {
  deployed: boolean;
  deploymentId: string;
  endpoint: string;
  version: string;
  strategy: DeploymentStrategy;
  replicas: number;
  environment: string;
  healthCheck: HealthStatus;
}

// ── Strategy parameters ──

export type ExecutionEnvironment = 'sandboxed' | 'optimized_sandbox';
export type DeploymentStrategy = 'rolling' | 'blue_green';

export interface ArchitectStrategy {
  temperature: number;
  maxTokens: number;
  designStyle: 'standard' | 'simplified';
}

export interface CoderStrategy {
  temperature: number;
  maxTokens: number;
  codeStyle: 'idiomatic' | 'detailed';
}

export interface ExecutorStrategy {
  environment: ExecutionEnvironment;
  timeoutMs: number;
}

export interface CriticStrategy {
  temperature: number;
  critiqueDepth: 'standard' | 'detailed';
  passThreshold: number;
}

export interface DeployerStrategy {
  deploymentStrategy: DeploymentStrategy;
  replicas: number;
  environment: string;
}

// ── Role maps ──

export interface StageTaskMap {
  [AgentRole.ARCHITECT]: ArchitectTask;
  [AgentRole.CODER]: CoderTask;
  [AgentRole.EXECUTOR]: ExecutorTask;
  [AgentRole.CRITIC]: CriticTask;
  [AgentRole.DEPLOYER]: DeployerTask;
}

export interface StageResultMap {
  [AgentRole.ARCHITECT]: ArchitectResult;
  [AgentRole.CODER]: CoderResult;
  [AgentRole.EXECUTOR]: ExecutorResult;
  [AgentRole.CRITIC]: CriticResult;
  [AgentRole.DEPLOYER]: DeployerResult;
}

export interface StrategyMap {
  [AgentRole.ARCHITECT]: ArchitectStrategy;
  [AgentRole.CODER]: CoderStrategy;
  [AgentRole.EXECUTOR]: ExecutorStrategy;
  [AgentRole.CRITIC]: CriticStrategy;
  [AgentRole.DEPLOYER]: DeployerStrategy;
}

export type StageTask = StageTaskMap[AgentRole];
export type StageResult = StageResultMap[AgentRole];
export type StrategyParameters = StrategyMap[AgentRole];

/**
 * Summary of an agent's scored history
 */
export interface PerformanceSummary {
  averageScore: number;
  bestScore: number;
  worstScore: number;
  totalExecutions: number;
}

/**
 * Serializable view of an agent instance
 */
export interface AgentSnapshot {
  agentId: string;
  role: AgentRole;
  generation: number;
  parentId?: string;
  childIds: string[];
  status: AgentStatus;
  strategy: StrategyParameters;
  memorySize: number;
  performance: PerformanceSummary;
}
