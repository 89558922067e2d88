/**
 * Provider Types
 *
 * Capability interfaces the agents depend on. Implementations may call real
 * services; the mock implementations in ./mock are deterministic.
 */

import { HealthStatus } from '../types/agent.types.js';

export interface GenerateOptions {
  maxTokens: number;
  temperature: number;
}

/**
 * Text generation
 */
export interface InferenceProvider {
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export interface HealingOutcome {
  code: string;
  /** Zero is a valid outcome: nothing needed fixing */
  issuesFixed: number;
}

/**
 * Automatic repair of generated code
 */
export interface HealingProvider {
  heal(code: string, language: string): Promise<HealingOutcome>;
}

export interface SandboxRun {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/**
 * Isolated code execution
 */
export interface SandboxProvider {
  run(code: string, language: string, timeoutMs: number): Promise<SandboxRun>;
}

export interface DeploymentOutcome {
  deploymentId: string;
  endpoint: string;
  healthCheck: HealthStatus;
}

/**
 * Service deployment
 */
export interface DeploymentProvider {
  deploy(agentId: string, environment: string, replicas: number): Promise<DeploymentOutcome>;
}

/**
 * Every capability an agent may use
 */
export interface AgentProviders {
  inference: InferenceProvider;
  healing: HealingProvider;
  sandbox: SandboxProvider;
  deployment: DeploymentProvider;
}
