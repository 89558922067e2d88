/**
 * Foundry Runtime
 *
 * Explicitly constructed context that owns one orchestrator and, through
 * it, one evolution tree. Nothing in the library is a process-wide
 * singleton; tests and embedders create as many runtimes as they need.
 */

import { createLogger } from '../common/logger.js';
import { FoundryConfig, FoundryConfigOverrides, loadFoundryConfig } from '../config/foundry.config.js';
import { AgentProviders } from '../providers/types.js';
import { createMockProviders } from '../providers/index.js';
import { PipelineOrchestrator } from '../orchestration/PipelineOrchestrator.js';
import { PipelineExecutionResult, PipelineOptions } from '../orchestration/types.js';
import { FoundryError } from '../errors/foundryErrors.js';

const logger = createLogger('FoundryRuntime');

export interface RuntimeOptions {
  config?: FoundryConfigOverrides;

  // Environment read for FOUNDRY_* settings
  env?: Record<string, string | undefined>;

  // Replaces individual mock providers
  providers?: Partial<AgentProviders>;
}

export class FoundryRuntime {
  public readonly config: FoundryConfig;
  public readonly orchestrator: PipelineOrchestrator;

  private inFlight: Set<Promise<PipelineExecutionResult>> = new Set();
  private closed = false;

  private constructor(config: FoundryConfig, providers: AgentProviders) {
    this.config = config;
    this.orchestrator = new PipelineOrchestrator({ providers, config });
  }

  /**
   * Load and validate configuration, then build providers and orchestrator
   * @throws InvalidConfigurationError
   */
  public static create(options: RuntimeOptions = {}): FoundryRuntime {
    const config = loadFoundryConfig(options.config, options.env);
    const runtime = new FoundryRuntime(config, createMockProviders(options.providers));

    logger.info('Runtime started', {
      maxReflexionLoops: config.maxReflexionLoops,
      performanceThreshold: config.performanceThreshold,
      evolutionThreshold: config.evolutionThreshold
    });
    return runtime;
  }

  /**
   * Create and execute a pipeline
   */
  public async runPipeline(
    description: string,
    requirements: string[] = [],
    options: PipelineOptions = {}
  ): Promise<PipelineExecutionResult> {
    this.assertOpen();
    const pipelineId = this.orchestrator.createPipeline(description, requirements, options);
    return this.track(this.orchestrator.executePipeline(pipelineId));
  }

  /**
   * Evolve a pipeline into its children and execute the new pipeline
   */
  public async runEvolved(pipelineId: string): Promise<PipelineExecutionResult> {
    this.assertOpen();
    const evolvedId = this.orchestrator.evolvePipeline(pipelineId);
    return this.track(this.orchestrator.executePipeline(evolvedId));
  }

  /**
   * Wait for running pipelines, then detach every listener.
   * Further runs are rejected.
   */
  public async shutdown(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (this.inFlight.size > 0) {
      logger.info(`Waiting for ${this.inFlight.size} running pipeline(s)`);
      await Promise.allSettled(Array.from(this.inFlight));
    }

    this.orchestrator.removeAllListeners();
    logger.info('Runtime shut down', this.orchestrator.getTreeStats());
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  private async track(execution: Promise<PipelineExecutionResult>): Promise<PipelineExecutionResult> {
    this.inFlight.add(execution);
    try {
      return await execution;
    } finally {
      this.inFlight.delete(execution);
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new FoundryError('Runtime has been shut down', 'RUNTIME_CLOSED');
    }
  }
}
