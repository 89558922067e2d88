/**
 * Agent Foundry
 *
 * Self-evolving agent pipelines: reflexion loops per stage, meta-learned
 * strategy adjustments and an evolution tree of spawned generations.
 */

export * from './types/agent.types.js';
export * from './errors/foundryErrors.js';
export * from './providers/index.js';
export * from './agents/index.js';
export * from './scoring/stageScorer.js';
export * from './services/memory/AgentMemoryLog.js';
export * from './services/meta-agent/MetaLearner.js';
export * from './services/reflexion/ReflexionLoop.js';
export * from './services/evolution/index.js';
export * from './orchestration/types.js';
export * from './orchestration/PipelineOrchestrator.js';
export * from './config/foundry.config.js';
export * from './runtime/FoundryRuntime.js';
export { registerShutdownHooks } from './utils/shutdown.js';
export { createLogger, setLogLevel } from './common/logger.js';
export type { LogLevel, Logger } from './common/logger.js';
