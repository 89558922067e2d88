export * from './base/AgentContext.js';
export * from './base/FoundryAgent.js';
export * from './implementations/ArchitectAgent.js';
export * from './implementations/CoderAgent.js';
export * from './implementations/ExecutorAgent.js';
export * from './implementations/CriticAgent.js';
export * from './implementations/DeployerAgent.js';
export * from './agentFactory.js';
export * from './agentRegistry.js';
