/**
 * Providers Module
 */

import { AgentProviders } from './types.js';
import { MockInferenceProvider } from './mock/MockInferenceProvider.js';
import { MockHealingProvider } from './mock/MockHealingProvider.js';
import { MockSandboxProvider } from './mock/MockSandboxProvider.js';
import { MockDeploymentProvider } from './mock/MockDeploymentProvider.js';

export * from './types.js';
export { MockInferenceProvider } from './mock/MockInferenceProvider.js';
export type { ResponseTemplates } from './mock/MockInferenceProvider.js';
export { MockHealingProvider } from './mock/MockHealingProvider.js';
export { MockSandboxProvider } from './mock/MockSandboxProvider.js';
export { MockDeploymentProvider } from './mock/MockDeploymentProvider.js';

/**
 * Deterministic providers for local runs and tests. Any capability can be
 * replaced by passing an override.
 */
export function createMockProviders(overrides: Partial<AgentProviders> = {}): AgentProviders {
  return {
    inference: new MockInferenceProvider(),
    healing: new MockHealingProvider(),
    sandbox: new MockSandboxProvider(),
    deployment: new MockDeploymentProvider(),
    ...overrides
  };
}
