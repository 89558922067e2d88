import { describe, expect, test } from '@jest/globals';

import {
  DEFAULT_FOUNDRY_CONFIG,
  loadFoundryConfig,
  mergeFoundryConfig,
  readEnvConfig,
  validateFoundryConfig
} from '../foundry.config.js';
import { InvalidConfigurationError } from '../../errors/foundryErrors.js';
import { AgentRole } from '../../types/agent.types.js';

describe('foundry config', () => {
  test('should load the defaults from an empty environment', () => {
    expect(loadFoundryConfig({}, {})).toEqual(DEFAULT_FOUNDRY_CONFIG);
  });

  test('should read FOUNDRY_* variables', () => {
    const config = loadFoundryConfig({}, {
      FOUNDRY_MAX_REFLEXION_LOOPS: '3',
      FOUNDRY_PERFORMANCE_THRESHOLD: '0.6',
      FOUNDRY_FAILURE_POLICY: 'abort',
      FOUNDRY_REQUIRE_CRITIC_APPROVAL: '1',
      FOUNDRY_DEPLOYMENT_ENVIRONMENT: 'production',
      FOUNDRY_META_STEP: '0.1'
    });

    expect(config).toMatchObject({
      maxReflexionLoops: 3,
      performanceThreshold: 0.6,
      evolutionThreshold: 0.85,
      failurePolicy: 'abort',
      requireCriticApproval: true,
      deploymentEnvironment: 'production',
      metaLearning: { recentWindow: 3, step: 0.1 }
    });
  });

  test('should let explicit overrides win over the environment', () => {
    const config = loadFoundryConfig(
      { maxReflexionLoops: 8, stageWeights: { [AgentRole.CODER]: 2 } },
      { FOUNDRY_MAX_REFLEXION_LOOPS: '3', FOUNDRY_LANGUAGE: 'rust' }
    );

    expect(config.maxReflexionLoops).toBe(8);
    expect(config.language).toBe('rust');
    expect(config.stageWeights).toEqual({
      architect: 1,
      coder: 2,
      executor: 1,
      critic: 1,
      deployer: 1
    });
  });

  test('should ignore unset and blank variables', () => {
    expect(readEnvConfig({ FOUNDRY_LANGUAGE: '  ', FOUNDRY_STAGE_TIMEOUT_MS: '' })).toEqual({
      maxReflexionLoops: undefined,
      performanceThreshold: undefined,
      evolutionThreshold: undefined,
      stageTimeoutMs: undefined,
      failurePolicy: undefined,
      requireCriticApproval: undefined,
      deploymentEnvironment: undefined,
      language: undefined
    });
  });

  test('should reject malformed variables', () => {
    expect(() => readEnvConfig({ FOUNDRY_MAX_REFLEXION_LOOPS: 'many' }))
      .toThrow('Invalid configuration: FOUNDRY_MAX_REFLEXION_LOOPS must be a number, got "many"');
    expect(() => readEnvConfig({ FOUNDRY_REQUIRE_CRITIC_APPROVAL: 'maybe' })).toThrow(InvalidConfigurationError);
    expect(() => readEnvConfig({ FOUNDRY_FAILURE_POLICY: 'retry' })).toThrow(InvalidConfigurationError);
  });

  test('should never let undefined replace a setting', () => {
    const merged = mergeFoundryConfig(DEFAULT_FOUNDRY_CONFIG, { language: undefined, metaLearning: { step: undefined } });

    expect(merged).toEqual(DEFAULT_FOUNDRY_CONFIG);
    expect(merged.stageWeights).not.toBe(DEFAULT_FOUNDRY_CONFIG.stageWeights);
  });

  test('should list every schema violation', () => {
    let caught: unknown;
    try {
      loadFoundryConfig({ maxReflexionLoops: 0, performanceThreshold: 1.5 }, {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidConfigurationError);
    if (caught instanceof InvalidConfigurationError) {
      expect(caught.validationErrors).toEqual([
        '/maxReflexionLoops must be >= 1',
        '/performanceThreshold must be <= 1'
      ]);
    }
  });

  test('should reject unknown keys', () => {
    expect(() => validateFoundryConfig({ ...DEFAULT_FOUNDRY_CONFIG, verbose: true }))
      .toThrow('Invalid configuration: / must NOT have additional properties');
    expect(() => validateFoundryConfig(null)).toThrow(InvalidConfigurationError);
  });
});
