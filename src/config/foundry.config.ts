/**
 * Foundry Configuration
 *
 * Defaults, FOUNDRY_* environment variables and explicit overrides, merged
 * in that order and validated against FoundryConfig.schema.json.
 */

import Ajv from 'ajv';
import { InvalidConfigurationError } from '../errors/foundryErrors.js';
import { AgentRole, PIPELINE_STAGES } from '../types/agent.types.js';
import foundryConfigSchema from '../schemas/FoundryConfig.schema.json';

export type FailurePolicy = 'continue' | 'abort';

export interface MetaLearningConfig {
  /** Recent entries compared against the overall average */
  recentWindow: number;

  /** Largest exploration nudge per adjustment */
  step: number;
}

export interface FoundryConfig {
  maxReflexionLoops: number;

  // Stage score that ends a reflexion loop early
  performanceThreshold: number;

  // Pipeline score at or above which every stage agent spawns a child
  evolutionThreshold: number;

  // Bound on each execute step, 0 disables it
  stageTimeoutMs: number;

  // 'abort' skips the remaining stages after a failed one
  failurePolicy: FailurePolicy;

  // Skip the deployer unless the critic's assessment passed
  requireCriticApproval: boolean;

  stageWeights: Record<AgentRole, number>;

  metaLearning: MetaLearningConfig;

  deploymentEnvironment: string;

  language: string;
}

export type FoundryConfigOverrides = Partial<Omit<FoundryConfig, 'stageWeights' | 'metaLearning'>> & {
  stageWeights?: Partial<Record<AgentRole, number>>;
  metaLearning?: Partial<MetaLearningConfig>;
};

export const DEFAULT_FOUNDRY_CONFIG: FoundryConfig = {
  maxReflexionLoops: 5,
  performanceThreshold: 0.75,
  evolutionThreshold: 0.85,
  stageTimeoutMs: 30000, // 30 seconds
  failurePolicy: 'continue',
  requireCriticApproval: false,
  stageWeights: {
    [AgentRole.ARCHITECT]: 1,
    [AgentRole.CODER]: 1,
    [AgentRole.EXECUTOR]: 1,
    [AgentRole.CRITIC]: 1,
    [AgentRole.DEPLOYER]: 1
  },
  metaLearning: {
    recentWindow: 3,
    step: 0.05
  },
  deploymentEnvironment: 'staging',
  language: 'typescript'
};

const ajv = new Ajv({ allErrors: true });
const validateSchema = ajv.compile<FoundryConfig>(foundryConfigSchema);

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, name: string): boolean | undefined {
  const raw = env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new InvalidConfigurationError(`${name} must be true or false, got "${raw}"`);
}

function readFailurePolicy(env: Env): FailurePolicy | undefined {
  const raw = env.FOUNDRY_FAILURE_POLICY?.trim();
  if (!raw) return undefined;
  if (raw === 'continue' || raw === 'abort') return raw;
  throw new InvalidConfigurationError(`FOUNDRY_FAILURE_POLICY must be continue or abort, got "${raw}"`);
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Read FOUNDRY_* variables. Unset variables are left out.
 */
export function readEnvConfig(env: Env = process.env): FoundryConfigOverrides {
  const fromEnv: FoundryConfigOverrides = {
    maxReflexionLoops: readNumber(env, 'FOUNDRY_MAX_REFLEXION_LOOPS'),
    performanceThreshold: readNumber(env, 'FOUNDRY_PERFORMANCE_THRESHOLD'),
    evolutionThreshold: readNumber(env, 'FOUNDRY_EVOLUTION_THRESHOLD'),
    stageTimeoutMs: readNumber(env, 'FOUNDRY_STAGE_TIMEOUT_MS'),
    failurePolicy: readFailurePolicy(env),
    requireCriticApproval: readBoolean(env, 'FOUNDRY_REQUIRE_CRITIC_APPROVAL'),
    deploymentEnvironment: readString(env, 'FOUNDRY_DEPLOYMENT_ENVIRONMENT'),
    language: readString(env, 'FOUNDRY_LANGUAGE')
  };

  const recentWindow = readNumber(env, 'FOUNDRY_META_RECENT_WINDOW');
  const step = readNumber(env, 'FOUNDRY_META_STEP');
  if (recentWindow !== undefined || step !== undefined) {
    fromEnv.metaLearning = { recentWindow, step };
  }

  return fromEnv;
}

function pick<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

/**
 * Merge overrides into a full configuration. Nested sections merge per key;
 * undefined values never replace a setting.
 */
export function mergeFoundryConfig(base: FoundryConfig, ...layers: FoundryConfigOverrides[]): FoundryConfig {
  let merged: FoundryConfig = {
    ...base,
    stageWeights: { ...base.stageWeights },
    metaLearning: { ...base.metaLearning }
  };

  for (const layer of layers) {
    const stageWeights = { ...merged.stageWeights };
    for (const role of PIPELINE_STAGES) {
      stageWeights[role] = pick(layer.stageWeights?.[role], stageWeights[role]);
    }

    merged = {
      maxReflexionLoops: pick(layer.maxReflexionLoops, merged.maxReflexionLoops),
      performanceThreshold: pick(layer.performanceThreshold, merged.performanceThreshold),
      evolutionThreshold: pick(layer.evolutionThreshold, merged.evolutionThreshold),
      stageTimeoutMs: pick(layer.stageTimeoutMs, merged.stageTimeoutMs),
      failurePolicy: pick(layer.failurePolicy, merged.failurePolicy),
      requireCriticApproval: pick(layer.requireCriticApproval, merged.requireCriticApproval),
      stageWeights,
      metaLearning: {
        recentWindow: pick(layer.metaLearning?.recentWindow, merged.metaLearning.recentWindow),
        step: pick(layer.metaLearning?.step, merged.metaLearning.step)
      },
      deploymentEnvironment: pick(layer.deploymentEnvironment, merged.deploymentEnvironment),
      language: pick(layer.language, merged.language)
    };
  }

  return merged;
}

/**
 * @throws InvalidConfigurationError listing every schema violation
 */
export function validateFoundryConfig(config: unknown): FoundryConfig {
  if (validateSchema(config)) {
    return config;
  }

  const errors = (validateSchema.errors ?? []).map(error =>
    `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`
  );
  throw new InvalidConfigurationError(errors.join('; '), errors);
}

/**
 * Build the configuration from defaults, environment and overrides
 */
export function loadFoundryConfig(
  overrides: FoundryConfigOverrides = {},
  env: Env = process.env
): FoundryConfig {
  return validateFoundryConfig(mergeFoundryConfig(DEFAULT_FOUNDRY_CONFIG, readEnvConfig(env), overrides));
}
