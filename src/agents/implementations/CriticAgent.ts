/**
 * Critic Agent
 *
 * Reviews the upstream stages. Produces a written critique with suggestions
 * and its own weighted assessment of the architecture, code and execution.
 */

import { FoundryAgent, AgentInitOptions, nudgeTemperature } from '../base/FoundryAgent.js';
import { StrategyAdjustment } from '../../services/meta-agent/MetaLearner.js';
import { hasCodeStructure, roundScore } from '../../scoring/stageScorer.js';
import {
  AgentRole,
  ArchitectResult,
  CriticAssessment,
  CriticResult,
  CriticStrategy,
  CriticTask,
  ExecutorResult
} from '../../types/agent.types.js';

export const DEFAULT_CRITIC_STRATEGY: CriticStrategy = {
  temperature: 0.3,
  critiqueDepth: 'standard',
  passThreshold: 0.75
};

export const ASSESSMENT_WEIGHTS: CriticAssessment = {
  architecture: 0.3,
  code: 0.4,
  execution: 0.3
};

const SUGGESTION_LIMITS = { standard: 3, detailed: 6 } as const;

const BULLET_PATTERN = /^\s*(?:[-*]|\d+\.)\s+(.+)$/;
const SUGGESTION_HEADING = /^\s*#+.*(recommend|improve|suggest)/i;
const HEADING = /^\s*#+/;

/**
 * Pull suggestions out of a critique. Bullets under a recommendations
 * heading win; without such a heading every bullet counts.
 */
export function extractSuggestions(critique: string, limit: number): string[] {
  const lines = critique.split('\n');
  const all: string[] = [];
  const underHeading: string[] = [];
  let inSuggestions = false;
  let sawHeading = false;

  for (const line of lines) {
    if (HEADING.test(line)) {
      inSuggestions = SUGGESTION_HEADING.test(line);
      sawHeading = sawHeading || inSuggestions;
      continue;
    }
    const match = BULLET_PATTERN.exec(line);
    if (!match) continue;

    const text = match[1].trim();
    all.push(text);
    if (inSuggestions) underHeading.push(text);
  }

  return (sawHeading ? underHeading : all).slice(0, limit);
}

export function assessWork(
  architecture: ArchitectResult | null,
  code: string,
  execution: ExecutorResult | null
): CriticAssessment {
  return {
    architecture: architecture ? Math.min(architecture.components.length / 4, 1) : 0,
    code: code.trim().length === 0 ? 0 : hasCodeStructure(code) ? 1 : 0.5,
    execution: execution === null ? 0 : execution.exitCode === 0 ? 1 : 0.25
  };
}

export class CriticAgent extends FoundryAgent<AgentRole.CRITIC> {
  constructor(options: AgentInitOptions<AgentRole.CRITIC>) {
    super(AgentRole.CRITIC, options, DEFAULT_CRITIC_STRATEGY);
  }

  protected instantiate(options: AgentInitOptions<AgentRole.CRITIC>): CriticAgent {
    return new CriticAgent(options);
  }

  protected async performTask(task: CriticTask): Promise<CriticResult> {
    const { temperature, critiqueDepth, passThreshold } = this.strategy;

    const execution = task.execution
      ? `exit code ${task.execution.exitCode}, ${task.execution.durationMs}ms${task.execution.error ? `, error: ${task.execution.error}` : ''}`
      : 'not run';

    const prompt = [
      `Evaluate the following work for: ${task.description}`,
      `Architecture components: ${task.architecture ? task.architecture.components.join(', ') || 'none' : 'unavailable'}`,
      `Execution: ${execution}`,
      'Code:',
      task.code || '(no code)',
      critiqueDepth === 'detailed'
        ? 'Give a detailed critique with strengths and a prioritised list of recommendations.'
        : 'Give a short critique with strengths and recommendations.'
    ].join('\n');

    const critique = await this.providers.inference.generate(prompt, {
      maxTokens: critiqueDepth === 'detailed' ? 2000 : 1000,
      temperature
    });

    const assessment = assessWork(task.architecture, task.code, task.execution);
    const overallScore = roundScore(
      assessment.architecture * ASSESSMENT_WEIGHTS.architecture +
      assessment.code * ASSESSMENT_WEIGHTS.code +
      assessment.execution * ASSESSMENT_WEIGHTS.execution
    );

    return {
      critique,
      suggestions: extractSuggestions(critique, SUGGESTION_LIMITS[critiqueDepth]),
      assessment,
      overallScore,
      passed: overallScore >= passThreshold
    };
  }

  protected adjustStrategy(strategy: CriticStrategy, adjustment: StrategyAdjustment): CriticStrategy {
    return {
      ...strategy,
      temperature: nudgeTemperature(strategy.temperature, adjustment.explorationDelta),
      critiqueDepth: adjustment.switchApproach ? 'detailed' : strategy.critiqueDepth
    };
  }
}
