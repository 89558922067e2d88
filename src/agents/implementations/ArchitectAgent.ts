/**
 * Architect Agent
 *
 * Turns a description and requirements into a system design, then extracts
 * the components and design patterns it mentions.
 */

import { FoundryAgent, AgentInitOptions, nudgeTemperature } from '../base/FoundryAgent.js';
import { StrategyAdjustment } from '../../services/meta-agent/MetaLearner.js';
import {
  AgentRole,
  ArchitectResult,
  ArchitectStrategy,
  ArchitectTask
} from '../../types/agent.types.js';

export const DEFAULT_ARCHITECT_STRATEGY: ArchitectStrategy = {
  temperature: 0.7,
  maxTokens: 2000,
  designStyle: 'standard'
};

const COMPONENT_KEYWORDS = ['service', 'api', 'database', 'cache', 'queue', 'worker'];

const DESIGN_PATTERNS = ['event-driven', 'circuit breaker', 'microservice', 'layered', 'repository', 'pub/sub'];

// Words of design text per complexity point
const WORDS_PER_COMPLEXITY = 50;

export function extractComponents(architecture: string): string[] {
  const text = architecture.toLowerCase();
  return COMPONENT_KEYWORDS.filter(keyword => text.includes(keyword));
}

export function extractDesignPatterns(architecture: string): string[] {
  const text = architecture.toLowerCase();
  return DESIGN_PATTERNS.filter(pattern => text.includes(pattern));
}

export function estimateComplexity(architecture: string): number {
  const words = architecture.split(/\s+/).filter(word => word.length > 0).length;
  return Math.floor(words / WORDS_PER_COMPLEXITY);
}

function bulletList(items: string[]): string {
  return items.length > 0 ? items.map(item => `- ${item}`).join('\n') : '- none';
}

export class ArchitectAgent extends FoundryAgent<AgentRole.ARCHITECT> {
  constructor(options: AgentInitOptions<AgentRole.ARCHITECT>) {
    super(AgentRole.ARCHITECT, options, DEFAULT_ARCHITECT_STRATEGY);
  }

  protected instantiate(options: AgentInitOptions<AgentRole.ARCHITECT>): ArchitectAgent {
    return new ArchitectAgent(options);
  }

  protected async performTask(task: ArchitectTask): Promise<ArchitectResult> {
    const { temperature, maxTokens, designStyle } = this.strategy;

    const prompt = [
      `Design a system architecture for: ${task.description}`,
      '',
      'Requirements:',
      bulletList(task.requirements),
      '',
      'Constraints:',
      bulletList(task.constraints),
      '',
      designStyle === 'simplified'
        ? 'Keep the design minimal: as few components as the requirements allow.'
        : 'List the components, their responsibilities and the design patterns used.'
    ].join('\n');

    const architecture = await this.providers.inference.generate(prompt, { maxTokens, temperature });

    const result: ArchitectResult = {
      architecture,
      components: extractComponents(architecture),
      designPatterns: extractDesignPatterns(architecture),
      estimatedComplexity: estimateComplexity(architecture)
    };

    this.logger.debug('Architecture designed', {
      components: result.components.length,
      complexity: result.estimatedComplexity
    });
    return result;
  }

  protected adjustStrategy(strategy: ArchitectStrategy, adjustment: StrategyAdjustment): ArchitectStrategy {
    return {
      ...strategy,
      temperature: nudgeTemperature(strategy.temperature, adjustment.explorationDelta),
      designStyle: adjustment.switchApproach ? 'simplified' : strategy.designStyle
    };
  }
}
