/**
 * Coder Agent
 *
 * Generates code from the task and the upstream architecture, then passes it
 * through the healing provider.
 */

import { FoundryAgent, AgentInitOptions, nudgeTemperature } from '../base/FoundryAgent.js';
import { StrategyAdjustment } from '../../services/meta-agent/MetaLearner.js';
import { AgentRole, CoderResult, CoderStrategy, CoderTask } from '../../types/agent.types.js';

export const DEFAULT_CODER_STRATEGY: CoderStrategy = {
  temperature: 0.5,
  maxTokens: 4000,
  codeStyle: 'idiomatic'
};

export class CoderAgent extends FoundryAgent<AgentRole.CODER> {
  constructor(options: AgentInitOptions<AgentRole.CODER>) {
    super(AgentRole.CODER, options, DEFAULT_CODER_STRATEGY);
  }

  protected instantiate(options: AgentInitOptions<AgentRole.CODER>): CoderAgent {
    return new CoderAgent(options);
  }

  protected async performTask(task: CoderTask): Promise<CoderResult> {
    const { temperature, maxTokens, codeStyle } = this.strategy;

    const lines = [
      `Generate code for: ${task.description}`,
      `Language: ${task.language}`
    ];
    if (task.architecture) {
      lines.push(`Components: ${task.architecture.components.join(', ') || 'none'}`);
    }
    if (task.requirements.length > 0) {
      lines.push('Requirements:', ...task.requirements.map(requirement => `- ${requirement}`));
    }
    lines.push(codeStyle === 'detailed'
      ? 'Write explicit, fully commented code with one class per component.'
      : 'Write concise, idiomatic code.');

    const generated = await this.providers.inference.generate(lines.join('\n'), { maxTokens, temperature });
    const healed = await this.providers.healing.heal(generated, task.language);

    if (healed.issuesFixed > 0) {
      this.logger.debug(`Healing fixed ${healed.issuesFixed} issue(s)`);
    }

    return {
      code: healed.code,
      language: task.language,
      healed: healed.issuesFixed > 0,
      issuesFixed: healed.issuesFixed,
      linesOfCode: healed.code.split('\n').length
    };
  }

  protected adjustStrategy(strategy: CoderStrategy, adjustment: StrategyAdjustment): CoderStrategy {
    return {
      ...strategy,
      temperature: nudgeTemperature(strategy.temperature, adjustment.explorationDelta),
      codeStyle: adjustment.switchApproach ? 'detailed' : strategy.codeStyle
    };
  }
}
