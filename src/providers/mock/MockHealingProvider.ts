/**
 * Mock Healing Provider
 *
 * Detects and fixes a fixed set of mechanical issues. Each issue type counts
 * once no matter how many lines it affects.
 */

import { HealingOutcome, HealingProvider } from '../types.js';

interface HealingRule {
  type: string;
  detect(code: string): boolean;
  fix(code: string): string;
}

const HEALING_RULES: HealingRule[] = [
  {
    type: 'windows_line_endings',
    detect: code => code.includes('\r\n'),
    fix: code => code.replace(/\r\n/g, '\n')
  },
  {
    type: 'tab_indentation',
    detect: code => /^\t+/m.test(code),
    fix: code => code.replace(/^\t+/gm, tabs => '  '.repeat(tabs.length))
  },
  {
    type: 'trailing_whitespace',
    detect: code => /[ \t]+$/m.test(code),
    fix: code => code.replace(/[ \t]+$/gm, '')
  }
];

export class MockHealingProvider implements HealingProvider {
  private history: Array<{ language: string; issues: string[] }> = [];

  public async heal(code: string, language: string): Promise<HealingOutcome> {
    let healed = code;
    const issues: string[] = [];

    for (const rule of HEALING_RULES) {
      if (rule.detect(healed)) {
        healed = rule.fix(healed);
        issues.push(rule.type);
      }
    }

    this.history.push({ language, issues });
    return { code: healed, issuesFixed: issues.length };
  }

  public getHistory(): Array<{ language: string; issues: string[] }> {
    return this.history.map(entry => ({ ...entry, issues: [...entry.issues] }));
  }
}
