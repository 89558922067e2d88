/**
 * Mock Sandbox Provider
 *
 * Pretends to run code. Empty input and unbalanced brackets fail; everything
 * else succeeds with a duration proportional to the line count.
 */

import { SandboxProvider, SandboxRun } from '../types.js';

const MS_PER_LINE = 5;

const CLOSING: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

/**
 * Find the first unbalanced bracket, if any
 */
function findUnbalanced(code: string): string | null {
  const stack: string[] = [];
  for (const char of code) {
    if (char === '(' || char === '[' || char === '{') {
      stack.push(char);
    } else if (char in CLOSING) {
      if (stack.pop() !== CLOSING[char]) return char;
    }
  }
  return stack.length > 0 ? stack[stack.length - 1] : null;
}

export class MockSandboxProvider implements SandboxProvider {
  public async run(code: string, language: string, timeoutMs: number): Promise<SandboxRun> {
    if (!code.trim()) {
      return { exitCode: 1, stdout: '', stderr: 'No code provided', durationMs: 0 };
    }

    const lines = code.split('\n').length;
    const durationMs = Math.min(lines * MS_PER_LINE, timeoutMs);

    const unbalanced = findUnbalanced(code);
    if (unbalanced !== null) {
      return {
        exitCode: 1,
        stdout: '',
        stderr: `SyntaxError: unbalanced '${unbalanced}' in ${language} source`,
        durationMs
      };
    }

    return { exitCode: 0, stdout: `Executed ${lines} lines`, stderr: '', durationMs };
  }
}
