import { describe, expect, test } from '@jest/globals';

import { hasCodeStructure, scoreStage } from '../stageScorer.js';
import { EvaluationError } from '../../errors/foundryErrors.js';
import {
  AgentRole,
  ArchitectTask,
  CoderResult,
  CoderTask,
  CriticResult,
  CriticTask,
  DeployerResult,
  DeployerTask,
  ExecutorResult,
  ExecutorTask
} from '../../types/agent.types.js';

const architectTask: ArchitectTask = { description: 'Build a todo service', requirements: [], constraints: [] };
const coderTask: CoderTask = { description: 'Build a todo service', requirements: [], architecture: null, language: 'typescript' };
const executorTask: ExecutorTask = { description: 'Build a todo service', code: 'run()', language: 'typescript' };
const criticTask: CriticTask = { description: 'Build a todo service', architecture: null, code: '', execution: null };
const deployerTask: DeployerTask = { description: 'Build a todo service', code: 'run()', serviceName: 'todo' };

const structuredCode = [
  'export class TodoList {',
  '  private items: string[] = [];',
  '',
  '  add(item: string): void {',
  '    this.items.push(item);',
  '  }',
  '',
  '  count(): number {',
  '    return this.items.length;',
  '  }',
  '}',
  ''
].join('\n');

function coderResult(overrides: Partial<CoderResult>): CoderResult {
  return {
    code: structuredCode,
    language: 'typescript',
    healed: false,
    issuesFixed: 0,
    linesOfCode: structuredCode.split('\n').length,
    ...overrides
  };
}

function criticResult(overrides: Partial<CriticResult>): CriticResult {
  return {
    critique: 'c'.repeat(60),
    suggestions: ['one', 'two', 'three'],
    assessment: { architecture: 1, code: 1, execution: 1 },
    overallScore: 1,
    passed: true,
    ...overrides
  };
}

describe('scoreStage', () => {
  describe('architect', () => {
    test('should award every component for a substantial, simple design', () => {
      const score = scoreStage(AgentRole.ARCHITECT, architectTask, {
        architecture: 'a'.repeat(101),
        components: ['api'],
        designPatterns: [],
        estimatedComplexity: 2
      });
      expect(score).toBe(1);
    });

    test('should give 0.2 instead of 0.4 for complexity of 5 or more', () => {
      const score = scoreStage(AgentRole.ARCHITECT, architectTask, {
        architecture: 'a'.repeat(101),
        components: ['api'],
        designPatterns: [],
        estimatedComplexity: 5
      });
      expect(score).toBe(0.8);
    });

    test('should only award the complexity component for an empty design', () => {
      const score = scoreStage(AgentRole.ARCHITECT, architectTask, {
        architecture: '',
        components: [],
        designPatterns: [],
        estimatedComplexity: 0
      });
      expect(score).toBe(0.4);
    });
  });

  describe('coder', () => {
    test('should score trivial unstructured code at 0.2', () => {
      expect(scoreStage(AgentRole.CODER, coderTask, coderResult({ code: 'x = 1', linesOfCode: 1 }))).toBe(0.2);
    });

    test('should score clean structured code at 1', () => {
      expect(scoreStage(AgentRole.CODER, coderTask, coderResult({}))).toBe(1);
    });

    test('should reduce the healing component as more issues were fixed', () => {
      expect(scoreStage(AgentRole.CODER, coderTask, coderResult({ issuesFixed: 1, healed: true }))).toBe(0.9);
      expect(scoreStage(AgentRole.CODER, coderTask, coderResult({ issuesFixed: 2, healed: true }))).toBe(0.9);
      expect(scoreStage(AgentRole.CODER, coderTask, coderResult({ issuesFixed: 3, healed: true }))).toBe(0.8);
    });

    test('should not award the size component at 500 lines', () => {
      expect(scoreStage(AgentRole.CODER, coderTask, coderResult({ linesOfCode: 500 }))).toBe(0.8);
    });
  });

  describe('executor', () => {
    const base: ExecutorResult = {
      success: true,
      output: 'ok',
      error: '',
      exitCode: 0,
      durationMs: 120,
      environment: 'sandboxed'
    };

    test('should score a fast successful run at 1', () => {
      expect(scoreStage(AgentRole.EXECUTOR, executorTask, base)).toBe(1);
    });

    test('should drop the speed component at 1000ms', () => {
      expect(scoreStage(AgentRole.EXECUTOR, executorTask, { ...base, durationMs: 1000 })).toBe(0.8);
    });

    test('should score a slow failed run at 0', () => {
      expect(
        scoreStage(AgentRole.EXECUTOR, executorTask, { ...base, success: false, exitCode: 1, durationMs: 1500 })
      ).toBe(0);
    });
  });

  describe('critic', () => {
    test('should weight substance, coverage and assessment', () => {
      const score = scoreStage(AgentRole.CRITIC, criticTask, criticResult({
        suggestions: ['one', 'two'],
        overallScore: 0.5
      }));
      expect(score).toBe(0.7);
    });

    test('should cap suggestion coverage at three suggestions', () => {
      const score = scoreStage(AgentRole.CRITIC, criticTask, criticResult({
        suggestions: ['1', '2', '3', '4', '5']
      }));
      expect(score).toBe(1);
    });

    test('should clamp scores above 1', () => {
      expect(scoreStage(AgentRole.CRITIC, criticTask, criticResult({ overallScore: 5 }))).toBe(1);
    });

    test('should treat a non-finite score as 0', () => {
      expect(scoreStage(AgentRole.CRITIC, criticTask, criticResult({ overallScore: Number.NaN }))).toBe(0);
    });
  });

  describe('deployer', () => {
    const base: DeployerResult = {
      deployed: true,
      deploymentId: 'dep-1',
      endpoint: 'https://staging.agents.local/todo',
      version: 'v1.0.0',
      strategy: 'rolling',
      replicas: 3,
      environment: 'staging',
      healthCheck: 'passing'
    };

    test('should score a healthy replicated deployment at 1', () => {
      expect(scoreStage(AgentRole.DEPLOYER, deployerTask, base)).toBe(1);
    });

    test('should drop the health component when the check fails', () => {
      expect(scoreStage(AgentRole.DEPLOYER, deployerTask, { ...base, healthCheck: 'failing' })).toBe(0.7);
    });

    test('should only award deployment for a single failing replica', () => {
      expect(
        scoreStage(AgentRole.DEPLOYER, deployerTask, { ...base, healthCheck: 'unknown', replicas: 1 })
      ).toBe(0.4);
    });
  });

  test('should score a result that does not match its role as 0', () => {
    const malformed: CoderResult = JSON.parse('{"deployed": true}');
    expect(scoreStage(AgentRole.CODER, coderTask, malformed)).toBe(0);
  });

  test('should return the same score for the same input', () => {
    const result = coderResult({ issuesFixed: 1 });
    expect(scoreStage(AgentRole.CODER, coderTask, result)).toBe(scoreStage(AgentRole.CODER, coderTask, result));
  });

  test('should throw EvaluationError for a role without a scorer', () => {
    const role: AgentRole = JSON.parse('"planner"');
    expect(() => scoreStage(role, coderTask, coderResult({}))).toThrow(EvaluationError);
  });
});

describe('hasCodeStructure', () => {
  test('should detect class and function declarations', () => {
    expect(hasCodeStructure('class A {}')).toBe(true);
    expect(hasCodeStructure('function run() {}')).toBe(true);
    expect(hasCodeStructure('const classic = 1')).toBe(false);
  });
});
