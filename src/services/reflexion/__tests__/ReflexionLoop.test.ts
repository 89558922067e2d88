import { describe, expect, jest, test } from '@jest/globals';

import { runReflexionLoop } from '../ReflexionLoop.js';
import { ArchitectAgent } from '../../../agents/implementations/ArchitectAgent.js';
import { CoderAgent } from '../../../agents/implementations/CoderAgent.js';
import { createMockProviders } from '../../../providers/index.js';
import { InferenceProvider } from '../../../providers/types.js';
import {
  BudgetExhaustedError,
  ExecutionError,
  InvalidConfigurationError
} from '../../../errors/foundryErrors.js';
import { AgentStatus, CoderTask } from '../../../types/agent.types.js';

// 13 lines after healing, one line with trailing whitespace: scores 0.9
const goodCode = [
  'export class Counter {',
  '  private value = 0;  ',
  '',
  '  increment(): number {',
  '    this.value += 1;',
  '    return this.value;',
  '  }',
  '',
  '  reset(): void {',
  '    this.value = 0;',
  '  }',
  '}',
  ''
].join('\n');

const coderTask: CoderTask = {
  description: 'Counter service',
  requirements: [],
  architecture: null,
  language: 'typescript'
};

function coderWith(generate: InferenceProvider['generate']): CoderAgent {
  return new CoderAgent({
    agentId: 'c',
    generation: 0,
    providers: createMockProviders({ inference: { generate } })
  });
}

describe('runReflexionLoop', () => {
  test('should stop after one iteration when the threshold is met', async () => {
    const agent = new ArchitectAgent({ agentId: 'a', generation: 0, providers: createMockProviders() });

    const result = await runReflexionLoop(
      agent,
      { description: 'Task tracker', requirements: [], constraints: [] },
      { maxLoops: 5, performanceThreshold: 0.75 }
    );

    expect(result.loopsExecuted).toBe(1);
    expect(result.bestScore).toBe(1);
    expect(result.thresholdMet).toBe(true);
    expect(result.status).toBe('completed');
    expect(result.budgetExhausted).toBeUndefined();
    expect(agent.status).toBe(AgentStatus.COMPLETED);
    expect(agent.memory).toHaveLength(1);
  });

  test('should keep iterating until a late attempt reaches the threshold', async () => {
    const generate = jest.fn<InferenceProvider['generate']>()
      .mockResolvedValueOnce('x = 1')
      .mockResolvedValueOnce('x = 1')
      .mockResolvedValueOnce('x = 1')
      .mockResolvedValueOnce('x = 1')
      .mockResolvedValueOnce(goodCode);
    const agent = coderWith(generate);

    const result = await runReflexionLoop(agent, coderTask, { maxLoops: 5, performanceThreshold: 0.85 });

    expect(result.scores).toEqual([0.2, 0.2, 0.2, 0.2, 0.9]);
    expect(result.loopsExecuted).toBe(5);
    expect(result.bestScore).toBe(0.9);
    expect(result.bestResult?.issuesFixed).toBe(1);
    expect(result.thresholdMet).toBe(true);
    expect(agent.memory).toHaveLength(5);
  });

  test('should return the first best result when the budget runs out', async () => {
    const generate = jest.fn<InferenceProvider['generate']>()
      .mockResolvedValueOnce('x = 1')
      .mockResolvedValue('y = 2');
    const agent = coderWith(generate);

    const result = await runReflexionLoop(agent, coderTask, { maxLoops: 3, performanceThreshold: 0.85 });

    expect(result.loopsExecuted).toBe(3);
    expect(result.bestScore).toBe(0.2);
    expect(result.bestResult?.code).toBe('x = 1');
    expect(result.thresholdMet).toBe(false);
    expect(result.status).toBe('completed');
    expect(result.budgetExhausted).toBeInstanceOf(BudgetExhaustedError);
    expect(result.budgetExhausted?.loopsExecuted).toBe(3);
  });

  test('should execute exactly once with a budget of one', async () => {
    const generate = jest.fn<InferenceProvider['generate']>().mockResolvedValue('x = 1');

    const result = await runReflexionLoop(coderWith(generate), coderTask, { maxLoops: 1, performanceThreshold: 0.85 });

    expect(generate).toHaveBeenCalledTimes(1);
    expect(result.loopsExecuted).toBe(1);
  });

  test('should reject invalid options before executing', async () => {
    const generate = jest.fn<InferenceProvider['generate']>().mockResolvedValue('x = 1');
    const agent = coderWith(generate);

    await expect(runReflexionLoop(agent, coderTask, { maxLoops: 0, performanceThreshold: 0.5 }))
      .rejects.toThrow(InvalidConfigurationError);
    await expect(runReflexionLoop(agent, coderTask, { maxLoops: 1.5, performanceThreshold: 0.5 }))
      .rejects.toThrow(InvalidConfigurationError);
    await expect(runReflexionLoop(agent, coderTask, { maxLoops: 3, performanceThreshold: 1.5 }))
      .rejects.toThrow(InvalidConfigurationError);
    expect(generate).not.toHaveBeenCalled();
  });

  test('should record failed iterations and continue', async () => {
    const generate = jest.fn<InferenceProvider['generate']>()
      .mockRejectedValueOnce(new Error('boom'))
      .mockRejectedValueOnce(new Error('boom'))
      .mockResolvedValueOnce(goodCode);
    const agent = coderWith(generate);

    const result = await runReflexionLoop(agent, coderTask, { maxLoops: 5, performanceThreshold: 0.85 });

    expect(result.scores).toEqual([0, 0, 0.9]);
    expect(result.failures).toBe(2);
    expect(result.status).toBe('completed');

    const [first] = agent.memory;
    expect(first.failed).toBe(true);
    expect(first.score).toBe(0);
    expect(first.result).toBeNull();
    expect(first.error).toBe('Execution failed for c: boom');
  });

  test('should report failure without throwing when every iteration fails', async () => {
    const generate = jest.fn<InferenceProvider['generate']>().mockRejectedValue(new Error('offline'));
    const agent = coderWith(generate);

    const result = await runReflexionLoop(agent, coderTask, { maxLoops: 3, performanceThreshold: 0.5 });

    expect(result.status).toBe('failed');
    expect(result.bestResult).toBeNull();
    expect(result.bestScore).toBe(0);
    expect(result.failures).toBe(3);
    expect(agent.status).toBe(AgentStatus.FAILED);
  });

  test('should turn a slow execute step into a failed iteration', async () => {
    const generate = jest.fn<InferenceProvider['generate']>().mockImplementation(() => new Promise<string>(() => undefined));
    const agent = coderWith(generate);

    const result = await runReflexionLoop(agent, coderTask, {
      maxLoops: 2,
      performanceThreshold: 0.5,
      stageTimeoutMs: 10
    });

    expect(result.status).toBe('failed');
    expect(result.failures).toBe(2);
    expect(agent.memory[0].error).toBe(new ExecutionError('timed out after 10ms', 'c').message);
  });

  test('should adapt the strategy between iterations', async () => {
    const generate = jest.fn<InferenceProvider['generate']>().mockResolvedValue('x = 1');
    const agent = coderWith(generate);

    await runReflexionLoop(agent, coderTask, { maxLoops: 3, performanceThreshold: 0.85 });

    // One entry is neutral; two equal low scores nudge exploration up
    expect(generate.mock.calls[0][1].temperature).toBe(0.5);
    expect(generate.mock.calls[1][1].temperature).toBe(0.5);
    expect(generate.mock.calls[2][1].temperature).toBeCloseTo(0.53);
  });
});
