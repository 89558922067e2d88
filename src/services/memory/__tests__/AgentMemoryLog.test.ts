import { describe, expect, test, beforeEach } from '@jest/globals';

import { AgentMemoryLog } from '../AgentMemoryLog.js';

interface Task {
  description: string;
  tags: string[];
}

interface Result {
  output: string;
}

describe('AgentMemoryLog', () => {
  let log: AgentMemoryLog<Task, Result>;

  beforeEach(() => {
    log = new AgentMemoryLog();
  });

  test('should return entries oldest first with increasing sequence numbers', () => {
    log.append({ task: { description: 'a', tags: [] }, action: 'coder', result: { output: '1' }, score: 0.1 });
    log.append({ task: { description: 'b', tags: [] }, action: 'coder', result: { output: '2' }, score: 0.2 });
    log.append({ task: { description: 'c', tags: [] }, action: 'coder', result: { output: '3' }, score: 0.3 });

    const entries = log.getEntries();
    expect(entries.map(entry => entry.task.description)).toEqual(['a', 'b', 'c']);
    expect(entries.map(entry => entry.sequence)).toEqual([0, 1, 2]);
    expect(log.scores()).toEqual([0.1, 0.2, 0.3]);
    expect(log.size).toBe(3);
  });

  test('should store snapshots unaffected by later mutation', () => {
    const task: Task = { description: 'original', tags: ['x'] };
    const result: Result = { output: 'first' };

    log.append({ task, action: 'architect', result, score: 0.5 });
    task.description = 'changed';
    task.tags.push('y');
    result.output = 'second';

    const [entry] = log.getEntries();
    expect(entry.task).toEqual({ description: 'original', tags: ['x'] });
    expect(entry.result).toEqual({ output: 'first' });
    expect(Object.isFrozen(entry)).toBe(true);
  });

  test('should record failed attempts with their error', () => {
    const entry = log.append({
      task: { description: 'a', tags: [] },
      action: 'executor',
      result: null,
      score: 0,
      failed: true,
      error: 'sandbox unavailable'
    });

    expect(entry.failed).toBe(true);
    expect(entry.result).toBeNull();
    expect(entry.error).toBe('sandbox unavailable');
  });

  test('should return the most recent entries from recent()', () => {
    for (const score of [0.1, 0.2, 0.3, 0.4]) {
      log.append({ task: { description: String(score), tags: [] }, action: 'critic', result: null, score });
    }

    expect(log.recent(2).map(entry => entry.score)).toEqual([0.3, 0.4]);
    expect(log.recent(0)).toEqual([]);
    expect(log.latest()?.score).toBe(0.4);
  });

  test('should not expose its internal array', () => {
    log.append({ task: { description: 'a', tags: [] }, action: 'coder', result: null, score: 0 });
    const entries = log.getEntries();
    expect(entries).not.toBe(log.getEntries());
    expect(log.size).toBe(1);
  });

  test('should summarize an empty log as zeros', () => {
    expect(log.summarize()).toEqual({ averageScore: 0, bestScore: 0, worstScore: 0, totalExecutions: 0 });
  });

  test('should summarize scores', () => {
    for (const score of [0.25, 0.75, 0.5]) {
      log.append({ task: { description: 'a', tags: [] }, action: 'coder', result: null, score });
    }

    expect(log.summarize()).toEqual({ averageScore: 0.5, bestScore: 0.75, worstScore: 0.25, totalExecutions: 3 });
  });
});
