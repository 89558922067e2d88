/**
 * Agent Memory Log
 *
 * Append-only record of an agent's past attempts. Entries are frozen deep
 * copies taken at append time and are returned in insertion order, oldest
 * first.
 */

import { PerformanceSummary } from '../../types/agent.types.js';

export interface MemoryEntry<TTask, TResult> {
  /** Position in the log, starting at 0 */
  readonly sequence: number;

  /** Snapshot of the task the agent was given */
  readonly task: TTask;

  /** Role that acted */
  readonly action: string;

  /** Snapshot of the produced result, null when the attempt failed */
  readonly result: TResult | null;

  /** Score in [0, 1]; 0 for failed attempts */
  readonly score: number;

  readonly timestamp: number;

  readonly failed: boolean;

  readonly error?: string;
}

export interface MemoryEntryInput<TTask, TResult> {
  task: TTask;
  action: string;
  result: TResult | null;
  score: number;
  failed?: boolean;
  error?: string;
}

export class AgentMemoryLog<TTask, TResult> {
  private entries: MemoryEntry<TTask, TResult>[] = [];

  /**
   * Append an attempt to the log
   * @returns The stored entry
   */
  public append(input: MemoryEntryInput<TTask, TResult>): MemoryEntry<TTask, TResult> {
    const entry: MemoryEntry<TTask, TResult> = Object.freeze({
      sequence: this.entries.length,
      task: structuredClone(input.task),
      action: input.action,
      result: input.result === null ? null : structuredClone(input.result),
      score: input.score,
      timestamp: Date.now(),
      failed: input.failed ?? false,
      ...(input.error !== undefined ? { error: input.error } : {})
    });

    this.entries.push(entry);
    return entry;
  }

  public get size(): number {
    return this.entries.length;
  }

  /**
   * All entries, oldest first
   */
  public getEntries(): ReadonlyArray<MemoryEntry<TTask, TResult>> {
    return [...this.entries];
  }

  /**
   * The last `count` entries, oldest first
   */
  public recent(count: number): ReadonlyArray<MemoryEntry<TTask, TResult>> {
    if (count <= 0) return [];
    return this.entries.slice(-count);
  }

  public latest(): MemoryEntry<TTask, TResult> | undefined {
    return this.entries[this.entries.length - 1];
  }

  public scores(): number[] {
    return this.entries.map(entry => entry.score);
  }

  public summarize(): PerformanceSummary {
    const scores = this.scores();
    if (scores.length === 0) {
      return { averageScore: 0, bestScore: 0, worstScore: 0, totalExecutions: 0 };
    }

    return {
      averageScore: scores.reduce((sum, score) => sum + score, 0) / scores.length,
      bestScore: Math.max(...scores),
      worstScore: Math.min(...scores),
      totalExecutions: scores.length
    };
  }
}
