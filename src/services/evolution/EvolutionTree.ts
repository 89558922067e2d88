/**
 * Evolution Tree
 *
 * Forest of agent instances organised by generation. Roots are the agents a
 * pipeline was created with; every other node is a child spawned from a
 * parent one generation earlier.
 *
 * Every mutation runs synchronously. A mutation therefore never interleaves
 * with another one on the event loop, and a node and its edge are always
 * committed together.
 *
 * Events:
 * - `node:added` (node, edge | null)
 * - `node:updated` (node, previousScore)
 */

import { EventEmitter } from 'events';
import { createLogger } from '../../common/logger.js';
import {
  DuplicateNodeError,
  GenerationMismatchError,
  MissingParentError
} from '../../errors/foundryErrors.js';
import {
  AddNodeInput,
  EvolutionEdge,
  EvolutionNode,
  EvolutionStats,
  EvolutionTreeJSON
} from './types.js';

const logger = createLogger('EvolutionTree');

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function copyNode(node: EvolutionNode): EvolutionNode {
  return { ...node, metadata: { ...node.metadata } };
}

export class EvolutionTree extends EventEmitter {
  private nodes: Map<string, EvolutionNode> = new Map();
  private children: Map<string, string[]> = new Map();
  private edges: EvolutionEdge[] = [];
  private generations: Map<number, Set<string>> = new Map();

  /**
   * Add a node, and the edge from its parent when it has one
   * @throws DuplicateNodeError, MissingParentError or GenerationMismatchError; nothing is added then
   */
  public addNode(input: AddNodeInput): EvolutionNode {
    const { nodeId, parentId } = input;

    if (this.nodes.has(nodeId)) {
      throw new DuplicateNodeError(nodeId);
    }

    let expectedGeneration = 0;
    if (parentId !== undefined) {
      const parent = this.nodes.get(parentId);
      if (!parent) {
        throw new MissingParentError(nodeId, parentId);
      }
      expectedGeneration = parent.generation + 1;
    }

    if (input.generation !== expectedGeneration) {
      throw new GenerationMismatchError(nodeId, expectedGeneration, input.generation);
    }

    const node: EvolutionNode = {
      nodeId,
      generation: input.generation,
      performanceScore: input.performanceScore,
      ...(parentId !== undefined ? { parentId } : {}),
      metadata: { ...input.metadata },
      createdAt: new Date().toISOString()
    };

    // Commit node and edge together
    this.nodes.set(nodeId, node);
    this.children.set(nodeId, []);

    let generation = this.generations.get(node.generation);
    if (!generation) {
      generation = new Set();
      this.generations.set(node.generation, generation);
    }
    generation.add(nodeId);

    let edge: EvolutionEdge | null = null;
    if (parentId !== undefined) {
      edge = { parentId, childId: nodeId };
      this.edges.push(edge);
      this.children.get(parentId)?.push(nodeId);
    }

    logger.debug(`Added node ${nodeId}`, { generation: node.generation, parentId });
    this.emit('node:added', copyNode(node), edge ? { ...edge } : null);
    return copyNode(node);
  }

  /**
   * Set a node's performance score
   * @returns false when the node does not exist
   */
  public updatePerformance(nodeId: string, performanceScore: number): boolean {
    const node = this.nodes.get(nodeId);
    if (!node) {
      logger.warn(`Cannot update performance of unknown node ${nodeId}`);
      return false;
    }

    const previousScore = node.performanceScore;
    node.performanceScore = performanceScore;
    this.emit('node:updated', copyNode(node), previousScore);
    return true;
  }

  public getNode(nodeId: string): EvolutionNode | undefined {
    const node = this.nodes.get(nodeId);
    return node ? copyNode(node) : undefined;
  }

  public hasNode(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  /**
   * Direct children in creation order
   */
  public getChildren(nodeId: string): string[] {
    return [...(this.children.get(nodeId) ?? [])];
  }

  /**
   * All descendants, breadth first
   */
  public getDescendants(nodeId: string): string[] {
    const descendants: string[] = [];
    const queue = this.getChildren(nodeId);

    while (queue.length > 0) {
      const next = queue.shift();
      if (next === undefined) break;
      descendants.push(next);
      queue.push(...this.getChildren(next));
    }

    return descendants;
  }

  /**
   * Ancestry of a node, root first and the node itself last.
   * Unknown ids give an empty array.
   */
  public getLineage(nodeId: string): string[] {
    const lineage: string[] = [];
    let current = this.nodes.get(nodeId);

    while (current) {
      lineage.push(current.nodeId);
      current = current.parentId !== undefined ? this.nodes.get(current.parentId) : undefined;
    }

    return lineage.reverse();
  }

  /**
   * Path from an ancestor down to a descendant
   * @returns null when either node is unknown or `toId` does not descend from `fromId`
   */
  public getEvolutionPath(fromId: string, toId: string): string[] | null {
    if (!this.nodes.has(fromId) || !this.nodes.has(toId)) {
      return null;
    }

    const lineage = this.getLineage(toId);
    const start = lineage.indexOf(fromId);
    return start === -1 ? null : lineage.slice(start);
  }

  /**
   * Relative score change from the root of a node's lineage to the node.
   * 0 for roots, unknown nodes and lineages whose root scored 0.
   */
  public calculateImprovementRate(nodeId: string): number {
    const lineage = this.getLineage(nodeId);
    if (lineage.length < 2) {
      return 0;
    }

    const initial = this.nodes.get(lineage[0])?.performanceScore ?? 0;
    const final = this.nodes.get(nodeId)?.performanceScore ?? 0;
    if (initial === 0) {
      return 0;
    }

    return round4((final - initial) / initial);
  }

  public getGeneration(generation: number): Set<string> {
    return new Set(this.generations.get(generation) ?? []);
  }

  /**
   * Highest-scoring nodes, ties broken by creation order
   */
  public topPerformers(count: number): EvolutionNode[] {
    if (count <= 0) {
      return [];
    }

    // Map iteration follows insertion order and the sort is stable
    return Array.from(this.nodes.values())
      .sort((a, b) => b.performanceScore - a.performanceScore)
      .slice(0, count)
      .map(copyNode);
  }

  public stats(): EvolutionStats {
    const scores = Array.from(this.nodes.values()).map(node => node.performanceScore);

    return {
      totalNodes: this.nodes.size,
      totalEdges: this.edges.length,
      totalGenerations: this.generations.size,
      averagePerformance: scores.length > 0
        ? round4(scores.reduce((sum, score) => sum + score, 0) / scores.length)
        : 0,
      bestPerformance: scores.length > 0 ? Math.max(...scores) : 0
    };
  }

  public toJSON(): EvolutionTreeJSON {
    return {
      nodes: Array.from(this.nodes.values()).map(copyNode),
      edges: this.edges.map(edge => ({ ...edge })),
      stats: this.stats()
    };
  }
}
