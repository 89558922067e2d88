/**
 * Evolution Tree Types
 */

/**
 * How a node entered the tree
 */
export enum SpawnReason {
  /** Created with a pipeline */
  GENESIS = 'genesis',

  /** Spawned from a parent after a pipeline crossed the evolution threshold */
  EVOLUTION = 'evolution'
}

export type NodeMetadataValue = string | number | boolean | null;

export type NodeMetadata = Record<string, NodeMetadataValue>;

/**
 * One agent instance in the evolution forest
 */
export interface EvolutionNode {
  /** Same as the agent id */
  nodeId: string;

  /** 0 for roots, parent generation + 1 otherwise */
  generation: number;

  /** Latest score in [0, 1] */
  performanceScore: number;

  /** Absent for roots */
  parentId?: string;

  metadata: NodeMetadata;

  /** ISO timestamp */
  createdAt: string;
}

export interface EvolutionEdge {
  parentId: string;
  childId: string;
}

export interface AddNodeInput {
  nodeId: string;
  generation: number;
  performanceScore: number;
  parentId?: string;
  metadata?: NodeMetadata;
}

export interface EvolutionStats {
  totalNodes: number;
  totalEdges: number;
  totalGenerations: number;
  averagePerformance: number;
  bestPerformance: number;
}

export interface EvolutionTreeJSON {
  nodes: EvolutionNode[];
  edges: EvolutionEdge[];
  stats: EvolutionStats;
}
