/**
 * Evolution Module
 *
 * Lineage tracking for spawned agent generations.
 */

export * from './types.js';
export * from './EvolutionTree.js';
