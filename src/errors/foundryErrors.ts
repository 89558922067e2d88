/**
 * Custom error classes for the agent foundry
 */

/**
 * Base class for all foundry errors
 */
export class FoundryError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'FoundryError';
  }
}

/**
 * Error thrown when a stage's task logic fails.
 * Provider failures are wrapped into this error at the agent boundary.
 */
export class ExecutionError extends FoundryError {
  constructor(
    message: string,
    public readonly agentId: string,
    public readonly originalError?: unknown
  ) {
    super(`Execution failed for ${agentId}: ${message}`, 'EXECUTION_FAILED');
    this.name = 'ExecutionError';
  }
}

/**
 * Error thrown when a result cannot be scored
 */
export class EvaluationError extends FoundryError {
  constructor(message: string, public readonly role: string) {
    super(`Evaluation failed for ${role}: ${message}`, 'EVALUATION_FAILED');
    this.name = 'EvaluationError';
  }
}

/**
 * Informational: a reflexion loop used its whole budget without reaching
 * the performance threshold
 */
export class BudgetExhaustedError extends FoundryError {
  constructor(
    public readonly agentId: string,
    public readonly loopsExecuted: number,
    public readonly bestScore: number,
    public readonly threshold: number
  ) {
    super(
      `Agent ${agentId} exhausted ${loopsExecuted} loops with best score ${bestScore.toFixed(2)} (threshold ${threshold})`,
      'BUDGET_EXHAUSTED'
    );
    this.name = 'BudgetExhaustedError';
  }
}

/**
 * Base class for violations of the evolution forest structure
 */
export class EvolutionStructureError extends FoundryError {
  constructor(message: string, code: string, public readonly nodeId: string) {
    super(message, code);
    this.name = 'EvolutionStructureError';
  }
}

export class DuplicateNodeError extends EvolutionStructureError {
  constructor(nodeId: string) {
    super(`Node ${nodeId} already exists in the evolution tree`, 'DUPLICATE_NODE', nodeId);
    this.name = 'DuplicateNodeError';
  }
}

export class MissingParentError extends EvolutionStructureError {
  constructor(nodeId: string, public readonly parentId: string) {
    super(`Parent ${parentId} of node ${nodeId} is not in the evolution tree`, 'MISSING_PARENT', nodeId);
    this.name = 'MissingParentError';
  }
}

/**
 * Error thrown when a node's generation does not follow from its parent
 */
export class GenerationMismatchError extends EvolutionStructureError {
  constructor(nodeId: string, public readonly expected: number, public readonly actual: number) {
    super(`Node ${nodeId} has generation ${actual}, expected ${expected}`, 'GENERATION_MISMATCH', nodeId);
    this.name = 'GenerationMismatchError';
  }
}

/**
 * Error thrown when a spawned child's derived id is already taken
 */
export class CollisionError extends EvolutionStructureError {
  constructor(nodeId: string, public readonly parentId: string) {
    super(`Cannot spawn ${nodeId} from ${parentId}: id already exists`, 'ID_COLLISION', nodeId);
    this.name = 'CollisionError';
  }
}

export class PipelineNotFoundError extends FoundryError {
  constructor(public readonly pipelineId: string) {
    super(`Pipeline ${pipelineId} not found`, 'PIPELINE_NOT_FOUND');
    this.name = 'PipelineNotFoundError';
  }
}

/**
 * Error thrown when a pipeline operation is not valid in its current status
 */
export class PipelineStateError extends FoundryError {
  constructor(public readonly pipelineId: string, message: string) {
    super(`Pipeline ${pipelineId}: ${message}`, 'PIPELINE_STATE');
    this.name = 'PipelineStateError';
  }
}

export class InvalidConfigurationError extends FoundryError {
  constructor(message: string, public readonly validationErrors: string[] = []) {
    super(`Invalid configuration: ${message}`, 'INVALID_CONFIGURATION');
    this.name = 'InvalidConfigurationError';
  }
}
