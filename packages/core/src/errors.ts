/**
 * Error Taxonomy
 *
 * Standard error types for workflow construction, execution and lookup.
 *
 * Hard rules:
 * - Every error has a code for programmatic handling
 * - Every error serializes to a log-friendly record
 *
 * @module @flowgraph/core/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard flowgraph error codes
 */
export type FlowErrorCode =
  // Graph construction (4xx-like, caller mistakes)
  | 'VALIDATION_ERROR'
  | 'CYCLE_DETECTED'
  | 'STRUCTURAL_ERROR'

  // Lookup
  | 'NOT_FOUND'

  // Runtime
  | 'EXECUTION_ERROR'

  // Internal errors
  | 'CONFIGURATION_ERROR'
  | 'UNHANDLED_ERROR';

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Flow error options
 */
export interface FlowErrorOptions {
  /** Error code */
  code: FlowErrorCode;

  /** Additional context for debugging */
  context?: Record<string, unknown>;

  /** Underlying cause */
  cause?: Error;
}

/**
 * Base flowgraph error class
 *
 * All flowgraph errors extend this for consistent handling.
 */
export class FlowError extends Error {
  readonly code: FlowErrorCode;
  readonly context?: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(message: string, options: FlowErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'FlowError';
    this.code = options.code;
    this.context = options.context;
    this.timestamp = new Date();

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
    };
  }
}

// =============================================================================
// Graph Construction Errors
// =============================================================================

/**
 * Validation error - an edge references a node that was never registered
 */
export class ValidationError extends FlowError {
  constructor(message: string, options?: { context?: Record<string, unknown> }) {
    super(message, {
      code: 'VALIDATION_ERROR',
      context: options?.context,
    });
    this.name = 'ValidationError';
  }
}

/**
 * Cycle error - an edge would point back at the root or at a predecessor
 */
export class CycleError extends FlowError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string, options?: { context?: Record<string, unknown> }) {
    super(`circular detection from '${from}' to '${to}'`, {
      code: 'CYCLE_DETECTED',
      context: { from, to, ...options?.context },
    });
    this.name = 'CycleError';
    this.from = from;
    this.to = to;
  }
}

/**
 * Structural error - the edge form does not fit the node's existing wiring
 */
export class StructuralError extends FlowError {
  readonly nodeKey?: string;

  constructor(message: string, options?: { nodeKey?: string; context?: Record<string, unknown> }) {
    super(message, {
      code: 'STRUCTURAL_ERROR',
      context: options?.context,
    });
    this.name = 'StructuralError';
    this.nodeKey = options?.nodeKey;
  }
}

// =============================================================================
// Runtime Errors
// =============================================================================

/**
 * Execution error - a node action failed while a workflow was running
 */
export class ExecutionError extends FlowError {
  readonly nodeKey: string;
  readonly workflow?: string;

  constructor(
    nodeKey: string,
    cause: unknown,
    options?: { workflow?: string; context?: Record<string, unknown> }
  ) {
    const causeError = cause instanceof Error ? cause : undefined;
    const reason = causeError ? causeError.message : String(cause);
    super(reason, {
      code: 'EXECUTION_ERROR',
      cause: causeError,
      context: { nodeKey, workflow: options?.workflow, ...options?.context },
    });
    this.name = 'ExecutionError';
    this.nodeKey = nodeKey;
    this.workflow = options?.workflow;
  }
}

/**
 * Lookup error - no workflow is stored under the requested name
 */
export class WorkflowNotFoundError extends FlowError {
  readonly workflowName: string;

  constructor(workflowName: string) {
    super(`workflow '${workflowName}' not found`, {
      code: 'NOT_FOUND',
      context: { workflow: workflowName },
    });
    this.name = 'WorkflowNotFoundError';
    this.workflowName = workflowName;
  }
}

/**
 * Configuration error - environment failed validation
 */
export class ConfigurationError extends FlowError {
  readonly fieldErrors: Record<string, string>;

  constructor(message: string, fieldErrors: Record<string, string> = {}) {
    super(message, {
      code: 'CONFIGURATION_ERROR',
      context: { fieldErrors },
    });
    this.name = 'ConfigurationError';
    this.fieldErrors = fieldErrors;
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Check whether a value is a FlowError
 */
export function isFlowError(error: unknown): error is FlowError {
  return error instanceof FlowError;
}

/**
 * Wrap any error as a FlowError
 */
export function wrapError(error: unknown, code: FlowErrorCode = 'UNHANDLED_ERROR'): FlowError {
  if (error instanceof FlowError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new FlowError(message, { code, cause });
}
