import type { MovePosition, NestedSetBounds, TreePk } from './tree-types.js';

export type TreeErrorCode =
  | 'NOT_FOUND'
  | 'CYCLE_REJECTED'
  | 'BOUNDARY_OVERFLOW'
  | 'CONCURRENCY_CONFLICT'
  | 'INVALID_STATE';

/**
 * Base class of every error raised by tree operations.
 */
export abstract class TreeError extends Error {
  abstract readonly code: TreeErrorCode;

  /** Whether re-issuing the same call may succeed */
  readonly retryable: boolean = false;

  /**
   * @param message error message
   * @param meta additional metadata (if any)
   * @param cause source error (if any)
   */
  protected constructor(
    message: string,
    public readonly meta: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
  }
}

/**
 * The referenced node does not exist, or was removed.
 */
export class NodeNotFoundError extends TreeError {
  readonly code = 'NOT_FOUND';

  constructor(pk: TreePk) {
    super(`Node ${String(pk)} not found`, { pk });
  }
}

/**
 * A move would place a node under itself or one of its own descendants.
 */
export class CycleRejectedError extends TreeError {
  readonly code = 'CYCLE_REJECTED';

  constructor(node: NestedSetBounds, target: NestedSetBounds, position: MovePosition) {
    super(
      `Cannot move node (${node.lft}-${node.rght}) ${position} node (${target.lft}-${target.rght}): ` +
      'target is the node itself or one of its descendants',
      { node, target, position }
    );
  }
}

/**
 * A plan would write a boundary beyond the configured maximum.
 */
export class BoundaryOverflowError extends TreeError {
  readonly code = 'BOUNDARY_OVERFLOW';

  constructor(required: number, maxBoundary: number) {
    super(
      `Boundary value ${required} exceeds the maximum representable boundary ${maxBoundary}`,
      { required, maxBoundary }
    );
  }
}

/**
 * Storage reported a lock-wait timeout, deadlock or serialization failure.
 * The transaction was rolled back; the call can be re-issued as is.
 */
export class ConcurrencyConflictError extends TreeError {
  readonly code = 'CONCURRENCY_CONFLICT';
  override readonly retryable = true;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Concurrent modification while running ${operation}: ${reason}`, { operation }, cause);
  }
}

/**
 * The operation is not valid for the node in its current state.
 */
export class InvalidStateError extends TreeError {
  readonly code = 'INVALID_STATE';

  constructor(message: string, meta: Record<string, unknown> = {}) {
    super(message, meta);
  }
}

export const isTreeError = (error: unknown): error is TreeError => error instanceof TreeError;

export const isRetryableTreeError = (error: unknown): error is ConcurrencyConflictError =>
  error instanceof ConcurrencyConflictError;
