import { describe, expect, it } from 'vitest';
import {
  BoundaryOverflowError,
  ConcurrencyConflictError,
  CycleRejectedError,
  InvalidStateError,
  NodeNotFoundError,
  TreeError,
  isRetryableTreeError,
  isTreeError,
} from '../../src/tree/tree-errors.js';

describe('Tree errors', () => {
  it('reports a missing node with its primary key', () => {
    const error = new NodeNotFoundError(7);

    expect(error).toBeInstanceOf(TreeError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('NodeNotFoundError');
    expect(error.message).toBe('Node 7 not found');
    expect(error.code).toBe('NOT_FOUND');
    expect(error.retryable).toBe(false);
    expect(error.meta).toEqual({ pk: 7 });
  });

  it('describes a rejected cycle with both nodes', () => {
    const error = new CycleRejectedError({ lft: 2, rght: 5 }, { lft: 3, rght: 4 }, 'lastChild');

    expect(error.code).toBe('CYCLE_REJECTED');
    expect(error.message).toBe(
      'Cannot move node (2-5) lastChild node (3-4): target is the node itself or one of its descendants'
    );
  });

  it('reports the boundary that would overflow', () => {
    const error = new BoundaryOverflowError(2_147_483_648, 2_147_483_647);

    expect(error.code).toBe('BOUNDARY_OVERFLOW');
    expect(error.message).toBe(
      'Boundary value 2147483648 exceeds the maximum representable boundary 2147483647'
    );
    expect(error.meta).toEqual({ required: 2_147_483_648, maxBoundary: 2_147_483_647 });
  });

  it('marks concurrency conflicts retryable and keeps the storage error as cause', () => {
    const storageError = Object.assign(new Error('SQLITE_BUSY: database is locked'), { code: 'SQLITE_BUSY' });
    const error = new ConcurrencyConflictError('addChild', storageError);

    expect(error.code).toBe('CONCURRENCY_CONFLICT');
    expect(error.retryable).toBe(true);
    expect(error.cause).toBe(storageError);
    expect(error.message).toBe('Concurrent modification while running addChild: SQLITE_BUSY: database is locked');
    expect(error.meta).toEqual({ operation: 'addChild' });
  });

  it('has no cause unless one is given', () => {
    expect(new InvalidStateError('Node 1 was already deleted').cause).toBeUndefined();
  });

  it('narrows with the type guards', () => {
    const conflict = new ConcurrencyConflictError('moveSubtree', 'deadlock');
    const invalid = new InvalidStateError('bad', { pk: 1 });

    expect(conflict.message).toBe('Concurrent modification while running moveSubtree: deadlock');
    expect(isTreeError(conflict)).toBe(true);
    expect(isTreeError(new Error('plain'))).toBe(false);
    expect(isRetryableTreeError(conflict)).toBe(true);
    expect(isRetryableTreeError(invalid)).toBe(false);
    expect(invalid.code).toBe('INVALID_STATE');
    expect(invalid.meta).toEqual({ pk: 1 });
  });
});
