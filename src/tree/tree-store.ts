import type { LockOptions } from './tree-query.js';
import type {
  NestedSetBounds,
  ShiftOperation,
  TreePk,
  TreeRow,
  TreeScope,
} from './tree-types.js';

/**
 * Storage operations available inside one unit of work.
 * Rows are returned as stored, keyed by column name.
 */
export interface TreeStoreSession {
  findByPk(pk: TreePk, options?: LockOptions): Promise<TreeRow | null>;

  /** Largest rght of the scope, 0 for an empty tree. */
  findMaxRght(options?: LockOptions): Promise<number>;

  /** Locks the rows a shift beyond `threshold` will touch. */
  lockFrom(threshold: number): Promise<void>;

  findAncestors(bounds: NestedSetBounds): Promise<TreeRow[]>;
  countAncestors(bounds: NestedSetBounds): Promise<number>;
  findDescendants(bounds: NestedSetBounds): Promise<TreeRow[]>;
  findRoots(): Promise<TreeRow[]>;
  findAll(): Promise<TreeRow[]>;

  /** Inserts one row and returns it as stored, primary key included. */
  insert(values: TreeRow): Promise<TreeRow>;

  shift(operation: ShiftOperation): Promise<void>;

  /** Deletes every row inside `[lft, rght]`. */
  deleteRange(bounds: NestedSetBounds): Promise<void>;

  park(bounds: NestedSetBounds): Promise<void>;
  unpark(offset: number): Promise<void>;
}

/**
 * Storage collaborator of the tree manager.
 */
export interface TreeStore {
  /** Scope values the store is bound to; written into every inserted row. */
  readonly scope: TreeScope;

  /**
   * Runs `work` as one unit of work: committed when it resolves, rolled back
   * when it throws. `operation` names the call for error reporting.
   */
  transaction<T>(operation: string, work: (session: TreeStoreSession) => Promise<T>): Promise<T>;

  /**
   * Runs read-only `work` against one consistent view of the tree, so bounds
   * read by one statement still hold for the next.
   */
  read<T>(operation: string, work: (session: TreeStoreSession) => Promise<T>): Promise<T>;

  /** Returns a store over the same storage bound to other scope values. */
  withScope(scope: TreeScope): TreeStore;
}
