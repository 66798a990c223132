/**
 * Tree Behavior Types
 *
 * Core type definitions for the Nested Set tree implementation.
 * These types support hierarchical data structures in relational databases.
 */

/**
 * Largest boundary value a plan may produce by default: the maximum of a
 * signed 32-bit `INT` column.
 */
export const MAX_BOUNDARY = 2_147_483_647;

/**
 * Configuration options for tree behavior.
 */
export interface TreeConfig {
  /** Column name of the storage-assigned primary key (default: 'id') */
  primaryKey: string;
  /** Column name for left boundary (default: 'lft') */
  leftKey: string;
  /** Column name for right boundary (default: 'rght') */
  rightKey: string;
  /** Columns used for scoping multiple trees in one table (e.g., ['tenantId']) */
  scope?: string[];
  /** Largest boundary value any operation may write (default: MAX_BOUNDARY) */
  maxBoundary: number;
}

/**
 * Default tree configuration values.
 */
export const DEFAULT_TREE_CONFIG: Readonly<Required<Omit<TreeConfig, 'scope'>>> = {
  primaryKey: 'id',
  leftKey: 'lft',
  rightKey: 'rght',
  maxBoundary: MAX_BOUNDARY,
};

/**
 * Type guard to check if a value is a valid TreeConfig.
 */
export function isTreeConfig(value: unknown): value is TreeConfig {
  if (typeof value !== 'object' || value === null) return false;
  const keys = ['primaryKey', 'leftKey', 'rightKey'].map(key => Reflect.get(value, key));
  const maxBoundary: unknown = Reflect.get(value, 'maxBoundary');
  return keys.every(key => typeof key === 'string') && typeof maxBoundary === 'number';
}

/**
 * Merges partial config with defaults.
 */
export function resolveTreeConfig(partial: Partial<TreeConfig>): TreeConfig {
  const maxBoundary = partial.maxBoundary ?? DEFAULT_TREE_CONFIG.maxBoundary;
  if (!Number.isSafeInteger(maxBoundary) || maxBoundary < 2) {
    throw new Error(`maxBoundary must be a safe integer >= 2, got ${maxBoundary}`);
  }

  return {
    primaryKey: partial.primaryKey ?? DEFAULT_TREE_CONFIG.primaryKey,
    leftKey: partial.leftKey ?? DEFAULT_TREE_CONFIG.leftKey,
    rightKey: partial.rightKey ?? DEFAULT_TREE_CONFIG.rightKey,
    scope: partial.scope,
    maxBoundary,
  };
}

/**
 * A raw table row keyed by column name.
 */
export type TreeRow = Record<string, unknown>;

/**
 * Primary key values a node can be referenced by.
 */
export type TreePk = string | number;

/**
 * Scope values for multi-tree tables.
 */
export type TreeScope = Record<string, unknown>;

/**
 * Internal representation of nested set boundaries for calculations.
 */
export interface NestedSetBounds {
  lft: number;
  rght: number;
}

/**
 * Where a new or moved node lands relative to a parent.
 */
export type ChildPosition = 'firstChild' | 'lastChild';

/**
 * Where a new or moved node lands relative to a sibling.
 */
export type SiblingPosition = 'before' | 'after';

/**
 * Any placement relative to a reference node.
 */
export type MovePosition = ChildPosition | SiblingPosition;

/**
 * The single bulk-update primitive: add `delta` to every `lft` and every
 * `rght` strictly greater than `threshold`.
 */
export interface ShiftOperation {
  threshold: number;
  delta: number;
}

/**
 * Boundaries for one inserted node plus the shift that makes room for it.
 * `shift` is null when the node goes after everything else (a new root).
 */
export interface InsertPlan extends NestedSetBounds {
  shift: ShiftOperation | null;
}

/**
 * A node of a pre-built batch waiting to be inserted.
 */
export interface TreeDraft<TAttributes extends TreeRow = TreeRow> {
  attributes: TAttributes;
  children?: TreeDraft<TAttributes>[];
}

/**
 * One draft with the boundaries it was assigned, in pre-order.
 */
export interface PlacedDraft<TAttributes extends TreeRow = TreeRow> extends NestedSetBounds {
  attributes: TAttributes;
  depth: number;
}

/**
 * Batch insert plan: every draft laid out in pre-order plus one shift
 * sized for the whole batch.
 */
export interface SubtreeInsertPlan<TAttributes extends TreeRow = TreeRow> {
  nodes: PlacedDraft<TAttributes>[];
  shift: ShiftOperation | null;
  width: number;
}

/**
 * Removal of a node and its whole subtree.
 */
export interface DeletePlan extends NestedSetBounds {
  /** Number of boundary values the subtree occupied */
  width: number;
  /** Number of rows removed (the node and its descendants) */
  removed: number;
  shift: ShiftOperation;
}

/**
 * Relocation of a subtree. Applied as: park the subtree out of the way,
 * `close` the gap it left, `open` a gap at the destination, then unpark
 * the subtree shifted by `offset`.
 */
export type MovePlan = MovePlanBase & (
  | { noop: true }
  | { noop: false; close: ShiftOperation; open: ShiftOperation }
);

interface MovePlanBase {
  /** Boundaries the subtree occupies before the move */
  from: NestedSetBounds;
  /** Boundaries the subtree root occupies after the move */
  to: NestedSetBounds;
  width: number;
  /** Constant added to every boundary inside the moved subtree */
  offset: number;
}

/**
 * Represents a node with its children in a threaded tree structure.
 * @typeParam T - The node type
 */
export interface ThreadedNode<T> {
  /** The node data */
  node: T;
  /** Child nodes */
  children: ThreadedNode<T>[];
}
