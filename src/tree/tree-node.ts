import { NestedSetStrategy } from './nested-set-strategy.js';
import type { NestedSetBounds, TreePk } from './tree-types.js';

/**
 * Lifecycle of a node wrapper. Not-yet-written nodes are TreeDrafts.
 */
export type NodeState = 'attached' | 'deleted';

/**
 * A stored record together with its nested set boundaries.
 *
 * Boundaries are a snapshot taken when the wrapper was read; tree
 * operations always re-read them before acting.
 *
 * @typeParam TRecord - The caller's record type
 */
export class TreeNode<TRecord> {
  private currentState: NodeState = 'attached';

  constructor(
    readonly pk: TreePk,
    readonly record: TRecord,
    readonly lft: number,
    readonly rght: number,
    /** Identifies the table and scope the node was read from */
    readonly treeKey: string
  ) {}

  get state(): NodeState {
    return this.currentState;
  }

  get bounds(): NestedSetBounds {
    return { lft: this.lft, rght: this.rght };
  }

  get width(): number {
    return NestedSetStrategy.subtreeWidth(this.lft, this.rght);
  }

  get descendantCount(): number {
    return NestedSetStrategy.descendantCount(this.lft, this.rght);
  }

  get isLeaf(): boolean {
    return NestedSetStrategy.isLeaf(this.lft, this.rght);
  }

  /**
   * Marks the wrapper as removed from storage. Called by the manager after
   * the subtree is deleted.
   */
  markDeleted(): void {
    this.currentState = 'deleted';
  }

  toString(): string {
    return `TreeNode(${String(this.pk)}, ${this.lft}, ${this.rght})`;
  }
}

export const isTreePk = (value: unknown): value is TreePk =>
  typeof value === 'string' || typeof value === 'number';
