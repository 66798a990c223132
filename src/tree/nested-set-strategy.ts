/**
 * Nested Set Strategy
 *
 * Boundary allocation for the nested set model: every structural change is
 * planned here as new boundaries for the affected node plus "add `delta` to
 * every boundary beyond `threshold`" shifts for everything else.
 *
 * All methods are pure functions that compute values without database access.
 *
 * @see https://en.wikipedia.org/wiki/Nested_set_model
 */

import {
  MAX_BOUNDARY,
  type ChildPosition,
  type DeletePlan,
  type InsertPlan,
  type MovePlan,
  type MovePosition,
  type NestedSetBounds,
  type PlacedDraft,
  type ShiftOperation,
  type SiblingPosition,
  type SubtreeInsertPlan,
  type ThreadedNode,
  type TreeDraft,
  type TreeRow,
} from './tree-types.js';
import { BoundaryOverflowError, CycleRejectedError, InvalidStateError } from './tree-errors.js';

export class NestedSetStrategy {
  /**
   * Calculates the number of descendants for a node.
   * Formula: (rght - lft - 1) / 2
   */
  static descendantCount(lft: number, rght: number): number {
    return (rght - lft - 1) / 2;
  }

  /**
   * Determines if a node is a leaf (has no children).
   */
  static isLeaf(lft: number, rght: number): boolean {
    return rght - lft === 1;
  }

  /**
   * Calculates the width of a subtree (number of lft/rght values it occupies).
   */
  static subtreeWidth(lft: number, rght: number): number {
    return rght - lft + 1;
  }

  /**
   * Checks if nodeA is an ancestor of nodeB.
   * With `inclusive`, a node counts as its own ancestor.
   */
  static isAncestorOf(nodeA: NestedSetBounds, nodeB: NestedSetBounds, inclusive = false): boolean {
    if (inclusive) {
      return nodeA.lft <= nodeB.lft && nodeB.rght <= nodeA.rght;
    }
    return nodeA.lft < nodeB.lft && nodeB.rght < nodeA.rght;
  }

  /**
   * Checks if nodeA is a descendant of nodeB.
   */
  static isDescendantOf(nodeA: NestedSetBounds, nodeB: NestedSetBounds, inclusive = false): boolean {
    return this.isAncestorOf(nodeB, nodeA, inclusive);
  }

  /**
   * Rejects boundaries that cannot belong to a well-formed tree.
   */
  static assertBounds(bounds: NestedSetBounds): void {
    const { lft, rght } = bounds;
    if (!Number.isSafeInteger(lft) || !Number.isSafeInteger(rght) || lft >= rght) {
      throw new InvalidStateError(`Invalid node boundaries (${lft}-${rght})`, { lft, rght });
    }
  }

  /**
   * The threshold whose gap a node placed at `position` relative to
   * `reference` fills: the placed node starts at `threshold + 1`.
   */
  static insertionThreshold(reference: NestedSetBounds, position: MovePosition): number {
    switch (position) {
      case 'firstChild':
        return reference.lft;
      case 'lastChild':
        return reference.rght - 1;
      case 'before':
        return reference.lft - 1;
      case 'after':
        return reference.rght;
    }
  }

  /**
   * Throws when growing a tree whose largest boundary is `currentMax` by
   * `growth` values would pass `maxBoundary`.
   */
  static ensureCapacity(currentMax: number, growth: number, maxBoundary: number = MAX_BOUNDARY): void {
    const required = currentMax + growth;
    if (growth > 0 && required > maxBoundary) {
      throw new BoundaryOverflowError(required, maxBoundary);
    }
  }

  /**
   * Plans a new leaf as a child of `parent`.
   * `lastChild` (the default) appends after the existing children and shifts
   * everything from the parent's own `rght` on; `firstChild` opens the gap
   * right after the parent's `lft`.
   */
  static planInsertChild(parent: NestedSetBounds, position: ChildPosition = 'lastChild'): InsertPlan {
    this.assertBounds(parent);
    return this.planInsertAt(this.insertionThreshold(parent, position));
  }

  /**
   * Plans a new leaf next to `sibling`, after it by default.
   */
  static planInsertSibling(sibling: NestedSetBounds, position: SiblingPosition = 'after'): InsertPlan {
    this.assertBounds(sibling);
    return this.planInsertAt(this.insertionThreshold(sibling, position));
  }

  /**
   * Plans a new root after every existing node.
   *
   * @param maxRght - Current maximum rght value in the tree (or 0 if empty)
   */
  static planInsertRoot(maxRght: number, maxBoundary: number = MAX_BOUNDARY): InsertPlan {
    this.ensureCapacity(maxRght, 2, maxBoundary);
    return { lft: maxRght + 1, rght: maxRght + 2, shift: null };
  }

  /**
   * Plans a batch of pre-built drafts placed at `position` relative to
   * `reference`, laid out in pre-order with a single shift for the batch.
   */
  static planInsertSubtree<TAttributes extends TreeRow>(
    reference: NestedSetBounds,
    position: MovePosition,
    drafts: TreeDraft<TAttributes>[]
  ): SubtreeInsertPlan<TAttributes> {
    this.assertBounds(reference);
    const threshold = this.insertionThreshold(reference, position);
    const nodes = this.layoutDrafts(drafts, threshold);
    const width = nodes.length * 2;
    return {
      nodes,
      width,
      shift: width > 0 ? { threshold, delta: width } : null,
    };
  }

  /**
   * Plans a batch of drafts as new roots after every existing node.
   */
  static planInsertSubtreeAsRoot<TAttributes extends TreeRow>(
    maxRght: number,
    drafts: TreeDraft<TAttributes>[],
    maxBoundary: number = MAX_BOUNDARY
  ): SubtreeInsertPlan<TAttributes> {
    const nodes = this.layoutDrafts(drafts, maxRght);
    const width = nodes.length * 2;
    this.ensureCapacity(maxRght, width, maxBoundary);
    return { nodes, width, shift: null };
  }

  /**
   * Plans removal of `node` with its whole subtree.
   * Everything beyond the node's `rght` moves left by the subtree width.
   */
  static planDelete(node: NestedSetBounds): DeletePlan {
    this.assertBounds(node);
    const width = this.subtreeWidth(node.lft, node.rght);
    return {
      lft: node.lft,
      rght: node.rght,
      width,
      removed: width / 2,
      shift: { threshold: node.rght, delta: -width },
    };
  }

  /**
   * Plans moving the subtree rooted at `node` to `position` relative to
   * `target`.
   *
   * Boundaries in `open.threshold` are expressed after `close` was applied,
   * so the steps must run in order: park, close, open, unpark.
   *
   * @throws CycleRejectedError when `target` is `node` or one of its descendants
   */
  static planMove(node: NestedSetBounds, target: NestedSetBounds, position: MovePosition): MovePlan {
    this.assertBounds(node);
    this.assertBounds(target);

    if (this.isAncestorOf(node, target, true)) {
      throw new CycleRejectedError(node, target, position);
    }

    const width = this.subtreeWidth(node.lft, node.rght);
    const threshold = this.insertionThreshold(target, position);

    // the gap right before or right after the node is where it already is
    if (threshold >= node.lft - 1 && threshold <= node.rght) {
      return {
        noop: true,
        from: { lft: node.lft, rght: node.rght },
        to: { lft: node.lft, rght: node.rght },
        width,
        offset: 0,
      };
    }

    const openThreshold = threshold > node.rght ? threshold - width : threshold;
    const lft = openThreshold + 1;

    return {
      noop: false,
      from: { lft: node.lft, rght: node.rght },
      to: { lft, rght: lft + width - 1 },
      width,
      offset: lft - node.lft,
      close: { threshold: node.rght, delta: -width },
      open: { threshold: openThreshold, delta: width },
    };
  }

  /**
   * Applies a shift to a single boundary value.
   */
  static shiftValue(value: number, shift: ShiftOperation): number {
    return value > shift.threshold ? value + shift.delta : value;
  }

  /**
   * Picks the top-level entries of a list ordered by lft: the roots of a
   * whole table, or the direct children when given one node's descendants.
   */
  static topLevel<T>(nodes: T[], getBounds: (node: T) => NestedSetBounds): T[] {
    const result: T[] = [];
    let edge = -Infinity;
    for (const node of nodes) {
      const { lft, rght } = getBounds(node);
      if (lft > edge) {
        result.push(node);
        edge = rght;
      }
    }
    return result;
  }

  /**
   * Converts a flat list of nodes (ordered by lft) into a threaded tree structure.
   *
   * @param nodes - Flat array of nodes ordered by lft
   * @param getLft - Function to extract lft from a node
   * @param getRght - Function to extract rght from a node
   */
  static toThreaded<T>(
    nodes: T[],
    getLft: (node: T) => number,
    getRght: (node: T) => number
  ): ThreadedNode<T>[] {
    const result: ThreadedNode<T>[] = [];
    const stack: ThreadedNode<T>[] = [];

    for (const node of nodes) {
      const threadedNode: ThreadedNode<T> = { node, children: [] };
      const nodeLft = getLft(node);
      const nodeRght = getRght(node);

      while (stack.length > 0) {
        const parent = stack[stack.length - 1];
        if (getRght(parent.node) > nodeRght) {
          break;
        }
        stack.pop();
      }

      if (stack.length === 0) {
        result.push(threadedNode);
      } else {
        stack[stack.length - 1].children.push(threadedNode);
      }

      if (!this.isLeaf(nodeLft, nodeRght)) {
        stack.push(threadedNode);
      }
    }

    return result;
  }

  /**
   * Calculates depth for each node based on ancestor count.
   * Assumes nodes are ordered by lft.
   */
  static calculateDepths<T>(
    nodes: T[],
    getLft: (node: T) => number,
    getRght: (node: T) => number
  ): Map<T, number> {
    const depths = new Map<T, number>();
    const stack: { rght: number }[] = [];

    for (const node of nodes) {
      const lft = getLft(node);
      const rght = getRght(node);

      while (stack.length > 0 && stack[stack.length - 1].rght < lft) {
        stack.pop();
      }

      depths.set(node, stack.length);

      if (!this.isLeaf(lft, rght)) {
        stack.push({ rght });
      }
    }

    return depths;
  }

  /**
   * Renders nodes (ordered by lft) as text lines, indented once per depth level.
   */
  static toTreeLines<T>(
    nodes: T[],
    getLft: (node: T) => number,
    getRght: (node: T) => number,
    format: (node: T) => string,
    indent: string = '    '
  ): string[] {
    const depths = this.calculateDepths(nodes, getLft, getRght);
    return nodes.map(node => indent.repeat(depths.get(node) ?? 0) + format(node));
  }

  /**
   * Validates that a tree has no malformed, overlapping or duplicated
   * boundaries and that every node's width matches its descendant count.
   * Returns validation errors if any.
   */
  static validateTree<T>(
    nodes: T[],
    getLft: (node: T) => number,
    getRght: (node: T) => number,
    getPk: (node: T) => unknown
  ): string[] {
    const errors: string[] = [];
    const sorted = [...nodes].sort((a, b) => getLft(a) - getLft(b));
    const seen = new Set<number>();
    const duplicated = new Set<number>();

    for (const node of sorted) {
      for (const value of [getLft(node), getRght(node)]) {
        if (seen.has(value)) {
          duplicated.add(value);
        }
        seen.add(value);
      }
    }

    for (let i = 0; i < sorted.length; i++) {
      const node = sorted[i];
      const lft = getLft(node);
      const rght = getRght(node);
      const pk = String(getPk(node));

      if (lft >= rght) {
        errors.push(`Node ${pk}: lft (${lft}) must be less than rght (${rght})`);
      }

      if (lft < 1) {
        errors.push(`Node ${pk}: lft (${lft}) must be positive`);
      }

      let inside = 0;
      for (let j = i + 1; j < sorted.length; j++) {
        const other = sorted[j];
        const otherLft = getLft(other);
        const otherRght = getRght(other);

        if (otherLft >= rght) break;

        if (otherRght > rght) {
          errors.push(
            `Node ${pk} (${lft}-${rght}) overlaps with node ${String(getPk(other))} (${otherLft}-${otherRght})`
          );
        } else {
          inside += 1;
        }
      }

      if (lft < rght && this.descendantCount(lft, rght) !== inside) {
        errors.push(
          `Node ${pk} (${lft}-${rght}): width implies ${this.descendantCount(lft, rght)} descendants, found ${inside}`
        );
      }
    }

    for (const value of duplicated) {
      errors.push(`Boundary value ${value} is used more than once`);
    }

    return errors;
  }

  private static planInsertAt(threshold: number): InsertPlan {
    return {
      lft: threshold + 1,
      rght: threshold + 2,
      shift: { threshold, delta: 2 },
    };
  }

  private static layoutDrafts<TAttributes extends TreeRow>(
    drafts: TreeDraft<TAttributes>[],
    threshold: number
  ): PlacedDraft<TAttributes>[] {
    const placed: PlacedDraft<TAttributes>[] = [];
    let next = threshold + 1;

    const visit = (draft: TreeDraft<TAttributes>, depth: number): void => {
      const entry: PlacedDraft<TAttributes> = { attributes: draft.attributes, lft: next, rght: next, depth };
      placed.push(entry);
      next += 1;
      for (const child of draft.children ?? []) {
        visit(child, depth + 1);
      }
      entry.rght = next;
      next += 1;
    };

    for (const draft of drafts) {
      visit(draft, 0);
    }

    return placed;
  }
}
