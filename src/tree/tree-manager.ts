/**
 * Tree Manager
 *
 * Level 3 API: node-level tree operations. Every structural change runs as
 * one unit of work against the TreeStore: lock the rows the change depends
 * on, re-read their boundaries, plan with NestedSetStrategy, apply.
 */

import type { Dialect } from '../core/dialect/abstract.js';
import { resolveDialectInput, type DialectKey } from '../core/dialect/dialect-factory.js';
import type { DbExecutor } from '../core/execution/db-executor.js';
import type { QueryLogger } from '../core/execution/query-logger.js';
import type { TreeTableDef } from '../schema/table.js';
import { NestedSetStrategy } from './nested-set-strategy.js';
import { SqlTreeStore, toInteger } from './sql-tree-store.js';
import { InvalidStateError, NodeNotFoundError } from './tree-errors.js';
import { TreeNode, isTreePk } from './tree-node.js';
import { buildScopeConditions } from './tree-query.js';
import type { TreeStore, TreeStoreSession } from './tree-store.js';
import type {
  ChildPosition,
  MovePosition,
  NestedSetBounds,
  PlacedDraft,
  ShiftOperation,
  SiblingPosition,
  ThreadedNode,
  TreeConfig,
  TreeDraft,
  TreePk,
  TreeRow,
  TreeScope,
} from './tree-types.js';

/**
 * A node given by wrapper or by primary key.
 */
export type NodeRef<TRecord> = TreeNode<TRecord> | TreePk;

/**
 * Maps a stored row to the caller's record type.
 */
export type RowMapper<TRecord> = (row: TreeRow) => TRecord;

export interface TreeManagerOptions<TRecord> {
  /** Storage collaborator */
  store: TreeStore;
  /** Table and tree column mapping */
  table: TreeTableDef;
  mapRow: RowMapper<TRecord>;
}

export interface AddChildOptions {
  /** Default: 'lastChild' */
  position?: ChildPosition;
}

export interface AddSiblingOptions {
  /** Default: 'after' */
  position?: SiblingPosition;
}

export interface MoveSubtreeOptions {
  /** Default: 'lastChild' */
  position?: ChildPosition;
}

export interface SiblingsOptions {
  includeSelf?: boolean;
}

export interface AncestryOptions {
  /** Count a node as its own ancestor/descendant */
  inclusive?: boolean;
}

export interface PrintTreeOptions<TRecord> {
  /** Label of one node (default: TreeNode#toString) */
  format?: (node: TreeNode<TRecord>) => string;
  /** Indentation per depth level (default: four spaces) */
  indent?: string;
}

type RefUse = 'delete' | 'other';

/**
 * Tree Manager for a nested set table.
 *
 * @typeParam TRecord - The record type rows are mapped to
 *
 * @example
 * ```ts
 * const tree = createTreeManager({ executor, dialect: 'sqlite', table: categories });
 *
 * const root = await tree.createRoot({ name: 'Electronics' });
 * const phones = await tree.addChild(root, { name: 'Phones' });
 * await tree.addSibling(phones, { name: 'Computers' }, { position: 'before' });
 * const path = await tree.ancestorsOf(phones);
 * ```
 */
export class TreeManager<TRecord> {
  readonly table: TreeTableDef;
  readonly config: TreeConfig;
  readonly store: TreeStore;

  private readonly mapRow: RowMapper<TRecord>;
  private readonly scopeValues: Record<string, unknown>;
  private readonly treeKey: string;

  constructor(options: TreeManagerOptions<TRecord>) {
    const { store, table, mapRow } = options;

    this.store = store;
    this.table = table;
    this.config = table.config;
    this.mapRow = mapRow;
    this.scopeValues = buildScopeConditions(this.config.scope, store.scope);
    this.treeKey = JSON.stringify([table.schema ?? null, table.name, this.scopeValues]);
  }

  // ===== Structural operations =====

  /**
   * Creates a single-node tree after every existing root.
   */
  async createRoot(attributes: TreeRow): Promise<TreeNode<TRecord>> {
    this.checkAttributes(attributes);

    return this.store.transaction('createRoot', async session => {
      const maxRght = await session.findMaxRght({ forUpdate: true });
      const plan = NestedSetStrategy.planInsertRoot(maxRght, this.config.maxBoundary);
      const row = await session.insert(this.rowValues(attributes, plan));
      return this.toNode(row);
    });
  }

  /**
   * Creates a root together with nested drafts in one unit of work.
   * @returns The new root
   */
  async createTree(draft: TreeDraft): Promise<TreeNode<TRecord>> {
    this.checkDrafts([draft]);

    return this.store.transaction('createTree', async session => {
      const maxRght = await session.findMaxRght({ forUpdate: true });
      const plan = NestedSetStrategy.planInsertSubtreeAsRoot(maxRght, [draft], this.config.maxBoundary);
      const [root] = await this.insertPlaced(session, plan.nodes);
      return root;
    });
  }

  /**
   * Adds a new leaf under `parent`, after its existing children unless
   * `position: 'firstChild'` is given.
   */
  async addChild(
    parent: NodeRef<TRecord>,
    attributes: TreeRow,
    options: AddChildOptions = {}
  ): Promise<TreeNode<TRecord>> {
    const parentPk = this.resolveRef(parent, 'other');
    this.checkAttributes(attributes);

    return this.store.transaction('addChild', async session => {
      const parentNode = await this.requireNode(session, parentPk, true);
      const plan = NestedSetStrategy.planInsertChild(parentNode, options.position ?? 'lastChild');
      await this.makeRoom(session, plan.shift);
      return this.toNode(await session.insert(this.rowValues(attributes, plan)));
    });
  }

  /**
   * Attaches pre-built drafts (with their nested children) under `parent`.
   * @returns Every inserted node in pre-order
   */
  async addChildren(
    parent: NodeRef<TRecord>,
    drafts: TreeDraft[],
    options: AddChildOptions = {}
  ): Promise<TreeNode<TRecord>[]> {
    const parentPk = this.resolveRef(parent, 'other');
    this.checkDrafts(drafts);

    return this.store.transaction('addChildren', async session => {
      const parentNode = await this.requireNode(session, parentPk, true);
      const plan = NestedSetStrategy.planInsertSubtree(parentNode, options.position ?? 'lastChild', drafts);
      await this.makeRoom(session, plan.shift);
      return this.insertPlaced(session, plan.nodes);
    });
  }

  /**
   * Adds a new leaf next to `sibling`, right after it unless
   * `position: 'before'` is given.
   */
  async addSibling(
    sibling: NodeRef<TRecord>,
    attributes: TreeRow,
    options: AddSiblingOptions = {}
  ): Promise<TreeNode<TRecord>> {
    const siblingPk = this.resolveRef(sibling, 'other');
    this.checkAttributes(attributes);

    return this.store.transaction('addSibling', async session => {
      const siblingNode = await this.requireNode(session, siblingPk, true);
      const plan = NestedSetStrategy.planInsertSibling(siblingNode, options.position ?? 'after');
      await this.makeRoom(session, plan.shift);
      return this.toNode(await session.insert(this.rowValues(attributes, plan)));
    });
  }

  /**
   * Deletes a node and all its descendants.
   * @returns Number of rows removed
   */
  async deleteSubtree(node: NodeRef<TRecord>): Promise<number> {
    const pk = this.resolveRef(node, 'delete');

    const removed = await this.store.transaction('deleteSubtree', async session => {
      const target = await this.requireNode(session, pk, true);
      const plan = NestedSetStrategy.planDelete(target);
      await session.lockFrom(plan.lft);
      await session.deleteRange(plan);
      await session.shift(plan.shift);
      return plan.removed;
    });

    if (node instanceof TreeNode) {
      node.markDeleted();
    }
    return removed;
  }

  /**
   * Moves `node` with its subtree under `newParent`, as its last child unless
   * `position: 'firstChild'` is given.
   * @returns The moved node with its new boundaries
   */
  async moveSubtree(
    node: NodeRef<TRecord>,
    newParent: NodeRef<TRecord>,
    options: MoveSubtreeOptions = {}
  ): Promise<TreeNode<TRecord>> {
    return this.move('moveSubtree', node, newParent, options.position ?? 'lastChild');
  }

  /** Moves `node` with its subtree right before `target`. */
  async moveBefore(node: NodeRef<TRecord>, target: NodeRef<TRecord>): Promise<TreeNode<TRecord>> {
    return this.move('moveBefore', node, target, 'before');
  }

  /** Moves `node` with its subtree right after `target`. */
  async moveAfter(node: NodeRef<TRecord>, target: NodeRef<TRecord>): Promise<TreeNode<TRecord>> {
    return this.move('moveAfter', node, target, 'after');
  }

  /** Moves `node` with its subtree to the end of `target`'s children. */
  async moveInside(node: NodeRef<TRecord>, target: NodeRef<TRecord>): Promise<TreeNode<TRecord>> {
    return this.move('moveInside', node, target, 'lastChild');
  }

  /**
   * Moves a node up among its siblings.
   * @returns true if moved, false if already at top
   */
  async moveUp(node: NodeRef<TRecord>): Promise<boolean> {
    return this.swapWithSibling('moveUp', node, -1);
  }

  /**
   * Moves a node down among its siblings.
   * @returns true if moved, false if already at bottom
   */
  async moveDown(node: NodeRef<TRecord>): Promise<boolean> {
    return this.swapWithSibling('moveDown', node, 1);
  }

  // ===== Queries =====

  /**
   * Gets a node by primary key, or null when it does not exist.
   */
  async getNode(pk: TreePk): Promise<TreeNode<TRecord> | null> {
    return this.store.read('getNode', async session => {
      const row = await session.findByPk(pk);
      return row ? this.toNode(row) : null;
    });
  }

  /**
   * Gets the root nodes, ordered by lft.
   */
  async getRoots(): Promise<TreeNode<TRecord>[]> {
    return this.store.read('getRoots', async session => this.toNodes(await session.findRoots()));
  }

  /**
   * Gets the path from the root down to the node's parent.
   */
  async ancestorsOf(node: NodeRef<TRecord>): Promise<TreeNode<TRecord>[]> {
    const pk = this.resolveRef(node, 'other');
    return this.store.read('ancestorsOf', async session => {
      const target = await this.requireNode(session, pk);
      return this.toNodes(await session.findAncestors(target));
    });
  }

  /**
   * Gets the nearest ancestor, or null for a root.
   */
  async parentOf(node: NodeRef<TRecord>): Promise<TreeNode<TRecord> | null> {
    const ancestors = await this.ancestorsOf(node);
    return ancestors[ancestors.length - 1] ?? null;
  }

  /**
   * Gets all descendants in pre-order.
   */
  async descendantsOf(node: NodeRef<TRecord>): Promise<TreeNode<TRecord>[]> {
    const pk = this.resolveRef(node, 'other');
    return this.store.read('descendantsOf', async session => {
      const target = await this.requireNode(session, pk);
      return this.toNodes(await session.findDescendants(target));
    });
  }

  /**
   * Gets the immediate children, ordered by lft.
   */
  async childrenOf(node: NodeRef<TRecord>): Promise<TreeNode<TRecord>[]> {
    const descendants = await this.descendantsOf(node);
    return NestedSetStrategy.topLevel(descendants, child => child.bounds);
  }

  /**
   * Gets the other children of the node's parent (or the other roots).
   */
  async siblingsOf(node: NodeRef<TRecord>, options: SiblingsOptions = {}): Promise<TreeNode<TRecord>[]> {
    const pk = this.resolveRef(node, 'other');
    const { target, siblings } = await this.store.read('siblingsOf', async session => {
      const node = await this.requireNode(session, pk);
      return { target: node, siblings: await this.siblingGroup(session, node) };
    });
    return options.includeSelf ? siblings : siblings.filter(sibling => sibling.pk !== target.pk);
  }

  /**
   * Gets the depth (level) of a node; roots are at depth 0.
   */
  async depthOf(node: NodeRef<TRecord>): Promise<number> {
    const pk = this.resolveRef(node, 'other');
    return this.store.read('depthOf', async session => {
      const target = await this.requireNode(session, pk);
      return session.countAncestors(target);
    });
  }

  /**
   * Checks, against current storage, whether `ancestor` contains `node`.
   */
  async isAncestorOf(
    ancestor: NodeRef<TRecord>,
    node: NodeRef<TRecord>,
    options: AncestryOptions = {}
  ): Promise<boolean> {
    const [a, b] = await this.readPair('isAncestorOf', ancestor, node);
    return NestedSetStrategy.isAncestorOf(a, b, options.inclusive ?? false);
  }

  /**
   * Checks, against current storage, whether `node` sits inside `ancestor`.
   */
  async isDescendantOf(
    node: NodeRef<TRecord>,
    ancestor: NodeRef<TRecord>,
    options: AncestryOptions = {}
  ): Promise<boolean> {
    return this.isAncestorOf(ancestor, node, options);
  }

  /**
   * Gets the node with its descendants nested as children.
   */
  async generateTree(node: NodeRef<TRecord>): Promise<ThreadedNode<TreeNode<TRecord>>> {
    const pk = this.resolveRef(node, 'other');
    const nodes = await this.store.read('generateTree', async session => {
      const target = await this.requireNode(session, pk);
      return [target, ...this.toNodes(await session.findDescendants(target))];
    });
    const [tree] = NestedSetStrategy.toThreaded(nodes, n => n.lft, n => n.rght);
    return tree;
  }

  /**
   * Renders every tree of the scope, one line per node.
   */
  async printTree(options: PrintTreeOptions<TRecord> = {}): Promise<string[]> {
    const { format = (n: TreeNode<TRecord>) => n.toString(), indent } = options;
    const nodes = await this.store.read('printTree', async session => this.toNodes(await session.findAll()));
    return NestedSetStrategy.toTreeLines(nodes, n => n.lft, n => n.rght, format, indent);
  }

  /**
   * Validates the tree structure.
   * @returns Array of validation errors (empty if valid)
   */
  async validate(): Promise<string[]> {
    const { primaryKey, leftKey, rightKey } = this.config;
    const rows = await this.store.read('validate', session => session.findAll());
    return NestedSetStrategy.validateTree(
      rows,
      row => Number(row[leftKey]),
      row => Number(row[rightKey]),
      row => row[primaryKey]
    );
  }

  /**
   * Creates a new TreeManager with different scope values.
   */
  withScope(scope: TreeScope): TreeManager<TRecord> {
    return new TreeManager({
      store: this.store.withScope(scope),
      table: this.table,
      mapRow: this.mapRow,
    });
  }

  // ===== Private Helpers =====

  private async move(
    operation: string,
    node: NodeRef<TRecord>,
    target: NodeRef<TRecord>,
    position: MovePosition
  ): Promise<TreeNode<TRecord>> {
    const pk = this.resolveRef(node, 'other');
    const targetPk = this.resolveRef(target, 'other');

    return this.store.transaction(operation, async session => {
      const moving = await this.requireNode(session, pk, true);
      const anchor = await this.requireNode(session, targetPk, true);
      return this.applyMove(session, moving, anchor, position);
    });
  }

  private async applyMove(
    session: TreeStoreSession,
    node: TreeNode<TRecord>,
    target: TreeNode<TRecord>,
    position: MovePosition
  ): Promise<TreeNode<TRecord>> {
    const plan = NestedSetStrategy.planMove(node, target, position);
    if (plan.noop) {
      return node;
    }

    await session.lockFrom(Math.min(node.lft, NestedSetStrategy.insertionThreshold(target, position)));
    await session.park(plan.from);
    await session.shift(plan.close);
    await session.shift(plan.open);
    await session.unpark(plan.offset);

    return this.requireNode(session, node.pk);
  }

  private async swapWithSibling(operation: string, node: NodeRef<TRecord>, step: -1 | 1): Promise<boolean> {
    const pk = this.resolveRef(node, 'other');

    return this.store.transaction(operation, async session => {
      const moving = await this.requireNode(session, pk, true);
      const siblings = await this.siblingGroup(session, moving);
      const index = siblings.findIndex(sibling => sibling.pk === moving.pk);
      const neighbour = siblings[index + step];
      if (index < 0 || !neighbour) {
        return false;
      }
      await this.applyMove(session, moving, neighbour, step < 0 ? 'before' : 'after');
      return true;
    });
  }

  private async siblingGroup(session: TreeStoreSession, node: TreeNode<TRecord>): Promise<TreeNode<TRecord>[]> {
    const ancestors = await session.findAncestors(node);
    const parentRow = ancestors[ancestors.length - 1];
    if (!parentRow) {
      return this.toNodes(await session.findRoots());
    }
    const parent = this.toNode(parentRow);
    const descendants = this.toNodes(await session.findDescendants(parent));
    return NestedSetStrategy.topLevel(descendants, child => child.bounds);
  }

  private async readPair(
    operation: string,
    first: NodeRef<TRecord>,
    second: NodeRef<TRecord>
  ): Promise<[TreeNode<TRecord>, TreeNode<TRecord>]> {
    const firstPk = this.resolveRef(first, 'other');
    const secondPk = this.resolveRef(second, 'other');
    return this.store.read(operation, async session => [
      await this.requireNode(session, firstPk),
      await this.requireNode(session, secondPk),
    ]);
  }

  /**
   * Locks the rows a shift will touch, checks the tree stays within
   * maxBoundary, then applies the shift.
   */
  private async makeRoom(session: TreeStoreSession, shift: ShiftOperation | null): Promise<void> {
    if (!shift) return;
    await session.lockFrom(shift.threshold);
    const maxRght = await session.findMaxRght();
    NestedSetStrategy.ensureCapacity(maxRght, shift.delta, this.config.maxBoundary);
    await session.shift(shift);
  }

  private async insertPlaced(session: TreeStoreSession, placed: PlacedDraft[]): Promise<TreeNode<TRecord>[]> {
    const nodes: TreeNode<TRecord>[] = [];
    for (const entry of placed) {
      nodes.push(this.toNode(await session.insert(this.rowValues(entry.attributes, entry))));
    }
    return nodes;
  }

  private async requireNode(session: TreeStoreSession, pk: TreePk, forUpdate = false): Promise<TreeNode<TRecord>> {
    const row = await session.findByPk(pk, { forUpdate });
    if (!row) {
      throw new NodeNotFoundError(pk);
    }
    return this.toNode(row);
  }

  private resolveRef(ref: NodeRef<TRecord>, use: RefUse): TreePk {
    if (ref instanceof TreeNode) {
      if (ref.treeKey !== this.treeKey) {
        throw new InvalidStateError(`Node ${String(ref.pk)} belongs to a different tree`, {
          pk: ref.pk,
          treeKey: ref.treeKey,
        });
      }
      if (ref.state === 'deleted') {
        if (use === 'delete') {
          throw new InvalidStateError(`Node ${String(ref.pk)} was already deleted`, { pk: ref.pk });
        }
        throw new NodeNotFoundError(ref.pk);
      }
      return ref.pk;
    }

    if (!isTreePk(ref)) {
      throw new InvalidStateError('Expected an attached node or a primary key');
    }
    return ref;
  }

  private checkAttributes(attributes: TreeRow): void {
    const { leftKey, rightKey, scope = [] } = this.config;
    for (const column of Object.keys(attributes)) {
      if (column === leftKey || column === rightKey) {
        throw new InvalidStateError(`Column '${column}' is managed by the tree and cannot be set`, { column });
      }
      if (scope.includes(column)) {
        throw new InvalidStateError(`Scope column '${column}' is set by the tree scope`, { column });
      }
      if (!this.table.columns.includes(column)) {
        throw new InvalidStateError(`Unknown column '${column}' for table '${this.table.name}'`, { column });
      }
    }
  }

  private checkDrafts(drafts: TreeDraft[]): void {
    for (const draft of drafts) {
      this.checkAttributes(draft.attributes);
      this.checkDrafts(draft.children ?? []);
    }
  }

  private rowValues(attributes: TreeRow, bounds: NestedSetBounds): TreeRow {
    return {
      ...attributes,
      ...this.scopeValues,
      [this.config.leftKey]: bounds.lft,
      [this.config.rightKey]: bounds.rght,
    };
  }

  private toNode(row: TreeRow): TreeNode<TRecord> {
    const { primaryKey, leftKey, rightKey } = this.config;
    const rawPk = row[primaryKey];
    const pk = typeof rawPk === 'bigint' ? toInteger(rawPk, primaryKey) : rawPk;
    if (!isTreePk(pk)) {
      throw new Error(`Row of '${this.table.name}' has no usable primary key '${primaryKey}'`);
    }

    return new TreeNode(
      pk,
      this.mapRow(row),
      toInteger(row[leftKey], leftKey),
      toInteger(row[rightKey], rightKey),
      this.treeKey
    );
  }

  private toNodes(rows: TreeRow[]): TreeNode<TRecord>[] {
    return rows.map(row => this.toNode(row));
  }
}

export interface CreateTreeManagerOptions {
  /** Database executor for running queries */
  executor: DbExecutor;
  /** SQL dialect, or the key of a registered one */
  dialect: Dialect | DialectKey;
  /** Table definition */
  table: TreeTableDef;
  /** Scope values for multi-tree tables */
  scope?: TreeScope;
  /** Receives every SQL statement before it runs, with the call that issued it */
  queryLogger?: QueryLogger;
}

const rowAsRecord: RowMapper<TreeRow> = row => row;

/**
 * Creates a TreeManager over a SQL table.
 * Without `mapRow`, node records are the raw rows.
 */
export function createTreeManager(options: CreateTreeManagerOptions): TreeManager<TreeRow>;
export function createTreeManager<TRecord>(
  options: CreateTreeManagerOptions & { mapRow: RowMapper<TRecord> }
): TreeManager<TRecord>;
export function createTreeManager<TRecord>(
  options: CreateTreeManagerOptions & { mapRow?: RowMapper<TRecord> }
): TreeManager<TRecord> | TreeManager<TreeRow> {
  const { executor, dialect, table, scope, queryLogger, mapRow } = options;
  const store = new SqlTreeStore({
    executor,
    dialect: resolveDialectInput(dialect),
    table,
    scope,
    queryLogger,
  });

  if (mapRow) {
    return new TreeManager({ store, table, mapRow });
  }
  return new TreeManager({ store, table, mapRow: rowAsRecord });
}
