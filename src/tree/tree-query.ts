/**
 * Tree Query Builder
 *
 * Level 1 API: pure statement compilation for tree operations.
 * Every statement is bound to one table, one dialect and one tree scope.
 */

import type { CompiledQuery, CompilerContext, Dialect } from '../core/dialect/abstract.js';
import type { TreeTableDef } from '../schema/table.js';
import type {
  NestedSetBounds,
  ShiftOperation,
  TreePk,
  TreeRow,
  TreeScope,
} from './tree-types.js';

export interface LockOptions {
  /** Lock the selected rows until the surrounding transaction ends */
  forUpdate?: boolean;
}

/**
 * Tree statement compiler bound to a specific table, dialect and scope.
 */
export interface TreeQuery {
  /** The underlying table definition */
  readonly table: TreeTableDef;
  /** Scope values every statement is restricted to */
  readonly scope: TreeScope;

  /** Finds a node by primary key. */
  findById(pk: TreePk, options?: LockOptions): CompiledQuery;

  /** Finds the node occupying a given left boundary. */
  findByLeft(lft: number): CompiledQuery;

  /** Reads the largest rght value (one row, or none for an empty tree). */
  findTail(options?: LockOptions): CompiledQuery;

  /**
   * Locks every row a shift beyond `threshold` would touch.
   * Null when the dialect serializes writers without row locks.
   */
  lockFrom(threshold: number): CompiledQuery | null;

  /** Ancestors of a node, root first. */
  findAncestors(bounds: NestedSetBounds): CompiledQuery;

  /** Number of ancestors of a node, as column `depth`. */
  countAncestors(bounds: NestedSetBounds): CompiledQuery;

  /** Descendants of a node in pre-order. */
  findDescendants(bounds: NestedSetBounds): CompiledQuery;

  /** Nodes not contained in any other node, ordered by lft. */
  findRoots(): CompiledQuery;

  /** Every node of the scope in pre-order. */
  findAll(): CompiledQuery;

  /** Inserts one row; returns it when the dialect supports RETURNING. */
  insert(values: TreeRow): CompiledQuery;

  /** Adds `delta` to every boundary strictly greater than `threshold`. */
  shift(operation: ShiftOperation): CompiledQuery;

  /** Deletes a node together with its subtree. */
  deleteRange(bounds: NestedSetBounds): CompiledQuery;

  /** Negates the boundaries of a subtree so range shifts skip it. */
  park(bounds: NestedSetBounds): CompiledQuery;

  /** Restores parked rows, adding `offset` to their original boundaries. */
  unpark(offset: number): CompiledQuery;

  /** Returns a new TreeQuery restricted to other scope values. */
  withScope(scope: TreeScope): TreeQuery;
}

/**
 * Builds scope conditions for multi-tree tables.
 * Every configured scope column must have a value.
 */
export function buildScopeConditions(
  scope: string[] | undefined,
  scopeValues: TreeScope
): Record<string, unknown> {
  if (!scope || scope.length === 0) return {};

  const conditions: Record<string, unknown> = {};
  for (const key of scope) {
    if (!(key in scopeValues)) {
      throw new Error(`Missing value for tree scope column '${key}'`);
    }
    conditions[key] = scopeValues[key];
  }
  return conditions;
}

/**
 * Creates a tree statement compiler.
 * @param table - The tree table definition
 * @param dialect - SQL dialect used for quoting and placeholders
 * @param scope - Values for the table's scope columns
 */
export function treeQuery(table: TreeTableDef, dialect: Dialect, scope: TreeScope = {}): TreeQuery {
  const { config } = table;
  const scopeConditions = buildScopeConditions(config.scope, scope);
  const q = (id: string): string => dialect.quoteIdentifier(id);
  const tableSql = dialect.quoteTable(table.name, table.schema);
  const lft = q(config.leftKey);
  const rght = q(config.rightKey);
  const pk = q(config.primaryKey);

  const compile = (build: (ctx: CompilerContext) => string): CompiledQuery => {
    const ctx = dialect.createCompilerContext();
    const sql = build(ctx).trim();
    return { sql: sql.endsWith(';') ? sql : `${sql};`, params: [...ctx.params] };
  };

  const scopeTerms = (ctx: CompilerContext, alias?: string): string[] =>
    Object.entries(scopeConditions).map(([column, value]) => {
      const ref = alias ? `${q(alias)}.${q(column)}` : q(column);
      return `${ref} = ${ctx.addParameter(value)}`;
    });

  const whereClause = (terms: string[]): string =>
    terms.length > 0 ? ` WHERE ${terms.join(' AND ')}` : '';

  // terms are built before scope terms so placeholders stay in textual order
  const where = (ctx: CompilerContext, build: () => string[]): string => {
    const terms = build();
    return whereClause([...terms, ...scopeTerms(ctx)]);
  };

  const lockSuffix = (options?: LockOptions): string =>
    options?.forUpdate ? dialect.forUpdateClause() : '';

  return {
    table,
    scope,

    findById(id, options) {
      return compile(ctx =>
        `SELECT * FROM ${tableSql}${where(ctx, () => [`${pk} = ${ctx.addParameter(id)}`])}${lockSuffix(options)}`
      );
    },

    findByLeft(value) {
      return compile(ctx =>
        `SELECT * FROM ${tableSql}${where(ctx, () => [`${lft} = ${ctx.addParameter(value)}`])}`
      );
    },

    findTail(options) {
      return compile(ctx =>
        `SELECT ${rght} FROM ${tableSql}${where(ctx, () => [])} ORDER BY ${rght} DESC LIMIT 1${lockSuffix(options)}`
      );
    },

    lockFrom(threshold) {
      const suffix = dialect.forUpdateClause();
      if (!suffix) return null;
      return compile(ctx =>
        `SELECT ${pk} FROM ${tableSql}${where(ctx, () => [`${rght} > ${ctx.addParameter(threshold)}`])}${suffix}`
      );
    },

    findAncestors(bounds) {
      return compile(ctx =>
        `SELECT * FROM ${tableSql}${where(ctx, () => [
          `${lft} < ${ctx.addParameter(bounds.lft)}`,
          `${rght} > ${ctx.addParameter(bounds.rght)}`,
        ])} ORDER BY ${lft} ASC`
      );
    },

    countAncestors(bounds) {
      return compile(ctx =>
        `SELECT COUNT(*) AS ${q('depth')} FROM ${tableSql}${where(ctx, () => [
          `${lft} < ${ctx.addParameter(bounds.lft)}`,
          `${rght} > ${ctx.addParameter(bounds.rght)}`,
        ])}`
      );
    },

    findDescendants(bounds) {
      return compile(ctx =>
        `SELECT * FROM ${tableSql}${where(ctx, () => [
          `${lft} > ${ctx.addParameter(bounds.lft)}`,
          `${rght} < ${ctx.addParameter(bounds.rght)}`,
        ])} ORDER BY ${lft} ASC`
      );
    },

    findRoots() {
      const node = q('node');
      const ancestor = q('ancestor');
      return compile(ctx => {
        const outerScope = scopeTerms(ctx, 'node');
        const innerTerms = [
          `${ancestor}.${lft} < ${node}.${lft}`,
          `${ancestor}.${rght} > ${node}.${rght}`,
          ...scopeTerms(ctx, 'ancestor'),
        ];
        const notExists =
          `NOT EXISTS (SELECT 1 FROM ${tableSql} AS ${ancestor}${whereClause(innerTerms)})`;
        return `SELECT ${node}.* FROM ${tableSql} AS ${node}${whereClause([...outerScope, notExists])} ` +
          `ORDER BY ${node}.${lft} ASC`;
      });
    },

    findAll() {
      return compile(ctx => `SELECT * FROM ${tableSql}${where(ctx, () => [])} ORDER BY ${lft} ASC`);
    },

    insert(values) {
      return compile(ctx => {
        const entries = Object.entries(values);
        const columns = entries.map(([column]) => q(column)).join(', ');
        const placeholders = entries.map(([, value]) => ctx.addParameter(value)).join(', ');
        const returning = dialect.supportsReturning() ? ' RETURNING *' : '';
        return `INSERT INTO ${tableSql} (${columns}) VALUES (${placeholders})${returning}`;
      });
    },

    shift(operation) {
      return compile(ctx => {
        const lftThreshold = ctx.addParameter(operation.threshold);
        const lftDelta = ctx.addParameter(operation.delta);
        const rghtDelta = ctx.addParameter(operation.delta);
        return `UPDATE ${tableSql} SET ` +
          `${lft} = CASE WHEN ${lft} > ${lftThreshold} THEN ${lft} + ${lftDelta} ELSE ${lft} END, ` +
          `${rght} = ${rght} + ${rghtDelta}` +
          where(ctx, () => [`${rght} > ${ctx.addParameter(operation.threshold)}`]);
      });
    },

    deleteRange(bounds) {
      return compile(ctx =>
        `DELETE FROM ${tableSql}${where(ctx, () => [
          `${lft} >= ${ctx.addParameter(bounds.lft)}`,
          `${rght} <= ${ctx.addParameter(bounds.rght)}`,
        ])}`
      );
    },

    park(bounds) {
      return compile(ctx =>
        `UPDATE ${tableSql} SET ${lft} = 0 - ${lft}, ${rght} = 0 - ${rght}${where(ctx, () => [
          `${lft} >= ${ctx.addParameter(bounds.lft)}`,
          `${rght} <= ${ctx.addParameter(bounds.rght)}`,
        ])}`
      );
    },

    unpark(offset) {
      return compile(ctx => {
        const lftOffset = ctx.addParameter(offset);
        const rghtOffset = ctx.addParameter(offset);
        return `UPDATE ${tableSql} SET ${lft} = ${lftOffset} - ${lft}, ${rght} = ${rghtOffset} - ${rght}` +
          where(ctx, () => [`${lft} < 0`]);
      });
    },

    withScope(next) {
      return treeQuery(table, dialect, { ...scope, ...next });
    },
  };
}
