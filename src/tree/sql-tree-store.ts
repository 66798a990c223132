/**
 * SQL Tree Store
 *
 * Level 2 API: runs the statements of a TreeQuery through a DbExecutor,
 * with transactions, row locks and storage error classification.
 */

import type { CompiledQuery, Dialect } from '../core/dialect/abstract.js';
import { queryResultsToRows, type DbExecutor } from '../core/execution/db-executor.js';
import { createQueryLoggingExecutor, type QueryLogger } from '../core/execution/query-logger.js';
import { runInTransaction, serialQueueFor } from '../core/execution/transaction-runner.js';
import type { TreeTableDef } from '../schema/table.js';
import { ConcurrencyConflictError, TreeError } from './tree-errors.js';
import { treeQuery, type TreeQuery } from './tree-query.js';
import type { TreeStore, TreeStoreSession } from './tree-store.js';
import type { TreeRow, TreeScope } from './tree-types.js';

export interface SqlTreeStoreOptions {
  executor: DbExecutor;
  dialect: Dialect;
  table: TreeTableDef;
  scope?: TreeScope;
  /** Receives every statement, tagged with the tree call that issued it */
  queryLogger?: QueryLogger;
}

/**
 * Reads an integer out of a driver value; COUNT/MAX come back as strings or
 * bigints from some drivers.
 */
export const toInteger = (value: unknown, column: string): number => {
  const parsed = typeof value === 'number' ? value
    : typeof value === 'bigint' || typeof value === 'string' ? Number(value)
      : Number.NaN;
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`Column '${column}' holds a non-integer value: ${String(value)}`);
  }
  return parsed;
};

/**
 * TreeStore backed by a relational database.
 *
 * Units of work on one executor run one at a time, whichever store or table
 * they come from. Reads run in a read-only transaction so every statement of
 * a query sees the same rows.
 */
export class SqlTreeStore implements TreeStore {
  readonly scope: TreeScope;
  readonly query: TreeQuery;

  private readonly executor: DbExecutor;
  private readonly dialect: Dialect;
  private readonly table: TreeTableDef;
  private readonly queryLogger?: QueryLogger;

  constructor(options: SqlTreeStoreOptions) {
    const { executor, dialect, table, scope = {}, queryLogger } = options;

    if (!executor.capabilities.transactions) {
      throw new Error(`Tree table '${table.name}' requires an executor with transaction support`);
    }

    this.executor = executor;
    this.dialect = dialect;
    this.table = table;
    this.scope = scope;
    this.queryLogger = queryLogger;
    this.query = treeQuery(table, dialect, scope);
  }

  transaction<T>(operation: string, work: (session: TreeStoreSession) => Promise<T>): Promise<T> {
    return this.unitOfWork(operation, true, work);
  }

  read<T>(operation: string, work: (session: TreeStoreSession) => Promise<T>): Promise<T> {
    return this.unitOfWork(operation, false, work);
  }

  withScope(scope: TreeScope): SqlTreeStore {
    return new SqlTreeStore({
      executor: this.executor,
      dialect: this.dialect,
      table: this.table,
      scope: { ...this.scope, ...scope },
      queryLogger: this.queryLogger,
    });
  }

  // ===== Private Helpers =====

  private unitOfWork<T>(
    operation: string,
    write: boolean,
    work: (session: TreeStoreSession) => Promise<T>
  ): Promise<T> {
    const executor = createQueryLoggingExecutor(this.executor, this.queryLogger, {
      operation,
      table: this.dialect.quoteTable(this.table.name, this.table.schema),
      write,
    });

    return serialQueueFor(this.executor).run(async () => {
      try {
        return await runInTransaction(executor, () => work(this.createSession(executor)), { readOnly: !write });
      } catch (error) {
        if (!(error instanceof TreeError) && this.dialect.isConcurrencyError(error)) {
          throw new ConcurrencyConflictError(operation, error);
        }
        throw error;
      }
    });
  }

  private createSession(executor: DbExecutor): TreeStoreSession {
    const { query } = this;
    const { leftKey, rightKey } = this.table.config;

    const rows = async (compiled: CompiledQuery): Promise<TreeRow[]> => {
      const results = await executor.executeSql(compiled.sql, compiled.params);
      return queryResultsToRows(results);
    };

    const run = async (compiled: CompiledQuery): Promise<void> => {
      await executor.executeSql(compiled.sql, compiled.params);
    };

    const first = async (compiled: CompiledQuery): Promise<TreeRow | null> => {
      const found = await rows(compiled);
      return found[0] ?? null;
    };

    return {
      findByPk: (pk, options) => first(query.findById(pk, options)),

      async findMaxRght(options) {
        const tail = await first(query.findTail(options));
        return tail ? toInteger(tail[rightKey], rightKey) : 0;
      },

      async lockFrom(threshold) {
        const statement = query.lockFrom(threshold);
        if (statement) {
          await run(statement);
        }
      },

      findAncestors: bounds => rows(query.findAncestors(bounds)),

      async countAncestors(bounds) {
        const row = await first(query.countAncestors(bounds));
        return row ? toInteger(row.depth, 'depth') : 0;
      },

      findDescendants: bounds => rows(query.findDescendants(bounds)),
      findRoots: () => rows(query.findRoots()),
      findAll: () => rows(query.findAll()),

      insert: async values => {
        const returned = await first(query.insert(values));
        // boundaries are unique within a scope, so lft identifies the new row
        const stored = returned ?? await first(query.findByLeft(toInteger(values[leftKey], leftKey)));
        if (!stored) {
          throw new Error(`Inserted row with ${leftKey} = ${String(values[leftKey])} could not be read back`);
        }
        return stored;
      },

      shift: operation => run(query.shift(operation)),
      deleteRange: bounds => run(query.deleteRange(bounds)),
      park: bounds => run(query.park(bounds)),
      unpark: offset => run(query.unpark(offset)),
    };
  }
}
