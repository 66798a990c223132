// src/core/execution/executors/mysql-executor.ts
import {
  type DbExecutor,
  rowsToQueryResult
} from '../db-executor.js';

export interface MysqlClientLike {
  query(
    sql: string,
    params?: unknown[]
  ): Promise<[unknown, unknown?]>; // rows, metadata
  beginTransaction?(): Promise<void>;
  commit?(): Promise<void>;
  rollback?(): Promise<void>;
  release?(): void;
}

const isRowArray = (value: unknown): value is Array<Record<string, unknown>> =>
  Array.isArray(value) && value.every(row => typeof row === 'object' && row !== null);

/**
 * Creates a database executor for MySQL.
 *
 * InnoDB runs REPEATABLE READ by default, so a plain transaction already reads
 * from one snapshot; read-only work needs no other statement.
 */
export function createMysqlExecutor(
  client: MysqlClientLike
): DbExecutor {
  const { beginTransaction, commit, rollback } = client;
  const supportsTransactions =
    typeof beginTransaction === 'function' &&
    typeof commit === 'function' &&
    typeof rollback === 'function';

  const requireHook = (hook: (() => Promise<void>) | undefined): (() => Promise<void>) => {
    if (!hook) {
      throw new Error('Transactions are not supported by this executor');
    }
    return hook.bind(client);
  };

  return {
    capabilities: {
      transactions: supportsTransactions,
    },
    async executeSql(sql, params) {
      const [rows] = await client.query(sql, params);

      if (!isRowArray(rows)) {
        // e.g. insert/update returning only headers, treat as no rows
        return [{ columns: [], values: [] }];
      }

      return [rowsToQueryResult(rows)];
    },
    async beginTransaction() {
      await requireHook(beginTransaction)();
    },
    async commitTransaction() {
      await requireHook(commit)();
    },
    async rollbackTransaction() {
      await requireHook(rollback)();
    },
    async dispose() {
      client.release?.();
    },
  };
}
