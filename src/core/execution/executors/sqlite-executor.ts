// src/core/execution/executors/sqlite-executor.ts
import {
  type DbExecutor,
  type TransactionOptions,
  rowsToQueryResult
} from '../db-executor.js';

export interface SqliteClientLike {
  all(
    sql: string,
    params?: unknown[]
  ): Promise<Array<Record<string, unknown>>>;
  beginTransaction?(options?: TransactionOptions): Promise<void>;
  commitTransaction?(): Promise<void>;
  rollbackTransaction?(): Promise<void>;
}

/**
 * Creates a database executor for SQLite.
 *
 * Clients that do not provide their own transaction hooks get plain
 * `BEGIN IMMEDIATE` / `COMMIT` / `ROLLBACK` statements, so a writer takes the
 * database lock before it reads the boundaries it is about to shift. Read-only
 * work opens a deferred transaction, which holds one snapshot without taking
 * the write lock.
 *
 * @param client A SQLite client instance.
 * @returns A DbExecutor implementation for SQLite.
 */
export function createSqliteExecutor(
  client: SqliteClientLike
): DbExecutor {
  const run = async (sql: string): Promise<void> => {
    await client.all(sql, []);
  };

  return {
    capabilities: {
      transactions: true,
    },
    async executeSql(sql, params) {
      const rows = await client.all(sql, params);
      const result = rowsToQueryResult(rows);
      return [result];
    },
    async beginTransaction(options) {
      if (client.beginTransaction) {
        await client.beginTransaction(options);
        return;
      }
      await run(options?.readOnly ? 'BEGIN DEFERRED;' : 'BEGIN IMMEDIATE;');
    },
    async commitTransaction() {
      if (client.commitTransaction) {
        await client.commitTransaction();
        return;
      }
      await run('COMMIT;');
    },
    async rollbackTransaction() {
      if (client.rollbackTransaction) {
        await client.rollbackTransaction();
        return;
      }
      await run('ROLLBACK;');
    },
    async dispose() {
      // Connection lifecycle is owned by the caller.
    },
  };
}
