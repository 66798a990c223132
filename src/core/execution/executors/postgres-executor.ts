// src/core/execution/executors/postgres-executor.ts
import {
  type DbExecutor,
  createExecutorFromQueryRunner
} from '../db-executor.js';

// READ COMMITTED (the default) takes a new snapshot per statement
const READ_ONLY_BEGIN = 'BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY';

export interface PostgresClientLike {
  query(
    text: string,
    params?: unknown[]
  ): Promise<{ rows: Array<Record<string, unknown>> }>;
  release?(): void;
}

export function createPostgresExecutor(
  client: PostgresClientLike
): DbExecutor {
  return createExecutorFromQueryRunner({
    async query(sql, params) {
      const { rows } = await client.query(sql, params);
      return rows;
    },
    async beginTransaction(options) {
      await client.query(options?.readOnly ? READ_ONLY_BEGIN : 'BEGIN');
    },
    async commitTransaction() {
      await client.query('COMMIT');
    },
    async rollbackTransaction() {
      await client.query('ROLLBACK');
    },
    async dispose() {
      client.release?.();
    },
  });
}
