// src/core/execution/db-executor.ts

// low-level canonical shape
export type QueryResult = {
  columns: string[];
  values: unknown[][];
};

export interface DbExecutorCapabilities {
  /** True when begin/commit/rollback map to real database transactions */
  transactions: boolean;
}

export interface TransactionOptions {
  /**
   * The unit of work only reads. Executors that can open a read-only
   * snapshot transaction do so; every statement then sees the same data.
   */
  readOnly?: boolean;
}

export interface DbExecutor {
  readonly capabilities: DbExecutorCapabilities;

  executeSql(sql: string, params?: unknown[]): Promise<QueryResult[]>;

  beginTransaction(options?: TransactionOptions): Promise<void>;
  commitTransaction(): Promise<void>;
  rollbackTransaction(): Promise<void>;

  /** Releases the underlying connection, when the executor owns one. */
  dispose(): Promise<void>;
}

// --- helpers ---

/**
 * Convert an array of row objects into a QueryResult.
 */
export function rowsToQueryResult(
  rows: Array<Record<string, unknown>>
): QueryResult {
  if (rows.length === 0) {
    return { columns: [], values: [] };
  }

  const columns = Object.keys(rows[0]);
  const values = rows.map(row => columns.map(c => row[c]));
  return { columns, values };
}

/**
 * Converts QueryResult[] back to row objects.
 * Handles the canonical { columns, values } format.
 */
export function queryResultsToRows(results: QueryResult[]): Array<Record<string, unknown>> {
  const rows: Array<Record<string, unknown>> = [];

  for (const result of results) {
    const { columns, values } = result;
    for (const valueRow of values) {
      const row: Record<string, unknown> = {};
      for (let i = 0; i < columns.length; i++) {
        row[columns[i]] = valueRow[i];
      }
      rows.push(row);
    }
  }

  return rows;
}

/**
 * Minimal contract that most SQL clients can implement.
 */
export interface SimpleQueryRunner {
  query(
    sql: string,
    params?: unknown[]
  ): Promise<Array<Record<string, unknown>>>;
  beginTransaction?(options?: TransactionOptions): Promise<void>;
  commitTransaction?(): Promise<void>;
  rollbackTransaction?(): Promise<void>;
  dispose?(): Promise<void>;
}

const unsupportedTransaction = async (): Promise<void> => {
  throw new Error('Transactions are not supported by this executor');
};

/**
 * Generic factory: turn any SimpleQueryRunner into a DbExecutor.
 */
export function createExecutorFromQueryRunner(
  runner: SimpleQueryRunner
): DbExecutor {
  const { beginTransaction, commitTransaction, rollbackTransaction } = runner;
  const supportsTransactions =
    typeof beginTransaction === 'function' &&
    typeof commitTransaction === 'function' &&
    typeof rollbackTransaction === 'function';

  return {
    capabilities: {
      transactions: supportsTransactions,
    },
    async executeSql(sql, params) {
      const rows = await runner.query(sql, params);
      const result = rowsToQueryResult(rows);
      return [result];
    },
    beginTransaction: beginTransaction?.bind(runner) ?? unsupportedTransaction,
    commitTransaction: commitTransaction?.bind(runner) ?? unsupportedTransaction,
    rollbackTransaction: rollbackTransaction?.bind(runner) ?? unsupportedTransaction,
    async dispose() {
      await runner.dispose?.();
    },
  };
}
