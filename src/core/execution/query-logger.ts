import type { DbExecutor } from './db-executor.js';

/**
 * The tree call a statement belongs to.
 */
export interface QueryLogContext {
  /** Manager operation, e.g. `addChild` or `ancestorsOf` */
  operation: string;
  /** Table the tree lives in, schema-qualified when it has one */
  table: string;
}

/**
 * One statement as it is sent to the database.
 */
export interface QueryLogEntry extends QueryLogContext {
  sql: string;
  params: unknown[];
  /** Whether the statement runs inside a write transaction */
  write: boolean;
}

export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Wraps an executor for one unit of work so every statement reaches
 * `logger` tagged with the tree call that issued it.
 * Without a logger the executor is returned as is.
 */
export const createQueryLoggingExecutor = (
  executor: DbExecutor,
  logger: QueryLogger | undefined,
  context: QueryLogContext & { write: boolean }
): DbExecutor => {
  if (!logger) {
    return executor;
  }

  return {
    capabilities: executor.capabilities,
    async executeSql(sql, params = []) {
      logger({ ...context, sql, params });
      return executor.executeSql(sql, params);
    },
    beginTransaction: options => executor.beginTransaction(options),
    commitTransaction: () => executor.commitTransaction(),
    rollbackTransaction: () => executor.rollbackTransaction(),
    dispose: () => executor.dispose(),
  };
};
