/**
 * Nested set tree core exports.
 * Provides table definitions, dialects, executors and tree operations.
 */
export * from './schema/table.js';
export * from './core/dialect/abstract.js';
export * from './core/dialect/dialect-factory.js';
export * from './core/dialect/mysql/index.js';
export * from './core/dialect/sqlite/index.js';
export * from './core/dialect/postgres/index.js';

// execution abstraction + helpers
export * from './core/execution/db-executor.js';
export * from './core/execution/query-logger.js';
export * from './core/execution/transaction-runner.js';
export * from './core/execution/executors/postgres-executor.js';
export * from './core/execution/executors/mysql-executor.js';
export * from './core/execution/executors/sqlite-executor.js';

export * from './tree/index.js';
