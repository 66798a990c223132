import { SUPPORTED_DIALECTS, type Dialect, type DialectName } from './abstract.js';
import { MySqlDialect } from './mysql/index.js';
import { PostgresDialect } from './postgres/index.js';
import { SqliteDialect } from './sqlite/index.js';

/**
 * Key of a built-in dialect. Other dialects are passed as instances.
 */
export type DialectKey = DialectName;

const BUILT_IN_DIALECTS: Record<DialectKey, () => Dialect> = {
  sqlite: () => new SqliteDialect(),
  postgres: () => new PostgresDialect(),
  mysql: () => new MySqlDialect(),
};

const DIALECT_KEYS: readonly string[] = Object.values(SUPPORTED_DIALECTS);

export const isDialectKey = (value: string): value is DialectKey => DIALECT_KEYS.includes(value);

/**
 * Creates a fresh instance of a built-in dialect.
 */
export const createDialect = (key: DialectKey): Dialect => BUILT_IN_DIALECTS[key]();

/**
 * Normalizes a dialect instance or key into a Dialect instance.
 * Keys may come from untyped configuration, so they are checked at run time.
 */
export const resolveDialectInput = (dialect: Dialect | string): Dialect => {
  if (typeof dialect !== 'string') {
    return dialect;
  }
  if (!isDialectKey(dialect)) {
    throw new Error(`Unknown dialect "${dialect}", expected one of: ${DIALECT_KEYS.join(', ')}`);
  }
  return createDialect(dialect);
};
