/**
 * Supported database dialects
 */
export const SUPPORTED_DIALECTS = {
  /** MySQL database dialect */
  MYSQL: 'mysql',
  /** SQLite database dialect */
  SQLITE: 'sqlite',
  /** PostgreSQL database dialect */
  POSTGRES: 'postgres'
} as const;

/**
 * Type representing any supported database dialect
 */
export type DialectName = (typeof SUPPORTED_DIALECTS)[keyof typeof SUPPORTED_DIALECTS];

/**
 * Context for SQL compilation with parameter management
 */
export interface CompilerContext {
  /** Array of parameters */
  params: unknown[];
  /** Function to add a parameter and get its placeholder */
  addParameter(value: unknown): string;
}

/**
 * Result of SQL compilation
 */
export interface CompiledQuery {
  /** Generated SQL string */
  sql: string;
  /** Parameters for the query */
  params: unknown[];
}

/**
 * Reads the driver-specific `code` / `errno` of a storage error, if any.
 */
export const readErrorCodes = (error: unknown): Array<string | number> => {
  if (typeof error !== 'object' || error === null) return [];
  const codes: Array<string | number> = [];
  for (const key of ['code', 'errno', 'sqlState']) {
    const value: unknown = Reflect.get(error, key);
    if (typeof value === 'string' || typeof value === 'number') {
      codes.push(value);
    }
  }
  return codes;
};

/**
 * Abstract base class for SQL dialect implementations
 */
export abstract class Dialect {
  /** Dialect identifier */
  protected abstract readonly dialect: DialectName;

  /** Storage error codes that signal a lock conflict worth retrying */
  protected abstract readonly conflictCodes: ReadonlyArray<string | number>;

  get name(): DialectName {
    return this.dialect;
  }

  /**
   * Quotes an SQL identifier (to be implemented by concrete dialects)
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  abstract quoteIdentifier(id: string): string;

  /**
   * Quotes a table name, qualified by its schema when one is given.
   */
  quoteTable(name: string, schema?: string): string {
    const table = this.quoteIdentifier(name);
    return schema ? `${this.quoteIdentifier(schema)}.${table}` : table;
  }

  supportsReturning(): boolean {
    return false;
  }

  /**
   * Row-locking suffix for SELECT statements run inside a write transaction.
   * Empty for engines that lock the whole database on write.
   */
  forUpdateClause(): string {
    return '';
  }

  /**
   * Whether a storage error is a lock-wait timeout, deadlock, serialization
   * failure or busy database.
   */
  isConcurrencyError(error: unknown): boolean {
    return readErrorCodes(error).some(code => this.conflictCodes.includes(code));
  }

  /**
   * Creates a new compiler context
   * @returns Compiler context with parameter management
   */
  createCompilerContext(): CompilerContext {
    const params: unknown[] = [];
    let counter = 0;
    return {
      params,
      addParameter: (value: unknown) => {
        counter += 1;
        params.push(value);
        return this.formatPlaceholder(counter);
      }
    };
  }

  /**
   * Formats a parameter placeholder
   * @param index - Parameter index
   * @returns Formatted placeholder string
   */
  protected formatPlaceholder(_index: number): string {
    void _index;
    return '?';
  }
}
