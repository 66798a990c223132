import { Dialect } from '../abstract.js';

/**
 * SQLite dialect implementation
 */
export class SqliteDialect extends Dialect {
  protected readonly dialect = 'sqlite';
  protected readonly conflictCodes = ['SQLITE_BUSY', 'SQLITE_LOCKED', 5, 6];

  /**
   * Quotes an identifier using SQLite double-quote syntax
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  quoteIdentifier(id: string): string {
    return `"${id}"`;
  }

  supportsReturning(): boolean {
    return true;
  }
}
