import { Dialect } from '../abstract.js';

/**
 * MySQL dialect implementation
 */
export class MySqlDialect extends Dialect {
  protected readonly dialect = 'mysql';
  protected readonly conflictCodes = ['ER_LOCK_WAIT_TIMEOUT', 'ER_LOCK_DEADLOCK', 1205, 1213];

  /**
   * Quotes an identifier using MySQL backtick syntax
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  quoteIdentifier(id: string): string {
    return `\`${id}\``;
  }

  forUpdateClause(): string {
    return ' FOR UPDATE';
  }
}
