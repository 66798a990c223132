import { Dialect } from '../abstract.js';

/**
 * PostgreSQL dialect implementation
 */
export class PostgresDialect extends Dialect {
  protected readonly dialect = 'postgres';
  // deadlock_detected, lock_not_available, serialization_failure
  protected readonly conflictCodes = ['40P01', '55P03', '40001'];

  /**
   * Quotes an identifier using PostgreSQL double-quote syntax
   * @param id - Identifier to quote
   * @returns Quoted identifier
   */
  quoteIdentifier(id: string): string {
    return `"${id}"`;
  }

  supportsReturning(): boolean {
    return true;
  }

  forUpdateClause(): string {
    return ' FOR UPDATE';
  }

  protected formatPlaceholder(index: number): string {
    return `$${index}`;
  }
}
