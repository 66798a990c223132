import { resolveTreeConfig, type TreeConfig } from '../tree/tree-types.js';

/**
 * Definition of a table that stores a nested set tree
 */
export interface TreeTableDef {
  /** Name of the table */
  name: string;
  /** Optional schema/catalog name */
  schema?: string;
  /** Every column callers may write, including the tree columns */
  columns: readonly string[];
  /** Resolved tree column mapping */
  config: TreeConfig;
}

export interface TreeTableOptions extends Partial<TreeConfig> {
  schema?: string;
}

/**
 * Result of checking a table definition for the columns a tree needs.
 */
export interface TreeValidationResult {
  valid: boolean;
  missingColumns: string[];
}

/**
 * Creates a tree table definition.
 *
 * @param name - Name of the table
 * @param columns - Column names of the table
 * @param options - Tree column mapping (defaults: `id`, `lft`, `rght`) and schema
 *
 * @example
 * ```typescript
 * const categories = defineTreeTable('categories', ['id', 'name', 'lft', 'rght']);
 * const comments = defineTreeTable(
 *   'comments',
 *   ['comment_id', 'thread_id', 'body', 'left_bound', 'right_bound'],
 *   { primaryKey: 'comment_id', leftKey: 'left_bound', rightKey: 'right_bound', scope: ['thread_id'] }
 * );
 * ```
 */
export const defineTreeTable = (
  name: string,
  columns: readonly string[],
  options: TreeTableOptions = {}
): TreeTableDef => {
  const { schema, ...config } = options;
  const table: TreeTableDef = {
    name,
    schema,
    columns: [...columns],
    config: resolveTreeConfig(config),
  };

  const validation = validateTreeTable(table);
  if (!validation.valid) {
    throw new Error(
      `Invalid tree table '${name}': missing columns ${validation.missingColumns.join(', ')}`
    );
  }

  return table;
};

/**
 * Validates that a table definition contains the required tree columns.
 */
export function validateTreeTable(table: TreeTableDef): TreeValidationResult {
  const { primaryKey, leftKey, rightKey, scope = [] } = table.config;
  const missingColumns = [primaryKey, leftKey, rightKey, ...scope].filter(
    column => !table.columns.includes(column)
  );

  return {
    valid: missingColumns.length === 0,
    missingColumns,
  };
}
