/**
 * Tree Behavior
 *
 * Hierarchical data in a flat relational table using the Nested Set model.
 *
 * @module tree
 */

export * from './tree-types.js';
export * from './tree-errors.js';
export * from './nested-set-strategy.js';
export * from './tree-query.js';
export * from './tree-store.js';
export * from './sql-tree-store.js';
export * from './tree-node.js';
export * from './tree-manager.js';
