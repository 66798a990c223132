// tests/execution/db-executor.test.ts
import { describe, it, expect } from 'vitest';
import {
  rowsToQueryResult,
  queryResultsToRows,
  createExecutorFromQueryRunner,
  type DbExecutor,
} from '../../src/core/execution/db-executor.js';

describe('rowsToQueryResult', () => {
  it('produces empty result for no rows', () => {
    expect(rowsToQueryResult([])).toEqual({ columns: [], values: [] });
  });

  it('uses keys of the first row as columns', () => {
    const res = rowsToQueryResult([
      { id: 1, lft: 1, rght: 4 },
      { id: 2, lft: 2, rght: 3 },
    ]);

    expect(res.columns).toEqual(['id', 'lft', 'rght']);
    expect(res.values).toEqual([
      [1, 1, 4],
      [2, 2, 3],
    ]);
  });
});

describe('queryResultsToRows', () => {
  it('flattens every result set back into row objects', () => {
    const rows = queryResultsToRows([
      { columns: ['id', 'lft'], values: [[1, 1], [2, 2]] },
      { columns: ['id', 'lft'], values: [[3, 5]] },
    ]);

    expect(rows).toEqual([
      { id: 1, lft: 1 },
      { id: 2, lft: 2 },
      { id: 3, lft: 5 },
    ]);
  });

  it('returns no rows for empty results', () => {
    expect(queryResultsToRows([])).toEqual([]);
    expect(queryResultsToRows([{ columns: [], values: [] }])).toEqual([]);
  });
});

describe('createExecutorFromQueryRunner', () => {
  it('delegates SQL + params and maps rows correctly', async () => {
    const calls: { sql: string; params?: unknown[] }[] = [];

    const executor: DbExecutor = createExecutorFromQueryRunner({
      async query(sql, params) {
        calls.push({ sql, params });
        return [{ id: 1 }, { id: 2 }];
      },
    });

    const [result] = await executor.executeSql('SELECT * FROM t WHERE id = ?', [42]);

    expect(calls).toEqual([
      { sql: 'SELECT * FROM t WHERE id = ?', params: [42] },
    ]);

    expect(result.columns).toEqual(['id']);
    expect(result.values).toEqual([[1], [2]]);
  });

  it('rewires transaction methods when present', async () => {
    const events: string[] = [];

    const executor = createExecutorFromQueryRunner({
      async query() {
        return [];
      },
      async beginTransaction() {
        events.push('begin');
      },
      async commitTransaction() {
        events.push('commit');
      },
      async rollbackTransaction() {
        events.push('rollback');
      },
      async dispose() {
        events.push('dispose');
      },
    });

    expect(executor.capabilities.transactions).toBe(true);

    await executor.beginTransaction();
    await executor.commitTransaction();
    await executor.rollbackTransaction();
    await executor.dispose();

    expect(events).toEqual(['begin', 'commit', 'rollback', 'dispose']);
  });

  it('reports missing transaction support', async () => {
    const executor = createExecutorFromQueryRunner({
      async query() {
        return [];
      },
    });

    expect(executor.capabilities.transactions).toBe(false);
    await expect(executor.beginTransaction()).rejects.toThrow('Transactions are not supported by this executor');
    await expect(executor.dispose()).resolves.toBeUndefined();
  });
});
