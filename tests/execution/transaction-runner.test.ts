import { describe, it, expect } from 'vitest';
import type { DbExecutor } from '../../src/core/execution/db-executor.js';
import { runInTransaction, SerialQueue, serialQueueFor } from '../../src/core/execution/transaction-runner.js';

interface RecordingExecutor extends DbExecutor {
  events: string[];
}

const createExecutor = (failures: { commit?: Error; rollback?: Error } = {}): RecordingExecutor => {
  const events: string[] = [];
  return {
    events,
    capabilities: { transactions: true },
    async executeSql(sql) {
      events.push(sql);
      return [];
    },
    async beginTransaction(options) {
      events.push(options?.readOnly ? 'begin read-only' : 'begin');
    },
    async commitTransaction() {
      events.push('commit');
      if (failures.commit) throw failures.commit;
    },
    async rollbackTransaction() {
      events.push('rollback');
      if (failures.rollback) throw failures.rollback;
    },
    async dispose() {
      events.push('dispose');
    },
  };
};

describe('runInTransaction', () => {
  it('commits after the action resolves', async () => {
    const executor = createExecutor();

    const result = await runInTransaction(executor, async () => {
      await executor.executeSql('UPDATE t SET x = 1');
      return 42;
    });

    expect(result).toBe(42);
    expect(executor.events).toEqual(['begin', 'UPDATE t SET x = 1', 'commit']);
  });

  it('passes transaction options to the executor', async () => {
    const executor = createExecutor();

    await runInTransaction(executor, async () => executor.executeSql('SELECT 1'), { readOnly: true });

    expect(executor.events).toEqual(['begin read-only', 'SELECT 1', 'commit']);
  });

  it('rolls back and rethrows when the action fails', async () => {
    const executor = createExecutor();
    const failure = new Error('boom');

    await expect(runInTransaction(executor, async () => {
      throw failure;
    })).rejects.toBe(failure);

    expect(executor.events).toEqual(['begin', 'rollback']);
  });

  it('rolls back when the commit fails', async () => {
    const commitError = new Error('commit failed');
    const executor = createExecutor({ commit: commitError });

    await expect(runInTransaction(executor, async () => 1)).rejects.toBe(commitError);
    expect(executor.events).toEqual(['begin', 'commit', 'rollback']);
  });

  it('keeps the original error when the rollback fails too', async () => {
    const rollbackError = new Error('rollback failed');
    const executor = createExecutor({ rollback: rollbackError });
    const failure = new Error('boom');

    const caught = await runInTransaction(executor, async () => {
      throw failure;
    }).catch((error: unknown) => error);

    expect(caught).toBe(failure);
    expect(Reflect.get(failure, 'rollbackError')).toBe(rollbackError);
    expect(Object.keys(failure)).not.toContain('rollbackError');
  });
});

describe('SerialQueue', () => {
  it('runs work one at a time in submission order', async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    let releaseFirst = (): void => undefined;
    const gate = new Promise<void>(resolve => {
      releaseFirst = resolve;
    });

    const first = queue.run(async () => {
      events.push('first:start');
      await gate;
      events.push('first:end');
      return 1;
    });
    const second = queue.run(async () => {
      events.push('second:start');
      return 2;
    });

    await Promise.resolve();
    expect(events).toEqual(['first:start']);

    releaseFirst();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('keeps running after a failed unit of work', async () => {
    const queue = new SerialQueue();

    const failed = queue.run(async () => {
      throw new Error('first failed');
    });
    const next = queue.run(async () => 'second');

    await expect(failed).rejects.toThrow('first failed');
    await expect(next).resolves.toBe('second');
  });
});

describe('serialQueueFor', () => {
  it('shares one queue per executor', () => {
    const executor = createExecutor();

    expect(serialQueueFor(executor)).toBe(serialQueueFor(executor));
    expect(serialQueueFor(executor)).not.toBe(serialQueueFor(createExecutor()));
  });
});
