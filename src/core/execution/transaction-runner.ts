import type { DbExecutor, TransactionOptions } from './db-executor.js';

/**
 * Executes a function within a database transaction
 * @param executor - Database executor to use for transaction operations
 * @param action - Function to execute within the transaction
 * @param options - Passed to `beginTransaction`
 * @returns The value produced by `action`, once the transaction has committed
 * @throws Re-throws any errors that occur during the transaction (after rolling back)
 */
export const runInTransaction = async <T>(
  executor: DbExecutor,
  action: () => Promise<T>,
  options?: TransactionOptions
): Promise<T> => {
  await executor.beginTransaction(options);
  try {
    const result = await action();
    await executor.commitTransaction();
    return result;
  } catch (error) {
    await rollbackAfterFailure(executor, error);
    throw error;
  }
};

/**
 * Rolls back after a failed action or commit. A rollback failure is attached
 * to the original error as `rollbackError` instead of replacing it.
 */
const rollbackAfterFailure = async (executor: DbExecutor, original: unknown): Promise<void> => {
  try {
    await executor.rollbackTransaction();
  } catch (rollbackError) {
    if (original instanceof Error) {
      Object.defineProperty(original, 'rollbackError', {
        value: rollbackError,
        enumerable: false,
        configurable: true,
      });
      return;
    }
    throw rollbackError;
  }
};

/**
 * Runs units of work one at a time, in submission order.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();

  run<T>(work: () => Promise<T>): Promise<T> {
    const result = this.tail.then(work);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

const connectionQueues = new WeakMap<DbExecutor, SerialQueue>();

/**
 * The queue shared by every unit of work on `executor`, so callers sharing a
 * connection never issue statements inside each other's transaction.
 */
export const serialQueueFor = (executor: DbExecutor): SerialQueue => {
  let queue = connectionQueues.get(executor);
  if (!queue) {
    queue = new SerialQueue();
    connectionQueues.set(executor, queue);
  }
  return queue;
};
