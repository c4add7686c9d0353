import { wrapError } from '@batchpay/core';
import type { Result } from 'neverthrow';

/**
 * Serializes async units of work: each task starts after the previous one settles.
 * A task that throws resolves to an Err and does not stall the queue.
 */
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  run<T, E>(task: () => Promise<Result<T, E>>, errorContext: string): Promise<Result<T, E | Error>> {
    this.pending++;

    const result = this.tail.then(async (): Promise<Result<T, E | Error>> => {
      try {
        return await task();
      } catch (error) {
        return wrapError(error, errorContext);
      } finally {
        this.pending--;
      }
    });

    this.tail = result.then(() => undefined);
    return result;
  }
}
