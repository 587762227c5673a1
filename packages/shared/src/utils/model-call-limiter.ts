import pLimit, { type LimitFunction } from 'p-limit';

/**
 * ModelCallLimiter - process-wide cap on in-flight model calls
 *
 * One instance is meant to be shared by every component that calls the
 * provider, so the cap holds across concurrent analysis requests rather than
 * per request. Tasks start in submission order.
 */
export class ModelCallLimiter {
  readonly concurrency: number;
  private readonly limit: LimitFunction;

  constructor(concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(
        `Concurrency must be a positive integer, got ${concurrency}`,
      );
    }
    this.concurrency = concurrency;
    this.limit = pLimit(concurrency);
  }

  /**
   * Run a task once a slot is free.
   *
   * The returned promise rejects with the signal's reason as soon as the
   * signal aborts, also while the task is still queued. A task whose signal
   * aborted before its slot freed up is never started.
   */
  run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return this.limit(task);
    if (signal.aborted) return Promise.reject(signal.reason);

    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });

      void this.limit(() => {
        signal.throwIfAborted();
        return task();
      })
        .then(resolve, reject)
        .finally(() => signal.removeEventListener('abort', onAbort));
    });
  }

  /**
   * Number of tasks currently running
   */
  get activeCount(): number {
    return this.limit.activeCount;
  }

  /**
   * Number of tasks waiting for a slot
   */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }
}
