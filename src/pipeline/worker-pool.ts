import { Logger } from '@nestjs/common';
import { BoundedQueue } from './bounded-queue';

export interface WorkerPoolOptions {
  /** Number of concurrent workers (1 = sequential) */
  concurrency: number;
  /** Pending-queue capacity; defaults to twice the concurrency */
  queueCapacity?: number;
  /** Stops admission; queued items are dropped, in-flight ones finish */
  signal?: AbortSignal;
}

export interface WorkerPoolResult {
  /** Items handed to a worker */
  dispatched: number;
  /** Items left in the queue when the pool was stopped */
  dropped: number;
  /** True when `signal` fired before the source was exhausted */
  stopped: boolean;
}

export type WorkerFn<T> = (item: T, workerIndex: number) => Promise<void>;

/**
 * WorkerPool - fixed set of async workers over a bounded queue
 *
 * One producer pulls lazily from `source` and feeds the queue; it suspends
 * while the queue is full, so listing never runs far ahead of processing.
 * `concurrency` workers take items off the queue until it is closed and
 * drained.
 *
 * The worker function is expected to contain its own per-item failures. If
 * it throws anyway, the pool treats that as fatal: admission stops, pending
 * items are dropped, the remaining workers finish what they hold, and the
 * first error is rethrown from `run`. A failure of the source itself is
 * handled the same way.
 */
export class WorkerPool<T> {
  private readonly logger = new Logger(WorkerPool.name);

  constructor(private readonly options: WorkerPoolOptions) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(
        `Worker concurrency must be a positive integer, got ${options.concurrency}`,
      );
    }
  }

  async run(source: AsyncIterable<T>, worker: WorkerFn<T>): Promise<WorkerPoolResult> {
    const { concurrency, signal } = this.options;
    const queue = new BoundedQueue<T>(
      this.options.queueCapacity ?? concurrency * 2,
    );
    const result: WorkerPoolResult = { dispatched: 0, dropped: 0, stopped: false };
    const fatal: { failed: boolean; error?: unknown } = { failed: false };

    const recordFatal = (error: unknown) => {
      if (fatal.failed) return;
      fatal.failed = true;
      fatal.error = error;
    };

    const stop = (reason: string) => {
      if (queue.isClosed) return;
      const dropped = queue.close(true);
      result.dropped += dropped.length;
      this.logger.warn(`Stopping admission (${reason}); dropped ${dropped.length} queued item(s)`);
    };

    const onAbort = () => {
      result.stopped = true;
      stop('cancelled');
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    const produce = async () => {
      try {
        for await (const item of source) {
          if (queue.isClosed) break;
          if (!(await queue.push(item))) break;
        }
      } catch (error) {
        recordFatal(error);
        stop('source failed');
        return;
      }
      queue.close();
    };

    const consume = async (workerIndex: number) => {
      for (;;) {
        const item = await queue.shift();
        if (item === undefined) return;
        result.dispatched++;
        try {
          await worker(item, workerIndex);
        } catch (error) {
          recordFatal(error);
          stop('worker failed');
          return;
        }
      }
    };

    try {
      await Promise.all([
        produce(),
        ...Array.from({ length: concurrency }, (_, index) => consume(index)),
      ]);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (fatal.failed) {
      throw fatal.error;
    }
    return result;
  }
}
