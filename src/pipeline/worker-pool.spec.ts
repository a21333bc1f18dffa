import { setTimeout as sleep } from 'node:timers/promises';
import { WorkerPool } from './worker-pool';

async function* fromArray<T>(items: T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

describe('WorkerPool', () => {
  it('should reject a concurrency below one', () => {
    expect(() => new WorkerPool<number>({ concurrency: 0 })).toThrow(RangeError);
  });

  it('should process every item exactly once', async () => {
    const seen: number[] = [];
    const pool = new WorkerPool<number>({ concurrency: 4 });

    const result = await pool.run(fromArray([1, 2, 3, 4, 5, 6, 7]), async (item) => {
      await sleep(item % 3);
      seen.push(item);
    });

    expect([...seen].sort((a, b) => a - b)).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(result).toEqual({ dispatched: 7, dropped: 0, stopped: false });
  });

  it('should never run more than `concurrency` items at once', async () => {
    let active = 0;
    let peak = 0;
    const pool = new WorkerPool<number>({ concurrency: 3 });

    await pool.run(fromArray(Array.from({ length: 12 }, (_, i) => i)), async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(2);
      active--;
    });

    expect(peak).toBe(3);
  });

  it('should run items in source order with a single worker', async () => {
    const order: string[] = [];
    const pool = new WorkerPool<string>({ concurrency: 1 });

    await pool.run(fromArray(['a', 'b', 'c']), async (item) => {
      await sleep(1);
      order.push(item);
    });

    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('should not pull from the source far ahead of the workers', async () => {
    let pulled = 0;
    async function* counting(): AsyncGenerator<number> {
      for (let i = 0; i < 50; i++) {
        pulled++;
        yield i;
      }
    }
    const pool = new WorkerPool<number>({ concurrency: 1, queueCapacity: 2 });
    let maxLead = 0;
    let done = 0;

    await pool.run(counting(), async () => {
      maxLead = Math.max(maxLead, pulled - done);
      await sleep(1);
      done++;
    });

    // one in flight, two queued, one held by the blocked producer
    expect(maxLead).toBeLessThanOrEqual(4);
  });

  it('should stop admitting work when the signal aborts', async () => {
    const controller = new AbortController();
    const processed: number[] = [];
    const pool = new WorkerPool<number>({
      concurrency: 2,
      queueCapacity: 2,
      signal: controller.signal,
    });

    const result = await pool.run(
      fromArray(Array.from({ length: 100 }, (_, i) => i)),
      async (item) => {
        if (item === 3) controller.abort();
        await sleep(1);
        processed.push(item);
      },
    );

    expect(result.stopped).toBe(true);
    expect(processed.length).toBeLessThan(100);
    expect(processed).toContain(3);
  });

  it('should return immediately when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const worker = jest.fn().mockResolvedValue(undefined);
    const pool = new WorkerPool<number>({ concurrency: 2, signal: controller.signal });

    const result = await pool.run(fromArray([1, 2, 3]), worker);

    expect(worker).not.toHaveBeenCalled();
    expect(result.stopped).toBe(true);
  });

  it('should rethrow the first worker failure after in-flight items finish', async () => {
    const finished: number[] = [];
    const pool = new WorkerPool<number>({ concurrency: 2 });

    await expect(
      pool.run(fromArray([1, 2, 3, 4, 5, 6]), async (item) => {
        if (item === 1) {
          await sleep(1);
          throw new Error('disk full');
        }
        await sleep(5);
        finished.push(item);
      }),
    ).rejects.toThrow('disk full');

    expect(finished).toContain(2);
    expect(finished).not.toContain(6);
  });

  it('should rethrow a failure raised by the source', async () => {
    async function* failing(): AsyncGenerator<number> {
      yield 1;
      throw new Error('listing failed');
    }
    const pool = new WorkerPool<number>({ concurrency: 2 });

    await expect(pool.run(failing(), async () => undefined)).rejects.toThrow(
      'listing failed',
    );
  });
});
