import { BoundedQueue } from './bounded-queue';

describe('BoundedQueue', () => {
  it('should reject a non-positive capacity', () => {
    expect(() => new BoundedQueue<number>(0)).toThrow(RangeError);
  });

  it('should deliver items in FIFO order', async () => {
    const queue = new BoundedQueue<number>(3);
    await queue.push(1);
    await queue.push(2);

    await expect(queue.shift()).resolves.toBe(1);
    await expect(queue.shift()).resolves.toBe(2);
  });

  it('should hand an item straight to a waiting consumer', async () => {
    const queue = new BoundedQueue<string>(1);
    const pending = queue.shift();

    await queue.push('a');

    await expect(pending).resolves.toBe('a');
    expect(queue.size).toBe(0);
  });

  it('should block producers while full', async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.push(1);

    let secondAdmitted = false;
    const second = queue.push(2).then((admitted) => {
      secondAdmitted = admitted;
    });

    await Promise.resolve();
    expect(secondAdmitted).toBe(false);
    expect(queue.size).toBe(1);

    await expect(queue.shift()).resolves.toBe(1);
    await second;
    expect(secondAdmitted).toBe(true);
    await expect(queue.shift()).resolves.toBe(2);
  });

  it('should never hold more than its capacity', async () => {
    const queue = new BoundedQueue<number>(2);
    let maxSize = 0;

    const producer = (async () => {
      for (let i = 0; i < 20; i++) {
        await queue.push(i);
        maxSize = Math.max(maxSize, queue.size);
      }
      queue.close();
    })();

    const received: number[] = [];
    for (;;) {
      const item = await queue.shift();
      if (item === undefined) break;
      received.push(item);
    }
    await producer;

    expect(received).toEqual(Array.from({ length: 20 }, (_, i) => i));
    expect(maxSize).toBeLessThanOrEqual(2);
  });

  it('should release waiting consumers with undefined on close', async () => {
    const queue = new BoundedQueue<number>(1);
    const waiting = [queue.shift(), queue.shift()];

    queue.close();

    await expect(Promise.all(waiting)).resolves.toEqual([undefined, undefined]);
  });

  it('should drain queued items after close unless discarded', async () => {
    const queue = new BoundedQueue<number>(3);
    await queue.push(1);
    await queue.push(2);

    queue.close();
    await expect(queue.push(3)).resolves.toBe(false);
    await expect(queue.shift()).resolves.toBe(1);
    await expect(queue.shift()).resolves.toBe(2);
    await expect(queue.shift()).resolves.toBeUndefined();
  });

  it('should return discarded items when closing with discardPending', async () => {
    const queue = new BoundedQueue<number>(3);
    await queue.push(1);
    await queue.push(2);

    expect(queue.close(true)).toEqual([1, 2]);
    await expect(queue.shift()).resolves.toBeUndefined();
  });

  it('should release a blocked producer on close', async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.push(1);
    const blocked = queue.push(2);

    queue.close();

    await expect(blocked).resolves.toBe(false);
  });
});
