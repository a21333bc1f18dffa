/**
 * Capacity-bounded async FIFO with one or more producers and consumers.
 *
 * - `push` resolves once the item is in the queue; it waits while full.
 * - `shift` resolves with the next item, or `undefined` once the queue is
 *   closed and drained.
 * - `close` stops admission. Waiting producers are released with `false`,
 *   waiting consumers with `undefined`.
 */
export class BoundedQueue<T> {
  private readonly items: T[] = [];
  private readonly consumers: Array<(item: T | undefined) => void> = [];
  private readonly producers: Array<() => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async push(item: T): Promise<boolean> {
    while (!this.closed && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.producers.push(resolve));
    }
    if (this.closed) {
      return false;
    }

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  shift(): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.producers.shift()?.();
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise<T | undefined>((resolve) => this.consumers.push(resolve));
  }

  /**
   * @param discardPending - drop queued items so consumers stop right away
   */
  close(discardPending = false): T[] {
    this.closed = true;
    const discarded = discardPending ? this.items.splice(0) : [];
    for (const consumer of this.consumers.splice(0)) {
      consumer(this.items.shift());
    }
    for (const producer of this.producers.splice(0)) {
      producer();
    }
    return discarded;
  }
}
