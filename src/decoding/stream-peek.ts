export interface PeekedStream {
  /** Up to `size` leading bytes */
  head: Buffer;
  /** The full stream again, head included */
  chunks: AsyncGenerator<Buffer>;
}

/**
 * Read the first `size` bytes of a chunk stream for format sniffing,
 * then hand back a stream that replays them before the rest.
 */
export async function peekHead(
  source: AsyncIterable<Buffer>,
  size: number,
): Promise<PeekedStream> {
  const iterator = source[Symbol.asyncIterator]();
  const buffered: Buffer[] = [];
  let length = 0;
  let exhausted = false;

  while (length < size) {
    const next = await iterator.next();
    if (next.done) {
      exhausted = true;
      break;
    }
    buffered.push(next.value);
    length += next.value.length;
  }

  async function* replay(): AsyncGenerator<Buffer> {
    try {
      yield* buffered;
      while (!exhausted) {
        const next = await iterator.next();
        if (next.done) {
          exhausted = true;
          return;
        }
        yield next.value;
      }
    } finally {
      if (!exhausted) {
        await iterator.return?.();
      }
    }
  }

  return {
    head: Buffer.concat(buffered).subarray(0, size),
    chunks: replay(),
  };
}
