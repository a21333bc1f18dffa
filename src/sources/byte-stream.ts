import type { Readable } from 'node:stream';
import {
  formatErrorMessage,
  PipelineError,
  TransientFetchError,
} from '../common/errors';

/**
 * Re-yield a log's byte stream, turning read failures (socket resets,
 * aborted downloads, timeouts) into TransientFetchError so they are told
 * apart from decode failures and retried.
 */
export async function* guardByteStream(
  stream: Readable,
  identifier: string,
): AsyncGenerator<Buffer> {
  try {
    for await (const chunk of stream) {
      yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    }
  } catch (error) {
    if (error instanceof PipelineError) {
      throw error;
    }
    throw new TransientFetchError(identifier, formatErrorMessage(error), error);
  } finally {
    stream.destroy();
  }
}
