import { Injectable, Logger } from '@nestjs/common';
import * as path from 'node:path';
import { CorruptFormatError } from '../common/errors';
import { DecodeOptions, ILogDecoder, Sample } from './interfaces/decoder.interface';
import { peekHead } from './stream-peek';
import { TelemetryCsvDecoder } from './strategies/telemetry-csv.decoder';
import { ULogDecoder } from './strategies/ulog.decoder';

/**
 * DecodingService - picks a decoder for each log and runs it
 *
 * Selection sniffs the first bytes of the stream, so a log is recognized
 * by content whatever its key looks like. The sniffed bytes are replayed
 * into the chosen decoder; nothing is read twice from the source.
 */
@Injectable()
export class DecodingService {
  private readonly logger = new Logger(DecodingService.name);
  private readonly decoders: ILogDecoder[];

  /** Bytes handed to canHandle() */
  private readonly SNIFF_BYTES = 64;

  constructor(
    private readonly ulogDecoder: ULogDecoder,
    private readonly telemetryCsvDecoder: TelemetryCsvDecoder,
  ) {
    // binary magic first, text header second
    this.decoders = [this.ulogDecoder, this.telemetryCsvDecoder];

    this.logger.log(
      `Initialized with ${this.decoders.length} decoder(s): ${this.decoders.map((d) => d.name).join(', ')}`,
    );
  }

  /**
   * Extensions worth listing; other objects under the prefix are ignored.
   */
  get supportedExtensions(): string[] {
    return [...new Set(this.decoders.flatMap((decoder) => [...decoder.extensions]))];
  }

  isSupported(identifier: string): boolean {
    return this.supportedExtensions.includes(path.extname(identifier).toLowerCase());
  }

  async *decode(
    identifier: string,
    chunks: AsyncIterable<Buffer>,
    options: DecodeOptions = {},
  ): AsyncGenerator<Sample> {
    const peeked = await peekHead(chunks, this.SNIFF_BYTES);
    const decoder = this.findDecoder(identifier, peeked.head);

    if (!decoder) {
      throw new CorruptFormatError(
        'decoding',
        `No decoder recognizes ${identifier}. Supported formats: ${this.decoders.map((d) => d.name).join(', ')}`,
      );
    }

    this.logger.debug(`Using decoder '${decoder.name}' for ${identifier}`);
    yield* decoder.decode(peeked.chunks, options);
  }

  private findDecoder(identifier: string, head: Buffer): ILogDecoder | null {
    for (const decoder of this.decoders) {
      if (decoder.canHandle(identifier, head)) {
        return decoder;
      }
    }
    return null;
  }
}
