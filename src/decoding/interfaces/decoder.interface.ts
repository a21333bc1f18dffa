/**
 * One decoded record: a timestamped set of named numeric fields.
 *
 * Array fields are flattened to `name[i]` and nested structs to
 * `parent.child`, so `values` is always a flat map.
 */
export interface Sample {
  /** Topic (message) name, e.g. 'sensor_accel' */
  readonly topic: string;
  /** Multi-instance index; 0 for single-instance topics */
  readonly instance: number;
  /** Microseconds since boot */
  readonly timestampUs: number;
  readonly values: Readonly<Record<string, number>>;
}

export interface DecodeOptions {
  /** Topics to decode; samples of other topics are skipped unread */
  topics?: ReadonlySet<string>;
}

/**
 * ILogDecoder Interface - Strategy Pattern for Log Decoding
 *
 * Each supported log format implements this interface and turns a byte
 * stream into a lazy sequence of samples.
 *
 * Decoders consume the stream chunk by chunk and keep only the bytes of
 * the record currently being read, so memory stays flat however large the
 * log is. A stream that cannot be decoded fails with CorruptFormatError;
 * read errors coming from the stream itself are passed through untouched.
 */
export interface ILogDecoder {
  /**
   * Unique identifier for this decoder, used in logs and error messages.
   * Examples: 'ulog', 'telemetry-csv'
   */
  readonly name: string;

  /**
   * Human-readable description of the format.
   */
  readonly description: string;

  /** Lower-case extensions (with dot) this decoder is listed for */
  readonly extensions: readonly string[];

  /**
   * Determine if this decoder can handle the log.
   *
   * @param identifier - Object key or relative path
   * @param head - The first bytes of the stream (up to 64 bytes, fewer for tiny logs)
   */
  canHandle(identifier: string, head: Buffer): boolean;

  decode(
    chunks: AsyncIterable<Buffer>,
    options?: DecodeOptions,
  ): AsyncGenerator<Sample>;
}
