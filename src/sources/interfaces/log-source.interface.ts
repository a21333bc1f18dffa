import type { Readable } from 'node:stream';

/**
 * Reference to one remote flight log, not its contents.
 */
export interface LogRef {
  /** Unique key into the store (object key or path relative to the root) */
  readonly identifier: string;
  /** Canonical vehicle id inferred from the identifier */
  readonly vehicleId: string;
  /** Size in bytes as reported by the listing, when known */
  readonly sizeHint?: number;
}

export interface ListOptions {
  /** Canonical vehicle ids to keep; null keeps everything */
  vehicleFilter?: ReadonlySet<string> | null;
  /** Lower-case file extensions to keep, including the dot */
  extensions?: readonly string[];
  signal?: AbortSignal;
}

/**
 * ILogSource - where flight logs live
 *
 * `list` is lazy: it yields LogRefs page by page so the scheduler can start
 * working before the listing completes, and stop it early.
 *
 * `open` returns a byte stream and never buffers the whole object. It fails
 * with LogNotFoundError, AccessDeniedError or TransientFetchError.
 */
export interface ILogSource {
  /** Human-readable location, e.g. "s3://bucket/prefix" */
  readonly location: string;

  list(options?: ListOptions): AsyncIterable<LogRef>;

  open(identifier: string, signal?: AbortSignal): Promise<Readable>;
}
