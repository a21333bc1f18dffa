/**
 * Failure classes used across the pipeline.
 *
 * Per-log failures (fetch, corrupt format, data quality) are contained inside
 * the worker that hit them and end up in the run report. Configuration and
 * writer failures abort the whole run.
 */
export type FailureKind =
  | 'transient_fetch'
  | 'not_found'
  | 'access_denied'
  | 'corrupt_format'
  | 'data_quality'
  | 'configuration'
  | 'writer'
  | 'unexpected';

export abstract class PipelineError extends Error {
  abstract readonly kind: FailureKind;

  constructor(
    message: string,
    public readonly originalError?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Network hiccups and timeouts. The only class the retry policy retries.
 */
export class TransientFetchError extends PipelineError {
  readonly kind = 'transient_fetch';

  constructor(
    public readonly identifier: string,
    message: string,
    originalError?: unknown,
  ) {
    super(`Transient failure fetching ${identifier}: ${message}`, originalError);
  }
}

export class LogNotFoundError extends PipelineError {
  readonly kind = 'not_found';

  constructor(
    public readonly identifier: string,
    originalError?: unknown,
  ) {
    super(`Log not found: ${identifier}`, originalError);
  }
}

export class AccessDeniedError extends PipelineError {
  readonly kind = 'access_denied';

  constructor(
    public readonly identifier: string,
    originalError?: unknown,
  ) {
    super(`Access denied reading ${identifier}`, originalError);
  }
}

/**
 * Unparseable log. Never retried.
 */
export class CorruptFormatError extends PipelineError {
  readonly kind: FailureKind = 'corrupt_format';

  constructor(
    public readonly decoderName: string,
    message: string,
    originalError?: unknown,
  ) {
    super(`[${decoderName}] ${message}`, originalError);
  }
}

/**
 * Raised when extracted metrics are negative or not finite.
 */
export class DataQualityError extends CorruptFormatError {
  override readonly kind: FailureKind = 'data_quality';

  constructor(message: string) {
    super('metrics', message);
  }
}

export class ConfigurationError extends PipelineError {
  readonly kind = 'configuration';
}

export class WriterError extends PipelineError {
  readonly kind = 'writer';
}

/**
 * Map anything thrown inside a worker to a failure kind.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof PipelineError) {
    return error.kind;
  }
  return 'unexpected';
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
