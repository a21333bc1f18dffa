import { Inject, Injectable, Logger } from '@nestjs/common';
import type { Readable } from 'node:stream';
import { TransientFetchError } from '../common/errors';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline.config';
import { DecodingService } from '../decoding/decoding.service';
import { LogSummary } from '../metrics/dto/log-summary.dto';
import { MetricsService } from '../metrics/metrics.service';
import { guardByteStream } from '../sources/byte-stream';
import { ILogSource, LogRef } from '../sources/interfaces/log-source.interface';
import { RetryPolicy } from './retry-policy';

/**
 * LogProcessor - fetch, decode and extract one log
 *
 * Each attempt opens a fresh stream, so a retry after a dropped
 * connection starts the decode from the first byte. Nothing of the log
 * is kept once the summary is built.
 */
@Injectable()
export class LogProcessor {
  private readonly logger = new Logger(LogProcessor.name);
  private readonly retry: RetryPolicy;

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    private readonly decoding: DecodingService,
    private readonly metrics: MetricsService,
  ) {
    this.retry = new RetryPolicy(settings.retry);
  }

  /**
   * @param signal - aborts the fetch in flight; fired on hard shutdown
   */
  process(source: ILogSource, ref: LogRef, signal: AbortSignal): Promise<LogSummary> {
    return this.retry.execute(
      ref.identifier,
      (attempt) => this.attempt(source, ref, attempt, signal),
      signal,
    );
  }

  private async attempt(
    source: ILogSource,
    ref: LogRef,
    attempt: number,
    signal: AbortSignal,
  ): Promise<LogSummary> {
    if (signal.aborted) {
      throw new TransientFetchError(ref.identifier, 'run aborted');
    }
    if (attempt > 1) {
      this.logger.debug(`${ref.identifier}: attempt ${attempt}`);
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', forwardAbort, { once: true });

    try {
      const stream = await this.open(source, ref.identifier, controller);
      try {
        const samples = this.decoding.decode(
          ref.identifier,
          guardByteStream(stream, ref.identifier),
          { topics: this.metrics.topics },
        );
        return await this.metrics.summarize(ref, samples);
      } finally {
        // the decoder may never have started reading
        stream.destroy();
      }
    } finally {
      signal.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * Open with a deadline. The deadline covers the request, not the
   * download; `controller` stays live for the body afterwards.
   */
  private async open(
    source: ILogSource,
    identifier: string,
    controller: AbortController,
  ): Promise<Readable> {
    const { fetchTimeoutMs } = this.settings;
    const timer = setTimeout(() => {
      controller.abort(
        new TransientFetchError(identifier, `no response within ${fetchTimeoutMs}ms`),
      );
    }, fetchTimeoutMs);

    try {
      return await source.open(identifier, controller.signal);
    } catch (error) {
      const reason: unknown = controller.signal.reason;
      if (reason instanceof TransientFetchError) {
        throw reason;
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}
