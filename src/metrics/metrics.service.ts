import { Injectable, Logger } from '@nestjs/common';
import { Sample } from '../decoding/interfaces/decoder.interface';
import { LogRef } from '../sources/interfaces/log-source.interface';
import { LogSummary } from './dto/log-summary.dto';
import { EXTRACTOR_TOPICS, MetricExtractor } from './metric-extractor';

/**
 * MetricsService - turns one log's sample stream into its LogSummary
 */
@Injectable()
export class MetricsService {
  private readonly logger = new Logger(MetricsService.name);

  /** Topics the decoder needs to produce */
  get topics(): ReadonlySet<string> {
    return EXTRACTOR_TOPICS;
  }

  async summarize(
    ref: LogRef,
    samples: AsyncIterable<Sample>,
    processedAt: Date = new Date(),
  ): Promise<LogSummary> {
    const extractor = new MetricExtractor();
    let count = 0;

    for await (const sample of samples) {
      extractor.consume(sample);
      count++;
    }

    const metrics = extractor.finish();
    if (metrics.durationTrackedS === 0) {
      this.logger.debug(`${ref.identifier}: no trackable accelerometer time (${count} samples)`);
    }

    return {
      identifier: ref.identifier,
      vehicleId: ref.vehicleId,
      ...metrics,
      processedAt: processedAt.toISOString(),
    };
  }
}
