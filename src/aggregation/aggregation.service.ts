import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { formatCsv } from '../common/csv';
import { formatErrorMessage, WriterError } from '../common/errors';
import { VehicleAggregate } from '../metrics/dto/log-summary.dto';
import { AGGREGATE_COLUMNS, aggregateToRow } from '../metrics/summary-columns';
import { SummaryStore } from '../pipeline/summary-store';
import { aggregateSummaries } from './aggregator';

/**
 * AggregationService
 *
 * Rebuilds the per-vehicle table from the whole summary store on every
 * run; the aggregated CSV is overwritten, never patched.
 */
@Injectable()
export class AggregationService {
  private readonly logger = new Logger(AggregationService.name);

  async aggregate(summaryPath: string, outPath: string): Promise<VehicleAggregate[]> {
    const summaries = await new SummaryStore(summaryPath).readAll();
    const aggregates = aggregateSummaries(summaries);

    await this.write(outPath, aggregates);
    this.logger.log(
      `Aggregated ${summaries.length} summaries into ${aggregates.length} vehicle(s) -> ${outPath}`,
    );
    return aggregates;
  }

  private async write(outPath: string, aggregates: VehicleAggregate[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(outPath), { recursive: true });
      await fs.writeFile(
        outPath,
        formatCsv(aggregates.map(aggregateToRow), AGGREGATE_COLUMNS),
        'utf-8',
      );
    } catch (error) {
      throw new WriterError(
        `Cannot write aggregated CSV ${outPath}: ${formatErrorMessage(error)}`,
        error,
      );
    }
  }
}
