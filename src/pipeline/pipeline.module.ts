import { Module } from '@nestjs/common';
import { AggregationModule } from '../aggregation/aggregation.module';
import { DecodingModule } from '../decoding/decoding.module';
import { MetricsModule } from '../metrics/metrics.module';
import { ReportsModule } from '../reports/reports.module';
import { RiskModule } from '../risk/risk.module';
import { SourcesModule } from '../sources/sources.module';
import { LogProcessor } from './log-processor';
import { PipelineService } from './pipeline.service';

/**
 * PipelineModule
 *
 * Runs ingestion end to end:
 * - PipelineService: ledger, worker pool, summary store, downstream stages
 * - LogProcessor: fetch + decode + extract for one log, with retries
 */
@Module({
  imports: [
    SourcesModule,
    DecodingModule,
    MetricsModule,
    AggregationModule,
    RiskModule,
    ReportsModule,
  ],
  providers: [PipelineService, LogProcessor],
  exports: [PipelineService],
})
export class PipelineModule {}
