import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'node:fs/promises';
import { AggregationService } from '../aggregation/aggregation.service';
import {
  classifyFailure,
  ConfigurationError,
  formatErrorMessage,
  WriterError,
} from '../common/errors';
import { PIPELINE_SETTINGS, PipelineSettings } from '../config/pipeline.config';
import { DecodingService } from '../decoding/decoding.service';
import { LogSummary } from '../metrics/dto/log-summary.dto';
import { ReportsService } from '../reports/reports.service';
import { RiskService } from '../risk/risk.service';
import { ILogSource, LogRef } from '../sources/interfaces/log-source.interface';
import { LogSourceFactory } from '../sources/log-source.factory';
import { RunOptions, RunReport } from './dto/run-options.dto';
import { LogProcessor } from './log-processor';
import { ResumeLedger } from './resume-ledger';
import { SummaryStore } from './summary-store';
import { WorkerPool } from './worker-pool';

/**
 * PipelineService - one full run
 *
 * Orchestrates:
 * 1. Source, dead-vehicle list and resume state (ledger seeded from the
 *    summary store)
 * 2. Ingestion: listing -> bounded queue -> W workers -> summary store
 * 3. Aggregation, risk scoring and reports from the whole store
 *
 * Per-log failures are recorded and never stop the run. A writer
 * failure or the caller's signal stops admission; in-flight logs get
 * `shutdownGraceMs` to finish before their fetches are aborted, and the
 * downstream stages are skipped.
 */
@Injectable()
export class PipelineService {
  private readonly logger = new Logger(PipelineService.name);

  constructor(
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
    private readonly sources: LogSourceFactory,
    private readonly decoding: DecodingService,
    private readonly processor: LogProcessor,
    private readonly aggregation: AggregationService,
    private readonly risk: RiskService,
    private readonly reports: ReportsService,
  ) {}

  /**
   * @throws ConfigurationError before anything is scheduled
   */
  async run(options: RunOptions, signal?: AbortSignal): Promise<RunReport> {
    const startedAt = Date.now();
    const report: RunReport = {
      listed: 0,
      scheduled: 0,
      processed: 0,
      skippedAlreadyDone: 0,
      failed: 0,
      failures: [],
      aborted: false,
      abortReason: null,
      durationMs: 0,
    };

    const source = await this.sources.create(options.source);
    const deadVehicles = await this.risk.loadDeadList(options.deadVehiclesPath);
    const store = new SummaryStore(options.summariesPath);
    const ledger = await this.prepareOutputs(options, store);

    this.logger.log(
      `Run started: source=${source.location} workers=${options.workers} ` +
        `prefetch=${options.prefetch || 'unlimited'} resume=${options.resume} ` +
        `vehicles=${options.vehicles ? [...options.vehicles].join(',') : 'all'}`,
    );

    await this.ingest(source, store, ledger, options, report, signal);
    report.durationMs = Date.now() - startedAt;
    this.logRunSummary(report);

    if (report.aborted) {
      this.logger.warn('Run aborted; aggregation and reports skipped');
      return report;
    }

    try {
      const aggregates = await this.aggregation.aggregate(
        options.summariesPath,
        options.aggregatedPath,
      );
      const risk = this.risk.assess(aggregates, deadVehicles);
      await this.reports.write(aggregates, risk, {
        reportPath: options.reportPath,
        riskReportPath: options.riskReportPath,
        top: options.top,
      });
    } catch (error) {
      if (!(error instanceof WriterError)) {
        throw error;
      }
      report.aborted = true;
      report.abortReason = error.message;
      this.logger.error(error.message);
    }

    report.durationMs = Date.now() - startedAt;
    return report;
  }

  /**
   * Resume mode seeds the ledger from the store; otherwise every output
   * of a previous run is removed.
   */
  private async prepareOutputs(options: RunOptions, store: SummaryStore): Promise<ResumeLedger> {
    if (options.resume) {
      await store.repair();
      const done = await store.readIdentifiers();
      this.logger.log(`Resuming: ${done.length} log(s) already summarized in ${store.filePath}`);
      return new ResumeLedger(done);
    }

    await store.reset();
    for (const filePath of [options.aggregatedPath, options.reportPath, options.riskReportPath]) {
      try {
        await fs.rm(filePath, { force: true });
      } catch (error) {
        throw new ConfigurationError(
          `Cannot remove previous output ${filePath}: ${formatErrorMessage(error)}`,
          error,
        );
      }
    }
    return new ResumeLedger();
  }

  private async ingest(
    source: ILogSource,
    store: SummaryStore,
    ledger: ResumeLedger,
    options: RunOptions,
    report: RunReport,
    signal?: AbortSignal,
  ): Promise<void> {
    // stops admission; in-flight logs keep going
    const admission = new AbortController();
    // aborts fetches in flight once the grace period is over
    const hard = new AbortController();
    let graceTimer: NodeJS.Timeout | undefined;

    const abortRun = (reason: string) => {
      if (report.aborted) return;
      report.aborted = true;
      report.abortReason = reason;
      this.logger.warn(
        `Aborting run (${reason}); in-flight logs have ${this.settings.shutdownGraceMs}ms to finish`,
      );
      admission.abort();
      graceTimer = setTimeout(() => {
        this.logger.warn('Grace period over; aborting fetches in flight');
        hard.abort();
      }, this.settings.shutdownGraceMs);
    };

    const onSignal = () => abortRun(signalReason(signal));
    if (signal?.aborted) {
      onSignal();
    } else {
      signal?.addEventListener('abort', onSignal, { once: true });
    }

    const pool = new WorkerPool<LogRef>({
      concurrency: options.workers,
      queueCapacity: this.settings.queueCapacity,
      signal: admission.signal,
    });

    try {
      const result = await pool.run(
        this.schedule(source, ledger, options, report, admission.signal),
        async (ref) => {
          try {
            await this.processOne(source, store, ref, report, hard.signal);
          } catch (error) {
            abortRun(formatErrorMessage(error));
            throw error;
          }
        },
      );
      if (result.dropped > 0) {
        this.logger.warn(`${result.dropped} scheduled log(s) were not started`);
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      abortRun(formatErrorMessage(error));
      this.logger.error(`Ingestion stopped: ${formatErrorMessage(error)}`);
    } finally {
      signal?.removeEventListener('abort', onSignal);
      clearTimeout(graceTimer);
      await store.flush();
    }
  }

  /**
   * Lazily list, filter through the ledger and cap at `prefetch`.
   */
  private async *schedule(
    source: ILogSource,
    ledger: ResumeLedger,
    options: RunOptions,
    report: RunReport,
    signal: AbortSignal,
  ): AsyncGenerator<LogRef> {
    const listing = source.list({
      vehicleFilter: options.vehicles,
      extensions: this.decoding.supportedExtensions,
      signal,
    });

    for await (const ref of listing) {
      report.listed++;
      if (!ledger.admit(ref.identifier)) {
        report.skippedAlreadyDone++;
        continue;
      }

      report.scheduled++;
      yield ref;

      if (options.prefetch > 0 && report.scheduled >= options.prefetch) {
        this.logger.log(`Prefetch limit of ${options.prefetch} reached; listing stopped`);
        return;
      }
    }
  }

  /**
   * Per-log failures are recorded here; only a WriterError escapes, which
   * the pool treats as fatal.
   */
  private async processOne(
    source: ILogSource,
    store: SummaryStore,
    ref: LogRef,
    report: RunReport,
    signal: AbortSignal,
  ): Promise<void> {
    let summary: LogSummary;
    try {
      summary = await this.processor.process(source, ref, signal);
    } catch (error) {
      const message = formatErrorMessage(error);
      report.failed++;
      report.failures.push({ identifier: ref.identifier, kind: classifyFailure(error), message });
      this.logger.warn(`Failed ${ref.identifier}: ${message}`);
      return;
    }

    // the writer lock is only taken once the log is fully extracted
    await store.append(summary);
    report.processed++;
    this.logger.log(`Processed ${ref.identifier} (${report.processed}/${report.scheduled})`);
  }

  private logRunSummary(report: RunReport): void {
    this.logger.log(
      `Run finished in ${report.durationMs}ms: listed ${report.listed}, scheduled ${report.scheduled}, ` +
        `processed ${report.processed}, skipped ${report.skippedAlreadyDone}, failed ${report.failed}`,
    );
    for (const failure of report.failures) {
      this.logger.warn(`  ${failure.kind}: ${failure.identifier} - ${failure.message}`);
    }
  }
}

function signalReason(signal: AbortSignal | undefined): string {
  const reason: unknown = signal?.reason;
  if (typeof reason === 'string') {
    return reason;
  }
  return reason instanceof Error && reason.name !== 'AbortError' ? reason.message : 'cancelled';
}
