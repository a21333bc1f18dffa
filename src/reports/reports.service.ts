import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { formatErrorMessage, WriterError } from '../common/errors';
import { VehicleAggregate } from '../metrics/dto/log-summary.dto';
import { RiskRecord } from '../risk/dto/risk-record.dto';
import { renderFleetReport } from './fleet-report.renderer';
import { renderRiskReport } from './risk-report.renderer';

export interface ReportTargets {
  reportPath: string;
  riskReportPath: string;
  /** Ranked vehicles shown in the risk report; null shows all */
  top: number | null;
}

/**
 * ReportsService - writes the Markdown fleet and risk reports
 */
@Injectable()
export class ReportsService {
  private readonly logger = new Logger(ReportsService.name);

  async write(
    aggregates: readonly VehicleAggregate[],
    risk: readonly RiskRecord[],
    targets: ReportTargets,
  ): Promise<void> {
    await this.writeFile(targets.reportPath, renderFleetReport(aggregates));
    await this.writeFile(targets.riskReportPath, renderRiskReport(risk, targets.top));
  }

  private async writeFile(filePath: string, text: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, text, 'utf-8');
    } catch (error) {
      throw new WriterError(`Cannot write report ${filePath}: ${formatErrorMessage(error)}`, error);
    }
    this.logger.log(`Wrote ${filePath}`);
  }
}
