import { Injectable, Logger } from '@nestjs/common';
import { VehicleAggregate } from '../metrics/dto/log-summary.dto';
import { loadDeadVehicles } from './dead-vehicles';
import { RiskRecord } from './dto/risk-record.dto';
import { rankVehicles } from './risk-scorer';

/**
 * RiskService - scores aggregates against the dead-vehicle list
 */
@Injectable()
export class RiskService {
  private readonly logger = new Logger(RiskService.name);

  /**
   * Read the dead-vehicle list; an absent file means nothing is dead.
   *
   * @throws ConfigurationError when the list exists but is malformed
   */
  async loadDeadList(deadVehiclesPath: string): Promise<ReadonlySet<string>> {
    const dead = await loadDeadVehicles(deadVehiclesPath);
    if (dead === null) {
      this.logger.warn(`Dead-vehicle list ${deadVehiclesPath} not found; ranking every vehicle`);
      return new Set();
    }
    this.logger.log(`Loaded ${dead.size} dead vehicle(s) from ${deadVehiclesPath}`);
    return dead;
  }

  assess(
    aggregates: readonly VehicleAggregate[],
    deadVehicles: ReadonlySet<string>,
  ): RiskRecord[] {
    const records = rankVehicles(aggregates, deadVehicles);
    const deadCount = records.filter((record) => record.dead).length;
    this.logger.log(
      `Scored ${records.length} vehicle(s): ${records.length - deadCount} ranked, ${deadCount} dead`,
    );
    return records;
  }
}
