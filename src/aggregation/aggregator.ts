import { compareVehicleIds, canonicalVehicleId } from '../common/vehicle-id';
import {
  emptyMetrics,
  LogSummary,
  VehicleAggregate,
  vibrationShares,
} from '../metrics/dto/log-summary.dto';

/**
 * Fold summary rows into one aggregate per canonical vehicle id.
 *
 * Rows are folded in identifier order, so the float sums come out the
 * same whatever order the workers appended them in. Shares are
 * recomputed from the summed bins rather than averaged.
 */
export function aggregateSummaries(rows: readonly LogSummary[]): VehicleAggregate[] {
  const ordered = [...rows].sort((a, b) =>
    a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0,
  );
  const byVehicle = new Map<string, VehicleAggregate>();

  for (const row of ordered) {
    const vehicleId = canonicalVehicleId(row.vehicleId);
    const aggregate = byVehicle.get(vehicleId) ?? startAggregate(byVehicle, vehicleId);

    aggregate.logCount++;
    aggregate.durationTrackedS += row.durationTrackedS;
    row.vibrationS.forEach((value, bin) => {
      aggregate.vibrationS[bin] += value;
    });
    row.motorSaturationS.forEach((thresholds, motor) => {
      thresholds.forEach((value, t) => {
        aggregate.motorSaturationS[motor][t] += value;
      });
    });
    aggregate.peakAccelCount += row.peakAccelCount;
    aggregate.clipCount += row.clipCount;
    aggregate.clipDurationS += row.clipDurationS;
  }

  const aggregates = [...byVehicle.values()];
  for (const aggregate of aggregates) {
    aggregate.vibrationShare = vibrationShares(aggregate.vibrationS, aggregate.durationTrackedS);
  }
  return aggregates.sort((a, b) => compareVehicleIds(a.vehicleId, b.vehicleId));
}

function startAggregate(
  byVehicle: Map<string, VehicleAggregate>,
  vehicleId: string,
): VehicleAggregate {
  const aggregate: VehicleAggregate = { vehicleId, logCount: 0, ...emptyMetrics() };
  byVehicle.set(vehicleId, aggregate);
  return aggregate;
}
