import { compareVehicleIds } from '../common/vehicle-id';
import { VehicleAggregate } from '../metrics/dto/log-summary.dto';
import { RiskRecord } from './dto/risk-record.dto';

/** Composite weights */
export const RISK_WEIGHTS = { fatigue: 0.6, motor: 0.2, vibration: 0.2 } as const;

/** Raw component values at which a component saturates at 100 */
export const VIBRATION_RAW_CAP = 13;
export const MOTOR_RAW_CAP = 20;
export const PEAK_RATE_CAP_PER_HOUR = 1000;
export const CLIP_RATE_CAP_PER_HOUR = 100;

const clamp01 = (value: number) => Math.min(Math.max(value, 0), 1);

/**
 * Score one vehicle. Every component is a rate over tracked time, so a
 * vehicle is not penalized for flying more. No tracked time scores zero.
 */
export function scoreVehicle(aggregate: VehicleAggregate, dead = false): RiskRecord {
  const trackedS = aggregate.durationTrackedS;
  const [, , vib50to70S, vibGt70S] = aggregate.vibrationS;
  const ge09S = aggregate.motorSaturationS.reduce((sum, motor) => sum + motor[1], 0);
  const ge10S = aggregate.motorSaturationS.reduce((sum, motor) => sum + motor[2], 0);

  const record: RiskRecord = {
    vehicleId: aggregate.vehicleId,
    dead,
    fatigueScore: 0,
    motorScore: 0,
    vibrationScore: 0,
    compositeScore: 0,
    rank: null,
    peakEventsPerHour: 0,
    clipEventsPerHour: 0,
    vibrationHighPct: 0,
    motorSaturationPct: 0,
    peakAccelCount: aggregate.peakAccelCount,
    clipCount: aggregate.clipCount,
    flightTimeMin: trackedS / 60,
    logCount: aggregate.logCount,
  };
  if (trackedS <= 0) {
    return record;
  }

  const hours = trackedS / 3600;
  const vibrationRaw = 10 * (vibGt70S / trackedS) + 3 * (vib50to70S / trackedS);
  const motorRaw = 15 * (ge10S / trackedS) + 5 * (ge09S / trackedS);

  record.peakEventsPerHour = aggregate.peakAccelCount / hours;
  record.clipEventsPerHour = aggregate.clipCount / hours;
  record.vibrationHighPct = (100 * vibGt70S) / trackedS;
  record.motorSaturationPct = (100 * ge10S) / trackedS;

  record.vibrationScore = 100 * clamp01(vibrationRaw / VIBRATION_RAW_CAP);
  record.motorScore = 100 * clamp01(motorRaw / MOTOR_RAW_CAP);
  record.fatigueScore =
    100 *
    (0.3 * clamp01(record.peakEventsPerHour / PEAK_RATE_CAP_PER_HOUR) +
      0.7 * clamp01(record.clipEventsPerHour / CLIP_RATE_CAP_PER_HOUR));
  record.compositeScore =
    RISK_WEIGHTS.fatigue * record.fatigueScore +
    RISK_WEIGHTS.motor * record.motorScore +
    RISK_WEIGHTS.vibration * record.vibrationScore;

  return record;
}

/**
 * Score and rank a fleet.
 *
 * Active vehicles come first, by composite score descending and vehicle
 * id ascending on ties, ranked 1..n. Dead vehicles follow unranked in
 * fleet order; they keep their scores.
 */
export function rankVehicles(
  aggregates: readonly VehicleAggregate[],
  deadVehicles: ReadonlySet<string> = new Set(),
): RiskRecord[] {
  const records = aggregates.map((aggregate) =>
    scoreVehicle(aggregate, deadVehicles.has(aggregate.vehicleId)),
  );

  const active = records
    .filter((record) => !record.dead)
    .sort(
      (a, b) =>
        b.compositeScore - a.compositeScore ||
        (a.vehicleId < b.vehicleId ? -1 : a.vehicleId > b.vehicleId ? 1 : 0),
    );
  active.forEach((record, index) => {
    record.rank = index + 1;
  });

  const dead = records
    .filter((record) => record.dead)
    .sort((a, b) => compareVehicleIds(a.vehicleId, b.vehicleId));

  return [...active, ...dead];
}
