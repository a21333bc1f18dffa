/**
 * Per-log and per-vehicle metric records.
 *
 * All durations are seconds. Minutes only appear in rendered reports.
 */

/** Acceleration magnitude bin edges in m/s²: [0,30) [30,50) [50,70) [70,∞) */
export const VIBRATION_BIN_EDGES = [30, 50, 70] as const;
export const VIBRATION_BIN_LABELS = ['lt_30', '30_50', '50_70', 'gt_70'] as const;

/** Normalized motor output thresholds; the 1.0 check allows 1e-4 of float slack */
export const MOTOR_THRESHOLDS = [0.8, 0.9, 1.0] as const;
export const MOTOR_THRESHOLD_LABELS = ['0_8', '0_9', '1_0'] as const;
export const SATURATION_EPSILON = 1e-4;
export const MOTOR_COUNT = 4;

/** m/s² */
export const PEAK_ACCEL_THRESHOLD = 100;
export const CLIP_ACCEL_THRESHOLD = 150;

/** Seconds per vibration bin, ordered as VIBRATION_BIN_LABELS */
export type VibrationBins = [number, number, number, number];

/** Seconds at or above each of MOTOR_THRESHOLDS, for one motor */
export type MotorSaturation = [number, number, number];

/**
 * Metrics shared by a log summary and a vehicle aggregate.
 */
export interface FlightMetrics {
  durationTrackedS: number;
  vibrationS: VibrationBins;
  /** Fraction of tracked time per bin, 0..1; all zero when nothing was tracked */
  vibrationShare: VibrationBins;
  /** One entry per motor, MOTOR_COUNT long */
  motorSaturationS: MotorSaturation[];
  peakAccelCount: number;
  clipCount: number;
  clipDurationS: number;
}

/**
 * LogSummary
 *
 * One row per successfully processed log. Immutable once written and
 * uniquely keyed by identifier.
 */
export interface LogSummary extends FlightMetrics {
  identifier: string;
  /** Canonical vehicle id */
  vehicleId: string;
  /** ISO-8601 UTC */
  processedAt: string;
}

/**
 * VehicleAggregate
 *
 * Sum of every summary row of one vehicle, recomputed on each run.
 */
export interface VehicleAggregate extends FlightMetrics {
  vehicleId: string;
  logCount: number;
}

export function emptyMetrics(): FlightMetrics {
  return {
    durationTrackedS: 0,
    vibrationS: [0, 0, 0, 0],
    vibrationShare: [0, 0, 0, 0],
    motorSaturationS: Array.from({ length: MOTOR_COUNT }, (): MotorSaturation => [0, 0, 0]),
    peakAccelCount: 0,
    clipCount: 0,
    clipDurationS: 0,
  };
}

export function vibrationShares(
  vibrationS: VibrationBins,
  durationTrackedS: number,
): VibrationBins {
  if (durationTrackedS <= 0) {
    return [0, 0, 0, 0];
  }
  return [
    vibrationS[0] / durationTrackedS,
    vibrationS[1] / durationTrackedS,
    vibrationS[2] / durationTrackedS,
    vibrationS[3] / durationTrackedS,
  ];
}
