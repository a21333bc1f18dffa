import { CsvRecord } from '../common/csv';
import { ConfigurationError } from '../common/errors';
import { canonicalVehicleId } from '../common/vehicle-id';
import {
  FlightMetrics,
  LogSummary,
  MOTOR_COUNT,
  MOTOR_THRESHOLD_LABELS,
  MotorSaturation,
  VehicleAggregate,
  VIBRATION_BIN_LABELS,
  VibrationBins,
} from './dto/log-summary.dto';

/**
 * Column layout of the summary and aggregated CSV files.
 */
export const METRIC_COLUMNS: readonly string[] = [
  'duration_tracked_s',
  ...VIBRATION_BIN_LABELS.map((label) => `vib_${label}_s`),
  ...VIBRATION_BIN_LABELS.map((label) => `vib_share_${label}`),
  ...Array.from({ length: MOTOR_COUNT }, (_, motor) =>
    MOTOR_THRESHOLD_LABELS.map((label) => `motor${motor}_ge_${label}_s`),
  ).flat(),
  'peak_accel_count',
  'clip_count',
  'clip_duration_s',
];

export const SUMMARY_COLUMNS: readonly string[] = [
  'identifier',
  'vehicle_id',
  ...METRIC_COLUMNS,
  'processed_at',
];

export const AGGREGATE_COLUMNS: readonly string[] = [
  'vehicle_id',
  'log_count',
  ...METRIC_COLUMNS,
];

/** Six decimals: microsecond resolution for seconds */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) {
    return String(value);
  }
  return String(Number(value.toFixed(6)));
}

function metricCells(metrics: FlightMetrics): string[] {
  return [
    metrics.durationTrackedS,
    ...metrics.vibrationS,
    ...metrics.vibrationShare,
    ...metrics.motorSaturationS.flat(),
    metrics.peakAccelCount,
    metrics.clipCount,
    metrics.clipDurationS,
  ].map(formatNumber);
}

export function summaryToRow(summary: LogSummary): string[] {
  return [
    summary.identifier,
    summary.vehicleId,
    ...metricCells(summary),
    summary.processedAt,
  ];
}

export function aggregateToRow(aggregate: VehicleAggregate): string[] {
  return [
    aggregate.vehicleId,
    String(aggregate.logCount),
    ...metricCells(aggregate),
  ];
}

/**
 * Rebuild a LogSummary from a summary CSV record.
 *
 * @throws ConfigurationError when a cell is missing or not a finite number
 */
export function summaryFromRecord(record: CsvRecord): LogSummary {
  const identifier = record['identifier'] ?? '';
  if (!identifier) {
    throw new ConfigurationError('Summary row without identifier');
  }

  const read = (column: string): number => {
    const raw = record[column];
    const value = raw === undefined || raw.trim() === '' ? Number.NaN : Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(
        `Summary row for ${identifier} has invalid ${column}: "${raw ?? ''}"`,
      );
    }
    return value;
  };

  const bins = (prefix: string, suffix: string): VibrationBins => [
    read(`${prefix}${VIBRATION_BIN_LABELS[0]}${suffix}`),
    read(`${prefix}${VIBRATION_BIN_LABELS[1]}${suffix}`),
    read(`${prefix}${VIBRATION_BIN_LABELS[2]}${suffix}`),
    read(`${prefix}${VIBRATION_BIN_LABELS[3]}${suffix}`),
  ];

  return {
    identifier,
    vehicleId: canonicalVehicleId(record['vehicle_id'] ?? ''),
    durationTrackedS: read('duration_tracked_s'),
    vibrationS: bins('vib_', '_s'),
    vibrationShare: bins('vib_share_', ''),
    motorSaturationS: Array.from(
      { length: MOTOR_COUNT },
      (_, motor): MotorSaturation => [
        read(`motor${motor}_ge_${MOTOR_THRESHOLD_LABELS[0]}_s`),
        read(`motor${motor}_ge_${MOTOR_THRESHOLD_LABELS[1]}_s`),
        read(`motor${motor}_ge_${MOTOR_THRESHOLD_LABELS[2]}_s`),
      ],
    ),
    peakAccelCount: read('peak_accel_count'),
    clipCount: read('clip_count'),
    clipDurationS: read('clip_duration_s'),
    processedAt: record['processed_at'] ?? '',
  };
}
