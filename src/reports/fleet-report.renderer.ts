import {
  MOTOR_THRESHOLDS,
  VehicleAggregate,
} from '../metrics/dto/log-summary.dto';
import { markdownTable, minutes, percent } from './markdown';

const BIN_LABELS = ['< 30 m/s²', '30–50 m/s²', '50–70 m/s²', '> 70 m/s²'];

/**
 * Render the per-vehicle fleet report. Aggregates are expected in fleet
 * order, as aggregateSummaries returns them.
 */
export function renderFleetReport(aggregates: readonly VehicleAggregate[]): string {
  const lines = ['# Flight Telemetry Fleet Report', ''];

  if (aggregates.length === 0) {
    lines.push('_No data available._');
    return `${lines.join('\n')}\n`;
  }

  const totalLogs = aggregates.reduce((sum, aggregate) => sum + aggregate.logCount, 0);
  lines.push(
    `- Total vehicles: ${aggregates.length}`,
    `- Total logs processed: ${totalLogs}`,
    '',
    '## Vehicles',
    '',
    `- Vehicles in report: ${aggregates.map((aggregate) => aggregate.vehicleId).join(', ')}`,
    '',
  );

  for (const aggregate of aggregates) {
    lines.push(...vehicleSection(aggregate), '');
  }
  return `${lines.join('\n')}\n`;
}

function vehicleSection(aggregate: VehicleAggregate): string[] {
  const lines = [
    `### Vehicle ${aggregate.vehicleId}`,
    `- Logs processed: ${aggregate.logCount}`,
    '',
  ];

  lines.push(
    ...markdownTable(
      ['Motor', ...MOTOR_THRESHOLDS.map((t) => `>= ${t} of max output (min)`)],
      aggregate.motorSaturationS.map((thresholds, motor) => [
        `Motor ${motor}`,
        ...thresholds.map(minutes),
      ]),
    ),
    '',
    ...markdownTable(
      ['Threshold', 'Total time (min)'],
      MOTOR_THRESHOLDS.map((threshold, t) => [
        `>= ${threshold}`,
        minutes(aggregate.motorSaturationS.reduce((sum, motor) => sum + motor[t], 0)),
      ]),
    ),
    '',
  );

  if (aggregate.durationTrackedS > 0) {
    lines.push(
      ...markdownTable(['Accel bin', 'Time (min)', 'Share'], [
        ...BIN_LABELS.map((label, bin) => [
          label,
          minutes(aggregate.vibrationS[bin]),
          percent(aggregate.vibrationShare[bin]),
        ]),
        ['Total tracked', minutes(aggregate.durationTrackedS), percent(1)],
      ]),
    );
  } else {
    lines.push('_No accelerometer data available._');
  }

  lines.push(
    '',
    ...markdownTable(
      ['Fatigue Metric', 'Value'],
      [
        ['Peak accel events (>100 m/s²)', `${aggregate.peakAccelCount} count`],
        ['Accel clipping time', `${aggregate.clipDurationS.toFixed(2)} s`],
        ['Accel clipping events', `${aggregate.clipCount} count`],
      ],
    ),
  );
  return lines;
}
