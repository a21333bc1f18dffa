import { createAggregate } from '../../test/utils/aggregate-builder';
import { renderFleetReport } from './fleet-report.renderer';

describe('renderFleetReport', () => {
  it('should say so when there is no data', () => {
    expect(renderFleetReport([])).toBe('# Flight Telemetry Fleet Report\n\n_No data available._\n');
  });

  it('should render totals and a section per vehicle in minutes', () => {
    const report = renderFleetReport([
      createAggregate('EL-040', {
        logCount: 3,
        durationTrackedS: 600,
        vibrationS: [450, 150, 0, 0],
        vibrationShare: [0.75, 0.25, 0, 0],
        motorSaturationS: [
          [120, 60, 30],
          [0, 0, 0],
          [0, 0, 0],
          [6, 0, 0],
        ],
        peakAccelCount: 2,
        clipCount: 1,
        clipDurationS: 0.25,
      }),
      createAggregate('EL-052'),
    ]);
    const lines = report.split('\n');

    expect(lines.slice(0, 8)).toEqual([
      '# Flight Telemetry Fleet Report',
      '',
      '- Total vehicles: 2',
      '- Total logs processed: 4',
      '',
      '## Vehicles',
      '',
      '- Vehicles in report: EL-040, EL-052',
    ]);
    expect(lines).toContain('### Vehicle EL-040');
    expect(lines).toContain('| Motor | >= 0.8 of max output (min) | >= 0.9 of max output (min) | >= 1 of max output (min) |');
    expect(lines).toContain('| Motor 0 | 2.0 | 1.0 | 0.5 |');
    expect(lines).toContain('| >= 0.8 | 2.1 |');
    expect(lines).toContain('| < 30 m/s² | 7.5 | 75.0% |');
    expect(lines).toContain('| Total tracked | 10.0 | 100.0% |');
    expect(lines).toContain('| Accel clipping time | 0.25 s |');
    expect(lines).toContain('| Peak accel events (>100 m/s²) | 2 count |');
  });

  it('should note a vehicle without accelerometer time', () => {
    const report = renderFleetReport([createAggregate('EL-052')]);

    expect(report.split('\n')).toContain('_No accelerometer data available._');
  });
});
