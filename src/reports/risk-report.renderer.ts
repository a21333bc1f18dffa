import { RiskRecord } from '../risk/dto/risk-record.dto';
import { markdownTable } from './markdown';

const SCORE_HEADERS = [
  'Risk Score',
  'Vib',
  'Motor',
  'Fatigue',
  'High Vib %',
  'Sat %',
  'Peak Events',
  'Clip Events',
  'Flight Time (min)',
  'Logs',
];

function scoreCells(record: RiskRecord): string[] {
  return [
    record.compositeScore.toFixed(2),
    record.vibrationScore.toFixed(2),
    record.motorScore.toFixed(2),
    record.fatigueScore.toFixed(2),
    `${record.vibrationHighPct.toFixed(1)}%`,
    `${record.motorSaturationPct.toFixed(1)}%`,
    String(record.peakAccelCount),
    String(record.clipCount),
    record.flightTimeMin.toFixed(1),
    String(record.logCount),
  ];
}

/**
 * Render the risk ranking. `top` limits the ranked table only; dead
 * vehicles are always listed in their own table.
 */
export function renderRiskReport(records: readonly RiskRecord[], top: number | null = null): string {
  const ranked = records.filter((record) => record.rank !== null);
  const dead = records.filter((record) => record.rank === null);
  const shown = top !== null && top > 0 ? ranked.slice(0, top) : ranked;

  const lines = [
    '# Vehicle Risk Analysis Report',
    '',
    'Vehicles ranked by composite risk score (60% fatigue, 20% motor stress, 20% vibration).',
    '',
    '## Vehicle Risk Rankings',
    '',
  ];

  if (shown.length === 0) {
    lines.push('_No active vehicles._');
  } else {
    lines.push(
      ...markdownTable(
        ['Rank', 'Vehicle', ...SCORE_HEADERS],
        shown.map((record) => [String(record.rank), record.vehicleId, ...scoreCells(record)]),
        ['left', 'left', ...SCORE_HEADERS.map((): 'right' => 'right')],
      ),
    );
    if (shown.length < ranked.length) {
      lines.push('', `_Top ${shown.length} of ${ranked.length} ranked vehicles shown._`);
    }
  }

  lines.push('', '## Dead vehicles', '');
  if (dead.length === 0) {
    lines.push('_No vehicles flagged dead._');
  } else {
    lines.push(
      ...markdownTable(
        ['Vehicle', ...SCORE_HEADERS],
        dead.map((record) => [record.vehicleId, ...scoreCells(record)]),
      ),
    );
  }

  return `${lines.join('\n')}\n`;
}
