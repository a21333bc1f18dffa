/**
 * Minimal Markdown table helpers shared by the report renderers.
 */
export type Alignment = 'left' | 'right';

export function markdownTable(
  headers: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<string | number>>,
  align: readonly Alignment[] = headers.map((_, i) => (i === 0 ? 'left' : 'right')),
): string[] {
  return [
    `| ${headers.join(' | ')} |`,
    `| ${align.map((a) => (a === 'right' ? '---:' : '---')).join(' | ')} |`,
    ...rows.map((row) => `| ${row.map((cell) => escapeCell(String(cell))).join(' | ')} |`),
  ];
}

export function minutes(seconds: number): string {
  return (seconds / 60).toFixed(1);
}

export function percent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}
