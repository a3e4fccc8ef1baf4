/**
 * Box-drawn terminal table with a heavy header rule.
 */

import type { ChalkInstance } from 'chalk';

export interface TableSpec {
  title: string;
  columns: string[];
  rows: string[][];
}

/** Width in code points; emoji and astral characters count once. */
function textWidth(text: string): number {
  return Array.from(text).length;
}

function padCell(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - textWidth(text)));
}

/** Renders the table as lines without trailing newlines. */
export function renderTable(spec: TableSpec, chalk: ChalkInstance): string[] {
  const widths = spec.columns.map((header, i) =>
    Math.max(textWidth(header), ...spec.rows.map(row => textWidth(row[i] ?? '')))
  );

  const rule = (left: string, fill: string, join: string, right: string): string =>
    left + widths.map(w => fill.repeat(w + 2)).join(join) + right;

  const line = (cells: string[], edge: string, style: (s: string) => string): string =>
    edge + widths.map((w, i) => ` ${style(padCell(cells[i] ?? '', w))} `).join(edge) + edge;

  const totalWidth = widths.reduce((sum, w) => sum + w + 2, 0) + widths.length + 1;
  const titlePad = Math.max(0, Math.floor((totalWidth - textWidth(spec.title)) / 2));

  return [
    ' '.repeat(titlePad) + chalk.italic(spec.title),
    rule('┏', '━', '┳', '┓'),
    line(spec.columns, '┃', s => chalk.bold(s)),
    rule('┡', '━', '╇', '┩'),
    ...spec.rows.map(row => line(row, '│', s => s)),
    rule('└', '─', '┴', '┘'),
  ];
}
