/**
 * Report Renderer - turns a ScanResult into styled terminal output.
 */

import defaultChalk, { type ChalkInstance } from 'chalk';
import type { ScanResult } from '../scanner/claim-scanner.js';
import { renderTable } from './table.js';

export const CLEAN_MESSAGE = '✅ Clean – no obvious hallucinations detected';
export const REPORT_TITLE = 'Hallucination Alerts 🔥';
export const REPORT_COLUMNS = ['Type', 'Match', 'Context'];

export interface RenderOptions {
  /** Chalk instance to style with; pass `new Chalk({ level: 0 })` for plain text. */
  chalk?: ChalkInstance;
}

export function summaryLine(count: number): string {
  return `Found ${count} potential hallucinations. Fix or flag before publishing.`;
}

/**
 * Renders the full report, newline-terminated.
 * Clean results produce the clean line alone.
 */
export function renderReport(result: ScanResult, options: RenderOptions = {}): string {
  const chalk = options.chalk ?? defaultChalk;

  if (result.findings.length === 0) {
    return `${chalk.bold.green(CLEAN_MESSAGE)}\n`;
  }

  const table = renderTable(
    {
      title: REPORT_TITLE,
      columns: REPORT_COLUMNS,
      rows: result.findings.map(f => [f.category, f.matchedText, f.context]),
    },
    chalk
  );

  return [...table, '', chalk.bold.red(summaryLine(result.findings.length))].join('\n') + '\n';
}
