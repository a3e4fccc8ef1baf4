/**
 * Report Module - Public API
 */

export {
  renderReport,
  summaryLine,
  CLEAN_MESSAGE,
  REPORT_TITLE,
  REPORT_COLUMNS,
} from './report-renderer.js';
export type { RenderOptions } from './report-renderer.js';
export { renderTable } from './table.js';
export type { TableSpec } from './table.js';
