/**
 * claim-audit - Main Entry Point
 *
 * Exports the scanner, reporter and CLI core for library use.
 */

// Scanner Module
export {
  ClaimScanner,
  SUSPECT_RULES,
  SUSPECT_QUANTITY_RULE,
  SUSPECT_REFERENCE_RULE,
  classifyMatch,
} from './scanner/index.js';
export type {
  ScannerConfig,
  ScanFinding,
  ScanResult,
  SuspectRule,
  SuspectRuleId,
} from './scanner/index.js';

// Report Module
export {
  renderReport,
  renderTable,
  summaryLine,
  CLEAN_MESSAGE,
  REPORT_TITLE,
  REPORT_COLUMNS,
} from './report/index.js';
export type { RenderOptions, TableSpec } from './report/index.js';

// CLI
export { runCli, parseArgs, usageText, PROGRAM_NAME } from './cli/audit-cli.js';
export type { CliOptions, OutputStream } from './cli/audit-cli.js';

// Shared
export { loadDocument } from './shared/document.js';
export { createLogger, resolveLogLevel } from './shared/logger.js';
export { AuditError, AuditErrorCode, UsageError, FileAccessError } from './shared/errors.js';
export { MatchCategory, ScanVerdict } from './shared/types.js';

// Version
export const VERSION = '0.1.0';
