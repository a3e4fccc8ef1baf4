/**
 * Shared Types
 *
 * Enums used across the scanner, reporter and CLI.
 */

/** Category shown in the Type column of a report. */
export enum MatchCategory {
  NUMBER_UNIT = 'Number/Unit',
  LINE_REFERENCE = 'Line/Reference',
}

/** Outcome of a single scan. */
export enum ScanVerdict {
  CLEAN = 'clean',
  FLAGGED = 'flagged',
}
