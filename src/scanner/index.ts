/**
 * Scanner Module - Public API
 */

export { ClaimScanner, default } from './claim-scanner.js';
export type { ScannerConfig, ScanFinding, ScanResult } from './claim-scanner.js';
export {
  SUSPECT_RULES,
  SUSPECT_QUANTITY_RULE,
  SUSPECT_REFERENCE_RULE,
  classifyMatch,
} from './rules.js';
export type { SuspectRule, SuspectRuleId } from './rules.js';
