/**
 * ClaimScanner - detects fabricated-looking technical claims in prose.
 *
 * Applies each suspect rule to the full text in table order and records
 * every match with a context window for the reporter.
 */

import { randomUUID } from 'crypto';
import { loadDocument } from '../shared/document.js';
import { createLogger } from '../shared/logger.js';
import { MatchCategory, ScanVerdict } from '../shared/types.js';
import { SUSPECT_RULES, classifyMatch, type SuspectRule, type SuspectRuleId } from './rules.js';

const logger = createLogger('scanner');

// ═══════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════

/** Configuration for the ClaimScanner. */
export interface ScannerConfig {
  /** Characters kept on each side of a match. Default: 30 */
  contextSize?: number;
  /** Maximum context length before the ellipsis. Default: 120 */
  maxContextLength?: number;
  /** Rules applied in order. Default: SUSPECT_RULES */
  rules?: readonly SuspectRule[];
}

/** A located occurrence of a suspect pattern. */
export interface ScanFinding {
  /** Unique finding identifier. */
  id: string;
  /** The text that matched. */
  matchedText: string;
  /** Rule that produced the match. */
  ruleId: SuspectRuleId;
  /** Label shown in the report. */
  category: MatchCategory;
  /** Start index in the original text. */
  startIndex: number;
  /** End index in the original text. */
  endIndex: number;
  /** Surrounding text, single-line, ending in "...". */
  context: string;
}

/** Result of a scan operation. */
export interface ScanResult {
  scanId: string;
  /** ISO timestamp when scan was performed. */
  scannedAt: string;
  /** File the text came from, null for in-memory text. */
  sourcePath: string | null;
  inputLength: number;
  durationMs: number;
  /** Findings in report order. */
  findings: ScanFinding[];
  findingCount: number;
  verdict: ScanVerdict;
}

// ═══════════════════════════════════════════════════════════════
// CODE POINT HELPERS
// ═══════════════════════════════════════════════════════════════

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Index `count` code points before `index`, clamped to 0. */
function stepBack(text: string, index: number, count: number): number {
  let i = index;
  for (let n = 0; n < count && i > 0; n++) {
    i--;
    if (i > 0 && isLowSurrogate(text.charCodeAt(i)) && isHighSurrogate(text.charCodeAt(i - 1))) {
      i--;
    }
  }
  return i;
}

/** Index `count` code points after `index`, clamped to the text length. */
function stepForward(text: string, index: number, count: number): number {
  let i = index;
  for (let n = 0; n < count && i < text.length; n++) {
    if (isHighSurrogate(text.charCodeAt(i)) && isLowSurrogate(text.charCodeAt(i + 1))) {
      i++;
    }
    i++;
  }
  return i;
}

// ═══════════════════════════════════════════════════════════════
// CLAIM SCANNER
// ═══════════════════════════════════════════════════════════════

export class ClaimScanner {
  private readonly config: Required<ScannerConfig>;

  constructor(config: ScannerConfig = {}) {
    this.config = {
      contextSize: config.contextSize ?? 30,
      maxContextLength: config.maxContextLength ?? 120,
      rules: config.rules ?? SUSPECT_RULES,
    };
  }

  /**
   * Scans text for suspect claims.
   * @param sourcePath - Recorded on the result when the text came from a file
   */
  scan(text: string, sourcePath: string | null = null): ScanResult {
    const scanId = randomUUID();
    const startTime = performance.now();

    const findings: ScanFinding[] = [];
    for (const rule of this.config.rules) {
      findings.push(...this.scanWithRule(text, rule));
    }

    const durationMs = performance.now() - startTime;
    logger.debug(
      { scanId, sourcePath, inputLength: text.length, findingCount: findings.length, durationMs },
      'Scan complete'
    );

    return {
      scanId,
      scannedAt: new Date().toISOString(),
      sourcePath,
      inputLength: text.length,
      durationMs,
      findings,
      findingCount: findings.length,
      verdict: findings.length > 0 ? ScanVerdict.FLAGGED : ScanVerdict.CLEAN,
    };
  }

  /**
   * Loads a file and scans its contents.
   * @throws FileAccessError if the file cannot be read as UTF-8 text
   */
  scanFile(filePath: string): ScanResult {
    return this.scan(loadDocument(filePath), filePath);
  }

  /**
   * Returns the window around [start, end): newlines become spaces, the
   * result is trimmed, capped and always suffixed with "...".
   * Window size and cap count code points, so surrogate pairs stay whole.
   */
  extractContext(text: string, start: number, end: number): string {
    const ctxSize = this.config.contextSize;
    const window = text.slice(stepBack(text, start, ctxSize), stepForward(text, end, ctxSize));
    const singleLine = window.replace(/\n/g, ' ').trim();
    return `${Array.from(singleLine).slice(0, this.config.maxContextLength).join('')}...`;
  }

  // ════════════════════════════════════════════════════════════
  // PRIVATE METHODS
  // ════════════════════════════════════════════════════════════

  private scanWithRule(text: string, rule: SuspectRule): ScanFinding[] {
    const findings: ScanFinding[] = [];
    // Fresh copy so a shared rule's lastIndex is never touched
    const { source, flags } = rule.pattern;
    const regex = new RegExp(source, flags.includes('g') ? flags : `${flags}g`);

    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
      const matchedText = match[0];
      const startIndex = match.index;
      const endIndex = startIndex + matchedText.length;

      findings.push({
        id: randomUUID(),
        matchedText,
        ruleId: rule.id,
        category: classifyMatch(matchedText),
        startIndex,
        endIndex,
        context: this.extractContext(text, startIndex, endIndex),
      });

      // Prevent infinite loops on zero-length matches
      if (matchedText.length === 0) {
        regex.lastIndex++;
      }
    }

    return findings;
  }
}

export default ClaimScanner;
