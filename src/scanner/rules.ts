/**
 * Suspect rules - the ordered pattern table applied by the ClaimScanner.
 *
 * Order matters: every match of the first rule is reported before any
 * match of the second.
 */

import { MatchCategory } from '../shared/types.js';

export type SuspectRuleId = 'suspect-quantity' | 'suspect-reference';

/** A single pattern the scanner applies to the whole document. */
export interface SuspectRule {
  id: SuspectRuleId;
  displayName: string;
  /** Must carry the `g` flag; `u` when it uses `\p{...}` classes. */
  pattern: RegExp;
}

/**
 * Numbers in any decimal script followed by a unit or count word. A
 * number opened by `[` or closed later by `]` is treated as a citation
 * and skipped.
 */
export const SUSPECT_QUANTITY_RULE: SuspectRule = {
  id: 'suspect-quantity',
  displayName: 'Suspicious quantitative claim',
  pattern:
    /(?<!\[)(?:\p{Nd}{1,4}[,\p{Nd}]*\s?(?:bytes?|B|KB|MB|GB|ms|s|line\s?\p{Nd}+|row|rows|duplicate))(?![^\[]*\])/gu,
};

/** Source locations, bare calls and crate-qualified paths that look copied from code. */
export const SUSPECT_REFERENCE_RULE: SuspectRule = {
  id: 'suspect-reference',
  displayName: 'Suspicious code reference',
  pattern:
    /[a-zA-Z0-9_/]+\.rs:\p{Nd}+|[a-z_]+\(\)|(?<![\p{L}\p{N}_])unwrap\(\)|(?<![\p{L}\p{N}_])prost::/gu,
};

export const SUSPECT_RULES: readonly SuspectRule[] = [
  SUSPECT_QUANTITY_RULE,
  SUSPECT_REFERENCE_RULE,
];

/**
 * Labels a match by its text alone, whichever rule produced it.
 * A reference such as `throw()` therefore reads as Line/Reference.
 */
export function classifyMatch(matchedText: string): MatchCategory {
  if (matchedText.includes('line') || matchedText.includes('row')) {
    return MatchCategory.LINE_REFERENCE;
  }
  return MatchCategory.NUMBER_UNIT;
}
