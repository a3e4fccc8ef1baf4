import { describe, it, expect } from 'vitest';
import { ClaimScanner, MatchCategory, SUSPECT_RULES, VERSION, renderTable } from '../index.js';

describe('Public API', () => {
  it('should expose the scanner with both rules in order', () => {
    expect(SUSPECT_RULES.map(rule => rule.id)).toEqual(['suspect-quantity', 'suspect-reference']);
    expect(new ClaimScanner().scan('see 3 line 12').findings[0].category).toBe(
      MatchCategory.LINE_REFERENCE
    );
  });

  it('should expose the table renderer and version', () => {
    expect(typeof renderTable).toBe('function');
    expect(VERSION).toBe('0.1.0');
  });
});
