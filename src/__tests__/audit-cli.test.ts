/**
 * Tests for the CLI core
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Chalk } from 'chalk';
import { runCli, parseArgs, usageText, type OutputStream } from '../cli/audit-cli.js';
import { AuditErrorCode, FileAccessError, UsageError } from '../shared/errors.js';

class CapturedOutput implements OutputStream {
  chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

describe('runCli', () => {
  const chalk = new Chalk({ level: 0 });
  let dir: string;
  let stdout: CapturedOutput;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'claim-audit-cli-'));
    writeFileSync(join(dir, 'clean.md'), '# Notes\n\nThe parser handles nested lists.\n');
    writeFileSync(join(dir, 'flagged.md'), 'Decoding finished in 40 ms via decode_all().\n');
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    stdout = new CapturedOutput();
  });

  describe('Usage', () => {
    it('should print usage and exit 1 without arguments', () => {
      expect(runCli([], { stdout, chalk })).toBe(1);
      expect(stdout.text).toBe('Usage: claim-audit <markdown-file>\n');
    });

    it('should print usage and exit 1 with two arguments', () => {
      const code = runCli([join(dir, 'clean.md'), join(dir, 'flagged.md')], { stdout, chalk });

      expect(code).toBe(1);
      expect(stdout.text).toBe('Usage: claim-audit <markdown-file>\n');
    });

    it('should use the configured program name', () => {
      runCli([], { stdout, chalk, programName: 'audit' });
      expect(stdout.text).toBe('Usage: audit <markdown-file>\n');
    });
  });

  describe('Scanning', () => {
    it('should print the clean message and exit 0 for a clean file', () => {
      const code = runCli([join(dir, 'clean.md')], { stdout, chalk });

      expect(code).toBe(0);
      expect(stdout.text).toBe('✅ Clean – no obvious hallucinations detected\n');
    });

    it('should print findings and still exit 0', () => {
      const code = runCli([join(dir, 'flagged.md')], { stdout, chalk });
      const lines = stdout.text.split('\n');
      const rows = lines.filter(line => line.startsWith('│'));

      expect(code).toBe(0);
      expect(stdout.text).not.toContain('Usage:');
      expect(rows.map(row => row.split('│')[2].trim())).toEqual(['40 ms', 'decode_all()']);
      expect(lines.at(-2)).toBe('Found 2 potential hallucinations. Fix or flag before publishing.');
    });

    it('should pass scanner options through', () => {
      runCli([join(dir, 'flagged.md')], { stdout, chalk, scanner: { maxContextLength: 8 } });
      const rows = stdout.text.split('\n').filter(line => line.startsWith('│'));

      expect(rows.map(row => row.split('│')[3].trim())).toEqual(['Decoding...', 'ecoding ...']);
    });

    it('should propagate FileAccessError for a missing file', () => {
      const missing = join(dir, 'missing.md');

      expect(() => runCli([missing], { stdout, chalk })).toThrow(FileAccessError);
      expect(stdout.text).toBe('');
    });
  });
});

describe('parseArgs', () => {
  it('should return the single path', () => {
    expect(parseArgs(['notes.md'])).toBe('notes.md');
  });

  it('should throw UsageError otherwise', () => {
    expect(() => parseArgs([])).toThrow(UsageError);

    try {
      parseArgs(['a.md', 'b.md', 'c.md']);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UsageError);
      if (error instanceof UsageError) {
        expect(error.code).toBe(AuditErrorCode.USAGE_ERROR);
        expect(error.details).toEqual({ argumentCount: 3 });
      }
    }
  });
});

describe('usageText', () => {
  it('should default to the package binary name', () => {
    expect(usageText()).toBe('Usage: claim-audit <markdown-file>');
  });
});
