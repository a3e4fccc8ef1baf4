/**
 * CLI core - validates arguments, scans the file and writes the report.
 *
 * Kept free of process globals so it can be driven from tests.
 */

import defaultChalk, { type ChalkInstance } from 'chalk';
import { ClaimScanner, type ScannerConfig } from '../scanner/claim-scanner.js';
import { renderReport } from '../report/report-renderer.js';
import { UsageError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const logger = createLogger('cli');

export const PROGRAM_NAME = 'claim-audit';

export function usageText(programName: string = PROGRAM_NAME): string {
  return `Usage: ${programName} <markdown-file>`;
}

/** Anything with a `write(string)` method, e.g. process.stdout. */
export interface OutputStream {
  write(chunk: string): unknown;
}

export interface CliOptions {
  stdout?: OutputStream;
  chalk?: ChalkInstance;
  programName?: string;
  scanner?: ScannerConfig;
}

/** Throws UsageError unless exactly one path is given. */
export function parseArgs(args: readonly string[]): string {
  const [filePath] = args;
  if (args.length !== 1 || filePath === undefined) {
    throw new UsageError(`Expected exactly one file path, got ${args.length} arguments`, {
      argumentCount: args.length,
    });
  }
  return filePath;
}

/**
 * Runs one audit and returns the process exit code.
 * @throws FileAccessError if the input file cannot be read
 */
export function runCli(args: readonly string[], options: CliOptions = {}): number {
  const stdout = options.stdout ?? process.stdout;
  const chalk = options.chalk ?? defaultChalk;

  let filePath: string;
  try {
    filePath = parseArgs(args);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    logger.debug({ details: error.details }, error.message);
    stdout.write(`${chalk.bold(usageText(options.programName))}\n`);
    return 1;
  }

  const scanner = new ClaimScanner(options.scanner);
  const result = scanner.scanFile(filePath);
  stdout.write(renderReport(result, { chalk }));
  return 0;
}
