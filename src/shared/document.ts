/**
 * Document loader - reads an input file fully into memory as UTF-8 text.
 */

import { readFileSync } from 'fs';
import { AuditErrorCode, FileAccessError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('document');

const decoder = new TextDecoder('utf-8', { fatal: true });

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Reads the whole file at `filePath`.
 * @throws FileAccessError if the file is missing, unreadable or not valid UTF-8
 */
export function loadDocument(filePath: string): string {
  let bytes: Buffer;
  try {
    bytes = readFileSync(filePath);
  } catch (error) {
    const code = errorCode(error);
    const reason = error instanceof Error ? error.message : String(error);
    if (code === 'ENOENT') {
      throw new FileAccessError(
        AuditErrorCode.FILE_NOT_FOUND,
        filePath,
        `File not found: ${filePath}`,
        { cause: error }
      );
    }
    throw new FileAccessError(
      AuditErrorCode.FILE_UNREADABLE,
      filePath,
      `Cannot read ${filePath}: ${reason}`,
      { cause: error }
    );
  }

  try {
    // Line endings are normalised so every break is a single '\n'
    const text = decoder.decode(bytes).replace(/\r\n?/g, '\n');
    logger.debug({ filePath, bytes: bytes.length }, 'Document loaded');
    return text;
  } catch (error) {
    throw new FileAccessError(
      AuditErrorCode.INVALID_ENCODING,
      filePath,
      `${filePath} is not valid UTF-8 text`,
      { cause: error }
    );
  }
}
