/**
 * Error types for the audit tool.
 */

export enum AuditErrorCode {
  USAGE_ERROR = 'AUDIT_USAGE_ERROR',
  FILE_NOT_FOUND = 'AUDIT_FILE_NOT_FOUND',
  FILE_UNREADABLE = 'AUDIT_FILE_UNREADABLE',
  INVALID_ENCODING = 'AUDIT_INVALID_ENCODING',
}

/** Base error class for all audit failures. */
export class AuditError extends Error {
  public readonly code: AuditErrorCode;
  public readonly details: Record<string, unknown> | undefined;

  constructor(
    code: AuditErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AuditError';
    this.code = code;
    this.details = details;
  }
}

/** Wrong number of command-line arguments. */
export class UsageError extends AuditError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(AuditErrorCode.USAGE_ERROR, message, details);
    this.name = 'UsageError';
  }
}

/** Input path missing, unreadable, or not UTF-8 text. */
export class FileAccessError extends AuditError {
  public readonly path: string;

  constructor(
    code: AuditErrorCode,
    path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, message, { path }, options);
    this.name = 'FileAccessError';
    this.path = path;
  }
}
