/**
 * Logger factory.
 *
 * All diagnostics go to stderr so that stdout carries only the report.
 */

import pino, { type Logger } from 'pino';

const DEFAULT_LEVEL = 'warn';

/** Resolves the log level from LOG_LEVEL, falling back to warn. */
export function resolveLogLevel(value: string | undefined = process.env['LOG_LEVEL']): string {
  if (value === undefined) return DEFAULT_LEVEL;
  const level = value.trim().toLowerCase();
  if (level === 'silent' || Object.hasOwn(pino.levels.values, level)) {
    return level;
  }
  return DEFAULT_LEVEL;
}

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (rootLogger === null) {
    rootLogger = pino(
      { name: 'claim-audit', level: resolveLogLevel() },
      pino.destination({ dest: 2, sync: true })
    );
  }
  return rootLogger;
}

/** Returns a child logger tagged with the module name. */
export function createLogger(module: string): Logger {
  return getRootLogger().child({ module: `claim-audit:${module}` });
}
