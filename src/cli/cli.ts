#!/usr/bin/env node
/**
 * claim-audit — flag fabricated-looking technical claims in a document
 *
 * Usage:
 *   npx tsx src/cli/cli.ts ./draft.md
 *   npm run audit -- ./draft.md
 *
 * Environment variables:
 *   LOG_LEVEL  - Diagnostic log level on stderr (default: warn)
 */

import { runCli } from './audit-cli.js';
import { AuditError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const logger = createLogger('cli');

try {
  process.exitCode = runCli(process.argv.slice(2));
} catch (err) {
  if (err instanceof AuditError) {
    logger.error({ code: err.code, details: err.details }, err.message);
    console.error(`❌ ${err.message}`);
  } else {
    logger.error({ err }, 'Audit failed');
  }
  console.error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
}
