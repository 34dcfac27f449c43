#!/usr/bin/env node
/**
 * pactcheck CLI binary entry point.
 * Diagnostics go to stderr so stdout carries only the report.
 */

import pino from 'pino';
import { run } from './index';
import { createRootLogger } from '../shared/logger';

async function main(): Promise<void> {
  const logger = createRootLogger(pino.destination(2)).child({ component: 'cli' });
  const exitCode = await run(process.argv, console.log, { logger });
  process.exit(exitCode);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(2);
});
