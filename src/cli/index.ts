#!/usr/bin/env node
/**
 * taskrelay CLI - capability-routed task coordination
 */

import { initErrorTracking, logger } from '../utils/logger.js';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  initErrorTracking();
  await createProgram().parseAsync(process.argv);
  await logger.flush();
}

main().catch((error) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
