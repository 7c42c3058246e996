/**
 * Program definition, separate from the entry point so tests can build it
 */

import { Command } from 'commander';
import { logger } from '../utils/logger.js';
import {
  createInitCommand,
  createLedgerCommand,
  createRunCommand,
  createStatusCommand,
} from './commands/index.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('taskrelay')
    .description('Route tasks to capable agents and consolidate their output into a ledger')
    .version(VERSION)
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Only log errors')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts() as { verbose?: boolean; quiet?: boolean };

      if (opts.verbose) {
        logger.setLevel('debug');
      } else if (opts.quiet) {
        logger.setLevel('error');
      }
    });

  program.addCommand(createInitCommand());
  program.addCommand(createRunCommand());
  program.addCommand(createStatusCommand());
  program.addCommand(createLedgerCommand());

  return program;
}
