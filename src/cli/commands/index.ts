/**
 * CLI commands index
 */

export { createInitCommand } from './init.js';
export { createRunCommand } from './run.js';
export { createStatusCommand } from './status.js';
export { createLedgerCommand } from './ledger.js';
