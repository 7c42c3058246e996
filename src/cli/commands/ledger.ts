/**
 * ledger command - Consolidated entries of the active specification
 */

import { Command } from 'commander';
import { FileStateStore } from '../../store/state-store.js';
import { Ledger } from '../../store/ledger.js';
import { layoutFromConfig } from '../../store/paths.js';
import { truncate } from '../utils/terminal.js';
import { addWorkspaceOption, loadWorkspaceConfig, type WorkspaceOption } from '../utils/workspace.js';

export interface LedgerOptions extends WorkspaceOption {
  json?: boolean;
  full?: boolean;
}

export function createLedgerCommand(): Command {
  const command = new Command('ledger')
    .description('List the entries consolidated into the ledger')
    .option('--json', 'Output as JSON')
    .option('--full', 'Print entry content in full')
    .action(async (options: LedgerOptions) => {
      try {
        const config = loadWorkspaceConfig(options.workspace);
        const layout = layoutFromConfig(config);
        const ledger = new Ledger(new FileStateStore(config.workspace.root), layout.ledgerPath);
        const entries = await ledger.entries();

        if (options.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }

        if (entries.length === 0) {
          console.log(`Ledger ${layout.ledgerPath} is empty.`);
          return;
        }

        console.log(`Ledger: ${layout.ledgerPath} (${entries.length} entries)\n`);
        for (const entry of entries) {
          console.log(`${entry.taskId}  by ${entry.agentId}`);
          if (options.full) {
            console.log(`${entry.content}\n`);
          } else {
            const firstLine = entry.content.split('\n').find(line => line.trim() !== '') ?? '';
            console.log(`  ${truncate(firstLine, 72)}`);
          }
        }
      } catch (error) {
        console.error('Failed to read ledger:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  return addWorkspaceOption(command);
}
