/**
 * status command - Task states recorded in the workspace registry
 */

import { Command } from 'commander';
import type { TaskStatusSnapshot } from '../../types.js';
import { Manager } from '../../core/manager.js';
import { formatSnapshot, shouldUseColors } from '../utils/terminal.js';
import { addWorkspaceOption, loadWorkspaceConfig, type WorkspaceOption } from '../utils/workspace.js';

export function createStatusCommand(): Command {
  const command = new Command('status')
    .description('Show the lifecycle state of every task')
    .option('--json', 'Output as JSON')
    .action(async (options: WorkspaceOption & { json?: boolean }) => {
      try {
        const config = loadWorkspaceConfig(options.workspace);
        const manager = new Manager({ config });

        let snapshot: TaskStatusSnapshot;
        try {
          snapshot = manager.getStatus();
        } finally {
          await manager.stop();
        }

        if (options.json) {
          console.log(JSON.stringify(snapshot, null, 2));
          return;
        }

        const lines = formatSnapshot(snapshot, shouldUseColors());
        if (lines.length === 0) {
          console.log('No tasks recorded.');
          return;
        }

        console.log(`Tasks in ${config.workspace.root}\n`);
        console.log('─'.repeat(50));
        for (const line of lines) {
          console.log(line);
        }
      } catch (error) {
        console.error('Failed to get status:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  return addWorkspaceOption(command);
}
