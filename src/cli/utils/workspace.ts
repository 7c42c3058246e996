/**
 * Workspace resolution shared by the commands
 */

import { join, resolve } from 'node:path';
import type { Command } from 'commander';
import type { TaskRelayConfig } from '../../types.js';
import { CONFIG_FILE_NAME, getConfig, loadConfig } from '../../utils/config.js';

export interface WorkspaceOption {
  workspace?: string;
}

export function addWorkspaceOption(command: Command): Command {
  return command.option('-w, --workspace <dir>', 'Workspace directory (default: nearest config, else cwd)');
}

/**
 * Config for an explicit workspace directory, or the cached config found
 * from the cwd. A workspace without a config file gets the defaults rooted
 * at that directory.
 */
export function loadWorkspaceConfig(workspace?: string): TaskRelayConfig {
  if (!workspace) {
    return getConfig();
  }
  return loadConfig(join(resolve(workspace), CONFIG_FILE_NAME));
}
