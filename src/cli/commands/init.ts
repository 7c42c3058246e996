/**
 * init command - Initialize a taskrelay workspace
 */

import { Command } from 'commander';
import { existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { CONFIG_FILE_NAME, getDefaultConfig, saveConfig } from '../../utils/config.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('init');

export const DEFAULT_ROSTER = `# Agent Roster

## librarian

capabilities:
- task_routing
- spec_consolidation
- coordination

permissions:
- read: logs/
- write: logs/active_spec.md

## probe

capabilities:
- probe

permissions:
- write: logs/
`;

export function createInitCommand(): Command {
  const command = new Command('init')
    .description('Initialize a new taskrelay workspace')
    .option('-f, --force', 'Overwrite existing files')
    .option('-d, --directory <path>', 'Directory to initialize', process.cwd())
    .action((options) => {
      const { force, directory } = options as { force?: boolean; directory: string };
      const root = resolve(directory);
      const config = getDefaultConfig();

      const configPath = join(root, CONFIG_FILE_NAME);
      const rosterPath = join(root, config.workspace.rosterPath);
      const logsDir = join(root, config.workspace.logsDir);
      const stateDir = dirname(join(root, config.workspace.registryPath));

      if (existsSync(configPath) && !force) {
        console.error('Workspace already initialized. Use --force to overwrite.');
        process.exit(1);
        return;
      }

      console.log('Initializing taskrelay workspace...\n');

      saveConfig(config, configPath);
      console.log(`  Created ${configPath}`);

      if (!existsSync(rosterPath) || force) {
        mkdirSync(dirname(rosterPath), { recursive: true });
        writeFileSync(rosterPath, DEFAULT_ROSTER);
        console.log(`  Created ${rosterPath}`);
      }

      if (!existsSync(logsDir)) {
        mkdirSync(logsDir, { recursive: true });
        console.log(`  Created ${logsDir}/`);
      }

      // Registry database stays out of version control
      if (!existsSync(stateDir)) {
        mkdirSync(stateDir, { recursive: true });
      }
      const gitignorePath = join(stateDir, '.gitignore');
      if (!existsSync(gitignorePath)) {
        writeFileSync(gitignorePath, '*.db\n*.db-wal\n*.db-shm\n');
        console.log(`  Created ${gitignorePath}`);
      }

      console.log('\nWorkspace initialized successfully!\n');
      console.log('Next steps:');
      console.log(`  1. Declare your agents in ${config.workspace.rosterPath}`);
      console.log('  2. Try the probe: taskrelay run "probe validation test"\n');

      log.info('Workspace initialized', { directory: root });
    });

  return command;
}
