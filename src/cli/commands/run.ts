/**
 * run command - Submit one task and wait for it to finish
 */

import { Command } from 'commander';
import type { Capability, TaskRelayConfig } from '../../types.js';
import { Manager } from '../../core/manager.js';
import { ProbeWorker } from '../../agents/probe.js';
import { isCapability } from '../../utils/validation.js';
import { logger } from '../../utils/logger.js';
import { formatSnapshot, shouldUseColors } from '../utils/terminal.js';
import { addWorkspaceOption, loadWorkspaceConfig, type WorkspaceOption } from '../utils/workspace.js';

const log = logger.child('run');

// Extra time past the router's own timeout so a timed-out delegation is
// reported as FAILED rather than as a wait timeout
const WAIT_GRACE_MS = 5_000;

export interface RunOptions extends WorkspaceOption {
  timeout?: string;
  json?: boolean;
  capability?: string[];
}

export interface RunResult {
  taskId: string;
  exitCode: number;
}

export function createRunCommand(): Command {
  const command = new Command('run')
    .description('Submit a task to the router and wait for it to complete')
    .argument('<description...>', 'Task description')
    .option('-t, --timeout <ms>', 'Maximum time to wait for the task')
    .option('-c, --capability <tag...>', 'Required capabilities (default: derived from the description)')
    .option('--json', 'Output as JSON')
    .action(async (description: string[], options: RunOptions) => {
      try {
        const config = loadWorkspaceConfig(options.workspace);
        const result = await runTask(config, description.join(' '), options);
        process.exitCode = result.exitCode;
      } catch (error) {
        console.error('Run failed:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    });

  return addWorkspaceOption(command);
}

function parseCapabilities(tags: string[] | undefined): Capability[] | undefined {
  if (!tags || tags.length === 0) return undefined;
  const capabilities: Capability[] = [];
  for (const tag of tags) {
    if (!isCapability(tag)) {
      throw new Error(`Unknown capability: ${tag}`);
    }
    capabilities.push(tag);
  }
  return capabilities;
}

/**
 * Boot the manager with the built-in probe worker, submit the task and
 * report its final state. Exit code 0 on COMPLETED, 1 otherwise.
 */
export async function runTask(
  config: TaskRelayConfig,
  description: string,
  options: RunOptions = {}
): Promise<RunResult> {
  const timeoutMs = options.timeout !== undefined
    ? Number.parseInt(options.timeout, 10)
    : config.router.completionTimeoutMs + WAIT_GRACE_MS;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`Invalid timeout: ${options.timeout ?? ''}`);
  }
  const capabilities = parseCapabilities(options.capability);

  const manager = new Manager({ config });
  await manager.registerAgent(
    new ProbeWorker({ bus: manager.bus, store: manager.store, layout: manager.layout })
  );

  try {
    await manager.start();

    const taskId = manager.submitTask(description, { capabilities });
    if (!options.json) {
      console.log(`Task submitted: ${taskId}`);
    }

    const task = await manager.waitForTask(taskId, timeoutMs);
    await manager.idle();
    const snapshot = manager.getStatus();

    if (options.json) {
      console.log(JSON.stringify({
        taskId,
        state: task.state,
        owner: task.owner,
        ...(task.failure && { failure: task.failure }),
        status: snapshot,
      }, null, 2));
    } else {
      console.log('');
      for (const line of formatSnapshot(snapshot, shouldUseColors())) {
        console.log(line);
      }
      if (task.failure) {
        console.log(`\n${task.failure.code}: ${task.failure.reason}`);
      }
    }

    log.debug('Task finished', { taskId, state: task.state });
    return { taskId, exitCode: task.state === 'COMPLETED' ? 0 : 1 };
  } finally {
    await manager.stop();
  }
}
