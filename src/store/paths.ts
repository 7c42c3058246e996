/**
 * Workspace layout. These paths are the exchange contract between the
 * router, the workers and anyone inspecting the workspace.
 */

import { posix } from 'node:path';
import type { TaskRelayConfig } from '../types.js';

export interface WorkspaceLayout {
  logsDir: string;
  ledgerPath: string;
  rosterPath: string;
  registryPath: string;
}

export const DEFAULT_LAYOUT: WorkspaceLayout = {
  logsDir: 'logs',
  ledgerPath: 'logs/active_spec.md',
  rosterPath: 'docs/agent_roster.md',
  registryPath: '.taskrelay/registry.db',
};

export function layoutFromConfig(config: TaskRelayConfig): WorkspaceLayout {
  const { logsDir, ledgerFile, rosterPath, registryPath } = config.workspace;
  return {
    logsDir,
    ledgerPath: posix.join(logsDir, ledgerFile),
    rosterPath,
    registryPath,
  };
}

/**
 * Scratch artifact a worker writes for one task
 */
export function artifactPath(layout: WorkspaceLayout, agentId: string, taskId: string): string {
  return posix.join(layout.logsDir, artifactFileName(agentId, taskId));
}

export function artifactFileName(agentId: string, taskId: string): string {
  return `${agentId}_${taskId}_spec.md`;
}

/**
 * Inverse of artifactFileName; null for anything else in the logs directory
 */
export function parseArtifactFileName(name: string): { agentId: string; taskId: string } | null {
  const match = /^(.+)_([A-Za-z][A-Za-z0-9]*-\d+)_spec\.md$/.exec(name);
  if (!match?.[1] || !match[2]) return null;
  return { agentId: match[1], taskId: match[2] };
}
