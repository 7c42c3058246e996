/**
 * Configuration management for taskrelay
 */

import { readFileSync, existsSync, writeFileSync, mkdirSync } from 'node:fs';
import { join, dirname, resolve, isAbsolute } from 'node:path';
import { z } from 'zod';
import type { TaskRelayConfig } from '../types.js';
import { CapabilitySchema, RosterDocumentSchema } from './validation.js';
import { logger } from './logger.js';

const WorkspaceConfigSchema = z.object({
  root: z.string().default('.'),
  logsDir: z.string().default('logs'),
  ledgerFile: z.string().default('active_spec.md'),
  rosterPath: z.string().default('docs/agent_roster.md'),
  registryPath: z.string().default('.taskrelay/registry.db'),
});

const TasksConfigSchema = z.object({
  idPrefix: z.string().min(1).max(20).regex(/^[A-Za-z][A-Za-z0-9]*$/).default('TASK'),
  idWidth: z.number().int().min(1).max(12).default(3),
});

const RouterConfigSchema = z.object({
  identity: z.string().min(1).default('librarian'),
  matchPolicy: z.enum(['superset', 'intersect']).default('superset'),
  completionTimeoutMs: z.number().int().min(10).max(86_400_000).default(300_000),
  retryDelayMs: z.number().int().min(0).max(60_000).default(250),
  defaultCapabilities: z.array(CapabilitySchema).default([]),
});

const ConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  workspace: WorkspaceConfigSchema.default({}),
  tasks: TasksConfigSchema.default({}),
  router: RouterConfigSchema.default({}),
  roster: RosterDocumentSchema.optional(),
});

export const CONFIG_FILE_NAME = 'taskrelay.config.json';

/**
 * Interpolate environment variables in config values
 */
function interpolateEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
      return process.env[envVar] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map(interpolateEnvVars);
  }
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateEnvVars(value);
    }
    return result;
  }
  return obj;
}

/**
 * Find config file by walking up directories
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Load and validate configuration.
 * A relative workspace root resolves against the directory holding the
 * config file (or the cwd when there is none).
 */
export function loadConfig(configPath?: string): TaskRelayConfig {
  const path = configPath ?? findConfigFile();

  let rawConfig: unknown = {};

  if (path && existsSync(path)) {
    try {
      const content = readFileSync(path, 'utf-8');
      rawConfig = JSON.parse(content);
      logger.debug('Loaded config from file', { path });
    } catch (error) {
      logger.warn('Failed to parse config file, using defaults', {
        path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  } else {
    logger.debug('No config file found, using defaults');
  }

  const interpolated = interpolateEnvVars(rawConfig);

  const result = ConfigSchema.safeParse(interpolated);

  let config: TaskRelayConfig;
  if (result.success) {
    config = result.data;
  } else {
    logger.warn('Config validation errors, using defaults', {
      errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
    });
    config = ConfigSchema.parse({});
  }

  const baseDir = path ? dirname(resolve(path)) : process.cwd();
  if (!isAbsolute(config.workspace.root)) {
    config.workspace.root = resolve(baseDir, config.workspace.root);
  }

  return config;
}

/**
 * Get default config
 */
export function getDefaultConfig(): TaskRelayConfig {
  return ConfigSchema.parse({});
}

/**
 * Save configuration to file
 */
export function saveConfig(config: TaskRelayConfig, configPath?: string): void {
  const path = configPath ?? join(process.cwd(), CONFIG_FILE_NAME);

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(path, JSON.stringify(config, null, 2));
  logger.info('Configuration saved', { path });
}

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): { valid: boolean; errors?: string[] } {
  const result = ConfigSchema.safeParse(config);

  if (result.success) {
    return { valid: true };
  }

  return {
    valid: false,
    errors: result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`),
  };
}

let cachedConfig: TaskRelayConfig | null = null;

/**
 * Get the current configuration (cached)
 */
export function getConfig(): TaskRelayConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
