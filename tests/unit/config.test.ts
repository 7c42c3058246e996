/**
 * Configuration tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  CONFIG_FILE_NAME,
  findConfigFile,
  getDefaultConfig,
  validateConfig,
  loadConfig,
  saveConfig,
  getConfig,
  resetConfig,
} from '../../src/utils/config.js';
import { mkdtempSync, rmSync, writeFileSync, mkdirSync, readFileSync, realpathSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

describe('Configuration', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = realpathSync(mkdtempSync(join(tmpdir(), 'taskrelay-config-')));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
    resetConfig();
    delete process.env.TASKRELAY_TEST_LOGS;
  });

  it('should provide default config', () => {
    const config = getDefaultConfig();

    expect(config.version).toBe('1.0.0');
    expect(config.workspace).toEqual({
      root: '.',
      logsDir: 'logs',
      ledgerFile: 'active_spec.md',
      rosterPath: 'docs/agent_roster.md',
      registryPath: '.taskrelay/registry.db',
    });
    expect(config.tasks).toEqual({ idPrefix: 'TASK', idWidth: 3 });
    expect(config.router).toEqual({
      identity: 'librarian',
      matchPolicy: 'superset',
      completionTimeoutMs: 300_000,
      retryDelayMs: 250,
      defaultCapabilities: [],
    });
    expect(config.roster).toBeUndefined();
  });

  it('should validate correct config', () => {
    const result = validateConfig({
      router: { matchPolicy: 'intersect', defaultCapabilities: ['probe'] },
      tasks: { idPrefix: 'JOB', idWidth: 5 },
    });

    expect(result.valid).toBe(true);
    expect(result.errors).toBeUndefined();
  });

  it('should reject an unknown match policy', () => {
    const result = validateConfig({ router: { matchPolicy: 'closest' } });

    expect(result.valid).toBe(false);
    expect(result.errors?.[0]).toContain('router.matchPolicy');
  });

  it('should reject unknown default capabilities', () => {
    const result = validateConfig({ router: { defaultCapabilities: ['telepathy'] } });

    expect(result.valid).toBe(false);
  });

  it('should reject an id prefix that is not alphanumeric', () => {
    const result = validateConfig({ tasks: { idPrefix: 'TASK-' } });

    expect(result.valid).toBe(false);
    expect(result.errors?.[0]).toContain('tasks.idPrefix');
  });

  it('should accept an inline roster', () => {
    const result = validateConfig({
      roster: { agents: { probe: { capabilities: ['probe'] } } },
    });

    expect(result.valid).toBe(true);
  });

  describe('loadConfig', () => {
    it('should load config from file and resolve the workspace root', () => {
      const configPath = join(testDir, CONFIG_FILE_NAME);
      writeFileSync(configPath, JSON.stringify({
        workspace: { root: 'work', logsDir: 'out' },
        router: { completionTimeoutMs: 1000 },
      }));

      const config = loadConfig(configPath);

      expect(config.workspace.root).toBe(join(testDir, 'work'));
      expect(config.workspace.logsDir).toBe('out');
      expect(config.workspace.ledgerFile).toBe('active_spec.md');
      expect(config.router.completionTimeoutMs).toBe(1000);
    });

    it('should keep an absolute workspace root', () => {
      const configPath = join(testDir, CONFIG_FILE_NAME);
      const root = join(testDir, 'elsewhere');
      writeFileSync(configPath, JSON.stringify({ workspace: { root } }));

      expect(loadConfig(configPath).workspace.root).toBe(root);
    });

    it('should use defaults rooted beside a missing config file', () => {
      const config = loadConfig(join(testDir, CONFIG_FILE_NAME));

      expect(config.workspace.root).toBe(testDir);
      expect(config.tasks.idPrefix).toBe('TASK');
    });

    it('should fall back to defaults on invalid JSON', () => {
      const configPath = join(testDir, CONFIG_FILE_NAME);
      writeFileSync(configPath, '{ not json');

      const config = loadConfig(configPath);

      expect(config.router.identity).toBe('librarian');
    });

    it('should fall back to defaults on schema errors', () => {
      const configPath = join(testDir, CONFIG_FILE_NAME);
      writeFileSync(configPath, JSON.stringify({ router: { completionTimeoutMs: -5 } }));

      const config = loadConfig(configPath);

      expect(config.router.completionTimeoutMs).toBe(300_000);
    });

    it('should interpolate environment variables', () => {
      process.env.TASKRELAY_TEST_LOGS = 'env-logs';
      const configPath = join(testDir, CONFIG_FILE_NAME);
      writeFileSync(configPath, JSON.stringify({
        workspace: { logsDir: '${TASKRELAY_TEST_LOGS}' },
      }));

      expect(loadConfig(configPath).workspace.logsDir).toBe('env-logs');
    });
  });

  describe('findConfigFile', () => {
    it('should walk up to the nearest config file', () => {
      const nested = join(testDir, 'a', 'b');
      mkdirSync(nested, { recursive: true });
      writeFileSync(join(testDir, CONFIG_FILE_NAME), '{}');

      expect(findConfigFile(nested)).toBe(join(testDir, CONFIG_FILE_NAME));
    });
  });

  describe('saveConfig', () => {
    it('should write config that loads back', () => {
      const configPath = join(testDir, 'nested', CONFIG_FILE_NAME);
      const config = getDefaultConfig();
      config.router.identity = 'coordinator';

      saveConfig(config, configPath);

      const saved = JSON.parse(readFileSync(configPath, 'utf-8'));
      expect(saved.router.identity).toBe('coordinator');
      expect(loadConfig(configPath).router.identity).toBe('coordinator');
    });
  });

  describe('getConfig', () => {
    it('should cache until reset', () => {
      const first = getConfig();
      expect(getConfig()).toBe(first);

      resetConfig();
      expect(getConfig()).not.toBe(first);
    });
  });
});
