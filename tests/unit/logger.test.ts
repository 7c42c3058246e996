/**
 * Logger tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger, logger, createLogger, serializeError } from '../../src/utils/logger.js';
import { NotFoundError } from '../../src/errors.js';

describe('Logger', () => {
  let consoleSpy: {
    log: ReturnType<typeof vi.spyOn>;
    warn: ReturnType<typeof vi.spyOn>;
    error: ReturnType<typeof vi.spyOn>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: vi.spyOn(console, 'log').mockImplementation(() => {}),
      warn: vi.spyOn(console, 'warn').mockImplementation(() => {}),
      error: vi.spyOn(console, 'error').mockImplementation(() => {}),
    };
    logger.setLevel('info');
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function jsonLogger(): Logger {
    const log = new Logger();
    log.setFormat('json');
    log.setLevel('debug');
    return log;
  }

  function lastEntry(spy: ReturnType<typeof vi.spyOn>): Record<string, unknown> {
    const call = spy.mock.calls[spy.mock.calls.length - 1];
    return JSON.parse(String(call?.[0]));
  }

  describe('log levels', () => {
    it('should route levels to the matching console method', () => {
      const log = jsonLogger();

      log.debug('d');
      log.info('i');
      log.warn('w');
      log.error('e');

      expect(consoleSpy.log).toHaveBeenCalledTimes(2);
      expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
      expect(consoleSpy.error).toHaveBeenCalledTimes(1);
    });

    it('should not log below the configured level', () => {
      logger.setLevel('warn');
      logger.info('info message');
      logger.debug('debug message');

      expect(consoleSpy.log).not.toHaveBeenCalled();
    });
  });

  describe('json format', () => {
    it('should emit one JSON object with context fields', () => {
      const log = jsonLogger();
      log.info('Task created', { taskId: 'TASK-001' });

      const entry = lastEntry(consoleSpy.log);
      expect(entry.level).toBe('info');
      expect(entry.message).toBe('Task created');
      expect(entry.taskId).toBe('TASK-001');
      expect(typeof entry.timestamp).toBe('string');
    });

    it('should serialize Error values passed as error', () => {
      const log = jsonLogger();
      log.error('Read failed', { error: new NotFoundError('logs/a.md') });

      const entry = lastEntry(consoleSpy.error);
      expect(entry.error).toMatchObject({
        name: 'NotFoundError',
        message: 'File not found: logs/a.md',
        code: 'NotFoundError',
        path: 'logs/a.md',
      });
    });

    it('should keep a string error inline as reason', () => {
      const log = jsonLogger();
      log.warn('Task failed in worker', { error: 'disk full' });

      const entry = lastEntry(consoleSpy.warn);
      expect(entry.reason).toBe('disk full');
      expect(entry.error).toBeUndefined();
    });
  });

  describe('child logger', () => {
    it('should prefix the module name', () => {
      const log = jsonLogger();
      log.child('router').info('message');

      expect(lastEntry(consoleSpy.log).module).toBe('router');
    });

    it('should nest module names', () => {
      const log = jsonLogger();
      log.child('agents').child('probe').info('message');

      expect(lastEntry(consoleSpy.log).module).toBe('agents:probe');
    });

    it('should follow the parent level after creation', () => {
      const child = logger.child('component');

      logger.setLevel('error');
      child.warn('quiet');
      expect(consoleSpy.warn).not.toHaveBeenCalled();

      logger.setLevel('warn');
      child.warn('loud');
      expect(consoleSpy.warn).toHaveBeenCalledTimes(1);
    });

    it('should set the level on the root when set through a child', () => {
      const child = createLogger('component');
      child.setLevel('error');

      expect(logger.getLevel()).toBe('error');
    });
  });

  describe('pretty format', () => {
    it('should not use colors when stdout is not a TTY', () => {
      const originalIsTTY = process.stdout.isTTY;
      Object.defineProperty(process.stdout, 'isTTY', { value: false, writable: true });

      try {
        const log = new Logger();
        log.setFormat('pretty');
        log.child('plain').info('plain message', { taskId: 'TASK-002' });

        const output = String(consoleSpy.log.mock.calls[0]?.[0]);
        expect(output).not.toContain('\x1b[');
        expect(output).toContain('INFO  [plain] plain message {"taskId":"TASK-002"}');
      } finally {
        Object.defineProperty(process.stdout, 'isTTY', { value: originalIsTTY, writable: true });
      }
    });
  });
});

describe('serializeError', () => {
  it('should copy own enumerable fields of an Error', () => {
    const serialized = serializeError(new NotFoundError('x.md'));

    expect(serialized.name).toBe('NotFoundError');
    expect(serialized.path).toBe('x.md');
    expect(serialized.stack).toBeDefined();
  });

  it('should stringify plain objects', () => {
    expect(serializeError({ a: 1 })).toEqual({ name: 'Error', message: '{"a":1}' });
  });

  it('should stringify primitives', () => {
    expect(serializeError(42)).toEqual({ name: 'Error', message: '42' });
  });
});
