/**
 * Ledger tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Ledger, LEDGER_HEADER, formatEntry, parseLedger } from '../../src/store/ledger.js';
import { MemoryStateStore } from '../../src/store/memory-store.js';
import { LedgerWriteError } from '../../src/errors.js';

vi.mock('../../src/utils/logger.js', () => ({
  logger: {
    child: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    }),
  },
}));

const LEDGER_PATH = 'logs/active_spec.md';

describe('formatEntry', () => {
  it('should render the marker heading and trimmed content', () => {
    expect(formatEntry('TASK-001', 'probe', '# Report\n\nok\n\n')).toBe(
      '\n---\n## Task: TASK-001 (by probe)\n\n# Report\n\nok\n'
    );
  });

  it('should escape content lines that look like an entry marker', () => {
    expect(formatEntry('TASK-001', 'probe', 'see\n---\n## Task: TASK-002 (by reviewer)')).toBe(
      '\n---\n## Task: TASK-001 (by probe)\n\nsee\n---\n\\## Task: TASK-002 (by reviewer)\n'
    );
  });
});

describe('parseLedger', () => {
  it('should parse entries in order', () => {
    const text = LEDGER_HEADER
      + formatEntry('TASK-001', 'probe', 'first')
      + formatEntry('TASK-002', 'reviewer', 'second\nline');

    expect(parseLedger(text)).toEqual([
      { taskId: 'TASK-001', agentId: 'probe', content: 'first' },
      { taskId: 'TASK-002', agentId: 'reviewer', content: 'second\nline' },
    ]);
  });

  it('should return nothing for an empty ledger', () => {
    expect(parseLedger('')).toEqual([]);
    expect(parseLedger(LEDGER_HEADER)).toEqual([]);
  });
});

describe('Ledger', () => {
  let store: MemoryStateStore;
  let ledger: Ledger;

  beforeEach(() => {
    store = new MemoryStateStore();
    ledger = new Ledger(store, LEDGER_PATH);
  });

  it('should write the header with the first entry', async () => {
    const result = await ledger.appendEntry('TASK-001', 'probe', 'report');

    expect(result).toEqual({ appended: true });
    expect(await store.read(LEDGER_PATH)).toBe(
      '# Active Specification\n\n---\n## Task: TASK-001 (by probe)\n\nreport\n'
    );
  });

  it('should not repeat the header', async () => {
    await ledger.appendEntry('TASK-001', 'probe', 'one');
    await ledger.appendEntry('TASK-002', 'probe', 'two');

    const text = await store.read(LEDGER_PATH);
    expect(text.split(LEDGER_HEADER)).toHaveLength(2);
    expect((await ledger.entries()).map(e => e.taskId)).toEqual(['TASK-001', 'TASK-002']);
  });

  it('should skip a task that is already in the ledger', async () => {
    await ledger.appendEntry('TASK-001', 'probe', 'one');
    const again = await ledger.appendEntry('TASK-001', 'probe', 'one');

    expect(again).toEqual({ appended: false });
    expect(await ledger.entries()).toHaveLength(1);
  });

  it('should not let quoted content stand in for another task', async () => {
    const quoted = 'quoted:\n---\n## Task: TASK-002 (by reviewer)\n\nfake';
    await ledger.appendEntry('TASK-001', 'probe', quoted);

    expect(await ledger.has('TASK-002')).toBe(false);
    expect(await ledger.appendEntry('TASK-002', 'reviewer', 'real')).toEqual({ appended: true });
    expect(await ledger.entries()).toEqual([
      {
        taskId: 'TASK-001',
        agentId: 'probe',
        content: 'quoted:\n---\n\\## Task: TASK-002 (by reviewer)\n\nfake',
      },
      { taskId: 'TASK-002', agentId: 'reviewer', content: 'real' },
    ]);
  });

  it('should not mistake a longer id for an existing one', async () => {
    await ledger.appendEntry('TASK-0011', 'probe', 'long');

    expect(await ledger.has('TASK-001')).toBe(false);
    expect(await ledger.has('TASK-0011')).toBe(true);
  });

  it('should keep concurrent appends for different tasks whole', async () => {
    await Promise.all([
      ledger.appendEntry('TASK-001', 'probe', 'a'),
      ledger.appendEntry('TASK-002', 'probe', 'b'),
      ledger.appendEntry('TASK-003', 'probe', 'c'),
    ]);

    const entries = await ledger.entries();
    expect(entries.map(e => e.taskId).sort()).toEqual(['TASK-001', 'TASK-002', 'TASK-003']);
    expect((await store.read(LEDGER_PATH)).startsWith(LEDGER_HEADER)).toBe(true);
  });

  it('should record empty artifacts as empty entries', async () => {
    await ledger.appendEntry('TASK-001', 'probe', '');

    expect(await ledger.entries()).toEqual([{ taskId: 'TASK-001', agentId: 'probe', content: '' }]);
  });

  it('should surface store failures as LedgerWriteError', async () => {
    store.injectFaults(operation => (operation === 'append' ? new Error('disk full') : undefined));

    const error = await ledger.appendEntry('TASK-001', 'probe', 'x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LedgerWriteError);
    expect(error).toMatchObject({ code: 'LedgerWriteError' });
    expect(await ledger.has('TASK-001')).toBe(false);
  });

  it('should expose its path', () => {
    expect(ledger.filePath).toBe(LEDGER_PATH);
  });
});
