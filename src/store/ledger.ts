/**
 * Consolidated ledger - append-only record of every consolidated artifact
 *
 * Layout:
 *
 *   # Active Specification
 *
 *   ---
 *   ## Task: TASK-001 (by probe)
 *
 *   <artifact content>
 *
 * The `## Task: <id> (by <agent>)` heading after a `---` rule is the per-task
 * marker. An entry whose marker is already present is never written again.
 * Content lines starting with `## Task:` are written as `\## Task:` so an
 * artifact cannot forge another task's marker.
 */

import type { LedgerEntry } from '../types.js';
import { LedgerWriteError, NotFoundError } from '../errors.js';
import { Semaphore } from '../utils/semaphore.js';
import type { StateStore } from './state-store.js';
import { logger } from '../utils/logger.js';

const log = logger.child('ledger');

export const LEDGER_HEADER = '# Active Specification\n';

const ENTRY_PATTERN = /\n---\n## Task: (\S+) \(by ([^)\n]+)\)\n\n/g;
const MARKER_LINE = /^(## Task:)/gm;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function formatEntry(taskId: string, agentId: string, content: string): string {
  const body = content.trimEnd().replace(MARKER_LINE, '\\$1');
  return `\n---\n## Task: ${taskId} (by ${agentId})\n\n${body}\n`;
}

export function parseLedger(text: string): LedgerEntry[] {
  const matches = Array.from(text.matchAll(ENTRY_PATTERN));
  const entries: LedgerEntry[] = [];

  matches.forEach((match, i) => {
    const start = (match.index ?? 0) + match[0].length;
    const next = matches[i + 1];
    const end = next?.index ?? text.length;
    entries.push({
      taskId: match[1] ?? '',
      agentId: match[2] ?? '',
      content: text.slice(start, end).replace(/\n$/, ''),
    });
  });

  return entries;
}

export interface AppendResult {
  appended: boolean;
}

export class Ledger {
  private readonly store: StateStore;
  private readonly path: string;
  // Appends for different tasks still target one file
  private readonly fileLock = new Semaphore('ledger', 1);

  constructor(store: StateStore, path: string) {
    this.store = store;
    this.path = path;
  }

  get filePath(): string {
    return this.path;
  }

  private async readText(): Promise<string> {
    try {
      return await this.store.read(this.path);
    } catch (error) {
      if (error instanceof NotFoundError) return '';
      throw error;
    }
  }

  async has(taskId: string): Promise<boolean> {
    const text = await this.readText();
    return containsMarker(text, taskId);
  }

  /**
   * Append one task's artifact. Skips (appended: false) when the task's
   * marker is already in the ledger. Store failures surface as
   * LedgerWriteError.
   */
  async appendEntry(taskId: string, agentId: string, content: string): Promise<AppendResult> {
    return this.fileLock.execute(async () => {
      let text: string;
      try {
        text = await this.readText();
      } catch (error) {
        throw new LedgerWriteError(`Cannot read ledger ${this.path}`, error);
      }

      if (containsMarker(text, taskId)) {
        log.info('Ledger already holds task, skipping append', { taskId });
        return { appended: false };
      }

      const block = (text === '' ? LEDGER_HEADER : '') + formatEntry(taskId, agentId, content);

      try {
        await this.store.append(this.path, block);
      } catch (error) {
        throw new LedgerWriteError(
          `Cannot append ${taskId} to ledger ${this.path}: ${error instanceof Error ? error.message : String(error)}`,
          error
        );
      }

      log.info('Ledger entry appended', { taskId, agentId });
      return { appended: true };
    });
  }

  async entries(): Promise<LedgerEntry[]> {
    return parseLedger(await this.readText());
  }
}

function containsMarker(text: string, taskId: string): boolean {
  return new RegExp(`\\n---\\n## Task: ${escapeRegExp(taskId)} \\(by `).test(text);
}
