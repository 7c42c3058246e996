/**
 * In-memory state store with the same contract as FileStateStore
 */

import { posix } from 'node:path';
import { NotFoundError } from '../errors.js';
import type { StateStore } from './state-store.js';

export type StoreOperation = 'read' | 'write' | 'append' | 'remove';

/**
 * Returns an error to make the operation fail, or undefined to let it run.
 */
export type FaultInjector = (operation: StoreOperation, path: string) => Error | undefined;

export class MemoryStateStore implements StateStore {
  private files: Map<string, string> = new Map();
  private faults: FaultInjector | null = null;

  constructor(initial: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(initial)) {
      this.files.set(normalize(path), content);
    }
  }

  /**
   * Install a fault injector; pass null to remove it
   */
  injectFaults(injector: FaultInjector | null): void {
    this.faults = injector;
  }

  private check(operation: StoreOperation, path: string): void {
    const error = this.faults?.(operation, path);
    if (error) throw error;
  }

  async read(path: string): Promise<string> {
    const key = normalize(path);
    this.check('read', key);
    const content = this.files.get(key);
    if (content === undefined) {
      throw new NotFoundError(path);
    }
    return content;
  }

  async write(path: string, content: string): Promise<void> {
    const key = normalize(path);
    this.check('write', key);
    this.files.set(key, content);
  }

  async append(path: string, content: string): Promise<void> {
    const key = normalize(path);
    this.check('append', key);
    this.files.set(key, (this.files.get(key) ?? '') + content);
  }

  async remove(path: string): Promise<boolean> {
    const key = normalize(path);
    this.check('remove', key);
    return this.files.delete(key);
  }

  async exists(path: string): Promise<boolean> {
    return this.files.has(normalize(path));
  }

  async list(dir: string): Promise<string[]> {
    const prefix = `${normalize(dir)}/`;
    const names: string[] = [];
    for (const key of this.files.keys()) {
      if (key.startsWith(prefix) && !key.slice(prefix.length).includes('/')) {
        names.push(key.slice(prefix.length));
      }
    }
    return names.sort();
  }

  /**
   * Every stored path, for assertions
   */
  paths(): string[] {
    return Array.from(this.files.keys()).sort();
  }
}

function normalize(path: string): string {
  return posix.normalize(path.replace(/\\/g, '/')).replace(/^\.\//, '').replace(/\/$/, '');
}
