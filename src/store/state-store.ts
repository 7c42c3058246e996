/**
 * State store - the file system as the only durability layer
 *
 * Every mutation goes through a temp file in the target's directory followed
 * by a rename, under a per-path lock, so a reader sees either the old or the
 * new content and never a partial write.
 */

import { open, readFile, rename, unlink, mkdir, readdir, access } from 'node:fs/promises';
import { dirname, join, relative, resolve, isAbsolute, sep } from 'node:path';
import { NotFoundError } from '../errors.js';
import { KeyedLock } from '../utils/semaphore.js';
import { logger } from '../utils/logger.js';

const log = logger.child('store');

export interface StateStore {
  /** Throws NotFoundError when the file does not exist. */
  read(path: string): Promise<string>;
  /** Replaces the whole file atomically, creating parent directories. */
  write(path: string, content: string): Promise<void>;
  /** Appends one block atomically: all of it lands or none of it does. */
  append(path: string, content: string): Promise<void>;
  /** Returns false when there was nothing to remove. */
  remove(path: string): Promise<boolean>;
  exists(path: string): Promise<boolean>;
  /** File names directly under a directory; empty when it is missing. */
  list(dir: string): Promise<string[]>;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isMissing(error: unknown): boolean {
  return isErrnoException(error) && error.code === 'ENOENT';
}

export class FileStateStore implements StateStore {
  private readonly root: string;
  private readonly locks = new KeyedLock('file');
  private tempCounter = 0;

  constructor(root: string) {
    this.root = resolve(root);
  }

  get rootDir(): string {
    return this.root;
  }

  /**
   * Resolve a workspace-relative path, refusing anything outside the root
   */
  resolvePath(path: string): string {
    const absolute = isAbsolute(path) ? resolve(path) : resolve(this.root, path);
    const rel = relative(this.root, absolute);
    if (rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
      throw new RangeError(`Path escapes the workspace: ${path}`);
    }
    return absolute;
  }

  async read(path: string): Promise<string> {
    const target = this.resolvePath(path);
    try {
      return await readFile(target, 'utf-8');
    } catch (error) {
      if (isMissing(error)) {
        throw new NotFoundError(path);
      }
      throw error;
    }
  }

  async write(path: string, content: string): Promise<void> {
    const target = this.resolvePath(path);
    await this.locks.run(target, () => this.replace(target, content));
    log.debug('File written', { path, bytes: Buffer.byteLength(content) });
  }

  async append(path: string, content: string): Promise<void> {
    const target = this.resolvePath(path);
    await this.locks.run(target, async () => {
      let current = '';
      try {
        current = await readFile(target, 'utf-8');
      } catch (error) {
        if (!isMissing(error)) throw error;
      }
      await this.replace(target, current + content);
    });
    log.debug('File appended', { path, bytes: Buffer.byteLength(content) });
  }

  async remove(path: string): Promise<boolean> {
    const target = this.resolvePath(path);
    return this.locks.run(target, async () => {
      try {
        await unlink(target);
        log.debug('File removed', { path });
        return true;
      } catch (error) {
        if (isMissing(error)) return false;
        throw error;
      }
    });
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(this.resolvePath(path));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }

  async list(dir: string): Promise<string[]> {
    try {
      const entries = await readdir(this.resolvePath(dir), { withFileTypes: true });
      return entries.filter(e => e.isFile()).map(e => e.name).sort();
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  /**
   * Write to a sibling temp file, fsync, rename over the target.
   * The handle is closed and a leftover temp file removed on every path.
   */
  private async replace(target: string, content: string): Promise<void> {
    const dir = dirname(target);
    await mkdir(dir, { recursive: true });

    const temp = join(dir, `.${process.pid}.${++this.tempCounter}.tmp`);
    let renamed = false;

    try {
      const handle = await open(temp, 'w');
      try {
        await handle.writeFile(content, 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(temp, target);
      renamed = true;
    } finally {
      if (!renamed) {
        await unlink(temp).catch((error: unknown) => {
          if (!isMissing(error)) {
            log.warn('Failed to remove temp file', { temp, error });
          }
        });
      }
    }
  }
}
