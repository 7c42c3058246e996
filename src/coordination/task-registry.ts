/**
 * Task registry - SQLite-backed task records and lifecycle state machine
 */

import Database from 'better-sqlite3';
import { EventEmitter } from 'node:events';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type {
  Capability,
  Task,
  TaskFailure,
  TaskState,
  TaskStatusSnapshot,
  TaskTransition,
} from '../types.js';
import { TERMINAL_STATES } from '../types.js';
import {
  DuplicateTaskIdentifierError,
  InvalidTransitionError,
  TaskNotFoundError,
} from '../errors.js';
import { isCapability } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const log = logger.child('registry');

const SCHEMA = `
CREATE TABLE IF NOT EXISTS tasks (
  id TEXT PRIMARY KEY,
  sequence INTEGER NOT NULL UNIQUE,
  payload TEXT NOT NULL,
  state TEXT NOT NULL DEFAULT 'SUBMITTED',
  owner TEXT,
  capabilities TEXT NOT NULL DEFAULT '[]',
  failure_code TEXT,
  failure_reason TEXT,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tasks_state ON tasks(state);

-- Append-only transition history
CREATE TABLE IF NOT EXISTS task_transitions (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  task_id TEXT NOT NULL,
  from_state TEXT,
  to_state TEXT NOT NULL,
  owner TEXT,
  reason TEXT,
  at INTEGER NOT NULL,
  FOREIGN KEY (task_id) REFERENCES tasks(id)
);

CREATE INDEX IF NOT EXISTS idx_transitions_task ON task_transitions(task_id);

CREATE TABLE IF NOT EXISTS sequences (
  name TEXT PRIMARY KEY,
  value INTEGER NOT NULL
);
`;

const ALLOWED_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  SUBMITTED: ['DELEGATED', 'FAILED'],
  DELEGATED: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
};

export function canTransition(from: TaskState, to: TaskState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function isTerminal(state: TaskState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface TaskIdFormat {
  prefix: string;
  width: number;
}

export function formatTaskId(sequence: number, format: TaskIdFormat): string {
  return `${format.prefix}-${String(sequence).padStart(format.width, '0')}`;
}

export interface TransitionOptions {
  owner?: string;
  failure?: TaskFailure;
}

export interface TaskRegistryEvents {
  'task:created': (task: Task) => void;
  'task:transitioned': (task: Task, transition: TaskTransition) => void;
  'task:terminal': (task: Task) => void;
}

export interface TaskRegistryOptions {
  idFormat?: Partial<TaskIdFormat>;
}

export class TaskRegistry extends EventEmitter {
  private db: Database.Database;
  private readonly dbPath: string;
  private readonly idFormat: TaskIdFormat;

  constructor(dbPath: string, options: TaskRegistryOptions = {}) {
    super();
    this.dbPath = dbPath;
    this.idFormat = {
      prefix: options.idFormat?.prefix ?? 'TASK',
      width: options.idFormat?.width ?? 3,
    };

    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(SCHEMA);

    log.debug('Task registry opened', { path: dbPath, maxSequence: this.maxSequence() });
  }

  get path(): string {
    return this.dbPath;
  }

  // ==================== Identifiers ====================

  /**
   * Reserve the next task sequence number and return its identifier.
   * The counter row is bumped inside a transaction and never drops below
   * the highest sequence already stored, so a lost counter row (or a copy
   * of the database without it) cannot hand out an id twice.
   */
  allocateId(): string {
    const next = this.transaction((db) => {
      const counter = db
        .prepare("SELECT value FROM sequences WHERE name = 'task'")
        .get() as SequenceRow | undefined;
      const value = Math.max(counter?.value ?? 0, this.maxSequence()) + 1;

      db.prepare(`
        INSERT INTO sequences (name, value) VALUES ('task', ?)
        ON CONFLICT(name) DO UPDATE SET value = excluded.value
      `).run(value);

      return value;
    });

    return formatTaskId(next, this.idFormat);
  }

  maxSequence(): number {
    const row = this.db
      .prepare('SELECT MAX(sequence) AS max FROM tasks')
      .get() as { max: number | null };
    return row.max ?? 0;
  }

  parseSequence(taskId: string): number | null {
    const prefix = `${this.idFormat.prefix}-`;
    if (!taskId.startsWith(prefix)) return null;
    const digits = taskId.slice(prefix.length);
    if (!/^\d+$/.test(digits)) return null;
    return Number.parseInt(digits, 10);
  }

  // ==================== Records ====================

  /**
   * Record a new task in SUBMITTED
   */
  create(taskId: string, payload: string, capabilities: Capability[] = []): Task {
    const sequence = this.parseSequence(taskId);
    if (sequence === null) {
      throw new TypeError(`Malformed task identifier: ${taskId}`);
    }

    const now = Date.now();

    const task = this.transaction((db) => {
      const existing = db
        .prepare('SELECT id FROM tasks WHERE id = ? OR sequence = ?')
        .get(taskId, sequence) as { id: string } | undefined;
      if (existing) {
        throw new DuplicateTaskIdentifierError(taskId);
      }

      db.prepare(`
        INSERT INTO tasks (id, sequence, payload, state, capabilities, created_at, updated_at)
        VALUES (?, ?, ?, 'SUBMITTED', ?, ?, ?)
      `).run(taskId, sequence, payload, JSON.stringify(capabilities), now, now);

      db.prepare(`
        INSERT INTO task_transitions (task_id, from_state, to_state, owner, at)
        VALUES (?, NULL, 'SUBMITTED', NULL, ?)
      `).run(taskId, now);

      return this.require(taskId);
    });

    log.info('Task created', { taskId, capabilities });
    this.emit('task:created', task);
    return task;
  }

  get(taskId: string): Task | null {
    const row = this.db
      .prepare('SELECT * FROM tasks WHERE id = ?')
      .get(taskId) as TaskRow | undefined;

    return row ? this.rowToTask(row) : null;
  }

  list(state?: TaskState): Task[] {
    const rows = state
      ? this.db.prepare('SELECT * FROM tasks WHERE state = ? ORDER BY sequence').all(state) as TaskRow[]
      : this.db.prepare('SELECT * FROM tasks ORDER BY sequence').all() as TaskRow[];
    return rows.map(row => this.rowToTask(row));
  }

  /**
   * Task id → state, in submission order
   */
  snapshot(): TaskStatusSnapshot {
    const rows = this.db
      .prepare('SELECT id, state FROM tasks ORDER BY sequence')
      .all() as Array<{ id: string; state: TaskState }>;

    const snapshot: TaskStatusSnapshot = {};
    for (const row of rows) {
      snapshot[row.id] = row.state;
    }
    return snapshot;
  }

  history(taskId: string): TaskTransition[] {
    const rows = this.db
      .prepare('SELECT * FROM task_transitions WHERE task_id = ? ORDER BY seq')
      .all(taskId) as TransitionRow[];

    return rows.map(row => ({
      taskId: row.task_id,
      from: row.from_state,
      to: row.to_state,
      owner: row.owner,
      reason: row.reason ?? undefined,
      at: new Date(row.at),
    }));
  }

  // ==================== Lifecycle ====================

  /**
   * Move a task forward. Only SUBMITTED→DELEGATED, SUBMITTED→FAILED,
   * DELEGATED→COMPLETED and DELEGATED→FAILED are accepted.
   */
  transition(taskId: string, to: TaskState, options: TransitionOptions = {}): Task {
    const now = Date.now();

    const { task, transition } = this.transaction((db) => {
      const current = this.get(taskId);
      if (!current) {
        throw new TaskNotFoundError(taskId);
      }
      if (!canTransition(current.state, to)) {
        throw new InvalidTransitionError(taskId, current.state, to);
      }

      const owner = options.owner ?? current.owner;

      db.prepare(`
        UPDATE tasks
        SET state = ?, owner = ?, failure_code = ?, failure_reason = ?, updated_at = ?
        WHERE id = ?
      `).run(
        to,
        owner,
        options.failure?.code ?? null,
        options.failure?.reason ?? null,
        now,
        taskId
      );

      db.prepare(`
        INSERT INTO task_transitions (task_id, from_state, to_state, owner, reason, at)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(taskId, current.state, to, owner, options.failure?.reason ?? null, now);

      const entry: TaskTransition = {
        taskId,
        from: current.state,
        to,
        owner,
        reason: options.failure?.reason,
        at: new Date(now),
      };

      return { task: this.require(taskId), transition: entry };
    });

    log.info('Task transitioned', {
      taskId,
      from: transition.from,
      to,
      owner: task.owner,
      ...(task.failure && { failure: task.failure.code }),
    });

    this.emit('task:transitioned', task, transition);
    if (isTerminal(to)) {
      this.emit('task:terminal', task);
    }

    return task;
  }

  private require(taskId: string): Task {
    const task = this.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }

  private rowToTask(row: TaskRow): Task {
    const parsed: unknown = JSON.parse(row.capabilities);
    const capabilities = Array.isArray(parsed)
      ? parsed.filter((tag): tag is Capability => typeof tag === 'string' && isCapability(tag))
      : [];

    return {
      id: row.id,
      sequence: row.sequence,
      payload: row.payload,
      state: row.state,
      owner: row.owner,
      capabilities,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      failure: row.failure_code
        ? { code: row.failure_code, reason: row.failure_reason ?? '' }
        : undefined,
    };
  }

  transaction<T>(fn: (db: Database.Database) => T): T {
    const transaction = this.db.transaction(fn);
    return transaction(this.db);
  }

  get isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      log.debug('Task registry closed', { path: this.dbPath });
    }
  }
}

// Row types for SQLite results
interface TaskRow {
  id: string;
  sequence: number;
  payload: string;
  state: TaskState;
  owner: string | null;
  capabilities: string;
  failure_code: string | null;
  failure_reason: string | null;
  created_at: number;
  updated_at: number;
}

interface TransitionRow {
  task_id: string;
  from_state: TaskState | null;
  to_state: TaskState;
  owner: string | null;
  reason: string | null;
  at: number;
}

interface SequenceRow {
  value: number;
}
