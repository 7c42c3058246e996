/**
 * Router - the coordinating agent
 *
 * Delegates NEW_TASK by capability, consolidates TASK_COMPLETE into the
 * ledger, records TASK_FAILED, and fails delegations that outlive the
 * completion timeout. It never runs two lifecycle steps for the same task
 * at once: every step after routing holds the task's consolidation lock.
 */

import type {
  Capability,
  MatchPolicy,
  MessageOf,
  Roster,
  Task,
} from '../types.js';
import type { EventBus } from '../coordination/event-bus.js';
import type { TaskRegistry } from '../coordination/task-registry.js';
import { DelegationQueue, type QueuedDelegation } from '../coordination/delegation-queue.js';
import type { StateStore } from '../store/state-store.js';
import { Ledger } from '../store/ledger.js';
import { artifactPath, parseArtifactFileName, type WorkspaceLayout } from '../store/paths.js';
import {
  ArtifactMissingError,
  DelegationTimeoutError,
  DispatchError,
  LedgerWriteError,
  NoCapableAgentError,
  NotFoundError,
  errorCode,
  toError,
} from '../errors.js';
import { AgentRuntime } from './runtime.js';
import { requiredCapabilities, selectAgent } from './roster.js';
import { KeyedLock } from '../utils/semaphore.js';
import { retryWithBackoff } from '../utils/retry.js';
import { logger } from '../utils/logger.js';

const log = logger.child('router');

const ROUTER_CAPABILITIES: Capability[] = ['task_routing', 'spec_consolidation', 'coordination'];

export const WORKER_FAILURE_CODE = 'WorkerFailure';

export interface RouterOptions {
  id?: string;
  bus: EventBus;
  registry: TaskRegistry;
  store: StateStore;
  layout: WorkspaceLayout;
  roster: Roster;
  matchPolicy?: MatchPolicy;
  completionTimeoutMs?: number;
  retryDelayMs?: number;
  /** Used when a payload names no capability and none were given */
  defaultCapabilities?: Capability[];
}

export type ConsolidationOutcome = 'completed' | 'failed' | 'ignored';

export interface RecoverySummary {
  routed: number;
  consolidated: number;
  redelegated: number;
  /** Leftover artifacts of completed tasks that were removed */
  cleaned: number;
}

export interface RouterStatus {
  delegated: number;
  activeDelegations: number;
  queuedDelegations: number;
  pendingOperations: number;
}

export class Router extends AgentRuntime {
  private readonly registry: TaskRegistry;
  private readonly store: StateStore;
  private readonly layout: WorkspaceLayout;
  private readonly roster: Roster;
  private readonly ledger: Ledger;
  private readonly matchPolicy: MatchPolicy;
  private readonly completionTimeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly defaultCapabilities: Capability[];
  private readonly queue = new DelegationQueue();
  private readonly taskLocks = new KeyedLock('task');
  private timers: Map<string, NodeJS.Timeout> = new Map();
  private pending: Set<Promise<unknown>> = new Set();

  constructor(options: RouterOptions) {
    const id = options.id ?? 'librarian';
    super({
      id,
      bus: options.bus,
      capabilities: options.roster.get(id) ?? ROUTER_CAPABILITIES,
    });

    this.registry = options.registry;
    this.store = options.store;
    this.layout = options.layout;
    this.roster = options.roster;
    this.ledger = new Ledger(options.store, options.layout.ledgerPath);
    this.matchPolicy = options.matchPolicy ?? 'superset';
    this.completionTimeoutMs = options.completionTimeoutMs ?? 300_000;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.defaultCapabilities = options.defaultCapabilities ?? [];

    this.on('NEW_TASK', message => this.handleNewTask(message));
    this.on('TASK_COMPLETE', message => this.track(this.handleTaskComplete(message)));
    this.on('TASK_FAILED', message => this.track(this.handleTaskFailed(message)));
  }

  // ==================== Routing ====================

  private handleNewTask(message: MessageOf<'NEW_TASK'>): void {
    const task = this.registry.get(message.task_id);
    if (!task) {
      log.warn('NEW_TASK for unknown task ignored', { taskId: message.task_id });
      return;
    }
    if (task.state !== 'SUBMITTED') {
      log.warn('NEW_TASK for task already routed ignored', { taskId: task.id, state: task.state });
      return;
    }

    this.route(task, message.capabilities);
  }

  /**
   * Capabilities a task needs: explicit ones first, then the tags its
   * payload names, then the configured default.
   */
  resolveCapabilities(payload: string, explicit?: readonly Capability[]): Capability[] {
    if (explicit && explicit.length > 0) return [...explicit];
    const named = requiredCapabilities(payload);
    return named.length > 0 ? named : [...this.defaultCapabilities];
  }

  /**
   * Pick the owner for a capability set; null when nobody qualifies
   */
  match(required: readonly Capability[]): string | null {
    return selectAgent(this.roster, required, {
      policy: this.matchPolicy,
      exclude: [this.id],
    });
  }

  private route(task: Task, explicit?: readonly Capability[]): void {
    const required = this.resolveCapabilities(
      task.payload,
      explicit && explicit.length > 0 ? explicit : task.capabilities
    );
    const agentId = this.match(required);

    if (!agentId) {
      const error = new NoCapableAgentError(required);
      log.warn('No capable agent, failing task', { taskId: task.id, required });
      this.registry.transition(task.id, 'FAILED', {
        failure: { code: error.code, reason: error.message },
      });
      return;
    }

    this.registry.transition(task.id, 'DELEGATED', { owner: agentId });

    const delegation = this.queue.offer(task.id, agentId, task.payload);
    if (delegation) {
      this.dispatch(delegation);
    } else {
      log.info('Agent busy, delegation queued', { taskId: task.id, agentId });
    }
  }

  private dispatch(delegation: QueuedDelegation): void {
    const { taskId, agentId } = delegation;
    this.startTimer(taskId, agentId);
    log.info('Delegating task', { taskId, agentId });
    const sent = this.publish({
      type: 'DELEGATED_TASK',
      to: agentId,
      task_id: taskId,
      payload: delegation.payload,
    });
    if (sent) return;

    // Nobody received the delegation
    this.clearTimer(taskId);
    const error = new DispatchError(taskId, agentId);
    log.error('Delegation rejected by the bus, failing task', { taskId, agentId });
    this.registry.transition(taskId, 'FAILED', {
      failure: { code: error.code, reason: error.message },
    });
    this.releaseAgent(taskId);
  }

  /**
   * Free the agent that owned a finished task and hand it the next one.
   * Waiting delegations whose task has since left DELEGATED are dropped.
   */
  private releaseAgent(taskId: string): void {
    let next = this.queue.release(taskId);
    while (next && !this.isCurrentDelegation(next)) {
      log.info('Stale delegation dropped', { taskId: next.taskId, agentId: next.agentId });
      next = this.queue.release(next.taskId);
    }
    if (next) {
      this.dispatch(next);
    }
  }

  private isCurrentDelegation(delegation: QueuedDelegation): boolean {
    const task = this.registry.get(delegation.taskId);
    return task?.state === 'DELEGATED' && task.owner === delegation.agentId;
  }

  // ==================== Timeouts ====================

  private startTimer(taskId: string, agentId: string): void {
    this.clearTimer(taskId);
    const timer = setTimeout(() => {
      this.timers.delete(taskId);
      this.track(this.handleTimeout(taskId, agentId));
    }, this.completionTimeoutMs);
    timer.unref();
    this.timers.set(taskId, timer);
  }

  private clearTimer(taskId: string): void {
    const timer = this.timers.get(taskId);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(taskId);
    }
  }

  private async handleTimeout(taskId: string, agentId: string): Promise<void> {
    await this.taskLocks.run(taskId, async () => {
      const task = this.registry.get(taskId);
      if (!task || task.state !== 'DELEGATED') return;

      const error = new DelegationTimeoutError(taskId, agentId, this.completionTimeoutMs);
      log.warn('Delegation timed out', { taskId, agentId, timeoutMs: this.completionTimeoutMs });
      this.registry.transition(taskId, 'FAILED', {
        failure: { code: error.code, reason: error.message },
      });
      this.releaseAgent(taskId);
    });
  }

  // ==================== Completion ====================

  private async handleTaskComplete(message: MessageOf<'TASK_COMPLETE'>): Promise<void> {
    await this.consolidate(message.agent_id, message.task_id);
  }

  private async handleTaskFailed(message: MessageOf<'TASK_FAILED'>): Promise<void> {
    const taskId = message.task_id;

    await this.taskLocks.run(taskId, async () => {
      const task = this.registry.get(taskId);
      if (!this.isOwnedDelegation(task, message.agent_id, 'TASK_FAILED')) return;

      this.clearTimer(taskId);
      // Any partial artifact stays where the worker left it
      this.registry.transition(taskId, 'FAILED', {
        failure: { code: WORKER_FAILURE_CODE, reason: message.reason },
      });
      this.releaseAgent(taskId);
    });
  }

  private isOwnedDelegation(
    task: Task | null,
    agentId: string,
    signal: 'TASK_COMPLETE' | 'TASK_FAILED'
  ): task is Task {
    if (!task) {
      log.warn(`${signal} for unknown task ignored`, { agentId });
      return false;
    }
    if (task.state !== 'DELEGATED') {
      log.info(`${signal} for task not in DELEGATED ignored`, { taskId: task.id, state: task.state, agentId });
      return false;
    }
    if (task.owner !== agentId) {
      log.warn(`${signal} from agent that does not own the task ignored`, {
        taskId: task.id,
        owner: task.owner,
        agentId,
      });
      return false;
    }
    return true;
  }

  /**
   * Read artifact → append to ledger → delete artifact → COMPLETED, as one
   * operation under the task's lock. One retry for a missing artifact or a
   * ledger write failure; after that the task is FAILED and the artifact
   * stays for manual recovery.
   */
  async consolidate(agentId: string, taskId: string): Promise<ConsolidationOutcome> {
    return this.taskLocks.run(taskId, async () => {
      const task = this.registry.get(taskId);
      if (!this.isOwnedDelegation(task, agentId, 'TASK_COMPLETE')) return 'ignored';

      this.clearTimer(taskId);

      try {
        await retryWithBackoff(() => this.consolidateOnce(agentId, taskId), {
          maxAttempts: 2,
          initialDelayMs: this.retryDelayMs,
          shouldRetry: error =>
            error instanceof ArtifactMissingError || error instanceof LedgerWriteError,
          label: `consolidate ${taskId}`,
        });
        return 'completed';
      } catch (error) {
        const failure = toError(error);
        log.error('Consolidation failed, artifact left in place', {
          taskId,
          agentId,
          error: failure,
        });
        this.registry.transition(taskId, 'FAILED', {
          failure: { code: errorCode(failure), reason: failure.message },
        });
        return 'failed';
      } finally {
        this.releaseAgent(taskId);
      }
    });
  }

  private async consolidateOnce(agentId: string, taskId: string): Promise<void> {
    const path = artifactPath(this.layout, agentId, taskId);

    let content: string | null = null;
    try {
      content = await this.store.read(path);
    } catch (error) {
      if (!(error instanceof NotFoundError)) throw error;
    }

    if (content === null) {
      // Appended by an earlier run that died before the state transition
      if (!(await this.ledger.has(taskId))) {
        throw new ArtifactMissingError(path);
      }
      log.info('Artifact already consolidated', { taskId, agentId });
    } else {
      await this.ledger.appendEntry(taskId, agentId, content);
      try {
        await this.store.remove(path);
      } catch (error) {
        // The ledger holds the entry; recovery removes the artifact later
        log.warn('Artifact deletion failed after consolidation', { taskId, path, error });
      }
    }

    this.registry.transition(taskId, 'COMPLETED');
  }

  // ==================== Recovery ====================

  /**
   * Bring every non-terminal task forward after a restart:
   * SUBMITTED tasks are routed, DELEGATED tasks whose artifact or ledger
   * entry exists are consolidated, the rest are delegated again. Artifacts
   * of tasks that completed while their deletion failed are removed.
   */
  async recover(): Promise<RecoverySummary> {
    const summary: RecoverySummary = { routed: 0, consolidated: 0, redelegated: 0, cleaned: 0 };

    for (const task of this.registry.list('SUBMITTED')) {
      this.route(task);
      summary.routed++;
    }

    for (const task of this.registry.list('DELEGATED')) {
      const owner = task.owner;
      // Routed a moment ago by the loop above, or already in flight
      if (!owner || this.queue.has(task.id) || this.timers.has(task.id)) continue;

      const hasArtifact = await this.store.exists(artifactPath(this.layout, owner, task.id));
      if (hasArtifact || (await this.ledger.has(task.id))) {
        // The owner's slot is taken until consolidate() releases it
        this.queue.offer(task.id, owner, task.payload);
        await this.consolidate(owner, task.id);
        summary.consolidated++;
        continue;
      }

      const delegation = this.queue.offer(task.id, owner, task.payload);
      if (delegation) {
        this.dispatch(delegation);
      }
      summary.redelegated++;
    }

    summary.cleaned = await this.sweepArtifacts();

    if (summary.routed + summary.consolidated + summary.redelegated + summary.cleaned > 0) {
      log.info('Recovered tasks', { ...summary });
    }
    return summary;
  }

  private async sweepArtifacts(): Promise<number> {
    let removed = 0;

    for (const name of await this.store.list(this.layout.logsDir)) {
      const artifact = parseArtifactFileName(name);
      if (!artifact) continue;

      const task = this.registry.get(artifact.taskId);
      if (!task || task.state !== 'COMPLETED' || task.owner !== artifact.agentId) continue;

      const path = artifactPath(this.layout, artifact.agentId, artifact.taskId);
      try {
        if (await this.store.remove(path)) removed++;
      } catch (error) {
        log.warn('Leftover artifact could not be removed', { taskId: task.id, path, error });
      }
    }

    return removed;
  }

  // ==================== Lifecycle ====================

  protected override async onStart(): Promise<void> {
    await this.recover();
  }

  protected override async onStop(): Promise<void> {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    await this.idle();
    this.queue.clear();
  }

  private track<T>(promise: Promise<T>): Promise<T> {
    const settled = promise.then(
      () => undefined,
      () => undefined
    );
    this.pending.add(settled);
    void settled.then(() => this.pending.delete(settled));
    return promise;
  }

  /**
   * Resolves once every completion, failure and timeout handler started so
   * far (and any they started in turn) has settled
   */
  async idle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(Array.from(this.pending));
    }
  }

  getStatus(): RouterStatus {
    const queue = this.queue.getStatus();
    return {
      delegated: this.registry.list('DELEGATED').length,
      activeDelegations: queue.active,
      queuedDelegations: queue.waiting,
      pendingOperations: this.pending.size,
    };
  }
}
