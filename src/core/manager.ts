/**
 * Manager - bootstraps the coordination core for one workspace
 *
 * Owns the store, the task registry and the bus, builds the router from the
 * roster and starts the registered workers. submitTask() and getStatus() are
 * the whole external API; everything else talks over the bus.
 */

import { resolve } from 'node:path';
import type {
  Capability,
  Roster,
  Task,
  TaskRelayConfig,
  TaskStatusSnapshot,
} from '../types.js';
import { EventBus } from '../coordination/event-bus.js';
import { TaskRegistry, isTerminal } from '../coordination/task-registry.js';
import { FileStateStore, type StateStore } from '../store/state-store.js';
import { layoutFromConfig, type WorkspaceLayout } from '../store/paths.js';
import { Router, type RouterStatus } from '../agents/router.js';
import type { AgentRuntime } from '../agents/runtime.js';
import { loadRoster } from '../agents/roster.js';
import {
  DuplicateAgentError,
  InvalidTaskInputError,
  ManagerNotRunningError,
  TaskNotFoundError,
  WaitTimeoutError,
} from '../errors.js';
import { SubmitTaskInputSchema, validate } from '../utils/validation.js';
import { getConfig } from '../utils/config.js';
import { logger } from '../utils/logger.js';

const log = logger.child('manager');

export const MANAGER_IDENTITY = 'manager';

export interface ManagerOptions {
  config?: TaskRelayConfig;
  /** Defaults to a FileStateStore rooted at the workspace */
  store?: StateStore;
  /** Defaults to the SQLite registry at workspace.registryPath */
  registry?: TaskRegistry;
  bus?: EventBus;
  /** Skips loading the roster document */
  roster?: Roster;
}

export interface SubmitOptions {
  capabilities?: Capability[];
}

export interface ManagerStatus {
  running: boolean;
  workspace: string;
  agents: ReturnType<AgentRuntime['describe']>[];
  router: RouterStatus | null;
}

export class Manager {
  readonly config: TaskRelayConfig;
  readonly layout: WorkspaceLayout;
  readonly store: StateStore;
  readonly bus: EventBus;
  private registry: TaskRegistry | null;
  private readonly ownsRegistry: boolean;
  private roster: Roster | null;
  private router: Router | null = null;
  private workers: Map<string, AgentRuntime> = new Map();
  private running = false;
  private starting: Promise<void> | null = null;

  constructor(options: ManagerOptions = {}) {
    this.config = options.config ?? getConfig();
    this.layout = layoutFromConfig(this.config);
    this.store = options.store ?? new FileStateStore(this.config.workspace.root);
    this.bus = options.bus ?? new EventBus();
    this.registry = options.registry ?? null;
    this.ownsRegistry = options.registry === undefined;
    this.roster = options.roster ?? null;
  }

  get workspaceRoot(): string {
    return this.config.workspace.root;
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ==================== Lifecycle ====================

  /**
   * Register a worker. When the manager is already running it starts now.
   */
  async registerAgent(agent: AgentRuntime): Promise<void> {
    if (this.workers.has(agent.id) || agent.id === this.config.router.identity) {
      throw new DuplicateAgentError(agent.id);
    }
    this.workers.set(agent.id, agent);

    if (this.roster && !this.roster.has(agent.id)) {
      log.warn('Registered agent is not in the roster and will never be delegated to', {
        agentId: agent.id,
      });
    }

    if (this.running) {
      await agent.start();
    }
  }

  /**
   * Start workers, then the router. The router recovers unfinished tasks
   * while starting and may re-delegate them, so workers go first.
   */
  async start(): Promise<void> {
    if (this.running) return;
    if (!this.starting) {
      this.starting = this.doStart().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async doStart(): Promise<void> {
    const registry = this.openRegistry();
    const roster = this.roster ?? await loadRoster(this.store, this.layout.rosterPath, this.config.roster);
    this.roster = roster;

    for (const [agentId] of this.workers) {
      if (!roster.has(agentId)) {
        log.warn('Registered agent is not in the roster and will never be delegated to', { agentId });
      }
    }

    const routerConfig = this.config.router;
    this.router = new Router({
      id: routerConfig.identity,
      bus: this.bus,
      registry,
      store: this.store,
      layout: this.layout,
      roster,
      matchPolicy: routerConfig.matchPolicy,
      completionTimeoutMs: routerConfig.completionTimeoutMs,
      retryDelayMs: routerConfig.retryDelayMs,
      defaultCapabilities: routerConfig.defaultCapabilities,
    });

    try {
      for (const worker of this.workers.values()) {
        await worker.start();
      }
      await this.router.start();
    } catch (error) {
      log.error('Startup failed, stopping agents', { error });
      await this.stopAgents();
      throw error;
    }

    this.running = true;
    log.info('Manager started', {
      workspace: this.workspaceRoot,
      agents: Array.from(roster.keys()),
      workers: Array.from(this.workers.keys()),
    });
  }

  /**
   * Stop the router and every worker, then close the registry the manager
   * opened. Safe when nothing was started.
   */
  async stop(): Promise<void> {
    if (this.starting) {
      await this.starting.catch(() => undefined);
    }

    await this.stopAgents();

    if (this.ownsRegistry && this.registry) {
      this.registry.close();
      this.registry = null;
    }

    if (this.running) {
      this.running = false;
      log.info('Manager stopped');
    }
  }

  private async stopAgents(): Promise<void> {
    // Router first: it drains in-flight consolidations before workers go away
    if (this.router) {
      await this.router.stop();
      this.router = null;
    }
    for (const worker of this.workers.values()) {
      await worker.stop();
    }
  }

  private openRegistry(): TaskRegistry {
    if (!this.registry) {
      this.registry = new TaskRegistry(resolve(this.workspaceRoot, this.layout.registryPath), {
        idFormat: { prefix: this.config.tasks.idPrefix, width: this.config.tasks.idWidth },
      });
    }
    return this.registry;
  }

  // ==================== Tasks ====================

  /**
   * Allocate an id, record the task and announce it. Returns the id without
   * waiting for completion.
   */
  submitTask(payload: string, options: SubmitOptions = {}): string {
    if (!this.running) {
      throw new ManagerNotRunningError();
    }

    const input = validate(SubmitTaskInputSchema, { payload, capabilities: options.capabilities });
    if (!input.success) {
      throw new InvalidTaskInputError(input.errors);
    }

    const registry = this.openRegistry();
    const capabilities = input.data.capabilities ?? [];
    const taskId = registry.allocateId();
    registry.create(taskId, input.data.payload, capabilities);

    log.info('Task submitted', { taskId });

    this.bus.publish({
      type: 'NEW_TASK',
      from: MANAGER_IDENTITY,
      task_id: taskId,
      payload: input.data.payload,
      ...(capabilities.length > 0 && { capabilities }),
    });

    return taskId;
  }

  /**
   * Task id → lifecycle state as recorded in the registry
   */
  getStatus(): TaskStatusSnapshot {
    return this.openRegistry().snapshot();
  }

  getTask(taskId: string): Task | null {
    return this.openRegistry().get(taskId);
  }

  /**
   * Resolve with the task once it reaches COMPLETED or FAILED
   */
  waitForTask(taskId: string, timeoutMs: number): Promise<Task> {
    const registry = this.openRegistry();
    const current = registry.get(taskId);
    if (!current) {
      return Promise.reject(new TaskNotFoundError(taskId));
    }
    if (isTerminal(current.state)) {
      return Promise.resolve(current);
    }

    return new Promise<Task>((resolvePromise, reject) => {
      const onTerminal = (task: Task): void => {
        if (task.id !== taskId) return;
        clearTimeout(timer);
        registry.off('task:terminal', onTerminal);
        resolvePromise(task);
      };

      const timer = setTimeout(() => {
        registry.off('task:terminal', onTerminal);
        reject(new WaitTimeoutError(taskId, timeoutMs));
      }, timeoutMs);

      registry.on('task:terminal', onTerminal);
    });
  }

  /**
   * Settle every router operation started so far
   */
  async idle(): Promise<void> {
    await this.router?.idle();
  }

  describe(): ManagerStatus {
    const agents = Array.from(this.workers.values()).map(worker => worker.describe());
    if (this.router) {
      agents.unshift(this.router.describe());
    }
    return {
      running: this.running,
      workspace: this.workspaceRoot,
      agents,
      router: this.router?.getStatus() ?? null,
    };
  }
}
