/**
 * Agent runtime - lifecycle wrapper binding an agent's handlers to the bus
 */

import type {
  AgentDescriptor,
  AgentLifecycle,
  AgentMessage,
  Capability,
  CapabilitySet,
  DelegatedTask,
  Message,
  MessageHandler,
  MessageOf,
  MessageType,
} from '../types.js';
import type { EventBus } from '../coordination/event-bus.js';
import type { StateStore } from '../store/state-store.js';
import { artifactPath, type WorkspaceLayout } from '../store/paths.js';
import { logger } from '../utils/logger.js';

const log = logger.child('runtime');

export interface AgentRuntimeOptions {
  id: string;
  bus: EventBus;
  capabilities?: Iterable<Capability>;
}

type Binding = (bus: EventBus) => void;

export class AgentRuntime {
  readonly id: string;
  readonly capabilities: CapabilitySet;
  protected readonly bus: EventBus;
  private status: AgentLifecycle = 'stopped';
  private bindings: Binding[] = [];

  constructor(options: AgentRuntimeOptions) {
    this.id = options.id;
    this.bus = options.bus;
    this.capabilities = new Set(options.capabilities ?? []);
  }

  /**
   * Declare a handler. It is subscribed on start() (or right away when the
   * agent is already running) and removed on stop().
   */
  on<T extends MessageType>(type: T, handler: MessageHandler<T>): this {
    const binding: Binding = (bus) => {
      bus.subscribe(this.id, type, handler);
    };
    this.bindings.push(binding);
    if (this.status === 'running') {
      binding(this.bus);
    }
    return this;
  }

  get lifecycle(): AgentLifecycle {
    return this.status;
  }

  get isRunning(): boolean {
    return this.status === 'running';
  }

  /**
   * Subscribe every declared handler under this agent's identity.
   * No-op when already running.
   */
  async start(): Promise<void> {
    if (this.status !== 'stopped') {
      return;
    }

    this.status = 'starting';
    try {
      // Handlers go live before onStart() so replies to anything it
      // publishes are not dropped
      for (const bind of this.bindings) {
        bind(this.bus);
      }
      await this.onStart();
      this.status = 'running';
    } catch (error) {
      this.bus.unsubscribeAll(this.id);
      this.status = 'stopped';
      throw error;
    }

    log.info('Agent started', { agentId: this.id, handlers: this.bindings.length });
  }

  /**
   * Drop every handler owned by this identity. No-op when already stopped.
   */
  async stop(): Promise<void> {
    if (this.status !== 'running') {
      return;
    }

    this.status = 'stopping';
    try {
      this.bus.unsubscribeAll(this.id);
      await this.onStop();
    } finally {
      this.status = 'stopped';
    }

    log.info('Agent stopped', { agentId: this.id });
  }

  publish(message: AgentMessage): Readonly<Message> | null {
    return this.bus.publish({ ...message, from: this.id });
  }

  describe(): AgentDescriptor {
    return {
      id: this.id,
      capabilities: Array.from(this.capabilities).sort(),
      status: this.status,
    };
  }

  protected async onStart(): Promise<void> {}

  protected async onStop(): Promise<void> {}
}

export interface WorkerOptions extends AgentRuntimeOptions {
  store: StateStore;
  layout: WorkspaceLayout;
}

/**
 * A worker accepts delegated tasks, writes its artifact and signals
 * completion. Anything perform() throws becomes TASK_FAILED.
 */
export abstract class Worker extends AgentRuntime {
  protected readonly store: StateStore;
  protected readonly layout: WorkspaceLayout;

  constructor(options: WorkerOptions) {
    super(options);
    this.store = options.store;
    this.layout = options.layout;
    this.on('DELEGATED_TASK', message => this.handleDelegated(message));
  }

  protected abstract perform(task: DelegatedTask): Promise<string>;

  private async handleDelegated(message: MessageOf<'DELEGATED_TASK'>): Promise<void> {
    if (message.to !== undefined && message.to !== this.id) {
      return;
    }

    const taskId = message.task_id;
    log.info('Delegated task received', { agentId: this.id, taskId });

    try {
      const content = await this.perform({ taskId, payload: message.payload });
      await this.store.write(artifactPath(this.layout, this.id, taskId), content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.warn('Task failed in worker', { agentId: this.id, taskId, error: reason });
      this.publish({ type: 'TASK_FAILED', agent_id: this.id, task_id: taskId, reason });
      return;
    }

    this.publish({ type: 'TASK_COMPLETE', agent_id: this.id, task_id: taskId });
  }
}
