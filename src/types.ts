/**
 * Core types for taskrelay
 */

// Capability tags
export const CAPABILITIES = [
  'task_routing',
  'spec_consolidation',
  'coordination',
  'probe',
  'spec_generation',
  'code_review',
  'testing',
  'research',
  'documentation',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export type CapabilitySet = ReadonlySet<Capability>;

/**
 * Identity → capability set. Loaded once, never mutated afterwards.
 */
export type Roster = ReadonlyMap<string, CapabilitySet>;

export type MatchPolicy = 'superset' | 'intersect';

// Task types
export type TaskState = 'SUBMITTED' | 'DELEGATED' | 'COMPLETED' | 'FAILED';

export const TERMINAL_STATES: ReadonlySet<TaskState> = new Set<TaskState>(['COMPLETED', 'FAILED']);

export interface TaskFailure {
  code: string;
  reason: string;
}

export interface Task {
  id: string;
  sequence: number;
  payload: string;
  state: TaskState;
  owner: string | null;
  capabilities: Capability[];
  createdAt: Date;
  updatedAt: Date;
  failure?: TaskFailure;
}

export interface TaskTransition {
  taskId: string;
  from: TaskState | null;
  to: TaskState;
  owner: string | null;
  reason?: string;
  at: Date;
}

export type TaskStatusSnapshot = Record<string, TaskState>;

// Message types
export type MessageType = 'NEW_TASK' | 'DELEGATED_TASK' | 'TASK_COMPLETE' | 'TASK_FAILED';

interface MessageEnvelope {
  from: string;
  to?: string; // undefined = every handler of the type
  timestamp: string;
}

export interface NewTaskMessage extends MessageEnvelope {
  type: 'NEW_TASK';
  task_id: string;
  payload: string;
  capabilities?: Capability[];
}

export interface DelegatedTaskMessage extends MessageEnvelope {
  type: 'DELEGATED_TASK';
  task_id: string;
  payload: string;
}

export interface TaskCompleteMessage extends MessageEnvelope {
  type: 'TASK_COMPLETE';
  agent_id: string;
  task_id: string;
}

export interface TaskFailedMessage extends MessageEnvelope {
  type: 'TASK_FAILED';
  agent_id: string;
  task_id: string;
  reason: string;
}

export type Message =
  | NewTaskMessage
  | DelegatedTaskMessage
  | TaskCompleteMessage
  | TaskFailedMessage;

export type MessageOf<T extends MessageType> = Extract<Message, { type: T }>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * What a caller hands to publish(); the bus stamps the timestamp.
 */
export type OutgoingMessage = DistributiveOmit<Message, 'timestamp'> & { timestamp?: string };

/**
 * What an agent hands to its runtime; the runtime stamps `from`.
 */
export type AgentMessage = DistributiveOmit<Message, 'timestamp' | 'from'>;

export type MessageHandler<T extends MessageType = MessageType> = (
  message: MessageOf<T>
) => void | Promise<void>;

// Agent types
export type AgentLifecycle = 'stopped' | 'starting' | 'running' | 'stopping';

export interface AgentDescriptor {
  id: string;
  capabilities: Capability[];
  status: AgentLifecycle;
}

export interface DelegatedTask {
  taskId: string;
  payload: string;
}

// Ledger types
export interface LedgerEntry {
  taskId: string;
  agentId: string;
  content: string;
}

// Configuration types
export interface TaskRelayConfig {
  version: string;
  workspace: {
    root: string;
    logsDir: string;
    ledgerFile: string;
    rosterPath: string;
    registryPath: string;
  };
  tasks: {
    idPrefix: string;
    idWidth: number;
  };
  router: {
    identity: string;
    matchPolicy: MatchPolicy;
    completionTimeoutMs: number;
    retryDelayMs: number;
    defaultCapabilities: Capability[];
  };
  roster?: {
    agents: Record<string, { capabilities: string[]; permissions?: string[] }>;
  };
}
