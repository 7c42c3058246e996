/**
 * Error taxonomy for the coordination core
 */

export class TaskRelayError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
    this.name = code;
  }
}

/**
 * No roster entry matches the required capability. Fails fast, never retried.
 */
export class NoCapableAgentError extends TaskRelayError {
  readonly capabilities: readonly string[];

  constructor(capabilities: readonly string[]) {
    super(
      'NoCapableAgentError',
      capabilities.length > 0
        ? `No agent in the roster provides: ${capabilities.join(', ')}`
        : 'Task payload names no known capability'
    );
    this.capabilities = capabilities;
  }
}

/**
 * Completion signal received but the worker's artifact is absent.
 */
export class ArtifactMissingError extends TaskRelayError {
  readonly path: string;

  constructor(path: string) {
    super('ArtifactMissingError', `Artifact not found: ${path}`);
    this.path = path;
  }
}

export class LedgerWriteError extends TaskRelayError {
  constructor(message: string, cause?: unknown) {
    super('LedgerWriteError', message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * The id sequence handed out an identifier that already exists. Fatal: the
 * registry is corrupt.
 */
export class DuplicateTaskIdentifierError extends TaskRelayError {
  readonly taskId: string;

  constructor(taskId: string) {
    super('DuplicateTaskIdentifierError', `Task identifier already allocated: ${taskId}`);
    this.taskId = taskId;
  }
}

export class InvalidTransitionError extends TaskRelayError {
  constructor(taskId: string, from: string, to: string) {
    super('InvalidTransitionError', `Task ${taskId} cannot move from ${from} to ${to}`);
  }
}

export class TaskNotFoundError extends TaskRelayError {
  constructor(taskId: string) {
    super('TaskNotFoundError', `Task not found: ${taskId}`);
  }
}

export class NotFoundError extends TaskRelayError {
  readonly path: string;

  constructor(path: string) {
    super('NotFoundError', `File not found: ${path}`);
    this.path = path;
  }
}

export class DelegationTimeoutError extends TaskRelayError {
  constructor(taskId: string, agentId: string, timeoutMs: number) {
    super(
      'DelegationTimeoutError',
      `Agent ${agentId} did not finish ${taskId} within ${timeoutMs}ms`
    );
  }
}

/**
 * The bus rejected the DELEGATED_TASK message, so no worker received it.
 */
export class DispatchError extends TaskRelayError {
  constructor(taskId: string, agentId: string) {
    super('DispatchError', `Delegation of ${taskId} to ${agentId} could not be published`);
  }
}

export class ManagerNotRunningError extends TaskRelayError {
  constructor() {
    super('ManagerNotRunningError', 'Manager is not running. Call start() first.');
  }
}

export class InvalidTaskInputError extends TaskRelayError {
  readonly errors: readonly string[];

  constructor(errors: readonly string[]) {
    super('InvalidTaskInputError', `Invalid task input: ${errors.join('; ')}`);
    this.errors = errors;
  }
}

export class WaitTimeoutError extends TaskRelayError {
  constructor(taskId: string, timeoutMs: number) {
    super('WaitTimeoutError', `Task ${taskId} did not reach a terminal state within ${timeoutMs}ms`);
  }
}

export class DuplicateAgentError extends TaskRelayError {
  constructor(agentId: string) {
    super('DuplicateAgentError', `Agent already registered: ${agentId}`);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function errorCode(error: unknown): string {
  if (error instanceof TaskRelayError) return error.code;
  if (error instanceof Error) return error.name;
  return 'Error';
}
