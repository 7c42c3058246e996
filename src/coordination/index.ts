/**
 * Coordination module exports
 */

export { EventBus, getEventBus, resetEventBus } from './event-bus.js';
export {
  TaskRegistry,
  canTransition,
  isTerminal,
  formatTaskId,
  type TaskIdFormat,
  type TransitionOptions,
  type TaskRegistryOptions,
} from './task-registry.js';
export { DelegationQueue, type QueuedDelegation } from './delegation-queue.js';
