/**
 * Delegation queue - one active task per agent, FIFO behind it
 */

import { EventEmitter } from 'node:events';
import { logger } from '../utils/logger.js';

const log = logger.child('queue');

export interface QueuedDelegation {
  taskId: string;
  agentId: string;
  payload: string;
  addedAt: Date;
}

export interface DelegationQueueEvents {
  'delegation:queued': (delegation: QueuedDelegation, position: number) => void;
  'delegation:active': (delegation: QueuedDelegation) => void;
  'delegation:released': (delegation: QueuedDelegation) => void;
}

export class DelegationQueue extends EventEmitter {
  private active: Map<string, QueuedDelegation> = new Map(); // agentId -> delegation
  private waiting: Map<string, QueuedDelegation[]> = new Map(); // agentId -> FIFO

  /**
   * Offer a delegation. Returns it when the agent was idle and the caller
   * should dispatch now, null when it was queued behind the active task.
   */
  offer(taskId: string, agentId: string, payload: string): QueuedDelegation | null {
    const delegation: QueuedDelegation = { taskId, agentId, payload, addedAt: new Date() };

    if (!this.active.has(agentId)) {
      this.active.set(agentId, delegation);
      this.emit('delegation:active', delegation);
      log.debug('Delegation active', { taskId, agentId });
      return delegation;
    }

    const queue = this.waiting.get(agentId) ?? [];
    queue.push(delegation);
    this.waiting.set(agentId, queue);

    this.emit('delegation:queued', delegation, queue.length);
    log.debug('Delegation queued', { taskId, agentId, position: queue.length });
    return null;
  }

  /**
   * Drop a task wherever it sits. When it was the agent's active task the
   * next waiting delegation becomes active and is returned for dispatch.
   */
  release(taskId: string): QueuedDelegation | null {
    for (const [agentId, delegation] of this.active) {
      if (delegation.taskId !== taskId) continue;

      this.active.delete(agentId);
      this.emit('delegation:released', delegation);
      log.debug('Delegation released', { taskId, agentId });

      const queue = this.waiting.get(agentId);
      const next = queue?.shift();
      if (queue && queue.length === 0) {
        this.waiting.delete(agentId);
      }
      if (next) {
        this.active.set(agentId, next);
        this.emit('delegation:active', next);
        log.debug('Delegation active', { taskId: next.taskId, agentId });
        return next;
      }
      return null;
    }

    for (const [agentId, queue] of this.waiting) {
      const index = queue.findIndex(d => d.taskId === taskId);
      if (index === -1) continue;
      queue.splice(index, 1);
      if (queue.length === 0) {
        this.waiting.delete(agentId);
      }
      log.debug('Waiting delegation dropped', { taskId, agentId });
      return null;
    }

    return null;
  }

  activeTask(agentId: string): string | null {
    return this.active.get(agentId)?.taskId ?? null;
  }

  isActive(taskId: string): boolean {
    for (const delegation of this.active.values()) {
      if (delegation.taskId === taskId) return true;
    }
    return false;
  }

  /**
   * Whether the task is held anywhere, active or waiting
   */
  has(taskId: string): boolean {
    if (this.isActive(taskId)) return true;
    for (const queue of this.waiting.values()) {
      if (queue.some(d => d.taskId === taskId)) return true;
    }
    return false;
  }

  waitingFor(agentId: string): QueuedDelegation[] {
    return [...(this.waiting.get(agentId) ?? [])];
  }

  getStatus(): { active: number; waiting: number } {
    let waiting = 0;
    for (const queue of this.waiting.values()) {
      waiting += queue.length;
    }
    return { active: this.active.size, waiting };
  }

  clear(): void {
    this.active.clear();
    this.waiting.clear();
    log.debug('Queue cleared');
  }
}
