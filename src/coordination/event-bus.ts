/**
 * Event bus - typed, synchronous publish/subscribe between named agents
 *
 * Delivery happens in the caller's stack: publish() returns after every
 * matching handler has been invoked. Handlers may publish in turn; each
 * publish iterates over a snapshot of the handler list taken when it starts.
 *
 * There is no persistence. A message published while no handler is
 * registered for its type (or for its addressee) is dropped. Agents must be
 * started before they can observe anything; the bus does not buffer for them.
 */

import { EventEmitter } from 'node:events';
import type {
  Message,
  MessageHandler,
  MessageOf,
  MessageType,
  OutgoingMessage,
} from '../types.js';
import { MessageSchema } from '../utils/validation.js';
import { logger } from '../utils/logger.js';

const log = logger.child('bus');

interface Subscription {
  agentId: string;
  type: MessageType;
  handler: (message: Message) => void | Promise<void>;
}

export interface EventBusEvents {
  'message': (message: Message) => void;
  'dropped': (message: Message) => void;
  'error': (error: Error, message?: Message) => void;
}

export class EventBus extends EventEmitter {
  private messageCount = 0;
  private subscriptions: Subscription[] = [];

  constructor() {
    super();
    // The bus reports handler failures as events; an 'error' with no
    // listener would otherwise throw out of publish().
    this.on('error', (error: Error, message?: Message) => {
      log.error('Handler failed', {
        type: message?.type,
        taskId: message?.task_id,
        error,
      });
    });
  }

  /**
   * Deliver a message to every handler registered for its type
   * (or, when `to` is set, to that agent's handlers only).
   * Returns the frozen message that was delivered, or null when the
   * message failed validation.
   */
  publish(outgoing: OutgoingMessage): Readonly<Message> | null {
    const message: Message = Object.freeze({
      ...outgoing,
      timestamp: outgoing.timestamp ?? new Date().toISOString(),
    });

    const parsed = MessageSchema.safeParse(message);
    if (!parsed.success) {
      const errors = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
      this.emit('error', new Error(`Invalid message: ${errors.join('; ')}`), message);
      return null;
    }

    this.messageCount++;

    const targets = this.subscriptions.filter(
      sub => sub.type === message.type && (message.to === undefined || sub.agentId === message.to)
    );

    log.debug('Message published', {
      type: message.type,
      taskId: message.task_id,
      from: message.from,
      to: message.to,
      handlers: targets.length,
    });

    try {
      this.emit('message', message);
    } catch (error) {
      this.emit('error', error instanceof Error ? error : new Error(String(error)), message);
    }

    if (targets.length === 0) {
      log.debug('Message dropped', { type: message.type, taskId: message.task_id, to: message.to });
      this.emit('dropped', message);
      return message;
    }

    for (const sub of targets) {
      this.invoke(sub, message);
    }

    return message;
  }

  private invoke(sub: Subscription, message: Message): void {
    try {
      const result = sub.handler(message);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          this.emit('error', error instanceof Error ? error : new Error(String(error)), message);
        });
      }
    } catch (error) {
      this.emit('error', error instanceof Error ? error : new Error(String(error)), message);
    }
  }

  /**
   * Register a handler for one message type, owned by an agent identity.
   * Returns an unsubscribe function.
   */
  subscribe<T extends MessageType>(
    agentId: string,
    type: T,
    handler: MessageHandler<T>
  ): () => void {
    const sub: Subscription = {
      agentId,
      type,
      handler: (message) => {
        if (isMessageOf(message, type)) {
          return handler(message);
        }
      },
    };
    // Copy-on-write keeps snapshots taken by in-flight publishes intact
    this.subscriptions = [...this.subscriptions, sub];

    log.debug('Handler subscribed', { agentId, type });

    return () => {
      this.subscriptions = this.subscriptions.filter(s => s !== sub);
    };
  }

  /**
   * Observe every delivered message regardless of type
   */
  subscribeAll(callback: (message: Message) => void): () => void {
    this.on('message', callback);
    return () => this.off('message', callback);
  }

  /**
   * Remove every handler owned by an agent identity
   */
  unsubscribeAll(agentId: string): number {
    const before = this.subscriptions.length;
    this.subscriptions = this.subscriptions.filter(s => s.agentId !== agentId);
    const removed = before - this.subscriptions.length;
    if (removed > 0) {
      log.debug('Agent unsubscribed', { agentId, removed });
    }
    return removed;
  }

  getSubscriberCount(agentId?: string): number {
    if (agentId === undefined) {
      return new Set(this.subscriptions.map(s => s.agentId)).size;
    }
    return this.subscriptions.filter(s => s.agentId === agentId).length;
  }

  getMessageCount(): number {
    return this.messageCount;
  }

  clear(): void {
    this.subscriptions = [];
    this.removeAllListeners('message');
    this.removeAllListeners('dropped');
    log.debug('Bus cleared');
  }
}

function isMessageOf<T extends MessageType>(message: Message, type: T): message is MessageOf<T> {
  return message.type === type;
}

let busInstance: EventBus | null = null;

/**
 * Get or create the process-wide bus
 */
export function getEventBus(): EventBus {
  if (!busInstance) {
    busInstance = new EventBus();
  }
  return busInstance;
}

export function resetEventBus(): void {
  if (busInstance) {
    busInstance.clear();
    busInstance = null;
  }
}
