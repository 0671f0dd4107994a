/**
 * @module: EventDispatcher
 * @risk: high
 * @scope: core
 *
 * @description: Delivers named events to every subscribed listener in registration order.
 *
 * @impact
 * Risk: A listener failure must stay contained; otherwise one broken extension silences its siblings.
 */

import { HandlerError } from './errors.js';
import { describeError, logger } from './logger.js';

const dispatcherLogger = logger.child({ module: 'eventDispatcher' });

export type EventHandler = (payload: unknown) => void | Promise<void>;

export interface EventListener {
  /** Monotonic registration sequence; listeners fire in ascending id order. */
  readonly id: number;
  readonly event: string;
  readonly handler: EventHandler;
  readonly once: boolean;
}

export interface SubscribeOptions {
  /** Remove the listener before its first invocation. */
  once?: boolean;
}

/**
 * Subscription surface handed to extensions.
 */
export interface EventSubscriber {
  subscribe(event: string, handler: EventHandler, options?: SubscribeOptions): EventListener;
  unsubscribe(listener: EventListener): boolean;
}

/**
 * Fan-out of named events to listeners.
 * @class EventDispatcher
 */
export class EventDispatcher implements EventSubscriber {
  private listeners = new Map<string, EventListener[]>();
  private sequence = 0;

  /**
   * Appends a listener. The same handler may be subscribed more than once; it then fires once per subscription.
   */
  subscribe(event: string, handler: EventHandler, options: SubscribeOptions = {}): EventListener {
    const listener: EventListener = {
      id: ++this.sequence,
      event,
      handler,
      once: options.once ?? false
    };
    this.insert(listener);
    dispatcherLogger.debug(`Subscribed listener #${listener.id} to ${event}${listener.once ? ' (once)' : ''}`);
    return listener;
  }

  unsubscribe(listener: EventListener): boolean {
    const current = this.listeners.get(listener.event);
    const index = current?.indexOf(listener) ?? -1;
    if (!current || index === -1) {
      return false;
    }

    current.splice(index, 1);
    if (current.length === 0) {
      this.listeners.delete(listener.event);
    }
    return true;
  }

  /**
   * Puts a previously removed listener back at the position its id gives it.
   * @returns false if the listener is already subscribed
   */
  restore(listener: EventListener): boolean {
    if (this.listeners.get(listener.event)?.includes(listener)) {
      return false;
    }
    this.insert(listener);
    return true;
  }

  /**
   * Invokes each listener for `event` in order, awaiting one before the next.
   * Listeners added or removed while publishing take effect from the next publish.
   */
  async publish(event: string, payload: unknown): Promise<void> {
    const snapshot = [...(this.listeners.get(event) ?? [])];
    if (snapshot.length === 0) {
      return;
    }

    for (const listener of snapshot) {
      if (listener.once && !this.unsubscribe(listener)) {
        // Already fired from an overlapping publish.
        continue;
      }

      try {
        await listener.handler(payload);
      } catch (error) {
        const failure = new HandlerError(`event "${event}" (listener #${listener.id})`, error);
        dispatcherLogger.error(describeError(failure));
      }
    }
  }

  listenerCount(event?: string): number {
    if (event !== undefined) {
      return this.listeners.get(event)?.length ?? 0;
    }
    let total = 0;
    for (const current of this.listeners.values()) {
      total += current.length;
    }
    return total;
  }

  eventNames(): string[] {
    return [...this.listeners.keys()];
  }

  private insert(listener: EventListener): void {
    const current = this.listeners.get(listener.event) ?? [];
    const index = current.findIndex((existing) => existing.id > listener.id);
    if (index === -1) {
      current.push(listener);
    } else {
      current.splice(index, 0, listener);
    }
    this.listeners.set(listener.event, current);
  }
}
