/**
 * @description Base event class for listeners an extension subscribes through its host, plus the event names the host publishes.
 * @scope interface
 * @module EventBase
 * @risk: moderate - Event wiring issues can prevent handlers from firing.
 */

import { Events } from 'discord.js';
import type { EventListener, EventSubscriber } from '../utils/eventDispatcher.js';

/**
 * Events the bot host publishes. The first three carry the discord.js names of the client events they forward.
 */
export const HostEvents = {
  Ready: Events.ClientReady,
  GuildCreated: Events.GuildCreate,
  MessageCreated: Events.MessageCreate,
  ComponentInteraction: 'componentInteraction',
  CommandError: 'commandError'
} as const;
export type HostEventName = (typeof HostEvents)[keyof typeof HostEvents];

/**
 * Abstract base class for event listeners.
 * @abstract
 * @class Event
 */
export abstract class Event<TPayload = unknown> {
  /** The name of the event to listen for */
  public readonly name: string;

  /** Whether the event should only be handled once */
  public readonly once: boolean;

  constructor(options: { name: string; once?: boolean }) {
    this.name = options.name;
    this.once = options.once ?? false;
  }

  /**
   * Narrows the published payload; events whose payload does not match are skipped.
   */
  protected abstract accepts(payload: unknown): payload is TPayload;

  public abstract execute(payload: TPayload): Promise<void> | void;

  /**
   * Subscribes the event with a dispatcher.
   */
  public register(subscriber: EventSubscriber): EventListener {
    return subscriber.subscribe(
      this.name,
      (payload) => (this.accepts(payload) ? this.execute(payload) : undefined),
      { once: this.once }
    );
  }
}
