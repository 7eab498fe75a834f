import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';

import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type {
  BaseEvent,
  RemedyEvent,
  RemedyEventMap,
  RemedyEventType,
  EventHandler,
  EventSubscription
} from './types';

function generateSubscriptionId(): string {
  return `subscription:${randomUUID()}`;
}

function isEventOfType<K extends RemedyEventType>(
  event: BaseEvent,
  eventType: K
): event is RemedyEventMap[K] {
  return event.type === eventType;
}

/**
 * Event Stream interface - contract for bus implementations
 */
export interface IEventStream {
  /**
   * Publish an event to the bus
   */
  publish(event: RemedyEvent): void;

  /**
   * Subscribe to events of a specific type
   */
  subscribe<K extends RemedyEventType>(
    eventType: K,
    handler: EventHandler<RemedyEventMap[K]>,
    subscriberName?: string
  ): EventSubscription;

  /**
   * Subscribe to every event (monitoring, audit)
   */
  subscribeAll(handler: EventHandler<RemedyEvent>, subscriberName?: string): EventSubscription;

  /**
   * Unsubscribe from events
   */
  unsubscribe(subscriptionId: string): boolean;

  /**
   * Get all active subscriptions
   */
  getSubscriptions(): EventSubscription[];

  /**
   * Clear all subscriptions (for testing/cleanup)
   */
  clearSubscriptions(): void;

  /**
   * Wait for all pending event handlers to complete
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

export type EventBusDependencies = {
  logger?: Logger;
};

type Registration = {
  subscription: EventSubscription;
  listener: (event: RemedyEvent) => void;
};

/**
 * In-process EventBus using Node.js EventEmitter
 *
 * Producers (adapters) publish after their state change is committed.
 * Handlers run in the background: a failing handler is logged and never
 * reaches the publisher. Callers that need the side effects to have
 * happened (tests, the CLI before exit) await waitForIdle().
 */
export class EventBus implements IEventStream {
  private emitter: EventEmitter;
  private registrations: Map<string, Registration>;
  private pendingHandlers: Set<Promise<void>>;
  private logger: Logger;

  constructor(dependencies: EventBusDependencies = {}) {
    this.emitter = new EventEmitter();
    this.registrations = new Map();
    this.pendingHandlers = new Set();
    this.logger = dependencies.logger ?? createLogger('[EventBus] ');

    this.emitter.setMaxListeners(100);
  }

  /**
   * Publish an event to all subscribers
   */
  publish(event: RemedyEvent): void {
    if (!event.type || typeof event.type !== 'string') {
      throw new Error('Event must have a valid type string');
    }

    if (!event.timestamp || typeof event.timestamp !== 'number') {
      throw new Error('Event must have a valid timestamp number');
    }

    if (!event.source || typeof event.source !== 'string') {
      throw new Error('Event must have a valid source string');
    }

    this.logger.debug(`publish ${event.type} from ${event.source}`);

    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event);
  }

  subscribe<K extends RemedyEventType>(
    eventType: K,
    handler: EventHandler<RemedyEventMap[K]>,
    subscriberName?: string
  ): EventSubscription {
    return this.register(eventType, subscriberName, (event) => {
      if (isEventOfType(event, eventType)) {
        this.track(eventType, () => handler(event));
      }
    });
  }

  subscribeAll(handler: EventHandler<RemedyEvent>, subscriberName?: string): EventSubscription {
    return this.register('*', subscriberName, (event) => {
      this.track('*', () => handler(event));
    });
  }

  /**
   * @returns true if subscription was found and removed, false otherwise
   */
  unsubscribe(subscriptionId: string): boolean {
    const registration = this.registrations.get(subscriptionId);
    if (!registration) {
      return false;
    }

    this.emitter.removeListener(registration.subscription.eventType, registration.listener);
    this.registrations.delete(subscriptionId);

    return true;
  }

  getSubscriptions(): EventSubscription[] {
    return Array.from(this.registrations.values()).map(r => r.subscription);
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.registrations.clear();
  }

  getSubscriptionCount(eventType: RemedyEventType | '*'): number {
    return this.emitter.listenerCount(eventType);
  }

  /**
   * Wait for all pending event handlers to complete
   *
   * @example
   * ```typescript
   * await reviewAdapter.castVote(...);   // publishes report.finalized
   * await eventBus.waitForIdle();        // notifications have been sent
   * expect(notifier.sent).toHaveLength(1);
   * ```
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const startTime = Date.now();

    while (this.pendingHandlers.size > 0) {
      if (Date.now() - startTime > timeout) {
        this.logger.warn(`waitForIdle() timeout after ${timeout}ms with ${this.pendingHandlers.size} handlers still pending`);
        break;
      }

      await Promise.race([
        Promise.all(Array.from(this.pendingHandlers)),
        new Promise(resolve => setTimeout(resolve, 10)) // Re-check every 10ms
      ]);
    }
  }

  private register(
    eventType: RemedyEventType | '*',
    subscriberName: string | undefined,
    listener: (event: RemedyEvent) => void
  ): EventSubscription {
    const subscription: EventSubscription = {
      id: generateSubscriptionId(),
      eventType,
      metadata: {
        createdAt: Date.now(),
        subscriberName,
      },
    };

    this.emitter.on(eventType, listener);
    this.registrations.set(subscription.id, { subscription, listener });

    return subscription;
  }

  /**
   * Runs a handler in the background and tracks it until it settles.
   */
  private track(eventType: string, run: () => void | Promise<void>): void {
    const handlerPromise = (async () => {
      try {
        await run();
      } catch (error) {
        this.logger.error(`Error in event handler for ${eventType}:`, error);
      }
    })();

    this.pendingHandlers.add(handlerPromise);
    void handlerPromise.finally(() => {
      this.pendingHandlers.delete(handlerPromise);
    });
  }
}
