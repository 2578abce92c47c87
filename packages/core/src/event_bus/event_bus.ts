import { EventEmitter } from 'events';

import type {
  BaseEvent,
  ConversionEvent,
  EventHandler,
  EventSubscription
} from './types';

let subscriptionCounter = 0;

function generateSubscriptionId(): string {
  subscriptionCounter += 1;
  return `subscription:${Date.now()}-${subscriptionCounter}`;
}

/**
 * Event Stream interface - Contract for event bus implementations
 */
export interface IEventStream {
  publish(event: BaseEvent): void;

  subscribe<T extends BaseEvent = BaseEvent>(
    eventType: T['type'],
    handler: EventHandler<T>
  ): EventSubscription;

  unsubscribe(subscriptionId: string): boolean;

  getSubscriptions(): EventSubscription[];

  /**
   * Clear all subscriptions (for testing/cleanup)
   */
  clearSubscriptions(): void;

  /**
   * Wait for all pending event handlers to complete (for testing)
   */
  waitForIdle(options?: { timeout?: number }): Promise<void>;
}

/**
 * In-memory EventBus using Node.js EventEmitter.
 *
 * Producers (the conversion pass) publish without knowing consumers; the CLI
 * subscribes to print progress. Handlers run fire-and-forget and their errors
 * are logged, so a failing consumer never aborts a pass.
 */
export class EventBus implements IEventStream {
  private emitter: EventEmitter;
  private subscriptions: Map<string, EventSubscription>;
  private pendingHandlers: Set<Promise<void>>;

  constructor() {
    this.emitter = new EventEmitter();
    this.subscriptions = new Map();
    this.pendingHandlers = new Set();
  }

  /**
   * Publish an event to all subscribers
   */
  publish(event: BaseEvent): void {
    if (!event.type || typeof event.type !== 'string') {
      throw new Error('Event must have a valid type string');
    }

    if (!event.timestamp || typeof event.timestamp !== 'number') {
      throw new Error('Event must have a valid timestamp number');
    }

    if (!event.source || typeof event.source !== 'string') {
      throw new Error('Event must have a valid source string');
    }

    this.emitter.emit(event.type, event);
    this.emitter.emit('*', event);
  }

  /**
   * Subscribe to events of a specific type ('*' receives every event)
   */
  subscribe<T extends BaseEvent = BaseEvent>(
    eventType: T['type'],
    handler: EventHandler<T>
  ): EventSubscription {
    const subscriptionId = generateSubscriptionId();

    const wrappedHandler = (event: BaseEvent): void => {
      const handlerPromise = (async () => {
        try {
          // Emitter only delivers events published under this type
          await handler(event as T);
        } catch (error) {
          console.error(`Error in event handler for ${eventType}:`, error);
        }
      })();

      this.pendingHandlers.add(handlerPromise);
      void handlerPromise.finally(() => {
        this.pendingHandlers.delete(handlerPromise);
      });
    };

    const subscription: EventSubscription = {
      id: subscriptionId,
      eventType,
      handler: wrappedHandler,
      metadata: {
        createdAt: Date.now()
      }
    };

    this.emitter.on(eventType, wrappedHandler);
    this.subscriptions.set(subscriptionId, subscription);

    return subscription;
  }

  /**
   * @returns true if subscription was found and removed, false otherwise
   */
  unsubscribe(subscriptionId: string): boolean {
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      return false;
    }

    this.emitter.removeListener(subscription.eventType, subscription.handler);
    this.subscriptions.delete(subscriptionId);

    return true;
  }

  getSubscriptions(): EventSubscription[] {
    return Array.from(this.subscriptions.values());
  }

  clearSubscriptions(): void {
    this.emitter.removeAllListeners();
    this.subscriptions.clear();
  }

  /**
   * Wait for all pending event handlers to complete.
   *
   * @param options.timeout - Maximum time to wait in ms (default: 5000)
   */
  async waitForIdle(options: { timeout?: number } = {}): Promise<void> {
    const timeout = options.timeout ?? 5000;
    const startTime = Date.now();

    while (this.pendingHandlers.size > 0) {
      if (Date.now() - startTime > timeout) {
        console.warn(`EventBus.waitForIdle() timeout after ${timeout}ms with ${this.pendingHandlers.size} handlers still pending`);
        break;
      }

      await Promise.race([
        Promise.all(Array.from(this.pendingHandlers)),
        new Promise(resolve => setTimeout(resolve, 10))
      ]);
    }
  }
}

/**
 * Type-safe publisher helper for conversion events
 */
export function publishConversionEvent(bus: IEventStream, event: ConversionEvent): void {
  bus.publish(event);
}
