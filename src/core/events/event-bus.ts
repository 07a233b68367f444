/**
 * In-process ReviewEventSink.
 *
 * Listeners are called synchronously in registration order but never awaited.
 * A listener that throws, or returns a promise that rejects, is logged and
 * otherwise ignored so delivery problems never reach the review path.
 *
 * @example
 * ```typescript
 * const bus = new ReviewEventBus();
 * const off = bus.on('item.leech', (event) => {
 *   notifyUser(event.data.userId, `Item ${event.data.itemId} keeps slipping`);
 * });
 * // later
 * off();
 * ```
 */

import { createLogger, type Logger } from '../logging';
import type {
  ReviewEvent,
  ReviewEventListener,
  ReviewEventPayloads,
  ReviewEventSink,
  ReviewEventType,
} from './types';

type AnyListener = (event: ReviewEvent) => void | Promise<void>;

export class ReviewEventBus implements ReviewEventSink {
  private readonly listeners = new Map<ReviewEventType | '*', Set<AnyListener>>();
  private readonly logger: Logger;

  constructor(logger: Logger = createLogger('ReviewEventBus')) {
    this.logger = logger;
  }

  /**
   * Subscribes to one event type.
   *
   * @returns Function that removes the subscription
   */
  on<K extends ReviewEventType>(type: K, listener: ReviewEventListener<K>): () => void {
    const wrapped: AnyListener = (event) => (isEventOfType(event, type) ? listener(event) : undefined);
    return this.add(type, wrapped);
  }

  /**
   * Subscribes to every event.
   */
  onAny(listener: ReviewEventListener): () => void {
    return this.add('*', listener);
  }

  emit<K extends ReviewEventType>(type: K, data: ReviewEventPayloads[K]): void {
    const event: ReviewEvent<K> = { type, data, timestamp: new Date() };

    for (const key of [type, '*'] as const) {
      const listeners = this.listeners.get(key);
      if (!listeners) continue;

      for (const listener of [...listeners]) {
        this.deliver(listener, event);
      }
    }
  }

  /** Number of registered listeners, across all types */
  get listenerCount(): number {
    let count = 0;
    for (const set of this.listeners.values()) {
      count += set.size;
    }
    return count;
  }

  private add(key: ReviewEventType | '*', listener: AnyListener): () => void {
    const set = this.listeners.get(key) ?? new Set<AnyListener>();
    this.listeners.set(key, set);
    set.add(listener);

    return () => {
      set.delete(listener);
    };
  }

  private deliver(listener: AnyListener, event: ReviewEvent): void {
    try {
      const result = listener(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportFailure(event.type, error));
      }
    } catch (error) {
      this.reportFailure(event.type, error);
    }
  }

  private reportFailure(type: ReviewEventType, error: unknown): void {
    this.logger.error(`Listener for '${type}' failed`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

function isEventOfType<K extends ReviewEventType>(event: ReviewEvent, type: K): event is ReviewEvent<K> {
  return event.type === type;
}
