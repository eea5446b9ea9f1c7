import type { EventBus, EventListener } from '../types/events.js';
import type { MetricsCollector } from '../types/metrics.js';
import { errorMessage } from '../types/orchestration.js';
import { logThought } from '../utils/logger.js';

/**
 * In-process publish/subscribe bus.
 *
 * `publish` awaits every listener of the topic; a listener that throws is
 * logged and counted without affecting the other listeners or the publisher.
 */
export class InMemoryEventBus implements EventBus {
  readonly #listeners: Map<string, Set<EventListener>> = new Map();
  readonly #metrics?: MetricsCollector;

  constructor(metrics?: MetricsCollector) {
    this.#metrics = metrics;
  }

  /** Subscribe to a topic. Returns a function that removes the subscription. */
  subscribe(topic: string, listener: EventListener): () => void {
    const listeners = this.#listeners.get(topic) ?? new Set<EventListener>();
    listeners.add(listener);
    this.#listeners.set(topic, listeners);
    return () => this.unsubscribe(topic, listener);
  }

  unsubscribe(topic: string, listener: EventListener): boolean {
    const listeners = this.#listeners.get(topic);
    if (!listeners) return false;

    const removed = listeners.delete(listener);
    if (listeners.size === 0) {
      this.#listeners.delete(topic);
    }
    return removed;
  }

  listenerCount(topic: string): number {
    return this.#listeners.get(topic)?.size ?? 0;
  }

  async publish(topic: string, payload: unknown): Promise<void> {
    const listeners = [...(this.#listeners.get(topic) ?? [])];
    if (listeners.length === 0) {
      this.#metrics?.recordMetric('event_bus.no_subscribers_count', 1, { topic });
      return;
    }

    const outcomes = await Promise.allSettled(
      listeners.map(async (listener) => listener(payload, topic)),
    );

    for (const outcome of outcomes) {
      if (outcome.status === 'rejected') {
        this.#metrics?.recordMetric('event_bus.handler_error_count', 1, { topic });
        await logThought(
          `[EventBus] Listener for '${topic}' failed: ${errorMessage(outcome.reason)}`,
        );
      }
    }

    this.#metrics?.recordMetric('event_bus.publish_count', 1, { topic });
  }
}
