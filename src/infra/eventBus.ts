/**
 * Simple in-memory pub/sub event bus.
 * Services emit governance events; the WebSocket handler broadcasts them.
 */

export type EventType =
  | 'stake.deposited'
  | 'stake.withdrawn'
  | 'reward.claimed'
  | 'income.deposited'
  | 'income.withheld'
  | 'poll.created'
  | 'poll.voted'
  | 'poll.ended'
  | 'poll.executed'
  | 'poll.failed'
  | 'poll.expired'
  | 'config.updated';

export type EventCallback = (event: EventType, data: unknown) => void;

export class EventBus {
  private listeners: Map<string, Set<EventCallback>> = new Map();
  private wildcardListeners: Set<EventCallback> = new Set();

  /**
   * Subscribe to a specific event type, or '*' for all events.
   */
  on(event: EventType | '*', callback: EventCallback): () => void {
    if (event === '*') {
      this.wildcardListeners.add(callback);
      return () => {
        this.wildcardListeners.delete(callback);
      };
    }

    let set = this.listeners.get(event);
    if (!set) {
      set = new Set();
      this.listeners.set(event, set);
    }
    set.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers. A throwing listener is
   * reported and does not stop delivery to the others.
   */
  emit(event: EventType, data: unknown): void {
    const targets = [...(this.listeners.get(event) ?? []), ...this.wildcardListeners];
    for (const cb of targets) {
      try {
        cb(event, data);
      } catch (error) {
        console.error(`[eventBus] listener for ${event} threw:`, error);
      }
    }
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
