/**
 * Simple in-memory pub/sub event bus.
 * Services publish committed ledger events here; the WebSocket feed and the
 * logger subscribe to them.
 */

export type EventType =
  | 'position.opened'
  | 'position.collateral.added'
  | 'position.collateral.removed'
  | 'position.borrowed'
  | 'position.repaid'
  | 'position.closed'
  | 'position.liquidated'
  | 'interest.activated'
  | 'interest.collected'
  | 'interest.vault.registered'
  | 'interest.treasury.withdrawn'
  | 'leverage.opened'
  | 'token.transfer'
  | 'oracle.price.published'
  | 'admin.updated';

export type EventCallback = (event: EventType, data: unknown) => void;

export interface PendingEvent {
  type: EventType;
  data: Record<string, unknown>;
}

class EventBus {
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

    let specific = this.listeners.get(event);
    if (!specific) {
      specific = new Set();
      this.listeners.set(event, specific);
    }
    specific.add(callback);

    return () => {
      this.listeners.get(event)?.delete(callback);
    };
  }

  /**
   * Emit an event to all matching subscribers.
   */
  emit(event: EventType, data: unknown): void {
    const specific = this.listeners.get(event);
    if (specific) {
      for (const cb of specific) {
        this.deliver(cb, event, data);
      }
    }

    for (const cb of this.wildcardListeners) {
      this.deliver(cb, event, data);
    }
  }

  emitAll(events: PendingEvent[]): void {
    for (const event of events) {
      this.emit(event.type, event.data);
    }
  }

  /**
   * Remove all listeners. Useful for tests.
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
  }

  private deliver(cb: EventCallback, event: EventType, data: unknown): void {
    try {
      cb(event, data);
    } catch (error) {
      // listener failures never reach the publisher
      process.emitWarning(`event listener for ${event} threw: ${String(error)}`);
    }
  }
}

/** Singleton event bus instance for the application. */
export const eventBus = new EventBus();
