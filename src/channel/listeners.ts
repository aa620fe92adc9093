import type { InboundEvent } from '../types.js';
import { createLogger } from '../logger.js';

const log = createLogger('listeners');

export type EventPredicate = (event: InboundEvent) => boolean;
export type EventCallback = (event: InboundEvent) => void | Promise<void>;

export interface SubscriptionHandle {
  readonly id: number;
}

interface Listener {
  predicate: EventPredicate;
  callback: EventCallback;
}

/**
 * Fan-out of inbound events to independently registered listeners.
 *
 * Callbacks run inline in arrival order; an async callback is started but never
 * awaited, and a listener that throws or rejects is logged and skipped so the
 * remaining listeners still see the event.
 */
export class ListenerRegistry {
  private listeners = new Map<number, Listener>();
  private nextId = 1;

  add(predicate: EventPredicate, callback: EventCallback): SubscriptionHandle {
    const handle = { id: this.nextId++ };
    this.listeners.set(handle.id, { predicate, callback });
    return handle;
  }

  remove(handle: SubscriptionHandle) {
    return this.listeners.delete(handle.id);
  }

  get size() {
    return this.listeners.size;
  }

  /** Returns how many listeners accepted the event. */
  dispatch(event: InboundEvent) {
    let delivered = 0;
    for (const [id, listener] of [...this.listeners]) {
      // removed by an earlier listener during this dispatch
      if (!this.listeners.has(id)) continue;

      let matched: boolean;
      try {
        matched = listener.predicate(event);
      } catch (error) {
        log.warn({ listenerId: id, messageId: event.messageId, err: String(error) }, 'listener predicate threw');
        continue;
      }
      if (!matched) continue;

      delivered++;
      try {
        const result = listener.callback(event);
        if (result instanceof Promise) {
          void result.catch((error: unknown) => {
            log.warn({ listenerId: id, messageId: event.messageId, err: String(error) }, 'listener callback rejected');
          });
        }
      } catch (error) {
        log.warn({ listenerId: id, messageId: event.messageId, err: String(error) }, 'listener callback threw');
      }
    }
    return delivered;
  }
}
