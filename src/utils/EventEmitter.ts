/**
 * Typed event emitter used by sessions, history and the clients.
 *
 * `on` and `once` return an unsubscribe function. A listener that throws is
 * logged and does not stop the remaining listeners.
 */

import { Logger } from './Logger';

const log = new Logger('EventEmitter');

type EventCallback<T = unknown> = (data: T) => void;

export interface EventMap {
  [event: string]: unknown;
}

type ListenerTable<Events extends EventMap> = { [K in keyof Events]?: Set<EventCallback<Events[K]>> };

export class EventEmitter<Events extends EventMap = EventMap> {
  private listeners: ListenerTable<Events> = {};

  on<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    const set = this.listeners[event] ?? new Set<EventCallback<Events[K]>>();
    set.add(callback);
    this.listeners[event] = set;
    return () => this.off(event, callback);
  }

  off<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): void {
    const set = this.listeners[event];
    if (!set) return;
    set.delete(callback);
    if (set.size === 0) this.listeners[event] = undefined;
  }

  /** Listeners added while an event is being delivered wait for the next one. */
  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    for (const callback of [...set]) {
      try {
        callback(data);
      } catch (err) {
        log.error(`Error in event listener for "${String(event)}":`, err);
      }
    }
  }

  once<K extends keyof Events>(event: K, callback: EventCallback<Events[K]>): () => void {
    const wrapper: EventCallback<Events[K]> = (data) => {
      this.off(event, wrapper);
      callback(data);
    };
    return this.on(event, wrapper);
  }

  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }

  removeAllListeners(event?: keyof Events): void {
    if (event === undefined) {
      this.listeners = {};
    } else {
      this.listeners[event] = undefined;
    }
  }
}
