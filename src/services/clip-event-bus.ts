/**
 * Clip Event Bus
 *
 * Typed publish/subscribe channel between the pipeline and its consumers.
 * A failing listener is logged and never breaks the producer or the other
 * listeners.
 */

import { ClipEventListener, ClipEventMap, ClipEventName } from '../models/events';
import { log, LogLevel } from '../utils/logger';
import { errorMessage } from '../utils/fs-errors';

type ListenerSets = {
  [E in ClipEventName]: Set<ClipEventListener<E>>;
};

export class ClipEventBus {
  private listeners: ListenerSets = {
    'clip-saved': new Set(),
    'clip-deleted': new Set(),
    'statistics-updated': new Set(),
    'thumbnail-attached': new Set(),
    'storage-status': new Set(),
    'connectivity-status': new Set(),
    'battery-status': new Set(),
  };

  /**
   * Subscribe to an event
   *
   * @returns Function that removes the listener
   */
  on<E extends ClipEventName>(event: E, listener: ClipEventListener<E>): () => void {
    this.listeners[event].add(listener);
    return () => this.off(event, listener);
  }

  off<E extends ClipEventName>(event: E, listener: ClipEventListener<E>): void {
    this.listeners[event].delete(listener);
  }

  /**
   * Subscribe for the next emission only
   */
  once<E extends ClipEventName>(event: E, listener: ClipEventListener<E>): () => void {
    const wrapper: ClipEventListener<E> = (payload) => {
      this.off(event, wrapper);
      return listener(payload);
    };
    return this.on(event, wrapper);
  }

  emit<E extends ClipEventName>(event: E, payload: ClipEventMap[E]): void {
    for (const listener of [...this.listeners[event]]) {
      try {
        const result = listener(payload);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.logListenerError(event, error));
        }
      } catch (error) {
        this.logListenerError(event, error);
      }
    }
  }

  listenerCount(event: ClipEventName): number {
    return this.listeners[event].size;
  }

  private logListenerError(event: ClipEventName, error: unknown): void {
    log(LogLevel.ERROR, 'Clip event listener failed', {
      event,
      error: errorMessage(error),
    });
  }
}
