/**
 * Trimmer Events
 * Change channel for renderers: bounds, layering, and indicator updates.
 */

import type { TrimmerEvent, TrimmerEventCallback } from './types';
import { createLogger } from '../utils/logger';

const logger = createLogger('TrimmerEvents');

/**
 * Simple event emitter for trimmer events.
 */
export class TrimmerEventEmitter {
  private listeners: Set<TrimmerEventCallback> = new Set();

  /**
   * Subscribe to trimmer events.
   * @returns Unsubscribe function
   */
  on(callback: TrimmerEventCallback): () => void {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  /**
   * Emit an event to all listeners.
   */
  emit(event: TrimmerEvent): void {
    for (const callback of this.listeners) {
      try {
        callback(event);
      } catch (err) {
        logger.error('Event listener error', { event: event.type, error: err });
      }
    }
  }

  /**
   * Remove all listeners.
   */
  clear(): void {
    this.listeners.clear();
  }

  /**
   * Get the number of listeners.
   */
  get listenerCount(): number {
    return this.listeners.size;
  }
}
