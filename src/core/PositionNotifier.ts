/**
 * Position Notifier
 * Reports the time under the position indicator to the host delegate.
 */

import type { TrimmerDelegate } from './types';
import type { TrimmerEventEmitter } from './TrimmerEvents';
import { createLogger } from '../utils/logger';

const logger = createLogger('PositionNotifier');

export class PositionNotifier {
  private delegate: TrimmerDelegate | null = null;
  private readonly events: TrimmerEventEmitter;
  private readonly readTime: () => number | undefined;

  /**
   * @param readTime - Time under the indicator, undefined when no asset is loaded
   */
  constructor(events: TrimmerEventEmitter, readTime: () => number | undefined) {
    this.events = events;
    this.readTime = readTime;
  }

  setDelegate(delegate: TrimmerDelegate | null): void {
    this.delegate = delegate;
  }

  /**
   * Report the indicator time, as moving or settled.
   * No-op when the time cannot be computed.
   */
  report(stoppedMoving: boolean): void {
    const time = this.readTime();
    if (time === undefined) return;

    const delegate = this.delegate;
    if (delegate) {
      try {
        if (stoppedMoving) {
          delegate.onPositionSettled(time);
        } else {
          delegate.onPositionChanged(time);
        }
      } catch (err) {
        logger.error('Delegate callback error', { stoppedMoving, error: err });
      }
    }

    this.events.emit({ type: 'position', time, stoppedMoving });
  }
}
