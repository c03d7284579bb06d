/**
 * Position Animator
 * Fixed-duration linear interpolation of the displayed indicator offset.
 * Only the displayed value animates; the committed offset is set up front.
 */

import { ANIMATION } from '../constants';
import { lerp } from '../utils/time';

/** Source of frames and a monotonic clock (ms) */
export interface FrameScheduler {
  now(): number;
  /**
   * Run the callback on the next frame.
   * @returns Cancel function
   */
  requestFrame(callback: () => void): () => void;
}

export const defaultFrameScheduler: FrameScheduler = {
  now: () => performance.now(),
  requestFrame(callback) {
    if (typeof requestAnimationFrame === 'function') {
      const id = requestAnimationFrame(() => callback());
      return () => cancelAnimationFrame(id);
    }
    const timer = setTimeout(callback, ANIMATION.FALLBACK_FRAME_MS);
    return () => clearTimeout(timer);
  },
};

export type FrameCallback = (offset: number, done: boolean) => void;

export class PositionAnimator {
  private readonly scheduler: FrameScheduler;
  private readonly onFrame: FrameCallback;
  private displayed = 0;
  private cancelFrame: (() => void) | null = null;

  constructor(scheduler: FrameScheduler, onFrame: FrameCallback) {
    this.scheduler = scheduler;
    this.onFrame = onFrame;
  }

  /** Offset as currently displayed */
  get offset(): number {
    return this.displayed;
  }

  get isAnimating(): boolean {
    return this.cancelFrame !== null;
  }

  /**
   * Show the offset immediately
   */
  jumpTo(offset: number): void {
    this.cancel();
    this.displayed = offset;
    this.onFrame(offset, true);
  }

  /**
   * Interpolate from the displayed offset to `target` over `durationMs`
   */
  animateTo(target: number, durationMs: number): void {
    if (durationMs <= 0 || target === this.displayed) {
      this.jumpTo(target);
      return;
    }

    this.cancel();
    const from = this.displayed;
    const startedAt = this.scheduler.now();

    const step = () => {
      const t = (this.scheduler.now() - startedAt) / durationMs;
      this.displayed = lerp(from, target, t);
      if (t >= 1) {
        this.cancelFrame = null;
        this.onFrame(target, true);
        return;
      }
      this.onFrame(this.displayed, false);
      this.cancelFrame = this.scheduler.requestFrame(step);
    };

    this.cancelFrame = this.scheduler.requestFrame(step);
  }

  /**
   * Stop any running animation, leaving the displayed offset where it is
   */
  cancel(): void {
    if (this.cancelFrame) {
      this.cancelFrame();
      this.cancelFrame = null;
    }
  }
}
