/**
 * Test fixtures: in-memory asset, surface and frame scheduler.
 */

import type { AssetSource, TimelineSurface } from '../../core/types';
import type { FrameScheduler } from '../../core/PositionAnimator';

export interface FakeAsset extends AssetSource {
  duration: number | undefined;
}

export function createAsset(duration: number | undefined): FakeAsset {
  return {
    duration,
    currentDuration() {
      return this.duration;
    },
  };
}

export interface FakeSurface extends TimelineSurface {
  width: number;
  view: number;
  scroll: number;
}

export function createSurface(contentWidth: number, viewWidth: number, scrollOffsetX = 0): FakeSurface {
  return {
    width: contentWidth,
    view: viewWidth,
    scroll: scrollOffsetX,
    contentWidth() {
      return this.width;
    },
    viewWidth() {
      return this.view;
    },
    scrollOffsetX() {
      return this.scroll;
    },
  };
}

export interface ManualScheduler extends FrameScheduler {
  /** Move the clock forward and run the frames queued so far */
  advance(ms: number): void;
  readonly pending: number;
}

export function createManualScheduler(): ManualScheduler {
  let now = 0;
  let queue: Array<() => void> = [];

  return {
    now: () => now,
    requestFrame(callback) {
      queue.push(callback);
      return () => {
        queue = queue.filter((c) => c !== callback);
      };
    },
    advance(ms) {
      now += ms;
      const frames = queue;
      queue = [];
      for (const frame of frames) frame();
    },
    get pending() {
      return queue.length;
    },
  };
}

/** Deterministic PRNG for randomized drag sequences */
export function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
