/**
 * Range Trimmer - Time/Position Mapper
 * Linear conversion between asset time (seconds) and preview-content pixels.
 */

import type { AssetSource, TimelineSurface } from './types';

export class TimeMapper {
  private readonly asset: AssetSource;
  private readonly surface: TimelineSurface;

  constructor(asset: AssetSource, surface: TimelineSurface) {
    this.asset = asset;
    this.surface = surface;
  }

  /**
   * Duration of the loaded asset, or undefined when there is none to map against
   */
  get duration(): number | undefined {
    const duration = this.asset.currentDuration();
    if (duration === undefined || !Number.isFinite(duration) || duration <= 0) {
      return undefined;
    }
    return duration;
  }

  /**
   * Content offset in pixels for a time in seconds
   */
  positionFor(time: number): number | undefined {
    const duration = this.duration;
    if (duration === undefined) return undefined;
    return this.surface.contentWidth() * (time / duration);
  }

  /**
   * Time in seconds under a content offset in pixels
   */
  timeFor(offset: number): number | undefined {
    const duration = this.duration;
    const width = this.surface.contentWidth();
    if (duration === undefined || width <= 0) return undefined;
    return (offset / width) * duration;
  }

  /**
   * Pixel distance that covers the given number of seconds. 0 without an asset.
   */
  pixelsFor(seconds: number): number {
    const duration = this.duration;
    if (duration === undefined) return 0;
    return (seconds * this.surface.contentWidth()) / duration;
  }
}
