/**
 * Range Trimmer - Bounds Model
 * Holds the committed handle offsets and the clamping rules that keep each
 * pair ordered with at least the minimum duration between its handles.
 *
 * Geometry (view coordinates, x grows to the right):
 *   leftHandleX  = leftOffset
 *   rightHandleX = viewWidth + rightOffset - handleWidth
 * The preview content starts one handle width in from the left edge, so a
 * view x maps to content x - handleWidth, plus the scroll offset.
 */

import type { HandleId, TrimmerBounds, TimelineSurface } from './types';
import type { TimeMapper } from './TimeMapper';

export interface BoundsModelOptions {
  handleWidth: number;
  minDuration: number;
}

const ZERO_BOUNDS: TrimmerBounds = {
  leftOffset: 0,
  rightOffset: 0,
  leftMarkOffset: 0,
  rightMarkOffset: 0,
  positionOffset: 0,
};

export class BoundsModel {
  private readonly mapper: TimeMapper;
  private readonly surface: TimelineSurface;
  readonly handleWidth: number;
  readonly minDuration: number;

  private _bounds: TrimmerBounds = { ...ZERO_BOUNDS };

  constructor(mapper: TimeMapper, surface: TimelineSurface, options: BoundsModelOptions) {
    this.mapper = mapper;
    this.surface = surface;
    this.handleWidth = options.handleWidth;
    this.minDuration = options.minDuration;
  }

  /**
   * Committed offsets (read-only copy)
   */
  get bounds(): Readonly<TrimmerBounds> {
    return { ...this._bounds };
  }

  // ============================================================================
  // GEOMETRY
  // ============================================================================

  get leftHandleX(): number {
    return this._bounds.leftOffset;
  }

  get rightHandleX(): number {
    return this.surface.viewWidth() + this._bounds.rightOffset - this.handleWidth;
  }

  get leftMarkX(): number {
    return this._bounds.leftMarkOffset;
  }

  get rightMarkX(): number {
    return this.surface.viewWidth() + this._bounds.rightMarkOffset - this.handleWidth;
  }

  /** Content position under the trim-start handle */
  get startPosition(): number {
    return this.leftHandleX + this.surface.scrollOffsetX();
  }

  /** Content position under the trim-end handle */
  get endPosition(): number {
    return this.rightHandleX - this.handleWidth + this.surface.scrollOffsetX();
  }

  get startMarkPosition(): number {
    return this.leftMarkX + this.surface.scrollOffsetX();
  }

  get endMarkPosition(): number {
    return this.rightMarkX - this.handleWidth + this.surface.scrollOffsetX();
  }

  /** Content position under the left edge of the position indicator */
  get thumbPosition(): number {
    return this.leftHandleX + this._bounds.positionOffset + this.surface.scrollOffsetX();
  }

  /**
   * Start-handle offset that puts the given content position under the handle
   */
  startOffsetAt(contentPosition: number): number {
    return contentPosition - this.surface.scrollOffsetX();
  }

  /**
   * End-handle offset that puts the given content position under the handle
   */
  endOffsetAt(contentPosition: number): number {
    return (
      contentPosition - this.surface.scrollOffsetX() - this.surface.viewWidth() + 2 * this.handleWidth
    );
  }

  /**
   * Pixels that cover the minimum duration for the current asset and width.
   * Recomputed on every call, never cached per asset.
   */
  minGapPixels(): number {
    return this.mapper.pixelsFor(this.minDuration);
  }

  // ============================================================================
  // CLAMPS
  // ============================================================================

  clampLeft(candidate: number): number {
    return this.clampStart(candidate, this.rightHandleX);
  }

  clampRight(candidate: number): number {
    return this.clampEnd(candidate, this.leftHandleX);
  }

  clampMarkLeft(candidate: number): number {
    return this.clampStart(candidate, this.rightMarkX);
  }

  clampMarkRight(candidate: number): number {
    return this.clampEnd(candidate, this.leftMarkX);
  }

  clampPosition(candidate: number): number {
    const max = Math.max(this.rightHandleX - this.handleWidth, 0);
    return Math.min(Math.max(0, candidate), max);
  }

  /**
   * Clamp a candidate offset for any handle
   */
  clamp(handle: HandleId, candidate: number): number {
    switch (handle) {
      case 'trimStart':
        return this.clampLeft(candidate);
      case 'trimEnd':
        return this.clampRight(candidate);
      case 'markStart':
        return this.clampMarkLeft(candidate);
      case 'markEnd':
        return this.clampMarkRight(candidate);
      case 'positionBar':
        return this.clampPosition(candidate);
    }
  }

  private clampStart(candidate: number, oppositeX: number): number {
    const max = Math.max(oppositeX - this.handleWidth - this.minGapPixels(), 0);
    return Math.min(Math.max(0, candidate), max);
  }

  private clampEnd(candidate: number, oppositeX: number): number {
    const min = Math.min(
      2 * this.handleWidth - this.surface.viewWidth() + oppositeX + this.minGapPixels(),
      0
    );
    return Math.max(Math.min(0, candidate), min);
  }

  // ============================================================================
  // MUTATION
  // ============================================================================

  /**
   * Committed offset of a handle
   */
  offsetOf(handle: HandleId): number {
    return this._bounds[boundsKeyOf(handle)];
  }

  /**
   * Store an already-clamped offset.
   * @returns whether the stored value changed
   */
  commit(handle: HandleId, offset: number): boolean {
    const key = boundsKeyOf(handle);
    if (this._bounds[key] === offset) return false;
    this._bounds = { ...this._bounds, [key]: offset };
    return true;
  }

  /**
   * Move every handle back to its natural edge
   */
  reset(): void {
    this._bounds = { ...ZERO_BOUNDS };
  }
}

/**
 * Field of TrimmerBounds that a handle owns
 */
export function boundsKeyOf(handle: HandleId): keyof TrimmerBounds {
  switch (handle) {
    case 'trimStart':
      return 'leftOffset';
    case 'trimEnd':
      return 'rightOffset';
    case 'markStart':
      return 'leftMarkOffset';
    case 'markEnd':
      return 'rightMarkOffset';
    case 'positionBar':
      return 'positionOffset';
  }
}
