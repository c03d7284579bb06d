/**
 * Range Trimmer - Snapshot Type Definitions
 * Immutable view of the trimmer state for renderers.
 */

import type { HandleGroupFlags, HandleId, HandleLayering, TrimmerBounds } from './handles';

/** Mark labels set by the host; null marks a natural edge */
export interface MarkLabels {
  start: string | null;
  end: string | null;
}

export interface TrimmerSnapshot {
  bounds: Readonly<TrimmerBounds>;
  /** Indicator offset as currently displayed (differs from the committed one while animating) */
  displayedPositionOffset: number;
  startTime: number | undefined;
  endTime: number | undefined;
  startMarkTime: number | undefined;
  endMarkTime: number | undefined;
  thumbTime: number | undefined;
  markLabels: Readonly<MarkLabels>;
  layering: Readonly<HandleLayering>;
  visibility: Readonly<HandleGroupFlags>;
  enabled: Readonly<HandleGroupFlags>;
  /** Handle currently dragging in each pair */
  dragging: Readonly<{ trim: HandleId | null; mark: HandleId | null; position: HandleId | null }>;
}
