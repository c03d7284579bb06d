/**
 * Range Trimmer - Event Type Definitions
 * Change-channel events and the position delegate.
 */

import type { HandleGroupFlags, HandleId, HandleLayering, TrimmerBounds } from './handles';

/** Events published on the trimmer change channel */
export type TrimmerEvent =
  | { type: 'bounds'; bounds: Readonly<TrimmerBounds> }
  | { type: 'layering'; layering: Readonly<HandleLayering> }
  | { type: 'position'; time: number; stoppedMoving: boolean }
  | { type: 'indicatorFrame'; offset: number; done: boolean }
  | { type: 'dragState'; handle: HandleId; dragging: boolean }
  | { type: 'flags'; enabled: Readonly<HandleGroupFlags>; visibility: Readonly<HandleGroupFlags> }
  | { type: 'reset' };

/** Change-channel listener */
export type TrimmerEventCallback = (event: TrimmerEvent) => void;

/** Host callbacks for the time under the position indicator */
export interface TrimmerDelegate {
  /** The indicator time changed while something is still moving */
  onPositionChanged(time: number): void;
  /** A drag or scroll ended; the indicator time is settled */
  onPositionSettled(time: number): void;
}
