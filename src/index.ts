/**
 * Range Trimmer - Public API
 */

// Core
export { Trimmer, resolveTrimmerConfig } from './core/Trimmer';
export type { TrimmerOptions } from './core/Trimmer';
export { TimeMapper } from './core/TimeMapper';
export { BoundsModel, boundsKeyOf } from './core/BoundsModel';
export { DragStateMachine, DEFAULT_LAYERING } from './core/DragStateMachine';
export type { DragState, DragHooks } from './core/DragStateMachine';
export { enforceMaxDuration } from './core/DurationConstraint';
export { PositionNotifier } from './core/PositionNotifier';
export { PositionAnimator, defaultFrameScheduler } from './core/PositionAnimator';
export type { FrameScheduler } from './core/PositionAnimator';
export { TrimmerEventEmitter } from './core/TrimmerEvents';

// React binding
export { useTrimmer } from './hooks/useTrimmer';

// Types
export type {
  HandleId,
  HandlePair,
  HandleSide,
  TrimmerBounds,
  HandleLayering,
  HandleGroupFlags,
  AssetSource,
  TimelineSurface,
  TrimmerConfig,
  ResolvedTrimmerConfig,
  TrimmerEvent,
  TrimmerEventCallback,
  TrimmerDelegate,
  TrimmerSnapshot,
  MarkLabels,
} from './core/types';
export { HANDLE_IDS, isHandleId, pairOf, sideOf } from './core/types';

// Utilities
export { secondsToUs, usToSeconds, formatTimecode, formatSeconds, clamp, lerp } from './utils/time';
export { createLogger, setLogLevel, getLogLevel } from './utils/logger';
export type { Logger, LogLevel } from './utils/logger';

// Constants
export { TIME, TRIMMER, ANIMATION } from './constants';
