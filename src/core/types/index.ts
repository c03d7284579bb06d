/**
 * Range Trimmer - Core Type Definitions
 * Re-exports all types from domain-specific modules.
 */

// Handles
export type {
  HandleId,
  HandlePair,
  HandleSide,
  TrimmerBounds,
  HandleLayering,
  HandleGroupFlags,
} from './handles';
export { HANDLE_IDS, isHandleId, pairOf, sideOf } from './handles';

// Collaborators
export type { AssetSource, TimelineSurface } from './surface';

// Configuration
export type { TrimmerConfig, ResolvedTrimmerConfig } from './config';

// Events
export type { TrimmerEvent, TrimmerEventCallback, TrimmerDelegate } from './events';

// Snapshot
export type { TrimmerSnapshot, MarkLabels } from './snapshot';
