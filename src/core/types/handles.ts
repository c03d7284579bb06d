/**
 * Range Trimmer - Handle Type Definitions
 * Handle identifiers, pairs, and the offsets they own.
 */

/** Every draggable element of the trimmer */
export type HandleId = 'trimStart' | 'trimEnd' | 'markStart' | 'markEnd' | 'positionBar';

/** Independently draggable groups of handles */
export type HandlePair = 'trim' | 'mark' | 'position';

/** Sides on which a trim handle and a mark handle overlap */
export type HandleSide = 'start' | 'end';

export const HANDLE_IDS: readonly HandleId[] = [
  'trimStart',
  'trimEnd',
  'markStart',
  'markEnd',
  'positionBar',
];

/** Type guard for handle ids arriving from an untyped gesture source */
export function isHandleId(value: unknown): value is HandleId {
  return typeof value === 'string' && (HANDLE_IDS as readonly string[]).includes(value);
}

/** Pair that a handle drags within */
export function pairOf(handle: HandleId): HandlePair {
  switch (handle) {
    case 'trimStart':
    case 'trimEnd':
      return 'trim';
    case 'markStart':
    case 'markEnd':
      return 'mark';
    case 'positionBar':
      return 'position';
  }
}

/** Side a handle stacks on, or null for the position bar */
export function sideOf(handle: HandleId): HandleSide | null {
  switch (handle) {
    case 'trimStart':
    case 'markStart':
      return 'start';
    case 'trimEnd':
    case 'markEnd':
      return 'end';
    case 'positionBar':
      return null;
  }
}

/**
 * Committed handle offsets.
 * Start offsets are measured from the left edge (>= 0), end offsets from the
 * right edge (<= 0). The position offset is measured from the right side of
 * the trim-start handle.
 */
export interface TrimmerBounds {
  leftOffset: number;
  rightOffset: number;
  leftMarkOffset: number;
  rightMarkOffset: number;
  positionOffset: number;
}

/** Topmost handle on each side */
export interface HandleLayering {
  start: 'trimStart' | 'markStart';
  end: 'trimEnd' | 'markEnd';
}

/** Interaction groups that can be enabled or hidden */
export interface HandleGroupFlags {
  handles: boolean;
  marks: boolean;
  positionBar: boolean;
}
