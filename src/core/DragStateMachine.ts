/**
 * Drag State Machine
 * Per-pair drag lifecycle: Idle -> Dragging(handle, baseline) -> Idle.
 * Pairs (trim, mark, position) drag independently of each other.
 */

import type { HandleId, HandleLayering, HandlePair } from './types';
import { isHandleId, pairOf, sideOf } from './types';
import type { BoundsModel } from './BoundsModel';
import { createLogger } from '../utils/logger';

const logger = createLogger('DragStateMachine');

export type DragState =
  | { status: 'idle' }
  | { status: 'dragging'; handle: HandleId; baseline: number };

export interface DragHooks {
  /** Whether the handle currently accepts gestures */
  isEnabled(handle: HandleId): boolean;
  /** Runs after the clamped offset of `handle` is committed during a move */
  afterCommit(handle: HandleId): void;
  /** Report the indicator time (moving or settled) */
  report(stoppedMoving: boolean): void;
  onLayeringChange(layering: Readonly<HandleLayering>): void;
  onDragStateChange(handle: HandleId, dragging: boolean): void;
}

const IDLE: DragState = { status: 'idle' };

const PAIRS: readonly HandlePair[] = ['trim', 'mark', 'position'];

export const DEFAULT_LAYERING: Readonly<HandleLayering> = {
  start: 'trimStart',
  end: 'trimEnd',
};

export class DragStateMachine {
  private readonly model: BoundsModel;
  private readonly hooks: DragHooks;

  private states: Record<HandlePair, DragState> = {
    trim: IDLE,
    mark: IDLE,
    position: IDLE,
  };
  private _layering: HandleLayering = { ...DEFAULT_LAYERING };

  constructor(model: BoundsModel, hooks: DragHooks) {
    this.model = model;
    this.hooks = hooks;
  }

  /**
   * Drag state of a pair
   */
  stateOf(pair: HandlePair): DragState {
    return this.states[pair];
  }

  /**
   * Handle currently dragging in a pair, or null
   */
  draggingIn(pair: HandlePair): HandleId | null {
    const state = this.states[pair];
    return state.status === 'dragging' ? state.handle : null;
  }

  get layering(): Readonly<HandleLayering> {
    return this._layering;
  }

  // ============================================================================
  // EVENTS
  // ============================================================================

  /**
   * Begin dragging a handle, capturing its committed offset as the baseline.
   * @returns false when the event was ignored
   */
  dragStart(handle: HandleId): boolean {
    if (!isHandleId(handle)) {
      logger.debug('Ignoring drag start for unknown handle', { handle });
      return false;
    }
    if (!this.hooks.isEnabled(handle)) {
      logger.debug('Ignoring drag start for disabled handle', { handle });
      return false;
    }
    const pair = pairOf(handle);
    if (this.states[pair].status === 'dragging') {
      logger.debug('Ignoring drag start, pair already dragging', { handle, pair });
      return false;
    }

    this.states[pair] = { status: 'dragging', handle, baseline: this.model.offsetOf(handle) };
    this.hooks.onDragStateChange(handle, true);
    this.bringToFront(handle);
    this.hooks.report(false);
    return true;
  }

  /**
   * Move a dragging handle by the cumulative translation since drag start
   * @returns false when the event was ignored
   */
  dragMove(handle: HandleId, translationX: number): boolean {
    const state = this.activeState(handle);
    if (!state) return false;
    if (!Number.isFinite(translationX)) {
      logger.debug('Ignoring non-finite drag translation', { handle, translationX });
      return false;
    }

    const clamped = this.model.clamp(handle, state.baseline + translationX);
    this.model.commit(handle, clamped);
    this.hooks.afterCommit(handle);
    this.hooks.report(false);
    this.bringToFront(handle);
    return true;
  }

  /**
   * Finish a drag. The last committed offset stays in place.
   */
  dragEnd(handle: HandleId): boolean {
    return this.finish(handle);
  }

  /**
   * Cancel a drag. Same as ending it: there is no rollback to the baseline.
   */
  dragCancel(handle: HandleId): boolean {
    return this.finish(handle);
  }

  /**
   * Drop every active drag without reporting (asset change)
   */
  reset(): void {
    for (const pair of PAIRS) {
      const handle = this.draggingIn(pair);
      this.states[pair] = IDLE;
      if (handle) this.hooks.onDragStateChange(handle, false);
    }
  }

  // ============================================================================
  // LAYERING
  // ============================================================================

  /**
   * Put the mark handles (true) or the trim handles (false) on top on both sides
   */
  setLayering(markOnTop: boolean): void {
    const next: HandleLayering = markOnTop
      ? { start: 'markStart', end: 'markEnd' }
      : { start: 'trimStart', end: 'trimEnd' };
    if (next.start === this._layering.start && next.end === this._layering.end) return;
    this._layering = next;
    this.hooks.onLayeringChange(this._layering);
  }

  private bringToFront(handle: HandleId): void {
    const side = sideOf(handle);
    if (side === null || this._layering[side] === handle) return;

    if (side === 'start' && (handle === 'trimStart' || handle === 'markStart')) {
      this._layering = { ...this._layering, start: handle };
    } else if (side === 'end' && (handle === 'trimEnd' || handle === 'markEnd')) {
      this._layering = { ...this._layering, end: handle };
    }
    this.hooks.onLayeringChange(this._layering);
  }

  private activeState(handle: HandleId): Extract<DragState, { status: 'dragging' }> | null {
    if (!isHandleId(handle)) return null;
    const state = this.states[pairOf(handle)];
    if (state.status !== 'dragging' || state.handle !== handle) return null;
    return state;
  }

  private finish(handle: HandleId): boolean {
    if (!this.activeState(handle)) return false;
    this.states[pairOf(handle)] = IDLE;
    this.hooks.onDragStateChange(handle, false);
    this.hooks.report(true);
    return true;
  }
}
