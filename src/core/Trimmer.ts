/**
 * Range Trimmer - Trimmer Class
 * Interaction core of a range-selection control: two trim handles, two mark
 * handles and a position indicator over a scrollable asset preview.
 * Facade over the mapper, bounds model, drag state machine, duration
 * constraint, notifier and animator.
 */

import type {
  AssetSource,
  TimelineSurface,
  TrimmerConfig,
  ResolvedTrimmerConfig,
  TrimmerBounds,
  TrimmerDelegate,
  TrimmerEventCallback,
  TrimmerSnapshot,
  HandleId,
  HandleLayering,
  HandleGroupFlags,
  MarkLabels,
} from './types';
import { pairOf } from './types';
import { TimeMapper } from './TimeMapper';
import { BoundsModel } from './BoundsModel';
import { DragStateMachine } from './DragStateMachine';
import { enforceMaxDuration } from './DurationConstraint';
import { PositionNotifier } from './PositionNotifier';
import { PositionAnimator, defaultFrameScheduler } from './PositionAnimator';
import type { FrameScheduler } from './PositionAnimator';
import { TrimmerEventEmitter } from './TrimmerEvents';
import { TRIMMER } from '../constants';
import { createLogger } from '../utils/logger';
import { clamp, formatSeconds } from '../utils/time';

const logger = createLogger('Trimmer');

export interface TrimmerOptions {
  asset: AssetSource;
  surface: TimelineSurface;
  config?: TrimmerConfig;
  /** Frame source for the animated seek (defaults to requestAnimationFrame) */
  scheduler?: FrameScheduler;
}

type HandleGroup = keyof HandleGroupFlags;

const ALL_GROUPS: Readonly<HandleGroupFlags> = { handles: true, marks: true, positionBar: true };

const GROUPS: readonly HandleGroup[] = ['handles', 'marks', 'positionBar'];

function groupOf(handle: HandleId): HandleGroup {
  switch (pairOf(handle)) {
    case 'trim':
      return 'handles';
    case 'mark':
      return 'marks';
    case 'position':
      return 'positionBar';
  }
}

function resolveNumber(
  name: keyof TrimmerConfig,
  value: number | undefined,
  fallback: number,
  isValid: (v: number) => boolean
): number {
  if (value === undefined) return fallback;
  if (isValid(value)) return value;
  logger.warn('Invalid config value, using default', { name, value, fallback });
  return fallback;
}

const isNonNegativeFinite = (v: number) => Number.isFinite(v) && v >= 0;
const isPositiveOrInfinite = (v: number) => v > 0;

/**
 * Apply defaults to a trimmer config
 */
export function resolveTrimmerConfig(config: TrimmerConfig = {}): ResolvedTrimmerConfig {
  return {
    handleWidth: resolveNumber('handleWidth', config.handleWidth, TRIMMER.HANDLE_WIDTH, isNonNegativeFinite),
    minDuration: resolveNumber('minDuration', config.minDuration, TRIMMER.MIN_DURATION_SECONDS, isNonNegativeFinite),
    positionBarAnimationDuration: resolveNumber(
      'positionBarAnimationDuration',
      config.positionBarAnimationDuration,
      TRIMMER.POSITION_BAR_ANIMATION_SECONDS,
      isNonNegativeFinite
    ),
    maxDuration: resolveNumber('maxDuration', config.maxDuration, TRIMMER.MAX_DURATION_SECONDS, isPositiveOrInfinite),
  };
}

export class Trimmer {
  readonly config: Readonly<ResolvedTrimmerConfig>;

  private readonly surface: TimelineSurface;
  private readonly mapper: TimeMapper;
  private readonly model: BoundsModel;
  private readonly drags: DragStateMachine;
  private readonly notifier: PositionNotifier;
  private readonly animator: PositionAnimator;
  private readonly events = new TrimmerEventEmitter();

  private _maxDuration: number;
  private markLabels: MarkLabels = { start: null, end: null };
  private enabled: HandleGroupFlags = { ...ALL_GROUPS };
  private visibility: HandleGroupFlags = { ...ALL_GROUPS };
  private snapshot: TrimmerSnapshot | null = null;

  constructor(options: TrimmerOptions) {
    this.config = resolveTrimmerConfig(options.config);
    this._maxDuration = this.config.maxDuration;
    this.surface = options.surface;
    this.mapper = new TimeMapper(options.asset, options.surface);
    this.model = new BoundsModel(this.mapper, options.surface, {
      handleWidth: this.config.handleWidth,
      minDuration: this.config.minDuration,
    });
    this.notifier = new PositionNotifier(this.events, () => this.thumbTime);
    this.animator = new PositionAnimator(options.scheduler ?? defaultFrameScheduler, (offset, done) => {
      this.invalidate();
      this.events.emit({ type: 'indicatorFrame', offset, done });
    });
    this.drags = new DragStateMachine(this.model, {
      isEnabled: (handle) => this.enabled[groupOf(handle)],
      afterCommit: (handle) => this.afterDragCommit(handle),
      report: (stoppedMoving) => this.notifier.report(stoppedMoving),
      onLayeringChange: (layering) => {
        this.invalidate();
        this.events.emit({ type: 'layering', layering });
      },
      onDragStateChange: (handle, dragging) => {
        this.invalidate();
        this.events.emit({ type: 'dragState', handle, dragging });
      },
    });
    this.applyMaxDuration();
  }

  // ============================================================================
  // TIMES
  // ============================================================================

  /** Selected start time in seconds */
  get startTime(): number | undefined {
    return this.mapper.timeFor(this.model.startPosition);
  }

  /** Selected end time in seconds */
  get endTime(): number | undefined {
    return this.mapper.timeFor(this.model.endPosition);
  }

  get startMarkTime(): number | undefined {
    return this.mapper.timeFor(this.model.startMarkPosition);
  }

  get endMarkTime(): number | undefined {
    return this.mapper.timeFor(this.model.endMarkPosition);
  }

  /** Time under the position indicator */
  get thumbTime(): number | undefined {
    return this.mapper.timeFor(this.model.thumbPosition);
  }

  // ============================================================================
  // STATE
  // ============================================================================

  get bounds(): Readonly<TrimmerBounds> {
    return this.model.bounds;
  }

  get layering(): Readonly<HandleLayering> {
    return this.drags.layering;
  }

  get maxDuration(): number {
    return this._maxDuration;
  }

  /** Pixels between handles that cover the minimum duration */
  get minimumDistanceBetweenHandles(): number {
    return this.model.minGapPixels();
  }

  /**
   * Immutable view of the state. The same object is returned until something changes.
   */
  getSnapshot(): TrimmerSnapshot {
    if (!this.snapshot) {
      this.snapshot = {
        bounds: this.model.bounds,
        displayedPositionOffset: this.animator.offset,
        startTime: this.startTime,
        endTime: this.endTime,
        startMarkTime: this.startMarkTime,
        endMarkTime: this.endMarkTime,
        thumbTime: this.thumbTime,
        markLabels: { ...this.markLabels },
        layering: this.drags.layering,
        visibility: { ...this.visibility },
        enabled: { ...this.enabled },
        dragging: {
          trim: this.drags.draggingIn('trim'),
          mark: this.drags.draggingIn('mark'),
          position: this.drags.draggingIn('position'),
        },
      };
    }
    return this.snapshot;
  }

  // ============================================================================
  // SUBSCRIPTIONS
  // ============================================================================

  /**
   * Subscribe to the change channel.
   * @returns Unsubscribe function
   */
  on(callback: TrimmerEventCallback): () => void {
    return this.events.on(callback);
  }

  setDelegate(delegate: TrimmerDelegate | null): void {
    this.notifier.setDelegate(delegate);
  }

  // ============================================================================
  // GESTURES
  // ============================================================================

  dragStart(handle: HandleId): boolean {
    return this.drags.dragStart(handle);
  }

  dragMove(handle: HandleId, translationX: number): boolean {
    return this.drags.dragMove(handle, translationX);
  }

  dragEnd(handle: HandleId): boolean {
    return this.drags.dragEnd(handle);
  }

  dragCancel(handle: HandleId): boolean {
    return this.drags.dragCancel(handle);
  }

  private afterDragCommit(handle: HandleId): void {
    if (handle === 'trimStart' || handle === 'trimEnd') {
      enforceMaxDuration(this.model, this.mapper, this._maxDuration, handle);
    }

    switch (handle) {
      case 'trimStart':
        this.seekToTime(this.startTime);
        break;
      case 'trimEnd':
        this.seekToTime(this.endTime);
        break;
      case 'markStart':
        this.seekToTime(this.startMarkTime);
        break;
      case 'markEnd':
        this.seekToTime(this.endMarkTime);
        break;
      case 'positionBar':
        // Already at its own time: show the committed offset as is
        this.animator.jumpTo(this.model.offsetOf('positionBar'));
        break;
    }

    this.reclampPosition();
    this.publishBounds();
  }

  private seekToTime(time: number | undefined): void {
    if (time !== undefined) this.placeIndicator(time);
  }

  // ============================================================================
  // HOST OPERATIONS
  // ============================================================================

  /**
   * Move the position indicator to a time, clamped into the indicator range.
   * Animates only when the time lies strictly inside the trimmed interval.
   */
  seek(time: number): void {
    if (this.placeIndicator(time)) this.publishBounds();
  }

  private placeIndicator(time: number): boolean {
    const position = this.mapper.positionFor(time);
    if (position === undefined) return false;

    const target = this.model.clampPosition(
      position - this.surface.scrollOffsetX() - this.model.leftHandleX
    );
    this.model.commit('positionBar', target);

    const startTime = this.startTime;
    const endTime = this.endTime;
    const inside =
      startTime !== undefined && endTime !== undefined && time > startTime && time < endTime;

    if (inside) {
      this.animator.animateTo(target, this.config.positionBarAnimationDuration * 1000);
    } else {
      this.animator.jumpTo(target);
    }
    return true;
  }

  /**
   * Cap the selected duration. Moves the end handle when the current selection is longer.
   */
  setMaxDuration(seconds: number): void {
    if (Number.isNaN(seconds) || seconds <= 0) {
      logger.warn('Ignoring invalid max duration', { seconds });
      return;
    }
    this._maxDuration = seconds;
    if (this.applyMaxDuration()) this.publishBounds();
  }

  /**
   * Place the mark handles at absolute times. 0 keeps a mark at its natural edge.
   */
  setMarkedTime(startSeconds: number, endSeconds: number): void {
    const startPosition = startSeconds === 0 ? 0 : this.mapper.positionFor(startSeconds);
    const endPosition = endSeconds === 0 ? 0 : this.mapper.positionFor(endSeconds);
    if (startPosition === undefined || endPosition === undefined) {
      logger.debug('Ignoring marked time without an asset', { startSeconds, endSeconds });
      return;
    }

    const left = startSeconds === 0 ? 0 : Math.max(this.model.startOffsetAt(startPosition), 0);
    const right = endSeconds === 0 ? 0 : Math.min(this.model.endOffsetAt(endPosition), 0);
    this.model.commit('markStart', left);
    this.model.commit('markEnd', right);

    const duration = this.mapper.duration ?? 0;
    this.markLabels = {
      start: startSeconds === 0 ? null : formatSeconds(clamp(startSeconds, 0, duration)),
      end: endSeconds === 0 ? null : formatSeconds(clamp(endSeconds, 0, duration)),
    };
    this.publishBounds();
  }

  /**
   * Put the mark handles (true) or the trim handles (false) on top of each other
   */
  setHandleLayering(markOnTop: boolean): void {
    this.drags.setLayering(markOnTop);
  }

  /**
   * Enable or disable handle groups. Disabling a group cancels its active drag.
   */
  setInteraction(flags: Partial<HandleGroupFlags>): void {
    this.enabled = { ...this.enabled, ...flags };
    this.cancelDisabledDrags();
    this.publishFlags();
  }

  /**
   * Show or hide handle groups. Hiding a group also disables it.
   */
  setVisibility(flags: Partial<HandleGroupFlags>): void {
    this.visibility = { ...this.visibility, ...flags };
    for (const group of GROUPS) {
      if (!this.visibility[group]) this.enabled[group] = false;
    }
    this.cancelDisabledDrags();
    this.publishFlags();
  }

  private cancelDisabledDrags(): void {
    for (const pair of ['trim', 'mark', 'position'] as const) {
      const handle = this.drags.draggingIn(pair);
      if (handle && !this.enabled[groupOf(handle)]) this.drags.dragCancel(handle);
    }
  }

  // ============================================================================
  // COLLABORATOR EVENTS
  // ============================================================================

  /**
   * A new asset finished loading: every handle returns to its natural edge
   */
  handleAssetChanged(): void {
    logger.info('Asset changed, resetting handles', { duration: this.mapper.duration });
    this.drags.reset();
    this.model.reset();
    this.markLabels = { start: null, end: null };
    this.animator.jumpTo(0);
    this.applyMaxDuration();
    this.events.emit({ type: 'reset' });
    this.publishBounds();
  }

  /**
   * The surface was resized or relaid out
   */
  handleSurfaceChanged(): void {
    this.reclampPosition();
    this.publishBounds();
  }

  /** Scroll came to rest after deceleration */
  handleScrollSettled(): void {
    this.invalidate();
    this.notifier.report(true);
  }

  /** The user released a scroll drag */
  handleScrollDragEnded(willDecelerate: boolean): void {
    this.invalidate();
    if (!willDecelerate) this.notifier.report(true);
  }

  /** The preview scrolled */
  handleScroll(): void {
    this.invalidate();
    this.notifier.report(false);
  }

  /**
   * Stop animations and drop every listener
   */
  dispose(): void {
    this.animator.cancel();
    this.notifier.setDelegate(null);
    this.events.clear();
  }

  // ============================================================================
  // INTERNALS
  // ============================================================================

  /**
   * Pull the end handle in so the selection fits the current cap
   * @returns true when a handle moved
   */
  private applyMaxDuration(): boolean {
    if (!enforceMaxDuration(this.model, this.mapper, this._maxDuration, 'trimStart')) return false;
    this.reclampPosition();
    return true;
  }

  private reclampPosition(): void {
    const offset = this.model.offsetOf('positionBar');
    const clamped = this.model.clampPosition(offset);
    if (clamped !== offset) {
      this.model.commit('positionBar', clamped);
      this.animator.jumpTo(clamped);
    }
  }

  private publishBounds(): void {
    this.invalidate();
    this.events.emit({ type: 'bounds', bounds: this.model.bounds });
  }

  private publishFlags(): void {
    this.invalidate();
    this.events.emit({ type: 'flags', enabled: { ...this.enabled }, visibility: { ...this.visibility } });
  }

  private invalidate(): void {
    this.snapshot = null;
  }
}
