/**
 * Duration Constraint
 * Keeps the trimmed interval within the maximum duration by moving the
 * handle the user is not dragging.
 */

import type { BoundsModel } from './BoundsModel';
import type { TimeMapper } from './TimeMapper';

export type TrimHandle = 'trimStart' | 'trimEnd';

/**
 * Re-satisfy endTime - startTime <= maxDuration after `moved` was committed.
 * @returns the handle that was corrected, or null when nothing changed
 */
export function enforceMaxDuration(
  model: BoundsModel,
  mapper: TimeMapper,
  maxDuration: number,
  moved: TrimHandle
): TrimHandle | null {
  if (!Number.isFinite(maxDuration)) return null;

  const duration = mapper.duration;
  const startTime = mapper.timeFor(model.startPosition);
  const endTime = mapper.timeFor(model.endPosition);
  if (duration === undefined || startTime === undefined || endTime === undefined) return null;
  if (endTime - startTime <= maxDuration) return null;

  if (moved === 'trimStart') {
    const targetEnd = startTime + maxDuration;
    const position = mapper.positionFor(targetEnd);
    const offset =
      targetEnd >= duration || position === undefined
        ? 0
        : Math.min(model.endOffsetAt(position), 0);
    return model.commit('trimEnd', offset) ? 'trimEnd' : null;
  }

  const targetStart = Math.max(endTime - maxDuration, 0);
  const position = mapper.positionFor(targetStart) ?? 0;
  const offset = Math.max(model.startOffsetAt(position), 0);
  return model.commit('trimStart', offset) ? 'trimStart' : null;
}
