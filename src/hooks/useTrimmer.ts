import { useCallback, useEffect, useRef, useSyncExternalStore } from 'react';
import type { PointerEvent as ReactPointerEvent } from 'react';
import type { Trimmer } from '../core/Trimmer';
import type { HandleId, TrimmerSnapshot } from '../core/types';

interface HandleProps {
  onPointerDown: (e: ReactPointerEvent) => void;
}

interface UseTrimmerReturn {
  /** Current trimmer state, re-rendered on every change */
  snapshot: TrimmerSnapshot;
  /** Props to spread on a handle element */
  getHandleProps: (handle: HandleId) => HandleProps;
}

interface ActiveDrag {
  handle: HandleId;
  startX: number;
}

/**
 * Hook binding a Trimmer to DOM pointer events.
 * Pointer down on a handle starts a drag; document pointer events drive it
 * with the cumulative translation since pointer down.
 */
export function useTrimmer(trimmer: Trimmer): UseTrimmerReturn {
  const subscribe = useCallback((onChange: () => void) => trimmer.on(onChange), [trimmer]);
  const getSnapshot = useCallback(() => trimmer.getSnapshot(), [trimmer]);
  const snapshot = useSyncExternalStore(subscribe, getSnapshot, getSnapshot);

  const activeDragsRef = useRef<Map<number, ActiveDrag>>(new Map());
  const detachRef = useRef<(() => void) | null>(null);

  const detach = useCallback(() => {
    detachRef.current?.();
    detachRef.current = null;
  }, []);

  const attach = useCallback(() => {
    if (detachRef.current) return;

    const drags = activeDragsRef.current;

    const finish = (e: PointerEvent, cancelled: boolean) => {
      const drag = drags.get(e.pointerId);
      if (!drag) return;
      drags.delete(e.pointerId);
      if (cancelled) {
        trimmer.dragCancel(drag.handle);
      } else {
        trimmer.dragEnd(drag.handle);
      }
      if (drags.size === 0) detach();
    };

    const handlePointerMove = (e: PointerEvent) => {
      const drag = drags.get(e.pointerId);
      if (!drag) return;
      trimmer.dragMove(drag.handle, e.clientX - drag.startX);
    };
    const handlePointerUp = (e: PointerEvent) => finish(e, false);
    const handlePointerCancel = (e: PointerEvent) => finish(e, true);

    document.addEventListener('pointermove', handlePointerMove);
    document.addEventListener('pointerup', handlePointerUp);
    document.addEventListener('pointercancel', handlePointerCancel);

    detachRef.current = () => {
      document.removeEventListener('pointermove', handlePointerMove);
      document.removeEventListener('pointerup', handlePointerUp);
      document.removeEventListener('pointercancel', handlePointerCancel);
    };
  }, [trimmer, detach]);

  const getHandleProps = useCallback(
    (handle: HandleId): HandleProps => ({
      onPointerDown: (e: ReactPointerEvent) => {
        e.preventDefault();
        e.stopPropagation();
        if (!trimmer.dragStart(handle)) return;
        activeDragsRef.current.set(e.pointerId, { handle, startX: e.clientX });
        attach();
      },
    }),
    [trimmer, attach]
  );

  // Drop listeners on unmount or when the trimmer is swapped
  useEffect(() => {
    const drags = activeDragsRef.current;
    return () => {
      for (const drag of drags.values()) {
        trimmer.dragCancel(drag.handle);
      }
      drags.clear();
      detach();
    };
  }, [trimmer, detach]);

  return { snapshot, getHandleProps };
}
