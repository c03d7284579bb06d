import { describe, it, expect, vi, afterEach } from 'vitest';
import { PositionNotifier } from '../../core/PositionNotifier';
import { TrimmerEventEmitter } from '../../core/TrimmerEvents';

function createDelegate() {
  return {
    onPositionChanged: vi.fn(),
    onPositionSettled: vi.fn(),
  };
}

describe('PositionNotifier', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should report a moving position as changed', () => {
    const notifier = new PositionNotifier(new TrimmerEventEmitter(), () => 2.5);
    const delegate = createDelegate();
    notifier.setDelegate(delegate);

    notifier.report(false);

    expect(delegate.onPositionChanged).toHaveBeenCalledWith(2.5);
    expect(delegate.onPositionSettled).not.toHaveBeenCalled();
  });

  it('should report a stopped position as settled', () => {
    const notifier = new PositionNotifier(new TrimmerEventEmitter(), () => 4);
    const delegate = createDelegate();
    notifier.setDelegate(delegate);

    notifier.report(true);

    expect(delegate.onPositionSettled).toHaveBeenCalledWith(4);
    expect(delegate.onPositionChanged).not.toHaveBeenCalled();
  });

  it('should stay silent when the time is unknown', () => {
    const events = new TrimmerEventEmitter();
    const listener = vi.fn();
    events.on(listener);
    const notifier = new PositionNotifier(events, () => undefined);
    const delegate = createDelegate();
    notifier.setDelegate(delegate);

    notifier.report(true);

    expect(delegate.onPositionSettled).not.toHaveBeenCalled();
    expect(listener).not.toHaveBeenCalled();
  });

  it('should publish the position on the change channel', () => {
    const events = new TrimmerEventEmitter();
    const listener = vi.fn();
    events.on(listener);
    const notifier = new PositionNotifier(events, () => 1.5);

    notifier.report(false);

    expect(listener).toHaveBeenCalledWith({ type: 'position', time: 1.5, stoppedMoving: false });
  });

  it('should log delegate errors and still publish', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const events = new TrimmerEventEmitter();
    const listener = vi.fn();
    events.on(listener);
    const notifier = new PositionNotifier(events, () => 3);
    notifier.setDelegate({
      onPositionChanged: () => {
        throw new Error('host failure');
      },
      onPositionSettled: vi.fn(),
    });

    notifier.report(false);

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
