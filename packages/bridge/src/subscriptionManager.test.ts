import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { BridgeError, logger } from '@hostbridge/utils';
import { SubscriptionManager } from './subscriptionManager';

interface FakeSource {
  subscribe: (onEvent: (event: unknown) => void, onError: (error: unknown) => void) => () => void;
  emit: (event: unknown) => void;
  fail: (error: unknown) => void;
  stop: Mock<[], void>;
}

function createSource(): FakeSource {
  let listener: ((event: unknown) => void) | null = null;
  let errorListener: ((error: unknown) => void) | null = null;
  const stop = vi.fn(() => {
    listener = null;
    errorListener = null;
  });
  return {
    subscribe: (onEvent, onError) => {
      listener = onEvent;
      errorListener = onError;
      return stop;
    },
    emit: (event) => listener?.(event),
    fail: (error) => errorListener?.(error),
    stop,
  };
}

describe('SubscriptionManager', () => {
  beforeEach(() => {
    vi.spyOn(logger, 'warn').mockImplementation(() => {});
    vi.spyOn(logger, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should hand out unique, never reused ids', () => {
    const manager = new SubscriptionManager({ idPrefix: 'watch' });
    const handlers = { onEvent: vi.fn(), onError: vi.fn() };

    const first = manager.start('geolocation.watchPosition', createSource().subscribe, handlers);
    manager.cancel(first);
    const second = manager.start('geolocation.watchPosition', createSource().subscribe, handlers);

    expect(first).toBe('watch-1');
    expect(second).toBe('watch-2');
  });

  it('should deliver every event with its subscription id', () => {
    const manager = new SubscriptionManager();
    const source = createSource();
    const onEvent = vi.fn();

    const id = manager.start('geolocation.watchPosition', source.subscribe, { onEvent, onError: vi.fn() });
    source.emit({ n: 1 });
    source.emit({ n: 2 });

    expect(id).toBe('sub-1');
    expect(onEvent.mock.calls).toEqual([
      [{ n: 1 }, 'sub-1'],
      [{ n: 2 }, 'sub-1'],
    ]);
  });

  it('should make cancel idempotent and stop delivery', () => {
    const onEnded = vi.fn();
    const manager = new SubscriptionManager({ onEnded });
    const source = createSource();
    const onEvent = vi.fn();
    const id = manager.start('geolocation.watchPosition', source.subscribe, { onEvent, onError: vi.fn() });

    expect(manager.cancel(id)).toBe(true);
    expect(manager.cancel(id)).toBe(false);
    expect(manager.cancel('sub-99')).toBe(false);
    source.emit({ n: 1 });

    expect(source.stop).toHaveBeenCalledTimes(1);
    expect(onEvent).not.toHaveBeenCalled();
    expect(onEnded).toHaveBeenCalledTimes(1);
    expect(onEnded).toHaveBeenCalledWith(id, 'cancelled');
  });

  it('should drop events an adapter emits after it was cancelled', () => {
    const manager = new SubscriptionManager();
    const captured: { emit?: (event: unknown) => void } = {};
    const onEvent = vi.fn();
    const id = manager.start(
      'geolocation.watchPosition',
      (emit) => {
        captured.emit = emit;
        return () => {};
      },
      { onEvent, onError: vi.fn() },
    );

    manager.cancel(id);
    captured.emit?.({ n: 1 });

    expect(onEvent).not.toHaveBeenCalled();
  });

  it('should end a subscription on its first error and report it once', () => {
    const manager = new SubscriptionManager();
    const source = createSource();
    const onError = vi.fn();
    const id = manager.start('geolocation.watchPosition', source.subscribe, { onEvent: vi.fn(), onError });

    source.fail(new BridgeError('OperationFailed', 'Geolocation watch failed: signal lost'));

    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError).toHaveBeenCalledWith(
      { kind: 'OperationFailed', message: 'Geolocation watch failed: signal lost' },
      id,
    );
    expect(source.stop).toHaveBeenCalledTimes(1);
    expect(manager.activeCount).toBe(0);
    expect(manager.cancel(id)).toBe(false);
  });

  it('should stop everything on disposeAll and refuse new subscriptions', () => {
    const onEnded = vi.fn();
    const manager = new SubscriptionManager({ onEnded });
    const sources = [createSource(), createSource()];
    const onEvent = vi.fn();
    for (const source of sources) {
      manager.start('geolocation.watchPosition', source.subscribe, { onEvent, onError: vi.fn() });
    }

    manager.disposeAll();
    for (const source of sources) {
      source.emit({ n: 1 });
    }

    expect(manager.activeCount).toBe(0);
    expect(onEvent).not.toHaveBeenCalled();
    expect(sources.map((source) => source.stop.mock.calls.length)).toEqual([1, 1]);
    expect(onEnded.mock.calls).toEqual([
      ['sub-1', 'disposed'],
      ['sub-2', 'disposed'],
    ]);
    expect(() =>
      manager.start('geolocation.watchPosition', createSource().subscribe, { onEvent, onError: vi.fn() }),
    ).toThrow(BridgeError);
  });

  it('should keep disposing when a cancel thunk throws', () => {
    const manager = new SubscriptionManager();
    const healthy = createSource();
    manager.start(
      'geolocation.watchPosition',
      () => () => {
        throw new Error('already gone');
      },
      { onEvent: vi.fn(), onError: vi.fn() },
    );
    manager.start('geolocation.watchPosition', healthy.subscribe, { onEvent: vi.fn(), onError: vi.fn() });

    expect(() => manager.disposeAll()).not.toThrow();
    expect(healthy.stop).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('[SubscriptionManager] Cancelling subscription threw', {
      subscriptionId: 'sub-1',
      error: 'already gone',
    });
  });

  it('should leave nothing registered when the adapter fails to start', () => {
    const manager = new SubscriptionManager();

    expect(() =>
      manager.start(
        'geolocation.watchPosition',
        () => {
          throw new Error('no provider');
        },
        { onEvent: vi.fn(), onError: vi.fn() },
      ),
    ).toThrow('no provider');
    expect(manager.activeCount).toBe(0);
  });

  it('should stop a stream that failed while it was being set up', () => {
    const manager = new SubscriptionManager();
    const stop = vi.fn();
    const onError = vi.fn();

    manager.start(
      'geolocation.watchPosition',
      (_onEvent, fail) => {
        fail(new Error('denied mid-setup'));
        return stop;
      },
      { onEvent: vi.fn(), onError },
    );

    expect(onError).toHaveBeenCalledWith({ kind: 'OperationFailed', message: 'denied mid-setup' }, 'sub-1');
    expect(stop).toHaveBeenCalledTimes(1);
    expect(manager.activeCount).toBe(0);
  });
});
