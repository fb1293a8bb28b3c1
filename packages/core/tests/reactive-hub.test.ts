import { describe, expect, it, vi } from 'vitest';

import type { HubConfig } from '../src/config/config.js';
import { Scope } from '../src/core/scope.js';
import { token } from '../src/core/token.js';
import { ReactiveHub, type Subscription } from '../src/reactive/reactive-hub.js';
import { createTestRuntime } from './support/runtime.js';

const CountT = token<number>('Count');
const NameT = token<string>('Name');

function createHub(limits: Partial<HubConfig> = {}) {
  const { runtime, logs } = createTestRuntime();
  const scope = new Scope({ name: 'root', runtime });
  const hub = new ReactiveHub((type, tag) => scope.find(type, { tag }), { limits, logger: runtime.logger });
  return { hub, scope, logs };
}

describe('ReactiveHub.listen', () => {
  it('calls the listener right away, even when nothing is bound', () => {
    const { hub } = createHub();
    const listener = vi.fn();

    hub.listen(CountT, listener);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(undefined);
  });

  it('passes the current value on subscription and on every notification', () => {
    const { hub, scope } = createHub();
    const listener = vi.fn();
    scope.register(CountT, 1);

    hub.listen(CountT, listener);
    scope.register(CountT, 2);
    hub.notifyListeners(CountT);

    expect(listener.mock.calls).toEqual([[1], [2]]);
  });

  it('materializes a lazy binding when it reads the value', () => {
    const { hub, scope } = createHub();
    const factory = vi.fn(() => 'lazy');
    scope.lazily(NameT, factory);

    hub.listen(NameT, vi.fn());

    expect(factory).toHaveBeenCalledTimes(1);
    expect(scope.getStats().factories).toBe(0);
  });

  it('keeps tagged and untagged keys apart', () => {
    const { hub, scope } = createHub();
    const untagged = vi.fn();
    const tagged = vi.fn();
    scope.register(NameT, 'tagged', { tag: 'x' });

    hub.listen(NameT, untagged);
    hub.listen(NameT, tagged, { tag: 'x' });
    hub.notifyListeners(NameT);

    expect(untagged).toHaveBeenCalledTimes(2);
    expect(tagged.mock.calls).toEqual([['tagged']]);

    hub.notifyListeners(NameT, { tag: 'x' });
    expect(tagged).toHaveBeenCalledTimes(2);
  });
});

describe('ReactiveHub.notifyListeners', () => {
  it('fans out to every listener once per notification', () => {
    const { hub } = createHub();
    const listeners = [vi.fn(), vi.fn(), vi.fn()];
    listeners.forEach((listener) => hub.listen(CountT, listener));

    hub.notifyListeners(CountT);

    for (const listener of listeners) {
      expect(listener).toHaveBeenCalledTimes(2);
    }
    expect(hub.notificationCount).toBe(1);
  });

  it('counts notifications without listeners', () => {
    const { hub } = createHub();

    hub.notifyListeners(CountT);
    hub.notifyListeners(CountT, { tag: 'x' });

    expect(hub.notificationCount).toBe(2);
  });

  it('isolates a throwing listener from the others and from the notifier', () => {
    const { hub, scope, logs } = createHub();
    const failing = vi.fn((value: number | undefined) => {
      if (value !== undefined) throw new Error('listener failed');
    });
    const healthy = vi.fn();
    hub.listen(CountT, failing);
    hub.listen(CountT, healthy);
    scope.register(CountT, 7);

    expect(() => hub.notifyListeners(CountT)).not.toThrow();

    expect(healthy).toHaveBeenLastCalledWith(7);
    expect(hub.errorCount).toBe(1);
    expect(logs.messages('error')).toEqual(['Error in notification listener call for Count']);
  });

  it('catches errors from the initial call', () => {
    const { hub, logs } = createHub();
    const failing = vi.fn(() => {
      throw new Error('initial failure');
    });

    const subscription = hub.listen(CountT, failing);

    expect(subscription.isDisposed).toBe(false);
    expect(hub.errorCount).toBe(1);
    expect(logs.messages('error')).toEqual(['Error in initial listener call for Count']);
  });

  it('calls a single listener directly and survives its failure', () => {
    const { hub, scope } = createHub();
    const failing = vi.fn((value: number | undefined) => {
      if (value !== undefined) throw new Error('listener failed');
    });
    hub.listen(CountT, failing);
    scope.register(CountT, 1);

    hub.notifyListeners(CountT);

    expect(failing).toHaveBeenCalledTimes(2);
    expect(hub.errorCount).toBe(1);
  });

  it('lets a listener dispose itself mid-notification', () => {
    const { hub, scope } = createHub();
    const first = vi.fn();
    const last = vi.fn();
    let self: Subscription | undefined;

    hub.listen(CountT, first);
    self = hub.listen(CountT, (value) => {
      if (value !== undefined) self?.dispose();
    });
    hub.listen(CountT, last);
    scope.register(CountT, 1);

    hub.notifyListeners(CountT);

    expect(first).toHaveBeenCalledTimes(2);
    expect(last).toHaveBeenCalledTimes(2);
    expect(self.isDisposed).toBe(true);
    expect(hub.getListenerCount(CountT)).toBe(2);
  });
});

describe('ReactiveHub raw keys', () => {
  it('signals listeners of a raw key', () => {
    const { hub } = createHub();
    const signal = vi.fn();

    const subscription = hub.listenKey('cart:updated', signal);
    hub.notifyKey('cart:updated');
    hub.notifyKey('other');

    expect(signal).toHaveBeenCalledTimes(2);
    expect(subscription.key).toBe('cart:updated');
  });

  it('shares the key space with typed listeners', () => {
    const { hub } = createHub();
    const listener = vi.fn();

    hub.listen(CountT, listener, { tag: 'x' });
    hub.notifyKey(`${CountT.id}:x`);

    expect(listener).toHaveBeenCalledTimes(2);
  });
});

describe('ReactiveHub subscriptions', () => {
  it('removes a key with its last subscription', () => {
    const { hub } = createHub();
    const first = hub.listen(CountT, vi.fn());
    const second = hub.listen(CountT, vi.fn());

    first.dispose();
    expect(hub.getMemoryStats()).toMatchObject({ totalKeys: 1, totalListeners: 1 });
    expect(hub.hasListeners(CountT)).toBe(true);

    second.close();
    expect(hub.getMemoryStats()).toMatchObject({ totalKeys: 0, totalListeners: 0 });
    expect(hub.hasListeners(CountT)).toBe(false);
    expect(second.isDisposed).toBe(true);
  });

  it('disposes idempotently', () => {
    const { hub } = createHub();
    const listener = vi.fn();
    const subscription = hub.listen(CountT, listener);
    hub.listen(CountT, vi.fn());

    subscription.dispose();
    subscription.dispose();
    hub.notifyListeners(CountT);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(hub.getListenerCount(CountT)).toBe(1);
  });

  it('clears every listener and resets the counters', () => {
    const { hub } = createHub();
    const listener = vi.fn();
    const a = hub.listen(CountT, listener);
    const b = hub.listen(NameT, vi.fn());
    hub.notifyListeners(CountT);

    hub.clearListeners();
    hub.notifyListeners(CountT);

    expect(a.isDisposed).toBe(true);
    expect(b.isDisposed).toBe(true);
    expect(listener).toHaveBeenCalledTimes(2);
    expect(hub.getMemoryStats()).toEqual({
      totalKeys: 0,
      totalListeners: 0,
      maxListenersPerKey: 0,
      averageListenersPerKey: 0,
      peakListenersPerKey: 0,
      notificationCount: 1,
      errorCount: 0,
    });
  });
});

describe('ReactiveHub observability', () => {
  it('reports memory statistics', () => {
    const { hub } = createHub();
    const counts = [hub.listen(CountT, vi.fn()), hub.listen(CountT, vi.fn()), hub.listen(CountT, vi.fn())];
    hub.listen(NameT, vi.fn());

    expect(hub.getMemoryStats()).toEqual({
      totalKeys: 2,
      totalListeners: 4,
      maxListenersPerKey: 3,
      averageListenersPerKey: 2,
      peakListenersPerKey: 3,
      notificationCount: 0,
      errorCount: 0,
    });

    counts.forEach((subscription) => subscription.dispose());

    expect(hub.getMemoryStats()).toMatchObject({ totalKeys: 1, maxListenersPerKey: 1, peakListenersPerKey: 3 });
    expect(hub.peakListenersPerKey).toBe(3);
  });

  it('is healthy under the limits', () => {
    const { hub } = createHub();
    hub.listen(CountT, vi.fn());

    const health = hub.getHealthStatus();

    expect(health.status).toBe('healthy');
    expect(health.memoryPressure).toBe('low');
    expect(health.issues).toEqual([]);
    expect(health.stats.totalListeners).toBe(1);
  });

  it('warns when a key exceeds its listener limit', () => {
    const { hub } = createHub({ maxListenersPerKey: 2, maxTotalListeners: 10 });
    for (let i = 0; i < 3; i++) hub.listen(CountT, vi.fn());

    const health = hub.getHealthStatus();

    expect(health.status).toBe('warning');
    expect(health.memoryPressure).toBe('medium');
    expect(health.issues).toEqual(['A key has 3 listeners (limit 2)']);
  });

  it('warns when the total approaches its limit', () => {
    const { hub } = createHub({ maxTotalListeners: 10 });
    for (let i = 0; i < 9; i++) hub.listen(token(`Key${i}`), vi.fn());

    const health = hub.getHealthStatus();

    expect(health.status).toBe('warning');
    expect(health.memoryPressure).toBe('medium');
    expect(health.issues).toEqual(['Total listeners (9) approaching limit (10)']);
  });

  it('is critical when the total exceeds its limit', () => {
    const { hub } = createHub({ maxTotalListeners: 2 });
    hub.listen(CountT, vi.fn());
    hub.listen(NameT, vi.fn());
    hub.listenKey('signal', vi.fn());

    const health = hub.getHealthStatus();

    expect(health.status).toBe('critical');
    expect(health.memoryPressure).toBe('high');
    expect(health.issues).toEqual(['Total listeners (3) exceed limit (2)']);
  });

  it('warns about a high listener error rate', () => {
    const { hub, scope } = createHub();
    hub.listen(CountT, (value) => {
      if (value !== undefined) throw new Error('listener failed');
    });
    scope.register(CountT, 1);
    hub.notifyListeners(CountT);

    const health = hub.getHealthStatus();

    expect(health.status).toBe('warning');
    expect(health.issues).toEqual(['High listener error rate: 1 errors in 1 notifications']);
  });

  it('runs maintenance every maintenanceInterval notifications', () => {
    const { hub, logs } = createHub({ maintenanceInterval: 2, maxListenersPerKey: 1 });
    hub.listen(CountT, vi.fn());
    hub.listen(CountT, vi.fn());

    hub.notifyListeners(CountT);
    expect(logs.messages('warn')).toEqual([]);

    hub.notifyListeners(CountT);
    expect(logs.messages('warn')).toEqual(['Reactive hub health is warning: A key has 2 listeners (limit 1)']);
  });

  it('runs maintenance on demand', () => {
    const { hub } = createHub();
    hub.listen(CountT, vi.fn());

    expect(hub.runMaintenance()).toBe(0);
    expect(hub.getMemoryStats().totalKeys).toBe(1);
  });

  it('dumps listeners by key, largest first', () => {
    const { hub } = createHub();
    hub.listenKey('signal', vi.fn());
    hub.listen(CountT, vi.fn(), { tag: 'x' });
    hub.listen(CountT, vi.fn());
    hub.listen(CountT, vi.fn());

    expect(hub.dumpListeners()).toBe(
      [
        'Reactive hub: 3 key(s), 4 listener(s)',
        `  Count [${CountT.id}]: 2`,
        '  signal [signal]: 1',
        `  Count(x) [${CountT.id}:x]: 1`,
      ].join('\n')
    );
  });
});
