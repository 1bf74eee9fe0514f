import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConnectionCache, connectionKey } from './ConnectionCache.js';

describe('ConnectionCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('refreshes the last use on every hit', () => {
    let now = 1000;
    const cache = new ConnectionCache({ ttl: 100, now: () => now });
    cache.add('dev:80', 40000, vi.fn());

    now = 1090;
    expect(cache.get('dev:80')?.localPort).toBe(40000);
    now = 1150;

    expect(cache.cleanUp()).toEqual([]);
    expect(cache.get('dev:80')?.lastUsed).toBe(1150);
  });

  it('cancels and drops entries idle longer than the TTL', () => {
    let now = 0;
    const cache = new ConnectionCache({ ttl: 100, now: () => now });
    const idle = vi.fn();
    const busy = vi.fn();
    cache.add('idle:80', 40001, idle);
    now = 50;
    cache.add('busy:80', 40002, busy);

    now = 101;
    expect(cache.cleanUp()).toEqual(['idle:80']);
    expect(cache.cleanUp()).toEqual([]);

    expect(idle).toHaveBeenCalledOnce();
    expect(busy).not.toHaveBeenCalled();
    expect(cache.keys()).toEqual(['busy:80']);
  });

  it('cancels a handle only once', () => {
    const cache = new ConnectionCache();
    const cancel = vi.fn();
    const handle = cache.add('dev:80', 40000, cancel);

    handle.cancel();
    cache.remove('dev:80');
    cache.clear();

    expect(cancel).toHaveBeenCalledOnce();
    expect(cache.size).toBe(0);
  });

  it('leaves a newer entry alone when removing a stale handle', () => {
    const cache = new ConnectionCache();
    const first = cache.add('dev:80', 40000, vi.fn());
    const second = cache.add('dev:80', 40001, vi.fn());

    expect(cache.remove('dev:80', first)).toBe(false);
    expect(cache.get('dev:80')).toBe(second);
    expect(cache.remove('dev:80', second)).toBe(true);
    expect(cache.size).toBe(0);
  });

  it('sweeps periodically until stopped', () => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    const cache = new ConnectionCache({ ttl: 1000 });
    const cancel = vi.fn();
    const onRemoved = vi.fn();
    cache.add('dev:80', 40000, cancel);

    const stop = cache.startCleanup(500, onRemoved);
    vi.advanceTimersByTime(1000);
    expect(cancel).not.toHaveBeenCalled();

    vi.advanceTimersByTime(500);
    expect(cancel).toHaveBeenCalledOnce();
    expect(onRemoved).toHaveBeenCalledWith(['dev:80']);
    stop();
  });

  it('builds keys from device and port', () => {
    expect(connectionKey('abc', '8080')).toBe('abc:8080');
  });
});
