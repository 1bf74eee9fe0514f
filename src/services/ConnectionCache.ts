export const DEFAULT_CONNECTION_TTL_MS = 5 * 60 * 1000;
export const DEFAULT_CLEANUP_INTERVAL_MS = 60 * 1000;

/** A running device tunnel owned by the cache */
export interface TunnelHandle {
  key: string;
  localPort: number;
  cancel(): void;
  lastUsed: number;
}

export interface ConnectionCacheOptions {
  /** Idle time after which a tunnel is torn down */
  ttl?: number;
  now?: () => number;
}

export function connectionKey(deviceId: string, devicePort: string | number): string {
  return `${deviceId}:${devicePort}`;
}

/**
 * Live tunnels keyed by `deviceId:port`.
 *
 * Every method is synchronous, so each runs to completion on the event loop
 * without interleaving.
 */
export class ConnectionCache {
  private readonly entries = new Map<string, TunnelHandle>();
  private readonly ttl: number;
  private readonly now: () => number;

  constructor(options: ConnectionCacheOptions = {}) {
    this.ttl = options.ttl ?? DEFAULT_CONNECTION_TTL_MS;
    this.now = options.now ?? (() => Date.now());
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /** Registers a tunnel; its cancel runs at most once however it is removed. */
  add(key: string, localPort: number, cancel: () => void): TunnelHandle {
    let cancelled = false;
    const handle: TunnelHandle = {
      key,
      localPort,
      lastUsed: this.now(),
      cancel: () => {
        if (cancelled) return;
        cancelled = true;
        cancel();
      },
    };

    const previous = this.entries.get(key);
    this.entries.set(key, handle);
    previous?.cancel();
    return handle;
  }

  /** Looks up a tunnel and marks it used. */
  get(key: string): TunnelHandle | undefined {
    const handle = this.entries.get(key);
    if (handle) {
      handle.lastUsed = this.now();
    }
    return handle;
  }

  /**
   * Removes and cancels the entry. With `handle`, only that exact entry is
   * removed, so a late watcher cannot evict a newer tunnel for the key.
   */
  remove(key: string, handle?: TunnelHandle): boolean {
    const current = this.entries.get(key);
    if (!current || (handle && current !== handle)) {
      return false;
    }
    this.entries.delete(key);
    current.cancel();
    return true;
  }

  /** Cancels every tunnel idle longer than the TTL and returns their keys. */
  cleanUp(): string[] {
    const cutoff = this.now() - this.ttl;
    const removed: string[] = [];

    for (const [key, handle] of this.entries) {
      if (handle.lastUsed < cutoff) {
        this.entries.delete(key);
        handle.cancel();
        removed.push(key);
      }
    }

    return removed;
  }

  /** Sweeps on an interval; call the returned function to stop. */
  startCleanup(interval = DEFAULT_CLEANUP_INTERVAL_MS, onRemoved?: (keys: string[]) => void): () => void {
    const timer = setInterval(() => {
      const removed = this.cleanUp();
      if (removed.length > 0) {
        onRemoved?.(removed);
      }
    }, interval);
    timer.unref();
    return () => clearInterval(timer);
  }

  clear(): void {
    const handles = [...this.entries.values()];
    this.entries.clear();
    for (const handle of handles) {
      handle.cancel();
    }
  }
}
