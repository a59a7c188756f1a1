import { LRUCache } from "lru-cache";

export type CacheKey = string;

/** Canonical key for an (operation, parameters) tuple. */
export function cacheKey(operation: string, ...params: readonly string[]): CacheKey {
  return JSON.stringify([operation, ...params]);
}

export interface AssetCacheOptions {
  maxEntries: number;
  defaultTtlMs: number;
  now?: () => number;
}

export interface ComputeOptions<V> {
  ttlMs?: number | ((value: V) => number);
  /** Tags the stored entry can later be invalidated by. */
  tags?: (value: V) => readonly string[];
}

type Entry<V> = {
  value: V;
  expiresAt: number;
  tags: readonly string[];
};

type Flight<V> = {
  promise: Promise<V>;
  marker: object;
};

/**
 * Bounded TTL + LRU cache with per-key single flight.
 *
 * Entries are a disposable projection of backend state: a lost entry only
 * costs a backend round trip. A computation still answers its waiters but is
 * not stored when its own key, or a tag its value carries, was invalidated
 * while it ran.
 */
export class AssetCache<V> {
  private entries: LRUCache<CacheKey, Entry<V>>;
  private inFlight = new Map<CacheKey, Flight<V>>();
  private tagIndex = new Map<string, Set<CacheKey>>();
  // tag -> sequence number of its latest invalidation; only kept while flights run
  private tagInvalidations = new Map<string, number>();
  private sequence = 0;
  private now: () => number;
  private defaultTtlMs: number;

  constructor(options: AssetCacheOptions) {
    if (!Number.isInteger(options.maxEntries) || options.maxEntries < 1) {
      throw new RangeError("maxEntries must be a positive integer");
    }
    this.now = options.now ?? Date.now;
    this.defaultTtlMs = options.defaultTtlMs;
    this.entries = new LRUCache<CacheKey, Entry<V>>({
      max: options.maxEntries,
      dispose: (entry, key) => this.untag(key, entry.tags),
    });
  }

  get size(): number {
    return this.entries.size;
  }

  /** Unexpired value for `key`, without computing. */
  peek(key: CacheKey): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async getOrCompute(
    key: CacheKey,
    compute: () => Promise<V>,
    options: ComputeOptions<V> = {}
  ): Promise<V> {
    const entry = this.entries.get(key);
    if (entry) {
      if (entry.expiresAt > this.now()) return entry.value;
      this.entries.delete(key);
    }

    const pending = this.inFlight.get(key);
    if (pending) return pending.promise;

    return this.startFlight(key, compute, options);
  }

  invalidate(key: CacheKey): void {
    this.inFlight.delete(key);
    this.entries.delete(key);
  }

  invalidateTag(tag: string): void {
    if (this.inFlight.size > 0) {
      this.tagInvalidations.set(tag, ++this.sequence);
    }
    const keys = this.tagIndex.get(tag);
    if (!keys) return;
    for (const key of [...keys]) {
      this.entries.delete(key);
    }
    this.tagIndex.delete(tag);
  }

  clear(): void {
    this.inFlight.clear();
    this.entries.clear();
    this.tagIndex.clear();
    this.tagInvalidations.clear();
  }

  private startFlight(
    key: CacheKey,
    compute: () => Promise<V>,
    options: ComputeOptions<V>
  ): Promise<V> {
    const marker = {};
    const startedAt = this.sequence;
    // invalidate(key) and clear() drop the flight, so a replaced flight never stores
    const isOwnFlight = () => this.inFlight.get(key)?.marker === marker;

    const promise = (async () => {
      // registers the flight before compute can settle
      await Promise.resolve();
      try {
        const value = await compute();
        if (isOwnFlight()) {
          this.store(key, value, options, startedAt);
        }
        return value;
      } finally {
        if (isOwnFlight()) this.inFlight.delete(key);
        if (this.inFlight.size === 0) this.tagInvalidations.clear();
      }
    })();

    this.inFlight.set(key, { promise, marker });
    return promise;
  }

  private store(key: CacheKey, value: V, options: ComputeOptions<V>, startedAt: number) {
    const ttl =
      typeof options.ttlMs === "function"
        ? options.ttlMs(value)
        : options.ttlMs ?? this.defaultTtlMs;
    if (ttl <= 0) return;

    const tags = options.tags?.(value) ?? [];
    if (tags.some((tag) => (this.tagInvalidations.get(tag) ?? 0) > startedAt)) return;

    this.entries.set(key, { value, expiresAt: this.now() + ttl, tags });
    for (const tag of tags) {
      let keys = this.tagIndex.get(tag);
      if (!keys) {
        keys = new Set();
        this.tagIndex.set(tag, keys);
      }
      keys.add(key);
    }
  }

  private untag(key: CacheKey, tags: readonly string[]) {
    for (const tag of tags) {
      const keys = this.tagIndex.get(tag);
      if (!keys) continue;
      keys.delete(key);
      if (keys.size === 0) this.tagIndex.delete(tag);
    }
  }
}
