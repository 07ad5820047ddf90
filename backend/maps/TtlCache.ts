// Read-through cache abstraction shared by the geocoder and the search orchestrator.
// - Entries are immutable once written: insert-if-absent-or-expired, never overwrite a live entry.
// - Expired entries are evicted lazily on read.

export interface Cache<V> {
  get(key: string): V | undefined;

  // Stores `value` unless a live entry exists; returns whichever value is now cached.
  setIfAbsent(key: string, value: V): V;
}

type Entry<V> = { readonly value: V; readonly expiresAt: number };

export class TtlCache<V> implements Cache<V> {
  private readonly entries = new Map<string, Entry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly maxEntries = 5000,
    private readonly now: () => number = Date.now,
  ) {
    if (!(ttlMs > 0)) throw new Error("TtlCache ttlMs must be positive.");
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  setIfAbsent(key: string, value: V): V {
    const live = this.get(key);
    if (live !== undefined) return live;

    if (this.entries.size >= this.maxEntries) {
      // Map iteration order is insertion order: drop the oldest entry.
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
    return value;
  }

  get size(): number {
    return this.entries.size;
  }
}

// Never stores anything. Useful to make tests observe every upstream call.
export class NoopCache<V> implements Cache<V> {
  get(_key: string): V | undefined {
    return undefined;
  }

  setIfAbsent(_key: string, value: V): V {
    return value;
  }
}

export async function readThrough<V>(cache: Cache<V>, key: string, load: () => Promise<V>): Promise<V> {
  const hit = cache.get(key);
  if (hit !== undefined) return hit;
  return cache.setIfAbsent(key, await load());
}
