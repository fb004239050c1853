type Entry<V> = {
  value: V;
  storedAt: number;
};

/** Read-time expiry only; nothing runs in the background. */
export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: { ttlMs: number; now?: () => number }) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}

/** Caches `fn` under `keyPrefix + JSON(args)`. Undefined results are not stored. */
export function memoize<A extends unknown[], V>(
  cache: TtlCache<V>,
  keyPrefix: string,
  fn: (...args: A) => V | undefined
): (...args: A) => V | undefined {
  return (...args: A) => {
    const key = keyPrefix + JSON.stringify(args);
    const hit = cache.get(key);
    if (hit !== undefined) return hit;
    const value = fn(...args);
    if (value !== undefined) cache.set(key, value);
    return value;
  };
}
