import { RecencyIndex, type Handle } from "./recency_index.js";
import { invalidConfiguration } from "./errors.js";

export type EvictCallback<K, V> = (key: K, value: V, size: number) => void;

export type SizedLruOptions<K, V> = {
  sizeLimit: number;
  ttlMs?: number; // 0 = entries never expire
  onEvict?: EvictCallback<K, V>;
  now?: () => number;
};

export type LruEntry<K, V> = {
  key: K;
  value: V;
  size: number;
};

export type LookupResult<V> = { found: true; value: V } | { found: false };

export type SizedLruStats = {
  entries: number;
  size: number;
  size_limit: number;
  ttl_ms: number;
};

type Entry<K, V> = {
  key: K;
  value: V;
  size: number;
  expiresAtMs: number;
};

/**
 * Size-aware LRU cache with optional per-entry TTL.
 *
 * Each entry carries a caller-supplied weight; inserting a new key evicts from the
 * least-recently-used end until the summed weight fits `sizeLimit` again. Expired
 * entries are only discovered when a read touches them.
 *
 * Not safe for concurrent use from multiple owners. `onEvict` runs synchronously and
 * must not call back into the same cache.
 */
export class SizedLru<K, V> {
  private readonly sizeLimit: number;
  private readonly ttlMs: number;
  private readonly onEvict: EvictCallback<K, V> | null;
  private readonly now: () => number;
  private readonly order = new RecencyIndex<Entry<K, V>>();
  private readonly items = new Map<K, Handle>();
  private currentSize = 0;

  constructor(opts: SizedLruOptions<K, V>) {
    if (!Number.isFinite(opts.sizeLimit) || opts.sizeLimit <= 0) {
      invalidConfiguration(`SizedLru: sizeLimit must be >0; got ${opts.sizeLimit}`, { size_limit: opts.sizeLimit });
    }
    const ttlMs = opts.ttlMs ?? 0;
    if (!Number.isFinite(ttlMs)) {
      invalidConfiguration(`SizedLru: ttlMs must be finite; got ${ttlMs}`, { ttl_ms: ttlMs });
    }
    this.sizeLimit = opts.sizeLimit;
    this.ttlMs = ttlMs;
    this.onEvict = opts.onEvict ?? null;
    this.now = opts.now ?? (() => Date.now());
  }

  /**
   * Returns true iff inserting a new key evicted at least one entry. Updates never report eviction.
   *
   * `size` is truncated to an integer. NaN and negative sizes count as 0; +Infinity counts as
   * `sizeLimit + 1`, so such an entry never fits.
   */
  add(key: K, value: V, rawSize: number): boolean {
    const size = normalizeSize(rawSize, this.sizeLimit);
    const existing = this.items.get(key);
    if (existing !== undefined) {
      this.order.moveToFront(existing);
      const e = this.order.get(existing);
      e.value = value;
      this.currentSize += size - e.size;
      e.size = size;
      if (this.ttlMs !== 0) e.expiresAtMs = this.now() + this.ttlMs;
      return false;
    }

    const entry: Entry<K, V> = {
      key,
      value,
      size,
      expiresAtMs: this.ttlMs !== 0 ? this.now() + this.ttlMs : 0,
    };
    this.items.set(key, this.order.pushFront(entry));
    this.currentSize += size;

    let evicted = false;
    while (this.currentSize > this.sizeLimit) {
      const oldest = this.order.back();
      if (oldest === null) break;
      this.removeElement(oldest);
      evicted = true;
    }
    return evicted;
  }

  get(key: K): V | undefined {
    const hit = this.lookup(key);
    return hit.found ? hit.value : undefined;
  }

  // Like get(), but distinguishes a stored `undefined` from a miss.
  lookup(key: K): LookupResult<V> {
    const h = this.liveHandle(key);
    if (h === null) return { found: false };
    this.order.moveToFront(h);
    return { found: true, value: this.order.get(h).value };
  }

  contains(key: K): boolean {
    return this.liveHandle(key) !== null;
  }

  peek(key: K): V | undefined {
    const h = this.liveHandle(key);
    return h === null ? undefined : this.order.get(h).value;
  }

  remove(key: K): boolean {
    const h = this.items.get(key);
    if (h === undefined) return false;
    this.removeElement(h);
    return true;
  }

  removeOldest(): LruEntry<K, V> | undefined {
    const h = this.order.back();
    if (h === null) return undefined;
    return this.removeElement(h);
  }

  getOldest(): LruEntry<K, V> | undefined {
    for (;;) {
      const h = this.order.back();
      if (h === null) return undefined;
      const e = this.order.get(h);
      if (this.isExpired(e)) {
        this.removeElement(h);
        continue;
      }
      return { key: e.key, value: e.value, size: e.size };
    }
  }

  /** Keys from oldest to newest. Expired entries are included. */
  keys(): K[] {
    const out: K[] = [];
    for (const e of this.order.backToFront()) out.push(e.key);
    return out;
  }

  len(): number {
    return this.order.length;
  }

  size(): number {
    return this.currentSize;
  }

  stats(): SizedLruStats {
    return {
      entries: this.order.length,
      size: this.currentSize,
      size_limit: this.sizeLimit,
      ttl_ms: this.ttlMs,
    };
  }

  // Drains oldest first. If onEvict throws, the entries not yet drained stay cached.
  purge() {
    for (let h = this.order.back(); h !== null; h = this.order.back()) this.removeElement(h);
    this.order.clear();
    this.currentSize = 0;
  }

  private liveHandle(key: K): Handle | null {
    const h = this.items.get(key);
    if (h === undefined) return null;
    if (this.isExpired(this.order.get(h))) {
      this.removeElement(h);
      return null;
    }
    return h;
  }

  private isExpired(e: Entry<K, V>): boolean {
    return e.expiresAtMs !== 0 && this.now() > e.expiresAtMs;
  }

  // Both structures and currentSize are consistent again before onEvict runs.
  private removeElement(h: Handle): LruEntry<K, V> {
    const e = this.order.remove(h);
    this.items.delete(e.key);
    this.currentSize -= e.size;
    if (this.onEvict) this.onEvict(e.key, e.value, e.size);
    return { key: e.key, value: e.value, size: e.size };
  }
}

function normalizeSize(size: number, sizeLimit: number): number {
  if (Number.isNaN(size) || size <= 0) return 0;
  if (size === Number.POSITIVE_INFINITY) return Math.trunc(sizeLimit) + 1;
  return Math.trunc(size);
}

export function newSizedLru<K, V>(sizeLimit: number, onEvict?: EvictCallback<K, V>): SizedLru<K, V> {
  return new SizedLru<K, V>({ sizeLimit, onEvict });
}

export function newSizedLruWithTtl<K, V>(sizeLimit: number, ttlMs: number, onEvict?: EvictCallback<K, V>): SizedLru<K, V> {
  return new SizedLru<K, V>({ sizeLimit, ttlMs, onEvict });
}
