import type { ClockPort } from '@feedgate/domain';
import { systemClock } from '../clock/clock.js';

export interface TtlCacheOptions {
  ttlMs: number;
  /** Oldest entry is evicted once this many are held. */
  maxEntries: number;
  clock?: ClockPort;
}

export interface TtlCacheStats {
  totalEntries: number;
  validEntries: number;
  hits: number;
  misses: number;
  hitRate: number;
  ttlMs: number;
  maxEntries: number;
}

interface Entry<V> {
  value: V;
  storedAtMs: number;
}

/** Bounded map whose entries expire `ttlMs` after they were stored. */
export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly clock: ClockPort;
  private hits = 0;
  private misses = 0;

  constructor(opts: TtlCacheOptions) {
    if (opts.ttlMs <= 0 || opts.maxEntries <= 0) {
      throw new RangeError('TtlCache needs a positive ttlMs and maxEntries');
    }
    this.ttlMs = opts.ttlMs;
    this.maxEntries = opts.maxEntries;
    this.clock = opts.clock ?? systemClock;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (entry && this.isFresh(entry, this.clock.now().getTime())) {
      this.hits++;
      return entry.value;
    }
    if (entry) this.entries.delete(key);
    this.misses++;
    return undefined;
  }

  set(key: string, value: V): void {
    const nowMs = this.clock.now().getTime();
    this.entries.delete(key);
    this.evictExpired(nowMs);
    while (this.entries.size >= this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value, storedAtMs: nowMs });
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): TtlCacheStats {
    const nowMs = this.clock.now().getTime();
    let validEntries = 0;
    for (const entry of this.entries.values()) {
      if (this.isFresh(entry, nowMs)) validEntries++;
    }
    const lookups = this.hits + this.misses;
    return {
      totalEntries: this.entries.size,
      validEntries,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
      ttlMs: this.ttlMs,
      maxEntries: this.maxEntries,
    };
  }

  private isFresh(entry: Entry<V>, nowMs: number): boolean {
    return nowMs - entry.storedAtMs < this.ttlMs;
  }

  private evictExpired(nowMs: number): void {
    for (const [key, entry] of this.entries) {
      if (!this.isFresh(entry, nowMs)) this.entries.delete(key);
    }
  }
}
