// ============================================
// CONSOLIDATION RESULT CACHE
// ============================================
// TTL memo for consolidations.
//
// - Keyed by (address, blockchain, sources filter, min confidence filter)
// - Lazy expiry: entries are checked on read, never swept
// - Concurrent misses for one key share a single computation
// - Null results are returned but not stored
// - Invalidating a key while it computes discards that computation's result

import { CONFIDENCE_LABELS } from '../config/constants.js';
import type {
  AdapterSourceName,
  AttributionConfidence,
  AttributionConsolidation,
  Blockchain,
  CacheStats,
} from '../types/index.js';

export interface CacheKeyInput {
  address: string;
  blockchain: Blockchain;
  sources?: readonly AdapterSourceName[];
  minConfidence?: AttributionConfidence;
}

interface CacheEntry {
  value: AttributionConsolidation;
  timestamp: number;
  addressKey: string;
}

interface PendingEntry {
  addressKey: string;
  stale: boolean;
  promise: Promise<AttributionConsolidation | null>;
}

export interface ResultCacheOptions {
  ttlSeconds: number;
  /** Milliseconds since epoch */
  now?: () => number;
}

/**
 * Serialize a cache key. Source order does not matter.
 */
export function cacheKey(input: CacheKeyInput): string {
  const sources = input.sources && input.sources.length > 0
    ? [...new Set(input.sources)].sort().join(',')
    : 'all';
  const minConfidence = input.minConfidence === undefined ? 'all' : CONFIDENCE_LABELS[input.minConfidence];
  return `${addressKey(input.address, input.blockchain)}|${sources}|${minConfidence}`;
}

function addressKey(address: string, blockchain: Blockchain): string {
  return `${blockchain}:${address}`;
}

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, PendingEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: ResultCacheOptions) {
    this.ttlMs = options.ttlSeconds * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Fresh entry or null. Expired entries are dropped here.
   */
  get(input: CacheKeyInput): AttributionConsolidation | null {
    const key = cacheKey(input);
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (this.now() - entry.timestamp >= this.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  set(input: CacheKeyInput, value: AttributionConsolidation): void {
    this.entries.set(cacheKey(input), {
      value,
      timestamp: this.now(),
      addressKey: addressKey(input.address, input.blockchain),
    });
  }

  /**
   * Return the cached value, or run `compute` once for all concurrent callers
   * of the same key and store a non-null result.
   */
  async getOrCompute(
    input: CacheKeyInput,
    compute: () => Promise<AttributionConsolidation | null>
  ): Promise<AttributionConsolidation | null> {
    const cached = this.get(input);
    if (cached) {
      this.hits++;
      return cached;
    }

    const key = cacheKey(input);
    const pending = this.inFlight.get(key);
    if (pending) {
      this.hits++;
      return pending.promise;
    }

    this.misses++;
    const entry: PendingEntry = {
      addressKey: addressKey(input.address, input.blockchain),
      stale: false,
      promise: Promise.resolve(null),
    };
    entry.promise = compute()
      .then(value => {
        if (value && !entry.stale) this.set(input, value);
        return value;
      })
      .finally(() => {
        if (this.inFlight.get(key) === entry) this.inFlight.delete(key);
      });

    this.inFlight.set(key, entry);
    return entry.promise;
  }

  /**
   * Drop one key, or everything
   */
  clear(input?: CacheKeyInput): void {
    if (input) {
      const key = cacheKey(input);
      this.entries.delete(key);
      this.abandon(key);
      return;
    }
    this.entries.clear();
    for (const key of [...this.inFlight.keys()]) {
      this.abandon(key);
    }
    this.hits = 0;
    this.misses = 0;
  }

  /**
   * Drop every filter variant cached for an address
   */
  invalidateAddress(address: string, blockchain: Blockchain): number {
    const target = addressKey(address, blockchain);
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.addressKey === target) {
        this.entries.delete(key);
        removed++;
      }
    }
    for (const [key, pending] of [...this.inFlight]) {
      if (pending.addressKey === target) this.abandon(key);
    }
    return removed;
  }

  /**
   * The computation still settles for its callers but is not stored,
   * and the next caller starts a fresh one.
   */
  private abandon(key: string): void {
    const pending = this.inFlight.get(key);
    if (!pending) return;
    pending.stale = true;
    this.inFlight.delete(key);
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
    };
  }
}
