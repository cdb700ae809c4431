import { inspect } from "node:util";

import type { Clock } from "./deadline.js";

/**
 * Serialises arbitrary data into a deterministic JSON string so cache keys
 * remain stable regardless of property insertion order. Arrays preserve their
 * order while objects are sorted lexicographically by key.
 */
export function serialiseCacheVariant(value: unknown): string {
  if (value === undefined) {
    return "undefined";
  }
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map((entry) => serialiseCacheVariant(entry)).join(",")}]`;
  }
  const entries = Object.entries(value)
    .filter(([, entryValue]) => entryValue !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, entryValue]) => `${JSON.stringify(key)}:${serialiseCacheVariant(entryValue)}`);
  return `{${entries.join(",")}}`;
}

/** Query parameters that identify a cacheable result. */
export type CacheQueryShape =
  | { readonly kind: "path"; readonly source: string; readonly target: string; readonly maxDepth: number }
  | { readonly kind: "neighborhood"; readonly source: string; readonly maxDepth: number }
  | { readonly kind: "business"; readonly source: string; readonly maxDepth: 1 };

/** Index of the coarse time bucket containing {@link now}. */
export function timeBucket(now: number, bucketMs: number): number {
  return Math.floor(now / bucketMs);
}

/**
 * Pure key derivation: identical queries inside the same bucket share a key,
 * and a new bucket yields new keys so old entries age out even without
 * explicit invalidation.
 */
export function deriveCacheKey(shape: CacheQueryShape, now: number, bucketMs: number): string {
  return `${shape.kind}::${serialiseCacheVariant(shape)}::b${timeBucket(now, bucketMs)}`;
}

/** Read-only view of a cache entry handed to invalidation predicates. */
export interface CacheEntryView {
  readonly key: string;
  readonly shape: CacheQueryShape;
  readonly insertedAt: number;
  readonly expiresAt: number;
  /** Business ids the cached value was derived from. */
  readonly dependsOn: ReadonlySet<string>;
}

interface CacheEntry<T> extends CacheEntryView {
  readonly value: T;
}

export interface CachePutOptions {
  readonly shape: CacheQueryShape;
  readonly ttlMs?: number;
  /**
   * Logical insertion time. An entry is never replaced by one with an
   * older insertion time, whatever the call order.
   */
  readonly insertedAt?: number;
  readonly dependsOn?: Iterable<string>;
  /**
   * Fence generation read before the value was computed. The write is
   * refused when a business in `dependsOn` was fenced after it.
   */
  readonly generation?: number;
}

export interface ResultCacheOptions {
  readonly capacity?: number;
  readonly defaultTtlMs?: number;
  readonly bucketMs?: number;
  readonly clock?: Clock;
}

/** Runtime statistics exposed by the cache for observability/tests. */
export interface ResultCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
  invalidations: number;
  staleWritesRejected: number;
  fencedWritesRejected: number;
}

/** Cache contract the query service relies on. */
export interface QueryResultCache<T> {
  deriveKey(shape: CacheQueryShape): string;
  get(key: string): T | undefined;
  put(key: string, value: T, options: CachePutOptions): boolean;
  invalidate(predicate: (entry: CacheEntryView) => boolean): number;
  generation(): number;
}

export const DEFAULT_CACHE_CAPACITY = 1_024;
export const DEFAULT_CACHE_TTL_MS = 3_600_000;
export const DEFAULT_CACHE_BUCKET_MS = 3_600_000;

/**
 * TTL-governed LRU cache of traversal results. Each call is synchronous and
 * therefore atomic with respect to other callers; no atomicity is offered
 * across calls (a miss followed by a put may race with another writer).
 * Only derived values live here, so losing the cache is always safe.
 */
export class ResultCache<T> implements QueryResultCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly capacity: number;
  private readonly defaultTtlMs: number;
  readonly bucketMs: number;
  private readonly clock: Clock;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;
  private invalidations = 0;
  private staleWritesRejected = 0;
  private fencedWritesRejected = 0;
  private fenceGeneration = 0;
  /** Generation at which each business was last fenced. */
  private readonly fences = new Map<string, number>();

  constructor(options: ResultCacheOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CACHE_CAPACITY;
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`ResultCache capacity must be a positive integer (received ${inspect(capacity)})`);
    }
    const ttl = options.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS;
    if (!Number.isFinite(ttl) || ttl <= 0) {
      throw new RangeError(`ResultCache TTL must be a positive number (received ${inspect(ttl)})`);
    }
    this.capacity = capacity;
    this.defaultTtlMs = ttl;
    this.bucketMs = options.bucketMs ?? DEFAULT_CACHE_BUCKET_MS;
    this.clock = options.clock ?? (() => Date.now());
  }

  /** Key for {@link shape} in the current time bucket. */
  deriveKey(shape: CacheQueryShape): string {
    return deriveCacheKey(shape, this.clock(), this.bucketMs);
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      this.expirations += 1;
      this.misses += 1;
      return undefined;
    }
    // Refresh the entry position to preserve the LRU ordering.
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits += 1;
    return entry.value;
  }

  /**
   * Stores {@link value} unless a fresher entry already holds the key or a
   * dependency was fenced after `options.generation`. Returns whether the
   * value was stored.
   */
  put(key: string, value: T, options: CachePutOptions): boolean {
    const now = this.clock();
    const insertedAt = options.insertedAt ?? now;
    const dependsOn = new Set(options.dependsOn ?? [options.shape.source]);
    if (options.generation !== undefined && this.fencedSince(dependsOn, options.generation)) {
      this.fencedWritesRejected += 1;
      return false;
    }
    const existing = this.entries.get(key);
    if (existing && existing.expiresAt > now && existing.insertedAt > insertedAt) {
      this.staleWritesRejected += 1;
      return false;
    }
    const ttlMs = options.ttlMs ?? this.defaultTtlMs;
    const entry: CacheEntry<T> = {
      key,
      shape: options.shape,
      value,
      insertedAt,
      expiresAt: insertedAt + ttlMs,
      dependsOn,
    };
    if (entry.expiresAt <= now) {
      return false;
    }
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.enforceCapacity(now);
    return true;
  }

  /** Current fence generation; pass it back through {@link CachePutOptions.generation}. */
  generation(): number {
    return this.fenceGeneration;
  }

  /**
   * Marks {@link ids} as changed. Writes computed under an earlier generation
   * that depend on one of them are refused from now on.
   */
  fence(ids: Iterable<string>): number {
    this.fenceGeneration += 1;
    for (const id of ids) {
      this.fences.set(id, this.fenceGeneration);
    }
    return this.fenceGeneration;
  }

  /** Removes every entry matched by {@link predicate}; returns how many were removed. */
  invalidate(predicate: (entry: CacheEntryView) => boolean): number {
    let removed = 0;
    for (const [key, entry] of Array.from(this.entries)) {
      if (predicate(entry)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    this.invalidations += removed;
    return removed;
  }

  /** Drops every entry and resets the counters. */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.expirations = 0;
    this.invalidations = 0;
    this.staleWritesRejected = 0;
    this.fencedWritesRejected = 0;
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  stats(): ResultCacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
      invalidations: this.invalidations,
      staleWritesRejected: this.staleWritesRejected,
      fencedWritesRejected: this.fencedWritesRejected,
    };
  }

  private fencedSince(dependsOn: ReadonlySet<string>, generation: number): boolean {
    for (const id of dependsOn) {
      const fencedAt = this.fences.get(id);
      if (fencedAt !== undefined && fencedAt > generation) {
        return true;
      }
    }
    return false;
  }

  private enforceCapacity(now: number): void {
    if (this.entries.size <= this.capacity) {
      return;
    }
    for (const [key, entry] of Array.from(this.entries)) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        this.expirations += 1;
      }
    }
    while (this.entries.size > this.capacity) {
      const oldestKey = this.entries.keys().next().value;
      if (oldestKey === undefined) {
        return;
      }
      this.entries.delete(oldestKey);
      this.evictions += 1;
    }
  }
}
