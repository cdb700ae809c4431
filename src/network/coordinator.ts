import type { InvalidationEvent, InvalidationEventBus } from "../events/bus.js";
import type { StructuredLogger } from "../logger.js";
import type { CacheEntryView } from "./cache.js";

/** Subset of the cache the coordinator needs. */
export interface InvalidatableCache {
  invalidate(predicate: (entry: CacheEntryView) => boolean): number;
  fence(ids: Iterable<string>): number;
}

export interface InvalidationCoordinatorOptions {
  readonly bus: InvalidationEventBus;
  readonly cache: InvalidatableCache;
  readonly logger?: StructuredLogger;
  /**
   * Cached queries with `maxDepth` at or below this value are invalidated
   * eagerly; deeper ones expire with their TTL. `0` disables eager
   * invalidation entirely.
   */
  readonly eagerDepthThreshold?: number;
}

export interface InvalidationCoordinatorStats {
  eventsProcessed: number;
  duplicatesIgnored: number;
  keysInvalidated: number;
  lastSeq: number;
  running: boolean;
}

/**
 * Turns mutation events into cache invalidations.
 *
 * Eager for shallow queries: any cached 1-hop result whose dependency set
 * contains an endpoint of the changed relationship (or the changed business)
 * is dropped as the event is published, so the very next read recomputes.
 * The touched businesses are fenced in the cache as well, which refuses late
 * writes from computations that started before the change.
 * Deeper results are left to TTL expiry, which bounds their staleness to one
 * TTL window without scanning the cache on behalf of every reachable entry.
 */
export class InvalidationCoordinator {
  private readonly bus: InvalidationEventBus;
  private readonly cache: InvalidatableCache;
  private readonly logger?: StructuredLogger;
  private readonly eagerDepthThreshold: number;
  private unsubscribe: (() => void) | null = null;
  private lastSeq = 0;
  private eventsProcessed = 0;
  private duplicatesIgnored = 0;
  private keysInvalidated = 0;

  constructor(options: InvalidationCoordinatorOptions) {
    this.bus = options.bus;
    this.cache = options.cache;
    this.logger = options.logger;
    this.eagerDepthThreshold = Math.max(0, Math.floor(options.eagerDepthThreshold ?? 1));
  }

  /** Subscribes to the bus after replaying the events it has not seen yet. */
  start(): void {
    if (this.unsubscribe) {
      return;
    }
    for (const event of this.bus.list({ afterSeq: this.lastSeq })) {
      this.handle(event);
    }
    this.unsubscribe = this.bus.subscribe((event) => {
      this.handle(event);
    });
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  /**
   * Processes one event and returns how many cache entries it invalidated.
   * Events are consumed once: a sequence number already handled is ignored.
   */
  handle(event: InvalidationEvent): number {
    if (event.seq <= this.lastSeq) {
      this.duplicatesIgnored += 1;
      return 0;
    }
    this.lastSeq = event.seq;
    this.eventsProcessed += 1;

    if (this.eagerDepthThreshold === 0) {
      return 0;
    }
    const touched = new Set(event.endpoints);
    // Fence first: a computation that read the store before this change may
    // still be running and must not repopulate the entries dropped below.
    this.cache.fence(touched);
    const removed = this.cache.invalidate(
      (entry) => entry.shape.maxDepth <= this.eagerDepthThreshold && [...touched].some((id) => entry.dependsOn.has(id)),
    );
    this.keysInvalidated += removed;
    this.logger?.info("network_cache_invalidated", {
      seq: event.seq,
      entity_kind: event.entityKind,
      entity_id: event.entityId,
      change: event.change,
      removed,
    });
    return removed;
  }

  stats(): InvalidationCoordinatorStats {
    return {
      eventsProcessed: this.eventsProcessed,
      duplicatesIgnored: this.duplicatesIgnored,
      keysInvalidated: this.keysInvalidated,
      lastSeq: this.lastSeq,
      running: this.unsubscribe !== null,
    };
  }
}
