import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import type { CacheQueryShape, QueryResultCache } from "./cache.js";
import { Deadline, type Clock } from "./deadline.js";
import { InvalidRequestError, TimeoutError, UnknownEntityError } from "./errors.js";
import { InflightRegistry } from "./inflight.js";
import { otherEndpoint, type BusinessNode, type RelationshipEdge } from "./model.js";
import {
  DEFAULT_MAX_DEPTH,
  type NeighborhoodEntry,
  type PathFinder,
  type PathOutcome,
  type PathResult,
  type TraversalStats,
} from "./pathFinder.js";
import { withStoreRetry } from "./retry.js";
import type { GraphSnapshot, GraphStore } from "./store.js";

/** Business as exposed in response envelopes. */
export interface BusinessView {
  id: string;
  name: string;
  category: string;
  location: string;
  size_class: string;
}

/** Relationship as exposed in response envelopes, seen from one business. */
export interface RelationshipView {
  relationship_id: string;
  business_id: string;
  relationship_type: string;
  weight: number;
  transaction_volume: number;
  frequency: string;
  created_at: string;
  last_transaction: string;
}

interface SourceContext {
  readonly business: BusinessNode;
  readonly relationships: readonly RelationshipEdge[];
  readonly snapshotVersion: number;
}

/** Value stored in the result cache. Envelopes are rebuilt from it on every call. */
export type CachedResult =
  | (SourceContext & { readonly kind: "path"; readonly outcome: PathOutcome })
  | (SourceContext & { readonly kind: "neighborhood"; readonly entries: readonly NeighborhoodEntry[] })
  | (SourceContext & { readonly kind: "business" });

export type CacheStatus = "hit" | "miss" | "shared";

/** Response envelope. Field names are part of the public contract. */
export interface NetworkResponse<TData> {
  status: "success" | "no_path";
  data: TData;
  metadata: {
    total_relationships: number;
    query_time_ms: number;
    cache: CacheStatus;
    depth: number;
    snapshot_version: number;
  };
}

export interface PathView {
  nodes: string[];
  hops: number;
  weight: number;
  edges: RelationshipView[];
}

export interface NeighborView {
  business: BusinessView;
  distance: number;
  weight: number;
  path: string[];
}

export interface BusinessNetworkData {
  business: BusinessView;
  relationships: RelationshipView[];
}

export interface PathData extends BusinessNetworkData {
  target: string;
  path: PathView | null;
}

export interface NeighborhoodData extends BusinessNetworkData {
  neighbors: NeighborView[];
}

const idSchema = z.string().trim().min(1, "identifier must not be empty");
const depthSchema = z.number().optional();
const deadlineSchema = z.number().int().positive().optional();

export const findPathRequestSchema = z.object({
  source: idSchema,
  target: idSchema,
  maxDepth: depthSchema,
  deadlineMs: deadlineSchema,
});
export type FindPathRequest = z.input<typeof findPathRequestSchema>;

export const neighborhoodRequestSchema = z.object({
  source: idSchema,
  maxDepth: depthSchema,
  deadlineMs: deadlineSchema,
});
export type NeighborhoodRequest = z.input<typeof neighborhoodRequestSchema>;

export const businessNetworkRequestSchema = z.object({
  businessId: idSchema,
  deadlineMs: deadlineSchema,
});
export type BusinessNetworkRequest = z.input<typeof businessNetworkRequestSchema>;

export interface QueryCallOptions {
  /** Overrides the deadline derived from `deadlineMs` or the service default. */
  readonly deadline?: Deadline;
}

export interface NetworkQueryServiceOptions {
  readonly store: GraphStore;
  readonly cache: QueryResultCache<CachedResult>;
  readonly pathFinder: PathFinder;
  readonly defaultDepth?: number;
  readonly defaultDeadlineMs?: number;
  readonly cacheTtlMs?: number;
  /** Enables best-effort single-flight for identical concurrent misses. */
  readonly singleFlight?: boolean;
  readonly singleFlightWaitMs?: number;
  readonly storeRetries?: number;
  readonly clock?: Clock;
  readonly logger?: StructuredLogger;
  /** Overrides the retry sleep; tests use it to avoid real delays. */
  readonly retrySleep?: (ms: number) => Promise<void>;
}

export interface NetworkQueryStats {
  queries: number;
  hits: number;
  misses: number;
  shared: number;
  timeouts: number;
  cacheWriteFailures: number;
}

function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError(`invalid ${label} request`, parsed.error.issues);
  }
  return parsed.data;
}

function toIso(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

export function toBusinessView(node: BusinessNode): BusinessView {
  return { id: node.id, name: node.name, category: node.category, location: node.location, size_class: node.sizeClass };
}

export function toRelationshipView(edge: RelationshipEdge, from: string): RelationshipView {
  return {
    relationship_id: edge.id,
    business_id: otherEndpoint(edge, from),
    relationship_type: edge.relationshipType,
    weight: edge.weight,
    transaction_volume: edge.transactionVolume,
    frequency: edge.frequency,
    created_at: toIso(edge.createdAt),
    last_transaction: toIso(edge.lastTransaction),
  };
}

/** Edges are oriented along the path: each one is seen from the node preceding it. */
export function toPathView(path: PathResult): PathView {
  return {
    nodes: [...path.nodes],
    hops: path.hops,
    weight: path.weight,
    edges: path.edges.map((edge, index) => toRelationshipView(edge, path.nodes[index] ?? edge.a)),
  };
}

/**
 * Entry point for network queries: validates requests, serves from the
 * cache when possible and otherwise computes on a fresh snapshot.
 *
 * No lock is held while reading the store. Two identical misses may both
 * compute; the optional single-flight registry only shortens that race and
 * never waits beyond its bounded window.
 */
export class NetworkQueryService {
  private readonly store: GraphStore;
  private readonly cache: QueryResultCache<CachedResult>;
  private readonly pathFinder: PathFinder;
  private readonly defaultDepth: number;
  private readonly defaultDeadlineMs: number;
  private readonly cacheTtlMs?: number;
  private readonly inflight: InflightRegistry<CachedResult> | null;
  private readonly singleFlightWaitMs: number;
  private readonly storeRetries: number;
  private readonly clock: Clock;
  private readonly logger?: StructuredLogger;
  private readonly retrySleep?: (ms: number) => Promise<void>;
  private readonly counters: NetworkQueryStats = {
    queries: 0,
    hits: 0,
    misses: 0,
    shared: 0,
    timeouts: 0,
    cacheWriteFailures: 0,
  };

  constructor(options: NetworkQueryServiceOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.pathFinder = options.pathFinder;
    this.defaultDepth = options.defaultDepth ?? DEFAULT_MAX_DEPTH;
    this.defaultDeadlineMs = options.defaultDeadlineMs ?? 2_000;
    this.cacheTtlMs = options.cacheTtlMs;
    this.inflight = options.singleFlight === false ? null : new InflightRegistry<CachedResult>();
    this.singleFlightWaitMs = options.singleFlightWaitMs ?? 250;
    this.storeRetries = options.storeRetries ?? 3;
    this.clock = options.clock ?? (() => Date.now());
    this.logger = options.logger;
    this.retrySleep = options.retrySleep;
  }

  async findPath(request: FindPathRequest, options: QueryCallOptions = {}): Promise<NetworkResponse<PathData>> {
    const parsed = parseRequest(findPathRequestSchema, request, "path");
    const maxDepth = this.pathFinder.assertDepth(parsed.maxDepth ?? this.defaultDepth);
    const shape: CacheQueryShape = { kind: "path", source: parsed.source, target: parsed.target, maxDepth };
    const started = this.clock();
    const { value, cache } = await this.execute(shape, this.resolveDeadline(parsed.deadlineMs, options), started);
    if (value.kind !== "path") {
      throw new TypeError(`cache entry for ${shape.kind} holds a ${value.kind} result`);
    }
    const outcome = value.outcome;
    const path = outcome.status === "found" ? toPathView(outcome.path) : null;
    return this.envelope(value, path ? "success" : "no_path", cache, maxDepth, started, {
      target: parsed.target,
      path,
    });
  }

  async neighborhood(request: NeighborhoodRequest, options: QueryCallOptions = {}): Promise<NetworkResponse<NeighborhoodData>> {
    const parsed = parseRequest(neighborhoodRequestSchema, request, "neighborhood");
    const maxDepth = this.pathFinder.assertDepth(parsed.maxDepth ?? this.defaultDepth);
    const shape: CacheQueryShape = { kind: "neighborhood", source: parsed.source, maxDepth };
    const started = this.clock();
    const { value, cache } = await this.execute(shape, this.resolveDeadline(parsed.deadlineMs, options), started);
    if (value.kind !== "neighborhood") {
      throw new TypeError(`cache entry for ${shape.kind} holds a ${value.kind} result`);
    }
    const neighbors = value.entries.map((entry) => ({
      business: toBusinessView(entry.node),
      distance: entry.distance,
      weight: entry.weight,
      path: [...entry.path],
    }));
    return this.envelope(value, "success", cache, maxDepth, started, { neighbors });
  }

  /** The business with its direct relationships (one hop). */
  async businessNetwork(request: BusinessNetworkRequest, options: QueryCallOptions = {}): Promise<NetworkResponse<BusinessNetworkData>> {
    const parsed = parseRequest(businessNetworkRequestSchema, request, "business network");
    const shape: CacheQueryShape = { kind: "business", source: parsed.businessId, maxDepth: 1 };
    const started = this.clock();
    const { value, cache } = await this.execute(shape, this.resolveDeadline(parsed.deadlineMs, options), started);
    return this.envelope(value, "success", cache, 1, started, {});
  }

  stats(): NetworkQueryStats {
    return { ...this.counters };
  }

  private resolveDeadline(deadlineMs: number | undefined, options: QueryCallOptions): Deadline {
    return options.deadline ?? Deadline.after(deadlineMs ?? this.defaultDeadlineMs, this.clock);
  }

  private async execute(
    shape: CacheQueryShape,
    deadline: Deadline,
    started: number,
  ): Promise<{ value: CachedResult; cache: CacheStatus }> {
    this.counters.queries += 1;
    try {
      deadline.throwIfExpired("cache_lookup");
      const key = this.cache.deriveKey(shape);
      const cached = this.cache.get(key);
      if (cached) {
        this.counters.hits += 1;
        this.logger?.debug("network_cache_hit", { key });
        return { value: cached, cache: "hit" };
      }
      this.counters.misses += 1;
      this.logger?.debug("network_cache_miss", { key });

      const compute = () => this.computeAndStore(key, shape, deadline, started);
      if (!this.inflight) {
        return { value: await compute(), cache: "miss" };
      }
      const waitMs = Math.min(this.singleFlightWaitMs, deadline.remainingMs());
      const { value, shared } = await this.inflight.run(key, waitMs, compute);
      if (shared) {
        this.counters.shared += 1;
      }
      return { value, cache: shared ? "shared" : "miss" };
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.counters.timeouts += 1;
        this.logger?.warn("network_query_timeout", { kind: shape.kind, source: shape.source, max_depth: shape.maxDepth });
      }
      throw error;
    }
  }

  private async computeAndStore(key: string, shape: CacheQueryShape, deadline: Deadline, started: number): Promise<CachedResult> {
    const generation = this.cache.generation();
    const snapshot = await withStoreRetry("store_snapshot", deadline, () => this.store.snapshot(), {
      attempts: this.storeRetries,
      logger: this.logger,
      sleep: this.retrySleep,
    });
    const { value, dependsOn, stats } = this.compute(snapshot, shape, deadline);
    if (stats) {
      this.logger?.debug("network_traversal_completed", {
        kind: shape.kind,
        source: shape.source,
        expanded_nodes: stats.expandedNodes,
        examined_edges: stats.examinedEdges,
        oversized_nodes: stats.oversizedNodes.length,
      });
    }

    try {
      const stored = this.cache.put(key, value, { shape, insertedAt: started, ttlMs: this.cacheTtlMs, dependsOn, generation });
      if (!stored) {
        this.logger?.debug("network_cache_put_skipped", { key, generation });
      }
    } catch (error) {
      // Population is best effort: the caller still gets the computed value.
      this.counters.cacheWriteFailures += 1;
      this.logger?.warn("network_cache_put_failed", {
        key,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return value;
  }

  private compute(
    snapshot: GraphSnapshot,
    shape: CacheQueryShape,
    deadline: Deadline,
  ): { value: CachedResult; dependsOn: Set<string>; stats: TraversalStats | null } {
    switch (shape.kind) {
      case "path": {
        const { outcome, stats } = this.pathFinder.findPath(snapshot, shape.source, shape.target, {
          maxDepth: shape.maxDepth,
          deadline,
        });
        const context = this.sourceContext(snapshot, shape.source);
        const dependsOn = new Set([shape.source, shape.target]);
        if (outcome.status === "found") {
          for (const id of outcome.path.nodes) {
            dependsOn.add(id);
          }
        }
        const value: CachedResult = { ...context, kind: "path", outcome };
        return { value, dependsOn, stats };
      }
      case "neighborhood": {
        const { entries, stats } = this.pathFinder.neighborhood(snapshot, shape.source, { maxDepth: shape.maxDepth, deadline });
        const context = this.sourceContext(snapshot, shape.source);
        const dependsOn = new Set([shape.source, ...entries.map((entry) => entry.node.id)]);
        const value: CachedResult = { ...context, kind: "neighborhood", entries: Object.freeze(entries) };
        return { value, dependsOn, stats };
      }
      case "business": {
        deadline.throwIfExpired("business_lookup");
        const context = this.sourceContext(snapshot, shape.source);
        const dependsOn = new Set([shape.source, ...context.relationships.map((edge) => otherEndpoint(edge, shape.source))]);
        const value: CachedResult = { ...context, kind: "business" };
        return { value, dependsOn, stats: null };
      }
    }
  }

  private sourceContext(snapshot: GraphSnapshot, source: string): SourceContext {
    const business = snapshot.getNode(source);
    if (!business) {
      throw new UnknownEntityError(source, "source");
    }
    return {
      business,
      relationships: Object.freeze(snapshot.neighbors(source).map((entry) => entry.edge)),
      snapshotVersion: snapshot.version,
    };
  }

  private envelope<TExtra extends object>(
    value: CachedResult,
    status: "success" | "no_path",
    cache: CacheStatus,
    depth: number,
    started: number,
    extra: TExtra,
  ): NetworkResponse<BusinessNetworkData & TExtra> {
    const relationships = value.relationships.map((edge) => toRelationshipView(edge, value.business.id));
    return {
      status,
      data: { business: toBusinessView(value.business), relationships, ...extra },
      metadata: {
        total_relationships: relationships.length,
        query_time_ms: Math.max(0, this.clock() - started),
        cache,
        depth,
        snapshot_version: value.snapshotVersion,
      },
    };
  }
}
