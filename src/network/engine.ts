import { InvalidationEventBus } from "../events/bus.js";
import { DEFAULT_ENGINE_CONFIG, engineConfigSchema, type EngineConfig } from "../config/engine.js";
import { createSilentLogger, type StructuredLogger } from "../logger.js";
import { ResultCache } from "./cache.js";
import { RelationshipChangeService } from "./changes.js";
import { InvalidationCoordinator } from "./coordinator.js";
import type { Clock } from "./deadline.js";
import { JsonlMutationJournal, type MutationJournal, type ReplayResult } from "./journal.js";
import { saturatingWeight, type WeightFunction } from "./model.js";
import { PathFinder } from "./pathFinder.js";
import { NetworkQueryService, type CachedResult } from "./queryService.js";
import { InMemoryGraphStore, type GraphStore } from "./store.js";

export interface NetworkEngineOptions {
  /** Partial settings merged over {@link DEFAULT_ENGINE_CONFIG}. */
  readonly config?: Partial<EngineConfig>;
  readonly logger?: StructuredLogger;
  readonly clock?: Clock;
  /** Overrides the volume-to-weight mapping derived from the configuration. */
  readonly weigh?: WeightFunction;
  /**
   * Store to query. When omitted an {@link InMemoryGraphStore} is created,
   * backed by {@link journal} or by a JSONL journal at `config.journalPath`.
   */
  readonly store?: GraphStore;
  readonly journal?: MutationJournal;
  /** Retry sleep override, mostly for tests. */
  readonly retrySleep?: (ms: number) => Promise<void>;
}

/** Fully wired engine. Components are exposed for tests and diagnostics. */
export interface NetworkEngine {
  readonly config: EngineConfig;
  readonly store: GraphStore;
  readonly cache: ResultCache<CachedResult>;
  readonly bus: InvalidationEventBus;
  readonly coordinator: InvalidationCoordinator;
  readonly pathFinder: PathFinder;
  readonly queries: NetworkQueryService;
  readonly changes: RelationshipChangeService;
  readonly replay: ReplayResult;
  readonly logger: StructuredLogger;
  /** Detaches the coordinator from the bus and flushes the logger. */
  close(): Promise<void>;
}

/**
 * Builds the engine from its configuration. Every component is created here
 * and handed to its consumers explicitly. Nothing lives in module state, so
 * several engines can coexist in one process.
 */
export async function createNetworkEngine(options: NetworkEngineOptions = {}): Promise<NetworkEngine> {
  const config = engineConfigSchema.parse({ ...DEFAULT_ENGINE_CONFIG, ...options.config });
  const logger = options.logger ?? createSilentLogger();
  const clock = options.clock ?? (() => Date.now());

  let store: GraphStore;
  let replay: ReplayResult = { applied: 0, skipped: 0 };
  if (options.store) {
    store = options.store;
  } else {
    const journal =
      options.journal ??
      (config.journalPath ? new JsonlMutationJournal(config.journalPath, logger.child("journal")) : null);
    const opened = await InMemoryGraphStore.open({
      weigh: options.weigh ?? saturatingWeight(config.weightHalfSaturation),
      clock,
      journal,
      logger: logger.child("store"),
    });
    store = opened.store;
    replay = opened.replay;
    if (journal) {
      logger.info("network_journal_replayed", { applied: replay.applied, skipped: replay.skipped });
    }
  }

  const cache = new ResultCache<CachedResult>({
    capacity: config.cacheCapacity,
    defaultTtlMs: config.cacheTtlMs,
    bucketMs: config.cacheBucketMs,
    clock,
  });
  const bus = new InvalidationEventBus({ now: clock });
  const coordinator = new InvalidationCoordinator({
    bus,
    cache,
    logger: logger.child("coordinator"),
    eagerDepthThreshold: config.eagerDepthThreshold,
  });
  coordinator.start();

  const pathFinder = new PathFinder({
    depthCeiling: config.depthCeiling,
    neighborCap: config.neighborCap,
    logger: logger.child("path_finder"),
  });
  const queries = new NetworkQueryService({
    store,
    cache,
    pathFinder,
    defaultDepth: config.defaultDepth,
    defaultDeadlineMs: config.deadlineMs,
    cacheTtlMs: config.cacheTtlMs,
    singleFlight: config.singleFlight,
    singleFlightWaitMs: config.singleFlightWaitMs,
    storeRetries: config.storeRetries,
    clock,
    logger: logger.child("queries"),
    retrySleep: options.retrySleep,
  });
  const changes = new RelationshipChangeService({ store, bus, logger: logger.child("changes") });

  return {
    config,
    store,
    cache,
    bus,
    coordinator,
    pathFinder,
    queries,
    changes,
    replay,
    logger,
    async close() {
      coordinator.stop();
      await logger.flush();
    },
  };
}
