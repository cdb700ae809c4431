export { createNetworkEngine, type NetworkEngine, type NetworkEngineOptions } from "./network/engine.js";
export {
  NetworkQueryService,
  type BusinessNetworkData,
  type BusinessNetworkRequest,
  type FindPathRequest,
  type NeighborhoodData,
  type NeighborhoodRequest,
  type NetworkResponse,
  type PathData,
} from "./network/queryService.js";
export {
  RelationshipChangeService,
  type BusinessChangeAck,
  type RelationshipChange,
  type RelationshipChangeAck,
} from "./network/changes.js";
export { InMemoryGraphStore, type GraphSnapshot, type GraphStore } from "./network/store.js";
export { PathFinder, type NeighborhoodEntry, type PathOutcome, type PathResult } from "./network/pathFinder.js";
export { ResultCache, deriveCacheKey, type CacheQueryShape } from "./network/cache.js";
export { InvalidationCoordinator } from "./network/coordinator.js";
export { InvalidationEventBus, type InvalidationEvent } from "./events/bus.js";
export { JsonlMutationJournal, type MutationJournal } from "./network/journal.js";
export { Deadline } from "./network/deadline.js";
export { cappedLinearWeight, saturatingWeight, type BusinessNode, type RelationshipEdge } from "./network/model.js";
export * from "./network/errors.js";
export { loadEngineConfig, type EngineConfig } from "./config/engine.js";
export { StructuredLogger, createSilentLogger } from "./logger.js";
