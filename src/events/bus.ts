import { EventEmitter } from "node:events";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Kind of mutation reported by an invalidation event. */
export type ChangeKind = "created" | "updated" | "deleted";

/** Entity touched by the mutation. */
export type ChangedEntityKind = "node" | "edge";

/**
 * Event envelope persisted by the bus. Edge events carry both endpoints so
 * consumers can match cached results without reading the store.
 */
export interface InvalidationEvent {
  seq: number;
  ts: number;
  entityKind: ChangedEntityKind;
  entityId: string;
  /** Business ids affected by the change: both endpoints for an edge, the id itself for a node. */
  endpoints: readonly string[];
  change: ChangeKind;
  /** Optional component that published the event. */
  source: string | null;
}

/** Input accepted by {@link InvalidationEventBus.publish}. */
export interface InvalidationEventInput {
  entityKind: ChangedEntityKind;
  entityId: string;
  endpoints?: readonly string[];
  change: ChangeKind;
  source?: string | null;
  ts?: number;
}

/** Filters supported when listing or subscribing to events. */
export interface InvalidationEventFilter {
  entityKinds?: ChangedEntityKind[];
  entityId?: string;
  /** Only events whose endpoints include this business id. */
  businessId?: string;
  afterSeq?: number;
  limit?: number;
}

export interface InvalidationEventBusOptions {
  historyLimit?: number;
  now?: () => number;
}

export type InvalidationListener = (event: InvalidationEvent) => void;

const BUS_EVENT = "invalidation";
const DEFAULT_HISTORY_LIMIT = 1_000;

function normaliseId(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new TypeError(`${field} must be non-empty`);
  }
  return trimmed;
}

/**
 * In-process bus carrying relationship and business mutations to the cache
 * coordinator. Listeners run synchronously inside {@link publish}, so a
 * publisher observing the returned envelope knows every subscriber has seen
 * it. A bounded history allows late subscribers to catch up by sequence.
 */
export class InvalidationEventBus {
  private readonly emitter = new EventEmitter();
  private readonly history: InvalidationEvent[] = [];
  private readonly historyLimit: number;
  private readonly now: () => number;
  private seq = 0;

  constructor(options: InvalidationEventBusOptions = {}) {
    this.historyLimit = Math.max(1, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.now = options.now ?? (() => Date.now());
  }

  get lastSeq(): number {
    return this.seq;
  }

  publish(input: InvalidationEventInput): InvalidationEvent {
    const entityId = normaliseId(input.entityId, "entityId");
    const endpoints = (input.endpoints ?? [entityId]).map((id) => normaliseId(id, "endpoint"));
    const envelope: InvalidationEvent = {
      seq: ++this.seq,
      ts: input.ts ?? this.now(),
      entityKind: input.entityKind,
      entityId,
      endpoints: Object.freeze([...new Set(endpoints)]),
      change: input.change,
      source: input.source ?? null,
    };

    this.history.push(envelope);
    if (this.history.length > this.historyLimit) {
      this.history.shift();
    }

    this.emitter.emit(BUS_EVENT, envelope);
    return envelope;
  }

  list(filter: InvalidationEventFilter = {}): InvalidationEvent[] {
    const filtered = this.history.filter((event) => matches(event, filter));
    const limit = filter.limit && filter.limit > 0 ? Math.min(filter.limit, this.historyLimit) : this.historyLimit;
    return filtered.slice(-limit);
  }

  /** Registers {@link listener}; returns the function removing it. */
  subscribe(listener: InvalidationListener, filter: InvalidationEventFilter = {}): () => void {
    const handler = (event: InvalidationEvent): void => {
      if (matches(event, filter)) {
        listener(event);
      }
    };
    this.emitter.on(BUS_EVENT, handler);
    return () => {
      this.emitter.removeListener(BUS_EVENT, handler);
    };
  }

  listenerCount(): number {
    return this.emitter.listenerCount(BUS_EVENT);
  }
}

function matches(event: InvalidationEvent, filter: InvalidationEventFilter): boolean {
  if (filter.entityKinds && filter.entityKinds.length > 0 && !filter.entityKinds.includes(event.entityKind)) {
    return false;
  }
  if (filter.entityId && event.entityId !== filter.entityId) {
    return false;
  }
  if (filter.businessId && !event.endpoints.includes(filter.businessId)) {
    return false;
  }
  if (typeof filter.afterSeq === "number" && !(event.seq > filter.afterSeq)) {
    return false;
  }
  return true;
}
