import type { StructuredLogger } from "../logger.js";
import type { Clock } from "./deadline.js";
import { ConflictError, InvalidRequestError, NotFoundError } from "./errors.js";
import type { JournalMutation, MutationJournal, ReplayResult } from "./journal.js";
import {
  businessInputSchema,
  canonicalPair,
  edgeId,
  pairKey,
  relationshipInputSchema,
  saturatingWeight,
  type BusinessInput,
  type BusinessNode,
  type NodePair,
  type RelationshipEdge,
  type RelationshipInput,
  type RelationshipType,
  type WeightFunction,
} from "./model.js";
import { KeyedMutex } from "./pairLocks.js";

/** One incident relationship as seen from a given business. */
export interface NeighborEntry {
  readonly neighborId: string;
  readonly edge: RelationshipEdge;
}

/**
 * Immutable view of the graph at one version. A traversal reads exclusively
 * from a single snapshot so concurrent writes never show up half-applied.
 */
export interface GraphSnapshot {
  readonly version: number;
  readonly nodeCount: number;
  readonly edgeCount: number;
  hasNode(id: string): boolean;
  getNode(id: string): BusinessNode | undefined;
  /** Incident relationships sorted by neighbour id, then edge id. */
  neighbors(id: string): readonly NeighborEntry[];
  degree(id: string): number;
}

export interface UpsertEdgeOptions {
  /** Replace an existing record for the same pair and type instead of failing. */
  readonly overwrite?: boolean;
}

export interface UpsertEdgeResult {
  readonly edge: RelationshipEdge;
  readonly change: "created" | "updated";
  readonly previous: RelationshipEdge | null;
}

export interface UpsertNodeResult {
  readonly node: BusinessNode;
  readonly change: "created" | "updated";
}

/** Canonical owner of business and relationship state. */
export interface GraphStore {
  getNode(id: string): Promise<BusinessNode>;
  getNeighbors(id: string): Promise<readonly NeighborEntry[]>;
  upsertNode(input: BusinessInput): Promise<UpsertNodeResult>;
  upsertEdge(input: RelationshipInput, options?: UpsertEdgeOptions): Promise<UpsertEdgeResult>;
  deleteEdge(pair: NodePair, type: RelationshipType): Promise<RelationshipEdge>;
  snapshot(): Promise<GraphSnapshot>;
}

export interface GraphStoreStats {
  version: number;
  nodes: number;
  edges: number;
}

interface StoreState {
  readonly version: number;
  readonly nodes: ReadonlyMap<string, BusinessNode>;
  readonly edges: ReadonlyMap<string, RelationshipEdge>;
  readonly adjacency: ReadonlyMap<string, readonly NeighborEntry[]>;
}

const EMPTY_NEIGHBORS: readonly NeighborEntry[] = Object.freeze([]);

class StateSnapshot implements GraphSnapshot {
  constructor(private readonly state: StoreState) {}

  get version(): number {
    return this.state.version;
  }

  get nodeCount(): number {
    return this.state.nodes.size;
  }

  get edgeCount(): number {
    return this.state.edges.size;
  }

  hasNode(id: string): boolean {
    return this.state.nodes.has(id);
  }

  getNode(id: string): BusinessNode | undefined {
    return this.state.nodes.get(id);
  }

  neighbors(id: string): readonly NeighborEntry[] {
    return this.state.adjacency.get(id) ?? EMPTY_NEIGHBORS;
  }

  degree(id: string): number {
    return this.neighbors(id).length;
  }
}

function compareEntries(left: NeighborEntry, right: NeighborEntry): number {
  if (left.neighborId !== right.neighborId) {
    return left.neighborId < right.neighborId ? -1 : 1;
  }
  if (left.edge.id === right.edge.id) {
    return 0;
  }
  return left.edge.id < right.edge.id ? -1 : 1;
}

function replaceIncident(
  adjacency: Map<string, readonly NeighborEntry[]>,
  owner: string,
  removeId: string,
  add: NeighborEntry | null,
): void {
  const current = adjacency.get(owner) ?? EMPTY_NEIGHBORS;
  const next = current.filter((entry) => entry.edge.id !== removeId);
  if (add) {
    next.push(add);
    next.sort(compareEntries);
  }
  if (next.length === 0) {
    adjacency.delete(owner);
  } else {
    adjacency.set(owner, Object.freeze(next));
  }
}

function withEdge(state: StoreState, edge: RelationshipEdge): StoreState {
  const edges = new Map(state.edges);
  edges.set(edge.id, edge);
  const adjacency = new Map(state.adjacency);
  replaceIncident(adjacency, edge.a, edge.id, { neighborId: edge.b, edge });
  replaceIncident(adjacency, edge.b, edge.id, { neighborId: edge.a, edge });
  return { version: state.version + 1, nodes: state.nodes, edges, adjacency };
}

function withoutEdge(state: StoreState, edge: RelationshipEdge): StoreState {
  const edges = new Map(state.edges);
  edges.delete(edge.id);
  const adjacency = new Map(state.adjacency);
  replaceIncident(adjacency, edge.a, edge.id, null);
  replaceIncident(adjacency, edge.b, edge.id, null);
  return { version: state.version + 1, nodes: state.nodes, edges, adjacency };
}

function withNode(state: StoreState, node: BusinessNode): StoreState {
  const nodes = new Map(state.nodes);
  nodes.set(node.id, node);
  return { version: state.version + 1, nodes, edges: state.edges, adjacency: state.adjacency };
}

export interface InMemoryGraphStoreOptions {
  /** Maps transaction volume to weight; defaults to {@link saturatingWeight}. */
  readonly weigh?: WeightFunction;
  readonly clock?: Clock;
  readonly journal?: MutationJournal | null;
  readonly logger?: StructuredLogger;
}

/**
 * Copy-on-write in-memory store. Each committed write swaps in a new state
 * object, so {@link snapshot} is a constant-time pointer capture. Writes are
 * serialised per unordered pair (per id for businesses); with a journal, the
 * append completes before the write becomes visible.
 */
export class InMemoryGraphStore implements GraphStore {
  private state: StoreState = { version: 0, nodes: new Map(), edges: new Map(), adjacency: new Map() };
  private readonly locks = new KeyedMutex();
  private readonly weigh: WeightFunction;
  private readonly clock: Clock;
  private readonly journal: MutationJournal | null;
  private readonly logger?: StructuredLogger;

  constructor(options: InMemoryGraphStoreOptions = {}) {
    this.weigh = options.weigh ?? saturatingWeight();
    this.clock = options.clock ?? (() => Date.now());
    this.journal = options.journal ?? null;
    this.logger = options.logger;
  }

  /** Creates a store and replays {@link InMemoryGraphStoreOptions.journal} into it. */
  static async open(options: InMemoryGraphStoreOptions = {}): Promise<{ store: InMemoryGraphStore; replay: ReplayResult }> {
    const store = new InMemoryGraphStore(options);
    const replay = store.journal ? await store.journal.replay((mutation) => store.applyReplayed(mutation)) : { applied: 0, skipped: 0 };
    return { store, replay };
  }

  async getNode(id: string): Promise<BusinessNode> {
    const node = this.state.nodes.get(id);
    if (!node) {
      throw new NotFoundError("business", id);
    }
    return node;
  }

  async getNeighbors(id: string): Promise<readonly NeighborEntry[]> {
    const state = this.state;
    if (!state.nodes.has(id)) {
      throw new NotFoundError("business", id);
    }
    return state.adjacency.get(id) ?? EMPTY_NEIGHBORS;
  }

  async snapshot(): Promise<GraphSnapshot> {
    return new StateSnapshot(this.state);
  }

  stats(): GraphStoreStats {
    return { version: this.state.version, nodes: this.state.nodes.size, edges: this.state.edges.size };
  }

  async upsertNode(input: BusinessInput): Promise<UpsertNodeResult> {
    const parsed = businessInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidRequestError("invalid business payload", parsed.error.issues);
    }
    const data = parsed.data;
    return this.locks.runExclusive<UpsertNodeResult>(`node:${data.id}`, async () => {
      const now = this.clock();
      const existing = this.state.nodes.get(data.id);
      const node: BusinessNode = Object.freeze({
        id: data.id,
        name: data.name,
        category: data.category,
        location: data.location,
        sizeClass: data.sizeClass,
        createdAt: existing?.createdAt ?? now,
        updatedAt: now,
      });
      await this.journal?.append({ op: "upsert_business", business: node }, now);
      this.state = withNode(this.state, node);
      return { node, change: existing ? "updated" : "created" };
    });
  }

  async upsertEdge(input: RelationshipInput, options: UpsertEdgeOptions = {}): Promise<UpsertEdgeResult> {
    const parsed = relationshipInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InvalidRequestError("invalid relationship payload", parsed.error.issues);
    }
    const data = parsed.data;
    const pair = canonicalPair(data.a, data.b);
    const id = edgeId(pair.a, pair.b, data.relationshipType);

    return this.locks.runExclusive<UpsertEdgeResult>(pairKey(pair.a, pair.b), async () => {
      for (const endpoint of [pair.a, pair.b]) {
        if (!this.state.nodes.has(endpoint)) {
          throw new NotFoundError("business", endpoint);
        }
      }
      const previous = this.state.edges.get(id) ?? null;
      if (previous && options.overwrite !== true) {
        throw new ConflictError(id);
      }
      const now = this.clock();
      const weight = clampWeight(this.weigh(data.transactionVolume));
      const edge: RelationshipEdge = Object.freeze({
        id,
        a: pair.a,
        b: pair.b,
        relationshipType: data.relationshipType,
        transactionVolume: data.transactionVolume,
        frequency: data.frequency,
        createdAt: previous?.createdAt ?? now,
        lastTransaction: data.lastTransaction ?? now,
        weight,
      });
      await this.journal?.append({ op: "upsert_relationship", edge }, now);
      this.state = withEdge(this.state, edge);
      return { edge, change: previous ? "updated" : "created", previous };
    });
  }

  async deleteEdge(pair: NodePair, type: RelationshipType): Promise<RelationshipEdge> {
    const canonical = canonicalPair(pair.a, pair.b);
    const id = edgeId(canonical.a, canonical.b, type);
    return this.locks.runExclusive<RelationshipEdge>(pairKey(canonical.a, canonical.b), async () => {
      const existing = this.state.edges.get(id);
      if (!existing) {
        throw new NotFoundError("relationship", id);
      }
      await this.journal?.append(
        { op: "delete_relationship", a: canonical.a, b: canonical.b, relationshipType: type },
        this.clock(),
      );
      this.state = withoutEdge(this.state, existing);
      return existing;
    });
  }

  private applyReplayed(mutation: JournalMutation): void {
    switch (mutation.op) {
      case "upsert_business":
        this.state = withNode(this.state, Object.freeze({ ...mutation.business }));
        return;
      case "upsert_relationship": {
        const { edge } = mutation;
        if (!this.state.nodes.has(edge.a) || !this.state.nodes.has(edge.b)) {
          this.logger?.warn("network_journal_orphan_relationship", { edge_id: edge.id });
          return;
        }
        this.state = withEdge(this.state, Object.freeze({ ...edge }));
        return;
      }
      case "delete_relationship": {
        const existing = this.state.edges.get(edgeId(mutation.a, mutation.b, mutation.relationshipType));
        if (existing) {
          this.state = withoutEdge(this.state, existing);
        }
        return;
      }
    }
  }
}

function clampWeight(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  return value >= 1 ? 1 : value;
}
