import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { Deadline } from "../src/network/deadline.js";
import { createNetworkEngine, type NetworkEngine } from "../src/network/engine.js";
import { InvalidDepthError, InvalidRequestError, TimeoutError, TransientStoreError, UnknownEntityError } from "../src/network/errors.js";
import type { BusinessInput, NodePair, RelationshipInput, RelationshipType } from "../src/network/model.js";
import type { GraphSnapshot, GraphStore, UpsertEdgeOptions } from "../src/network/store.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { BASE_TIME, createFakeClock, createTriangleStore, percentWeight, type FakeClock } from "./helpers/networkFixtures.js";

const ISO_BASE = new Date(BASE_TIME).toISOString();

async function seed(engine: NetworkEngine): Promise<void> {
  for (const id of ["A", "B", "C", "D"]) {
    await engine.changes.upsertBusiness({ id, name: `Business ${id}` });
  }
  await engine.changes.applyRelationshipChange({
    kind: "upsert",
    relationship: { a: "A", b: "B", relationshipType: "partner", transactionVolume: 90 },
  });
  await engine.changes.applyRelationshipChange({
    kind: "upsert",
    relationship: { a: "B", b: "C", relationshipType: "partner", transactionVolume: 50 },
  });
  await engine.changes.applyRelationshipChange({
    kind: "upsert",
    relationship: { a: "A", b: "C", relationshipType: "partner", transactionVolume: 30 },
  });
}

async function seededEngine(clock: FakeClock, cacheTtlMs = 3_600_000): Promise<NetworkEngine> {
  const engine = await createNetworkEngine({ clock: clock.now, weigh: percentWeight, config: { cacheTtlMs } });
  await seed(engine);
  return engine;
}

async function captureError(work: () => Promise<unknown>): Promise<unknown> {
  try {
    await work();
  } catch (error) {
    return error;
  }
  return null;
}

/** Store delegating to another one, with programmable snapshot behaviour. */
class ScriptedStore implements GraphStore {
  public snapshotCalls = 0;
  public transientFailures = 0;
  public gate: Promise<void> | null = null;
  /** Parks the call after the state was captured, until `release` settles. */
  public hold: { readonly captured: () => void; readonly release: Promise<void> } | null = null;
  public wrap: ((snapshot: GraphSnapshot) => GraphSnapshot) | null = null;

  constructor(private readonly inner: GraphStore) {}

  getNode(id: string) {
    return this.inner.getNode(id);
  }

  getNeighbors(id: string) {
    return this.inner.getNeighbors(id);
  }

  upsertNode(input: BusinessInput) {
    return this.inner.upsertNode(input);
  }

  upsertEdge(input: RelationshipInput, options?: UpsertEdgeOptions) {
    return this.inner.upsertEdge(input, options);
  }

  deleteEdge(pair: NodePair, type: RelationshipType) {
    return this.inner.deleteEdge(pair, type);
  }

  async snapshot(): Promise<GraphSnapshot> {
    this.snapshotCalls += 1;
    if (this.transientFailures > 0) {
      this.transientFailures -= 1;
      throw new TransientStoreError("replica lagging");
    }
    if (this.gate) {
      await this.gate;
    }
    const snapshot = await this.inner.snapshot();
    if (this.hold) {
      this.hold.captured();
      await this.hold.release;
    }
    return this.wrap ? this.wrap(snapshot) : snapshot;
  }
}

/** Snapshot whose neighbour lookups advance the fake clock, as a slow backend would. */
class TickingSnapshot implements GraphSnapshot {
  constructor(
    private readonly inner: GraphSnapshot,
    private readonly clock: FakeClock,
    private readonly tickMs: number,
  ) {}

  get version() {
    return this.inner.version;
  }

  get nodeCount() {
    return this.inner.nodeCount;
  }

  get edgeCount() {
    return this.inner.edgeCount;
  }

  hasNode(id: string) {
    return this.inner.hasNode(id);
  }

  getNode(id: string) {
    return this.inner.getNode(id);
  }

  neighbors(id: string) {
    this.clock.advance(this.tickMs);
    return this.inner.neighbors(id);
  }

  degree(id: string) {
    return this.inner.degree(id);
  }
}

describe("network query service", () => {
  it("answers path queries with the response envelope", async () => {
    const engine = await seededEngine(createFakeClock());
    const response = await engine.queries.findPath({ source: "A", target: "C", maxDepth: 2 });

    const viewOf = (id: string, other: string, weight: number, volume: number) => ({
      relationship_id: id,
      business_id: other,
      relationship_type: "partner",
      weight,
      transaction_volume: volume,
      frequency: "irregular",
      created_at: ISO_BASE,
      last_transaction: ISO_BASE,
    });

    expect(response).to.deep.equal({
      status: "success",
      data: {
        business: { id: "A", name: "Business A", category: "uncategorised", location: "unknown", size_class: "small" },
        relationships: [viewOf("A::B::partner", "B", 0.9, 90), viewOf("A::C::partner", "C", 0.3, 30)],
        target: "C",
        path: { nodes: ["A", "C"], hops: 1, weight: 0.3, edges: [viewOf("A::C::partner", "C", 0.3, 30)] },
      },
      metadata: { total_relationships: 2, query_time_ms: 0, cache: "miss", depth: 2, snapshot_version: 7 },
    });
  });

  it("serves repeated queries from the cache with identical data", async () => {
    const engine = await seededEngine(createFakeClock());
    const first = await engine.queries.findPath({ source: "A", target: "C", maxDepth: 2 });
    const second = await engine.queries.findPath({ source: "A", target: "C", maxDepth: 2 });

    expect(second.metadata.cache).to.equal("hit");
    expect(second.data).to.deep.equal(first.data);
    expect(engine.queries.stats()).to.deep.equal({
      queries: 2,
      hits: 1,
      misses: 1,
      shared: 0,
      timeouts: 0,
      cacheWriteFailures: 0,
    });
  });

  it("reports a no_path status instead of failing", async () => {
    const engine = await seededEngine(createFakeClock());
    const response = await engine.queries.findPath({ source: "A", target: "D" });
    expect(response.status).to.equal("no_path");
    expect(response.data.path).to.equal(null);
    expect(response.metadata).to.include({ depth: 3, total_relationships: 2 });
  });

  it("returns a business with its direct relationships", async () => {
    const engine = await seededEngine(createFakeClock());
    const response = await engine.queries.businessNetwork({ businessId: "B" });
    expect(response.status).to.equal("success");
    expect(response.data.relationships.map((view) => [view.business_id, view.weight])).to.deep.equal([
      ["A", 0.9],
      ["C", 0.5],
    ]);
    expect(response.metadata).to.include({ total_relationships: 2, depth: 1, cache: "miss" });
  });

  it("rejects invalid requests before touching the cache", async () => {
    const engine = await seededEngine(createFakeClock());

    expect(await captureError(() => engine.queries.findPath({ source: "A", target: "C", maxDepth: 0 }))).to.be.instanceOf(
      InvalidDepthError,
    );
    expect(await captureError(() => engine.queries.neighborhood({ source: "A", maxDepth: 7 }))).to.be.instanceOf(
      InvalidDepthError,
    );
    expect(await captureError(() => engine.queries.findPath({ source: " ", target: "C" }))).to.be.instanceOf(
      InvalidRequestError,
    );
    expect(engine.queries.stats().queries).to.equal(0);

    expect(await captureError(() => engine.queries.findPath({ source: "Z", target: "C" }))).to.be.instanceOf(
      UnknownEntityError,
    );
    expect(engine.cache.stats().size).to.equal(0);
  });

  it("invalidates cached one-hop results as soon as a relationship changes", async () => {
    const engine = await seededEngine(createFakeClock());
    const before = await engine.queries.neighborhood({ source: "A", maxDepth: 1 });
    expect(before.data.neighbors.map((neighbor) => neighbor.business.id)).to.deep.equal(["B", "C"]);

    const ack = await engine.changes.applyRelationshipChange({
      kind: "upsert",
      relationship: { a: "D", b: "A", relationshipType: "vendor", transactionVolume: 10 },
    });
    expect(ack).to.include({ ack: true, change: "created", eventSeq: 8 });
    expect(ack.edge.id).to.equal("A::D::vendor");

    const after = await engine.queries.neighborhood({ source: "A", maxDepth: 1 });
    expect(after.metadata).to.include({ cache: "miss", total_relationships: 3 });
    expect(after.data.neighbors.map((neighbor) => [neighbor.business.id, neighbor.weight])).to.deep.equal([
      ["B", 0.9],
      ["C", 0.3],
      ["D", 0.1],
    ]);
  });

  it("lets deeper results expire with their TTL", async () => {
    const clock = createFakeClock();
    const engine = await seededEngine(clock, 60_000);
    await engine.queries.neighborhood({ source: "A", maxDepth: 3 });

    await engine.changes.applyRelationshipChange({
      kind: "upsert",
      relationship: { a: "C", b: "D", relationshipType: "client", transactionVolume: 20 },
    });
    const stale = await engine.queries.neighborhood({ source: "A", maxDepth: 3 });
    expect(stale.metadata.cache).to.equal("hit");
    expect(stale.data.neighbors.map((neighbor) => neighbor.business.id)).to.deep.equal(["B", "C"]);

    clock.advance(60_000);
    const fresh = await engine.queries.neighborhood({ source: "A", maxDepth: 3 });
    expect(fresh.metadata.cache).to.equal("miss");
    expect(fresh.data.neighbors.map((neighbor) => [neighbor.business.id, neighbor.distance, neighbor.path])).to.deep.equal([
      ["B", 1, ["A", "B"]],
      ["C", 1, ["A", "C"]],
      ["D", 2, ["A", "C", "D"]],
    ]);
  });

  it("drops relationships from results once deleted", async () => {
    const engine = await seededEngine(createFakeClock());
    await engine.queries.businessNetwork({ businessId: "C" });

    const ack = await engine.changes.applyRelationshipChange({ kind: "delete", a: "C", b: "B", relationshipType: "partner" });
    expect(ack.change).to.equal("deleted");

    const response = await engine.queries.businessNetwork({ businessId: "C" });
    expect(response.metadata.cache).to.equal("miss");
    expect(response.data.relationships.map((view) => view.business_id)).to.deep.equal(["A"]);
  });

  it("times out when the deadline has already passed", async () => {
    const clock = createFakeClock();
    const engine = await seededEngine(clock);
    const expired = Deadline.after(0, clock.now);

    const failure = await captureError(() =>
      engine.queries.findPath({ source: "A", target: "C" }, { deadline: expired }),
    );
    expect(failure).to.be.instanceOf(TimeoutError);
    expect(engine.queries.stats().timeouts).to.equal(1);
    expect(engine.cache.stats().size).to.equal(0);
  });

  it("times out when the deadline passes in the middle of a traversal", async () => {
    const clock = createFakeClock();
    const store = new ScriptedStore(await createTriangleStore(clock));
    store.wrap = (snapshot) => new TickingSnapshot(snapshot, clock, 1_500);
    const logger = new RecordingLogger();
    const engine = await createNetworkEngine({ store, clock: clock.now, logger, config: { deadlineMs: 2_000 } });

    // A is expanded at +0ms, B at +1500ms; the check before C runs at +3000ms.
    const failure = await captureError(() => engine.queries.neighborhood({ source: "A", maxDepth: 2 }));
    expect(failure).to.be.instanceOf(TimeoutError);
    expect(failure).to.have.property("message", "deadline exceeded during path_traversal");
    expect(engine.queries.stats()).to.include({ timeouts: 1, misses: 1 });
    expect(engine.cache.stats().size).to.equal(0);
    expect(logger.find("network_query_timeout").map((entry) => entry.payload)).to.deep.equal([
      { kind: "neighborhood", source: "A", max_depth: 2 },
    ]);
  });

  it("does not cache a one-hop result read before a concurrent change", async () => {
    const clock = createFakeClock();
    const store = new ScriptedStore(await createTriangleStore(clock));
    const engine = await createNetworkEngine({ store, clock: clock.now });

    let captured: () => void = () => undefined;
    const snapshotTaken = new Promise<void>((resolve) => {
      captured = resolve;
    });
    let release: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    store.hold = { captured: () => captured(), release: released };

    const pending = engine.queries.neighborhood({ source: "D", maxDepth: 1 });
    await snapshotTaken;
    store.hold = null;
    await engine.changes.applyRelationshipChange({
      kind: "upsert",
      relationship: { a: "D", b: "A", relationshipType: "vendor", transactionVolume: 10 },
    });
    release();

    const raced = await pending;
    expect(raced.data.neighbors).to.deep.equal([]);
    expect(engine.cache.stats()).to.include({ size: 0, fencedWritesRejected: 1 });

    const next = await engine.queries.neighborhood({ source: "D", maxDepth: 1 });
    expect(next.metadata.cache).to.equal("miss");
    expect(next.data.neighbors.map((neighbor) => neighbor.business.id)).to.deep.equal(["A"]);
  });

  it("still answers when the cache refuses a write", async () => {
    const clock = createFakeClock();
    const logger = new RecordingLogger();
    const engine = await createNetworkEngine({ store: await createTriangleStore(clock), clock: clock.now, logger });
    const put = sinon.stub(engine.cache, "put").throws(new Error("cache offline"));

    try {
      const response = await engine.queries.findPath({ source: "A", target: "C", maxDepth: 2 });
      expect(response.status).to.equal("success");
      expect(put.calledOnce).to.equal(true);
      expect(engine.queries.stats().cacheWriteFailures).to.equal(1);
      const failures = logger.find("network_cache_put_failed");
      expect(failures).to.have.length(1);
      expect(failures[0]?.payload).to.have.property("reason", "cache offline");
    } finally {
      put.restore();
    }
  });

  it("retries transient snapshot failures", async () => {
    const clock = createFakeClock();
    const store = new ScriptedStore(await createTriangleStore(clock));
    store.transientFailures = 2;
    const logger = new RecordingLogger();
    const engine = await createNetworkEngine({ store, clock: clock.now, logger, retrySleep: async () => undefined });

    const response = await engine.queries.findPath({ source: "B", target: "A", maxDepth: 1 });
    expect(response.data.path?.nodes).to.deep.equal(["B", "A"]);
    expect(store.snapshotCalls).to.equal(3);
    expect(logger.find("network_store_retry")).to.have.length(2);
  });

  it("shares one computation between identical concurrent misses", async () => {
    const clock = createFakeClock();
    const store = new ScriptedStore(await createTriangleStore(clock));
    let release: () => void = () => undefined;
    store.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const engine = await createNetworkEngine({ store, clock: clock.now });

    const first = engine.queries.findPath({ source: "A", target: "C", maxDepth: 2 });
    const second = engine.queries.findPath({ source: "A", target: "C", maxDepth: 2 });
    release();

    const [leader, follower] = await Promise.all([first, second]);
    expect(leader.metadata.cache).to.equal("miss");
    expect(follower.metadata.cache).to.equal("shared");
    expect(follower.data).to.deep.equal(leader.data);
    expect(store.snapshotCalls).to.equal(1);
  });
});
