import { describe, it } from "mocha";
import { expect } from "chai";

import { InvalidationEventBus } from "../src/events/bus.js";
import { ResultCache } from "../src/network/cache.js";
import { InvalidationCoordinator } from "../src/network/coordinator.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { createFakeClock } from "./helpers/networkFixtures.js";

function seededCache(): ResultCache<string> {
  const cache = new ResultCache<string>({ clock: createFakeClock(0).now });
  cache.put("one-hop", "A:[B]", { shape: { kind: "neighborhood", source: "A", maxDepth: 1 }, dependsOn: ["A", "B"] });
  cache.put("business", "B", { shape: { kind: "business", source: "B", maxDepth: 1 }, dependsOn: ["B", "A"] });
  cache.put("deep", "A-B-C", {
    shape: { kind: "path", source: "A", target: "C", maxDepth: 3 },
    dependsOn: ["A", "B", "C"],
  });
  cache.put("unrelated", "E:[F]", { shape: { kind: "neighborhood", source: "E", maxDepth: 1 }, dependsOn: ["E", "F"] });
  return cache;
}

describe("network invalidation coordinator", () => {
  it("drops shallow entries touching the change and leaves deeper ones to their TTL", () => {
    const bus = new InvalidationEventBus({ now: () => 0 });
    const cache = seededCache();
    const logger = new RecordingLogger();
    const coordinator = new InvalidationCoordinator({ bus, cache, logger });
    coordinator.start();

    bus.publish({ entityKind: "edge", entityId: "B::C::vendor", endpoints: ["B", "C"], change: "created" });

    expect(cache.keys()).to.deep.equal(["deep", "unrelated"]);
    expect(cache.generation()).to.equal(1);
    expect(
      cache.put("late", "C:[B]", { shape: { kind: "neighborhood", source: "C", maxDepth: 1 }, dependsOn: ["C", "B"], generation: 0 }),
    ).to.equal(false);
    expect(coordinator.stats()).to.deep.equal({
      eventsProcessed: 1,
      duplicatesIgnored: 0,
      keysInvalidated: 2,
      lastSeq: 1,
      running: true,
    });
    expect(logger.find("network_cache_invalidated").map((entry) => entry.payload)).to.deep.equal([
      { seq: 1, entity_kind: "edge", entity_id: "B::C::vendor", change: "created", removed: 2 },
    ]);
  });

  it("handles each event once", () => {
    const bus = new InvalidationEventBus();
    const cache = seededCache();
    const coordinator = new InvalidationCoordinator({ bus, cache });
    coordinator.start();

    const event = bus.publish({ entityKind: "node", entityId: "E", change: "updated" });
    expect(cache.keys()).to.not.include("unrelated");

    cache.put("unrelated", "E:[F]", { shape: { kind: "neighborhood", source: "E", maxDepth: 1 }, dependsOn: ["E"] });
    expect(coordinator.handle(event)).to.equal(0);
    expect(cache.keys()).to.include("unrelated");
    expect(coordinator.stats()).to.include({ eventsProcessed: 1, duplicatesIgnored: 1 });
  });

  it("catches up on events published before it started", () => {
    const bus = new InvalidationEventBus();
    const cache = seededCache();
    bus.publish({ entityKind: "edge", entityId: "A::B::partner", endpoints: ["A", "B"], change: "deleted" });

    const coordinator = new InvalidationCoordinator({ bus, cache });
    expect(cache.keys()).to.have.length(4);
    coordinator.start();
    expect(cache.keys()).to.deep.equal(["deep", "unrelated"]);

    coordinator.stop();
    expect(bus.listenerCount()).to.equal(0);
    bus.publish({ entityKind: "node", entityId: "F", change: "updated" });
    expect(cache.keys()).to.deep.equal(["deep", "unrelated"]);
  });

  it("invalidates deeper entries when the eager threshold covers them", () => {
    const bus = new InvalidationEventBus();
    const cache = seededCache();
    new InvalidationCoordinator({ bus, cache, eagerDepthThreshold: 3 }).start();

    bus.publish({ entityKind: "node", entityId: "C", change: "updated" });
    expect(cache.keys()).to.deep.equal(["one-hop", "business", "unrelated"]);
  });

  it("leaves every entry to TTL expiry when eager invalidation is disabled", () => {
    const bus = new InvalidationEventBus();
    const cache = seededCache();
    const coordinator = new InvalidationCoordinator({ bus, cache, eagerDepthThreshold: 0 });
    coordinator.start();

    bus.publish({ entityKind: "node", entityId: "A", change: "updated" });
    expect(cache.keys()).to.have.length(4);
    expect(cache.generation()).to.equal(0);
    expect(coordinator.stats().eventsProcessed).to.equal(1);
  });
});

describe("invalidation event bus", () => {
  it("numbers events and filters the history", () => {
    let now = 10;
    const bus = new InvalidationEventBus({ historyLimit: 2, now: () => now++ });
    bus.publish({ entityKind: "node", entityId: "A", change: "created" });
    bus.publish({ entityKind: "edge", entityId: "A::B::client", endpoints: ["A", "B", "A"], change: "created" });
    bus.publish({ entityKind: "node", entityId: "C", change: "updated", source: "test" });

    expect(bus.lastSeq).to.equal(3);
    expect(bus.list().map((event) => event.seq)).to.deep.equal([2, 3]);
    expect(bus.list({ businessId: "B" })).to.deep.equal([
      {
        seq: 2,
        ts: 11,
        entityKind: "edge",
        entityId: "A::B::client",
        endpoints: ["A", "B"],
        change: "created",
        source: null,
      },
    ]);
    expect(bus.list({ entityKinds: ["node"], afterSeq: 2 }).map((event) => event.entityId)).to.deep.equal(["C"]);
    expect(() => bus.publish({ entityKind: "node", entityId: "  ", change: "created" })).to.throw(TypeError);
  });

  it("only delivers events matching a subscription filter", () => {
    const bus = new InvalidationEventBus();
    const seen: string[] = [];
    const unsubscribe = bus.subscribe((event) => seen.push(event.entityId), { entityKinds: ["edge"] });

    bus.publish({ entityKind: "node", entityId: "A", change: "created" });
    bus.publish({ entityKind: "edge", entityId: "A::B::vendor", endpoints: ["A", "B"], change: "created" });
    unsubscribe();
    bus.publish({ entityKind: "edge", entityId: "A::C::vendor", endpoints: ["A", "C"], change: "created" });

    expect(seen).to.deep.equal(["A::B::vendor"]);
  });
});
