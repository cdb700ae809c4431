import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";

import { createNetworkServer } from "../src/mcp/networkTools.js";
import { createNetworkEngine, type NetworkEngine } from "../src/network/engine.js";
import { createFakeClock, percentWeight } from "./helpers/networkFixtures.js";

interface ToolOutcome {
  isError: boolean;
  payload: unknown;
}

function readOutcome(response: unknown): ToolOutcome {
  const result = CallToolResultSchema.parse(response);
  const first = result.content[0];
  if (!first || first.type !== "text") {
    throw new Error("expected a text content block");
  }
  const payload: unknown = JSON.parse(first.text);
  expect(result.structuredContent).to.deep.equal(payload);
  return { isError: result.isError ?? false, payload };
}

/**
 * Exercises the network tools end to end through the SDK client, using the
 * in-memory transport pair so nothing leaves the process.
 */
describe("network MCP tools", () => {
  let engine: NetworkEngine;
  let server: McpServer;
  let client: Client;

  async function call(name: string, args: Record<string, unknown>): Promise<ToolOutcome> {
    return readOutcome(await client.callTool({ name, arguments: args }));
  }

  beforeEach(async () => {
    engine = await createNetworkEngine({ clock: createFakeClock().now, weigh: percentWeight });
    server = createNetworkServer(engine);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "network-tools-test", version: "1.0.0-test" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await engine.close();
  });

  it("lists every network tool", async () => {
    const listed = await client.listTools({});
    expect(listed.tools.map((tool) => tool.name).sort()).to.deep.equal([
      "network_apply_change",
      "network_business",
      "network_cache_stats",
      "network_find_path",
      "network_neighborhood",
      "network_upsert_business",
    ]);
  });

  it("mutates the network and answers path queries", async () => {
    for (const id of ["A", "B", "C"]) {
      const created = await call("network_upsert_business", { id, name: `Business ${id}` });
      expect(created.isError).to.equal(false);
    }
    const changes = [
      { a: "A", b: "B", transaction_volume: 90 },
      { a: "B", b: "C", transaction_volume: 50 },
      { a: "A", b: "C", transaction_volume: 30 },
    ];
    for (const change of changes) {
      const applied = await call("network_apply_change", { kind: "upsert", relationship_type: "partner", ...change });
      expect(applied.payload).to.have.nested.property("result.ack", true);
    }

    const found = await call("network_find_path", { source: "A", target: "C", max_depth: 2 });
    expect(found.isError).to.equal(false);
    expect(found.payload).to.have.nested.property("tool", "network_find_path");
    expect(found.payload).to.have.nested.property("result.status", "success");
    expect(found.payload).to.have.nested.property("result.data.path.nodes").that.deep.equals(["A", "C"]);
    expect(found.payload).to.have.nested.property("result.metadata.total_relationships", 2);

    const neighborhood = await call("network_neighborhood", { source: "B", max_depth: 1 });
    expect(neighborhood.payload).to.have.nested.property("result.data.neighbors[0].business.id", "A");
    expect(neighborhood.payload).to.have.nested.property("result.data.neighbors[1].weight", 0.5);

    await call("network_find_path", { source: "A", target: "C", max_depth: 2 });
    const stats = await call("network_cache_stats", {});
    expect(stats.payload).to.have.nested.property("result.queries.hits", 1);
    expect(stats.payload).to.have.nested.property("result.coordinator.eventsProcessed", 6);
  });

  it("reports engine errors with their stable code", async () => {
    await call("network_upsert_business", { id: "A", name: "Alpha" });

    const unknown = await call("network_business", { business_id: "Z" });
    expect(unknown.isError).to.equal(true);
    expect(unknown.payload).to.have.nested.property("error.code", "E-NET-UNKNOWN-ENTITY");

    const depth = await call("network_find_path", { source: "A", target: "A", max_depth: 9 });
    expect(depth.payload).to.have.nested.property("error.code", "E-NET-INVALID-DEPTH");

    const missingVolume = await call("network_apply_change", {
      kind: "upsert",
      a: "A",
      b: "B",
      relationship_type: "client",
    });
    expect(missingVolume.payload).to.have.nested.property("error.code", "E-NET-INVALID-INPUT");

    const missingEdge = await call("network_apply_change", {
      kind: "delete",
      a: "A",
      b: "B",
      relationship_type: "client",
    });
    expect(missingEdge.payload).to.have.nested.property("error.code", "E-NET-NOT-FOUND");
  });
});
