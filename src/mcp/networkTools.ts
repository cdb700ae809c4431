import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import { InvalidRequestError, isNetworkError } from "../network/errors.js";
import type { NetworkEngine } from "../network/engine.js";
import { RELATIONSHIP_FREQUENCIES, RELATIONSHIP_TYPES, SIZE_CLASSES } from "../network/model.js";
import type { RelationshipChange } from "../network/changes.js";
import { ERROR_CODES, type ErrorCode } from "../types.js";

export const NETWORK_SERVER_NAME = "business-network";
export const NETWORK_SERVER_VERSION = "0.1.0";

const j = (o: unknown) => JSON.stringify(o, null, 2);

const id = z.string().trim().min(1);
const depth = z.number().int().optional();
const deadline = z.number().int().positive().optional();

export const FindPathInputShape = {
  source: id,
  target: id,
  max_depth: depth,
  deadline_ms: deadline,
} as const;

export const NeighborhoodInputShape = {
  source: id,
  max_depth: depth,
  deadline_ms: deadline,
} as const;

export const BusinessInputShape = {
  business_id: id,
  deadline_ms: deadline,
} as const;

export const UpsertBusinessInputShape = {
  id,
  name: z.string().trim().min(1),
  category: z.string().trim().optional(),
  location: z.string().trim().optional(),
  size_class: z.enum(SIZE_CLASSES).optional(),
} as const;

export const ApplyChangeInputShape = {
  kind: z.enum(["upsert", "delete"]),
  a: id,
  b: id,
  relationship_type: z.enum(RELATIONSHIP_TYPES),
  transaction_volume: z.number().finite().nonnegative().optional(),
  frequency: z.enum(RELATIONSHIP_FREQUENCIES).optional(),
  last_transaction: z.number().int().nonnegative().optional(),
  overwrite: z.boolean().optional(),
} as const;

export const CacheStatsInputShape = {} as const;

const ApplyChangeInputSchema = z.object(ApplyChangeInputShape);
type ApplyChangeInput = z.infer<typeof ApplyChangeInputSchema>;

interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

function success(tool: string, result: object): ToolResult {
  const payload = { tool, result };
  return { content: [{ type: "text", text: j(payload) }], structuredContent: payload };
}

/** Engine errors keep their stable code; anything else is reported as unexpected. */
function failure(tool: string, error: unknown): ToolResult {
  const payload = isNetworkError(error)
    ? { tool, error: error.toJSON() }
    : {
        tool,
        error: {
          code: ERROR_CODES.MCP_UNEXPECTED,
          message: error instanceof Error ? error.message : String(error),
        },
      };
  return { isError: true, content: [{ type: "text", text: j(payload) }], structuredContent: payload };
}

function toRelationshipChange(input: ApplyChangeInput): RelationshipChange {
  if (input.kind === "delete") {
    return { kind: "delete", a: input.a, b: input.b, relationshipType: input.relationship_type };
  }
  if (input.transaction_volume === undefined) {
    throw new InvalidRequestError("transaction_volume is required when kind is 'upsert'");
  }
  return {
    kind: "upsert",
    overwrite: input.overwrite,
    relationship: {
      a: input.a,
      b: input.b,
      relationshipType: input.relationship_type,
      transactionVolume: input.transaction_volume,
      frequency: input.frequency,
      lastTransaction: input.last_transaction,
    },
  };
}

/**
 * Registers the network tools on {@link server}. Handlers never throw: engine
 * failures come back as `isError` results carrying the error code so clients
 * can branch on it.
 */
export function registerNetworkTools(server: McpServer, engine: NetworkEngine): void {
  const logger = engine.logger.child("mcp");

  async function run(tool: string, handler: () => Promise<object>): Promise<ToolResult> {
    try {
      return success(tool, await handler());
    } catch (error) {
      const code: ErrorCode = isNetworkError(error) ? error.code : ERROR_CODES.MCP_UNEXPECTED;
      logger.warn("network_tool_failed", {
        tool,
        code,
        message: error instanceof Error ? error.message : String(error),
      });
      return failure(tool, error);
    }
  }

  server.registerTool(
    "network_find_path",
    {
      title: "Find path",
      description: "Best path between two businesses within max_depth hops (fewest hops, then highest weight).",
      inputSchema: FindPathInputShape,
    },
    async (input) =>
      run("network_find_path", () =>
        engine.queries.findPath({
          source: input.source,
          target: input.target,
          maxDepth: input.max_depth,
          deadlineMs: input.deadline_ms,
        }),
      ),
  );

  server.registerTool(
    "network_neighborhood",
    {
      title: "Neighborhood",
      description: "Businesses reachable within max_depth hops, with distance and best-path weight.",
      inputSchema: NeighborhoodInputShape,
    },
    async (input) =>
      run("network_neighborhood", () =>
        engine.queries.neighborhood({ source: input.source, maxDepth: input.max_depth, deadlineMs: input.deadline_ms }),
      ),
  );

  server.registerTool(
    "network_business",
    {
      title: "Business network",
      description: "A business with its direct relationships.",
      inputSchema: BusinessInputShape,
    },
    async (input) =>
      run("network_business", () =>
        engine.queries.businessNetwork({ businessId: input.business_id, deadlineMs: input.deadline_ms }),
      ),
  );

  server.registerTool(
    "network_upsert_business",
    {
      title: "Upsert business",
      description: "Creates or updates a business.",
      inputSchema: UpsertBusinessInputShape,
    },
    async (input) =>
      run("network_upsert_business", () =>
        engine.changes.upsertBusiness({
          id: input.id,
          name: input.name,
          category: input.category,
          location: input.location,
          sizeClass: input.size_class,
        }),
      ),
  );

  server.registerTool(
    "network_apply_change",
    {
      title: "Apply relationship change",
      description: "Creates, replaces or deletes a relationship and invalidates the affected cached results.",
      inputSchema: ApplyChangeInputShape,
    },
    async (input) =>
      run("network_apply_change", () => engine.changes.applyRelationshipChange(toRelationshipChange(input))),
  );

  server.registerTool(
    "network_cache_stats",
    {
      title: "Cache statistics",
      description: "Counters of the result cache, the invalidation coordinator and the query service.",
      inputSchema: CacheStatsInputShape,
    },
    async () =>
      run("network_cache_stats", async () => ({
        cache: engine.cache.stats(),
        coordinator: engine.coordinator.stats(),
        queries: engine.queries.stats(),
      })),
  );
}

/** Creates an MCP server exposing {@link engine}. */
export function createNetworkServer(engine: NetworkEngine): McpServer {
  const server = new McpServer({ name: NETWORK_SERVER_NAME, version: NETWORK_SERVER_VERSION });
  registerNetworkTools(server, engine);
  return server;
}
