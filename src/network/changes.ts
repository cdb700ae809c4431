import { z } from "zod";

import type { InvalidationEventBus } from "../events/bus.js";
import type { StructuredLogger } from "../logger.js";
import { InvalidRequestError } from "./errors.js";
import {
  RELATIONSHIP_TYPES,
  type BusinessInput,
  type BusinessNode,
  type RelationshipEdge,
  type RelationshipInput,
} from "./model.js";
import type { GraphStore } from "./store.js";

const EVENT_SOURCE = "relationship_changes";

/** Mutation accepted by {@link RelationshipChangeService.applyRelationshipChange}. */
export type RelationshipChange =
  | { readonly kind: "upsert"; readonly relationship: RelationshipInput; readonly overwrite?: boolean }
  | {
      readonly kind: "delete";
      readonly a: string;
      readonly b: string;
      readonly relationshipType: RelationshipInput["relationshipType"];
    };

const deleteChangeSchema = z.object({
  kind: z.literal("delete"),
  a: z.string().trim().min(1),
  b: z.string().trim().min(1),
  relationshipType: z.enum(RELATIONSHIP_TYPES),
});

/** Acknowledgement returned once the store committed and invalidation ran. */
export interface RelationshipChangeAck {
  readonly ack: true;
  readonly change: "created" | "updated" | "deleted";
  readonly edge: RelationshipEdge;
  /** Sequence number of the invalidation event published for the change. */
  readonly eventSeq: number;
}

export interface BusinessChangeAck {
  readonly ack: true;
  readonly change: "created" | "updated";
  readonly business: BusinessNode;
  readonly eventSeq: number;
}

export interface RelationshipChangeServiceOptions {
  readonly store: GraphStore;
  readonly bus: InvalidationEventBus;
  readonly logger?: StructuredLogger;
}

/**
 * Write path of the engine. Every committed mutation publishes an event on
 * the bus before the caller is acknowledged; since the bus dispatches
 * synchronously, eager cache invalidation has completed by the time the
 * returned promise resolves.
 */
export class RelationshipChangeService {
  private readonly store: GraphStore;
  private readonly bus: InvalidationEventBus;
  private readonly logger?: StructuredLogger;

  constructor(options: RelationshipChangeServiceOptions) {
    this.store = options.store;
    this.bus = options.bus;
    this.logger = options.logger;
  }

  async applyRelationshipChange(change: RelationshipChange): Promise<RelationshipChangeAck> {
    if (change.kind === "delete") {
      const parsed = deleteChangeSchema.safeParse(change);
      if (!parsed.success) {
        throw new InvalidRequestError("invalid relationship deletion", parsed.error.issues);
      }
      const edge = await this.store.deleteEdge({ a: parsed.data.a, b: parsed.data.b }, parsed.data.relationshipType);
      return this.acknowledge(edge, "deleted");
    }

    const result = await this.store.upsertEdge(change.relationship, { overwrite: change.overwrite === true });
    return this.acknowledge(result.edge, result.change);
  }

  async upsertBusiness(input: BusinessInput): Promise<BusinessChangeAck> {
    const result = await this.store.upsertNode(input);
    const event = this.bus.publish({
      entityKind: "node",
      entityId: result.node.id,
      change: result.change,
      source: EVENT_SOURCE,
    });
    this.logger?.info("network_business_committed", {
      business_id: result.node.id,
      change: result.change,
      seq: event.seq,
    });
    return { ack: true, change: result.change, business: result.node, eventSeq: event.seq };
  }

  private acknowledge(edge: RelationshipEdge, change: RelationshipChangeAck["change"]): RelationshipChangeAck {
    const event = this.bus.publish({
      entityKind: "edge",
      entityId: edge.id,
      endpoints: [edge.a, edge.b],
      change,
      source: EVENT_SOURCE,
    });
    this.logger?.info("network_relationship_committed", {
      relationship_id: edge.id,
      change,
      seq: event.seq,
    });
    return { ack: true, change, edge, eventSeq: event.seq };
  }
}
