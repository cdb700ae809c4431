import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";

import type { StructuredLogger } from "../logger.js";
import {
  RELATIONSHIP_FREQUENCIES,
  RELATIONSHIP_TYPES,
  SIZE_CLASSES,
  type BusinessNode,
  type RelationshipEdge,
  type RelationshipType,
} from "./model.js";

/**
 * Persisted relationship record. Field names follow the wire format shared
 * with the ingestion side (`transaction_volume`, `relationship_type`, ...).
 */
const persistedEdgeSchema = z.object({
  id: z.string().min(1),
  a: z.string().min(1),
  b: z.string().min(1),
  relationship_type: z.enum(RELATIONSHIP_TYPES),
  transaction_volume: z.number().finite().nonnegative(),
  frequency: z.enum(RELATIONSHIP_FREQUENCIES),
  created_at: z.number().int().nonnegative(),
  last_transaction: z.number().int().nonnegative(),
  weight: z.number().min(0).max(1),
});

const persistedBusinessSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  category: z.string(),
  location: z.string(),
  size_class: z.enum(SIZE_CLASSES),
  created_at: z.number().int().nonnegative(),
  updated_at: z.number().int().nonnegative(),
});

const journalEntrySchema = z.discriminatedUnion("op", [
  z.object({ ts: z.number(), op: z.literal("upsert_business"), business: persistedBusinessSchema }),
  z.object({ ts: z.number(), op: z.literal("upsert_relationship"), edge: persistedEdgeSchema }),
  z.object({
    ts: z.number(),
    op: z.literal("delete_relationship"),
    a: z.string().min(1),
    b: z.string().min(1),
    relationship_type: z.enum(RELATIONSHIP_TYPES),
  }),
]);

export type JournalEntry = z.infer<typeof journalEntrySchema>;

/** Mutation replayed from a journal, expressed with the in-memory types. */
export type JournalMutation =
  | { op: "upsert_business"; business: BusinessNode }
  | { op: "upsert_relationship"; edge: RelationshipEdge }
  | { op: "delete_relationship"; a: string; b: string; relationshipType: RelationshipType };

export interface ReplayResult {
  applied: number;
  skipped: number;
}

/** Destination of store mutations. Appends must complete before a write is visible. */
export interface MutationJournal {
  append(mutation: JournalMutation, ts: number): Promise<void>;
  replay(apply: (mutation: JournalMutation) => void): Promise<ReplayResult>;
}

function toPersistedEntry(mutation: JournalMutation, ts: number): JournalEntry {
  switch (mutation.op) {
    case "upsert_business": {
      const { business } = mutation;
      return {
        ts,
        op: "upsert_business",
        business: {
          id: business.id,
          name: business.name,
          category: business.category,
          location: business.location,
          size_class: business.sizeClass,
          created_at: business.createdAt,
          updated_at: business.updatedAt,
        },
      };
    }
    case "upsert_relationship": {
      const { edge } = mutation;
      return {
        ts,
        op: "upsert_relationship",
        edge: {
          id: edge.id,
          a: edge.a,
          b: edge.b,
          relationship_type: edge.relationshipType,
          transaction_volume: edge.transactionVolume,
          frequency: edge.frequency,
          created_at: edge.createdAt,
          last_transaction: edge.lastTransaction,
          weight: edge.weight,
        },
      };
    }
    case "delete_relationship":
      return { ts, op: "delete_relationship", a: mutation.a, b: mutation.b, relationship_type: mutation.relationshipType };
  }
}

function fromPersistedEntry(entry: JournalEntry): JournalMutation {
  switch (entry.op) {
    case "upsert_business":
      return {
        op: "upsert_business",
        business: {
          id: entry.business.id,
          name: entry.business.name,
          category: entry.business.category,
          location: entry.business.location,
          sizeClass: entry.business.size_class,
          createdAt: entry.business.created_at,
          updatedAt: entry.business.updated_at,
        },
      };
    case "upsert_relationship":
      return {
        op: "upsert_relationship",
        edge: {
          id: entry.edge.id,
          a: entry.edge.a,
          b: entry.edge.b,
          relationshipType: entry.edge.relationship_type,
          transactionVolume: entry.edge.transaction_volume,
          frequency: entry.edge.frequency,
          createdAt: entry.edge.created_at,
          lastTransaction: entry.edge.last_transaction,
          weight: entry.edge.weight,
        },
      };
    case "delete_relationship":
      return { op: "delete_relationship", a: entry.a, b: entry.b, relationshipType: entry.relationship_type };
  }
}

/**
 * Append-only JSONL journal. One line per mutation; replay skips lines that
 * fail to parse (typically a torn final write) and reports how many were
 * dropped.
 */
export class JsonlMutationJournal implements MutationJournal {
  private readonly file: string;
  private directoryReady = false;

  constructor(
    file: string,
    private readonly logger?: StructuredLogger,
  ) {
    this.file = resolve(file);
  }

  async append(mutation: JournalMutation, ts: number): Promise<void> {
    if (!this.directoryReady) {
      await mkdir(dirname(this.file), { recursive: true });
      this.directoryReady = true;
    }
    const line = JSON.stringify(toPersistedEntry(mutation, ts));
    await appendFile(this.file, `${line}\n`, { encoding: "utf8" });
  }

  async replay(apply: (mutation: JournalMutation) => void): Promise<ReplayResult> {
    let contents: string;
    try {
      contents = await readFile(this.file, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return { applied: 0, skipped: 0 };
      }
      throw error;
    }

    const result: ReplayResult = { applied: 0, skipped: 0 };
    const lines = contents.split("\n");
    lines.forEach((raw, index) => {
      const line = raw.trim();
      if (line.length === 0) {
        return;
      }
      const parsed = journalEntrySchema.safeParse(safeJsonParse(line));
      if (!parsed.success) {
        result.skipped += 1;
        this.logger?.warn("network_journal_line_skipped", { file: this.file, line: index + 1 });
        return;
      }
      apply(fromPersistedEntry(parsed.data));
      result.applied += 1;
    });
    return result;
  }
}

function safeJsonParse(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
