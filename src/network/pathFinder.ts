import type { StructuredLogger } from "../logger.js";
import type { Deadline } from "./deadline.js";
import { InvalidDepthError, UnknownEntityError } from "./errors.js";
import type { BusinessNode, RelationshipEdge } from "./model.js";
import type { GraphSnapshot } from "./store.js";

export const DEFAULT_MAX_DEPTH = 3;
export const DEFAULT_DEPTH_CEILING = 6;
export const DEFAULT_NEIGHBOR_CAP = 100;

/** Two aggregate weights closer than this are considered equal. */
const WEIGHT_EPSILON = 1e-9;

/** Path between two businesses. Frozen once produced. */
export interface PathResult {
  readonly source: string;
  readonly target: string;
  /** Business ids from source to target, both included. */
  readonly nodes: readonly string[];
  readonly edges: readonly RelationshipEdge[];
  readonly hops: number;
  /** Sum of the traversed edge weights. */
  readonly weight: number;
}

export type PathOutcome =
  | { readonly status: "found"; readonly path: PathResult }
  | { readonly status: "no_path"; readonly source: string; readonly target: string; readonly maxDepth: number };

export interface NeighborhoodEntry {
  readonly node: BusinessNode;
  readonly distance: number;
  readonly weight: number;
  /** Best path from the source, source included. */
  readonly path: readonly string[];
}

export interface TraversalStats {
  expandedNodes: number;
  examinedEdges: number;
  /** Expanded businesses whose degree exceeded the neighbour cap. */
  oversizedNodes: string[];
  levels: number;
}

export interface TraversalOptions {
  readonly maxDepth: number;
  readonly deadline: Deadline;
}

export interface PathFinderOptions {
  readonly depthCeiling?: number;
  /**
   * Degree above which a business counts as oversized. Oversized businesses
   * are still expanded; the cap only feeds statistics and logs. Worst-case
   * work is O(cap^depth), which the depth ceiling keeps bounded.
   */
  readonly neighborCap?: number;
  readonly logger?: StructuredLogger;
}

/** Best known way to reach a business, at a given hop distance. */
interface Label {
  readonly distance: number;
  readonly weight: number;
  readonly nodes: readonly string[];
  readonly edges: readonly RelationshipEdge[];
}

function compareSequences(left: readonly string[], right: readonly string[]): number {
  const length = Math.min(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const a = left[index];
    const b = right[index];
    if (a !== b) {
      return (a ?? "") < (b ?? "") ? -1 : 1;
    }
  }
  return left.length - right.length;
}

/**
 * True when {@link candidate} beats {@link incumbent}. Both labels have the
 * same hop count: higher weight wins, then the smaller node sequence, then
 * the smaller edge-id sequence (parallel relationships of one pair).
 */
function isBetter(candidate: Label, incumbent: Label): boolean {
  const delta = candidate.weight - incumbent.weight;
  if (Math.abs(delta) > WEIGHT_EPSILON) {
    return delta > 0;
  }
  const byNodes = compareSequences(candidate.nodes, incumbent.nodes);
  if (byNodes !== 0) {
    return byNodes < 0;
  }
  return (
    compareSequences(
      candidate.edges.map((edge) => edge.id),
      incumbent.edges.map((edge) => edge.id),
    ) < 0
  );
}

/**
 * Bounded-depth traversal over the undirected relationship multigraph.
 *
 * The search proceeds level by level. Every path reaching a business at hop
 * `d` has exactly `d` edges, so the best path to it extends the best path to
 * one of its level `d - 1` neighbours; keeping a single label per business
 * is therefore exact for the fewest-hops / max-weight / lexicographic order.
 */
export class PathFinder {
  readonly depthCeiling: number;
  readonly neighborCap: number;
  private readonly logger?: StructuredLogger;

  constructor(options: PathFinderOptions = {}) {
    this.depthCeiling = options.depthCeiling ?? DEFAULT_DEPTH_CEILING;
    this.neighborCap = options.neighborCap ?? DEFAULT_NEIGHBOR_CAP;
    this.logger = options.logger;
  }

  /** Throws {@link InvalidDepthError} unless depth is an integer in `[1, ceiling]`. */
  assertDepth(maxDepth: unknown): number {
    if (typeof maxDepth !== "number" || !Number.isInteger(maxDepth) || maxDepth < 1 || maxDepth > this.depthCeiling) {
      throw new InvalidDepthError(maxDepth, this.depthCeiling);
    }
    return maxDepth;
  }

  findPath(snapshot: GraphSnapshot, source: string, target: string, options: TraversalOptions): { outcome: PathOutcome; stats: TraversalStats } {
    const maxDepth = this.assertDepth(options.maxDepth);
    this.assertKnown(snapshot, source, "source");
    this.assertKnown(snapshot, target, "target");

    const stats = createStats();
    if (source === target) {
      const path: PathResult = Object.freeze({
        source,
        target,
        nodes: Object.freeze([source]),
        edges: Object.freeze([]),
        hops: 0,
        weight: 0,
      });
      return { outcome: { status: "found", path }, stats };
    }

    const labels = this.traverse(snapshot, source, maxDepth, options.deadline, stats, target);
    const label = labels.get(target);
    if (!label) {
      return { outcome: { status: "no_path", source, target, maxDepth }, stats };
    }
    const path: PathResult = Object.freeze({
      source,
      target,
      nodes: Object.freeze([...label.nodes]),
      edges: Object.freeze([...label.edges]),
      hops: label.distance,
      weight: label.weight,
    });
    return { outcome: { status: "found", path }, stats };
  }

  neighborhood(snapshot: GraphSnapshot, source: string, options: TraversalOptions): { entries: NeighborhoodEntry[]; stats: TraversalStats } {
    const maxDepth = this.assertDepth(options.maxDepth);
    this.assertKnown(snapshot, source, "source");

    const stats = createStats();
    const labels = this.traverse(snapshot, source, maxDepth, options.deadline, stats, null);
    const entries: NeighborhoodEntry[] = [];
    for (const [id, label] of labels) {
      const node = snapshot.getNode(id);
      if (id === source || !node) {
        continue;
      }
      entries.push(Object.freeze({ node, distance: label.distance, weight: label.weight, path: Object.freeze([...label.nodes]) }));
    }
    entries.sort((left, right) => left.distance - right.distance || (left.node.id < right.node.id ? -1 : left.node.id > right.node.id ? 1 : 0));
    return { entries, stats };
  }

  private assertKnown(snapshot: GraphSnapshot, id: string, role: "source" | "target"): void {
    if (!snapshot.hasNode(id)) {
      throw new UnknownEntityError(id, role);
    }
  }

  /**
   * Layered expansion from {@link source}. When {@link stopAt} is set, the
   * search ends after the level that first labels it. The deadline is
   * checked before each expansion; on expiry the partial labels are dropped
   * with the thrown error.
   */
  private traverse(
    snapshot: GraphSnapshot,
    source: string,
    maxDepth: number,
    deadline: Deadline,
    stats: TraversalStats,
    stopAt: string | null,
  ): Map<string, Label> {
    const labels = new Map<string, Label>();
    labels.set(source, { distance: 0, weight: 0, nodes: [source], edges: [] });
    let frontier: string[] = [source];

    for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth += 1) {
      const level = new Map<string, Label>();
      for (const current of frontier) {
        deadline.throwIfExpired("path_traversal");
        const base = labels.get(current);
        if (!base) {
          continue;
        }
        const incident = snapshot.neighbors(current);
        stats.expandedNodes += 1;
        if (incident.length > this.neighborCap) {
          stats.oversizedNodes.push(current);
          this.logger?.warn("network_fanout_exceeds_cap", {
            business_id: current,
            degree: incident.length,
            cap: this.neighborCap,
            depth,
          });
        }
        for (const { neighborId, edge } of incident) {
          stats.examinedEdges += 1;
          const settled = labels.get(neighborId);
          if (settled && settled.distance < depth) {
            continue;
          }
          const candidate: Label = {
            distance: depth,
            weight: base.weight + edge.weight,
            nodes: [...base.nodes, neighborId],
            edges: [...base.edges, edge],
          };
          const incumbent = level.get(neighborId);
          if (!incumbent || isBetter(candidate, incumbent)) {
            level.set(neighborId, candidate);
          }
        }
      }

      stats.levels = depth;
      const next = [...level.keys()].sort();
      for (const id of next) {
        const label = level.get(id);
        if (label) {
          labels.set(id, label);
        }
      }
      if (stopAt !== null && level.has(stopAt)) {
        break;
      }
      frontier = next;
    }

    deadline.throwIfExpired("path_traversal");
    return labels;
  }
}

function createStats(): TraversalStats {
  return { expandedNodes: 0, examinedEdges: 0, oversizedNodes: [], levels: 0 };
}
