import { z } from "zod";

/** Relationship kinds recognised by the network. */
export const RELATIONSHIP_TYPES = ["vendor", "client", "partner"] as const;
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

/** Declared cadence of the transactions backing a relationship. */
export const RELATIONSHIP_FREQUENCIES = ["daily", "weekly", "monthly", "quarterly", "yearly", "irregular"] as const;
export type RelationshipFrequency = (typeof RELATIONSHIP_FREQUENCIES)[number];

export const SIZE_CLASSES = ["micro", "small", "medium", "large", "enterprise"] as const;
export type SizeClass = (typeof SIZE_CLASSES)[number];

/** A company participating in the network. `id` never changes once stored. */
export interface BusinessNode {
  readonly id: string;
  readonly name: string;
  readonly category: string;
  readonly location: string;
  readonly sizeClass: SizeClass;
  readonly createdAt: number;
  readonly updatedAt: number;
}

/**
 * Undirected relationship between two businesses. Endpoints are stored in
 * canonical order (`a < b`) so the same pair always yields the same id.
 */
export interface RelationshipEdge {
  readonly id: string;
  readonly a: string;
  readonly b: string;
  readonly relationshipType: RelationshipType;
  readonly transactionVolume: number;
  readonly frequency: RelationshipFrequency;
  readonly createdAt: number;
  readonly lastTransaction: number;
  /** Derived from {@link transactionVolume}; always within [0, 1]. */
  readonly weight: number;
}

/** Unordered pair of business identifiers. */
export interface NodePair {
  readonly a: string;
  readonly b: string;
}

const idSchema = z.string().trim().min(1, "identifier must not be empty");

export const businessInputSchema = z.object({
  id: idSchema,
  name: z.string().trim().min(1),
  category: z.string().trim().default("uncategorised"),
  location: z.string().trim().default("unknown"),
  sizeClass: z.enum(SIZE_CLASSES).default("small"),
});
export type BusinessInput = z.input<typeof businessInputSchema>;

export const relationshipInputSchema = z
  .object({
    a: idSchema,
    b: idSchema,
    relationshipType: z.enum(RELATIONSHIP_TYPES),
    transactionVolume: z.number().finite().nonnegative(),
    frequency: z.enum(RELATIONSHIP_FREQUENCIES).default("irregular"),
    lastTransaction: z.number().int().nonnegative().optional(),
  })
  .refine((value) => value.a !== value.b, { message: "a relationship needs two distinct businesses", path: ["b"] });
export type RelationshipInput = z.input<typeof relationshipInputSchema>;

/** Maps a transaction volume to a weight in [0, 1]. Must be monotonic. */
export type WeightFunction = (transactionVolume: number) => number;

/** Default half-saturation volume: a relationship moving this much weighs 0.5. */
export const DEFAULT_HALF_SATURATION = 10_000;

/**
 * Saturating weight `v / (v + halfSaturation)`. Zero volume weighs 0 and the
 * weight approaches 1 as the volume grows.
 */
export function saturatingWeight(halfSaturation = DEFAULT_HALF_SATURATION): WeightFunction {
  if (!Number.isFinite(halfSaturation) || halfSaturation <= 0) {
    throw new RangeError(`half saturation must be a positive number (received ${halfSaturation})`);
  }
  return (volume) => (volume <= 0 ? 0 : volume / (volume + halfSaturation));
}

/** Linear weight `v / ceiling`, clamped to 1 once the ceiling volume is reached. */
export function cappedLinearWeight(ceilingVolume: number): WeightFunction {
  if (!Number.isFinite(ceilingVolume) || ceilingVolume <= 0) {
    throw new RangeError(`ceiling volume must be a positive number (received ${ceilingVolume})`);
  }
  return (volume) => (volume <= 0 ? 0 : Math.min(1, volume / ceilingVolume));
}

/** Returns the pair with its endpoints sorted. */
export function canonicalPair(a: string, b: string): NodePair {
  return a <= b ? { a, b } : { a: b, b: a };
}

/** Escapes `%` and `:` so a business id never contains the `::` key separator. */
function keySegment(id: string): string {
  return id.replace(/%/g, "%25").replace(/:/g, "%3A");
}

export function pairKey(a: string, b: string): string {
  const pair = canonicalPair(a, b);
  return `${keySegment(pair.a)}::${keySegment(pair.b)}`;
}

export function edgeId(a: string, b: string, type: RelationshipType): string {
  return `${pairKey(a, b)}::${type}`;
}

/** Endpoint of {@link edge} opposite to {@link from}. */
export function otherEndpoint(edge: RelationshipEdge, from: string): string {
  return edge.a === from ? edge.b : edge.a;
}
