/**
 * Shared types used across the engine. Grouping these definitions keeps the
 * string unions and error helpers consistent between the store, the
 * traversal code and the MCP surface.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Every engine error carries one of these codes so callers can branch on a
 * stable literal instead of parsing messages.
 */
export const ERROR_CATALOG = {
  NET: {
    NOT_FOUND: "E-NET-NOT-FOUND",
    UNKNOWN_ENTITY: "E-NET-UNKNOWN-ENTITY",
    INVALID_DEPTH: "E-NET-INVALID-DEPTH",
    CONFLICT: "E-NET-CONFLICT",
    TIMEOUT: "E-NET-TIMEOUT",
    STORE_UNAVAILABLE: "E-NET-STORE-UNAVAILABLE",
    INVALID_INPUT: "E-NET-INVALID-INPUT",
  },
  MCP: {
    UNEXPECTED: "E-MCP-UNEXPECTED",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `NET_CONFLICT`). The runtime object is frozen while keeping the
 * typed relationship with {@link ERROR_CATALOG}.
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.NET_TIMEOUT`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the engine. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Maximum number of UTF-16 code units allowed for error messages and hints. */
export const ERROR_TEXT_MAX_LENGTH = 160;

/**
 * Collapses whitespace, trims surrounding spaces and enforces the maximum length
 * for an error message. Empty text collapses to the fallback.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const collapsed = text.replace(/\s+/g, " ").trim();
  const base = collapsed.length === 0 ? fallback : collapsed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

/** Normalises the optional hint attached to an error. */
export function normaliseErrorHint(hint?: string): string | undefined {
  if (hint === undefined) {
    return undefined;
  }
  const collapsed = hint.replace(/\s+/g, " ").trim();
  if (collapsed.length === 0) {
    return undefined;
  }
  if (collapsed.length <= ERROR_TEXT_MAX_LENGTH) {
    return collapsed;
  }
  return `${collapsed.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}
