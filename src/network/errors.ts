import { ERROR_CODES, normaliseErrorHint, normaliseErrorMessage } from "../types.js";

/** Narrow union describing the network engine error codes. */
export type NetworkErrorCode =
  | typeof ERROR_CODES.NET_NOT_FOUND
  | typeof ERROR_CODES.NET_UNKNOWN_ENTITY
  | typeof ERROR_CODES.NET_INVALID_DEPTH
  | typeof ERROR_CODES.NET_CONFLICT
  | typeof ERROR_CODES.NET_TIMEOUT
  | typeof ERROR_CODES.NET_STORE_UNAVAILABLE
  | typeof ERROR_CODES.NET_INVALID_INPUT;

/** JSON form of a {@link NetworkError}, as surfaced to MCP clients. */
export interface NetworkErrorPayload {
  code: NetworkErrorCode;
  message: string;
  hint?: string;
  details?: Record<string, unknown>;
}

/**
 * Base class of every error raised by the engine. The code is stable, the
 * message and hint are normalised so payloads stay short.
 */
export class NetworkError extends Error {
  public readonly code: NetworkErrorCode;
  public readonly hint?: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: NetworkErrorCode, message: string, hint?: string, details?: Record<string, unknown>) {
    super(normaliseErrorMessage(message));
    this.name = "NetworkError";
    this.code = code;
    this.hint = normaliseErrorHint(hint);
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): NetworkErrorPayload {
    return {
      code: this.code,
      message: this.message,
      ...(this.hint !== undefined ? { hint: this.hint } : {}),
      ...(this.details !== undefined ? { details: this.details } : {}),
    };
  }
}

/** A record referenced by a store call does not exist. */
export class NotFoundError extends NetworkError {
  constructor(kind: "business" | "relationship", id: string) {
    super(ERROR_CODES.NET_NOT_FOUND, `${kind} '${id}' not found`, undefined, { kind, id });
    this.name = "NotFoundError";
  }
}

/** A query references a business that is absent from the store. */
export class UnknownEntityError extends NetworkError {
  constructor(id: string, role: "source" | "target") {
    super(ERROR_CODES.NET_UNKNOWN_ENTITY, `unknown ${role} business '${id}'`, "check the business identifier", {
      id,
      role,
    });
    this.name = "UnknownEntityError";
  }
}

/** The requested depth falls outside `[1, ceiling]`. */
export class InvalidDepthError extends NetworkError {
  constructor(requested: unknown, ceiling: number) {
    super(
      ERROR_CODES.NET_INVALID_DEPTH,
      `max depth must be an integer between 1 and ${ceiling} (received ${String(requested)})`,
      undefined,
      { requested, ceiling },
    );
    this.name = "InvalidDepthError";
  }
}

/** An upsert would create a second active record for the same pair and type. */
export class ConflictError extends NetworkError {
  constructor(edgeId: string) {
    super(
      ERROR_CODES.NET_CONFLICT,
      `relationship '${edgeId}' already exists`,
      "pass overwrite=true to replace the existing record",
      { edgeId },
    );
    this.name = "ConflictError";
  }
}

/** The deadline attached to a call expired before it completed. */
export class TimeoutError extends NetworkError {
  constructor(stage: string, budgetMs: number | null) {
    super(
      ERROR_CODES.NET_TIMEOUT,
      `deadline exceeded during ${stage}`,
      "retry with backoff or a larger deadline",
      { stage, budgetMs },
    );
    this.name = "TimeoutError";
  }
}

/**
 * Transient failure of the backing store. Reads failing with this error are
 * retried by {@link withStoreRetry}; every other error propagates as is.
 */
export class TransientStoreError extends NetworkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ERROR_CODES.NET_STORE_UNAVAILABLE, message, "the store may be temporarily unavailable", details);
    this.name = "TransientStoreError";
  }
}

/** The request payload failed validation. */
export class InvalidRequestError extends NetworkError {
  constructor(message: string, issues?: unknown) {
    super(ERROR_CODES.NET_INVALID_INPUT, message, undefined, issues === undefined ? undefined : { issues });
    this.name = "InvalidRequestError";
  }
}

export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}
