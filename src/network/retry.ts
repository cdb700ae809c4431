import { setTimeout as delay } from "node:timers/promises";

import type { StructuredLogger } from "../logger.js";
import type { Deadline } from "./deadline.js";
import { TransientStoreError } from "./errors.js";

export interface StoreRetryOptions {
  /** Total attempts including the first one. */
  readonly attempts: number;
  /** Base backoff; attempt `n` waits `baseDelayMs * 2^(n-1)` plus jitter. */
  readonly baseDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly logger?: StructuredLogger;
  /** Overrides used by tests to avoid real sleeps and randomness. */
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
}

const DEFAULT_BASE_DELAY_MS = 25;
const DEFAULT_MAX_DELAY_MS = 500;

/** Backoff for the given (1-based) failed attempt, with up to 50% jitter. */
export function computeBackoff(attempt: number, baseDelayMs: number, maxDelayMs: number, random: () => number): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1));
  const jitter = Math.floor(random() * exponential * 0.5);
  return Math.min(maxDelayMs, exponential + jitter);
}

/**
 * Runs a store read, retrying {@link TransientStoreError} failures with a
 * bounded number of attempts and jittered exponential backoff. Any other
 * error, timeouts included, propagates on first occurrence. A retry is only
 * scheduled when the backoff fits in the remaining deadline.
 */
export async function withStoreRetry<T>(
  stage: string,
  deadline: Deadline,
  read: () => Promise<T>,
  options: StoreRetryOptions,
): Promise<T> {
  const attempts = Math.max(1, Math.floor(options.attempts));
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const sleep = options.sleep ?? ((ms: number) => delay(ms).then(() => undefined));
  const random = options.random ?? Math.random;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await deadline.run(stage, read);
    } catch (error) {
      if (!(error instanceof TransientStoreError) || attempt >= attempts) {
        throw error;
      }
      const backoffMs = computeBackoff(attempt, baseDelayMs, maxDelayMs, random);
      if (backoffMs >= deadline.remainingMs()) {
        throw error;
      }
      options.logger?.warn("network_store_retry", {
        stage,
        attempt,
        backoff_ms: backoffMs,
        reason: error.message,
      });
      await sleep(backoffMs);
    }
  }
}
