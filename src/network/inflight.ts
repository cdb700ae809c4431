import { clearTimeout, setTimeout } from "node:timers";

const WAIT_EXPIRED = Symbol("wait-expired");

export interface InflightResult<T> {
  readonly value: T;
  /** True when the value came from another caller's computation. */
  readonly shared: boolean;
}

export interface InflightStats {
  leaders: number;
  followers: number;
  waitsExpired: number;
  pending: number;
}

/**
 * Best-effort single-flight. The first caller for a key computes; later
 * callers wait for it at most {@link run}'s `waitMs` and then compute on
 * their own. A failing leader never fails its followers: they fall back to
 * independent computation as well. Correctness never depends on this
 * registry, it only saves duplicate work.
 */
export class InflightRegistry<T> {
  private readonly pending = new Map<string, Promise<T>>();
  private leaders = 0;
  private followers = 0;
  private waitsExpired = 0;

  async run(key: string, waitMs: number, compute: () => Promise<T>): Promise<InflightResult<T>> {
    const existing = this.pending.get(key);
    if (existing && waitMs > 0) {
      const shared = await waitAtMost(existing, waitMs);
      if (shared !== WAIT_EXPIRED) {
        this.followers += 1;
        return { value: shared, shared: true };
      }
      this.waitsExpired += 1;
    }

    this.leaders += 1;
    const promise = compute();
    if (!this.pending.has(key)) {
      this.pending.set(key, promise);
    }
    try {
      return { value: await promise, shared: false };
    } finally {
      if (this.pending.get(key) === promise) {
        this.pending.delete(key);
      }
    }
  }

  stats(): InflightStats {
    return {
      leaders: this.leaders,
      followers: this.followers,
      waitsExpired: this.waitsExpired,
      pending: this.pending.size,
    };
  }
}

/** Resolves with the value of {@link promise}, or {@link WAIT_EXPIRED} on timeout or rejection. */
async function waitAtMost<T>(promise: Promise<T>, waitMs: number): Promise<T | typeof WAIT_EXPIRED> {
  let timer: NodeJS.Timeout | undefined;
  const expiry = new Promise<typeof WAIT_EXPIRED>((resolve) => {
    timer = setTimeout(() => resolve(WAIT_EXPIRED), waitMs);
  });
  try {
    return await Promise.race([promise.catch((): typeof WAIT_EXPIRED => WAIT_EXPIRED), expiry]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}
