import { clearTimeout, setTimeout } from "node:timers";

import { TimeoutError } from "./errors.js";

/** Function returning the current epoch milliseconds, injectable for tests. */
export type Clock = () => number;

const systemClock: Clock = () => Date.now();

/**
 * Absolute point in time after which a call must stop. Deadlines are passed
 * down from the query entry point to every store and cache call so no step
 * can suspend indefinitely.
 */
export class Deadline {
  private constructor(
    /** Epoch milliseconds at which the deadline expires; `null` means unbounded. */
    public readonly expiresAt: number | null,
    private readonly budgetMs: number | null,
    private readonly clock: Clock,
  ) {}

  /** Deadline expiring {@link ms} milliseconds from now. */
  static after(ms: number, clock: Clock = systemClock): Deadline {
    const budget = Number.isFinite(ms) ? Math.max(0, Math.floor(ms)) : 0;
    return new Deadline(clock() + budget, budget, clock);
  }

  /** Deadline that never expires. Only meant for tests and offline tooling. */
  static none(clock: Clock = systemClock): Deadline {
    return new Deadline(null, null, clock);
  }

  remainingMs(): number {
    if (this.expiresAt === null) {
      return Number.POSITIVE_INFINITY;
    }
    return Math.max(0, this.expiresAt - this.clock());
  }

  expired(): boolean {
    return this.expiresAt !== null && this.clock() >= this.expiresAt;
  }

  throwIfExpired(stage: string): void {
    if (this.expired()) {
      throw new TimeoutError(stage, this.budgetMs);
    }
  }

  /**
   * Races {@link work} against the deadline. The timer is always cleared so
   * no handle outlives the call; a late result from {@link work} is ignored.
   */
  async run<T>(stage: string, work: () => Promise<T>): Promise<T> {
    this.throwIfExpired(stage);
    const remaining = this.remainingMs();
    if (!Number.isFinite(remaining)) {
      return work();
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new TimeoutError(stage, this.budgetMs)), remaining);
    });
    try {
      return await Promise.race([work(), timeout]);
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
    }
  }
}
