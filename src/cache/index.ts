import { logger } from "../logger";
import { Clock } from "../utils/time";

type Entry<T> = {
  value: T;
  expiresAt: number;
};

export type CacheLookup<T> = {
  value: T;
  origin: 'cached' | 'computed';
};

/**
 * In-memory memoization cache with time-based expiry.
 *
 * Entries are never evicted by size; an entry is dropped the first time it is
 * read after `expiresAt`, or by `sweep()`. Concurrent `getOrCompute` calls for
 * the same key share a single in-flight computation.
 */
export class MemoCache<T> {
  private readonly entries = new Map<string, Entry<T>>();
  private readonly inFlight = new Map<string, Promise<T>>();

  constructor(private readonly now: Clock = Date.now) {}

  get(key: string): T | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }

    return entry.value;
  }

  set(key: string, value: T, ttlMs: number): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  async getOrCompute(
    key: string,
    ttlMs: number,
    compute: () => Promise<T>
  ): Promise<T> {
    const { value } = await this.lookup(key, ttlMs, compute);
    return value;
  }

  /**
   * Like `getOrCompute`, but also tells where the value came from. A caller
   * that joins a pending computation gets `computed`: its value is as fresh
   * as the one the first caller receives.
   */
  async lookup(
    key: string,
    ttlMs: number,
    compute: () => Promise<T>
  ): Promise<CacheLookup<T>> {
    const cached = this.get(key);
    if (cached !== null) {
      logger.debug({ key }, 'Cache hit');
      return { value: cached, origin: 'cached' };
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      logger.debug({ key }, 'Joining in-flight computation');
      return { value: await pending, origin: 'computed' };
    }

    logger.debug({ key }, 'Cache miss');

    const promise = compute()
      .then((value) => {
        this.set(key, value, ttlMs);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, promise);
    return { value: await promise, origin: 'computed' };
  }

  // Drops every expired entry, returns how many were removed.
  sweep(): number {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed++;
      }
    }

    return removed;
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
  }
}

export function forecastCacheKey(
  latitude: number,
  longitude: number,
  units: string
): string {
  return `forecast:${latitude}:${longitude}:${units}`;
}
