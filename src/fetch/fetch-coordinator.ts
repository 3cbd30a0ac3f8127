import { StandardService } from "@/common/base";
import type { CacheKey } from "@/common/types/cache";
import type { FetchHandle, InFlightFetch, InFlightFetchSummary } from "@/common/types/fetch";

/**
 * Keyed registry of pending fetches. The first caller for a key runs `fetchFn`;
 * callers arriving while it runs join it and settle with the same value or error.
 * The entry is removed as soon as the fetch settles, so the next caller starts a new one.
 */
export class FetchCoordinator<T> extends StandardService {
  private readonly inFlight = new Map<CacheKey, InFlightFetch<T>>();

  join(key: CacheKey, fetchFn: () => Promise<T>): FetchHandle<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      existing.waiters++;
      this.incrementCounter("joins");
      return { role: "waiter", result: existing.promise };
    }

    const promise: Promise<T> = Promise.resolve()
      .then(fetchFn)
      .then(
        value => {
          this.incrementCounter("fetches_succeeded");
          return value;
        },
        (error: unknown) => {
          this.incrementCounter("fetches_failed");
          throw error;
        }
      )
      .finally(() => {
        if (this.inFlight.get(key)?.promise === promise) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, { key, promise, waiters: 0, startedAt: Date.now() });
    this.incrementCounter("fetches_started");
    return { role: "leader", result: promise };
  }

  fetchOrJoin(key: CacheKey, fetchFn: () => Promise<T>): Promise<T> {
    return this.join(key, fetchFn).result;
  }

  isInFlight(key: CacheKey): boolean {
    return this.inFlight.has(key);
  }

  getInFlight(): InFlightFetchSummary[] {
    const now = Date.now();
    return [...this.inFlight.values()].map(({ key, waiters, startedAt }) => ({
      key,
      waiters,
      ageMs: now - startedAt,
    }));
  }
}
