import type { CacheEntry, ResourceKind } from "@/common/types/cache";
import type { ProxyConfig } from "@/config/proxy-config";

/**
 * An entry is fresh while `now - storedAt` is strictly below the duration for its kind.
 */
export class FreshnessPolicy {
  constructor(private readonly durationsMs: Readonly<Record<ResourceKind, number>>) {}

  static fromConfig(config: ProxyConfig): FreshnessPolicy {
    return new FreshnessPolicy({
      file: config.fileFreshnessMs,
      index: config.indexFreshnessMs,
    });
  }

  durationFor(kind: ResourceKind): number {
    return this.durationsMs[kind];
  }

  isFresh(entry: Pick<CacheEntry, "kind" | "storedAt">, now: number): boolean {
    return now - entry.storedAt < this.durationFor(entry.kind);
  }

  expiresAt(entry: Pick<CacheEntry, "kind" | "storedAt">): number {
    return entry.storedAt + this.durationFor(entry.kind);
  }
}
