import { Inject, Injectable } from "@nestjs/common";
import { StandardService } from "@/common/base";
import type { CacheSweepReport } from "@/common/types/cache";
import { asError } from "@/common/utils/error.utils";
import { PROXY_CONFIG, type ProxyConfig } from "@/config/proxy-config";
import { DiskCacheStoreService } from "./disk-cache-store.service";

/**
 * Periodically removes expired entries from the disk cache
 */
@Injectable()
export class CacheSweeperService extends StandardService {
  private sweeping = false;

  constructor(
    private readonly store: DiskCacheStoreService,
    @Inject(PROXY_CONFIG) private readonly proxyConfig: ProxyConfig
  ) {
    super({ useEnhancedLogging: true });
  }

  override async initialize(): Promise<void> {
    const interval = this.proxyConfig.sweepIntervalMs;
    if (interval === 0) {
      this.logger.log("Cache expiry sweep disabled");
      return;
    }

    this.createInterval(() => {
      this.runSweep().catch(error => this.handleError(asError(error), "sweep", { shouldThrow: false }));
    }, interval);
    this.logger.log(`Cache expiry sweep every ${interval}ms`);
  }

  /**
   * Resolves undefined when a sweep is already running
   */
  async runSweep(): Promise<CacheSweepReport | undefined> {
    if (this.sweeping) {
      return undefined;
    }
    this.sweeping = true;

    const operationId = `sweep_${Date.now()}`;
    this.startPerformanceTimer(operationId, "cache_sweep");
    try {
      const report = await this.store.sweep();
      this.endPerformanceTimer(operationId, true, { removedEntries: report.removedEntries });
      this.incrementCounter("sweeps");

      if (report.removedEntries > 0) {
        this.logCriticalOperation("cache_sweep", {
          ...report,
          counters: this.store.getCounters(),
          sweepTimings: this.enhancedLogger?.getPerformanceStatistics(),
          sweepFailures: this.enhancedLogger?.getErrorStatistics().totalErrors,
        });
      } else {
        this.logDebug(`Sweep found nothing stale among ${report.scannedEntries} entries`);
      }
      return report;
    } catch (error) {
      this.endPerformanceTimer(operationId, false);
      throw error;
    } finally {
      this.sweeping = false;
    }
  }
}
