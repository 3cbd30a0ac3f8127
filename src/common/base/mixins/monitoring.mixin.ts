import type { MixinBase } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

/**
 * Counters a service exposes about itself
 */
export interface MonitoringCapabilities {
  incrementCounter(name: string, increment?: number): void;
  getCounters(): Record<string, number>;
  resetCounters(): void;
}

/**
 * Mixin that adds named counters to a service
 */
export function WithMonitoring<TBase extends MixinBase<LoggingCapabilities>>(Base: TBase) {
  abstract class MonitoringMixin extends Base implements MonitoringCapabilities {
    public serviceCounters = new Map<string, number>();

    // eslint-disable-next-line @typescript-eslint/no-explicit-any
    constructor(...args: any[]) {
      super(...args);
    }

    incrementCounter(name: string, increment = 1): void {
      const current = this.serviceCounters.get(name) ?? 0;
      this.serviceCounters.set(name, current + increment);
    }

    getCounters(): Record<string, number> {
      return Object.fromEntries(this.serviceCounters);
    }

    resetCounters(): void {
      this.serviceCounters.clear();
    }
  }

  return MonitoringMixin;
}
