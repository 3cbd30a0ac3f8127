import type { MixinBase } from "../../types/services/mixins";
import type { LoggingCapabilities } from "./logging.mixin";

type ConfigChanges = Record<string, { old: unknown; new: unknown }>;

/**
 * Per-instance service options
 */
export interface ConfigurableCapabilities<TConfig extends Record<string, unknown>> {
  updateConfig(newConfig: Partial<TConfig>): void;
  onConfigUpdated?(oldConfig: TConfig, newConfig: TConfig): void;
}

/**
 * Mixin that adds per-instance service options on top of WithLogging.
 * `onConfigUpdated` runs after every update.
 */
export function WithConfiguration<TConfig extends Record<string, unknown>>(defaultConfig: TConfig) {
  return function <TBase extends MixinBase<LoggingCapabilities>>(Base: TBase) {
    abstract class ConfigurableMixin extends Base implements ConfigurableCapabilities<TConfig> {
      public config: TConfig = { ...defaultConfig };

      // eslint-disable-next-line @typescript-eslint/no-explicit-any
      constructor(...args: any[]) {
        super(...args);
      }

      updateConfig(newConfig: Partial<TConfig>): void {
        const oldConfig = this.config;
        this.config = { ...oldConfig, ...newConfig };
        this.onConfigUpdated?.(oldConfig, this.config);
        this.logger.debug("Configuration updated", {
          service: this.constructor.name,
          changes: diffConfig(oldConfig, this.config),
        });
      }

      onConfigUpdated?(_oldConfig: TConfig, _newConfig: TConfig): void;
    }

    return ConfigurableMixin;
  };
}

function diffConfig<TConfig extends Record<string, unknown>>(before: TConfig, after: TConfig): ConfigChanges {
  const changes: ConfigChanges = {};
  for (const key in after) {
    if (before[key] !== after[key]) {
      changes[key] = { old: before[key], new: after[key] };
    }
  }
  return changes;
}
