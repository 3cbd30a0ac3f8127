import type { LoggingCapabilities } from "../../base/mixins/logging.mixin";
import type { ConfigurableCapabilities } from "../../base/mixins/configurable.mixin";

/**
 * Base configuration interface that all services extend
 */
export interface BaseServiceConfig extends Record<string, unknown> {
  useEnhancedLogging?: boolean;
}

/**
 * Minimal public surface of every service
 */
export interface IBaseService extends LoggingCapabilities, ConfigurableCapabilities<BaseServiceConfig> {}
