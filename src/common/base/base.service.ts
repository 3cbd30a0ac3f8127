import { WithConfiguration } from "./mixins/configurable.mixin";
import { WithLogging } from "./mixins/logging.mixin";
import type { BaseServiceConfig, IBaseService } from "../types/services";

const defaultConfig: BaseServiceConfig = {
  useEnhancedLogging: false,
};

class SimpleBase {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  constructor(..._args: any[]) {}
}

const LoggingBase = WithLogging(SimpleBase);
const ConfigurableBase = WithConfiguration<BaseServiceConfig>(defaultConfig)(LoggingBase);

/**
 * Root of every service: a Nest logger named after the class, plus opt-in enhanced logging
 * (file output, error history, operation timers) switched on through `useEnhancedLogging`.
 */
export abstract class BaseService extends ConfigurableBase implements IBaseService {
  constructor(config?: Partial<BaseServiceConfig>) {
    super();
    if (config) this.updateConfig(config);
  }

  override onConfigUpdated(oldConfig: BaseServiceConfig, newConfig: BaseServiceConfig): void {
    if (oldConfig.useEnhancedLogging !== newConfig.useEnhancedLogging && newConfig.useEnhancedLogging !== undefined) {
      this.initializeEnhancedLogging(newConfig.useEnhancedLogging);
    }
  }
}
