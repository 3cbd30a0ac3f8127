/**
 * Config Module Exports
 */

export { ConfigModule } from "./config.module";
export { ConfigValidationService } from "./config-validation.service";
export { PROXY_CONFIG, CLOCK, systemClock, type ProxyConfig, type Clock } from "./proxy-config";
export { ENV, ENV_HELPERS } from "./environment.constants";
