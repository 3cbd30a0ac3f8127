import { Global, Module } from "@nestjs/common";
import { ConfigValidationService } from "./config-validation.service";
import { CLOCK, PROXY_CONFIG, systemClock } from "./proxy-config";

/**
 * Loads the proxy configuration once at startup and shares it with every module
 */
@Global()
@Module({
  providers: [
    ConfigValidationService,
    {
      provide: PROXY_CONFIG,
      useFactory: (configValidationService: ConfigValidationService) => configValidationService.loadAndValidate(),
      inject: [ConfigValidationService],
    },
    {
      provide: CLOCK,
      useValue: systemClock,
    },
  ],
  exports: [ConfigValidationService, PROXY_CONFIG, CLOCK],
})
export class ConfigModule {}
