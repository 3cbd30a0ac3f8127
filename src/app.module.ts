import { Module } from "@nestjs/common";
import { APP_FILTER } from "@nestjs/core";

// Core modules
import { ConfigModule } from "@/config";
import { CacheModule } from "@/cache/cache.module";
import { FetchModule } from "@/fetch/fetch.module";
import { RoutingModule } from "@/routing/routing.module";
import { ProxyModule } from "@/proxy/proxy.module";

import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";

@Module({
  imports: [ConfigModule, CacheModule, FetchModule, RoutingModule, ProxyModule],
  providers: [
    // Global filter; applies to test apps built from AppModule as well
    { provide: APP_FILTER, useClass: HttpExceptionFilter },
  ],
})
export class AppModule {}
