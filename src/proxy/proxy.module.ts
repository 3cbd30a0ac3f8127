import { Module } from "@nestjs/common";
import { CacheModule } from "@/cache/cache.module";
import { FetchModule } from "@/fetch/fetch.module";
import { RoutingModule } from "@/routing/routing.module";
import { ProxyController } from "./proxy.controller";
import { ProxyService } from "./proxy.service";

@Module({
  imports: [CacheModule, FetchModule, RoutingModule],
  controllers: [ProxyController],
  providers: [ProxyService],
  exports: [ProxyService],
})
export class ProxyModule {}
