import { Module } from "@nestjs/common";
import { DiskCacheStoreService } from "./disk-cache-store.service";
import { CacheSweeperService } from "./cache-sweeper.service";

@Module({
  providers: [DiskCacheStoreService, CacheSweeperService],
  exports: [DiskCacheStoreService],
})
export class CacheModule {}
