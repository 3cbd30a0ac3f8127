import { Module } from "@nestjs/common";
import { FillCoordinatorService } from "./fill-coordinator.service";
import { UpstreamClientService } from "./upstream-client.service";

@Module({
  providers: [FillCoordinatorService, UpstreamClientService],
  exports: [FillCoordinatorService, UpstreamClientService],
})
export class FetchModule {}
