import { Module } from "@nestjs/common";
import { RedirectPolicyService } from "./redirect-policy.service";

@Module({
  providers: [RedirectPolicyService],
  exports: [RedirectPolicyService],
})
export class RoutingModule {}
