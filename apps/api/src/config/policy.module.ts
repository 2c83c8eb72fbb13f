import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { loadSosPolicy, SOS_POLICY } from "./sos-policy.config";

@Module({
  providers: [
    {
      provide: SOS_POLICY,
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => loadSosPolicy(cfg.get<string>("SOS_POLICY_PATH"))
    }
  ],
  exports: [SOS_POLICY]
})
export class PolicyModule {}
