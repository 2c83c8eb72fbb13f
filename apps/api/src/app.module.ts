import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { ThrottlerGuard, ThrottlerModule } from "@nestjs/throttler";
import { envSchema } from "./config/env.validation";

import { DatabaseModule } from "./modules/database/database.module";
import { SosModule } from "./modules/sos/sos.module";
import { AdminModule } from "./modules/admin/admin.module";
import { HealthModule } from "./modules/health/health.module";

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: (c) => envSchema.parse(c) }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService) => ({
        throttlers: [{
          ttl: (cfg.get<number>("RATE_LIMIT_TTL_SEC") ?? 60) * 1000,
          limit: cfg.get<number>("RATE_LIMIT_REQ_PER_TTL") ?? 20
        }]
      })
    }),
    DatabaseModule,
    SosModule,
    AdminModule,
    HealthModule
  ],
  providers: [{ provide: APP_GUARD, useClass: ThrottlerGuard }]
})
export class AppModule {}
