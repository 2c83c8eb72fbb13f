import { Module } from "@nestjs/common";
import { AdminController } from "./admin.controller";
import { SosModule } from "../sos/sos.module";

@Module({
  imports: [SosModule],
  controllers: [AdminController]
})
export class AdminModule {}
