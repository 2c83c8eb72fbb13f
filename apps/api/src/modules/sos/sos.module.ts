import { Module } from "@nestjs/common";
import { PolicyModule } from "../../config/policy.module";
import { LlmModule } from "../llm/llm.module";
import { SearchModule } from "../search/search.module";
import { ContactCacheService } from "./contact-cache.service";
import { ContactExtractorService } from "./contact-extractor.service";
import { ContactValidatorService } from "./contact-validator.service";
import { SosController } from "./sos.controller";
import { SosService } from "./sos.service";

@Module({
  imports: [PolicyModule, SearchModule, LlmModule],
  controllers: [SosController],
  providers: [SosService, ContactCacheService, ContactExtractorService, ContactValidatorService],
  exports: [SosService]
})
export class SosModule {}
