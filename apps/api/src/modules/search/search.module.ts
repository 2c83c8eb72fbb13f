import { Module } from "@nestjs/common";
import { PolicyModule } from "../../config/policy.module";
import { ContactSearchService } from "./contact-search.service";
import { SEARCH_PROVIDER } from "./search-provider";
import { SerpApiSearchProvider } from "./serpapi-search.provider";

@Module({
  imports: [PolicyModule],
  providers: [ContactSearchService, { provide: SEARCH_PROVIDER, useClass: SerpApiSearchProvider }],
  exports: [ContactSearchService]
})
export class SearchModule {}
