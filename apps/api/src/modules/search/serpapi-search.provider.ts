import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { z } from "zod";
import { SOS_POLICY, SosPolicy } from "../../config/sos-policy.config";
import { SearchHit, SearchProvider } from "./search-provider";

const SERPAPI_ENDPOINT = "https://serpapi.com/search.json";

const serpApiResponseSchema = z.object({
  error: z.string().optional(),
  organic_results: z
    .array(
      z.object({
        title: z.string().optional(),
        snippet: z.string().optional(),
        link: z.string().optional(),
      })
    )
    .optional(),
});

@Injectable()
export class SerpApiSearchProvider implements SearchProvider {
  private readonly logger = new Logger(SerpApiSearchProvider.name);
  private readonly apiKey: string | undefined;

  constructor(
    private readonly configService: ConfigService,
    @Inject(SOS_POLICY) private readonly policy: SosPolicy
  ) {
    this.apiKey = this.configService.get<string>("SERPAPI_API_KEY");
    if (!this.apiKey) {
      this.logger.warn("SERPAPI_API_KEY not configured - live contact lookups will fall back to cache/defaults");
    }
  }

  async search(query: string, signal?: AbortSignal): Promise<SearchHit[]> {
    if (!this.apiKey) {
      throw new Error("SERPAPI_API_KEY not configured");
    }

    const params = new URLSearchParams({
      engine: "google",
      q: query,
      api_key: this.apiKey,
      num: String(this.policy.maxResultsPerQuery),
      hl: "en",
    });

    const response = await fetch(`${SERPAPI_ENDPOINT}?${params.toString()}`, { signal });
    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`SerpApi error: ${response.status} - ${errorText.substring(0, 200)}`);
    }

    const body = serpApiResponseSchema.parse(await response.json());
    if (body.error) {
      // SerpApi reports "no results" as an error string; that is an empty result, not a failure
      if (/hasn't returned any results/i.test(body.error)) return [];
      throw new Error(`SerpApi error: ${body.error}`);
    }

    return (body.organic_results ?? []).map((r) => ({
      title: r.title ?? "",
      snippet: r.snippet ?? "",
      sourceUrl: r.link ?? "",
    }));
  }
}
