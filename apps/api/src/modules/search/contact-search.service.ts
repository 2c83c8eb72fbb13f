import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { renderQueryTemplate, SOS_POLICY, SosPolicy } from "../../config/sos-policy.config";
import { withTimeout } from "../../common/utils/with-timeout";
import { describeError, SearchFailedError } from "../sos/sos.errors";
import { RawSearchResults, SearchSnippet } from "../sos/sos.types";
import { SEARCH_PROVIDER, SearchHit, SearchProvider } from "./search-provider";

@Injectable()
export class ContactSearchService {
  private readonly logger = new Logger(ContactSearchService.name);
  readonly timeoutMs: number;

  constructor(
    @Inject(SEARCH_PROVIDER) private readonly provider: SearchProvider,
    @Inject(SOS_POLICY) private readonly policy: SosPolicy,
    private readonly configService: ConfigService
  ) {
    this.timeoutMs = this.configService.get<number>("SOS_SEARCH_TIMEOUT_MS") ?? 15000;
  }

  /**
   * The three configured queries for a country. Same country and year, same queries.
   */
  buildQueries(country: string, year: number): string[] {
    return this.policy.searchQueryTemplates.map((template) => renderQueryTemplate(template, country, year));
  }

  /**
   * Run all queries concurrently and merge their snippets.
   * Empty or failed queries are tolerated while at least one returns usable content.
   */
  async search(country: string, year: number = new Date().getFullYear()): Promise<RawSearchResults> {
    const queries = this.buildQueries(country, year);
    const controller = new AbortController();

    const settled = await withTimeout(
      Promise.allSettled(queries.map((query) => this.provider.search(query, controller.signal))),
      this.timeoutMs,
      () => {
        controller.abort();
        return new SearchFailedError(`Search for "${country}" timed out after ${this.timeoutMs}ms`);
      }
    );

    const perQuery: SearchSnippet[][] = settled.map((result, i) => {
      if (result.status === "rejected") {
        this.logger.warn(`Query failed "${queries[i]}": ${describeError(result.reason)}`);
        return [];
      }
      return result.value.filter(isUsable).map((hit) => toSnippet(hit, queries[i]));
    });

    const snippets = interleave(perQuery);
    if (snippets.length === 0) {
      throw new SearchFailedError(`No usable search results for "${country}" across ${queries.length} queries`);
    }

    this.logger.log(`Retrieved ${snippets.length} search results for ${country}`);
    return { country, queries, snippets };
  }
}

function isUsable(hit: SearchHit): boolean {
  return hit.sourceUrl.trim().length > 0 && (hit.snippet.trim().length > 0 || hit.title.trim().length > 0);
}

function toSnippet(hit: SearchHit, query: string): SearchSnippet {
  return {
    title: hit.title.trim(),
    snippet: hit.snippet.trim(),
    sourceUrl: hit.sourceUrl.trim(),
    query,
  };
}

/**
 * Round-robin merge so a cap on evidence size keeps snippets from every query.
 * A page returned twice with the same snippet is kept once; a different snippet from the same page is kept.
 */
function interleave(lists: SearchSnippet[][]): SearchSnippet[] {
  const merged: SearchSnippet[] = [];
  const seen = new Set<string>();
  const longest = Math.max(0, ...lists.map((l) => l.length));
  for (let i = 0; i < longest; i++) {
    for (const list of lists) {
      const item = list[i];
      if (!item) continue;
      const key = `${item.sourceUrl}\n${item.snippet}`;
      if (seen.has(key)) continue;
      seen.add(key);
      merged.push(item);
    }
  }
  return merged;
}
