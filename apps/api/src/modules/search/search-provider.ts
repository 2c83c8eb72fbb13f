export interface SearchHit {
  title: string;
  snippet: string;
  sourceUrl: string;
}

/**
 * Black-box text search: one query in, a list of snippets with their source URLs out.
 * Implementations throw on transport or provider errors and honour the abort signal.
 */
export interface SearchProvider {
  search(query: string, signal?: AbortSignal): Promise<SearchHit[]>;
}

export const SEARCH_PROVIDER = Symbol("SEARCH_PROVIDER");
