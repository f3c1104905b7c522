/**
 * SearchNode
 * Runs a web search for the query held in the shared store
 */

import { AsyncNode } from "../engine/async";
import { readKey, type SharedStore } from "../engine/shared";
import type { NodeOptions } from "../engine/types";
import type { ProviderOptions } from "../middleware/types";
import { DEFAULT_NUM_RESULTS, type SearchRouter } from "../providers/search";
import type { SearchHit } from "../schema/types";

export interface SearchNodeOptions extends NodeOptions {
  /** Default "query" */
  inputKey?: string;
  /** Default "search_results" */
  outputKey?: string;
  /** Search provider name; the router's default when omitted */
  provider?: string;
  /** Default 5 */
  numResults?: number;
  /** Store a readable string instead of the result list */
  formatResults?: boolean;
  /** Defaults to the router's retry settings (3 unless configured) */
  maxRetries?: number;
  /** Seconds between attempts; defaults to the router's (1 unless configured) */
  wait?: number;
  searchOptions?: ProviderOptions;
}

/**
 * Render results as a numbered, human-readable list
 */
export function formatSearchResults(results: SearchHit[]): string {
  if (results.length === 0) {
    return "No results found.";
  }
  return results
    .map((r, i) => {
      const title = r.title ?? "No title";
      const snippet = r.snippet ?? "No description";
      const url = r.url ?? "";
      return `${i + 1}. ${title}\n   ${snippet}\n   URL: ${url}`;
    })
    .join("\n\n");
}

export class SearchNode extends AsyncNode {
  readonly inputKey: string;
  readonly outputKey: string;
  readonly provider: string | undefined;
  readonly numResults: number;
  readonly formatResults: boolean;
  private readonly searchOptions: ProviderOptions;

  constructor(
    private readonly searcher: SearchRouter,
    options: SearchNodeOptions = {},
  ) {
    super(
      options.maxRetries ?? searcher.retry.maxRetries,
      options.wait ?? searcher.retry.wait,
      options,
    );
    this.inputKey = options.inputKey ?? "query";
    this.outputKey = options.outputKey ?? "search_results";
    this.provider = options.provider;
    this.numResults = options.numResults ?? DEFAULT_NUM_RESULTS;
    this.formatResults = options.formatResults ?? false;
    this.searchOptions = options.searchOptions ?? {};
  }

  prep(shared: SharedStore): unknown {
    return readKey(shared, this.inputKey, "");
  }

  async exec(query: unknown): Promise<SearchHit[] | string> {
    if (!query) {
      return this.formatResults ? "" : [];
    }
    const results = await this.searcher.search(String(query), {
      ...this.searchOptions,
      provider: this.provider,
      numResults: this.numResults,
    });
    return this.formatResults ? formatSearchResults(results) : results;
  }

  post(shared: SharedStore, _prepRes: unknown, execRes: unknown): undefined {
    shared[this.outputKey] = execRes;
    return undefined;
  }
}
