/**
 * Search Router
 * Routes queries to registered search functions and checks their results
 */

import { ConfigurationError, ProviderResponseError } from "../errors";
import type { Awaitable } from "../engine/types";
import type { ProviderOptions } from "../middleware/types";
import type { SearchHit } from "../schema/types";
import { formatValidationErrors, parseSearchResults } from "../schema/validator";
import { ProviderRouter, type RouterOptions } from "./router";

export type SearchProvider = (
  query: string,
  numResults: number,
  options: ProviderOptions,
) => Awaitable<SearchHit[]>;

export interface SearchOptions extends ProviderOptions {
  /** Provider name; the default provider when omitted */
  provider?: string;
  /** Defaults to 5 */
  numResults?: number;
}

export const DEFAULT_NUM_RESULTS = 5;

export class SearchRouter extends ProviderRouter<SearchProvider> {
  constructor(options: RouterOptions = {}) {
    super("search", options);
  }

  async search(query: string, options: SearchOptions = {}): Promise<SearchHit[]> {
    if (typeof query !== "string") {
      throw new TypeError(`query must be a string, got ${typeof query}`);
    }
    const { provider: name, numResults = DEFAULT_NUM_RESULTS, ...rest } = options;
    if (!Number.isInteger(numResults) || numResults < 1) {
      throw new ConfigurationError(
        `numResults must be a positive integer, got ${String(numResults)}`,
      );
    }

    const { provider, fn } = this.registry.resolveProvider(name);
    const raw = await this.invoke(
      { kind: "search", provider, model: undefined, input: query, options: rest },
      async (ctx) => fn(ctx.input, numResults, ctx.options),
    );

    const parsed = parseSearchResults(raw);
    if ("errors" in parsed) {
      throw new ProviderResponseError(provider, formatValidationErrors(parsed.errors));
    }
    return parsed.results;
  }
}
