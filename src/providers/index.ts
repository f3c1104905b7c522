/**
 * Providers Module
 *
 * One router per provider kind. Build them once at startup and pass them
 * to the nodes that need them:
 *
 *   const providers = createProviders(loadConfig());
 *   providers.llm.register("echo", (prompt) => prompt);
 *   providers.llm.registry.seal();
 */

import type { Logger } from "../logging/logger";
import type { ProviderMiddleware } from "../middleware/types";
import type { EngineConfig } from "../schema/types";
import { EmbeddingRouter } from "./embedding";
import { LlmRouter } from "./llm";
import { SearchRouter } from "./search";

export { ProviderRouter, type RouterOptions } from "./router";
export { LlmRouter, type LlmProvider } from "./llm";
export {
  DEFAULT_NUM_RESULTS,
  SearchRouter,
  type SearchOptions,
  type SearchProvider,
} from "./search";
export { EmbeddingRouter, type EmbeddingProvider } from "./embedding";

export interface Providers {
  llm: LlmRouter;
  search: SearchRouter;
  embedding: EmbeddingRouter;
}

export interface CreateProvidersOptions {
  logger?: Logger;
  /** Installed on all three routers, in order */
  middleware?: ProviderMiddleware[];
}

/**
 * Build the three routers with the configured default providers. The
 * configured retry settings become the defaults of every node built on
 * these routers.
 */
export function createProviders(
  config: Pick<EngineConfig, "providers"> & Partial<Pick<EngineConfig, "retry">>,
  options: CreateProvidersOptions = {},
): Providers {
  const { logger, middleware = [] } = options;
  const { retry } = config;
  const providers: Providers = {
    llm: new LlmRouter({ defaultProvider: config.providers.llm, logger, retry }),
    search: new SearchRouter({ defaultProvider: config.providers.search, logger, retry }),
    embedding: new EmbeddingRouter({
      defaultProvider: config.providers.embedding,
      logger,
      retry,
    }),
  };
  for (const mw of middleware) {
    providers.llm.use(mw);
    providers.search.use(mw);
    providers.embedding.use(mw);
  }
  return providers;
}
