/**
 * Embedding Router
 */

import { ProviderResponseError } from "../errors";
import type { Awaitable } from "../engine/types";
import type { ProviderOptions } from "../middleware/types";
import type { Embedding } from "../schema/types";
import { formatValidationErrors, parseEmbedding } from "../schema/validator";
import { ProviderRouter, type RouterOptions } from "./router";

export type EmbeddingProvider = (
  text: string,
  model: string | undefined,
  options: ProviderOptions,
) => Awaitable<Embedding>;

export class EmbeddingRouter extends ProviderRouter<EmbeddingProvider> {
  constructor(options: RouterOptions = {}) {
    super("embedding", options);
  }

  async embed(text: string, model?: string, options: ProviderOptions = {}): Promise<Embedding> {
    if (typeof text !== "string") {
      throw new TypeError(`text must be a string, got ${typeof text}`);
    }
    const resolved = this.registry.resolve(model);
    const raw = await this.invoke(
      {
        kind: "embedding",
        provider: resolved.provider,
        model: resolved.model,
        input: text,
        options: { ...options },
      },
      async (ctx) => resolved.fn(ctx.input, ctx.model, ctx.options),
    );

    const parsed = parseEmbedding(raw);
    if ("errors" in parsed) {
      throw new ProviderResponseError(resolved.provider, formatValidationErrors(parsed.errors));
    }
    return parsed.embedding;
  }
}
