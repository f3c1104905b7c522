/**
 * LLM Router
 * Routes `"provider/model"` specifiers to registered completion functions
 */

import { ProviderResponseError } from "../errors";
import type { Awaitable } from "../engine/types";
import type { ProviderOptions } from "../middleware/types";
import { ProviderRouter, type RouterOptions } from "./router";

export type LlmProvider = (
  prompt: string,
  model: string | undefined,
  options: ProviderOptions,
) => Awaitable<string>;

export class LlmRouter extends ProviderRouter<LlmProvider> {
  constructor(options: RouterOptions = {}) {
    super("llm", options);
  }

  /**
   * Call an LLM. `model` may be `"provider/model"`, a bare model for the
   * default provider, or omitted entirely.
   */
  async call(prompt: string, model?: string, options: ProviderOptions = {}): Promise<string> {
    if (typeof prompt !== "string") {
      throw new TypeError(`prompt must be a string, got ${typeof prompt}`);
    }
    const resolved = this.registry.resolve(model);
    const result = await this.invoke(
      {
        kind: "llm",
        provider: resolved.provider,
        model: resolved.model,
        input: prompt,
        options: { ...options },
      },
      async (ctx) => resolved.fn(ctx.input, ctx.model, ctx.options),
    );
    if (typeof result !== "string") {
      throw new ProviderResponseError(resolved.provider, `expected a string, got ${typeof result}`);
    }
    return result;
  }
}
