/**
 * EmbeddingNode
 * Embeds the text held in the shared store
 */

import { AsyncNode } from "../engine/async";
import { readKey, type SharedStore } from "../engine/shared";
import type { NodeOptions } from "../engine/types";
import type { ProviderOptions } from "../middleware/types";
import type { EmbeddingRouter } from "../providers/embedding";
import type { Embedding } from "../schema/types";

export interface EmbeddingNodeOptions extends NodeOptions {
  /** Default "text" */
  inputKey?: string;
  /** Default "embedding" */
  outputKey?: string;
  model?: string;
  /** Defaults to the router's retry settings (3 unless configured) */
  maxRetries?: number;
  /** Seconds between attempts; defaults to the router's (1 unless configured) */
  wait?: number;
  embeddingOptions?: ProviderOptions;
}

export class EmbeddingNode extends AsyncNode {
  readonly inputKey: string;
  readonly outputKey: string;
  readonly model: string | undefined;
  private readonly embeddingOptions: ProviderOptions;

  constructor(
    private readonly embedder: EmbeddingRouter,
    options: EmbeddingNodeOptions = {},
  ) {
    super(
      options.maxRetries ?? embedder.retry.maxRetries,
      options.wait ?? embedder.retry.wait,
      options,
    );
    this.inputKey = options.inputKey ?? "text";
    this.outputKey = options.outputKey ?? "embedding";
    this.model = options.model;
    this.embeddingOptions = options.embeddingOptions ?? {};
  }

  prep(shared: SharedStore): unknown {
    return readKey(shared, this.inputKey, "");
  }

  async exec(text: unknown): Promise<Embedding> {
    if (!text) return [];
    return this.embedder.embed(String(text), this.model, this.embeddingOptions);
  }

  post(shared: SharedStore, _prepRes: unknown, execRes: unknown): undefined {
    shared[this.outputKey] = execRes;
    return undefined;
  }
}
