/**
 * LLMNode
 *
 * Renders a prompt template from the shared store and sends it to an LLM.
 *
 * @example
 *   const summarize = new LLMNode(providers.llm, {
 *     inputKey: "document",
 *     outputKey: "summary",
 *     promptTemplate: "Summarize this in 3 sentences:\n\n{document}",
 *     model: "openai/gpt-4o",
 *   });
 */

import { AsyncNode } from "../engine/async";
import { readKey, type SharedStore } from "../engine/shared";
import type { NodeOptions } from "../engine/types";
import type { ProviderOptions } from "../middleware/types";
import type { LlmRouter } from "../providers/llm";
import { extractTemplateKeys, renderTemplate } from "./template";

export interface LLMNodeOptions extends NodeOptions {
  /** Primary input key, also available as `{input}` (default "input") */
  inputKey?: string;
  /** Key the response is written to (default "output") */
  outputKey?: string;
  /** Default "{input}" */
  promptTemplate?: string;
  /** `"provider/model"`, a bare model, or omitted for the default provider */
  model?: string;
  /** Defaults to the router's retry settings (3 unless configured) */
  maxRetries?: number;
  /** Seconds between attempts; defaults to the router's (1 unless configured) */
  wait?: number;
  /** Forwarded to the provider */
  llmOptions?: ProviderOptions;
}

export class LLMNode extends AsyncNode {
  readonly inputKey: string;
  readonly outputKey: string;
  readonly promptTemplate: string;
  readonly model: string | undefined;
  private readonly llmOptions: ProviderOptions;
  private readonly templateKeys: string[];

  constructor(
    private readonly llm: LlmRouter,
    options: LLMNodeOptions = {},
  ) {
    super(
      options.maxRetries ?? llm.retry.maxRetries,
      options.wait ?? llm.retry.wait,
      options,
    );
    this.inputKey = options.inputKey ?? "input";
    this.outputKey = options.outputKey ?? "output";
    this.promptTemplate = options.promptTemplate ?? "{input}";
    this.model = options.model;
    this.llmOptions = options.llmOptions ?? {};
    this.templateKeys = extractTemplateKeys(this.promptTemplate);
  }

  /**
   * Collect every template value, plus the input key, from the store
   */
  prep(shared: SharedStore): Record<string, unknown> {
    const context: Record<string, unknown> = {};
    for (const key of this.templateKeys) {
      context[key] = readKey(shared, key, "");
    }
    if (!(this.inputKey in context)) {
      context[this.inputKey] = readKey(shared, this.inputKey, "");
    }
    // Lets a custom inputKey feed the default "{input}" template
    if (this.templateKeys.includes("input") && this.inputKey !== "input") {
      context.input = readKey(shared, this.inputKey, "");
    }
    return context;
  }

  exec(context: Record<string, unknown>): Promise<string> {
    const prompt = renderTemplate(this.promptTemplate, context);
    return this.llm.call(prompt, this.model, this.llmOptions);
  }

  post(shared: SharedStore, _prepRes: unknown, execRes: unknown): undefined {
    shared[this.outputKey] = execRes;
    return undefined;
  }
}
