/**
 * LLMNode Tests
 */

import { describe, it, expect, vi } from "vitest";
import { LLMNode } from "../llmNode";
import { AsyncFlow } from "../../engine/async";
import type { SharedStore } from "../../engine/shared";
import { ExecutionFailure } from "../../errors";
import { silentLogger } from "../../logging/logger";
import { LlmRouter, type LlmProvider } from "../../providers/llm";
import { createEchoLlm } from "../../testing/harness";

function createRouter(): LlmRouter {
  return new LlmRouter({ logger: silentLogger })
    .register("echo", createEchoLlm("echo"))
    .register("alt", createEchoLlm("alt"));
}

describe("LLMNode", () => {
  it("should use the documented defaults", () => {
    const node = new LLMNode(createRouter());
    expect(node.inputKey).toBe("input");
    expect(node.outputKey).toBe("output");
    expect(node.promptTemplate).toBe("{input}");
    expect(node.model).toBeUndefined();
    expect(node.maxRetries).toBe(3);
    expect(node.wait).toBe(1);
  });

  it("should take retry defaults from its router unless given", () => {
    const router = new LlmRouter({ logger: silentLogger, retry: { maxRetries: 5, wait: 0 } });
    const inherited = new LLMNode(router);
    const own = new LLMNode(router, { maxRetries: 2, wait: 0.25 });

    expect([inherited.maxRetries, inherited.wait]).toEqual([5, 0]);
    expect([own.maxRetries, own.wait]).toEqual([2, 0.25]);
  });

  it("should send the input and store the response", async () => {
    const shared: SharedStore = { input: "hello" };
    await new LLMNode(createRouter(), { logger: silentLogger }).runAsync(shared);
    expect(shared.output).toBe("[echo:default] hello");
  });

  it("should fill every placeholder from the store", async () => {
    const node = new LLMNode(createRouter(), {
      inputKey: "document",
      outputKey: "summary",
      promptTemplate: "Summarize {document} for {audience}",
      model: "alt/brief",
      logger: silentLogger,
    });
    const shared: SharedStore = { document: "the minutes", audience: "managers" };

    await node.runAsync(shared);

    expect(shared.summary).toBe("[alt:brief] Summarize the minutes for managers");
  });

  it("should gather template keys and the input key in prep", () => {
    const node = new LLMNode(createRouter(), {
      inputKey: "question",
      promptTemplate: "Context: {context}",
    });
    expect(node.prep({ question: "why?" })).toEqual({ context: "", question: "why?" });
  });

  it("should alias a custom input key to {input}", async () => {
    const node = new LLMNode(createRouter(), { inputKey: "question", logger: silentLogger });
    expect(node.prep({ question: "why?" })).toEqual({ input: "why?", question: "why?" });

    const shared: SharedStore = { question: "why?", input: "ignored" };
    await node.runAsync(shared);
    expect(shared.output).toBe("[echo:default] why?");
  });

  it("should render missing keys as empty strings", async () => {
    const shared: SharedStore = {};
    await new LLMNode(createRouter(), {
      promptTemplate: "Q: {input} A:",
      logger: silentLogger,
    }).runAsync(shared);
    expect(shared.output).toBe("[echo:default] Q:  A:");
  });

  it("should forward llmOptions to the provider", async () => {
    const provider = vi.fn<Parameters<LlmProvider>, string>(() => "ok");
    const router = new LlmRouter({ logger: silentLogger }).register("spy", provider);

    await new LLMNode(router, {
      model: "tiny",
      llmOptions: { temperature: 0 },
      logger: silentLogger,
    }).runAsync({ input: "x" });

    expect(provider).toHaveBeenCalledWith("x", "tiny", { temperature: 0 });
  });

  it("should retry failed provider calls", async () => {
    let calls = 0;
    const router = new LlmRouter({ logger: silentLogger }).register("flaky", (prompt) => {
      calls++;
      if (calls < 3) throw new Error("rate limited");
      return `answer to ${prompt}`;
    });

    const shared: SharedStore = { input: "q" };
    await new LLMNode(router, { wait: 0, logger: silentLogger }).runAsync(shared);

    expect(calls).toBe(3);
    expect(shared.output).toBe("answer to q");
  });

  it("should fail with ExecutionFailure once retries are exhausted", async () => {
    const router = new LlmRouter({ logger: silentLogger }).register("down", () => {
      throw new Error("service unavailable");
    });
    const shared: SharedStore = { input: "q" };

    await expect(
      new LLMNode(router, { maxRetries: 2, wait: 0, logger: silentLogger }).runAsync(shared),
    ).rejects.toThrow("LLMNode failed after 2 attempt(s): service unavailable");
    expect(shared.output).toBeUndefined();
  });

  it("should use a fallback answer when given one", async () => {
    const router = new LlmRouter({ logger: silentLogger }).register("down", () => {
      throw new Error("service unavailable");
    });
    const shared: SharedStore = { input: "q" };

    await new LLMNode(router, {
      maxRetries: 1,
      fallback: () => "I don't know",
      logger: silentLogger,
    }).runAsync(shared);

    expect(shared.output).toBe("I don't know");
  });

  it("should chain inside an AsyncFlow", async () => {
    const router = createRouter();
    const draft = new LLMNode(router, { outputKey: "draft", logger: silentLogger });
    const review = new LLMNode(router, {
      inputKey: "draft",
      outputKey: "review",
      promptTemplate: "Review: {draft}",
      logger: silentLogger,
    });
    draft.next(review);

    const shared: SharedStore = { input: "idea" };
    await new AsyncFlow(draft, silentLogger).runAsync(shared);

    expect(shared.review).toBe("[echo:default] Review: [echo:default] idea");
  });

  it("should surface lookup errors as execution failures", async () => {
    const node = new LLMNode(createRouter(), {
      model: "ghost/model",
      maxRetries: 1,
      logger: silentLogger,
    });
    await expect(node.runAsync({ input: "x" })).rejects.toBeInstanceOf(ExecutionFailure);
  });
});
