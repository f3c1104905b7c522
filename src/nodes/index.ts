/**
 * Provider-backed Nodes
 */

export { extractTemplateKeys, renderTemplate } from "./template";
export { LLMNode, type LLMNodeOptions } from "./llmNode";
export { SearchNode, formatSearchResults, type SearchNodeOptions } from "./searchNode";
export { EmbeddingNode, type EmbeddingNodeOptions } from "./embeddingNode";
