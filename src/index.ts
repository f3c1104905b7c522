/**
 * nodeloom - node/flow execution engine
 *
 * Three-phase nodes (prep → exec → post) wired into action-routed graphs,
 * with batch, async and parallel variants, plus provider routers for
 * LLM, search and embedding calls.
 */

// Engine
export * from "./engine";

// Errors
export * from "./errors";

// Logging
export * from "./logging";

// Configuration
export * from "./config";

// Schema
export * from "./schema";

// Providers
export * from "./registry";
export * from "./middleware";
export * from "./providers";

// Provider-backed nodes
export * from "./nodes";

// Testing Utilities
export * from "./testing";
