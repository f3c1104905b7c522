/**
 * Schema Types
 * Shapes validated at the edges of the engine: configuration and
 * provider responses.
 */

import type { LogLevel } from "../logging/logger";

// ============================================================================
// Configuration
// ============================================================================

export interface RetryDefaults {
  /** Attempts for nodes built from configuration */
  maxRetries: number;
  /** Seconds between attempts */
  wait: number;
}

export interface ProviderDefaults {
  /** Default LLM provider name */
  llm?: string;
  /** Default search provider name */
  search?: string;
  /** Default embedding provider name */
  embedding?: string;
}

export interface EngineConfig {
  logLevel: LogLevel;
  retry: RetryDefaults;
  providers: ProviderDefaults;
}

// ============================================================================
// Provider responses
// ============================================================================

export interface SearchResult {
  title: string;
  snippet: string;
  url: string;
}

/** A search result as a provider returned it; any field may be missing */
export type SearchHit = Partial<SearchResult>;

export type Embedding = number[];

// ============================================================================
// Validation Types
// ============================================================================

export interface ValidationError {
  path: string;
  message: string;
}
