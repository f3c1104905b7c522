/**
 * Configuration
 *
 * Engine-wide defaults read from the environment:
 *
 *   NODELOOM_LOG_LEVEL          debug | info | warn | error | silent
 *   NODELOOM_MAX_RETRIES        attempts for provider-backed nodes
 *   NODELOOM_RETRY_WAIT         seconds between attempts
 *   NODELOOM_LLM_PROVIDER       default LLM provider
 *   NODELOOM_SEARCH_PROVIDER    default search provider
 *   NODELOOM_EMBEDDING_PROVIDER default embedding provider
 */

import { ConfigurationError } from "../errors";
import { createLogger, type Logger } from "../logging/logger";
import { formatValidationErrors, parseConfig } from "../schema/validator";
import type { EngineConfig, ProviderDefaults } from "../schema/types";

export type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG: EngineConfig = {
  logLevel: "warn",
  retry: { maxRetries: 3, wait: 1 },
  providers: {},
};

const ENV_KEYS = {
  logLevel: "NODELOOM_LOG_LEVEL",
  maxRetries: "NODELOOM_MAX_RETRIES",
  wait: "NODELOOM_RETRY_WAIT",
  llm: "NODELOOM_LLM_PROVIDER",
  search: "NODELOOM_SEARCH_PROVIDER",
  embedding: "NODELOOM_EMBEDDING_PROVIDER",
} as const;

function readEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Build and validate configuration from environment variables.
 * Unset variables keep their defaults; overrides win over both.
 */
export function loadConfig(
  env: Env = process.env,
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  const providers: ProviderDefaults = { ...DEFAULT_CONFIG.providers };
  for (const kind of ["llm", "search", "embedding"] as const) {
    const name = readEnv(env, ENV_KEYS[kind]);
    if (name !== undefined) providers[kind] = name;
  }

  const raw = {
    logLevel: readEnv(env, ENV_KEYS.logLevel) ?? DEFAULT_CONFIG.logLevel,
    retry: {
      maxRetries: readEnv(env, ENV_KEYS.maxRetries) ?? DEFAULT_CONFIG.retry.maxRetries,
      wait: readEnv(env, ENV_KEYS.wait) ?? DEFAULT_CONFIG.retry.wait,
    },
    providers,
    ...overrides,
  };

  const parsed = parseConfig(raw);
  if ("errors" in parsed) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatValidationErrors(parsed.errors)}`,
    );
  }
  return parsed.config;
}

/**
 * Root logger at the configured level
 */
export function createConfiguredLogger(config: EngineConfig, scope = "nodeloom"): Logger {
  return createLogger({ scope, level: config.logLevel });
}
