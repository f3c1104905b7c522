/**
 * Middleware Types
 *
 * Provider middleware follows a Koa-style async (ctx, next) pattern.
 * Each middleware receives the call context and a `next` function that
 * delegates to the next middleware (or the provider itself).
 *
 * Middleware can:
 * - Rewrite the input or options before the provider sees them
 * - Short-circuit by returning a value without calling next()
 * - Transform results by modifying what next() returns
 * - Log, time, or bound the call
 */

export type ProviderKind = "llm" | "search" | "embedding";

/**
 * Extra arguments forwarded verbatim to a provider function
 */
export type ProviderOptions = Record<string, unknown>;

export interface ProviderCallContext {
  kind: ProviderKind;
  /** Resolved provider name */
  provider: string;
  /** Model part of the specifier; undefined for search */
  model: string | undefined;
  /** Prompt, query or text (mutable) */
  input: string;
  /** Options passed through to the provider (mutable) */
  options: ProviderOptions;
}

/**
 * Next function - calls the next middleware or the provider
 */
export type NextFunction = () => Promise<unknown>;

export type ProviderMiddleware = (
  ctx: ProviderCallContext,
  next: NextFunction,
) => Promise<unknown>;

/**
 * The innermost call a middleware chain wraps
 */
export type ProviderInvocation = (ctx: ProviderCallContext) => Promise<unknown>;
