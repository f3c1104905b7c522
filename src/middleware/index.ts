/**
 * Middleware Module
 *
 * Koa-style (ctx, next) chains wrapped around provider calls.
 *
 * Usage:
 *   providers.llm.use(loggingMiddleware(logger)).use(timeoutMiddleware(30_000));
 */

export type {
  NextFunction,
  ProviderCallContext,
  ProviderInvocation,
  ProviderKind,
  ProviderMiddleware,
  ProviderOptions,
} from "./types";

export { composeMiddleware } from "./composer";
export { loggingMiddleware, timeoutMiddleware } from "./builtins";
