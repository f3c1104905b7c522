/**
 * Built-in Middleware
 *
 *   - loggingMiddleware - logs each provider call and its duration
 *   - timeoutMiddleware - fails a call that outlives its deadline
 */

import { ProviderTimeoutError, describeError } from "../errors";
import type { Logger } from "../logging/logger";
import type { ProviderCallContext, ProviderMiddleware } from "./types";

function target(ctx: ProviderCallContext): string {
  return ctx.model === undefined ? ctx.provider : `${ctx.provider}/${ctx.model}`;
}

/**
 * Log wall-clock duration of every provider call
 */
export function loggingMiddleware(logger: Logger): ProviderMiddleware {
  return async (ctx, next) => {
    const start = Date.now();
    logger.debug(`${ctx.kind} ${target(ctx)}: calling`);
    try {
      const result = await next();
      logger.info(`${ctx.kind} ${target(ctx)} took ${Date.now() - start}ms`);
      return result;
    } catch (e) {
      logger.warn(
        `${ctx.kind} ${target(ctx)} failed after ${Date.now() - start}ms: ${describeError(e)}`,
      );
      throw e;
    }
  };
}

/**
 * Reject with ProviderTimeoutError when the call takes longer than `ms`.
 * The provider call itself is not cancelled.
 */
export function timeoutMiddleware(ms: number): ProviderMiddleware {
  return async (ctx, next) => {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ProviderTimeoutError(ctx.provider, ms)), ms);
    });

    try {
      return await Promise.race([next(), deadline]);
    } finally {
      if (timeoutId !== undefined) clearTimeout(timeoutId);
    }
  };
}
