/**
 * Middleware Composer
 *
 * Composes an ordered list of middleware functions into a single
 * invocation wrapping the provider call.
 *
 * Usage:
 *   const composed = composeMiddleware(middlewares, invokeProvider);
 *   const result = await composed(ctx);
 */

import type {
  NextFunction,
  ProviderCallContext,
  ProviderInvocation,
  ProviderMiddleware,
} from "./types";

/**
 * Execution order for [mw1, mw2, mw3]:
 *   mw1 → mw2 → mw3 → target
 *
 * Each middleware calls `next()` to proceed; if it doesn't, the chain
 * short-circuits and its return value is used.
 */
export function composeMiddleware(
  middlewares: ProviderMiddleware[],
  target: ProviderInvocation,
): ProviderInvocation {
  if (middlewares.length === 0) {
    return target;
  }

  return (ctx: ProviderCallContext): Promise<unknown> => {
    let index = -1;

    const dispatch = (i: number): Promise<unknown> => {
      if (i <= index) {
        return Promise.reject(new Error("next() called multiple times"));
      }
      index = i;

      if (i < middlewares.length) {
        const next: NextFunction = () => dispatch(i + 1);
        return middlewares[i](ctx, next);
      }

      // End of the chain; middleware may have rewritten ctx
      return target(ctx);
    };

    return dispatch(0);
  };
}
