/**
 * Provider Router
 *
 * Base for the LLM, search and embedding routers: a registry of provider
 * callables plus the middleware chain every call passes through. Also
 * carries the retry defaults for nodes built on top of it.
 */

import { DEFAULT_CONFIG } from "../config/config";
import { composeMiddleware } from "../middleware/composer";
import type {
  ProviderCallContext,
  ProviderInvocation,
  ProviderKind,
  ProviderMiddleware,
} from "../middleware/types";
import { ProviderRegistry, type ProviderFunction, type RegistryOptions } from "../registry/registry";
import type { RetryDefaults } from "../schema/types";

export interface RouterOptions extends RegistryOptions {
  /** maxRetries and wait for nodes that leave them unset */
  retry?: RetryDefaults;
}

export abstract class ProviderRouter<F extends ProviderFunction> {
  readonly registry: ProviderRegistry<F>;
  readonly retry: RetryDefaults;
  private readonly middlewares: ProviderMiddleware[] = [];

  constructor(
    readonly kind: ProviderKind,
    options: RouterOptions = {},
  ) {
    const { retry = DEFAULT_CONFIG.retry, ...registryOptions } = options;
    this.registry = new ProviderRegistry<F>(kind, registryOptions);
    this.retry = { ...retry };
  }

  register(name: string, fn: F): this {
    this.registry.register(name, fn);
    return this;
  }

  /**
   * Append middleware; it wraps every later call in registration order
   */
  use(middleware: ProviderMiddleware): this {
    this.middlewares.push(middleware);
    return this;
  }

  protected invoke(ctx: ProviderCallContext, target: ProviderInvocation): Promise<unknown> {
    return composeMiddleware(this.middlewares, target)(ctx);
  }
}
