/**
 * Provider Registry
 * Name → callable mapping behind each provider router
 */

import { ConfigurationError, ProviderLookupError } from "../errors";
import { defaultLogger, type Logger } from "../logging/logger";

// ============================================================================
// Registry Types
// ============================================================================

/**
 * Any provider callable; routers narrow this to their own shape
 */
export type ProviderFunction = (...args: never[]) => unknown;

export interface RegistryOptions {
  /** Provider used when a specifier names no provider */
  defaultProvider?: string;
  logger?: Logger;
}

/**
 * Result of resolving a `"provider/model"` specifier
 */
export interface ResolvedProvider<F extends ProviderFunction> {
  provider: string;
  model: string | undefined;
  fn: F;
}

export const PROVIDER_SEPARATOR = "/";

/**
 * Check a provider name, returning the reason it is unusable (if any)
 */
export function checkProviderName(name: unknown): string | undefined {
  if (typeof name !== "string" || name.length === 0) {
    return "Provider name must be a non-empty string";
  }
  if (/\s/.test(name)) {
    return `Provider name "${name}" cannot contain whitespace`;
  }
  if (name.includes(PROVIDER_SEPARATOR)) {
    return `Provider name "${name}" cannot contain '${PROVIDER_SEPARATOR}' character`;
  }
  return undefined;
}

// ============================================================================
// Registry Implementation
// ============================================================================

export class ProviderRegistry<F extends ProviderFunction> {
  private providers = new Map<string, F>();
  private defaultName: string | undefined;
  private sealed = false;
  private logger: Logger;

  constructor(
    readonly kind: string,
    options: RegistryOptions = {},
  ) {
    this.logger = options.logger ?? defaultLogger;
    if (options.defaultProvider !== undefined) {
      const problem = checkProviderName(options.defaultProvider);
      if (problem) throw new ConfigurationError(problem);
      this.defaultName = options.defaultProvider;
    }
  }

  /**
   * Register a provider. The first one registered becomes the default
   * unless a default was configured.
   */
  register(name: string, fn: F): void {
    this.assertOpen("register");
    const problem = checkProviderName(name);
    if (problem) {
      throw new ConfigurationError(problem);
    }
    if (typeof fn !== "function") {
      throw new ConfigurationError(`Provider "${name}" must be a function`);
    }
    if (this.providers.has(name)) {
      this.logger.warn(`${this.kind} provider "${name}" is being overwritten`);
    }
    this.providers.set(name, fn);
    this.defaultName ??= name;
  }

  /**
   * Remove a provider; a removed default leaves no default behind
   */
  unregister(name: string): boolean {
    this.assertOpen("unregister");
    if (this.defaultName === name) {
      this.defaultName = undefined;
    }
    return this.providers.delete(name);
  }

  /**
   * Refuse further registration changes; lookups keep working
   */
  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  get(name: string): F | undefined {
    return this.providers.get(name);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  /**
   * Registered provider names, in registration order
   */
  names(): string[] {
    return Array.from(this.providers.keys());
  }

  get defaultProvider(): string | undefined {
    return this.defaultName;
  }

  setDefault(name: string): void {
    if (!this.providers.has(name)) {
      throw this.notRegistered(name);
    }
    this.defaultName = name;
  }

  /**
   * Resolve `"provider/model"`, or a bare model (or nothing) against the
   * default provider. Splits at the first separator only.
   */
  resolve(specifier?: string): ResolvedProvider<F> {
    if (specifier !== undefined && specifier.includes(PROVIDER_SEPARATOR)) {
      const at = specifier.indexOf(PROVIDER_SEPARATOR);
      const provider = specifier.slice(0, at);
      if (provider.length === 0) {
        throw new ConfigurationError(
          `Invalid model specifier "${specifier}": provider part is empty`,
        );
      }
      return { provider, model: specifier.slice(at + 1), fn: this.lookup(provider) };
    }
    const provider = this.requireDefault();
    return { provider, model: specifier || undefined, fn: this.lookup(provider) };
  }

  /**
   * Resolve a provider by exact name, or the default when none is given
   */
  resolveProvider(name?: string): { provider: string; fn: F } {
    const provider = name ?? this.requireDefault();
    return { provider, fn: this.lookup(provider) };
  }

  clear(): void {
    this.assertOpen("clear");
    this.providers.clear();
    this.defaultName = undefined;
  }

  get size(): number {
    return this.providers.size;
  }

  private lookup(provider: string): F {
    const fn = this.providers.get(provider);
    if (!fn) {
      throw this.notRegistered(provider);
    }
    return fn;
  }

  private requireDefault(): string {
    if (this.defaultName !== undefined) return this.defaultName;
    if (this.providers.size === 0) {
      throw new ProviderLookupError(
        `No ${this.kind} providers registered. Register a provider first using register()`,
        undefined,
        [],
      );
    }
    throw new ProviderLookupError(
      `No default ${this.kind} provider set and no provider specified`,
      undefined,
      this.names(),
    );
  }

  private notRegistered(provider: string): ProviderLookupError {
    const available = this.names();
    return new ProviderLookupError(
      `${this.kind} provider "${provider}" not registered. ` +
        `Available providers: [${available.join(", ")}]. ` +
        `Use register("${provider}", fn) to register it.`,
      provider,
      available,
    );
  }

  private assertOpen(operation: string): void {
    if (this.sealed) {
      throw new ConfigurationError(
        `Cannot ${operation} ${this.kind} providers: registry is sealed`,
      );
    }
  }
}
