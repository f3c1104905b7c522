/**
 * Error Taxonomy
 *
 * Every error the engine raises on its own extends FlowError and carries a
 * stable `code`. Errors thrown by user code inside prep/post pass through
 * untouched; only exec failures are wrapped (in ExecutionFailure).
 */

export type FlowErrorCode =
  | "CONFIGURATION"
  | "PROVIDER_LOOKUP"
  | "PROVIDER_RESPONSE"
  | "PROVIDER_TIMEOUT"
  | "EXECUTION_FAILURE";

export class FlowError extends Error {
  readonly code: FlowErrorCode;

  constructor(code: FlowErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Invalid retry settings, malformed provider names, bad configuration,
 * or running a node in the wrong execution mode.
 */
export class ConfigurationError extends FlowError {
  constructor(message: string, options?: ErrorOptions) {
    super("CONFIGURATION", message, options);
  }
}

/**
 * Requested provider is not registered, or no default is available.
 */
export class ProviderLookupError extends FlowError {
  readonly provider: string | undefined;
  readonly available: string[];

  constructor(message: string, provider: string | undefined, available: string[]) {
    super("PROVIDER_LOOKUP", message);
    this.provider = provider;
    this.available = available;
  }
}

export class ProviderResponseError extends FlowError {
  readonly provider: string;

  constructor(provider: string, message: string) {
    super("PROVIDER_RESPONSE", `Provider "${provider}" returned an invalid response: ${message}`);
    this.provider = provider;
  }
}

export class ProviderTimeoutError extends FlowError {
  readonly provider: string;
  readonly timeoutMs: number;

  constructor(provider: string, timeoutMs: number) {
    super("PROVIDER_TIMEOUT", `Provider "${provider}" timed out after ${timeoutMs}ms`);
    this.provider = provider;
    this.timeoutMs = timeoutMs;
  }
}

export interface ExecutionFailureDetails {
  /** Class name of the failing node */
  node: string;
  /** Number of exec attempts made */
  attempts: number;
  /** Position of the failing item when the node is a batch */
  itemIndex?: number;
}

/**
 * exec exhausted every attempt and no fallback recovered it.
 * The error from the final attempt is available as `cause`.
 */
export class ExecutionFailure extends FlowError {
  readonly node: string;
  readonly attempts: number;
  readonly itemIndex: number | undefined;

  constructor(details: ExecutionFailureDetails, cause: unknown) {
    const where =
      details.itemIndex === undefined ? "" : ` (batch item ${details.itemIndex})`;
    super(
      "EXECUTION_FAILURE",
      `${details.node}${where} failed after ${details.attempts} attempt(s): ${describeError(cause)}`,
      { cause },
    );
    this.node = details.node;
    this.attempts = details.attempts;
    this.itemIndex = details.itemIndex;
  }
}

export function isFlowError(error: unknown): error is FlowError {
  return error instanceof FlowError;
}

/**
 * Best-effort message extraction for anything that was thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
