/**
 * Engine Type Definitions
 */

import type { Logger } from "../logging/logger";
import type { RetryContext } from "./retry";

/**
 * Label returned by post to pick the next node.
 * Flows may narrow it to a union of their own labels.
 */
export type Action = string;

export const DEFAULT_ACTION = "default";

/**
 * What post may hand back: a label, or nothing for the default edge
 */
export type PostResult<A extends Action = Action> = A | undefined | void;

/**
 * Per-run parameters a flow passes down to its nodes
 */
export type Params = Record<string, unknown>;

export type Awaitable<T> = T | Promise<T>;

/**
 * Recovery function invoked once every exec attempt has failed.
 * Its return value is treated as an ordinary exec result.
 */
export type FallbackFunction<PrepRes = unknown, ExecRes = unknown> = (
  prepRes: PrepRes,
  error: unknown,
) => ExecRes;

export interface NodeOptions<PrepRes = unknown, ExecRes = unknown> {
  fallback?: FallbackFunction<PrepRes, ExecRes>;
  logger?: Logger;
  /** Called before each wait between attempts */
  onRetry?: (context: RetryContext) => void;
}

/**
 * Normalize a post result into the label used for routing
 */
export function routeLabel(action: PostResult | null): Action {
  return action ? action : DEFAULT_ACTION;
}
