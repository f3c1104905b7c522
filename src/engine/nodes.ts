/**
 * Node Types
 *
 * The prep → exec → post lifecycle shared by every unit of work:
 * - BaseNode → successors table, params, cloning
 * - Node → single step with retry/fallback around exec
 * - BatchNode → exec once per item, strictly in order
 *
 * Async counterparts live in ./async, flows in ./flow.
 */

import { ConfigurationError, ExecutionFailure, describeError } from "../errors";
import { defaultLogger, type Logger } from "../logging/logger";
import {
  createRetryPolicy,
  withRetrySync,
  type RetryContext,
  type RetryPolicy,
} from "./retry";
import type { SharedStore } from "./shared";
import {
  DEFAULT_ACTION,
  routeLabel,
  type Action,
  type FallbackFunction,
  type NodeOptions,
  type Params,
  type PostResult,
} from "./types";

// ============================================================================
// BaseNode
// ============================================================================

export abstract class BaseNode<S = SharedStore, A extends Action = Action> {
  params: Params = {};
  readonly successors = new Map<Action, BaseNode<S>>();
  protected logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? defaultLogger;
  }

  setParams(params: Params): void {
    this.params = { ...params };
  }

  withLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  /**
   * Connect `node` as the successor for `action` (default edge when omitted).
   * Returns `node` so edges can be chained.
   */
  next<T extends BaseNode<S>>(node: T, action: A | typeof DEFAULT_ACTION = DEFAULT_ACTION): T {
    if (this.successors.has(action)) {
      this.logger.warn(`Overwriting successor for action '${action}'`);
    }
    this.successors.set(action, node);
    return node;
  }

  /**
   * Connect `node` as the successor for a labelled action
   */
  on<T extends BaseNode<S>>(action: A, node: T): T {
    return this.next(node, action);
  }

  /**
   * Successor registered for an action; absent actions route as "default"
   */
  getNextNode(action: Action | undefined): BaseNode<S> | undefined {
    return this.successors.get(routeLabel(action));
  }

  /**
   * Shallow copy sharing the successors table; flows run clones so that
   * params and retry state stay local to one traversal.
   */
  clone(): this {
    const copy: this = Object.create(Object.getPrototypeOf(this));
    return Object.assign(copy, this);
  }

  /**
   * Run this node on its own. Successors are not followed; use a Flow.
   */
  run(shared: S): Action | undefined {
    this.warnIfSuccessors();
    return this.runLifecycle(shared);
  }

  /** @internal full lifecycle, used by flows */
  abstract runLifecycle(shared: S): Action | undefined;

  /** @internal lifecycle as awaited by async flows */
  async runLifecycleAsync(shared: S): Promise<Action | undefined> {
    return this.runLifecycle(shared);
  }

  protected warnIfSuccessors(): void {
    if (this.successors.size > 0) {
      this.logger.warn(`${this.constructor.name} won't run successors. Use a Flow.`);
    }
  }

  protected get nodeName(): string {
    return this.constructor.name;
  }
}

/**
 * Validate what post handed back
 */
export function toAction(result: unknown): Action | undefined {
  if (result === undefined || result === null) return undefined;
  if (typeof result !== "string") {
    throw new ConfigurationError(
      `post must return an action label string, got ${typeof result}`,
    );
  }
  return result;
}

/**
 * Map an error escaping execFallback: the untouched last error becomes an
 * ExecutionFailure, anything the fallback raised itself passes through.
 */
export function exhaustedError(
  thrown: unknown,
  lastError: unknown,
  node: string,
  attempts: number,
  itemIndex?: number,
): unknown {
  return thrown === lastError
    ? new ExecutionFailure({ node, attempts, itemIndex }, lastError)
    : thrown;
}

/**
 * Items a batch prep produced; nothing yields an empty batch
 */
export function toBatchItems(prepRes: unknown, node: string): unknown[] {
  if (prepRes === undefined || prepRes === null) return [];
  if (!Array.isArray(prepRes)) {
    throw new ConfigurationError(
      `${node}: prep must return an array, got ${typeof prepRes}`,
    );
  }
  return prepRes;
}

// ============================================================================
// RetryingNode - retry configuration shared by sync and async nodes
// ============================================================================

export abstract class RetryingNode<S = SharedStore, A extends Action = Action> extends BaseNode<S, A> {
  /**
   * Retry attempt in progress (0-indexed). Stays 0 in
   * AsyncParallelBatchNode, whose items retry independently.
   */
  currentRetry = 0;
  protected readonly retryPolicy: RetryPolicy;
  protected readonly fallback: FallbackFunction | undefined;
  protected readonly onRetry: ((context: RetryContext) => void) | undefined;

  constructor(maxRetries = 1, wait = 0, options: NodeOptions = {}) {
    super(options.logger);
    this.retryPolicy = createRetryPolicy(maxRetries, wait);
    this.fallback = options.fallback;
    this.onRetry = options.onRetry;
  }

  get maxRetries(): number {
    return this.retryPolicy.maxRetries;
  }

  get wait(): number {
    return this.retryPolicy.wait;
  }

  protected reportRetry(context: RetryContext, itemIndex?: number): void {
    const item = itemIndex === undefined ? "" : ` item ${itemIndex}`;
    this.logger.warn(
      `${this.nodeName}${item} attempt ${context.attempt}/${context.maxRetries} failed: ${describeError(context.error)}; retrying in ${context.wait}s`,
    );
    this.onRetry?.(context);
  }
}

// ============================================================================
// Node - single step with retry
// ============================================================================

export class Node<S = SharedStore, A extends Action = Action> extends RetryingNode<S, A> {
  prep(_shared: S): unknown {
    return undefined;
  }

  exec(_prepRes: unknown): unknown {
    return undefined;
  }

  post(_shared: S, _prepRes: unknown, _execRes: unknown): PostResult<A> {
    return undefined;
  }

  /**
   * Called after the final failed attempt. Rethrowing `error` fails the
   * node; returning a value continues as if exec had produced it.
   */
  execFallback(prepRes: unknown, error: unknown): unknown {
    if (this.fallback) return this.fallback(prepRes, error);
    throw error;
  }

  runLifecycle(shared: S): Action | undefined {
    const prepRes = this.prep(shared);
    const execRes = this.runExec(prepRes);
    return toAction(this.post(shared, prepRes, execRes));
  }

  /** exec phase as a whole; batch nodes fan it out per item */
  protected runExec(prepRes: unknown): unknown {
    return this.execWithRetry(prepRes);
  }

  protected execWithRetry(input: unknown, itemIndex?: number): unknown {
    return withRetrySync(
      (retry) => {
        this.currentRetry = retry;
        return this.exec(input);
      },
      this.retryPolicy,
      {
        onRetry: (context) => this.reportRetry(context, itemIndex),
        onExhausted: (error, attempts) => {
          try {
            return this.execFallback(input, error);
          } catch (thrown) {
            throw exhaustedError(thrown, error, this.nodeName, attempts, itemIndex);
          }
        },
      },
    );
  }
}

// ============================================================================
// BatchNode - sequential processing of prep's items
// ============================================================================

export class BatchNode<S = SharedStore, A extends Action = Action> extends Node<S, A> {
  protected runExec(prepRes: unknown): unknown[] {
    return toBatchItems(prepRes, this.nodeName).map((item, index) =>
      this.execWithRetry(item, index),
    );
  }
}
