/**
 * Async Node & Flow Types
 *
 * Cooperative counterparts of the sync primitives. Phases may return
 * promises; the retry wait suspends instead of blocking.
 * - AsyncNode → single step with retry
 * - AsyncBatchNode → items one after another
 * - AsyncParallelBatchNode → all items at once, results in input order
 * - AsyncFlow → traversal awaiting each node (sync nodes allowed)
 * - AsyncBatchFlow / AsyncParallelBatchFlow → graph per parameter set
 */

import { ConfigurationError } from "../errors";
import type { Logger } from "../logging/logger";
import { nextInGraph, toParamSets } from "./flow";
import {
  BaseNode,
  RetryingNode,
  exhaustedError,
  toAction,
  toBatchItems,
} from "./nodes";
import { withRetry } from "./retry";
import type { SharedStore } from "./shared";
import {
  routeLabel,
  type Action,
  type Awaitable,
  type Params,
  type PostResult,
} from "./types";

function requireAsyncRun(node: string): ConfigurationError {
  return new ConfigurationError(`${node} is async; use runAsync() or an AsyncFlow`);
}

// ============================================================================
// AsyncNode
// ============================================================================

export class AsyncNode<S = SharedStore, A extends Action = Action> extends RetryingNode<S, A> {
  prep(_shared: S): Awaitable<unknown> {
    return undefined;
  }

  exec(_prepRes: unknown): Awaitable<unknown> {
    return undefined;
  }

  post(_shared: S, _prepRes: unknown, _execRes: unknown): Awaitable<PostResult<A>> {
    return undefined;
  }

  /**
   * Called after the final failed attempt. Rethrowing `error` fails the
   * node; returning a value continues as if exec had produced it.
   */
  execFallback(prepRes: unknown, error: unknown): Awaitable<unknown> {
    if (this.fallback) return this.fallback(prepRes, error);
    throw error;
  }

  /**
   * Run this node on its own. Successors are not followed; use an AsyncFlow.
   */
  async runAsync(shared: S): Promise<Action | undefined> {
    this.warnIfSuccessors();
    return this.runLifecycleAsync(shared);
  }

  runLifecycle(_shared: S): Action | undefined {
    throw requireAsyncRun(this.nodeName);
  }

  async runLifecycleAsync(shared: S): Promise<Action | undefined> {
    const prepRes = await this.prep(shared);
    const execRes = await this.runExec(prepRes);
    return toAction(await this.post(shared, prepRes, execRes));
  }

  protected runExec(prepRes: unknown): Promise<unknown> {
    return this.execWithRetry(prepRes);
  }

  protected trackRetry(retry: number): void {
    this.currentRetry = retry;
  }

  protected execWithRetry(input: unknown, itemIndex?: number): Promise<unknown> {
    return withRetry(
      (retry) => {
        this.trackRetry(retry);
        return this.exec(input);
      },
      this.retryPolicy,
      {
        onRetry: (context) => this.reportRetry(context, itemIndex),
        onExhausted: async (error, attempts) => {
          try {
            return await this.execFallback(input, error);
          } catch (thrown) {
            throw exhaustedError(thrown, error, this.nodeName, attempts, itemIndex);
          }
        },
      },
    );
  }
}

// ============================================================================
// AsyncBatchNode - sequential
// ============================================================================

export class AsyncBatchNode<S = SharedStore, A extends Action = Action> extends AsyncNode<S, A> {
  protected async runExec(prepRes: unknown): Promise<unknown[]> {
    const results: unknown[] = [];
    const items = toBatchItems(prepRes, this.nodeName);
    for (let index = 0; index < items.length; index++) {
      results.push(await this.execWithRetry(items[index], index));
    }
    return results;
  }
}

// ============================================================================
// AsyncParallelBatchNode - concurrent, unbounded fan-out
// ============================================================================

export class AsyncParallelBatchNode<
  S = SharedStore,
  A extends Action = Action,
> extends AsyncNode<S, A> {
  // Items retry concurrently, so there is no single attempt to report
  protected trackRetry(_retry: number): void {}

  protected runExec(prepRes: unknown): Promise<unknown[]> {
    const items = toBatchItems(prepRes, this.nodeName);
    // Promise.all keeps input order whatever order items settle in
    return Promise.all(items.map((item, index) => this.execWithRetry(item, index)));
  }
}

// ============================================================================
// AsyncFlow
// ============================================================================

export class AsyncFlow<S = SharedStore, A extends Action = Action> extends BaseNode<S, A> {
  protected startNode: BaseNode<S> | undefined;

  constructor(start?: BaseNode<S>, logger?: Logger) {
    super(logger);
    this.startNode = start;
  }

  start<T extends BaseNode<S>>(node: T): T {
    this.startNode = node;
    return node;
  }

  prep(_shared: S): Awaitable<unknown> {
    return undefined;
  }

  /**
   * Receives the traversal's terminal action as `execRes` and returns it
   */
  post(_shared: S, _prepRes: unknown, execRes: unknown): Awaitable<PostResult> {
    return toAction(execRes);
  }

  async runAsync(shared: S): Promise<Action | undefined> {
    this.warnIfSuccessors();
    return this.runLifecycleAsync(shared);
  }

  runLifecycle(_shared: S): Action | undefined {
    throw requireAsyncRun(this.nodeName);
  }

  async runLifecycleAsync(shared: S): Promise<Action | undefined> {
    const prepRes = await this.prep(shared);
    const terminal = await this.orchestrate(shared);
    return toAction(await this.post(shared, prepRes, terminal));
  }

  protected async orchestrate(shared: S, params?: Params): Promise<Action | undefined> {
    if (!this.startNode) {
      throw new ConfigurationError(`${this.nodeName} has no start node`);
    }
    const runParams = params ?? { ...this.params };
    let current = this.startNode.clone();
    let lastAction: Action | undefined;

    for (;;) {
      current.setParams(runParams);
      lastAction = await current.runLifecycleAsync(shared);
      this.logger.debug(`${current.constructor.name} -> ${routeLabel(lastAction)}`);
      const next = nextInGraph(current, lastAction, this.logger);
      if (!next) return lastAction;
      current = next.clone();
    }
  }
}

// ============================================================================
// AsyncBatchFlow - parameter sets one after another
// ============================================================================

export class AsyncBatchFlow<S = SharedStore, A extends Action = Action> extends AsyncFlow<S, A> {
  async runLifecycleAsync(shared: S): Promise<Action | undefined> {
    const prepRes = await this.prep(shared);
    for (const batchParams of toParamSets(prepRes, this.nodeName)) {
      await this.orchestrate(shared, { ...this.params, ...batchParams });
    }
    return toAction(await this.post(shared, prepRes, undefined));
  }
}

// ============================================================================
// AsyncParallelBatchFlow - parameter sets concurrently
// ============================================================================

/**
 * Runs one traversal per parameter set at the same time. All of them share
 * the store: branches must write disjoint keys.
 */
export class AsyncParallelBatchFlow<
  S = SharedStore,
  A extends Action = Action,
> extends AsyncFlow<S, A> {
  async runLifecycleAsync(shared: S): Promise<Action | undefined> {
    const prepRes = await this.prep(shared);
    await Promise.all(
      toParamSets(prepRes, this.nodeName).map((batchParams) =>
        this.orchestrate(shared, { ...this.params, ...batchParams }),
      ),
    );
    return toAction(await this.post(shared, prepRes, undefined));
  }
}
