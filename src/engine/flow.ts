/**
 * Flow Orchestration
 *
 * A Flow walks a graph of nodes: run the current node, look its action up
 * in the node's successors, continue or stop. A Flow is itself a node, so
 * flows nest as steps of other flows.
 */

import { ConfigurationError } from "../errors";
import type { Logger } from "../logging/logger";
import { BaseNode, toAction, toBatchItems } from "./nodes";
import type { SharedStore } from "./shared";
import { routeLabel, type Action, type Params, type PostResult } from "./types";

/**
 * Pick the successor for `action`, warning when the traversal dead-ends on
 * a node that does have outgoing edges.
 */
export function nextInGraph<S>(
  current: BaseNode<S>,
  action: Action | undefined,
  logger: Logger,
): BaseNode<S> | undefined {
  const next = current.getNextNode(action);
  if (!next && current.successors.size > 0) {
    const defined = Array.from(current.successors.keys()).join(", ");
    logger.warn(`Flow ends: '${routeLabel(action)}' not found in [${defined}]`);
  }
  return next;
}

export class Flow<S = SharedStore, A extends Action = Action> extends BaseNode<S, A> {
  protected startNode: BaseNode<S> | undefined;

  constructor(start?: BaseNode<S>, logger?: Logger) {
    super(logger);
    this.startNode = start;
  }

  /**
   * Set the node the traversal begins at
   */
  start<T extends BaseNode<S>>(node: T): T {
    this.startNode = node;
    return node;
  }

  prep(_shared: S): unknown {
    return undefined;
  }

  /**
   * Receives the traversal's terminal action as `execRes` and returns it
   */
  post(_shared: S, _prepRes: unknown, execRes: unknown): PostResult {
    return toAction(execRes);
  }

  runLifecycle(shared: S): Action | undefined {
    const prepRes = this.prep(shared);
    const terminal = this.orchestrate(shared);
    return toAction(this.post(shared, prepRes, terminal));
  }

  /**
   * Walk the graph from the start node and return the last action
   */
  protected orchestrate(shared: S, params?: Params): Action | undefined {
    const runParams = params ?? { ...this.params };
    let current = this.requireStart().clone();
    let lastAction: Action | undefined;

    for (;;) {
      current.setParams(runParams);
      lastAction = current.runLifecycle(shared);
      this.logger.debug(`${current.constructor.name} -> ${routeLabel(lastAction)}`);
      const next = nextInGraph(current, lastAction, this.logger);
      if (!next) return lastAction;
      current = next.clone();
    }
  }

  protected requireStart(): BaseNode<S> {
    if (!this.startNode) {
      throw new ConfigurationError(`${this.nodeName} has no start node`);
    }
    return this.startNode;
  }
}

// ============================================================================
// BatchFlow - run the whole graph once per parameter set
// ============================================================================

export class BatchFlow<S = SharedStore, A extends Action = Action> extends Flow<S, A> {
  runLifecycle(shared: S): Action | undefined {
    const prepRes = this.prep(shared);
    for (const batchParams of toParamSets(prepRes, this.nodeName)) {
      this.orchestrate(shared, { ...this.params, ...batchParams });
    }
    return toAction(this.post(shared, prepRes, undefined));
  }
}

/**
 * Parameter sets a batch flow's prep produced
 */
export function toParamSets(prepRes: unknown, node: string): Params[] {
  return toBatchItems(prepRes, node).map((item, index) => {
    if (typeof item !== "object" || item === null || Array.isArray(item)) {
      throw new ConfigurationError(
        `${node}: parameter set ${index} must be an object`,
      );
    }
    return Object.fromEntries(Object.entries(item));
  });
}
