/**
 * Async Node & Flow Tests
 */

import { describe, it, expect } from "vitest";
import {
  AsyncBatchFlow,
  AsyncBatchNode,
  AsyncFlow,
  AsyncNode,
  AsyncParallelBatchFlow,
  AsyncParallelBatchNode,
} from "../async";
import { Flow } from "../flow";
import { Node } from "../nodes";
import { sleep } from "../retry";
import type { SharedStore } from "../shared";
import { ConfigurationError, ExecutionFailure } from "../../errors";
import { silentLogger } from "../../logging/logger";

// ============================================================================
// AsyncNode
// ============================================================================

describe("AsyncNode", () => {
  class Fetch extends AsyncNode {
    async prep(shared: SharedStore): Promise<string> {
      await sleep(1);
      return String(shared.url);
    }

    async exec(url: string): Promise<string> {
      await sleep(1);
      return `body of ${url}`;
    }

    async post(shared: SharedStore, _prepRes: unknown, execRes: unknown): Promise<string> {
      shared.body = execRes;
      return "fetched";
    }
  }

  it("should await every phase and return the post action", async () => {
    const shared: SharedStore = { url: "example.test/page" };
    const action = await new Fetch(1, 0, { logger: silentLogger }).runAsync(shared);

    expect(action).toBe("fetched");
    expect(shared.body).toBe("body of example.test/page");
  });

  it("should track the current retry while exec runs", async () => {
    const seen: number[] = [];
    class Flaky extends AsyncNode {
      async exec(): Promise<string> {
        seen.push(this.currentRetry);
        if (this.currentRetry < 2) throw new Error("flaky");
        return "ok";
      }
    }

    await new Flaky(3, 0, { logger: silentLogger }).runAsync({});
    expect(seen).toEqual([0, 1, 2]);
  });

  it("should refuse a synchronous run", () => {
    const node = new Fetch(1, 0, { logger: silentLogger });
    expect(() => node.run({})).toThrow(ConfigurationError);
    expect(() => node.run({})).toThrow("Fetch is async; use runAsync() or an AsyncFlow");
  });

  it("should retry rejected exec calls and fail with ExecutionFailure", async () => {
    let calls = 0;
    class Rejects extends AsyncNode {
      async exec(): Promise<unknown> {
        calls++;
        throw new Error(`rejection ${calls}`);
      }
    }

    const shared: SharedStore = {};
    const run = new Rejects(3, 0, { logger: silentLogger }).runAsync(shared);

    await expect(run).rejects.toBeInstanceOf(ExecutionFailure);
    await expect(run).rejects.toThrow("Rejects failed after 3 attempt(s): rejection 3");
    expect(calls).toBe(3);
    expect(shared).toEqual({});
  });

  it("should suspend rather than block between attempts", async () => {
    let ticks = 0;
    const timer = setInterval(() => ticks++, 5);
    class Rejects extends AsyncNode {
      exec(): unknown {
        throw new Error("down");
      }
    }

    const start = performance.now();
    try {
      await expect(new Rejects(3, 0.03, { logger: silentLogger }).runAsync({})).rejects.toThrow(
        ExecutionFailure,
      );
    } finally {
      clearInterval(timer);
    }

    expect(performance.now() - start).toBeGreaterThanOrEqual(55);
    expect(ticks).toBeGreaterThan(0);
  });

  it("should use an async fallback result as success", async () => {
    class Recovering extends AsyncNode {
      exec(): unknown {
        throw new Error("down");
      }
      async execFallback(): Promise<string> {
        await sleep(1);
        return "cached";
      }
      post(shared: SharedStore, _prepRes: unknown, execRes: unknown): undefined {
        shared.result = execRes;
        return undefined;
      }
    }

    const shared: SharedStore = {};
    await new Recovering(2, 0, { logger: silentLogger }).runAsync(shared);
    expect(shared.result).toBe("cached");
  });

  it("should propagate an error raised by the fallback itself", async () => {
    const own = new Error("no cache either");
    class Unrecoverable extends AsyncNode {
      exec(): unknown {
        throw new Error("down");
      }
    }

    const node = new Unrecoverable(1, 0, {
      logger: silentLogger,
      fallback: () => {
        throw own;
      },
    });
    await expect(node.runAsync({})).rejects.toBe(own);
  });
});

// ============================================================================
// AsyncBatchNode / AsyncParallelBatchNode
// ============================================================================

/**
 * Tracks how many execs overlap and in which order they finish
 */
interface Concurrency {
  active: number;
  peak: number;
  finished: number[];
}

function createTracker() {
  const tracker: Concurrency = { active: 0, peak: 0, finished: [] };
  const run = async (item: number, delayMs: number): Promise<number> => {
    tracker.active++;
    tracker.peak = Math.max(tracker.peak, tracker.active);
    await sleep(delayMs);
    tracker.active--;
    tracker.finished.push(item);
    return item * 10;
  };
  return { tracker, run };
}

const DELAYS: Record<number, number> = { 1: 30, 2: 5, 3: 15 };

describe("AsyncBatchNode", () => {
  it("should exec items one after another in input order", async () => {
    const { tracker, run } = createTracker();
    class Sequential extends AsyncBatchNode {
      prep(): number[] {
        return [1, 2, 3];
      }
      exec(item: number): Promise<number> {
        return run(item, DELAYS[item]);
      }
      post(shared: SharedStore, _prepRes: unknown, execRes: unknown): undefined {
        shared.results = execRes;
        return undefined;
      }
    }

    const shared: SharedStore = {};
    await new Sequential(1, 0, { logger: silentLogger }).runAsync(shared);

    expect(shared.results).toEqual([10, 20, 30]);
    expect(tracker.peak).toBe(1);
    expect(tracker.finished).toEqual([1, 2, 3]);
  });
});

describe("AsyncParallelBatchNode", () => {
  class Parallel extends AsyncParallelBatchNode {
    constructor(private readonly work: (item: number, delayMs: number) => Promise<number>) {
      super(1, 0, { logger: silentLogger });
    }
    prep(): number[] {
      return [1, 2, 3];
    }
    exec(item: number): Promise<number> {
      return this.work(item, DELAYS[item]);
    }
    post(shared: SharedStore, _prepRes: unknown, execRes: unknown): undefined {
      shared.results = execRes;
      return undefined;
    }
  }

  it("should run items concurrently and deliver results in input order", async () => {
    const { tracker, run } = createTracker();
    const shared: SharedStore = {};

    await new Parallel(run).runAsync(shared);

    expect(tracker.peak).toBe(3);
    expect(tracker.finished).toEqual([2, 3, 1]);
    expect(shared.results).toEqual([10, 20, 30]);
  });

  it("should leave currentRetry alone while items retry", async () => {
    const seen: number[] = [];
    class Retrying extends AsyncParallelBatchNode {
      private readonly failed = new Set<string>();
      prep(): string[] {
        return ["a", "b"];
      }
      async exec(item: string): Promise<string> {
        seen.push(this.currentRetry);
        if (!this.failed.has(item)) {
          this.failed.add(item);
          throw new Error(`${item} not ready`);
        }
        return item;
      }
    }

    const node = new Retrying(2, 0, { logger: silentLogger });
    await node.runAsync({});

    expect(seen).toEqual([0, 0, 0, 0]);
    expect(node.currentRetry).toBe(0);
  });

  it("should retry items independently", async () => {
    const attempts = new Map<number, number>();
    class FlakyParallel extends AsyncParallelBatchNode {
      prep(): number[] {
        return [1, 2, 3];
      }
      async exec(item: number): Promise<number> {
        const count = (attempts.get(item) ?? 0) + 1;
        attempts.set(item, count);
        if (item === 3 && count === 1) throw new Error("cold start");
        return item;
      }
      post(shared: SharedStore, _prepRes: unknown, execRes: unknown): undefined {
        shared.results = execRes;
        return undefined;
      }
    }

    const shared: SharedStore = {};
    await new FlakyParallel(2, 0, { logger: silentLogger }).runAsync(shared);

    expect(shared.results).toEqual([1, 2, 3]);
    expect(Object.fromEntries(attempts)).toEqual({ 1: 1, 2: 1, 3: 2 });
  });

  it("should fail the batch when one item is exhausted", async () => {
    class OneBad extends AsyncParallelBatchNode {
      prep(): string[] {
        return ["ok", "bad", "ok"];
      }
      async exec(item: string): Promise<string> {
        if (item === "bad") throw new Error("bad input");
        return item;
      }
      post(shared: SharedStore): undefined {
        shared.written = true;
        return undefined;
      }
    }

    const shared: SharedStore = {};
    const run = new OneBad(1, 0, { logger: silentLogger }).runAsync(shared);

    await expect(run).rejects.toThrow("OneBad (batch item 1) failed after 1 attempt(s): bad input");
    expect(shared).toEqual({});
  });
});

// ============================================================================
// AsyncFlow
// ============================================================================

class SyncRecord extends Node {
  constructor(private readonly label: string) {
    super(1, 0, { logger: silentLogger });
  }
  post(shared: SharedStore): undefined {
    const log = Array.isArray(shared.log) ? shared.log : [];
    shared.log = [...log, `${this.label}:${String(this.params.id ?? "-")}`];
    return undefined;
  }
}

class AsyncRecord extends AsyncNode {
  constructor(
    private readonly label: string,
    private readonly delayMs = 0,
  ) {
    super(1, 0, { logger: silentLogger });
  }
  async exec(): Promise<void> {
    await sleep(this.delayMs);
  }
  post(shared: SharedStore): undefined {
    const log = Array.isArray(shared.log) ? shared.log : [];
    shared.log = [...log, `${this.label}:${String(this.params.id ?? "-")}`];
    return undefined;
  }
}

describe("AsyncFlow", () => {
  it("should run async and sync nodes in one traversal", async () => {
    type Route = "left" | "right";
    class Choose extends AsyncNode<SharedStore, Route> {
      async post(shared: SharedStore): Promise<Route> {
        return shared.side === "left" ? "left" : "right";
      }
    }

    const start = new AsyncRecord("start");
    const choose = start.next(new Choose(1, 0, { logger: silentLogger }));
    choose.on("left", new SyncRecord("left"));
    choose.on("right", new AsyncRecord("right"));

    const shared: SharedStore = { side: "left" };
    await new AsyncFlow(start, silentLogger).runAsync(shared);

    expect(shared.log).toEqual(["start:-", "left:-"]);
  });

  it("should return the terminal action", async () => {
    class Finish extends AsyncNode {
      post(): string {
        return "done";
      }
    }
    const action = await new AsyncFlow(new Finish(1, 0, { logger: silentLogger }), silentLogger)
      .runAsync({});
    expect(action).toBe("done");
  });

  it("should nest a sync flow inside an async flow", async () => {
    const innerStart = new SyncRecord("inner");
    const inner = new Flow(innerStart, silentLogger);
    const outerStart = new AsyncRecord("outer");
    outerStart.next(inner);

    const shared: SharedStore = {};
    await new AsyncFlow(outerStart, silentLogger).runAsync(shared);

    expect(shared.log).toEqual(["outer:-", "inner:-"]);
  });

  it("should refuse a synchronous run", () => {
    const flow = new AsyncFlow(new AsyncRecord("a"), silentLogger);
    expect(() => flow.run({})).toThrow("AsyncFlow is async; use runAsync() or an AsyncFlow");
  });

  it("should require a start node", async () => {
    await expect(new AsyncFlow(undefined, silentLogger).runAsync({})).rejects.toThrow(
      "AsyncFlow has no start node",
    );
  });
});

// ============================================================================
// AsyncBatchFlow / AsyncParallelBatchFlow
// ============================================================================

describe("AsyncBatchFlow", () => {
  it("should run the graph once per parameter set, sequentially", async () => {
    class Batches extends AsyncBatchFlow {
      prep(): unknown {
        return [{ id: 1 }, { id: 2 }];
      }
    }
    const start = new AsyncRecord("fetch", 5);
    start.next(new SyncRecord("store"));

    const shared: SharedStore = {};
    await new Batches(start, silentLogger).runAsync(shared);

    expect(shared.log).toEqual(["fetch:1", "store:1", "fetch:2", "store:2"]);
  });
});

describe("AsyncParallelBatchFlow", () => {
  it("should run parameter sets concurrently against one store", async () => {
    const { tracker, run } = createTracker();
    class Work extends AsyncNode {
      async exec(): Promise<number> {
        const id = Number(this.params.id);
        return run(id, DELAYS[id]);
      }
      post(shared: SharedStore, _prepRes: unknown, execRes: unknown): undefined {
        shared[`result_${String(this.params.id)}`] = execRes;
        return undefined;
      }
    }
    class Fanout extends AsyncParallelBatchFlow {
      prep(): unknown {
        return [{ id: 1 }, { id: 2 }, { id: 3 }];
      }
    }

    const shared: SharedStore = {};
    await new Fanout(new Work(1, 0, { logger: silentLogger }), silentLogger).runAsync(shared);

    expect(tracker.peak).toBe(3);
    expect(tracker.finished).toEqual([2, 3, 1]);
    expect(shared).toEqual({ result_1: 10, result_2: 20, result_3: 30 });
  });

  it("should fail when any branch fails", async () => {
    class Picky extends AsyncNode {
      async exec(): Promise<unknown> {
        if (this.params.id === 2) throw new Error("branch 2 failed");
        return undefined;
      }
    }
    class Fanout extends AsyncParallelBatchFlow {
      prep(): unknown {
        return [{ id: 1 }, { id: 2 }];
      }
    }

    await expect(
      new Fanout(new Picky(1, 0, { logger: silentLogger }), silentLogger).runAsync({}),
    ).rejects.toBeInstanceOf(ExecutionFailure);
  });
});
