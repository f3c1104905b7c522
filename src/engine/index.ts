/**
 * Execution Engine
 *
 * Node primitives and the flows that orchestrate them:
 * 1. Node - single step with retry logic
 * 2. Flow - steps connected by actions
 * 3. BatchNode - sequential repeat steps
 * 4. AsyncNode / AsyncBatchNode - cooperative counterparts
 * 5. AsyncParallelBatchNode - concurrent repeat steps (I/O-bound)
 * 6. BatchFlow / AsyncBatchFlow - sub-flow once per parameter set
 * 7. AsyncParallelBatchFlow - concurrent sub-flow runs
 *
 * Plus the shared store threaded through every phase.
 */

export * from "./types";
export * from "./shared";
export * from "./retry";
export * from "./nodes";
export * from "./flow";
export * from "./async";
