/**
 * Shared Store
 *
 * A single mutable object threaded through every phase of every node in
 * one run. It is the only channel for data exchange between nodes; the
 * engine imposes no schema on it.
 *
 * prep reads from it, post writes to it, exec never sees it.
 */

export type SharedStore = Record<string, unknown>;

/**
 * Create a new shared store, optionally seeded with initial data
 */
export function createSharedStore(initialData: SharedStore = {}): SharedStore {
  return { ...initialData };
}

/**
 * Read a key, falling back when it is absent or undefined
 */
export function readKey(store: SharedStore, key: string, fallback: unknown): unknown {
  return Object.prototype.hasOwnProperty.call(store, key) && store[key] !== undefined
    ? store[key]
    : fallback;
}
