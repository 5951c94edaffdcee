// ============================================================================
// Core Types
// ============================================================================

/**
 * Produces the next state from the current one.
 *
 * Reducers must not mutate the state they receive. Returning the same
 * instance signals a no-op and suppresses the publish for that cycle.
 */
export type Reducer<T> = (state: T) => T;

/**
 * Read-only callback run against the state as it stands after the reducers
 * of its cycle have been applied.
 */
export type Action<T> = (state: T) => void;

/**
 * Receives every published state, in publish order.
 */
export type StateListener<T> = (state: T) => void;

/**
 * Called once after a store has stopped and released its backend.
 */
export type QuittedListener = () => void;

/**
 * Decides whether two consecutive states are the same value.
 */
export type StateEquivalence<T> = (previous: T, next: T) => boolean;

// ============================================================================
// Execution Contexts
// ============================================================================

/**
 * Runs tasks somewhere: inline, on a pool, on a caller's scheduler.
 * Stores never assume more than that each task eventually runs once.
 */
export interface Executor {
  readonly execute: (task: () => void) => void;
}

/**
 * A single logical thread that runs posted tasks one after another,
 * such as a UI message loop.
 */
export interface Looper {
  readonly post: (task: () => void) => void;
}

// ============================================================================
// Threading
// ============================================================================

/**
 * How a store schedules its cycles.
 *
 * - `Thread`   a dedicated worker loop owned by the store
 * - `Pool`     the shared pool, or a pool of `size` owned by the store
 * - `Executor` a caller-supplied executor, never torn down by the store
 * - `Sync`     inline on whichever caller submitted the work
 * - `Post`     one cycle per task posted to a looper
 */
export type Threading =
  | { readonly _tag: "Thread" }
  | { readonly _tag: "Pool"; readonly size?: number }
  | { readonly _tag: "Executor"; readonly executor: Executor }
  | { readonly _tag: "Sync" }
  | { readonly _tag: "Post"; readonly looper?: Looper };

export type ThreadingKind = Threading["_tag"];

export const Threading = {
  thread: (): Threading => ({ _tag: "Thread" }),
  pool: (size?: number): Threading =>
    size === undefined ? { _tag: "Pool" } : { _tag: "Pool", size },
  executor: (executor: Executor): Threading => ({ _tag: "Executor", executor }),
  sync: (): Threading => ({ _tag: "Sync" }),
  post: (looper?: Looper): Threading =>
    looper === undefined ? { _tag: "Post" } : { _tag: "Post", looper },
};
