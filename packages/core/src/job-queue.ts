import { Completion } from "./completion.js";
import type { Action, Reducer } from "./types.js";

// ============================================================================
// Jobs
// ============================================================================

export interface Job<F> {
  readonly run: F;
  readonly completion: Completion;
}

export type ReducerJob<T> = Job<Reducer<T>>;
export type ActionJob<T> = Job<Action<T>>;

/**
 * Everything that was pending at the moment a cycle detached the queue.
 */
export interface Batch<T> {
  readonly reducers: ReadonlyArray<ReducerJob<T>>;
  readonly actions: ReadonlyArray<ActionJob<T>>;
}

// ============================================================================
// Job Queue
// ============================================================================

/**
 * Pending reducers and actions, each in submission order.
 *
 * Every mutation runs inside one synchronous section, so enqueue and detach
 * are atomic with respect to every other producer on the event loop.
 * The queue is unbounded.
 */
export class JobQueue<T> {
  private reducers: Array<ReducerJob<T>> = [];
  private actions: Array<ActionJob<T>> = [];

  get size(): number {
    return this.reducers.length + this.actions.length;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }

  enqueueReducer(run: Reducer<T>): Completion {
    const completion = new Completion();
    this.reducers.push({ run, completion });
    return completion;
  }

  enqueueAction(run: Action<T>): Completion {
    const completion = new Completion();
    this.actions.push({ run, completion });
    return completion;
  }

  /**
   * Swaps both queues for empty ones and hands back what they held.
   */
  detach(): Batch<T> {
    const batch: Batch<T> = { reducers: this.reducers, actions: this.actions };
    this.reducers = [];
    this.actions = [];
    return batch;
  }

  /**
   * Drops every pending job, settling each completion as discarded.
   * Returns how many jobs were dropped.
   */
  discardAll(): number {
    const { reducers, actions } = this.detach();
    for (const job of reducers) job.completion.discard();
    for (const job of actions) job.completion.discard();
    return reducers.length + actions.length;
  }
}
