import type { Cause } from "effect";
import { Completion } from "./completion.js";
import { JobFaultError } from "./errors.js";
import type { MutableHistory } from "./history.js";
import { JobQueue, type Batch } from "./job-queue.js";
import type { Lifecycle } from "./lifecycle.js";
import type { StateSubject } from "./subject.js";
import type { Action, Reducer, StateEquivalence } from "./types.js";

// ============================================================================
// Types
// ============================================================================

/**
 * What a backend learns from one step: keep driving, or stop for good.
 */
export type StepResult = "cycled" | "stopped";

/**
 * Called around every cycle, on the context that runs it.
 */
export interface CycleHooks {
  readonly onCycleStart?: () => void;
  readonly onCycleEnd?: () => void;
}

export interface EngineOptions<T> {
  readonly storeId: string;
  readonly lifecycle: Lifecycle;
  readonly history: MutableHistory<T>;
  readonly subject: StateSubject<T>;
  readonly equals: StateEquivalence<T>;
  readonly hooks: CycleHooks;
}

// ============================================================================
// Engine
// ============================================================================

/**
 * The single writer. Owns the authoritative state and applies queued jobs
 * to it, one cycle at a time, on whatever context the backend calls
 * {@link step} from.
 *
 * A cycle detaches both queues at once, so a job submitted while a cycle
 * runs (from a reducer, an action or anywhere else) waits for the next one.
 * Reducers run first, in order, each result pushed to history. Actions then
 * run against the resulting state. The state is published only when it
 * differs from the one the cycle started from.
 *
 * The engine does not catch errors thrown by jobs; the backend sees them
 * and calls {@link abort}.
 */
export class Engine<T> {
  private state: T;
  private readonly queue = new JobQueue<T>();

  // Settlement bookkeeping for the cycle in flight, read by abort()
  private batch: Batch<T> | null = null;
  private current: Completion | null = null;
  private ran: Completion[] = [];

  constructor(
    initial: T,
    private readonly options: EngineOptions<T>,
  ) {
    this.state = initial;
  }

  submitReducer(reducer: Reducer<T>): Completion {
    if (!this.options.lifecycle.accepting) return Completion.discarded();
    return this.queue.enqueueReducer(reducer);
  }

  submitAction(action: Action<T>): Completion {
    if (!this.options.lifecycle.accepting) return Completion.discarded();
    return this.queue.enqueueAction(action);
  }

  get pendingJobs(): number {
    return this.queue.size;
  }

  /**
   * Whether a backend has a reason to call {@link step}: queued work,
   * or a stop that has not been carried out yet.
   */
  needsStep(): boolean {
    const { lifecycle } = this.options;
    return !this.queue.isEmpty || !lifecycle.running || lifecycle.stopping;
  }

  /**
   * Runs at most one cycle. The cycle after `quitSafely()` is the last one.
   */
  step(): StepResult {
    const { lifecycle } = this.options;
    if (!lifecycle.running) return "stopped";
    if (lifecycle.stopping) lifecycle.beginFinalCycle();

    this.cycle();

    return lifecycle.running ? "cycled" : "stopped";
  }

  /**
   * Settles the cycle a job fault interrupted: the faulting job fails,
   * actions that already ran complete, everything else in the batch is
   * discarded.
   */
  abort(cause: Cause.Cause<unknown>): void {
    this.current?.fail(new JobFaultError({ storeId: this.options.storeId, cause }));
    for (const completion of this.ran) completion.complete();
    if (this.batch !== null) {
      for (const job of this.batch.reducers) job.completion.discard();
      for (const job of this.batch.actions) job.completion.discard();
    }
    this.current = null;
    this.ran = [];
    this.batch = null;
  }

  /** @returns how many queued jobs were dropped */
  discardPending(): number {
    return this.queue.discardAll();
  }

  private cycle(): void {
    const { lifecycle, history, subject, equals, hooks } = this.options;
    hooks.onCycleStart?.();

    const previous = this.state;
    const batch = this.queue.detach();
    this.batch = batch;

    for (const job of batch.reducers) {
      if (lifecycle.forced) {
        job.completion.discard();
        continue;
      }
      this.current = job.completion;
      this.state = job.run(this.state);
      this.current = null;
      history.push(this.state);
      job.completion.complete();
    }

    for (const job of batch.actions) {
      if (lifecycle.forced) {
        job.completion.discard();
        continue;
      }
      this.current = job.completion;
      job.run(this.state);
      this.current = null;
      this.ran.push(job.completion);
    }

    if (!equals(previous, this.state)) {
      subject.publish(this.state);
    }

    for (const completion of this.ran) completion.complete();
    this.ran = [];
    this.batch = null;

    hooks.onCycleEnd?.();
  }
}
