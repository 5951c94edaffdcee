import { Deferred, Effect, Either, Exit } from "effect";
import type { JobFaultError, TerminationError } from "./errors.js";

// ============================================================================
// Completion
// ============================================================================

/**
 * How a job ended once it is no longer pending.
 */
export type JobOutcome = "completed" | "discarded";

export type CompletionStatus = "pending" | JobOutcome | "faulted";

/**
 * Handed back for every submitted reducer or action.
 *
 * Settles exactly once: `completed` after the engine ran the job,
 * `discarded` when the job will never run, or fails with `JobFaultError`
 * when the job itself threw.
 *
 * @example
 * ```ts
 * const outcome = await store.update((s) => s.increment()).join();
 * if (outcome === "discarded") {
 *   // the store was quitting
 * }
 * ```
 */
export class Completion {
  private readonly deferred = Effect.runSync(Deferred.make<JobOutcome, JobFaultError>());
  private _status: CompletionStatus = "pending";

  /** A completion for a submission that was rejected outright. */
  static discarded(): Completion {
    const completion = new Completion();
    completion.discard();
    return completion;
  }

  get status(): CompletionStatus {
    return this._status;
  }

  get isPending(): boolean {
    return this._status === "pending";
  }

  /** Waits for the job to settle. */
  get await(): Effect.Effect<JobOutcome, JobFaultError> {
    return Deferred.await(this.deferred);
  }

  /** Rejects with the `JobFaultError` itself when the job faulted. */
  async join(): Promise<JobOutcome> {
    const result = await Effect.runPromise(Effect.either(this.await));
    if (Either.isLeft(result)) throw result.left;
    return result.right;
  }

  /** @internal */
  complete(): boolean {
    return this.settle("completed", Exit.succeed("completed"));
  }

  /** @internal */
  discard(): boolean {
    return this.settle("discarded", Exit.succeed("discarded"));
  }

  /** @internal */
  fail(error: JobFaultError): boolean {
    return this.settle("faulted", Exit.fail(error));
  }

  private settle(status: CompletionStatus, exit: Exit.Exit<JobOutcome, JobFaultError>): boolean {
    if (this._status !== "pending") return false;
    this._status = status;
    return Effect.runSync(Deferred.done(this.deferred, exit));
  }
}

// ============================================================================
// Joinable
// ============================================================================

/**
 * Quit handle. Ready once the store has stopped and its backend has
 * released whatever it owned.
 */
export class Joinable {
  private readonly deferred = Effect.runSync(Deferred.make<void, TerminationError>());
  private _done = false;

  get isDone(): boolean {
    return this._done;
  }

  get await(): Effect.Effect<void, TerminationError> {
    return Deferred.await(this.deferred);
  }

  /** Rejects with the `TerminationError` itself when the store did not stop cleanly. */
  async join(): Promise<void> {
    const result = await Effect.runPromise(Effect.either(this.await));
    if (Either.isLeft(result)) throw result.left;
  }

  /** @internal */
  resolve(exit: Exit.Exit<void, TerminationError>): boolean {
    if (this._done) return false;
    this._done = true;
    return Effect.runSync(Deferred.done(this.deferred, exit));
  }
}
