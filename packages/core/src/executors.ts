import { Cause, Effect, Fiber, Queue } from "effect";
import { getDefaults } from "./config.js";
import { ExecutorShutdownError } from "./errors.js";
import { runLog } from "./logging.js";
import type { Executor, Looper } from "./types.js";

// ============================================================================
// Inline
// ============================================================================

/**
 * Runs each task on the caller, before `execute` returns.
 */
export const inlineExecutor: Executor = {
  execute: (task) => task(),
};

// ============================================================================
// Pool
// ============================================================================

const Stop = Symbol("PoolExecutor.Stop");
type PoolItem = (() => void) | typeof Stop;

/**
 * A fixed set of worker fibers taking tasks from one FIFO queue.
 *
 * Tasks start in submission order; with more than one worker nothing else
 * is promised about how they interleave. A task that throws is logged and
 * the worker moves on.
 */
export class PoolExecutor implements Executor {
  private readonly tasks = Effect.runSync(Queue.unbounded<PoolItem>());
  private readonly workers: ReadonlyArray<Fiber.RuntimeFiber<void>>;
  private closed = false;
  private shutdownEffect: Effect.Effect<void> | undefined;

  constructor(
    readonly size: number,
    readonly name = "pool",
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${size}`);
    }
    this.workers = Array.from({ length: size }, () => Effect.runFork(this.worker()));
  }

  get isShutdown(): boolean {
    return this.closed;
  }

  execute(task: () => void): void {
    if (this.closed) {
      throw new ExecutorShutdownError({ executor: this.name });
    }
    Effect.runSync(Queue.offer(this.tasks, task));
  }

  /**
   * Stops accepting tasks, lets the workers finish everything already
   * queued, then waits for them to exit. Idempotent.
   */
  shutdown(): Effect.Effect<void> {
    if (this.shutdownEffect === undefined) {
      this.closed = true;
      const stops = Array.from({ length: this.size }, (): PoolItem => Stop);
      Effect.runSync(Queue.offerAll(this.tasks, stops));
      this.shutdownEffect = Effect.runSync(
        Effect.cached(Fiber.joinAll(this.workers).pipe(Effect.zipRight(Queue.shutdown(this.tasks)))),
      );
    }
    return this.shutdownEffect;
  }

  private worker(): Effect.Effect<void> {
    const tasks = this.tasks;
    const name = this.name;
    return Effect.gen(function* () {
      while (true) {
        const next = yield* Queue.take(tasks);
        if (next === Stop) return;
        yield* Effect.sync(next).pipe(
          Effect.catchAllDefect((defect) =>
            Effect.sync(() =>
              runLog(Effect.logError(`Task on ${name} failed`, Cause.die(defect))),
            ),
          ),
        );
      }
    });
  }
}

let shared: PoolExecutor | undefined;

/**
 * The process-wide pool behind `Threading.pool()` and the default callback
 * executor. Created on first use with the configured size; never shut down.
 */
export function sharedPool(): PoolExecutor {
  if (shared === undefined) {
    shared = new PoolExecutor(getDefaults().poolSize, "shared-pool");
  }
  return shared;
}

// ============================================================================
// Loopers
// ============================================================================

/**
 * Posts tasks to the microtask queue of the current event loop.
 */
export const microtaskLooper: Looper = {
  post: (task) => queueMicrotask(task),
};
