import { Cause, Effect, Exit } from "effect";
import type { BackendTeardownError } from "../errors.js";
import type { PoolExecutor } from "../executors.js";
import type { Executor } from "../types.js";
import type { Backend, CycleDriver } from "./types.js";

/**
 * Runs each step as a task on an executor and reschedules itself while
 * work remains.
 *
 * `scheduled` is the single active permit: it is taken when a task is
 * handed to the executor and given back only after that task's step
 * returned, so a pool never runs two steps at once and an inline executor
 * never nests one step inside another. An executor that refuses the task
 * stops the store with that error as its fault.
 */
export class ExecutorBackend implements Backend {
  private scheduled = false;
  private finished = false;

  constructor(
    private readonly driver: CycleDriver,
    private readonly executor: Executor,
    readonly name: string,
    private readonly owned?: PoolExecutor,
  ) {}

  /**
   * A backend on a pool that exists for this store alone and is shut down
   * with it.
   */
  static owning(driver: CycleDriver, pool: PoolExecutor): ExecutorBackend {
    return new ExecutorBackend(driver, pool, "dedicated-pool", pool);
  }

  start(): void {
    if (this.driver.needsStep()) this.schedule();
  }

  signal(): void {
    this.schedule();
  }

  teardown(): Effect.Effect<void, BackendTeardownError> {
    return this.owned === undefined ? Effect.void : this.owned.shutdown();
  }

  private schedule(): void {
    if (this.scheduled || this.finished) return;
    this.scheduled = true;
    try {
      this.executor.execute(this.run);
    } catch (error) {
      this.scheduled = false;
      this.finish(Cause.die(error));
    }
  }

  private readonly run = (): void => {
    const exit = Effect.runSyncExit(Effect.sync(() => this.driver.step()));
    if (Exit.isFailure(exit)) {
      this.finish(exit.cause);
      return;
    }
    if (exit.value === "stopped") {
      this.finish();
      return;
    }

    this.scheduled = false;
    if (this.driver.needsStep()) this.schedule();
  };

  private finish(fault?: Cause.Cause<unknown>): void {
    this.finished = true;
    this.driver.terminate(fault);
  }
}
