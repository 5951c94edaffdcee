import { Cause, Effect, Exit } from "effect";
import type { BackendTeardownError } from "../errors.js";
import type { Looper } from "../types.js";
import type { Backend, CycleDriver } from "./types.js";

/**
 * For hosts that already serialize callbacks: every submission posts one
 * task to the looper, and each task runs at most one cycle inline.
 *
 * Tasks that find nothing to do return at once. A task posted while a cycle
 * is running (possible with a looper that runs tasks inline) is folded into
 * one repost after that cycle.
 */
export class CooperativeBackend implements Backend {
  readonly name = "post";
  private active = false;
  private missed = false;
  private finished = false;

  constructor(
    private readonly driver: CycleDriver,
    private readonly looper: Looper,
  ) {}

  start(): void {
    if (this.driver.needsStep()) this.signal();
  }

  signal(): void {
    if (this.finished) return;
    try {
      this.looper.post(this.process);
    } catch (error) {
      this.finished = true;
      this.driver.terminate(Cause.die(error));
    }
  }

  teardown(): Effect.Effect<void, BackendTeardownError> {
    return Effect.void;
  }

  private readonly process = (): void => {
    if (this.finished) return;
    if (this.active) {
      this.missed = true;
      return;
    }
    if (!this.driver.needsStep()) return;

    this.active = true;
    const exit = Effect.runSyncExit(Effect.sync(() => this.driver.step()));
    this.active = false;

    if (Exit.isFailure(exit)) {
      this.finished = true;
      this.driver.terminate(exit.cause);
      return;
    }
    if (exit.value === "stopped") {
      this.finished = true;
      this.driver.terminate();
      return;
    }
    if (this.missed) {
      this.missed = false;
      if (this.driver.needsStep()) this.signal();
    }
  };
}
