import { Effect, Exit, Fiber, Queue } from "effect";
import type { BackendTeardownError } from "../errors.js";
import type { Backend, CycleDriver } from "./types.js";

/**
 * Drives the engine from a worker fiber of its own.
 *
 * The worker steps, then sleeps on a single-slot doorbell unless work is
 * already pending or a stop was requested. Submissions and quit calls ring
 * the doorbell; a ring that arrives mid-cycle stays in the slot, so the
 * next wait returns at once.
 */
export class DedicatedBackend implements Backend {
  readonly name = "thread";
  private readonly doorbell = Effect.runSync(Queue.dropping<void>(1));
  private worker: Fiber.RuntimeFiber<void> | undefined;
  private closed = false;

  constructor(private readonly driver: CycleDriver) {}

  start(): void {
    const driver = this.driver;
    const doorbell = this.doorbell;

    const loop = Effect.gen(function* () {
      while (true) {
        const result = yield* Effect.sync(() => driver.step());
        if (result === "stopped") return;
        if (!driver.needsStep()) {
          yield* Queue.take(doorbell);
        }
      }
    });

    this.worker = Effect.runFork(
      loop.pipe(
        Effect.exit,
        Effect.flatMap((exit) =>
          Effect.sync(() => driver.terminate(Exit.isFailure(exit) ? exit.cause : undefined)),
        ),
      ),
    );
  }

  signal(): void {
    if (this.closed) return;
    Effect.runSync(Queue.offer(this.doorbell, undefined));
  }

  teardown(): Effect.Effect<void, BackendTeardownError> {
    const worker = this.worker;
    return Effect.sync(() => {
      this.closed = true;
    }).pipe(
      Effect.zipRight(Queue.shutdown(this.doorbell)),
      Effect.zipRight(worker === undefined ? Effect.void : Effect.asVoid(Fiber.await(worker))),
    );
  }
}
