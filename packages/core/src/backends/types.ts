import type { Cause, Effect } from "effect";
import type { StepResult } from "../engine.js";
import type { BackendTeardownError } from "../errors.js";

/**
 * What a backend drives. Implemented by the store.
 */
export interface CycleDriver {
  readonly storeId: string;
  /** Runs at most one cycle. Throws whatever a job threw. */
  step(): StepResult;
  needsStep(): boolean;
  /**
   * Discards leftover work, tears the backend down and marks the store
   * stopped. Pass the cause when a step failed.
   */
  terminate(fault?: Cause.Cause<unknown>): void;
}

/**
 * Schedules a store's cycles.
 *
 * Whatever the strategy, a backend never has two steps scheduled or running
 * at once, and keeps calling `step()` while `needsStep()` holds until a
 * step reports `"stopped"`.
 */
export interface Backend {
  readonly name: string;
  /** Called once, after the initial state was published. */
  start(): void;
  /** Work arrived, or a quit was requested. */
  signal(): void;
  /**
   * Releases what the backend owns exclusively. A backend running on a
   * shared or caller-supplied resource leaves it alone.
   */
  teardown(): Effect.Effect<void, BackendTeardownError>;
}

export type BackendFactory = (driver: CycleDriver) => Backend;
