import { Cause, Effect, type Exit } from "effect";
import { Joinable } from "./completion.js";
import type { TerminationError } from "./errors.js";
import { runLog } from "./logging.js";
import type { QuittedListener } from "./types.js";

/**
 * ```
 * Active ──quit()──────▶ ForceStopping ──▶ Stopped
 *   │                          ▲
 *   └──quitSafely()──▶ Draining ┴─────────▶ Stopped
 * ```
 * `quit()` while draining escalates to a forced stop. A job fault stops
 * the store from any phase.
 */
export type LifecyclePhase = "Active" | "Draining" | "ForceStopping" | "Stopped";

/**
 * Owns the `running` and `stopping` flags and the quit handle.
 *
 * `running` goes from true to false once. `stopping` is set by
 * `quitSafely()` and stays true, next to `running`, for exactly one more
 * cycle.
 */
export class Lifecycle {
  readonly joinable = new Joinable();
  private _phase: LifecyclePhase = "Active";
  private _running = true;
  private _stopping = false;
  private readonly quitted = new Set<QuittedListener>();

  constructor(private readonly storeId: string) {}

  get phase(): LifecyclePhase {
    return this._phase;
  }

  get running(): boolean {
    return this._running;
  }

  get stopping(): boolean {
    return this._stopping;
  }

  /** Whether new submissions are queued rather than discarded. */
  get accepting(): boolean {
    return this._phase === "Active";
  }

  /** Whether queued work must be dropped instead of applied. */
  get forced(): boolean {
    return this._phase === "ForceStopping";
  }

  /** @returns false when the store was already force stopping or stopped */
  requestQuit(): boolean {
    if (this._phase === "ForceStopping" || this._phase === "Stopped") return false;
    this._phase = "ForceStopping";
    this._running = false;
    return true;
  }

  /** @returns false unless the store was active */
  requestQuitSafely(): boolean {
    if (this._phase !== "Active") return false;
    this._phase = "Draining";
    this._stopping = true;
    return true;
  }

  /**
   * Entering the last cycle of a graceful quit.
   */
  beginFinalCycle(): void {
    this._running = false;
  }

  /**
   * No more cycles and no more submissions, whatever the phase.
   * Used once the store is tearing down, including after a job fault.
   */
  halt(): void {
    if (this._phase === "Active") this._phase = "ForceStopping";
    this._running = false;
  }

  markStopped(exit: Exit.Exit<void, TerminationError>): void {
    if (this._phase === "Stopped") return;
    this._phase = "Stopped";
    this._running = false;
    this.joinable.resolve(exit);

    for (const listener of Array.from(this.quitted)) {
      this.notify(listener);
    }
    this.quitted.clear();
  }

  /**
   * Registers a callback for the moment the store has stopped.
   * Runs it right away when that already happened.
   */
  addQuittedListener(listener: QuittedListener): void {
    if (this._phase === "Stopped") {
      this.notify(listener);
      return;
    }
    this.quitted.add(listener);
  }

  removeQuittedListener(listener: QuittedListener): void {
    this.quitted.delete(listener);
  }

  private notify(listener: QuittedListener): void {
    try {
      listener();
    } catch (error) {
      runLog(Effect.logError("Quitted listener failed", Cause.die(error)), this.storeId);
    }
  }
}
