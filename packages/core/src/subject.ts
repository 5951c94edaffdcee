import { Cause, Effect } from "effect";
import { runLog } from "./logging.js";
import type { Executor, StateListener } from "./types.js";

/**
 * Listener registration for published states.
 */
export interface StateObservable<T> {
  addListener(listener: StateListener<T>): void;
  removeListener(listener: StateListener<T>): void;
  /** Same as {@link addListener}, returning the matching removal. */
  subscribe(listener: StateListener<T>): () => void;
  /** Resolves once every state published so far reached the listeners. */
  awaitDelivery(): Promise<void>;
}

/**
 * Hands published states to listeners on a callback executor.
 *
 * Deliveries go through one serial chain: at most one delivery task is
 * scheduled at a time and it drains everything published before it ran,
 * so listeners see states in publish order on any executor.
 */
export class StateSubject<T> implements StateObservable<T> {
  private readonly listeners = new Set<StateListener<T>>();
  private pending: T[] = [];
  private scheduled = false;
  private idle: Array<() => void> = [];

  constructor(
    private readonly executor: Executor,
    private readonly storeId: string,
  ) {}

  publish(state: T): void {
    this.pending.push(state);
    this.schedule();
  }

  addListener(listener: StateListener<T>): void {
    this.listeners.add(listener);
  }

  removeListener(listener: StateListener<T>): void {
    this.listeners.delete(listener);
  }

  subscribe(listener: StateListener<T>): () => void {
    this.addListener(listener);
    return () => this.removeListener(listener);
  }

  awaitDelivery(): Promise<void> {
    if (!this.scheduled && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idle.push(resolve);
    });
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    try {
      this.executor.execute(this.deliver);
    } catch (error) {
      // Nothing will deliver these
      const dropped = this.pending.length;
      this.pending = [];
      this.scheduled = false;
      runLog(
        Effect.logError(`Could not schedule delivery, ${dropped} states dropped`, Cause.die(error)),
        this.storeId,
      );
      this.settleIdle();
    }
  }

  private readonly deliver = (): void => {
    const states = this.pending;
    this.pending = [];
    for (const state of states) {
      for (const listener of Array.from(this.listeners)) {
        try {
          listener(state);
        } catch (error) {
          runLog(Effect.logError("State listener failed", Cause.die(error)), this.storeId);
        }
      }
    }
    this.scheduled = false;

    if (this.pending.length > 0) {
      this.schedule();
      return;
    }
    this.settleIdle();
  };

  private settleIdle(): void {
    const idle = this.idle;
    this.idle = [];
    for (const resolve of idle) resolve();
  }
}
