import { Effect, Equal, Exit, type Cause, type Scope } from "effect";
import { createBackend, type Backend, type BackendFactory, type CycleDriver } from "./backends/index.js";
import type { Completion, Joinable } from "./completion.js";
import { getDefaults } from "./config.js";
import { Engine, type CycleHooks, type StepResult } from "./engine.js";
import { EngineFaultError, type TerminationError } from "./errors.js";
import { sharedPool } from "./executors.js";
import { RecordingHistory, type History, type HistoryOptions } from "./history.js";
import { Lifecycle, type LifecyclePhase } from "./lifecycle.js";
import { runLog } from "./logging.js";
import { StateSubject, type StateObservable } from "./subject.js";
import type {
  Action,
  Executor,
  QuittedListener,
  Reducer,
  StateEquivalence,
  StateListener,
  Threading,
} from "./types.js";

// ============================================================================
// Public API
// ============================================================================

export interface StoreOptions<T> {
  /** Defaults to the configured process-wide threading. */
  readonly threading?: Threading;
  /**
   * Replaces the threading option with a custom scheduling strategy.
   */
  readonly backend?: BackendFactory;
  /** Where listeners are called. Defaults to the shared pool. */
  readonly callbackExecutor?: Executor;
  /** Decides whether a cycle changed the state. Defaults to `Equal.equals`. */
  readonly equals?: StateEquivalence<T>;
  readonly history?: HistoryOptions;
  readonly hooks?: CycleHooks;
  readonly id?: string;
}

/**
 * A value owned by a single writer.
 *
 * Any caller may submit reducers and actions; the store applies them one at
 * a time, in submission order, and publishes each changed state to its
 * listeners.
 */
export interface Store<T> extends StateObservable<T> {
  readonly id: string;
  /** Name of the backend driving this store. */
  readonly backend: string;
  readonly phase: LifecyclePhase;
  /**
   * Every state produced by a reducer, for debugging. Disabled by default.
   * Contains states listeners never saw; do not diff it.
   */
  readonly history: History<T>;

  /**
   * Queues a reducer. It runs on the store's own context and should not
   * block. Return the state unchanged to signal a no-op.
   */
  update(reducer: Reducer<T>): Completion;

  /**
   * Queues an action for the next cycle. It sees the state after every
   * reducer of that cycle has been applied.
   */
  inspect(action: Action<T>): Completion;

  /**
   * Stops now. Queued jobs are discarded; a job already running finishes.
   */
  quit(): Joinable;

  /**
   * Stops after one more cycle that applies everything queued so far.
   */
  quitSafely(): Joinable;

  addQuittedListener(listener: QuittedListener): void;
  removeQuittedListener(listener: QuittedListener): void;
}

// ============================================================================
// Implementation
// ============================================================================

let nextStoreId = 0;

class SerialStore<T> implements Store<T>, CycleDriver {
  readonly id: string;
  readonly history: RecordingHistory<T>;
  private readonly lifecycle: Lifecycle;
  private readonly subject: StateSubject<T>;
  private readonly engine: Engine<T>;
  private readonly driver: Backend;
  private terminating = false;

  constructor(initial: T, options: StoreOptions<T>) {
    const defaults = getDefaults();
    this.id = options.id ?? `store-${++nextStoreId}`;
    this.history = new RecordingHistory({ enabled: defaults.history, ...options.history });
    this.lifecycle = new Lifecycle(this.id);
    this.subject = new StateSubject(options.callbackExecutor ?? sharedPool(), this.id);
    this.engine = new Engine(initial, {
      storeId: this.id,
      lifecycle: this.lifecycle,
      history: this.history,
      subject: this.subject,
      equals: options.equals ?? ((previous, next) => Equal.equals(previous, next)),
      hooks: options.hooks ?? {},
    });
    this.driver =
      options.backend !== undefined
        ? options.backend(this)
        : createBackend(options.threading ?? defaults.threading, this);

    runLog(Effect.logDebug(`Created on ${this.driver.name} backend`), this.id);
    this.subject.publish(initial);
    this.driver.start();
  }

  get storeId(): string {
    return this.id;
  }

  get backend(): string {
    return this.driver.name;
  }

  get phase(): LifecyclePhase {
    return this.lifecycle.phase;
  }

  update(reducer: Reducer<T>): Completion {
    const completion = this.engine.submitReducer(reducer);
    if (completion.isPending) this.driver.signal();
    return completion;
  }

  inspect(action: Action<T>): Completion {
    const completion = this.engine.submitAction(action);
    if (completion.isPending) this.driver.signal();
    return completion;
  }

  quit(): Joinable {
    if (this.lifecycle.requestQuit()) {
      runLog(Effect.logDebug("Quit requested"), this.id);
      this.driver.signal();
    }
    return this.lifecycle.joinable;
  }

  quitSafely(): Joinable {
    if (this.lifecycle.requestQuitSafely()) {
      runLog(Effect.logDebug("Graceful quit requested"), this.id);
      this.driver.signal();
    }
    return this.lifecycle.joinable;
  }

  addListener(listener: StateListener<T>): void {
    this.subject.addListener(listener);
  }

  removeListener(listener: StateListener<T>): void {
    this.subject.removeListener(listener);
  }

  subscribe(listener: StateListener<T>): () => void {
    return this.subject.subscribe(listener);
  }

  awaitDelivery(): Promise<void> {
    return this.subject.awaitDelivery();
  }

  addQuittedListener(listener: QuittedListener): void {
    this.lifecycle.addQuittedListener(listener);
  }

  removeQuittedListener(listener: QuittedListener): void {
    this.lifecycle.removeQuittedListener(listener);
  }

  // --------------------------------------------------------------------------
  // CycleDriver
  // --------------------------------------------------------------------------

  step(): StepResult {
    return this.engine.step();
  }

  needsStep(): boolean {
    return this.engine.needsStep();
  }

  terminate(fault?: Cause.Cause<unknown>): void {
    if (this.terminating) return;
    this.terminating = true;
    this.lifecycle.halt();

    if (fault !== undefined) {
      this.engine.abort(fault);
      runLog(Effect.logError("Faulted, stopping", fault), this.id);
    }
    const discarded = this.engine.discardPending();
    runLog(Effect.logDebug(`Stopping, ${discarded} pending jobs discarded`), this.id);

    const id = this.id;
    const lifecycle = this.lifecycle;
    Effect.runFork(
      Effect.exit(this.driver.teardown()).pipe(
        Effect.map((teardown): Exit.Exit<void, TerminationError> => {
          if (fault !== undefined) {
            return Exit.fail(new EngineFaultError({ storeId: id, cause: fault }));
          }
          if (Exit.isFailure(teardown)) {
            runLog(Effect.logError("Backend teardown failed", teardown.cause), id);
          }
          return teardown;
        }),
        Effect.flatMap((exit) => Effect.sync(() => lifecycle.markStopped(exit))),
      ),
    );
  }
}

/**
 * Creates a store and publishes `initial` to its listeners. The caller
 * owns it and must quit it to release its backend.
 *
 * @example
 * ```ts
 * const store = createStore(Data.struct({ count: 0 }), { threading: Threading.thread() });
 * store.subscribe((state) => render(state));
 * store.update((state) => Data.struct({ count: state.count + 1 }));
 * await store.quitSafely().join();
 * ```
 */
export function createStore<T>(initial: T, options: StoreOptions<T> = {}): Store<T> {
  return new SerialStore(initial, options);
}

/**
 * Creates a store tied to the current scope: closing the scope quits it
 * safely and waits until it stopped.
 */
export const makeStore = <T>(
  initial: T,
  options: StoreOptions<T> = {},
): Effect.Effect<Store<T>, never, Scope.Scope> =>
  Effect.acquireRelease(
    Effect.sync(() => createStore(initial, options)),
    (store) =>
      store.quitSafely().await.pipe(
        Effect.catchAll((error) =>
          Effect.logWarning(`Store ${store.id} stopped with ${error._tag}`),
        ),
      ),
  );
