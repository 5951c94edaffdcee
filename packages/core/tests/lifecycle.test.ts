import { describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import type { Completion } from "../src/completion.js";
import { ExecutorBackend, type BackendFactory } from "../src/backends/index.js";
import { BackendTeardownError } from "../src/errors.js";
import { PoolExecutor, inlineExecutor, sharedPool } from "../src/executors.js";
import { createStore } from "../src/store.js";
import { Threading } from "../src/types.js";
import {
  ManualExecutor,
  TestListener,
  bump,
  immediateExecutor,
  initialState,
  threadings,
} from "./test-utils.js";

const manualStore = () => {
  const executor = new ManualExecutor();
  const callbacks = new ManualExecutor();
  const listener = new TestListener();
  const store = createStore(initialState(), {
    threading: Threading.executor(executor),
    callbackExecutor: callbacks,
  });
  store.addListener(listener.listener);
  return { store, executor, callbacks, listener };
};

// ============================================================================
// quit()
// ============================================================================

describe("quit()", () => {
  it("discards queued jobs that have not started", async () => {
    const { store, executor, callbacks, listener } = manualStore();

    const jobs = [store.update(bump), store.inspect(() => undefined), store.update(bump)];
    const handle = store.quit();
    expect(store.phase).toBe("ForceStopping");

    executor.runAll();
    await handle.join();
    callbacks.runAll();

    expect(jobs.map((job) => job.status)).toEqual(["discarded", "discarded", "discarded"]);
    expect(listener.revisions).toEqual([0]);
    expect(store.phase).toBe("Stopped");
  });

  it("rejects submissions made after it", async () => {
    const { store, executor } = manualStore();

    store.quit();
    const late = store.update(bump);

    expect(late.status).toBe("discarded");
    expect(await late.join()).toBe("discarded");
    expect(executor.pending).toBe(1);
    executor.runAll();
    await store.quit().join();
  });

  it("returns the same handle every time", () => {
    const { store } = manualStore();
    const first = store.quit();

    expect(store.quit()).toBe(first);
    expect(store.quitSafely()).toBe(first);
  });

  it("escalates a graceful quit that has not drained yet", async () => {
    const { store, executor } = manualStore();

    const jobs = [store.update(bump), store.update(bump)];
    store.quitSafely();
    expect(store.phase).toBe("Draining");
    store.quit();
    expect(store.phase).toBe("ForceStopping");

    executor.runAll();
    await store.quit().join();

    expect(jobs.map((job) => job.status)).toEqual(["discarded", "discarded"]);
  });

  it("drops the rest of the batch when called from inside a reducer", async () => {
    const { store, executor } = manualStore();

    const first = store.update((state) => {
      store.quit();
      return bump(state);
    });
    const second = store.update(bump);
    const action = store.inspect(() => undefined);

    executor.runAll();
    await store.quit().join();

    expect(first.status).toBe("completed");
    expect(second.status).toBe("discarded");
    expect(action.status).toBe("discarded");
  });
});

// ============================================================================
// quitSafely()
// ============================================================================

describe("quitSafely()", () => {
  it("runs exactly one more cycle that drains the queue", async () => {
    const { store, executor, callbacks, listener } = manualStore();

    store.update(bump);
    store.update(bump);
    const action = store.inspect(() => undefined);
    const handle = store.quitSafely();

    expect(executor.runAll()).toBe(1);
    await handle.join();
    callbacks.runAll();

    expect(action.status).toBe("completed");
    expect(listener.revisions).toEqual([0, 2]);
  });

  it("lets the current cycle finish when called from inside a reducer", async () => {
    const { store, executor, callbacks, listener } = manualStore();

    const first = store.update((state) => {
      store.quitSafely();
      return bump(state);
    });
    const second = store.update(bump);

    expect(executor.runNext()).toBe(true);
    expect(store.phase).toBe("Draining");
    expect(executor.runAll()).toBe(1);
    await store.quitSafely().join();
    callbacks.runAll();

    expect([first.status, second.status]).toEqual(["completed", "completed"]);
    expect(listener.revisions).toEqual([0, 2]);
  });

  it("rejects work submitted from inside the final cycle", async () => {
    const { store, executor } = manualStore();
    const submitted: Completion[] = [];

    store.update((state) => {
      submitted.push(store.inspect(() => undefined));
      return state;
    });
    store.quitSafely();
    executor.runAll();
    await store.quitSafely().join();

    expect(submitted.map((completion) => completion.status)).toEqual(["discarded"]);
  });
});

// ============================================================================
// Quitted listeners
// ============================================================================

describe.each(threadings)("quitted listeners on the %s backend", (_name, threading) => {
  it("are called once the store stopped", async () => {
    const store = createStore(initialState(), {
      threading: threading(),
      callbackExecutor: immediateExecutor,
    });
    const calls: string[] = [];
    store.addQuittedListener(() => calls.push(store.phase));

    await store.quitSafely().join();

    expect(calls).toEqual(["Stopped"]);
  });
});

describe("quitted listeners", () => {
  it("run right away when added after the store stopped", async () => {
    const store = createStore(initialState(), { threading: Threading.sync() });
    await store.quit().join();

    let called = 0;
    store.addQuittedListener(() => called++);

    expect(called).toBe(1);
  });

  it("can be removed before the store stops", async () => {
    const store = createStore(initialState(), { threading: Threading.sync() });
    let called = 0;
    const listener = () => {
      called++;
    };
    store.addQuittedListener(listener);
    store.removeQuittedListener(listener);

    await store.quit().join();

    expect(called).toBe(0);
  });
});

// ============================================================================
// Faults
// ============================================================================

describe("job faults", () => {
  it("fail the faulting job, stop the store and discard the rest", async () => {
    const { store, executor, callbacks, listener } = manualStore();

    const before = store.update(bump);
    const faulting = store.update(() => {
      throw new Error("boom");
    });
    const after = store.update(bump);
    const action = store.inspect(() => undefined);

    executor.runAll();
    const termination = await Effect.runPromise(Effect.either(store.quit().await));
    callbacks.runAll();

    expect(before.status).toBe("completed");
    expect(faulting.status).toBe("faulted");
    expect(after.status).toBe("discarded");
    expect(action.status).toBe("discarded");

    const failure = await Effect.runPromise(Effect.either(faulting.await));
    expect(Either.isLeft(failure) && failure.left._tag).toBe("JobFaultError");
    expect(Either.isLeft(termination) && termination.left._tag).toBe("EngineFaultError");
    expect(store.phase).toBe("Stopped");
    expect(listener.revisions).toEqual([0]);
  });

  it("complete actions that ran before the faulting one", async () => {
    const { store, executor } = manualStore();

    const ran = store.inspect(() => undefined);
    const faulting = store.inspect(() => {
      throw new Error("boom");
    });

    executor.runAll();
    await Effect.runPromise(Effect.either(store.quit().await));

    expect([ran.status, faulting.status]).toEqual(["completed", "faulted"]);
  });

  it("end the dedicated worker", async () => {
    const store = createStore(initialState(), {
      threading: Threading.thread(),
      callbackExecutor: immediateExecutor,
    });

    const faulting = store.update(() => {
      throw new Error("boom");
    });
    const failure = await Effect.runPromise(Effect.either(faulting.await));
    const termination = await Effect.runPromise(Effect.either(store.quit().await));

    expect(Either.isLeft(failure)).toBe(true);
    expect(Either.isLeft(termination) && termination.left._tag).toBe("EngineFaultError");
    expect(store.update(bump).status).toBe("discarded");
  });
});

describe("backend resources", () => {
  it("shuts down a pool the backend owns", async () => {
    const pool = new PoolExecutor(2, "owned-pool");
    const store = createStore(initialState(), {
      backend: (driver) => ExecutorBackend.owning(driver, pool),
      callbackExecutor: immediateExecutor,
    });

    store.update(bump);
    await store.quitSafely().join();

    expect(store.backend).toBe("dedicated-pool");
    expect(pool.isShutdown).toBe(true);
  });

  it("leaves a caller-supplied pool running", async () => {
    const pool = new PoolExecutor(1, "caller-pool");
    const store = createStore(initialState(), {
      threading: Threading.executor(pool),
      callbackExecutor: immediateExecutor,
    });

    await store.update(bump).join();
    await store.quitSafely().join();
    expect(pool.isShutdown).toBe(false);

    const ran: string[] = [];
    pool.execute(() => ran.push("after quit"));
    await Effect.runPromise(pool.shutdown());
    expect(ran).toEqual(["after quit"]);
  });

  it("leaves the shared pool running", async () => {
    const store = createStore(initialState(), {
      threading: Threading.pool(),
      callbackExecutor: immediateExecutor,
    });

    await store.update(bump).join();
    await store.quitSafely().join();

    expect(store.backend).toBe("pool");
    expect(sharedPool().isShutdown).toBe(false);
  });

  it("stops with a fault when the executor refuses a step", async () => {
    const pool = new PoolExecutor(1, "closed-pool");
    await Effect.runPromise(pool.shutdown());
    const store = createStore(initialState(), {
      threading: Threading.executor(pool),
      callbackExecutor: immediateExecutor,
    });

    const refused = store.update(bump);
    const termination = await Effect.runPromise(Effect.either(store.quit().await));

    expect(refused.status).toBe("discarded");
    expect(Either.isLeft(termination) && termination.left._tag).toBe("EngineFaultError");
    expect(store.phase).toBe("Stopped");
    expect(store.update(bump).status).toBe("discarded");
  });

  it("stops with a fault when the looper refuses a task", async () => {
    const store = createStore(initialState(), {
      threading: Threading.post({
        post: () => {
          throw new Error("looper closed");
        },
      }),
      callbackExecutor: immediateExecutor,
    });

    const refused = store.update(bump);
    const termination = await Effect.runPromise(Effect.either(store.quit().await));

    expect(refused.status).toBe("discarded");
    expect(Either.isLeft(termination) && termination.left._tag).toBe("EngineFaultError");
  });
});

describe("backend teardown", () => {
  it("reports a teardown failure on the quit handle", async () => {
    const failing: BackendFactory = (driver) => {
      const inner = new ExecutorBackend(driver, inlineExecutor, "failing");
      return {
        name: "failing",
        start: () => inner.start(),
        signal: () => inner.signal(),
        teardown: () =>
          Effect.fail(new BackendTeardownError({ backend: "failing", reason: "handle leaked" })),
      };
    };
    const store = createStore(initialState(), {
      backend: failing,
      callbackExecutor: immediateExecutor,
    });

    const applied = store.update(bump);
    const termination = await Effect.runPromise(Effect.either(store.quitSafely().await));

    expect(store.backend).toBe("failing");
    expect(applied.status).toBe("completed");
    const error = Either.isLeft(termination) ? termination.left : undefined;
    expect(error?._tag).toBe("BackendTeardownError");
    expect(error instanceof BackendTeardownError && error.reason).toBe("handle leaked");
    expect(store.phase).toBe("Stopped");
  });
});
