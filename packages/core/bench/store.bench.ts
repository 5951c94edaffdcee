import { Bench, type Task } from "tinybench";
import { Data } from "effect";
import { createStore, Threading, type Executor } from "../src/index.js";

// ============================================================================
// State
// ============================================================================

class Counter extends Data.Class<{ readonly count: number }> {}

const increment = (state: Counter): Counter => new Counter({ count: state.count + 1 });

const UPDATES = 1000;

const immediate: Executor = {
  execute: (task) => {
    setImmediate(task);
  },
};

const backends: Array<[string, () => Threading]> = [
  ["thread", () => Threading.thread()],
  ["shared pool", () => Threading.pool()],
  ["dedicated pool", () => Threading.pool(2)],
  ["executor", () => Threading.executor(immediate)],
  ["sync", () => Threading.sync()],
  ["post", () => Threading.post()],
];

// ============================================================================
// Helper Functions
// ============================================================================

function formatOps(task: Task): string {
  const hz = task.result?.hz;
  return hz === undefined ? "N/A" : hz.toLocaleString(undefined, { maximumFractionDigits: 0 });
}

function formatMean(task: Task): string {
  const mean = task.result?.mean;
  return mean === undefined ? "N/A" : (mean * 1000).toFixed(3);
}

function printTable(bench: Bench): void {
  console.table(
    bench.tasks.map((task) => ({
      Task: task.name,
      "ops/sec": formatOps(task),
      "Mean (μs)": formatMean(task),
    })),
  );
}

// ============================================================================
// Verification
// ============================================================================

async function verifyBackends(): Promise<void> {
  console.log("Checking every backend applies every update\n");

  for (const [name, threading] of backends) {
    const store = createStore(new Counter({ count: 0 }), {
      threading: threading(),
      history: { enabled: false },
    });
    let last = 0;
    store.subscribe((state) => {
      last = state.count;
    });
    for (let i = 0; i < UPDATES; i++) store.update(increment);
    await store.quitSafely().join();
    await store.awaitDelivery();

    console.log(`  ${name.padEnd(16)} ${last === UPDATES ? "ok" : `expected ${UPDATES}, saw ${last}`}`);
  }
  console.log();
}

// ============================================================================
// Run Benchmarks
// ============================================================================

async function main(): Promise<void> {
  await verifyBackends();

  // -------------------------------------------------------------------------
  // Store lifecycle
  // -------------------------------------------------------------------------
  console.log("STORE LIFECYCLE (create + quit)\n");

  const lifecycleBench = new Bench({ time: 200, warmupTime: 50 });
  for (const [name, threading] of backends) {
    lifecycleBench.add(name, async () => {
      const store = createStore(new Counter({ count: 0 }), { threading: threading() });
      await store.quit().join();
    });
  }
  await lifecycleBench.run();
  printTable(lifecycleBench);

  // -------------------------------------------------------------------------
  // Update throughput
  // -------------------------------------------------------------------------
  console.log(`\nUPDATES (${UPDATES} reducers, then a graceful quit)\n`);

  const updateBench = new Bench({ time: 200, warmupTime: 50 });
  for (const [name, threading] of backends) {
    updateBench.add(name, async () => {
      const store = createStore(new Counter({ count: 0 }), { threading: threading() });
      for (let i = 0; i < UPDATES; i++) store.update(increment);
      await store.quitSafely().join();
    });
  }
  await updateBench.run();
  printTable(updateBench);

  // -------------------------------------------------------------------------
  // Listeners
  // -------------------------------------------------------------------------
  console.log("\nWITH LISTENERS (5 listeners, one update awaited at a time)\n");

  const listenerBench = new Bench({ time: 200, warmupTime: 50 });
  for (const [name, threading] of backends) {
    listenerBench.add(name, async () => {
      const store = createStore(new Counter({ count: 0 }), { threading: threading() });
      for (let i = 0; i < 5; i++) store.subscribe(() => undefined);
      for (let i = 0; i < 50; i++) await store.update(increment).join();
      await store.quitSafely().join();
      await store.awaitDelivery();
    });
  }
  await listenerBench.run();
  printTable(listenerBench);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
