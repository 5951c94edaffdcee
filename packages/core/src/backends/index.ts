import { inlineExecutor, microtaskLooper, PoolExecutor, sharedPool } from "../executors.js";
import type { Threading } from "../types.js";
import { CooperativeBackend } from "./cooperative.js";
import { DedicatedBackend } from "./dedicated.js";
import { ExecutorBackend } from "./executor.js";
import type { Backend, CycleDriver } from "./types.js";

export * from "./types.js";
export { CooperativeBackend } from "./cooperative.js";
export { DedicatedBackend } from "./dedicated.js";
export { ExecutorBackend } from "./executor.js";

/**
 * Picks the backend for a threading option.
 */
export function createBackend(threading: Threading, driver: CycleDriver): Backend {
  switch (threading._tag) {
    case "Thread":
      return new DedicatedBackend(driver);
    case "Pool":
      return threading.size === undefined
        ? new ExecutorBackend(driver, sharedPool(), "pool")
        : ExecutorBackend.owning(driver, new PoolExecutor(threading.size, `${driver.storeId}-pool`));
    case "Executor":
      return new ExecutorBackend(driver, threading.executor, "executor");
    case "Sync":
      return new ExecutorBackend(driver, inlineExecutor, "sync");
    case "Post":
      return new CooperativeBackend(driver, threading.looper ?? microtaskLooper);
  }
}
