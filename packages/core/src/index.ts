/**
 * serialstore
 *
 * A single-writer state container: any caller submits reducers and
 * actions, one engine applies them in order, listeners see each changed
 * state exactly once and in order.
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./completion.js";
export * from "./history.js";
export * from "./subject.js";
export * from "./lifecycle.js";
export * from "./engine.js";
export * from "./job-queue.js";
export * from "./executors.js";
export * from "./config.js";
export * from "./backends/index.js";
export * from "./store.js";
