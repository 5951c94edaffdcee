import { Effect, Logger } from "effect";
import { getDefaults } from "./config.js";

/**
 * Runs a log effect from synchronous code, through the pretty logger and
 * the configured minimum level.
 */
export function runLog(log: Effect.Effect<void>, storeId?: string): void {
  const annotated = storeId === undefined ? log : Effect.annotateLogs(log, "store", storeId);
  Effect.runSync(
    annotated.pipe(
      Logger.withMinimumLogLevel(getDefaults().logLevel),
      Effect.provide(Logger.pretty),
    ),
  );
}
