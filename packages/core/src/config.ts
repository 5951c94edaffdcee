import { Config, Effect, Either, LogLevel } from "effect";
import { ConfigurationError } from "./errors.js";
import { Threading } from "./types.js";

// ============================================================================
// Defaults
// ============================================================================

/**
 * Process-wide settings a store falls back to when its options leave
 * something out. Read once, at the first store construction.
 */
export interface StoreDefaults {
  readonly threading: Threading;
  /**
   * Workers in the shared pool. Read when the pool is first created;
   * changing it afterwards does not resize the pool.
   */
  readonly poolSize: number;
  /** Whether new stores record history from the start. */
  readonly history: boolean;
  readonly logLevel: LogLevel.LogLevel;
}

const ThreadingName = Config.literal("thread", "pool", "sync", "post")("SERIALSTORE_THREADING");

/**
 * Environment variables behind {@link StoreDefaults}.
 */
export const StoreDefaultsConfig = Config.all({
  threading: ThreadingName.pipe(Config.withDefault("pool" as const)),
  poolSize: Config.integer("SERIALSTORE_POOL_SIZE").pipe(
    Config.validate({
      message: "Expected a pool size of at least 1",
      validation: (size: number) => size >= 1,
    }),
    Config.withDefault(4),
  ),
  history: Config.boolean("SERIALSTORE_HISTORY").pipe(Config.withDefault(false)),
  logLevel: Config.logLevel("SERIALSTORE_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Warning)),
});

const threadingFromName = (name: "thread" | "pool" | "sync" | "post"): Threading => {
  switch (name) {
    case "thread":
      return Threading.thread();
    case "pool":
      return Threading.pool();
    case "sync":
      return Threading.sync();
    case "post":
      return Threading.post();
  }
};

/**
 * Reads {@link StoreDefaults} from the current `ConfigProvider`.
 *
 * @example
 * ```ts
 * const defaults = Effect.runSync(
 *   loadDefaults.pipe(Effect.withConfigProvider(ConfigProvider.fromMap(env))),
 * );
 * ```
 */
export const loadDefaults: Effect.Effect<StoreDefaults, ConfigurationError> = Effect.gen(function* () {
  const raw = yield* StoreDefaultsConfig;
  return {
    threading: threadingFromName(raw.threading),
    poolSize: raw.poolSize,
    history: raw.history,
    logLevel: raw.logLevel,
  };
}).pipe(Effect.mapError((error) => new ConfigurationError({ reason: String(error) })));

let current: StoreDefaults | undefined;

/**
 * The defaults in effect, loading them from the environment on first use.
 *
 * @throws ConfigurationError when an environment variable is malformed
 */
export function getDefaults(): StoreDefaults {
  if (current === undefined) {
    const loaded = Effect.runSync(Effect.either(loadDefaults));
    if (Either.isLeft(loaded)) {
      throw loaded.left;
    }
    current = loaded.right;
  }
  return current;
}

/**
 * Overrides some defaults for every store created afterwards.
 * `poolSize` only takes effect if the shared pool has not been created yet.
 */
export function configure(patch: Partial<StoreDefaults>): StoreDefaults {
  current = { ...getDefaults(), ...patch };
  return current;
}

/**
 * Forgets configured defaults; the next read loads them again.
 */
export function resetDefaults(): void {
  current = undefined;
}
