import { Data, type Cause } from "effect";

/**
 * A reducer or action threw while the engine was applying it.
 * Fails the completion of the job that threw.
 */
export class JobFaultError extends Data.TaggedError("JobFaultError")<{
  readonly storeId: string;
  readonly cause: Cause.Cause<unknown>;
}> {}

/**
 * The store stopped because one of its jobs faulted.
 * Reported on the quit handle.
 */
export class EngineFaultError extends Data.TaggedError("EngineFaultError")<{
  readonly storeId: string;
  readonly cause: Cause.Cause<unknown>;
}> {}

/**
 * A backend could not release a resource it owns.
 */
export class BackendTeardownError extends Data.TaggedError("BackendTeardownError")<{
  readonly backend: string;
  readonly reason: string;
}> {}

/**
 * A task was handed to a pool after it shut down.
 */
export class ExecutorShutdownError extends Data.TaggedError("ExecutorShutdownError")<{
  readonly executor: string;
}> {}

/**
 * Store defaults could not be read from the environment.
 */
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly reason: string;
}> {}

/**
 * Ways a stopped store can report its termination on the quit handle.
 */
export type TerminationError = EngineFaultError | BackendTeardownError;
