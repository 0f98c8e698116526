export interface Ok<T> {
  status: "ok";
  value: T;
}

/** The call failed but the pipeline continues with `fallback`. */
export interface Recoverable<T> {
  status: "recoverable";
  cause: Error;
  fallback: T;
}

/** The call failed in a way that ends the batch. */
export interface Fatal {
  status: "fatal";
  cause: Error;
}

export type Outcome<T> = Ok<T> | Recoverable<T> | Fatal;

/** Outcome of a call that can degrade but never ends the batch. */
export type Settled<T> = Ok<T> | Recoverable<T>;

export function ok<T>(value: T): Ok<T> {
  return { status: "ok", value };
}

export function recoverable<T>(cause: Error, fallback: T): Recoverable<T> {
  return { status: "recoverable", cause, fallback };
}

export function fatal(cause: Error): Fatal {
  return { status: "fatal", cause };
}

/**
 * Value to continue with: the result on success, the fallback otherwise.
 */
export function settledValue<T>(outcome: Settled<T>): T {
  return outcome.status === "ok" ? outcome.value : outcome.fallback;
}
