/**
 * Shared result primitives threaded through the broadcast and relay paths. A
 * failure keeps both the error and its stack trace so the hub can report it to
 * the host without re-throwing across asynchronous boundaries.
 */

/** Maximum number of UTF-16 code units kept for a reported error message. */
export const ERROR_TEXT_MAX_LENGTH = 2_000;

/** Successful branch of {@link Outcome}. */
export interface Success<T> {
  ok: true;
  value: T;
}

/** Failed branch of {@link Outcome}. */
export interface Failure {
  ok: false;
  error: Error;
  /** Stack trace captured where the failure was observed. */
  trace: string;
}

/** Tagged result: either the value or the captured failure. */
export type Outcome<T> = Success<T> | Failure;

export function success<T>(value: T): Success<T> {
  return { ok: true, value };
}

/**
 * Builds a {@link Failure} from any thrown value. Non-error values are wrapped
 * so callers can always rely on `error.message`.
 */
export function failure(cause: unknown): Failure {
  const error = toError(cause);
  return { ok: false, error, trace: error.stack ?? "" };
}

/** Runs the promise to completion and captures the outcome instead of throwing. */
export async function settle<T>(operation: Promise<T>): Promise<Outcome<T>> {
  try {
    return success(await operation);
  } catch (error) {
    return failure(error);
  }
}

export function toError(cause: unknown): Error {
  if (cause instanceof Error) {
    return cause;
  }
  if (typeof cause === "string" && cause.trim().length > 0) {
    return new Error(cause);
  }
  return new Error(`non-error value thrown: ${String(cause)}`);
}

/**
 * Collapses surrounding whitespace and bounds the length of an error message so
 * notifications sent to the host stay readable.
 */
export function normaliseErrorMessage(text: string, fallback = "unexpected error"): string {
  const trimmed = text.trim();
  const base = trimmed.length === 0 ? fallback : trimmed;
  if (base.length <= ERROR_TEXT_MAX_LENGTH) {
    return base;
  }
  return `${base.slice(0, ERROR_TEXT_MAX_LENGTH - 1)}…`;
}

export function describeError(cause: unknown): string {
  return normaliseErrorMessage(toError(cause).message);
}
