/**
 * railyard/result
 *
 * Core Result primitives: the two-track value every combinator threads.
 * The combinators themselves live in combinators.ts and async.ts.
 */

// =============================================================================
// Core Result Types
// =============================================================================

/**
 * Represents a successful result.
 * Use `ok(value)` to create instances.
 */
export type Ok<T> = { readonly ok: true; readonly value: T };

/**
 * Represents a failed result.
 * Use `err(error)` to create instances.
 */
export type Err<E, C = unknown> = { readonly ok: false; readonly error: E; readonly cause?: C };

/**
 * Represents a successful computation or a failed one.
 */
export type Result<T, E = unknown, C = unknown> = Ok<T> | Err<E, C>;

/**
 * A Promise that resolves to a Result.
 */
export type AsyncResult<T, E = unknown, C = unknown> = Promise<Result<T, E, C>>;

/**
 * Either a Result or a Promise of one. Accepted by every async combinator.
 */
export type MaybeAsyncResult<T, E = unknown, C = unknown> = Result<T, E, C> | AsyncResult<T, E, C>;

// =============================================================================
// Result Constructors
// =============================================================================

/**
 * Creates a successful Result.
 */
export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });

/**
 * Creates a failed Result.
 *
 * @example
 * ```typescript
 * err("NOT_FOUND");
 * err("PARSE_FAILED", { cause: syntaxError });
 * ```
 */
export const err = <E, C = unknown>(error: E, options?: { cause?: C }): Err<E, C> =>
  options?.cause !== undefined ? { ok: false, error, cause: options.cause } : { ok: false, error };

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Checks if a Result is successful.
 */
export const isOk = <T, E, C>(r: Result<T, E, C>): r is Ok<T> => r.ok;

/**
 * Checks if a Result is a failure.
 */
export const isErr = <T, E, C>(r: Result<T, E, C>): r is Err<E, C> => !r.ok;

// =============================================================================
// Fault Messages
// =============================================================================

const UNKNOWN_FAULT = "Unknown error";

/**
 * Turns anything that was thrown (or any error value) into a non-empty message.
 *
 * `Error` instances give their `message` (their `name` when the message is
 * empty), strings are used as-is, objects with a string `message` property
 * give that property, and everything else goes through `String()`.
 *
 * @example
 * ```typescript
 * messageOf(new Error("boom")); // "boom"
 * messageOf("disk full"); // "disk full"
 * messageOf({ type: "NOT_FOUND", message: "no such user" }); // "no such user"
 * messageOf(42); // "42"
 * ```
 */
export function messageOf(thrown: unknown): string {
  if (thrown instanceof Error) {
    return thrown.message || thrown.name || UNKNOWN_FAULT;
  }
  if (typeof thrown === "string") {
    return thrown || UNKNOWN_FAULT;
  }
  if (typeof thrown === "object" && thrown !== null && "message" in thrown && typeof thrown.message === "string") {
    return thrown.message || UNKNOWN_FAULT;
  }
  try {
    return String(thrown) || UNKNOWN_FAULT;
  } catch {
    // Objects without a prototype cannot be converted to a primitive.
    return UNKNOWN_FAULT;
  }
}

// =============================================================================
// Unwrap Utilities
// =============================================================================

/**
 * Error thrown when `unwrap()` is called on an error Result.
 *
 * Prefer `unwrapOr` or `match` outside tests and program edges.
 */
export class UnwrapError<E = unknown, C = unknown> extends Error {
  constructor(
    public readonly error: E,
    public readonly cause?: C
  ) {
    super(`Unwrap called on an error result: ${messageOf(error)}`);
    this.name = "UnwrapError";
  }
}

/**
 * Unwraps a Result, throwing an `UnwrapError` if it's a failure.
 *
 * @example
 * ```typescript
 * unwrap(ok(5)); // 5
 * unwrap(err("NOT_FOUND")); // throws UnwrapError
 * ```
 */
export const unwrap = <T, E, C>(r: Result<T, E, C>): T => {
  if (r.ok) return r.value;
  throw new UnwrapError<E, C>(r.error, r.cause);
};

/**
 * Unwraps a Result, returning a default value if it's a failure.
 */
export const unwrapOr = <T, E, C>(r: Result<T, E, C>, defaultValue: T): T =>
  r.ok ? r.value : defaultValue;
