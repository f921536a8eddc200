/**
 * railyard/combinators
 *
 * The synchronous railway combinators. Each takes the Result in flight
 * first and the step second; the curried forms in `R` take the step
 * first so they slot into `pipe()`.
 *
 * Every combinator leaves a failure untouched: once a step fails, the
 * remaining value-transforming steps are skipped without the steps
 * themselves having to check.
 */

import type { Result } from "./result";
import { ok, err, messageOf } from "./result";

// =============================================================================
// Fault Boundary
// =============================================================================

/**
 * Run a Result-returning thunk, converting anything it throws into an error.
 *
 * Without `onThrow` the error is the thrown value's message (see `messageOf`).
 * The thrown value itself is kept as the error's `cause`.
 *
 * @example
 * ```typescript
 * attempt(() => legacyParse(input)); // err("Unexpected token") instead of a throw
 * attempt(() => legacyParse(input), () => "PARSE_FAILED" as const);
 * ```
 */
export function attempt<T, E, C>(fn: () => Result<T, E, C>): Result<T, E | string, unknown>;
export function attempt<T, E, C, F>(
  fn: () => Result<T, E, C>,
  onThrow: (thrown: unknown) => F
): Result<T, E | F, unknown>;
export function attempt<T, E, C, F>(
  fn: () => Result<T, E, C>,
  onThrow?: (thrown: unknown) => F
): Result<T, E | F | string, unknown> {
  try {
    return fn();
  } catch (thrown) {
    return err(onThrow ? onThrow(thrown) : messageOf(thrown), { cause: thrown });
  }
}

// =============================================================================
// Result Combinators (sync)
// =============================================================================

/**
 * Chain a step that can itself fail (short-circuits on error).
 *
 * The step's Result is returned as-is, so nothing is double-wrapped.
 *
 * @example
 * ```typescript
 * const findUser = (name: string): Result<User, string> => ...;
 *
 * bind(ok("alice"), findUser); // findUser("alice")
 * bind(err("Invalid params"), findUser); // err("Invalid params"), findUser not called
 * ```
 */
export function bind<T, U, E1, E2, C1, C2>(
  result: Result<T, E1, C1>,
  fn: (value: T) => Result<U, E2, C2>
): Result<U, E1 | E2, C1 | C2> {
  if (!result.ok) {
    return result;
  }
  return fn(result.value);
}

/**
 * Transform the success value with a step that cannot fail.
 *
 * @example
 * ```typescript
 * map(ok(5), (x) => x * 2); // ok(10)
 * map(err("not found"), (x) => x * 2); // err("not found")
 * ```
 */
export function map<T, U, E, C>(result: Result<T, E, C>, fn: (value: T) => U): Result<U, E, C> {
  if (!result.ok) {
    return result;
  }
  return ok(fn(result.value));
}

/**
 * Run a side-effecting step that can fail, keeping the value in flight.
 *
 * When the step succeeds its own payload is dropped and the original
 * `result` object is returned. When it fails, its failure replaces the
 * success.
 *
 * @example
 * ```typescript
 * const sendEmail = (user: User): Result<{ messageId: string }, string> => ...;
 *
 * tee(ok(user), sendEmail); // the same ok(user) when the email went out
 * tee(ok(user), sendEmail); // err("SMTP down") when it did not
 * ```
 */
export function tee<T, E1, E2, C1, C2>(
  result: Result<T, E1, C1>,
  fn: (value: T) => Result<unknown, E2, C2>
): Result<T, E1 | E2, C1 | C2> {
  if (!result.ok) {
    return result;
  }
  const effect = fn(result.value);
  return effect.ok ? result : effect;
}

/**
 * `bind` inside a fault boundary: a throw from `fn` becomes an error.
 *
 * Use it to adapt operations that report failure by throwing rather than
 * by returning a Result.
 *
 * @example
 * ```typescript
 * tryWith(ok(id), (id) => ok(legacyRepo.load(id))); // err("connection refused") if load throws
 * ```
 */
export function tryWith<T, U, E1, E2, C1, C2>(
  result: Result<T, E1, C1>,
  fn: (value: T) => Result<U, E2, C2>
): Result<U, E1 | E2 | string, unknown>;
export function tryWith<T, U, E1, E2, C1, C2, F>(
  result: Result<T, E1, C1>,
  fn: (value: T) => Result<U, E2, C2>,
  onThrow: (thrown: unknown) => F
): Result<U, E1 | E2 | F, unknown>;
export function tryWith<T, U, E1, E2, C1, C2, F>(
  result: Result<T, E1, C1>,
  fn: (value: T) => Result<U, E2, C2>,
  onThrow?: (thrown: unknown) => F
): Result<U, E1 | E2 | F | string, unknown> {
  if (!result.ok) {
    return result;
  }
  const value = result.value;
  return onThrow ? attempt(() => fn(value), onThrow) : attempt(() => fn(value));
}

/**
 * `map` inside a fault boundary: a throw from `fn` becomes an error.
 *
 * @example
 * ```typescript
 * tryMap(ok("{}"), JSON.parse); // ok({})
 * tryMap(ok("{"), JSON.parse); // err("Expected property name or '}' in JSON at position 1")
 * ```
 */
export function tryMap<T, U, E, C>(
  result: Result<T, E, C>,
  fn: (value: T) => U
): Result<U, E | string, unknown>;
export function tryMap<T, U, E, C, F>(
  result: Result<T, E, C>,
  fn: (value: T) => U,
  onThrow: (thrown: unknown) => F
): Result<U, E | F, unknown>;
export function tryMap<T, U, E, C, F>(
  result: Result<T, E, C>,
  fn: (value: T) => U,
  onThrow?: (thrown: unknown) => F
): Result<U, E | F | string, unknown> {
  const lift = (value: T): Result<U, never, never> => ok(fn(value));
  return onThrow ? tryWith(result, lift, onThrow) : tryWith(result, lift);
}

/**
 * Observe a Result on either track without changing it.
 *
 * Used for logging and auditing: the observer sees successes and failures
 * alike and its return value is ignored.
 *
 * @example
 * ```typescript
 * inspect(result, (r) => (r.ok ? log.info("done") : log.warn(String(r.error))));
 * ```
 */
export function inspect<T, E, C>(
  result: Result<T, E, C>,
  fn: (result: Result<T, E, C>) => void
): Result<T, E, C> {
  fn(result);
  return result;
}

/**
 * Transform the error value, keeping its cause.
 *
 * @example
 * ```typescript
 * mapError(err("not found"), (message) => ({ type: "NOT_FOUND", message }));
 * // err({ type: "NOT_FOUND", message: "not found" })
 * ```
 */
export function mapError<T, E1, E2, C>(
  result: Result<T, E1, C>,
  fn: (error: E1) => E2
): Result<T, E2, C> {
  if (result.ok) {
    return result;
  }
  return err(fn(result.error), { cause: result.cause });
}

/**
 * Pattern match on Result.
 *
 * @example
 * ```typescript
 * match(ok(5), {
 *   ok: (x) => `Success: ${x}`,
 *   err: (e) => `Error: ${e}`,
 * }); // "Success: 5"
 * ```
 */
export function match<T, E, U, C>(
  result: Result<T, E, C>,
  patterns: { ok: (value: T) => U; err: (error: E, cause?: C) => U }
): U {
  if (result.ok) {
    return patterns.ok(result.value);
  }
  return patterns.err(result.error, result.cause);
}

// =============================================================================
// Pipeable Result Functions (R namespace)
// =============================================================================

/**
 * Curried combinators for use in pipe().
 *
 * The returned functions stay generic in the incoming error and cause, so
 * error types accumulate as the pipeline grows.
 *
 * @example
 * ```typescript
 * import { pipe, R } from "railyard";
 *
 * const result = pipe(
 *   parseCredentials(input),
 *   R.bind(findUser),
 *   R.tee(checkPassword),
 *   R.map((user) => user.id)
 * );
 * ```
 */
export const R = {
  /** Curried bind for use in pipe() */
  bind:
    <T, U, E2, C2>(fn: (value: T) => Result<U, E2, C2>) =>
    <E1, C1>(result: Result<T, E1, C1>): Result<U, E1 | E2, C1 | C2> =>
      bind(result, fn),

  /** Curried map for use in pipe() */
  map:
    <T, U>(fn: (value: T) => U) =>
    <E, C>(result: Result<T, E, C>): Result<U, E, C> =>
      map(result, fn),

  /** Curried tee for use in pipe() */
  tee:
    <T, E2, C2>(fn: (value: T) => Result<unknown, E2, C2>) =>
    <E1, C1>(result: Result<T, E1, C1>): Result<T, E1 | E2, C1 | C2> =>
      tee(result, fn),

  /** Curried tryWith for use in pipe() */
  tryWith:
    <T, U, E2, C2, F>(fn: (value: T) => Result<U, E2, C2>, onThrow: (thrown: unknown) => F) =>
    <E1, C1>(result: Result<T, E1, C1>): Result<U, E1 | E2 | F, unknown> =>
      tryWith(result, fn, onThrow),

  /** Curried tryMap for use in pipe() */
  tryMap:
    <T, U, F>(fn: (value: T) => U, onThrow: (thrown: unknown) => F) =>
    <E, C>(result: Result<T, E, C>): Result<U, E | F, unknown> =>
      tryMap(result, fn, onThrow),

  /** Curried inspect for use in pipe() */
  inspect:
    <T, E, C>(fn: (result: Result<T, E, C>) => void) =>
    (result: Result<T, E, C>): Result<T, E, C> =>
      inspect(result, fn),

  /** Curried mapError for use in pipe() */
  mapError:
    <E1, E2>(fn: (error: E1) => E2) =>
    <T, C>(result: Result<T, E1, C>): Result<T, E2, C> =>
      mapError(result, fn),

  /** Curried match for use in pipe() */
  match:
    <T, E, U, C>(patterns: { ok: (value: T) => U; err: (error: E, cause?: C) => U }) =>
    (result: Result<T, E, C>): U =>
      match(result, patterns),
};
