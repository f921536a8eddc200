/**
 * railyard/async
 *
 * Async counterparts of the railway combinators. Each accepts a Result or
 * a Promise of one, and a step that may answer synchronously or not.
 */

import type { Result, AsyncResult, MaybeAsyncResult } from "./result";
import { ok, err, messageOf } from "./result";

// =============================================================================
// Fault Boundary (async)
// =============================================================================

/**
 * Run a Result-returning thunk, converting a throw or a rejection into an error.
 *
 * @example
 * ```typescript
 * await attemptAsync(() => fetchProfile(id)); // err("socket hang up") on rejection
 * ```
 */
export function attemptAsync<T, E, C>(
  fn: () => MaybeAsyncResult<T, E, C>
): AsyncResult<T, E | string, unknown>;
export function attemptAsync<T, E, C, F>(
  fn: () => MaybeAsyncResult<T, E, C>,
  onThrow: (thrown: unknown) => F
): AsyncResult<T, E | F, unknown>;
export async function attemptAsync<T, E, C, F>(
  fn: () => MaybeAsyncResult<T, E, C>,
  onThrow?: (thrown: unknown) => F
): AsyncResult<T, E | F | string, unknown> {
  try {
    return await fn();
  } catch (thrown) {
    return err(onThrow ? onThrow(thrown) : messageOf(thrown), { cause: thrown });
  }
}

// =============================================================================
// Result Combinators (async)
// =============================================================================

/**
 * Async bind.
 *
 * @example
 * ```typescript
 * const fetchUser = async (id: string): AsyncResult<User, "NOT_FOUND"> => { ... };
 * await bindAsync(ok("user-123"), fetchUser); // AsyncResult<User, "NOT_FOUND">
 * ```
 */
export async function bindAsync<T, U, E1, E2, C1, C2>(
  result: MaybeAsyncResult<T, E1, C1>,
  fn: (value: T) => MaybeAsyncResult<U, E2, C2>
): AsyncResult<U, E1 | E2, C1 | C2> {
  const resolved = await result;
  if (!resolved.ok) {
    return resolved;
  }
  return fn(resolved.value);
}

/**
 * Async map. The transform may return a plain value or a Promise of one.
 */
export async function mapAsync<T, U, E, C>(
  result: MaybeAsyncResult<T, E, C>,
  fn: (value: T) => U | Promise<U>
): AsyncResult<U, E, C> {
  const resolved = await result;
  if (!resolved.ok) {
    return resolved;
  }
  return ok(await fn(resolved.value));
}

/**
 * Async tee: the step's success payload is dropped, its failure kept.
 *
 * @example
 * ```typescript
 * await teeAsync(ok(user), (u) => mailer.send(u.email, "Welcome")); // ok(user)
 * ```
 */
export async function teeAsync<T, E1, E2, C1, C2>(
  result: MaybeAsyncResult<T, E1, C1>,
  fn: (value: T) => MaybeAsyncResult<unknown, E2, C2>
): AsyncResult<T, E1 | E2, C1 | C2> {
  const resolved = await result;
  if (!resolved.ok) {
    return resolved;
  }
  const effect = await fn(resolved.value);
  return effect.ok ? resolved : effect;
}

/**
 * Async tryWith: a throw or rejection from `fn` becomes an error.
 */
export function tryWithAsync<T, U, E1, E2, C1, C2>(
  result: MaybeAsyncResult<T, E1, C1>,
  fn: (value: T) => MaybeAsyncResult<U, E2, C2>
): AsyncResult<U, E1 | E2 | string, unknown>;
export function tryWithAsync<T, U, E1, E2, C1, C2, F>(
  result: MaybeAsyncResult<T, E1, C1>,
  fn: (value: T) => MaybeAsyncResult<U, E2, C2>,
  onThrow: (thrown: unknown) => F
): AsyncResult<U, E1 | E2 | F, unknown>;
export async function tryWithAsync<T, U, E1, E2, C1, C2, F>(
  result: MaybeAsyncResult<T, E1, C1>,
  fn: (value: T) => MaybeAsyncResult<U, E2, C2>,
  onThrow?: (thrown: unknown) => F
): AsyncResult<U, E1 | E2 | F | string, unknown> {
  const resolved = await result;
  if (!resolved.ok) {
    return resolved;
  }
  const value = resolved.value;
  return onThrow ? attemptAsync(() => fn(value), onThrow) : attemptAsync(() => fn(value));
}

/**
 * Async inspect: awaits the observer, then returns the Result unchanged.
 */
export async function inspectAsync<T, E, C>(
  result: MaybeAsyncResult<T, E, C>,
  fn: (result: Result<T, E, C>) => void | Promise<void>
): AsyncResult<T, E, C> {
  const resolved = await result;
  await fn(resolved);
  return resolved;
}
