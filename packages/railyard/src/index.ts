/**
 * railyard
 *
 * Railway-oriented composition for fallible steps: every step returns a
 * Result, and the combinators route failures past the rest of the line.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { pipe, R, ok, err, type Result } from "railyard";
 *
 * const parse = (raw: string): Result<number, string> =>
 *   Number.isNaN(Number(raw)) ? err("not a number") : ok(Number(raw));
 * const positive = (n: number): Result<number, string> =>
 *   n > 0 ? ok(n) : err("not positive");
 *
 * const result = pipe(
 *   parse("42"),
 *   R.tee(positive),
 *   R.map((n: number) => n * 2)
 * ); // ok(84)
 * ```
 *
 * ## Combinators
 *
 * - `bind` - chain a step that can fail
 * - `map` - chain a step that cannot fail
 * - `tee` - run a fallible side effect, keep the value in flight
 * - `tryWith` / `tryMap` - `bind` / `map` inside a fault boundary
 * - `inspect` - observe both tracks without changing anything
 */

// =============================================================================
// Result primitives
// =============================================================================

export {
  type Ok,
  type Err,
  type Result,
  type AsyncResult,
  type MaybeAsyncResult,
  ok,
  err,
  isOk,
  isErr,
  messageOf,
  unwrap,
  unwrapOr,
  UnwrapError,
} from "./result";

// =============================================================================
// Combinators
// =============================================================================

export {
  attempt,
  bind,
  map,
  tee,
  tryWith,
  tryMap,
  inspect,
  mapError,
  match,
  R,
} from "./combinators";

export {
  attemptAsync,
  bindAsync,
  mapAsync,
  teeAsync,
  tryWithAsync,
  inspectAsync,
} from "./async";

// =============================================================================
// Composition
// =============================================================================

export { pipe } from "./pipe";
