/**
 * railyard/pipe
 *
 * Threads a Result through the curried combinators in `R`, first step
 * first. Typed for up to seven steps, which covers the longest pipeline
 * in the workspace; split a longer line into named sub-pipelines.
 *
 * @example
 * ```typescript
 * const result = pipe(
 *   validate(input),
 *   R.bind(findUser),
 *   R.tee(checkPassword),
 *   R.map(toResponse)
 * );
 * ```
 */

type Step<In, Out> = (input: In) => Out;

export function pipe<S0>(start: S0): S0;
export function pipe<S0, S1>(start: S0, s1: Step<S0, S1>): S1;
export function pipe<S0, S1, S2>(start: S0, s1: Step<S0, S1>, s2: Step<S1, S2>): S2;
export function pipe<S0, S1, S2, S3>(
  start: S0,
  s1: Step<S0, S1>,
  s2: Step<S1, S2>,
  s3: Step<S2, S3>
): S3;
export function pipe<S0, S1, S2, S3, S4>(
  start: S0,
  s1: Step<S0, S1>,
  s2: Step<S1, S2>,
  s3: Step<S2, S3>,
  s4: Step<S3, S4>
): S4;
export function pipe<S0, S1, S2, S3, S4, S5>(
  start: S0,
  s1: Step<S0, S1>,
  s2: Step<S1, S2>,
  s3: Step<S2, S3>,
  s4: Step<S3, S4>,
  s5: Step<S4, S5>
): S5;
export function pipe<S0, S1, S2, S3, S4, S5, S6>(
  start: S0,
  s1: Step<S0, S1>,
  s2: Step<S1, S2>,
  s3: Step<S2, S3>,
  s4: Step<S3, S4>,
  s5: Step<S4, S5>,
  s6: Step<S5, S6>
): S6;
export function pipe<S0, S1, S2, S3, S4, S5, S6, S7>(
  start: S0,
  s1: Step<S0, S1>,
  s2: Step<S1, S2>,
  s3: Step<S2, S3>,
  s4: Step<S3, S4>,
  s5: Step<S4, S5>,
  s6: Step<S5, S6>,
  s7: Step<S6, S7>
): S7;
export function pipe(start: unknown, ...steps: Step<unknown, unknown>[]): unknown {
  let current = start;
  for (const step of steps) {
    current = step(current);
  }
  return current;
}
