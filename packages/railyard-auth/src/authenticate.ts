/**
 * The authentication pipeline.
 *
 * ```
 * validate -> lookup -> check password -> notify -> record history -> audit log -> response
 *   (ok)      bind          tee             tee          tee             inspect       map
 * ```
 *
 * Each step runs only while every step before it succeeded, and wraps its
 * own dependency call in a fault boundary. The audit log runs on both
 * tracks and cannot turn a failure into a success. Logging and event
 * hooks are guarded when options are resolved, so neither can throw here.
 */

import { bindAsync, inspectAsync, mapAsync, pipe, R, teeAsync, type AsyncResult, type Result } from "railyard";
import type { AsyncAuthDeps, AuthDeps, AuthenticatedPair, Credentials, User } from "./types";
import type { AuthError } from "./errors";
import { resolveAuthOptions, type AuthOptions, type ResolvedAuthOptions } from "./options";
import {
  buildResponse,
  checkPasswordStep,
  logOutcome,
  lookupStep,
  notifyStep,
  recordHistoryStep,
  validateCredentials,
  type AuthContext,
} from "./steps";
import {
  checkPasswordStepAsync,
  lookupStepAsync,
  notifyStepAsync,
  recordHistoryStepAsync,
  type AsyncAuthContext,
} from "./steps-async";

export type Authenticator = (credentials: Credentials) => Result<User, AuthError>;
export type AsyncAuthenticator = (credentials: Credentials) => AsyncResult<User, AuthError>;

function start(credentials: Credentials, options: ResolvedAuthOptions): number {
  const startedAt = options.clock();
  options.onEvent?.({ type: "auth_start", username: credentials.username, ts: startedAt });
  return startedAt;
}

// =============================================================================
// Synchronous pipeline
// =============================================================================

function runAuthentication(credentials: Credentials, ctx: AuthContext): Result<User, AuthError> {
  const { options } = ctx;
  const startedAt = start(credentials, options);

  return pipe(
    validateCredentials(credentials),
    R.bind((valid: Credentials) => lookupStep(valid, ctx)),
    R.tee((pair: AuthenticatedPair) => checkPasswordStep(pair, ctx)),
    R.tee((pair: AuthenticatedPair) => notifyStep(pair, ctx)),
    R.tee((pair: AuthenticatedPair) => recordHistoryStep(pair, ctx)),
    R.inspect((outcome: Result<AuthenticatedPair, AuthError>) => logOutcome(outcome, options, startedAt)),
    R.map(buildResponse)
  );
}

/**
 * Authenticate a username/password pair.
 *
 * Never throws for a collaborator's failure: a collaborator that throws
 * comes back as an `UNEXPECTED` error naming it. A throwing logger or
 * `onEvent` hook does not change the outcome.
 *
 * @throws {AuthConfigError} Only for unusable `options`
 *
 * @example
 * ```typescript
 * const result = authenticate(
 *   { username: "alice", password: "secret" },
 *   { lookupUser, checkPassword, notify },
 *   { logger: createConsoleLogger() }
 * );
 * if (result.ok) {
 *   console.log(`Welcome ${result.value.name}`);
 * } else {
 *   console.log(describeAuthError(result.error));
 * }
 * ```
 */
export function authenticate(
  credentials: Credentials,
  deps: AuthDeps,
  options?: AuthOptions
): Result<User, AuthError> {
  return runAuthentication(credentials, { deps, options: resolveAuthOptions(options) });
}

/**
 * Bind collaborators and options once; options are validated here.
 *
 * @example
 * ```typescript
 * const login = createAuthenticator({ lookupUser, checkPassword, notify });
 * login({ username: "alice", password: "secret" });
 * ```
 */
export function createAuthenticator(deps: AuthDeps, options?: AuthOptions): Authenticator {
  const ctx: AuthContext = { deps, options: resolveAuthOptions(options) };
  return (credentials) => runAuthentication(credentials, ctx);
}

// =============================================================================
// Async pipeline
// =============================================================================

async function runAuthenticationAsync(
  credentials: Credentials,
  ctx: AsyncAuthContext
): AsyncResult<User, AuthError> {
  const { options } = ctx;
  const startedAt = start(credentials, options);

  const found = await bindAsync(validateCredentials(credentials), (valid: Credentials) =>
    lookupStepAsync(valid, ctx)
  );
  const checked = await teeAsync(found, (pair: AuthenticatedPair) => checkPasswordStepAsync(pair, ctx));
  const notified = await teeAsync(checked, (pair: AuthenticatedPair) => notifyStepAsync(pair, ctx));
  const recorded = await teeAsync(notified, (pair: AuthenticatedPair) => recordHistoryStepAsync(pair, ctx));
  const logged = await inspectAsync(recorded, (outcome: Result<AuthenticatedPair, AuthError>) =>
    logOutcome(outcome, options, startedAt)
  );
  return mapAsync(logged, buildResponse);
}

/**
 * `authenticate` for collaborators that answer with Promises.
 * A rejection is treated like a throw.
 */
export function authenticateAsync(
  credentials: Credentials,
  deps: AsyncAuthDeps,
  options?: AuthOptions
): AsyncResult<User, AuthError> {
  return runAuthenticationAsync(credentials, { deps, options: resolveAuthOptions(options) });
}

export function createAsyncAuthenticator(deps: AsyncAuthDeps, options?: AuthOptions): AsyncAuthenticator {
  const ctx: AsyncAuthContext = { deps, options: resolveAuthOptions(options) };
  return (credentials) => runAuthenticationAsync(credentials, ctx);
}
