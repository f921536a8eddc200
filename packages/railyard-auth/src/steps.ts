/**
 * The named steps of the authentication pipeline.
 *
 * Every step is written in the fn(args, ctx) form and only handles its own
 * success path: skipping after an earlier failure is left entirely to the
 * combinators that compose the steps.
 */

import { attempt, err, map, mapError, messageOf, ok, type Result } from "railyard";
import type { AuthDeps, AuthenticatedPair, Credentials, User } from "./types";
import {
  credentialMismatch,
  invalidInput,
  lookupFailed,
  notifyFailed,
  unexpectedIn,
  type AuthError,
} from "./errors";
import type { ResolvedAuthOptions } from "./options";

/**
 * Dependencies and resolved options, bound once per authenticator.
 */
export interface AuthContext<D = AuthDeps> {
  readonly deps: D;
  readonly options: ResolvedAuthOptions;
}

const isBlank = (value: string): boolean => value.trim() === "";

// =============================================================================
// Validate
// =============================================================================

/**
 * First step: both fields must hold something other than whitespace.
 */
export function validateCredentials(credentials: Credentials): Result<Credentials, AuthError> {
  if (isBlank(credentials.username) || isBlank(credentials.password)) {
    return err(invalidInput());
  }
  return ok(credentials);
}

// =============================================================================
// Settling dependency answers (shared with the async steps)
// =============================================================================

/** Pair the user found with the password the caller supplied. */
export const settleLookup = (
  found: Result<User, AuthError>,
  credentials: Credentials
): Result<AuthenticatedPair, AuthError> => map(found, (user) => ({ user, password: credentials.password }));

/**
 * Apply the notify failure policy. Under "ignore" any failure, thrown
 * ones included, is logged and dropped.
 */
export function settleNotify(
  sent: Result<void, AuthError>,
  user: User,
  options: ResolvedAuthOptions
): Result<void, AuthError> {
  if (sent.ok || options.notifyFailure === "fail") {
    return sent;
  }
  options.logger.warn("Login confirmation failed, continuing", {
    userId: user.id,
    error: sent.error.message,
  });
  return ok(undefined);
}

/** History is best-effort: a failure is logged, never propagated. */
export function settleHistory(
  recorded: Result<void, string | AuthError>,
  user: User,
  options: ResolvedAuthOptions
): Result<void, never> {
  if (!recorded.ok) {
    options.logger.warn("History record failed", { userId: user.id, error: messageOf(recorded.error) });
  }
  return ok(undefined);
}

// =============================================================================
// Steps
// =============================================================================

/**
 * Each step puts only its own dependency call inside the fault boundary;
 * logging stays outside it.
 */
export function lookupStep(
  credentials: Credentials,
  ctx: AuthContext
): Result<AuthenticatedPair, AuthError> {
  const { lookupUser } = ctx.deps;
  ctx.options.logger.debug("Looking up user", { username: credentials.username });
  const found = attempt(
    () => mapError(lookupUser(credentials.username), lookupFailed),
    unexpectedIn("lookupUser")
  );
  return settleLookup(found, credentials);
}

export function checkPasswordStep(pair: AuthenticatedPair, ctx: AuthContext): Result<void, AuthError> {
  const { checkPassword } = ctx.deps;
  return attempt(
    () => mapError(checkPassword(pair.user.password, pair.password), credentialMismatch),
    unexpectedIn("checkPassword")
  );
}

export function notifyStep(pair: AuthenticatedPair, ctx: AuthContext): Result<void, AuthError> {
  const { notify } = ctx.deps;
  const sent = attempt(
    () => mapError(notify(pair.user.email, ctx.options.confirmationMessage), notifyFailed),
    unexpectedIn("notify")
  );
  return settleNotify(sent, pair.user, ctx.options);
}

export function recordHistoryStep(pair: AuthenticatedPair, ctx: AuthContext): Result<void, never> {
  const { recordHistory } = ctx.deps;
  if (!recordHistory) {
    return ok(undefined);
  }
  const recorded = attempt(
    () => mapError(recordHistory(pair.user), messageOf),
    unexpectedIn("recordHistory")
  );
  return settleHistory(recorded, pair.user, ctx.options);
}

// =============================================================================
// Audit log and response
// =============================================================================

/**
 * Runs on both tracks. Logs the outcome and emits the terminal event;
 * the outcome itself is left alone.
 */
export function logOutcome(
  outcome: Result<AuthenticatedPair, AuthError>,
  options: ResolvedAuthOptions,
  startedAt: number
): void {
  const ts = options.clock();
  const durationMs = ts - startedAt;

  if (outcome.ok) {
    const userId = outcome.value.user.id;
    options.logger.info("Authentication succeeded", { userId });
    options.onEvent?.({ type: "auth_success", userId, ts, durationMs });
    return;
  }

  options.logger.warn("Authentication failed", {
    type: outcome.error.type,
    error: outcome.error.message,
  });
  options.onEvent?.({ type: "auth_error", error: outcome.error, ts, durationMs });
}

/** Drop the supplied password from what goes back to the caller. */
export const buildResponse = (pair: AuthenticatedPair): User => pair.user;
