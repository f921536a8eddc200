/**
 * Async versions of the dependency steps, for collaborators that do I/O.
 * They settle answers exactly like the synchronous steps.
 */

import { attemptAsync, mapError, messageOf, ok, type AsyncResult } from "railyard";
import type { AsyncAuthDeps, AuthenticatedPair, Credentials } from "./types";
import { credentialMismatch, lookupFailed, notifyFailed, unexpectedIn, type AuthError } from "./errors";
import { settleHistory, settleLookup, settleNotify, type AuthContext } from "./steps";

export type AsyncAuthContext = AuthContext<AsyncAuthDeps>;

export async function lookupStepAsync(
  credentials: Credentials,
  ctx: AsyncAuthContext
): AsyncResult<AuthenticatedPair, AuthError> {
  const { lookupUser } = ctx.deps;
  ctx.options.logger.debug("Looking up user", { username: credentials.username });
  const found = await attemptAsync(
    async () => mapError(await lookupUser(credentials.username), lookupFailed),
    unexpectedIn("lookupUser")
  );
  return settleLookup(found, credentials);
}

export async function checkPasswordStepAsync(
  pair: AuthenticatedPair,
  ctx: AsyncAuthContext
): AsyncResult<void, AuthError> {
  const { checkPassword } = ctx.deps;
  return attemptAsync(
    async () => mapError(await checkPassword(pair.user.password, pair.password), credentialMismatch),
    unexpectedIn("checkPassword")
  );
}

export async function notifyStepAsync(
  pair: AuthenticatedPair,
  ctx: AsyncAuthContext
): AsyncResult<void, AuthError> {
  const { notify } = ctx.deps;
  const sent = await attemptAsync(
    async () => mapError(await notify(pair.user.email, ctx.options.confirmationMessage), notifyFailed),
    unexpectedIn("notify")
  );
  return settleNotify(sent, pair.user, ctx.options);
}

export async function recordHistoryStepAsync(
  pair: AuthenticatedPair,
  ctx: AsyncAuthContext
): AsyncResult<void, never> {
  const { recordHistory } = ctx.deps;
  if (!recordHistory) {
    return ok(undefined);
  }
  const recorded = await attemptAsync(
    async () => mapError(await recordHistory(pair.user), messageOf),
    unexpectedIn("recordHistory")
  );
  return settleHistory(recorded, pair.user, ctx.options);
}
