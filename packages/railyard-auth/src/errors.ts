/**
 * Authentication errors.
 *
 * One closed union, discriminated by `type`. `message` always holds the
 * text the failing collaborator reported, so callers can show or log it
 * without knowing which step produced it.
 */

import { messageOf } from "railyard";
import type { DependencyName } from "./types";

/** Discriminants for AuthError - use in switch statements */
export const INVALID_INPUT = "INVALID_INPUT" as const;
export const LOOKUP_FAILED = "LOOKUP_FAILED" as const;
export const CREDENTIAL_MISMATCH = "CREDENTIAL_MISMATCH" as const;
export const NOTIFY_FAILED = "NOTIFY_FAILED" as const;
export const UNEXPECTED = "UNEXPECTED" as const;

export const INVALID_PARAMS_MESSAGE = "Invalid params";

export type InvalidInputError = { type: typeof INVALID_INPUT; message: string };
export type LookupFailedError = { type: typeof LOOKUP_FAILED; message: string };
export type CredentialMismatchError = { type: typeof CREDENTIAL_MISMATCH; message: string };
export type NotifyFailedError = { type: typeof NOTIFY_FAILED; message: string };
/** A collaborator threw (or rejected) instead of returning a Result. */
export type UnexpectedAuthError = { type: typeof UNEXPECTED; message: string; step: DependencyName };

export type AuthError =
  | InvalidInputError
  | LookupFailedError
  | CredentialMismatchError
  | NotifyFailedError
  | UnexpectedAuthError;

export type AuthErrorType = AuthError["type"];

const AUTH_ERROR_TYPES: readonly AuthErrorType[] = [
  INVALID_INPUT,
  LOOKUP_FAILED,
  CREDENTIAL_MISMATCH,
  NOTIFY_FAILED,
  UNEXPECTED,
];

// =============================================================================
// Constructors
// =============================================================================

export const invalidInput = (): InvalidInputError => ({
  type: INVALID_INPUT,
  message: INVALID_PARAMS_MESSAGE,
});

export const lookupFailed = (message: string): LookupFailedError => ({ type: LOOKUP_FAILED, message });

export const credentialMismatch = (message: string): CredentialMismatchError => ({
  type: CREDENTIAL_MISMATCH,
  message,
});

export const notifyFailed = (message: string): NotifyFailedError => ({ type: NOTIFY_FAILED, message });

export const unexpected = (step: DependencyName, message: string): UnexpectedAuthError => ({
  type: UNEXPECTED,
  message,
  step,
});

/**
 * Fault handler for `tryWith`/`attempt`: turns whatever the named
 * dependency threw into an `UNEXPECTED` error.
 */
export const unexpectedIn =
  (step: DependencyName) =>
  (thrown: unknown): UnexpectedAuthError =>
    unexpected(step, messageOf(thrown));

// =============================================================================
// Guards and formatting
// =============================================================================

/**
 * Checks if a value is an AuthError.
 */
export function isAuthError(e: unknown): e is AuthError {
  if (typeof e !== "object" || e === null || !("type" in e) || !("message" in e)) {
    return false;
  }
  const tag = e.type;
  return typeof e.message === "string" && AUTH_ERROR_TYPES.some((type) => type === tag);
}

/**
 * One line for the invoking layer to show a person.
 */
export function describeAuthError(error: AuthError): string {
  switch (error.type) {
    case INVALID_INPUT:
      return "Username and password are required";
    case LOOKUP_FAILED:
      return `User lookup failed: ${error.message}`;
    case CREDENTIAL_MISMATCH:
      return `Credentials rejected: ${error.message}`;
    case NOTIFY_FAILED:
      return `Login confirmation could not be sent: ${error.message}`;
    case UNEXPECTED:
      return `Unexpected failure in ${error.step}: ${error.message}`;
  }
}
