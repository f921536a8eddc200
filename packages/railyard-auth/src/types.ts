import type { Result, MaybeAsyncResult } from "railyard";
import type { AuthError } from "./errors";

// =============================================================================
// Domain
// =============================================================================

/**
 * A user as the lookup dependency returns it. The pipeline only reads it.
 */
export interface User {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  /** Stored credential, handed to `checkPassword` as-is */
  readonly password: string;
}

/**
 * Raw input to the pipeline.
 */
export interface Credentials {
  readonly username: string;
  readonly password: string;
}

/**
 * The value threaded from the lookup step to the response step: the user
 * found, still paired with the password the caller supplied.
 */
export interface AuthenticatedPair {
  readonly user: User;
  readonly password: string;
}

// =============================================================================
// Dependencies
// =============================================================================

export type LookupUser = (username: string) => Result<User, string>;
export type CheckPassword = (storedCredential: string, provided: string) => Result<void, string>;
export type Notify = (email: string, message: string) => Result<void, string>;
export type RecordHistory = (user: User) => Result<void, string>;

/**
 * Collaborators of the synchronous pipeline. Each is a plain function so
 * tests can replace any one of them on its own.
 */
export interface AuthDeps {
  lookupUser: LookupUser;
  checkPassword: CheckPassword;
  notify: Notify;
  /** When present, called once after a successful notification */
  recordHistory?: RecordHistory;
}

/**
 * Collaborators of `authenticateAsync`. Any of them may answer with a
 * Promise; synchronous `AuthDeps` are accepted too.
 */
export interface AsyncAuthDeps {
  lookupUser: (username: string) => MaybeAsyncResult<User, string>;
  checkPassword: (storedCredential: string, provided: string) => MaybeAsyncResult<void, string>;
  notify: (email: string, message: string) => MaybeAsyncResult<void, string>;
  recordHistory?: (user: User) => MaybeAsyncResult<void, string>;
}

/** Names of the dependencies, as reported on unexpected failures. */
export type DependencyName = keyof AuthDeps;

// =============================================================================
// Events
// =============================================================================

export type AuthEvent =
  | { type: "auth_start"; username: string; ts: number }
  | { type: "auth_success"; userId: string; ts: number; durationMs: number }
  | { type: "auth_error"; error: AuthError; ts: number; durationMs: number };
