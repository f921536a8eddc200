/**
 * railyard-auth
 *
 * Username/password authentication as a railway pipeline. The user store,
 * password comparison, and notification delivery are supplied by the
 * caller as plain functions returning Results.
 *
 * ```typescript
 * import { authenticate, createConsoleLogger } from "railyard-auth";
 *
 * const result = authenticate(
 *   { username: "alice", password: "secret" },
 *   {
 *     lookupUser: (username) => directory.find(username),
 *     checkPassword: (stored, provided) => (stored === provided ? ok(undefined) : err("mismatch")),
 *     notify: (email, message) => mailer.send(email, message),
 *   },
 *   { logger: createConsoleLogger() }
 * );
 * ```
 */

export {
  authenticate,
  authenticateAsync,
  createAuthenticator,
  createAsyncAuthenticator,
  type Authenticator,
  type AsyncAuthenticator,
} from "./authenticate";

export {
  validateCredentials,
  lookupStep,
  checkPasswordStep,
  notifyStep,
  recordHistoryStep,
  logOutcome,
  buildResponse,
  type AuthContext,
} from "./steps";

export {
  lookupStepAsync,
  checkPasswordStepAsync,
  notifyStepAsync,
  recordHistoryStepAsync,
  type AsyncAuthContext,
} from "./steps-async";

export {
  INVALID_INPUT,
  LOOKUP_FAILED,
  CREDENTIAL_MISMATCH,
  NOTIFY_FAILED,
  UNEXPECTED,
  INVALID_PARAMS_MESSAGE,
  invalidInput,
  lookupFailed,
  credentialMismatch,
  notifyFailed,
  unexpected,
  unexpectedIn,
  isAuthError,
  describeAuthError,
  type AuthError,
  type AuthErrorType,
  type InvalidInputError,
  type LookupFailedError,
  type CredentialMismatchError,
  type NotifyFailedError,
  type UnexpectedAuthError,
} from "./errors";

export {
  resolveAuthOptions,
  AuthConfigError,
  DEFAULT_CONFIRMATION_MESSAGE,
  NOTIFY_FAILURE_POLICIES,
  type AuthOptions,
  type ResolvedAuthOptions,
  type NotifyFailurePolicy,
} from "./options";

export {
  createConsoleLogger,
  guardLogger,
  silentLogger,
  type AuthLogger,
  type ConsoleLoggerOptions,
  type LogContext,
  type LogLevel,
} from "./logger";

export type {
  User,
  Credentials,
  AuthenticatedPair,
  AuthDeps,
  AsyncAuthDeps,
  LookupUser,
  CheckPassword,
  Notify,
  RecordHistory,
  DependencyName,
  AuthEvent,
} from "./types";
