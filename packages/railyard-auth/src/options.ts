import { messageOf } from "railyard";
import type { AuthEvent } from "./types";
import { guardLogger, silentLogger, type AuthLogger } from "./logger";

/**
 * What a failed login confirmation does to the login:
 * - "fail": the pipeline fails with NOTIFY_FAILED
 * - "ignore": the failure is logged and the user is still authenticated
 */
export type NotifyFailurePolicy = "fail" | "ignore";

export const NOTIFY_FAILURE_POLICIES: readonly NotifyFailurePolicy[] = ["fail", "ignore"];

export const DEFAULT_CONFIRMATION_MESSAGE = "You have successfully logged in";

export interface AuthOptions {
  /** Sent to the user's email after the password check (default: DEFAULT_CONFIRMATION_MESSAGE) */
  confirmationMessage?: string;
  /** Default "fail" */
  notifyFailure?: NotifyFailurePolicy;
  /** Default silentLogger. Calls that throw are dropped. */
  logger?: AuthLogger;
  /**
   * Receives auth_start and exactly one of auth_success / auth_error per call.
   * A throw from the hook is logged at `error` and does not affect the login.
   */
  onEvent?: (event: AuthEvent) => void;
  /** Millisecond clock for event timestamps (default Date.now) */
  clock?: () => number;
}

export interface ResolvedAuthOptions {
  readonly confirmationMessage: string;
  readonly notifyFailure: NotifyFailurePolicy;
  readonly logger: AuthLogger;
  readonly onEvent?: (event: AuthEvent) => void;
  readonly clock: () => number;
}

/**
 * Thrown by `resolveAuthOptions` for options no pipeline can run with.
 */
export class AuthConfigError extends Error {
  constructor(
    message: string,
    public readonly option: keyof AuthOptions
  ) {
    super(message);
    this.name = "AuthConfigError";
  }
}

/**
 * Fill in defaults and reject unusable values. The supplied logger and
 * event hook come back wrapped so that neither can throw into a login.
 *
 * @throws {AuthConfigError} For an empty confirmation message or an unknown notify policy
 */
export function resolveAuthOptions(options: AuthOptions = {}): ResolvedAuthOptions {
  const confirmationMessage = options.confirmationMessage ?? DEFAULT_CONFIRMATION_MESSAGE;
  if (confirmationMessage.trim() === "") {
    throw new AuthConfigError("confirmationMessage must not be empty", "confirmationMessage");
  }

  const notifyFailure = options.notifyFailure ?? "fail";
  if (!NOTIFY_FAILURE_POLICIES.includes(notifyFailure)) {
    throw new AuthConfigError(
      `notifyFailure must be one of ${NOTIFY_FAILURE_POLICIES.join(", ")}, got "${String(notifyFailure)}"`,
      "notifyFailure"
    );
  }

  const logger = options.logger ? guardLogger(options.logger) : silentLogger;

  return {
    confirmationMessage,
    notifyFailure,
    logger,
    onEvent: options.onEvent && guardHook(options.onEvent, logger),
    clock: options.clock ?? Date.now,
  };
}

function guardHook(hook: (event: AuthEvent) => void, logger: AuthLogger): (event: AuthEvent) => void {
  return (event) => {
    try {
      hook(event);
    } catch (thrown) {
      logger.error("Event hook failed", { event: event.type, error: messageOf(thrown) });
    }
  };
}
