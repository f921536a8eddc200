/**
 * Tests for authenticate.ts - the synchronous authentication pipeline
 */
import { describe, it, expect, vi } from "vitest";
import { ok, err, type Result } from "railyard";
import { authenticate, createAuthenticator } from "./authenticate";
import { AuthConfigError, DEFAULT_CONFIRMATION_MESSAGE } from "./options";
import type { AuthEvent, RecordHistory, User } from "./types";

const alice: User = { id: "1", name: "alice", email: "a@test.com", password: "secret" };

const validCredentials = { username: "alice", password: "secret" };

function createDeps() {
  return {
    lookupUser: vi.fn((_username: string): Result<User, string> => ok(alice)),
    checkPassword: vi.fn(
      (stored: string, provided: string): Result<void, string> =>
        stored === provided ? ok(undefined) : err("mismatch")
    ),
    notify: vi.fn((_email: string, _message: string): Result<void, string> => ok(undefined)),
  };
}

function createLoggerSpy() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const errorOf = <T, E>(result: Result<T, E>): E | undefined => (result.ok ? undefined : result.error);

describe("authenticate", () => {
  describe("when every step succeeds", () => {
    it("returns the user the lookup produced", () => {
      const deps = createDeps();

      const result = authenticate(validCredentials, deps);

      expect(result).toEqual(ok(alice));
      expect(result.ok && result.value).toBe(alice);
    });

    it("returns the user, not the user paired with the supplied password", () => {
      const result = authenticate(validCredentials, createDeps());
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value).not.toHaveProperty("user");
        expect(Object.keys(result.value).sort()).toEqual(["email", "id", "name", "password"]);
      }
    });

    it("calls each collaborator once, in order, with the threaded values", () => {
      const deps = createDeps();

      authenticate(validCredentials, deps);

      expect(deps.lookupUser).toHaveBeenCalledTimes(1);
      expect(deps.lookupUser).toHaveBeenCalledWith("alice");
      expect(deps.checkPassword).toHaveBeenCalledTimes(1);
      expect(deps.checkPassword).toHaveBeenCalledWith("secret", "secret");
      expect(deps.notify).toHaveBeenCalledTimes(1);
      expect(deps.notify).toHaveBeenCalledWith("a@test.com", DEFAULT_CONFIRMATION_MESSAGE);

      const [lookupOrder] = deps.lookupUser.mock.invocationCallOrder;
      const [checkOrder] = deps.checkPassword.mock.invocationCallOrder;
      const [notifyOrder] = deps.notify.mock.invocationCallOrder;
      expect(lookupOrder).toBeLessThan(checkOrder);
      expect(checkOrder).toBeLessThan(notifyOrder);
    });

    it("sends the configured confirmation message", () => {
      const deps = createDeps();
      authenticate(validCredentials, deps, { confirmationMessage: "New sign-in to your account" });
      expect(deps.notify).toHaveBeenCalledWith("a@test.com", "New sign-in to your account");
    });

    it("yields identical outcomes for identical inputs", () => {
      const deps = createDeps();
      const first = authenticate(validCredentials, deps);
      const second = authenticate(validCredentials, deps);
      expect(second).toEqual(first);
      expect(deps.lookupUser).toHaveBeenCalledTimes(2);
    });
  });

  describe("validation", () => {
    it.each([
      ["empty username", "", "secret"],
      ["empty password", "alice", ""],
      ["whitespace username", "   ", "secret"],
      ["whitespace password", "alice", "\t\n"],
      ["both empty", "", ""],
    ])("fails with Invalid params for %s and calls nothing", (_label, username, password) => {
      const deps = createDeps();

      const result = authenticate({ username, password }, deps);

      expect(result).toEqual(err({ type: "INVALID_INPUT", message: "Invalid params" }));
      expect(deps.lookupUser).not.toHaveBeenCalled();
      expect(deps.checkPassword).not.toHaveBeenCalled();
      expect(deps.notify).not.toHaveBeenCalled();
    });
  });

  describe("lookup", () => {
    it("propagates the lookup error and skips the remaining steps", () => {
      const deps = createDeps();
      deps.lookupUser.mockReturnValue(err("not found"));

      const result = authenticate(validCredentials, deps);

      expect(result).toEqual(err({ type: "LOOKUP_FAILED", message: "not found" }));
      expect(deps.checkPassword).not.toHaveBeenCalled();
      expect(deps.notify).not.toHaveBeenCalled();
    });

    it("turns a throwing lookup into UNEXPECTED", () => {
      const deps = createDeps();
      deps.lookupUser.mockImplementation(() => {
        throw new Error("connection refused");
      });

      const result = authenticate(validCredentials, deps);

      expect(errorOf(result)).toEqual({
        type: "UNEXPECTED",
        message: "connection refused",
        step: "lookupUser",
      });
      expect(deps.checkPassword).not.toHaveBeenCalled();
      expect(deps.notify).not.toHaveBeenCalled();
    });
  });

  describe("password check", () => {
    it("fails with the checker's error and never notifies", () => {
      const deps = createDeps();

      const result = authenticate({ username: "alice", password: "wrong" }, deps);

      expect(result).toEqual(err({ type: "CREDENTIAL_MISMATCH", message: "mismatch" }));
      expect(deps.checkPassword).toHaveBeenCalledWith("secret", "wrong");
      expect(deps.notify).not.toHaveBeenCalled();
    });

    it("turns a throwing checker into UNEXPECTED", () => {
      const deps = createDeps();
      deps.checkPassword.mockImplementation(() => {
        throw new Error("hash format not recognised");
      });

      const result = authenticate(validCredentials, deps);

      expect(errorOf(result)).toEqual({
        type: "UNEXPECTED",
        message: "hash format not recognised",
        step: "checkPassword",
      });
      expect(deps.notify).not.toHaveBeenCalled();
    });
  });

  describe("notification", () => {
    it("fails the login when notify fails under the default policy", () => {
      const deps = createDeps();
      deps.notify.mockReturnValue(err("Some major problem occurred"));

      const result = authenticate(validCredentials, deps);

      expect(result).toEqual(err({ type: "NOTIFY_FAILED", message: "Some major problem occurred" }));
    });

    it("still authenticates under the ignore policy and logs a warning", () => {
      const deps = createDeps();
      deps.notify.mockReturnValue(err("Some major problem occurred"));
      const logger = createLoggerSpy();

      const result = authenticate(validCredentials, deps, { notifyFailure: "ignore", logger });

      expect(result).toEqual(ok(alice));
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith("Login confirmation failed, continuing", {
        userId: "1",
        error: "Some major problem occurred",
      });
    });

    it("reports a throwing notifier as UNEXPECTED under the default policy", () => {
      const deps = createDeps();
      deps.notify.mockImplementation(() => {
        throw new Error("SMTP timeout");
      });

      const result = authenticate(validCredentials, deps);

      expect(errorOf(result)).toEqual({ type: "UNEXPECTED", message: "SMTP timeout", step: "notify" });
    });

    it("tolerates a throwing notifier under the ignore policy", () => {
      const deps = createDeps();
      deps.notify.mockImplementation(() => {
        throw new Error("SMTP timeout");
      });

      expect(authenticate(validCredentials, deps, { notifyFailure: "ignore" })).toEqual(ok(alice));
    });
  });

  describe("history", () => {
    it("records the user once after a successful notification", () => {
      const recordHistory = vi.fn((_user: User): Result<void, string> => ok(undefined));
      const deps = { ...createDeps(), recordHistory };

      const result = authenticate(validCredentials, deps);

      expect(result).toEqual(ok(alice));
      expect(recordHistory).toHaveBeenCalledTimes(1);
      expect(recordHistory).toHaveBeenCalledWith(alice);
      const [notifyOrder] = deps.notify.mock.invocationCallOrder;
      const [recordOrder] = recordHistory.mock.invocationCallOrder;
      expect(notifyOrder).toBeLessThan(recordOrder);
    });

    it("never fails the login when recording fails", () => {
      const recordHistory = vi.fn((_user: User): Result<void, string> => err("disk full"));
      const logger = createLoggerSpy();

      const result = authenticate(validCredentials, { ...createDeps(), recordHistory }, { logger });

      expect(result).toEqual(ok(alice));
      expect(logger.warn).toHaveBeenCalledWith("History record failed", { userId: "1", error: "disk full" });
    });

    it("never fails the login when the recorder throws", () => {
      const recordHistory = vi.fn((_user: User): Result<void, string> => {
        throw new Error("audit table locked");
      });
      const logger = createLoggerSpy();

      const result = authenticate(validCredentials, { ...createDeps(), recordHistory }, { logger });

      expect(result).toEqual(ok(alice));
      expect(logger.warn).toHaveBeenCalledWith("History record failed", {
        userId: "1",
        error: "audit table locked",
      });
    });

    it("is not called when an earlier step failed", () => {
      const recordHistory = vi.fn((_user: User): Result<void, string> => ok(undefined));

      authenticate({ username: "alice", password: "wrong" }, { ...createDeps(), recordHistory });

      expect(recordHistory).not.toHaveBeenCalled();
    });
  });

  describe("audit log", () => {
    it("logs success with the user id", () => {
      const logger = createLoggerSpy();

      authenticate(validCredentials, createDeps(), { logger });

      expect(logger.info).toHaveBeenCalledWith("Authentication succeeded", { userId: "1" });
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("logs failure with the error detail", () => {
      const logger = createLoggerSpy();

      authenticate({ username: "alice", password: "wrong" }, createDeps(), { logger });

      expect(logger.warn).toHaveBeenCalledWith("Authentication failed", {
        type: "CREDENTIAL_MISMATCH",
        error: "mismatch",
      });
      expect(logger.info).not.toHaveBeenCalled();
    });

    it("runs even when validation fails", () => {
      const logger = createLoggerSpy();

      authenticate({ username: "", password: "" }, createDeps(), { logger });

      expect(logger.warn).toHaveBeenCalledWith("Authentication failed", {
        type: "INVALID_INPUT",
        error: "Invalid params",
      });
    });

    it("emits a start event and one terminal event with timings", () => {
      const events: AuthEvent[] = [];
      const ticks = [1000, 1012];
      const clock = () => ticks.shift() ?? 0;

      authenticate(validCredentials, createDeps(), { onEvent: (e) => events.push(e), clock });

      expect(events).toEqual([
        { type: "auth_start", username: "alice", ts: 1000 },
        { type: "auth_success", userId: "1", ts: 1012, durationMs: 12 },
      ]);
    });

    it("emits auth_error carrying the error", () => {
      const events: AuthEvent[] = [];
      const ticks = [50, 53];
      const clock = () => ticks.shift() ?? 0;
      const deps = createDeps();
      deps.lookupUser.mockReturnValue(err("not found"));

      authenticate(validCredentials, deps, { onEvent: (e) => events.push(e), clock });

      expect(events).toEqual([
        { type: "auth_start", username: "alice", ts: 50 },
        {
          type: "auth_error",
          error: { type: "LOOKUP_FAILED", message: "not found" },
          ts: 53,
          durationMs: 3,
        },
      ]);
    });
  });
});

describe("authenticate with failing observers", () => {
  const sinkDown = () => {
    throw new Error("log sink down");
  };

  it("returns the user when the info logger throws after notification", () => {
    const deps = createDeps();
    const logger = { ...createLoggerSpy(), info: vi.fn(sinkDown) };

    const result = authenticate(validCredentials, deps, { logger });

    expect(result).toEqual(ok(alice));
    expect(deps.notify).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledTimes(1);
  });

  it("keeps the original error when the warn logger throws", () => {
    const logger = { ...createLoggerSpy(), warn: vi.fn(sinkDown) };

    const result = authenticate({ username: "alice", password: "wrong" }, createDeps(), { logger });

    expect(result).toEqual(err({ type: "CREDENTIAL_MISMATCH", message: "mismatch" }));
  });

  it("does not blame lookupUser for a throwing debug logger", () => {
    const deps = createDeps();
    const logger = { ...createLoggerSpy(), debug: vi.fn(sinkDown) };

    const result = authenticate(validCredentials, deps, { logger });

    expect(result).toEqual(ok(alice));
    expect(deps.lookupUser).toHaveBeenCalledTimes(1);
  });

  it("returns the user when the event hook throws, and logs the hook failure", () => {
    const logger = createLoggerSpy();

    const result = authenticate(validCredentials, createDeps(), { logger, onEvent: sinkDown });

    expect(result).toEqual(ok(alice));
    expect(logger.error.mock.calls).toEqual([
      ["Event hook failed", { event: "auth_start", error: "log sink down" }],
      ["Event hook failed", { event: "auth_success", error: "log sink down" }],
    ]);
  });

  it("survives a throwing hook and a throwing logger together", () => {
    const logger = { debug: vi.fn(sinkDown), info: vi.fn(sinkDown), warn: vi.fn(sinkDown), error: vi.fn(sinkDown) };

    expect(authenticate(validCredentials, createDeps(), { logger, onEvent: sinkDown })).toEqual(ok(alice));
  });

  it("logs a recorder that answers with something other than a Result", () => {
    const logger = createLoggerSpy();
    // A collaborator written without types can hand back anything.
    const recordHistory: RecordHistory = () => JSON.parse("null");

    const result = authenticate(validCredentials, { ...createDeps(), recordHistory }, { logger });

    expect(result).toEqual(ok(alice));
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("History record failed", {
      userId: "1",
      error: expect.any(String),
    });
  });
});

describe("createAuthenticator", () => {
  it("binds collaborators once for repeated logins", () => {
    const deps = createDeps();
    const login = createAuthenticator(deps);

    expect(login(validCredentials)).toEqual(ok(alice));
    expect(login({ username: "alice", password: "wrong" })).toEqual(
      err({ type: "CREDENTIAL_MISMATCH", message: "mismatch" })
    );
    expect(deps.lookupUser).toHaveBeenCalledTimes(2);
  });

  it("rejects unusable options when it is created", () => {
    expect(() => createAuthenticator(createDeps(), { confirmationMessage: "  " })).toThrow(AuthConfigError);
  });
});
