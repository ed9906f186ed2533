/**
 * Tests for the build error taxonomy and its CLI mapping.
 */

import {
  BuildError,
  CompileError,
  ConfigError,
  DependencyInstallError,
  EXIT_CODES,
  InvalidTargetError,
  LockMismatchError,
  StagingError,
  TimeoutError,
  exitCodeFor,
  serializeError,
  toBuildError,
} from "./errors.js";

describe("error classes", () => {
  it("records the stage each subclass belongs to", () => {
    expect(new StagingError("x").stage).toBe("staging");
    expect(new DependencyInstallError("x").stage).toBe("dependencies");
    expect(new CompileError("x").stage).toBe("compile");
    expect(new TimeoutError("compile", 50).stage).toBe("compile");
  });

  it("sets name and code", () => {
    const error = new CompileError("boom");
    expect(error).toBeInstanceOf(BuildError);
    expect(error.name).toBe("CompileError");
    expect(error.code).toBe("compile_failed");
  });

  it("joins lock mismatches into the message", () => {
    const error = new LockMismatchError(["a is missing", "b differs"]);
    expect(error.message).toBe("Lock file disagrees with manifest: a is missing; b differs");
    expect(error.details).toEqual({ mismatches: ["a is missing", "b differs"] });
  });

  it("lists available names for an unknown target", () => {
    const error = new InvalidTargetError("environment", "staging", ["dev", "production"]);
    expect(error.message).toBe('Unknown environment "staging" (available: dev, production)');
    expect(new InvalidTargetError("service", "x", []).message).toBe('Unknown service "x" (available: none)');
  });

  it("appends config issues", () => {
    const error = new ConfigError("Invalid servicepack.yml", "/x/servicepack.yml", ["services: Required"]);
    expect(error.message).toBe("Invalid servicepack.yml: services: Required");
  });
});

describe("toBuildError", () => {
  it("keeps the first stage recorded on a BuildError", () => {
    const original = new DependencyInstallError("failed");
    const wrapped = toBuildError(original, "compile");
    expect(wrapped).toBe(original);
    expect(wrapped.stage).toBe("dependencies");
  });

  it("attaches the stage to a BuildError without one", () => {
    const error = new BuildError("internal_error", "odd");
    expect(toBuildError(error, "assembly").stage).toBe("assembly");
  });

  it("wraps foreign errors with the original as cause", () => {
    const cause = new Error("EACCES");
    const wrapped = toBuildError(cause, "tagging");
    expect(wrapped.code).toBe("internal_error");
    expect(wrapped.stage).toBe("tagging");
    expect(wrapped.message).toBe("EACCES");
    expect(wrapped.cause).toBe(cause);
  });
});

describe("exitCodeFor", () => {
  it("maps error codes to CLI exit codes", () => {
    expect(exitCodeFor(new InvalidTargetError("service", "x", []))).toBe(EXIT_CODES.invalidTarget);
    expect(exitCodeFor(new TimeoutError("dependencies", 10))).toBe(EXIT_CODES.timeout);
    expect(exitCodeFor(new CompileError("x"))).toBe(EXIT_CODES.buildFailed);
    expect(exitCodeFor(new Error("plain"))).toBe(EXIT_CODES.buildFailed);
  });
});

describe("serializeError", () => {
  it("serializes a BuildError with stage, details and cause", () => {
    const error = new CompileError("Build command exited with code 2", {
      details: { exitCode: 2 },
      cause: new Error("inner"),
    });
    expect(serializeError(error)).toEqual({
      message: "Build command exited with code 2",
      code: "compile_failed",
      stage: "compile",
      details: { exitCode: 2 },
      cause: "inner",
    });
  });

  it("omits empty details", () => {
    expect(serializeError(new StagingError("empty"))).toEqual({
      message: "empty",
      code: "staging_failed",
      stage: "staging",
      details: undefined,
      cause: undefined,
    });
  });

  it("handles non-errors", () => {
    expect(serializeError("nope")).toEqual({ message: "nope" });
  });
});
