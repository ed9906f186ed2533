/**
 * Build error taxonomy.
 *
 * Every failure in a pipeline run is one of these classes. Errors are typed
 * with a code so the CLI can map them to exit codes, and carry the stage that
 * failed plus the underlying cause. None of them is retryable: given fixed
 * inputs a build fails the same way every time.
 */

export type BuildStage = "config" | "staging" | "dependencies" | "compile" | "assembly" | "tagging";

export type BuildErrorCode =
  | "staging_failed"
  | "dependency_install_failed"
  | "lock_mismatch"
  | "compile_failed"
  | "assembly_failed"
  | "timeout"
  | "invalid_target"
  | "invalid_config"
  | "internal_error";

export interface BuildErrorOptions {
  stage?: BuildStage;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class BuildError extends Error {
  public readonly code: BuildErrorCode;
  public readonly details: Record<string, unknown>;
  private failedStage: BuildStage | null;

  constructor(code: BuildErrorCode, message: string, options: BuildErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "BuildError";
    this.code = code;
    this.details = options.details ?? {};
    this.failedStage = options.stage ?? null;
  }

  get stage(): BuildStage | null {
    return this.failedStage;
  }

  /** Record the stage the error surfaced in. The first stage recorded wins. */
  atStage(stage: BuildStage): this {
    if (this.failedStage === null) this.failedStage = stage;
    return this;
  }
}

export class StagingError extends BuildError {
  constructor(message: string, options: Omit<BuildErrorOptions, "stage"> = {}) {
    super("staging_failed", message, { ...options, stage: "staging" });
    this.name = "StagingError";
  }
}

export class DependencyInstallError extends BuildError {
  constructor(message: string, options: Omit<BuildErrorOptions, "stage"> = {}) {
    super("dependency_install_failed", message, { ...options, stage: "dependencies" });
    this.name = "DependencyInstallError";
  }
}

/** The lock file is missing or disagrees with the manifest under a ci-clean install. */
export class LockMismatchError extends BuildError {
  public readonly mismatches: string[];

  constructor(mismatches: string[], options: Omit<BuildErrorOptions, "stage"> = {}) {
    super("lock_mismatch", `Lock file disagrees with manifest: ${mismatches.join("; ")}`, {
      ...options,
      stage: "dependencies",
      details: { ...options.details, mismatches },
    });
    this.name = "LockMismatchError";
    this.mismatches = mismatches;
  }
}

export class CompileError extends BuildError {
  constructor(message: string, options: Omit<BuildErrorOptions, "stage"> = {}) {
    super("compile_failed", message, { ...options, stage: "compile" });
    this.name = "CompileError";
  }
}

export class AssemblyError extends BuildError {
  constructor(message: string, options: Omit<BuildErrorOptions, "stage"> = {}) {
    super("assembly_failed", message, { ...options, stage: "assembly" });
    this.name = "AssemblyError";
  }
}

export class TimeoutError extends BuildError {
  public readonly timeoutMs: number;

  constructor(stage: BuildStage, timeoutMs: number) {
    super("timeout", `Stage "${stage}" exceeded ${timeoutMs}ms`, {
      stage,
      details: { timeoutMs },
    });
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class InvalidTargetError extends BuildError {
  public readonly kind: "service" | "environment";
  public readonly requested: string;

  constructor(kind: "service" | "environment", requested: string, available: string[]) {
    super(
      "invalid_target",
      `Unknown ${kind} "${requested}" (available: ${available.join(", ") || "none"})`,
      { stage: "config", details: { kind, requested, available } },
    );
    this.name = "InvalidTargetError";
    this.kind = kind;
    this.requested = requested;
  }
}

export class ConfigError extends BuildError {
  public readonly configPath: string | null;

  constructor(message: string, configPath: string | null, issues: string[] = []) {
    super("invalid_config", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, {
      stage: "config",
      details: { configPath, issues },
    });
    this.name = "ConfigError";
    this.configPath = configPath;
  }
}

export function isBuildError(error: unknown): error is BuildError {
  return error instanceof BuildError;
}

/** Wrap anything thrown by a stage that is not already a BuildError. */
export function toBuildError(error: unknown, stage: BuildStage): BuildError {
  if (isBuildError(error)) return error.atStage(stage);
  const message = error instanceof Error ? error.message : String(error);
  return new BuildError("internal_error", message, { stage, cause: error });
}

export const EXIT_CODES = {
  success: 0,
  buildFailed: 1,
  invalidTarget: 2,
  timeout: 3,
} as const;

export function exitCodeFor(error: unknown): number {
  if (!isBuildError(error)) return EXIT_CODES.buildFailed;
  switch (error.code) {
    case "invalid_target":
      return EXIT_CODES.invalidTarget;
    case "timeout":
      return EXIT_CODES.timeout;
    default:
      return EXIT_CODES.buildFailed;
  }
}

/**
 * Serialize an error for JSON output.
 */
export function serializeError(error: unknown): {
  message: string;
  code?: string;
  stage?: string;
  details?: unknown;
  cause?: string;
} {
  if (isBuildError(error)) {
    const cause = error.cause instanceof Error ? error.cause.message : undefined;
    return {
      message: error.message,
      code: error.code,
      stage: error.stage ?? undefined,
      details: Object.keys(error.details).length > 0 ? error.details : undefined,
      cause,
    };
  }

  if (error instanceof Error) {
    return {
      message: error.message,
    };
  }

  return {
    message: String(error),
  };
}
