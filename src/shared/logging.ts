/**
 * Leveled console logging for the build pipeline.
 *
 * Set SERVICEPACK_LOG_LEVEL to control output:
 *   - "verbose" - Everything, including cache lookups and state transitions
 *   - "info" - Stage start/finish and build results (default)
 *   - "warn" - Warnings and errors only
 *   - "error" - Errors only
 *   - "silent" - No logs
 */

export type LogLevel = "verbose" | "info" | "warn" | "error" | "silent";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  verbose: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let levelOverride: LogLevel | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/** Override the environment-derived level (used by the CLI --log-level flag). */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

export function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  const level = process.env["SERVICEPACK_LOG_LEVEL"];
  return isLogLevel(level) ? level : "info";
}

export function parseLogLevel(value: string): LogLevel | null {
  return isLogLevel(value) ? value : null;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLogLevel()];
}

/**
 * Log at verbose level - detailed debug information.
 * Use for: cache hits, file counts, state transitions.
 */
export function logVerbose(tag: string, message: string, ...args: unknown[]): void {
  if (shouldLog("verbose")) {
    console.log(`[${tag}] ${message}`, ...args);
  }
}

/**
 * Log at info level - normal operational messages.
 */
export function logInfo(tag: string, message: string, ...args: unknown[]): void {
  if (shouldLog("info")) {
    console.log(`[${tag}] ${message}`, ...args);
  }
}

export function logWarn(tag: string, message: string, ...args: unknown[]): void {
  if (shouldLog("warn")) {
    console.warn(`[${tag}] ${message}`, ...args);
  }
}

export function logError(tag: string, message: string, ...args: unknown[]): void {
  if (shouldLog("error")) {
    console.error(`[${tag}] ${message}`, ...args);
  }
}

export function isVerbose(): boolean {
  return shouldLog("verbose");
}

export interface DevLogger {
  verbose(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  isVerbose(): boolean;
}

/**
 * Create a scoped logger for a specific component.
 */
export function createDevLogger(tag: string): DevLogger {
  return {
    verbose: (message, ...args) => logVerbose(tag, message, ...args),
    info: (message, ...args) => logInfo(tag, message, ...args),
    warn: (message, ...args) => logWarn(tag, message, ...args),
    error: (message, ...args) => logError(tag, message, ...args),
    isVerbose: () => isVerbose(),
  };
}
