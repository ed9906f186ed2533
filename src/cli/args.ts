/**
 * Command-line parsing for the servicepack CLI.
 *
 *   servicepack build <service> <environment> [flags]
 *   servicepack dockerfile <service> <environment> [flags]
 *   servicepack list [flags]
 *   servicepack gc [flags]
 */

import { parseLogLevel, type LogLevel } from "../shared/logging.js";

export const USAGE = `Usage: servicepack <command> [options]

Commands:
  build <service> <environment>       Build and tag an image
  dockerfile <service> <environment>  Build, then print the image's Dockerfile
  list                                List services and environment profiles
  gc                                  Remove images, artifacts and dependency installs no tag references

Options:
  --config <path>      Path to servicepack.yml (default: SERVICEPACK_CONFIG, then search upwards)
  --data-dir <path>    Cache and image directory (default: SERVICEPACK_DATA_DIR)
  --timeout <ms>       Per-stage timeout for installs and builds (default: SERVICEPACK_TIMEOUT_MS or 600000)
  --log-level <level>  verbose | info | warn | error | silent
  --json               Print results as JSON
  -h, --help           Show this help`;

export type CliCommand =
  | { name: "build"; service: string; environment: string }
  | { name: "dockerfile"; service: string; environment: string }
  | { name: "list" }
  | { name: "gc" }
  | { name: "help" };

export interface CliFlags {
  config?: string;
  dataDir?: string;
  timeoutMs?: number;
  logLevel?: LogLevel;
  json: boolean;
}

export interface CliArgs {
  command: CliCommand;
  flags: CliFlags;
}

/** Bad invocation; the CLI prints usage and exits with code 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

const VALUE_FLAGS = new Set(["config", "data-dir", "timeout", "log-level"]);
const BOOLEAN_FLAGS = new Set(["json", "help"]);

export function parseArgs(argv: readonly string[]): CliArgs {
  const flags: CliFlags = { json: false };
  const positionals: string[] = [];
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";

    if (arg === "-h") {
      help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }

    let key: string;
    let value: string | undefined;
    const eqIdx = arg.indexOf("=");
    if (eqIdx !== -1) {
      key = arg.slice(2, eqIdx);
      value = arg.slice(eqIdx + 1);
    } else {
      key = arg.slice(2);
    }

    if (BOOLEAN_FLAGS.has(key)) {
      if (value !== undefined) throw new UsageError(`--${key} does not take a value`);
      if (key === "json") flags.json = true;
      else help = true;
      continue;
    }
    if (!VALUE_FLAGS.has(key)) throw new UsageError(`Unknown flag: --${key}`);

    if (value === undefined) {
      value = argv[i + 1];
      if (value === undefined || value.startsWith("--")) throw new UsageError(`Missing value for --${key}`);
      i++;
    }

    switch (key) {
      case "config":
        flags.config = value;
        break;
      case "data-dir":
        flags.dataDir = value;
        break;
      case "timeout": {
        const timeoutMs = Number(value);
        if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
          throw new UsageError(`--timeout must be a positive number of milliseconds, got "${value}"`);
        }
        flags.timeoutMs = timeoutMs;
        break;
      }
      case "log-level": {
        const level = parseLogLevel(value);
        if (!level) throw new UsageError(`Invalid --log-level "${value}"`);
        flags.logLevel = level;
        break;
      }
    }
  }

  if (help) return { command: { name: "help" }, flags };
  return { command: parseCommand(positionals), flags };
}

function parseCommand(positionals: string[]): CliCommand {
  const [name, ...rest] = positionals;
  switch (name) {
    case "build":
    case "dockerfile": {
      const [service, environment, ...extra] = rest;
      if (!service || !environment) throw new UsageError(`${name} requires <service> and <environment>`);
      if (extra.length > 0) throw new UsageError(`Unexpected argument: ${extra[0]}`);
      return { name, service, environment };
    }
    case "list":
    case "gc":
      if (rest.length > 0) throw new UsageError(`Unexpected argument: ${rest[0]}`);
      return { name };
    case undefined:
      throw new UsageError("Missing command");
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}
