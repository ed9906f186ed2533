/**
 * Configuration loading for servicepack.
 *
 * One servicepack.yml declares every service, every environment profile and
 * the runtime base images. It replaces the per-variant Dockerfiles the
 * services used to carry.
 *
 * Discovery priority:
 * 1. CLI argument: --config=/path/to/servicepack.yml
 * 2. Environment variable: SERVICEPACK_CONFIG
 * 3. Walk up from cwd looking for servicepack.yml
 */

import * as fs from "fs";
import * as path from "path";
import YAML from "yaml";
import dotenv from "dotenv";
import { ConfigError } from "../shared/errors.js";
import type { EnvironmentProfile, ServiceDescriptor } from "../shared/types.js";
import { createDevLogger } from "../shared/logging.js";
import {
  PipelineConfigSchema,
  formatIssues,
  type ProfileConfig,
  type RuntimeImages,
  type ServiceConfig,
} from "./schema.js";

const log = createDevLogger("Config");

export const CONFIG_FILE_NAME = "servicepack.yml";

export interface PipelineConfig {
  /** Absolute path of the loaded servicepack.yml */
  configPath: string;
  /** Directory service sources and env files resolve against */
  rootDir: string;
  services: ReadonlyMap<string, ServiceDescriptor>;
  profiles: ReadonlyMap<string, EnvironmentProfile>;
  runtimes: Readonly<RuntimeImages>;
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * Walk up from startDir looking for servicepack.yml.
 */
export function findConfigFile(startDir: string): string | null {
  let current = path.resolve(startDir);

  for (;;) {
    const candidate = path.join(current, CONFIG_FILE_NAME);
    if (fs.existsSync(candidate)) return candidate;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function resolveConfigPath(explicit?: string, cwd: string = process.cwd()): string {
  if (explicit) return path.resolve(cwd, explicit);

  const fromEnv = process.env["SERVICEPACK_CONFIG"];
  if (fromEnv) return path.resolve(cwd, fromEnv);

  const found = findConfigFile(cwd);
  if (!found) {
    throw new ConfigError(`No ${CONFIG_FILE_NAME} found in ${cwd} or any parent directory`, null);
  }
  return found;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Load and validate a servicepack.yml from disk.
 */
export function loadConfig(configPath: string): PipelineConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      configPath,
    );
  }
  return parseConfig(content, configPath);
}

/**
 * Parse servicepack.yml content. `configPath` anchors relative source and
 * env-file paths; the file itself is not read again.
 */
export function parseConfig(content: string, configPath: string): PipelineConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid YAML in ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
      configPath,
    );
  }

  const parsed = PipelineConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${CONFIG_FILE_NAME}`, configPath, formatIssues(parsed.error));
  }

  const rootDir = path.dirname(path.resolve(configPath));

  const services = new Map<string, ServiceDescriptor>();
  for (const [name, service] of Object.entries(parsed.data.services)) {
    services.set(name, toServiceDescriptor(name, service, rootDir));
  }

  const profiles = new Map<string, EnvironmentProfile>();
  for (const [name, profile] of Object.entries(parsed.data.profiles)) {
    profiles.set(name, toEnvironmentProfile(name, profile, rootDir, configPath));
  }

  log.verbose(`Loaded ${services.size} services and ${profiles.size} profiles from ${configPath}`);

  return {
    configPath: path.resolve(configPath),
    rootDir,
    services,
    profiles,
    runtimes: Object.freeze({ ...parsed.data.runtimes }),
  };
}

/**
 * Split a shell-style command string on whitespace. Quoting is not
 * interpreted; use the list form in YAML for arguments containing spaces.
 */
export function splitCommand(command: string | string[]): string[] {
  if (Array.isArray(command)) return [...command];
  return command.trim().split(/\s+/);
}

function toServiceDescriptor(name: string, service: ServiceConfig, rootDir: string): ServiceDescriptor {
  return Object.freeze({
    name,
    sourcePath: path.resolve(rootDir, service.source),
    ecosystem: service.ecosystem,
    hasBuildStep: service.buildStep,
    entrypoint: Object.freeze(splitCommand(service.entrypoint)),
    exposedPort: service.port ?? null,
    serve: service.serve,
    build: Object.freeze({
      command: splitCommand(service.build.command),
      outputDir: service.build.outputDir,
    }),
    exclude: Object.freeze([...service.exclude]),
  });
}

function toEnvironmentProfile(
  name: string,
  profile: ProfileConfig,
  rootDir: string,
  configPath: string,
): EnvironmentProfile {
  const fromFile = profile.envFile ? readEnvFile(path.resolve(rootDir, profile.envFile), configPath) : {};

  return Object.freeze({
    name,
    // Inline env wins over the env file
    envVars: Object.freeze({ ...fromFile, ...profile.env }),
    installMode: profile.installMode,
    buildEnabled: profile.buildEnabled,
  });
}

/**
 * Parse a .env file without touching process.env: profile variables go into
 * the image, never into the build host.
 */
function readEnvFile(envPath: string, configPath: string): Record<string, string> {
  if (!fs.existsSync(envPath)) {
    throw new ConfigError(`Profile env file not found: ${envPath}`, configPath);
  }
  return dotenv.parse(fs.readFileSync(envPath));
}
