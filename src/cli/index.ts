/**
 * servicepack CLI.
 *
 * Exit codes: 0 success, 1 build failure, 2 unknown service/environment or
 * bad usage, 3 stage timeout.
 */

import * as fs from "fs";
import { loadConfig, resolveConfigPath, type PipelineConfig } from "../config/loader.js";
import { setDataDir } from "../config/paths.js";
import { EXIT_CODES, exitCodeFor, serializeError } from "../shared/errors.js";
import { setLogLevel } from "../shared/logging.js";
import { Pipeline } from "../build/pipeline.js";
import { parseArgs, USAGE, UsageError, type CliArgs } from "./args.js";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface MainOptions {
  io?: CliIo;
  cwd?: string;
  /** Build a Pipeline for the loaded config (tests swap in fake runners) */
  createPipeline?: (config: PipelineConfig, args: CliArgs) => Pipeline;
}

export async function main(argv: readonly string[], options: MainOptions = {}): Promise<number> {
  const io = options.io ?? consoleIo;

  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    io.err(`Error: ${error.message}`);
    io.err(USAGE);
    return EXIT_CODES.invalidTarget;
  }

  const { command, flags } = args;
  if (command.name === "help") {
    io.out(USAGE);
    return EXIT_CODES.success;
  }

  if (flags.logLevel) setLogLevel(flags.logLevel);
  else if (flags.json) setLogLevel("warn");
  if (flags.dataDir) setDataDir(flags.dataDir);

  try {
    const config = loadConfig(resolveConfigPath(flags.config, options.cwd));

    if (command.name === "list") {
      printList(config, flags.json, io);
      return EXIT_CODES.success;
    }

    const pipeline = options.createPipeline
      ? options.createPipeline(config, args)
      : new Pipeline({ config, timeoutMs: flags.timeoutMs });

    if (command.name === "gc") {
      const result = pipeline.gc();
      if (flags.json) {
        io.out(JSON.stringify({ ok: true, removed: result }, null, 2));
      } else {
        io.out(
          `Removed ${result.images.length} images, ${result.artifacts.length} artifacts, ` +
            `${result.dependencies.length} dependency installs`,
        );
      }
      return EXIT_CODES.success;
    }

    const outcome = await pipeline.execute(
      { service: command.service, environment: command.environment },
      { timeoutMs: flags.timeoutMs },
    );
    if (!outcome.ok) throw outcome.error;
    const { image, stored } = outcome;

    if (command.name === "dockerfile") {
      io.out(fs.readFileSync(stored.dockerfilePath, "utf-8").trimEnd());
    } else if (flags.json) {
      io.out(
        JSON.stringify(
          {
            ok: true,
            tag: image.tag,
            contentHash: image.contentHash,
            context: stored.contextDir,
            states: outcome.run.history.map((t) => t.to),
          },
          null,
          2,
        ),
      );
    } else {
      io.out(image.tag);
      io.out(`  context: ${stored.contextDir}`);
    }
    return EXIT_CODES.success;
  } catch (error) {
    if (flags.json) {
      io.out(JSON.stringify({ ok: false, error: serializeError(error) }, null, 2));
    } else {
      io.err(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    return exitCodeFor(error);
  }
}

function printList(config: PipelineConfig, json: boolean, io: CliIo): void {
  const services = [...config.services.values()];
  const profiles = [...config.profiles.values()];

  if (json) {
    io.out(
      JSON.stringify(
        {
          services: services.map((s) => ({
            name: s.name,
            ecosystem: s.ecosystem,
            buildStep: s.hasBuildStep,
            serve: s.serve,
            port: s.exposedPort,
          })),
          profiles: profiles.map((p) => ({
            name: p.name,
            installMode: p.installMode,
            buildEnabled: p.buildEnabled,
            env: Object.keys(p.envVars).sort(),
          })),
        },
        null,
        2,
      ),
    );
    return;
  }

  io.out("Services:");
  for (const s of services) {
    const port = s.exposedPort === null ? "" : `, port ${s.exposedPort}`;
    io.out(`  ${s.name} (${s.ecosystem}${s.hasBuildStep ? `, build -> ${s.serve}` : ""}${port})`);
  }
  io.out("Profiles:");
  for (const p of profiles) {
    io.out(`  ${p.name} (${p.installMode}${p.buildEnabled ? "" : ", build disabled"})`);
  }
}
