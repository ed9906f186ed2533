/**
 * Artifact Compiler: runs a service's build step against its staged source
 * and stores the output.
 *
 * The build runs in a scratch copy of the build context with the resolved
 * dependency tree linked in, so the staged source stays pristine for the
 * assembler. A failed build never falls back to an older artifact.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type {
  BuildArtifact,
  EnvironmentProfile,
  ResolvedDependencies,
  ServiceDescriptor,
} from "../shared/types.js";
import { CompileError, isBuildError } from "../shared/errors.js";
import { createDevLogger } from "../shared/logging.js";
import type { StagedSource } from "./sourceStaging.js";
import type { ArtifactStore } from "./artifactStore.js";
import { hostToolEnv, runCommand, tail, type CommandResult, type CommandRunner } from "./process.js";
import { normalizeInside, removeDir, walkFiles } from "./fsUtils.js";
import { withTimeout } from "./timeout.js";

const log = createDevLogger("Compiler");

export interface CompileInput {
  descriptor: ServiceDescriptor;
  profile: EnvironmentProfile;
  staged: StagedSource;
  dependencies: ResolvedDependencies;
  store: ArtifactStore;
  timeoutMs: number;
  runner?: CommandRunner;
  /** Parent directory for the scratch copy (defaults to os.tmpdir()) */
  workDir?: string;
}

/** The compiler runs only for services with a build step, under a profile that builds. */
export function shouldCompile(descriptor: ServiceDescriptor, profile: EnvironmentProfile): boolean {
  return descriptor.hasBuildStep && profile.buildEnabled;
}

/**
 * Environment for the build command: the host's tool variables, the
 * profile's variables, and the dependency tree's location.
 */
export function buildEnvFor(
  profile: EnvironmentProfile,
  dependencies: ResolvedDependencies,
  hostEnv: Record<string, string> = hostToolEnv(),
): Record<string, string> {
  const env: Record<string, string> = { ...hostEnv, ...profile.envVars };
  let bin: string;
  if (dependencies.manifest.ecosystem === "python") {
    // A --target tree is importable as is; its console scripts land in bin/
    env["PYTHONPATH"] = env["PYTHONPATH"]
      ? `${dependencies.installRoot}${path.delimiter}${env["PYTHONPATH"]}`
      : dependencies.installRoot;
    bin = path.join(dependencies.installRoot, "bin");
  } else {
    bin = path.join(dependencies.installRoot, ".bin");
  }
  env["PATH"] = env["PATH"] ? `${bin}${path.delimiter}${env["PATH"]}` : bin;
  return env;
}

export async function compileArtifact(input: CompileInput): Promise<BuildArtifact> {
  const { descriptor, profile, staged, dependencies, store } = input;
  const runner = input.runner ?? runCommand;

  const outputRel = normalizeInside(descriptor.build.outputDir);
  if (outputRel === null) {
    throw new CompileError(`Build output directory escapes the source root: ${descriptor.build.outputDir}`);
  }

  const parent = input.workDir ?? os.tmpdir();
  fs.mkdirSync(parent, { recursive: true });
  const scratch = fs.mkdtempSync(path.join(parent, `servicepack-compile-${descriptor.name}-`));

  try {
    fs.cpSync(staged.dir, scratch, { recursive: true });
    for (const rel of staged.files) {
      fs.chmodSync(path.join(scratch, ...rel.split("/")), 0o644);
    }
    if (dependencies.manifest.ecosystem === "node" && fs.existsSync(dependencies.installRoot)) {
      fs.symlinkSync(dependencies.installRoot, path.join(scratch, "node_modules"), "junction");
    }

    const command = descriptor.build.command;
    log.info(`${descriptor.name}: ${command.join(" ")} (${profile.name})`);

    let result: CommandResult;
    try {
      result = await withTimeout("compile", input.timeoutMs, (signal) =>
        runner(command, { cwd: scratch, env: buildEnvFor(profile, dependencies), signal }),
      );
    } catch (error) {
      if (isBuildError(error)) throw error;
      throw new CompileError(
        `Could not run build command ${command[0] ?? ""}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error, details: { command } },
      );
    }

    if (result.exitCode !== 0) {
      throw new CompileError(`Build command exited with code ${result.exitCode}`, {
        details: { command, exitCode: result.exitCode, stderr: tail(result.stderr) },
      });
    }

    const outputDir = path.join(scratch, ...outputRel.split("/"));
    if (!fs.existsSync(outputDir) || !fs.statSync(outputDir).isDirectory()) {
      throw new CompileError(`Build output directory ${outputRel} was not produced`, {
        details: { outputDir: outputRel },
      });
    }
    if (walkFiles(outputDir).length === 0) {
      throw new CompileError(`Build output directory ${outputRel} is empty`, {
        details: { outputDir: outputRel },
      });
    }

    return store.put({
      service: descriptor.name,
      environment: profile.name,
      outputKind: descriptor.serve === "static" ? "static_dir" : "runnable_image",
      sourceDir: outputDir,
    });
  } finally {
    removeDir(scratch);
  }
}
