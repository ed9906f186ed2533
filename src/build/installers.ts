/**
 * Package manager invocations. Each install runs in the directory that becomes
 * the cache entry; the manifest and lock are copied there first.
 *
 *   python full:     pip install --target <dir>/site-packages -r requirements.txt
 *   python ci-clean: pip install --target <dir>/site-packages --no-deps -r requirements.lock
 *   node full:       npm install
 *   node ci-clean:   npm ci
 *
 * Python trees are installed for the runtime image's interpreter version
 * (--python-version, wheels only), not the host's. Node trees are installed
 * by the host's npm; native add-ons built against glibc will not load on an
 * alpine (musl) runtime.
 */

import * as path from "path";
import type { DependencyManifest, Ecosystem, InstallMode } from "../shared/types.js";
import { DependencyInstallError } from "../shared/errors.js";
import { createDevLogger } from "../shared/logging.js";
import { hostToolEnv, runCommand, tail, type CommandResult, type CommandRunner } from "./process.js";
import { MANIFEST_FILES } from "./dependencyManifest.js";

const log = createDevLogger("Installer");

/** Directory inside a cache entry holding the installed tree. */
export const INSTALL_ROOTS: Record<Ecosystem, string> = {
  python: "site-packages",
  node: "node_modules",
};

export interface InstallRequest {
  manifest: DependencyManifest;
  mode: InstallMode;
  /** Directory holding the manifest and lock; the tree is installed here */
  workDir: string;
  /** Base runtime image the tree will run on */
  runtime: string;
  signal: AbortSignal;
}

export interface DependencyInstaller {
  install(request: InstallRequest): Promise<void>;
}

/** "python:3.11-slim" → "3.11"; null when the image tag names no X.Y version. */
export function pythonVersionOf(runtime: string): string | null {
  const match = /(?:^|\/)python:(\d+\.\d+)(?:$|[.-])/.exec(runtime);
  return match?.[1] ?? null;
}

export function installCommandFor(
  ecosystem: Ecosystem,
  mode: InstallMode,
  workDir: string,
  runtime: string,
): string[] {
  if (ecosystem === "python") {
    const version = pythonVersionOf(runtime);
    if (version === null) {
      throw new DependencyInstallError(`Cannot tell the Python version of runtime ${runtime} (expected python:X.Y)`, {
        details: { runtime },
      });
    }
    const base = [
      "python3", "-m", "pip", "install", "--disable-pip-version-check", "--no-input",
      "--target", path.join(workDir, INSTALL_ROOTS.python),
      "--python-version", version,
      "--only-binary=:all:",
    ];
    return mode === "ci-clean"
      ? [...base, "--no-deps", "-r", MANIFEST_FILES.python.lock]
      : [...base, "-r", MANIFEST_FILES.python.manifest];
  }
  return mode === "ci-clean"
    ? ["npm", "ci", "--no-audit", "--no-fund"]
    : ["npm", "install", "--no-audit", "--no-fund"];
}

/** Runs pip or npm through a CommandRunner. */
export class CommandInstaller implements DependencyInstaller {
  constructor(private readonly runner: CommandRunner = runCommand) {}

  async install(request: InstallRequest): Promise<void> {
    const { manifest, mode, workDir, runtime, signal } = request;
    const command = installCommandFor(manifest.ecosystem, mode, workDir, runtime);
    log.info(`${command.join(" ")} (${manifest.declaredPackages.length} declared packages)`);

    let result: CommandResult;
    try {
      result = await this.runner(command, { cwd: workDir, env: hostToolEnv(), signal });
    } catch (error) {
      if (signal.aborted) throw error;
      throw new DependencyInstallError(
        `Could not run ${command[0]}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error, details: { command } },
      );
    }

    if (result.exitCode !== 0) {
      throw new DependencyInstallError(`${command.slice(0, 3).join(" ")} exited with code ${result.exitCode}`, {
        details: { command, exitCode: result.exitCode, stderr: tail(result.stderr) },
      });
    }
  }
}
