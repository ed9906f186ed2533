/**
 * Shared test helpers: temp directories, service/profile factories and fake
 * package managers and build tools that run in process.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { EnvironmentProfile, ServiceDescriptor } from "../shared/types.js";
import type { DependencyInstaller, InstallRequest } from "../build/installers.js";
import { INSTALL_ROOTS } from "../build/installers.js";
import { DependencyInstallError } from "../shared/errors.js";
import type { CommandOptions, CommandResult, CommandRunner } from "../build/process.js";

export function makeTempDir(prefix = "servicepack-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/** Write files (relative path → content) under root. */
export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const target = path.join(root, ...rel.split("/"));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }
}

export function makeDescriptor(overrides: Partial<ServiceDescriptor> & { sourcePath: string }): ServiceDescriptor {
  return {
    name: "worker",
    ecosystem: "python",
    hasBuildStep: false,
    entrypoint: ["python3", "app2.py"],
    exposedPort: null,
    serve: "process",
    build: { command: ["npm", "run", "build"], outputDir: "build" },
    exclude: [],
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<EnvironmentProfile> = {}): EnvironmentProfile {
  return {
    name: "production",
    envVars: { APP_ENV: "production" },
    installMode: "full",
    buildEnabled: true,
    ...overrides,
  };
}

export interface FakeInstallerOptions {
  /** Package names the fake registry does not have */
  unavailable?: string[];
  /** Never finish on its own; settles only when aborted */
  hang?: boolean;
  /** Resolve only when release() is called */
  gated?: boolean;
}

/**
 * Stands in for pip/npm: writes one marker file per declared package into the
 * install root, or fails like the real tool when a package is unavailable.
 */
export class FakeInstaller implements DependencyInstaller {
  readonly calls: InstallRequest[] = [];
  private gate: Promise<void> = Promise.resolve();
  private openGate: () => void = () => undefined;

  constructor(private readonly options: FakeInstallerOptions = {}) {
    if (options.gated) {
      this.gate = new Promise((resolve) => {
        this.openGate = resolve;
      });
    }
  }

  release(): void {
    this.openGate();
  }

  async install(request: InstallRequest): Promise<void> {
    this.calls.push(request);

    if (this.options.hang) {
      await new Promise<never>((_, reject) => {
        request.signal.addEventListener("abort", () => reject(request.signal.reason), { once: true });
      });
    }
    await this.gate;

    for (const pkg of request.manifest.declaredPackages) {
      if (this.options.unavailable?.includes(pkg.name)) {
        throw new DependencyInstallError(`No matching distribution found for ${pkg.name}${pkg.version}`, {
          details: { stderr: `ERROR: No matching distribution found for ${pkg.name}${pkg.version}` },
        });
      }
    }

    const root = path.join(request.workDir, INSTALL_ROOTS[request.manifest.ecosystem]);
    fs.mkdirSync(root, { recursive: true });
    for (const pkg of request.manifest.declaredPackages) {
      fs.writeFileSync(path.join(root, `${pkg.name}.installed`), pkg.version);
    }
  }
}

export interface RecordedCommand {
  command: readonly string[];
  options: CommandOptions;
}

/**
 * A CommandRunner that records its calls and runs `handler` in process
 * instead of spawning anything.
 */
export function fakeRunner(
  handler: (command: readonly string[], options: CommandOptions) => CommandResult | Promise<CommandResult>,
): CommandRunner & { calls: RecordedCommand[] } {
  const calls: RecordedCommand[] = [];
  const runner = async (command: readonly string[], options: CommandOptions) => {
    calls.push({ command, options });
    return handler(command, options);
  };
  return Object.assign(runner, { calls });
}

/** Build tool that writes `files` into `<cwd>/<outputDir>` and exits 0. */
export function fakeBuild(outputDir: string, files: Record<string, string>): CommandRunner & { calls: RecordedCommand[] } {
  return fakeRunner((_command, options) => {
    writeTree(path.join(options.cwd, outputDir), files);
    return { exitCode: 0, stdout: "", stderr: "" };
  });
}

export const ok: CommandResult = { exitCode: 0, stdout: "", stderr: "" };
