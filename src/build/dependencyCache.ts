/**
 * Dependency Cache: shared, content-addressed installs keyed by
 * (ecosystem, lock fingerprint).
 *
 * {dataDir}/deps/{ecosystem}-{fingerprint}/
 *   ├── site-packages/ | node_modules/   ← installed tree
 *   ├── requirements.* | package*.json
 *   ├── metadata.json
 *   └── .ready                    ← sentinel marking a completed install
 *
 * Entries are written in a tmp sibling and renamed into place, so a reader
 * either sees a complete entry or none. Concurrent misses on one key share a
 * single install; it is aborted once every waiter has given up.
 *
 * An entry records the install mode and runtime it was made for. A ci-clean
 * entry serves both modes; a full entry serves only full callers, and a
 * ci-clean caller that finds one reinstalls and replaces it. An entry made
 * for another runtime is replaced the same way.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { DependencyManifest, EnvironmentProfile, InstallMode, ResolvedDependencies } from "../shared/types.js";
import { DependencyInstallError, LockMismatchError, isBuildError } from "../shared/errors.js";
import { createDevLogger } from "../shared/logging.js";
import { promoteDirectory, removeDir, replaceDirectory, tmpSiblingOf } from "./fsUtils.js";
import { verifyLock } from "./dependencyManifest.js";
import { INSTALL_ROOTS, type DependencyInstaller } from "./installers.js";
import { raceTimeout } from "./timeout.js";

const log = createDevLogger("Deps");

export const READY_SENTINEL = ".ready";

const METADATA_FILE = "metadata.json";

const EntryMetadataSchema = z.object({
  ecosystem: z.enum(["python", "node"]),
  fingerprint: z.string(),
  installMode: z.enum(["full", "ci-clean"]),
  runtime: z.string(),
  declaredPackages: z.array(z.object({ name: z.string(), version: z.string() })),
  installedAt: z.string(),
});

export type DependencyEntryMetadata = z.infer<typeof EntryMetadataSchema>;

export interface ResolveOptions {
  /** Deadline for this caller; 0 disables it */
  timeoutMs: number;
  /** Base runtime image the tree will run on */
  runtime: string;
}

/** Whether an entry installed as `metadata` may serve a caller in `mode` on `runtime`. */
export function entrySatisfies(metadata: DependencyEntryMetadata, mode: InstallMode, runtime: string): boolean {
  if (metadata.runtime !== runtime) return false;
  return metadata.installMode === "ci-clean" || mode === "full";
}

interface InFlightInstall {
  promise: Promise<ResolvedDependencies>;
  controller: AbortController;
  waiters: number;
  settled: boolean;
}

export class DependencyCache {
  private readonly inFlight = new Map<string, InFlightInstall>();

  constructor(
    private readonly cacheDir: string,
    private readonly installer: DependencyInstaller,
  ) {}

  static keyFor(manifest: DependencyManifest): string {
    return `${manifest.ecosystem}-${manifest.lockFingerprint}`;
  }

  entryDir(manifest: DependencyManifest): string {
    return path.join(this.cacheDir, DependencyCache.keyFor(manifest));
  }

  /**
   * Completed entry for this manifest that can serve `mode` on `runtime`, or
   * null. Never triggers an install.
   */
  lookup(manifest: DependencyManifest, mode: InstallMode, runtime: string): ResolvedDependencies | null {
    const dir = this.entryDir(manifest);
    const metadata = this.readMetadata(dir);
    if (!metadata || !entrySatisfies(metadata, mode, runtime)) return null;
    return this.resolved(manifest, dir, metadata, true);
  }

  /** Metadata of the completed entry in `dir`, or null when there is none. */
  readMetadata(dir: string): DependencyEntryMetadata | null {
    if (!fs.existsSync(path.join(dir, READY_SENTINEL))) return null;
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(path.join(dir, METADATA_FILE), "utf-8"));
    } catch (error) {
      log.warn(`Unreadable metadata in ${dir}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
    const parsed = EntryMetadataSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn(`Ignoring malformed metadata in ${dir}`);
      return null;
    }
    return parsed.data;
  }

  private resolved(
    manifest: DependencyManifest,
    dir: string,
    metadata: DependencyEntryMetadata,
    cacheHit: boolean,
  ): ResolvedDependencies {
    return {
      manifest,
      dir,
      installRoot: path.join(dir, INSTALL_ROOTS[manifest.ecosystem]),
      installMode: metadata.installMode,
      runtime: metadata.runtime,
      cacheHit,
    };
  }

  /**
   * Resolve the dependency tree for a staged source. Under ci-clean the lock
   * must agree with the manifest, hit or miss.
   */
  async resolve(
    manifest: DependencyManifest,
    sourceDir: string,
    profile: EnvironmentProfile,
    options: ResolveOptions,
  ): Promise<ResolvedDependencies> {
    if (profile.installMode === "ci-clean") {
      const mismatches = verifyLock(sourceDir, manifest);
      if (mismatches.length > 0) throw new LockMismatchError(mismatches);
    }

    const { installMode } = profile;
    const key = DependencyCache.keyFor(manifest);
    const hit = this.lookup(manifest, installMode, options.runtime);
    if (hit) {
      log.info(`Cache hit ${key} (${hit.installMode})`);
      return hit;
    }

    // Installs of one key in different modes or for different runtimes never share
    const flightKey = `${key}|${installMode}|${options.runtime}`;
    let install = this.inFlight.get(flightKey);
    if (install) {
      log.verbose(`Joining in-flight install ${flightKey}`);
    } else {
      log.info(`Cache miss ${key}, installing (${installMode} for ${options.runtime})`);
      install = this.startInstall(flightKey, manifest, sourceDir, installMode, options.runtime);
    }

    const current = install;
    current.waiters++;
    try {
      return await raceTimeout(current.promise, "dependencies", options.timeoutMs);
    } finally {
      current.waiters--;
      if (current.waiters === 0 && !current.settled) {
        log.warn(`Aborting install ${key}: no callers left`);
        current.controller.abort(new DependencyInstallError(`Install ${key} was cancelled`));
      }
    }
  }

  private startInstall(
    flightKey: string,
    manifest: DependencyManifest,
    sourceDir: string,
    mode: InstallMode,
    runtime: string,
  ): InFlightInstall {
    const controller = new AbortController();
    const promise = this.install(manifest, sourceDir, mode, runtime, controller.signal).finally(() => {
      entry.settled = true;
      this.inFlight.delete(flightKey);
    });
    const entry: InFlightInstall = { promise, controller, waiters: 0, settled: false };
    this.inFlight.set(flightKey, entry);
    return entry;
  }

  private async install(
    manifest: DependencyManifest,
    sourceDir: string,
    mode: InstallMode,
    runtime: string,
    signal: AbortSignal,
  ): Promise<ResolvedDependencies> {
    const finalDir = this.entryDir(manifest);
    const name = path.basename(finalDir);
    fs.mkdirSync(this.cacheDir, { recursive: true });

    // Install to temp dir, then atomically rename
    const tmpDir = tmpSiblingOf(finalDir);
    fs.mkdirSync(tmpDir);

    try {
      for (const file of [manifest.manifestFile, manifest.lockFile]) {
        if (!file) continue;
        const target = path.join(tmpDir, file);
        fs.copyFileSync(path.join(sourceDir, file), target);
        fs.chmodSync(target, 0o644);
      }

      await this.installer.install({ manifest, mode, workDir: tmpDir, runtime, signal });
      signal.throwIfAborted();

      fs.mkdirSync(path.join(tmpDir, INSTALL_ROOTS[manifest.ecosystem]), { recursive: true });
      const metadata: DependencyEntryMetadata = {
        ecosystem: manifest.ecosystem,
        fingerprint: manifest.lockFingerprint,
        installMode: mode,
        runtime,
        declaredPackages: manifest.declaredPackages,
        installedAt: new Date().toISOString(),
      };
      fs.writeFileSync(path.join(tmpDir, METADATA_FILE), JSON.stringify(metadata, null, 2));
      // Sentinel goes in before the rename so the winner is always complete
      fs.writeFileSync(path.join(tmpDir, READY_SENTINEL), metadata.installedAt);

      const existing = this.readMetadata(finalDir);
      const completeOnDisk = fs.existsSync(path.join(finalDir, READY_SENTINEL));
      if (completeOnDisk && (!existing || !entrySatisfies(existing, mode, runtime))) {
        replaceDirectory(tmpDir, finalDir);
        log.info(`Replaced ${name}` + (existing ? ` (was ${existing.installMode} for ${existing.runtime})` : ""));
      } else if (!promoteDirectory(tmpDir, finalDir, READY_SENTINEL)) {
        log.verbose(`Another writer completed ${name} first`);
      }
      log.info(`Installed ${name}`);

      const onDisk = this.readMetadata(finalDir) ?? metadata;
      return this.resolved(manifest, finalDir, onDisk, false);
    } catch (error) {
      removeDir(tmpDir);
      if (isBuildError(error)) throw error;
      throw new DependencyInstallError(
        `Failed to install dependencies: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  private installing(key: string): boolean {
    for (const flightKey of this.inFlight.keys()) {
      if (flightKey.startsWith(`${key}|`)) return true;
    }
    return false;
  }

  /** Keys of every completed entry. */
  listKeys(): string[] {
    if (!fs.existsSync(this.cacheDir)) return [];
    return fs
      .readdirSync(this.cacheDir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && fs.existsSync(path.join(this.cacheDir, entry.name, READY_SENTINEL)))
      .map((entry) => entry.name)
      .sort();
  }

  /**
   * Remove entries whose key is not in `keep`, plus abandoned tmp dirs.
   * Entries with an install in flight are left alone.
   */
  gc(keep: ReadonlySet<string>): { removed: string[] } {
    const removed: string[] = [];
    if (!fs.existsSync(this.cacheDir)) return { removed };

    for (const entry of fs.readdirSync(this.cacheDir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      const key = entry.name.split(".tmp.")[0] ?? entry.name;
      if (keep.has(entry.name) || this.installing(key)) continue;
      removeDir(path.join(this.cacheDir, entry.name));
      removed.push(entry.name);
    }
    return { removed };
  }
}
