/**
 * Pipeline Orchestrator: one run per (service, environment).
 *
 * Runs the stages in order, records every step on a PipelineRun and emits it
 * as a "transition" event. A failing stage fails the run with its error
 * unchanged (plus the stage name); nothing is retried and no stored output is
 * substituted for a failed stage.
 *
 * Runs share only the dependency cache and the content-addressed stores.
 * Each run stages into its own build context and works on its own frozen copy
 * of the profile.
 */

import * as path from "path";
import { EventEmitter } from "events";
import pLimit from "p-limit";
import type { BuildArtifact, Image } from "../shared/types.js";
import { toBuildError, type BuildError, type BuildStage } from "../shared/errors.js";
import { createDevLogger } from "../shared/logging.js";
import type { PipelineConfig } from "../config/loader.js";
import { selectProfile, selectService } from "../config/profiles.js";
import {
  getArtifactsDir,
  getDataDir,
  getDefaultTimeoutMs,
  getDependencyCacheDir,
  getImagesDir,
} from "../config/paths.js";
import { stageSource, type StagedSource } from "./sourceStaging.js";
import { readDependencyManifest } from "./dependencyManifest.js";
import { DependencyCache } from "./dependencyCache.js";
import { CommandInstaller, type DependencyInstaller } from "./installers.js";
import { ArtifactStore } from "./artifactStore.js";
import { compileArtifact, shouldCompile } from "./artifactCompiler.js";
import { assembleImage } from "./runtimeAssembler.js";
import { ImageStore, tagImage, type StoredImage } from "./imageStore.js";
import { PipelineRun, type RunTransition } from "./pipelineRun.js";
import { runCommand, type CommandRunner } from "./process.js";

const log = createDevLogger("Pipeline");

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PipelineOptions {
  config: PipelineConfig;
  /** Root for the dependency cache, artifacts and images (defaults to getDataDir()) */
  dataDir?: string;
  /** Runs build steps; installs too unless `installer` is given */
  runner?: CommandRunner;
  installer?: DependencyInstaller;
  /** Per-stage deadline (defaults to getDefaultTimeoutMs()); 0 disables it */
  timeoutMs?: number;
  /** Parent directory for build contexts and scratch copies */
  workDir?: string;
}

export interface BuildOptions {
  timeoutMs?: number;
}

export interface BuildRequest {
  service: string;
  environment: string;
}

export type RunOutcome =
  | { ok: true; run: PipelineRun; image: Image; stored: StoredImage }
  | { ok: false; run: PipelineRun; error: BuildError };

export interface PipelineEvents {
  transition: { run: PipelineRun; transition: RunTransition };
}

export interface GcResult {
  dependencies: string[];
  artifacts: string[];
  images: string[];
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export class Pipeline extends EventEmitter {
  readonly config: PipelineConfig;
  readonly dataDir: string;
  readonly dependencies: DependencyCache;
  readonly artifacts: ArtifactStore;
  readonly images: ImageStore;
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;
  private readonly workDir: string | undefined;

  constructor(options: PipelineOptions) {
    super();
    this.config = options.config;
    this.dataDir = options.dataDir ?? getDataDir();
    this.runner = options.runner ?? runCommand;
    this.timeoutMs = options.timeoutMs ?? getDefaultTimeoutMs();
    this.workDir = options.workDir;
    this.dependencies = new DependencyCache(
      getDependencyCacheDir(this.dataDir),
      options.installer ?? new CommandInstaller(this.runner),
    );
    this.artifacts = new ArtifactStore(getArtifactsDir(this.dataDir));
    this.images = new ImageStore(getImagesDir(this.dataDir));
  }

  /** Build one image. Rejects with the failing stage's BuildError. */
  async build(service: string, environment: string, options: BuildOptions = {}): Promise<Image> {
    const outcome = await this.execute({ service, environment }, options);
    if (!outcome.ok) throw outcome.error;
    return outcome.image;
  }

  /** Build several images, at most `concurrency` at a time. Never rejects. */
  async buildMany(
    requests: readonly BuildRequest[],
    options: BuildOptions & { concurrency?: number } = {},
  ): Promise<RunOutcome[]> {
    const limit = pLimit(Math.max(1, options.concurrency ?? 2));
    return Promise.all(requests.map((request) => limit(() => this.execute(request, options))));
  }

  /** Run the pipeline and report the outcome instead of throwing. */
  async execute(request: BuildRequest, options: BuildOptions = {}): Promise<RunOutcome> {
    const run = new PipelineRun(request.service, request.environment, (current, transition) => {
      log.verbose(
        `${current.service} (${current.environment}): ${transition.from} -> ${transition.to}` +
          (transition.detail ? ` [${transition.detail}]` : ""),
      );
      try {
        this.emit("transition", { run: current, transition } satisfies PipelineEvents["transition"]);
      } catch (error) {
        // Listener errors never fail the run
        log.warn(
          `transition listener failed on ${transition.to}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    });

    let stage: BuildStage = "config";
    let staged: StagedSource | null = null;

    try {
      const descriptor = selectService(this.config, request.service);
      const profile = selectProfile(this.config, request.environment);
      const timeoutMs = options.timeoutMs ?? this.timeoutMs;
      log.info(`Building ${descriptor.name} (${profile.name})`);

      stage = "staging";
      staged = stageSource(descriptor, { workDir: this.workDir });
      run.advance("staged", `${staged.files.length} files`);

      stage = "dependencies";
      const manifest = readDependencyManifest(staged.dir, descriptor.ecosystem);
      const dependencies = await this.dependencies.resolve(manifest, staged.dir, profile, {
        timeoutMs,
        runtime: this.config.runtimes[descriptor.ecosystem],
      });
      run.advance("dependencies_resolved", dependencies.cacheHit ? "cache hit" : "installed");

      let artifact: BuildArtifact | null = null;
      if (shouldCompile(descriptor, profile)) {
        stage = "compile";
        artifact = await compileArtifact({
          descriptor,
          profile,
          staged,
          dependencies,
          store: this.artifacts,
          timeoutMs,
          runner: this.runner,
          workDir: this.workDir,
        });
        run.advance("compiled", artifact.contentHash.slice(0, 12));
      } else {
        run.advance(
          "compile_skipped",
          descriptor.hasBuildStep ? `build disabled by profile ${profile.name}` : "no build step",
        );
      }

      stage = "assembly";
      const assembled = assembleImage({
        descriptor,
        profile,
        staged,
        dependencies,
        artifact,
        runtimes: this.config.runtimes,
        foreignSourceRoots: this.foreignSourceRoots(descriptor.name, descriptor.sourcePath),
      });
      run.advance("assembled", assembled.contentHash.slice(0, 12));

      stage = "tagging";
      const image = tagImage(assembled);
      const stored = this.images.put(image);
      run.advance("tagged", image.tag);

      log.info(`Built ${image.tag}`);
      return { ok: true, run, image, stored };
    } catch (error) {
      const buildError = toBuildError(error, stage);
      if (!run.isTerminal()) run.fail(buildError);
      log.error(
        `${request.service} (${request.environment}) failed at ${buildError.stage ?? stage}: ${buildError.message}`,
      );
      return { ok: false, run, error: buildError };
    } finally {
      staged?.cleanup();
    }
  }

  /** Prune images no tag points at, then artifacts and dependency entries nothing references. */
  gc(): GcResult {
    const images = this.images.gc().removed;

    const keep = new Set<string>();
    for (const stored of this.images.list()) {
      for (const layer of stored.image.layers) {
        if (layer.source.kind === "dependencies") {
          keep.add(`${layer.source.ecosystem}-${layer.source.fingerprint}`);
        }
      }
    }
    const dependencies = this.dependencies.gc(keep).removed;
    const artifacts = this.artifacts.gc().removed;

    log.info(
      `GC removed ${images.length} images, ${artifacts.length} artifacts, ${dependencies.length} dependency entries`,
    );
    return { dependencies, artifacts, images };
  }

  private foreignSourceRoots(service: string, ownRoot: string): string[] {
    const roots: string[] = [];
    for (const descriptor of this.config.services.values()) {
      if (descriptor.name === service) continue;
      // Skip roots that contain this service's own tree
      if (path.relative(descriptor.sourcePath, ownRoot).split(path.sep)[0] !== "..") continue;
      roots.push(descriptor.sourcePath);
    }
    return roots;
  }
}
