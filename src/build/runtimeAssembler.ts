/**
 * Runtime Assembler: describe the final image as a base runtime plus an
 * ordered list of copy layers.
 *
 * Two runtime kinds:
 *   process: ecosystem base image; dependencies, staged source, then the
 *            compiled artifact when there is one. Runs the descriptor's
 *            entrypoint.
 *   static: static file server base image holding only the compiled
 *           static_dir, plus a generated server config listening on the
 *           declared port. No source, no dependency tree.
 */

import type {
  BuildArtifact,
  Ecosystem,
  EnvironmentProfile,
  Image,
  ImageLayer,
  ResolvedDependencies,
  ServiceDescriptor,
} from "../shared/types.js";
import type { RuntimeImages } from "../config/schema.js";
import { AssemblyError } from "../shared/errors.js";
import { createDevLogger } from "../shared/logging.js";
import type { StagedSource } from "./sourceStaging.js";
import { hashStrings, isInside, normalizeInside } from "./fsUtils.js";
import { pythonVersionOf } from "./installers.js";

const log = createDevLogger("Assembler");

export const APP_WORKDIR = "/app";
export const STATIC_WEB_ROOT = "/usr/share/nginx/html";
export const STATIC_ENTRYPOINT: readonly string[] = ["nginx", "-g", "daemon off;"];
export const STATIC_CONFIG_DIR = "/etc/nginx/conf.d";
export const STATIC_CONFIG_FILE = "default.conf";

/** Where an ecosystem's installed tree lands in an image built on `runtime`. */
export function dependencyTarget(ecosystem: Ecosystem, runtime: string): string {
  if (ecosystem === "node") return `${APP_WORKDIR}/node_modules`;
  const version = pythonVersionOf(runtime);
  if (version === null) {
    throw new AssemblyError(`Cannot tell the Python version of runtime ${runtime} (expected python:X.Y)`, {
      details: { runtime },
    });
  }
  return `/usr/local/lib/python${version}/site-packages`;
}

/** Server block replacing the image's default site: serve the web root on `port`. */
export function staticServerConfig(port: number): string {
  return [
    "server {",
    `    listen ${port};`,
    `    listen [::]:${port};`,
    "    server_name _;",
    `    root ${STATIC_WEB_ROOT};`,
    "    index index.html;",
    "",
    "    location / {",
    "        try_files $uri $uri/ /index.html;",
    "    }",
    "}",
    "",
  ].join("\n");
}

export type RuntimeKind = "process" | "static";

/** An assembled image before tagging. */
export type AssembledImage = Omit<Image, "tag">;

export interface AssembleInput {
  descriptor: ServiceDescriptor;
  profile: EnvironmentProfile;
  staged: StagedSource;
  dependencies: ResolvedDependencies;
  /** Compiled output, or null when compilation was skipped */
  artifact: BuildArtifact | null;
  runtimes: Readonly<RuntimeImages>;
  /** Source roots of the other services; no layer may read from them */
  foreignSourceRoots?: readonly string[];
}

export function selectRuntime(descriptor: ServiceDescriptor, artifact: BuildArtifact | null): RuntimeKind {
  return descriptor.serve === "static" && artifact !== null ? "static" : "process";
}

export function assembleImage(input: AssembleInput): AssembledImage {
  const { descriptor, profile, artifact } = input;
  const kind = selectRuntime(descriptor, artifact);

  const baseRuntime = kind === "static" ? input.runtimes.static : input.runtimes[descriptor.ecosystem];
  if (!baseRuntime) {
    throw new AssemblyError(`No base runtime configured for ${kind === "static" ? "static" : descriptor.ecosystem}`, {
      details: { service: descriptor.name, runtime: kind },
    });
  }

  const exposedPort = checkPort(descriptor, profile);
  const layers =
    kind === "static" && artifact ? staticLayers(descriptor, artifact, exposedPort) : processLayers(input, baseRuntime);
  checkOwnership(layers, input);

  const env = sortedEnv(profile.envVars);
  const entrypoint = kind === "static" ? [...STATIC_ENTRYPOINT] : [...descriptor.entrypoint];
  const workdir = kind === "static" ? STATIC_WEB_ROOT : APP_WORKDIR;

  const image: AssembledImage = {
    service: descriptor.name,
    environment: profile.name,
    baseRuntime,
    layers,
    entrypoint,
    exposedPort,
    env,
    workdir,
    contentHash: computeImageHash({
      service: descriptor.name,
      environment: profile.name,
      baseRuntime,
      layers,
      entrypoint,
      exposedPort,
      env,
      workdir,
    }),
  };

  log.verbose(
    `${descriptor.name} (${profile.name}): ${kind} runtime on ${baseRuntime}, ${layers.length} layers, ${image.contentHash.slice(0, 12)}`,
  );
  return image;
}

export function computeImageHash(image: Omit<AssembledImage, "contentHash">): string {
  return hashStrings([
    image.service,
    image.environment,
    image.baseRuntime,
    ...image.layers.flatMap((layer) => [layer.action, layer.target, layer.contentHash]),
    JSON.stringify(image.entrypoint),
    String(image.exposedPort),
    image.workdir,
    JSON.stringify(Object.entries(image.env).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))),
  ]);
}

// ---------------------------------------------------------------------------
// Layers
// ---------------------------------------------------------------------------

function staticLayers(descriptor: ServiceDescriptor, artifact: BuildArtifact, port: number | null): ImageLayer[] {
  const layers = [artifactLayer(artifact, STATIC_WEB_ROOT)];
  if (port !== null) {
    const files = { [STATIC_CONFIG_FILE]: staticServerConfig(port) };
    layers.push({
      action: "write-config",
      source: { kind: "generated", service: descriptor.name, files },
      target: STATIC_CONFIG_DIR,
      contentHash: hashStrings(Object.entries(files).flat()),
    });
  }
  return layers;
}

function processLayers(input: AssembleInput, baseRuntime: string): ImageLayer[] {
  const { descriptor, staged, dependencies, artifact } = input;
  const layers: ImageLayer[] = [];

  if (dependencies.manifest.declaredPackages.length > 0) {
    if (dependencies.runtime !== baseRuntime) {
      throw new AssemblyError(
        `Dependencies of ${descriptor.name} were installed for ${dependencies.runtime}, but the image runs on ${baseRuntime}`,
        { details: { service: descriptor.name, installedFor: dependencies.runtime, baseRuntime } },
      );
    }
    layers.push({
      action: "copy-dependencies",
      source: {
        kind: "dependencies",
        service: descriptor.name,
        ecosystem: dependencies.manifest.ecosystem,
        fingerprint: dependencies.manifest.lockFingerprint,
        dir: dependencies.installRoot,
      },
      target: dependencyTarget(dependencies.manifest.ecosystem, baseRuntime),
      contentHash: dependencies.manifest.lockFingerprint,
    });
  }

  layers.push({
    action: "copy-source",
    source: { kind: "source", service: staged.service, dir: staged.dir },
    target: APP_WORKDIR,
    contentHash: staged.contentHash,
  });

  if (artifact) {
    const outputRel = normalizeInside(descriptor.build.outputDir);
    if (outputRel === null) {
      throw new AssemblyError(`Build output directory escapes the source root: ${descriptor.build.outputDir}`);
    }
    layers.push(artifactLayer(artifact, `${APP_WORKDIR}/${outputRel}`));
  }
  return layers;
}

function artifactLayer(artifact: BuildArtifact, target: string): ImageLayer {
  return {
    action: "copy-artifact",
    source: { kind: "artifact", service: artifact.service, environment: artifact.environment, dir: artifact.dir },
    target,
    contentHash: artifact.contentHash,
  };
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

function checkOwnership(layers: ImageLayer[], input: AssembleInput): void {
  const { descriptor, profile } = input;
  for (const layer of layers) {
    const { source } = layer;
    if (source.service !== descriptor.name) {
      throw new AssemblyError(`Layer ${layer.action} belongs to service "${source.service}", not "${descriptor.name}"`, {
        details: { service: descriptor.name, layerService: source.service },
      });
    }
    if (source.kind === "artifact" && source.environment !== profile.name) {
      throw new AssemblyError(
        `Artifact for environment "${source.environment}" cannot be used in "${profile.name}"`,
        { details: { service: descriptor.name, artifactEnvironment: source.environment } },
      );
    }
    if (source.kind === "generated") continue;
    for (const root of input.foreignSourceRoots ?? []) {
      if (isInside(root, source.dir)) {
        throw new AssemblyError(`Layer ${layer.action} reads from another service's source tree ${root}`, {
          details: { service: descriptor.name, dir: source.dir },
        });
      }
    }
  }
}

function checkPort(descriptor: ServiceDescriptor, profile: EnvironmentProfile): number | null {
  const port = descriptor.exposedPort;
  if (port === null) return null;

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new AssemblyError(`Invalid port ${port} for ${descriptor.name}`, {
      details: { service: descriptor.name, port },
    });
  }

  const fromEnv = profile.envVars["PORT"];
  if (fromEnv !== undefined && Number(fromEnv) !== port) {
    throw new AssemblyError(
      `Port conflict: ${descriptor.name} exposes ${port} but profile ${profile.name} sets PORT=${fromEnv}`,
      { details: { service: descriptor.name, port, profilePort: fromEnv } },
    );
  }
  return port;
}

function sortedEnv(vars: Readonly<Record<string, string>>): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of Object.keys(vars).sort()) {
    const value = vars[key];
    if (value !== undefined) env[key] = value;
  }
  return env;
}
