/**
 * Core data model shared by every pipeline stage.
 */

export type Ecosystem = "python" | "node";

export type InstallMode = "full" | "ci-clean";

/** How the assembled image runs the service. */
export type ServeMode = "process" | "static";

export interface BuildStepConfig {
  /** Command run inside the scratch directory, exec form */
  command: string[];
  /** Directory (relative to the source root) the command writes its output to */
  outputDir: string;
}

/**
 * What is being packaged. Declared once per service in servicepack.yml and
 * frozen after loading.
 */
export interface ServiceDescriptor {
  readonly name: string;
  /** Absolute path to the service's source tree */
  readonly sourcePath: string;
  readonly ecosystem: Ecosystem;
  readonly hasBuildStep: boolean;
  /** Process entrypoint, exec form (e.g. ["python3", "app2.py"]) */
  readonly entrypoint: readonly string[];
  /** Port the running container listens on, or null when it serves nothing */
  readonly exposedPort: number | null;
  readonly serve: ServeMode;
  readonly build: Readonly<BuildStepConfig>;
  /** Extra ignore patterns applied while staging (gitignore syntax) */
  readonly exclude: readonly string[];
}

/**
 * A named build/runtime configuration (dev, production, ...). Exactly one is
 * active per pipeline run; it is frozen on selection.
 */
export interface EnvironmentProfile {
  readonly name: string;
  /** Variables surfaced into the running container, and nothing else */
  readonly envVars: Readonly<Record<string, string>>;
  readonly installMode: InstallMode;
  readonly buildEnabled: boolean;
}

export interface DeclaredPackage {
  name: string;
  /** Version spec as written in the manifest ("==2.31.0", "^18.2.0", "" when unpinned) */
  version: string;
}

export interface DependencyManifest {
  ecosystem: Ecosystem;
  /** sha256 over ecosystem, manifest bytes and lock bytes */
  lockFingerprint: string;
  declaredPackages: DeclaredPackage[];
  /** File name of the manifest inside the source root */
  manifestFile: string;
  /** File name of the lock inside the source root, null when absent */
  lockFile: string | null;
}

/** Where a resolved dependency tree lives in the shared cache. */
export interface ResolvedDependencies {
  manifest: DependencyManifest;
  /** Cache entry directory (contains the installed tree) */
  dir: string;
  /** Directory inside `dir` that the runtime image copies */
  installRoot: string;
  /** Mode the tree was installed with; a ci-clean tree also serves full callers */
  installMode: InstallMode;
  /** Base runtime the tree was installed for */
  runtime: string;
  cacheHit: boolean;
}

export type ArtifactOutputKind = "static_dir" | "runnable_image";

export interface BuildArtifact {
  readonly service: string;
  readonly environment: string;
  readonly producedAt: string;
  readonly outputKind: ArtifactOutputKind;
  readonly contentHash: string;
  /** Absolute path of the stored output */
  readonly dir: string;
}

export type LayerAction = "copy-dependencies" | "copy-source" | "copy-artifact" | "write-config";

export type LayerSource =
  | { kind: "dependencies"; service: string; ecosystem: Ecosystem; fingerprint: string; dir: string }
  | { kind: "source"; service: string; dir: string }
  | { kind: "artifact"; service: string; environment: string; dir: string }
  /** Files rendered by the assembler (file name → content) */
  | { kind: "generated"; service: string; files: Record<string, string> };

export interface ImageLayer {
  action: LayerAction;
  source: LayerSource;
  /** Absolute path inside the image */
  target: string;
  contentHash: string;
}

export interface Image {
  service: string;
  environment: string;
  baseRuntime: string;
  layers: ImageLayer[];
  entrypoint: string[];
  exposedPort: number | null;
  env: Record<string, string>;
  workdir: string;
  contentHash: string;
  tag: string;
}
