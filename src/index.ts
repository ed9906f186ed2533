export * from "./shared/types.js";
export * from "./shared/errors.js";
export { createDevLogger, setLogLevel, type DevLogger, type LogLevel } from "./shared/logging.js";
export {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadConfig,
  parseConfig,
  resolveConfigPath,
  type PipelineConfig,
} from "./config/loader.js";
export { getDataDir, setDataDir } from "./config/paths.js";
export { selectProfile, selectService } from "./config/profiles.js";
export { stageSource, type StagedSource } from "./build/sourceStaging.js";
export { readDependencyManifest, verifyLock } from "./build/dependencyManifest.js";
export { DependencyCache } from "./build/dependencyCache.js";
export { CommandInstaller, type DependencyInstaller, type InstallRequest } from "./build/installers.js";
export { ArtifactStore } from "./build/artifactStore.js";
export { compileArtifact, shouldCompile } from "./build/artifactCompiler.js";
export { assembleImage, selectRuntime, type AssembledImage } from "./build/runtimeAssembler.js";
export { renderDockerfile } from "./build/dockerfile.js";
export { ImageStore, tagImage, type StoredImage } from "./build/imageStore.js";
export { PipelineRun, type RunState, type RunTransition } from "./build/pipelineRun.js";
export {
  Pipeline,
  type BuildOptions,
  type BuildRequest,
  type PipelineOptions,
  type RunOutcome,
} from "./build/pipeline.js";
export { runCommand, type CommandRunner, type CommandResult } from "./build/process.js";
