import * as path from "path";
import * as os from "os";

let dataDirOverride: string | null = null;

/** Explicitly set the data directory (CLI --data-dir, tests). */
export function setDataDir(p: string | null): void {
  dataDirOverride = p === null ? null : path.resolve(p);
}

/**
 * Directory holding the dependency cache, artifact store and image contexts.
 * Resolution order:
 *   1. Explicitly set via setDataDir()
 *   2. SERVICEPACK_DATA_DIR
 *   3. Platform-conventional cache directory (XDG / Library / LocalAppData)
 */
export function getDataDir(): string {
  if (dataDirOverride) return dataDirOverride;
  const fromEnv = process.env["SERVICEPACK_DATA_DIR"];
  if (fromEnv) return path.resolve(fromEnv);
  return platformDefault();
}

function platformDefault(): string {
  const home = os.homedir();
  switch (process.platform) {
    case "win32": {
      const localAppData = process.env["LOCALAPPDATA"] ?? path.join(home, "AppData", "Local");
      return path.join(localAppData, "servicepack", "cache");
    }
    case "darwin":
      return path.join(home, "Library", "Caches", "servicepack");
    default: {
      const xdgCache = process.env["XDG_CACHE_HOME"] ?? path.join(home, ".cache");
      return path.join(xdgCache, "servicepack");
    }
  }
}

export function getDependencyCacheDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, "deps");
}

export function getArtifactsDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, "artifacts");
}

export function getImagesDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, "images");
}

const DEFAULT_TIMEOUT_MS = 600_000;

/** Default per-stage bound for installs and compiles. */
export function getDefaultTimeoutMs(): number {
  const raw = process.env["SERVICEPACK_TIMEOUT_MS"];
  if (!raw) return DEFAULT_TIMEOUT_MS;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_TIMEOUT_MS;
}
