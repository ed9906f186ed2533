/**
 * Dependency manifests: what a service declares, and a fingerprint of it.
 *
 *   python: requirements.txt (+ requirements.lock, `name==version` per line)
 *   node:   package.json     (+ package-lock.json, lockfileVersion 2 or 3)
 *
 * The fingerprint covers the ecosystem and the exact manifest and lock bytes,
 * so any edit to either produces a new dependency cache key.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { DeclaredPackage, DependencyManifest, Ecosystem } from "../shared/types.js";
import { DependencyInstallError } from "../shared/errors.js";
import { hashStrings } from "./fsUtils.js";

export const MANIFEST_FILES: Record<Ecosystem, { manifest: string; lock: string }> = {
  python: { manifest: "requirements.txt", lock: "requirements.lock" },
  node: { manifest: "package.json", lock: "package-lock.json" },
};

const DependencyMapSchema = z.record(z.string());

const PackageJsonSchema = z
  .object({
    dependencies: DependencyMapSchema.optional(),
    devDependencies: DependencyMapSchema.optional(),
  })
  .passthrough();

const PackageLockSchema = z
  .object({
    lockfileVersion: z.number().int(),
    packages: z
      .record(
        z
          .object({
            version: z.string().optional(),
            dependencies: DependencyMapSchema.optional(),
            devDependencies: DependencyMapSchema.optional(),
          })
          .passthrough(),
      )
      .optional(),
  })
  .passthrough();

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** PEP 503 name normalization: lowercase, runs of -_. become a single dash. */
export function normalizePythonName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

/**
 * Parse requirements.txt / requirements.lock content. Options (-r, --index-url),
 * comments and environment markers are ignored.
 */
export function parseRequirements(text: string): DeclaredPackage[] {
  const packages: DeclaredPackage[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/(^|\s)#.*$/, "").trim();
    if (!line || line.startsWith("-")) continue;

    const withoutMarker = line.split(";")[0]?.trim() ?? "";
    const match = /^([A-Za-z0-9][A-Za-z0-9._-]*)(\[[^\]]*\])?\s*(.*)$/.exec(withoutMarker);
    if (!match?.[1]) continue;

    packages.push({
      name: normalizePythonName(match[1]),
      version: (match[3] ?? "").replace(/\s+/g, ""),
    });
  }
  return sortPackages(packages);
}

export function parsePackageJson(text: string): DeclaredPackage[] {
  const parsed = PackageJsonSchema.parse(JSON.parse(text));
  const packages: DeclaredPackage[] = [];
  for (const field of [parsed.dependencies, parsed.devDependencies]) {
    for (const [name, version] of Object.entries(field ?? {})) {
      packages.push({ name, version });
    }
  }
  return sortPackages(packages);
}

function sortPackages(packages: DeclaredPackage[]): DeclaredPackage[] {
  return packages.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}

export function computeLockFingerprint(ecosystem: Ecosystem, manifest: Buffer, lock: Buffer | null): string {
  return hashStrings([
    ecosystem,
    manifest.toString("base64"),
    lock === null ? "<no-lock>" : lock.toString("base64"),
  ]);
}

/**
 * Read the manifest (and lock, when present) from a staged source tree.
 */
export function readDependencyManifest(dir: string, ecosystem: Ecosystem): DependencyManifest {
  const files = MANIFEST_FILES[ecosystem];
  const manifestPath = path.join(dir, files.manifest);
  if (!fs.existsSync(manifestPath)) {
    throw new DependencyInstallError(`Dependency manifest ${files.manifest} not found`, {
      details: { ecosystem, dir },
    });
  }

  const manifestBytes = fs.readFileSync(manifestPath);
  const lockPath = path.join(dir, files.lock);
  const lockBytes = fs.existsSync(lockPath) ? fs.readFileSync(lockPath) : null;

  let declaredPackages: DeclaredPackage[];
  try {
    declaredPackages =
      ecosystem === "python"
        ? parseRequirements(manifestBytes.toString("utf-8"))
        : parsePackageJson(manifestBytes.toString("utf-8"));
  } catch (error) {
    throw new DependencyInstallError(`Cannot parse ${files.manifest}`, {
      cause: error,
      details: { ecosystem, dir },
    });
  }

  return {
    ecosystem,
    lockFingerprint: computeLockFingerprint(ecosystem, manifestBytes, lockBytes),
    declaredPackages,
    manifestFile: files.manifest,
    lockFile: lockBytes === null ? null : files.lock,
  };
}

// ---------------------------------------------------------------------------
// Lock verification (ci-clean)
// ---------------------------------------------------------------------------

/**
 * Compare the lock against the manifest. Returns one message per
 * disagreement; an empty list means the lock can be installed as-is.
 */
export function verifyLock(dir: string, manifest: DependencyManifest): string[] {
  const files = MANIFEST_FILES[manifest.ecosystem];
  const lockPath = path.join(dir, files.lock);
  if (!fs.existsSync(lockPath)) return [`${files.lock} is missing`];

  const lockText = fs.readFileSync(lockPath, "utf-8");
  return manifest.ecosystem === "python"
    ? verifyRequirementsLock(manifest.declaredPackages, lockText)
    : verifyPackageLock(fs.readFileSync(path.join(dir, files.manifest), "utf-8"), lockText);
}

function verifyRequirementsLock(declared: DeclaredPackage[], lockText: string): string[] {
  const locked = new Map(parseRequirements(lockText).map((pkg) => [pkg.name, pkg.version]));
  const mismatches: string[] = [];

  for (const [name, version] of locked) {
    if (!version.startsWith("==")) {
      mismatches.push(`${name} is not pinned to an exact version in requirements.lock`);
    }
  }

  for (const pkg of declared) {
    const lockedVersion = locked.get(pkg.name);
    if (lockedVersion === undefined) {
      mismatches.push(`${pkg.name} is not pinned in requirements.lock`);
    } else if (pkg.version.startsWith("==") && pkg.version !== lockedVersion) {
      mismatches.push(`${pkg.name}: requirements.txt wants ${pkg.version}, requirements.lock has ${lockedVersion}`);
    }
  }
  return mismatches;
}

function verifyPackageLock(packageJsonText: string, lockText: string): string[] {
  let lock: z.infer<typeof PackageLockSchema>;
  try {
    lock = PackageLockSchema.parse(JSON.parse(lockText));
  } catch {
    return ["package-lock.json is not valid JSON"];
  }
  if (lock.lockfileVersion < 2 || !lock.packages) {
    return [`package-lock.json lockfileVersion ${lock.lockfileVersion} is not supported`];
  }

  const pkg = PackageJsonSchema.parse(JSON.parse(packageJsonText));
  const lockRoot = lock.packages[""];
  const mismatches: string[] = [];

  for (const field of ["dependencies", "devDependencies"] as const) {
    const wanted = pkg[field] ?? {};
    const recorded = lockRoot?.[field] ?? {};

    for (const [name, range] of Object.entries(wanted)) {
      const lockedRange = recorded[name];
      if (lockedRange !== range) {
        mismatches.push(`${name}: package.json wants ${range}, package-lock.json has ${lockedRange ?? "nothing"}`);
      } else if (!lock.packages[`node_modules/${name}`]) {
        mismatches.push(`${name} is missing from package-lock.json packages`);
      }
    }
    for (const name of Object.keys(recorded)) {
      if (!(name in wanted)) {
        mismatches.push(`${name} is in package-lock.json but not in package.json ${field}`);
      }
    }
  }
  return mismatches;
}
