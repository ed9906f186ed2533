/**
 * Filesystem and hashing helpers shared by the content-addressed stores.
 */

import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { createDevLogger } from "../shared/logging.js";

const log = createDevLogger("Fs");

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

/** sha256 over the parts, separated by NUL so ["ab","c"] and ["a","bc"] differ. */
export function hashStrings(parts: readonly string[]): string {
  const hash = crypto.createHash("sha256");
  for (const part of parts) {
    hash.update(part);
    hash.update("\0");
  }
  return hash.digest("hex");
}

export function hashFile(filePath: string): string {
  return crypto.createHash("sha256").update(fs.readFileSync(filePath)).digest("hex");
}

/**
 * Relative (posix) paths of every regular file under dir, sorted.
 * Symlinks are followed only when they point at files.
 */
export function walkFiles(dir: string): string[] {
  const out: string[] = [];

  function walk(current: string, prefix: string) {
    const entries = fs.readdirSync(current, { withFileTypes: true });
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const entry of entries) {
      const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(full, rel);
      } else if (entry.isFile() || (entry.isSymbolicLink() && fs.statSync(full).isFile())) {
        out.push(rel);
      }
    }
  }

  if (fs.existsSync(dir)) walk(dir, "");
  return out.sort();
}

export interface DirectoryDigest {
  hash: string;
  files: string[];
}

/** Hash of a directory tree: sorted relative paths paired with file digests. */
export function hashDirectory(dir: string): DirectoryDigest {
  const files = walkFiles(dir);
  const parts: string[] = [];
  for (const rel of files) {
    parts.push(rel, hashFile(path.join(dir, rel)));
  }
  return { hash: hashStrings(parts), files };
}

// ---------------------------------------------------------------------------
// Atomic promotion
// ---------------------------------------------------------------------------

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Remove a directory, logging instead of throwing. Used on cleanup paths where
 * a primary error is already in flight.
 */
export function removeDir(dir: string): void {
  try {
    fs.rmSync(dir, { recursive: true, force: true });
  } catch (error) {
    log.verbose(`Failed to remove ${dir}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/** Unique sibling path for building an entry before it is renamed into place. */
export function tmpSiblingOf(finalDir: string): string {
  return `${finalDir}.tmp.${Date.now()}.${process.pid}.${crypto.randomBytes(4).toString("hex")}`;
}

/**
 * Rename a fully written tmp directory onto its final path. When another
 * writer got there first and its sentinel exists, its entry is kept and ours
 * is discarded. Returns false in that case.
 */
export function promoteDirectory(tmpDir: string, finalDir: string, sentinel: string): boolean {
  try {
    fs.renameSync(tmpDir, finalDir);
    return true;
  } catch (error) {
    if (!isErrnoException(error) || !["ENOTEMPTY", "EEXIST", "ENOTDIR", "EPERM"].includes(error.code ?? "")) {
      removeDir(tmpDir);
      throw error;
    }

    if (fs.existsSync(path.join(finalDir, sentinel))) {
      removeDir(tmpDir);
      return false;
    }

    // Winner incomplete: replace it
    try {
      fs.rmSync(finalDir, { recursive: true, force: true });
      fs.renameSync(tmpDir, finalDir);
      return true;
    } catch (retryError) {
      removeDir(tmpDir);
      removeDir(finalDir);
      throw new Error(`Failed to promote ${path.basename(finalDir)}`, { cause: retryError });
    }
  }
}

/**
 * Swap a complete tmp directory in for an existing entry that must not be
 * kept. The old entry is moved aside first and removed once the new one is in
 * place.
 */
export function replaceDirectory(tmpDir: string, finalDir: string): void {
  const aside = tmpSiblingOf(finalDir);
  fs.renameSync(finalDir, aside);
  try {
    fs.renameSync(tmpDir, finalDir);
  } catch (error) {
    fs.renameSync(aside, finalDir);
    throw error;
  }
  removeDir(aside);
}

/** Write JSON through a tmp file and rename so readers never see half a file. */
export function writeJsonAtomic(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp.${process.pid}.${crypto.randomBytes(4).toString("hex")}`;
  fs.writeFileSync(tmpPath, JSON.stringify(value, null, 2));
  fs.renameSync(tmpPath, filePath);
}

/**
 * Ensure `relative` stays inside its base directory. Returns the normalized
 * posix form, or null when it escapes or is absolute.
 */
export function normalizeInside(relative: string): string | null {
  if (path.isAbsolute(relative) || path.win32.isAbsolute(relative)) return null;
  const normalized = path.posix.normalize(relative.replace(/\\/g, "/")).replace(/\/+$/, "");
  if (normalized === "" || normalized === "." || normalized === ".." || normalized.startsWith("../")) {
    return null;
  }
  return normalized;
}

export function isInside(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  return rel === "" || (rel.split(path.sep)[0] !== ".." && !path.isAbsolute(rel));
}
