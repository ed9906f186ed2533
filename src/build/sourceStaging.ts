/**
 * Source Staging: copy a service's source tree into a fresh build context.
 *
 * {tmpdir}/servicepack-stage-{service}-XXXXXX/
 *   └── (exactly the service's files, read-only)
 *
 * Nothing outside `descriptor.sourcePath` is ever read: symlinks resolving
 * outside the root fail the stage.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import ignore, { type Ignore } from "ignore";
import type { ServiceDescriptor } from "../shared/types.js";
import { StagingError } from "../shared/errors.js";
import { createDevLogger } from "../shared/logging.js";
import { hashStrings, hashFile, isInside, removeDir } from "./fsUtils.js";

const log = createDevLogger("Staging");

export const DEFAULT_EXCLUDES = [".git/", "node_modules/", "__pycache__/", "*.pyc", ".venv/", ".DS_Store"];
export const DOCKERIGNORE_FILE = ".dockerignore";

export interface StagedSource {
  service: string;
  /** Build context directory */
  dir: string;
  /** Staged relative paths, sorted */
  files: string[];
  contentHash: string;
  /** Remove the build context. Safe to call more than once. */
  cleanup(): void;
}

export interface StageOptions {
  /** Parent directory for the build context (defaults to os.tmpdir()) */
  workDir?: string;
}

/**
 * Build the ignore matcher for a service: built-in excludes, the build output
 * directory, descriptor excludes and the source root's .dockerignore.
 */
export function createStageFilter(descriptor: ServiceDescriptor): Ignore {
  const filter = ignore().add(DEFAULT_EXCLUDES);
  if (descriptor.hasBuildStep) {
    filter.add(`/${descriptor.build.outputDir.replace(/^\.?\/+/, "").replace(/\/+$/, "")}/`);
  }
  filter.add([...descriptor.exclude]);

  const dockerignore = path.join(descriptor.sourcePath, DOCKERIGNORE_FILE);
  if (fs.existsSync(dockerignore)) {
    filter.add(fs.readFileSync(dockerignore, "utf-8"));
  }
  return filter;
}

export function stageSource(descriptor: ServiceDescriptor, options: StageOptions = {}): StagedSource {
  const root = descriptor.sourcePath;

  let rootStat: fs.Stats;
  try {
    rootStat = fs.statSync(root);
  } catch (error) {
    throw new StagingError(`Source path does not exist: ${root}`, {
      cause: error,
      details: { service: descriptor.name, sourcePath: root },
    });
  }
  if (!rootStat.isDirectory()) {
    throw new StagingError(`Source path is not a directory: ${root}`, {
      details: { service: descriptor.name, sourcePath: root },
    });
  }

  const realRoot = fs.realpathSync(root);
  const filter = createStageFilter(descriptor);
  const parent = options.workDir ?? os.tmpdir();
  fs.mkdirSync(parent, { recursive: true });
  const dir = fs.mkdtempSync(path.join(parent, `servicepack-stage-${descriptor.name}-`));

  let cleaned = false;
  const cleanup = () => {
    if (cleaned) return;
    cleaned = true;
    removeDir(dir);
  };

  try {
    const copied = copyTree(realRoot, dir, filter);
    if (copied.length === 0) {
      throw new StagingError(`Source path contains no files to stage: ${root}`, {
        details: { service: descriptor.name, sourcePath: root },
      });
    }

    const files = copied.map((entry) => entry.rel);
    const contentHash = hashStrings(copied.flatMap((entry) => [entry.rel, entry.digest]));
    log.verbose(`Staged ${files.length} files for ${descriptor.name} into ${dir}`);

    return { service: descriptor.name, dir, files, contentHash, cleanup };
  } catch (error) {
    cleanup();
    if (error instanceof StagingError) throw error;
    throw new StagingError(
      `Failed to stage ${descriptor.name}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error, details: { service: descriptor.name, sourcePath: root } },
    );
  }
}

interface CopiedFile {
  rel: string;
  digest: string;
}

function copyTree(realRoot: string, dest: string, filter: Ignore): CopiedFile[] {
  const copied: CopiedFile[] = [];
  const visited = new Set<string>([realRoot]);

  function copyFile(from: string, rel: string) {
    const target = path.join(dest, ...rel.split("/"));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.copyFileSync(from, target);
    fs.chmodSync(target, 0o444);
    copied.push({ rel, digest: hashFile(target) });
  }

  function walk(current: string, prefix: string) {
    const names = fs.readdirSync(current).sort();
    for (const name of names) {
      const rel = prefix ? `${prefix}/${name}` : name;
      const full = path.join(current, name);
      let stat = fs.lstatSync(full);
      let source = full;

      if (stat.isSymbolicLink()) {
        let resolved: string;
        try {
          resolved = fs.realpathSync(full);
        } catch (error) {
          throw new StagingError(`Broken symlink in source tree: ${rel}`, { cause: error });
        }
        if (!isInside(realRoot, resolved)) {
          throw new StagingError(`Symlink escapes the source root: ${rel} -> ${resolved}`, {
            details: { path: rel, target: resolved },
          });
        }
        source = resolved;
        stat = fs.statSync(resolved);
      }

      if (stat.isDirectory()) {
        if (filter.ignores(`${rel}/`)) continue;
        // Directory symlinks pointing back up the tree
        if (visited.has(source)) continue;
        visited.add(source);
        walk(source, rel);
      } else if (stat.isFile()) {
        if (filter.ignores(rel)) continue;
        copyFile(source, rel);
      }
    }
  }

  walk(realRoot, "");
  return copied.sort((a, b) => (a.rel < b.rel ? -1 : a.rel > b.rel ? 1 : 0));
}
