/**
 * Content-Addressed Artifact Store: immutable compiler output.
 *
 * {dataDir}/artifacts/
 *   ├── objects/{contentHash}/
 *   │     ├── content/        ← the build output, as produced
 *   │     └── metadata.json   ← sentinel
 *   └── index.json            ← newest artifact per service/environment
 *
 * Same hash = same content. Forever. GC prunes objects the index no longer
 * references.
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { ArtifactOutputKind, BuildArtifact } from "../shared/types.js";
import { createDevLogger } from "../shared/logging.js";
import { hashDirectory, promoteDirectory, removeDir, tmpSiblingOf, writeJsonAtomic } from "./fsUtils.js";

const log = createDevLogger("Artifacts");

const METADATA_FILE = "metadata.json";

const ArtifactRecordSchema = z.object({
  service: z.string(),
  environment: z.string(),
  producedAt: z.string(),
  outputKind: z.enum(["static_dir", "runnable_image"]),
  contentHash: z.string(),
});

const ArtifactIndexSchema = z.record(ArtifactRecordSchema);

type ArtifactRecord = z.infer<typeof ArtifactRecordSchema>;

export interface PutArtifactInput {
  service: string;
  environment: string;
  outputKind: ArtifactOutputKind;
  /** Directory holding the output to store; left untouched */
  sourceDir: string;
}

export function indexKey(service: string, environment: string): string {
  return `${service}/${environment}`;
}

export class ArtifactStore {
  constructor(private readonly rootDir: string) {}

  private objectDir(contentHash: string): string {
    return path.join(this.rootDir, "objects", contentHash);
  }

  private get indexPath(): string {
    return path.join(this.rootDir, "index.json");
  }

  has(contentHash: string): boolean {
    return fs.existsSync(path.join(this.objectDir(contentHash), METADATA_FILE));
  }

  /**
   * Store an output directory and record it as the newest artifact for its
   * service/environment. Identical content reuses the existing object.
   */
  put(input: PutArtifactInput): BuildArtifact {
    const { hash: contentHash, files } = hashDirectory(input.sourceDir);
    const finalDir = this.objectDir(contentHash);

    if (this.has(contentHash)) {
      log.verbose(`Artifact ${contentHash.slice(0, 12)} already stored`);
    } else {
      fs.mkdirSync(path.dirname(finalDir), { recursive: true });
      const tmpDir = tmpSiblingOf(finalDir);
      try {
        fs.cpSync(input.sourceDir, path.join(tmpDir, "content"), { recursive: true, dereference: true });
        fs.writeFileSync(
          path.join(tmpDir, METADATA_FILE),
          JSON.stringify({ contentHash, files: files.length, storedAt: new Date().toISOString() }, null, 2),
        );
        promoteDirectory(tmpDir, finalDir, METADATA_FILE);
      } catch (error) {
        removeDir(tmpDir);
        throw error;
      }
      log.info(`Stored artifact ${contentHash.slice(0, 12)} (${files.length} files) for ${input.service}`);
    }

    const record: ArtifactRecord = {
      service: input.service,
      environment: input.environment,
      producedAt: new Date().toISOString(),
      outputKind: input.outputKind,
      contentHash,
    };
    const index = this.readIndex();
    index[indexKey(input.service, input.environment)] = record;
    writeJsonAtomic(this.indexPath, index);

    return this.toArtifact(record);
  }

  /** Newest artifact for a service/environment, or null. */
  latest(service: string, environment: string): BuildArtifact | null {
    const record = this.readIndex()[indexKey(service, environment)];
    if (!record || !this.has(record.contentHash)) return null;
    return this.toArtifact(record);
  }

  list(): BuildArtifact[] {
    return Object.values(this.readIndex())
      .filter((record) => this.has(record.contentHash))
      .map((record) => this.toArtifact(record));
  }

  /** Remove objects not referenced by the index. */
  gc(): { removed: string[] } {
    const objectsDir = path.join(this.rootDir, "objects");
    const removed: string[] = [];
    if (!fs.existsSync(objectsDir)) return { removed };

    const referenced = new Set(Object.values(this.readIndex()).map((record) => record.contentHash));
    for (const name of fs.readdirSync(objectsDir)) {
      if (referenced.has(name)) continue;
      removeDir(path.join(objectsDir, name));
      removed.push(name);
    }
    return { removed };
  }

  private readIndex(): Record<string, ArtifactRecord> {
    if (!fs.existsSync(this.indexPath)) return {};
    const parsed = ArtifactIndexSchema.safeParse(JSON.parse(fs.readFileSync(this.indexPath, "utf-8")));
    if (!parsed.success) {
      log.warn(`Ignoring malformed artifact index ${this.indexPath}`);
      return {};
    }
    return parsed.data;
  }

  private toArtifact(record: ArtifactRecord): BuildArtifact {
    return Object.freeze({
      ...record,
      dir: path.join(this.objectDir(record.contentHash), "content"),
    });
  }
}
