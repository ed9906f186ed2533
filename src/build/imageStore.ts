/**
 * Image Store: tagged images as on-disk `docker build` contexts.
 *
 * {dataDir}/images/
 *   ├── {contentHash}/
 *   │     ├── context/
 *   │     │     ├── Dockerfile
 *   │     │     └── layer-{n}-{action}/   ← one directory per layer (copied or generated)
 *   │     └── image.json                  ← sentinel
 *   └── tags.json                         ← latest image per service/environment
 */

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { Image } from "../shared/types.js";
import { createDevLogger } from "../shared/logging.js";
import type { AssembledImage } from "./runtimeAssembler.js";
import { layerContextDir, renderDockerfile } from "./dockerfile.js";
import { promoteDirectory, removeDir, tmpSiblingOf, writeJsonAtomic } from "./fsUtils.js";

const log = createDevLogger("Images");

const IMAGE_FILE = "image.json";
const TAG_HASH_LENGTH = 12;

const TagRecordSchema = z.object({
  tag: z.string(),
  contentHash: z.string(),
  taggedAt: z.string(),
});

const TagIndexSchema = z.record(TagRecordSchema);

const LayerSourceSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("dependencies"),
    service: z.string(),
    ecosystem: z.enum(["python", "node"]),
    fingerprint: z.string(),
    dir: z.string(),
  }),
  z.object({ kind: z.literal("source"), service: z.string(), dir: z.string() }),
  z.object({ kind: z.literal("artifact"), service: z.string(), environment: z.string(), dir: z.string() }),
  z.object({ kind: z.literal("generated"), service: z.string(), files: z.record(z.string()) }),
]);

const ImageSchema = z.object({
  service: z.string(),
  environment: z.string(),
  baseRuntime: z.string(),
  layers: z.array(
    z.object({
      action: z.enum(["copy-dependencies", "copy-source", "copy-artifact", "write-config"]),
      source: LayerSourceSchema,
      target: z.string(),
      contentHash: z.string(),
    }),
  ),
  entrypoint: z.array(z.string()),
  exposedPort: z.number().int().nullable(),
  env: z.record(z.string()),
  workdir: z.string(),
  contentHash: z.string(),
  tag: z.string(),
});

export interface StoredImage {
  image: Image;
  /** Directory to pass to `docker build` */
  contextDir: string;
  dockerfilePath: string;
}

export function tagFor(image: AssembledImage): string {
  return `${image.service}:${image.environment}-${image.contentHash.slice(0, TAG_HASH_LENGTH)}`;
}

export function tagImage(image: AssembledImage): Image {
  return { ...image, tag: tagFor(image) };
}

export class ImageStore {
  constructor(private readonly rootDir: string) {}

  private imageDir(contentHash: string): string {
    return path.join(this.rootDir, contentHash);
  }

  private get tagsPath(): string {
    return path.join(this.rootDir, "tags.json");
  }

  /**
   * Write the build context for an image (once per content hash) and point
   * its service/environment tag at it.
   */
  put(image: Image): StoredImage {
    const finalDir = this.imageDir(image.contentHash);

    if (fs.existsSync(path.join(finalDir, IMAGE_FILE))) {
      log.verbose(`Image ${image.tag} already stored`);
    } else {
      fs.mkdirSync(this.rootDir, { recursive: true });
      const tmpDir = tmpSiblingOf(finalDir);
      try {
        const contextDir = path.join(tmpDir, "context");
        fs.mkdirSync(contextDir, { recursive: true });
        image.layers.forEach((layer, index) => {
          const target = path.join(contextDir, layerContextDir(index, layer));
          const { source } = layer;
          if (source.kind === "generated") {
            fs.mkdirSync(target);
            for (const [name, content] of Object.entries(source.files)) {
              fs.writeFileSync(path.join(target, name), content);
            }
          } else if (fs.existsSync(source.dir)) {
            fs.cpSync(source.dir, target, { recursive: true, dereference: true });
          } else {
            fs.mkdirSync(target);
          }
        });
        fs.writeFileSync(path.join(contextDir, "Dockerfile"), renderDockerfile(image));
        fs.writeFileSync(path.join(tmpDir, IMAGE_FILE), JSON.stringify(image, null, 2));
        promoteDirectory(tmpDir, finalDir, IMAGE_FILE);
      } catch (error) {
        removeDir(tmpDir);
        throw error;
      }
      log.info(`Stored image ${image.tag}`);
    }

    const tags = this.readTags();
    tags[`${image.service}/${image.environment}`] = {
      tag: image.tag,
      contentHash: image.contentHash,
      taggedAt: new Date().toISOString(),
    };
    writeJsonAtomic(this.tagsPath, tags);

    return this.stored(image);
  }

  get(contentHash: string): StoredImage | null {
    const imagePath = path.join(this.imageDir(contentHash), IMAGE_FILE);
    if (!fs.existsSync(imagePath)) return null;
    const parsed = ImageSchema.safeParse(JSON.parse(fs.readFileSync(imagePath, "utf-8")));
    if (!parsed.success) {
      log.warn(`Ignoring malformed ${imagePath}`);
      return null;
    }
    return this.stored(parsed.data);
  }

  latest(service: string, environment: string): StoredImage | null {
    const record = this.readTags()[`${service}/${environment}`];
    return record ? this.get(record.contentHash) : null;
  }

  list(): StoredImage[] {
    const images: StoredImage[] = [];
    for (const record of Object.values(this.readTags())) {
      const stored = this.get(record.contentHash);
      if (stored) images.push(stored);
    }
    return images;
  }

  /** Remove image contexts no tag points at. */
  gc(): { removed: string[] } {
    const removed: string[] = [];
    if (!fs.existsSync(this.rootDir)) return { removed };

    const referenced = new Set(Object.values(this.readTags()).map((record) => record.contentHash));
    for (const entry of fs.readdirSync(this.rootDir, { withFileTypes: true })) {
      if (!entry.isDirectory() || referenced.has(entry.name)) continue;
      removeDir(path.join(this.rootDir, entry.name));
      removed.push(entry.name);
    }
    return { removed };
  }

  private stored(image: Image): StoredImage {
    const contextDir = path.join(this.imageDir(image.contentHash), "context");
    return { image, contextDir, dockerfilePath: path.join(contextDir, "Dockerfile") };
  }

  private readTags(): Record<string, z.infer<typeof TagRecordSchema>> {
    if (!fs.existsSync(this.tagsPath)) return {};
    const parsed = TagIndexSchema.safeParse(JSON.parse(fs.readFileSync(this.tagsPath, "utf-8")));
    if (!parsed.success) {
      log.warn(`Ignoring malformed tag index ${this.tagsPath}`);
      return {};
    }
    return parsed.data;
  }
}
