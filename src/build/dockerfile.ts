/**
 * Dockerfile rendering for an assembled image. Layer directories are named
 * by layerContextDir() inside the image build context written by ImageStore.
 */

import type { Image, ImageLayer } from "../shared/types.js";

export const CONTENT_HASH_LABEL = "io.servicepack.content-hash";

export function layerContextDir(index: number, layer: ImageLayer): string {
  return `layer-${index}-${layer.action}`;
}

function quote(value: string): string {
  return JSON.stringify(value);
}

export function renderDockerfile(image: Image): string {
  const lines: string[] = [
    `# ${image.service} (${image.environment})`,
    `FROM ${image.baseRuntime}`,
    `LABEL ${CONTENT_HASH_LABEL}=${quote(image.contentHash)}`,
    `WORKDIR ${image.workdir}`,
  ];

  image.layers.forEach((layer, index) => {
    lines.push(`COPY ${layerContextDir(index, layer)}/ ${layer.target}/`);
  });

  const envKeys = Object.keys(image.env).sort();
  for (const key of envKeys) {
    lines.push(`ENV ${key}=${quote(image.env[key] ?? "")}`);
  }

  if (image.exposedPort !== null) {
    lines.push(`EXPOSE ${image.exposedPort}`);
  }

  lines.push(`CMD ${JSON.stringify(image.entrypoint)}`);
  return `${lines.join("\n")}\n`;
}
