/**
 * Tests for renderDockerfile.
 */

import type { Image } from "../shared/types.js";
import { renderDockerfile } from "./dockerfile.js";

const workerImage: Image = {
  service: "worker",
  environment: "production",
  baseRuntime: "python:3.11-slim",
  layers: [
    {
      action: "copy-dependencies",
      source: { kind: "dependencies", service: "worker", ecosystem: "python", fingerprint: "d", dir: "/cache/d/site-packages" },
      target: "/usr/local/lib/python3.11/site-packages",
      contentHash: "d",
    },
    {
      action: "copy-source",
      source: { kind: "source", service: "worker", dir: "/tmp/stage" },
      target: "/app",
      contentHash: "s",
    },
  ],
  entrypoint: ["python3", "app2.py"],
  exposedPort: null,
  env: { APP_ENV: "production", GREETING: 'say "hi"' },
  workdir: "/app",
  contentHash: "0123456789abcdef",
  tag: "worker:production-0123456789ab",
};

describe("renderDockerfile", () => {
  it("renders a process image", () => {
    expect(renderDockerfile(workerImage)).toBe(
      [
        "# worker (production)",
        "FROM python:3.11-slim",
        'LABEL io.servicepack.content-hash="0123456789abcdef"',
        "WORKDIR /app",
        "COPY layer-0-copy-dependencies/ /usr/local/lib/python3.11/site-packages/",
        "COPY layer-1-copy-source/ /app/",
        'ENV APP_ENV="production"',
        'ENV GREETING="say \\"hi\\""',
        'CMD ["python3","app2.py"]',
        "",
      ].join("\n"),
    );
  });

  it("exposes the port of a static image", () => {
    const dockerfile = renderDockerfile({
      ...workerImage,
      service: "adminportal",
      baseRuntime: "nginx:1.27-alpine",
      layers: [
        {
          action: "copy-artifact",
          source: { kind: "artifact", service: "adminportal", environment: "production", dir: "/a" },
          target: "/usr/share/nginx/html",
          contentHash: "a",
        },
        {
          action: "write-config",
          source: { kind: "generated", service: "adminportal", files: { "default.conf": "server {}\n" } },
          target: "/etc/nginx/conf.d",
          contentHash: "c",
        },
      ],
      entrypoint: ["nginx", "-g", "daemon off;"],
      exposedPort: 3000,
      env: {},
      workdir: "/usr/share/nginx/html",
    });

    expect(dockerfile.split("\n")).toEqual([
      "# adminportal (production)",
      "FROM nginx:1.27-alpine",
      'LABEL io.servicepack.content-hash="0123456789abcdef"',
      "WORKDIR /usr/share/nginx/html",
      "COPY layer-0-copy-artifact/ /usr/share/nginx/html/",
      "COPY layer-1-write-config/ /etc/nginx/conf.d/",
      "EXPOSE 3000",
      'CMD ["nginx","-g","daemon off;"]',
      "",
    ]);
  });
});
