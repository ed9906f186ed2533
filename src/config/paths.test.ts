/**
 * Tests for data directory and timeout resolution.
 */

import * as path from "path";
import { getArtifactsDir, getDataDir, getDefaultTimeoutMs, getDependencyCacheDir, setDataDir } from "./paths.js";

describe("getDataDir", () => {
  const saved = process.env["SERVICEPACK_DATA_DIR"];

  afterEach(() => {
    setDataDir(null);
    if (saved === undefined) delete process.env["SERVICEPACK_DATA_DIR"];
    else process.env["SERVICEPACK_DATA_DIR"] = saved;
  });

  it("prefers the explicit override, then SERVICEPACK_DATA_DIR", () => {
    process.env["SERVICEPACK_DATA_DIR"] = "/env/data";
    expect(getDataDir()).toBe(path.resolve("/env/data"));
    setDataDir("/flag/data");
    expect(getDataDir()).toBe(path.resolve("/flag/data"));
  });

  it("lays out the stores under the data dir", () => {
    expect(getDependencyCacheDir("/d")).toBe(path.join("/d", "deps"));
    expect(getArtifactsDir("/d")).toBe(path.join("/d", "artifacts"));
  });

  it("falls back to a platform cache directory", () => {
    delete process.env["SERVICEPACK_DATA_DIR"];
    expect(path.basename(getDataDir())).toMatch(/^(servicepack|cache)$/);
  });
});

describe("getDefaultTimeoutMs", () => {
  const saved = process.env["SERVICEPACK_TIMEOUT_MS"];

  afterEach(() => {
    if (saved === undefined) delete process.env["SERVICEPACK_TIMEOUT_MS"];
    else process.env["SERVICEPACK_TIMEOUT_MS"] = saved;
  });

  it("reads SERVICEPACK_TIMEOUT_MS and ignores junk", () => {
    delete process.env["SERVICEPACK_TIMEOUT_MS"];
    expect(getDefaultTimeoutMs()).toBe(600_000);
    process.env["SERVICEPACK_TIMEOUT_MS"] = "1500";
    expect(getDefaultTimeoutMs()).toBe(1500);
    process.env["SERVICEPACK_TIMEOUT_MS"] = "later";
    expect(getDefaultTimeoutMs()).toBe(600_000);
  });
});
