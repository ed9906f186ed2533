/**
 * Tests for DependencyCache: hits, misses, coalescing, failure and timeout.
 */

import * as fs from "fs";
import * as path from "path";
import { DependencyInstallError, LockMismatchError, TimeoutError } from "../shared/errors.js";
import { FakeInstaller, makeProfile, makeTempDir, writeTree } from "../testing/fixtures.js";
import { readDependencyManifest } from "./dependencyManifest.js";
import { DependencyCache, READY_SENTINEL, type DependencyEntryMetadata } from "./dependencyCache.js";

const RUNTIME = "python:3.11-slim";

function readMetadata(dir: string): DependencyEntryMetadata {
  return JSON.parse(fs.readFileSync(path.join(dir, "metadata.json"), "utf-8"));
}

describe("DependencyCache", () => {
  let root: string;
  let cacheDir: string;
  let sourceDir: string;

  beforeEach(() => {
    root = makeTempDir();
    cacheDir = path.join(root, "deps");
    sourceDir = path.join(root, "src");
    writeTree(sourceDir, {
      "requirements.txt": "schedule==1.2.2\nrequests==2.31.0\n",
      "requirements.lock": "schedule==1.2.2\nrequests==2.31.0\n",
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const full = makeProfile({ installMode: "full" });
  const ciClean = makeProfile({ installMode: "ci-clean" });

  it("installs on a miss and reuses the entry on a hit", async () => {
    const installer = new FakeInstaller();
    const cache = new DependencyCache(cacheDir, installer);
    const manifest = readDependencyManifest(sourceDir, "python");

    const first = await cache.resolve(manifest, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });
    expect(first.cacheHit).toBe(false);
    expect(first.dir).toBe(path.join(cacheDir, `python-${manifest.lockFingerprint}`));
    expect(first.installRoot).toBe(path.join(first.dir, "site-packages"));
    expect(fs.readFileSync(path.join(first.installRoot, "schedule.installed"), "utf-8")).toBe("==1.2.2");
    expect(fs.existsSync(path.join(first.dir, READY_SENTINEL))).toBe(true);

    const second = await cache.resolve(manifest, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });
    expect(second.cacheHit).toBe(true);
    expect(second.dir).toBe(first.dir);
    expect(installer.calls).toHaveLength(1);
  });

  it("installs again when the fingerprint changes", async () => {
    const installer = new FakeInstaller();
    const cache = new DependencyCache(cacheDir, installer);

    const before = await cache.resolve(readDependencyManifest(sourceDir, "python"), sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });
    fs.writeFileSync(path.join(sourceDir, "requirements.txt"), "schedule==1.2.2\nrequests==2.32.0\n");
    const after = await cache.resolve(readDependencyManifest(sourceDir, "python"), sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });

    expect(after.cacheHit).toBe(false);
    expect(after.dir).not.toBe(before.dir);
    expect(installer.calls).toHaveLength(2);
    expect(cache.listKeys()).toHaveLength(2);
  });

  it("coalesces concurrent misses into one install", async () => {
    const installer = new FakeInstaller({ gated: true });
    const cache = new DependencyCache(cacheDir, installer);
    const manifest = readDependencyManifest(sourceDir, "python");

    const a = cache.resolve(manifest, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });
    const b = cache.resolve(manifest, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });
    installer.release();
    const [ra, rb] = await Promise.all([a, b]);

    expect(installer.calls).toHaveLength(1);
    expect(ra.dir).toBe(rb.dir);
  });

  it("leaves no entry behind when the install fails", async () => {
    const cache = new DependencyCache(cacheDir, new FakeInstaller({ unavailable: ["requests"] }));
    const manifest = readDependencyManifest(sourceDir, "python");

    await expect(cache.resolve(manifest, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME })).rejects.toBeInstanceOf(
      DependencyInstallError,
    );
    expect(cache.lookup(manifest, "full", RUNTIME)).toBeNull();
    expect(fs.readdirSync(cacheDir)).toEqual([]);
  });

  it("times out, aborts the install and leaves no entry", async () => {
    const installer = new FakeInstaller({ hang: true });
    const cache = new DependencyCache(cacheDir, installer);
    const manifest = readDependencyManifest(sourceDir, "python");

    await expect(cache.resolve(manifest, sourceDir, full, { timeoutMs: 20, runtime: RUNTIME })).rejects.toBeInstanceOf(TimeoutError);
    await vi.waitFor(() => {
      expect(fs.readdirSync(cacheDir)).toEqual([]);
    });
    expect(installer.calls[0]?.signal.aborted).toBe(true);
    expect(cache.lookup(manifest, "full", RUNTIME)).toBeNull();
  });

  it("verifies the lock under ci-clean before touching the cache", async () => {
    fs.writeFileSync(path.join(sourceDir, "requirements.lock"), "schedule==1.2.2\n");
    const installer = new FakeInstaller();
    const cache = new DependencyCache(cacheDir, installer);

    await expect(
      cache.resolve(readDependencyManifest(sourceDir, "python"), sourceDir, ciClean, { timeoutMs: 0, runtime: RUNTIME }),
    ).rejects.toBeInstanceOf(LockMismatchError);
    expect(installer.calls).toHaveLength(0);
  });

  it("passes the install mode through to the installer", async () => {
    const installer = new FakeInstaller();
    const cache = new DependencyCache(cacheDir, installer);
    const resolved = await cache.resolve(readDependencyManifest(sourceDir, "python"), sourceDir, ciClean, {
      timeoutMs: 0,
      runtime: RUNTIME,
    });

    expect(installer.calls[0]?.mode).toBe("ci-clean");
    expect(fs.readdirSync(resolved.dir).sort()).toEqual([
      ".ready",
      "metadata.json",
      "requirements.lock",
      "requirements.txt",
      "site-packages",
    ]);
  });

  it("lets one waiter time out while the others still get the install", async () => {
    const installer = new FakeInstaller({ gated: true });
    const cache = new DependencyCache(cacheDir, installer);
    const manifest = readDependencyManifest(sourceDir, "python");

    const impatient = cache.resolve(manifest, sourceDir, full, { timeoutMs: 20, runtime: RUNTIME });
    const patient = cache.resolve(manifest, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });
    await expect(impatient).rejects.toBeInstanceOf(TimeoutError);

    installer.release();
    const resolved = await patient;
    expect(installer.calls).toHaveLength(1);
    expect(installer.calls[0]?.signal.aborted).toBe(false);
    expect(resolved.cacheHit).toBe(false);
    expect(fs.existsSync(path.join(resolved.dir, READY_SENTINEL))).toBe(true);
    expect(cache.lookup(manifest, "full", RUNTIME)?.dir).toBe(resolved.dir);
  });

  it("does not serve a full install to a ci-clean caller", async () => {
    const installer = new FakeInstaller();
    const cache = new DependencyCache(cacheDir, installer);
    const manifest = readDependencyManifest(sourceDir, "python");

    const permissive = await cache.resolve(manifest, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });
    expect(permissive.installMode).toBe("full");
    expect(cache.lookup(manifest, "ci-clean", RUNTIME)).toBeNull();

    const strict = await cache.resolve(manifest, sourceDir, ciClean, { timeoutMs: 0, runtime: RUNTIME });
    expect(installer.calls.map((call) => call.mode)).toEqual(["full", "ci-clean"]);
    expect(strict.cacheHit).toBe(false);
    expect(strict.installMode).toBe("ci-clean");
    expect(strict.dir).toBe(permissive.dir);
    expect(readMetadata(strict.dir).installMode).toBe("ci-clean");
    expect(cache.listKeys()).toEqual([DependencyCache.keyFor(manifest)]);
    expect(fs.readdirSync(cacheDir)).toEqual([DependencyCache.keyFor(manifest)]);
  });

  it("serves a ci-clean install to both modes", async () => {
    const installer = new FakeInstaller();
    const cache = new DependencyCache(cacheDir, installer);
    const manifest = readDependencyManifest(sourceDir, "python");

    await cache.resolve(manifest, sourceDir, ciClean, { timeoutMs: 0, runtime: RUNTIME });
    const dev = await cache.resolve(manifest, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });

    expect(dev.cacheHit).toBe(true);
    expect(dev.installMode).toBe("ci-clean");
    expect(installer.calls).toHaveLength(1);
  });

  it("does not let a ci-clean caller join a full install in flight", async () => {
    const installer = new FakeInstaller({ gated: true });
    const cache = new DependencyCache(cacheDir, installer);
    const manifest = readDependencyManifest(sourceDir, "python");

    const dev = cache.resolve(manifest, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });
    const prod = cache.resolve(manifest, sourceDir, ciClean, { timeoutMs: 0, runtime: RUNTIME });
    installer.release();
    const [, strict] = await Promise.all([dev, prod]);

    expect(installer.calls.map((call) => call.mode).sort()).toEqual(["ci-clean", "full"]);
    expect(strict.installMode).toBe("ci-clean");
    expect(readMetadata(strict.dir).installMode).toBe("ci-clean");
  });

  it("reinstalls for a different runtime", async () => {
    const installer = new FakeInstaller();
    const cache = new DependencyCache(cacheDir, installer);
    const manifest = readDependencyManifest(sourceDir, "python");

    await cache.resolve(manifest, sourceDir, ciClean, { timeoutMs: 0, runtime: RUNTIME });
    const upgraded = await cache.resolve(manifest, sourceDir, ciClean, { timeoutMs: 0, runtime: "python:3.12-slim" });

    expect(upgraded.cacheHit).toBe(false);
    expect(upgraded.runtime).toBe("python:3.12-slim");
    expect(installer.calls.map((call) => call.runtime)).toEqual([RUNTIME, "python:3.12-slim"]);
    expect(cache.lookup(manifest, "ci-clean", RUNTIME)).toBeNull();
  });

  it("gc keeps listed keys and removes the rest", async () => {
    const cache = new DependencyCache(cacheDir, new FakeInstaller());
    const manifest = readDependencyManifest(sourceDir, "python");
    await cache.resolve(manifest, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });
    const kept = DependencyCache.keyFor(manifest);

    fs.writeFileSync(path.join(sourceDir, "requirements.txt"), "schedule==1.2.2\n");
    const other = readDependencyManifest(sourceDir, "python");
    await cache.resolve(other, sourceDir, full, { timeoutMs: 0, runtime: RUNTIME });

    expect(cache.gc(new Set([kept])).removed).toEqual([DependencyCache.keyFor(other)]);
    expect(cache.listKeys()).toEqual([kept]);
  });
});
