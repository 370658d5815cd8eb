import { afterEach, describe, expect, test } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  DEFAULT_VERSION,
  findManifestPath,
  loadConfig,
  loadManifest,
  manifestSourcePaths,
  resolveFlag,
  resolveResolutionMode,
} from "../src/config";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), "dvrtl-config-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe("resolveResolutionMode", () => {
  test("defaults to hoisted", () => {
    expect(resolveResolutionMode(undefined)).toBe("hoisted");
    expect(resolveResolutionMode("bogus")).toBe("hoisted");
    expect(resolveResolutionMode("bogus", "sequential")).toBe("sequential");
  });

  test("accepts aliases in any case", () => {
    expect(resolveResolutionMode(" Sequential ")).toBe("sequential");
    expect(resolveResolutionMode("ordered")).toBe("sequential");
    expect(resolveResolutionMode("FORWARD")).toBe("hoisted");
  });
});

describe("loadConfig", () => {
  test("reads the environment", () => {
    const config = loadConfig({ DVRTL_RESOLUTION: "sequential", DVRTL_TRACE_ERRORS: "1", DVRTL_VERSION: "dvrtl test" });
    expect(config).toEqual({ resolution: "sequential", traceErrors: true, version: "dvrtl test" });
  });

  test("falls back to the manifest and defaults", () => {
    const manifest = { path: "/tmp/dvrtl.yml", name: null, resolution: "sequential" as const, sources: [] };
    expect(loadConfig({}, manifest)).toEqual({ resolution: "sequential", traceErrors: false, version: DEFAULT_VERSION });
    expect(loadConfig({ DVRTL_RESOLUTION: "hoisted" }, manifest).resolution).toBe("hoisted");
  });

  test("flags", () => {
    expect(resolveFlag("yes")).toBe(true);
    expect(resolveFlag("0")).toBe(false);
    expect(resolveFlag(undefined)).toBe(false);
  });
});

describe("dvrtl.yml", () => {
  test("is found by walking up from a nested directory", () => {
    const root = makeTempDir();
    const nested = path.join(root, "a", "b");
    mkdirSync(nested, { recursive: true });
    writeFileSync(path.join(root, "dvrtl.yml"), "name: demo\n");
    expect(findManifestPath(nested)).toBe(path.join(root, "dvrtl.yml"));
  });

  test("reads name, resolution and sources", () => {
    const root = makeTempDir();
    const manifestPath = path.join(root, "dvrtl.yml");
    writeFileSync(manifestPath, "name: adder\nresolution: sequential\nsources:\n  - src/adder.dv\n  - top.dv\n");
    const manifest = loadManifest(manifestPath);
    expect(manifest).toEqual({
      path: manifestPath,
      name: "adder",
      resolution: "sequential",
      sources: ["src/adder.dv", "top.dv"],
    });
    expect(manifestSourcePaths(manifest)).toEqual([path.join(root, "src", "adder.dv"), path.join(root, "top.dv")]);
  });

  test("an empty manifest has no sources", () => {
    const root = makeTempDir();
    const manifestPath = path.join(root, "dvrtl.yml");
    writeFileSync(manifestPath, "");
    expect(loadManifest(manifestPath)).toEqual({ path: manifestPath, name: null, sources: [] });
  });

  test("rejects unknown resolution modes and malformed sources", () => {
    const root = makeTempDir();
    const manifestPath = path.join(root, "dvrtl.yml");
    writeFileSync(manifestPath, "resolution: lazy\n");
    expect(() => loadManifest(manifestPath)).toThrow(`manifest ${manifestPath}: unknown resolution 'lazy'`);
    writeFileSync(manifestPath, "sources: top.dv\n");
    expect(() => loadManifest(manifestPath)).toThrow(`manifest ${manifestPath}: sources must be a list of paths`);
  });
});
