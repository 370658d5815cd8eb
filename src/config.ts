import fs from "node:fs";
import path from "node:path";

import { parse as parseYAML } from "yaml";

import type { ResolutionMode } from "./parser/transform-context";

export const MANIFEST_FILENAME = "dvrtl.yml";

export type ManifestData = {
  path: string;
  name: string | null;
  resolution?: ResolutionMode;
  sources: string[];
};

export type FrontendConfig = {
  resolution: ResolutionMode;
  traceErrors: boolean;
  version: string;
};

export const DEFAULT_VERSION = "dvrtl 0.1.0";

export function parseResolutionMode(raw: string): ResolutionMode | null {
  const normalized = raw.trim().toLowerCase();
  if (normalized === "hoisted" || normalized === "hoist" || normalized === "forward") {
    return "hoisted";
  }
  if (normalized === "sequential" || normalized === "ordered" || normalized === "strict") {
    return "sequential";
  }
  return null;
}

export function resolveResolutionMode(raw: string | undefined, fallback: ResolutionMode = "hoisted"): ResolutionMode {
  if (raw === undefined) return fallback;
  return parseResolutionMode(raw) ?? fallback;
}

export function resolveFlag(raw: string | undefined): boolean {
  if (raw === undefined) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
}

/**
 * Reads DVRTL_RESOLUTION, DVRTL_TRACE_ERRORS and DVRTL_VERSION. A resolution
 * set in the manifest is the fallback when the environment leaves it unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv, manifest: ManifestData | null = null): FrontendConfig {
  const version = env.DVRTL_VERSION?.trim();
  return {
    resolution: resolveResolutionMode(env.DVRTL_RESOLUTION, manifest?.resolution ?? "hoisted"),
    traceErrors: resolveFlag(env.DVRTL_TRACE_ERRORS),
    version: version ? version : DEFAULT_VERSION,
  };
}

/** Walks up from `start` to the nearest directory holding a manifest. */
export function findManifestPath(start: string): string | null {
  let dir = path.resolve(start);
  if (fs.existsSync(dir) && !fs.statSync(dir).isDirectory()) {
    dir = path.dirname(dir);
  }
  while (true) {
    const candidate = path.join(dir, MANIFEST_FILENAME);
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

export function loadManifest(manifestPath: string): ManifestData {
  const abs = path.resolve(manifestPath);
  let contents: string;
  try {
    contents = fs.readFileSync(abs, "utf8");
  } catch (error) {
    throw new Error(`failed to read manifest ${abs}: ${extractErrorMessage(error)}`);
  }
  let parsed: unknown;
  try {
    parsed = parseYAML(contents) ?? {};
  } catch (error) {
    throw new Error(`failed to parse manifest ${abs}: ${extractErrorMessage(error)}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`manifest ${abs} must be a mapping`);
  }

  const manifest: ManifestData = {
    path: abs,
    name: typeof parsed.name === "string" ? parsed.name : null,
    sources: readSources(parsed.sources, abs),
  };
  if (parsed.resolution !== undefined) {
    const raw = String(parsed.resolution);
    const resolution = parseResolutionMode(raw);
    if (!resolution) {
      throw new Error(`manifest ${abs}: unknown resolution '${raw}'`);
    }
    manifest.resolution = resolution;
  }
  return manifest;
}

export function loadNearestManifest(start: string): ManifestData | null {
  const manifestPath = findManifestPath(start);
  return manifestPath ? loadManifest(manifestPath) : null;
}

/** Source paths listed in the manifest, resolved against its directory. */
export function manifestSourcePaths(manifest: ManifestData): string[] {
  const root = path.dirname(manifest.path);
  return manifest.sources.map(source => path.resolve(root, source));
}

function readSources(raw: unknown, manifestPath: string): string[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw) || !raw.every((entry): entry is string => typeof entry === "string")) {
    throw new Error(`manifest ${manifestPath}: sources must be a list of paths`);
  }
  return raw;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
