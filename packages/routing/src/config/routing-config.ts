/**
 * Layered JSON config for routing parameters.
 *
 * A base config (configs/routing/base.json) holds the process-wide defaults;
 * named profiles (configs/routing/profiles/*.json) are partial overrides
 * that deep-merge on top of it.
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

import type { PenaltyCurve } from "@campus-flow/types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RoutingConfig {
  /** Congestion weight alpha in length * (1 + alpha * curve(ratio)) */
  congestionWeight: number;
  penaltyCurve: PenaltyCurve;
  /** Used for walking-time estimates */
  walkingSpeedMps: number;
  /** Routes per weighting when a query gives no k */
  defaultK: number;
}

export interface ProfileConfig {
  name: string;
  description: string;
  overrides: Partial<RoutingConfig>;
}

export interface ProfileInfo {
  name: string;
  description: string;
}

export const DEFAULT_ROUTING_CONFIG: Readonly<RoutingConfig> = Object.freeze({
  congestionWeight: 1.0,
  penaltyCurve: "linear",
  walkingSpeedMps: 1.3,
  defaultK: 3,
});

// ---------------------------------------------------------------------------
// Merge + validation
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pick the recognised, well-typed keys out of parsed JSON.
 * Unknown keys and values of the wrong type are dropped.
 */
export function readOverrides(raw: unknown): Partial<RoutingConfig> {
  if (!isRecord(raw)) return {};
  const out: Partial<RoutingConfig> = {};
  const positive = (v: unknown): v is number => typeof v === "number" && Number.isFinite(v) && v > 0;

  const alpha = raw["congestionWeight"];
  if (typeof alpha === "number" && Number.isFinite(alpha) && alpha >= 0) out.congestionWeight = alpha;
  const curve = raw["penaltyCurve"];
  if (curve === "linear" || curve === "stepped") out.penaltyCurve = curve;
  const speed = raw["walkingSpeedMps"];
  if (positive(speed)) out.walkingSpeedMps = speed;
  const defaultK = raw["defaultK"];
  if (positive(defaultK) && Number.isInteger(defaultK)) out.defaultK = defaultK;
  return out;
}

/** Overrides win */
export function mergeConfig(base: RoutingConfig, overrides: Partial<RoutingConfig>): RoutingConfig {
  return {
    congestionWeight: overrides.congestionWeight ?? base.congestionWeight,
    penaltyCurve: overrides.penaltyCurve ?? base.penaltyCurve,
    walkingSpeedMps: overrides.walkingSpeedMps ?? base.walkingSpeedMps,
    defaultK: overrides.defaultK ?? base.defaultK,
  };
}

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Walk up directories to find `configs/routing/`.
 * Works from both source (packages/routing/src/config/) and compiled paths.
 */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "routing");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "routing");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

/** Load base.json on top of the hardcoded defaults. Falls back to the defaults if unreadable. */
export function loadBaseConfig(configsRoot: string = findConfigsRoot()): RoutingConfig {
  const filePath = join(configsRoot, "base.json");
  try {
    const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
    return mergeConfig(DEFAULT_ROUTING_CONFIG, readOverrides(parsed));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[config] Using default routing config (${filePath}: ${reason})`);
    return { ...DEFAULT_ROUTING_CONFIG };
  }
}

/** Load a named profile merged over the base config. Throws if the profile file is missing. */
export function loadProfileConfig(
  profileName: string,
  configsRoot: string = findConfigsRoot(),
): RoutingConfig & { _profile: ProfileInfo } {
  const filePath = join(configsRoot, "profiles", `${profileName}.json`);
  const parsed: unknown = JSON.parse(readFileSync(filePath, "utf-8"));
  const profile = isRecord(parsed) ? parsed : {};

  const merged = mergeConfig(loadBaseConfig(configsRoot), readOverrides(profile["overrides"]));
  return {
    ...merged,
    _profile: {
      name: typeof profile["name"] === "string" ? profile["name"] : profileName,
      description: typeof profile["description"] === "string" ? profile["description"] : "",
    },
  };
}

/** List all available profiles from the profiles directory. */
export function listProfiles(configsRoot: string = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const profiles: ProfileInfo[] = [];
  for (const file of readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort()) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(join(profilesDir, file), "utf-8"));
      if (!isRecord(parsed)) continue;
      profiles.push({
        name: typeof parsed["name"] === "string" ? parsed["name"] : file.replace(/\.json$/, ""),
        description: typeof parsed["description"] === "string" ? parsed["description"] : "",
      });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[config] Skipping malformed profile ${file}: ${reason}`);
    }
  }
  return profiles;
}
