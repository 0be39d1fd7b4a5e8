import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  DEFAULT_ROUTING_CONFIG,
  findConfigsRoot,
  listProfiles,
  loadBaseConfig,
  loadProfileConfig,
  mergeConfig,
  readOverrides,
} from "./routing-config.js";

describe("readOverrides", () => {
  it("keeps recognised keys with valid values", () => {
    expect(
      readOverrides({ congestionWeight: 2, penaltyCurve: "stepped", walkingSpeedMps: 1.1, defaultK: 2 }),
    ).toEqual({ congestionWeight: 2, penaltyCurve: "stepped", walkingSpeedMps: 1.1, defaultK: 2 });
  });

  it("drops unknown keys and wrongly typed values", () => {
    expect(
      readOverrides({ congestionWeight: -1, penaltyCurve: "cubic", defaultK: 2.5, maxK: "ten", extra: true }),
    ).toEqual({});
    expect(readOverrides(null)).toEqual({});
    expect(readOverrides([1, 2])).toEqual({});
  });

  it("accepts a zero congestion weight", () => {
    expect(readOverrides({ congestionWeight: 0 })).toEqual({ congestionWeight: 0 });
  });
});

describe("mergeConfig", () => {
  it("lets overrides win", () => {
    expect(mergeConfig(DEFAULT_ROUTING_CONFIG, { congestionWeight: 3 })).toEqual({
      ...DEFAULT_ROUTING_CONFIG,
      congestionWeight: 3,
    });
  });

  it("keeps base values the overrides leave out", () => {
    const merged = mergeConfig(DEFAULT_ROUTING_CONFIG, { defaultK: 5 });
    expect(merged.defaultK).toBe(5);
    expect(merged.penaltyCurve).toBe("linear");
  });
});

describe("config files", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "routing-config-"));
    mkdirSync(join(root, "profiles"));
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("falls back to defaults without base.json", () => {
    expect(loadBaseConfig(root)).toEqual(DEFAULT_ROUTING_CONFIG);
  });

  it("falls back to defaults on unparsable base.json", () => {
    writeFileSync(join(root, "base.json"), "{ not json");
    expect(loadBaseConfig(root)).toEqual(DEFAULT_ROUTING_CONFIG);
  });

  it("merges a profile over the base file", () => {
    writeFileSync(join(root, "base.json"), JSON.stringify({ walkingSpeedMps: 1.2 }));
    writeFileSync(
      join(root, "profiles", "rush.json"),
      JSON.stringify({ name: "rush", description: "Rush hour", overrides: { congestionWeight: 2.5 } }),
    );

    const config = loadProfileConfig("rush", root);
    expect(config.walkingSpeedMps).toBe(1.2);
    expect(config.congestionWeight).toBe(2.5);
    expect(config.penaltyCurve).toBe("linear");
    expect(config._profile).toEqual({ name: "rush", description: "Rush hour" });
  });

  it("throws for a missing profile", () => {
    expect(() => loadProfileConfig("nope", root)).toThrow();
  });

  it("lists profiles sorted by file name and skips malformed ones", () => {
    writeFileSync(join(root, "profiles", "b.json"), JSON.stringify({ name: "bee", description: "second" }));
    writeFileSync(join(root, "profiles", "a.json"), JSON.stringify({ description: "first" }));
    writeFileSync(join(root, "profiles", "c.json"), "oops");

    expect(listProfiles(root)).toEqual([
      { name: "a", description: "first" },
      { name: "bee", description: "second" },
    ]);
  });
});

describe("repository configs", () => {
  it("ships the base config and profiles", () => {
    const root = findConfigsRoot();
    expect(loadBaseConfig(root)).toEqual(DEFAULT_ROUTING_CONFIG);
    expect(loadProfileConfig("avoid-crowds", root).congestionWeight).toBe(3);
    expect(loadProfileConfig("banded", root).penaltyCurve).toBe("stepped");
    expect(listProfiles(root).map((p) => p.name)).toEqual(["avoid-crowds", "banded"]);
  });
});
