import { describe, it, expect } from "vitest";
import { HealthController } from "./health.controller.js";
import { createServices, registerServices } from "../services/registry.js";
import { makeEngine } from "../services/test-fixtures.js";

describe("HealthController", () => {
  it("reports graph size, cache stats and profiles", async () => {
    const engine = makeEngine();
    await engine.forecast({ hour: 9, dayOfWeek: 1, isPeak: 1 });
    registerServices(
      createServices(engine, {
        profile: "avoid-crowds",
        profiles: [{ name: "avoid-crowds", description: "Stay off busy paths" }],
      }),
    );
    const health = await new HealthController().getHealth();

    expect(health.status).toBe("ok");
    expect(health.graph).toEqual({ nodes: 6, edges: 5 });
    expect(health.cache).toEqual({ entries: 1, hits: 0, awaited: 0, misses: 1, computations: 1, inFlight: 0 });
    expect(health.profile).toBe("avoid-crowds");
    expect(health.profiles).toEqual([{ name: "avoid-crowds", description: "Stay off busy paths" }]);
  });

  it("omits the profile when none is active", async () => {
    registerServices(createServices(makeEngine(), { profiles: [] }));
    const health = await new HealthController().getHealth();

    expect(health.profile).toBeUndefined();
    expect(health.profiles).toEqual([]);
  });
});
