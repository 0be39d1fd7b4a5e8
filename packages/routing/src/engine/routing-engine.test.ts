import { describe, it, expect, vi, afterEach } from "vitest";
import type { GraphEdge, GraphNode, TimeContext } from "@campus-flow/types";
import { GraphStore } from "../graph/graph-store.js";
import { ForecastCache } from "../forecast/forecast-cache.js";
import { StaticFlowPredictor } from "../forecast/static-predictor.js";
import { DEFAULT_ROUTING_CONFIG } from "../config/routing-config.js";
import {
  ForecastNotReadyError,
  InvalidQueryError,
  InvalidTimeContextError,
  UnknownNodeError,
} from "../errors.js";
import { RoutingEngine, isRouteMode, weightingsFor } from "./routing-engine.js";

// ─── Fixtures ───────────────────────────────────────────────────────────────

function node(id: string): GraphNode {
  return { id, coordinate: { lat: 33.64, lng: 72.36 }, label: id, kind: "poi" };
}

function edge(id: string, source: string, target: string): GraphEdge {
  return { id, source, target, lengthMeters: 10, capacity: 100, kind: "path" };
}

const DIAMOND = GraphStore.load(
  ["A", "B", "C", "D"].map(node),
  [edge("ab", "A", "B"), edge("ac", "A", "C"), edge("bd", "B", "D"), edge("cd", "C", "D")],
);

const MORNING: TimeContext = { hour: 9, dayOfWeek: 1, isPeak: 1 };

function makeEngine(flows: Record<string, number> = {}) {
  const predictor = new StaticFlowPredictor(flows);
  const cache = new ForecastCache(DIAMOND, predictor);
  return { engine: new RoutingEngine(DIAMOND, cache, DEFAULT_ROUTING_CONFIG), cache, predictor };
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ─── Helpers ────────────────────────────────────────────────────────────────

describe("isRouteMode", () => {
  it("accepts the three modes only", () => {
    expect(isRouteMode("distance")).toBe(true);
    expect(isRouteMode("penalized")).toBe(true);
    expect(isRouteMode("both")).toBe(true);
    expect(isRouteMode("fastest")).toBe(false);
  });
});

describe("weightingsFor", () => {
  it("expands both into penalized then distance", () => {
    expect(weightingsFor("both")).toEqual(["penalized", "distance"]);
    expect(weightingsFor("distance")).toEqual(["distance"]);
  });
});

// ─── RoutingEngine ──────────────────────────────────────────────────────────

describe("RoutingEngine.findRoutes", () => {
  it("routes by distance without any forecast", async () => {
    const { engine } = makeEngine();
    const answer = await engine.findRoutes({ source: "A", target: "D", mode: "distance", k: 2 });

    expect(answer.mode).toBe("distance");
    expect(answer.forecastKey).toBeUndefined();
    expect(answer.penalized).toBeUndefined();
    const outcome = answer.distance;
    if (outcome?.kind !== "found") throw new Error("expected a route");
    expect(outcome.primary.path).toEqual(["A", "B", "D"]);
    expect(outcome.alternates.map((r) => r.path)).toEqual([["A", "C", "D"]]);
  });

  it("fails penalized routing before any forecast exists", async () => {
    const { engine } = makeEngine();
    await expect(engine.findRoutes({ source: "A", target: "D", mode: "penalized" })).rejects.toBeInstanceOf(
      ForecastNotReadyError,
    );
    await expect(engine.findRoutes({ source: "A", target: "D", mode: "both" })).rejects.toMatchObject({
      kind: "forecast-not-ready",
    });
  });

  it("avoids a congested edge under penalized routing", async () => {
    const { engine } = makeEngine({ ab: 90 });
    const answer = await engine.findRoutes({
      source: "A",
      target: "D",
      mode: "both",
      k: 2,
      timeContext: MORNING,
    });

    expect(answer.forecastKey).toBe("9:1:1");
    const penalized = answer.penalized;
    if (penalized?.kind !== "found") throw new Error("expected a penalized route");
    expect(penalized.primary.path).toEqual(["A", "C", "D"]);
    expect(penalized.primary.cost).toBeCloseTo(20, 9);
    expect(penalized.alternates[0]?.path).toEqual(["A", "B", "D"]);
    expect(penalized.alternates[0]?.cost).toBeCloseTo(29, 9);
    expect(penalized.alternates[0]?.lengthMeters).toBe(20);

    const distance = answer.distance;
    if (distance?.kind !== "found") throw new Error("expected a distance route");
    expect(distance.primary.path).toEqual(["A", "B", "D"]);
  });

  it("uses the active forecast when the query names no time context", async () => {
    const { engine } = makeEngine({ ab: 90 });
    await engine.forecast(MORNING);

    const answer = await engine.findRoutes({ source: "A", target: "D", mode: "penalized", k: 1 });
    expect(answer.forecastKey).toBe("9:1:1");
    expect(answer.penalized?.kind === "found" && answer.penalized.primary.path).toEqual(["A", "C", "D"]);
  });

  it("computes the named forecast once across queries", async () => {
    const { engine, predictor } = makeEngine();
    const spy = vi.spyOn(predictor, "predictAll");

    await engine.findRoutes({ source: "A", target: "D", mode: "penalized", timeContext: MORNING });
    await engine.findRoutes({ source: "B", target: "C", mode: "penalized", timeContext: MORNING });
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it("matches distance routing when every ratio is zero", async () => {
    const { engine } = makeEngine();
    const answer = await engine.findRoutes({
      source: "A",
      target: "D",
      mode: "both",
      k: 2,
      timeContext: MORNING,
    });
    const paths = (o: typeof answer.distance) =>
      o?.kind === "found" ? [o.primary.path, ...o.alternates.map((r) => r.path)] : [];
    expect(paths(answer.penalized)).toEqual(paths(answer.distance));
  });

  it("lets a query override the congestion weight", async () => {
    const { engine } = makeEngine({ ab: 90 });
    const answer = await engine.findRoutes({
      source: "A",
      target: "D",
      mode: "penalized",
      k: 1,
      timeContext: MORNING,
      congestionWeight: 0,
    });
    const outcome = answer.penalized;
    if (outcome?.kind !== "found") throw new Error("expected a route");
    expect(outcome.primary.path).toEqual(["A", "B", "D"]);
    expect(outcome.primary.cost).toBe(20);
  });

  it("falls back to the configured default k", async () => {
    const { engine } = makeEngine();
    const answer = await engine.findRoutes({ source: "A", target: "D", mode: "distance" });
    expect(answer.distance?.kind === "found" && answer.distance.alternates).toHaveLength(1);
  });

  it("returns every existing path when k exceeds them", async () => {
    const { engine } = makeEngine();
    const answer = await engine.findRoutes({ source: "A", target: "D", mode: "distance", k: 50 });
    const outcome = answer.distance;
    if (outcome?.kind !== "found") throw new Error("expected a route");
    expect(outcome.primary.path).toEqual(["A", "B", "D"]);
    expect(outcome.alternates.map((r) => r.path)).toEqual([["A", "C", "D"]]);
  });

  it("rejects unknown nodes and k below 1", async () => {
    const { engine } = makeEngine();
    await expect(engine.findRoutes({ source: "Z", target: "D", mode: "distance" })).rejects.toBeInstanceOf(
      UnknownNodeError,
    );
    await expect(engine.findRoutes({ source: "A", target: "D", mode: "distance", k: 0 })).rejects.toThrow(
      new InvalidQueryError("k must be an integer >= 1, got 0"),
    );
  });

  it("rejects invalid time contexts before predicting", async () => {
    const { engine, predictor } = makeEngine();
    const spy = vi.spyOn(predictor, "predictAll");
    await expect(
      engine.findRoutes({
        source: "A",
        target: "D",
        mode: "penalized",
        timeContext: { hour: 24, dayOfWeek: 1, isPeak: 0 },
      }),
    ).rejects.toBeInstanceOf(InvalidTimeContextError);
    expect(spy).not.toHaveBeenCalled();
  });
});
