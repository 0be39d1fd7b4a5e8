import { describe, it, expect, beforeEach, vi, afterEach } from "vitest";
import { ForecastNotReadyError } from "@campus-flow/routing";
import { RouteNotFoundError, RouteService, toRouteQuery } from "./route.service.js";
import { RouteController } from "../controllers/route.controller.js";
import { createServices, registerServices } from "./registry.js";
import { makeEngine } from "./test-fixtures.js";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("toRouteQuery", () => {
  it("defaults to both weightings and no time context", () => {
    expect(toRouteQuery({ source: "A", target: "D" })).toEqual({ source: "A", target: "D", mode: "both" });
  });

  it("fills the rest of a partial time context with defaults", () => {
    expect(toRouteQuery({ source: "A", target: "D", mode: "penalized", hour: 14, k: 2 })).toEqual({
      source: "A",
      target: "D",
      mode: "penalized",
      k: 2,
      timeContext: { hour: 14, dayOfWeek: 1, isPeak: 1 },
    });
  });

  it("passes the congestion weight through", () => {
    expect(toRouteQuery({ source: "A", target: "D", congestionWeight: 0 }).congestionWeight).toBe(0);
  });
});

describe("RouteService", () => {
  it("returns both weightings for a time context", async () => {
    const service = new RouteService(makeEngine());
    const answer = await service.findRoutes({ source: "A", target: "D", k: 2, hour: 9 });

    expect(answer.mode).toBe("both");
    expect(answer.forecastKey).toBe("9:1:1");
    expect(answer.penalized?.kind === "found" && answer.penalized.primary.path).toEqual(["A", "C", "D"]);
    expect(answer.distance?.kind === "found" && answer.distance.primary.path).toEqual(["A", "B", "D"]);
  });

  it("fails penalized routing before any forecast", async () => {
    const service = new RouteService(makeEngine());
    await expect(service.findRoutes({ source: "A", target: "D" })).rejects.toBeInstanceOf(ForecastNotReadyError);
  });

  it("raises RouteNotFoundError when nothing connects the nodes", async () => {
    const service = new RouteService(makeEngine());
    await expect(service.findRoutes({ source: "A", target: "E", mode: "distance" })).rejects.toThrow(
      new RouteNotFoundError("No path between A and E"),
    );
  });

  it("adds route metadata to the GeoJSON answer", async () => {
    const service = new RouteService(makeEngine());
    const result = await service.findRoutesGeoJson({ source: "A", target: "D", k: 2, hour: 9 });

    expect(result.type).toBe("FeatureCollection");
    expect(result.features).toHaveLength(4);
    expect(result._meta).toEqual({ mode: "both", forecastKey: "9:1:1", routeCount: 4 });
  });

  it("reports a null forecast key for distance-only answers", async () => {
    const service = new RouteService(makeEngine());
    const result = await service.findRoutesGeoJson({ source: "A", target: "D", mode: "distance", k: 1 });
    expect(result._meta).toEqual({ mode: "distance", forecastKey: null, routeCount: 1 });
  });
});

describe("RouteController", () => {
  beforeEach(() => {
    registerServices(createServices(makeEngine(), { profiles: [] }));
  });

  it("answers no path with a 404 body", async () => {
    const controller = new RouteController();
    const body = await controller.getRoutes("A", "F", "distance");

    expect(controller.getStatus()).toBe(404);
    expect(body).toEqual({ message: "no path", kind: "no-path" });
  });

  it("leaves the status unset on success", async () => {
    const controller = new RouteController();
    const body = await controller.getRoutes("A", "D", "distance", 1);

    expect(controller.getStatus()).toBeUndefined();
    expect("mode" in body && body.mode).toBe("distance");
  });

  it("rethrows core errors for the error handler", async () => {
    const controller = new RouteController();
    await expect(controller.getRoutesGeoJson("A", "Q", "distance")).rejects.toMatchObject({ kind: "unknown-node" });
  });
});
