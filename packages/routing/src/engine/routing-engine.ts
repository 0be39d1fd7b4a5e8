/**
 * Routing engine: forecast resolution, weighting and search.
 *
 * Holds the immutable graph, the forecast cache and the routing config.
 * Each query is independent; the only state shared between queries is the
 * forecast cache.
 *
 * Penalized routing needs a forecast. A query may name its time context
 * (resolved through the cache, computed on first use); otherwise the most
 * recently resolved forecast is used. With neither, the query fails with
 * ForecastNotReadyError rather than silently assuming zero congestion.
 */

import type {
  ForecastEntry,
  RouteAnswer,
  RouteMode,
  RouteQuery,
  TimeContext,
  Weighting,
} from "@campus-flow/types";
import { ForecastNotReadyError, InvalidQueryError, UnknownNodeError } from "../errors.js";
import type { GraphStore } from "../graph/graph-store.js";
import type { ForecastCache } from "../forecast/forecast-cache.js";
import { DEFAULT_ROUTING_CONFIG, type RoutingConfig } from "../config/routing-config.js";
import { createWeightFunction } from "../weights/weight-function.js";
import { findRoutes } from "../search/route-builder.js";

const ROUTE_MODES: readonly RouteMode[] = ["distance", "penalized", "both"];

export function isRouteMode(value: string): value is RouteMode {
  return ROUTE_MODES.some((mode) => mode === value);
}

/** Weightings to run for a mode, in response order */
export function weightingsFor(mode: RouteMode): Weighting[] {
  if (mode === "both") return ["penalized", "distance"];
  return [mode];
}

export class RoutingEngine {
  readonly graph: GraphStore;
  readonly forecasts: ForecastCache;
  readonly config: RoutingConfig;

  constructor(graph: GraphStore, forecasts: ForecastCache, config: RoutingConfig = DEFAULT_ROUTING_CONFIG) {
    this.graph = graph;
    this.forecasts = forecasts;
    this.config = config;
  }

  /** Resolve the forecast for a context; it becomes the active forecast. */
  async forecast(context: TimeContext): Promise<ForecastEntry> {
    return this.forecasts.getOrCompute(context);
  }

  /**
   * Run one search per weighting the mode requires.
   *
   * @throws UnknownNodeError, InvalidQueryError, ForecastNotReadyError,
   *   InvalidTimeContextError, PredictionError
   */
  async findRoutes(query: RouteQuery): Promise<RouteAnswer> {
    const { source, target, mode } = query;
    if (!isRouteMode(mode)) {
      throw new InvalidQueryError(`mode must be one of ${ROUTE_MODES.join(", ")}, got ${String(mode)}`);
    }
    if (!this.graph.hasNode(source)) throw new UnknownNodeError(source);
    if (!this.graph.hasNode(target)) throw new UnknownNodeError(target);

    const k = query.k ?? this.config.defaultK;
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidQueryError(`k must be an integer >= 1, got ${k}`);
    }

    const weightings = weightingsFor(mode);
    let forecast: ForecastEntry | null = null;
    if (weightings.includes("penalized")) {
      forecast = query.timeContext
        ? await this.forecasts.getOrCompute(query.timeContext)
        : this.forecasts.latest();
      if (!forecast) throw new ForecastNotReadyError();
    }

    const answer: RouteAnswer = { mode };
    if (forecast) answer.forecastKey = forecast.key;

    const start = performance.now();
    for (const weighting of weightings) {
      const weight = createWeightFunction(weighting, {
        forecast,
        congestionWeight: query.congestionWeight ?? this.config.congestionWeight,
        penaltyCurve: this.config.penaltyCurve,
      });
      answer[weighting] = findRoutes(this.graph, source, target, weight, k, {
        walkingSpeedMps: this.config.walkingSpeedMps,
      });
    }

    console.log(
      `[routing] ${source} -> ${target} mode=${mode} k=${k}${forecast ? ` forecast=${forecast.key}` : ""} in ${(performance.now() - start).toFixed(1)}ms`,
    );
    return answer;
  }
}
