import type { TimeContext } from "@campus-flow/types";
import {
  forecastToGeoJson,
  toForecastRows,
  type GeoJsonFeatureCollection,
  type RoutingEngine,
} from "@campus-flow/routing";
import type { TimeContextQuery } from "../models/requests.js";
import type { ForecastResponse } from "../models/responses.js";

/** Monday 09:00, a class-change peak */
export const DEFAULT_TIME_CONTEXT: Readonly<TimeContext> = Object.freeze({ hour: 9, dayOfWeek: 1, isPeak: 1 });

export function resolveTimeContext(query: TimeContextQuery): TimeContext {
  return {
    hour: query.hour ?? DEFAULT_TIME_CONTEXT.hour,
    dayOfWeek: query.dayOfWeek ?? DEFAULT_TIME_CONTEXT.dayOfWeek,
    isPeak: query.isPeak ?? DEFAULT_TIME_CONTEXT.isPeak,
  };
}

export class ForecastService {
  constructor(private readonly engine: RoutingEngine) {}

  /** Compute (or reuse) the forecast for a time context; it becomes the active forecast. */
  async getForecast(query: TimeContextQuery): Promise<ForecastResponse> {
    const entry = await this.engine.forecast(resolveTimeContext(query));
    return {
      key: entry.key,
      createdAt: entry.createdAt,
      predictor: entry.predictor,
      context: { ...entry.context },
      edges: toForecastRows(entry),
    };
  }

  async getForecastGeoJson(query: TimeContextQuery): Promise<GeoJsonFeatureCollection> {
    const entry = await this.engine.forecast(resolveTimeContext(query));
    return forecastToGeoJson(this.engine.graph, entry);
  }
}
