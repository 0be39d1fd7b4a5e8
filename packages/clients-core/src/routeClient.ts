import { ApiError, BaseClient, type ClientConfig, type QueryValue } from "./baseClient.js";
import type { RouteGeoJsonResponse, RouteRequest, RouteResponse } from "./types.js";

function routeQuery(request: RouteRequest): Record<string, QueryValue> {
  return {
    source: request.source,
    target: request.target,
    mode: request.mode,
    k: request.k,
    hour: request.hour,
    dayOfWeek: request.dayOfWeek,
    isPeak: request.isPeak,
    congestionWeight: request.congestionWeight,
  };
}

/** True when the server found no path for any requested weighting */
export function isNoPath(err: unknown): boolean {
  return err instanceof ApiError && err.kind === "no-path";
}

export class RouteClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/routes", config);
  }

  /** Primary route plus alternates per weighting */
  public async findRoutes(request: RouteRequest): Promise<RouteResponse> {
    return this.client.get<RouteResponse>({ query: routeQuery(request) });
  }

  /** Same routes as a styled FeatureCollection */
  public async findRoutesGeoJson(request: RouteRequest): Promise<RouteGeoJsonResponse> {
    return this.client.get<RouteGeoJsonResponse>({ path: "geojson", query: routeQuery(request) });
  }
}
