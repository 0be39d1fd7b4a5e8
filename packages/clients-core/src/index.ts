// Base
export {
  BaseClient,
  ApiError,
  compactQuery,
  toApiError,
  type ClientConfig,
  type QueryValue,
  type RequestParams,
} from "./baseClient.js";

// Domain clients
export { GraphClient } from "./graphClient.js";
export { ForecastClient } from "./forecastClient.js";
export { RouteClient, isNoPath } from "./routeClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Graph
  GraphResponse,
  NearestNodeRequest,
  NearestNodeResponse,
  // Forecast
  TimeContextQuery,
  ForecastRow,
  ForecastResponse,
  // GeoJSON
  GeoJsonFeature,
  GeoJsonFeatureCollection,
  // Routes
  RouteRequest,
  RouteResponse,
  RouteGeoJsonResponse,
  // Health
  HealthResponse,
  ProfileInfo,
  // Errors
  ErrorResponse,
} from "./types.js";
