import type {
  ErrorKind,
  ForecastCacheStats,
  GraphEdge,
  GraphNode,
  RouteAnswer,
  RouteMode,
  TimeContext,
} from "@campus-flow/types";
import type { ForecastRow, GeoJsonFeatureCollection, ProfileInfo } from "@campus-flow/routing";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  graph: { nodes: number; edges: number };
  cache: ForecastCacheStats;
  /** Active routing profile, if one was selected */
  profile?: string;
  profiles: ProfileInfo[];
}

export interface GraphResponse {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface NearestNodeResponse {
  node: GraphNode;
  distanceMeters: number;
}

export interface ForecastResponse {
  key: string;
  createdAt: string;
  predictor: string;
  context: TimeContext;
  edges: ForecastRow[];
}

export type RouteResponse = RouteAnswer;

export interface RouteGeoJsonResponse extends GeoJsonFeatureCollection {
  _meta: {
    mode: RouteMode;
    forecastKey: string | null;
    routeCount: number;
  };
}

export interface NoPathResponse {
  message: "no path";
  kind: "no-path";
}

export interface ErrorResponse {
  message: string;
  kind?: ErrorKind | "validation";
  details?: unknown;
}
