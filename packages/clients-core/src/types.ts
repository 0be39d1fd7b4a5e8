/**
 * Request/response shapes of the campus routing API.
 *
 * Domain types come from @campus-flow/types; the rest mirror the server's
 * models so clients need no dependency on the server or routing packages.
 */

import type {
  CongestionLevel,
  ForecastCacheStats,
  GraphEdge,
  GraphNode,
  RouteAnswer,
  RouteMode,
  TimeContext,
} from "@campus-flow/types";

// ─── Graph ──────────────────────────────────────────────────────────────────

export interface GraphResponse {
  nodes: GraphNode[];
  edges: GraphEdge[];
}

export interface NearestNodeRequest {
  lat: number;
  lng: number;
}

export interface NearestNodeResponse {
  node: GraphNode;
  distanceMeters: number;
}

// ─── Forecast ───────────────────────────────────────────────────────────────

/** Time context query; the server defaults missing fields to Monday 09:00 peak */
export type TimeContextQuery = Partial<TimeContext>;

export interface ForecastRow {
  edgeId: string;
  predFlow: number;
  capacity: number;
  ratio: number;
  level: CongestionLevel;
}

export interface ForecastResponse {
  key: string;
  createdAt: string;
  predictor: string;
  context: TimeContext;
  edges: ForecastRow[];
}

// ─── GeoJSON ────────────────────────────────────────────────────────────────

export interface GeoJsonFeature {
  type: "Feature";
  geometry:
    | { type: "LineString"; coordinates: number[][] }
    | { type: "Point"; coordinates: number[] };
  properties: Record<string, unknown>;
}

export interface GeoJsonFeatureCollection {
  type: "FeatureCollection";
  features: GeoJsonFeature[];
}

// ─── Routes ─────────────────────────────────────────────────────────────────

export interface RouteRequest extends TimeContextQuery {
  source: string;
  target: string;
  mode?: RouteMode;
  k?: number;
  congestionWeight?: number;
}

export type RouteResponse = RouteAnswer;

export interface RouteGeoJsonResponse extends GeoJsonFeatureCollection {
  _meta: {
    mode: RouteMode;
    forecastKey: string | null;
    routeCount: number;
  };
}

// ─── Health ─────────────────────────────────────────────────────────────────

export interface ProfileInfo {
  name: string;
  description: string;
}

export interface HealthResponse {
  status: "ok";
  uptime: number;
  graph: { nodes: number; edges: number };
  cache: ForecastCacheStats;
  profile?: string;
  profiles: ProfileInfo[];
}

// ─── Errors ─────────────────────────────────────────────────────────────────

export interface ErrorResponse {
  message: string;
  kind?: string;
  details?: unknown;
}
