import type { RouteMode } from "@campus-flow/types";

/** Time context fields as they arrive on a query string; missing fields take defaults */
export interface TimeContextQuery {
  hour?: number;
  dayOfWeek?: number;
  isPeak?: 0 | 1;
}

export interface RouteRequest extends TimeContextQuery {
  source: string;
  target: string;
  /** Defaults to "both" */
  mode?: RouteMode;
  /** Routes per weighting, primary included. Defaults to the routing config. */
  k?: number;
  /** Overrides the configured congestion weight for this query */
  congestionWeight?: number;
}

/** Plain JSON, or a GeoJSON FeatureCollection for map layers */
export type ResponseFormat = "json" | "geojson";
