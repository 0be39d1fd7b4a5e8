/**
 * Route results - the output of the routing engine.
 */

import type { TimeContext } from "./forecast.js";

/** How edges are weighted during search */
export type Weighting = "distance" | "penalized";

/** Requested routing mode. "both" runs one search per weighting. */
export type RouteMode = Weighting | "both";

/** Shape of the congestion penalty applied in penalized mode */
export type PenaltyCurve = "linear" | "stepped";

/** A node along a route, with its position */
export interface RouteCoordinate {
  id: string;
  lat: number;
  lng: number;
  label: string;
}

/** A single simple path from source to target */
export interface RouteResult {
  /** Node ids in travel order */
  path: string[];
  coords: RouteCoordinate[];
  /** True physical length in meters, whatever weighting produced the route */
  lengthMeters: number;
  /** Total cost under the weighting that produced the route */
  cost: number;
  /** Estimated walking time in minutes */
  walkingMinutes: number;
}

/** Outcome of one search under one weighting */
export type RouteOutcome =
  | {
      kind: "found";
      /** The best route */
      primary: RouteResult;
      /** Loopless alternates, ranked by increasing cost */
      alternates: RouteResult[];
    }
  | {
      kind: "no-path";
      message: string;
    };

/** A route query */
export interface RouteQuery {
  source: string;
  target: string;
  mode: RouteMode;
  /** Number of routes per weighting (primary + k-1 alternates). Defaults to config. */
  k?: number;
  /** Resolve (and compute if needed) this forecast before penalized search */
  timeContext?: TimeContext;
  /** Per-query override of the congestion weight */
  congestionWeight?: number;
}

/** Answer to a route query, one outcome per requested weighting */
export interface RouteAnswer {
  mode: RouteMode;
  /** Key of the forecast used by penalized search */
  forecastKey?: string;
  distance?: RouteOutcome;
  penalized?: RouteOutcome;
}
