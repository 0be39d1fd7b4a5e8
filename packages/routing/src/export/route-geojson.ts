/**
 * GeoJSON export for route answers.
 *
 * Each route becomes one LineString through its node coordinates. The
 * primary route of each weighting is drawn solid and on top; alternates are
 * thinner and translucent.
 */

import type { RouteAnswer, RouteResult, Weighting } from "@campus-flow/types";
import type { GeoJsonFeature, GeoJsonFeatureCollection } from "./geojson.js";

/** Base colors per weighting: [primary, alternate] */
export const ROUTE_COLORS: Record<Weighting, [string, string]> = {
  penalized: ["#2563eb", "#93c5fd"],
  distance: ["#111827", "#9ca3af"],
};

/** Build the LineString feature for one route */
export function routeToFeature(route: RouteResult, weighting: Weighting, rank: number): GeoJsonFeature {
  const isPrimary = rank === 0;
  const [primaryColor, alternateColor] = ROUTE_COLORS[weighting];

  return {
    type: "Feature",
    geometry: {
      type: "LineString",
      coordinates: route.coords.map((c) => [c.lng, c.lat]),
    },
    properties: {
      weighting,
      rank,
      isPrimary,
      from: route.path[0] ?? null,
      to: route.path[route.path.length - 1] ?? null,
      nodeCount: route.path.length,
      lengthMeters: Math.round(route.lengthMeters * 10) / 10,
      cost: Math.round(route.cost * 10) / 10,
      walkingMinutes: Math.round(route.walkingMinutes * 10) / 10,
      stroke: isPrimary ? primaryColor : alternateColor,
      "stroke-width": isPrimary ? 5 : 3,
      "stroke-opacity": isPrimary ? 0.9 : 0.6,
    },
  };
}

/**
 * Convert a route answer to a FeatureCollection.
 *
 * Alternates come first so primaries render on top. Weightings with no path
 * contribute no features.
 */
export function routeAnswerToGeoJson(answer: RouteAnswer): GeoJsonFeatureCollection {
  const alternates: GeoJsonFeature[] = [];
  const primaries: GeoJsonFeature[] = [];

  for (const weighting of ["distance", "penalized"] as const) {
    const outcome = answer[weighting];
    if (!outcome || outcome.kind !== "found") continue;
    outcome.alternates.forEach((route, i) => {
      alternates.push(routeToFeature(route, weighting, i + 1));
    });
    primaries.push(routeToFeature(outcome.primary, weighting, 0));
  }

  return { type: "FeatureCollection", features: [...alternates, ...primaries] };
}
