/**
 * GeoJSON export for graph and forecast data.
 *
 * Exports edges as a FeatureCollection of LineStrings (and nodes as Points)
 * for the map client, QGIS, geojson.io, etc. Coordinates are [lng, lat].
 */

import type { CongestionLevel, ForecastEntry, GraphEdge } from "@campus-flow/types";
import type { GraphStore } from "../graph/graph-store.js";

/** GeoJSON types (subset we need) */
export interface GeoJsonFeatureCollection {
  type: "FeatureCollection";
  features: GeoJsonFeature[];
}

export interface GeoJsonFeature {
  type: "Feature";
  geometry: GeoJsonLineString | GeoJsonPoint;
  properties: Record<string, unknown>;
}

/** Positions are [lng, lat] */
export interface GeoJsonLineString {
  type: "LineString";
  coordinates: number[][];
}

export interface GeoJsonPoint {
  type: "Point";
  coordinates: number[];
}

/** Stroke colors by congestion level */
export const CONGESTION_COLORS: Record<CongestionLevel, string> = {
  low: "#16a34a",
  medium: "#f59e0b",
  high: "#dc2626",
};

function edgeLine(graph: GraphStore, edge: GraphEdge): GeoJsonLineString | null {
  const from = graph.node(edge.source);
  const to = graph.node(edge.target);
  if (!from || !to) return null;
  return {
    type: "LineString",
    coordinates: [
      [from.coordinate.lng, from.coordinate.lat],
      [to.coordinate.lng, to.coordinate.lat],
    ],
  };
}

export interface GraphGeoJsonOptions {
  /** Include node Point features (default: true) */
  includeNodes?: boolean;
}

/** Plain graph export: one LineString per edge, optionally one Point per node */
export function graphToGeoJson(graph: GraphStore, options: GraphGeoJsonOptions = {}): GeoJsonFeatureCollection {
  const features: GeoJsonFeature[] = [];

  for (const edge of graph.edges()) {
    const geometry = edgeLine(graph, edge);
    if (!geometry) continue;
    features.push({
      type: "Feature",
      geometry,
      properties: {
        id: edge.id,
        source: edge.source,
        target: edge.target,
        lengthMeters: edge.lengthMeters,
        capacity: edge.capacity,
        kind: edge.kind,
      },
    });
  }

  if (options.includeNodes ?? true) {
    for (const node of graph.nodes()) {
      features.push({
        type: "Feature",
        geometry: { type: "Point", coordinates: [node.coordinate.lng, node.coordinate.lat] },
        properties: { id: node.id, label: node.label, kind: node.kind },
      });
    }
  }

  return { type: "FeatureCollection", features };
}

/**
 * Forecast export: one LineString per edge, colored by congestion level.
 * Edges without a prediction are drawn as low congestion.
 */
export function forecastToGeoJson(graph: GraphStore, entry: ForecastEntry): GeoJsonFeatureCollection {
  const features: GeoJsonFeature[] = [];

  for (const edge of graph.edges()) {
    const geometry = edgeLine(graph, edge);
    if (!geometry) continue;
    const forecast = entry.edges.get(edge.id);
    const level: CongestionLevel = forecast?.level ?? "low";
    features.push({
      type: "Feature",
      geometry,
      properties: {
        edgeId: edge.id,
        predFlow: forecast ? Math.round(forecast.predFlow * 10) / 10 : null,
        capacity: edge.capacity,
        ratio: forecast ? Math.round(forecast.ratio * 1000) / 1000 : null,
        level,
        forecastKey: entry.key,
        stroke: CONGESTION_COLORS[level],
        "stroke-width": level === "high" ? 5 : 3,
        "stroke-opacity": 0.85,
      },
    });
  }

  return { type: "FeatureCollection", features };
}
