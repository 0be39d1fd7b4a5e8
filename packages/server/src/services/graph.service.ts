import { InvalidQueryError, graphToGeoJson, type GeoJsonFeatureCollection, type GraphStore } from "@campus-flow/routing";
import type { GraphResponse, NearestNodeResponse } from "../models/responses.js";

export class GraphService {
  constructor(private readonly graph: GraphStore) {}

  getGraph(): GraphResponse {
    return { nodes: [...this.graph.nodes()], edges: [...this.graph.edges()] };
  }

  /** Edges as LineStrings and nodes as Points, for map layers */
  getGraphGeoJson(): GeoJsonFeatureCollection {
    return graphToGeoJson(this.graph);
  }

  /** Snap a map click to the closest node */
  nearest(lat: number, lng: number): NearestNodeResponse {
    if (lat < -90 || lat > 90 || lng < -180 || lng > 180) {
      throw new InvalidQueryError(`coordinate out of range: ${lat}, ${lng}`);
    }
    const snapped = this.graph.nearestNode({ lat, lng });
    if (!snapped) throw new InvalidQueryError("graph has no nodes");
    return { node: snapped.node, distanceMeters: Math.round(snapped.distanceMeters * 10) / 10 };
  }
}
