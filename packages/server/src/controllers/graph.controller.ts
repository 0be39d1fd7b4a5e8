import { Controller, Get, Query, Route, Tags } from "@tsoa/runtime";
import type { GeoJsonFeatureCollection } from "@campus-flow/routing";
import type { ResponseFormat } from "../models/requests.js";
import type { GraphResponse, NearestNodeResponse } from "../models/responses.js";
import { getServices } from "../services/registry.js";

@Route("api/graph")
@Tags("Graph")
export class GraphController extends Controller {
  /** All nodes and edges of the walking network, as lists or as GeoJSON */
  @Get()
  public async getGraph(@Query() format?: ResponseFormat): Promise<GraphResponse | GeoJsonFeatureCollection> {
    const { graph } = getServices();
    return format === "geojson" ? graph.getGraphGeoJson() : graph.getGraph();
  }

  /** Closest node to a coordinate (click-to-pick) */
  @Get("nearest")
  public async getNearest(@Query() lat: number, @Query() lng: number): Promise<NearestNodeResponse> {
    return getServices().graph.nearest(lat, lng);
  }
}
